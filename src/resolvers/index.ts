import { ClinicalContextResolver } from "./clinical-context";
import { CodeTableResolver } from "./code-table";
import { CodedElementResolver } from "./coded-element";
import { ContactFieldResolver } from "./contact-field";
import { DemographicResolver } from "./demographic";
import { IdentifierCoherenceResolver } from "./identifier-coherence";
import { IdentifierFieldResolver } from "./identifier-field";
import { LabResultResolver } from "./lab-result";
import { MessageHeaderResolver } from "./message-header";
import { PrimitiveFallbackResolver } from "./primitive-fallback";
import { RangeCoherenceResolver } from "./range-coherence";
import { SessionValueResolver } from "./session-value";
import { TemporalCoherenceResolver } from "./temporal";
import type { Resolver } from "./types";

/** The built-in resolvers, in registration order. Ties in priority keep this order. */
export function defaultResolvers(): Resolver[] {
  return [
    new SessionValueResolver(),
    new TemporalCoherenceResolver(),
    new ClinicalContextResolver(),
    new MessageHeaderResolver(),
    new LabResultResolver(),
    new CodeTableResolver(),
    new CodedElementResolver(),
    new DemographicResolver(),
    new IdentifierCoherenceResolver(),
    new RangeCoherenceResolver(),
    new ContactFieldResolver(),
    new IdentifierFieldResolver(),
    new PrimitiveFallbackResolver(),
  ];
}

export { ResolverChain } from "./resolver-chain";
export type {
  CompositeAwareResolver,
  ComponentValues,
  FieldResolutionContext,
  FieldValueResolver,
  Resolver,
} from "./types";
export { SEMANTIC_FIELD_PATHS } from "./session-value";
