import type { ClinicalBundle } from "./clinical/types";
import { composerConfig } from "./config";
import {
  createMessageComposer,
  errorMessage,
  type ComposeResult,
  type MessageComposer,
} from "./composer/message-composer";
import { createReferenceSchemaProvider, toTriggerEventCode } from "./hl7v2/schema/provider";

let defaultComposer: MessageComposer | null = null;

/** Composer over the bundled reference data, built from configuration on first use. */
export function getDefaultComposer(): MessageComposer {
  if (defaultComposer === null) {
    const config = composerConfig();
    defaultComposer = createMessageComposer({
      provider: createReferenceSchemaProvider(config.referenceData),
      config,
    });
  }
  return defaultComposer;
}

/**
 * Composes one HL7v2 message.
 *
 * @param messageType - e.g. `ADT^A01`
 * @param options - {@link GenerationOptions}; validated, an invalid value yields a failure result
 */
export async function compose(messageType: string, bundle: ClinicalBundle, options?: unknown): Promise<ComposeResult> {
  let composer: MessageComposer;
  try {
    composer = getDefaultComposer();
  } catch (error) {
    return { error: `Error composing message: ${errorMessage(error)}`, triggerEvent: toTriggerEventCode(messageType) };
  }
  return composer.compose(messageType, bundle, options);
}

/** Drops the cached default composer. Used for testing. */
export function resetDefaultComposer(): void {
  defaultComposer = null;
}

export type { ComposeResult, MessageComposer, MessageComposerOptions } from "./composer/message-composer";
export { createMessageComposer } from "./composer/message-composer";
export type { GenerationOptions } from "./composer/generation-context";
export type {
  Address,
  ClinicalBundle,
  Coding,
  ContactPoint,
  Encounter,
  EncounterClass,
  HumanName,
  Observation,
  Patient,
  Period,
  Practitioner,
  Prescription,
} from "./clinical/types";
export { clearConfigCache, composerConfig, parseComposerConfig, type ComposerConfig } from "./config";
export { createReferenceSchemaProvider, createSchemaProvider } from "./hl7v2/schema/provider";
export type * from "./hl7v2/schema/types";
export { SchemaNotFoundError } from "./hl7v2/schema/errors";
export { ReferenceDataError } from "./hl7v2/reference/load";
export { defaultResolvers, ResolverChain, SEMANTIC_FIELD_PATHS } from "./resolvers";
export type {
  CompositeAwareResolver,
  ComponentValues,
  FieldResolutionContext,
  FieldValueResolver,
  Resolver,
} from "./resolvers";
