import { headerVersion } from "../config";
import {
  COMPONENT_SEPARATOR,
  ENCODING_CHARACTERS,
  FIELD_SEPARATOR,
  escapeValue,
  formatHL7Timestamp,
} from "../hl7v2/format";
import type { SegmentSchema } from "../hl7v2/schema/types";
import type { ResolverChain } from "../resolvers/resolver-chain";
import { lockedValue } from "../resolvers/session-value";
import { generateField } from "./field-generator";
import type { GenerationContext } from "./generation-context";
import { resolveTrackedTimestamp } from "./temporal-coherence";

/** `ADT^A01` becomes `ADT^A01^ADT_A01`; a type that already names its structure is kept. */
export function messageTypeField(messageType: string, structure: string): string {
  return messageType.split("^").length === 2 ? `${messageType}^${structure}` : messageType;
}

type HeaderField = (generation: GenerationContext) => string;

/** Configured HD value (`APP^^L`): components kept, each one escaped. */
function hierarchicDesignator(value: string): string {
  return value.split(COMPONENT_SEPARATOR).map(escapeValue).join(COMPONENT_SEPARATOR);
}

/** MSH positions synthesized from configuration instead of the resolver chain. */
const MESSAGE_HEADER_FIELDS: Readonly<Record<number, HeaderField>> = {
  3: ({ config }) => hierarchicDesignator(config.messageHeader.sendingApplication),
  4: ({ config }) => hierarchicDesignator(config.messageHeader.sendingFacility),
  5: ({ config }) => hierarchicDesignator(config.messageHeader.receivingApplication),
  6: ({ config }) => hierarchicDesignator(config.messageHeader.receivingFacility),
  7: (generation) => formatHL7Timestamp(resolveTrackedTimestamp("MSH.7", generation) ?? generation.now),
  8: () => "",
  9: ({ messageType, schema }) => messageTypeField(messageType, schema.triggerEvent.structure),
  10: ({ random }) => random.digits(6),
  11: ({ config }) => escapeValue(config.messageHeader.processingId),
  12: ({ config }) => escapeValue(headerVersion(config)),
};

function maxPosition(schema: SegmentSchema): number {
  return schema.fields.reduce((max, field) => Math.max(max, field.position), 0);
}

function generateMessageHeader(schema: SegmentSchema, generation: GenerationContext, chain: ResolverChain): string {
  const byPosition = new Map(schema.fields.map((field) => [field.position, field]));
  const last = Math.max(maxPosition(schema), 12);
  let line = schema.code + FIELD_SEPARATOR + ENCODING_CHARACTERS;

  for (let position = 3; position <= last; position++) {
    // Pinned header values are emitted verbatim
    const pinned = lockedValue(generation, `MSH.${position}`);
    const header = MESSAGE_HEADER_FIELDS[position];
    const field = byPosition.get(position);

    let value = "";
    if (pinned !== undefined) {
      value = pinned;
    } else if (header) {
      value = header(generation);
    } else if (field) {
      value = generateField(field, { segmentCode: schema.code, segmentIndex: 1, generation, chain });
    }
    line += FIELD_SEPARATOR + value;
  }
  return line;
}

/**
 * One segment line. A segment without a schema is emitted as its bare code;
 * positions the schema does not define are left empty.
 */
export function generateSegment(
  schema: SegmentSchema | null,
  code: string,
  params: { generation: GenerationContext; chain: ResolverChain; segmentIndex: number },
): string {
  if (!schema) return code;

  const { generation, chain, segmentIndex } = params;
  if (schema.code === "MSH") return generateMessageHeader(schema, generation, chain);

  const byPosition = new Map(schema.fields.map((field) => [field.position, field]));
  const values: string[] = [];
  for (let position = 1; position <= maxPosition(schema); position++) {
    const field = byPosition.get(position);
    values.push(field ? generateField(field, { segmentCode: schema.code, segmentIndex, generation, chain }) : "");
  }

  return [schema.code, ...values].join(FIELD_SEPARATOR);
}
