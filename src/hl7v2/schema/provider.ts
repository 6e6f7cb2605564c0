/**
 * Schema provider over HL7v2 reference catalogs.
 *
 * Converts the JSON catalogs (see src/hl7v2/reference/types.ts) into the
 * structural definitions the composer consumes. Every lookup goes through a
 * per-kind read-through cache, so a definition is built once per process.
 */
import { loadReferenceData } from "../reference/load";
import type { OutputMessage, OutputSegmentField, ReferenceData, XsdMessageElement } from "../reference/types";
import { ReadThroughCache } from "./cache";
import type {
  CodeTable,
  ComponentDefinition,
  DataTypeDefinition,
  FieldDefinition,
  Optionality,
  Repeatability,
  SchemaProvider,
  SegmentOccurrence,
  SegmentSchema,
  TriggerEventDefinition,
} from "./types";

export const PRIMITIVE_TYPES = new Set([
  "ST", "TX", "FT", "NM", "SI", "ID", "IS", "DT", "TM", "DTM", "TS", "GTS", "NUL",
]);

/**
 * Trigger events that share another event's message structure (HL7 table 0354).
 */
export const MESSAGE_STRUCTURE_ALIASES: Readonly<Record<string, string>> = {
  ADT_A04: "ADT_A01",
  ADT_A08: "ADT_A01",
  ADT_A13: "ADT_A01",
  ORU_R30: "ORU_R01",
  RDE_O25: "RDE_O11",
};

/**
 * `ADT^A01` becomes `adt_a01`. Only message code and trigger event count, so
 * `ADT^A04^ADT_A01` is `adt_a04`.
 */
export function toTriggerEventCode(messageType: string): string {
  return messageType.split("^").slice(0, 2).join("_").toLowerCase();
}

// =============================================================================
// Catalog conversion
// =============================================================================

function optionalityOf(code: string | null | undefined, minOccurs: number): Optionality {
  if (code) return code === "R" ? "required" : "optional";
  return minOccurs > 0 ? "required" : "optional";
}

function repeatabilityOf(maxOccurs: number | "unbounded"): Repeatability {
  return maxOccurs === "unbounded" || maxOccurs > 1 ? "unbounded" : "once";
}

/**
 * Flattens nested message elements into ordered occurrences. A group becomes a
 * marker followed by its members one level deeper.
 */
export function flattenMessageElements(elements: XsdMessageElement[]): SegmentOccurrence[] {
  const occurrences: SegmentOccurrence[] = [];

  const visit = (list: XsdMessageElement[], level: number) => {
    for (const element of list) {
      const code = element.group ?? element.segment;
      if (!code) continue;

      occurrences.push({
        code,
        optionality: element.minOccurs > 0 ? "required" : "optional",
        repeatability: repeatabilityOf(element.maxOccurs),
        isGroup: element.group !== undefined,
        level,
        position: occurrences.length + 1,
      });

      if (element.group !== undefined && element.elements) {
        visit(element.elements, level + 1);
      }
    }
  };

  visit(elements, 0);
  return occurrences;
}

function buildTriggerEvent(code: string, data: ReferenceData): TriggerEventDefinition | null {
  const name = code.toUpperCase();
  const structure = data.messages[name] ? name : MESSAGE_STRUCTURE_ALIASES[name];
  const message: OutputMessage | undefined = structure ? data.messages[structure] : undefined;
  if (!structure || !message) return null;

  return {
    code: code.toLowerCase(),
    structure,
    segments: flattenMessageElements(message.elements),
  };
}

function buildField(segmentCode: string, entry: OutputSegmentField, data: ReferenceData): FieldDefinition | null {
  const field = data.fields[entry.field] ?? data.fields[`${segmentCode}.${entry.position}`];
  if (!field) return null;

  return {
    position: entry.position,
    name: field.longName,
    dataType: field.dataType,
    optionality: optionalityOf(entry.optionality, entry.minOccurs),
    repeatability: repeatabilityOf(entry.maxOccurs),
    maxLength: field.maxLength,
    table: field.table,
  };
}

function buildSegment(code: string, data: ReferenceData): SegmentSchema | null {
  const segment = data.segments[code];
  if (!segment) return null;

  const fields = segment.fields
    .map((entry) => buildField(code, entry, data))
    .filter((field): field is FieldDefinition => field !== null)
    .sort((a, b) => a.position - b.position);

  return { code, longName: segment.longName, description: segment.description, fields };
}

function buildDataType(code: string, data: ReferenceData): DataTypeDefinition | null {
  const datatype = data.datatypes[code];
  if (!datatype) {
    return PRIMITIVE_TYPES.has(code) ? { code, components: [] } : null;
  }

  const components: ComponentDefinition[] = datatype.components
    .map((c) => ({
      position: c.position,
      name: c.longName,
      dataType: c.dataType,
      optionality: optionalityOf(c.optionality, 0),
      table: c.table ?? null,
    }))
    .sort((a, b) => a.position - b.position);

  return { code, components };
}

function buildCodeTable(id: string, data: ReferenceData): CodeTable | null {
  const table = data.tables[id];
  if (!table) return null;
  return { id: table.tableNumber, name: table.name, values: table.values };
}

// =============================================================================
// Providers
// =============================================================================

/**
 * Builds a provider over any source of reference catalogs. The source is read
 * once; a failed read is retried on the next lookup.
 */
export function createSchemaProvider(source: () => Promise<ReferenceData>): SchemaProvider {
  const reference = new ReadThroughCache<ReferenceData>(() => source());
  const data = () => reference.get("catalog");

  const triggerEvents = new ReadThroughCache(async (code) => buildTriggerEvent(code, await data()));
  const segments = new ReadThroughCache(async (code) => buildSegment(code, await data()));
  const dataTypes = new ReadThroughCache(async (code) => buildDataType(code, await data()));
  const codeTables = new ReadThroughCache(async (id) => buildCodeTable(id, await data()));

  return {
    getTriggerEvent: (code) => triggerEvents.get(code.toLowerCase()),
    getSegment: (code) => segments.get(code),
    getDataType: (code) => dataTypes.get(code),
    getCodeTable: (id) => codeTables.get(id),
    async listTriggerEvents() {
      const { messages } = await data();
      const names = [
        ...Object.keys(messages),
        ...Object.entries(MESSAGE_STRUCTURE_ALIASES)
          .filter(([, structure]) => messages[structure] !== undefined)
          .map(([alias]) => alias),
      ];
      return [...new Set(names.map((name) => name.toLowerCase()))].sort();
    },
  };
}

export interface ReferenceSchemaProviderOptions {
  version: string;
  /** Directory holding the JSON catalogs; defaults to data/hl7v2-reference/v{version}. */
  directory?: string;
}

export function createReferenceSchemaProvider(options: ReferenceSchemaProviderOptions): SchemaProvider {
  return createSchemaProvider(() => loadReferenceData(options.version, options.directory));
}
