import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { XsdBundle } from "./xsd-parser";
import type {
  OutputDatatype,
  OutputField,
  OutputMessage,
  OutputSegment,
  ReferenceData,
} from "./types";

export interface MergeReport {
  fieldCount: number;
  segmentCount: number;
  datatypeCount: number;
  messageCount: number;
  tableCount: number;
  /** Fields whose optionality came from the previous catalog rather than minOccurs. */
  carriedOptionalityCount: number;
}

/**
 * Builds reference catalogs from parsed XSD. Descriptions, optionality,
 * component tables and code tables are not part of the XSD bundle; they are
 * carried over from `previous` (the catalog being regenerated) when present.
 */
export function buildReferenceData(
  xsd: XsdBundle,
  previous?: ReferenceData,
): { data: ReferenceData; report: MergeReport } {
  const fields: Record<string, OutputField> = {};
  for (const [key, field] of xsd.fields) {
    fields[key] = {
      ...field,
      description: previous?.fields[key]?.description ?? null,
    };
  }

  let carriedOptionalityCount = 0;
  const segments: Record<string, OutputSegment> = {};
  for (const [name, segment] of xsd.segments) {
    const prior = previous?.segments[name];
    segments[name] = {
      longName: prior?.longName ?? null,
      description: prior?.description ?? null,
      fields: segment.fields.map((f) => {
        const optionality = prior?.fields.find((p) => p.field === f.field)?.optionality ?? null;
        if (optionality) carriedOptionalityCount++;
        return { ...f, optionality };
      }),
    };
  }

  const datatypes: Record<string, OutputDatatype> = {};
  for (const [name, datatype] of xsd.datatypes) {
    const prior = previous?.datatypes[name];
    datatypes[name] = {
      components: datatype.components
        .map((c) => {
          const priorComponent = prior?.components.find((p) => p.component === c.component);
          return {
            ...c,
            optionality: priorComponent?.optionality ?? null,
            table: priorComponent?.table ?? null,
          };
        })
        .sort((a, b) => a.position - b.position),
    };
  }

  const messages: Record<string, OutputMessage> = {};
  for (const [name, message] of xsd.messages) {
    messages[name] = { elements: message.elements };
  }

  const tables = previous?.tables ?? {};

  return {
    data: { fields, segments, datatypes, messages, tables },
    report: {
      fieldCount: xsd.fields.size,
      segmentCount: xsd.segments.size,
      datatypeCount: xsd.datatypes.size,
      messageCount: xsd.messages.size,
      tableCount: Object.keys(tables).length,
      carriedOptionalityCount,
    },
  };
}

export async function writeReferenceData(data: ReferenceData, outputDir: string): Promise<void> {
  await mkdir(outputDir, { recursive: true });

  const writeJson = (filename: string, value: unknown) =>
    writeFile(join(outputDir, filename), JSON.stringify(value, null, 2) + "\n");

  await Promise.all([
    writeJson("fields.json", data.fields),
    writeJson("segments.json", data.segments),
    writeJson("datatypes.json", data.datatypes),
    writeJson("messages.json", data.messages),
    writeJson("tables.json", data.tables),
  ]);
}
