/**
 * Reference data loader.
 *
 * Reads the five JSON catalogs under data/hl7v2-reference/v{version}/ and
 * validates them before handing them to the schema provider.
 */
import { readFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import {
  outputDatatypeSchema,
  outputFieldSchema,
  outputMessageSchema,
  outputSegmentSchema,
  outputTableSchema,
  type ReferenceData,
} from "./types";

const PROJECT_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), "../../..");

export class ReferenceDataError extends Error {
  constructor(
    message: string,
    public readonly file: string,
  ) {
    super(message);
    this.name = "ReferenceDataError";
  }
}

export function referenceDataDirectory(version: string, directory?: string): string {
  return directory ?? join(PROJECT_ROOT, "data", "hl7v2-reference", `v${version}`);
}

async function loadCatalog<T>(dir: string, file: string, schema: z.ZodType<T>): Promise<Record<string, T>> {
  const path = join(dir, file);

  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown error reading file";
    throw new ReferenceDataError(`Failed to read reference data ${path}: ${message}`, path);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown parse error";
    throw new ReferenceDataError(`Failed to parse reference data ${path} as JSON: ${message}`, path);
  }

  const result = z.record(z.string(), schema).safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ReferenceDataError(`Invalid reference data in ${path}: ${issues}`, path);
  }
  return result.data;
}

export async function loadReferenceData(version: string, directory?: string): Promise<ReferenceData> {
  const dir = referenceDataDirectory(version, directory);

  const [fields, segments, datatypes, messages, tables] = await Promise.all([
    loadCatalog(dir, "fields.json", outputFieldSchema),
    loadCatalog(dir, "segments.json", outputSegmentSchema),
    loadCatalog(dir, "datatypes.json", outputDatatypeSchema),
    loadCatalog(dir, "messages.json", outputMessageSchema),
    loadCatalog(dir, "tables.json", outputTableSchema),
  ]);

  return { fields, segments, datatypes, messages, tables };
}
