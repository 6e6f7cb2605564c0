import { readFileSync } from "fs";
import { dirname, join, resolve } from "path";
import { fileURLToPath } from "url";
import type { z } from "zod";

/**
 * Shared helpers for the JSON data files under data/
 */

export const DATA_DIR = resolve(dirname(fileURLToPath(import.meta.url)), "../../data");

/**
 * Reads and validates a JSON file under data/.
 *
 * @throws Error naming the file when it is missing, malformed, or fails validation
 */
export function readDataFile<T>(relativePath: string, schema: z.ZodType<T>): T {
  const path = join(DATA_DIR, relativePath);

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown error";
    throw new Error(`Failed to load data file ${path}: ${message}`);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(
      `Invalid data file ${path}: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown issue"}`,
    );
  }
  return result.data;
}
