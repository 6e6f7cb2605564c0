import { readFileSync } from "fs";
import { join } from "path";
import { z } from "zod";

/**
 * Composer configuration: message header identity, realism probabilities and
 * the location of the HL7v2 reference data.
 */

const probability = z.number().min(0).max(1);

const composerConfigSchema = z
  .object({
    referenceData: z
      .object({
        version: z.string().min(1).default("2.5"),
        /** Defaults to data/hl7v2-reference/v{version} in the repository. */
        directory: z.string().min(1).optional(),
      })
      .strict()
      .default({}),
    messageHeader: z
      .object({
        sendingApplication: z.string().default("COMPOSER"),
        sendingFacility: z.string().default("COMPOSER_FACILITY"),
        receivingApplication: z.string().default("TARGET_APP"),
        receivingFacility: z.string().default("TARGET_FACILITY"),
        processingId: z.string().min(1).default("P"),
        /** MSH-12. Falls back to referenceData.version. */
        versionId: z.string().min(1).optional(),
      })
      .strict()
      .default({}),
    probabilities: z
      .object({
        optionalSegmentInclusion: probability.default(0.6),
        optionalFieldPopulation: probability.default(0.7),
        componentImportance: z
          .object({
            critical: probability.default(0.95),
            important: probability.default(0.5),
            optional: probability.default(0.2),
          })
          .strict()
          .default({}),
      })
      .strict()
      .default({}),
    segmentSeparator: z.enum(["\r", "\n", "\r\n"]).default("\r"),
  })
  .strict();

export type ComposerConfig = z.infer<typeof composerConfigSchema>;
export type ComposerConfigInput = z.input<typeof composerConfigSchema>;

export const DEFAULT_COMPOSER_CONFIG: ComposerConfig = composerConfigSchema.parse({});

const DEFAULT_CONFIG_PATH = join(process.cwd(), "config", "message-composer.json");

function getConfigPath(): string {
  return process.env.MESSAGE_COMPOSER_CONFIG ?? DEFAULT_CONFIG_PATH;
}

let cachedConfig: ComposerConfig | null = null;

/**
 * Validates a raw config value and fills in defaults.
 *
 * @throws Error listing every invalid key
 */
export function parseComposerConfig(value: unknown): ComposerConfig {
  const result = composerConfigSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid message composer config: ${issues}`);
  }
  return result.data;
}

/**
 * Returns the message composer configuration (lazy singleton).
 * Loaded once at first call and cached for process lifetime.
 *
 * @throws Error if the config file is missing, malformed, or fails validation
 */
export function composerConfig(): ComposerConfig {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  const path = getConfigPath();

  let fileContent: string;
  try {
    fileContent = readFileSync(path, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown error reading file";
    throw new Error(`Failed to load message composer config from ${path}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown parse error";
    throw new Error(`Failed to parse message composer config as JSON: ${message}`);
  }

  cachedConfig = parseComposerConfig(parsed);
  return cachedConfig;
}

/** MSH-12 value for the configured reference data. */
export function headerVersion(config: ComposerConfig): string {
  return config.messageHeader.versionId ?? config.referenceData.version;
}

/**
 * Clears the cached config. Used for testing.
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
