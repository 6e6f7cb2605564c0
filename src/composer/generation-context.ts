import { isValid, parseISO } from "date-fns";
import { z } from "zod";
import type { ClinicalBundle } from "../clinical/types";
import type { ComposerConfig } from "../config";
import type { MessageSchema } from "../hl7v2/schema/message-schema";
import { createRandom, type Random } from "./random";
import { TimestampLedger } from "./temporal-coherence";

// =============================================================================
// Generation options
// =============================================================================

const generationOptionsSchema = z
  .object({
    seed: z.number().int().optional(),
    segmentInclusionProbabilities: z.record(z.string(), z.number().min(0).max(1)).optional(),
    segmentRepeatCounts: z.record(z.string(), z.number().int().nonnegative()).optional(),
    /** Pinned values by field path (`PID.3`), component path (`PID.5.1`) or semantic path (`patient.mrn`). */
    lockedValues: z.record(z.string(), z.string()).optional(),
    /** Clock for "now"; see {@link referenceClock}. */
    referenceTime: z.date().optional(),
  })
  .strict();

export type GenerationOptions = z.infer<typeof generationOptionsSchema>;

export type OptionsResult = { options: GenerationOptions } | { error: string };

export function validateGenerationOptions(value: unknown): OptionsResult {
  const result = generationOptionsSchema.safeParse(value ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return { error: `Invalid generation options: ${issues}` };
  }
  return { options: result.data };
}

// =============================================================================
// Generation context
// =============================================================================

/**
 * State owned by one composition call. Discarded when the message is done.
 */
export interface GenerationContext {
  readonly bundle: ClinicalBundle;
  /** As supplied by the caller, e.g. `ADT^A01`. */
  readonly messageType: string;
  readonly schema: MessageSchema;
  readonly options: GenerationOptions;
  readonly config: ComposerConfig;
  readonly random: Random;
  readonly now: Date;
  readonly encounterStart: Date | null;
  readonly timestamps: TimestampLedger;
  /** Sampled pool indices per field path, so sibling components describe the same entry. */
  readonly memo: Map<string, number>;
}

/** Seeded runs without an encounter or reference time use this instant. */
export const SEEDED_REFERENCE_TIME = new Date("2024-01-01T12:00:00Z");

export function parseClinicalDate(value: string | undefined): Date | null {
  if (!value) return null;
  const date = parseISO(value);
  return isValid(date) ? date : null;
}

/**
 * `referenceTime` when supplied. Seeded runs otherwise derive the clock from
 * the bundle so their output does not depend on the wall clock.
 */
export function referenceClock(options: GenerationOptions, encounterStart: Date | null): Date {
  if (options.referenceTime) return options.referenceTime;
  if (options.seed !== undefined) return encounterStart ?? SEEDED_REFERENCE_TIME;
  return new Date();
}

export function createGenerationContext(params: {
  bundle: ClinicalBundle;
  messageType: string;
  schema: MessageSchema;
  options: GenerationOptions;
  config: ComposerConfig;
}): GenerationContext {
  const encounterStart = parseClinicalDate(params.bundle.encounter?.period?.start);

  return {
    ...params,
    random: createRandom(params.options.seed),
    now: referenceClock(params.options, encounterStart),
    encounterStart,
    timestamps: new TimestampLedger(),
    memo: new Map(),
  };
}

/** Reuses the sampled index for `key` within this message, drawing one on first use. */
export function memoizedIndex(ctx: GenerationContext, key: string, size: number): number {
  const existing = ctx.memo.get(key);
  if (existing !== undefined && existing < size) return existing;
  const index = ctx.random.int(0, size - 1);
  ctx.memo.set(key, index);
  return index;
}
