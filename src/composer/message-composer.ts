/**
 * Message Composer
 *
 * Walks a trigger event's segment occurrences, decides which optional
 * segments and groups to include and how often repeating segments occur,
 * and joins the generated segment lines into one message.
 *
 * Only loading the message's schemas is asynchronous; everything after that
 * runs synchronously against the preloaded snapshot.
 */
import type { ClinicalBundle } from "../clinical/types";
import type { ComposerConfig } from "../config";
import { SchemaNotFoundError } from "../hl7v2/schema/errors";
import { loadMessageSchema } from "../hl7v2/schema/message-schema";
import { toTriggerEventCode } from "../hl7v2/schema/provider";
import type {
  SchemaProvider,
  SegmentOccurrence,
  SegmentSchema,
  TriggerEventDefinition,
} from "../hl7v2/schema/types";
import { defaultResolvers } from "../resolvers";
import { ResolverChain } from "../resolvers/resolver-chain";
import type { Resolver } from "../resolvers/types";
import { createGenerationContext, validateGenerationOptions, type GenerationContext } from "./generation-context";
import { generateSegment } from "./segment-generator";

export type ComposeResult = { message: string } | { error: string; triggerEvent: string };

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// =============================================================================
// Inclusion and repetition
// =============================================================================

type RepeatRange = { terms: string[]; min: number; max: number };

/** Matched against a segment's long name and description, first match wins. */
export const REPEAT_RANGES: readonly RepeatRange[] = [
  { terms: ["next of kin", "emergency contact"], min: 1, max: 2 },
  { terms: ["observation", "result"], min: 1, max: 5 },
  { terms: ["allergy", "adverse"], min: 1, max: 3 },
  { terms: ["diagnosis", "condition"], min: 1, max: 3 },
  { terms: ["guarantor", "financial"], min: 1, max: 2 },
];

const DEFAULT_REPEAT_RANGE = { min: 1, max: 2 };

export function repeatRange(segment: SegmentSchema | null): { min: number; max: number } {
  const text = `${segment?.longName ?? ""} ${segment?.description ?? ""}`.toLowerCase();
  const range = REPEAT_RANGES.find((r) => r.terms.some((term) => text.includes(term))) ?? DEFAULT_REPEAT_RANGE;
  return { min: range.min, max: range.max };
}

function isIncluded(occurrence: SegmentOccurrence, generation: GenerationContext): boolean {
  if (occurrence.optionality === "required") return true;
  const probability =
    generation.options.segmentInclusionProbabilities?.[occurrence.code] ??
    generation.config.probabilities.optionalSegmentInclusion;
  return generation.random.chance(probability);
}

/** Total occurrences of a segment; 1 unless it repeats. */
function occurrenceCount(occurrence: SegmentOccurrence, generation: GenerationContext): number {
  if (occurrence.repeatability === "once") return 1;

  const override = generation.options.segmentRepeatCounts?.[occurrence.code];
  if (override !== undefined) return Math.max(1, override);

  const range = repeatRange(generation.schema.segment(occurrence.code));
  return generation.random.int(range.min, range.max);
}

// =============================================================================
// Composer
// =============================================================================

export interface MessageComposerOptions {
  provider: SchemaProvider;
  config: ComposerConfig;
  /** Defaults to the built-in resolvers. */
  resolvers?: readonly Resolver[];
}

type GroupDecision = { level: number; included: boolean };

export class MessageComposer {
  private readonly provider: SchemaProvider;
  private readonly config: ComposerConfig;
  private readonly chain: ResolverChain;

  constructor(options: MessageComposerOptions) {
    this.provider = options.provider;
    this.config = options.config;
    this.chain = new ResolverChain(options.resolvers ?? defaultResolvers());
  }

  async compose(messageType: string, bundle: ClinicalBundle, options?: unknown): Promise<ComposeResult> {
    const triggerEvent = toTriggerEventCode(messageType);

    const validated = validateGenerationOptions(options);
    if ("error" in validated) {
      return { error: validated.error, triggerEvent };
    }

    let definition: TriggerEventDefinition;
    let generation: GenerationContext;
    try {
      const found = await this.provider.getTriggerEvent(triggerEvent);
      if (!found) {
        return { error: new SchemaNotFoundError("trigger-event", triggerEvent).message, triggerEvent };
      }
      definition = found;

      const schema = await loadMessageSchema(this.provider, definition);
      generation = createGenerationContext({
        bundle,
        messageType,
        schema,
        options: validated.options,
        config: this.config,
      });
    } catch (error) {
      return { error: `Error composing message: ${errorMessage(error)}`, triggerEvent };
    }

    const lines: string[] = [];
    const groups: GroupDecision[] = [];
    const segmentCounts = new Map<string, number>();

    for (const occurrence of definition.segments) {
      while (groups.length > 0 && (groups.at(-1)?.level ?? -1) >= occurrence.level) {
        groups.pop();
      }
      if (groups.at(-1)?.included === false) continue;

      if (occurrence.isGroup) {
        groups.push({ level: occurrence.level, included: isIncluded(occurrence, generation) });
        continue;
      }
      if (!isIncluded(occurrence, generation)) continue;

      const count = occurrenceCount(occurrence, generation);
      for (let i = 0; i < count; i++) {
        const segmentIndex = (segmentCounts.get(occurrence.code) ?? 0) + 1;
        segmentCounts.set(occurrence.code, segmentIndex);

        try {
          lines.push(
            generateSegment(generation.schema.segment(occurrence.code), occurrence.code, {
              generation,
              chain: this.chain,
              segmentIndex,
            }),
          );
        } catch (error) {
          const reason = errorMessage(error);
          if (occurrence.code === "MSH") {
            return { error: `Message header generation failed: ${reason}`, triggerEvent };
          }
          console.warn(`[composer] Skipping ${occurrence.code} segment: ${reason}`);
        }
      }
    }

    return { message: lines.join(this.config.segmentSeparator).trimEnd() };
  }

  /** Trigger events the provider can compose, lower-cased. */
  listTriggerEvents(): Promise<string[]> {
    return this.provider.listTriggerEvents();
  }

  resolverNames(): { field: string[]; composite: string[] } {
    return this.chain.names();
  }
}

export function createMessageComposer(options: MessageComposerOptions): MessageComposer {
  return new MessageComposer(options);
}
