/**
 * Temporal coherence for generated timestamps.
 *
 * A dependent field's timestamp is generated as its anchor's timestamp plus a
 * bounded random offset, so that e.g. a diagnosis follows the admission event
 * by hours rather than by an unrelated random amount. Anchors are read from
 * the per-message {@link TimestampLedger}; EVN-2 (recorded date/time) is the
 * encounter anchor everything else falls back to.
 */
import { addSeconds, subSeconds } from "date-fns";
import type { Random } from "./random";

const MINUTE = 60;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

export interface TemporalRelationship {
  anchor: string;
  minOffsetSeconds: number;
  maxOffsetSeconds: number;
}

export const ENCOUNTER_ANCHOR = "EVN.2";

/** How far before `now` a generated encounter anchor may fall when no encounter start is known. */
export const ENCOUNTER_ANCHOR_LOOKBACK_SECONDS = 7 * DAY;

export const TEMPORAL_RELATIONSHIPS: Readonly<Record<string, TemporalRelationship>> = {
  "PV1.44": { anchor: ENCOUNTER_ANCHOR, minOffsetSeconds: 0, maxOffsetSeconds: 5 * MINUTE },
  "DG1.5": { anchor: ENCOUNTER_ANCHOR, minOffsetSeconds: 0, maxOffsetSeconds: 48 * HOUR },
  "OBX.14": { anchor: ENCOUNTER_ANCHOR, minOffsetSeconds: 0, maxOffsetSeconds: 24 * HOUR },
  "MSH.7": { anchor: ENCOUNTER_ANCHOR, minOffsetSeconds: 0, maxOffsetSeconds: HOUR },
  "ORC.9": { anchor: ENCOUNTER_ANCHOR, minOffsetSeconds: 0, maxOffsetSeconds: 24 * HOUR },
  "RXE.32": { anchor: "ORC.9", minOffsetSeconds: -24 * HOUR, maxOffsetSeconds: 0 },
};

/** Field path → generated instant, scoped to one message. */
export class TimestampLedger {
  private readonly values = new Map<string, Date>();

  get(path: string): Date | undefined {
    return this.values.get(path);
  }

  has(path: string): boolean {
    return this.values.has(path);
  }

  record(path: string, value: Date): void {
    this.values.set(path, value);
  }

  entries(): Array<[string, Date]> {
    return [...this.values.entries()];
  }
}

export interface TemporalContext {
  readonly timestamps: TimestampLedger;
  readonly random: Random;
  readonly now: Date;
  readonly encounterStart: Date | null;
}

export function isTrackedTimestamp(path: string): boolean {
  return path === ENCOUNTER_ANCHOR || TEMPORAL_RELATIONSHIPS[path] !== undefined;
}

function anchorFor(relationship: TemporalRelationship, ctx: TemporalContext): Date | null {
  return (
    ctx.timestamps.get(relationship.anchor) ??
    ctx.timestamps.get(ENCOUNTER_ANCHOR) ??
    ctx.encounterStart
  );
}

function encounterAnchor(ctx: TemporalContext): Date {
  const existing = ctx.timestamps.get(ENCOUNTER_ANCHOR);
  if (existing) return existing;
  return ctx.encounterStart ?? subSeconds(ctx.now, ctx.random.int(0, ENCOUNTER_ANCHOR_LOOKBACK_SECONDS));
}

/**
 * Generates and records the timestamp for a tracked field path.
 * Returns null for paths that take part in no temporal relationship.
 */
export function resolveTrackedTimestamp(path: string, ctx: TemporalContext): Date | null {
  let value: Date;

  if (path === ENCOUNTER_ANCHOR) {
    value = encounterAnchor(ctx);
  } else {
    const relationship = TEMPORAL_RELATIONSHIPS[path];
    if (!relationship) return null;

    const anchor = anchorFor(relationship, ctx);
    value = anchor
      ? addSeconds(anchor, ctx.random.int(relationship.minOffsetSeconds, relationship.maxOffsetSeconds))
      : ctx.now;
  }

  ctx.timestamps.record(path, value);
  return value;
}

/** Window after the encounter anchor for date/time fields outside the relationship table. */
export const UNTRACKED_WINDOW_SECONDS = DAY;

/**
 * Timestamp for a date/time field that takes part in no relationship: the
 * encounter anchor plus a random offset within {@link UNTRACKED_WINDOW_SECONDS},
 * or `now` less such an offset when no anchor is known. Recorded under its path.
 */
export function resolveUntrackedTimestamp(path: string, ctx: TemporalContext): Date {
  const anchor = ctx.timestamps.get(ENCOUNTER_ANCHOR) ?? ctx.encounterStart;
  const offset = ctx.random.int(0, UNTRACKED_WINDOW_SECONDS);
  const value = anchor ? addSeconds(anchor, offset) : subSeconds(ctx.now, offset);
  ctx.timestamps.record(path, value);
  return value;
}
