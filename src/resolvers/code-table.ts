import { randomTableCode } from "../composer/primitive-values";
import type { FieldResolutionContext, FieldValueResolver } from "./types";

/**
 * Site-defined (user) tables ship without values in the reference catalog.
 * These stand in so table-bound fields still carry a plausible code.
 */
export const USER_TABLE_DEFAULTS: Readonly<Record<string, readonly string[]>> = {
  "0018": ["IP", "OP", "ER", "OBS"],
  "0072": ["PPO01", "HMO02", "MCR", "MCD"],
  "0099": ["Y", "N"],
  "0113": ["HOME", "SNF", "REHAB", "HOSPICE"],
  "0171": ["USA", "CAN", "MEX"],
  "0212": ["USA", "CAN", "MEX", "GBR"],
  "0289": ["001", "003", "005"],
  "0302": ["ICU", "MEDSURG", "ER", "PEDS"],
  "0303": ["101", "102", "204", "310"],
  "0304": ["A", "B"],
};

function tableDefaults(ctx: FieldResolutionContext): readonly string[] | undefined {
  return ctx.field.table ? USER_TABLE_DEFAULTS[ctx.field.table] : undefined;
}

/**
 * Fields bound to a code table get a code from that table. EVN-1 takes the
 * trigger event of the message type being composed.
 */
export class CodeTableResolver implements FieldValueResolver {
  readonly name = "code-table";
  readonly priority = 85;

  canHandle(ctx: FieldResolutionContext): boolean {
    if (!ctx.field.table) return false;
    const table = ctx.generation.schema.codeTable(ctx.field.table);
    return (table !== null && table.values.length > 0) || tableDefaults(ctx) !== undefined;
  }

  resolve(ctx: FieldResolutionContext): string | null {
    if (ctx.segmentCode === "EVN" && ctx.fieldPosition === 1 && !ctx.component) {
      const event = ctx.generation.messageType.split("^")[1];
      if (event) return event;
    }

    const code = randomTableCode(ctx);
    if (code !== null) return code;

    const defaults = tableDefaults(ctx);
    return defaults ? ctx.generation.random.pick(defaults) : null;
  }
}
