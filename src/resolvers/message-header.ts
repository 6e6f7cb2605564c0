import { subDays } from "date-fns";
import { resolveUntrackedTimestamp } from "../composer/temporal-coherence";
import { headerVersion } from "../config";
import { formatForDataType } from "../hl7v2/format";
import { fieldPath, type FieldResolutionContext, type FieldValueResolver } from "./types";

const DATE_TIME_TYPES = new Set(["DT", "TM", "DTM", "TS"]);

/** Name of the field being resolved; for a component, its enclosing field. */
function semanticName(ctx: FieldResolutionContext): string {
  return (ctx.component?.parentField.name ?? ctx.field.name).toLowerCase();
}

type HeaderRule = {
  when: (name: string, ctx: FieldResolutionContext) => boolean;
  value: (ctx: FieldResolutionContext) => string;
};

const RULES: HeaderRule[] = [
  {
    when: (name, ctx) => !ctx.component && (name.includes("set id") || name.includes("sequence number")),
    value: (ctx) => String(ctx.segmentIndex),
  },
  {
    when: (name) => name.includes("control id"),
    value: (ctx) => ctx.generation.random.digits(6),
  },
  {
    when: (name) => name.includes("version id"),
    value: (ctx) => headerVersion(ctx.generation.config),
  },
  {
    when: (name) => name.includes("processing id"),
    value: (ctx) => ctx.generation.config.messageHeader.processingId,
  },
  {
    when: (name, ctx) => DATE_TIME_TYPES.has(ctx.field.dataType) && name.includes("birth"),
    value: (ctx) => {
      const { now, random } = ctx.generation;
      return formatForDataType(subDays(now, random.int(18 * 365, 90 * 365)), "DT");
    },
  },
  {
    when: (name, ctx) => DATE_TIME_TYPES.has(ctx.field.dataType) && (name.includes("date") || name.includes("time")),
    value: (ctx) => formatForDataType(resolveUntrackedTimestamp(fieldPath(ctx), ctx.generation), ctx.field.dataType),
  },
];

/**
 * Protocol-level fields recognized by name: set ids and sequence numbers,
 * control ids, version and processing ids, and untracked dates and times
 * (offset from the encounter anchor).
 */
export class MessageHeaderResolver implements FieldValueResolver {
  readonly name = "message-header";
  readonly priority = 90;

  canHandle(ctx: FieldResolutionContext): boolean {
    const name = semanticName(ctx);
    return RULES.some((rule) => rule.when(name, ctx));
  }

  resolve(ctx: FieldResolutionContext): string | null {
    const name = semanticName(ctx);
    const rule = RULES.find((r) => r.when(name, ctx));
    return rule ? rule.value(ctx) : null;
  }
}
