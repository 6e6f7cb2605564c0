import { addDays, subDays } from "date-fns";
import { formatHL7Timestamp } from "../hl7v2/format";
import type { DataTypeDefinition } from "../hl7v2/schema/types";
import type { CompositeAwareResolver, ComponentValues, FieldResolutionContext } from "./types";

const RANGE_TYPES = new Set(["CQ", "DR", "NR"]);

const QUANTITY_UNITS = ["mg", "mL", "g", "tab", "cap"];

/** Quantity with its units, from the prescription dose when there is one. */
function quantity(ctx: FieldResolutionContext): ComponentValues {
  const { bundle, random } = ctx.generation;
  const dose = bundle.prescription?.dose;
  if (dose) {
    return new Map([
      [1, String(dose.value)],
      [2, dose.unit],
    ]);
  }
  return new Map([
    [1, String(random.int(1, 10))],
    [2, random.pick(QUANTITY_UNITS)],
  ]);
}

/** Start up to 30 days before the clock; end 1 to 30 days after start. */
function dateRange(ctx: FieldResolutionContext): ComponentValues {
  const { now, random } = ctx.generation;
  const start = subDays(now, random.int(0, 30));
  const end = addDays(start, random.int(1, 30));
  return new Map([
    [1, formatHL7Timestamp(start)],
    [2, formatHL7Timestamp(end)],
  ]);
}

function numericRange(ctx: FieldResolutionContext): ComponentValues {
  const { random } = ctx.generation;
  const low = random.int(1, 50);
  const high = low + random.int(1, 100);
  return new Map([
    [1, String(low)],
    [2, String(high)],
  ]);
}

/**
 * Composites whose parts only make sense together: a quantity and its unit,
 * and ranges whose lower bound never exceeds the upper.
 */
export class RangeCoherenceResolver implements CompositeAwareResolver {
  readonly name = "range-coherence";
  readonly priority = 76;

  canHandleComposite(dataType: DataTypeDefinition): boolean {
    return RANGE_TYPES.has(dataType.code);
  }

  resolveComposite(dataType: DataTypeDefinition, ctx: FieldResolutionContext): ComponentValues | null {
    switch (dataType.code) {
      case "CQ":
        return quantity(ctx);
      case "DR":
        return dateRange(ctx);
      case "NR":
        return numericRange(ctx);
      default:
        return null;
    }
  }
}
