import { isTrackedTimestamp, resolveTrackedTimestamp } from "../composer/temporal-coherence";
import { formatForDataType } from "../hl7v2/format";
import type { DataTypeDefinition } from "../hl7v2/schema/types";
import {
  parentFieldPath,
  type CompositeAwareResolver,
  type ComponentValues,
  type FieldResolutionContext,
  type FieldValueResolver,
} from "./types";

const TIMESTAMP_TYPES = new Set(["TS", "DTM"]);

/**
 * Timestamps for fields in the temporal relationship table, generated
 * relative to their anchors and recorded in the message's ledger.
 */
export class TemporalCoherenceResolver implements FieldValueResolver, CompositeAwareResolver {
  readonly name = "temporal-coherence";
  readonly priority = 92;

  canHandle(ctx: FieldResolutionContext): boolean {
    return !ctx.component && TIMESTAMP_TYPES.has(ctx.field.dataType) && isTrackedTimestamp(parentFieldPath(ctx));
  }

  resolve(ctx: FieldResolutionContext): string | null {
    const value = resolveTrackedTimestamp(parentFieldPath(ctx), ctx.generation);
    return value ? formatForDataType(value, ctx.field.dataType) : null;
  }

  canHandleComposite(dataType: DataTypeDefinition, ctx: FieldResolutionContext): boolean {
    return TIMESTAMP_TYPES.has(dataType.code) && isTrackedTimestamp(parentFieldPath(ctx));
  }

  resolveComposite(_dataType: DataTypeDefinition, ctx: FieldResolutionContext): ComponentValues | null {
    const value = resolveTrackedTimestamp(parentFieldPath(ctx), ctx.generation);
    return value ? new Map([[1, formatForDataType(value, "DTM")]]) : null;
  }
}
