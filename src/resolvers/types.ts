import type { GenerationContext } from "../composer/generation-context";
import type { DataTypeDefinition, FieldDefinition } from "../hl7v2/schema/types";

/**
 * Per-field (or per-component) resolution input. Created for one lookup and
 * discarded afterwards.
 */
export interface FieldResolutionContext {
  segmentCode: string;
  /** Position of the field within the segment; for components, the parent field's position. */
  fieldPosition: number;
  /** 1-based index of this segment among the segments with the same code in the message. */
  segmentIndex: number;
  /** The field, or a pseudo-field built from a component definition. */
  field: FieldDefinition;
  /** Set when a composite's component is resolved on its own. */
  component?: {
    position: number;
    parentField: FieldDefinition;
  };
  generation: GenerationContext;
}

/** Position → value for one composite field. */
export type ComponentValues = Map<number, string>;

export interface FieldValueResolver {
  readonly name: string;
  readonly priority: number;
  canHandle(ctx: FieldResolutionContext): boolean;
  /** null declines, letting the next resolver try. */
  resolve(ctx: FieldResolutionContext): string | null;
}

export interface CompositeAwareResolver {
  readonly name: string;
  readonly priority: number;
  canHandleComposite(dataType: DataTypeDefinition, ctx: FieldResolutionContext): boolean;
  /** null declines; the field then falls back to per-component resolution. */
  resolveComposite(dataType: DataTypeDefinition, ctx: FieldResolutionContext): ComponentValues | null;
}

export type Resolver = FieldValueResolver | CompositeAwareResolver | (FieldValueResolver & CompositeAwareResolver);

export function isFieldResolver(resolver: Resolver): resolver is FieldValueResolver {
  return "resolve" in resolver;
}

export function isCompositeResolver(resolver: Resolver): resolver is CompositeAwareResolver {
  return "resolveComposite" in resolver;
}

/** `PID.3`, or `PID.5.1` for a component. */
export function fieldPath(ctx: FieldResolutionContext): string {
  const base = `${ctx.segmentCode}.${ctx.fieldPosition}`;
  return ctx.component ? `${base}.${ctx.component.position}` : base;
}

/** Path of the whole field, ignoring any component position. */
export function parentFieldPath(ctx: FieldResolutionContext): string {
  return `${ctx.segmentCode}.${ctx.fieldPosition}`;
}

/** Data type of the enclosing field when resolving a component, else the field's own. */
export function parentDataType(ctx: FieldResolutionContext): string {
  return ctx.component ? ctx.component.parentField.dataType : ctx.field.dataType;
}

export function componentValues(entries: Array<[number, string | undefined | null]>): ComponentValues {
  const values: ComponentValues = new Map();
  for (const [position, value] of entries) {
    if (value !== undefined && value !== null) values.set(position, value);
  }
  return values;
}
