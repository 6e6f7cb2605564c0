import { COMPONENT_SEPARATOR, escapeValue } from "../hl7v2/format";
import {
  isComposite,
  type ComponentDefinition,
  type DataTypeDefinition,
  type FieldDefinition,
} from "../hl7v2/schema/types";
import type { ResolverChain } from "../resolvers/resolver-chain";
import { isPinned, lockedValue } from "../resolvers/session-value";
import type { ComponentValues, FieldResolutionContext } from "../resolvers/types";
import { classifyComponent, populationProbability } from "./component-importance";
import type { GenerationContext } from "./generation-context";

export interface FieldGenerationParams {
  segmentCode: string;
  segmentIndex: number;
  generation: GenerationContext;
  chain: ResolverChain;
}

function truncate(value: string, maxLength: number | null): string {
  return maxLength !== null && maxLength > 0 && value.length > maxLength ? value.substring(0, maxLength) : value;
}

/** Resolution input for a component, resolved as a leaf under its parent's position. */
function componentContext(
  fieldContext: FieldResolutionContext,
  component: ComponentDefinition,
): FieldResolutionContext {
  const parent = fieldContext.field;
  return {
    ...fieldContext,
    field: {
      position: parent.position,
      name: component.name,
      dataType: component.dataType,
      optionality: component.optionality,
      repeatability: "once",
      maxLength: null,
      table: component.table,
    },
    component: { position: component.position, parentField: parent },
  };
}

function joinComponents(values: ComponentValues, declaredCount: number): string {
  const width = Math.max(declaredCount, ...values.keys());
  const parts: string[] = [];
  for (let position = 1; position <= width; position++) {
    parts.push(escapeValue(values.get(position) ?? ""));
  }
  return parts.join(COMPONENT_SEPARATOR);
}

/** Component-level pins (`PID.3.1`) take precedence over a resolver's whole-field mapping. */
function overlayLockedComponents(values: ComponentValues, ctx: FieldResolutionContext, width: number): void {
  const path = `${ctx.segmentCode}.${ctx.fieldPosition}`;
  for (let position = 1; position <= width; position++) {
    const pinned = lockedValue(ctx.generation, `${path}.${position}`);
    if (pinned !== undefined) values.set(position, pinned);
  }
}

function generateComponents(dataType: DataTypeDefinition, ctx: FieldResolutionContext, chain: ResolverChain): ComponentValues {
  const { config, random } = ctx.generation;
  const values: ComponentValues = new Map();

  for (const component of dataType.components) {
    const componentCtx = componentContext(ctx, component);
    if (component.optionality === "optional") {
      const path = `${ctx.segmentCode}.${ctx.fieldPosition}.${component.position}`;
      const probability = populationProbability(classifyComponent(dataType.code, component), config);
      if (!isPinned(ctx.generation, path) && !random.chance(probability)) continue;
    }
    values.set(component.position, chain.resolveField(componentCtx));
  }
  return values;
}

function generateComposite(dataType: DataTypeDefinition, ctx: FieldResolutionContext, chain: ResolverChain): string {
  const declared = dataType.components.length;
  const resolved = chain.resolveComposite(dataType, ctx);

  if (resolved) {
    const values = new Map(resolved);
    overlayLockedComponents(values, ctx, Math.max(declared, ...values.keys()));
    return joinComponents(values, declared);
  }

  return joinComponents(generateComponents(dataType, ctx, chain), declared);
}

/**
 * Produces the wire value of one field: composites are offered whole to the
 * composite-aware resolvers first and expanded component by component
 * otherwise. Leaf values are escaped; primitives are cut to the field's
 * maximum length.
 */
export function generateField(field: FieldDefinition, params: FieldGenerationParams): string {
  const { segmentCode, segmentIndex, generation, chain } = params;
  const path = `${segmentCode}.${field.position}`;

  if (
    field.optionality === "optional" &&
    !isPinned(generation, path) &&
    !generation.random.chance(generation.config.probabilities.optionalFieldPopulation)
  ) {
    return "";
  }

  const ctx: FieldResolutionContext = {
    segmentCode,
    fieldPosition: field.position,
    segmentIndex,
    field,
    generation,
  };

  const dataType = generation.schema.dataType(field.dataType);
  if (isComposite(dataType)) {
    return generateComposite(dataType, ctx, chain);
  }

  return escapeValue(truncate(chain.resolveField(ctx), field.maxLength));
}
