import type { DataTypeDefinition } from "../hl7v2/schema/types";
import {
  isCompositeResolver,
  isFieldResolver,
  type CompositeAwareResolver,
  type ComponentValues,
  type FieldResolutionContext,
  type FieldValueResolver,
  type Resolver,
} from "./types";

const byPriority = (a: { priority: number }, b: { priority: number }) => b.priority - a.priority;

/**
 * Resolvers ordered by descending priority, sorted once at construction.
 * Equal priorities keep registration order.
 */
export class ResolverChain {
  private readonly fieldResolvers: readonly FieldValueResolver[];
  private readonly compositeResolvers: readonly CompositeAwareResolver[];

  constructor(resolvers: readonly Resolver[]) {
    this.fieldResolvers = resolvers.filter(isFieldResolver).sort(byPriority);
    this.compositeResolvers = resolvers.filter(isCompositeResolver).sort(byPriority);
  }

  /** First non-null value from a resolver that can handle the field; "" when none can. */
  resolveField(ctx: FieldResolutionContext): string {
    for (const resolver of this.fieldResolvers) {
      if (!resolver.canHandle(ctx)) continue;
      const value = resolver.resolve(ctx);
      if (value !== null) return value;
    }
    return "";
  }

  /** First accepted mapping from a composite-aware resolver; null when all decline. */
  resolveComposite(dataType: DataTypeDefinition, ctx: FieldResolutionContext): ComponentValues | null {
    for (const resolver of this.compositeResolvers) {
      if (!resolver.canHandleComposite(dataType, ctx)) continue;
      const values = resolver.resolveComposite(dataType, ctx);
      if (values !== null) return values;
    }
    return null;
  }

  names(): { field: string[]; composite: string[] } {
    return {
      field: this.fieldResolvers.map((r) => `${r.name} (${r.priority})`),
      composite: this.compositeResolvers.map((r) => `${r.name} (${r.priority})`),
    };
  }
}
