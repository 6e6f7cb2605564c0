import { generatePrimitiveValue } from "../composer/primitive-values";
import type { FieldResolutionContext, FieldValueResolver } from "./types";

/** Accepts every field; the chain never ends without a value while this is registered. */
export class PrimitiveFallbackResolver implements FieldValueResolver {
  readonly name = "primitive-fallback";
  readonly priority = 10;

  canHandle(): boolean {
    return true;
  }

  resolve(ctx: FieldResolutionContext): string {
    return generatePrimitiveValue(ctx);
  }
}
