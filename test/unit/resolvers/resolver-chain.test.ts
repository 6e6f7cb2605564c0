import { describe, expect, test, vi } from "vitest";
import { defaultResolvers } from "../../../src/resolvers";
import { ResolverChain } from "../../../src/resolvers/resolver-chain";
import type { CompositeAwareResolver, FieldValueResolver } from "../../../src/resolvers/types";
import { field, resolutionContext } from "../helpers";

function fieldResolver(name: string, priority: number, value: string | null, handles = true): FieldValueResolver {
  return { name, priority, canHandle: () => handles, resolve: () => value };
}

function compositeResolver(name: string, priority: number, values: Map<number, string> | null): CompositeAwareResolver {
  return { name, priority, canHandleComposite: () => true, resolveComposite: () => values };
}

const ctx = resolutionContext(field(1, "Anything", "ST"));
const xpn = { code: "XPN", components: [] };

describe("ResolverChain", () => {
  test("asks resolvers in descending priority", () => {
    const chain = new ResolverChain([fieldResolver("low", 1, "low"), fieldResolver("high", 9, "high")]);
    expect(chain.resolveField(ctx)).toBe("high");
  });

  test("equal priorities keep registration order", () => {
    const chain = new ResolverChain([fieldResolver("first", 5, "first"), fieldResolver("second", 5, "second")]);
    expect(chain.resolveField(ctx)).toBe("first");
  });

  test("skips resolvers that cannot handle the field or return null", () => {
    const skipped = fieldResolver("skipped", 9, "never", false);
    const resolve = vi.spyOn(skipped, "resolve");
    const chain = new ResolverChain([skipped, fieldResolver("declines", 8, null), fieldResolver("answers", 7, "ok")]);

    expect(chain.resolveField(ctx)).toBe("ok");
    expect(resolve).not.toHaveBeenCalled();
  });

  test("an unresolved field is empty", () => {
    expect(new ResolverChain([fieldResolver("declines", 1, null)]).resolveField(ctx)).toBe("");
  });

  test("returns the first accepted composite mapping", () => {
    const chain = new ResolverChain([
      compositeResolver("declines", 9, null),
      compositeResolver("accepts", 5, new Map([[1, "A"]])),
    ]);
    expect(chain.resolveComposite(xpn, ctx)).toEqual(new Map([[1, "A"]]));
    expect(new ResolverChain([compositeResolver("declines", 9, null)]).resolveComposite(xpn, ctx)).toBeNull();
  });

  test("the default resolvers are ordered by priority", () => {
    expect(new ResolverChain(defaultResolvers()).names()).toEqual({
      field: [
        "session-value (100)",
        "temporal-coherence (92)",
        "clinical-context (91)",
        "message-header (90)",
        "lab-result (86)",
        "code-table (85)",
        "demographic (80)",
        "contact-field (75)",
        "identifier-field (75)",
        "primitive-fallback (10)",
      ],
      composite: [
        "session-value (100)",
        "temporal-coherence (92)",
        "clinical-context (91)",
        "lab-result (86)",
        "coded-element (82)",
        "identifier-coherence (78)",
        "range-coherence (76)",
      ],
    });
  });

  test("the default chain always produces a value for a primitive", () => {
    const chain = new ResolverChain(defaultResolvers());
    expect(chain.resolveField(resolutionContext(field(30, "Something Odd", "ST")))).toBe("Generated_Something_Odd");
  });
});
