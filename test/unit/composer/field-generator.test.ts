import { describe, expect, test, vi } from "vitest";
import { generateField } from "../../../src/composer/field-generator";
import type { GenerationContext } from "../../../src/composer/generation-context";
import type { DataTypeDefinition, FieldDefinition } from "../../../src/hl7v2/schema/types";
import { ResolverChain } from "../../../src/resolvers/resolver-chain";
import { SessionValueResolver } from "../../../src/resolvers/session-value";
import type {
  CompositeAwareResolver,
  FieldResolutionContext,
  FieldValueResolver,
  Resolver,
} from "../../../src/resolvers/types";
import { component, field, fixedRandom, REFERENCE_TIME, testGeneration, testSchema } from "../helpers";

const xpn: DataTypeDefinition = {
  code: "XPN",
  components: [
    component(1, "Family Name", "FN"),
    component(2, "Given Name", "ST", { optionality: "optional" }),
    component(3, "Second and Further Given Names", "ST", { optionality: "optional" }),
  ],
};
const schema = testSchema({ dataTypes: [xpn] });
const patientName = field(5, "Patient Name", "XPN");

/** Answers every field with its own name. */
const echo: FieldValueResolver = {
  name: "echo",
  priority: 1,
  canHandle: () => true,
  resolve: (ctx) => ctx.field.name,
};

const constant = (value: string): FieldValueResolver => ({
  name: "constant",
  priority: 1,
  canHandle: () => true,
  resolve: () => value,
});

const composite = (values: Array<[number, string]>): CompositeAwareResolver => ({
  name: "composite",
  priority: 1,
  canHandleComposite: () => true,
  resolveComposite: () => new Map(values),
});

function generation(options: { chance?: boolean; lockedValues?: Record<string, string> } = {}): GenerationContext {
  return testGeneration({
    schema,
    options: { seed: 1, referenceTime: REFERENCE_TIME, lockedValues: options.lockedValues },
    random: fixedRandom({ chance: options.chance }),
  });
}

function generate(definition: FieldDefinition, resolvers: Resolver[], context: GenerationContext = generation()): string {
  return generateField(definition, {
    segmentCode: "PID",
    segmentIndex: 1,
    generation: context,
    chain: new ResolverChain(resolvers),
  });
}

describe("generateField", () => {
  describe("primitives", () => {
    test("escapes delimiters in the resolved value", () => {
      expect(generate(field(19, "SSN", "ST"), [constant("a|b^c")])).toBe("a\\F\\b\\S\\c");
    });

    test("truncates to the maximum length before escaping", () => {
      expect(generate(field(19, "SSN", "ST", { maxLength: 3 }), [constant("AB|CD")])).toBe("AB\\F\\");
    });

    test("an unresolved field is empty", () => {
      expect(generate(field(19, "SSN", "ST"), [])).toBe("");
    });
  });

  describe("optional fields", () => {
    test("are left empty when the population draw fails, without consulting resolvers", () => {
      const resolver = constant("value");
      const resolve = vi.spyOn(resolver, "resolve");
      const optional = field(19, "SSN", "ST", { optionality: "optional" });

      expect(generate(optional, [resolver], generation({ chance: false }))).toBe("");
      expect(resolve).not.toHaveBeenCalled();
    });

    test("are populated when the draw succeeds", () => {
      expect(generate(field(19, "SSN", "ST", { optionality: "optional" }), [constant("value")])).toBe("value");
    });

    test("a pinned field is always populated", () => {
      const context = generation({ chance: false, lockedValues: { "PID.19": "000-11-2222" } });
      const optional = field(19, "SSN", "ST", { optionality: "optional" });
      expect(generate(optional, [new SessionValueResolver()], context)).toBe("000-11-2222");
    });

    test("a pinned component keeps its optional field populated", () => {
      const context = generation({ chance: false, lockedValues: { "PID.5.1": "DOE" } });
      const optional = field(5, "Patient Name", "XPN", { optionality: "optional" });
      expect(generate(optional, [new SessionValueResolver(), echo], context)).toBe("DOE^^");
    });
  });

  describe("composites", () => {
    test("an accepted mapping spans the declared components", () => {
      expect(generate(patientName, [composite([[1, "DOE"]])])).toBe("DOE^^");
    });

    test("an accepted mapping wider than the declaration is kept whole", () => {
      expect(generate(patientName, [composite([[1, "DOE"], [5, "DR"]])])).toBe("DOE^^^^DR");
    });

    test("component values are escaped", () => {
      expect(generate(patientName, [composite([[1, "O&NEIL"]])])).toBe("O\\T\\NEIL^^");
    });

    test("component pins override the accepted mapping", () => {
      const context = generation({ lockedValues: { "PID.5.2": "JANE" } });
      expect(generate(patientName, [composite([[1, "DOE"], [2, "JOHN"]])], context)).toBe("DOE^JANE^");
    });

    test("without an accepting resolver each component is resolved as a leaf", () => {
      expect(generate(patientName, [echo])).toBe("Family Name^Given Name^Second and Further Given Names");
    });

    test("optional components follow the importance draw", () => {
      expect(generate(patientName, [echo], generation({ chance: false }))).toBe("Family Name^^");
    });

    test("a pinned optional component is resolved even when the draw fails", () => {
      const context = generation({ chance: false, lockedValues: { "PID.5.2": "JANE" } });
      expect(generate(patientName, [new SessionValueResolver(), echo], context)).toBe("Family Name^JANE^");
    });

    test("components are resolved under the parent field's position", () => {
      const seen: FieldResolutionContext[] = [];
      const recorder: FieldValueResolver = {
        name: "recorder",
        priority: 1,
        canHandle: () => true,
        resolve: (ctx) => {
          seen.push(ctx);
          return "";
        },
      };
      generate(patientName, [recorder]);

      expect(seen.map((ctx) => [ctx.fieldPosition, ctx.field.position, ctx.component?.position])).toEqual([
        [5, 5, 1],
        [5, 5, 2],
        [5, 5, 3],
      ]);
      expect(seen[0]?.component?.parentField).toBe(patientName);
      expect(seen[0]?.field.dataType).toBe("FN");
    });
  });

  test("a data type without components is treated as a primitive", () => {
    expect(generate(field(7, "Date/Time of Birth", "TS"), [constant("19850315")])).toBe("19850315");
  });
});

describe("optional field population rate", () => {
  test("a seeded run populates roughly seven in ten optional fields", () => {
    const optional = field(19, "SSN", "ST", { optionality: "optional" });
    const runs = 1000;
    let populated = 0;
    for (let seed = 0; seed < runs; seed++) {
      const context = testGeneration({ schema, options: { seed, referenceTime: REFERENCE_TIME } });
      if (generate(optional, [constant("value")], context) === "value") populated++;
    }
    const rate = populated / runs;
    expect(rate).toBeGreaterThanOrEqual(0.63);
    expect(rate).toBeLessThanOrEqual(0.77);
  });
});
