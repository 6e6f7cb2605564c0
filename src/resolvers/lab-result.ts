import { z } from "zod";
import { memoizedIndex } from "../composer/generation-context";
import type { DataTypeDefinition } from "../hl7v2/schema/types";
import { readDataFile } from "../utils/data-file";
import {
  componentValues,
  parentFieldPath,
  type CompositeAwareResolver,
  type ComponentValues,
  type FieldResolutionContext,
  type FieldValueResolver,
} from "./types";

const labTestSchema = z.object({
  code: z.string(),
  display: z.string(),
  value: z.string(),
  units: z.string(),
  referenceRange: z.string(),
  abnormalFlag: z.string(),
});

export type LabTest = z.infer<typeof labTestSchema>;

let cachedLabTests: LabTest[] | null = null;

/** Lab tests from data/lab-tests.json. */
export function labTests(): LabTest[] {
  if (cachedLabTests === null) {
    cachedLabTests = readDataFile("lab-tests.json", z.array(labTestSchema).min(1));
  }
  return cachedLabTests;
}

type LabValue = string | ComponentValues;

const LAB_FIELDS: Readonly<Record<string, (test: LabTest) => LabValue>> = {
  "OBR.4": (test) => componentValues([[1, test.code], [2, test.display], [3, "LN"]]),
  "OBX.2": () => "NM",
  "OBX.3": (test) => componentValues([[1, test.code], [2, test.display], [3, "LN"]]),
  "OBX.5": (test) => test.value,
  "OBX.6": (test) => componentValues([[1, test.units], [3, "UCUM"]]),
  "OBX.7": (test) => test.referenceRange,
  "OBX.8": (test) => test.abnormalFlag,
};

/** The lab test reported by this OBR or OBX segment, drawn once per segment. */
export function labTestFor(ctx: FieldResolutionContext): LabTest {
  const tests = labTests();
  const index = memoizedIndex(ctx.generation, `${ctx.segmentCode}#${ctx.segmentIndex}:lab-test`, tests.length);
  const test = tests[index];
  if (test === undefined) {
    throw new Error(`No lab test at index ${index}`);
  }
  return test;
}

function labField(ctx: FieldResolutionContext): ((test: LabTest) => LabValue) | undefined {
  if (ctx.generation.bundle.observation) return undefined;
  return LAB_FIELDS[parentFieldPath(ctx)];
}

/**
 * Result segments without a bundle observation report a lab test from
 * data/lab-tests.json. The test code, value, units, range and flag of one
 * OBX all come from the same entry.
 */
export class LabResultResolver implements FieldValueResolver, CompositeAwareResolver {
  readonly name = "lab-result";
  readonly priority = 86;

  canHandle(ctx: FieldResolutionContext): boolean {
    return !ctx.component && labField(ctx) !== undefined;
  }

  resolve(ctx: FieldResolutionContext): string | null {
    const handler = labField(ctx);
    if (!handler) return null;
    const value = handler(labTestFor(ctx));
    return typeof value === "string" ? value : value.get(1) ?? null;
  }

  canHandleComposite(_dataType: DataTypeDefinition, ctx: FieldResolutionContext): boolean {
    return labField(ctx) !== undefined;
  }

  resolveComposite(_dataType: DataTypeDefinition, ctx: FieldResolutionContext): ComponentValues | null {
    const handler = labField(ctx);
    if (!handler) return null;
    const value = handler(labTestFor(ctx));
    return typeof value === "string" ? new Map([[1, value]]) : value;
  }
}
