import { z } from "zod";
import type { DataTypeDefinition } from "../hl7v2/schema/types";
import { readDataFile } from "../utils/data-file";
import {
  type CompositeAwareResolver,
  type ComponentValues,
  type FieldResolutionContext,
} from "./types";

const CODED_TYPES = new Set(["CE", "CWE", "CNE", "CF"]);

const codedPoolSchema = z.array(
  z.object({
    terms: z.array(z.string()).min(1),
    system: z.string(),
    values: z.array(z.object({ code: z.string(), display: z.string() })).min(1),
  }),
);

export type CodedPool = z.infer<typeof codedPoolSchema>[number];

let cachedPools: CodedPool[] | null = null;

/** Semantic pools from data/coded-elements.json, matched against field names in file order. */
export function codedElementPools(): CodedPool[] {
  if (cachedPools === null) {
    cachedPools = readDataFile("coded-elements.json", codedPoolSchema);
  }
  return cachedPools;
}

function poolFor(ctx: FieldResolutionContext): CodedPool | undefined {
  const name = ctx.field.name.toLowerCase();
  return codedElementPools().find((pool) => pool.terms.some((term) => name.includes(term)));
}

function codedElement(code: string, display: string, system: string): ComponentValues {
  return new Map([
    [1, code],
    [2, display],
    [3, system],
  ]);
}

/**
 * Coded elements (CE/CWE/CNE/CF) whose identifier, text and coding system
 * describe the same concept: drawn from the field's code table when it has
 * values, otherwise from a semantic pool matched by field name.
 */
export class CodedElementResolver implements CompositeAwareResolver {
  readonly name = "coded-element";
  readonly priority = 82;

  canHandleComposite(dataType: DataTypeDefinition, ctx: FieldResolutionContext): boolean {
    if (!CODED_TYPES.has(dataType.code)) return false;
    const table = ctx.field.table ? ctx.generation.schema.codeTable(ctx.field.table) : null;
    return (table !== null && table.values.length > 0) || poolFor(ctx) !== undefined;
  }

  resolveComposite(_dataType: DataTypeDefinition, ctx: FieldResolutionContext): ComponentValues | null {
    const { random, schema } = ctx.generation;

    const table = ctx.field.table ? schema.codeTable(ctx.field.table) : null;
    if (table && table.values.length > 0) {
      const value = random.pick(table.values);
      return codedElement(value.code, value.display, `HL7${table.id}`);
    }

    const pool = poolFor(ctx);
    if (!pool) return null;
    const value = random.pick(pool.values);
    return codedElement(value.code, value.display, pool.system);
  }
}
