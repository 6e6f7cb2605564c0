import type { FieldResolutionContext, FieldValueResolver } from "./types";

const DATE_TIME_TYPES = new Set(["DT", "TM", "TS", "DTM"]);

type IdentifierRule = {
  when: (name: string) => boolean;
  value: (ctx: FieldResolutionContext) => string;
};

const RULES: IdentifierRule[] = [
  {
    when: (name) => name.includes("medical record") || name.includes("mrn"),
    value: ({ generation }) => generation.bundle.patient.mrn ?? `MRN${generation.random.digits(7)}`,
  },
  {
    when: (name) => name.includes("ssn") || name.includes("social security"),
    value: ({ generation }) => {
      const { random } = generation;
      return generation.bundle.patient.ssn ?? `${random.digits(3)}-${random.digits(2)}-${random.digits(4)}`;
    },
  },
  {
    when: (name) => name.includes("patient id"),
    value: ({ generation }) => generation.bundle.patient.id || `PAT${generation.random.digits(6)}`,
  },
  {
    when: (name) => name.includes("account"),
    value: ({ generation }) => generation.bundle.encounter?.accountNumber ?? `ACCT${generation.random.digits(7)}`,
  },
  {
    when: (name) => name.includes("visit number") || name.includes("visit id"),
    value: ({ generation }) => generation.bundle.encounter?.id ?? `V${generation.random.digits(7)}`,
  },
  {
    when: (name) => name.includes("order number") || name.includes("order id"),
    value: ({ generation }) => `ORD${generation.random.digits(8)}`,
  },
  {
    when: (name) => ["provider", "physician", "doctor"].some((term) => name.includes(term)),
    value: ({ generation }) => `PRV${generation.random.digits(6)}`,
  },
  {
    when: (name) => name.includes("identifier") || name.endsWith(" id"),
    value: ({ generation }) => `ID${generation.random.digits(8)}`,
  },
];

/**
 * Identifier-shaped leaves recognized by name: medical record, social
 * security, account, visit, order and provider numbers.
 */
export class IdentifierFieldResolver implements FieldValueResolver {
  readonly name = "identifier-field";
  readonly priority = 75;

  canHandle(ctx: FieldResolutionContext): boolean {
    if (DATE_TIME_TYPES.has(ctx.field.dataType)) return false;
    const name = ctx.field.name.toLowerCase();
    return RULES.some((rule) => rule.when(name));
  }

  resolve(ctx: FieldResolutionContext): string | null {
    const name = ctx.field.name.toLowerCase();
    const rule = RULES.find((r) => r.when(name));
    return rule ? rule.value(ctx) : null;
  }
}
