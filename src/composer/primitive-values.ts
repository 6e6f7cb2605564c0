/**
 * Last-resort value generation for primitive fields.
 *
 * Each data-type family has an ordered list of (predicate, generator) pairs
 * over the lower-cased field name; the first matching predicate wins. These
 * are approximations: they make unrecognized fields look plausible, they do
 * not encode the standard.
 */
import { addDays, differenceInYears } from "date-fns";
import { demographicPools } from "../demographics/pools";
import {
  formatHL7Date,
  formatHL7Time,
  formatHL7Timestamp,
  toHL7DateString,
} from "../hl7v2/format";
import type { FieldResolutionContext } from "../resolvers/types";
import { parseClinicalDate } from "./generation-context";

type PrimitiveRule = {
  when: (name: string) => boolean;
  generate: (ctx: FieldResolutionContext) => string;
};

const has = (...terms: string[]) => (name: string) => terms.some((term) => name.includes(term));
const hasAll = (...terms: string[]) => (name: string) => terms.every((term) => name.includes(term));

const oneOf =
  (...codes: string[]) =>
  (ctx: FieldResolutionContext) =>
    ctx.generation.random.pick(codes);

const between =
  (min: number, max: number) =>
  (ctx: FieldResolutionContext) =>
    String(ctx.generation.random.int(min, max));

// =============================================================================
// ST / TX / FT
// =============================================================================

const STRING_RULES: PrimitiveRule[] = [
  {
    when: has("patient name", "person name"),
    generate: ({ generation }) => {
      const name = generation.bundle.patient.name;
      return [name?.given?.[0], name?.family].filter(Boolean).join(" ");
    },
  },
  {
    when: has("family name", "last name", "surname"),
    generate: ({ generation }) =>
      generation.bundle.patient.name?.family ?? generation.random.pick(demographicPools().lastNames),
  },
  {
    when: has("given name", "first name"),
    generate: ({ generation }) =>
      generation.bundle.patient.name?.given?.[0] ?? generation.random.pick(demographicPools().firstNames),
  },
  { when: has("middle"), generate: ({ generation }) => generation.bundle.patient.name?.given?.[1] ?? "" },
  {
    when: has("room"),
    generate: ({ generation }) => generation.bundle.encounter?.location?.room ?? String(generation.random.int(100, 499)),
  },
  {
    when: has("bed"),
    generate: ({ generation }) => generation.bundle.encounter?.location?.bed ?? generation.random.pick(["A", "B", "C", "D"]),
  },
  {
    when: has("facility", "hospital"),
    generate: ({ generation }) => generation.bundle.encounter?.location?.facility ?? "General Hospital",
  },
  { when: has("department", "unit"), generate: () => "General Medicine" },
  {
    when: has("medication", "drug"),
    generate: ({ generation }) => generation.bundle.prescription?.medication.display ?? "Unknown Medication",
  },
  {
    when: has("result", "value"),
    generate: ({ generation }) => generation.bundle.observation?.value ?? "Normal",
  },
  {
    when: has("diagnosis"),
    generate: ({ generation }) => generation.bundle.encounter?.diagnosis?.display ?? "General Diagnosis",
  },
  {
    when: has("address", "street"),
    generate: ({ generation }) => generation.bundle.patient.address?.line?.[0] ?? "123 Main St",
  },
  { when: has("city"), generate: ({ generation }) => generation.bundle.patient.address?.city ?? "Anytown" },
  { when: has("state"), generate: ({ generation }) => generation.bundle.patient.address?.state ?? "ST" },
  {
    when: has("zip", "postal"),
    generate: ({ generation }) => generation.bundle.patient.address?.postalCode ?? "12345",
  },
  {
    when: has("phone", "telephone"),
    generate: ({ generation }) =>
      generation.bundle.patient.telecom?.find((t) => t.system === "phone")?.value ?? "555-123-4567",
  },
];

function defaultString(ctx: FieldResolutionContext): string {
  return `Generated_${ctx.field.name.replace(/ /g, "_")}`;
}

// =============================================================================
// NM / SI
// =============================================================================

const NUMERIC_RULES: PrimitiveRule[] = [
  { when: has("sequence", "set id"), generate: () => "1" },
  {
    when: hasAll("patient", "id"),
    generate: (ctx) => ctx.generation.bundle.patient.id || between(100000, 999999)(ctx),
  },
  { when: has("account"), generate: between(1000000, 9999999) },
  {
    when: has("visit"),
    generate: (ctx) => ctx.generation.bundle.encounter?.id ?? between(100000, 999999)(ctx),
  },
  {
    when: has("age"),
    generate: (ctx) => {
      const birth = parseClinicalDate(ctx.generation.bundle.patient.birthDate);
      if (!birth) return between(20, 80)(ctx);
      return String(Math.max(0, differenceInYears(ctx.generation.now, birth)));
    },
  },
  { when: has("weight"), generate: between(50, 200) },
  { when: has("height"), generate: between(150, 200) },
  {
    when: has("temperature"),
    generate: ({ generation }) => (36 + generation.random.next() * 3).toFixed(1),
  },
  { when: hasAll("pressure", "systolic"), generate: between(90, 180) },
  { when: hasAll("pressure", "diastolic"), generate: between(60, 110) },
];

// =============================================================================
// DT
// =============================================================================

const DATE_RULES: PrimitiveRule[] = [
  {
    when: has("birth"),
    generate: ({ generation }) => {
      const birthDate = generation.bundle.patient.birthDate;
      return birthDate ? toHL7DateString(birthDate).substring(0, 8) : "19800101";
    },
  },
  { when: has("death"), generate: () => "" },
  {
    when: has("admit"),
    generate: ({ generation }) => formatHL7Date(generation.encounterStart ?? generation.now),
  },
  {
    when: has("discharge"),
    generate: ({ generation }) => {
      const end = parseClinicalDate(generation.bundle.encounter?.period?.end);
      return formatHL7Date(end ?? addDays(generation.now, 3));
    },
  },
];

// =============================================================================
// ID / IS
// =============================================================================

const CODED_RULES: PrimitiveRule[] = [
  { when: has("sex", "gender"), generate: oneOf("M", "F") },
  { when: has("marital"), generate: oneOf("S", "M", "D", "W", "A", "L") },
  { when: has("race"), generate: oneOf("1002-5", "2028-9", "2054-5", "2076-8", "2106-3") },
  { when: has("ethnic"), generate: oneOf("H", "N") },
  { when: has("religion"), generate: oneOf("CHR", "JUD", "MOS", "BAH", "HIN", "BUD", "OTH") },
  { when: has("language"), generate: oneOf("en", "es", "fr", "de", "zh", "ja", "ar") },
  { when: has("nationality", "citizenship"), generate: oneOf("USA", "CAN", "MEX", "GBR", "CHN", "IND") },
  {
    when: (n) => n.includes("admission") && has("type", "source")(n),
    generate: oneOf("E", "I", "O", "P", "R", "U"),
  },
  { when: hasAll("patient", "class"), generate: oneOf("E", "I", "O", "P", "R", "B", "N") },
  {
    when: hasAll("hospital", "service"),
    generate: oneOf("MED", "SUR", "URO", "PUL", "CAR", "GYN", "OBS", "PED", "PSY", "NEU"),
  },
  { when: hasAll("admit", "source"), generate: oneOf("1", "2", "3", "4", "5", "6", "7", "8", "9") },
  { when: hasAll("result", "status"), generate: oneOf("F", "P", "C", "R", "X", "S", "I") },
  { when: has("status"), generate: oneOf("A", "I", "P", "C", "S", "D") },
  { when: hasAll("diagnosis", "priority"), generate: between(1, 9) },
  { when: has("priority"), generate: oneOf("S", "A", "R", "P", "C", "T") },
  { when: has("indicator", "flag"), generate: oneOf("Y", "N") },
  { when: hasAll("living", "dependency"), generate: oneOf("S", "M", "C", "WU", "O") },
  { when: has("financial", "billing"), generate: oneOf("COM", "HMO", "INS", "MED", "MM", "PPO", "POS") },
  {
    when: hasAll("relationship", "patient"),
    generate: oneOf("SEL", "SPO", "CHD", "PAR", "OTH", "GRD", "DEP"),
  },
  { when: hasAll("event", "reason"), generate: oneOf("01", "02", "03", "O", "U") },
  { when: hasAll("event", "type"), generate: oneOf("A01", "A02", "A03", "A04", "A05", "A08", "A11") },
  { when: hasAll("allergy", "type"), generate: oneOf("DA", "FA", "MA", "MC", "EA", "AA", "LA", "PA") },
  { when: hasAll("allergy", "severity"), generate: oneOf("SV", "MO", "MI", "U") },
  { when: hasAll("diagnosis", "type"), generate: oneOf("A", "W", "F") },
  { when: hasAll("abnormal", "flag"), generate: oneOf("L", "H", "LL", "HH", "N", "A") },
  {
    when: (n) => n.includes("specimen") && has("source", "type")(n),
    generate: oneOf("BLD", "BLDV", "BLDA", "UR", "CSF", "GAST", "SPUT", "SER", "PLAS"),
  },
];

function defaultCoded(ctx: FieldResolutionContext): string {
  return ctx.field.optionality === "optional" ? "" : "U";
}

// =============================================================================

function firstMatch(
  rules: PrimitiveRule[],
  ctx: FieldResolutionContext,
  fallback: (ctx: FieldResolutionContext) => string,
): string {
  const name = ctx.field.name.toLowerCase();
  const rule = rules.find((r) => r.when(name));
  return rule ? rule.generate(ctx) : fallback(ctx);
}

/** Random code from the field's table, or null when the table is unknown or empty. */
export function randomTableCode(ctx: FieldResolutionContext): string | null {
  const table = ctx.field.table ? ctx.generation.schema.codeTable(ctx.field.table) : null;
  if (!table || table.values.length === 0) return null;
  return ctx.generation.random.pick(table.values).code;
}

export function generatePrimitiveValue(ctx: FieldResolutionContext): string {
  const tableCode = randomTableCode(ctx);
  if (tableCode !== null) return tableCode;

  const { now, random } = ctx.generation;

  switch (ctx.field.dataType) {
    case "NM":
    case "SI":
      return firstMatch(NUMERIC_RULES, ctx, () => String(random.int(1, 999)));
    case "DT":
      return firstMatch(DATE_RULES, ctx, () => formatHL7Date(now));
    case "TM":
      return formatHL7Time(now);
    case "TS":
    case "DTM":
      return formatHL7Timestamp(now);
    case "ID":
    case "IS":
      return firstMatch(CODED_RULES, ctx, defaultCoded);
    default:
      return firstMatch(STRING_RULES, ctx, defaultString);
  }
}
