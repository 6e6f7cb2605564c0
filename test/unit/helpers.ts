/**
 * Shared fixtures for unit tests: inline schemas, a deterministic random
 * source and generation/resolution context builders.
 */
import type { ClinicalBundle } from "../../src/clinical/types";
import { DEFAULT_COMPOSER_CONFIG, type ComposerConfig } from "../../src/config";
import {
  createGenerationContext,
  type GenerationContext,
  type GenerationOptions,
} from "../../src/composer/generation-context";
import type { Random } from "../../src/composer/random";
import type { MessageSchema } from "../../src/hl7v2/schema/message-schema";
import type {
  CodeTable,
  ComponentDefinition,
  DataTypeDefinition,
  FieldDefinition,
  SegmentSchema,
} from "../../src/hl7v2/schema/types";
import type { FieldResolutionContext } from "../../src/resolvers/types";

export const testBundle: ClinicalBundle = {
  patient: {
    id: "P12345",
    mrn: "MRN0042",
    ssn: "000-00-0000",
    name: { family: "TESTPATIENT", given: ["ALEX", "JORDAN"] },
    birthDate: "1985-03-15",
    gender: "female",
    telecom: [
      { system: "phone", value: "(555)555-0100", use: "home" },
      { system: "email", value: "alex@example.com" },
    ],
  },
  encounter: {
    id: "V98765",
    accountNumber: "ACCT555",
    class: "inpatient",
    period: { start: "2024-01-15T08:30:00Z" },
  },
};

export const REFERENCE_TIME = new Date("2024-01-15T12:00:00Z");

/**
 * Random source with fixed answers: `int` returns its lower bound, `pick`
 * the first item, `chance` the configured answer.
 */
export function fixedRandom(options: { chance?: boolean } = {}): Random {
  return {
    seed: 0,
    next: () => 0,
    int: (min) => min,
    chance: () => options.chance ?? true,
    pick: <T>(items: readonly T[]): T => {
      const [first] = items;
      if (first === undefined) throw new Error("Cannot pick from an empty list");
      return first;
    },
    digits: (length) => "1234567890".repeat(Math.ceil(length / 10)).substring(0, length),
  };
}

export function field(
  position: number,
  name: string,
  dataType: string,
  overrides: Partial<FieldDefinition> = {},
): FieldDefinition {
  return {
    position,
    name,
    dataType,
    optionality: "required",
    repeatability: "once",
    maxLength: null,
    table: null,
    ...overrides,
  };
}

export function component(
  position: number,
  name: string,
  dataType: string,
  overrides: Partial<ComponentDefinition> = {},
): ComponentDefinition {
  return { position, name, dataType, optionality: "required", table: null, ...overrides };
}

export function testSchema(
  parts: {
    segments?: SegmentSchema[];
    dataTypes?: DataTypeDefinition[];
    tables?: CodeTable[];
    structure?: string;
  } = {},
): MessageSchema {
  const structure = parts.structure ?? "ADT_A01";
  return {
    triggerEvent: { code: structure.toLowerCase(), structure, segments: [] },
    segment: (code) => parts.segments?.find((s) => s.code === code) ?? null,
    dataType: (code) => parts.dataTypes?.find((dt) => dt.code === code) ?? null,
    codeTable: (id) => parts.tables?.find((t) => t.id === id) ?? null,
  };
}

export function testGeneration(
  overrides: {
    bundle?: ClinicalBundle;
    schema?: MessageSchema;
    options?: GenerationOptions;
    config?: ComposerConfig;
    messageType?: string;
    random?: Random;
  } = {},
): GenerationContext {
  const generation = createGenerationContext({
    bundle: overrides.bundle ?? testBundle,
    messageType: overrides.messageType ?? "ADT^A01",
    schema: overrides.schema ?? testSchema(),
    options: overrides.options ?? { seed: 1, referenceTime: REFERENCE_TIME },
    config: overrides.config ?? DEFAULT_COMPOSER_CONFIG,
  });
  return overrides.random ? { ...generation, random: overrides.random } : generation;
}

export function resolutionContext(
  fieldDefinition: FieldDefinition,
  overrides: {
    segmentCode?: string;
    segmentIndex?: number;
    generation?: GenerationContext;
    component?: FieldResolutionContext["component"];
  } = {},
): FieldResolutionContext {
  return {
    segmentCode: overrides.segmentCode ?? "PID",
    fieldPosition: overrides.component?.parentField.position ?? fieldDefinition.position,
    segmentIndex: overrides.segmentIndex ?? 1,
    field: fieldDefinition,
    component: overrides.component,
    generation: overrides.generation ?? testGeneration(),
  };
}

/** Resolution input for component `child` of `parent`, as the field generator builds it. */
export function componentContext(
  parent: FieldDefinition,
  child: ComponentDefinition,
  overrides: { segmentCode?: string; segmentIndex?: number; generation?: GenerationContext } = {},
): FieldResolutionContext {
  return resolutionContext(
    field(parent.position, child.name, child.dataType, { optionality: child.optionality, table: child.table }),
    { ...overrides, component: { position: child.position, parentField: parent } },
  );
}
