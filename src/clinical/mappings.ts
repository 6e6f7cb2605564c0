import type { Coding, EncounterClass, HumanName, Observation, Patient } from "./types";

// HL7 table 0001
export function mapGender(gender: Patient["gender"]): string {
  switch (gender) {
    case "male": return "M";
    case "female": return "F";
    case "other": return "O";
    default: return "U";
  }
}

// HL7 table 0004
export function mapPatientClass(encounterClass: EncounterClass | undefined): string {
  switch (encounterClass) {
    case "inpatient": return "I";
    case "outpatient": return "O";
    case "emergency": return "E";
    case "preadmit": return "P";
    case "recurring": return "R";
    default: return "U";
  }
}

// HL7 table 0085
export function mapObservationStatus(status: Observation["status"]): string {
  switch (status) {
    case "final": return "F";
    case "preliminary": return "P";
    case "corrected": return "C";
    case "cancelled": return "X";
    default: return "F";
  }
}

/** Name of coding system (CE-3) for a FHIR system URI. */
export function mapCodingSystem(system: string | undefined, fallback: string): string {
  if (!system) return fallback;
  if (system.includes("icd-10")) return "I10";
  if (system.includes("icd-9")) return "I9C";
  if (system.includes("cpt")) return "C4";
  if (system.includes("snomed")) return "SCT";
  if (system.includes("loinc")) return "LN";
  if (system.includes("rxnorm")) return "RXNORM";
  if (system.includes("ndc")) return "NDC";
  if (system.includes("ucum")) return "UCUM";
  return system;
}

export function codingComponents(coding: Coding, defaultSystem: string): Array<[number, string]> {
  return [
    [1, coding.code],
    [2, coding.display ?? ""],
    [3, mapCodingSystem(coding.system, defaultSystem)],
  ];
}

/** XPN / XCN name parts: family, given, further given names, suffix, prefix. */
export function nameParts(name: HumanName | undefined): {
  family?: string;
  given?: string;
  middle?: string;
  suffix?: string;
  prefix?: string;
} {
  return {
    family: name?.family,
    given: name?.given?.[0],
    middle: name?.given?.slice(1).join(" ") || undefined,
    suffix: name?.suffix?.[0],
    prefix: name?.prefix?.[0],
  };
}
