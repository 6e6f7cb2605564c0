/**
 * Values read straight from the clinical bundle. When the caller supplied a
 * patient's birth date or an observation's code, the message carries exactly
 * that rather than a sampled stand-in.
 *
 * Handlers are pure: they never draw from the message's random source, so
 * `canHandle` can evaluate them without side effects.
 */
import {
  codingComponents,
  mapGender,
  mapObservationStatus,
  mapPatientClass,
  nameParts,
} from "../clinical/mappings";
import type { ClinicalBundle, Practitioner } from "../clinical/types";
import { toHL7DateString } from "../hl7v2/format";
import type { DataTypeDefinition } from "../hl7v2/schema/types";
import {
  componentValues,
  parentFieldPath,
  type CompositeAwareResolver,
  type ComponentValues,
  type FieldResolutionContext,
  type FieldValueResolver,
} from "./types";

type ContextValue = string | ComponentValues | null;
type ContextHandler = (bundle: ClinicalBundle) => ContextValue;

const practitioner = (p: Practitioner | undefined): ContextValue => {
  if (!p) return null;
  const name = nameParts(p.name);
  return componentValues([
    [1, p.id],
    [2, name.family],
    [3, name.given],
    [4, name.middle],
    [6, name.prefix],
  ]);
};

const dateTime = (value: string | undefined): ContextValue => (value ? toHL7DateString(value) : null);

export const CONTEXT_FIELDS: Readonly<Record<string, ContextHandler>> = {
  // PID
  "PID.5": ({ patient }) => {
    if (!patient.name) return null;
    const name = nameParts(patient.name);
    return componentValues([
      [1, name.family],
      [2, name.given],
      [3, name.middle],
      [4, name.suffix],
      [5, name.prefix],
      [7, "L"],
    ]);
  },
  "PID.7": ({ patient }) => dateTime(patient.birthDate),
  "PID.8": ({ patient }) => (patient.gender ? mapGender(patient.gender) : null),
  "PID.11": ({ patient }) => {
    const address = patient.address;
    if (!address) return null;
    return componentValues([
      [1, address.line?.[0]],
      [2, address.line?.[1]],
      [3, address.city],
      [4, address.state],
      [5, address.postalCode],
      [6, address.country],
      [7, "H"],
    ]);
  },
  "PID.13": ({ patient }) => {
    const phone = patient.telecom?.find((t) => t.system === "phone" && t.value);
    if (!phone?.value) return null;
    return componentValues([
      [1, phone.value],
      [2, phone.use === "work" ? "WPN" : "PRN"],
      [3, phone.use === "mobile" ? "CP" : "PH"],
    ]);
  },
  "PID.15": ({ patient }) => (patient.language ? new Map([[1, patient.language]]) : null),
  "PID.16": ({ patient }) => (patient.maritalStatus ? new Map([[1, patient.maritalStatus]]) : null),
  "PID.19": ({ patient }) => patient.ssn ?? null,

  // PV1
  "PV1.2": ({ encounter }) => (encounter?.class ? mapPatientClass(encounter.class) : null),
  "PV1.3": ({ encounter }) => {
    const location = encounter?.location;
    if (!location) return null;
    return componentValues([
      [1, location.pointOfCare],
      [2, location.room],
      [3, location.bed],
      [4, location.facility],
    ]);
  },
  "PV1.7": ({ encounter }) => practitioner(encounter?.attending),
  "PV1.45": ({ encounter }) => dateTime(encounter?.period?.end),

  // DG1
  "DG1.3": ({ encounter }) =>
    encounter?.diagnosis ? new Map(codingComponents(encounter.diagnosis, "I10")) : null,
  "DG1.4": ({ encounter }) => encounter?.diagnosis?.display ?? null,

  // OBR / OBX
  "OBR.4": ({ observation }) => (observation ? new Map(codingComponents(observation.code, "LN")) : null),
  "OBX.2": ({ observation }) => {
    if (!observation) return null;
    if (observation.valueType) return observation.valueType;
    return observation.value !== undefined && /^-?\d+(\.\d+)?$/.test(observation.value) ? "NM" : "ST";
  },
  "OBX.3": ({ observation }) => (observation ? new Map(codingComponents(observation.code, "LN")) : null),
  "OBX.5": ({ observation }) => observation?.value ?? null,
  "OBX.6": ({ observation }) =>
    observation?.unit ? componentValues([[1, observation.unit], [3, "UCUM"]]) : null,
  "OBX.7": ({ observation }) => {
    const range = observation?.referenceRange;
    if (!range || (range.low === undefined && range.high === undefined)) return null;
    return `${range.low ?? ""}-${range.high ?? ""}`;
  },
  "OBX.8": ({ observation }) => observation?.interpretation ?? null,
  "OBX.11": ({ observation }) => (observation ? mapObservationStatus(observation.status) : null),

  // ORC / RXE / RXR
  "ORC.12": ({ prescription }) => practitioner(prescription?.prescriber),
  "RXE.2": ({ prescription }) =>
    prescription ? new Map(codingComponents(prescription.medication, "RXNORM")) : null,
  "RXE.3": ({ prescription }) => (prescription?.dose ? String(prescription.dose.value) : null),
  "RXE.5": ({ prescription }) =>
    prescription?.dose ? componentValues([[1, prescription.dose.unit], [3, "UCUM"]]) : null,
  "RXR.1": ({ prescription }) =>
    prescription?.route ? new Map(codingComponents(prescription.route, "HL70162")) : null,
};

function contextValue(ctx: FieldResolutionContext): ContextValue {
  const handler = CONTEXT_FIELDS[parentFieldPath(ctx)];
  return handler ? handler(ctx.generation.bundle) : null;
}

export class ClinicalContextResolver implements FieldValueResolver, CompositeAwareResolver {
  readonly name = "clinical-context";
  readonly priority = 91;

  canHandle(ctx: FieldResolutionContext): boolean {
    return !ctx.component && contextValue(ctx) !== null;
  }

  resolve(ctx: FieldResolutionContext): string | null {
    const value = contextValue(ctx);
    if (value === null || typeof value === "string") return value;
    return value.get(1) ?? null;
  }

  canHandleComposite(_dataType: DataTypeDefinition, ctx: FieldResolutionContext): boolean {
    return contextValue(ctx) !== null;
  }

  resolveComposite(_dataType: DataTypeDefinition, ctx: FieldResolutionContext): ComponentValues | null {
    const value = contextValue(ctx);
    if (value === null) return null;
    return typeof value === "string" ? new Map([[1, value]]) : value;
  }
}
