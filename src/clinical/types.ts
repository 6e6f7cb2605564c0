/**
 * Clinical seed data supplied by the caller. Shapes follow the FHIR resources
 * they stand in for, reduced to the elements the composer reads.
 */

export type Coding = {
  code: string;
  display?: string;
  system?: string;
};

export type HumanName = {
  family?: string;
  given?: string[];
  prefix?: string[];
  suffix?: string[];
};

export type Address = {
  line?: string[];
  city?: string;
  state?: string;
  postalCode?: string;
  country?: string;
};

export type ContactPoint = {
  system?: "phone" | "email" | "fax";
  value?: string;
  use?: "home" | "work" | "mobile";
};

export type Period = {
  start?: string;
  end?: string;
};

export type Practitioner = {
  id: string;
  name?: HumanName;
};

export type Patient = {
  id: string;
  mrn?: string;
  ssn?: string;
  name?: HumanName;
  birthDate?: string;
  gender?: "male" | "female" | "other" | "unknown";
  address?: Address;
  telecom?: ContactPoint[];
  maritalStatus?: string;
  language?: string;
};

export type EncounterClass = "inpatient" | "outpatient" | "emergency" | "preadmit" | "recurring";

export type Encounter = {
  id: string;
  accountNumber?: string;
  class?: EncounterClass;
  period?: Period;
  location?: {
    pointOfCare?: string;
    room?: string;
    bed?: string;
    facility?: string;
  };
  attending?: Practitioner;
  diagnosis?: Coding;
};

export type Prescription = {
  id: string;
  medication: Coding;
  dose?: { value: number; unit: string };
  route?: Coding;
  prescriber?: Practitioner;
  authoredOn?: string;
};

export type Observation = {
  id: string;
  code: Coding;
  value?: string;
  /** HL7 value type for OBX-2: NM, ST, CE, ... */
  valueType?: string;
  unit?: string;
  referenceRange?: { low?: number; high?: number };
  status?: "final" | "preliminary" | "corrected" | "cancelled";
  interpretation?: string;
  effective?: string;
};

export type ClinicalBundle = {
  patient: Patient;
  encounter?: Encounter;
  prescription?: Prescription;
  observation?: Observation;
};
