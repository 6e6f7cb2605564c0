/**
 * Example: composing an ADT^A01 message for a fixed patient and encounter
 *
 * Run: npx tsx example/compose-message.ts [messageType] [seed]
 */

import { compose, type ClinicalBundle } from "../src";

const bundle: ClinicalBundle = {
  patient: {
    id: "P12345",
    mrn: "MRN0042",
    name: { family: "TESTPATIENT", given: ["ALEX", "J"] },
    birthDate: "1985-03-15",
    gender: "female",
    address: { line: ["100 Example Ave"], city: "Springfield", state: "IL", postalCode: "62701", country: "USA" },
    telecom: [{ system: "phone", value: "(217)555-0100", use: "home" }],
  },
  encounter: {
    id: "V98765",
    accountNumber: "ACCT555",
    class: "inpatient",
    period: { start: "2024-01-15T08:30:00Z" },
    location: { pointOfCare: "MEDSURG", room: "204", bed: "A", facility: "MAIN" },
    attending: { id: "PRV001", name: { family: "EXAMPLE", given: ["SAM"], prefix: ["DR"] } },
    diagnosis: { code: "J18.9", display: "Pneumonia, unspecified organism", system: "http://hl7.org/fhir/sid/icd-10" },
  },
};

const messageType = process.argv[2] ?? "ADT^A01";
const seed = process.argv[3] ? Number(process.argv[3]) : 42;

const result = await compose(messageType, bundle, { seed });

if ("error" in result) {
  console.error(`Failed to compose ${result.triggerEvent}: ${result.error}`);
  process.exit(1);
}

console.log(result.message.split(/\r\n|\r|\n/).join("\n"));
