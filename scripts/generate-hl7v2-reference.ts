/**
 * Generate HL7v2 reference JSON from the official XSD schemas.
 *
 * Usage:
 *   npx tsx scripts/generate-hl7v2-reference.ts \
 *     --xsd-dir "tmp/HL7-xml v2.5" \
 *     --version 2.5
 *
 * Output: data/hl7v2-reference/v{version}/ with 5 JSON files. Descriptions,
 * optionality and code tables already present in the output directory are kept.
 */

import { parseArgs } from "node:util";
import { readXsdDirectory } from "../src/hl7v2/reference/xsd-parser";
import { buildReferenceData, writeReferenceData } from "../src/hl7v2/reference/merge";
import { loadReferenceData, ReferenceDataError } from "../src/hl7v2/reference/load";
import type { ReferenceData } from "../src/hl7v2/reference/types";

const { values } = parseArgs({
  args: process.argv.slice(2),
  options: {
    "xsd-dir": { type: "string" },
    "version": { type: "string", default: "2.5" },
    "output-dir": { type: "string" },
  },
});

const xsdDir = values["xsd-dir"];
const version = values["version"] ?? "2.5";
const outputDir = values["output-dir"] ?? `data/hl7v2-reference/v${version}`;

if (!xsdDir) {
  console.error("Usage: npx tsx scripts/generate-hl7v2-reference.ts --xsd-dir <path> [--version <ver>] [--output-dir <path>]");
  process.exit(1);
}

console.log(`Generating HL7v2 v${version} reference data...`);
console.log(`  XSD source: ${xsdDir}`);
console.log(`  Output:     ${outputDir}`);
console.log();

let previous: ReferenceData | undefined;
try {
  previous = await loadReferenceData(version, outputDir);
  console.log("Existing catalog found; carrying over descriptions, optionality and tables.");
} catch (err) {
  if (!(err instanceof ReferenceDataError)) throw err;
  console.log(`No usable existing catalog (${err.message}); starting fresh.`);
}

const xsd = await readXsdDirectory(xsdDir);
const { data, report } = buildReferenceData(xsd, previous);
await writeReferenceData(data, outputDir);

console.log();
console.log("=== Report ===");
console.log(`Fields:    ${report.fieldCount}`);
console.log(`Segments:  ${report.segmentCount} (${report.carriedOptionalityCount} fields with carried optionality)`);
console.log(`Datatypes: ${report.datatypeCount}`);
console.log(`Messages:  ${report.messageCount}`);
console.log(`Tables:    ${report.tableCount}`);
console.log();
console.log("Done.");
