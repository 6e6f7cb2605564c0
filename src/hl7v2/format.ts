/**
 * HL7v2 wire conventions: delimiters, escaping and date/time formats.
 */

export const FIELD_SEPARATOR = "|";
export const COMPONENT_SEPARATOR = "^";
export const REPETITION_SEPARATOR = "~";
export const ESCAPE_CHARACTER = "\\";
export const SUBCOMPONENT_SEPARATOR = "&";

/** MSH-2 */
export const ENCODING_CHARACTERS =
  COMPONENT_SEPARATOR + REPETITION_SEPARATOR + ESCAPE_CHARACTER + SUBCOMPONENT_SEPARATOR;

const ESCAPE_SEQUENCES: Record<string, string> = {
  [FIELD_SEPARATOR]: "\\F\\",
  [COMPONENT_SEPARATOR]: "\\S\\",
  [REPETITION_SEPARATOR]: "\\R\\",
  [ESCAPE_CHARACTER]: "\\E\\",
  [SUBCOMPONENT_SEPARATOR]: "\\T\\",
};

/** Replaces reserved delimiter characters with HL7 escape sequences. */
export function escapeValue(value: string): string {
  return value.replace(/[|^~\\&]/g, (ch) => ESCAPE_SEQUENCES[ch] ?? ch);
}

/** `yyyyMMddHHmmss` in UTC. */
export function formatHL7Timestamp(date: Date): string {
  return date.toISOString().replace(/[-:T]/g, "").replace(/\.\d+Z?$/, "").substring(0, 14);
}

/** `yyyyMMdd` in UTC. */
export function formatHL7Date(date: Date): string {
  return formatHL7Timestamp(date).substring(0, 8);
}

/** `HHmmss` in UTC. */
export function formatHL7Time(date: Date): string {
  return formatHL7Timestamp(date).substring(8, 14);
}

/** FHIR date or dateTime string (`1985-03-15`, `2024-01-01T10:00:00Z`) to HL7 format. */
export function toHL7DateString(value: string): string {
  return value
    .replace(/(\.\d+)?(Z|[+-]\d{2}:?\d{2})?$/, "")
    .replace(/[-:T]/g, "")
    .substring(0, 14);
}

/** Formats an instant for a date/time data type code. */
export function formatForDataType(date: Date, dataType: string): string {
  switch (dataType) {
    case "DT":
      return formatHL7Date(date);
    case "TM":
      return formatHL7Time(date);
    default:
      return formatHL7Timestamp(date);
  }
}
