import { z } from "zod";

// =============================================================================
// XSD import shapes
// =============================================================================

export interface XsdField {
  segment: string;
  position: number;
  item: string;        // zero-padded 5-digit, e.g. "00106"
  dataType: string;    // e.g. "CX", "ST", "SI"
  longName: string;
  maxLength: number | null;
  table: string | null;     // e.g. "0061" (stripped HL7 prefix), null if absent
}

export interface XsdSegmentField {
  field: string;       // e.g. "PID.3"
  position: number;
  minOccurs: number;
  maxOccurs: number | "unbounded";
}

export interface XsdSegment {
  name: string;        // e.g. "PID"
  fields: XsdSegmentField[];
}

export interface XsdDatatypeComponent {
  component: string;   // e.g. "CX.1"
  position: number;
  dataType: string;
  longName: string;
  maxLength: number | null;
}

export interface XsdDatatype {
  name: string;        // e.g. "CX"
  components: XsdDatatypeComponent[];
}

export interface XsdMessageElement {
  segment?: string;
  group?: string;
  minOccurs: number;
  maxOccurs: number | "unbounded";
  elements?: XsdMessageElement[];
}

export interface XsdMessage {
  name: string;        // e.g. "ADT_A01"
  elements: XsdMessageElement[];
}

// =============================================================================
// Reference JSON (data/hl7v2-reference/v{version}/*.json)
// =============================================================================

const cardinalitySchema = z.union([z.number().int().nonnegative(), z.literal("unbounded")]);

export const outputFieldSchema = z.object({
  segment: z.string(),
  position: z.number().int().positive(),
  item: z.string(),
  dataType: z.string(),
  longName: z.string(),
  maxLength: z.number().int().positive().nullable(),
  table: z.string().nullable(),
  description: z.string().nullable(),
});

export const outputSegmentFieldSchema = z.object({
  field: z.string(),
  position: z.number().int().positive(),
  minOccurs: z.number().int().nonnegative(),
  maxOccurs: cardinalitySchema,
  optionality: z.string().nullable(), // OPT code: "R", "O", "C", "RE", "CE", "X", "B", "W"
});

export const outputSegmentSchema = z.object({
  longName: z.string().nullable(),
  description: z.string().nullable(),
  fields: z.array(outputSegmentFieldSchema),
});

export const outputDatatypeComponentSchema = z.object({
  component: z.string(),
  position: z.number().int().positive(),
  dataType: z.string(),
  longName: z.string(),
  maxLength: z.number().int().positive().nullable(),
  optionality: z.string().nullable().optional(),
  table: z.string().nullable().optional(),
});

export const outputDatatypeSchema = z.object({
  components: z.array(outputDatatypeComponentSchema),
});

export const outputTableSchema = z.object({
  tableNumber: z.string(),
  name: z.string(),
  type: z.string(),        // "HL7" or "User"
  values: z.array(z.object({ code: z.string(), display: z.string() })),
});

export const messageElementSchema: z.ZodType<XsdMessageElement> = z.lazy(() =>
  z.object({
    segment: z.string().optional(),
    group: z.string().optional(),
    minOccurs: z.number().int().nonnegative(),
    maxOccurs: cardinalitySchema,
    elements: z.array(messageElementSchema).optional(),
  }),
);

export const outputMessageSchema = z.object({
  elements: z.array(messageElementSchema),
});

export type OutputField = z.infer<typeof outputFieldSchema>;
export type OutputSegmentField = z.infer<typeof outputSegmentFieldSchema>;
export type OutputSegment = z.infer<typeof outputSegmentSchema>;
export type OutputDatatypeComponent = z.infer<typeof outputDatatypeComponentSchema>;
export type OutputDatatype = z.infer<typeof outputDatatypeSchema>;
export type OutputTable = z.infer<typeof outputTableSchema>;
export type OutputMessage = z.infer<typeof outputMessageSchema>;

export interface ReferenceData {
  fields: Record<string, OutputField>;
  segments: Record<string, OutputSegment>;
  datatypes: Record<string, OutputDatatype>;
  messages: Record<string, OutputMessage>;
  tables: Record<string, OutputTable>;
}
