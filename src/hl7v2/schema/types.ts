/**
 * Structural definitions served by a {@link SchemaProvider}.
 * All definitions are immutable once loaded.
 */

export type Optionality = "required" | "optional";
export type Repeatability = "once" | "unbounded";

export interface SegmentOccurrence {
  /** Segment code (`PID`) or, for group markers, the group name (`ADT_A01.PROCEDURE`). */
  code: string;
  optionality: Optionality;
  repeatability: Repeatability;
  isGroup: boolean;
  /** Nesting depth; top-level occurrences are level 0, members of a group are one deeper. */
  level: number;
  position: number;
}

export interface TriggerEventDefinition {
  /** Lower-cased structure name, e.g. `adt_a01`. */
  code: string;
  /** Upper-cased structure name as it appears in MSH-9.3. */
  structure: string;
  segments: SegmentOccurrence[];
}

export interface FieldDefinition {
  position: number;
  name: string;
  dataType: string;
  optionality: Optionality;
  repeatability: Repeatability;
  maxLength: number | null;
  table: string | null;
}

export interface SegmentSchema {
  code: string;
  longName: string | null;
  description: string | null;
  fields: FieldDefinition[];
}

export interface ComponentDefinition {
  position: number;
  name: string;
  dataType: string;
  optionality: Optionality;
  table: string | null;
}

export interface DataTypeDefinition {
  code: string;
  /** Empty for primitive types. */
  components: ComponentDefinition[];
}

export interface CodeTableValue {
  code: string;
  display: string;
}

export interface CodeTable {
  id: string;
  name: string;
  values: CodeTableValue[];
}

export interface SchemaProvider {
  getTriggerEvent(code: string): Promise<TriggerEventDefinition | null>;
  getSegment(code: string): Promise<SegmentSchema | null>;
  getDataType(code: string): Promise<DataTypeDefinition | null>;
  getCodeTable(id: string): Promise<CodeTable | null>;
  listTriggerEvents(): Promise<string[]>;
}

export function isComposite(dataType: DataTypeDefinition | null): dataType is DataTypeDefinition {
  return dataType !== null && dataType.components.length > 0;
}
