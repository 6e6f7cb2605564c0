import type {
  CodeTable,
  DataTypeDefinition,
  SchemaProvider,
  SegmentSchema,
  TriggerEventDefinition,
} from "./types";

/**
 * Synchronous view of every definition one message needs. Built once per
 * composition so that field generation never awaits.
 */
export interface MessageSchema {
  triggerEvent: TriggerEventDefinition;
  segment(code: string): SegmentSchema | null;
  dataType(code: string): DataTypeDefinition | null;
  codeTable(id: string): CodeTable | null;
}

async function loadAll<T>(keys: Iterable<string>, load: (key: string) => Promise<T | null>): Promise<Map<string, T>> {
  const unique = [...new Set(keys)];
  const loaded = await Promise.all(unique.map(async (key) => [key, await load(key)] as const));
  const result = new Map<string, T>();
  for (const [key, value] of loaded) {
    if (value !== null) result.set(key, value);
  }
  return result;
}

export async function loadMessageSchema(
  provider: SchemaProvider,
  triggerEvent: TriggerEventDefinition,
): Promise<MessageSchema> {
  const segmentCodes = triggerEvent.segments.filter((s) => !s.isGroup).map((s) => s.code);
  const segments = await loadAll(segmentCodes, (code) => provider.getSegment(code));

  const fields = [...segments.values()].flatMap((segment) => segment.fields);
  const dataTypes = await loadAll(
    fields.map((field) => field.dataType),
    (code) => provider.getDataType(code),
  );

  const tableIds = [
    ...fields.map((field) => field.table),
    ...[...dataTypes.values()].flatMap((dt) => dt.components.map((c) => c.table)),
  ].filter((id): id is string => id !== null);
  const codeTables = await loadAll(tableIds, (id) => provider.getCodeTable(id));

  return {
    triggerEvent,
    segment: (code) => segments.get(code) ?? null,
    dataType: (code) => dataTypes.get(code) ?? null,
    codeTable: (id) => codeTables.get(id) ?? null,
  };
}
