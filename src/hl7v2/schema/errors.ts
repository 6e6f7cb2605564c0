export type SchemaKind = "trigger-event" | "segment" | "data-type" | "code-table";

export class SchemaNotFoundError extends Error {
  constructor(
    public readonly kind: SchemaKind,
    public readonly code: string,
  ) {
    super(`${kind === "trigger-event" ? "Trigger event" : `Schema ${kind}`} ${code} not found`);
    this.name = "SchemaNotFoundError";
  }
}
