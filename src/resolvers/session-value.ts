/**
 * Caller-pinned values (`options.lockedValues`). Highest priority: a pinned
 * value always wins.
 *
 * Keys are field paths (`PID.3`), component paths (`PID.5.1`) or semantic
 * paths (`patient.mrn`). A pinned composite value is split on `^`.
 */
import { COMPONENT_SEPARATOR } from "../hl7v2/format";
import type { GenerationContext } from "../composer/generation-context";
import type { DataTypeDefinition } from "../hl7v2/schema/types";
import {
  fieldPath,
  parentFieldPath,
  type CompositeAwareResolver,
  type ComponentValues,
  type FieldResolutionContext,
  type FieldValueResolver,
} from "./types";

export const SEMANTIC_FIELD_PATHS: Readonly<Record<string, string>> = {
  "message.controlId": "MSH.10",
  "patient.identifier": "PID.3",
  "patient.mrn": "PID.3.1",
  "patient.name": "PID.5",
  "patient.family": "PID.5.1",
  "patient.given": "PID.5.2",
  "patient.birthDate": "PID.7",
  "patient.sex": "PID.8",
  "patient.address": "PID.11",
  "patient.phone": "PID.13",
  "patient.language": "PID.15",
  "patient.maritalStatus": "PID.16",
  "patient.account": "PID.18",
  "patient.ssn": "PID.19",
  "encounter.class": "PV1.2",
  "encounter.location": "PV1.3",
  "encounter.attending": "PV1.7",
  "encounter.visitNumber": "PV1.19",
  "order.placerNumber": "ORC.2",
  "order.fillerNumber": "ORC.3",
};

const normalized = new WeakMap<Record<string, string>, Map<string, string>>();

function lockedValuesByPath(generation: GenerationContext): Map<string, string> {
  const locked = generation.options.lockedValues;
  if (!locked) return new Map();

  const cached = normalized.get(locked);
  if (cached) return cached;

  const byPath = new Map<string, string>();
  // Field paths win over semantic aliases for the same target
  for (const [key, value] of Object.entries(locked)) {
    const path = SEMANTIC_FIELD_PATHS[key];
    if (path !== undefined) byPath.set(path, value);
  }
  for (const [key, value] of Object.entries(locked)) {
    if (SEMANTIC_FIELD_PATHS[key] === undefined) byPath.set(key, value);
  }

  normalized.set(locked, byPath);
  return byPath;
}

/** Pinned value for an exact path, if any. */
export function lockedValue(generation: GenerationContext, path: string): string | undefined {
  return lockedValuesByPath(generation).get(path);
}

/** True when `path` or any of its components is pinned. */
export function isPinned(generation: GenerationContext, path: string): boolean {
  const prefix = `${path}.`;
  for (const key of lockedValuesByPath(generation).keys()) {
    if (key === path || key.startsWith(prefix)) return true;
  }
  return false;
}

function splitComponents(value: string): string[] {
  return value.split(COMPONENT_SEPARATOR);
}

export class SessionValueResolver implements FieldValueResolver, CompositeAwareResolver {
  readonly name = "session-value";
  readonly priority = 100;

  canHandle(ctx: FieldResolutionContext): boolean {
    return this.resolve(ctx) !== null;
  }

  resolve(ctx: FieldResolutionContext): string | null {
    const locked = lockedValuesByPath(ctx.generation);
    const exact = locked.get(fieldPath(ctx));
    if (exact !== undefined) return exact;

    if (!ctx.component) return null;
    const whole = locked.get(parentFieldPath(ctx));
    if (whole === undefined) return null;
    return splitComponents(whole)[ctx.component.position - 1] ?? "";
  }

  canHandleComposite(_dataType: DataTypeDefinition, ctx: FieldResolutionContext): boolean {
    return lockedValuesByPath(ctx.generation).has(parentFieldPath(ctx));
  }

  resolveComposite(_dataType: DataTypeDefinition, ctx: FieldResolutionContext): ComponentValues | null {
    const whole = lockedValuesByPath(ctx.generation).get(parentFieldPath(ctx));
    if (whole === undefined) return null;

    const values: ComponentValues = new Map();
    splitComponents(whole).forEach((value, index) => values.set(index + 1, value));
    return values;
  }
}
