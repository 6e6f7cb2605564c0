import { memoizedIndex } from "../composer/generation-context";
import { demographicPools, type Locality } from "../demographics/pools";
import { nameParts } from "../clinical/mappings";
import { parentFieldPath, type FieldResolutionContext, type FieldValueResolver } from "./types";

const PATIENT_NAME = "PID.5";
const PATIENT_ADDRESS = "PID.11";

/**
 * Locality shared by every address and phone number of one segment
 * occurrence, so city, state, postal code and area code agree.
 */
export function segmentLocality(ctx: FieldResolutionContext): Locality {
  const { localities } = demographicPools();
  const index = memoizedIndex(ctx.generation, `${ctx.segmentCode}#${ctx.segmentIndex}:locality`, localities.length);
  return localities[index] ?? localities[0] ?? { city: "", state: "", postalCode: "", areaCode: "" };
}

function pooled(ctx: FieldResolutionContext, kind: "firstNames" | "lastNames" | "streets"): string {
  const pool = demographicPools()[kind];
  const index = memoizedIndex(ctx.generation, `${parentFieldPath(ctx)}#${ctx.segmentIndex}:${kind}`, pool.length);
  return pool[index] ?? "";
}

function patientName(ctx: FieldResolutionContext) {
  return parentFieldPath(ctx) === PATIENT_NAME ? nameParts(ctx.generation.bundle.patient.name) : {};
}

function patientAddress(ctx: FieldResolutionContext) {
  return parentFieldPath(ctx) === PATIENT_ADDRESS ? ctx.generation.bundle.patient.address : undefined;
}

type DemographicRule = {
  when: (name: string) => boolean;
  value: (ctx: FieldResolutionContext) => string;
};

const RULES: DemographicRule[] = [
  {
    when: (name) => name.includes("family name") || name === "surname" || name.includes("last name"),
    value: (ctx) => patientName(ctx).family ?? pooled(ctx, "lastNames"),
  },
  {
    when: (name) => name.includes("given name") && !name.includes("further"),
    value: (ctx) => patientName(ctx).given ?? pooled(ctx, "firstNames"),
  },
  {
    when: (name) => name.includes("first name"),
    value: (ctx) => patientName(ctx).given ?? pooled(ctx, "firstNames"),
  },
  {
    when: (name) => name.includes("further given names") || name.includes("middle"),
    value: (ctx) => patientName(ctx).middle ?? "",
  },
  {
    when: (name) => name.includes("suffix"),
    value: (ctx) => patientName(ctx).suffix ?? "",
  },
  {
    when: (name) => name.includes("prefix") && !name.includes("surname"),
    value: (ctx) => patientName(ctx).prefix ?? "",
  },
  {
    when: (name) => name.includes("street"),
    value: (ctx) => {
      const line = patientAddress(ctx)?.line?.[0];
      if (line) return line;
      return `${ctx.generation.random.int(100, 9999)} ${pooled(ctx, "streets")}`;
    },
  },
  {
    when: (name) => name === "other designation",
    value: (ctx) => `Apt ${ctx.generation.random.int(1, 40)}`,
  },
  {
    when: (name) => name === "city",
    value: (ctx) => patientAddress(ctx)?.city ?? segmentLocality(ctx).city,
  },
  {
    when: (name) => name === "state" || name.includes("state or province"),
    value: (ctx) => patientAddress(ctx)?.state ?? segmentLocality(ctx).state,
  },
  {
    when: (name) => name.includes("zip") || name.includes("postal code"),
    value: (ctx) => patientAddress(ctx)?.postalCode ?? segmentLocality(ctx).postalCode,
  },
  {
    when: (name) => name === "country",
    value: (ctx) => patientAddress(ctx)?.country ?? "USA",
  },
];

/**
 * Person names and postal addresses. Values come from the patient when
 * resolving the patient's own name or address, otherwise from curated pools.
 */
export class DemographicResolver implements FieldValueResolver {
  readonly name = "demographic";
  readonly priority = 80;

  canHandle(ctx: FieldResolutionContext): boolean {
    const name = ctx.field.name.toLowerCase();
    return RULES.some((rule) => rule.when(name));
  }

  resolve(ctx: FieldResolutionContext): string | null {
    const name = ctx.field.name.toLowerCase();
    const rule = RULES.find((r) => r.when(name));
    return rule ? rule.value(ctx) : null;
  }
}
