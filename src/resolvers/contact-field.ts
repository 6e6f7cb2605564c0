import { memoizedIndex } from "../composer/generation-context";
import { segmentLocality } from "./demographic";
import { parentFieldPath, type FieldResolutionContext, type FieldValueResolver } from "./types";

const PATIENT_PHONE = "PID.13";

/** Seven-digit local number shared by the components of one telecom field. */
function localNumber(ctx: FieldResolutionContext): string {
  const key = `${parentFieldPath(ctx)}#${ctx.segmentIndex}:local-number`;
  return String(memoizedIndex(ctx.generation, key, 8_000_000) + 2_000_000);
}

function patientTelecom(ctx: FieldResolutionContext, system: "phone" | "email"): string | undefined {
  if (parentFieldPath(ctx) !== PATIENT_PHONE) return undefined;
  return ctx.generation.bundle.patient.telecom?.find((t) => t.system === system && t.value)?.value;
}

type ContactRule = {
  when: (name: string) => boolean;
  value: (ctx: FieldResolutionContext) => string;
};

const RULES: ContactRule[] = [
  {
    when: (name) => name.includes("email"),
    value: (ctx) => patientTelecom(ctx, "email") ?? `contact${ctx.generation.random.digits(4)}@example.com`,
  },
  {
    when: (name) => name.includes("country code"),
    value: () => "1",
  },
  {
    when: (name) => name.includes("area"),
    value: (ctx) => segmentLocality(ctx).areaCode,
  },
  {
    when: (name) => name.includes("local number"),
    value: (ctx) => localNumber(ctx),
  },
  {
    when: (name) => (name.includes("telephone") || name.includes("phone")) && !name.includes("use") && !name.includes("equipment"),
    value: (ctx) => {
      const phone = patientTelecom(ctx, "phone");
      if (phone) return phone;
      const local = localNumber(ctx);
      return `(${segmentLocality(ctx).areaCode})${local.slice(0, 3)}-${local.slice(3)}`;
    },
  },
];

/**
 * Phone numbers and email addresses. The area code follows the locality of
 * the segment's address, and a telecom field's formatted number, area code
 * and local number describe the same line.
 */
export class ContactFieldResolver implements FieldValueResolver {
  readonly name = "contact-field";
  readonly priority = 75;

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
