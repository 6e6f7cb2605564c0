/**
 * Identifier composites whose parts must agree with each other: the CX check
 * digit is computed over the id it accompanies, and placer/filler numbers are
 * shared by every order segment of the message.
 */
import { memoizedIndex } from "../composer/generation-context";
import { demographicPools } from "../demographics/pools";
import type { DataTypeDefinition } from "../hl7v2/schema/types";
import { lockedValue } from "./session-value";
import {
  componentValues,
  parentFieldPath,
  type CompositeAwareResolver,
  type ComponentValues,
  type FieldResolutionContext,
} from "./types";

const IDENTIFIER_TYPES = new Set(["CX", "EI", "XCN", "XON"]);

/** Mod10 (Luhn) check digit over the digits of `id`, or null when it has none. */
export function mod10CheckDigit(id: string): string | null {
  const digits = id.replace(/\D/g, "");
  if (digits.length === 0) return null;

  let sum = 0;
  for (let i = 0; i < digits.length; i++) {
    let digit = Number(digits[digits.length - 1 - i]);
    if (i % 2 === 0) {
      digit *= 2;
      if (digit > 9) digit -= 9;
    }
    sum += digit;
  }
  return String((10 - (sum % 10)) % 10);
}

// =============================================================================
// CX
// =============================================================================

type CxTarget = { id: (ctx: FieldResolutionContext) => string; type: string };

const CX_TARGETS: Readonly<Record<string, CxTarget>> = {
  "PID.3": {
    id: ({ generation }) =>
      lockedValue(generation, "PID.3.1") ?? generation.bundle.patient.mrn ?? generation.bundle.patient.id,
    type: "MR",
  },
  "PID.18": {
    id: ({ generation }) => generation.bundle.encounter?.accountNumber ?? `ACCT${generation.random.digits(7)}`,
    type: "AN",
  },
  "PV1.19": {
    id: ({ generation }) => generation.bundle.encounter?.id ?? `V${generation.random.digits(7)}`,
    type: "VN",
  },
};

function compositeIdentifier(ctx: FieldResolutionContext): ComponentValues {
  const target = CX_TARGETS[parentFieldPath(ctx)];
  const id = target ? target.id(ctx) : `ID${ctx.generation.random.digits(8)}`;
  const checkDigit = mod10CheckDigit(id);

  return componentValues([
    [1, id],
    [2, checkDigit],
    [3, checkDigit === null ? null : "M10"],
    [4, ctx.generation.config.messageHeader.sendingFacility],
    [5, target?.type ?? "PI"],
  ]);
}

// =============================================================================
// EI
// =============================================================================

/** Order number shared by every segment of the message that references it. */
function orderNumber(ctx: FieldResolutionContext, role: "placer" | "filler"): string {
  return String(memoizedIndex(ctx.generation, `order:${role}`, 90_000_000) + 10_000_000);
}

function entityIdentifier(ctx: FieldResolutionContext): ComponentValues {
  const { bundle, config, random } = ctx.generation;
  const name = ctx.field.name.toLowerCase();
  const header = config.messageHeader;

  if (name.includes("placer order")) {
    return componentValues([
      [1, bundle.prescription?.id ?? `ORD${orderNumber(ctx, "placer")}`],
      [2, header.sendingApplication],
    ]);
  }
  if (name.includes("filler order")) {
    return componentValues([
      [1, bundle.observation?.id ?? `FIL${orderNumber(ctx, "filler")}`],
      [2, header.receivingApplication],
    ]);
  }
  return componentValues([
    [1, `EI${random.digits(8)}`],
    [2, header.sendingApplication],
  ]);
}

// =============================================================================
// XCN / XON
// =============================================================================

function provider(ctx: FieldResolutionContext): ComponentValues {
  const { random } = ctx.generation;
  const pools = demographicPools();
  return componentValues([
    [1, `PRV${random.digits(6)}`],
    [2, random.pick(pools.lastNames)],
    [3, random.pick(pools.firstNames)],
    [6, "DR"],
  ]);
}

function organization(ctx: FieldResolutionContext): ComponentValues {
  const { organizations } = demographicPools();
  const index = memoizedIndex(ctx.generation, `${parentFieldPath(ctx)}#${ctx.segmentIndex}:organization`, organizations.length);
  const entry = organizations[index];
  return componentValues([
    [1, entry?.name],
    [10, entry?.id],
  ]);
}

export class IdentifierCoherenceResolver implements CompositeAwareResolver {
  readonly name = "identifier-coherence";
  readonly priority = 78;

  canHandleComposite(dataType: DataTypeDefinition): boolean {
    return IDENTIFIER_TYPES.has(dataType.code);
  }

  resolveComposite(dataType: DataTypeDefinition, ctx: FieldResolutionContext): ComponentValues | null {
    switch (dataType.code) {
      case "CX":
        return compositeIdentifier(ctx);
      case "EI":
        return entityIdentifier(ctx);
      case "XCN":
        return provider(ctx);
      case "XON":
        return organization(ctx);
      default:
        return null;
    }
  }
}
