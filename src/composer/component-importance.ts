/**
 * Population tiers for optional composite components. Rules are keyed by the
 * parent data type; components of unknown composites are Optional.
 */
import type { ComposerConfig } from "../config";
import type { ComponentDefinition } from "../hl7v2/schema/types";

export type ImportanceTier = "critical" | "important" | "optional";

type ImportanceRule = {
  tier: Exclude<ImportanceTier, "optional">;
  matches: (name: string, position: number) => boolean;
};

const has = (name: string, ...terms: string[]) => terms.some((term) => name.includes(term));

const CODED_ELEMENT_RULES: ImportanceRule[] = [
  {
    tier: "critical",
    matches: (n, p) => p <= 2 || (has(n, "identifier", "text") && !n.includes("alternate")),
  },
  { tier: "important", matches: (n, p) => p === 3 || has(n, "coding system", "alternate") },
];

export const IMPORTANCE_RULES: Readonly<Record<string, ImportanceRule[]>> = {
  XAD: [
    {
      tier: "critical",
      matches: (n, p) => p === 7 || has(n, "street", "city", "state", "zip", "postal", "address type"),
    },
    {
      tier: "important",
      matches: (n, p) => p === 2 || p === 6 || has(n, "other designation", "country"),
    },
  ],
  XPN: [
    {
      tier: "critical",
      matches: (n) => has(n, "family", "first") || (n.includes("given") && !n.includes("further")),
    },
    {
      tier: "important",
      matches: (n, p) => (p >= 3 && p <= 5) || has(n, "middle", "prefix", "suffix"),
    },
  ],
  CX: [
    {
      tier: "critical",
      matches: (n, p) =>
        p <= 3 || (/\bid\b/.test(n) && !n.includes("assigning")) || n.includes("check digit"),
    },
    {
      tier: "important",
      matches: (n, p) => p === 4 || p === 5 || has(n, "assigning authority", "identifier type"),
    },
  ],
  XTN: [
    {
      tier: "critical",
      matches: (n, p) => p <= 3 || (n.includes("telephone") && !has(n, "use", "equipment")),
    },
    { tier: "important", matches: (n, p) => p === 4 || p === 6 || has(n, "email", "area") },
  ],
  CE: CODED_ELEMENT_RULES,
  CWE: CODED_ELEMENT_RULES,
};

export function classifyComponent(parentDataType: string, component: ComponentDefinition): ImportanceTier {
  const rules = IMPORTANCE_RULES[parentDataType];
  if (!rules) return "optional";

  const name = component.name.toLowerCase();
  return rules.find((rule) => rule.matches(name, component.position))?.tier ?? "optional";
}

export function populationProbability(tier: ImportanceTier, config: ComposerConfig): number {
  return config.probabilities.componentImportance[tier];
}
