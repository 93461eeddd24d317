import type { ResolvedVariable } from "../types";

export type MaskingMode = "none" | "partial" | "full";

export interface MaskingPolicy {
  mode: MaskingMode;
  /** Name patterns; `*` matches any run of characters, case-insensitive. */
  patterns: readonly string[];
}

export const MASKING_MODES: readonly MaskingMode[] = ["none", "partial", "full"];

export const DEFAULT_MASK_PATTERNS: readonly string[] = [
  "*SECRET*",
  "*KEY*",
  "*TOKEN*",
  "*PASSWORD*",
];

export const DEFAULT_MASKING_POLICY: MaskingPolicy = {
  mode: "partial",
  patterns: DEFAULT_MASK_PATTERNS,
};

const FULL_MASK = "********";

function patternToRegExp(pattern: string): RegExp {
  const body = pattern
    .split("*")
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(`^${body}$`, "i");
}

export function isSensitiveName(name: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => patternToRegExp(pattern).test(name));
}

/**
 * Value as it may be shown to the user. Partial masking keeps the first
 * and last two characters of values longer than eight.
 */
export function maskValue(variable: ResolvedVariable, policy: MaskingPolicy): string {
  const { value } = variable;
  if (policy.mode === "none" || value === "") return value;
  if (!isSensitiveName(variable.name, policy.patterns)) return value;
  if (policy.mode === "full" || value.length <= 8) return FULL_MASK;
  return `${value.slice(0, 2)}${"*".repeat(value.length - 4)}${value.slice(-2)}`;
}
