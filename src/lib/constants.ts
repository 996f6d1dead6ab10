import type { Category } from "@/analysis/types";

export const CATEGORY_ORDER = [
  "compile-error",
  "link-missing-dependency",
  "link-undefined-reference",
  "license-match",
  "other",
] as const satisfies readonly Category[];

/** Numeric index for category sorting (lower = higher priority) */
export const CATEGORY_INDEX: Record<Category, number> = {
  "compile-error": 0,
  "link-missing-dependency": 1,
  "link-undefined-reference": 2,
  "license-match": 3,
  other: 4,
};

/** Singular/plural nouns used in human summaries */
export const CATEGORY_LABELS: Record<Category, [string, string]> = {
  "compile-error": ["compile error", "compile errors"],
  "link-missing-dependency": ["missing-library error", "missing-library errors"],
  "link-undefined-reference": ["undefined-reference error", "undefined-reference errors"],
  "license-match": ["license match", "license matches"],
  other: ["other indicator", "other indicators"],
};

/** Rough chars-per-token ratio used wherever a backend does not report usage */
export const CHARS_PER_TOKEN = 3.5;

export const DEFAULT_CONTEXT_LINES = 5;
export const DEFAULT_PROMPT_MAX_CHARS = 12_000;
export const DEFAULT_MAX_FINDINGS = 3;

/** Scanner notes beyond this are cut before budgeting */
export const MAX_EXTERNAL_CONTEXT_CHARS = 2_000;

/** Lines scanned for a build-info header */
export const BUILD_INFO_SCAN_LINES = 40;

export const MAX_SNIPPET_CHARS = 200;

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}
