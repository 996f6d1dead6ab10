import type {
  Category,
  CategoryCounts,
  CategorizedWindow,
  FallbackReason,
  Finding,
} from "./types";
import { CATEGORY_LABELS, MAX_SNIPPET_CHARS } from "@/lib/constants";
import { categorizeIndicator, compareCategorizedWindows, describeCounts } from "./rule-engine/categorizer";

const NEXT_ACTIONS: Record<Category, string> = {
  "compile-error": "Open the cited source location and fix the reported diagnostic.",
  "link-missing-dependency": "Install the missing library or add its path to the linker search paths.",
  "link-undefined-reference": "Check that the object or library defining the symbol is linked, and in the right order.",
  "license-match": "Review the cited lines against the third-party license and add attribution or remove the code.",
  other: "Inspect the cited lines.",
};

export const FALLBACK_REASON_TEXT: Record<FallbackReason, string> = {
  "ai-disabled": "AI analysis is disabled",
  "budget-exceeded": "the AI cost budget for this period is exhausted",
  "backend-unavailable": "the model backend was unavailable",
  "schema-error": "the model response could not be parsed",
  "prompt-budget": "the prompt budget is too small for the instructions",
  "extraction-empty": "no indicators were found",
};

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * One finding per top-priority window, citing the first indicator line of
 * the window's own category verbatim (cut to MAX_SNIPPET_CHARS). Always low confidence.
 */
export function buildFallbackFindings(windows: CategorizedWindow[], maxFindings: number): Finding[] {
  return [...windows]
    .sort(compareCategorizedWindows)
    .slice(0, Math.max(0, maxFindings))
    .flatMap((window): Finding[] => {
      const indicator =
        window.indicators.find((i) => categorizeIndicator(i) === window.category) ?? window.indicators[0];
      if (!indicator) return [];
      const snippet = indicator.text.trim().slice(0, MAX_SNIPPET_CHARS);
      return [
        {
          cause: `${capitalize(CATEGORY_LABELS[window.category][0])} at line ${indicator.line}`,
          citations: snippet.length > 0 ? [{ line: indicator.line, snippet }] : [],
          confidence: "low",
          nextAction: NEXT_ACTIONS[window.category],
          ...(snippet.length > 0 ? {} : { missingData: "The indicator line is blank." }),
        },
      ];
    });
}

export function buildFallbackSummary(counts: CategoryCounts, reason: FallbackReason): string[] {
  if (reason === "extraction-empty") return ["No issues detected."];
  return [
    `${capitalize(describeCounts(counts))}.`,
    `Deterministic extraction only: ${FALLBACK_REASON_TEXT[reason]}.`,
  ];
}
