import type {
  Category,
  CategoryCounts,
  CategorizedWindow,
  EvidenceWindow,
  Indicator,
} from "@/analysis/types";
import { CATEGORY_INDEX, CATEGORY_LABELS, CATEGORY_ORDER } from "@/lib/constants";

type CategoryPredicate = (indicator: Indicator) => boolean;

interface CategoryRule {
  id: string;
  test: CategoryPredicate;
  category: Category;
}

const hintIs =
  (...hints: string[]): CategoryPredicate =>
  (indicator) =>
    indicator.hint !== null && hints.includes(indicator.hint);

const textMatches =
  (regex: RegExp): CategoryPredicate =>
  (indicator) =>
    regex.test(indicator.text);

const either =
  (...predicates: CategoryPredicate[]): CategoryPredicate =>
  (indicator) =>
    predicates.some((p) => p(indicator));

/**
 * Ordered category table. First match wins, so the linker checks sit above
 * the generic `error:` check ("ld: error: undefined symbol: foo").
 */
export const CATEGORY_RULES: CategoryRule[] = [
  { id: "license", test: hintIs("license-match"), category: "license-match" },
  {
    id: "link-missing",
    test: either(
      hintIs("link-missing"),
      textMatches(/\b(?:ld:\s+)?cannot find\s+-l\S+|\blibrary not found for\s+-l\S+|\bld:\s+cannot find\b/i)
    ),
    category: "link-missing-dependency",
  },
  {
    id: "link-undefined",
    test: either(hintIs("link-undefined"), textMatches(/\bundefined (?:reference|symbol)\b/i)),
    category: "link-undefined-reference",
  },
  // Driver summaries ("collect2: error: ld returned 1 exit status") restate a link failure
  {
    id: "link-summary",
    test: textMatches(/\bld returned \d+ exit status\b|\blinker command failed\b/i),
    category: "other",
  },
  { id: "configuration", test: hintIs("configuration"), category: "other" },
  {
    id: "compile",
    test: either(
      hintIs("compile"),
      textMatches(/\berror:|\bfatal error\b|^\s*\d+\s+errors?\s+generated\b/i)
    ),
    category: "compile-error",
  },
];

export function categorizeIndicator(indicator: Indicator): Category {
  for (const rule of CATEGORY_RULES) {
    if (rule.test(indicator)) return rule.category;
  }
  return "other";
}

export function emptyCategoryCounts(): CategoryCounts {
  return {
    "compile-error": 0,
    "link-missing-dependency": 0,
    "link-undefined-reference": 0,
    "license-match": 0,
    other: 0,
  };
}

export function compareCategorizedWindows(a: CategorizedWindow, b: CategorizedWindow): number {
  return CATEGORY_INDEX[a.category] - CATEGORY_INDEX[b.category] || a.startLine - b.startLine;
}

export interface CategorizerResult {
  windows: CategorizedWindow[];
  /** Per-indicator counts; a merged window with two errors counts twice */
  counts: CategoryCounts;
}

/**
 * Label each window with the union of its indicators' categories. The
 * window's `category` is the highest-priority one. Output keeps input order.
 */
export function categorizeWindows(windows: EvidenceWindow[]): CategorizerResult {
  const counts = emptyCategoryCounts();

  const categorized = windows.map((window): CategorizedWindow => {
    const seen = new Set<Category>();
    for (const indicator of window.indicators) {
      const category = categorizeIndicator(indicator);
      counts[category]++;
      seen.add(category);
    }
    const categories = CATEGORY_ORDER.filter((c) => seen.has(c));
    return { ...window, category: categories[0] ?? "other", categories };
  });

  return { windows: categorized, counts };
}

/** "3 compile errors, 2 missing-library errors" */
export function describeCounts(counts: CategoryCounts): string {
  const parts = CATEGORY_ORDER.filter((c) => counts[c] > 0).map((c) => {
    const [singular, plural] = CATEGORY_LABELS[c];
    return `${counts[c]} ${counts[c] === 1 ? singular : plural}`;
  });
  return parts.length > 0 ? parts.join(", ") : "no issues detected";
}
