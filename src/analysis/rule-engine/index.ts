import type {
  Artifact,
  BuildInfo,
  DetectionRule,
  EvidenceWindow,
  Indicator,
  PatternRule,
  ReferenceRule,
} from "@/analysis/types";
import { BUILD_INFO_SCAN_LINES, DEFAULT_CONTEXT_LINES } from "@/lib/constants";
import { buildWindows } from "./windows";
import { escapeRegExp, splitLines, stripAnsi } from "./utils";

export { buildWindows, renderWindow } from "./windows";
export { buildLogRules } from "./rules/build-errors";
export { licenseNoticeRules } from "./rules/license-notices";

export interface ExtractorOptions {
  contextLines?: number;
}

export interface ExtractorResult {
  indicators: Indicator[];
  windows: EvidenceWindow[];
}

/**
 * Ingest raw text once: escape sequences stripped, line endings normalised.
 * The returned artifact is frozen for the rest of the run.
 */
export function ingestArtifact(id: string, rawText: string): Artifact {
  const text = stripAnsi(rawText);
  const lines = splitLines(text);
  return Object.freeze({ id, text, lines: Object.freeze(lines) });
}

/**
 * Compile configuration strings ("error", "undefined reference") into
 * case-insensitive pattern rules. A string that is not a valid regular
 * expression is matched literally.
 */
export function patternRulesFromStrings(patterns: string[], hint?: string): PatternRule[] {
  return patterns
    .map((p) => p.trim())
    .filter((p) => p.length > 0)
    .map((source): PatternRule => {
      let regex: RegExp;
      try {
        regex = new RegExp(source, "i");
      } catch {
        regex = new RegExp(escapeRegExp(source), "i");
      }
      return { kind: "pattern", id: `config:${source}`, regex, ...(hint ? { hint } : {}) };
    });
}

function matchesPattern(rule: PatternRule, line: string): boolean {
  rule.regex.lastIndex = 0;
  if (!rule.regex.test(line)) return false;
  if (!rule.also) return true;
  rule.also.lastIndex = 0;
  return rule.also.test(line);
}

/**
 * Find indicator lines. Reference rules are applied first, so a scanner
 * reference wins over a pattern on the same line; after that the first
 * matching pattern rule wins. One indicator per line, ordered by line.
 */
export function findIndicators(artifact: Artifact, rules: DetectionRule[]): Indicator[] {
  const byLine = new Map<number, Indicator>();
  const references = rules.filter((r): r is ReferenceRule => r.kind === "reference");
  const patterns = rules.filter((r): r is PatternRule => r.kind === "pattern");

  for (const ref of references) {
    if (!Number.isInteger(ref.line) || ref.line < 1 || ref.line > artifact.lines.length) continue;
    if (byLine.has(ref.line)) continue;
    byLine.set(ref.line, {
      line: ref.line,
      text: artifact.lines[ref.line - 1],
      ruleId: ref.id,
      hint: ref.hint ?? null,
    });
  }

  artifact.lines.forEach((text, index) => {
    const line = index + 1;
    if (byLine.has(line)) return;

    for (const rule of patterns) {
      try {
        if (matchesPattern(rule, text)) {
          byLine.set(line, { line, text, ruleId: rule.id, hint: rule.hint ?? null });
          break;
        }
      } catch (error) {
        console.error(
          `[Extractor] Rule ${rule.id} failed on line ${line}:`,
          error instanceof Error ? error.message : error
        );
      }
    }
  });

  return [...byLine.values()].sort((a, b) => a.line - b.line);
}

export function runExtractor(
  artifact: Artifact,
  rules: DetectionRule[],
  options: ExtractorOptions = {}
): ExtractorResult {
  const indicators = findIndicators(artifact, rules);
  const windows = buildWindows(artifact, indicators, options.contextLines ?? DEFAULT_CONTEXT_LINES);
  return { indicators, windows };
}

const BUILD_INFO_KEYS: Record<string, keyof BuildInfo> = {
  component: "component",
  "build id": "buildId",
  build_id: "buildId",
  compiler: "compiler",
  branch: "branch",
  runner: "runner",
};

const BUILD_INFO_REGEX = /^\s*(component|build[ _]id|compiler|branch|runner)\s*[:=]\s*(.+?)\s*$/i;

/**
 * Read the `key: value` header CI runners print at the top of a log.
 * First occurrence of each key wins.
 */
export function extractBuildInfo(artifact: Artifact): BuildInfo {
  const info: BuildInfo = {};
  for (const line of artifact.lines.slice(0, BUILD_INFO_SCAN_LINES)) {
    const match = line.match(BUILD_INFO_REGEX);
    if (!match) continue;
    const key = BUILD_INFO_KEYS[match[1].toLowerCase()];
    if (key && info[key] === undefined) info[key] = match[2];
  }
  return info;
}
