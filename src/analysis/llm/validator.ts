import type { Artifact, Citation, Confidence, Finding } from "@/analysis/types";
import { normalizeForCompare } from "../rule-engine/utils";
import type { ParsedRootCause } from "./parser";

export const UNVERIFIED_NOTE =
  "No cited evidence could be verified against the artifact; treat this cause as unconfirmed.";

const LINE_PREFIX = /^\s*\d+\s*[:|]\s*/;

export interface LineRange {
  startLine: number;
  endLine: number;
}

export interface ValidateOptions {
  maxFindings: number;
  /** Ranges shown to the model. Citations outside every range are rejected. */
  shownRanges?: LineRange[];
}

export interface ValidationResult {
  findings: Finding[];
  rejectedCitations: number;
}

function downgrade(confidence: Confidence): Confidence {
  return confidence === "high" ? "medium" : "low";
}

function inRanges(line: number, ranges: LineRange[] | undefined): boolean {
  if (!ranges) return true;
  return ranges.some((r) => line >= r.startLine && line <= r.endLine);
}

/**
 * Check one citation against the artifact. Returns the snippet form that
 * matched, or null. A leading "12:" or "12 |" line-number prefix copied from
 * the prompt is tolerated.
 */
export function verifyCitation(
  artifact: Artifact,
  citation: Citation,
  shownRanges?: LineRange[]
): Citation | null {
  const { line } = citation;
  if (!Number.isInteger(line) || line < 1 || line > artifact.lines.length) return null;
  if (!inRanges(line, shownRanges)) return null;

  const haystack = normalizeForCompare(artifact.lines[line - 1]);
  const candidates = [citation.snippet, citation.snippet.replace(LINE_PREFIX, "")];

  for (const candidate of candidates) {
    const needle = normalizeForCompare(candidate);
    if (needle.length > 0 && haystack.includes(needle)) {
      return { line, snippet: candidate.trim() };
    }
  }
  return null;
}

/**
 * Gate model findings on their evidence. Failed citations are stripped; a
 * finding that lost some citations drops one confidence step, and one left
 * with none is forced to low with a missing-data note. The first
 * `maxFindings` findings are kept in model order.
 */
export function validateFindings(
  rootCauses: ParsedRootCause[],
  artifact: Artifact,
  options: ValidateOptions
): ValidationResult {
  let rejectedCitations = 0;

  const findings = rootCauses.map((rc): Finding => {
    const verified: Citation[] = [];
    const seen = new Set<string>();
    let stripped = rc.malformedCitations;

    for (const citation of rc.evidence) {
      const ok = verifyCitation(artifact, citation, options.shownRanges);
      if (!ok) {
        stripped++;
        continue;
      }
      const key = `${ok.line}:${normalizeForCompare(ok.snippet)}`;
      if (seen.has(key)) continue;
      seen.add(key);
      verified.push(ok);
    }

    rejectedCitations += stripped;

    if (verified.length === 0) {
      return {
        cause: rc.cause,
        citations: [],
        confidence: "low",
        nextAction: rc.nextAction,
        missingData: rc.missingData || UNVERIFIED_NOTE,
      };
    }

    return {
      cause: rc.cause,
      citations: verified,
      confidence: stripped > 0 ? downgrade(rc.confidence) : rc.confidence,
      nextAction: rc.nextAction,
      ...(rc.missingData ? { missingData: rc.missingData } : {}),
    };
  });

  if (rejectedCitations > 0) {
    console.warn(`[Validator] Rejected ${rejectedCitations} citation(s) not found in artifact ${artifact.id}`);
  }

  return { findings: findings.slice(0, Math.max(0, options.maxFindings)), rejectedCitations };
}

/**
 * Review is required whenever a finding is low confidence or any citation
 * was rejected, whatever the model said.
 */
export function requiresReview(findings: Finding[], rejectedCitations: number, modelFlag = false): boolean {
  return modelFlag || rejectedCitations > 0 || findings.some((f) => f.confidence === "low");
}
