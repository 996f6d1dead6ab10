import type { Artifact, DetectionRule, PatternRule, TaskKind } from "./types";
import {
  buildLogRules,
  licenseNoticeRules,
  patternRulesFromStrings,
} from "./rule-engine";
import { parseScannerReport } from "./rule-engine/scanner-report";

/** Lines the pull-request artifact renderer flags for review */
export const PR_RISK_PREFIX = "risk:";

const PR_RISK_RULE: PatternRule = {
  kind: "pattern",
  id: "pr-risk",
  regex: /^risk:\s+\S/i,
  hint: "pr-risk",
};

export interface TaskRuleInput {
  task: TaskKind;
  artifact: Artifact;
  /** Extra patterns from configuration, matched after the built-ins */
  configured: string[];
  scannerReport?: string;
  sourceName?: string;
}

/**
 * Detection rules for a task. Scanner references come first so they win
 * over pattern matches on the same line.
 */
export function rulesForTask(input: TaskRuleInput): DetectionRule[] {
  const extra = patternRulesFromStrings(input.configured);

  switch (input.task) {
    case "build-log":
      return [...buildLogRules(), ...extra];
    case "license-scan": {
      const references = input.scannerReport
        ? parseScannerReport(input.scannerReport, input.sourceName ?? input.artifact.id, input.artifact.lines.length)
        : [];
      return [...references, ...licenseNoticeRules(), ...extra];
    }
    case "pull-request":
      return [PR_RISK_RULE, ...extra];
  }
}
