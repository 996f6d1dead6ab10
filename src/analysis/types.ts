export type Category =
  | "compile-error"
  | "link-missing-dependency"
  | "link-undefined-reference"
  | "license-match"
  | "other";

export type Confidence = "high" | "medium" | "low";

export type TaskKind = "build-log" | "license-scan" | "pull-request";

export type AnalysisPath = "AI_PATH" | "DETERMINISTIC_FALLBACK";

export type FallbackReason =
  | "ai-disabled"
  | "budget-exceeded"
  | "backend-unavailable"
  | "schema-error"
  | "prompt-budget"
  | "extraction-empty";

export interface Artifact {
  id: string;
  text: string;
  /** 1-indexed via `lines[line - 1]` */
  lines: readonly string[];
}

export interface PatternRule {
  kind: "pattern";
  id: string;
  regex: RegExp;
  /** Second pattern that must also match the same line */
  also?: RegExp;
  /** Category hint consumed by the categorizer, e.g. "license-match" */
  hint?: string;
}

export interface ReferenceRule {
  kind: "reference";
  id: string;
  line: number;
  column?: number;
  hint?: string;
}

export type DetectionRule = PatternRule | ReferenceRule;

export interface Indicator {
  line: number;
  text: string;
  ruleId: string;
  hint: string | null;
}

export interface EvidenceWindow {
  startLine: number;
  endLine: number;
  lines: string[];
  indicators: Indicator[];
}

export interface CategorizedWindow extends EvidenceWindow {
  /** Highest-priority category among the window's indicators */
  category: Category;
  categories: Category[];
}

export type CategoryCounts = Record<Category, number>;

export interface BuildInfo {
  component?: string;
  buildId?: string;
  compiler?: string;
  branch?: string;
  runner?: string;
}

export interface PromptBudget {
  maxChars?: number;
  maxTokens?: number;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface ModelResponse {
  text: string;
  backend: string;
  model: string;
  usage: TokenUsage;
  latencyMs: number;
  attempts: number;
}

export interface Citation {
  line: number;
  snippet: string;
}

export interface Finding {
  cause: string;
  citations: Citation[];
  confidence: Confidence;
  nextAction: string;
  missingData?: string;
}

export interface Report {
  runId: string;
  artifactId: string;
  task: TaskKind;
  createdAt: string;
  aiAssisted: boolean;
  path: AnalysisPath;
  fallbackReason?: FallbackReason;
  status: "issues-found" | "no-issues";
  summary: string[];
  findings: Finding[];
  categoryCounts: CategoryCounts;
  droppedWindows: number;
  truncatedWindows: number;
  rejectedCitations: number;
  /** A person must confirm the findings before anyone acts on them */
  reviewRequired: boolean;
  /** license-scan only: NOTICE and LICENSE text drafted by the model */
  noticeAdditions?: string[];
  licenseAdditions?: string[];
  warnings: string[];
  backend?: string;
  model?: string;
}

export interface UsageRecord {
  id: string;
  timestamp: string;
  runId?: string;
  operation: string;
  backend: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  cost: number;
  outcome: "success" | "failed";
  latencyMs: number;
}

/** Audit metadata archived beside each report */
export interface RunMeta {
  runId: string;
  artifactId: string;
  task: TaskKind;
  createdAt: string;
  path: AnalysisPath;
  aiAssisted: boolean;
  fallbackReason?: FallbackReason;
  backend?: string;
  model?: string;
  artifactChars: number;
  artifactLines: number;
  promptChars: number;
  /** Characters of the artifact kept out of the prompt */
  savedChars: number;
  estimatedTokenSavings: number;
  indicatorCount: number;
  windowCount: number;
  includedWindows: number;
  droppedWindows: number;
  truncatedWindows: number;
  categoryCounts: CategoryCounts;
  buildInfo: BuildInfo;
  usage?: TokenUsage;
  latencyMs?: number;
  attempts?: number;
  durationMs: number;
}
