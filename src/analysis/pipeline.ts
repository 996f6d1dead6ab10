import { randomUUID } from "crypto";
import type {
  Artifact,
  BuildInfo,
  CategoryCounts,
  CategorizedWindow,
  FallbackReason,
  Finding,
  ModelResponse,
  PromptBudget,
  Report,
  RunMeta,
  TaskKind,
} from "./types";
import { extractBuildInfo, ingestArtifact, runExtractor } from "./rule-engine";
import { categorizeWindows, describeCounts } from "./rule-engine/categorizer";
import { assemblePrompt, type AssembledPrompt } from "./llm/prompt";
import type { ModelInvoker } from "./llm/invoker";
import { parseModelOutput, type ParsedModelOutput } from "./llm/parser";
import { requiresReview, validateFindings } from "./llm/validator";
import { buildFallbackFindings, buildFallbackSummary } from "./fallback";
import { rulesForTask } from "./tasks";
import type { CostLedger } from "@/lib/cost-ledger";
import type { RunArchive } from "@/lib/archive";
import { computeCost, type PricingTable } from "@/lib/pricing";
import { BackendUnavailableError, PromptBudgetError, SchemaError, errorMessage } from "@/lib/errors";
import { CHARS_PER_TOKEN } from "@/lib/constants";

/**
 * Evidence-gated analysis pipeline.
 *
 * Stages run strictly in order: extract, categorize, assemble, invoke,
 * validate, then ledger, archive and return. Every run ends in a Report:
 * backend failures, unparseable output, an exhausted cost budget and an
 * over-tight prompt budget all divert to the deterministic fallback, which
 * is built from the extractor output alone and marked as not AI-assisted.
 *
 * The model call is bounded by a run deadline. Usage is written to the cost
 * ledger for every model call, including failed ones (zero tokens), before
 * the response is validated.
 */

export interface AnalysisRequest {
  task: TaskKind;
  artifactId: string;
  text: string;
  /** license-scan: scanner report supplying line references and notes */
  scannerReport?: string;
  /** license-scan: file name as it appears in the scanner report */
  sourceName?: string;
  externalContext?: string;
  runId?: string;
}

export interface AnalysisOutcome {
  report: Report;
  meta: RunMeta;
  prompt?: { system: string; user: string };
}

export interface PipelineSettings {
  aiEnabled: boolean;
  detectionRules: string[];
  contextLines: number;
  budget: PromptBudget;
  maxFindings: number;
  runDeadlineMs: number;
}

export interface PipelineDeps {
  /** Null when no backend is configured; treated as AI disabled */
  invoker: ModelInvoker | null;
  ledger: CostLedger;
  pricing: PricingTable;
  archive?: RunArchive | null;
  settings: PipelineSettings;
  now?: () => Date;
  idFactory?: () => string;
}

interface RunState {
  runId: string;
  startedAt: number;
  createdAt: string;
  request: AnalysisRequest;
  artifact: Artifact;
  indicatorCount: number;
  windows: CategorizedWindow[];
  counts: CategoryCounts;
  buildInfo: BuildInfo;
  warnings: string[];
  prompt?: AssembledPrompt;
  response?: ModelResponse;
}

export class AnalysisPipeline {
  private readonly now: () => Date;
  private readonly idFactory: () => string;

  constructor(private readonly deps: PipelineDeps) {
    this.now = deps.now ?? (() => new Date());
    this.idFactory = deps.idFactory ?? randomUUID;
  }

  async run(request: AnalysisRequest): Promise<AnalysisOutcome> {
    const { settings } = this.deps;
    const startedAt = this.now();
    const runId = request.runId ?? this.idFactory();

    // Deadline covers the whole run, not just the model call
    const deadline = new AbortController();
    const timer = setTimeout(() => deadline.abort(), settings.runDeadlineMs);
    if (timer.unref) timer.unref();

    try {
      // 1. Extract
      const artifact = ingestArtifact(request.artifactId, request.text);
      const rules = rulesForTask({
        task: request.task,
        artifact,
        configured: settings.detectionRules,
        scannerReport: request.scannerReport,
        sourceName: request.sourceName,
      });
      const extraction = runExtractor(artifact, rules, { contextLines: settings.contextLines });

      // 2. Categorize
      const { windows, counts } = categorizeWindows(extraction.windows);

      const state: RunState = {
        runId,
        startedAt: startedAt.getTime(),
        createdAt: startedAt.toISOString(),
        request,
        artifact,
        indicatorCount: extraction.indicators.length,
        windows,
        counts,
        buildInfo: request.task === "build-log" ? extractBuildInfo(artifact) : {},
        warnings: [],
      };

      console.log(
        `[Pipeline] Run ${runId} (${request.task}, ${request.artifactId}): ${artifact.lines.length} lines, ${extraction.indicators.length} indicators, ${windows.length} windows`
      );

      if (extraction.indicators.length === 0) {
        return await this.finish(state, this.fallback(state, "extraction-empty"));
      }

      const invoker = this.deps.invoker;
      if (!settings.aiEnabled || !invoker) {
        return await this.finish(state, this.fallback(state, "ai-disabled"));
      }

      const budget = await this.checkBudget();
      if (budget) {
        state.warnings.push(budget);
        return await this.finish(state, this.fallback(state, "budget-exceeded"));
      }

      // 3. Assemble
      let prompt: AssembledPrompt;
      try {
        prompt = assemblePrompt({
          task: request.task,
          windows,
          externalContext: request.externalContext ?? request.scannerReport,
          buildInfo: state.buildInfo,
          budget: settings.budget,
        });
      } catch (error) {
        if (!(error instanceof PromptBudgetError)) throw error;
        console.warn(`[Pipeline] Run ${runId}: ${error.message}`);
        state.warnings.push(error.message);
        return await this.finish(state, this.fallback(state, "prompt-budget"));
      }
      state.prompt = prompt;

      // 4. Invoke
      let response: ModelResponse;
      try {
        response = await invoker.invoke({
          system: prompt.system,
          prompt: prompt.prompt,
          signal: deadline.signal,
        });
      } catch (error) {
        if (!(error instanceof BackendUnavailableError)) throw error;
        console.warn(`[Pipeline] Run ${runId}: backend unavailable (${error.reason}): ${error.message}`);
        await this.recordUsage(state, {
          backend: invoker.backendName,
          model: invoker.model,
          inputTokens: 0,
          outputTokens: 0,
          outcome: "failed",
          latencyMs: this.now().getTime() - state.startedAt,
        });
        state.warnings.push(`Model backend unavailable (${error.reason}) after ${error.attempts} attempt(s)`);
        return await this.finish(state, this.fallback(state, "backend-unavailable"));
      }
      state.response = response;

      await this.recordUsage(state, {
        backend: response.backend,
        model: response.model,
        inputTokens: response.usage.inputTokens,
        outputTokens: response.usage.outputTokens,
        outcome: "success",
        latencyMs: response.latencyMs,
      });

      // 5. Validate
      let parsed: ParsedModelOutput;
      try {
        parsed = parseModelOutput(response.text);
      } catch (error) {
        if (!(error instanceof SchemaError)) throw error;
        console.warn(`[Pipeline] Run ${runId}: ${error.message}`, error.issues.slice(0, 5));
        state.warnings.push("Model output did not match the required schema");
        return await this.finish(state, this.fallback(state, "schema-error"));
      }

      const { findings, rejectedCitations } = validateFindings(parsed.rootCauses, artifact, {
        maxFindings: settings.maxFindings,
        shownRanges: prompt.includedWindows,
      });

      const report: Report = {
        ...this.baseReport(state),
        aiAssisted: true,
        path: "AI_PATH",
        summary: parsed.summary.length > 0 ? parsed.summary : [`${describeCounts(counts)}.`],
        findings,
        droppedWindows: prompt.droppedWindows,
        truncatedWindows: prompt.truncatedWindows,
        rejectedCitations,
        reviewRequired: requiresReview(findings, rejectedCitations, parsed.reviewRequired),
        ...(request.task === "license-scan" ? this.licenseAddenda(state, parsed, findings) : {}),
        backend: response.backend,
        model: response.model,
      };
      return await this.finish(state, report);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * NOTICE and LICENSE addenda are kept only when some finding cites
   * verified evidence; otherwise their provenance is unproven.
   */
  private licenseAddenda(
    state: RunState,
    parsed: ParsedModelOutput,
    findings: Finding[]
  ): Pick<Report, "noticeAdditions" | "licenseAdditions"> {
    const drafted = parsed.noticeAdditions.length + parsed.licenseAdditions.length;
    if (drafted > 0 && !findings.some((f) => f.citations.length > 0)) {
      console.warn(`[Pipeline] Run ${state.runId}: dropped ${drafted} addition(s) with no verified evidence`);
      state.warnings.push("Notice and license additions dropped: no finding cites verified evidence");
      return { noticeAdditions: [], licenseAdditions: [] };
    }
    return { noticeAdditions: parsed.noticeAdditions, licenseAdditions: parsed.licenseAdditions };
  }

  /** Returns a warning when the cost ceiling is exceeded, else null. */
  private async checkBudget(): Promise<string | null> {
    try {
      const status = await this.deps.ledger.checkBudget();
      if (!status.exceeded || status.ceiling === null) return null;
      console.warn(`[Pipeline] Cost budget exceeded: $${status.spent} of $${status.ceiling} (${status.period})`);
      return `Cost budget exceeded: $${status.spent.toFixed(4)} spent of $${status.ceiling.toFixed(2)} this ${status.period} period; AI analysis skipped`;
    } catch (error) {
      console.error("[Pipeline] Could not read cost ledger for budget check:", errorMessage(error));
      return null;
    }
  }

  private async recordUsage(
    state: RunState,
    usage: {
      backend: string;
      model: string;
      inputTokens: number;
      outputTokens: number;
      outcome: "success" | "failed";
      latencyMs: number;
    }
  ): Promise<void> {
    try {
      await this.deps.ledger.record({
        operation: state.request.task,
        runId: state.runId,
        cost: computeCost(this.deps.pricing, usage.model, usage.inputTokens, usage.outputTokens),
        ...usage,
      });
    } catch (error) {
      console.error(`[Pipeline] Run ${state.runId}: usage not recorded:`, errorMessage(error));
      state.warnings.push("Usage could not be recorded in the cost ledger");
    }
  }

  private baseReport(state: RunState): Omit<Report, "aiAssisted" | "path" | "summary" | "findings" | "droppedWindows" | "truncatedWindows" | "rejectedCitations" | "reviewRequired"> {
    return {
      runId: state.runId,
      artifactId: state.artifact.id,
      task: state.request.task,
      createdAt: state.createdAt,
      status: state.indicatorCount > 0 ? "issues-found" : "no-issues",
      categoryCounts: state.counts,
      warnings: state.warnings,
    };
  }

  private fallback(state: RunState, reason: FallbackReason): Report {
    const findings: Finding[] = buildFallbackFindings(state.windows, this.deps.settings.maxFindings);
    return {
      ...this.baseReport(state),
      aiAssisted: false,
      path: "DETERMINISTIC_FALLBACK",
      fallbackReason: reason,
      summary: buildFallbackSummary(state.counts, reason),
      findings,
      // Windows not surfaced as findings
      droppedWindows: Math.max(0, state.windows.length - findings.length),
      truncatedWindows: 0,
      rejectedCitations: 0,
      reviewRequired: requiresReview(findings, 0),
    };
  }

  private async finish(state: RunState, report: Report): Promise<AnalysisOutcome> {
    const promptChars = state.prompt ? state.prompt.system.length + state.prompt.prompt.length : 0;
    const savedChars = state.prompt ? Math.max(0, state.artifact.text.length - promptChars) : 0;
    const response = state.response;

    const meta: RunMeta = {
      runId: state.runId,
      artifactId: state.artifact.id,
      task: state.request.task,
      createdAt: state.createdAt,
      path: report.path,
      aiAssisted: report.aiAssisted,
      ...(report.fallbackReason ? { fallbackReason: report.fallbackReason } : {}),
      ...(response ? { backend: response.backend, model: response.model } : {}),
      artifactChars: state.artifact.text.length,
      artifactLines: state.artifact.lines.length,
      promptChars,
      savedChars,
      estimatedTokenSavings: Math.floor(savedChars / CHARS_PER_TOKEN),
      indicatorCount: state.indicatorCount,
      windowCount: state.windows.length,
      includedWindows: state.prompt?.includedWindows.length ?? 0,
      droppedWindows: report.droppedWindows,
      truncatedWindows: report.truncatedWindows,
      categoryCounts: state.counts,
      buildInfo: state.buildInfo,
      ...(response
        ? { usage: response.usage, latencyMs: response.latencyMs, attempts: response.attempts }
        : {}),
      durationMs: this.now().getTime() - state.startedAt,
    };

    const prompt = state.prompt ? { system: state.prompt.system, user: state.prompt.prompt } : undefined;

    if (this.deps.archive) {
      try {
        await this.deps.archive.save({ report, meta, ...(prompt ? { prompt } : {}) });
      } catch (error) {
        console.error(`[Pipeline] Run ${state.runId}: archive failed:`, errorMessage(error));
      }
    }

    console.log(
      `[Pipeline] Run ${state.runId} finished on ${report.path}${report.fallbackReason ? ` (${report.fallbackReason})` : ""}: ${report.findings.length} finding(s), ${report.droppedWindows} dropped, ${report.rejectedCitations} rejected`
    );

    return { report, meta, ...(prompt ? { prompt } : {}) };
  }
}
