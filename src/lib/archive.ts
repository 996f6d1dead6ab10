import { z } from "zod/v4";
import type { Report, RunMeta } from "@/analysis/types";
import type { StorageProvider } from "./storage";

const categoryCountsSchema = z.object({
  "compile-error": z.number().int().nonnegative(),
  "link-missing-dependency": z.number().int().nonnegative(),
  "link-undefined-reference": z.number().int().nonnegative(),
  "license-match": z.number().int().nonnegative(),
  other: z.number().int().nonnegative(),
});

const findingSchema = z.object({
  cause: z.string(),
  citations: z.array(z.object({ line: z.number().int().positive(), snippet: z.string() })),
  confidence: z.enum(["high", "medium", "low"]),
  nextAction: z.string(),
  missingData: z.string().optional(),
});

export const reportSchema = z.object({
  runId: z.string().min(1),
  artifactId: z.string(),
  task: z.enum(["build-log", "license-scan", "pull-request"]),
  createdAt: z.string(),
  aiAssisted: z.boolean(),
  path: z.enum(["AI_PATH", "DETERMINISTIC_FALLBACK"]),
  fallbackReason: z
    .enum(["ai-disabled", "budget-exceeded", "backend-unavailable", "schema-error", "prompt-budget", "extraction-empty"])
    .optional(),
  status: z.enum(["issues-found", "no-issues"]),
  summary: z.array(z.string()),
  findings: z.array(findingSchema),
  categoryCounts: categoryCountsSchema,
  droppedWindows: z.number().int().nonnegative(),
  truncatedWindows: z.number().int().nonnegative(),
  rejectedCitations: z.number().int().nonnegative(),
  reviewRequired: z.boolean(),
  noticeAdditions: z.array(z.string()).optional(),
  licenseAdditions: z.array(z.string()).optional(),
  warnings: z.array(z.string()),
  backend: z.string().optional(),
  model: z.string().optional(),
});

export function serializeReport(report: Report): string {
  return JSON.stringify(report, null, 2);
}

export function parseReport(json: string): Report {
  return reportSchema.parse(JSON.parse(json));
}

/**
 * Findings at high or medium confidence must carry at least one verified
 * citation before they are archived. Returns the offending causes.
 */
export function findUnbackedFindings(report: Report): string[] {
  return report.findings
    .filter((f) => f.confidence !== "low" && f.citations.length === 0)
    .map((f) => f.cause);
}

export interface RunBundle {
  report: Report;
  meta: RunMeta;
  /** System and user prompt as sent, absent on the fallback path */
  prompt?: { system: string; user: string };
}

const RUN_ID = /^[A-Za-z0-9._-]+$/;

/**
 * Audit archive. Each run lands under `{runId}/` as result.json, meta.json
 * and, when a model was called, prompt.txt.
 */
export class RunArchive {
  constructor(private readonly storage: StorageProvider) {}

  async save(bundle: RunBundle): Promise<string[]> {
    const { runId } = bundle.report;
    if (!RUN_ID.test(runId) || runId === "." || runId === "..") {
      throw new Error(`Refusing to archive run with unsafe id "${runId}"`);
    }

    const unbacked = findUnbackedFindings(bundle.report);
    if (unbacked.length > 0) {
      throw new Error(`Report ${runId} has ${unbacked.length} high/medium finding(s) without citations`);
    }

    const written: string[] = [];
    const put = async (name: string, data: string) => {
      const path = `${runId}/${name}`;
      await this.storage.write(path, data);
      written.push(path);
    };

    try {
      await put("result.json", serializeReport(bundle.report));
      await put("meta.json", JSON.stringify(bundle.meta, null, 2));
      if (bundle.prompt) {
        await put("prompt.txt", `### system\n${bundle.prompt.system}\n\n### user\n${bundle.prompt.user}\n`);
      }
    } catch (error) {
      await this.removeAll(written);
      throw error;
    }
    return written;
  }

  /** Partial bundles are removed so a run is archived whole or not at all. */
  private async removeAll(paths: string[]): Promise<void> {
    for (const path of paths) {
      try {
        await this.storage.delete(path);
      } catch (error) {
        console.warn(`[Archive] Failed to remove partial file ${path}:`, error);
      }
    }
  }

  async loadReport(runId: string): Promise<Report> {
    const data = await this.storage.read(`${runId}/result.json`);
    return parseReport(data.toString("utf-8"));
  }
}
