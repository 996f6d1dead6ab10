import { randomUUID } from "crypto";
import { appendFile, mkdir, readFile } from "fs/promises";
import { dirname } from "path";
import { z } from "zod/v4";
import type { UsageRecord } from "@/analysis/types";

export type UsagePeriod = "daily" | "weekly" | "monthly" | "all";

const PERIOD_DAYS: Record<Exclude<UsagePeriod, "all">, number> = {
  daily: 1,
  weekly: 7,
  monthly: 30,
};

const DAY_MS = 24 * 60 * 60 * 1000;

const usageRecordSchema = z.object({
  id: z.string().min(1),
  timestamp: z.string(),
  runId: z.string().optional(),
  operation: z.string(),
  backend: z.string(),
  model: z.string(),
  inputTokens: z.number().nonnegative(),
  outputTokens: z.number().nonnegative(),
  cost: z.number().nonnegative(),
  outcome: z.enum(["success", "failed"]),
  latencyMs: z.number().nonnegative(),
});

/**
 * Append-only persistence for usage records. Implementations need not be
 * safe for concurrent appends; CostLedger serialises writes.
 */
export interface UsageStore {
  append(record: UsageRecord): Promise<void>;
  readAll(): Promise<UsageRecord[]>;
}

/** One JSON object per line. A torn or invalid line is skipped on read. */
export class JsonlUsageStore implements UsageStore {
  constructor(private readonly filePath: string) {}

  async append(record: UsageRecord): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await appendFile(this.filePath, JSON.stringify(record) + "\n", "utf-8");
  }

  async readAll(): Promise<UsageRecord[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") return [];
      throw error;
    }

    const records: UsageRecord[] = [];
    for (const line of raw.split("\n")) {
      if (line.trim().length === 0) continue;
      let json: unknown;
      try {
        json = JSON.parse(line);
      } catch {
        continue;
      }
      const parsed = usageRecordSchema.safeParse(json);
      if (parsed.success) records.push(parsed.data);
    }
    return records;
  }
}

export class MemoryUsageStore implements UsageStore {
  readonly records: UsageRecord[] = [];

  async append(record: UsageRecord): Promise<void> {
    this.records.push({ ...record });
  }

  async readAll(): Promise<UsageRecord[]> {
    return this.records.map((r) => ({ ...r }));
  }
}

export interface UsageBucket {
  count: number;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  cost: number;
}

export interface UsageAggregate {
  period: UsagePeriod;
  /** ISO start of the window, null for "all" */
  since: string | null;
  totals: UsageBucket;
  byOperation: Record<string, UsageBucket>;
  byModel: Record<string, UsageBucket>;
}

export interface UsageInput {
  operation: string;
  backend: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  cost: number;
  runId?: string;
  outcome?: UsageRecord["outcome"];
  latencyMs?: number;
}

export interface BudgetStatus {
  exceeded: boolean;
  spent: number;
  ceiling: number | null;
  period: Exclude<UsagePeriod, "all">;
}

export interface CostLedgerOptions {
  now?: () => Date;
  idFactory?: () => string;
  budget?: { ceilingUsd?: number; period: Exclude<UsagePeriod, "all"> };
}

function emptyBucket(): UsageBucket {
  return { count: 0, inputTokens: 0, outputTokens: 0, totalTokens: 0, cost: 0 };
}

function addTo(bucket: UsageBucket, record: UsageRecord): void {
  bucket.count++;
  bucket.inputTokens += record.inputTokens;
  bucket.outputTokens += record.outputTokens;
  bucket.totalTokens += record.inputTokens + record.outputTokens;
  bucket.cost += record.cost;
}

/** Float sums of prices drift (0.01 + 0.02); report to the micro-dollar */
function roundCost(value: number): number {
  return Math.round(value * 1_000_000) / 1_000_000;
}

function roundBucket(bucket: UsageBucket): UsageBucket {
  return { ...bucket, cost: roundCost(bucket.cost) };
}

/**
 * The one piece of shared mutable state across runs. Appends go through a
 * single promise chain, so concurrent `record` calls land one at a time and
 * in call order. Aggregates dedupe by record id.
 */
export class CostLedger {
  private queue: Promise<void> = Promise.resolve();
  private readonly now: () => Date;
  private readonly idFactory: () => string;
  private readonly budget: CostLedgerOptions["budget"];

  constructor(
    private readonly store: UsageStore,
    options: CostLedgerOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? randomUUID;
    this.budget = options.budget;
  }

  record(input: UsageInput): Promise<UsageRecord> {
    const record: UsageRecord = {
      id: this.idFactory(),
      timestamp: this.now().toISOString(),
      ...(input.runId ? { runId: input.runId } : {}),
      operation: input.operation,
      backend: input.backend,
      model: input.model,
      inputTokens: Math.max(0, Math.round(input.inputTokens)),
      outputTokens: Math.max(0, Math.round(input.outputTokens)),
      cost: Math.max(0, input.cost),
      outcome: input.outcome ?? "success",
      latencyMs: Math.max(0, Math.round(input.latencyMs ?? 0)),
    };

    const write = this.queue.then(() => this.store.append(record));
    this.queue = write.catch((error: unknown) => {
      console.error(
        `[Ledger] Failed to append usage record ${record.id}:`,
        error instanceof Error ? error.message : error
      );
    });
    return write.then(() => record);
  }

  /** Resolves once every record queued so far has been written or has failed. */
  flush(): Promise<void> {
    return this.queue;
  }

  async aggregate(period: UsagePeriod): Promise<UsageAggregate> {
    await this.queue;
    const records = await this.store.readAll();

    const now = this.now().getTime();
    const sinceMs = period === "all" ? null : now - PERIOD_DAYS[period] * DAY_MS;

    const totals = emptyBucket();
    const byOperation: Record<string, UsageBucket> = {};
    const byModel: Record<string, UsageBucket> = {};
    const seen = new Set<string>();

    for (const record of records) {
      if (seen.has(record.id)) continue;
      seen.add(record.id);

      const ts = Date.parse(record.timestamp);
      if (Number.isNaN(ts)) continue;
      if (sinceMs !== null && (ts < sinceMs || ts > now)) continue;

      addTo(totals, record);
      addTo((byOperation[record.operation] ??= emptyBucket()), record);
      addTo((byModel[`${record.backend}/${record.model}`] ??= emptyBucket()), record);
    }

    const round = (groups: Record<string, UsageBucket>) =>
      Object.fromEntries(Object.entries(groups).map(([k, v]) => [k, roundBucket(v)]));

    return {
      period,
      since: sinceMs === null ? null : new Date(sinceMs).toISOString(),
      totals: roundBucket(totals),
      byOperation: round(byOperation),
      byModel: round(byModel),
    };
  }

  /** True when spend in the budget period is strictly above the ceiling. */
  async checkBudget(): Promise<BudgetStatus> {
    const period = this.budget?.period ?? "monthly";
    const ceiling = this.budget?.ceilingUsd ?? null;
    if (ceiling === null) return { exceeded: false, spent: 0, ceiling, period };

    const { totals } = await this.aggregate(period);
    return { exceeded: totals.cost > ceiling, spent: totals.cost, ceiling, period };
  }
}

function formatBucket(bucket: UsageBucket, total: number): string {
  const share = total > 0 ? ((bucket.cost / total) * 100).toFixed(1) : "0.0";
  return `${bucket.count} call(s), ${bucket.totalTokens.toLocaleString("en-US")} tokens, $${bucket.cost.toFixed(4)} (${share}%)`;
}

export function formatCostReport(aggregate: UsageAggregate): string {
  const { totals } = aggregate;
  const lines = [
    `Usage report (${aggregate.period}${aggregate.since ? ` since ${aggregate.since}` : ""})`,
    `Total: ${totals.count} call(s), ${totals.totalTokens.toLocaleString("en-US")} tokens, $${totals.cost.toFixed(4)}`,
  ];

  const section = (title: string, groups: Record<string, UsageBucket>) => {
    const entries = Object.entries(groups).sort((a, b) => b[1].cost - a[1].cost || a[0].localeCompare(b[0]));
    if (entries.length === 0) return;
    lines.push("", `${title}:`);
    for (const [name, bucket] of entries) {
      lines.push(`  ${name}: ${formatBucket(bucket, totals.cost)}`);
    }
  };

  section("By operation", aggregate.byOperation);
  section("By model", aggregate.byModel);
  return lines.join("\n");
}
