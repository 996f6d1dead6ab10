import { AnalysisPipeline } from "@/analysis/pipeline";
import { createModelBackend } from "@/analysis/llm/client";
import { ModelInvoker } from "@/analysis/llm/invoker";
import { DeliveryService, type Destination } from "@/delivery";
import { GitHubClient } from "@/delivery/github";
import { SlackClient } from "@/delivery/slack";
import { RunArchive } from "@/lib/archive";
import type { AppConfig } from "@/lib/config";
import { CostLedger, JsonlUsageStore } from "@/lib/cost-ledger";
import { createIdempotencyStore, type IdempotencyStore } from "@/lib/idempotency";
import { loadPricing } from "@/lib/pricing";
import { createStorageProvider } from "@/lib/storage";

const IDEMPOTENCY_TTL_MS = 24 * 60 * 60 * 1000;

export interface Container {
  pipeline: AnalysisPipeline;
  ledger: CostLedger;
  delivery: DeliveryService;
  github: GitHubClient | null;
  /** Destinations every event is sent to, besides a PR comment */
  destinations: Destination[];
  idempotency: IdempotencyStore;
}

/** Wire every service from a validated config. */
export function createContainer(config: AppConfig): Container {
  const backend = config.ai.enabled ? createModelBackend(config.ai) : null;
  if (config.ai.enabled && !backend) {
    console.warn(`[LLM] No credentials for backend "${config.ai.backend}"; runs will use the deterministic fallback`);
  }

  const invoker = backend
    ? new ModelInvoker(backend, {
        model: config.ai.model,
        temperature: config.ai.temperature,
        maxOutputTokens: config.ai.maxOutputTokens,
        ...config.retry,
      })
    : null;

  const ledger = new CostLedger(new JsonlUsageStore(config.cost.ledgerPath), {
    budget: { ceilingUsd: config.cost.budgetUsd, period: config.cost.budgetPeriod },
  });

  const storage = createStorageProvider(config.archive);

  const pipeline = new AnalysisPipeline({
    invoker,
    ledger,
    pricing: loadPricing(config.cost.pricingFile),
    archive: storage ? new RunArchive(storage) : null,
    settings: {
      aiEnabled: config.ai.enabled,
      detectionRules: config.extraction.detectionRules,
      contextLines: config.extraction.contextLines,
      budget: { maxChars: config.prompt.maxChars, maxTokens: config.prompt.maxTokens },
      maxFindings: config.prompt.maxFindings,
      runDeadlineMs: config.runDeadlineMs,
    },
  });

  const slack =
    config.slack.webhookUrl || config.slack.botToken
      ? new SlackClient({
          webhookUrl: config.slack.webhookUrl,
          botToken: config.slack.botToken,
          defaultChannel: config.slack.channel,
        })
      : null;

  const github = config.webhooks.githubToken
    ? new GitHubClient({ token: config.webhooks.githubToken, apiUrl: config.webhooks.githubApiUrl })
    : null;

  const idempotency = createIdempotencyStore({ ttlMs: IDEMPOTENCY_TTL_MS });
  const destinations: Destination[] = [{ kind: "console" }];
  if (slack) destinations.push({ kind: "slack" });

  return {
    pipeline,
    ledger,
    delivery: new DeliveryService({ slack, github }, idempotency),
    github,
    destinations,
    idempotency,
  };
}
