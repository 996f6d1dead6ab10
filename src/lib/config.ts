import { z } from "zod/v4";
import { DEFAULT_MODELS, type BackendKind } from "@/analysis/llm/client";
import {
  DEFAULT_CONTEXT_LINES,
  DEFAULT_MAX_FINDINGS,
  DEFAULT_PROMPT_MAX_CHARS,
} from "./constants";
import { ConfigError } from "./errors";
import type { S3Config } from "./storage-s3";

const flag = z
  .enum(["true", "false", "1", "0", "yes", "no", "on", "off"])
  .transform((v) => v === "true" || v === "1" || v === "yes" || v === "on");

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

const ruleList = z.string().transform((raw, ctx): string[] => {
  const trimmed = raw.trim();
  if (trimmed.startsWith("[")) {
    const parsed = parseJson(trimmed);
    if (Array.isArray(parsed) && parsed.every((p): p is string => typeof p === "string")) return parsed;
    ctx.addIssue({ code: "custom", message: "must be a JSON array of strings or a comma-separated list" });
    return [];
  }
  return trimmed.split(",").map((s) => s.trim()).filter((s) => s.length > 0);
});

const envSchema = z
  .object({
    AI_ENABLED: flag.default(true),
    MODEL_BACKEND: z.enum(["anthropic", "openai", "openai-compatible", "ollama"]).default("openai"),
    MODEL_NAME: z.string().optional(),
    MODEL_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
    MODEL_MAX_OUTPUT_TOKENS: positiveInt.default(2000),
    ANTHROPIC_API_KEY: z.string().optional(),
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_BASE_URL: z.url().optional(),
    OLLAMA_URL: z.url().default("http://localhost:11434"),

    DETECTION_RULES: ruleList.optional(),
    CONTEXT_LINES: nonNegativeInt.default(DEFAULT_CONTEXT_LINES),
    PROMPT_MAX_CHARS: positiveInt.default(DEFAULT_PROMPT_MAX_CHARS),
    PROMPT_MAX_TOKENS: positiveInt.optional(),
    MAX_FINDINGS: positiveInt.default(DEFAULT_MAX_FINDINGS),

    RETRY_MAX_ATTEMPTS: positiveInt.default(3),
    RETRY_BASE_DELAY_MS: nonNegativeInt.default(1000),
    RETRY_MAX_DELAY_MS: nonNegativeInt.default(8000),
    MODEL_TIMEOUT_MS: positiveInt.default(30_000),
    RUN_DEADLINE_MS: positiveInt.default(60_000),

    COST_BUDGET_USD: z.coerce.number().nonnegative().optional(),
    COST_BUDGET_PERIOD: z.enum(["daily", "weekly", "monthly"]).default("monthly"),
    PRICING_FILE: z.string().default("config/pricing.json"),
    LEDGER_PATH: z.string().default("data/usage.jsonl"),

    ARCHIVE_DIR: z.string().optional(),
    S3_BUCKET: z.string().optional(),
    S3_ENDPOINT: z.url().optional(),
    S3_REGION: z.string().default("us-east-1"),
    S3_ACCESS_KEY_ID: z.string().optional(),
    S3_SECRET_ACCESS_KEY: z.string().optional(),
    S3_PATH_PREFIX: z.string().optional(),
    S3_FORCE_PATH_STYLE: flag.default(false),

    WEBHOOK_SECRET: z.string().optional(),
    GITHUB_WEBHOOK_SECRET: z.string().optional(),
    GITHUB_TOKEN: z.string().optional(),
    GITHUB_API_URL: z.url().default("https://api.github.com"),
    SLACK_WEBHOOK_URL: z.url().optional(),
    SLACK_BOT_TOKEN: z.string().optional(),
    SLACK_CHANNEL: z.string().optional(),

    PORT: positiveInt.default(8080),
  })
  .superRefine((env, ctx) => {
    if (env.S3_BUCKET && !(env.S3_ENDPOINT && env.S3_ACCESS_KEY_ID && env.S3_SECRET_ACCESS_KEY)) {
      ctx.addIssue({
        code: "custom",
        path: ["S3_BUCKET"],
        message: "S3_ENDPOINT, S3_ACCESS_KEY_ID and S3_SECRET_ACCESS_KEY are required with S3_BUCKET",
      });
    }
    if (env.SLACK_BOT_TOKEN && !env.SLACK_CHANNEL) {
      ctx.addIssue({ code: "custom", path: ["SLACK_CHANNEL"], message: "required with SLACK_BOT_TOKEN" });
    }
    if (env.MODEL_BACKEND === "openai-compatible" && !env.OPENAI_BASE_URL) {
      ctx.addIssue({ code: "custom", path: ["OPENAI_BASE_URL"], message: "required for openai-compatible" });
    }
  });

export interface AppConfig {
  ai: {
    enabled: boolean;
    backend: BackendKind;
    model: string;
    temperature: number;
    maxOutputTokens: number;
    anthropicApiKey?: string;
    openaiApiKey?: string;
    openaiBaseUrl?: string;
    ollamaUrl: string;
  };
  extraction: {
    /** Extra patterns on top of the task's built-in rules */
    detectionRules: string[];
    contextLines: number;
  };
  prompt: {
    maxChars: number;
    maxTokens?: number;
    maxFindings: number;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    timeoutMs: number;
  };
  runDeadlineMs: number;
  cost: {
    budgetUsd?: number;
    budgetPeriod: "daily" | "weekly" | "monthly";
    pricingFile: string;
    ledgerPath: string;
  };
  archive: {
    dir?: string;
    s3?: S3Config;
  };
  webhooks: {
    secret?: string;
    githubSecret?: string;
    githubToken?: string;
    githubApiUrl: string;
  };
  slack: {
    webhookUrl?: string;
    botToken?: string;
    channel?: string;
  };
  port: number;
}

type Env = Record<string, string | undefined>;

/**
 * Validate environment variables into a typed config. Empty strings count as
 * unset. Throws ConfigError naming every offending key.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const cleaned: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") cleaned[key] = value;
  }

  const result = z.safeParse(envSchema, cleaned);
  if (!result.success) {
    const keys = [...new Set(result.error.issues.map((i) => i.path.join(".")))];
    const detail = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(keys, `Invalid configuration: ${detail}`);
  }

  const e = result.data;
  const s3: S3Config | undefined =
    e.S3_BUCKET && e.S3_ENDPOINT && e.S3_ACCESS_KEY_ID && e.S3_SECRET_ACCESS_KEY
      ? {
          bucket: e.S3_BUCKET,
          endpoint: e.S3_ENDPOINT,
          region: e.S3_REGION,
          accessKeyId: e.S3_ACCESS_KEY_ID,
          secretAccessKey: e.S3_SECRET_ACCESS_KEY,
          pathPrefix: e.S3_PATH_PREFIX,
          forcePathStyle: e.S3_FORCE_PATH_STYLE,
        }
      : undefined;

  return {
    ai: {
      enabled: e.AI_ENABLED,
      backend: e.MODEL_BACKEND,
      model: e.MODEL_NAME ?? DEFAULT_MODELS[e.MODEL_BACKEND],
      temperature: e.MODEL_TEMPERATURE,
      maxOutputTokens: e.MODEL_MAX_OUTPUT_TOKENS,
      anthropicApiKey: e.ANTHROPIC_API_KEY,
      openaiApiKey: e.OPENAI_API_KEY,
      openaiBaseUrl: e.OPENAI_BASE_URL,
      ollamaUrl: e.OLLAMA_URL,
    },
    extraction: {
      detectionRules: e.DETECTION_RULES ?? [],
      contextLines: e.CONTEXT_LINES,
    },
    prompt: {
      maxChars: e.PROMPT_MAX_CHARS,
      maxTokens: e.PROMPT_MAX_TOKENS,
      maxFindings: e.MAX_FINDINGS,
    },
    retry: {
      maxAttempts: e.RETRY_MAX_ATTEMPTS,
      baseDelayMs: e.RETRY_BASE_DELAY_MS,
      maxDelayMs: e.RETRY_MAX_DELAY_MS,
      timeoutMs: e.MODEL_TIMEOUT_MS,
    },
    runDeadlineMs: e.RUN_DEADLINE_MS,
    cost: {
      budgetUsd: e.COST_BUDGET_USD,
      budgetPeriod: e.COST_BUDGET_PERIOD,
      pricingFile: e.PRICING_FILE,
      ledgerPath: e.LEDGER_PATH,
    },
    archive: {
      dir: e.ARCHIVE_DIR,
      s3,
    },
    webhooks: {
      secret: e.WEBHOOK_SECRET,
      githubSecret: e.GITHUB_WEBHOOK_SECRET,
      githubToken: e.GITHUB_TOKEN,
      githubApiUrl: e.GITHUB_API_URL,
    },
    slack: {
      webhookUrl: e.SLACK_WEBHOOK_URL,
      botToken: e.SLACK_BOT_TOKEN,
      channel: e.SLACK_CHANNEL,
    },
    port: e.PORT,
  };
}
