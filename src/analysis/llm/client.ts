import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";
import { z } from "zod/v4";
import type { TokenUsage } from "@/analysis/types";

export type BackendKind = "anthropic" | "openai" | "openai-compatible" | "ollama";

export interface CompletionRequest {
  system: string;
  prompt: string;
  model: string;
  temperature: number;
  maxOutputTokens: number;
}

export interface CompletionResult {
  text: string;
  /** Null when the backend did not report token counts */
  usage: TokenUsage | null;
}

/**
 * One interchangeable model backend. Implementations hold no shared state
 * and must honour `signal` where their transport allows it.
 */
export interface ModelBackend {
  readonly name: BackendKind;
  complete(request: CompletionRequest, signal: AbortSignal): Promise<CompletionResult>;
}

/** Non-2xx response from a backend reached over plain HTTP. */
export class HttpStatusError extends Error {
  readonly status: number;
  readonly headers: Record<string, string>;

  constructor(status: number, message: string, headers: Record<string, string> = {}) {
    super(message);
    this.name = "HttpStatusError";
    this.status = status;
    this.headers = headers;
  }
}

export class AnthropicBackend implements ModelBackend {
  readonly name = "anthropic";
  private client: Anthropic;

  constructor(apiKey: string) {
    // Retries are owned by the invoker
    this.client = new Anthropic({ apiKey, maxRetries: 0 });
  }

  async complete(request: CompletionRequest, signal: AbortSignal): Promise<CompletionResult> {
    const message = await this.client.messages.create(
      {
        model: request.model,
        max_tokens: request.maxOutputTokens,
        temperature: request.temperature,
        system: request.system,
        messages: [{ role: "user", content: request.prompt }],
      },
      { signal }
    );

    const parts: string[] = [];
    for (const block of message.content) {
      if (block.type === "text") parts.push(block.text);
    }

    return {
      text: parts.join(""),
      usage: {
        inputTokens: message.usage.input_tokens,
        outputTokens: message.usage.output_tokens,
      },
    };
  }
}

export interface OpenAIBackendOptions {
  apiKey: string;
  /** Set for OpenAI-compatible local servers (vLLM, LM Studio, llama.cpp) */
  baseURL?: string;
  /** Request `response_format: json_object`; not every compatible server supports it */
  jsonMode?: boolean;
}

export class OpenAIBackend implements ModelBackend {
  readonly name: BackendKind;
  private client: OpenAI;
  private jsonMode: boolean;

  constructor(options: OpenAIBackendOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      maxRetries: 0,
      ...(options.baseURL ? { baseURL: options.baseURL } : {}),
    });
    this.name = options.baseURL ? "openai-compatible" : "openai";
    this.jsonMode = options.jsonMode ?? !options.baseURL;
  }

  async complete(request: CompletionRequest, signal: AbortSignal): Promise<CompletionResult> {
    const response = await this.client.chat.completions.create(
      {
        model: request.model,
        temperature: request.temperature,
        max_tokens: request.maxOutputTokens,
        ...(this.jsonMode ? { response_format: { type: "json_object" as const } } : {}),
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.prompt },
        ],
      },
      { signal }
    );

    const usage = response.usage
      ? { inputTokens: response.usage.prompt_tokens, outputTokens: response.usage.completion_tokens }
      : null;

    return { text: response.choices[0]?.message?.content ?? "", usage };
  }
}

const ollamaResponseSchema = z.object({
  response: z.string(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

export interface OllamaBackendOptions {
  baseUrl: string;
  fetchImpl?: typeof fetch;
}

/** Local Ollama server via its `/api/generate` endpoint. */
export class OllamaBackend implements ModelBackend {
  readonly name = "ollama";
  private baseUrl: string;
  private fetchImpl: typeof fetch;

  constructor(options: OllamaBackendOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async complete(request: CompletionRequest, signal: AbortSignal): Promise<CompletionResult> {
    const res = await this.fetchImpl(`${this.baseUrl}/api/generate`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model: request.model,
        system: request.system,
        prompt: request.prompt,
        stream: false,
        format: "json",
        options: { temperature: request.temperature, num_predict: request.maxOutputTokens },
      }),
      signal,
    });

    if (!res.ok) {
      const retryAfter = res.headers.get("retry-after");
      throw new HttpStatusError(
        res.status,
        `Ollama request failed (${res.status} ${res.statusText})`,
        retryAfter ? { "retry-after": retryAfter } : {}
      );
    }

    const parsed = ollamaResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new Error("Ollama response is missing the `response` field");
    }

    const { response, prompt_eval_count, eval_count } = parsed.data;
    const usage =
      prompt_eval_count !== undefined || eval_count !== undefined
        ? { inputTokens: prompt_eval_count ?? 0, outputTokens: eval_count ?? 0 }
        : null;

    return { text: response, usage };
  }
}

export interface BackendSettings {
  backend: BackendKind;
  anthropicApiKey?: string;
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  ollamaUrl: string;
}

export const DEFAULT_MODELS: Record<BackendKind, string> = {
  anthropic: "claude-3-5-haiku-latest",
  openai: "gpt-4o-mini",
  "openai-compatible": "qwen2.5-coder",
  ollama: "llama3.1",
};

/**
 * Build the configured backend, or null when its credentials are missing.
 */
export function createModelBackend(settings: BackendSettings): ModelBackend | null {
  switch (settings.backend) {
    case "anthropic":
      return settings.anthropicApiKey ? new AnthropicBackend(settings.anthropicApiKey) : null;
    case "openai":
      return settings.openaiApiKey ? new OpenAIBackend({ apiKey: settings.openaiApiKey }) : null;
    case "openai-compatible":
      if (!settings.openaiBaseUrl) return null;
      return new OpenAIBackend({
        // Local servers accept any bearer token
        apiKey: settings.openaiApiKey ?? "local",
        baseURL: settings.openaiBaseUrl,
      });
    case "ollama":
      return new OllamaBackend({ baseUrl: settings.ollamaUrl });
  }
}
