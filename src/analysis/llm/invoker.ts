import type { ModelResponse } from "@/analysis/types";
import { BackendUnavailableError, errorMessage, type BackendFailureReason } from "@/lib/errors";
import { estimateTokens } from "@/lib/constants";
import type { ModelBackend } from "./client";

export interface InvokerSettings {
  model: string;
  temperature: number;
  maxOutputTokens: number;
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Per-attempt timeout */
  timeoutMs: number;
}

export interface InvokeRequest {
  system: string;
  prompt: string;
  /** Run-level deadline; aborting it ends the call without further retries */
  signal?: AbortSignal;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

interface Failure {
  reason: BackendFailureReason;
  status: number | null;
  retryable: boolean;
  message: string;
}

class AttemptTimeoutError extends Error {
  constructor(ms: number) {
    super(`Model call timed out after ${ms}ms`);
    this.name = "AttemptTimeoutError";
  }
}

function deadlineError(attempts: number): BackendUnavailableError {
  return new BackendUnavailableError("deadline", attempts, "Run deadline expired before the model responded");
}

export const defaultSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(deadlineError(0));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(deadlineError(0));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export function getErrorStatus(error: unknown): number | null {
  if (typeof error === "object" && error !== null) {
    if ("status" in error && typeof error.status === "number") return error.status;
    if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  }
  return null;
}

/** Retry-After in seconds, from a plain header record or a fetch Headers. */
export function getRetryAfter(error: unknown): number | null {
  if (typeof error !== "object" || error === null || !("headers" in error)) return null;
  const headers = error.headers;
  let value: unknown = null;
  if (headers instanceof Headers) {
    value = headers.get("retry-after");
  } else if (typeof headers === "object" && headers !== null && "retry-after" in headers) {
    value = headers["retry-after"];
  }
  if (typeof value !== "string") return null;
  const seconds = parseFloat(value);
  return Number.isNaN(seconds) ? null : seconds;
}

function classify(error: unknown): Failure {
  const message = errorMessage(error);
  if (error instanceof AttemptTimeoutError) {
    return { reason: "timeout", status: null, retryable: true, message };
  }
  const status = getErrorStatus(error);
  if (status === 429) return { reason: "rate-limited", status, retryable: true, message };
  if (status === 408) return { reason: "timeout", status, retryable: true, message };
  if (status !== null && status >= 500) return { reason: "server-error", status, retryable: true, message };
  if (status !== null) return { reason: "client-error", status, retryable: false, message };

  const name = error instanceof Error ? error.name : "";
  if (/timeout/i.test(name)) return { reason: "timeout", status: null, retryable: true, message };
  return { reason: "network", status: null, retryable: true, message };
}

function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    const fail = () => reject(signal.reason instanceof Error ? signal.reason : new Error("aborted"));
    if (signal.aborted) fail();
    else signal.addEventListener("abort", fail, { once: true });
  });
}

/**
 * Calls a backend with a per-attempt timeout and bounded exponential backoff.
 *
 * Network errors, timeouts, 408, 429 and 5xx are retried up to `maxAttempts`
 * in total; any other HTTP error fails at once. Every failure surfaces as
 * BackendUnavailableError so callers can take the fallback path.
 */
export class ModelInvoker {
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(
    private readonly backend: ModelBackend,
    private readonly settings: InvokerSettings,
    options: { sleep?: Sleep; now?: () => number } = {}
  ) {
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  get backendName(): string {
    return this.backend.name;
  }

  get model(): string {
    return this.settings.model;
  }

  async invoke(request: InvokeRequest): Promise<ModelResponse> {
    const { maxAttempts, baseDelayMs, maxDelayMs } = this.settings;
    const attempts = Math.max(1, maxAttempts);
    const startedAt = this.now();
    let last: Failure | null = null;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (request.signal?.aborted) throw deadlineError(attempt - 1);

      try {
        const result = await this.attempt(request);
        const usage = result.usage ?? {
          inputTokens: estimateTokens(request.system + request.prompt),
          outputTokens: estimateTokens(result.text),
        };
        return {
          text: result.text,
          backend: this.backend.name,
          model: this.settings.model,
          usage,
          latencyMs: this.now() - startedAt,
          attempts: attempt,
        };
      } catch (error: unknown) {
        if (request.signal?.aborted) throw deadlineError(attempt);
        if (error instanceof BackendUnavailableError) throw error;

        last = classify(error);
        if (!last.retryable) {
          console.error(`[LLM] ${this.backend.name} rejected the request (status=${last.status}): ${last.message}`);
          throw new BackendUnavailableError(last.reason, attempt, last.message, last.status);
        }
        if (attempt === attempts) break;

        let delayMs = baseDelayMs * Math.pow(2, attempt - 1);
        const retryAfter = getRetryAfter(error);
        if (retryAfter !== null) delayMs = Math.max(delayMs, retryAfter * 1000);
        delayMs = Math.min(delayMs, maxDelayMs);

        console.warn(
          `[LLM] Request failed (attempt ${attempt}/${attempts}, ${last.reason}), retrying in ${Math.round(delayMs)}ms...`,
          last.status ? `status=${last.status}` : ""
        );
        try {
          await this.sleep(delayMs, request.signal);
        } catch {
          throw deadlineError(attempt);
        }
      }
    }

    const reason = last?.reason ?? "network";
    throw new BackendUnavailableError(
      reason,
      attempts,
      `${this.backend.name} unavailable after ${attempts} attempt(s): ${last?.message ?? "unknown error"}`,
      last?.status ?? null
    );
  }

  private async attempt(request: InvokeRequest) {
    const { timeoutMs } = this.settings;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new AttemptTimeoutError(timeoutMs)), timeoutMs);
    const runSignal = request.signal;
    const onRunAbort = () => controller.abort(deadlineError(0));
    runSignal?.addEventListener("abort", onRunAbort, { once: true });

    try {
      return await Promise.race([
        this.backend.complete(
          {
            system: request.system,
            prompt: request.prompt,
            model: this.settings.model,
            temperature: this.settings.temperature,
            maxOutputTokens: this.settings.maxOutputTokens,
          },
          controller.signal
        ),
        rejectOnAbort(controller.signal),
      ]);
    } catch (error: unknown) {
      // The SDKs surface an aborted request as their own error type
      if (controller.signal.aborted && controller.signal.reason instanceof Error) {
        throw controller.signal.reason;
      }
      throw error;
    } finally {
      clearTimeout(timer);
      runSignal?.removeEventListener("abort", onRunAbort);
    }
  }
}
