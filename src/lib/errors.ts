/**
 * Typed errors raised across the analysis pipeline.
 *
 * Stage-local failures (backend, schema, prompt budget) are caught by the
 * pipeline and turned into a fallback report. Only SignatureInvalidError is
 * surfaced to callers, as a 401 at the webhook boundary.
 */

export type BackendFailureReason =
  | "timeout"
  | "network"
  | "rate-limited"
  | "server-error"
  | "client-error"
  | "deadline";

export class BackendUnavailableError extends Error {
  readonly code = "BACKEND_UNAVAILABLE";
  readonly reason: BackendFailureReason;
  readonly attempts: number;
  readonly status: number | null;

  constructor(reason: BackendFailureReason, attempts: number, message: string, status: number | null = null) {
    super(message);
    this.name = "BackendUnavailableError";
    this.reason = reason;
    this.attempts = attempts;
    this.status = status;
  }
}

export class SchemaError extends Error {
  readonly code = "SCHEMA_ERROR";
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "SchemaError";
    this.issues = issues;
  }
}

export class PromptBudgetError extends Error {
  readonly code = "PROMPT_BUDGET";
  readonly budget: number;
  readonly required: number;

  constructor(budget: number, required: number) {
    super(`Fixed prompt text needs ${required} chars but the budget is ${budget}`);
    this.name = "PromptBudgetError";
    this.budget = budget;
    this.required = required;
  }
}

export class SignatureInvalidError extends Error {
  readonly code = "SIGNATURE_INVALID";

  constructor(message = "Invalid or missing signature") {
    super(message);
    this.name = "SignatureInvalidError";
  }
}

export class DeliveryError extends Error {
  readonly code = "DELIVERY_FAILED";
  readonly destination: string;
  readonly status: number | null;

  constructor(destination: string, message: string, status: number | null = null) {
    super(message);
    this.name = "DeliveryError";
    this.destination = destination;
    this.status = status;
  }
}

export class ConfigError extends Error {
  readonly code = "CONFIG_INVALID";
  readonly keys: string[];

  constructor(keys: string[], message: string) {
    super(message);
    this.name = "ConfigError";
    this.keys = keys;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
