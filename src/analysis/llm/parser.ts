import { z } from "zod/v4";
import type { Citation, Confidence } from "@/analysis/types";
import { SchemaError } from "@/lib/errors";

const confidenceSchema = z.preprocess(
  (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
  z.enum(["high", "medium", "low"])
);

const citationSchema = z.object({
  line: z.coerce.number().int().positive(),
  snippet: z.string(),
});

const rootCauseSchema = z.object({
  cause: z.string().min(1),
  // Citations are checked one by one so a bad item only costs its finding
  evidence: z.array(z.unknown()).default([]),
  confidence: confidenceSchema,
  next_action: z.string().default(""),
  missing_data: z.string().nullish(),
});

const modelOutputSchema = z.object({
  root_causes: z.array(rootCauseSchema),
  summary: z
    .union([z.array(z.string()), z.string().transform((s) => [s])])
    .default([]),
  // License-scan addenda; anything but a string entry is skipped
  notice_additions: z.array(z.unknown()).default([]),
  license_additions: z.array(z.unknown()).default([]),
  // An unreadable flag asks for review
  review_required: z.boolean().optional().catch(true),
});

export interface ParsedRootCause {
  cause: string;
  evidence: Citation[];
  /** Citation items dropped for a bad shape, e.g. `line: 0` or a missing snippet */
  malformedCitations: number;
  confidence: Confidence;
  nextAction: string;
  missingData?: string;
}

export interface ParsedModelOutput {
  rootCauses: ParsedRootCause[];
  summary: string[];
  noticeAdditions: string[];
  licenseAdditions: string[];
  /** The model's own review flag, when it sent one */
  reviewRequired?: boolean;
}

/**
 * Return the index just past the `}` closing the object that opens at
 * `start`, or -1. String literals are skipped so braces inside them do not
 * count.
 */
function findBalancedEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Tolerant JSON extraction: bare JSON first, then a fenced code block, then
 * the first balanced `{...}` in the text.
 */
export function extractJSON(raw: string): unknown {
  const trimmed = raw.trim();

  const direct = tryParse(trimmed);
  if (direct.ok) return direct.value;

  const fence = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (fence) {
    const fenced = tryParse(fence[1].trim());
    if (fenced.ok) return fenced.value;
  }

  let from = trimmed.indexOf("{");
  while (from !== -1) {
    const end = findBalancedEnd(trimmed, from);
    if (end === -1) break;
    const block = tryParse(trimmed.slice(from, end));
    if (block.ok) return block.value;
    from = trimmed.indexOf("{", from + 1);
  }

  throw new SchemaError("Model output contains no parseable JSON object");
}

function readTextList(items: unknown[]): string[] {
  return items
    .filter((item): item is string => typeof item === "string")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function readCitations(items: unknown[]): { citations: Citation[]; malformed: number } {
  const citations: Citation[] = [];
  let malformed = 0;
  for (const item of items) {
    const result = z.safeParse(citationSchema, item);
    if (result.success) citations.push(result.data);
    else malformed++;
  }
  return { citations, malformed };
}

export function parseModelOutput(raw: string): ParsedModelOutput {
  const json = extractJSON(raw);
  // A bare array is read as the root_causes list
  const candidate = Array.isArray(json) ? { root_causes: json } : json;

  const result = z.safeParse(modelOutputSchema, candidate);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new SchemaError(`Model output does not match the required schema`, issues);
  }

  return {
    rootCauses: result.data.root_causes.map((rc) => {
      const { citations, malformed } = readCitations(rc.evidence);
      return {
        cause: rc.cause.trim(),
        evidence: citations,
        malformedCitations: malformed,
        confidence: rc.confidence,
        nextAction: rc.next_action.trim(),
        ...(rc.missing_data ? { missingData: rc.missing_data.trim() } : {}),
      };
    }),
    summary: result.data.summary.map((s) => s.trim()).filter((s) => s.length > 0),
    noticeAdditions: readTextList(result.data.notice_additions),
    licenseAdditions: readTextList(result.data.license_additions),
    ...(result.data.review_required !== undefined ? { reviewRequired: result.data.review_required } : {}),
  };
}
