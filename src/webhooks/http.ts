import type { IncomingMessage, ServerResponse } from "http";

/** Upper bound on an inbound body; CI logs beyond this are rejected */
export const MAX_BODY_BYTES = 10 * 1024 * 1024; // 10MB

export interface InboundRequest {
  method: string;
  path: string;
  query: URLSearchParams;
  /** Lower-cased header names */
  headers: Record<string, string | undefined>;
  /** Raw bytes, exactly as signed by the sender */
  body: Buffer;
}

export interface HandlerResult {
  status: number;
  body: Record<string, unknown>;
}

export type Handler = (request: InboundRequest) => Promise<HandlerResult>;

export function json(status: number, body: Record<string, unknown>): HandlerResult {
  return { status, body };
}

export class BodyTooLargeError extends Error {
  constructor(limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = "BodyTooLargeError";
  }
}

export async function readBody(req: IncomingMessage, limit: number = MAX_BODY_BYTES): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > limit) throw new BodyTooLargeError(limit);
    chunks.push(buf);
  }
  return Buffer.concat(chunks);
}

export async function toInboundRequest(req: IncomingMessage): Promise<InboundRequest> {
  const url = new URL(req.url ?? "/", "http://localhost");
  const headers: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(req.headers)) {
    headers[name.toLowerCase()] = Array.isArray(value) ? value.join(", ") : value;
  }
  const method = (req.method ?? "GET").toUpperCase();
  const body = method === "GET" || method === "HEAD" ? Buffer.alloc(0) : await readBody(req);
  return { method, path: url.pathname, query: url.searchParams, headers, body };
}

export function sendResult(res: ServerResponse, result: HandlerResult): void {
  res.statusCode = result.status;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.end(JSON.stringify(result.body));
}
