import { createHmac, timingSafeEqual } from "crypto";
import { SignatureInvalidError } from "./errors";

const PREFIX = "sha256=";

/** `sha256=<hex>` HMAC of the raw body, the form GitHub and our CI notifier send. */
export function signPayload(secret: string, body: string | Buffer): string {
  return PREFIX + createHmac("sha256", secret).update(body).digest("hex");
}

/**
 * Constant-time check of a `sha256=<hex>` signature header against the raw
 * request body. Must run before the body is parsed.
 */
export function verifySignature(
  secret: string,
  body: string | Buffer,
  header: string | null | undefined
): boolean {
  if (!secret || !header || !header.startsWith(PREFIX)) return false;

  const expected = Buffer.from(signPayload(secret, body));
  const received = Buffer.from(header.trim());

  if (expected.length !== received.length) return false;
  return timingSafeEqual(expected, received);
}

/** Throw SignatureInvalidError unless `header` signs `body` with `secret`. */
export function requireSignature(secret: string, body: string | Buffer, header: string | undefined): void {
  if (!header) throw new SignatureInvalidError("Missing signature");
  if (!verifySignature(secret, body, header)) throw new SignatureInvalidError("Invalid signature");
}
