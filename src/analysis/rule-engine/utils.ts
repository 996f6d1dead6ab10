/** CSI / OSC escape sequences emitted by colourised compilers and CI runners */
const ANSI_REGEX = /\x1B\[[0-?]*[ -/]*[@-~]|\x1B[@-Z\\-_]/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_REGEX, "");
}

/**
 * Split text into lines. CRLF and lone CR are normalised; a single trailing
 * newline does not produce an extra empty line.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.replace(/\r\n?/g, "\n").split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/** Lowercase and collapse runs of whitespace to a single space. */
export function normalizeForCompare(text: string): string {
  return text.replace(/\s+/g, " ").trim().toLowerCase();
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
