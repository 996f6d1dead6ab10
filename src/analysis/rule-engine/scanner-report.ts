import type { ReferenceRule } from "@/analysis/types";
import { LICENSE_HINT } from "./rules/license-notices";
import { escapeRegExp } from "./utils";

/**
 * Turn a license/code scanner report into reference rules against the file
 * under review. Recognised forms:
 *   - `name.ext:LINE` or `name.ext:LINE:COL` where `name.ext` is the file
 *   - `before LINE` (snippet-match notes)
 * Lines outside `1..lineCount` are dropped; duplicates collapse to the first.
 */
export function parseScannerReport(
  reportText: string,
  sourceName: string,
  lineCount: number
): ReferenceRule[] {
  const baseName = sourceName.split(/[\\/]/).pop() ?? sourceName;
  const fileRef = new RegExp(`(?:^|[^\\w.-])${escapeRegExp(baseName)}:(\\d+)(?::(\\d+))?`, "g");
  const beforeRef = /\bbefore\s+(\d+)\b/gi;

  const found: { line: number; column?: number; index: number }[] = [];

  for (const match of reportText.matchAll(fileRef)) {
    const column = match[2] !== undefined ? Number(match[2]) : undefined;
    found.push({
      line: Number(match[1]),
      ...(column !== undefined ? { column } : {}),
      index: match.index ?? 0,
    });
  }
  for (const match of reportText.matchAll(beforeRef)) {
    found.push({ line: Number(match[1]), index: match.index ?? 0 });
  }

  found.sort((a, b) => a.index - b.index);

  const seen = new Set<number>();
  const rules: ReferenceRule[] = [];
  for (const ref of found) {
    if (ref.line < 1 || ref.line > lineCount || seen.has(ref.line)) continue;
    seen.add(ref.line);
    rules.push({
      kind: "reference",
      id: `scanner:${ref.line}`,
      line: ref.line,
      ...(ref.column !== undefined ? { column: ref.column } : {}),
      hint: LICENSE_HINT,
    });
  }
  return rules;
}
