import type { Artifact, EvidenceWindow, Indicator } from "@/analysis/types";

/**
 * Expand each indicator by `contextLines` on both sides (clipped to the
 * artifact) and merge windows whose line ranges overlap. Merged windows keep
 * every indicator they absorbed. Adjacent but non-overlapping ranges stay
 * separate.
 */
export function buildWindows(
  artifact: Artifact,
  indicators: Indicator[],
  contextLines: number
): EvidenceWindow[] {
  const total = artifact.lines.length;
  if (total === 0 || indicators.length === 0) return [];

  const context = Math.max(0, Math.floor(contextLines));
  const sorted = [...indicators].sort((a, b) => a.line - b.line);

  const ranges: { startLine: number; endLine: number; indicators: Indicator[] }[] = [];
  for (const indicator of sorted) {
    const startLine = Math.max(1, indicator.line - context);
    const endLine = Math.min(total, indicator.line + context);
    const prev = ranges[ranges.length - 1];

    if (prev && startLine <= prev.endLine) {
      prev.endLine = Math.max(prev.endLine, endLine);
      prev.indicators.push(indicator);
    } else {
      ranges.push({ startLine, endLine, indicators: [indicator] });
    }
  }

  return ranges.map((r) => ({
    startLine: r.startLine,
    endLine: r.endLine,
    lines: artifact.lines.slice(r.startLine - 1, r.endLine),
    indicators: r.indicators,
  }));
}

/** Render a window as numbered lines, the form shown to the model. */
export function renderWindow(window: EvidenceWindow): string {
  return window.lines.map((line, i) => `${window.startLine + i}: ${line}`).join("\n");
}
