import { describe, it, expect } from "vitest";
import { assemblePrompt, resolveBudgetChars, SYSTEM_PROMPT } from "../prompt";
import { buildLogRules, ingestArtifact, runExtractor } from "../../rule-engine";
import { categorizeWindows } from "../../rule-engine/categorizer";
import { PromptBudgetError } from "@/lib/errors";
import type { CategorizedWindow } from "@/analysis/types";

// ── Helpers ──────────────────────────────────────────────

function windowsFor(text: string, contextLines: number): CategorizedWindow[] {
  const artifact = ingestArtifact("log", text);
  return categorizeWindows(runExtractor(artifact, buildLogRules(), { contextLines }).windows).windows;
}

/** Length of everything but the windows: the fixed part of the prompt */
function fixedLength(): number {
  const empty = assemblePrompt({ task: "build-log", windows: [], budget: { maxChars: 100_000 } });
  return empty.system.length + empty.prompt.length;
}

// ── Tests ────────────────────────────────────────────────

describe("resolveBudgetChars", () => {
  it("takes the tighter of chars and tokens", () => {
    expect(resolveBudgetChars({ maxChars: 12_000, maxTokens: 1000 })).toBe(3500);
    expect(resolveBudgetChars({ maxChars: 2000, maxTokens: 1000 })).toBe(2000);
  });

  it("falls back to the default ceiling", () => {
    expect(resolveBudgetChars({})).toBe(12_000);
  });
});

describe("assemblePrompt", () => {
  it("stays within budget for a 10,000-line log and reports what it dropped", () => {
    const lines = Array.from({ length: 10_000 }, (_, i) =>
      (i + 1) % 20 === 0 ? `src/f${i + 1}.c:1:1: error: bad thing` : `compiling unit ${i + 1}`
    );
    const windows = windowsFor(lines.join("\n"), 2);
    expect(windows).toHaveLength(500);

    const result = assemblePrompt({ task: "build-log", windows, budget: { maxChars: 6000 } });

    expect(result.system.length + result.prompt.length).toBeLessThanOrEqual(6000);
    expect(result.includedWindows.length).toBeGreaterThan(0);
    expect(result.droppedWindows).toBe(500 - result.includedWindows.length);
    expect(result.droppedWindows).toBeGreaterThan(0);
    expect(result.truncatedWindows).toBe(0);
  });

  it("orders windows by category priority, then by line", () => {
    const lines = Array.from({ length: 40 }, () => "ok");
    lines[2] = "main.o: undefined reference to `init'";
    lines[29] = "a.c:1:1: error: bad";
    const windows = windowsFor(lines.join("\n"), 1);

    const result = assemblePrompt({ task: "build-log", windows, budget: { maxChars: 100_000 } });

    expect(result.includedWindows.map((w) => w.startLine)).toEqual([29, 2]);
    expect(result.prompt).toContain("### Window 1 [compile-error] lines 29-31\n29: ok\n30: a.c:1:1: error: bad\n31: ok\n");
    expect(result.prompt).toContain("### Window 2 [link-undefined-reference] lines 2-4\n");
    expect(result.system).toBe(SYSTEM_PROMPT);
  });

  it("clips the first window around its indicator when it alone overflows", () => {
    const lines = Array.from({ length: 30 }, (_, i) => `context line ${i + 1} with some padding text`);
    lines[14] = "a.c:1:1: error: bad";
    const windows = windowsFor(lines.join("\n"), 5);
    const budget = fixedLength() + 160;

    const result = assemblePrompt({ task: "build-log", windows, budget: { maxChars: budget } });
    const [shown] = result.includedWindows;

    expect(result.truncatedWindows).toBe(1);
    expect(result.droppedWindows).toBe(0);
    expect(shown.startLine).toBeLessThanOrEqual(15);
    expect(shown.endLine).toBeGreaterThanOrEqual(15);
    expect(shown.endLine - shown.startLine).toBeLessThan(10);
    expect(shown.indicators.map((i) => i.line)).toEqual([15]);
    expect(result.system.length + result.prompt.length).toBeLessThanOrEqual(budget);
  });

  it("cuts the indicator line itself when nothing else fits", () => {
    const lines = Array.from({ length: 20 }, () => "ok");
    lines[9] = "error: " + "x".repeat(93);
    const windows = windowsFor(lines.join("\n"), 5);
    const budget = fixedLength() + 60;

    const result = assemblePrompt({ task: "build-log", windows, budget: { maxChars: budget } });

    expect(result.truncatedWindows).toBe(1);
    expect(result.includedWindows[0].lines).toEqual(["error: xxx..."]);
    expect(result.prompt).toContain("### Window 1 [compile-error] lines 10-10\n10: error: xxx...\n\n");
    expect(result.system.length + result.prompt.length).toBe(budget);
  });

  it("caps external notes", () => {
    const result = assemblePrompt({
      task: "license-scan",
      windows: [],
      externalContext: "x".repeat(5000),
      budget: { maxChars: 100_000 },
    });
    expect(result.prompt).toContain(`External notes:\n---\n${"x".repeat(2000)}\n---\n`);
    expect(result.prompt).not.toContain("x".repeat(2001));
  });

  it("includes the build info header when present", () => {
    const result = assemblePrompt({
      task: "build-log",
      windows: [],
      buildInfo: { component: "engine", compiler: "gcc 13" },
      budget: { maxChars: 100_000 },
    });
    expect(result.prompt).toContain("Build info:\nComponent: engine\nCompiler: gcc 13\n\n");
  });

  it("throws PromptBudgetError when the fixed text alone overflows", () => {
    expect(() => assemblePrompt({ task: "build-log", windows: [], budget: { maxChars: 100 } })).toThrow(
      PromptBudgetError
    );
  });
});
