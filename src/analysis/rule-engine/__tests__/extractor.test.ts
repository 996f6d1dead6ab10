import { describe, it, expect } from "vitest";
import {
  buildLogRules,
  buildWindows,
  extractBuildInfo,
  findIndicators,
  ingestArtifact,
  patternRulesFromStrings,
  renderWindow,
  runExtractor,
} from "../index";
import { categorizeWindows } from "../categorizer";
import type { Indicator } from "@/analysis/types";

// ── Helpers ──────────────────────────────────────────────

function indicator(line: number, text = `line ${line}`): Indicator {
  return { line, text, ruleId: "test", hint: null };
}

function numberedLog(count: number, errorLines: number[]): string {
  const errors = new Set(errorLines);
  return Array.from({ length: count }, (_, i) =>
    errors.has(i + 1) ? `src/mod${i + 1}.c:1:1: error: broken` : `step ${i + 1} ok`
  ).join("\n");
}

// ── Tests ────────────────────────────────────────────────

describe("ingestArtifact", () => {
  it("strips ANSI colour codes and normalises CRLF", () => {
    const artifact = ingestArtifact("log", "\x1b[31merror:\x1b[0m bad\r\nnext\r\n");
    expect(artifact.lines).toEqual(["error: bad", "next"]);
    expect(artifact.text).toBe("error: bad\r\nnext\r\n");
  });

  it("freezes the artifact and its lines", () => {
    const artifact = ingestArtifact("log", "a\nb");
    expect(Object.isFrozen(artifact)).toBe(true);
    expect(Object.isFrozen(artifact.lines)).toBe(true);
  });

  it("yields no lines for empty input", () => {
    expect(ingestArtifact("empty", "").lines).toEqual([]);
  });
});

describe("runExtractor", () => {
  it("builds one window over a three-line log with a configured rule", () => {
    const artifact = ingestArtifact("log", "1: ok\n2: error: unknown type name 'foo_t'\n3: ok");
    const result = runExtractor(artifact, patternRulesFromStrings(["error"]), { contextLines: 1 });

    expect(result.indicators).toHaveLength(1);
    expect(result.indicators[0].line).toBe(2);
    expect(result.windows).toHaveLength(1);
    expect(result.windows[0].startLine).toBe(1);
    expect(result.windows[0].endLine).toBe(3);

    const { windows } = categorizeWindows(result.windows);
    expect(windows[0].category).toBe("compile-error");
  });

  it("returns identical output for identical input", () => {
    const text = numberedLog(40, [5, 6, 30]);
    const a = runExtractor(ingestArtifact("x", text), buildLogRules(), { contextLines: 2 });
    const b = runExtractor(ingestArtifact("x", text), buildLogRules(), { contextLines: 2 });
    expect(a).toEqual(b);
  });

  it("yields nothing when no rule matches", () => {
    const artifact = ingestArtifact("log", "all good\nstill good");
    const result = runExtractor(artifact, buildLogRules());
    expect(result.indicators).toEqual([]);
    expect(result.windows).toEqual([]);
  });

  it("keeps every window inside the artifact bounds", () => {
    const artifact = ingestArtifact("log", numberedLog(4, [1, 4]));
    const result = runExtractor(artifact, buildLogRules(), { contextLines: 10 });
    expect(result.windows).toHaveLength(1);
    expect(result.windows[0].startLine).toBe(1);
    expect(result.windows[0].endLine).toBe(4);
    expect(result.windows[0].indicators.map((i) => i.line)).toEqual([1, 4]);
  });

  it("treats an invalid configured regex as a literal", () => {
    const artifact = ingestArtifact("log", "ok\nfailed [step\nok");
    const result = runExtractor(artifact, patternRulesFromStrings(["[step"]), { contextLines: 0 });
    expect(result.indicators.map((i) => i.line)).toEqual([2]);
    expect(result.indicators[0].ruleId).toBe("config:[step");
  });
});

describe("findIndicators", () => {
  it("uses the first matching rule for a line", () => {
    const artifact = ingestArtifact("log", "main.c:(.text+0x1): undefined reference to `foo'");
    const [hit] = findIndicators(artifact, buildLogRules());
    expect(hit.ruleId).toBe("undefined-reference");
    expect(hit.hint).toBe("link-undefined");
  });

  it("only counts CI FAILED markers that name a step", () => {
    const artifact = ingestArtifact("log", "FAILED: build target app\nFAILED\nfailed target");
    const hits = findIndicators(artifact, buildLogRules());
    expect(hits.map((h) => h.line)).toEqual([1]);
    expect(hits[0].hint).toBe("ci-marker");
  });

  it("places reference rules ahead of patterns on the same line", () => {
    const artifact = ingestArtifact("src", "int a;\nerror: x");
    const hits = findIndicators(artifact, [
      { kind: "reference", id: "scanner:2", line: 2, hint: "license-match" },
      ...buildLogRules(),
    ]);
    expect(hits).toEqual([{ line: 2, text: "error: x", ruleId: "scanner:2", hint: "license-match" }]);
  });

  it("ignores references outside the artifact", () => {
    const artifact = ingestArtifact("src", "one\ntwo");
    const hits = findIndicators(artifact, [
      { kind: "reference", id: "scanner:0", line: 0 },
      { kind: "reference", id: "scanner:9", line: 9 },
    ]);
    expect(hits).toEqual([]);
  });
});

describe("buildWindows", () => {
  const artifact = ingestArtifact("log", Array.from({ length: 20 }, (_, i) => `l${i + 1}`).join("\n"));

  it("merges overlapping windows and keeps all their indicators", () => {
    const windows = buildWindows(artifact, [indicator(5), indicator(8)], 2);
    expect(windows).toHaveLength(1);
    expect(windows[0].startLine).toBe(3);
    expect(windows[0].endLine).toBe(10);
    expect(windows[0].indicators.map((i) => i.line)).toEqual([5, 8]);
  });

  it("keeps adjacent but non-overlapping windows apart", () => {
    // 3..5 and 6..8
    const windows = buildWindows(artifact, [indicator(4), indicator(7)], 1);
    expect(windows.map((w) => [w.startLine, w.endLine])).toEqual([
      [3, 5],
      [6, 8],
    ]);
  });

  it("sorts indicators before merging", () => {
    const windows = buildWindows(artifact, [indicator(15), indicator(2)], 0);
    expect(windows.map((w) => w.startLine)).toEqual([2, 15]);
  });
});

describe("renderWindow", () => {
  it("prefixes each line with its number", () => {
    const artifact = ingestArtifact("log", "a\nb\nc");
    const [window] = buildWindows(artifact, [indicator(2)], 1);
    expect(renderWindow(window)).toBe("1: a\n2: b\n3: c");
  });
});

describe("extractBuildInfo", () => {
  it("reads the header keys a runner prints", () => {
    const artifact = ingestArtifact(
      "log",
      ["Component: engine", "Build ID = 4711", "compiler: clang 17", "branch: main", "component: other"].join("\n")
    );
    expect(extractBuildInfo(artifact)).toEqual({
      component: "engine",
      buildId: "4711",
      compiler: "clang 17",
      branch: "main",
    });
  });

  it("ignores keys after the header region", () => {
    const lines = Array.from({ length: 40 }, () => "noise");
    lines.push("runner: late");
    expect(extractBuildInfo(ingestArtifact("log", lines.join("\n")))).toEqual({});
  });
});
