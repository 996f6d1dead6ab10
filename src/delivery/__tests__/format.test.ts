import { describe, it, expect } from "vitest";
import { escapeSlack, formatConsole, formatMarkdown, formatSlack, modeLabel } from "../format";
import type { Report } from "@/analysis/types";

function report(overrides: Partial<Report> = {}): Report {
  return {
    runId: "run-1",
    artifactId: "ci-7",
    task: "build-log",
    createdAt: "2026-03-10T12:00:00.000Z",
    aiAssisted: true,
    path: "AI_PATH",
    status: "issues-found",
    summary: ["Missing typedef."],
    findings: [
      {
        cause: "foo_t is not declared",
        citations: [{ line: 4, snippet: "unknown type name 'foo_t'" }],
        confidence: "high",
        nextAction: "Include <foo.h>",
      },
    ],
    categoryCounts: {
      "compile-error": 1,
      "link-missing-dependency": 0,
      "link-undefined-reference": 0,
      "license-match": 0,
      other: 0,
    },
    droppedWindows: 1,
    truncatedWindows: 0,
    rejectedCitations: 2,
    reviewRequired: false,
    warnings: [],
    ...overrides,
  };
}

const CONTEXT = {
  link: "https://ci.example.test/builds/7",
  repo: "acme/engine",
  branch: "main",
  commit: "0123456789abcdef",
};

describe("modeLabel", () => {
  it("labels fallback reports as not AI-assisted with the reason", () => {
    expect(modeLabel(report())).toBe("AI-assisted");
    expect(modeLabel(report({ aiAssisted: false, path: "DETERMINISTIC_FALLBACK", fallbackReason: "ai-disabled" }))).toBe(
      "Deterministic fallback, not AI-assisted (AI analysis is disabled)"
    );
  });
});

describe("formatConsole", () => {
  it("renders header, findings, evidence counts and link", () => {
    const text = formatConsole(report({ warnings: ["slow backend"] }), CONTEXT);

    expect(text.split("\n")).toEqual([
      "Build failure analysis for ci-7 (acme/engine@main 0123456)",
      "Run run-1 | AI-assisted",
      "",
      "Summary:",
      "  - Missing typedef.",
      "",
      "Findings:",
      "  1. foo_t is not declared [high]",
      "     line 4: unknown type name 'foo_t'",
      "     Next: Include <foo.h>",
      "",
      "Evidence: 1 window(s) dropped, 0 truncated, 2 citation(s) rejected",
      "Warning: slow backend",
      "Link: https://ci.example.test/builds/7",
    ]);
  });

  it("omits the origin and findings sections when empty", () => {
    const text = formatConsole(report({ findings: [], status: "no-issues", summary: ["No issues detected."] }));
    expect(text.split("\n").slice(0, 5)).toEqual([
      "Build failure analysis for ci-7",
      "Run run-1 | AI-assisted",
      "",
      "Summary:",
      "  - No issues detected.",
    ]);
    expect(text).not.toContain("Findings:");
  });
});

describe("formatMarkdown", () => {
  it("fences snippets that contain backticks", () => {
    const text = formatMarkdown(
      report({
        task: "pull-request",
        findings: [
          {
            cause: "Unlinked symbol",
            citations: [{ line: 6, snippet: "undefined reference to `init'" }],
            confidence: "medium",
            nextAction: "Link libengine",
          },
        ],
      }),
      { link: "https://github.example.test/acme/engine/pull/42" }
    );

    expect(text.split("\n")).toEqual([
      "### Pull request review",
      "",
      "**Mode:** AI-assisted",
      "",
      "**Summary**",
      "- Missing typedef.",
      "",
      "**Findings**",
      "1. **Unlinked symbol** (confidence: medium)",
      "   - line 6: ``undefined reference to `init'``",
      "   - Next action: Link libengine",
      "",
      "_Evidence: 1 window(s) dropped, 0 truncated, 2 citation(s) rejected._",
      "",
      "[View source](https://github.example.test/acme/engine/pull/42)",
    ]);
  });
});

describe("formatSlack", () => {
  it("escapes control characters and replaces backticks in code", () => {
    const text = formatSlack(
      report({
        findings: [
          {
            cause: "a < b & c",
            citations: [{ line: 6, snippet: "undefined reference to `init'" }],
            confidence: "low",
            nextAction: "Include <foo.h>",
            missingData: "linker flags",
          },
        ],
      }),
      CONTEXT
    );

    expect(text.split("\n")).toEqual([
      ":x: *Build failure analysis* acme/engine@main 0123456",
      "_AI-assisted_",
      "",
      "*Summary:* Missing typedef.",
      "",
      "*Top causes:*",
      "1. a &lt; b &amp; c (_low_)",
      "> line 6: `undefined reference to 'init'`",
      "Fix: Include &lt;foo.h&gt;",
      "Missing: linker flags",
      "",
      "_Evidence: 1 window(s) dropped, 0 truncated, 2 citation(s) rejected_",
      "<https://ci.example.test/builds/7|View build>",
    ]);
  });

  it("uses a check mark when nothing was found", () => {
    const text = formatSlack(report({ status: "no-issues", findings: [] }));
    expect(text.split("\n")[0]).toBe(":white_check_mark: *Build failure analysis*");
  });
});

describe("license scan reports", () => {
  const licenseReport = report({
    task: "license-scan",
    findings: [],
    reviewRequired: true,
    noticeAdditions: ["This product includes zlib."],
    licenseAdditions: ["Zlib License"],
  });

  it("marks review and lists the additions on the console", () => {
    expect(formatConsole(licenseReport).split("\n")).toEqual([
      "License scan review for ci-7",
      "Run run-1 | AI-assisted | review required",
      "",
      "Summary:",
      "  - Missing typedef.",
      "",
      "Notice additions:",
      "  - This product includes zlib.",
      "",
      "License additions:",
      "  - Zlib License",
      "",
      "Evidence: 1 window(s) dropped, 0 truncated, 2 citation(s) rejected",
    ]);
  });

  it("lists the additions in markdown", () => {
    expect(formatMarkdown(licenseReport).split("\n")).toEqual([
      "### License scan review",
      "",
      "**Mode:** AI-assisted | review required",
      "",
      "**Summary**",
      "- Missing typedef.",
      "",
      "**Notice additions**",
      "- This product includes zlib.",
      "",
      "**License additions**",
      "- Zlib License",
      "",
      "_Evidence: 1 window(s) dropped, 0 truncated, 2 citation(s) rejected._",
    ]);
  });

  it("links to the scan from Slack", () => {
    expect(formatSlack(licenseReport, CONTEXT).split("\n")).toEqual([
      ":x: *License scan review* acme/engine@main 0123456",
      "_AI-assisted | review required_",
      "",
      "*Summary:* Missing typedef.",
      "",
      "*Notice additions:*",
      "• This product includes zlib.",
      "",
      "*License additions:*",
      "• Zlib License",
      "",
      "_Evidence: 1 window(s) dropped, 0 truncated, 2 citation(s) rejected_",
      "<https://ci.example.test/builds/7|View scan>",
    ]);
  });
});

describe("escapeSlack", () => {
  it("escapes ampersands before angle brackets", () => {
    expect(escapeSlack("<&>")).toBe("&lt;&amp;&gt;");
  });
});
