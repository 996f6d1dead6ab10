import { describe, it, expect } from "vitest";
import {
  extractTicketIds,
  pullRequestRisks,
  renderPullRequestArtifact,
  type PullRequestMeta,
} from "../pull-request";

function meta(overrides: Partial<PullRequestMeta> = {}): PullRequestMeta {
  return {
    repo: "acme/engine",
    number: 42,
    title: "ENG-12: add inflate fast path",
    author: "octo",
    headRef: "feature/ENG-12-inflate",
    baseRef: "main",
    draft: false,
    additions: 40,
    deletions: 2,
    changedFiles: 2,
    ticketIds: ["ENG-12"],
    files: [
      { filename: "src/inflate.c", status: "modified", additions: 38, deletions: 2 },
      { filename: "tests/inflate_test.c", status: "added", additions: 2, deletions: 0 },
    ],
    ...overrides,
  };
}

describe("extractTicketIds", () => {
  it("collects unique ids from every source in sorted order", () => {
    expect(extractTicketIds("OPS-9 and ENG-12", "feature/ENG-12-x", null, "see ab-1 and OPS-9")).toEqual([
      "ENG-12",
      "OPS-9",
    ]);
  });

  it("returns nothing without a match", () => {
    expect(extractTicketIds("fix typo", undefined)).toEqual([]);
  });
});

describe("pullRequestRisks", () => {
  it("finds nothing in a small ticketed change", () => {
    expect(pullRequestRisks(meta())).toEqual([]);
  });

  it("lists every risk in a fixed order", () => {
    const risks = pullRequestRisks(
      meta({
        title: "[WIP] rework build",
        ticketIds: [],
        additions: 450,
        deletions: 100,
        changedFiles: 4,
        files: [
          { filename: ".github/workflows/ci.yml", status: "modified", additions: 5, deletions: 1 },
          { filename: "engine/CMakeLists.txt", status: "modified", additions: 3, deletions: 0 },
          { filename: "old/legacy.c", status: "removed", additions: 0, deletions: 90 },
          { filename: "src/main.c", status: "modified", additions: 442, deletions: 9 },
        ],
      })
    );

    expect(risks).toEqual([
      "no linked ticket id in title, branch or description",
      "large change (550 lines across 4 files)",
      "title marks the change as work in progress",
      "touches CI configuration: .github/workflows/ci.yml",
      "touches dependency manifest: engine/CMakeLists.txt",
      "deletes 1 file(s)",
    ]);
  });

  it("does not flag exactly the large-change threshold", () => {
    expect(pullRequestRisks(meta({ additions: 250, deletions: 250 }))).toEqual([]);
  });

  it("recognizes WIP and draft prefixes but not words that start with them", () => {
    expect(pullRequestRisks(meta({ title: "WIP: inflate" }))).toEqual(["title marks the change as work in progress"]);
    expect(pullRequestRisks(meta({ title: "Draft inflate" }))).toEqual(["title marks the change as work in progress"]);
    expect(pullRequestRisks(meta({ title: "Wipe caches" }))).toEqual([]);
  });
});

describe("renderPullRequestArtifact", () => {
  it("renders metadata, files and risks one per line", () => {
    const text = renderPullRequestArtifact(
      meta({ title: "  add\n inflate  ", ticketIds: [], draft: true })
    );

    expect(text.split("\n")).toEqual([
      "pull request: acme/engine#42",
      "title: add inflate",
      "author: octo",
      "branch: feature/ENG-12-inflate -> main",
      "draft: yes",
      "diff: +40 -2 in 2 files",
      "tickets: none",
      "files:",
      "  modified src/inflate.c (+38 -2)",
      "  added tests/inflate_test.c (+2 -0)",
      "risk: no linked ticket id in title, branch or description",
    ]);
  });

  it("lists at most fifty files", () => {
    const files = Array.from({ length: 53 }, (_, i) => ({
      filename: `src/f${i}.c`,
      status: "modified",
      additions: 1,
      deletions: 0,
    }));
    const lines = renderPullRequestArtifact(meta({ files, changedFiles: 53 })).split("\n");

    expect(lines.filter((l) => l.startsWith("  modified "))).toHaveLength(50);
    expect(lines[lines.length - 1]).toBe("  ... 3 more");
  });
});
