import { describe, it, expect } from "vitest";
import { parseScannerReport } from "../scanner-report";

describe("parseScannerReport", () => {
  it("reads file:line and file:line:col references for the named file", () => {
    const report = [
      "MATCH vendor/zlib/inflate.c:12:3 similar to zlib 1.2.11 (Zlib)",
      "MATCH vendor/zlib/inflate.c:40 copyright header",
      "MATCH vendor/zlib/deflate.c:7 not this file",
    ].join("\n");

    expect(parseScannerReport(report, "src/inflate.c", 100)).toEqual([
      { kind: "reference", id: "scanner:12", line: 12, column: 3, hint: "license-match" },
      { kind: "reference", id: "scanner:40", line: 40, hint: "license-match" },
    ]);
  });

  it("reads 'before N' snippet notes", () => {
    const rules = parseScannerReport("snippet match ends before 18", "a.c", 50);
    expect(rules.map((r) => r.line)).toEqual([18]);
  });

  it("keeps report order and drops duplicate and out-of-range lines", () => {
    const report = "a.c:30\nbefore 5\na.c:30:2\na.c:0\na.c:999";
    expect(parseScannerReport(report, "a.c", 100).map((r) => r.line)).toEqual([30, 5]);
  });

  it("does not match a longer file name that ends with the same name", () => {
    expect(parseScannerReport("lib/xa.c:4", "a.c", 10)).toEqual([]);
  });
});
