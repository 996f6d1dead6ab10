import type { PatternRule } from "@/analysis/types";

interface BuildErrorPattern {
  id: string;
  regex: RegExp;
  also?: RegExp;
  hint: string;
  description: string;
}

export const BUILD_ERROR_PATTERNS: BuildErrorPattern[] = [
  // Linker
  {
    id: "undefined-reference",
    regex: /\bundefined reference to\b/i,
    hint: "link-undefined",
    description: "Symbol referenced but never defined at link time",
  },
  {
    id: "undefined-symbol",
    regex: /\bundefined symbol:/i,
    hint: "link-undefined",
    description: "Undefined symbol reported by lld or the dynamic loader",
  },
  {
    id: "ld-cannot-find",
    regex: /\bld:\s+cannot find\b/i,
    hint: "link-missing",
    description: "Linker could not locate a library or object",
  },
  {
    id: "cannot-find-library",
    regex: /\bcannot find\s+-l\S+/i,
    hint: "link-missing",
    description: "Missing -l library",
  },
  {
    id: "library-not-found",
    regex: /\blibrary not found for\s+-l\S+/i,
    hint: "link-missing",
    description: "Missing -l library (ld64)",
  },
  // Compiler
  {
    id: "fatal",
    regex: /\bfatal(?: error)?:\s+\S/i,
    hint: "compile",
    description: "Fatal compiler or tool error",
  },
  {
    id: "error",
    regex: /\berror:\s+\S/i,
    hint: "compile",
    description: "Compiler diagnostic at error level",
  },
  {
    id: "errors-generated",
    regex: /^\s*\d+\s+errors?\s+generated\b/i,
    hint: "compile",
    description: "Clang error summary",
  },
  // Build system
  {
    id: "no-rule-to-make-target",
    regex: /\bno rule to make target\b/i,
    hint: "configuration",
    description: "Make could not resolve a prerequisite",
  },
  {
    id: "cmake-error",
    regex: /\bcmake error\b/i,
    hint: "configuration",
    description: "CMake configure step failed",
  },
  {
    id: "configuration-error",
    regex: /\bconfiguration error\b/i,
    hint: "configuration",
    description: "Project configuration failed",
  },
];

/**
 * CI summary markers ("FAILED: build target foo", "Test FAILURE in link step").
 * Only counted when the line also names a test, target, build or link step.
 */
export const CI_MARKER_PATTERN: BuildErrorPattern = {
  id: "ci-marker",
  regex: /\bFAIL(?:ED|URE)\b/,
  also: /\b(?:test|target|build|link)s?\b/i,
  hint: "ci-marker",
  description: "CI step reported failure",
};

export function buildLogRules(): PatternRule[] {
  return [...BUILD_ERROR_PATTERNS, CI_MARKER_PATTERN].map((p): PatternRule => ({
    kind: "pattern",
    id: p.id,
    regex: p.regex,
    ...(p.also ? { also: p.also } : {}),
    hint: p.hint,
  }));
}
