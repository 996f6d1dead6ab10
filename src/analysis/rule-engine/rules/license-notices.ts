import type { PatternRule } from "@/analysis/types";

export const LICENSE_HINT = "license-match";

const LICENSE_PATTERNS: { id: string; regex: RegExp }[] = [
  // Copyright line naming a permissive or copyleft family
  { id: "copyright-license", regex: /copyright.*?\b(?:ISC|BSD|Apache|MIT|GPL|LGPL|MPL)\b/i },
  { id: "spdx-identifier", regex: /SPDX-License-Identifier:\s*\S+/i },
  { id: "mit-grant", regex: /permission is hereby granted,? free of charge/i },
  { id: "apache-notice", regex: /licensed under the apache license/i },
  { id: "gpl-notice", regex: /gnu (?:lesser |library )?general public license/i },
];

export function licenseNoticeRules(): PatternRule[] {
  return LICENSE_PATTERNS.map((p): PatternRule => ({
    kind: "pattern",
    id: p.id,
    regex: p.regex,
    hint: LICENSE_HINT,
  }));
}
