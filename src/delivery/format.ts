import type { Citation, Finding, Report, TaskKind } from "@/analysis/types";
import { FALLBACK_REASON_TEXT } from "@/analysis/fallback";

export interface DeliveryContext {
  /** Link back to the originating build or pull request */
  link?: string;
  repo?: string;
  branch?: string;
  commit?: string;
}

const TASK_TITLES: Record<TaskKind, string> = {
  "build-log": "Build failure analysis",
  "license-scan": "License scan review",
  "pull-request": "Pull request review",
};

const LINK_TEXT: Record<TaskKind, string> = {
  "build-log": "View build",
  "license-scan": "View scan",
  "pull-request": "View pull request",
};

export function modeLabel(report: Report): string {
  if (report.aiAssisted) return "AI-assisted";
  const reason = report.fallbackReason ? FALLBACK_REASON_TEXT[report.fallbackReason] : "fallback";
  return `Deterministic fallback, not AI-assisted (${reason})`;
}

/** Mode label plus a review marker when a person must confirm the findings */
export function statusLabel(report: Report): string {
  return report.reviewRequired ? `${modeLabel(report)} | review required` : modeLabel(report);
}

function addenda(report: Report): [string, string[]][] {
  const sections: [string, string[]][] = [
    ["Notice additions", report.noticeAdditions ?? []],
    ["License additions", report.licenseAdditions ?? []],
  ];
  return sections.filter(([, items]) => items.length > 0);
}

export function evidenceLine(report: Report): string {
  return `Evidence: ${report.droppedWindows} window(s) dropped, ${report.truncatedWindows} truncated, ${report.rejectedCitations} citation(s) rejected`;
}

function origin(context: DeliveryContext): string {
  const parts = [context.repo, context.branch].filter(Boolean).join("@");
  const commit = context.commit ? ` ${context.commit.slice(0, 7)}` : "";
  return parts ? `${parts}${commit}` : "";
}

// ── Console ──────────────────────────────────────────────

export function formatConsole(report: Report, context: DeliveryContext = {}): string {
  const where = origin(context);
  const lines = [
    `${TASK_TITLES[report.task]} for ${report.artifactId}${where ? ` (${where})` : ""}`,
    `Run ${report.runId} | ${statusLabel(report)}`,
    "",
    "Summary:",
    ...report.summary.map((s) => `  - ${s}`),
  ];

  if (report.findings.length > 0) {
    lines.push("", "Findings:");
    report.findings.forEach((f, i) => {
      lines.push(`  ${i + 1}. ${f.cause} [${f.confidence}]`);
      for (const c of f.citations) lines.push(`     line ${c.line}: ${c.snippet}`);
      if (f.nextAction) lines.push(`     Next: ${f.nextAction}`);
      if (f.missingData) lines.push(`     Missing: ${f.missingData}`);
    });
  }

  for (const [title, items] of addenda(report)) {
    lines.push("", `${title}:`, ...items.map((item) => `  - ${item}`));
  }

  lines.push("", evidenceLine(report));
  for (const w of report.warnings) lines.push(`Warning: ${w}`);
  if (context.link) lines.push(`Link: ${context.link}`);
  return lines.join("\n");
}

// ── Markdown (pull-request comments) ─────────────────────

function inlineCode(text: string): string {
  const longestRun = Math.max(0, ...(text.match(/`+/g) ?? []).map((run) => run.length));
  const fence = "`".repeat(longestRun + 1);
  const pad = text.startsWith("`") || text.endsWith("`") ? " " : "";
  return `${fence}${pad}${text}${pad}${fence}`;
}

function markdownCitation(c: Citation): string {
  return `   - line ${c.line}: ${inlineCode(c.snippet)}`;
}

export function formatMarkdown(report: Report, context: DeliveryContext = {}): string {
  const lines = [
    `### ${TASK_TITLES[report.task]}`,
    "",
    `**Mode:** ${statusLabel(report)}`,
    "",
    "**Summary**",
    ...report.summary.map((s) => `- ${s}`),
  ];

  if (report.findings.length > 0) {
    lines.push("", "**Findings**");
    report.findings.forEach((f: Finding, i) => {
      lines.push(`${i + 1}. **${f.cause}** (confidence: ${f.confidence})`);
      lines.push(...f.citations.map(markdownCitation));
      if (f.nextAction) lines.push(`   - Next action: ${f.nextAction}`);
      if (f.missingData) lines.push(`   - Missing data: ${f.missingData}`);
    });
  }

  for (const [title, items] of addenda(report)) {
    lines.push("", `**${title}**`, ...items.map((item) => `- ${item}`));
  }

  lines.push("", `_${evidenceLine(report)}._`);
  for (const w of report.warnings) lines.push(`> ${w}`);
  if (context.link) lines.push("", `[View source](${context.link})`);
  return lines.join("\n");
}

// ── Slack mrkdwn ─────────────────────────────────────────

export function escapeSlack(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function slackCode(text: string): string {
  // Slack has no escape for backticks inside inline code
  return "`" + escapeSlack(text.replace(/`/g, "'")) + "`";
}

export function formatSlack(report: Report, context: DeliveryContext = {}): string {
  const where = origin(context);
  const icon = report.status === "no-issues" ? ":white_check_mark:" : ":x:";
  const lines = [
    `${icon} *${TASK_TITLES[report.task]}*${where ? ` ${escapeSlack(where)}` : ""}`,
    `_${escapeSlack(statusLabel(report))}_`,
    "",
    `*Summary:* ${escapeSlack(report.summary.join(" "))}`,
  ];

  if (report.findings.length > 0) {
    lines.push("", "*Top causes:*");
    report.findings.forEach((f, i) => {
      lines.push(`${i + 1}. ${escapeSlack(f.cause)} (_${f.confidence}_)`);
      for (const c of f.citations) lines.push(`> line ${c.line}: ${slackCode(c.snippet)}`);
      if (f.nextAction) lines.push(`Fix: ${escapeSlack(f.nextAction)}`);
      if (f.missingData) lines.push(`Missing: ${escapeSlack(f.missingData)}`);
    });
  }

  for (const [title, items] of addenda(report)) {
    lines.push("", `*${title}:*`, ...items.map((item) => `• ${escapeSlack(item)}`));
  }

  lines.push("", `_${evidenceLine(report)}_`);
  if (context.link) {
    lines.push(`<${context.link}|${LINK_TEXT[report.task]}>`);
  }
  return lines.join("\n");
}
