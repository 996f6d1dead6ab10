import { PR_RISK_PREFIX } from "./tasks";

/** Metadata that may enter a pull-request artifact. The description body never does. */
export interface PullRequestMeta {
  repo: string;
  number: number;
  title: string;
  author: string;
  headRef: string;
  baseRef: string;
  draft: boolean;
  additions: number;
  deletions: number;
  changedFiles: number;
  /** Ticket ids lifted from title, branch and description */
  ticketIds: string[];
  files: { filename: string; status: string; additions: number; deletions: number }[];
}

const TICKET_ID = /\b[A-Z][A-Z0-9]+-\d+\b/g;
export const LARGE_CHANGE_LINES = 500;
const MAX_LISTED_FILES = 50;

const CI_PATHS = [/^\.github\/workflows\//, /^\.gitlab-ci\.yml$/, /(^|\/)Jenkinsfile$/, /^\.circleci\//, /^azure-pipelines\.yml$/];
const DEPENDENCY_MANIFESTS = [
  /(^|\/)package(-lock)?\.json$/,
  /(^|\/)requirements[^/]*\.txt$/,
  /(^|\/)go\.(mod|sum)$/,
  /(^|\/)Cargo\.(toml|lock)$/,
  /(^|\/)pom\.xml$/,
  /(^|\/)build\.gradle(\.kts)?$/,
  /(^|\/)CMakeLists\.txt$/,
  /(^|\/)conanfile\.(txt|py)$/,
];
const WIP_TITLE = /^\s*(\[wip\]|wip\b|draft\b)/i;

export function extractTicketIds(...sources: (string | null | undefined)[]): string[] {
  const ids = new Set<string>();
  for (const source of sources) {
    if (!source) continue;
    for (const match of source.matchAll(TICKET_ID)) ids.add(match[0]);
  }
  return [...ids].sort();
}

export function pullRequestRisks(meta: PullRequestMeta): string[] {
  const risks: string[] = [];

  if (meta.ticketIds.length === 0) {
    risks.push("no linked ticket id in title, branch or description");
  }
  const changed = meta.additions + meta.deletions;
  if (changed > LARGE_CHANGE_LINES) {
    risks.push(`large change (${changed} lines across ${meta.changedFiles} files)`);
  }
  if (WIP_TITLE.test(meta.title)) {
    risks.push("title marks the change as work in progress");
  }
  for (const file of meta.files) {
    if (CI_PATHS.some((p) => p.test(file.filename))) {
      risks.push(`touches CI configuration: ${file.filename}`);
    } else if (DEPENDENCY_MANIFESTS.some((p) => p.test(file.filename))) {
      risks.push(`touches dependency manifest: ${file.filename}`);
    }
  }
  const removed = meta.files.filter((f) => f.status === "removed").length;
  if (removed > 0) risks.push(`deletes ${removed} file(s)`);

  return risks;
}

/**
 * Render PR metadata as line-addressable text. Risk lines carry the
 * `risk:` prefix the pull-request detection rule keys on.
 */
export function renderPullRequestArtifact(meta: PullRequestMeta): string {
  const lines = [
    `pull request: ${meta.repo}#${meta.number}`,
    `title: ${meta.title.replace(/\s+/g, " ").trim()}`,
    `author: ${meta.author}`,
    `branch: ${meta.headRef} -> ${meta.baseRef}`,
    `draft: ${meta.draft ? "yes" : "no"}`,
    `diff: +${meta.additions} -${meta.deletions} in ${meta.changedFiles} files`,
    `tickets: ${meta.ticketIds.length > 0 ? meta.ticketIds.join(", ") : "none"}`,
  ];

  if (meta.files.length > 0) {
    lines.push("files:");
    for (const file of meta.files.slice(0, MAX_LISTED_FILES)) {
      lines.push(`  ${file.status} ${file.filename} (+${file.additions} -${file.deletions})`);
    }
    if (meta.files.length > MAX_LISTED_FILES) {
      lines.push(`  ... ${meta.files.length - MAX_LISTED_FILES} more`);
    }
  }

  for (const risk of pullRequestRisks(meta)) {
    lines.push(`${PR_RISK_PREFIX} ${risk}`);
  }
  return lines.join("\n");
}
