import { z } from "zod/v4";
import type { Report } from "@/analysis/types";
import { DeliveryError } from "@/lib/errors";
import { formatMarkdown, type DeliveryContext } from "./format";

const REQUEST_TIMEOUT_MS = 10_000;
/** GitHub caps the files endpoint at 3000 entries; 3 pages covers typical PRs */
const MAX_FILE_PAGES = 3;

const pullFileSchema = z.object({
  filename: z.string(),
  status: z.string(),
  additions: z.number(),
  deletions: z.number(),
});

export type PullRequestFile = z.infer<typeof pullFileSchema>;

export interface GitHubClientOptions {
  token: string;
  apiUrl?: string;
  fetchImpl?: typeof fetch;
}

const REPO_NAME = /^[\w.-]+\/[\w.-]+$/;

export class GitHubClient {
  private readonly token: string;
  private readonly apiUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: GitHubClientOptions) {
    this.token = options.token;
    this.apiUrl = (options.apiUrl ?? "https://api.github.com").replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  private headers(): Record<string, string> {
    return {
      Accept: "application/vnd.github+json",
      Authorization: `Bearer ${this.token}`,
      "X-GitHub-Api-Version": "2022-11-28",
      "User-Agent": "buildlens",
    };
  }

  private repoPath(repo: string): string {
    if (!REPO_NAME.test(repo)) throw new Error(`Invalid repository name "${repo}"`);
    return `${this.apiUrl}/repos/${repo}`;
  }

  async createIssueComment(repo: string, issueNumber: number, body: string): Promise<void> {
    const res = await this.fetchImpl(`${this.repoPath(repo)}/issues/${issueNumber}/comments`, {
      method: "POST",
      headers: { ...this.headers(), "Content-Type": "application/json" },
      body: JSON.stringify({ body }),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    if (!res.ok) {
      throw new DeliveryError("pr-comment", `GitHub comment failed with ${res.status}`, res.status);
    }
  }

  /** `GET /repos/{repo}/pulls/{n}/files`, paged. */
  async listPullRequestFiles(repo: string, pullNumber: number): Promise<PullRequestFile[]> {
    const files: PullRequestFile[] = [];
    for (let page = 1; page <= MAX_FILE_PAGES; page++) {
      const res = await this.fetchImpl(
        `${this.repoPath(repo)}/pulls/${pullNumber}/files?per_page=100&page=${page}`,
        { headers: this.headers(), signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) }
      );
      if (!res.ok) throw new Error(`GitHub files request failed with ${res.status}`);

      const parsed = z.array(pullFileSchema).safeParse(await res.json());
      if (!parsed.success) throw new Error("Unexpected GitHub files response");
      files.push(...parsed.data);
      if (parsed.data.length < 100) break;
    }
    return files;
  }

  async postReport(report: Report, context: DeliveryContext, repo: string, pullNumber: number): Promise<void> {
    await this.createIssueComment(repo, pullNumber, formatMarkdown(report, context));
  }
}
