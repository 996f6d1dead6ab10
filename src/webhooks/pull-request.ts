import { z } from "zod/v4";
import type { AnalysisPipeline } from "@/analysis/pipeline";
import { extractTicketIds, renderPullRequestArtifact, type PullRequestMeta } from "@/analysis/pull-request";
import type { DeliveryService, Destination } from "@/delivery";
import type { GitHubClient, PullRequestFile } from "@/delivery/github";
import { requireSignature } from "@/lib/signature";
import { SignatureInvalidError, errorMessage } from "@/lib/errors";
import { json, type Handler } from "./http";

const ANALYZED_ACTIONS = new Set(["opened", "reopened", "synchronize", "ready_for_review"]);

const pullRequestEventSchema = z.object({
  action: z.string(),
  number: z.number().int().positive(),
  pull_request: z.object({
    title: z.string(),
    html_url: z.string(),
    body: z.string().nullish(),
    draft: z.boolean().optional().default(false),
    additions: z.number().int().nonnegative().optional().default(0),
    deletions: z.number().int().nonnegative().optional().default(0),
    changed_files: z.number().int().nonnegative().optional().default(0),
    user: z.object({ login: z.string() }),
    head: z.object({ ref: z.string(), sha: z.string() }),
    base: z.object({ ref: z.string() }),
  }),
  repository: z.object({ full_name: z.string() }),
});

export interface PullRequestHandlerDeps {
  pipeline: Pick<AnalysisPipeline, "run">;
  delivery: DeliveryService;
  /** GitHub webhook secret; unset disables the endpoint */
  secret: string | undefined;
  /** Used to list changed files; without it the artifact carries diff stats only */
  github: GitHubClient | null;
  /** Extra destinations besides the PR comment (console, slack) */
  destinations: Destination[];
}

/** GitHub sends `application/x-www-form-urlencoded` bodies as `payload=<json>`. */
function payloadText(body: Buffer, contentType: string | undefined): string | null {
  const text = body.toString("utf-8");
  if (contentType?.startsWith("application/x-www-form-urlencoded")) {
    return new URLSearchParams(text).get("payload");
  }
  return text;
}

export function createPullRequestHandler(deps: PullRequestHandlerDeps): Handler {
  return async (request) => {
    if (request.method !== "POST") {
      return json(405, { error: "Method not allowed" });
    }

    if (!deps.secret) {
      return json(503, { error: "GitHub webhook is not configured" });
    }

    // --- Signature verification ---
    try {
      requireSignature(deps.secret, request.body, request.headers["x-hub-signature-256"]);
    } catch (error) {
      if (!(error instanceof SignatureInvalidError)) throw error;
      console.warn(`[Webhook] Rejected GitHub event: ${error.message}`);
      return json(401, { error: error.message });
    }

    const event = request.headers["x-github-event"];
    if (event === "ping") {
      return json(200, { message: "pong" });
    }
    if (event !== "pull_request") {
      return json(200, { message: `Ignored event: ${event ?? "unknown"}` });
    }

    // --- Payload ---
    const text = payloadText(request.body, request.headers["content-type"]);
    if (text === null) {
      return json(400, { error: "Missing payload field" });
    }
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      return json(400, { error: "Invalid JSON" });
    }

    const parsed = z.safeParse(pullRequestEventSchema, raw);
    if (!parsed.success) {
      return json(422, { error: "Invalid payload" });
    }
    const payload = parsed.data;

    if (!ANALYZED_ACTIONS.has(payload.action)) {
      return json(200, { message: `Ignored action: ${payload.action}` });
    }

    const repo = payload.repository.full_name;
    const pr = payload.pull_request;
    const eventId = `${repo}#${payload.number}@${pr.head.sha}`;

    const destinations: Destination[] = [
      ...(deps.github ? [{ kind: "pr-comment" as const, repo, pullNumber: payload.number }] : []),
      ...deps.destinations,
    ];

    if (deps.delivery.allDelivered(eventId, destinations)) {
      return json(200, { eventId, duplicate: true });
    }

    try {
      let files: PullRequestFile[] = [];
      if (deps.github) {
        try {
          files = await deps.github.listPullRequestFiles(repo, payload.number);
        } catch (error) {
          console.warn(`[Webhook] Could not list files for ${repo}#${payload.number}:`, errorMessage(error));
        }
      }

      const meta: PullRequestMeta = {
        repo,
        number: payload.number,
        title: pr.title,
        author: pr.user.login,
        headRef: pr.head.ref,
        baseRef: pr.base.ref,
        draft: pr.draft,
        additions: pr.additions,
        deletions: pr.deletions,
        changedFiles: pr.changed_files,
        ticketIds: extractTicketIds(pr.title, pr.head.ref, pr.body),
        files,
      };

      const { report } = await deps.pipeline.run({
        task: "pull-request",
        artifactId: `${repo}#${payload.number}`,
        text: renderPullRequestArtifact(meta),
      });

      const context = { link: pr.html_url, repo, branch: pr.head.ref, commit: pr.head.sha };
      const { results, failures } = await deps.delivery.deliverAll(report, destinations, eventId, context);

      return json(failures.length > 0 ? 502 : 200, {
        eventId,
        runId: report.runId,
        path: report.path,
        aiAssisted: report.aiAssisted,
        deliveries: results.map((r) => ({ key: r.key, delivered: r.delivered, duplicate: r.duplicate })),
        failed: failures,
      });
    } catch (error) {
      console.error(`[Webhook] Pull request event ${eventId} failed:`, errorMessage(error));
      return json(500, { error: "Internal error" });
    }
  };
}
