import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { DeliveryService, destinationKey, type Destination } from "../index";
import { SlackClient } from "../slack";
import { GitHubClient } from "../github";
import { createIdempotencyStore, type IdempotencyStore } from "@/lib/idempotency";
import { DeliveryError } from "@/lib/errors";
import type { Report } from "@/analysis/types";

// ── Mocks ────────────────────────────────────────────────

const slackFetch = vi.fn<typeof fetch>();
const githubFetch = vi.fn<typeof fetch>();

// ── Helpers ──────────────────────────────────────────────

const REPORT: Report = {
  runId: "run-1",
  artifactId: "acme/engine#42",
  task: "pull-request",
  createdAt: "2026-03-10T12:00:00.000Z",
  aiAssisted: false,
  path: "DETERMINISTIC_FALLBACK",
  fallbackReason: "ai-disabled",
  status: "no-issues",
  summary: ["No issues detected."],
  findings: [],
  categoryCounts: {
    "compile-error": 0,
    "link-missing-dependency": 0,
    "link-undefined-reference": 0,
    "license-match": 0,
    other: 0,
  },
  droppedWindows: 0,
  truncatedWindows: 0,
  rejectedCitations: 0,
  reviewRequired: false,
  warnings: [],
};

const PR: Destination = { kind: "pr-comment", repo: "acme/engine", pullNumber: 42 };

let idempotency: IdempotencyStore;
let written: string[];

function service(targets: { slack?: boolean; github?: boolean } = {}) {
  return new DeliveryService(
    {
      slack: targets.slack
        ? new SlackClient({ webhookUrl: "https://hooks.slack.example.test/T0/B0", fetchImpl: slackFetch })
        : null,
      github: targets.github
        ? new GitHubClient({ token: "test-token", apiUrl: "https://github.example.test/api/", fetchImpl: githubFetch })
        : null,
      write: (text) => written.push(text),
    },
    idempotency
  );
}

beforeEach(() => {
  vi.clearAllMocks();
  slackFetch.mockReset();
  githubFetch.mockReset();
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
  idempotency = createIdempotencyStore({ ttlMs: 60_000 });
  written = [];
});

afterEach(() => {
  idempotency.destroy();
  vi.restoreAllMocks();
});

// ── Tests ────────────────────────────────────────────────

describe("destinationKey", () => {
  it("distinguishes channels and pull requests", () => {
    expect(destinationKey({ kind: "console" })).toBe("console");
    expect(destinationKey({ kind: "slack" })).toBe("slack:default");
    expect(destinationKey({ kind: "slack", channel: "#builds" })).toBe("slack:#builds");
    expect(destinationKey(PR)).toBe("pr:acme/engine#42");
  });
});

describe("DeliveryService", () => {
  it("delivers once per event and destination", async () => {
    const delivery = service();

    const first = await delivery.deliver(REPORT, { kind: "console" }, "evt-1");
    const second = await delivery.deliver({ ...REPORT, runId: "run-2" }, { kind: "console" }, "evt-1");

    expect(first).toEqual({ key: "evt-1:console", delivered: true, duplicate: false });
    expect(second).toEqual({ key: "evt-1:console", delivered: false, duplicate: true });
    expect(written).toHaveLength(1);
    expect(written[0].split("\n")[1]).toBe(
      "Run run-1 | Deterministic fallback, not AI-assisted (AI analysis is disabled)"
    );
  });

  it("releases the key after a failed send so a retry can deliver", async () => {
    slackFetch.mockResolvedValueOnce(new Response("no", { status: 500 }));
    slackFetch.mockResolvedValueOnce(new Response("ok", { status: 200 }));
    const delivery = service({ slack: true });

    await expect(delivery.deliver(REPORT, { kind: "slack" }, "evt-1")).rejects.toThrow(
      new DeliveryError("slack", "Slack webhook returned 500", 500)
    );
    const retry = await delivery.deliver(REPORT, { kind: "slack" }, "evt-1");

    expect(retry.delivered).toBe(true);
    expect(slackFetch).toHaveBeenCalledTimes(2);
    const [url, init] = slackFetch.mock.calls[1];
    expect(url).toBe("https://hooks.slack.example.test/T0/B0");
    expect(JSON.parse(String(init?.body))).toHaveProperty("text");
  });

  it("fails a destination whose client is not configured", async () => {
    await expect(service().deliver(REPORT, PR, "evt-1")).rejects.toThrow("GitHub token is not configured");
    expect(idempotency.claim("evt-1:pr:acme/engine#42")).toBe(true);
  });

  it("posts a markdown comment to the pull request", async () => {
    githubFetch.mockResolvedValueOnce(new Response("{}", { status: 201 }));

    await service({ github: true }).deliver(REPORT, PR, "evt-1", { link: "https://github.example.test/pull/42" });

    const [url, init] = githubFetch.mock.calls[0];
    expect(url).toBe("https://github.example.test/api/repos/acme/engine/issues/42/comments");
    expect(init?.method).toBe("POST");
    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toEqual({ body: expect.stringContaining("### Pull request review\n") });
  });

  it("keeps delivering to the rest when one destination fails", async () => {
    githubFetch.mockResolvedValueOnce(new Response("denied", { status: 403 }));
    const delivery = service({ github: true });

    const { results, failures } = await delivery.deliverAll(REPORT, [PR, { kind: "console" }], "evt-1");

    expect(failures).toEqual(["pr:acme/engine#42"]);
    expect(results).toEqual([{ key: "evt-1:console", delivered: true, duplicate: false }]);
    expect(console.error).toHaveBeenCalledWith("[Delivery] GitHub comment failed with 403");
  });

  it("reports all delivered only when every destination completed", async () => {
    const delivery = service();
    const destinations: Destination[] = [{ kind: "console" }, { kind: "slack" }];

    expect(delivery.allDelivered("evt-1", [])).toBe(false);
    await delivery.deliver(REPORT, { kind: "console" }, "evt-1");
    expect(delivery.allDelivered("evt-1", destinations)).toBe(false);
    expect(delivery.allDelivered("evt-1", [{ kind: "console" }])).toBe(true);
  });
});

describe("GitHubClient.listPullRequestFiles", () => {
  it("pages until a short page", async () => {
    const file = { filename: "src/a.c", status: "modified", additions: 1, deletions: 0 };
    githubFetch
      .mockResolvedValueOnce(Response.json(Array.from({ length: 100 }, () => file)))
      .mockResolvedValueOnce(Response.json([file, file]));
    const client = new GitHubClient({ token: "test-token", fetchImpl: githubFetch });

    const files = await client.listPullRequestFiles("acme/engine", 42);

    expect(files).toHaveLength(102);
    expect(githubFetch.mock.calls.map(([url]) => url)).toEqual([
      "https://api.github.com/repos/acme/engine/pulls/42/files?per_page=100&page=1",
      "https://api.github.com/repos/acme/engine/pulls/42/files?per_page=100&page=2",
    ]);
  });

  it("refuses a malformed repository name", async () => {
    const client = new GitHubClient({ token: "test-token", fetchImpl: githubFetch });
    await expect(client.listPullRequestFiles("../../admin", 1)).rejects.toThrow('Invalid repository name "../../admin"');
    expect(githubFetch).not.toHaveBeenCalled();
  });
});

describe("SlackClient with a bot token", () => {
  it("posts to chat.postMessage and surfaces Slack errors", async () => {
    slackFetch.mockResolvedValueOnce(Response.json({ ok: false, error: "channel_not_found" }));
    const client = new SlackClient({ botToken: "test-token", defaultChannel: "#builds", fetchImpl: slackFetch });

    await expect(client.postReport(REPORT, {})).rejects.toThrow("chat.postMessage failed: channel_not_found");

    const [url, init] = slackFetch.mock.calls[0];
    expect(url).toBe("https://slack.com/api/chat.postMessage");
    expect(JSON.parse(String(init?.body))).toMatchObject({ channel: "#builds", mrkdwn: true });
  });

  it("needs a webhook or a token", () => {
    expect(() => new SlackClient({})).toThrow("SlackClient needs a webhook URL or a bot token");
  });
});
