import { z } from "zod/v4";
import type { Report } from "@/analysis/types";
import { DeliveryError } from "@/lib/errors";
import { formatSlack, type DeliveryContext } from "./format";

const SLACK_POST_MESSAGE_URL = "https://slack.com/api/chat.postMessage";
const SEND_TIMEOUT_MS = 10_000;

const postMessageResponseSchema = z.object({
  ok: z.boolean(),
  error: z.string().optional(),
});

export interface SlackOptions {
  /** Incoming webhook; takes precedence over the bot token */
  webhookUrl?: string;
  botToken?: string;
  defaultChannel?: string;
  fetchImpl?: typeof fetch;
}

/**
 * Posts a report to Slack through an incoming webhook, or through
 * `chat.postMessage` with a bot token.
 */
export class SlackClient {
  private readonly webhookUrl: string | null;
  private readonly botToken: string | null;
  private readonly defaultChannel: string | null;
  private readonly fetchImpl: typeof fetch;

  constructor(options: SlackOptions) {
    this.webhookUrl = options.webhookUrl ?? null;
    this.botToken = options.botToken ?? null;
    this.defaultChannel = options.defaultChannel ?? null;
    this.fetchImpl = options.fetchImpl ?? fetch;
    if (!this.webhookUrl && !this.botToken) {
      throw new Error("SlackClient needs a webhook URL or a bot token");
    }
  }

  async postReport(report: Report, context: DeliveryContext, channel?: string): Promise<void> {
    const text = formatSlack(report, context);

    if (this.webhookUrl) {
      const res = await this.fetchImpl(this.webhookUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ text }),
        signal: AbortSignal.timeout(SEND_TIMEOUT_MS),
      });
      if (!res.ok) {
        throw new DeliveryError("slack", `Slack webhook returned ${res.status}`, res.status);
      }
      return;
    }

    const target = channel ?? this.defaultChannel;
    if (!target) throw new DeliveryError("slack", "No Slack channel configured");

    const res = await this.fetchImpl(SLACK_POST_MESSAGE_URL, {
      method: "POST",
      headers: {
        "Content-Type": "application/json; charset=utf-8",
        Authorization: `Bearer ${this.botToken}`,
      },
      body: JSON.stringify({ channel: target, text, mrkdwn: true, unfurl_links: false }),
      signal: AbortSignal.timeout(SEND_TIMEOUT_MS),
    });
    if (!res.ok) {
      throw new DeliveryError("slack", `chat.postMessage returned ${res.status}`, res.status);
    }
    const parsed = postMessageResponseSchema.safeParse(await res.json());
    if (!parsed.success || !parsed.data.ok) {
      const reason = parsed.success ? parsed.data.error ?? "unknown_error" : "unexpected response";
      throw new DeliveryError("slack", `chat.postMessage failed: ${reason}`);
    }
  }
}
