import type { Report } from "@/analysis/types";
import { DeliveryError, errorMessage } from "@/lib/errors";
import type { IdempotencyStore } from "@/lib/idempotency";
import { formatConsole, type DeliveryContext } from "./format";
import type { GitHubClient } from "./github";
import type { SlackClient } from "./slack";

export type { DeliveryContext } from "./format";

export type Destination =
  | { kind: "console" }
  | { kind: "slack"; channel?: string }
  | { kind: "pr-comment"; repo: string; pullNumber: number };

export interface DeliveryResult {
  key: string;
  delivered: boolean;
  /** An earlier delivery for the same event and destination already won */
  duplicate: boolean;
}

export interface DeliveryTargets {
  slack?: SlackClient | null;
  github?: GitHubClient | null;
  /** Console sink; defaults to console.log */
  write?: (text: string) => void;
}

export function destinationKey(destination: Destination): string {
  switch (destination.kind) {
    case "console":
      return "console";
    case "slack":
      return `slack:${destination.channel ?? "default"}`;
    case "pr-comment":
      return `pr:${destination.repo}#${destination.pullNumber}`;
  }
}

/**
 * Sends reports and suppresses repeats per (event id, destination).
 *
 * The first delivery for a key wins. A concurrent or later attempt for the
 * same key is skipped as a duplicate even if its findings differ. A failed
 * send releases the key so the sender's retry can deliver.
 */
export class DeliveryService {
  private readonly write: (text: string) => void;

  constructor(
    private readonly targets: DeliveryTargets,
    private readonly idempotency: IdempotencyStore
  ) {
    this.write = targets.write ?? ((text) => console.log(text));
  }

  /** True when every destination already holds a completed delivery for the event. */
  allDelivered(eventId: string, destinations: Destination[]): boolean {
    return (
      destinations.length > 0 &&
      destinations.every((d) => this.idempotency.isDone(`${eventId}:${destinationKey(d)}`))
    );
  }

  async deliver(
    report: Report,
    destination: Destination,
    eventId: string,
    context: DeliveryContext = {}
  ): Promise<DeliveryResult> {
    const key = `${eventId}:${destinationKey(destination)}`;

    if (!this.idempotency.claim(key)) {
      console.log(`[Delivery] Skipping duplicate delivery ${key} (run ${report.runId})`);
      return { key, delivered: false, duplicate: true };
    }

    try {
      await this.send(report, destination, context);
      this.idempotency.complete(key);
      console.log(`[Delivery] Delivered run ${report.runId} to ${destinationKey(destination)}`);
      return { key, delivered: true, duplicate: false };
    } catch (error) {
      this.idempotency.release(key);
      if (error instanceof DeliveryError) throw error;
      throw new DeliveryError(destination.kind, `Delivery to ${destinationKey(destination)} failed: ${errorMessage(error)}`);
    }
  }

  /** Deliver to each destination in turn; one failing destination does not stop the rest. */
  async deliverAll(
    report: Report,
    destinations: Destination[],
    eventId: string,
    context: DeliveryContext = {}
  ): Promise<{ results: DeliveryResult[]; failures: string[] }> {
    const results: DeliveryResult[] = [];
    const failures: string[] = [];
    for (const destination of destinations) {
      try {
        results.push(await this.deliver(report, destination, eventId, context));
      } catch (error) {
        console.error(`[Delivery] ${errorMessage(error)}`);
        failures.push(destinationKey(destination));
      }
    }
    return { results, failures };
  }

  private async send(report: Report, destination: Destination, context: DeliveryContext): Promise<void> {
    switch (destination.kind) {
      case "console":
        this.write(formatConsole(report, context));
        return;
      case "slack":
        if (!this.targets.slack) throw new DeliveryError("slack", "Slack is not configured");
        await this.targets.slack.postReport(report, context, destination.channel);
        return;
      case "pr-comment":
        if (!this.targets.github) throw new DeliveryError("pr-comment", "GitHub token is not configured");
        await this.targets.github.postReport(report, context, destination.repo, destination.pullNumber);
        return;
    }
  }
}
