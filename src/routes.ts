import { z } from "zod/v4";
import { formatCostReport, type CostLedger } from "@/lib/cost-ledger";
import { errorMessage } from "@/lib/errors";
import { json, type Handler } from "@/webhooks/http";

export interface RouterDeps {
  buildFailure: Handler;
  licenseScan: Handler;
  github: Handler;
  ledger: CostLedger;
}

const periodSchema = z.enum(["daily", "weekly", "monthly", "all"]).default("monthly");

/** Dispatch by path. Handlers own their method checks. */
export function createRouter(deps: RouterDeps): Handler {
  const usage: Handler = async (request) => {
    if (request.method !== "GET") return json(405, { error: "Method not allowed" });

    const period = z.safeParse(periodSchema, request.query.get("period") ?? undefined);
    if (!period.success) {
      return json(400, { error: "period must be daily, weekly, monthly or all" });
    }
    try {
      const aggregate = await deps.ledger.aggregate(period.data);
      return json(200, { ...aggregate, text: formatCostReport(aggregate) });
    } catch (error) {
      console.error("[Ledger] Failed to aggregate usage:", errorMessage(error));
      return json(500, { error: "Internal error" });
    }
  };

  const routes = new Map<string, Handler>([
    ["/healthz", async () => json(200, { status: "ok" })],
    ["/webhooks/build-failure", deps.buildFailure],
    ["/webhooks/license-scan", deps.licenseScan],
    ["/webhooks/github", deps.github],
    ["/usage", usage],
  ]);

  return async (request) => {
    const handler = routes.get(request.path);
    if (!handler) return json(404, { error: "Not found" });
    return handler(request);
  };
}
