import { createHash } from "crypto";
import { z } from "zod/v4";
import type { AnalysisPipeline } from "@/analysis/pipeline";
import type { DeliveryService, Destination } from "@/delivery";
import { requireSignature } from "@/lib/signature";
import { SignatureInvalidError, errorMessage } from "@/lib/errors";
import { json, type Handler } from "./http";

const buildFailureSchema = z.object({
  log: z.string().min(1, "log is required"),
  repo: z.string().min(1),
  branch: z.string().min(1),
  build_url: z.url(),
  commit: z.string().min(1).optional(),
  event_id: z.string().min(1).max(200).optional(),
});

export type BuildFailurePayload = z.infer<typeof buildFailureSchema>;

export interface BuildFailureHandlerDeps {
  pipeline: Pick<AnalysisPipeline, "run">;
  delivery: DeliveryService;
  /** Shared secret the CI notifier signs with; unset disables the endpoint */
  secret: string | undefined;
  destinations: Destination[];
}

export function createBuildFailureHandler(deps: BuildFailureHandlerDeps): Handler {
  return async (request) => {
    if (request.method !== "POST") {
      return json(405, { error: "Method not allowed" });
    }

    if (!deps.secret) {
      return json(503, { error: "Build-failure webhook is not configured" });
    }

    // --- Signature verification (raw bytes, before any parsing) ---
    const signature = request.headers["x-signature-256"] ?? request.headers["x-hub-signature-256"];
    try {
      requireSignature(deps.secret, request.body, signature);
    } catch (error) {
      if (!(error instanceof SignatureInvalidError)) throw error;
      console.warn(`[Webhook] Rejected build-failure event: ${error.message}`);
      return json(401, { error: error.message });
    }

    // --- Payload ---
    let raw: unknown;
    try {
      raw = JSON.parse(request.body.toString("utf-8"));
    } catch {
      return json(400, { error: "Invalid JSON" });
    }

    const parsed = z.safeParse(buildFailureSchema, raw);
    if (!parsed.success) {
      return json(422, {
        error: "Invalid payload",
        issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
    }
    const payload = parsed.data;

    const eventId =
      request.headers["x-delivery-id"] ??
      payload.event_id ??
      createHash("sha256").update(request.body).digest("hex");

    if (deps.delivery.allDelivered(eventId, deps.destinations)) {
      console.log(`[Webhook] Event ${eventId} already delivered; skipping analysis`);
      return json(200, { eventId, duplicate: true });
    }

    try {
      const { report } = await deps.pipeline.run({
        task: "build-log",
        artifactId: `${payload.repo}@${payload.branch}`,
        text: payload.log,
      });

      const context = {
        link: payload.build_url,
        repo: payload.repo,
        branch: payload.branch,
        commit: payload.commit,
      };
      const { results, failures } = await deps.delivery.deliverAll(report, deps.destinations, eventId, context);

      const body = {
        eventId,
        runId: report.runId,
        path: report.path,
        aiAssisted: report.aiAssisted,
        findings: report.findings.length,
        deliveries: results.map((r) => ({ key: r.key, delivered: r.delivered, duplicate: r.duplicate })),
        failed: failures,
      };
      return json(failures.length > 0 ? 502 : 200, body);
    } catch (error) {
      console.error(`[Webhook] Build-failure event ${eventId} failed:`, errorMessage(error));
      return json(500, { error: "Internal error" });
    }
  };
}
