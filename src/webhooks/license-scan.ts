import { createHash } from "crypto";
import { z } from "zod/v4";
import type { AnalysisPipeline } from "@/analysis/pipeline";
import type { DeliveryService, Destination } from "@/delivery";
import { requireSignature } from "@/lib/signature";
import { SignatureInvalidError, errorMessage } from "@/lib/errors";
import { json, type Handler } from "./http";

const licenseScanSchema = z.object({
  source: z.string().min(1, "source is required"),
  source_name: z.string().min(1),
  scanner_report: z.string().min(1, "scanner_report is required"),
  scan_url: z.url().optional(),
  event_id: z.string().min(1).max(200).optional(),
});

export type LicenseScanPayload = z.infer<typeof licenseScanSchema>;

export interface LicenseScanHandlerDeps {
  pipeline: Pick<AnalysisPipeline, "run">;
  delivery: DeliveryService;
  /** Shared secret the scanner job signs with; unset disables the endpoint */
  secret: string | undefined;
  destinations: Destination[];
}

/**
 * Reviews one source file against its scanner report. The file text is the
 * artifact; the report supplies the referenced lines and the notes shown to
 * the model.
 */
export function createLicenseScanHandler(deps: LicenseScanHandlerDeps): Handler {
  return async (request) => {
    if (request.method !== "POST") {
      return json(405, { error: "Method not allowed" });
    }

    if (!deps.secret) {
      return json(503, { error: "License-scan webhook is not configured" });
    }

    try {
      requireSignature(deps.secret, request.body, request.headers["x-signature-256"]);
    } catch (error) {
      if (!(error instanceof SignatureInvalidError)) throw error;
      console.warn(`[Webhook] Rejected license-scan event: ${error.message}`);
      return json(401, { error: error.message });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(request.body.toString("utf-8"));
    } catch {
      return json(400, { error: "Invalid JSON" });
    }

    const parsed = z.safeParse(licenseScanSchema, raw);
    if (!parsed.success) {
      return json(422, {
        error: "Invalid payload",
        issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
    }
    const payload: LicenseScanPayload = parsed.data;

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
        task: "license-scan",
        artifactId: payload.source_name,
        text: payload.source,
        sourceName: payload.source_name,
        scannerReport: payload.scanner_report,
      });

      const { results, failures } = await deps.delivery.deliverAll(report, deps.destinations, eventId, {
        link: payload.scan_url,
      });

      return json(failures.length > 0 ? 502 : 200, {
        eventId,
        runId: report.runId,
        path: report.path,
        aiAssisted: report.aiAssisted,
        findings: report.findings.length,
        reviewRequired: report.reviewRequired,
        deliveries: results.map((r) => ({ key: r.key, delivered: r.delivered, duplicate: r.duplicate })),
        failed: failures,
      });
    } catch (error) {
      console.error(`[Webhook] License-scan event ${eventId} failed:`, errorMessage(error));
      return json(500, { error: "Internal error" });
    }
  };
}
