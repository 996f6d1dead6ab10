import http from "http";
import { createContainer } from "./container";
import { loadConfig } from "./lib/config";
import { errorMessage } from "./lib/errors";
import { createRouter } from "./routes";
import { createBuildFailureHandler } from "./webhooks/build-failure";
import { BodyTooLargeError, json, sendResult, toInboundRequest } from "./webhooks/http";
import { createLicenseScanHandler } from "./webhooks/license-scan";
import { createPullRequestHandler } from "./webhooks/pull-request";

// --- Configuration ---
const config = loadConfig();
const container = createContainer(config);

console.log(`[Server] Model backend: ${config.ai.enabled ? `${config.ai.backend} (${config.ai.model})` : "disabled"}`);
console.log(`[Server] WEBHOOK_SECRET: ${config.webhooks.secret ? "SET" : "NOT SET"}`);
console.log(`[Server] GITHUB_WEBHOOK_SECRET: ${config.webhooks.githubSecret ? "SET" : "NOT SET"}`);

// --- Routes ---
const router = createRouter({
  ledger: container.ledger,
  buildFailure: createBuildFailureHandler({
    pipeline: container.pipeline,
    delivery: container.delivery,
    secret: config.webhooks.secret,
    destinations: container.destinations,
  }),
  licenseScan: createLicenseScanHandler({
    pipeline: container.pipeline,
    delivery: container.delivery,
    secret: config.webhooks.secret,
    destinations: container.destinations,
  }),
  github: createPullRequestHandler({
    pipeline: container.pipeline,
    delivery: container.delivery,
    secret: config.webhooks.githubSecret,
    github: container.github,
    destinations: container.destinations,
  }),
});

// --- HTTP bridge ---
const server = http.createServer((req, res) => {
  const handle = async () => {
    try {
      const request = await toInboundRequest(req);
      const result = await router(request);
      console.log(`[Server] ${request.method} ${request.path} -> ${result.status}`);
      sendResult(res, result);
    } catch (error) {
      if (error instanceof BodyTooLargeError) {
        sendResult(res, json(413, { error: error.message }));
        return;
      }
      console.error("[Server] Unhandled request error:", errorMessage(error));
      sendResult(res, json(500, { error: "Internal error" }));
    }
  };
  void handle();
});

server.listen(config.port, () => {
  console.log(`[Server] Listening on port ${config.port}`);
});

// --- Shutdown ---
const shutdown = (signal: string) => {
  console.log(`[Server] ${signal} received, draining`);
  server.close(() => {
    container.idempotency.destroy();
    container.ledger
      .flush()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error("[Ledger] Flush failed during shutdown:", errorMessage(error));
        process.exit(1);
      });
  });
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
