/**
 * Start the webhook HTTP listener
 */

import { getConfig } from "../services/config.js";
import { createLogger } from "../services/logger.js";
import { initializeService } from "../services/startup.js";
import { buildWebhookApp } from "./app.js";

const log = createLogger("webhooks.serve");

export async function runWebhookServer(): Promise<void> {
  const config = getConfig();
  const service = initializeService(config);
  const app = buildWebhookApp({ service, webhookSecret: config.webhookSecret });

  const address = await app.listen({ port: config.port, host: config.host });
  log.info("Webhook server listening", { address });

  const shutdown = (signal: string): void => {
    log.info("Shutting down", { signal });
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error("Error during shutdown", { error: error instanceof Error ? error.message : String(error) });
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}
