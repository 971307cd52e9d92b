/**
 * Webhook HTTP application
 *
 * Routes:
 *   POST /webhook/enrich   (X-Webhook-Token required)
 *   POST /webhook/cleanup  (X-Webhook-Token required)
 *   GET  /health
 */

import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import { diagnostics } from "../diagnostics/channels.js";
import { createLogger } from "../services/logger.js";
import type { SimilarProductsService } from "../services/similar-products-service.js";
import { validateWebhookSecret, WEBHOOK_TOKEN_HEADER } from "./auth.js";
import { registerCleanupRoute } from "./cleanup.js";
import { registerEnrichRoute } from "./enrich.js";
import { errorBody } from "./responses.js";

const log = createLogger("webhooks");

export interface WebhookAppOptions {
  service: SimilarProductsService;
  webhookSecret: string;
}

export function buildWebhookApp(options: WebhookAppOptions): FastifyInstance {
  const { service, webhookSecret } = options;

  // Structured logging goes through our own logger, not fastify's
  const app = Fastify({ logger: false });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Body parser rejections (empty or malformed JSON) read as "no data"
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.code(400).send(errorBody("No data", false));
    }

    diagnostics.publishError(error, `http ${request.method} ${request.url}`);
    log.error("Unexpected error in webhook", { path: request.url, error: error.message });
    return reply.code(500).send(errorBody("Internal server error"));
  });

  // The hook is scoped to this plugin, so it guards the matched webhook
  // routes however the request path was spelled
  app.register(async (webhooks) => {
    // Runs before body parsing: unauthenticated callers never reach the parser
    webhooks.addHook("onRequest", async (request, reply) => {
      if (!validateWebhookSecret(request.headers[WEBHOOK_TOKEN_HEADER], webhookSecret)) {
        log.warn("Unauthorized webhook attempt", { ip: request.ip, path: request.url });
        return reply.code(401).send(errorBody("Unauthorized", false));
      }
    });

    registerEnrichRoute(webhooks, service);
    registerCleanupRoute(webhooks, service);
  });

  app.get("/health", async (_request, reply) => {
    return reply.code(200).send({ status: "healthy" });
  });

  return app;
}
