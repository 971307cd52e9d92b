/**
 * POST /webhook/enrich
 *
 * Called by a Klaviyo back-in-stock flow with { email, ProductID, ... }.
 * Stores substitute product ids on the customer's profile.
 *
 * 200 { status: "success", similar_products_count, timestamp, duration_ms }
 */

import type { FastifyInstance } from "fastify";
import { v4 as uuidv4 } from "uuid";
import { EnrichWebhookBodySchema } from "../schemas/enrich-profile.js";
import { createLogger, hashEmail } from "../services/logger.js";
import type { SimilarProductsService } from "../services/similar-products-service.js";
import { errorBody, isJsonObject, timestamp } from "./responses.js";

const log = createLogger("webhooks.enrich");

export function registerEnrichRoute(app: FastifyInstance, service: SimilarProductsService): void {
  app.post("/webhook/enrich", async (request, reply) => {
    const startTime = Date.now();
    const requestId = uuidv4();

    if (!isJsonObject(request.body)) {
      return reply.code(400).send(errorBody("No data", false));
    }

    const parsed = EnrichWebhookBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send(errorBody("Missing email or ProductID", false));
    }

    const { email, ProductID: productId } = parsed.data;
    const result = await service.enrichProfile(email, productId);
    const durationMs = Date.now() - startTime;

    if (!result.success) {
      log.error("Enrichment failed", {
        request_id: requestId,
        user_hash: hashEmail(email),
        product_id: productId,
        error: result.error,
      });
      return reply.code(500).send(errorBody(result.error ?? "Enrichment failed"));
    }

    log.info("Webhook enrichment completed", {
      request_id: requestId,
      user_hash: hashEmail(email),
      product_id: productId,
      similar_count: result.similarCount,
      duration_ms: durationMs,
    });

    return reply.code(200).send({
      status: "success",
      similar_products_count: result.similarCount,
      timestamp: timestamp(),
      duration_ms: durationMs,
    });
  });
}
