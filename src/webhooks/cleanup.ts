/**
 * POST /webhook/cleanup
 *
 * Called after the notification e-mail went out. Removes one product's
 * substitutes, or all of them when ProductID is omitted.
 */

import type { FastifyInstance } from "fastify";
import { v4 as uuidv4 } from "uuid";
import { CleanupWebhookBodySchema } from "../schemas/cleanup-profile.js";
import { createLogger, hashEmail } from "../services/logger.js";
import type { SimilarProductsService } from "../services/similar-products-service.js";
import { errorBody, isJsonObject, timestamp } from "./responses.js";

const log = createLogger("webhooks.cleanup");

export function registerCleanupRoute(app: FastifyInstance, service: SimilarProductsService): void {
  app.post("/webhook/cleanup", async (request, reply) => {
    if (!isJsonObject(request.body)) {
      return reply.code(400).send(errorBody("No data", false));
    }

    const parsed = CleanupWebhookBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send(errorBody("Missing email", false));
    }

    const { email, ProductID: productId } = parsed.data;
    const requestId = uuidv4();
    const success = await service.cleanupProfile(email, productId);

    if (!success) {
      log.error("Cleanup failed", { request_id: requestId, user_hash: hashEmail(email), product_id: productId ?? "all" });
      return reply.code(500).send(errorBody("Cleanup failed"));
    }

    log.info("Webhook cleanup completed", { request_id: requestId, user_hash: hashEmail(email), product_id: productId ?? "all" });
    return reply.code(200).send({ status: "success", timestamp: timestamp() });
  });
}
