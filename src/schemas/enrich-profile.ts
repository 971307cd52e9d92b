/**
 * Zod schemas for profile enrichment: MCP tool params and the Klaviyo
 * flow webhook body
 */

import { z } from "zod";
import { EmailSchema, ProductIdSchema } from "./common.js";

export const EnrichProfileParamsSchema = z.object({
  email: EmailSchema,
  product_id: ProductIdSchema,
});

export type EnrichProfileParams = z.infer<typeof EnrichProfileParamsSchema>;

/**
 * Webhook body. Klaviyo sends the whole event (ProductName, ImageURL, ...);
 * only email and ProductID are read.
 */
export const EnrichWebhookBodySchema = z
  .object({
    email: EmailSchema,
    ProductID: ProductIdSchema,
  })
  .passthrough();

export type EnrichWebhookBody = z.infer<typeof EnrichWebhookBodySchema>;
