/**
 * Zod schemas for profile cleanup
 *
 * Without a product id, every stored substitute list is removed.
 */

import { z } from "zod";
import { EmailSchema, ProductIdSchema } from "./common.js";

export const CleanupProfileParamsSchema = z.object({
  email: EmailSchema,
  product_id: ProductIdSchema.optional(),
});

export type CleanupProfileParams = z.infer<typeof CleanupProfileParamsSchema>;

export const CleanupWebhookBodySchema = z
  .object({
    email: EmailSchema,
    // Klaviyo templates render a missing value as null or ""
    ProductID: z.union([ProductIdSchema, z.literal(""), z.null()]).optional()
      .transform((val) => (val === null || val === "" ? undefined : val)),
  })
  .passthrough();

export type CleanupWebhookBody = z.infer<typeof CleanupWebhookBodySchema>;
