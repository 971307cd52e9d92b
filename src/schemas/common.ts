/**
 * Common Zod schemas shared across tools and webhooks
 */

import { z } from "zod";

/**
 * Non-negative integer
 */
export const NonNegativeIntSchema = z.number().int().nonnegative();

/**
 * Product id as sent by Klaviyo flows: string or number, normalized to string
 */
export const ProductIdSchema = z
  .union([z.string(), z.number().int().nonnegative()])
  .transform((val) => String(val).trim())
  .pipe(z.string().min(1, "Product id cannot be empty"));

/**
 * Customer e-mail. Only presence is checked; Klaviyo is the authority on format.
 */
export const EmailSchema = z.string().trim().min(1, "email is required");
