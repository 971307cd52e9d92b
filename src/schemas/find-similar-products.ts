/**
 * Zod schema for find_similar_products tool parameters
 */

import { z } from "zod";
import { NonNegativeIntSchema, ProductIdSchema } from "./common.js";

/**
 * @param product_id - Required. Product the customer is waiting for.
 * @param limit - Optional. Number of substitutes (default SIMILAR_PRODUCTS_LIMIT).
 */
export const FindSimilarProductsParamsSchema = z.object({
  product_id: ProductIdSchema,
  limit: NonNegativeIntSchema.max(100).optional(),
});

export type FindSimilarProductsParams = z.infer<typeof FindSimilarProductsParamsSchema>;
