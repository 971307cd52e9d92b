/**
 * E-commerce platform adapter contract.
 *
 * One implementation per shop platform. Only PrestaShop exists today; the
 * service depends on this interface alone.
 */

import type { Product } from "../types/index.js";

export class EcommerceApiError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "EcommerceApiError";
    this.status = status;
  }
}

export interface EcommerceAdapter {
  /**
   * Fetch a single product.
   * @returns null when the platform reports it does not exist
   * @throws EcommerceApiError on transport or HTTP failure
   */
  getProduct(productId: string): Promise<Product | null>;

  /**
   * Fetch up to `limit` products whose default category is `categoryId`,
   * with stock quantities filled in.
   * @throws EcommerceApiError on transport or HTTP failure
   */
  getProductsByCategory(categoryId: string, limit?: number): Promise<Product[]>;

  /** Whether the platform API is reachable with these credentials */
  healthCheck(): Promise<boolean>;
}
