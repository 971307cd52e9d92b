/**
 * Similar Products Service
 *
 * Orchestrates one recommendation:
 *   1. fetch the subscribed (out of stock) product from the shop
 *   2. fetch its category and rank in-stock substitutes
 *   3. store the ids on the customer's Klaviyo profile
 *
 * Ranking is pure; every I/O failure surfaces here and is turned into an
 * EnrichResult, never swallowed inside the ranking path.
 */

import type { EcommerceAdapter } from "../adapters/base.js";
import type { ProfileStore } from "../clients/klaviyo-client.js";
import { diagnostics } from "../diagnostics/channels.js";
import type { EnrichResult, Product, RankResult } from "../types/index.js";
import { createLogger, hashEmail } from "./logger.js";
import { rankSimilarProducts } from "./ranker.js";

const log = createLogger("services.similar_products");

export interface SimilarProductsServiceOptions {
  /** Substitutes returned per product */
  limit?: number;
  /** Category products fetched to build the BM25 corpus */
  poolLimit?: number;
  /** Clock for enriched_at stamps */
  now?: () => Date;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SimilarProductsService {
  readonly limit: number;
  readonly poolLimit: number;
  private readonly now: () => Date;

  constructor(
    private readonly catalog: EcommerceAdapter,
    private readonly profiles: ProfileStore,
    options: SimilarProductsServiceOptions = {}
  ) {
    this.limit = options.limit ?? 6;
    this.poolLimit = options.poolLimit ?? 100;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Rank substitutes for a product already fetched from the catalog.
   *
   * @throws on catalog failure; an empty category is not an error
   */
  async findSimilarProducts(reference: Product, limit: number = this.limit): Promise<RankResult> {
    const start = Date.now();
    const pool = await this.catalog.getProductsByCategory(reference.categoryId, this.poolLimit);

    log.info("Fetched category products", {
      product_id: reference.id,
      category_id: reference.categoryId,
      total_fetched: pool.length,
    });

    const result = rankSimilarProducts(reference, pool, limit);

    diagnostics.publishRank({
      productId: reference.id,
      categoryId: reference.categoryId,
      poolSize: pool.length,
      eligibleCount: result.eligibleCount,
      returnedCount: result.ids.length,
      durationMs: Date.now() - start,
    });

    if (result.status === "empty") {
      log.warn("No in-stock candidates found", {
        product_id: reference.id,
        category_id: reference.categoryId,
      });
      return result;
    }

    log.info("Top similar products", {
      product_id: reference.id,
      in_stock_count: result.eligibleCount,
      top_matches: result.matches.slice(0, 3).map((m) => ({
        id: m.id,
        name: m.name.slice(0, 50),
        score: Math.round(m.score * 1000) / 1000,
      })),
    });

    return result;
  }

  /**
   * Look up a product by id and rank its substitutes.
   * @returns null when the product does not exist
   */
  async findSimilarById(productId: string, limit: number = this.limit): Promise<{ product: Product; result: RankResult } | null> {
    const product = await this.catalog.getProduct(productId);
    if (!product) return null;
    return { product, result: await this.findSimilarProducts(product, limit) };
  }

  /**
   * Enrich a customer's profile with substitutes for a subscribed product.
   */
  async enrichProfile(email: string, productId: string): Promise<EnrichResult> {
    const userHash = hashEmail(email);

    try {
      const found = await this.findSimilarById(productId);
      if (!found) {
        log.warn("Product not found", { product_id: productId });
        return { success: false, similarCount: 0, similarIds: [], error: "Product not found" };
      }

      const { product, result } = found;
      log.info("Product found", {
        product_id: productId,
        product_name: product.name,
        category_id: product.categoryId,
      });

      if (result.ids.length === 0) {
        log.info("No similar products to add - skipping profile update", {
          user_hash: userHash,
          product_id: productId,
        });
        return { success: true, similarCount: 0, similarIds: [], error: null };
      }

      await this.profiles.addSimilarProducts(email, productId, result.ids, this.now().toISOString());

      log.info("Profile enriched successfully", {
        user_hash: userHash,
        product_id: productId,
        similar_count: result.ids.length,
      });
      return { success: true, similarCount: result.ids.length, similarIds: result.ids, error: null };
    } catch (error) {
      const message = errorMessage(error);
      diagnostics.publishError(error instanceof Error ? error : message, "enrich_profile");
      log.error("Error enriching profile", {
        user_hash: userHash,
        product_id: productId,
        error: message,
      });
      return { success: false, similarCount: 0, similarIds: [], error: message };
    }
  }

  /**
   * Remove substitutes from a profile: one product's entry, or all of them.
   */
  async cleanupProfile(email: string, productId?: string): Promise<boolean> {
    const context = { user_hash: hashEmail(email), product_id: productId ?? "all" };

    try {
      const removed = await this.profiles.removeSimilarProducts(email, productId);
      if (!removed) {
        // Nothing stored for this e-mail: already clean
        log.warn("Profile not found for cleanup", context);
        return true;
      }
      log.info("Profile cleaned up", context);
      return true;
    } catch (error) {
      const message = errorMessage(error);
      diagnostics.publishError(error instanceof Error ? error : message, "cleanup_profile");
      log.error("Error cleaning up profile", { ...context, error: message });
      return false;
    }
  }
}
