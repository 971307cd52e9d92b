/**
 * Similar Products Types
 */

/**
 * Universal product representation across e-commerce platforms.
 *
 * Carries only the fields the similarity engine needs. Images and URLs
 * live in the Klaviyo catalog, not here.
 */
export interface Product {
  readonly id: string;
  /** Primary name (first shop language) */
  readonly name: string;
  readonly categoryId: string;
  /** Stock count. Pre-filter only, never scored. */
  readonly quantity: number;
  readonly price?: number;
  readonly manufacturerName?: string;
  /** Second-language name, when the shop has one */
  readonly nameSecondary?: string;
  readonly sku?: string;
}

// Token set produced by the tokenizer
export type TokenSet = ReadonlySet<string>;

/**
 * Corpus statistics for one ranking request.
 * Built fresh per call and thrown away afterwards.
 */
export interface Bm25Model {
  readonly idf: ReadonlyMap<string, number>;
  readonly avgDocLength: number;
  readonly documentCount: number;
}

export interface ScoredCandidate {
  id: string;
  name: string;
  score: number;
}

/**
 * Outcome of one ranking call.
 *
 * "empty" is the only non-error terminal state: no candidate survived
 * the stock and self filters. Defects in the input throw instead.
 */
export type RankResult =
  | { status: "ranked"; ids: string[]; matches: ScoredCandidate[]; eligibleCount: number }
  | { status: "empty"; ids: []; matches: []; eligibleCount: 0 };

// One element of the bis_similar_products profile property
export interface SimilarProductEntry {
  product_id: string;
  similar_ids: string[];
  enriched_at: string;
}

export interface EnrichResult {
  success: boolean;
  similarCount: number;
  similarIds: string[];
  error: string | null;
}

export type LogLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR";
