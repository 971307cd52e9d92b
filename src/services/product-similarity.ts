/**
 * Product Similarity Scoring
 *
 * Composite score deciding how good a substitute a candidate is:
 *   60% name similarity (BM25 against the category corpus)
 *   30% price proximity (same price point, same segment)
 *   10% manufacturer match
 *
 * Missing price or manufacturer data is not imputed: a candidate without
 * either tops out at 0.60.
 */

import type { Bm25Model, Product } from "../types/index.js";
import { bm25Score } from "./bm25.js";
import { jaccardNameSimilarity } from "./jaccard.js";
import { tokenize } from "./tokenizer.js";

export const WEIGHTS = {
  NAME: 0.6,
  PRICE: 0.3,
  MANUFACTURER: 0.1,
} as const;

// Relative price difference tiers
const PRICE_TIERS = {
  CLOSE: 0.2,   // within 20% -> 1.0
  NEAR: 0.5,    // within 50% -> 0.5
} as const;

/**
 * Tiered price proximity, with the reference price as the base.
 */
export function priceSimilarity(referencePrice: number, candidatePrice: number): number {
  const diff = Math.abs(referencePrice - candidatePrice) / referencePrice;

  if (diff <= PRICE_TIERS.CLOSE) return 1.0;
  if (diff <= PRICE_TIERS.NEAR) return 0.5;
  return 0.2;
}

function hasPositivePrice(product: Product): product is Product & { price: number } {
  return typeof product.price === "number" && product.price > 0;
}

export function manufacturerMatches(reference: Product, candidate: Product): boolean {
  if (!reference.manufacturerName || !candidate.manufacturerName) return false;
  return reference.manufacturerName.toLowerCase() === candidate.manufacturerName.toLowerCase();
}

/**
 * BM25 name similarity against a shared corpus model.
 *
 * Secondary-language names were folded into the same corpus, so the
 * secondary pair is scored with the same model and the better language wins.
 */
export function bm25NameSimilarity(reference: Product, candidate: Product, model: Bm25Model): number {
  const primary = bm25Score(tokenize(reference.name), tokenize(candidate.name), model);

  if (reference.nameSecondary && candidate.nameSecondary) {
    const secondary = bm25Score(
      tokenize(reference.nameSecondary),
      tokenize(candidate.nameSecondary),
      model
    );
    return Math.max(primary, secondary);
  }

  return primary;
}

function weightedScore(reference: Product, candidate: Product, nameScore: number): number {
  let score = nameScore * WEIGHTS.NAME;

  if (hasPositivePrice(reference) && hasPositivePrice(candidate)) {
    score += priceSimilarity(reference.price, candidate.price) * WEIGHTS.PRICE;
  }

  if (manufacturerMatches(reference, candidate)) {
    score += WEIGHTS.MANUFACTURER;
  }

  return score;
}

/**
 * Composite substitute score of one candidate, 0-1.
 */
export function scoreCandidate(reference: Product, candidate: Product, model: Bm25Model): number {
  return weightedScore(reference, candidate, bm25NameSimilarity(reference, candidate, model));
}

/**
 * Composite score without a corpus: Jaccard stands in for BM25.
 */
export function calculateProductSimilarity(reference: Product, candidate: Product): number {
  return weightedScore(reference, candidate, jaccardNameSimilarity(reference, candidate));
}
