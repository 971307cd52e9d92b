/**
 * Substitute Ranker
 *
 * Filters a category pool down to in-stock candidates, builds one BM25
 * corpus over the reference plus every survivor, scores each candidate
 * and returns the top-N ids.
 *
 * Pure and synchronous: no I/O, no state kept between calls. The corpus
 * is rebuilt on every call so price and stock changes are never stale.
 */

import type { Product, RankResult, ScoredCandidate, TokenSet } from "../types/index.js";
import { buildBm25Model } from "./bm25.js";
import { scoreCandidate } from "./product-similarity.js";
import { productDocuments } from "./tokenizer.js";

/** Candidates that may be offered as substitutes: not the reference, in stock. */
export function eligibleCandidates(reference: Product, candidates: readonly Product[]): Product[] {
  return candidates.filter((p) => p.id !== reference.id && p.quantity > 0);
}

/**
 * Rank a candidate pool against a reference product.
 *
 * Ties keep pool order (Array.prototype.sort is stable).
 *
 * @throws RangeError when limit is not a non-negative integer
 */
export function rankSimilarProducts(
  reference: Product,
  candidates: readonly Product[],
  limit: number
): RankResult {
  if (!Number.isInteger(limit) || limit < 0) {
    throw new RangeError(`limit must be a non-negative integer, got ${limit}`);
  }

  const pool = eligibleCandidates(reference, candidates);
  if (pool.length === 0) {
    return { status: "empty", ids: [], matches: [], eligibleCount: 0 };
  }

  const documents: TokenSet[] = [...productDocuments(reference)];
  for (const candidate of pool) {
    documents.push(...productDocuments(candidate));
  }
  const model = buildBm25Model(documents);

  const scored: ScoredCandidate[] = pool.map((candidate) => ({
    id: candidate.id,
    name: candidate.name,
    score: scoreCandidate(reference, candidate, model),
  }));
  scored.sort((a, b) => b.score - a.score);

  const matches = scored.slice(0, limit);
  return {
    status: "ranked",
    ids: matches.map((m) => m.id),
    matches,
    eligibleCount: pool.length,
  };
}

/** Ordered substitute ids, best first, at most `limit`. */
export function rank(reference: Product, candidates: readonly Product[], limit: number): string[] {
  return rankSimilarProducts(reference, candidates, limit).ids;
}
