/**
 * BM25 Name Scoring
 *
 * Okapi BM25 over product-name token sets, used to compare a reference
 * product's name against each candidate in its category.
 *
 * - Inverse document frequency (rare words like "keto" outweigh "cookie")
 * - Document length normalization (long names neither favored nor punished)
 * - Binary term frequency: names are short, repeats carry no signal
 *
 * The corpus is one category's worth of names, so IDF is only meaningful
 * with a full candidate pool. Scores are normalized to 0-1 against the
 * best score the query could reach on the same document.
 */

import type { Bm25Model, TokenSet } from "../types/index.js";

// --- BM25 Parameters ---
export const K1 = 1.5;   // Term frequency saturation
export const B = 0.75;   // Length normalization strength

// --- Model ---

/**
 * Build corpus statistics from a set of tokenized documents.
 *
 * IDF: ln((N - df + 0.5) / (df + 0.5) + 1), never negative.
 */
export function buildBm25Model(documents: Iterable<TokenSet>): Bm25Model {
  const docFreq = new Map<string, number>(); // term -> number of docs containing it
  let totalDocs = 0;
  let totalLength = 0;

  for (const doc of documents) {
    totalDocs++;
    totalLength += doc.size;
    for (const term of doc) {
      docFreq.set(term, (docFreq.get(term) ?? 0) + 1);
    }
  }

  const idf = new Map<string, number>();
  for (const [term, df] of docFreq) {
    idf.set(term, Math.log((totalDocs - df + 0.5) / (df + 0.5) + 1));
  }

  return {
    idf,
    avgDocLength: totalDocs > 0 ? totalLength / totalDocs : 1.0,
    documentCount: totalDocs,
  };
}

// --- Scoring ---

/**
 * Score a query token set against one document token set.
 *
 * @param k1 - Term frequency saturation
 * @param b - Length normalization strength
 * @returns Normalized score in [0, 1]
 */
export function bm25Score(
  query: TokenSet | null | undefined,
  doc: TokenSet | null | undefined,
  model: Bm25Model,
  k1: number = K1,
  b: number = B
): number {
  if (!query || !doc || query.size === 0 || doc.size === 0) return 0;

  // Every document in the corpus was empty: avoid dividing by zero
  const avgDl = model.avgDocLength || 1;
  const tf = 1;
  const denominator = tf + k1 * (1 - b + b * (doc.size / avgDl));
  const termWeight = (tf * (k1 + 1)) / denominator;

  let score = 0;
  let maxScore = 0;

  for (const term of query) {
    const idf = model.idf.get(term);
    if (idf === undefined) continue;

    maxScore += idf * termWeight;
    if (doc.has(term)) {
      score += idf * termWeight;
    }
  }

  if (maxScore <= 0) return 0;
  return Math.min(score / maxScore, 1.0);
}
