/**
 * Jaccard name similarity
 *
 * Stateless set-overlap scoring for when no category corpus is at hand
 * (a single pair, or a pool too small for IDF to mean anything).
 */

import type { Product, TokenSet } from "../types/index.js";
import { tokenize } from "./tokenizer.js";

/** |a ∩ b| / |a ∪ b|, or 0 when either side is empty. */
export function jaccardSimilarity(a: TokenSet, b: TokenSet): number {
  if (a.size === 0 || b.size === 0) return 0;

  let intersection = 0;
  for (const token of a) {
    if (b.has(token)) intersection++;
  }
  const union = a.size + b.size - intersection;
  return union > 0 ? intersection / union : 0;
}

/**
 * Jaccard similarity of two product names, best match across languages
 * when both products carry a secondary name.
 */
export function jaccardNameSimilarity(reference: Product, candidate: Product): number {
  const primary = jaccardSimilarity(tokenize(reference.name), tokenize(candidate.name));

  if (reference.nameSecondary && candidate.nameSecondary) {
    const secondary = jaccardSimilarity(
      tokenize(reference.nameSecondary),
      tokenize(candidate.nameSecondary)
    );
    return Math.max(primary, secondary);
  }

  return primary;
}
