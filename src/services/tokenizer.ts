/**
 * Product Name Tokenizer
 *
 * Turns a raw product name into the set of keywords that carry meaning
 * for substitute matching. Quantities ("600g", "250 ml"), stop words and
 * tokens shorter than three characters are dropped.
 *
 * Stop words cover English and Polish since PrestaShop shops here run
 * bilingual catalogs.
 */

import type { TokenSet } from "../types/index.js";

export const STOP_WORDS: ReadonlySet<string> = new Set([
  // English
  "the", "and", "for", "with", "of", "in", "on", "at", "a", "an", "free",
  "pack", "mix", "set", "piece", "pieces", "bag", "box",
  // Polish
  "i", "na", "do", "z", "w", "o", "dla", "po", "ze", "od",
]);

const MIN_TOKEN_LENGTH = 3;

// Integer + optional single space + unit code, followed by whitespace or end
const QUANTITY_PATTERN = /\d+\s?(?:g|kg|ml|l|mg|szt|pcs|oz|lb)(?:\s|$)/g;

// Letters in any script (Polish diacritics included), digits, underscore
const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

/** Tokenize a product name into a set of significant keywords. */
export function tokenize(name: string | null | undefined): Set<string> {
  if (!name) return new Set();

  const text = name.toLowerCase().replace(QUANTITY_PATTERN, " ");
  const words = text.match(WORD_PATTERN) ?? [];

  const tokens = new Set<string>();
  for (const word of words) {
    // Code points, not UTF-16 units
    if ([...word].length < MIN_TOKEN_LENGTH || STOP_WORDS.has(word)) continue;
    tokens.add(word);
  }
  return tokens;
}

/**
 * All token sets a product contributes to a corpus: the primary name and,
 * when present, the secondary-language name.
 */
export function productDocuments(product: { name: string; nameSecondary?: string }): TokenSet[] {
  const docs: TokenSet[] = [tokenize(product.name)];
  if (product.nameSecondary) {
    docs.push(tokenize(product.nameSecondary));
  }
  return docs;
}
