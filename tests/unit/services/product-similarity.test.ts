import { describe, it, expect } from "vitest";
import {
  priceSimilarity,
  manufacturerMatches,
  bm25NameSimilarity,
  scoreCandidate,
  calculateProductSimilarity,
  WEIGHTS,
} from "../../../src/services/product-similarity.js";
import { buildBm25Model } from "../../../src/services/bm25.js";
import { productDocuments } from "../../../src/services/tokenizer.js";
import type { Product } from "../../../src/types/index.js";
import { makeProduct } from "../../fixtures/index.js";

function modelFor(products: Product[]) {
  return buildBm25Model(products.flatMap((p) => productDocuments(p)));
}

describe("product similarity", () => {
  describe("priceSimilarity", () => {
    it("scores within 20% as 1.0", () => {
      expect(priceSimilarity(10, 10)).toBe(1.0);
      expect(priceSimilarity(10, 8)).toBe(1.0);
      expect(priceSimilarity(10, 12)).toBe(1.0);
    });

    it("scores 20-50% as 0.5", () => {
      expect(priceSimilarity(10, 12.5)).toBe(0.5);
      expect(priceSimilarity(10, 15)).toBe(0.5);
      expect(priceSimilarity(10, 6)).toBe(0.5);
    });

    it("scores beyond 50% as 0.2", () => {
      expect(priceSimilarity(10, 16)).toBe(0.2);
      expect(priceSimilarity(10, 4)).toBe(0.2);
    });

    it("uses the reference price as the base", () => {
      // |10 - 20| / 10 = 1.0, but |20 - 10| / 20 = 0.5
      expect(priceSimilarity(10, 20)).toBe(0.2);
      expect(priceSimilarity(20, 10)).toBe(0.5);
    });
  });

  describe("manufacturerMatches", () => {
    it("matches case-insensitively", () => {
      const a = makeProduct({ id: "a", manufacturerName: "Bakery Co" });
      const b = makeProduct({ id: "b", manufacturerName: "BAKERY CO" });
      expect(manufacturerMatches(a, b)).toBe(true);
    });

    it("never matches missing or empty names", () => {
      const a = makeProduct({ id: "a", manufacturerName: "" });
      const b = makeProduct({ id: "b", manufacturerName: "" });
      const c = makeProduct({ id: "c" });
      expect(manufacturerMatches(a, b)).toBe(false);
      expect(manufacturerMatches(c, c)).toBe(false);
    });
  });

  describe("bm25NameSimilarity", () => {
    it("takes the better of primary and secondary names", () => {
      const ref = makeProduct({ id: "r", name: "Chocolate biscuits", nameSecondary: "Ciastka czekoladowe" });
      const cand = makeProduct({ id: "c", name: "Cocoa cookies", nameSecondary: "Ciastka czekoladowe" });
      expect(bm25NameSimilarity(ref, cand, modelFor([ref, cand]))).toBeCloseTo(1, 12);
    });

    it("uses the primary name only when one side lacks a secondary", () => {
      const ref = makeProduct({ id: "r", name: "Chocolate biscuits", nameSecondary: "Ciastka czekoladowe" });
      const cand = makeProduct({ id: "c", name: "Cocoa cookies" });
      expect(bm25NameSimilarity(ref, cand, modelFor([ref, cand]))).toBe(0);
    });
  });

  describe("scoreCandidate", () => {
    const reference = makeProduct({ id: "r", name: "Almond Flour", price: 20, manufacturerName: "Acme" });

    it("sums all three components to 1 for a perfect substitute", () => {
      const cand = makeProduct({ id: "c", name: "Almond Flour", price: 21, manufacturerName: "ACME" });
      expect(scoreCandidate(reference, cand, modelFor([reference, cand]))).toBeCloseTo(1.0, 12);
    });

    it("caps at the name weight without price or manufacturer data", () => {
      const ref = makeProduct({ id: "r", name: "Almond Flour" });
      const cand = makeProduct({ id: "c", name: "Almond Flour" });
      expect(scoreCandidate(ref, cand, modelFor([ref, cand]))).toBeCloseTo(WEIGHTS.NAME, 12);
    });

    it("skips price when the reference price is not positive", () => {
      const ref = makeProduct({ id: "r", name: "Almond Flour", price: 0 });
      const cand = makeProduct({ id: "c", name: "Almond Flour", price: 20 });
      expect(scoreCandidate(ref, cand, modelFor([ref, cand]))).toBeCloseTo(0.6, 12);
    });

    it("adds exactly 0.10 for a manufacturer match", () => {
      const withBrand = makeProduct({ id: "a", name: "Almond Flour Fine", price: 20, manufacturerName: "acme" });
      const withoutBrand = makeProduct({ id: "b", name: "Almond Flour Fine", price: 20, manufacturerName: "Other" });
      const model = modelFor([reference, withBrand, withoutBrand]);

      const delta = scoreCandidate(reference, withBrand, model) - scoreCandidate(reference, withoutBrand, model);
      expect(delta).toBeCloseTo(0.1, 12);
    });

    it("is monotonic in price proximity", () => {
      const near = makeProduct({ id: "n", name: "Almond Flour", price: 22 });
      const mid = makeProduct({ id: "m", name: "Almond Flour", price: 27 });
      const far = makeProduct({ id: "f", name: "Almond Flour", price: 40 });
      const model = modelFor([reference, near, mid, far]);

      const sNear = scoreCandidate(reference, near, model);
      const sMid = scoreCandidate(reference, mid, model);
      const sFar = scoreCandidate(reference, far, model);

      expect(sNear).toBeCloseTo(0.6 + 0.3, 12);
      expect(sMid).toBeCloseTo(0.6 + 0.15, 12);
      expect(sFar).toBeCloseTo(0.6 + 0.06, 12);
    });
  });

  describe("calculateProductSimilarity (no corpus)", () => {
    it("uses Jaccard for the name component", () => {
      const a = makeProduct({ id: "a", name: "Sugar Cookie" });
      const b = makeProduct({ id: "b", name: "Cookie Dough" });
      expect(calculateProductSimilarity(a, b)).toBeCloseTo(0.2, 12);
    });

    it("adds price and manufacturer the same way", () => {
      const a = makeProduct({ id: "a", name: "Sugar Cookie", price: 10, manufacturerName: "Acme" });
      const b = makeProduct({ id: "b", name: "Sugar Cookie", price: 11, manufacturerName: "acme" });
      expect(calculateProductSimilarity(a, b)).toBeCloseTo(1.0, 12);
    });
  });
});
