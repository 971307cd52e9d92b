import { defineConfig } from "vitest/config";

/**
 * Vitest configuration for unit tests.
 *
 * Fast tests that don't require:
 * - Network connections
 * - A running shop or Klaviyo account
 *
 * Covers:
 * - Tokenizer, BM25, Jaccard and composite scoring
 * - Ranking properties and the end-to-end substitute example
 * - Zod schema validation
 * - PrestaShop / Klaviyo clients against a stubbed fetch
 * - Webhook routes via fastify inject, MCP tool dispatch
 */
export default defineConfig({
  test: {
    // Include only unit tests
    include: ["tests/unit/**/*.test.ts"],

    exclude: ["node_modules/**", "dist/**"],

    // Fast timeout for unit tests
    testTimeout: 5000,

    // Run tests in parallel
    pool: "threads",

    // Environment
    environment: "node",

    // Clear mocks between tests
    clearMocks: true,
    restoreMocks: true,
    unstubGlobals: true,
  },
});
