/**
 * Zod schemas for MCP tools and webhooks
 *
 * Single source of truth for parameter validation.
 * Used by both handlers and unit tests.
 */

export * from "./common.js";
export * from "./find-similar-products.js";
export * from "./enrich-profile.js";
export * from "./cleanup-profile.js";
