/**
 * Schema Registry: maps tool names to Zod schemas for server-level validation.
 *
 * Every tool is validated here before dispatch.
 */

import type { ZodSchema } from "zod";

import { FindSimilarProductsParamsSchema } from "./find-similar-products.js";
import { EnrichProfileParamsSchema } from "./enrich-profile.js";
import { CleanupProfileParamsSchema } from "./cleanup-profile.js";

/**
 * Map of canonical tool names → Zod schemas.
 */
const TOOL_SCHEMAS: Record<string, ZodSchema> = {
  find_similar_products: FindSimilarProductsParamsSchema,
  enrich_profile: EnrichProfileParamsSchema,
  cleanup_profile: CleanupProfileParamsSchema,
};

/**
 * Map of alias → canonical name.
 */
const ALIAS_MAP: Record<string, string> = {
  "similar": "find_similar_products",
  "sp-find": "find_similar_products",
  "sp-enrich": "enrich_profile",
  "sp-cleanup": "cleanup_profile",
};

/**
 * Resolve a tool name (possibly an alias) to its canonical name.
 */
export function resolveToolName(name: string): string {
  return ALIAS_MAP[name] || name;
}

/**
 * Whether a canonical or alias name has a registered schema
 */
export function hasSchema(name: string): boolean {
  return resolveToolName(name) in TOOL_SCHEMAS;
}

/**
 * Validate tool arguments against the registered schema.
 * Returns null if valid or no schema exists.
 * Returns error string if validation fails.
 */
export function validateToolArgs(name: string, args: Record<string, unknown>): string | null {
  const canonical = resolveToolName(name);
  const schema = TOOL_SCHEMAS[canonical];

  if (!schema) {
    // No schema registered: pass through
    return null;
  }

  const result = schema.safeParse(args);
  if (result.success) {
    return null;
  }

  const errors = result.error.errors.map(
    (e) => `${e.path.length > 0 ? e.path.join(".") + ": " : ""}${e.message}`
  );
  return `Invalid parameters for ${canonical}: ${errors.join("; ")}`;
}
