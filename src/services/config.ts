/**
 * Configuration Service
 *
 * Loads settings from environment variables, validated with zod.
 *
 * Environment Variables:
 * - KLAVIYO_API_KEY: Klaviyo private API key (required)
 * - KLAVIYO_API_REVISION: Klaviyo API revision date (default: 2024-10-15)
 * - ECOMMERCE_PLATFORM: Catalog platform (default: prestashop)
 * - ECOMMERCE_URL: Shop base URL (required)
 * - ECOMMERCE_API_KEY: Shop WebService key (required)
 * - WEBHOOK_SECRET: Shared secret for the X-Webhook-Token header (required)
 * - SIMILAR_PRODUCTS_LIMIT: Substitutes per product (default: 6)
 * - CATEGORY_POOL_LIMIT: Category products fetched per ranking (default: 100)
 * - API_TIMEOUT: Outbound HTTP timeout in seconds (default: 10)
 * - LOG_LEVEL: DEBUG | INFO | WARNING | ERROR (default: INFO)
 * - LOG_FILE: Optional file that also receives log lines
 * - PORT / HOST: Webhook listener (default: 5000 / 0.0.0.0)
 *
 * Nothing here reads a .env file: export the variables, or start with
 * `npm run start:env` (node --env-file=.env).
 */

import { z } from "zod";
import type { LogLevel } from "../types/index.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const positiveIntFromEnv = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((val) => (val === undefined || val.trim() === "" ? String(fallback) : val))
    .pipe(z.coerce.number().int().positive());

const LogLevelSchema = z
  .string()
  .optional()
  .transform((val) => (val || "INFO").toUpperCase())
  .pipe(z.enum(["DEBUG", "INFO", "WARNING", "ERROR"]));

const EnvSchema = z.object({
  KLAVIYO_API_KEY: z.string().default(""),
  KLAVIYO_API_REVISION: z.string().min(1).default("2024-10-15"),
  ECOMMERCE_PLATFORM: z.string().default("prestashop").transform((val) => val.toLowerCase()),
  ECOMMERCE_URL: z.string().default(""),
  ECOMMERCE_API_KEY: z.string().default(""),
  WEBHOOK_SECRET: z.string().default(""),
  SIMILAR_PRODUCTS_LIMIT: positiveIntFromEnv(6),
  CATEGORY_POOL_LIMIT: positiveIntFromEnv(100),
  API_TIMEOUT: positiveIntFromEnv(10),
  LOG_LEVEL: LogLevelSchema,
  LOG_FILE: z.string().optional(),
  PORT: positiveIntFromEnv(5000),
  HOST: z.string().min(1).default("0.0.0.0"),
});

export interface AppConfig {
  klaviyoApiKey: string;
  klaviyoApiRevision: string;
  ecommercePlatform: string;
  ecommerceUrl: string;
  ecommerceApiKey: string;
  webhookSecret: string;
  similarProductsLimit: number;
  categoryPoolLimit: number;
  /** Seconds */
  apiTimeout: number;
  logLevel: LogLevel;
  logFile?: string;
  port: number;
  host: string;
}

// Required settings, in the order they are reported when missing
const REQUIRED: ReadonlyArray<[keyof AppConfig, string]> = [
  ["klaviyoApiKey", "KLAVIYO_API_KEY"],
  ["ecommerceUrl", "ECOMMERCE_URL"],
  ["ecommerceApiKey", "ECOMMERCE_API_KEY"],
  ["webhookSecret", "WEBHOOK_SECRET"],
];

/**
 * Load configuration from environment
 *
 * @throws ConfigError when a value is present but malformed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`);
    throw new ConfigError(`Invalid configuration: ${errors.join("; ")}`);
  }

  const e = result.data;
  return {
    klaviyoApiKey: e.KLAVIYO_API_KEY,
    klaviyoApiRevision: e.KLAVIYO_API_REVISION,
    ecommercePlatform: e.ECOMMERCE_PLATFORM,
    ecommerceUrl: e.ECOMMERCE_URL,
    ecommerceApiKey: e.ECOMMERCE_API_KEY,
    webhookSecret: e.WEBHOOK_SECRET,
    similarProductsLimit: e.SIMILAR_PRODUCTS_LIMIT,
    categoryPoolLimit: e.CATEGORY_POOL_LIMIT,
    apiTimeout: e.API_TIMEOUT,
    logLevel: e.LOG_LEVEL,
    logFile: e.LOG_FILE || undefined,
    port: e.PORT,
    host: e.HOST,
  };
}

/**
 * Check required settings before startup.
 *
 * @throws ConfigError listing every missing variable
 */
export function validateConfig(config: AppConfig): void {
  const missing = REQUIRED.filter(([key]) => !config[key]).map(([, envName]) => envName);

  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(", ")}`);
  }
}

// Singleton config instance
let configInstance: AppConfig | null = null;

/**
 * Get the configuration (loads once, caches)
 */
export function getConfig(): AppConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reload configuration (for testing or dynamic updates)
 */
export function reloadConfig(): AppConfig {
  configInstance = loadConfig();
  return configInstance;
}
