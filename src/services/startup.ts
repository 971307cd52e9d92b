/**
 * Startup Service
 *
 * Validates configuration and wires the catalog adapter, the Klaviyo
 * client and the similar products service together. Both the webhook
 * server and the MCP server start from here.
 */

import { createAdapter } from "../adapters/index.js";
import { KlaviyoClient } from "../clients/klaviyo-client.js";
import { type AppConfig, getConfig, validateConfig } from "./config.js";
import { configureLogger, createLogger } from "./logger.js";
import { SimilarProductsService } from "./similar-products-service.js";

const log = createLogger("startup");

/**
 * Build the service from configuration
 *
 * @throws ConfigError when required settings are missing or the platform is unsupported
 */
export function initializeService(config: AppConfig = getConfig()): SimilarProductsService {
  configureLogger({ level: config.logLevel, file: config.logFile });

  try {
    validateConfig(config);
  } catch (error) {
    log.error("Configuration validation failed", {
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
  log.info("Configuration validated successfully");

  const catalog = createAdapter(config);
  log.info("Initialized e-commerce adapter", { platform: config.ecommercePlatform });

  const profiles = new KlaviyoClient({
    apiKey: config.klaviyoApiKey,
    revision: config.klaviyoApiRevision,
    timeout: config.apiTimeout,
  });

  return new SimilarProductsService(catalog, profiles, {
    limit: config.similarProductsLimit,
    poolLimit: config.categoryPoolLimit,
  });
}
