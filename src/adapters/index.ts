/**
 * Adapter selection by ECOMMERCE_PLATFORM
 */

import type { AppConfig } from "../services/config.js";
import { ConfigError } from "../services/config.js";
import type { EcommerceAdapter } from "./base.js";
import { PrestaShopAdapter } from "./prestashop.js";

export function createAdapter(config: AppConfig): EcommerceAdapter {
  switch (config.ecommercePlatform) {
    case "prestashop":
      return new PrestaShopAdapter({
        baseUrl: config.ecommerceUrl,
        apiKey: config.ecommerceApiKey,
        timeout: config.apiTimeout,
      });
    default:
      throw new ConfigError(`Unsupported e-commerce platform: ${config.ecommercePlatform}`);
  }
}

export { EcommerceApiError } from "./base.js";
export type { EcommerceAdapter } from "./base.js";
export { PrestaShopAdapter } from "./prestashop.js";
