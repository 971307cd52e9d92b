/**
 * PrestaShop 1.7 WebService adapter
 *
 * Category listing is done in three batched calls instead of one call per
 * product:
 *   1. GET /api/products?filter[id_category_default]=[cat]   -> ids
 *   2. GET /api/products?filter[id]=[1|2|3]&display=[...]    -> fields
 *   3. GET /api/stock_availables?filter[id_product]=[1|2|3]  -> quantities
 *
 * Newer PrestaShop releases (8.x) may shape responses differently.
 */

import { z } from "zod";
import type { Product } from "../types/index.js";
import { diagnostics } from "../diagnostics/channels.js";
import { createLogger } from "../services/logger.js";
import { EcommerceApiError, type EcommerceAdapter } from "./base.js";

const log = createLogger("adapters.prestashop");

const PRIMARY_LANG_ID = "1";
const SECONDARY_LANG_ID = "2";
const HEALTH_CHECK_TIMEOUT_MS = 5000;
const USER_AGENT = "similar-products/1.0.0";
const BATCH_DISPLAY_FIELDS = "[id,name,id_category_default,price,manufacturer_name]";

// --- Response shapes ---

const IdSchema = z.union([z.string(), z.number()]).transform(String);

const LangValueSchema = z.object({
  id: IdSchema.optional(),
  value: z.string().optional(),
});

const MultiLangSchema = z.union([
  z.string(),
  z.array(LangValueSchema),
  z.object({ value: z.string().optional() }),
]);

const NumericSchema = z.union([z.string(), z.number()]);

const RawProductSchema = z.object({
  id: IdSchema,
  name: MultiLangSchema.optional(),
  id_category_default: IdSchema.optional(),
  quantity: NumericSchema.optional(),
  price: NumericSchema.optional(),
  manufacturer_name: z.unknown().optional(),
  reference: z.string().optional(),
  associations: z
    .object({
      stock_availables: z.array(z.object({ quantity: NumericSchema.optional() })).optional(),
    })
    .optional(),
});

type RawProduct = z.infer<typeof RawProductSchema>;
type MultiLang = z.infer<typeof MultiLangSchema>;

const ListingItemSchema = z.object({ id: IdSchema });

const StockItemSchema = z.object({
  id_product: IdSchema,
  quantity: NumericSchema.optional(),
});

// --- Parsing ---

/**
 * Read one language out of a PrestaShop multi-language field.
 *
 * Field forms: "Name" | [{ id: "1", value: "..." }, ...] | { value: "..." }.
 * Without a language id, the first entry wins.
 */
export function extractMultiLangField(field: MultiLang | undefined, langId?: string): string {
  if (field === undefined) return "";
  if (typeof field === "string") return field;

  if (Array.isArray(field)) {
    if (langId) {
      const match = field.find((item) => item.id === langId);
      if (match) return match.value ?? "";
    }
    return field[0]?.value ?? "";
  }

  return field.value ?? "";
}

function toInt(raw: string | number | undefined): number {
  if (raw === undefined) return 0;
  const parsed = typeof raw === "number" ? Math.trunc(raw) : parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : 0;
}

function toPrice(raw: string | number | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const parsed = typeof raw === "number" ? raw : parseFloat(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

function quantityOf(raw: RawProduct): number {
  const stock = raw.associations?.stock_availables;
  if (stock && stock.length > 0) return toInt(stock[0].quantity);
  return toInt(raw.quantity);
}

/**
 * Map a PrestaShop product object to a Product.
 *
 * @returns null when the object has no id or no usable name
 */
export function parseProduct(data: unknown): Product | null {
  const parsed = RawProductSchema.safeParse(data);
  if (!parsed.success) return null;
  const raw = parsed.data;

  // Secondary name only when the shop actually sent a second language
  const nameSecondary = Array.isArray(raw.name)
    ? raw.name.find((item) => item.id === SECONDARY_LANG_ID)?.value
    : undefined;

  const name =
    extractMultiLangField(raw.name, PRIMARY_LANG_ID) || extractMultiLangField(raw.name);

  if (!raw.id || !name) return null;

  const manufacturerName =
    typeof raw.manufacturer_name === "string" && raw.manufacturer_name !== ""
      ? raw.manufacturer_name
      : undefined;

  return {
    id: raw.id,
    name,
    nameSecondary: nameSecondary || undefined,
    categoryId: raw.id_category_default ?? "",
    quantity: quantityOf(raw),
    price: toPrice(raw.price),
    manufacturerName,
    sku: raw.reference || undefined,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function listField(body: unknown, key: string): unknown[] {
  // Empty result sets come back as a bare [] instead of an object
  if (!isRecord(body)) return [];
  const value = body[key];
  return Array.isArray(value) ? value : [];
}

// --- Adapter ---

export interface PrestaShopAdapterOptions {
  baseUrl: string;
  apiKey: string;
  /** Seconds */
  timeout?: number;
}

export class PrestaShopAdapter implements EcommerceAdapter {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;

  constructor(options: PrestaShopAdapterOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.timeoutMs = (options.timeout ?? 10) * 1000;
  }

  async getProduct(productId: string): Promise<Product | null> {
    const res = await this.request(
      "get_product",
      `/api/products/${encodeURIComponent(productId)}`,
      { display: "full" },
      { allowNotFound: true }
    );
    if (res === null) return null;

    // Either { product: {...} } or { products: [{...}] } depending on auth mode
    if (isRecord(res) && res.product !== undefined) {
      return parseProduct(res.product);
    }
    const products = listField(res, "products");
    return products.length > 0 ? parseProduct(products[0]) : null;
  }

  async getProductsByCategory(categoryId: string, limit: number = 50): Promise<Product[]> {
    // Step 1: ids in category
    const listing = await this.request("list_category", "/api/products", {
      "filter[id_category_default]": `[${categoryId}]`,
      limit: String(limit),
    });

    const productIds: string[] = [];
    for (const item of listField(listing, "products")) {
      const parsed = ListingItemSchema.safeParse(item);
      if (parsed.success) productIds.push(parsed.data.id);
    }
    if (productIds.length === 0) return [];

    const idsFilter = `[${productIds.join("|")}]`;

    // Step 2: batch product fields
    const batch = await this.request("batch_products", "/api/products", {
      "filter[id]": idsFilter,
      display: BATCH_DISPLAY_FIELDS,
    });

    // Step 3: batch stock
    const stock = await this.request("batch_stock", "/api/stock_availables", {
      "filter[id_product]": idsFilter,
      display: "[id_product,quantity]",
    });

    const quantities = new Map<string, number>();
    for (const item of listField(stock, "stock_availables")) {
      const parsed = StockItemSchema.safeParse(item);
      if (parsed.success) quantities.set(parsed.data.id_product, toInt(parsed.data.quantity));
    }

    const products = new Map<string, Product>();
    for (const item of listField(batch, "products")) {
      const product = parseProduct(item);
      if (!product) {
        log.debug("Skipping unparseable product", { category_id: categoryId });
        continue;
      }
      const quantity = quantities.get(product.id);
      products.set(product.id, quantity === undefined ? product : { ...product, quantity });
    }

    return [...products.values()];
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api`, {
        method: "HEAD",
        headers: { "User-Agent": USER_AGENT },
        signal: AbortSignal.timeout(HEALTH_CHECK_TIMEOUT_MS),
      });
      // 401 means the WebService exists but wants a key
      return response.status === 200 || response.status === 401;
    } catch (error) {
      log.warn("Health check failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /**
   * GET a WebService resource as JSON.
   * @returns null only when allowNotFound is set and the API answered 404
   */
  private async request(
    operation: string,
    path: string,
    params: Record<string, string>,
    options: { allowNotFound?: boolean } = {}
  ): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${path}`);
    url.searchParams.set("ws_key", this.apiKey);
    url.searchParams.set("output_format", "JSON");
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    const event = diagnostics.publishApiCallStart("prestashop", operation);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { "User-Agent": USER_AGENT },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      diagnostics.publishApiCallEnd(event, false, undefined, message);
      throw new EcommerceApiError(`PrestaShop API error: ${message}`);
    }

    if (response.status === 404 && options.allowNotFound) {
      diagnostics.publishApiCallEnd(event, true, 404);
      return null;
    }

    if (!response.ok) {
      const text = await response.text();
      diagnostics.publishApiCallEnd(event, false, response.status, text.slice(0, 200));
      throw new EcommerceApiError(
        `PrestaShop API error: ${response.status} - ${text.slice(0, 200)}`,
        response.status
      );
    }

    try {
      const body: unknown = await response.json();
      diagnostics.publishApiCallEnd(event, true, response.status);
      return body;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      diagnostics.publishApiCallEnd(event, false, response.status, message);
      throw new EcommerceApiError(`PrestaShop API error: invalid JSON (${message})`, response.status);
    }
  }
}
