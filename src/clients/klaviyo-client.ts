/**
 * Klaviyo REST API client
 *
 * Keeps one array property on the profile, one entry per subscribed
 * product, so a customer waiting on several products gets separate
 * substitute lists:
 *
 *   bis_similar_products: [
 *     { product_id: "4422", similar_ids: ["15655", "11773"], enriched_at: "2025-10-30T12:34:56Z" },
 *   ]
 */

import { z } from "zod";
import type { SimilarProductEntry } from "../types/index.js";
import { diagnostics } from "../diagnostics/channels.js";
import { createLogger } from "../services/logger.js";

const log = createLogger("clients.klaviyo");

export const KLAVIYO_BASE_URL = "https://a.klaviyo.com/api";
export const SIMILAR_PRODUCTS_PROPERTY = "bis_similar_products";

export class KlaviyoApiError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "KlaviyoApiError";
    this.status = status;
  }
}

/**
 * Where substitute lists are stored per customer.
 * The service only needs these two operations.
 */
export interface ProfileStore {
  /** @throws when the profile cannot be found or updated */
  addSimilarProducts(email: string, productId: string, similarIds: string[], enrichedAt: string): Promise<boolean>;
  /** @returns false when there is no profile for the e-mail */
  removeSimilarProducts(email: string, productId?: string): Promise<boolean>;
}

export interface KlaviyoClientOptions {
  apiKey: string;
  revision?: string;
  /** Seconds */
  timeout?: number;
  baseUrl?: string;
}

// Stored entries are kept verbatim on merge, so only product_id is checked
type StoredEntry = Record<string, unknown>;

const ProfileListSchema = z.object({
  data: z.array(z.object({ id: z.string() })).default([]),
});

const ProfilePropertiesSchema = z.object({
  data: z.object({
    attributes: z.object({
      properties: z.record(z.unknown()).nullish(),
    }),
  }),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class KlaviyoClient implements ProfileStore {
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly baseUrl: string;

  constructor(options: KlaviyoClientOptions) {
    this.timeoutMs = (options.timeout ?? 10) * 1000;
    this.baseUrl = options.baseUrl ?? KLAVIYO_BASE_URL;
    this.headers = {
      Authorization: `Klaviyo-API-Key ${options.apiKey}`,
      Accept: "application/json",
      "Content-Type": "application/json",
      revision: options.revision ?? "2024-10-15",
    };
  }

  /**
   * Find a profile id by e-mail
   * @returns null when no profile has this e-mail
   */
  async getProfileIdByEmail(email: string): Promise<string | null> {
    const escaped = email.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
    const url = new URL(`${this.baseUrl}/profiles/`);
    url.searchParams.set("filter", `equals(email,"${escaped}")`);

    const body = await this.request("get_profile", url, { method: "GET" });
    const parsed = ProfileListSchema.safeParse(body);
    if (!parsed.success) {
      throw new KlaviyoApiError("Failed to get profile: unexpected response shape");
    }
    return parsed.data.data[0]?.id ?? null;
  }

  /**
   * PATCH custom properties onto a profile
   */
  async updateProfileProperties(profileId: string, properties: Record<string, unknown>): Promise<boolean> {
    const url = new URL(`${this.baseUrl}/profiles/${encodeURIComponent(profileId)}/`);
    await this.request("update_profile", url, {
      method: "PATCH",
      body: JSON.stringify({
        data: {
          type: "profile",
          id: profileId,
          attributes: { properties },
        },
      }),
    });
    return true;
  }

  /**
   * Store substitutes for one product, replacing any earlier entry for it.
   *
   * @throws KlaviyoApiError when no profile exists for the e-mail
   */
  async addSimilarProducts(
    email: string,
    productId: string,
    similarIds: string[],
    enrichedAt: string
  ): Promise<boolean> {
    const profileId = await this.getProfileIdByEmail(email);
    if (!profileId) {
      throw new KlaviyoApiError("Profile not found");
    }

    const existing = await this.getSimilarProductsArray(profileId);
    const entry: SimilarProductEntry = {
      product_id: productId,
      similar_ids: similarIds,
      enriched_at: enrichedAt,
    };
    const merged: StoredEntry[] = [
      ...existing.filter((item) => item.product_id !== productId),
      { ...entry },
    ];

    return this.updateProfileProperties(profileId, { [SIMILAR_PRODUCTS_PROPERTY]: merged });
  }

  /**
   * Remove one product's substitutes, or the whole property when no product
   * is given. An array left empty is cleared to null.
   */
  async removeSimilarProducts(email: string, productId?: string): Promise<boolean> {
    const profileId = await this.getProfileIdByEmail(email);
    if (!profileId) return false;

    if (productId === undefined) {
      return this.updateProfileProperties(profileId, { [SIMILAR_PRODUCTS_PROPERTY]: null });
    }

    const existing = await this.getSimilarProductsArray(profileId);
    const remaining = existing.filter((item) => item.product_id !== productId);

    return this.updateProfileProperties(profileId, {
      [SIMILAR_PRODUCTS_PROPERTY]: remaining.length > 0 ? remaining : null,
    });
  }

  /**
   * Current bis_similar_products entries of a profile.
   * A failed read is logged and treated as an empty list.
   */
  private async getSimilarProductsArray(profileId: string): Promise<StoredEntry[]> {
    const url = new URL(`${this.baseUrl}/profiles/${encodeURIComponent(profileId)}/`);
    url.searchParams.set("additional-fields[profile]", "properties");

    try {
      const body = await this.request("get_profile_properties", url, { method: "GET" });
      const parsed = ProfilePropertiesSchema.safeParse(body);
      const existing = parsed.success ? parsed.data.data.attributes.properties?.[SIMILAR_PRODUCTS_PROPERTY] : undefined;
      return Array.isArray(existing) ? existing.filter(isRecord) : [];
    } catch (error) {
      log.warn("Could not read existing similar products, starting from empty", {
        profile_id: profileId,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }

  private async request(operation: string, url: URL, init: RequestInit): Promise<unknown> {
    const event = diagnostics.publishApiCallStart("klaviyo", operation);

    let response: Response;
    try {
      response = await fetch(url, {
        ...init,
        headers: this.headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      diagnostics.publishApiCallEnd(event, false, undefined, message);
      throw new KlaviyoApiError(`Klaviyo ${operation} failed: ${message}`);
    }

    if (!response.ok) {
      const text = await response.text();
      diagnostics.publishApiCallEnd(event, false, response.status, text.slice(0, 200));
      throw new KlaviyoApiError(
        `Klaviyo ${operation} failed: ${response.status} - ${text.slice(0, 200)}`,
        response.status
      );
    }

    diagnostics.publishApiCallEnd(event, true, response.status);

    // PATCH may answer 204 with no body
    const text = await response.text();
    if (!text) return null;
    try {
      return JSON.parse(text);
    } catch {
      throw new KlaviyoApiError(`Klaviyo ${operation} failed: invalid JSON`, response.status);
    }
  }
}
