import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildWebhookApp } from "../../../src/webhooks/app.js";
import { SimilarProductsService } from "../../../src/services/similar-products-service.js";
import { createMockCatalog, createMockProfiles, silenceLogs } from "../../helpers/mocks.js";
import { COOKIE_MIX_REFERENCE, COOKIE_MIX_CANDIDATES } from "../../fixtures/index.js";

const AUTH = { "x-webhook-token": "test-secret" };

describe("webhook app", () => {
  let app: FastifyInstance;
  let catalog: ReturnType<typeof createMockCatalog>;
  let profiles: ReturnType<typeof createMockProfiles>;
  let service: SimilarProductsService;

  beforeEach(() => {
    silenceLogs();
    catalog = createMockCatalog({ product: COOKIE_MIX_REFERENCE, pool: COOKIE_MIX_CANDIDATES });
    profiles = createMockProfiles();
    service = new SimilarProductsService(catalog, profiles, { limit: 2 });
    app = buildWebhookApp({ service, webhookSecret: "test-secret" });
  });

  afterEach(async () => {
    await app.close();
  });

  describe("GET /health", () => {
    it("needs no token", async () => {
      const res = await app.inject({ method: "GET", url: "/health" });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ status: "healthy" });
    });
  });

  describe("authentication", () => {
    it("rejects a missing token", async () => {
      const res = await app.inject({ method: "POST", url: "/webhook/enrich", payload: { email: "customer@example.com", ProductID: "X" } });
      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({ status: "error", message: "Unauthorized" });
      expect(catalog.getProduct).not.toHaveBeenCalled();
    });

    it("rejects a wrong token on cleanup", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/webhook/cleanup",
        headers: { "x-webhook-token": "wrong-secret" },
        payload: { email: "customer@example.com" },
      });
      expect(res.statusCode).toBe(401);
      expect(profiles.removeSimilarProducts).not.toHaveBeenCalled();
    });

    it("rejects before parsing a malformed body", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/webhook/enrich",
        headers: { "content-type": "application/json" },
        payload: "{not json",
      });
      expect(res.statusCode).toBe(401);
    });
  });

  describe("POST /webhook/enrich", () => {
    it("enriches the profile", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/webhook/enrich",
        headers: AUTH,
        payload: { email: "customer@example.com", ProductID: "X", ProductName: "Gluten-Free Cookie Mix" },
      });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.status).toBe("success");
      expect(body.similar_products_count).toBe(2);
      expect(typeof body.timestamp).toBe("string");
      expect(typeof body.duration_ms).toBe("number");
      expect(catalog.getProduct).toHaveBeenCalledWith("X");
      expect(profiles.addSimilarProducts).toHaveBeenCalledWith("customer@example.com", "X", ["1", "2"], expect.any(String));
    });

    it("accepts a numeric ProductID", async () => {
      await app.inject({ method: "POST", url: "/webhook/enrich", headers: AUTH, payload: { email: "customer@example.com", ProductID: 4422 } });
      expect(catalog.getProduct).toHaveBeenCalledWith("4422");
    });

    it("answers 400 No data for an empty object", async () => {
      const res = await app.inject({ method: "POST", url: "/webhook/enrich", headers: AUTH, payload: {} });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ status: "error", message: "No data" });
    });

    it("answers 400 No data for malformed JSON", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/webhook/enrich",
        headers: { ...AUTH, "content-type": "application/json" },
        payload: "{not json",
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ status: "error", message: "No data" });
    });

    it("answers 400 when a field is missing", async () => {
      const res = await app.inject({ method: "POST", url: "/webhook/enrich", headers: AUTH, payload: { email: "customer@example.com" } });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ status: "error", message: "Missing email or ProductID" });
    });

    it("answers 500 with the failure message", async () => {
      catalog.getProduct.mockResolvedValueOnce(null);

      const res = await app.inject({ method: "POST", url: "/webhook/enrich", headers: AUTH, payload: { email: "customer@example.com", ProductID: "404" } });

      expect(res.statusCode).toBe(500);
      const body = res.json();
      expect(body.status).toBe("error");
      expect(body.message).toBe("Product not found");
      expect(typeof body.timestamp).toBe("string");
    });

    it("answers 500 Internal server error for unexpected throws", async () => {
      vi.spyOn(service, "enrichProfile").mockRejectedValueOnce(new Error("boom"));

      const res = await app.inject({ method: "POST", url: "/webhook/enrich", headers: AUTH, payload: { email: "customer@example.com", ProductID: "X" } });

      expect(res.statusCode).toBe(500);
      expect(res.json().message).toBe("Internal server error");
    });
  });

  describe("POST /webhook/cleanup", () => {
    it("removes one product's entry", async () => {
      const res = await app.inject({ method: "POST", url: "/webhook/cleanup", headers: AUTH, payload: { email: "customer@example.com", ProductID: "X" } });

      expect(res.statusCode).toBe(200);
      expect(res.json().status).toBe("success");
      expect(profiles.removeSimilarProducts).toHaveBeenCalledWith("customer@example.com", "X");
    });

    it("removes everything without ProductID", async () => {
      await app.inject({ method: "POST", url: "/webhook/cleanup", headers: AUTH, payload: { email: "customer@example.com", ProductID: null } });
      expect(profiles.removeSimilarProducts).toHaveBeenCalledWith("customer@example.com", undefined);
    });

    it("answers 400 without email", async () => {
      const res = await app.inject({ method: "POST", url: "/webhook/cleanup", headers: AUTH, payload: { ProductID: "X" } });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ status: "error", message: "Missing email" });
    });

    it("answers 500 when cleanup fails", async () => {
      profiles.removeSimilarProducts.mockRejectedValueOnce(new Error("Klaviyo update_profile failed: 500 - oops"));

      const res = await app.inject({ method: "POST", url: "/webhook/cleanup", headers: AUTH, payload: { email: "customer@example.com" } });

      expect(res.statusCode).toBe(500);
      expect(res.json().message).toBe("Cleanup failed");
    });
  });
});
