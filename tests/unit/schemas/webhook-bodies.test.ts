/**
 * Tests for the Klaviyo flow webhook bodies
 */

import { describe, it, expect } from "vitest";
import { EnrichWebhookBodySchema } from "../../../src/schemas/enrich-profile.js";
import { CleanupWebhookBodySchema } from "../../../src/schemas/cleanup-profile.js";

describe("EnrichWebhookBodySchema", () => {
  it("reads email and ProductID and keeps the rest", () => {
    const body = EnrichWebhookBodySchema.parse({
      email: "customer@example.com",
      ProductID: 4422,
      ProductName: "Gluten-Free Cookie Mix",
    });
    expect(body).toEqual({
      email: "customer@example.com",
      ProductID: "4422",
      ProductName: "Gluten-Free Cookie Mix",
    });
  });

  it("requires both fields", () => {
    expect(EnrichWebhookBodySchema.safeParse({ email: "customer@example.com" }).success).toBe(false);
    expect(EnrichWebhookBodySchema.safeParse({ ProductID: "1" }).success).toBe(false);
  });
});

describe("CleanupWebhookBodySchema", () => {
  it("keeps a product id", () => {
    expect(CleanupWebhookBodySchema.parse({ email: "customer@example.com", ProductID: "7" }).ProductID).toBe("7");
  });

  it("treats missing, null and empty ProductID as all products", () => {
    expect(CleanupWebhookBodySchema.parse({ email: "customer@example.com" }).ProductID).toBeUndefined();
    expect(CleanupWebhookBodySchema.parse({ email: "customer@example.com", ProductID: null }).ProductID).toBeUndefined();
    expect(CleanupWebhookBodySchema.parse({ email: "customer@example.com", ProductID: "" }).ProductID).toBeUndefined();
  });

  it("requires an email", () => {
    expect(CleanupWebhookBodySchema.safeParse({ ProductID: "7" }).success).toBe(false);
  });
});
