/**
 * Webhook shared-secret check
 */

import { timingSafeEqual } from "crypto";

export const WEBHOOK_TOKEN_HEADER = "x-webhook-token";

/**
 * Constant-time comparison of the X-Webhook-Token header against the secret.
 * An empty secret never authorizes anything.
 */
export function validateWebhookSecret(provided: string | string[] | undefined, secret: string): boolean {
  if (typeof provided !== "string" || provided === "" || secret === "") return false;

  const a = Buffer.from(provided, "utf8");
  const b = Buffer.from(secret, "utf8");
  // timingSafeEqual throws on length mismatch; compare b to itself to keep timing flat
  if (a.length !== b.length) {
    timingSafeEqual(b, b);
    return false;
  }
  return timingSafeEqual(a, b);
}
