/**
 * JSON response bodies shared by the webhook routes
 */

export interface ErrorBody {
  status: "error";
  message: string;
  timestamp?: string;
}

export function timestamp(): string {
  return new Date().toISOString();
}

export function errorBody(message: string, withTimestamp: boolean = true): ErrorBody {
  return withTimestamp ? { status: "error", message, timestamp: timestamp() } : { status: "error", message };
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && Object.keys(value).length > 0;
}
