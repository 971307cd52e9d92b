/**
 * Diagnostics Channels
 *
 * diagnostics_channel channels for zero-overhead instrumentation.
 * When no subscriber is attached, publish() is essentially a no-op.
 */

import { channel, Channel } from "diagnostics_channel";

/**
 * Channel names
 */
export const CHANNEL_NAMES = {
  RANK: "substitutes:rank",
  API_CALL: "substitutes:api:call",
  ERROR: "substitutes:error",
} as const;

/**
 * Ranking finished event payload
 */
export interface RankEvent {
  productId: string;
  categoryId: string;
  poolSize: number;
  eligibleCount: number;
  returnedCount: number;
  durationMs: number;
}

/**
 * Outbound API call event payload
 */
export interface ApiCallEvent {
  service: "prestashop" | "klaviyo";
  operation: string;
  startTime: number;
  endTime?: number;
  durationMs?: number;
  status?: number;
  success?: boolean;
  error?: string;
}

/**
 * Error event payload
 */
export interface ErrorEvent {
  error: Error | string;
  context: string;
  timestamp: number;
  severity: "warning" | "error" | "fatal";
}

/**
 * Diagnostics channels singleton
 */
class DiagnosticsChannels {
  readonly rank: Channel;
  readonly apiCall: Channel;
  readonly error: Channel;

  constructor() {
    this.rank = channel(CHANNEL_NAMES.RANK);
    this.apiCall = channel(CHANNEL_NAMES.API_CALL);
    this.error = channel(CHANNEL_NAMES.ERROR);
  }

  publishRank(event: RankEvent): void {
    this.rank.publish(event);
  }

  /**
   * Publish API call start event
   */
  publishApiCallStart(service: ApiCallEvent["service"], operation: string): ApiCallEvent {
    const event: ApiCallEvent = {
      service,
      operation,
      startTime: Date.now(),
    };
    this.apiCall.publish(event);
    return event;
  }

  /**
   * Publish API call end event
   */
  publishApiCallEnd(event: ApiCallEvent, success: boolean, status?: number, error?: string): void {
    event.endTime = Date.now();
    event.durationMs = event.endTime - event.startTime;
    event.success = success;
    event.status = status;
    event.error = error;
    this.apiCall.publish(event);
  }

  /**
   * Publish error event
   */
  publishError(error: Error | string, context: string, severity: ErrorEvent["severity"] = "error"): void {
    const event: ErrorEvent = {
      error,
      context,
      timestamp: Date.now(),
      severity,
    };
    this.error.publish(event);
  }

  /**
   * Check if any channel has subscribers
   */
  hasSubscribers(): boolean {
    return this.rank.hasSubscribers || this.apiCall.hasSubscribers || this.error.hasSubscribers;
  }
}

// Singleton instance
export const diagnostics = new DiagnosticsChannels();

// Export channel for external subscription
export { channel };
