/**
 * Structured Logger
 *
 * JSON lines on stderr, one object per event:
 *   { timestamp, level, logger, message, ...context }
 *
 * stdout belongs to the MCP stdio transport, so nothing here writes to it.
 * When LOG_FILE is set, the same lines are appended to that file.
 *
 * E-mail addresses must never reach a log line: pass hashEmail(email).
 */

import { createHash } from "crypto";
import { appendFileSync } from "fs";
import type { LogLevel } from "../types/index.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
};

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export interface LoggerSettings {
  level: LogLevel;
  file?: string;
}

function parseLevel(raw: string | undefined): LogLevel {
  const upper = (raw || "INFO").toUpperCase();
  return upper === "DEBUG" || upper === "WARNING" || upper === "ERROR" ? upper : "INFO";
}

let settings: LoggerSettings = {
  level: parseLevel(process.env.LOG_LEVEL),
  file: process.env.LOG_FILE || undefined,
};

// Set once per process; a broken log file must not take requests down with it
let fileSinkFailed = false;

/**
 * Apply log level and file sink from loaded configuration
 */
export function configureLogger(next: LoggerSettings): void {
  settings = { ...next };
  fileSinkFailed = false;
}

export function getLoggerSettings(): LoggerSettings {
  return { ...settings };
}

/**
 * First 12 hex chars of the SHA-256 of an e-mail, for GDPR-safe logs
 */
export function hashEmail(email: string): string {
  return createHash("sha256").update(email).digest("hex").slice(0, 12);
}

function write(name: string, level: LogLevel, message: string, context?: LogContext): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[settings.level]) return;

  const line = JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    logger: name,
    message,
    ...context,
  });

  console.error(line);

  if (settings.file && !fileSinkFailed) {
    try {
      appendFileSync(settings.file, line + "\n");
    } catch (error) {
      fileSinkFailed = true;
      console.error(`[logger] Disabling file sink ${settings.file}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

/**
 * Get a named logger (name is typically the module, e.g. "webhooks.enrich")
 */
export function createLogger(name: string): Logger {
  return {
    debug: (message, context) => write(name, "DEBUG", message, context),
    info: (message, context) => write(name, "INFO", message, context),
    warn: (message, context) => write(name, "WARNING", message, context),
    error: (message, context) => write(name, "ERROR", message, context),
  };
}
