/**
 * Structured diagnostics logger with credential redaction and request correlation.
 * Request log entries go to sinks; this logger carries everything else.
 */

import type { DispatchVariables } from "../types/env";
import { sanitizeUrl } from "./sanitize";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  requestId?: string;
  component?: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const SENSITIVE_KEYS = ["password", "secret", "token", "authorization"];

/**
 * Redact credentials before logging
 */
export const redactSensitiveData = (data: unknown): unknown => {
  if (typeof data === "string") {
    // URLs may embed user:pass@
    return data.includes("://") ? sanitizeUrl(data) : data;
  }

  if (data instanceof Error) {
    return { name: data.name, message: data.message, stack: data.stack };
  }

  if (typeof data === "object" && data !== null) {
    if (Array.isArray(data)) {
      return data.map(redactSensitiveData);
    }

    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      const lowerKey = key.toLowerCase();
      if (SENSITIVE_KEYS.some((sensitive) => lowerKey.includes(sensitive))) {
        redacted[key] = "***";
      } else {
        redacted[key] = redactSensitiveData(value);
      }
    }
    return redacted;
  }

  return data;
};

// Meta that cannot be serialized (BigInt, cycles) is replaced, not thrown
const serialize = (entry: { timestamp: string; level: LogLevel; message: string }): string => {
  try {
    return JSON.stringify(redactSensitiveData(entry));
  } catch (err) {
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      message: entry.message,
      serializationError: err instanceof Error ? err.message : String(err),
    });
  }
};

/**
 * Logger class with structured logging
 */
export class Logger {
  private context: LogContext;
  private minLevel: LogLevel;

  constructor(context: LogContext = {}, minLevel: LogLevel = "info") {
    this.context = context;
    this.minLevel = minLevel;
  }

  /**
   * Logger sharing this one's level, with extra bound context
   */
  child(context: LogContext): Logger {
    return new Logger({ ...this.context, ...context }, this.minLevel);
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const timestamp = new Date().toISOString();
    const logEntry = {
      timestamp,
      level,
      message,
      ...this.context,
      ...meta,
    };

    const line = serialize(logEntry);

    switch (level) {
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.log(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
  }

  debug(message: string, meta?: Record<string, unknown>) {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>) {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>) {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>) {
    this.log("error", message, meta);
  }
}

/**
 * Create logger from Hono context variables
 */
export const createLogger = (variables?: Partial<DispatchVariables>, minLevel?: LogLevel): Logger => {
  return new Logger({ requestId: variables?.requestId }, minLevel);
};
