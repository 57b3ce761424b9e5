/**
 * Structured logging for the multi-auth library
 * JSON lines format with redaction of credential material
 * Uses Pino
 */

import pino from "pino";
import type { LogLevel } from "../types/config.js";

const LOG_LEVELS: Record<LogLevel, number> = {
  SILENT: -1,
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
  TRACE: 4,
};

const REDACTED = "***REDACTED***";

const SENSITIVE_KEY_FRAGMENTS = ["key", "token", "secret", "authorization", "assertion", "jwt"];

/**
 * Check whether a string value looks like credential material
 */
function looksSensitive(value: string): boolean {
  const lowerValue = value.toLowerCase();
  return (
    lowerValue.startsWith("bearer ") ||
    lowerValue.startsWith("ya29.") ||
    value.includes("-----BEGIN") ||
    /^AIza[0-9A-Za-z_-]{20,}$/.test(value) ||
    /^sk-[a-z0-9_-]{8,}$/i.test(value) ||
    /^eyJ[\w-]+\.[\w-]+\.[\w-]*$/.test(value)
  );
}

/**
 * Redact sensitive values from log data
 */
export function redact(data: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = { ...data };

  for (const [key, value] of Object.entries(redacted)) {
    const lowerKey = key.toLowerCase();

    if (typeof value === "string") {
      if (SENSITIVE_KEY_FRAGMENTS.some((fragment) => lowerKey.includes(fragment))) {
        redacted[key] = REDACTED;
        continue;
      }

      if (looksSensitive(value)) {
        redacted[key] = REDACTED;
      }
    } else if (Array.isArray(value)) {
      redacted[key] = value.map((item: unknown) =>
        typeof item === "string" && looksSensitive(item) ? REDACTED : item
      );
    } else if (typeof value === "object" && value !== null) {
      redacted[key] = redact({ ...value });
    }
  }

  return redacted;
}

function toPinoLevel(level: LogLevel): pino.LevelWithSilent {
  switch (level) {
    case "SILENT":
      return "silent";
    case "ERROR":
      return "error";
    case "WARN":
      return "warn";
    case "INFO":
      return "info";
    case "DEBUG":
      return "debug";
    case "TRACE":
      return "trace";
  }
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Logger class for structured logging
 * Wraps Pino, writing JSON lines to stderr
 */
export class Logger {
  private pino: pino.Logger;
  private currentLevel: LogLevel;

  constructor(level: LogLevel = "INFO") {
    this.currentLevel = level;

    this.pino = pino(
      {
        level: toPinoLevel(level),
        formatters: {
          level: (label) => {
            return { level: label.toUpperCase() };
          },
        },
        serializers: {
          err: pino.stdSerializers.err,
        },
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      process.stderr
    );
  }

  /**
   * Check if a log level should be output
   */
  private shouldLog(level: LogLevel): boolean {
    if (this.currentLevel === "SILENT") {
      return false;
    }
    return LOG_LEVELS[level] <= LOG_LEVELS[this.currentLevel];
  }

  private writeLog(
    level: Exclude<LogLevel, "SILENT">,
    message: string,
    data: Record<string, unknown>
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const redactedData = redact(data);

    switch (level) {
      case "ERROR":
        this.pino.error(redactedData, message);
        break;
      case "WARN":
        this.pino.warn(redactedData, message);
        break;
      case "INFO":
        this.pino.info(redactedData, message);
        break;
      case "DEBUG":
        this.pino.debug(redactedData, message);
        break;
      case "TRACE":
        this.pino.trace(redactedData, message);
        break;
    }
  }

  error(message: string, data: Record<string, unknown> = {}): void {
    this.writeLog("ERROR", message, data);
  }

  warn(message: string, data: Record<string, unknown> = {}): void {
    this.writeLog("WARN", message, data);
  }

  info(message: string, data: Record<string, unknown> = {}): void {
    this.writeLog("INFO", message, data);
  }

  debug(message: string, data: Record<string, unknown> = {}): void {
    this.writeLog("DEBUG", message, data);
  }

  trace(message: string, data: Record<string, unknown> = {}): void {
    this.writeLog("TRACE", message, data);
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }
}

/**
 * Create logger from a level string such as "info" or "DEBUG"
 */
export function createLogger(levelString: string): Logger {
  const normalized = levelString.trim().toUpperCase() || "INFO";

  if (!isLogLevel(normalized)) {
    process.stderr.write(`Invalid log level '${levelString}', using INFO\n`);
    return new Logger("INFO");
  }

  return new Logger(normalized);
}

/**
 * Logger used when a component is constructed without one
 */
export function createDefaultLogger(): Logger {
  return createLogger(process.env.LOG_LEVEL ?? "WARN");
}
