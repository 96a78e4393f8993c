/**
 * Logger Module
 * Structured logging using pino
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production";
}

function isTestRun(): boolean {
  return process.env.VITEST !== undefined || process.env.NODE_ENV === "test";
}

/**
 * Get log level from environment or default
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  if (isTestRun()) return "silent";
  return isDevelopment() ? "debug" : "info";
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "graph-store", "checkpoint", "jobs")
 *
 * @example
 * ```typescript
 * const logger = createLogger("graph-store");
 * logger.info({ project: "demo" }, "Graph rebuilt");
 * logger.error({ err }, "Rebuild failed");
 * ```
 */
export function createLogger(component: string): PinoLogger {
  const level = getLogLevel();

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  // Pretty transport spawns a worker thread; keep it out of test runs and silent loggers
  if (isDevelopment() && !isTestRun() && level !== "silent") {
    try {
      return pino({
        ...baseOptions,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:HH:MM:ss",
            ignore: "pid,hostname",
          },
        },
      });
    } catch {
      return pino(baseOptions);
    }
  }

  return pino(baseOptions);
}

export type Logger = PinoLogger;
