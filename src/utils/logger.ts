/**
 * Logger Module
 * Structured logging using pino with file and console output
 */

import pino, { type Logger as PinoLogger } from "pino";
import * as fs from "node:fs";
import * as path from "node:path";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  /** Directory for `<component>.log`; defaults to `LOG_DIR`. Unset means no file log. */
  logDir?: string;
}

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

/**
 * Ensures the log directory exists
 */
function ensureLogDir(logDir: string): void {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
}

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production";
}

function isTest(): boolean {
  return process.env.NODE_ENV === "test" || process.env.VITEST !== undefined;
}

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

/**
 * Get log level from environment or default
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  if (isTest()) return "silent";
  return isDevelopment() ? "debug" : "info";
}

function getLogDir(): string | undefined {
  const dir = process.env.LOG_DIR?.trim();
  return dir ? path.resolve(dir) : undefined;
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "governor", "artifact-store", "coordinator")
 *
 * @example
 * ```typescript
 * const logger = createLogger("governor");
 * logger.info({ url }, "Fetching page");
 * logger.error({ err }, "Fetch failed");
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): PinoLogger {
  const { level = getLogLevel(), logDir = getLogDir() } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  if (logDir) {
    ensureLogDir(logDir);

    const destination = pino.destination({
      dest: path.join(logDir, `${component}.log`),
      sync: false,
    });

    return pino(baseOptions, destination);
  }

  // Pretty output only for an interactive terminal outside tests
  if (isDevelopment() && !isTest() && process.stdout.isTTY && level !== "silent") {
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
  }

  return pino(baseOptions);
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(parent: PinoLogger, bindings: Record<string, unknown>): PinoLogger {
  return parent.child(bindings);
}

export type Logger = PinoLogger;
