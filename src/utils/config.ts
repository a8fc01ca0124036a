/**
 * Configuration loading
 *
 * Reads the optional project config file, applies command-line overrides
 * and validates the result. Every field has a default, so a missing file
 * yields the default configuration.
 *
 * @module
 */

import { ConfigurationError, ErrorCode, errorMessage } from "../core/errors.js";
import { readJson } from "./index.js";
import { getConfigPath } from "./paths.js";
import { AppConfigSchema, type AppConfig, type AppConfigInput } from "./validation.js";

export interface LoadConfigOptions {
  /** Defaults to `.directory-graph/config.json` under the working directory */
  configPath?: string;
  /** Top-level values that replace the file's; undefined entries are ignored */
  overrides?: AppConfigInput;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const configPath = options.configPath ?? getConfigPath();

  let fileInput: unknown;
  try {
    fileInput = readJson(configPath) ?? {};
  } catch (error) {
    throw new ConfigurationError(`Cannot read ${configPath}: ${errorMessage(error)}`, ErrorCode.CONFIG_UNREADABLE, {
      configPath,
    });
  }

  if (!isRecord(fileInput)) {
    throw new ConfigurationError(`${configPath} must contain a JSON object`, ErrorCode.CONFIG_INVALID, { configPath });
  }

  const overrides = Object.fromEntries(
    Object.entries(options.overrides ?? {}).filter(([, value]) => value !== undefined)
  );

  const parsed = AppConfigSchema.safeParse({ ...fileInput, ...overrides });
  if (!parsed.success) {
    const summary = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${summary}`, ErrorCode.CONFIG_INVALID, {
      configPath,
      issues: parsed.error.issues,
    });
  }

  return parsed.data;
}
