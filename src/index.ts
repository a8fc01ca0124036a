/**
 * directory-graph
 *
 * Library entry point. The CLI lives in `cli/index.ts`.
 *
 * @module
 */

export * from "./core/index.js";
export { loadConfig, type LoadConfigOptions } from "./utils/config.js";
export {
  AppConfigSchema,
  PacingConfigSchema,
  RetryConfigSchema,
  SeedUrlsSchema,
  type AppConfig,
  type AppConfigInput,
  type PacingConfig,
  type RetryConfig,
  type SeedUrls,
} from "./utils/validation.js";
export { createLogger, type Logger } from "./utils/logger.js";
