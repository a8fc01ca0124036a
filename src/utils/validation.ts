/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating configuration at runtime.
 * Provides type-safe validation with automatic TypeScript type inference.
 *
 * @module
 */

import * as os from "node:os";
import { z } from "zod";
import { DEFAULT_DATA_DIR, DEFAULT_OUTPUT_DIR } from "./paths.js";

// =============================================================================
// Pacing and Retry
// =============================================================================

const DelayRangeSchema = z
  .object({
    minMs: z.number().int().nonnegative(),
    maxMs: z.number().int().nonnegative(),
  })
  .refine((range) => range.maxMs >= range.minMs, {
    message: "maxMs must be greater than or equal to minMs",
  });

export type DelayRange = z.infer<typeof DelayRangeSchema>;

/**
 * Request pacing and anomaly escalation for the fetch governor
 */
export const PacingConfigSchema = z.object({
  /** Base delay between requests in the Normal state */
  normalDelay: DelayRangeSchema.default({ minMs: 2000, maxMs: 6000 }),
  /** Jitter added on top of the Normal base delay */
  normalJitter: DelayRangeSchema.default({ minMs: 0, maxMs: 4000 }),
  /** Delay between requests in the Cautious and Backoff states */
  cautiousDelay: DelayRangeSchema.default({ minMs: 10000, maxMs: 20000 }),
  /** Anomaly-free requests needed to leave Cautious */
  cautiousWindow: z.number().int().positive().default(10),
  /** First Backoff pause; doubled on each further consecutive anomaly */
  backoffPauseMs: z.number().int().nonnegative().default(180_000),
  /** Consecutive anomalies that abort the governor */
  abortThreshold: z.number().int().positive().default(5),
});

export type PacingConfig = z.infer<typeof PacingConfigSchema>;

/**
 * Per-fetch retry policy, independent of the anomaly state machine
 */
export const RetryConfigSchema = z.object({
  maxAttempts: z.number().int().positive().default(3),
  attemptTimeoutMs: z.number().int().positive().default(30_000),
  initialDelayMs: z.number().int().nonnegative().default(2000),
  backoffFactor: z.number().min(1).default(2),
  maxDelayMs: z.number().int().nonnegative().default(30_000),
});

export type RetryConfig = z.infer<typeof RetryConfigSchema>;

// =============================================================================
// Application Configuration Schema
// =============================================================================

export const SeedUrlsSchema = z.object({
  faq: z.string().url().default("https://ecitizen.go.ke/en/help-and-support"),
  agencies: z.string().url().default("https://ecitizen.go.ke/en/agencies"),
  ministries: z.string().url().default("https://accounts.ecitizen.go.ke/en/home/national-ministries"),
});

export type SeedUrls = z.infer<typeof SeedUrlsSchema>;

export const AppConfigSchema = z.object({
  seedUrls: SeedUrlsSchema.default({}),

  /** Root of raw artifacts, checkpoints, failure log and logs */
  dataDir: z.string().min(1).default(DEFAULT_DATA_DIR),

  /** Where serialized entity files and reports are written */
  outputDir: z.string().min(1).default(DEFAULT_OUTPUT_DIR),

  userAgent: z
    .string()
    .min(1)
    .default("directory-graph/0.1 (public research dataset crawler)"),

  pacing: PacingConfigSchema.default({}),

  retry: RetryConfigSchema.default({}),

  /** Parse & resolve worker pool size */
  concurrency: z
    .number()
    .int()
    .positive()
    .default(() => Math.max(1, os.availableParallelism())),

  /** Absolute delta between reported and observed counts that is tolerated */
  discrepancyTolerance: z.number().int().nonnegative().default(0),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/** Input shape accepted by the schema (all fields optional) */
export type AppConfigInput = z.input<typeof AppConfigSchema>;
