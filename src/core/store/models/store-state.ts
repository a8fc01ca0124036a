/**
 * Persisted store state: checkpoints and the failure log
 */

import { z } from "zod";
import { FETCH_FAILURE_KINDS } from "../../errors.js";

export const PHASES = ["faq", "agency-directory", "ministries"] as const;

export const PhaseNameSchema = z.enum(PHASES);

export type PhaseName = z.infer<typeof PhaseNameSchema>;

// =============================================================================
// Checkpoints
// =============================================================================

export const CheckpointStateSchema = z.object({
  version: z.literal(1),
  /** Phases whose output was fully processed in a run */
  completedPhases: z.array(PhaseNameSchema).default([]),
  /** Keys processed downstream, per stage (page type) */
  processed: z.record(z.string(), z.array(z.string())).default({}),
  updatedAt: z.string().datetime().nullable().default(null),
});

export type CheckpointState = z.infer<typeof CheckpointStateSchema>;

export function emptyCheckpointState(): CheckpointState {
  return { version: 1, completedPhases: [], processed: {}, updatedAt: null };
}

// =============================================================================
// Failure Log
// =============================================================================

export const FailureEntrySchema = z.object({
  key: z.string(),
  url: z.string(),
  pageType: z.string(),
  kind: z.enum(FETCH_FAILURE_KINDS),
  message: z.string(),
  attempts: z.number().int().nonnegative(),
  status: z.number().int().optional(),
  recordedAt: z.string().datetime(),
});

export type FailureEntry = z.infer<typeof FailureEntrySchema>;

export const FailureLogSchema = z.object({
  version: z.literal(1),
  entries: z.array(FailureEntrySchema).default([]),
});

export type FailureLog = z.infer<typeof FailureLogSchema>;
