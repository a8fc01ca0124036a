/**
 * Run report
 *
 * Structured outcome of one pipeline run. Non-fatal problems accumulate
 * here instead of stopping the crawl.
 *
 * @module
 */

import type { PageType } from "../../../types/index.js";
import type { ErrorCode } from "../../errors.js";
import type { GovernorSnapshot } from "../../fetch/fetch-governor.js";
import type { FailureEntry, PhaseName } from "../../store/models/store-state.js";
import type {
  CountNotReportedWarning,
  DiscrepancyFinding,
  EntityCounts,
  InvariantViolation,
} from "../../assembly/models/findings.js";

/**
 * - `success`: every page obtained and parsed, graph valid
 * - `partial-failure`: some pages failed or were skipped, graph valid
 * - `aborted`: the governor aborted; graph built from what was cached
 * - `failed`: an invariant was violated
 */
export type RunStatus = "success" | "partial-failure" | "aborted" | "failed";

/**
 * - `network`: fetch every cache miss
 * - `failed-only`: fetch only misses recorded in the failure log
 * - `cache-only`: never fetch
 */
export type FetchPolicy = "network" | "failed-only" | "cache-only";

export const FETCH_POLICIES: readonly FetchPolicy[] = ["network", "failed-only", "cache-only"];

export interface FetchStats {
  /** Keys the run needed */
  requested: number;
  fetched: number;
  cacheHits: number;
  /** Misses the policy or an abort kept off the network */
  skipped: number;
  failed: number;
  skippedKeys: string[];
}

export interface PhaseStats {
  phase: PhaseName;
  keys: number;
  fetched: number;
  cacheHits: number;
  skipped: number;
  failed: number;
  parsed: number;
  parseFailures: number;
  complete: boolean;
  durationMs: number;
}

export interface ParseFailureWarning {
  kind: "parse-failed";
  key: string;
  pageType: PageType;
  code: ErrorCode;
  message: string;
}

export interface UnplacedAgencyWarning {
  kind: "unplaced-directory-agency";
  agencyNameHash: string;
  name: string;
  message: string;
}

export type RunWarning = ParseFailureWarning | UnplacedAgencyWarning | CountNotReportedWarning;

export interface RunReport {
  status: RunStatus;
  policy: FetchPolicy;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  governor: GovernorSnapshot;
  fetch: FetchStats;
  phases: PhaseStats[];
  counts: EntityCounts;
  /** Placements kept without global directory metadata */
  unmatchedPlacements: number;
  violations: InvariantViolation[];
  discrepancies: DiscrepancyFinding[];
  warnings: RunWarning[];
  failures: FailureEntry[];
}

export type PipelinePhase = PhaseName | "assembly";

export interface PipelineProgressEvent {
  phase: PipelinePhase;
  /** Key being processed (if applicable) */
  currentKey?: string;
  processed: number;
  total: number;
  /** 0-100 within the phase */
  percentage: number;
  message: string;
}
