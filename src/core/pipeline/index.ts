/**
 * Crawl pipeline
 *
 * @module
 */

export { PhaseCoordinator, type PhaseCoordinatorOptions, type PipelineResult } from "./phase-coordinator.js";
export * from "./artifact-keys.js";
export { FETCH_POLICIES } from "./models/run-report.js";
export type {
  FetchPolicy,
  FetchStats,
  ParseFailureWarning,
  PhaseStats,
  PipelinePhase,
  PipelineProgressEvent,
  RunReport,
  RunStatus,
  RunWarning,
  UnplacedAgencyWarning,
} from "./models/run-report.js";
