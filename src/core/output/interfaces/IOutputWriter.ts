/**
 * Output Writer Interface
 *
 * @module
 */

import type { PipelineResult } from "../../pipeline/phase-coordinator.js";

export interface IOutputWriter {
  /**
   * Serializes a validated graph and its run report.
   * @returns paths written, sorted
   * @throws InvariantViolationError when the graph violates an invariant
   */
  write(result: PipelineResult): Promise<string[]>;
}
