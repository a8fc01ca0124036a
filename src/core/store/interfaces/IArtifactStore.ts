/**
 * Artifact Store Interface
 *
 * Raw page content keyed by hierarchy position, plus the checkpoint markers
 * and failure log that make re-runs resumable.
 *
 * @module
 */

import type { CheckpointState, FailureEntry, PhaseName } from "../models/store-state.js";

export interface IArtifactStore {
  /** Loads persisted state; must be called before use */
  open(): Promise<void>;

  put(key: string, content: string): Promise<void>;
  /** Cache miss returns null */
  get(key: string): Promise<string | null>;
  has(key: string): Promise<boolean>;
  keys(): Promise<string[]>;

  markPhaseComplete(phase: PhaseName): Promise<void>;
  isPhaseComplete(phase: PhaseName): boolean;
  markProcessed(stage: string, key: string): Promise<void>;
  isProcessed(stage: string, key: string): boolean;
  checkpoints(): CheckpointState;

  recordFailure(entry: FailureEntry): Promise<void>;
  clearFailure(key: string): Promise<void>;
  getFailure(key: string): FailureEntry | null;
  listFailures(): FailureEntry[];
}
