/**
 * Local Artifact Store
 *
 * @module
 */

export type { IArtifactStore } from "./interfaces/IArtifactStore.js";
export { FileArtifactStore, assertValidKey, type FileArtifactStoreOptions } from "./file-artifact-store.js";
export {
  PHASES,
  PhaseNameSchema,
  CheckpointStateSchema,
  FailureEntrySchema,
  FailureLogSchema,
  emptyCheckpointState,
  type PhaseName,
  type CheckpointState,
  type FailureEntry,
  type FailureLog,
} from "./models/store-state.js";
