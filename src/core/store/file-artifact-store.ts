/**
 * File Artifact Store
 *
 * Raw artifacts live at `<dataDir>/raw/<key>.html`; checkpoints and the
 * failure log at `<dataDir>/state/*.json`. Every write is atomic and
 * serialized per key, so concurrent workers never contend on unrelated keys.
 *
 * @module
 */

import * as path from "node:path";
import type { z } from "zod";
import { ArtifactStoreError, ErrorCode, errorMessage } from "../errors.js";
import { KeyedMutex } from "../../utils/async.js";
import { findFiles, readFileIfExists, writeFileAtomic } from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";
import { getRawDir, getStateDir } from "../../utils/paths.js";
import type { IArtifactStore } from "./interfaces/IArtifactStore.js";
import {
  CheckpointStateSchema,
  FailureLogSchema,
  emptyCheckpointState,
  type CheckpointState,
  type FailureEntry,
  type PhaseName,
} from "./models/store-state.js";

const logger = createLogger("artifact-store");

const ARTIFACT_EXTENSION = ".html";
const CHECKPOINTS_FILE = "checkpoints.json";
const FAILURES_FILE = "failures.json";
const KEY_SEGMENT = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

/**
 * Throws unless the key is one or more safe slash-separated segments.
 */
export function assertValidKey(key: string): void {
  const segments = key.split("/");
  if (key.length === 0 || !segments.every((segment) => KEY_SEGMENT.test(segment))) {
    throw new ArtifactStoreError(`Invalid artifact key: "${key}"`, ErrorCode.STORE_INVALID_KEY, { key });
  }
}

export interface FileArtifactStoreOptions {
  dataDir: string;
  /** Clock for checkpoint timestamps */
  now?: () => Date;
}

export class FileArtifactStore implements IArtifactStore {
  private rawDir: string;
  private stateDir: string;
  private now: () => Date;
  private locks = new KeyedMutex();
  private opened = false;

  private checkpointState: CheckpointState = emptyCheckpointState();
  private failures = new Map<string, FailureEntry>();

  constructor(options: FileArtifactStoreOptions) {
    this.rawDir = getRawDir(options.dataDir);
    this.stateDir = getStateDir(options.dataDir);
    this.now = options.now ?? (() => new Date());
  }

  async open(): Promise<void> {
    if (this.opened) return;

    const checkpoints = await this.readState(CHECKPOINTS_FILE, CheckpointStateSchema);
    this.checkpointState = checkpoints ?? emptyCheckpointState();

    const failureLog = await this.readState(FAILURES_FILE, FailureLogSchema);
    this.failures = new Map((failureLog?.entries ?? []).map((entry) => [entry.key, entry]));

    this.opened = true;
    logger.debug(
      {
        completedPhases: this.checkpointState.completedPhases,
        failures: this.failures.size,
      },
      "Artifact store opened"
    );
  }

  // ==========================================================================
  // Artifacts
  // ==========================================================================

  async put(key: string, content: string): Promise<void> {
    const filePath = this.artifactPath(key);
    await this.locks.runExclusive(key, async () => {
      try {
        await writeFileAtomic(filePath, content);
      } catch (error) {
        throw this.ioError(`Failed to write artifact "${key}"`, error, { key });
      }
    });
  }

  async get(key: string): Promise<string | null> {
    const filePath = this.artifactPath(key);
    return this.locks.runExclusive(key, async () => {
      try {
        return await readFileIfExists(filePath);
      } catch (error) {
        throw this.ioError(`Failed to read artifact "${key}"`, error, { key });
      }
    });
  }

  async has(key: string): Promise<boolean> {
    return (await this.get(key)) !== null;
  }

  async keys(): Promise<string[]> {
    const files = await findFiles({ patterns: [`**/*${ARTIFACT_EXTENSION}`], cwd: this.rawDir });
    return files.map((file) => file.slice(0, -ARTIFACT_EXTENSION.length));
  }

  // ==========================================================================
  // Checkpoints
  // ==========================================================================

  async markPhaseComplete(phase: PhaseName): Promise<void> {
    this.ensureOpen();
    if (!this.checkpointState.completedPhases.includes(phase)) {
      this.checkpointState.completedPhases.push(phase);
    }
    await this.saveCheckpoints();
  }

  isPhaseComplete(phase: PhaseName): boolean {
    return this.checkpointState.completedPhases.includes(phase);
  }

  async markProcessed(stage: string, key: string): Promise<void> {
    this.ensureOpen();
    const keys = this.checkpointState.processed[stage] ?? [];
    if (!keys.includes(key)) {
      keys.push(key);
      keys.sort();
      this.checkpointState.processed[stage] = keys;
      await this.saveCheckpoints();
    }
  }

  isProcessed(stage: string, key: string): boolean {
    return this.checkpointState.processed[stage]?.includes(key) ?? false;
  }

  checkpoints(): CheckpointState {
    return structuredClone(this.checkpointState);
  }

  // ==========================================================================
  // Failure Log
  // ==========================================================================

  async recordFailure(entry: FailureEntry): Promise<void> {
    this.ensureOpen();
    this.failures.set(entry.key, entry);
    await this.saveFailures();
  }

  async clearFailure(key: string): Promise<void> {
    this.ensureOpen();
    if (this.failures.delete(key)) {
      await this.saveFailures();
    }
  }

  getFailure(key: string): FailureEntry | null {
    return this.failures.get(key) ?? null;
  }

  listFailures(): FailureEntry[] {
    return [...this.failures.values()].sort((a, b) => a.key.localeCompare(b.key));
  }

  // ==========================================================================
  // Internal
  // ==========================================================================

  private artifactPath(key: string): string {
    assertValidKey(key);
    return path.join(this.rawDir, ...key.split("/")) + ARTIFACT_EXTENSION;
  }

  private ensureOpen(): void {
    if (!this.opened) {
      throw new ArtifactStoreError("Artifact store used before open()", ErrorCode.STORE_IO_FAILED);
    }
  }

  private async saveCheckpoints(): Promise<void> {
    this.checkpointState.updatedAt = this.now().toISOString();
    await this.writeState(CHECKPOINTS_FILE, this.checkpointState);
  }

  private async saveFailures(): Promise<void> {
    await this.writeState(FAILURES_FILE, { version: 1, entries: this.listFailures() });
  }

  private async writeState(fileName: string, data: unknown): Promise<void> {
    const filePath = path.join(this.stateDir, fileName);
    const content = JSON.stringify(data, null, 2) + "\n";
    await this.locks.runExclusive(`state/${fileName}`, async () => {
      try {
        await writeFileAtomic(filePath, content);
      } catch (error) {
        throw this.ioError(`Failed to write ${fileName}`, error, { filePath });
      }
    });
  }

  private async readState<S extends z.ZodTypeAny>(fileName: string, schema: S): Promise<z.infer<S> | null> {
    const filePath = path.join(this.stateDir, fileName);
    const content = await readFileIfExists(filePath);
    if (content === null) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ArtifactStoreError(`${fileName} is not valid JSON`, ErrorCode.STORE_STATE_CORRUPT, {
        filePath,
        cause: errorMessage(error),
      });
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new ArtifactStoreError(`${fileName} does not match the expected shape`, ErrorCode.STORE_STATE_CORRUPT, {
        filePath,
        issues: parsed.error.issues,
      });
    }
    return parsed.data;
  }

  private ioError(message: string, error: unknown, context: Record<string, unknown>): ArtifactStoreError {
    return new ArtifactStoreError(message, ErrorCode.STORE_IO_FAILED, {
      ...context,
      cause: errorMessage(error),
    });
  }
}
