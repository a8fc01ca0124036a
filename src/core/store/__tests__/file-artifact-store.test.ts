/**
 * Tests for FileArtifactStore
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { FileArtifactStore } from "../file-artifact-store.js";
import { ArtifactStoreError, ErrorCode } from "../../errors.js";
import type { FailureEntry } from "../models/store-state.js";

const FIXED_NOW = new Date("2024-05-01T10:00:00.000Z");

function failure(key: string): FailureEntry {
  return {
    key,
    url: `https://example.test/${key}`,
    pageType: "agency-services",
    kind: "timeout",
    message: "No response within 30000ms",
    attempts: 3,
    recordedAt: FIXED_NOW.toISOString(),
  };
}

describe("FileArtifactStore", () => {
  let dataDir: string;
  let store: FileArtifactStore;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "artifact-store-"));
    store = new FileArtifactStore({ dataDir, now: () => FIXED_NOW });
    await store.open();
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  describe("artifacts", () => {
    it("should treat a missing key as a cache miss", async () => {
      expect(await store.get("faq")).toBeNull();
      expect(await store.has("faq")).toBe(false);
    });

    it("should round-trip content under nested keys", async () => {
      await store.put("ministries/abc123def456/services", "<ul></ul>");

      expect(await store.get("ministries/abc123def456/services")).toBe("<ul></ul>");
      const onDisk = await fs.readFile(
        path.join(dataDir, "raw", "ministries", "abc123def456", "services.html"),
        "utf-8"
      );
      expect(onDisk).toBe("<ul></ul>");
    });

    it("should overwrite content for an existing key", async () => {
      await store.put("faq", "old");
      await store.put("faq", "new");
      expect(await store.get("faq")).toBe("new");
    });

    it("should list stored keys in order", async () => {
      await store.put("ministries", "a");
      await store.put("faq", "b");
      await store.put("ministries/abc123def456", "c");

      expect(await store.keys()).toEqual(["faq", "ministries", "ministries/abc123def456"]);
    });

    it("should list no keys before anything is stored", async () => {
      expect(await store.keys()).toEqual([]);
    });

    it("should list only artifacts, not leftover temporary files", async () => {
      await store.put("ministries/abc123def456", "c");
      await fs.writeFile(path.join(dataDir, "raw", "ministries", "abc123def456.html.42.deadbeef.tmp"), "partial");
      await fs.writeFile(path.join(dataDir, "raw", "notes.txt"), "not an artifact");

      expect(await store.keys()).toEqual(["ministries/abc123def456"]);
    });

    it("should reject keys that escape the store", async () => {
      for (const key of ["", "../etc", "a//b", "/abs", "a/.hidden"]) {
        const error = await store.put(key, "x").catch((e: unknown) => e);
        expect(error).toBeInstanceOf(ArtifactStoreError);
        if (error instanceof ArtifactStoreError) {
          expect(error.code).toBe(ErrorCode.STORE_INVALID_KEY);
        }
      }
    });

    it("should keep concurrent writes to different keys intact", async () => {
      const keys = Array.from({ length: 20 }, (_, i) => `page-${i}`);
      await Promise.all(keys.map((key) => store.put(key, `content of ${key}`)));

      for (const key of keys) {
        expect(await store.get(key)).toBe(`content of ${key}`);
      }
    });
  });

  describe("checkpoints", () => {
    it("should persist completed phases and processed keys across instances", async () => {
      await store.markPhaseComplete("faq");
      await store.markProcessed("agency-services", "ministries/b");
      await store.markProcessed("agency-services", "ministries/a");
      await store.markProcessed("agency-services", "ministries/a");

      const reopened = new FileArtifactStore({ dataDir });
      await reopened.open();

      expect(reopened.isPhaseComplete("faq")).toBe(true);
      expect(reopened.isPhaseComplete("ministries")).toBe(false);
      expect(reopened.isProcessed("agency-services", "ministries/a")).toBe(true);
      expect(reopened.checkpoints()).toEqual({
        version: 1,
        completedPhases: ["faq"],
        processed: { "agency-services": ["ministries/a", "ministries/b"] },
        updatedAt: "2024-05-01T10:00:00.000Z",
      });
    });

    it("should reject corrupt checkpoint files", async () => {
      await fs.mkdir(path.join(dataDir, "state"), { recursive: true });
      await fs.writeFile(path.join(dataDir, "state", "checkpoints.json"), "{ not json");

      const reopened = new FileArtifactStore({ dataDir });
      const error = await reopened.open().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ArtifactStoreError);
      if (error instanceof ArtifactStoreError) {
        expect(error.code).toBe(ErrorCode.STORE_STATE_CORRUPT);
      }
    });

    it("should refuse state changes before open", async () => {
      const unopened = new FileArtifactStore({ dataDir });
      await expect(unopened.markPhaseComplete("faq")).rejects.toThrow(ArtifactStoreError);
    });
  });

  describe("failure log", () => {
    it("should record, list and clear failures", async () => {
      await store.recordFailure(failure("zeta"));
      await store.recordFailure(failure("alpha"));

      expect(store.listFailures().map((entry) => entry.key)).toEqual(["alpha", "zeta"]);
      expect(store.getFailure("zeta")?.kind).toBe("timeout");

      await store.clearFailure("zeta");
      expect(store.getFailure("zeta")).toBeNull();

      const reopened = new FileArtifactStore({ dataDir });
      await reopened.open();
      expect(reopened.listFailures()).toEqual([failure("alpha")]);
    });

    it("should replace an earlier failure for the same key", async () => {
      await store.recordFailure(failure("alpha"));
      await store.recordFailure({ ...failure("alpha"), kind: "challenge" });

      expect(store.listFailures()).toHaveLength(1);
      expect(store.getFailure("alpha")?.kind).toBe("challenge");
    });
  });
});
