import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { closeConnection, type DatabaseHandle } from "../../../../src/db/connection.js";
import {
  MAX_ERROR_SAMPLES,
  RunDiagnostics,
  RunLedger,
  toSyncStatus,
} from "../../../../src/services/sync/runs.js";
import { SourceRegistry } from "../../../../src/services/sync/sources.js";
import { SYSTEM_URL } from "../../../fixtures/oparl.js";
import { createTestDatabase } from "../../../helpers/db.js";

describe("services/sync/runs", () => {
  let handle: DatabaseHandle;
  let ledger: RunLedger;
  let registry: SourceRegistry;
  let sourceId: number;

  beforeEach(async () => {
    handle = await createTestDatabase();
    ledger = new RunLedger(handle.db);
    registry = new SourceRegistry(handle.db);
    const { source } = await registry.addSource({ name: "Beispielstadt", baseUrl: SYSTEM_URL });
    sourceId = source.id;
  });

  afterEach(async () => {
    await closeConnection(handle);
  });

  describe("RunDiagnostics", () => {
    it("should count every error but keep a bounded sample", () => {
      const diagnostics = new RunDiagnostics();
      for (let i = 0; i < MAX_ERROR_SAMPLES + 10; i++) {
        diagnostics.record("validation", "person", `person ${String(i)} is missing name`);
      }
      diagnostics.record("fetch", "file", "HTTP 500", { url: "https://ris.example.org/files" });

      expect(diagnostics.count("validation")).toBe(60);
      expect(diagnostics.counts).toEqual({ validation: 60, fetch: 1 });
      expect(diagnostics.samples).toHaveLength(MAX_ERROR_SAMPLES);
      expect(diagnostics.samples[0]).toMatchObject({
        kind: "validation",
        entityType: "person",
        message: "person 0 is missing name",
      });
    });
  });

  describe("createRun", () => {
    it("should create a pending run", async () => {
      const { run, isNew } = await ledger.createRun(sourceId, "FULL", "cli");

      expect(isNew).toBe(true);
      expect(run).toMatchObject({
        sourceId,
        mode: "FULL",
        state: "PENDING",
        requestedBy: "cli",
        counters: {},
        errors: [],
        relations: null,
        startedAt: null,
      });
    });

    it("should return the active run instead of a second one", async () => {
      const first = await ledger.createRun(sourceId, "FULL", "cli");
      await ledger.markRunning(first.run.id, "worker-a", null);

      const second = await ledger.createRun(sourceId, "INCREMENTAL", "api");

      expect(second.isNew).toBe(false);
      expect(second.run.id).toBe(first.run.id);
      expect(second.run.state).toBe("RUNNING");
    });

    it("should create a new run once the previous one finished", async () => {
      const first = await ledger.createRun(sourceId, "FULL", "cli");
      await ledger.failRun(first.run.id, "lease_unavailable", "Source 1 is leased by another worker");

      const second = await ledger.createRun(sourceId, "FULL", "cli");

      expect(second.isNew).toBe(true);
      expect(second.run.id).not.toBe(first.run.id);
    });
  });

  describe("transitions", () => {
    it("should record the worker and high-water mark when running", async () => {
      const { run } = await ledger.createRun(sourceId, "INCREMENTAL", "scheduler");
      await ledger.markRunning(run.id, "worker-a", "2025-01-01T00:00:00.000Z");

      const status = toSyncStatus(await ledger.requireRun(run.id));

      expect(status).toMatchObject({
        runId: run.id,
        state: "RUNNING",
        workerId: "worker-a",
        highWaterMarkUsed: "2025-01-01T00:00:00.000Z",
      });
      expect(status.startedAt).not.toBeNull();
    });

    it("should store the outcome of a finished run", async () => {
      const { run } = await ledger.createRun(sourceId, "FULL", "api");
      const diagnostics = new RunDiagnostics();
      diagnostics.record("fetch", "file", "HTTP 500 from https://ris.example.org/files");

      await ledger.finishRun(run.id, {
        state: "PARTIAL",
        counters: {
          file: { fetched: 0, upserted: 0, skipped: 0, failed: 0, inserted: 0, updated: 0 },
        },
        diagnostics,
        relations: { resolved: 3, stillPending: 1, orphaned: 0 },
        highWaterMarkProduced: "2025-01-02T00:00:00.000Z",
      });
      const stored = await ledger.requireRun(run.id);

      expect(stored).toMatchObject({
        state: "PARTIAL",
        errorCounts: { fetch: 1 },
        relations: { resolved: 3, stillPending: 1, orphaned: 0 },
        highWaterMarkProduced: "2025-01-02T00:00:00.000Z",
      });
      expect(stored.errors.map((error) => error.message)).toEqual([
        "HTTP 500 from https://ris.example.org/files",
      ]);
      expect(stored.finishedAt).not.toBeNull();
    });

    it("should fail running runs whose lease is gone", async () => {
      const { run } = await ledger.createRun(sourceId, "FULL", "cli");
      await ledger.markRunning(run.id, "worker-dead", null);

      const recovered = await ledger.recoverStaleRuns();
      const stored = await ledger.requireRun(run.id);

      expect(recovered).toEqual([run.id]);
      expect(stored.state).toBe("FAILED");
      expect(stored.errorCounts).toEqual({ stale_run: 1 });
    });

    it("should keep running runs whose lease is still valid", async () => {
      const now = new Date("2025-01-01T00:00:00.000Z");
      const { run } = await ledger.createRun(sourceId, "FULL", "cli");
      await registry.acquireLease(sourceId, "worker-a", 600, now);
      await ledger.markRunning(run.id, "worker-a", null);

      expect(await ledger.recoverStaleRuns(now)).toEqual([]);
      expect((await ledger.requireRun(run.id)).state).toBe("RUNNING");
    });
  });

  describe("queries", () => {
    it("should list runs newest first", async () => {
      const first = await ledger.createRun(sourceId, "FULL", "cli");
      await ledger.failRun(first.run.id, "internal", "boom");
      const second = await ledger.createRun(sourceId, "FULL", "cli");

      const runs = await ledger.listRuns(sourceId);

      expect(runs.map((run) => run.id)).toEqual([second.run.id, first.run.id]);
      expect((await ledger.listByState("PENDING")).map((run) => run.id)).toEqual([
        second.run.id,
      ]);
    });

    it("should throw NotFoundError for an unknown run", async () => {
      await expect(ledger.requireRun(999)).rejects.toThrow("Sync run 999 not found");
    });
  });
});
