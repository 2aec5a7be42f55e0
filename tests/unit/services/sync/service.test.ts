import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { closeConnection, type DatabaseHandle } from "../../../../src/db/connection.js";
import { NotFoundError } from "../../../../src/errors.js";
import { SyncScheduler } from "../../../../src/services/sync/scheduler.js";
import { SyncService } from "../../../../src/services/sync/service.js";
import {
  SYSTEM_URL,
  organizationPayload,
  personPayload,
  serveSource,
} from "../../../fixtures/oparl.js";
import { createTestDatabase } from "../../../helpers/db.js";
import { FakeOParlServer } from "../../../helpers/fake-oparl.js";

import type { SyncProgress } from "../../../../src/services/sync/orchestrator.js";

describe("services/sync/service", () => {
  let handle: DatabaseHandle;
  let server: FakeOParlServer;
  let service: SyncService;
  let sourceId: number;

  beforeEach(async () => {
    handle = await createTestDatabase();
    server = new FakeOParlServer();
    serveSource(server, {
      organization: [organizationPayload(1)],
      person: [personPayload(1)],
    });
    service = new SyncService(handle.db, {
      concurrency: 2,
      workerId: "worker-test",
      fetch: server.fetch,
      orchestrator: { pageDelayMs: 0, retryBaseDelayMs: 0, retryMaxDelayMs: 0 },
      retryHooks: { sleep: () => Promise.resolve() },
    });
    const { source } = await service.sources.addSource({
      name: "Beispielstadt",
      baseUrl: SYSTEM_URL,
      defaultMode: "FULL",
    });
    sourceId = source.id;
  });

  afterEach(async () => {
    await service.shutdown();
    await closeConnection(handle);
  });

  // ============================================================================
  // Trigger interface
  // ============================================================================

  describe("startSync", () => {
    it("should queue a run in the source's default mode", async () => {
      const started = await service.startSync(sourceId, { requestedBy: "api" });

      expect(started).toMatchObject({ sourceId, mode: "FULL", isNew: true });
      await service.waitForRun(started.runId);

      const status = await service.getSyncStatus(started.runId);
      expect(status).toMatchObject({
        state: "SUCCESS",
        requestedBy: "api",
        workerId: "worker-test",
      });
    });

    it("should return the active run instead of starting a second one", async () => {
      const first = await service.startSync(sourceId);
      const second = await service.startSync(sourceId, { mode: "INCREMENTAL" });

      expect(second.runId).toBe(first.runId);
      expect(second.isNew).toBe(false);
      expect(second.mode).toBe("FULL");

      await service.onIdle();
      expect((await service.runs.listRuns(sourceId)).map((run) => run.id)).toEqual([
        first.runId,
      ]);
      // One system request: the run executed once
      expect(server.requestsTo(SYSTEM_URL)).toHaveLength(1);
    });

    it("should reject an unknown source", async () => {
      await expect(service.startSync(999)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("runToCompletion", () => {
    it("should report progress and return the final status", async () => {
      const phases: SyncProgress["phase"][] = [];

      const status = await service.runToCompletion(sourceId, {
        mode: "INCREMENTAL",
        requestedBy: "cli",
        onProgress: (progress) => phases.push(progress.phase),
      });

      expect(status.state).toBe("SUCCESS");
      expect(status.mode).toBe("INCREMENTAL");
      expect(phases).toEqual([
        "system",
        "body",
        "organization",
        "person",
        "membership",
        "meeting",
        "paper",
        "file",
        "relations",
      ]);
    });
  });

  describe("syncAllEnabled", () => {
    it("should queue one run per enabled source", async () => {
      const { source: disabled } = await service.sources.addSource({
        name: "Stillgelegt",
        baseUrl: `${SYSTEM_URL}?disabled`,
        enabled: false,
      });

      const started = await service.syncAllEnabled("FULL", "scheduler");
      await service.onIdle();

      expect(started.map((run) => run.sourceId)).toEqual([sourceId]);
      expect(await service.runs.listRuns(disabled.id)).toEqual([]);
    });
  });

  // ============================================================================
  // Lifecycle
  // ============================================================================

  describe("start", () => {
    it("should resume runs left pending by a previous process", async () => {
      const { run } = await service.runs.createRun(sourceId, "FULL", "scheduler");

      const { recovered, resumed } = await service.start();
      await service.onIdle();

      expect(recovered).toEqual([]);
      expect(resumed).toEqual([run.id]);
      expect((await service.getSyncStatus(run.id)).state).toBe("SUCCESS");
    });

    it("should fail runs abandoned while running", async () => {
      const { run } = await service.runs.createRun(sourceId, "FULL", "cli");
      await service.runs.markRunning(run.id, "worker-gone", null);

      const { recovered } = await service.start();

      expect(recovered).toEqual([run.id]);
      expect((await service.getSyncStatus(run.id)).state).toBe("FAILED");
    });
  });

  describe("cancel", () => {
    it("should return false for a run this process does not execute", async () => {
      expect(await service.cancel(12345)).toBe(false);
    });

    it("should fail a queued run so the next trigger creates a new one", async () => {
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const single = new SyncService(handle.db, {
        concurrency: 1,
        workerId: "worker-single",
        fetch: async (url, init) => {
          await gate;
          return server.fetch(url, init);
        },
        orchestrator: { pageDelayMs: 0, retryBaseDelayMs: 0, retryMaxDelayMs: 0 },
        retryHooks: { sleep: () => Promise.resolve() },
      });
      const { source: neighbour } = await single.sources.addSource({
        name: "Nachbarstadt",
        baseUrl: `${SYSTEM_URL}?tenant=2`,
        defaultMode: "FULL",
      });

      await single.startSync(sourceId);
      const queued = await single.startSync(neighbour.id);

      expect(await single.cancel(queued.runId)).toBe(true);
      const status = await single.getSyncStatus(queued.runId);
      expect(status.state).toBe("FAILED");
      expect(status.errorCounts).toEqual({ cancelled: 1 });
      expect(status.errors[0]?.message).toBe("Sync run cancelled before it started");

      const again = await single.startSync(neighbour.id);
      expect(again.isNew).toBe(true);
      expect(again.runId).not.toBe(queued.runId);

      release();
      await single.onIdle();
      await single.shutdown();
      expect((await single.getSyncStatus(again.runId)).state).toBe("SUCCESS");
    });
  });

  // ============================================================================
  // Scheduler
  // ============================================================================

  describe("SyncScheduler", () => {
    it("should queue incremental runs on a tick", async () => {
      const scheduler = new SyncScheduler(service, { intervalMinutes: 15, fullIntervalHours: 24 });

      const results = await scheduler.tickIncremental();
      await service.onIdle();

      expect(results).toEqual([
        expect.objectContaining({ sourceId, mode: "INCREMENTAL", isNew: true }),
      ]);
      const [run] = await service.runs.listRuns(sourceId);
      expect(run?.requestedBy).toBe("scheduler");
    });

    it("should report already active runs on overlapping ticks", async () => {
      const scheduler = new SyncScheduler(service, { intervalMinutes: 15, fullIntervalHours: 24 });

      const first = await scheduler.tickFull();
      const second = await scheduler.tickIncremental();
      await service.onIdle();

      expect(first[0]?.isNew).toBe(true);
      expect(second[0]).toMatchObject({ runId: first[0]?.runId, isNew: false, mode: "FULL" });
    });

    it("should start and stop its timers", () => {
      const scheduler = new SyncScheduler(service, { intervalMinutes: 15, fullIntervalHours: 24 });

      scheduler.start();
      expect(scheduler.running).toBe(true);
      scheduler.stop();
      expect(scheduler.running).toBe(false);
    });
  });
});
