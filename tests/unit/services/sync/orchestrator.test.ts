import { setTimeout as delay } from "node:timers/promises";

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { closeConnection, type DatabaseHandle } from "../../../../src/db/connection.js";
import { SyncEvents, type SyncEventMap } from "../../../../src/services/sync/events.js";
import {
  SyncOrchestrator,
  type ExecuteOptions,
  type OrchestratorOptions,
} from "../../../../src/services/sync/orchestrator.js";
import { RunLedger } from "../../../../src/services/sync/runs.js";
import {
  SourceRegistry,
  type SourceSnapshot,
} from "../../../../src/services/sync/sources.js";
import { countEntitiesByType, getEntity } from "../../../../src/services/sync/upsert.js";
import {
  BODIES_URL,
  BODY_ID,
  LIST_URLS,
  SYSTEM_URL,
  entityId,
  filePayload,
  listPage,
  meetingPayload,
  membershipPayload,
  organizationPayload,
  paperPayload,
  personPayload,
  serveSource,
} from "../../../fixtures/oparl.js";
import { createTestDatabase } from "../../../helpers/db.js";
import { FakeOParlServer } from "../../../helpers/fake-oparl.js";

import type { FetchLike } from "../../../../src/scraper/client.js";
import type { SyncMode } from "../../../../src/types/index.js";

const FIRST_RUN = new Date("2025-01-01T00:00:00.000Z");
const SECOND_RUN = new Date("2025-01-02T00:00:00.000Z");

const EMPTY = { fetched: 0, upserted: 0, skipped: 0, failed: 0, inserted: 0, updated: 0 };

function serveCouncil(server: FakeOParlServer): void {
  serveSource(server, {
    organization: [organizationPayload(1)],
    person: [personPayload(1), personPayload(2)],
    membership: [membershipPayload(1, 1, 1)],
    meeting: [meetingPayload(1)],
    paper: [paperPayload(1)],
    file: [filePayload(1)],
  });
}

describe("services/sync/orchestrator", () => {
  let handle: DatabaseHandle;
  let server: FakeOParlServer;
  let registry: SourceRegistry;
  let ledger: RunLedger;
  let source: SourceSnapshot;
  let clock: Date;

  function createOrchestrator(overrides: Partial<OrchestratorOptions> = {}): SyncOrchestrator {
    return new SyncOrchestrator(handle.db, {
      workerId: "worker-a",
      fetch: server.fetch,
      config: { pageDelayMs: 0, retryBaseDelayMs: 0, retryMaxDelayMs: 0 },
      retryHooks: { sleep: () => Promise.resolve() },
      now: () => clock,
      ...overrides,
    });
  }

  async function runSync(
    mode: SyncMode = "FULL",
    orchestrator: SyncOrchestrator = createOrchestrator(),
    options: ExecuteOptions = {}
  ) {
    const { run } = await ledger.createRun(source.id, mode, "cli");
    return orchestrator.execute(run.id, options);
  }

  beforeEach(async () => {
    handle = await createTestDatabase();
    server = new FakeOParlServer();
    registry = new SourceRegistry(handle.db);
    ledger = new RunLedger(handle.db);
    clock = FIRST_RUN;
    ({ source } = await registry.addSource({
      name: "Beispielstadt",
      baseUrl: SYSTEM_URL,
      maxRetries: 1,
    }));
  });

  afterEach(async () => {
    await closeConnection(handle);
  });

  // ============================================================================
  // Full runs
  // ============================================================================

  describe("full run", () => {
    it("should store every entity type and resolve relations", async () => {
      serveCouncil(server);

      const status = await runSync();

      expect(status.state).toBe("SUCCESS");
      expect(status.perEntityType.body).toEqual({ ...EMPTY, fetched: 1, upserted: 1, inserted: 1 });
      expect(status.perEntityType.person).toEqual({ ...EMPTY, fetched: 2, upserted: 2, inserted: 2 });
      expect(status.perEntityType.membership).toEqual({
        ...EMPTY,
        fetched: 1,
        upserted: 1,
        inserted: 1,
      });
      // organization, 2 persons and paper point at the body; membership at person and organization; meeting at organization
      expect(status.relations).toEqual({ resolved: 7, stillPending: 0, orphaned: 0 });
      expect(status.errors).toEqual([]);
      expect(await countEntitiesByType(handle.db, source.id)).toEqual({
        body: 1,
        organization: 1,
        person: 2,
        membership: 1,
        meeting: 1,
        paper: 1,
        file: 1,
      });
    });

    it("should advance the high-water mark to the fetch start", async () => {
      serveCouncil(server);

      const status = await runSync();
      const updated = await registry.requireSource(source.id);

      expect(status.highWaterMarkProduced).toBe(FIRST_RUN.toISOString());
      expect(updated.highWaterMark).toBe(FIRST_RUN.toISOString());
      expect(updated.lastRunId).toBe(status.runId);
      expect(updated.leaseOwner).toBeNull();
    });

    it("should be idempotent when nothing changed upstream", async () => {
      serveCouncil(server);
      await runSync();
      const before = await getEntity(handle.db, source.id, entityId("person", 1));

      clock = SECOND_RUN;
      const status = await runSync();
      const after = await getEntity(handle.db, source.id, entityId("person", 1));

      expect(status.state).toBe("SUCCESS");
      expect(status.perEntityType.person).toEqual({ ...EMPTY, fetched: 2, upserted: 2 });
      expect(status.relations).toEqual({ resolved: 0, stillPending: 0, orphaned: 0 });
      expect(after?.id).toBe(before?.id);
      expect(after?.updatedAt).toBe(FIRST_RUN.toISOString());
      expect(after?.lastSyncedAt).toBe(SECOND_RUN.toISOString());
    });

    it("should count updates when a payload changed", async () => {
      serveCouncil(server);
      await runSync();

      server.json(
        LIST_URLS.person,
        listPage([personPayload(1, { familyName: "Beispiel" }), personPayload(2)])
      );
      clock = SECOND_RUN;
      const status = await runSync();

      expect(status.perEntityType.person).toEqual({
        ...EMPTY,
        fetched: 2,
        upserted: 2,
        updated: 1,
      });
      expect((await getEntity(handle.db, source.id, entityId("person", 1)))?.name).toBe(
        "Erika Beispiel"
      );
    });

    it("should skip records repeated across pages", async () => {
      serveSource(server);
      server
        .json(
          LIST_URLS.person,
          listPage([personPayload(1), personPayload(2)], `${LIST_URLS.person}?page=2`)
        )
        .json(`${LIST_URLS.person}?page=2`, listPage([personPayload(2), personPayload(3)]));

      const status = await runSync();

      expect(status.perEntityType.person).toEqual({
        ...EMPTY,
        fetched: 4,
        skipped: 1,
        upserted: 3,
        inserted: 3,
      });
    });

    it("should store embedded records under their own type", async () => {
      serveSource(server, {
        paper: [paperPayload(1, { mainFile: filePayload(9) })],
      });

      const status = await runSync();

      expect(status.perEntityType.file).toEqual({ ...EMPTY, upserted: 1, inserted: 1 });
      expect(await getEntity(handle.db, source.id, entityId("file", 9))).toMatchObject({
        entityType: "file",
        bodyExternalId: BODY_ID,
      });
    });
  });

  // ============================================================================
  // Incremental runs
  // ============================================================================

  describe("incremental run", () => {
    it("should send the high-water mark and skip older records", async () => {
      serveCouncil(server);
      await runSync("FULL");

      server.requests.length = 0;
      clock = SECOND_RUN;
      const status = await runSync("INCREMENTAL");

      expect(status.highWaterMarkUsed).toBe(FIRST_RUN.toISOString());
      expect(server.requestsTo(LIST_URLS.person).map((request) => request.url)).toEqual([
        `${LIST_URLS.person}?modified_since=2025-01-01T00%3A00%3A00.000Z`,
      ]);
      // The body list is always read in full
      expect(server.requestsTo(BODIES_URL).map((request) => request.url)).toEqual([BODIES_URL]);
      expect(status.perEntityType.person).toEqual({ ...EMPTY, fetched: 2, skipped: 2 });
      expect(status.highWaterMarkProduced).toBe(SECOND_RUN.toISOString());
    });

    it("should behave as a full run without a high-water mark", async () => {
      serveCouncil(server);

      const status = await runSync("INCREMENTAL");

      expect(status.highWaterMarkUsed).toBeNull();
      expect(server.requestsTo(LIST_URLS.person).map((request) => request.url)).toEqual([
        LIST_URLS.person,
      ]);
    });
  });

  // ============================================================================
  // Failures
  // ============================================================================

  describe("failures", () => {
    it("should finish PARTIAL when one entity list fails", async () => {
      serveCouncil(server);
      server.route(LIST_URLS.file, { status: 500 });

      const status = await runSync();

      expect(status.state).toBe("PARTIAL");
      expect(status.perEntityType.file).toEqual(EMPTY);
      expect(status.perEntityType.person).toEqual({ ...EMPTY, fetched: 2, upserted: 2, inserted: 2 });
      expect(status.errorCounts).toEqual({ fetch: 1 });
      expect(status.errors).toEqual([
        expect.objectContaining({
          kind: "fetch",
          entityType: "file",
          url: LIST_URLS.file,
          message: `HTTP 500 from ${LIST_URLS.file}`,
        }),
      ]);
      expect(server.requestsTo(LIST_URLS.file)).toHaveLength(2);
      expect(status.relations).toEqual({ resolved: 7, stillPending: 0, orphaned: 0 });
      expect((await registry.requireSource(source.id)).highWaterMark).toBe(
        FIRST_RUN.toISOString()
      );
    });

    it("should fail without touching the high-water mark when the system is unreachable", async () => {
      server.route(SYSTEM_URL, { status: 503 });

      const status = await runSync();

      expect(status.state).toBe("FAILED");
      expect(status.errorCounts).toEqual({ fetch: 1 });
      expect(status.relations).toBeNull();
      expect(status.highWaterMarkProduced).toBeNull();
      expect((await registry.requireSource(source.id)).highWaterMark).toBeNull();
    });

    it("should count records that fail validation and keep going", async () => {
      serveSource(server, {
        person: [personPayload(1), personPayload(2, { givenName: null, familyName: null })],
      });

      const status = await runSync();

      expect(status.state).toBe("SUCCESS");
      expect(status.perEntityType.person).toEqual({
        ...EMPTY,
        fetched: 2,
        failed: 1,
        upserted: 1,
        inserted: 1,
      });
      expect(status.errors).toEqual([
        expect.objectContaining({
          kind: "validation",
          entityType: "person",
          externalId: entityId("person", 2),
        }),
      ]);
    });

    it("should record unreadable pages and continue", async () => {
      serveSource(server);
      server.route(LIST_URLS.meeting, { body: "<html>maintenance</html>" });

      const status = await runSync();

      expect(status.state).toBe("SUCCESS");
      expect(status.errorCounts).toEqual({ parse: 1 });
      expect(status.errors[0]).toMatchObject({ kind: "parse", entityType: "meeting" });
    });

    it("should count list entries that are not objects as failed", async () => {
      serveSource(server);
      server.json(LIST_URLS.person, { data: [personPayload(1), "oops"], links: {} });

      const status = await runSync();

      expect(status.state).toBe("SUCCESS");
      expect(status.perEntityType.person).toEqual({
        ...EMPTY,
        fetched: 2,
        failed: 1,
        upserted: 1,
        inserted: 1,
      });
      expect(status.errorCounts).toEqual({ validation: 1 });
      expect(status.errors).toEqual([
        expect.objectContaining({
          kind: "validation",
          entityType: "person",
          url: LIST_URLS.person,
          message: "person list entry is not an object",
        }),
      ]);
    });

    it("should retry transient failures until the list answers", async () => {
      serveCouncil(server);
      server.route(
        LIST_URLS.person,
        { status: 503 },
        { status: 503 },
        { body: listPage([personPayload(1), personPayload(2)]) }
      );
      await handle.db
        .updateTable("sources")
        .set({ max_retries: 3 })
        .where("id", "=", source.id)
        .execute();
      const retries: { url: string; attempt: number; status: number | null }[] = [];

      const status = await runSync(
        "FULL",
        createOrchestrator({
          onRetry: (event) => {
            retries.push({ url: event.url, attempt: event.attempt, status: event.error.status });
          },
        })
      );

      expect(status.state).toBe("SUCCESS");
      expect(retries).toEqual([
        { url: LIST_URLS.person, attempt: 1, status: 503 },
        { url: LIST_URLS.person, attempt: 2, status: 503 },
      ]);
      expect(server.requestsTo(LIST_URLS.person)).toHaveLength(3);
      expect(status.perEntityType.person).toEqual({ ...EMPTY, fetched: 2, upserted: 2, inserted: 2 });
      expect(status.errors).toEqual([]);
    });

    it("should report relations orphaned in this run", async () => {
      const missing = entityId("organization", 99);
      serveSource(server, {
        meeting: [meetingPayload(1, { organization: [missing] })],
      });

      const status = await runSync(
        "FULL",
        createOrchestrator({
          config: { pageDelayMs: 0, retryBaseDelayMs: 0, retryMaxDelayMs: 0, orphanAfterRuns: 1 },
        })
      );
      const meeting = await getEntity(handle.db, source.id, entityId("meeting", 1));

      expect(status.relations).toEqual({ resolved: 0, stillPending: 0, orphaned: 1 });
      expect(status.errorCounts).toEqual({ orphaned_relation: 1 });
      expect(status.errors).toEqual([
        expect.objectContaining({
          kind: "orphaned_relation",
          entityType: null,
          externalId: missing,
          message: `Relation meeting.organization from entity ${String(meeting?.id)} to ${missing} unresolved after 1 runs`,
        }),
      ]);
    });

    it("should keep unresolved references pending", async () => {
      serveSource(server, {
        meeting: [meetingPayload(1, { organization: [entityId("organization", 99)] })],
      });

      const status = await runSync();

      expect(status.state).toBe("SUCCESS");
      expect(status.relations).toEqual({ resolved: 0, stillPending: 1, orphaned: 0 });
    });
  });

  // ============================================================================
  // Concurrency control
  // ============================================================================

  describe("leases and cancellation", () => {
    it("should fail when another worker holds the lease", async () => {
      serveCouncil(server);
      await registry.acquireLease(source.id, "worker-b", 600, FIRST_RUN);

      const status = await runSync();

      expect(status.state).toBe("FAILED");
      expect(status.errorCounts).toEqual({ lease_unavailable: 1 });
      expect(server.requests).toHaveLength(0);
      expect((await registry.requireSource(source.id)).leaseOwner).toBe("worker-b");
    });

    it("should stop at the next page boundary when cancelled", async () => {
      serveCouncil(server);
      const controller = new AbortController();

      const status = await runSync("FULL", createOrchestrator(), {
        signal: controller.signal,
        onProgress: (progress) => {
          if (progress.phase === "person") {
            controller.abort();
          }
        },
      });

      expect(status.state).toBe("FAILED");
      expect(status.errorCounts).toEqual({ cancelled: 1 });
      expect(status.perEntityType.organization).toEqual({
        ...EMPTY,
        fetched: 1,
        upserted: 1,
        inserted: 1,
      });
      expect(status.relations).toBeNull();
      expect(server.requestsTo(LIST_URLS.person)).toHaveLength(0);
      expect(await registry.requireSource(source.id)).toMatchObject({
        highWaterMark: null,
        leaseOwner: null,
      });
    });

    it("should store the page in flight and stop after it", async () => {
      serveCouncil(server);
      const controller = new AbortController();
      const requestSignals: boolean[] = [];
      const cancelMidRequest: FetchLike = async (url, init) => {
        if (url === LIST_URLS.person) {
          controller.abort();
          await delay(20);
          requestSignals.push(init.signal?.aborted === true);
        }
        return server.fetch(url, init);
      };

      const status = await runSync("FULL", createOrchestrator({ fetch: cancelMidRequest }), {
        signal: controller.signal,
      });

      expect(requestSignals).toEqual([false]);
      expect(status.state).toBe("FAILED");
      expect(status.errorCounts).toEqual({ cancelled: 1 });
      expect(status.perEntityType.person).toEqual({ ...EMPTY, fetched: 2, upserted: 2, inserted: 2 });
      expect(await countEntitiesByType(handle.db, source.id)).toMatchObject({ person: 2 });
      expect(server.requestsTo(LIST_URLS.membership)).toHaveLength(0);
      expect(status.relations).toBeNull();
    });

    it("should abort when the lease is taken over mid-run", async () => {
      serveCouncil(server);
      const stealing: FetchLike = async (url, init) => {
        if (url === LIST_URLS.organization) {
          await handle.db
            .updateTable("sources")
            .set({ lease_owner: "worker-b" })
            .where("id", "=", source.id)
            .execute();
        }
        return server.fetch(url, init);
      };

      // A zero TTL renews the lease before every page
      const status = await runSync(
        "FULL",
        createOrchestrator({
          fetch: stealing,
          config: { pageDelayMs: 0, retryBaseDelayMs: 0, retryMaxDelayMs: 0, leaseTtlSeconds: 0 },
        })
      );

      expect(status.state).toBe("FAILED");
      expect(status.errorCounts).toEqual({ lease_lost: 1 });
      expect(status.perEntityType.organization).toEqual(EMPTY);
    });

    it("should leave runs that are no longer pending untouched", async () => {
      serveCouncil(server);
      const { run } = await ledger.createRun(source.id, "FULL", "cli");
      await ledger.failRun(run.id, "internal", "gave up");

      const status = await createOrchestrator().execute(run.id);

      expect(status.errorCounts).toEqual({ internal: 1 });
      expect(server.requests).toHaveLength(0);
    });
  });

  // ============================================================================
  // Events
  // ============================================================================

  describe("events", () => {
    it("should announce runs and changed entities", async () => {
      serveCouncil(server);
      const events = new SyncEvents();
      const changes: SyncEventMap["entity:changed"][] = [];
      const finished: SyncEventMap["run:finished"][] = [];
      events.on("entity:changed", (event) => changes.push(event));
      events.on("run:finished", (event) => finished.push(event));

      const status = await runSync("FULL", createOrchestrator({ events }));

      expect(changes).toHaveLength(8);
      expect(changes.every((change) => change.change === "inserted")).toBe(true);
      expect(finished).toEqual([
        expect.objectContaining({ runId: status.runId, sourceId: source.id, state: "SUCCESS", errorCount: 0 }),
      ]);
    });

    it("should not let a failing listener break the run", async () => {
      serveCouncil(server);
      const events = new SyncEvents();
      events.on("entity:changed", () => {
        throw new Error("listener failed");
      });

      const status = await runSync("FULL", createOrchestrator({ events }));

      expect(status.state).toBe("SUCCESS");
    });
  });
});
