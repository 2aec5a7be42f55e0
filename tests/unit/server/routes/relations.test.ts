import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { normalize } from "../../../../src/services/sync/canonical/index.js";
import { resolvePending } from "../../../../src/services/sync/relations.js";
import { upsertEntity } from "../../../../src/services/sync/upsert.js";
import { SYSTEM_URL, entityId, membershipPayload } from "../../../fixtures/oparl.js";
import { createTestApp, type TestApp } from "../../../helpers/app.js";

describe("server/routes/relations", () => {
  let ctx: TestApp;
  let sourceId: number;

  beforeEach(async () => {
    ctx = await createTestApp();
    const { source } = await ctx.service.sources.addSource({
      name: "Beispielstadt",
      baseUrl: SYSTEM_URL,
    });
    sourceId = source.id;
  });

  afterEach(async () => {
    await ctx.close();
  });

  describe("GET /api/v1/sources/:sourceId/orphans", () => {
    it("should return an empty page when nothing is orphaned", async () => {
      const response = await ctx.app.inject({
        method: "GET",
        url: `/api/v1/sources/${String(sourceId)}/orphans`,
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        data: [],
        meta: { pagination: { limit: 20, offset: 0, hasMore: false } },
      });
    });

    it("should list edges whose target never appeared", async () => {
      const result = normalize("membership", membershipPayload(1, 1, 1));
      if (!result.ok) {
        throw result.failure;
      }
      await upsertEntity(ctx.handle.db, sourceId, result.record, "2025-01-01T00:00:00.000Z");
      await resolvePending(ctx.handle.db, sourceId, { runId: null, orphanAfterRuns: 1 });

      const response = await ctx.app.inject({
        method: "GET",
        url: `/api/v1/sources/${String(sourceId)}/orphans?limit=1`,
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.data).toHaveLength(1);
      expect(body.data[0]).toMatchObject({ unresolvedAttempts: 1, lastAttemptRunId: null });
      expect([entityId("person", 1), entityId("organization", 1)]).toContain(
        body.data[0].targetExternalId
      );
      expect(body.meta.pagination.hasMore).toBe(true);
    });

    it("should return 404 for an unknown source", async () => {
      const response = await ctx.app.inject({ method: "GET", url: "/api/v1/sources/9/orphans" });

      expect(response.statusCode).toBe(404);
    });
  });
});
