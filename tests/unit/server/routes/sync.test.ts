import { describe, it, expect, beforeEach, afterEach } from "vitest";

import {
  SYSTEM_URL,
  organizationPayload,
  serveSource,
} from "../../../fixtures/oparl.js";
import { createTestApp, type TestApp } from "../../../helpers/app.js";

describe("server/routes/sync", () => {
  let ctx: TestApp;
  let sourceId: number;

  beforeEach(async () => {
    ctx = await createTestApp();
    serveSource(ctx.server, { organization: [organizationPayload(1), organizationPayload(2)] });
    const { source } = await ctx.service.sources.addSource({
      name: "Beispielstadt",
      baseUrl: SYSTEM_URL,
    });
    sourceId = source.id;
  });

  afterEach(async () => {
    await ctx.close();
  });

  describe("GET /api/v1/sync/runs/:runId", () => {
    it("should return the status of a finished run", async () => {
      const { runId } = await ctx.service.runToCompletion(sourceId, { mode: "FULL" });

      const response = await ctx.app.inject({
        method: "GET",
        url: `/api/v1/sync/runs/${String(runId)}`,
      });

      expect(response.statusCode).toBe(200);
      const { data } = response.json();
      expect(data).toMatchObject({ runId, sourceId, mode: "FULL", state: "SUCCESS" });
      expect(data.perEntityType.organization).toMatchObject({ fetched: 2, upserted: 2 });
      expect(data.errors).toEqual([]);
    });

    it("should return 404 for an unknown run", async () => {
      const response = await ctx.app.inject({ method: "GET", url: "/api/v1/sync/runs/999" });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({
        error: "NOT_FOUND",
        message: "Sync run 999 not found",
      });
    });

    it("should reject a non-numeric run id", async () => {
      const response = await ctx.app.inject({ method: "GET", url: "/api/v1/sync/runs/latest" });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe("VALIDATION_ERROR");
    });
  });

  describe("DELETE /api/v1/sync/runs/:runId", () => {
    it("should report a finished run as not cancellable", async () => {
      const { runId } = await ctx.service.runToCompletion(sourceId);

      const response = await ctx.app.inject({
        method: "DELETE",
        url: `/api/v1/sync/runs/${String(runId)}`,
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().data).toEqual({
        runId,
        cancelled: false,
        message: `Run ${String(runId)} is success and not active in this process`,
      });
    });

    it("should not cancel a pending run owned by another process", async () => {
      const { run } = await ctx.service.runs.createRun(sourceId, "FULL", "scheduler");

      const response = await ctx.app.inject({
        method: "DELETE",
        url: `/api/v1/sync/runs/${String(run.id)}`,
      });

      expect(response.json().data).toMatchObject({
        cancelled: false,
        message: `Run ${String(run.id)} is pending and not active in this process`,
      });
      expect((await ctx.service.getSyncStatus(run.id)).state).toBe("PENDING");
    });
  });
});
