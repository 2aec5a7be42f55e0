import { setTimeout as delay } from "node:timers/promises";

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { closeConnection, type DatabaseHandle } from "../../../../src/db/connection.js";
import { LeaseError } from "../../../../src/errors.js";
import { LeaseKeeper } from "../../../../src/services/sync/lease-keeper.js";
import { SourceRegistry } from "../../../../src/services/sync/sources.js";
import { SYSTEM_URL } from "../../../fixtures/oparl.js";
import { createTestDatabase } from "../../../helpers/db.js";

const ACQUIRED_AT = new Date("2025-01-01T00:00:00.000Z");
const RENEWED_AT = new Date("2025-01-01T00:05:00.000Z");

describe("services/sync/lease-keeper", () => {
  let handle: DatabaseHandle;
  let registry: SourceRegistry;
  let sourceId: number;
  let keeper: LeaseKeeper;

  beforeEach(async () => {
    handle = await createTestDatabase();
    registry = new SourceRegistry(handle.db);
    const { source } = await registry.addSource({ name: "Beispielstadt", baseUrl: SYSTEM_URL });
    sourceId = source.id;
    await registry.acquireLease(sourceId, "worker-a", 600, ACQUIRED_AT);
    keeper = new LeaseKeeper(registry, {
      sourceId,
      owner: "worker-a",
      ttlSeconds: 600,
      now: () => RENEWED_AT,
    });
  });

  afterEach(async () => {
    await keeper.stop();
    await closeConnection(handle);
  });

  async function takeOver(): Promise<void> {
    await handle.db
      .updateTable("sources")
      .set({ lease_owner: "worker-b" })
      .where("id", "=", sourceId)
      .execute();
  }

  it("should renew the lease on its timer", async () => {
    keeper.start(5);

    await vi.waitFor(async () => {
      expect((await registry.requireSource(sourceId)).leaseExpiresAt).toBe(
        "2025-01-01T00:15:00.000Z"
      );
    });
    expect(keeper.lost).toBe(false);
  });

  it("should notice a lease taken over between pages", async () => {
    await takeOver();
    keeper.start(5);

    await vi.waitFor(() => {
      expect(keeper.lost).toBe(true);
    });
    await expect(keeper.ensure()).rejects.toBeInstanceOf(LeaseError);
  });

  it("should not renew on ensure before half of the TTL has passed", async () => {
    await keeper.ensure();

    expect((await registry.requireSource(sourceId)).leaseExpiresAt).toBe(
      "2025-01-01T00:10:00.000Z"
    );
  });

  it("should stop renewing once stopped", async () => {
    keeper.start(5);
    await keeper.stop();
    await takeOver();

    await delay(30);

    expect(keeper.lost).toBe(false);
  });
});
