import { Type } from "@sinclair/typebox";
import Fastify, { type FastifyInstance } from "fastify";
import { describe, it, expect, beforeAll, afterAll } from "vitest";

import {
  ConfigError,
  LeaseError,
  NotFoundError,
  ParseError,
  StorageError,
} from "../../../../src/errors.js";
import { errorHandler } from "../../../../src/server/plugins/error-handler.js";

describe("server/plugins/error-handler", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = Fastify({ logger: false });
    await app.register(errorHandler);

    // Test routes that throw different errors
    app.get("/missing-source", async () => {
      throw new NotFoundError("source", 7);
    });

    app.get("/bad-config", async () => {
      throw new ConfigError("Invalid source: baseUrl must use http or https", [
        "baseUrl must use http or https",
      ]);
    });

    app.get("/lease", async () => {
      throw new LeaseError("Source 3 is leased by worker-b", "lease_unavailable", 3);
    });

    app.get("/storage", async () => {
      throw new StorageError("Database unavailable", null, null);
    });

    app.get("/parse", async () => {
      throw new ParseError("Unexpected token", "https://ris.example.org/oparl/v1/system");
    });

    app.get("/client-error", async () => {
      throw Object.assign(new Error("Payload too large"), {
        statusCode: 413,
        code: "FST_ERR_CTP_BODY_TOO_LARGE",
      });
    });

    app.get("/generic-error", async () => {
      throw new Error("Something went wrong");
    });

    app.get(
      "/validated",
      { schema: { querystring: Type.Object({ limit: Type.Integer() }) } },
      async () => ({ ok: true })
    );

    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  // ============================================================================
  // Ingestion errors
  // ============================================================================

  it("should map NotFoundError to 404 with the resource", async () => {
    const response = await app.inject({ method: "GET", url: "/missing-source" });

    expect(response.statusCode).toBe(404);
    const body = response.json();
    expect(body.error).toBe("NOT_FOUND");
    expect(body.message).toBe("Source 7 not found");
    expect(body.details).toEqual({ resource: "source", id: 7 });
    expect(body.requestId).toBeDefined();
  });

  it("should map ConfigError to 400 with its problems", async () => {
    const response = await app.inject({ method: "GET", url: "/bad-config" });

    expect(response.statusCode).toBe(400);
    const body = response.json();
    expect(body.error).toBe("CONFIG_ERROR");
    expect(body.details).toEqual({ problems: ["baseUrl must use http or https"] });
  });

  it("should map LeaseError to 409", async () => {
    const response = await app.inject({ method: "GET", url: "/lease" });

    expect(response.statusCode).toBe(409);
    expect(response.json().error).toBe("LEASE_ERROR");
    expect(response.json().message).toBe("Source 3 is leased by worker-b");
  });

  it("should map StorageError to 503", async () => {
    const response = await app.inject({ method: "GET", url: "/storage" });

    expect(response.statusCode).toBe(503);
    expect(response.json().error).toBe("STORAGE_ERROR");
    expect(response.json().message).toBe("Database unavailable");
  });

  it("should hide the message of other ingestion errors", async () => {
    const response = await app.inject({ method: "GET", url: "/parse" });

    expect(response.statusCode).toBe(500);
    const body = response.json();
    expect(body.error).toBe("PARSE_ERROR");
    expect(body.message).toBe("An unexpected error occurred");
  });

  // ============================================================================
  // Framework errors
  // ============================================================================

  it("should return schema validation failures as 400", async () => {
    const response = await app.inject({ method: "GET", url: "/validated?limit=many" });

    expect(response.statusCode).toBe(400);
    const body = response.json();
    expect(body.error).toBe("VALIDATION_ERROR");
    expect(body.message).toBe("Invalid request parameters");
    expect(Array.isArray(body.details.validation)).toBe(true);
  });

  it("should pass client errors through with their status", async () => {
    const response = await app.inject({ method: "GET", url: "/client-error" });

    expect(response.statusCode).toBe(413);
    expect(response.json()).toMatchObject({
      error: "FST_ERR_CTP_BODY_TOO_LARGE",
      message: "Payload too large",
    });
  });

  it("should return a generic 500 for unexpected errors", async () => {
    const response = await app.inject({ method: "GET", url: "/generic-error" });

    expect(response.statusCode).toBe(500);
    const body = response.json();
    expect(body.error).toBe("INTERNAL_ERROR");
    expect(body.message).toBe("An unexpected error occurred");
  });

  it("should answer unknown routes with NOT_FOUND", async () => {
    const response = await app.inject({ method: "GET", url: "/nope" });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toMatchObject({
      error: "NOT_FOUND",
      message: "Route GET /nope not found",
    });
  });
});
