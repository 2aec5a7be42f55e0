import { setTimeout as delay } from "node:timers/promises";

import {
  FetchError,
  ParseError,
  SyncCancelledError,
  errorMessage,
} from "../errors.js";
import { apiLogger } from "../logger.js";

import type { CircuitBreaker } from "./circuit-breaker.js";
import { RetryPolicy, type RetryEvent, type RetryOptions } from "./retry.js";

import type {
  JsonObject,
  JsonValue,
  OParlObject,
  OParlSystem,
} from "../types/index.js";

// ============================================================================
// Types
// ============================================================================

/**
 * The subset of `fetch` the client relies on; the global fetch satisfies it
 */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface OParlClientOptions {
  credential?: string | null;
  requestTimeoutSeconds: number;
  retry: RetryPolicy | RetryOptions;
  /** Minimum gap between two requests of this client */
  minRequestIntervalMs?: number;
  maxPages?: number;
  fetch?: FetchLike;
  /**
   * Stops the client between requests: before an attempt, during backoff
   * and rate-limit waits. A request in flight runs until it answers or
   * times out.
   */
  signal?: AbortSignal;
  /** Shared by every request of the source; open means fail fast */
  circuitBreaker?: CircuitBreaker;
  onRetry?: (event: RetryEvent) => void;
}

/**
 * `items` holds every entry of the page's data array as sent, objects or not
 */
export type ListPageResult =
  | { kind: "page"; url: string; items: JsonValue[] }
  | { kind: "parse_error"; url: string; error: ParseError };

export interface FetchListOptions {
  /** Incremental lower bound (ISO-8601), sent as `modified_since` */
  since?: string | null;
}

export interface ClientStats {
  requests: number;
  retries: number;
  pages: number;
  parseErrors: number;
  httpTimeMs: number;
}

const DEFAULT_MAX_PAGES = 10_000;

// ============================================================================
// URL helpers
// ============================================================================

export function withQueryParam(url: string, name: string, value: string): string {
  const parsed = new URL(url);
  parsed.searchParams.set(name, value);
  return parsed.toString();
}

/**
 * URL of the following page when a page body could not be read, derived
 * from its `page` query parameter. Null when the URL has none.
 */
export function incrementPageParam(url: string): string | null {
  const parsed = new URL(url);
  const page = parsed.searchParams.get("page");
  if (page === null || !/^\d+$/.test(page)) {
    return null;
  }
  parsed.searchParams.set("page", String(Number.parseInt(page, 10) + 1));
  return parsed.toString();
}

/**
 * Retry-After is either delta-seconds or an HTTP date
 */
export function parseRetryAfter(
  header: string | null,
  now: number = Date.now()
): number | null {
  if (header === null || header.trim() === "") {
    return null;
  }
  const trimmed = header.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10) * 1000;
  }
  const date = Date.parse(trimmed);
  return Number.isNaN(date) ? null : Math.max(0, date - now);
}

function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: JsonValue | undefined): string | null {
  return typeof value === "string" && value !== "" ? value : null;
}

type ParsedListPage =
  | { ok: true; items: JsonValue[]; next: string | null }
  | { ok: false; reason: string; next: string | null; validJson: boolean };

function parseListPage(text: string): ParsedListPage {
  let body: JsonValue;
  try {
    body = JSON.parse(text);
  } catch (error) {
    return {
      ok: false,
      reason: `Invalid JSON: ${errorMessage(error)}`,
      next: null,
      validJson: false,
    };
  }

  if (!isJsonObject(body)) {
    return { ok: false, reason: "List page is not an object", next: null, validJson: true };
  }

  const links = body.links;
  const next = isJsonObject(links) ? optionalString(links.next) : null;
  const data = body.data;

  if (!Array.isArray(data)) {
    return { ok: false, reason: "List page has no data array", next, validJson: true };
  }

  return { ok: true, items: data, next };
}

// ============================================================================
// OParlClient
// ============================================================================

/**
 * HTTP client for one OParl source.
 *
 * Each source gets its own client, so the request interval only throttles
 * that source.
 */
export class OParlClient {
  readonly stats: ClientStats = {
    requests: 0,
    retries: 0,
    pages: 0,
    parseErrors: 0,
    httpTimeMs: 0,
  };

  private readonly retry: RetryPolicy;
  private readonly fetchFn: FetchLike;
  private readonly timeoutMs: number;
  private readonly minRequestIntervalMs: number;
  private readonly maxPages: number;
  private lastRequestTime = 0;

  constructor(private readonly options: OParlClientOptions) {
    this.retry =
      options.retry instanceof RetryPolicy
        ? options.retry
        : new RetryPolicy(options.retry);
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.requestTimeoutSeconds * 1000;
    this.minRequestIntervalMs = options.minRequestIntervalMs ?? 0;
    this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  }

  // ==========================================================================
  // Requests
  // ==========================================================================

  private async waitForSlot(): Promise<void> {
    const elapsed = Date.now() - this.lastRequestTime;
    if (elapsed < this.minRequestIntervalMs) {
      const waitTime = this.minRequestIntervalMs - elapsed;
      apiLogger.trace({ waitTime }, "Rate limiting: waiting before request");
      try {
        await delay(waitTime, undefined, { signal: this.options.signal });
      } catch (error) {
        if (this.options.signal?.aborted === true) {
          throw new SyncCancelledError();
        }
        throw error;
      }
    }
    this.lastRequestTime = Date.now();
  }

  /**
   * One attempt: GET the URL and return the body text, or throw a
   * classified FetchError.
   */
  private async attempt(url: string): Promise<string> {
    const breaker = this.options.circuitBreaker;
    breaker?.beforeRequest(url);
    await this.waitForSlot();

    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.options.credential !== undefined && this.options.credential !== null) {
      headers.Authorization = `Bearer ${this.options.credential}`;
    }

    this.stats.requests++;
    apiLogger.debug({ url }, "Sending request to OParl endpoint");

    const startTime = performance.now();
    try {
      const response = await this.fetchFn(url, {
        headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (response.status === 429 || response.status >= 500) {
        throw new FetchError(
          `HTTP ${String(response.status)} from ${url}`,
          url,
          response.status,
          true,
          parseRetryAfter(response.headers.get("retry-after"))
        );
      }
      if (!response.ok) {
        throw new FetchError(
          `HTTP ${String(response.status)} from ${url}`,
          url,
          response.status,
          false
        );
      }

      const text = await response.text();
      breaker?.recordSuccess();
      return text;
    } catch (error) {
      if (error instanceof FetchError) {
        if (error.retryable) {
          breaker?.recordFailure();
        }
        throw error;
      }
      breaker?.recordFailure();
      const timedOut = error instanceof Error && error.name === "TimeoutError";
      throw new FetchError(
        timedOut
          ? `Request to ${url} timed out after ${String(this.timeoutMs)}ms`
          : `Request to ${url} failed: ${errorMessage(error)}`,
        url,
        null,
        true,
        null,
        { cause: error }
      );
    } finally {
      const duration = Math.round(performance.now() - startTime);
      this.stats.httpTimeMs += duration;
      apiLogger.debug({ url, duration: `${String(duration)}ms` }, "Request finished");
    }
  }

  private getText(url: string): Promise<string> {
    return this.retry.execute(() => this.attempt(url), {
      url,
      signal: this.options.signal,
      onRetry: (event) => {
        this.stats.retries++;
        this.options.onRetry?.(event);
      },
    });
  }

  // ==========================================================================
  // Objects
  // ==========================================================================

  /**
   * Fetch a single OParl object (System, Body)
   */
  async fetchObject(url: string): Promise<OParlObject> {
    const text = await this.getText(url);
    let body: JsonValue;
    try {
      body = JSON.parse(text);
    } catch (error) {
      throw new ParseError(`Invalid JSON from ${url}`, url, { cause: error });
    }
    if (!isJsonObject(body)) {
      throw new ParseError(`Expected a JSON object from ${url}`, url);
    }
    return body;
  }

  /**
   * Fetch the System object a source is registered with
   */
  async fetchSystem(url: string): Promise<{ system: OParlSystem; raw: OParlObject }> {
    const raw = await this.fetchObject(url);
    const bodyListUrl = optionalString(raw.body);
    if (bodyListUrl === null) {
      throw new ParseError(`System object at ${url} has no body list URL`, url);
    }

    apiLogger.info(
      { url, oparlVersion: raw.oparlVersion, name: raw.name },
      "Fetched OParl system"
    );

    return {
      system: {
        id: optionalString(raw.id) ?? url,
        name: optionalString(raw.name),
        oparlVersion: optionalString(raw.oparlVersion),
        bodyListUrl,
        website: optionalString(raw.website),
        vendor: optionalString(raw.vendor),
        product: optionalString(raw.product),
      },
      raw,
    };
  }

  // ==========================================================================
  // Lists
  // ==========================================================================

  /**
   * Walk a list endpoint page by page.
   *
   * Every call starts again from the first page. A malformed page yields a
   * `parse_error` result and the walk continues where a next URL can be
   * determined. Fetch failures are thrown.
   */
  async *fetchList(
    endpoint: string,
    options: FetchListOptions = {}
  ): AsyncGenerator<ListPageResult, void, undefined> {
    const since = options.since ?? null;
    let next: string | null =
      since !== null ? withQueryParam(endpoint, "modified_since", since) : endpoint;
    const visited = new Set<string>();

    while (next !== null) {
      if (visited.has(next)) {
        apiLogger.warn({ endpoint, url: next }, "Pagination loop detected, stopping");
        return;
      }
      if (visited.size >= this.maxPages) {
        apiLogger.warn(
          { endpoint, maxPages: this.maxPages },
          "Page limit reached, stopping"
        );
        return;
      }

      const url: string = next;
      visited.add(url);

      const text = await this.getText(url);
      const parsed = parseListPage(text);
      this.stats.pages++;

      if (parsed.ok) {
        apiLogger.debug({ url, items: parsed.items.length }, "Fetched list page");
        next = parsed.next;
        yield { kind: "page", url, items: parsed.items };
        continue;
      }

      this.stats.parseErrors++;
      apiLogger.warn({ url, reason: parsed.reason }, "Malformed list page");
      next = parsed.validJson ? parsed.next : incrementPageParam(url);
      yield {
        kind: "parse_error",
        url,
        error: new ParseError(`${parsed.reason} at ${url}`, url),
      };
    }
  }
}
