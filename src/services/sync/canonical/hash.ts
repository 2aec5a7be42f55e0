import { createHash } from "node:crypto";

import type { JsonValue } from "../../../types/index.js";

/**
 * Serialize a JSON value with object keys sorted at every level, so that
 * two payloads differing only in key order serialize identically.
 */
export function canonicalJson(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const keys = Object.keys(value).sort();
    const parts: string[] = [];
    for (const key of keys) {
      const entry = value[key];
      if (entry !== undefined) {
        parts.push(`${JSON.stringify(key)}:${canonicalJson(entry)}`);
      }
    }
    return `{${parts.join(",")}}`;
  }
  return JSON.stringify(value);
}

/**
 * SHA-256 of the canonical JSON form
 */
export function computeContentHash(payload: JsonValue): string {
  return createHash("sha256").update(canonicalJson(payload)).digest("hex");
}
