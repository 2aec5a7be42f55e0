/**
 * Catalogue of public OParl endpoints used by `sources seed`
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigError } from "../../errors.js";

const KnownSourceSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  baseUrl: Type.String({ minLength: 1 }),
  priority: Type.Integer({ minimum: 1, maximum: 3 }),
  category: Type.Union([
    Type.Literal("municipality"),
    Type.Literal("district"),
    Type.Literal("state"),
    Type.Literal("other"),
  ]),
});

const KnownSourcesSchema = Type.Array(KnownSourceSchema);

export type KnownSource = Static<typeof KnownSourceSchema>;

// Same relative location from src/cli/utils and dist/cli/utils
export const KNOWN_SOURCES_PATH = fileURLToPath(
  new URL("../../../data/known-sources.json", import.meta.url)
);

export function loadKnownSources(path: string = KNOWN_SOURCES_PATH): KnownSource[] {
  const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
  if (!Value.Check(KnownSourcesSchema, parsed)) {
    const problems = [...Value.Errors(KnownSourcesSchema, parsed)]
      .slice(0, 5)
      .map((error) => `${error.path}: ${error.message}`);
    throw new ConfigError(`Invalid source catalogue ${path}`, problems);
  }
  return parsed;
}

/**
 * Entries up to the given priority (1 = major cities only), optionally of
 * one category
 */
export function selectKnownSources(
  sources: KnownSource[],
  filters: { maxPriority?: number; category?: string } = {}
): KnownSource[] {
  return sources.filter(
    (source) =>
      source.priority <= (filters.maxPriority ?? 3) &&
      (filters.category === undefined || source.category === filters.category)
  );
}
