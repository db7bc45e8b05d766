/**
 * Tiergate: Pattern Store: Bundled Catalog
 *
 * The default rule library lives in `config/patterns.json`, grouped by tier
 * and then by category. Hosts with their own loader can feed any object of
 * the same shape through `definitionsFromCatalog`.
 */

import { readFileSync } from "node:fs";
import { ConfigError } from "../errors.js";
import { catalogSchema, formatIssues, type Catalog } from "./schema.js";
import { TIERS, type PatternDefinition } from "./types.js";

export const DEFAULT_CATALOG_URL = new URL(
  "../../config/patterns.json",
  import.meta.url,
);

export function parseCatalog(raw: unknown): Catalog {
  const result = catalogSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(
      `Invalid pattern catalog:\n  ${issues.join("\n  ")}`,
      issues,
    );
  }
  return result.data;
}

export function definitionsFromCatalog(catalog: Catalog): PatternDefinition[] {
  const definitions: PatternDefinition[] = [];

  for (const tier of TIERS) {
    const categories = catalog.tiers[tier];
    if (!categories) continue;

    for (const [category, entries] of Object.entries(categories)) {
      for (const entry of entries) {
        definitions.push({
          id: entry.id,
          tier,
          category,
          message: entry.message,
          pattern: entry.pattern,
          flags: entry.flags,
          weight: entry.weight,
        });
      }
    }
  }

  return definitions;
}

let defaultDefinitions: PatternDefinition[] | null = null;

/**
 * Read and validate the bundled catalog. The parsed result is memoized.
 */
export function loadDefaultCatalog(): PatternDefinition[] {
  if (!defaultDefinitions) {
    const json = readFileSync(DEFAULT_CATALOG_URL, "utf-8");
    defaultDefinitions = definitionsFromCatalog(parseCatalog(JSON.parse(json)));
  }
  return [...defaultDefinitions];
}
