/**
 * Layer selection by datasource.
 */

import type { DatasourcePredicate, MapLayer } from "./types";

/**
 * Ids of layers whose datasource satisfies the predicate, in flat-list
 * order. Layers without an id are skipped and each id is returned once.
 */
export function selectLayers(
  layers: readonly MapLayer[],
  predicate: DatasourcePredicate
): string[] {
  const seen = new Set<string>();
  const matched: string[] = [];

  for (const layer of layers) {
    if (!layer.id || seen.has(layer.id)) {
      continue;
    }
    if (layer.datasource && predicate(layer.datasource)) {
      seen.add(layer.id);
      matched.push(layer.id);
    }
  }

  return matched;
}

export function datasourceContains(pattern: string): DatasourcePredicate {
  return (datasource) => datasource.includes(pattern);
}

export function datasourceMatches(pattern: string | RegExp): DatasourcePredicate {
  const regex = typeof pattern === "string" ? new RegExp(pattern) : pattern;
  return (datasource) => {
    // Global and sticky regexes carry lastIndex between calls
    regex.lastIndex = 0;
    return regex.test(datasource);
  };
}

export type MatchMode = "substring" | "regex";

export function buildDatasourcePredicate(
  pattern: string,
  mode: MatchMode = "substring"
): DatasourcePredicate {
  return mode === "regex"
    ? datasourceMatches(pattern)
    : datasourceContains(pattern);
}
