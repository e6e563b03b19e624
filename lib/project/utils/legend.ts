/**
 * Legend hierarchy indexing: maps each layer id to the legendlayer that
 * presents it and the legend groups enclosing that entry.
 */

import type { LegendGroup, LegendIndex } from "../types";

export function indexLegend(root: LegendGroup): LegendIndex {
  const layerToEntry: LegendIndex["layerToEntry"] = new Map();

  function visit(
    group: LegendGroup,
    groupNames: string[],
    groupAttributes: Record<string, string>[]
  ): void {
    for (const child of group.children) {
      if (child.kind === "legend-group") {
        visit(
          child,
          [...groupNames, child.name],
          [...groupAttributes, { ...child.element.attributes }]
        );
        continue;
      }
      for (const layerId of child.layerIds) {
        layerToEntry.set(layerId, { layer: child, groupNames, groupAttributes });
      }
    }
  }

  visit(root, [], []);
  return { layerToEntry };
}
