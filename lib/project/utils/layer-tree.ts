/**
 * Layer tree indexing.
 *
 * Walks the display group hierarchy once and produces the group-path index
 * shared by documentation output and layer extraction. Sibling groups with
 * the same name resolve to the same path and therefore share one entry.
 */

import { GROUP_PATH_SEPARATOR, UNNAMED_GROUP } from "../constants";
import type {
  GroupPathEntry,
  LayerTreeGroup,
  LayerTreeIndex,
} from "../types";

// The root group contributes no path segment
export const ROOT_GROUP_PATH = "";

export function joinGroupPath(segments: string[]): string {
  return segments.join(GROUP_PATH_SEPARATOR);
}

/**
 * Build the path index for a layer tree. Pure: the input is not modified.
 */
export function indexLayerTree(root: LayerTreeGroup): LayerTreeIndex {
  const pathToNode = new Map<string, GroupPathEntry>();
  const layerToPath = new Map<string, string>();

  function visit(group: LayerTreeGroup, segments: string[]): string {
    const path = joinGroupPath(segments);

    let entry = pathToNode.get(path);
    if (!entry) {
      entry = {
        path,
        segments,
        name: segments.at(-1) ?? "",
        attributes: { ...group.element.attributes },
        layers: [],
        childPaths: [],
      };
      pathToNode.set(path, entry);
    }

    for (const child of group.children) {
      if (child.kind === "layer") {
        if (!child.id) {
          continue;
        }
        entry.layers.push(child);
        // Last write wins for ids listed under several groups
        layerToPath.set(child.id, path);
        continue;
      }

      const childPath = visit(child, [...segments, child.name || UNNAMED_GROUP]);
      if (!entry.childPaths.includes(childPath)) {
        entry.childPaths.push(childPath);
      }
    }

    return path;
  }

  visit(root, []);
  return { pathToNode, layerToPath };
}

/**
 * Group path of a layer, or "" when the layer is not in the tree.
 */
export function groupPathOf(index: LayerTreeIndex, layerId: string): string {
  return index.layerToPath.get(layerId) ?? ROOT_GROUP_PATH;
}

/**
 * Paths of the top-level groups, in document order.
 */
export function rootGroupPaths(index: LayerTreeIndex): string[] {
  return index.pathToNode.get(ROOT_GROUP_PATH)?.childPaths ?? [];
}
