/**
 * Rebuilds a minimal project document containing only the matched layers.
 *
 * The flat layer list fixes the output order; the display tree and legend
 * are rebuilt by walking each layer's original path and reusing a child
 * group whenever one with the same name already exists at that level of
 * the new tree. Sibling groups that only share a name are therefore merged.
 */

import { ELEMENTS, PASSTHROUGH_SECTIONS } from "./constants";
import { projectDebug } from "./debug";
import { ReassemblyError } from "./errors";
import { buildProjectDocument } from "./parser";
import type {
  LayerTreeIndex,
  LegendIndex,
  LegendLayer,
  MapLayer,
  ProjectDocument,
  XmlElement,
} from "./types";
import { joinGroupPath } from "./utils/layer-tree";
import { indexLegend } from "./utils/legend";
import { cloneElement, createElement, escapeXml, findChild } from "./utils/xml";

const dbg = projectDebug("reassemble");

/**
 * A group under construction. `groupsByName` indexes the direct child
 * groups of this level only.
 */
type GroupBuilder = {
  element: XmlElement;
  groupsByName: Map<string, GroupBuilder>;
};

function toBuilder(element: XmlElement): GroupBuilder {
  return { element, groupsByName: new Map() };
}

function ensureChildGroup(
  parent: GroupBuilder,
  name: string,
  tag: string,
  attributes: Record<string, string>
): GroupBuilder {
  let child = parent.groupsByName.get(name);
  if (!child) {
    const element = createElement(tag, attributes);
    parent.element.children.push(element);
    child = toBuilder(element);
    parent.groupsByName.set(name, child);
  }
  return child;
}

function lookupLayers(layers: readonly MapLayer[]): Map<string, MapLayer> {
  const byId = new Map<string, MapLayer>();
  // Last occurrence wins for duplicated ids
  for (const layer of layers) {
    if (layer.id) {
      byId.set(layer.id, layer);
    }
  }
  return byId;
}

function addToLayerTree(
  treeRoot: GroupBuilder,
  layerId: string,
  index: LayerTreeIndex,
  documentPath?: string
): void {
  const path = index.layerToPath.get(layerId);
  if (path === undefined) {
    dbg("layer %s is ungrouped", layerId);
    return;
  }

  const entry = index.pathToNode.get(path);
  const treeLayer = entry?.layers
    .filter((layer) => layer.id === layerId)
    .at(-1);
  if (!entry || !treeLayer) {
    throw new ReassemblyError(
      layerId,
      `group path '${path}' is not indexed`,
      documentPath
    );
  }

  let group = treeRoot;
  for (let depth = 0; depth < entry.segments.length; depth++) {
    const name = entry.segments[depth];
    const prefix = index.pathToNode.get(
      joinGroupPath(entry.segments.slice(0, depth + 1))
    );
    group = ensureChildGroup(
      group,
      name,
      ELEMENTS.treeGroup,
      prefix?.attributes ?? { name: escapeXml(name) }
    );
  }

  group.element.children.push(cloneElement(treeLayer.element));
}

function addToLegend(
  legendRoot: GroupBuilder,
  layerId: string,
  legendIndex: LegendIndex,
  copied: Set<LegendLayer>
): void {
  const entry = legendIndex.layerToEntry.get(layerId);
  if (!entry) {
    dbg("layer %s has no legend entry", layerId);
    return;
  }
  if (copied.has(entry.layer)) {
    return;
  }

  let group = legendRoot;
  for (let depth = 0; depth < entry.groupNames.length; depth++) {
    const name = entry.groupNames[depth];
    group = ensureChildGroup(
      group,
      name,
      ELEMENTS.legendGroup,
      entry.groupAttributes[depth] ?? { name: escapeXml(name) }
    );
  }

  group.element.children.push(cloneElement(entry.layer.element));
  copied.add(entry.layer);
}

/**
 * Build a new project document containing only `matched`, in that order.
 *
 * @param matched - Layer ids in flat-list order, as returned by selectLayers
 * @param index - Layer tree index of `original`
 * @param documentPath - Source of `original`, named in errors
 * @throws ReassemblyError when a matched id has no layer definition or its
 *   group path is missing from the index
 */
export function rebuildProject(
  original: ProjectDocument,
  matched: readonly string[],
  index: LayerTreeIndex,
  documentPath?: string
): ProjectDocument {
  const layersById = lookupLayers(original.layers);
  const legendIndex = indexLegend(original.legend);

  const projectLayers = createElement(ELEMENTS.projectLayers);
  const layerOrder = createElement(ELEMENTS.layerOrder);
  const layerTree = toBuilder(
    createElement(ELEMENTS.treeGroup, original.layerTree.element.attributes)
  );
  const legend = toBuilder(
    createElement(ELEMENTS.legend, { updateDrawingOrder: "true" })
  );
  const copiedLegendLayers = new Set<LegendLayer>();

  for (const layerId of new Set(matched)) {
    const layer = layersById.get(layerId);
    if (!layer) {
      throw new ReassemblyError(
        layerId,
        "no layer definition in projectlayers",
        documentPath
      );
    }

    projectLayers.children.push(cloneElement(layer.element));
    layerOrder.children.push(
      createElement(ELEMENTS.layerOrderItem, { id: escapeXml(layerId) })
    );
    addToLayerTree(layerTree, layerId, index, documentPath);
    addToLegend(legend, layerId, legendIndex, copiedLegendLayers);
  }

  const root = createElement(ELEMENTS.root, original.root.attributes);
  for (const section of PASSTHROUGH_SECTIONS) {
    const element = findChild(original.root, section);
    if (element) {
      root.children.push(cloneElement(element));
    }
  }
  root.children.push(
    projectLayers,
    layerOrder,
    layerTree.element,
    legend.element
  );

  dbg("rebuilt project with %d layers", projectLayers.children.length);
  return buildProjectDocument(root, original.encoding);
}
