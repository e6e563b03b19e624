/**
 * Layer documentation for project files.
 *
 * Read-only consumer of the layer tree index: produces per-layer metadata
 * (group path, provider, visibility scales) and renders it as Markdown,
 * CSV or a wiki sidebar.
 */

import { format } from "date-fns";
import { unparse } from "papaparse";
import type { LayerTreeIndex, MapLayer, ProjectDocument } from "./types";
import {
  groupPathOf,
  indexLayerTree,
  ROOT_GROUP_PATH,
  rootGroupPaths,
} from "./utils/layer-tree";
import { attributeOf, childText, findChild } from "./utils/xml";

const NOT_AVAILABLE = "N/A";
const ALWAYS_VISIBLE = "Always Visible";
const NO_MIN_SCALE = "No Min (Visible Zoomed Out)";
const NO_MAX_SCALE = "No Max (Visible Zoomed In)";
const UNGROUPED_TITLE = "Ungrouped Layers";
const SIDEBAR_GROUP_LIMIT = 10;

export const PROVIDER_DESCRIPTIONS: Record<string, string> = {
  postgres: "PostgreSQL database layers",
  ogr: "Vector file formats (Shapefile, GeoJSON, etc.)",
  gdal: "Raster file formats",
  wms: "Web Map Service layers",
  wfs: "Web Feature Service layers",
  memory: "Temporary in-memory layers",
  other: "Other or unspecified providers",
};

const PROVIDER_PARAMETER_PATTERN = /provider=['"]?([^\s'"]+)/;

export type LayerDocumentation = {
  name: string;
  id: string;
  provider: string;
  minScale: string;
  maxScale: string;
  /** "" when the layer is not part of any group */
  groupPath: string;
};

export type LayerDocumentationData = {
  layers: LayerDocumentation[];
  index: LayerTreeIndex;
};

/**
 * Provider of a layer: the provider element when present, otherwise a
 * guess from the datasource string.
 */
export function detectProvider(layer: MapLayer): string {
  const declared = childText(layer.element, "provider").trim();
  if (declared) {
    return declared;
  }

  const datasource = layer.datasource;
  const parameter = datasource.match(PROVIDER_PARAMETER_PATTERN);
  if (parameter) {
    return parameter[1];
  }
  if (datasource.includes("postgres://") || datasource.includes("host=")) {
    return "postgres";
  }
  if (datasource.endsWith(".shp") || datasource.includes("ogr:")) {
    return "ogr";
  }
  return "other";
}

function toScaleNumber(value: string): number {
  return value.trim() === "" ? Number.NaN : Number(value);
}

/**
 * Visibility scale thresholds as display text.
 *
 * Reads minScale/maxScale from the maplayer when its
 * hasScaleBasedVisibilityFlag is set, falling back to an enabled
 * scalebasedvisibility child.
 */
export function describeScaleVisibility(layer: MapLayer): {
  minScale: string;
  maxScale: string;
} {
  const element = layer.element;
  let minScale = "0";
  let maxScale = "0";

  if (attributeOf(element, "hasScaleBasedVisibilityFlag") === "1") {
    minScale =
      attributeOf(element, "minScale") ?? attributeOf(element, "minimumScale") ?? "0";
    maxScale =
      attributeOf(element, "maxScale") ?? attributeOf(element, "maximumScale") ?? "0";
  }

  if (minScale === "0" && maxScale === "0") {
    const visibility = findChild(element, "scalebasedvisibility");
    if (visibility && attributeOf(visibility, "enabled") === "1") {
      minScale =
        attributeOf(visibility, "minimumScale") ??
        attributeOf(visibility, "minimumscale") ??
        "0";
      maxScale =
        attributeOf(visibility, "maximumScale") ??
        attributeOf(visibility, "maximumscale") ??
        "0";
    }
  }

  if (minScale === "0" && maxScale === "0") {
    return { minScale: ALWAYS_VISIBLE, maxScale: ALWAYS_VISIBLE };
  }

  const min = toScaleNumber(minScale);
  const max = toScaleNumber(maxScale);
  if (Number.isNaN(min) || Number.isNaN(max)) {
    return {
      minScale: `Error parsing: ${minScale}`,
      maxScale: `Error parsing: ${maxScale}`,
    };
  }

  return {
    minScale: minScale === "0" ? NO_MIN_SCALE : `1:${Math.trunc(min)}`,
    maxScale: maxScale === "0" ? NO_MAX_SCALE : `1:${Math.trunc(max)}`,
  };
}

export function extractLayerDocumentation(
  doc: ProjectDocument
): LayerDocumentationData {
  const index = indexLayerTree(doc.layerTree);

  const layers = doc.layers.map((layer) => ({
    name: layer.name || NOT_AVAILABLE,
    id: layer.id || NOT_AVAILABLE,
    provider: detectProvider(layer),
    ...describeScaleVisibility(layer),
    groupPath: groupPathOf(index, layer.id),
  }));

  return { layers, index };
}

function countGroups(index: LayerTreeIndex): number {
  return index.pathToNode.size - (index.pathToNode.has(ROOT_GROUP_PATH) ? 1 : 0);
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, "\\|");
}

/**
 * Group paths in tree order (depth first), root excluded.
 */
function groupPathsInTreeOrder(index: LayerTreeIndex): string[] {
  const ordered: string[] = [];
  const visit = (path: string) => {
    ordered.push(path);
    for (const child of index.pathToNode.get(path)?.childPaths ?? []) {
      visit(child);
    }
  };
  for (const path of rootGroupPaths(index)) {
    visit(path);
  }
  return ordered;
}

function sortByTreeOrder(
  layers: LayerDocumentation[],
  index: LayerTreeIndex,
  groupPath: string
): LayerDocumentation[] {
  const treeLayers = index.pathToNode.get(groupPath)?.layers ?? [];
  const position = new Map<string, number>();
  treeLayers.forEach((layer, i) => {
    if (!position.has(layer.id)) {
      position.set(layer.id, i);
    }
  });
  return [...layers].sort(
    (a, b) =>
      (position.get(a.id) ?? Number.MAX_SAFE_INTEGER) -
      (position.get(b.id) ?? Number.MAX_SAFE_INTEGER)
  );
}

function renderLayerTable(title: string, layers: LayerDocumentation[]): string {
  const rows = layers.map(
    (layer) =>
      `| ${escapeCell(layer.name)} | ${escapeCell(layer.provider)} | ${layer.minScale} | ${layer.maxScale} |`
  );
  return [
    "<details>",
    `<summary><strong>${title}</strong> (${layers.length} layers)</summary>`,
    "",
    "| Layer Name | Provider | Min Scale | Max Scale |",
    "|------------|----------|-----------|-----------|",
    ...rows,
    "",
    "</details>",
    "",
  ].join("\n");
}

export function countProviders(
  layers: LayerDocumentation[]
): Map<string, number> {
  const counts = new Map<string, number>();
  for (const layer of layers) {
    counts.set(layer.provider, (counts.get(layer.provider) ?? 0) + 1);
  }
  return new Map([...counts].sort(([a], [b]) => a.localeCompare(b)));
}

/**
 * Render layer documentation as Markdown for a wiki page.
 */
export function formatAsMarkdown(
  title: string,
  data: LayerDocumentationData,
  options: { generatedOn: Date }
): string {
  const { layers, index } = data;
  const generated = format(options.generatedOn, "MMMM d, yyyy");

  if (layers.length === 0) {
    return `# ${title} - Layer Documentation\n\n**No layer data found** - the project contains no layers.\n\n---\n*Generated on ${generated}*\n`;
  }

  const lines: string[] = [
    `# ${title} - Layer Documentation`,
    "",
    `**Project Summary**: ${layers.length} layers, ${countGroups(index)} groups, generated on ${generated}`,
    "",
    "## Layer Groups Overview",
    "",
  ];

  const renderGroup = (path: string, depth: number) => {
    const entry = index.pathToNode.get(path);
    if (!entry) {
      return;
    }
    lines.push(
      `${"  ".repeat(depth)}- **${entry.name}** (${entry.layers.length} layers)`
    );
    for (const child of entry.childPaths) {
      renderGroup(child, depth + 1);
    }
  };
  for (const path of rootGroupPaths(index)) {
    renderGroup(path, 0);
  }

  const layersByGroup = new Map<string, LayerDocumentation[]>();
  for (const layer of layers) {
    const group = layersByGroup.get(layer.groupPath) ?? [];
    group.push(layer);
    layersByGroup.set(layer.groupPath, group);
  }
  const ungrouped = layersByGroup.get(ROOT_GROUP_PATH) ?? [];

  if (ungrouped.length > 0) {
    lines.push("", `- **${UNGROUPED_TITLE}** (${ungrouped.length} layers)`);
  }

  lines.push("", "## Detailed Layer Information", "");

  for (const path of groupPathsInTreeOrder(index)) {
    const groupLayers = layersByGroup.get(path);
    const entry = index.pathToNode.get(path);
    if (groupLayers && entry) {
      lines.push(
        renderLayerTable(entry.name, sortByTreeOrder(groupLayers, index, path))
      );
    }
  }
  if (ungrouped.length > 0) {
    lines.push(renderLayerTable(UNGROUPED_TITLE, ungrouped));
  }

  lines.push(
    "## Project Statistics",
    "",
    "| Metric | Count |",
    "|--------|-------|",
    `| Total Layers | ${layers.length} |`,
    `| Layer Groups | ${countGroups(index)} |`,
    `| Ungrouped Layers | ${ungrouped.length} |`,
    "",
    "### Data Providers",
    "",
    "| Provider | Layer Count | Description |",
    "|----------|-------------|-------------|"
  );
  for (const [provider, count] of countProviders(layers)) {
    const description =
      PROVIDER_DESCRIPTIONS[provider] ?? "Custom or specialized provider";
    lines.push(`| \`${provider}\` | ${count} | ${description} |`);
  }

  lines.push("", "---", "", `*Generated on ${generated}*`, "");
  return lines.join("\n");
}

export function formatAsCsv(layers: LayerDocumentation[]): string {
  if (layers.length === 0) {
    return "";
  }
  return unparse(
    {
      fields: [
        "Layer Name",
        "Layer ID",
        "Group Path",
        "Provider",
        "Min Scale",
        "Max Scale",
      ],
      data: layers.map((layer) => [
        layer.name,
        layer.id,
        layer.groupPath || "Ungrouped",
        layer.provider,
        layer.minScale,
        layer.maxScale,
      ]),
    },
    { newline: "\n" }
  );
}

function toWikiSlug(value: string): string {
  return value.replace(/[ /]/g, "-");
}

/**
 * Sidebar (_Sidebar.md) linking the documentation page and its top-level
 * groups.
 */
export function generateWikiSidebar(
  data: LayerDocumentationData,
  title: string
): string {
  const page = `${toWikiSlug(title)}-Layer-Documentation`;
  const roots = rootGroupPaths(data.index);

  const lines = [
    `## ${title} Wiki`,
    "",
    "### Main Pages",
    "- [Home](Home)",
    `- [Layer Documentation](${page})`,
    "",
    "### Layer Groups",
  ];
  for (const path of roots.slice(0, SIDEBAR_GROUP_LIMIT)) {
    const name = data.index.pathToNode.get(path)?.name ?? path;
    lines.push(`- [${name}](${page}#${toWikiSlug(name).toLowerCase()})`);
  }
  if (roots.length > SIDEBAR_GROUP_LIMIT) {
    lines.push(`- ... and ${roots.length - SIDEBAR_GROUP_LIMIT} more groups`);
  }
  lines.push(
    "",
    "### Quick Stats",
    `- ${data.layers.length} layers`,
    `- ${countGroups(data.index)} groups`,
    ""
  );
  return lines.join("\n");
}
