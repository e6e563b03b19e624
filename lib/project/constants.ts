// Default namespace declared by some project files. Stripped before parsing
// so lookups can use unqualified tag names; never written back.
export const PROJECT_NAMESPACE_DECLARATION = 'xmlns="http://www.qgis.org/dtd"';

export const PROJECT_EXTENSIONS = {
  ".qgs": "qgs",
  ".qgz": "qgz",
} as const;

export const ELEMENTS = {
  root: "qgis",
  projectLayers: "projectlayers",
  mapLayer: "maplayer",
  layerId: "id",
  layerName: "layername",
  datasource: "datasource",
  layerOrder: "layerorder",
  layerOrderItem: "layer",
  treeGroup: "layer-tree-group",
  treeLayer: "layer-tree-layer",
  legend: "legend",
  legendGroup: "legendgroup",
  legendLayer: "legendlayer",
  legendLayerFile: "legendlayerfile",
} as const;

/**
 * Document-level sections copied verbatim into an extracted project,
 * in output order.
 */
export const PASSTHROUGH_SECTIONS = [
  "properties",
  "relations",
  "mapcanvas",
] as const;

export const GROUP_PATH_SEPARATOR = "/";
export const UNNAMED_GROUP = "Unnamed Group";

export const DEFAULT_ENCODING_LABEL = "UTF-8";
