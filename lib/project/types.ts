/**
 * Types for parsed GIS project documents (.qgs / .qgz)
 */

export type ProjectFormat = "qgs" | "qgz";

/**
 * A node in the typed XML tree built from the parser's ordered output.
 * Child order is document order. Attribute values and text hold raw markup,
 * entity references included.
 */
export type XmlNode = XmlElement | XmlText;

export type XmlElement = {
  kind: "element";
  tag: string;
  attributes: Record<string, string>;
  children: XmlNode[];
};

export type XmlText = { kind: "text"; value: string };

/**
 * Text encoding detected from the XML declaration.
 * `label` is written back into the output declaration.
 */
export type ProjectEncoding = {
  label: string;
  decoder: string;
};

/**
 * One entry of projectlayers. The raw element is copied verbatim on
 * reassembly so renderer and style definitions are never lost.
 */
export type MapLayer = {
  id: string;
  name: string;
  datasource: string;
  element: XmlElement;
};

// Display hierarchy (layer-tree-group / layer-tree-layer)

export type LayerTreeLayer = {
  kind: "layer";
  id: string;
  name: string;
  element: XmlElement;
};

export type LayerTreeGroup = {
  kind: "group";
  name: string;
  element: XmlElement;
  children: LayerTreeNode[];
};

export type LayerTreeNode = LayerTreeLayer | LayerTreeGroup;

// Legend hierarchy (legend / legendgroup / legendlayer)

export type LegendLayer = {
  kind: "legend-layer";
  name: string;
  layerIds: string[];
  element: XmlElement;
};

export type LegendGroup = {
  kind: "legend-group";
  name: string;
  element: XmlElement;
  children: LegendNode[];
};

export type LegendNode = LegendLayer | LegendGroup;

export type ProjectDocument = {
  /** The qgis root element. Opaque sections are read from here. */
  root: XmlElement;
  encoding: ProjectEncoding;
  layers: MapLayer[];
  layerTree: LayerTreeGroup;
  legend: LegendGroup;
  drawOrder: string[];
};

/**
 * Group path as produced by the tree indexer. `path` is the lookup key
 * (names joined by "/"), `segments` are the names themselves.
 */
export type GroupPathEntry = {
  path: string;
  segments: string[];
  name: string;
  /** Attributes of the first group seen at this path */
  attributes: Record<string, string>;
  layers: LayerTreeLayer[];
  childPaths: string[];
};

export type LayerTreeIndex = {
  pathToNode: Map<string, GroupPathEntry>;
  layerToPath: Map<string, string>;
};

export type LegendEntry = {
  layer: LegendLayer;
  groupNames: string[];
  /** Attributes of each enclosing legendgroup, parallel to groupNames */
  groupAttributes: Record<string, string>[];
};

export type LegendIndex = {
  layerToEntry: Map<string, LegendEntry>;
};

export type DatasourcePredicate = (datasource: string) => boolean;
