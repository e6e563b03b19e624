/**
 * Project document parser (.qgs plain XML, .qgz gzip container)
 * Loads a project file into the typed ProjectDocument model.
 */

import { existsSync, readFileSync } from "node:fs";
import { extname } from "node:path";
import { gunzipSync } from "node:zlib";
import { XMLValidator } from "fast-xml-parser";
import {
  ELEMENTS,
  PROJECT_EXTENSIONS,
  PROJECT_NAMESPACE_DECLARATION,
} from "./constants";
import { projectDebug } from "./debug";
import {
  describeError,
  NotFoundError,
  ParseError,
  UnsupportedFormatError,
} from "./errors";
import type {
  LayerTreeGroup,
  LayerTreeNode,
  LegendGroup,
  LegendNode,
  MapLayer,
  ProjectDocument,
  ProjectEncoding,
  ProjectFormat,
  XmlElement,
} from "./types";
import { decodeText, detectEncoding } from "./utils/encoding";
import {
  attributeOf,
  childElements,
  childText,
  createElement,
  findChild,
  findDescendants,
  parseXmlNodes,
} from "./utils/xml";

const dbg = projectDebug("parse");

export function detectProjectFormat(filePath: string): ProjectFormat {
  const extension = extname(filePath).toLowerCase();
  if (extension === ".qgs" || extension === ".qgz") {
    return PROJECT_EXTENSIONS[extension];
  }
  throw new UnsupportedFormatError(filePath);
}

/**
 * Read a project file's XML bytes, decompressing .qgz containers.
 */
export function readProjectFile(filePath: string): Uint8Array {
  const format = detectProjectFormat(filePath);
  if (!existsSync(filePath)) {
    throw new NotFoundError(filePath);
  }

  const raw = readFileSync(filePath);
  if (format === "qgs") {
    return raw;
  }

  try {
    return gunzipSync(raw);
  } catch (error) {
    throw new ParseError(`corrupt compressed container (${describeError(error)})`, {
      documentPath: filePath,
      cause: error,
    });
  }
}

/**
 * Decode document bytes with the encoding from their XML declaration and
 * strip the project namespace declaration.
 */
export function decodeProjectBytes(
  bytes: Uint8Array,
  documentPath?: string
): { xml: string; encoding: ProjectEncoding } {
  const encoding = detectEncoding(bytes);
  const text = decodeText(bytes, encoding, documentPath);
  return {
    xml: text.split(PROJECT_NAMESPACE_DECLARATION).join(""),
    encoding,
  };
}

function toLayerTreeGroup(element: XmlElement): LayerTreeGroup {
  const children: LayerTreeNode[] = [];
  for (const child of childElements(element)) {
    if (child.tag === ELEMENTS.treeGroup) {
      children.push(toLayerTreeGroup(child));
    } else if (child.tag === ELEMENTS.treeLayer) {
      children.push({
        kind: "layer",
        id: attributeOf(child, "id") ?? "",
        name: attributeOf(child, "name") ?? "",
        element: child,
      });
    }
  }
  return {
    kind: "group",
    name: attributeOf(element, "name") ?? "",
    element,
    children,
  };
}

function toLegendGroup(element: XmlElement): LegendGroup {
  const children: LegendNode[] = [];
  for (const child of childElements(element)) {
    if (child.tag === ELEMENTS.legendGroup) {
      children.push(toLegendGroup(child));
    } else if (child.tag === ELEMENTS.legendLayer) {
      const layerIds = findDescendants(child, ELEMENTS.legendLayerFile)
        .map((file) => attributeOf(file, "layerid") ?? "")
        .filter((id) => id !== "");
      children.push({
        kind: "legend-layer",
        name: attributeOf(child, "name") ?? "",
        layerIds,
        element: child,
      });
    }
  }
  return {
    kind: "legend-group",
    name: attributeOf(element, "name") ?? "",
    element,
    children,
  };
}

function toMapLayer(element: XmlElement): MapLayer {
  // Newer projects store the id as a child element, older ones as an attribute
  const id =
    childText(element, ELEMENTS.layerId) || attributeOf(element, "id") || "";
  return {
    id,
    name: childText(element, ELEMENTS.layerName),
    datasource: childText(element, ELEMENTS.datasource),
    element,
  };
}

/**
 * Parse decoded project XML into the document model.
 *
 * @throws ParseError for malformed XML or a missing qgis root element
 */
export function parseProjectXml(
  xml: string,
  encoding: ProjectEncoding,
  documentPath?: string
): ProjectDocument {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new ParseError(validation.err.msg, {
      documentPath,
      line: validation.err.line,
      column: validation.err.col,
    });
  }

  const root = parseXmlNodes(xml).find(
    (node): node is XmlElement =>
      node.kind === "element" && node.tag === ELEMENTS.root
  );
  if (!root) {
    throw new ParseError(`missing ${ELEMENTS.root} root element`, {
      documentPath,
    });
  }

  const document = buildProjectDocument(root, encoding);
  dbg(
    "%s: %d layers, %d in draw order, encoding %s",
    documentPath ?? "<memory>",
    document.layers.length,
    document.drawOrder.length,
    encoding.label
  );
  return document;
}

/**
 * Derive the document model from a qgis root element.
 */
export function buildProjectDocument(
  root: XmlElement,
  encoding: ProjectEncoding
): ProjectDocument {
  const projectLayers = findChild(root, ELEMENTS.projectLayers);
  const layers = projectLayers
    ? childElements(projectLayers, ELEMENTS.mapLayer).map(toMapLayer)
    : [];

  const treeRoot =
    findChild(root, ELEMENTS.treeGroup) ??
    findDescendants(root, ELEMENTS.treeGroup)[0] ??
    createElement(ELEMENTS.treeGroup);

  const legendRoot =
    findChild(root, ELEMENTS.legend) ?? createElement(ELEMENTS.legend);

  const layerOrder = findChild(root, ELEMENTS.layerOrder);
  const drawOrder = layerOrder
    ? childElements(layerOrder, ELEMENTS.layerOrderItem)
        .map((item) => attributeOf(item, "id") ?? "")
        .filter((id) => id !== "")
    : [];

  return {
    root,
    encoding,
    layers,
    layerTree: toLayerTreeGroup(treeRoot),
    legend: toLegendGroup(legendRoot),
    drawOrder,
  };
}

/**
 * Load a .qgs or .qgz file from disk.
 *
 * @throws NotFoundError, UnsupportedFormatError or ParseError
 */
export function loadProjectFile(filePath: string): ProjectDocument {
  const bytes = readProjectFile(filePath);
  const { xml, encoding } = decodeProjectBytes(bytes, filePath);
  return parseProjectXml(xml, encoding, filePath);
}
