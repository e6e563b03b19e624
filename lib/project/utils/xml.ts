/**
 * Typed XML tree helpers.
 *
 * fast-xml-parser's preserveOrder output is an array of single-key objects
 * with attributes under ":@". It is converted once into XmlElement/XmlText
 * so the rest of the code walks a typed tree instead of string lookups.
 *
 * Values are kept as raw markup on both ends (no entity processing, no
 * trimming), so an untouched subtree is written back exactly as read.
 * Use `textOf`/`attributeOf` to read decoded values and `escapeXml` for
 * values built in code.
 */

import { XMLBuilder, XMLParser } from "fast-xml-parser";
import type { XmlElement, XmlNode } from "../types";

const ATTRIBUTE_PREFIX = "@_";
const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";

/**
 * Parser that preserves document order - sibling order across different
 * tags matters for verbatim copies.
 */
const preserveOrderParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_KEY,
  preserveOrder: true,
  trimValues: false,
  processEntities: false,
  parseAttributeValue: false,
  parseTagValue: false,
});

const preserveOrderBuilder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_KEY,
  preserveOrder: true,
  processEntities: false,
  format: true,
  indentBy: "  ",
  suppressEmptyNode: true,
});

const NAMED_ENTITIES: Record<string, string> = {
  lt: "<",
  gt: ">",
  amp: "&",
  quot: '"',
  apos: "'",
};

const ENTITY_PATTERN = /&(?:#x([0-9a-fA-F]+)|#([0-9]+)|(lt|gt|amp|quot|apos));/g;

/**
 * Resolve the predefined entities and character references of raw markup.
 */
export function decodeEntities(raw: string): string {
  if (!raw.includes("&")) {
    return raw;
  }
  return raw.replace(
    ENTITY_PATTERN,
    (match: string, hex?: string, decimal?: string, named?: string) => {
      if (named) {
        return NAMED_ENTITIES[named] ?? match;
      }
      const codePoint = hex ? Number.parseInt(hex, 16) : Number(decimal);
      return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : match;
    }
  );
}

/**
 * Escape a value for use as text or attribute content.
 */
export function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) {
    return attributes;
  }
  for (const [key, value] of Object.entries(raw)) {
    const name = key.startsWith(ATTRIBUTE_PREFIX)
      ? key.slice(ATTRIBUTE_PREFIX.length)
      : key;
    attributes[name] = String(value);
  }
  return attributes;
}

function toNodes(items: unknown): XmlNode[] {
  if (!Array.isArray(items)) {
    return [];
  }

  const nodes: XmlNode[] = [];
  for (const item of items) {
    if (!isRecord(item)) {
      continue;
    }
    for (const [key, value] of Object.entries(item)) {
      if (key === ATTRIBUTES_KEY) {
        continue;
      }
      if (key === TEXT_KEY) {
        const text = String(value);
        // Indentation between elements
        if (text.trim() !== "") {
          nodes.push({ kind: "text", value: text });
        }
        continue;
      }
      // Processing instructions (the XML declaration among them)
      if (key.startsWith("?")) {
        continue;
      }
      nodes.push({
        kind: "element",
        tag: key,
        attributes: toAttributes(item[ATTRIBUTES_KEY]),
        children: toNodes(value),
      });
    }
  }
  return nodes;
}

/**
 * Parse well-formed XML into top-level typed nodes.
 * Callers validate first; see parser.ts.
 */
export function parseXmlNodes(xml: string): XmlNode[] {
  return toNodes(preserveOrderParser.parse(xml));
}

function toOrdered(node: XmlNode): Record<string, unknown> {
  if (node.kind === "text") {
    return { [TEXT_KEY]: node.value };
  }
  const entry: Record<string, unknown> = {
    [node.tag]: node.children.map(toOrdered),
  };
  const attributeNames = Object.keys(node.attributes);
  if (attributeNames.length > 0) {
    const prefixed: Record<string, string> = {};
    for (const name of attributeNames) {
      prefixed[`${ATTRIBUTE_PREFIX}${name}`] = node.attributes[name];
    }
    entry[ATTRIBUTES_KEY] = prefixed;
  }
  return entry;
}

/**
 * Serialize an element (and its subtree) without an XML declaration.
 */
export function buildXml(element: XmlElement): string {
  return preserveOrderBuilder.build([toOrdered(element)]).trim();
}

export function createElement(
  tag: string,
  attributes: Record<string, string> = {},
  children: XmlNode[] = []
): XmlElement {
  return { kind: "element", tag, attributes: { ...attributes }, children };
}

export function cloneElement(element: XmlElement): XmlElement {
  return {
    kind: "element",
    tag: element.tag,
    attributes: { ...element.attributes },
    children: element.children.map((child) =>
      child.kind === "text" ? { ...child } : cloneElement(child)
    ),
  };
}

export function childElements(element: XmlElement, tag?: string): XmlElement[] {
  const result: XmlElement[] = [];
  for (const child of element.children) {
    if (child.kind === "element" && (tag === undefined || child.tag === tag)) {
      result.push(child);
    }
  }
  return result;
}

export function findChild(element: XmlElement, tag: string): XmlElement | undefined {
  return childElements(element, tag)[0];
}

/**
 * All descendants with the given tag, in document order.
 */
export function findDescendants(element: XmlElement, tag: string): XmlElement[] {
  const found: XmlElement[] = [];
  for (const child of childElements(element)) {
    if (child.tag === tag) {
      found.push(child);
    }
    found.push(...findDescendants(child, tag));
  }
  return found;
}

/**
 * Concatenated direct text of an element, entity-decoded.
 */
export function textOf(element: XmlElement | undefined): string {
  if (!element) {
    return "";
  }
  let text = "";
  for (const child of element.children) {
    if (child.kind === "text") {
      text += child.value;
    }
  }
  return decodeEntities(text);
}

export function attributeOf(element: XmlElement, name: string): string | undefined {
  const raw = element.attributes[name];
  return raw === undefined ? undefined : decodeEntities(raw);
}

export function childText(element: XmlElement, tag: string): string {
  return textOf(findChild(element, tag));
}
