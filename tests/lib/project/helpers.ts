import { randomUUID } from "node:crypto";
import { existsSync, mkdirSync, rmSync } from "node:fs";
import { join } from "node:path";
import { decodeProjectBytes, parseProjectXml } from "@/lib/project/parser";
import type {
  LayerTreeGroup,
  LegendGroup,
  ProjectDocument,
} from "@/lib/project/types";

export const FIXTURES_DIR = join(process.cwd(), "tests/fixtures/projects");
export const SAMPLE_PROJECT = join(FIXTURES_DIR, "sample.qgs");

const TMP_DIR = join(process.cwd(), "tests/fixtures/tmp");

/**
 * A fresh directory for one test, unique across parallel workers.
 */
export function createTempDir(): string {
  const dir = join(TMP_DIR, randomUUID());
  mkdirSync(dir, { recursive: true });
  return dir;
}

export function removeTempDir(dir: string): void {
  if (existsSync(dir)) {
    rmSync(dir, { recursive: true, force: true });
  }
}

export function parseProject(xml: string): ProjectDocument {
  const { xml: text, encoding } = decodeProjectBytes(Buffer.from(xml, "utf-8"));
  return parseProjectXml(text, encoding);
}

export function mapLayerXml(id: string, datasource: string): string {
  return `<maplayer type="vector"><id>${id}</id><datasource>${datasource}</datasource><layername>${id} layer</layername></maplayer>`;
}

export function projectXml(parts: {
  tree?: string;
  layers: string[];
  legend?: string;
  extra?: string;
}): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<qgis projectname="Test" version="3.34.4-Prizren">
  <layer-tree-group>${parts.tree ?? ""}</layer-tree-group>
  <projectlayers>${parts.layers.join("")}</projectlayers>
  <legend updateDrawingOrder="true">${parts.legend ?? ""}</legend>
  ${parts.extra ?? ""}
</qgis>`;
}

export function legendLayerXml(layerId: string): string {
  return `<legendlayer name="${layerId} legend"><filegroup><legendlayerfile layerid="${layerId}"/></filegroup></legendlayer>`;
}

/**
 * Indented outline of a tree: group names, then layer ids beneath them.
 */
export function outline(
  group: LayerTreeGroup | LegendGroup,
  depth = 0
): string[] {
  const indent = "  ".repeat(depth);
  const lines: string[] = [];
  for (const child of group.children) {
    if (child.kind === "group" || child.kind === "legend-group") {
      lines.push(`${indent}${child.name}`, ...outline(child, depth + 1));
    } else if (child.kind === "layer") {
      lines.push(`${indent}${child.id}`);
    } else {
      lines.push(`${indent}${child.layerIds.join(",")}`);
    }
  }
  return lines;
}

/**
 * The error thrown by `fn`. Fails the test when nothing is thrown or the
 * error is of another type.
 */
export function captureError<T extends Error>(
  fn: () => unknown,
  type: new (...args: never[]) => T
): T {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected ${type.name} to be thrown`);
}
