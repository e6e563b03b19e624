/**
 * Tests for loading project documents (.qgs / .qgz) into the typed model.
 */

import { readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { gzipSync } from "node:zlib";
import { expect, test } from "@playwright/test";
import {
  NotFoundError,
  ParseError,
  UnsupportedFormatError,
} from "@/lib/project/errors";
import {
  decodeProjectBytes,
  detectProjectFormat,
  loadProjectFile,
  parseProjectXml,
} from "@/lib/project/parser";
import {
  captureError,
  createTempDir,
  FIXTURES_DIR,
  outline,
  parseProject,
  removeTempDir,
  SAMPLE_PROJECT,
} from "./helpers";

test.describe("loadProjectFile", () => {
  test("reads layers in flat-list order", () => {
    const doc = loadProjectFile(SAMPLE_PROJECT);

    expect(doc.layers.map((layer) => layer.id)).toEqual([
      "L3",
      "L1",
      "L2",
      "L4",
      "T2",
      "T1",
    ]);
    expect(doc.layers[0].name).toBe("Buildings");
    expect(doc.layers[0].datasource).toBe(
      `dbname='topo' host=db.example.test port=5432 table="public"."buildings" (geom)`
    );
  });

  test("strips the project namespace declaration", () => {
    const doc = loadProjectFile(SAMPLE_PROJECT);

    expect(doc.root.tag).toBe("qgis");
    expect(doc.root.attributes).toEqual({
      projectname: "Sample",
      version: "3.34.4-Prizren",
    });
  });

  test("reads the draw order", () => {
    const doc = loadProjectFile(SAMPLE_PROJECT);

    expect(doc.drawOrder).toEqual(["L1", "L2", "L3", "T1", "T2", "L4"]);
  });

  test("builds the layer tree with nested groups", () => {
    const doc = loadProjectFile(SAMPLE_PROJECT);

    expect(outline(doc.layerTree)).toEqual([
      "A",
      "  Land",
      "    L1",
      "    L2",
      "B",
      "  L3",
      "Labels",
      "  Text",
      "    T1",
      "  Text",
      "    T2",
    ]);
  });

  test("builds the legend tree", () => {
    const doc = loadProjectFile(SAMPLE_PROJECT);

    expect(outline(doc.legend)).toEqual([
      "A",
      "  Land",
      "    L1",
      "    L2",
      "B",
      "  L3",
      "L4",
    ]);
  });

  test("defaults to UTF-8 when the declaration names it", () => {
    const doc = loadProjectFile(SAMPLE_PROJECT);

    expect(doc.encoding.label).toBe("UTF-8");
  });

  test("throws NotFoundError for a missing file", () => {
    const missing = join(FIXTURES_DIR, "missing.qgs");
    const error = captureError(() => loadProjectFile(missing), NotFoundError);

    expect(error.documentPath).toBe(missing);
  });

  test("throws UnsupportedFormatError for other extensions", () => {
    const error = captureError(
      () => loadProjectFile("notes.txt"),
      UnsupportedFormatError
    );

    expect(error.code).toBe("unsupported_format");
  });
});

test.describe("compressed projects", () => {
  let dir: string;

  test.beforeEach(() => {
    dir = createTempDir();
  });

  test.afterEach(() => {
    removeTempDir(dir);
  });

  test("loads a gzip-compressed .qgz", () => {
    const target = join(dir, "sample.qgz");
    writeFileSync(target, gzipSync(readFileSync(SAMPLE_PROJECT)));

    const doc = loadProjectFile(target);

    expect(doc.layers.map((layer) => layer.id)).toEqual([
      "L3",
      "L1",
      "L2",
      "L4",
      "T2",
      "T1",
    ]);
  });

  test("reports a corrupt container as ParseError", () => {
    const target = join(dir, "broken.qgz");
    writeFileSync(target, "<qgis/>");

    const error = captureError(() => loadProjectFile(target), ParseError);

    expect(error.documentPath).toBe(target);
  });
});

test.describe("detectProjectFormat", () => {
  test("is case-insensitive", () => {
    expect(detectProjectFormat("Topo.QGS")).toBe("qgs");
    expect(detectProjectFormat("data/Topo.qgz")).toBe("qgz");
  });
});

test.describe("parseProjectXml", () => {
  test("reports malformed XML with its line", () => {
    const xml = `<?xml version="1.0"?>\n<qgis>\n  <projectlayers>\n</qgis>`;
    const error = captureError(() => parseProject(xml), ParseError);

    expect(error.line).toBe(4);
  });

  test("requires a qgis root element", () => {
    const error = captureError(
      () => parseProject(`<?xml version="1.0"?>\n<project/>`),
      ParseError
    );

    expect(error.message).toBe(
      "Could not parse project document: missing qgis root element"
    );
  });

  test("falls back to the id attribute of older layers", () => {
    const doc = parseProject(
      `<qgis><projectlayers><maplayer id="legacy"><datasource>a.shp</datasource></maplayer></projectlayers></qgis>`
    );

    expect(doc.layers[0].id).toBe("legacy");
  });

  test("decodes entity references in model values", () => {
    const doc = parseProject(
      `<qgis><layer-tree-group><layer-tree-group name="Roads &amp; rails"><layer-tree-layer id="L&#x31;" name="one"/></layer-tree-group></layer-tree-group><projectlayers><maplayer><id>L&#49;</id><datasource>dbname=&apos;topo&apos;</datasource><layername>A &lt; B</layername></maplayer></projectlayers></qgis>`
    );

    expect(doc.layers[0].id).toBe("L1");
    expect(doc.layers[0].datasource).toBe("dbname='topo'");
    expect(doc.layers[0].name).toBe("A < B");
    expect(outline(doc.layerTree)).toEqual(["Roads & rails", "  L1"]);
  });

  test("treats a missing layer tree and legend as empty", () => {
    const doc = parseProject("<qgis><projectlayers/></qgis>");

    expect(doc.layerTree.children).toEqual([]);
    expect(doc.legend.children).toEqual([]);
    expect(doc.drawOrder).toEqual([]);
  });
});

test.describe("decodeProjectBytes", () => {
  test("decodes with the declared encoding", () => {
    const bytes = Buffer.from(
      `<?xml version="1.0" encoding="ISO-8859-1"?>\n<qgis projectname="Bjørn"/>`,
      "latin1"
    );

    const { xml, encoding } = decodeProjectBytes(bytes);
    const doc = parseProjectXml(xml, encoding);

    expect(encoding.label).toBe("ISO-8859-1");
    expect(doc.root.attributes.projectname).toBe("Bjørn");
  });

  test("takes the byte order from a UTF-16 byte order mark", () => {
    const text = `<?xml version="1.0" encoding="UTF-16"?>\n<qgis projectname="Bjørn"/>`;
    const bigEndian = Buffer.concat([
      Buffer.from([0xfe, 0xff]),
      Buffer.from(text, "utf16le").swap16(),
    ]);

    const { xml, encoding } = decodeProjectBytes(bigEndian);

    expect(encoding).toEqual({ label: "UTF-16", decoder: "utf-16be" });
    expect(parseProjectXml(xml, encoding).root.attributes.projectname).toBe(
      "Bjørn"
    );
  });

  test("rejects an unknown encoding", () => {
    const bytes = Buffer.from(
      `<?xml version="1.0" encoding="x-no-such-encoding"?>\n<qgis/>`
    );

    const error = captureError(
      () => decodeProjectBytes(bytes, "odd.qgs"),
      ParseError
    );

    expect(error.message).toBe(
      "Could not parse odd.qgs: unsupported text encoding 'x-no-such-encoding'"
    );
  });
});
