import { readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { gunzipSync } from "node:zlib";
import { expect, test } from "@playwright/test";
import { WriteError } from "@/lib/project/errors";
import {
  decodeProjectBytes,
  loadProjectFile,
  parseProjectXml,
} from "@/lib/project/parser";
import { rebuildProject } from "@/lib/project/reassembler";
import { datasourceContains, selectLayers } from "@/lib/project/selector";
import { serializeProject, writeProjectFile } from "@/lib/project/serializer";
import { indexLayerTree } from "@/lib/project/utils/layer-tree";
import {
  captureError,
  createTempDir,
  outline,
  parseProject,
  projectXml,
  removeTempDir,
  SAMPLE_PROJECT,
} from "./helpers";

function reparse(bytes: Uint8Array) {
  const { xml, encoding } = decodeProjectBytes(bytes);
  return parseProjectXml(xml, encoding);
}

test.describe("serializeProject", () => {
  test("starts with an XML declaration naming the encoding", () => {
    const text = serializeProject(loadProjectFile(SAMPLE_PROJECT)).toString(
      "utf-8"
    );

    expect(text.split("\n").slice(0, 2)).toEqual([
      `<?xml version="1.0" encoding="UTF-8"?>`,
      `<qgis projectname="Sample" version="3.34.4-Prizren">`,
    ]);
    expect(text.endsWith("</qgis>\n")).toBe(true);
  });

  test("writes empty elements as self-closing tags", () => {
    const text = serializeProject(loadProjectFile(SAMPLE_PROJECT)).toString(
      "utf-8"
    );

    expect(text).toContain("  <relations/>\n");
  });

  test("reads back to the same layers and trees", () => {
    const doc = loadProjectFile(SAMPLE_PROJECT);
    const copy = reparse(serializeProject(doc));

    expect(copy.layers.map((layer) => [layer.id, layer.datasource])).toEqual(
      doc.layers.map((layer) => [layer.id, layer.datasource])
    );
    expect(copy.drawOrder).toEqual(doc.drawOrder);
    expect(outline(copy.layerTree)).toEqual(outline(doc.layerTree));
    expect(outline(copy.legend)).toEqual(outline(doc.legend));
  });

  test("writes raw markup of copied layers back unchanged", () => {
    const doc = parseProject(
      projectXml({
        layers: [
          `<maplayer><id>L1</id><datasource>  dbname=&apos;x&apos; padded  </datasource><expr value="line1&#xa;line2&#x9;end"/><layername>Roads &amp; rails</layername></maplayer>`,
        ],
      })
    );

    const rebuilt = rebuildProject(
      doc,
      selectLayers(doc.layers, datasourceContains("dbname='x'")),
      indexLayerTree(doc.layerTree)
    );
    const lines = serializeProject(rebuilt).toString("utf-8").split("\n");

    expect(lines).toContain(
      "      <datasource>  dbname=&apos;x&apos; padded  </datasource>"
    );
    expect(lines).toContain(`      <expr value="line1&#xa;line2&#x9;end"/>`);
    expect(lines).toContain("      <layername>Roads &amp; rails</layername>");

    const copy = reparse(serializeProject(rebuilt));
    expect(copy.layers[0].datasource).toBe("  dbname='x' padded  ");
    expect(copy.layers[0].name).toBe("Roads & rails");
  });

  test("writes back in the source encoding", () => {
    const doc = reparse(
      Buffer.from(
        `<?xml version="1.0" encoding="ISO-8859-1"?>\n<qgis projectname="Bjørn"/>`,
        "latin1"
      )
    );

    const bytes = serializeProject(doc);

    expect(bytes.toString("latin1").split("\n")[0]).toBe(
      `<?xml version="1.0" encoding="ISO-8859-1"?>`
    );
    expect(bytes.includes(0xf8)).toBe(true);
    expect(reparse(bytes).root.attributes.projectname).toBe("Bjørn");
  });

  test("falls back to UTF-8 for encodings it cannot write", () => {
    const doc = reparse(
      Buffer.from(
        `<?xml version="1.0" encoding="windows-1252"?>\n<qgis projectname="Bjørn"/>`,
        "latin1"
      )
    );

    const bytes = serializeProject(doc);

    expect(bytes.toString("utf-8").split("\n")[0]).toBe(
      `<?xml version="1.0" encoding="UTF-8"?>`
    );
    expect(reparse(bytes).root.attributes.projectname).toBe("Bjørn");
  });
});

test.describe("writeProjectFile", () => {
  let dir: string;

  test.beforeEach(() => {
    dir = createTempDir();
  });

  test.afterEach(() => {
    removeTempDir(dir);
  });

  test("creates missing directories", () => {
    const target = join(dir, "nested", "out", "subset.qgs");

    writeProjectFile(loadProjectFile(SAMPLE_PROJECT), target);

    expect(loadProjectFile(target).layers).toHaveLength(6);
  });

  test("compresses .qgz targets", () => {
    const doc = loadProjectFile(SAMPLE_PROJECT);
    const target = join(dir, "subset.qgz");

    writeProjectFile(doc, target);

    expect(gunzipSync(readFileSync(target))).toEqual(serializeProject(doc));
    expect(loadProjectFile(target).drawOrder).toEqual(doc.drawOrder);
  });

  test("reports failures with the target path", () => {
    const blocker = join(dir, "blocker");
    writeFileSync(blocker, "not a directory");
    const target = join(blocker, "subset.qgs");

    const error = captureError(
      () => writeProjectFile(loadProjectFile(SAMPLE_PROJECT), target),
      WriteError
    );

    expect(error.targetPath).toBe(target);
    expect(error.code).toBe("write");
  });
});
