/**
 * Project document serialization.
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, extname } from "node:path";
import { gzipSync } from "node:zlib";
import { projectDebug } from "./debug";
import { WriteError } from "./errors";
import type { ProjectDocument } from "./types";
import { resolveOutputEncoding } from "./utils/encoding";
import { buildXml } from "./utils/xml";

const dbg = projectDebug("serialize");

const BYTE_ORDER_MARK = "\uFEFF";

/**
 * Serialize a document with an XML declaration, in the source encoding
 * where it can be written back (UTF-8 otherwise).
 */
export function serializeProject(doc: ProjectDocument): Buffer {
  const { label, bufferEncoding } = resolveOutputEncoding(doc.encoding);
  const declaration = `<?xml version="1.0" encoding="${label}"?>`;
  const text = `${declaration}\n${buildXml(doc.root)}\n`;
  // UTF-16 output needs a byte order mark for readers to detect it
  return Buffer.from(
    bufferEncoding === "utf16le" ? `${BYTE_ORDER_MARK}${text}` : text,
    bufferEncoding
  );
}

/**
 * Write a document to disk, creating missing directories. Targets ending
 * in .qgz are gzip-compressed.
 *
 * @throws WriteError carrying the target path
 */
export function writeProjectFile(doc: ProjectDocument, targetPath: string): void {
  try {
    const bytes = serializeProject(doc);
    const outputDir = dirname(targetPath);
    if (outputDir) {
      mkdirSync(outputDir, { recursive: true });
    }
    const compressed = extname(targetPath).toLowerCase() === ".qgz";
    writeFileSync(targetPath, compressed ? gzipSync(bytes) : bytes);
    dbg("wrote %s (%d bytes)", targetPath, bytes.length);
  } catch (error) {
    throw new WriteError(targetPath, error);
  }
}
