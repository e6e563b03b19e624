/**
 * Text encoding detection and round-tripping for project documents.
 */

import { TextDecoder } from "node:util";
import { DEFAULT_ENCODING_LABEL } from "../constants";
import { ParseError } from "../errors";
import type { ProjectEncoding } from "../types";

const DECLARATION_ENCODING_PATTERN =
  /^\s*<\?xml[^>]*?\bencoding\s*=\s*["']([A-Za-z0-9._:-]+)["']/;

// UTF-8 and UTF-16 byte order marks, read as latin1
const BYTE_ORDER_MARK_PATTERN = /^(\xEF\xBB\xBF|\xFF\xFE|\xFE\xFF)/;

// Bytes inspected for the XML declaration
const DECLARATION_PROBE_LENGTH = 256;

/**
 * Encodings the serializer can write back. Keys are lowercased labels.
 */
const OUTPUT_ENCODINGS: Record<string, BufferEncoding> = {
  "utf-8": "utf8",
  utf8: "utf8",
  "iso-8859-1": "latin1",
  "iso8859-1": "latin1",
  latin1: "latin1",
  "utf-16": "utf16le",
  "utf-16le": "utf16le",
};

/**
 * Byte order of UTF-16 text with a byte order mark.
 */
function utf16DecoderFromMark(bytes: Uint8Array): string | undefined {
  if (bytes[0] === 0xfe && bytes[1] === 0xff) {
    return "utf-16be";
  }
  if (bytes[0] === 0xff && bytes[1] === 0xfe) {
    return "utf-16le";
  }
  return undefined;
}

/**
 * Read the encoding label from the XML declaration, defaulting to UTF-8.
 * A UTF-16 byte order mark decides the decoder over the label.
 */
export function detectEncoding(bytes: Uint8Array): ProjectEncoding {
  const head = Buffer.from(bytes.subarray(0, DECLARATION_PROBE_LENGTH))
    .toString("latin1")
    .replace(BYTE_ORDER_MARK_PATTERN, "")
    .replace(/\0/g, "");
  const match = head.match(DECLARATION_ENCODING_PATTERN);
  const label = match ? match[1] : DEFAULT_ENCODING_LABEL;
  return {
    label,
    decoder: utf16DecoderFromMark(bytes) ?? label.toLowerCase(),
  };
}

export function decodeText(
  bytes: Uint8Array,
  encoding: ProjectEncoding,
  documentPath?: string
): string {
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(encoding.decoder);
  } catch (error) {
    throw new ParseError(`unsupported text encoding '${encoding.label}'`, {
      documentPath,
      cause: error,
    });
  }
  return decoder.decode(bytes);
}

/**
 * Resolve how a document's text is written back. Encodings that cannot be
 * written fall back to UTF-8, and the declaration says so.
 */
export function resolveOutputEncoding(encoding: ProjectEncoding): {
  label: string;
  bufferEncoding: BufferEncoding;
} {
  const bufferEncoding = OUTPUT_ENCODINGS[encoding.label.toLowerCase()];
  if (!bufferEncoding) {
    return { label: DEFAULT_ENCODING_LABEL, bufferEncoding: "utf8" };
  }
  return { label: encoding.label, bufferEncoding };
}
