/**
 * Error taxonomy for project document handling.
 *
 * Every error names the document it concerns (when known) so the CLI can
 * report it without extra context.
 */

export type ProjectErrorCode =
  | "not_found"
  | "unsupported_format"
  | "parse"
  | "no_match"
  | "reassembly"
  | "write";

export class ProjectError extends Error {
  readonly code: ProjectErrorCode;
  readonly documentPath?: string;

  constructor(
    code: ProjectErrorCode,
    message: string,
    documentPath?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ProjectError";
    this.code = code;
    this.documentPath = documentPath;
  }
}

export class NotFoundError extends ProjectError {
  constructor(documentPath: string) {
    super("not_found", `Project file not found: ${documentPath}`, documentPath);
    this.name = "NotFoundError";
  }
}

export class UnsupportedFormatError extends ProjectError {
  constructor(documentPath: string) {
    super(
      "unsupported_format",
      `Unsupported file type: ${documentPath}. Expected a .qgs or .qgz file`,
      documentPath
    );
    this.name = "UnsupportedFormatError";
  }
}

export class ParseError extends ProjectError {
  readonly line?: number;
  readonly column?: number;

  constructor(
    reason: string,
    details: {
      documentPath?: string;
      line?: number;
      column?: number;
      cause?: unknown;
    } = {}
  ) {
    const location =
      details.line === undefined
        ? ""
        : ` (line ${details.line}, column ${details.column ?? 0})`;
    const subject = details.documentPath ?? "project document";
    super("parse", `Could not parse ${subject}: ${reason}${location}`, details.documentPath, {
      cause: details.cause,
    });
    this.name = "ParseError";
    this.line = details.line;
    this.column = details.column;
  }
}

/**
 * A candidate document that was skipped during extraction.
 */
export type DocumentFailure = {
  documentPath: string;
  error: ProjectError;
};

export class NoMatchError extends ProjectError {
  readonly pattern: string;
  readonly failures: DocumentFailure[];

  constructor(pattern: string, failures: DocumentFailure[] = []) {
    super("no_match", `No layers matching '${pattern}' found in any project file`);
    this.name = "NoMatchError";
    this.pattern = pattern;
    this.failures = failures;
  }
}

export class ReassemblyError extends ProjectError {
  readonly layerId: string;

  constructor(layerId: string, reason: string, documentPath?: string) {
    const subject = documentPath ? ` in ${documentPath}` : "";
    super("reassembly", `Cannot rebuild layer '${layerId}'${subject}: ${reason}`, documentPath);
    this.name = "ReassemblyError";
    this.layerId = layerId;
  }
}

export class WriteError extends ProjectError {
  readonly targetPath: string;

  constructor(targetPath: string, cause: unknown) {
    super("write", `Could not write ${targetPath}: ${describeError(cause)}`, targetPath, {
      cause,
    });
    this.name = "WriteError";
    this.targetPath = targetPath;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
