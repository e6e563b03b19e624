/**
 * Extract layers matching a datasource pattern into a new project file.
 *
 * Candidate documents are tried in order and the first one with any
 * matching layer wins; later candidates are not read or merged.
 */

import {
  type ExtractionOptions,
  extractionOptionsSchema,
} from "./config";
import { projectDebug } from "./debug";
import {
  type DocumentFailure,
  describeError,
  NoMatchError,
  ProjectError,
} from "./errors";
import { loadProjectFile } from "./parser";
import { rebuildProject } from "./reassembler";
import { buildDatasourcePredicate, selectLayers } from "./selector";
import { writeProjectFile } from "./serializer";
import type { DatasourcePredicate, ProjectDocument } from "./types";
import { indexLayerTree } from "./utils/layer-tree";

const dbg = projectDebug("extract");

export type ExtractionResult = {
  source: string;
  output: string;
  layerCount: number;
  /** Layer ids of the written project, in draw order */
  layerOrder: string[];
  /** Candidates skipped before the match because they failed to load */
  failures: DocumentFailure[];
};

/**
 * Rebuild one document keeping only layers whose datasource satisfies the
 * predicate. Returns null when nothing matches.
 */
export function extractMatchingLayers(
  doc: ProjectDocument,
  predicate: DatasourcePredicate,
  documentPath?: string
): ProjectDocument | null {
  const matched = selectLayers(doc.layers, predicate);
  if (matched.length === 0) {
    return null;
  }
  return rebuildProject(
    doc,
    matched,
    indexLayerTree(doc.layerTree),
    documentPath
  );
}

/**
 * @throws NoMatchError when no candidate has a matching layer
 * @throws WriteError when the output cannot be written
 */
export function extractLayersByDatasource(
  options: ExtractionOptions
): ExtractionResult {
  const { sources, pattern, output, mode } =
    extractionOptionsSchema.parse(options);
  const predicate = buildDatasourcePredicate(pattern, mode);
  const failures: DocumentFailure[] = [];

  for (const source of sources) {
    dbg("processing %s", source);

    let extracted: ProjectDocument | null;
    try {
      extracted = extractMatchingLayers(
        loadProjectFile(source),
        predicate,
        source
      );
    } catch (error) {
      if (!(error instanceof ProjectError)) {
        throw error;
      }
      dbg("skipping %s: %s", source, describeError(error));
      failures.push({ documentPath: source, error });
      continue;
    }

    if (!extracted) {
      dbg("no layers matching '%s' in %s", pattern, source);
      continue;
    }

    writeProjectFile(extracted, output);
    dbg("extracted %d layers from %s", extracted.layers.length, source);
    return {
      source,
      output,
      layerCount: extracted.layers.length,
      layerOrder: extracted.drawOrder,
      failures,
    };
  }

  throw new NoMatchError(pattern, failures);
}
