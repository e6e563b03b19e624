/**
 * Extract layers whose datasource matches a pattern into a new project file
 *
 * Usage:
 *   npx tsx scripts/extract-layers.ts --pattern=PATTERN --output=FILE [options]
 *
 * Options:
 *   --pattern=TEXT   Text to look for in each layer's datasource (required)
 *   --output=FILE    Project file to write, .qgs or .qgz (required)
 *   --files=A,B      Candidate project files (comma-separated). Defaults to
 *                    PROJECT_SOURCES, then every project in PROJECT_DIRECTORY
 *   --regex          Treat --pattern as a regular expression
 *   --verbose        Show candidates and the final layer order
 *
 * Skipped candidates are always reported on stderr.
 *
 * The first candidate with any matching layer is used; the others are ignored.
 */

import { config } from "dotenv";

config({ path: ".env.local" });

import {
  readProjectEnv,
  resolveProjectSources,
  splitList,
} from "@/lib/project/config";
import { describeError, NoMatchError } from "@/lib/project/errors";
import { extractLayersByDatasource } from "@/lib/project/extract";

// Parse command line arguments
const args = process.argv.slice(2);

function flagValue(name: string): string | undefined {
  const prefix = `--${name}=`;
  return args.find((a) => a.startsWith(prefix))?.slice(prefix.length);
}

// Patterns often contain "=" (dbname='topo'), so values are taken whole
const pattern = flagValue("pattern");
const output = flagValue("output");
const filesArg = flagValue("files");
const useRegex = args.includes("--regex");
const verbose = args.includes("--verbose");

function log(message: string) {
  console.log(`[extract] ${message}`);
}

function main(): number {
  if (!pattern) {
    console.error("[extract] Error: --pattern is required");
    return 1;
  }
  if (!output) {
    console.error("[extract] Error: --output is required");
    return 1;
  }

  const sources = resolveProjectSources(
    filesArg ? splitList(filesArg) : null,
    readProjectEnv()
  );
  if (sources.length === 0) {
    console.error("[extract] Error: No project files found");
    return 1;
  }

  if (verbose) {
    log(`Found ${sources.length} project files`);
    for (const source of sources) {
      log(`  ${source}`);
    }
  }

  try {
    const result = extractLayersByDatasource({
      sources,
      pattern,
      output,
      mode: useRegex ? "regex" : "substring",
    });

    for (const failure of result.failures) {
      console.error(`[extract] Skipped ${failure.documentPath}: ${failure.error.message}`);
    }
    log(`Extracted ${result.layerCount} layers from ${result.source} to ${result.output}`);
    if (verbose) {
      log(`Layer order: ${result.layerOrder.join(", ")}`);
    }
    return 0;
  } catch (error) {
    if (error instanceof NoMatchError) {
      for (const failure of error.failures) {
        console.error(`[extract] Skipped ${failure.documentPath}: ${failure.error.message}`);
      }
    }
    console.error(`[extract] Error: ${describeError(error)}`);
    return 1;
  }
}

process.exit(main());
