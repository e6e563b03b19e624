/**
 * Generate wiki documentation for the layers of a project file
 *
 * Usage:
 *   npx tsx scripts/document-layers.ts PROJECT [options]
 *
 * Options:
 *   --output=FILE    Markdown output (prints to stdout when omitted)
 *   --csv=FILE       Also write the layer table as CSV
 *   --sidebar=FILE   Also write a wiki sidebar (_Sidebar.md)
 *   --title=TEXT     Page title (defaults to the project file name)
 */

import { writeFileSync } from "node:fs";
import { basename, extname } from "node:path";
import {
  extractLayerDocumentation,
  formatAsCsv,
  formatAsMarkdown,
  generateWikiSidebar,
} from "@/lib/project/documentation";
import { describeError } from "@/lib/project/errors";
import { loadProjectFile } from "@/lib/project/parser";

const args = process.argv.slice(2);
const projectPath = args.find((a) => !a.startsWith("--"));

function flagValue(name: string): string | undefined {
  const prefix = `--${name}=`;
  return args.find((a) => a.startsWith(prefix))?.slice(prefix.length);
}

const outputFile = flagValue("output");
const csvFile = flagValue("csv");
const sidebarFile = flagValue("sidebar");
const titleArg = flagValue("title");

function log(message: string) {
  console.log(`[document] ${message}`);
}

function writeOutput(label: string, filePath: string, content: string): boolean {
  try {
    writeFileSync(filePath, content, "utf-8");
    log(`${label} written to ${filePath}`);
    return true;
  } catch (error) {
    console.error(`[document] Could not write ${filePath}: ${describeError(error)}`);
    return false;
  }
}

function main(): number {
  if (!projectPath) {
    console.error("[document] Error: a project file (.qgs or .qgz) is required");
    return 1;
  }

  let data: ReturnType<typeof extractLayerDocumentation>;
  try {
    data = extractLayerDocumentation(loadProjectFile(projectPath));
  } catch (error) {
    console.error(`[document] Error: ${describeError(error)}`);
    return 1;
  }

  const title = titleArg ?? basename(projectPath, extname(projectPath));
  const markdown = formatAsMarkdown(title, data, { generatedOn: new Date() });

  let ok = true;
  if (outputFile) {
    ok = writeOutput("Wiki documentation", outputFile, markdown) && ok;
  } else {
    console.log(markdown);
  }

  if (sidebarFile) {
    ok = writeOutput("Wiki sidebar", sidebarFile, generateWikiSidebar(data, title)) && ok;
  }

  if (csvFile) {
    const csv = formatAsCsv(data.layers);
    if (csv) {
      ok = writeOutput("CSV data", csvFile, csv) && ok;
    } else {
      log("No data to write to CSV.");
    }
  }

  return ok ? 0 : 1;
}

process.exit(main());
