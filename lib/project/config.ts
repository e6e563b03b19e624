/**
 * Configuration for project tooling.
 *
 * The candidate project list is an explicit value passed to each
 * operation. Environment variables only seed its defaults.
 */

import { existsSync, readdirSync } from "node:fs";
import { extname, join } from "node:path";
import { z } from "zod";
import { PROJECT_EXTENSIONS } from "./constants";

export const DEFAULT_PROJECT_DIRECTORY = "./data";

export const extractionOptionsSchema = z.object({
  sources: z
    .array(z.string().min(1))
    .min(1, "At least one project file is required"),
  pattern: z.string().min(1, "A datasource pattern is required"),
  output: z.string().min(1, "An output project path is required"),
  mode: z.enum(["substring", "regex"]).default("substring"),
});

export type ExtractionOptions = z.input<typeof extractionOptionsSchema>;
export type ResolvedExtractionOptions = z.output<typeof extractionOptionsSchema>;

const envSchema = z.object({
  PROJECT_SOURCES: z.string().optional(),
  PROJECT_DIRECTORY: z.string().default(DEFAULT_PROJECT_DIRECTORY),
});

export type ProjectEnv = z.infer<typeof envSchema>;

export function readProjectEnv(
  env: Record<string, string | undefined> = process.env
): ProjectEnv {
  return envSchema.parse(env);
}

function isProjectFile(fileName: string): boolean {
  return extname(fileName).toLowerCase() in PROJECT_EXTENSIONS;
}

/**
 * Project files directly inside a directory, sorted by name.
 */
export function findProjectFiles(directory: string): string[] {
  if (!existsSync(directory)) {
    return [];
  }
  return readdirSync(directory)
    .filter(isProjectFile)
    .sort()
    .map((fileName) => join(directory, fileName));
}

export function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Candidate project files: explicit list first, then PROJECT_SOURCES,
 * then every project file in PROJECT_DIRECTORY.
 */
export function resolveProjectSources(
  explicit: string[] | null,
  env: ProjectEnv
): string[] {
  if (explicit && explicit.length > 0) {
    return explicit;
  }
  if (env.PROJECT_SOURCES) {
    return splitList(env.PROJECT_SOURCES);
  }
  return findProjectFiles(env.PROJECT_DIRECTORY);
}
