import { existsSync, mkdirSync, rmSync, writeFileSync } from "node:fs";
import { dirname, isAbsolute, join, relative, sep } from "node:path";

import type { ParseOutputEntry } from "../directory/compile_directory";
import { TraceParseError } from "../ingest/trace_parse_error";
import { getDefaultLogger, type ReportLogger } from "../logging/logger";

/** Creates `outDir`, replacing it only when `overwrite` is set. */
export function setupOutputDirectory(outDir: string, overwrite: boolean): void {
  if (existsSync(outDir)) {
    if (!overwrite) {
      throw new TraceParseError({
        code: "output_exists",
        message: `Directory ${outDir} already exists; pass --overwrite to replace it`,
        path: outDir,
      });
    }
    rmSync(outDir, { recursive: true, force: true });
  }
  mkdirSync(outDir, { recursive: true });
}

export function isInsideDirectory(root: string, target: string): boolean {
  const rel = relative(root, target);
  return rel !== "" && rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

/**
 * Writes every output below `outDir`; returns the path of `index.html`.
 * Paths that would land outside `outDir` are skipped.
 */
export function writeParseOutput(
  outDir: string,
  outputs: readonly ParseOutputEntry[],
  logger: ReportLogger = getDefaultLogger(),
): string {
  for (const { path, content } of outputs) {
    const target = join(outDir, path);
    if (!isInsideDirectory(outDir, target)) {
      logger.warn({ path }, "output.path_outside_directory");
      continue;
    }
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, content);
  }
  return join(outDir, "index.html");
}
