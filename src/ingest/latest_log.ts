import { existsSync, readdirSync, statSync } from "node:fs";
import { join } from "node:path";

import { TraceParseError } from "./trace_parse_error";

/** The most recently modified regular file directly inside `dir`. */
export function latestLogFile(dir: string): string {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    throw new TraceParseError({
      code: "not_a_directory",
      message: `${dir} is not a directory (required when using --latest)`,
      path: dir,
    });
  }

  let latest: { path: string; mtimeMs: number } | null = null;
  for (const name of readdirSync(dir)) {
    const path = join(dir, name);
    const stats = statSync(path);
    if (!stats.isFile()) continue;
    if (latest === null || stats.mtimeMs > latest.mtimeMs) {
      latest = { path, mtimeMs: stats.mtimeMs };
    }
  }
  if (latest === null) {
    throw new TraceParseError({ code: "no_log_files", message: `No files found in directory ${dir}`, path: dir });
  }
  return latest.path;
}
