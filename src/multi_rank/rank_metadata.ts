import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";

import { CompileDirectoryFileSchema, type RankMetadata } from "../contracts/multi_rank";
import { rankDirectory } from "./artifact_reader";

const isUnknownKey = (key: string): boolean => key === "unknown" || key.startsWith("unknown_");

/**
 * Compile ids and cache sequence of one rank, from its `compile_directory.json`.
 * The cache sequence is the non-empty status suffixes in artifact order.
 */
export function rankMetadataFromDirectoryJson(rank: number, content: string): RankMetadata {
  const parsed = CompileDirectoryFileSchema.safeParse(JSON.parse(content));
  if (!parsed.success) return { rank, compileIds: [], cacheSequence: "" };

  const compileIds: string[] = [];
  const statuses: Array<{ number: number; suffix: string }> = [];
  for (const [key, entry] of Object.entries(parsed.data)) {
    if (!isUnknownKey(key)) compileIds.push(key);
    for (const artifact of entry.artifacts) {
      if (artifact.suffix !== "") statuses.push({ number: artifact.number, suffix: artifact.suffix });
    }
  }
  statuses.sort((a, b) => a.number - b.number);
  return {
    rank,
    compileIds: compileIds.sort(),
    cacheSequence: statuses.map((status) => status.suffix).join(""),
  };
}

export function readRankMetadata(outDir: string, rank: number): RankMetadata {
  const path = join(rankDirectory(outDir, rank), "compile_directory.json");
  if (!existsSync(path)) return { rank, compileIds: [], cacheSequence: "" };
  return rankMetadataFromDirectoryJson(rank, readFileSync(path, "utf8"));
}
