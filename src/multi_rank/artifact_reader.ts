import { existsSync, readdirSync, readFileSync, statSync } from "node:fs";
import { join, parse } from "node:path";

import {
  CollectiveScheduleSchema,
  RuntimeAndTensorMetaSchema,
  type CollectiveSchedule,
  type GraphRuntime,
  type TensorMetaFingerprint,
} from "../contracts/multi_rank";
import { errorMessage } from "../parsers/dispatch";
import { TraceParseError } from "../ingest/trace_parse_error";

export const RUNTIME_AND_TENSOR_META_PREFIX = "inductor_runtime_and_tensor_meta";
export const COLLECTIVE_SCHEDULE_PREFIX = "inductor_collective_schedule";

export const rankDirectory = (outDir: string, rank: number): string => join(outDir, `rank_${rank}`);

const sortedNames = (dir: string): string[] => readdirSync(dir).sort();

function firstMatchingJson(compileDir: string, prefix: string): string | null {
  for (const name of sortedNames(compileDir)) {
    const parsed = parse(name);
    if (parsed.ext !== ".json" || !parsed.name.startsWith(prefix)) continue;
    const path = join(compileDir, name);
    if (statSync(path).isFile()) return path;
  }
  return null;
}

/**
 * For every rank, opens the first `<prefix>*.json` in each compile directory
 * under `rank_<N>/` and keeps what `read` returns. Missing rank directories
 * are skipped; an unreadable artifact fails the pass.
 */
export function readRankArtifacts<T>(
  outDir: string,
  ranks: readonly number[],
  prefix: string,
  read: (content: string, rank: number, graph: string) => T | null,
): T[] {
  const results: T[] = [];
  for (const rank of ranks) {
    const rankDir = rankDirectory(outDir, rank);
    if (!existsSync(rankDir)) continue;
    for (const graph of sortedNames(rankDir)) {
      const compileDir = join(rankDir, graph);
      if (!statSync(compileDir).isDirectory()) continue;
      const file = firstMatchingJson(compileDir, prefix);
      if (file === null) continue;
      let value: T | null;
      try {
        value = read(readFileSync(file, "utf8"), rank, graph);
      } catch (error) {
        throw new TraceParseError({
          code: "artifact_invalid",
          message: `Reading ${prefix} for rank ${rank}: ${errorMessage(error)}`,
          path: file,
        });
      }
      if (value !== null) results.push(value);
    }
  }
  return results;
}

/** JSON with object keys sorted at every level and no whitespace. */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, child]) => `${JSON.stringify(key)}:${canonicalJson(child)}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value);
}

export function readRuntimeEstimations(outDir: string, ranks: readonly number[]): GraphRuntime[] {
  return readRankArtifacts(outDir, ranks, RUNTIME_AND_TENSOR_META_PREFIX, (content, rank, graph) => {
    const { ops } = RuntimeAndTensorMetaSchema.parse(JSON.parse(content));
    return ops.length === 0 ? null : { rank, graph, ops };
  });
}

export function readTensorMetaFingerprints(outDir: string, ranks: readonly number[]): TensorMetaFingerprint[] {
  return readRankArtifacts(outDir, ranks, RUNTIME_AND_TENSOR_META_PREFIX, (content, rank, graph) => ({
    rank,
    graph,
    fingerprint: canonicalJson(JSON.parse(content)),
  }));
}

export function readCollectiveSchedules(outDir: string, ranks: readonly number[]): CollectiveSchedule[] {
  return readRankArtifacts(outDir, ranks, COLLECTIVE_SCHEDULE_PREFIX, (content, rank, graph) => {
    const ops = CollectiveScheduleSchema.parse(JSON.parse(content));
    return ops.length === 0 ? null : { rank, graph, ops };
  });
}
