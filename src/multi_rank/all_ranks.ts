import { existsSync, readdirSync, readFileSync, statSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import { z } from "zod";

import { defaultParseConfig, type ParseConfig } from "../config/parse_config";
import type { Diagnostics, RankMetadata } from "../contracts/multi_rank";
import { parseLog } from "../ingest/parse_log";
import { formatParseStats } from "../ingest/parse_stats";
import { TraceParseError } from "../ingest/trace_parse_error";
import { getDefaultLogger, type ReportLogger } from "../logging/logger";
import { errorMessage } from "../parsers/dispatch";
import { setupOutputDirectory, writeParseOutput } from "../output/output_writer";
import { renderLandingPage } from "../render/landing_page";
import {
  rankDirectory,
  readCollectiveSchedules,
  readRuntimeEstimations,
  readTensorMetaFingerprints,
} from "./artifact_reader";
import {
  collectiveSignatures,
  compileIdSignature,
  groupBySignature,
  reportedGroups,
  tensorMetaSignatures,
} from "./divergence";
import { readRankMetadata } from "./rank_metadata";
import { analyzeGraphRuntimeDeltas } from "./runtime_analysis";
import { buildRuntimeTrace } from "./runtime_trace";

const RANK_LOG_PATTERN = /^dedicated_log_torch_trace_rank_(\d+)(?:_.*)?\.log$/;

export type RankLog = { rank: number; path: string };

/** Per-rank logs in `inputDir`, ordered by rank. Only the first log of a rank is kept. */
export function discoverRankLogs(inputDir: string): RankLog[] {
  const found: RankLog[] = [];
  for (const name of readdirSync(inputDir).sort()) {
    const match = RANK_LOG_PATTERN.exec(name);
    if (!match) continue;
    const path = join(inputDir, name);
    if (!statSync(path).isFile()) continue;
    found.push({ rank: Number(match[1]), path });
  }
  found.sort((a, b) => a.rank - b.rank);
  return found.filter((log, i) => i === 0 || found[i - 1].rank !== log.rank);
}

const ChromiumEventsSchema = z.array(z.record(z.unknown()));

/** A rank's chromium events with `pid` set to the rank. A missing file means no events. */
export function readChromiumEventsWithPid(
  path: string,
  rank: number,
  logger: ReportLogger = getDefaultLogger(),
): Array<Record<string, unknown>> {
  if (!existsSync(path)) return [];
  let reason: string;
  try {
    const parsed = ChromiumEventsSchema.safeParse(JSON.parse(readFileSync(path, "utf8")));
    if (parsed.success) return parsed.data.map((event) => ({ ...event, pid: rank }));
    reason = parsed.error.issues[0]?.message ?? "not an event list";
  } catch (error) {
    reason = errorMessage(error);
  }
  logger.warn({ rank, path, reason }, "multi_rank.chromium_events_invalid");
  throw new TraceParseError({
    code: "artifact_invalid",
    message: `Reading chromium events for rank ${rank}: ${reason}`,
    path,
  });
}

export type AllRanksOptions = {
  inputDir: string;
  outDir: string;
  overwrite: boolean;
  config?: ParseConfig;
};

export type AllRanksResult = {
  ranks: number[];
  diagnostics: Diagnostics;
  landingPage: string;
};

const writeJson = (path: string, value: unknown): void => {
  writeFileSync(path, JSON.stringify(value, null, 2));
};

/**
 * Parses every rank log into `rank_<N>/`, then compares the ranks and writes
 * the cross-rank files and landing page.
 */
export function handleAllRanks(options: AllRanksOptions): AllRanksResult {
  const config = options.config ?? defaultParseConfig();
  const logger = config.logger ?? getDefaultLogger();
  const { inputDir, outDir } = options;

  if (!existsSync(inputDir) || !statSync(inputDir).isDirectory()) {
    throw new TraceParseError({
      code: "not_a_directory",
      message: `Input path ${inputDir} must be a directory`,
      path: inputDir,
    });
  }
  const logs = discoverRankLogs(inputDir);
  if (logs.length === 0) {
    throw new TraceParseError({
      code: "no_rank_logs",
      message: `No rank log files found in directory ${inputDir}`,
      path: inputDir,
    });
  }

  setupOutputDirectory(outDir, options.overwrite);

  const ranks = logs.map((log) => log.rank);
  const chromiumEvents: Array<Record<string, unknown>> = [];
  const metadata: RankMetadata[] = [];
  for (const { rank, path } of logs) {
    const rankDir = rankDirectory(outDir, rank);
    setupOutputDirectory(rankDir, options.overwrite);
    const result = parseLog(path, config);
    writeParseOutput(rankDir, result.outputs, logger);
    logger.info({ rank, path, stats: formatParseStats(result.stats) }, "multi_rank.rank_processed");

    metadata.push(readRankMetadata(outDir, rank));
    chromiumEvents.push(...readChromiumEventsWithPid(join(rankDir, "chromium_events.json"), rank, logger));
  }

  const compileIdGrouping = groupBySignature(
    metadata.map((md) => ({ rank: md.rank, signature: compileIdSignature(md.compileIds) })),
  );
  const cacheGrouping = groupBySignature(metadata.map((md) => ({ rank: md.rank, signature: md.cacheSequence })));

  if (chromiumEvents.length > 0) {
    writeJson(join(outDir, "chromium_events.json"), chromiumEvents);
  }

  const runtimes = readRuntimeEstimations(outDir, ranks);
  if (runtimes.length > 0) {
    writeJson(join(outDir, "runtime_estimations.json"), runtimes);
    writeJson(join(outDir, "chromium_trace_with_runtime.json"), buildRuntimeTrace(runtimes));
  }

  const schedules = readCollectiveSchedules(outDir, ranks);
  if (schedules.length > 0) {
    writeJson(join(outDir, "collective_schedules.json"), schedules);
  }
  const collectiveGrouping = groupBySignature(collectiveSignatures(ranks, schedules));
  const tensorMetaGrouping = groupBySignature(tensorMetaSignatures(readTensorMetaFingerprints(outDir, ranks)));

  const diagnostics: Diagnostics = {
    divergence: {
      cache: cacheGrouping.divergent,
      collective: collectiveGrouping.divergent,
      tensorMeta: tensorMetaGrouping.divergent,
      compileIds: compileIdGrouping.divergent,
    },
    artifacts: { runtimeTrace: runtimes.length > 0 },
    analysis: analyzeGraphRuntimeDeltas(runtimes),
    cacheGroups: reportedGroups(cacheGrouping),
    collectiveGroups: reportedGroups(collectiveGrouping),
    tensorMetaGroups: reportedGroups(tensorMetaGrouping),
    compileIdGroups: reportedGroups(compileIdGrouping),
  };
  writeJson(join(outDir, "diagnostics.json"), diagnostics);

  const landingPage = join(outDir, "index.html");
  writeFileSync(
    landingPage,
    renderLandingPage({
      ranks,
      diagnostics,
      hasChromiumEvents: chromiumEvents.length > 0,
      customHeaderHtml: config.customHeaderHtml,
    }),
  );
  logger.info({ outDir, ranks: ranks.length, divergence: diagnostics.divergence }, "multi_rank.completed");

  return { ranks, diagnostics, landingPage };
}
