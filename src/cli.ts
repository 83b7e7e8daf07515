#!/usr/bin/env node
import { Command } from "commander";
import { z } from "zod";

import { loadParseConfigFromEnv, type ParseConfig } from "./config/parse_config";
import { latestLogFile } from "./ingest/latest_log";
import { parseLog } from "./ingest/parse_log";
import { formatParseStats } from "./ingest/parse_stats";
import { TraceParseError } from "./ingest/trace_parse_error";
import { getDefaultLogger } from "./logging/logger";
import { handleAllRanks } from "./multi_rank/all_ranks";
import { setupOutputDirectory, writeParseOutput } from "./output/output_writer";

const CommonOptionsSchema = z.object({
  out: z.string().min(1),
  overwrite: z.boolean().default(false),
  strict: z.boolean().optional(),
  strictCompileId: z.boolean().optional(),
  verbose: z.boolean().optional(),
  plainText: z.boolean().optional(),
  export: z.boolean().optional(),
  inductorProvenance: z.boolean().optional(),
  customHeaderHtml: z.string().optional(),
});

type CommonOptions = z.infer<typeof CommonOptionsSchema>;

const ParseOptionsSchema = CommonOptionsSchema.extend({
  latest: z.boolean().default(false),
});

function configFromOptions(opts: CommonOptions): ParseConfig {
  const base = loadParseConfigFromEnv();
  return {
    ...base,
    strict: opts.strict ?? base.strict,
    strictCompileId: opts.strictCompileId ?? base.strictCompileId,
    verbose: opts.verbose ?? base.verbose,
    plainText: opts.plainText ?? base.plainText,
    export: opts.export ?? base.export,
    inductorProvenance: opts.inductorProvenance ?? base.inductorProvenance,
    customHeaderHtml: opts.customHeaderHtml ?? base.customHeaderHtml,
    logger: getDefaultLogger(),
  };
}

const withParseOptions = (command: Command): Command =>
  command
    .option("-o, --out <dir>", "Output directory", "tl_out")
    .option("--overwrite", "Delete the output directory if it already exists", false)
    .option("--strict", "Fail if any line could not be parsed")
    .option("--strict-compile-id", "Fail if a record is missing its compile id")
    .option("-v, --verbose", "Log every unknown field as it is seen")
    .option("-p, --plain-text", "Write inductor output code as plain text")
    .option("-e, --export", "Only report export failures")
    .option("-i, --inductor-provenance", "Write provenance mappings for inductor output")
    .option("--custom-header-html <html>", "HTML placed at the top of every index page");

function reportFailure(err: unknown): never {
  if (err instanceof TraceParseError) {
    console.error(JSON.stringify(err.toJSON(), null, 2));
  } else {
    console.error(err instanceof Error ? err.message : String(err));
  }
  process.exit(1);
}

export function buildProgram(): Command {
  const program = new Command()
    .name("rank-trace-report")
    .description("Turn compilation trace logs into browsable artifact reports");

  withParseOptions(
    program
      .command("parse")
      .description("Parse a single trace log")
      .argument("<log>", "Trace log file, or a directory with --latest")
      .option("--latest", "Parse the most recently modified file in the <log> directory", false),
  ).action((log: string, rawOpts: unknown) => {
    const opts = ParseOptionsSchema.parse(rawOpts);
    const config = configFromOptions(opts);
    const path = opts.latest ? latestLogFile(log) : log;
    setupOutputDirectory(opts.out, opts.overwrite);
    const result = parseLog(path, config);
    const index = writeParseOutput(opts.out, result.outputs, getDefaultLogger());
    console.log(formatParseStats(result.stats));
    console.log(index);
  });

  withParseOptions(
    program
      .command("all-ranks")
      .description("Parse every per-rank log in a directory and compare the ranks")
      .argument("<dir>", "Directory holding dedicated_log_torch_trace_rank_<N>*.log files"),
  ).action((dir: string, rawOpts: unknown) => {
    const opts = CommonOptionsSchema.parse(rawOpts);
    const result = handleAllRanks({
      inputDir: dir,
      outDir: opts.out,
      overwrite: opts.overwrite,
      config: configFromOptions(opts),
    });
    console.log(result.landingPage);
  });

  return program;
}

if (require.main === module) {
  try {
    buildProgram().parse(process.argv);
  } catch (err) {
    reportFailure(err);
  }
}
