import { existsSync, readFileSync, statSync } from "node:fs";

import { defaultParseConfig, type ParseConfig } from "../config/parse_config";
import {
  compileIdDirectoryName,
  compileIdFromInput,
  normalizeCompileId,
  type CompileId,
} from "../contracts/compile_id";
import {
  EnvelopeSchema,
  unknownEnvelopeFields,
  type CompilationMetricsMetadata,
  type Envelope,
  type GuardAddedFastMetadata,
  type StackSummary,
  type SymbolicShapeSpecializationMetadata,
} from "../contracts/envelope";
import { ArtifactSink, CompileDirectory, type ParseOutputEntry } from "../directory/compile_directory";
import { CompileIdIndex, CompileIdMap } from "../directory/compile_id_index";
import { getDefaultLogger, type ReportLogger } from "../logging/logger";
import {
  compilationMetricsParser,
  failuresFromMetrics,
  renderFailuresAndRestarts,
  type FailureEntry,
} from "../parsers/compilation_metrics_parser";
import { defaultParsers, exportParsers } from "../parsers/default_parsers";
import { errorMessage, runParser, type DispatchContext } from "../parsers/dispatch";
import type { ParserCallArgs, ParserEntry } from "../parsers/parser_interfaces";
import { withoutConvertFrameSuffix } from "../parsers/stack_format";
import {
  renderExportIndex,
  SymExprArena,
  symbolicGuardParser,
  type ExportFailure,
} from "../parsers/symbolic_guard_parser";
import { convertNodeMappingsToLineNumbers, provenanceSourcesFor } from "../provenance/node_mappings";
import { escapeHtml } from "../render/html";
import { renderIndexPage } from "../render/index_page";
import { compileStatus, StackTrie } from "../render/stack_trie";
import { LineCursor, payloadDigest, payloadMatchesDigest, readContinuationPayload } from "./continuation";
import { parseGlogLine, type GlogPrefix } from "./glog_line";
import { InternTable } from "./intern_table";
import { createParseStats, formatParseStats, recordParserFailure, strictFailureCount, type ParseStats } from "./parse_stats";
import { SideLog } from "./side_log";
import { TraceParseError } from "./trace_parse_error";

export type ParseResult = {
  /** Relative path → content, in emission order. */
  outputs: ParseOutputEntry[];
  stats: ParseStats;
  directory: CompileDirectory;
  unknownFields: string[];
};

const FAKE_KERNEL_HELP = "Register a fake (meta) implementation for this operator that matches the real kernel.";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * One interpreter pass over one rank's log. All state (intern table,
 * directory, indices, counters) lives for the duration of the pass.
 */
class LogPass {
  private readonly stats = createParseStats();
  private readonly strings = new InternTable();
  private readonly directory = new CompileDirectory();
  private readonly sink = new ArtifactSink();
  private readonly sideLog: SideLog;
  private readonly logger: ReportLogger;
  private readonly parsers: ParserEntry[];

  private readonly stacks = new CompileIdMap<StackSummary>();
  private readonly specializations = new CompileIdIndex<SymbolicShapeSpecializationMetadata>();
  private readonly fastGuards = new CompileIdIndex<GuardAddedFastMetadata>();
  private readonly arena = new SymExprArena();
  private readonly metricsIndex = new CompileIdIndex<CompilationMetricsMetadata>();
  private readonly stackTrie = new StackTrie();
  private readonly unknownStackTrie = new StackTrie();

  private readonly failures: FailureEntry[] = [];
  private readonly exportFailures: ExportFailure[] = [];
  private readonly chromiumEvents: unknown[] = [];
  private readonly unknownFields = new Set<string>();

  private expectedRank: number | null = null;

  constructor(private readonly config: ParseConfig) {
    this.logger = config.logger ?? getDefaultLogger();
    this.sideLog = new SideLog(this.stats, this.logger, new Date().getUTCFullYear());
    // Provenance line numbers are computed over the raw output code.
    const plainText = config.plainText || config.inductorProvenance;
    const builtIn = config.export ? exportParsers() : defaultParsers({ plainText });
    this.parsers = [...builtIn, ...config.customParsers];
  }

  run(text: string): ParseResult {
    const cursor = new LineCursor(text);
    let bytesRead = 0;
    for (let line = cursor.next(); line; line = cursor.next()) {
      bytesRead += Buffer.byteLength(line.text, "utf8");
      this.processLine(line.lineno, line.text, cursor);
      this.config.onProgress?.(bytesRead, this.stats);
    }
    return this.finish(text);
  }

  private processLine(lineno: number, text: string, cursor: LineCursor): void {
    const glog = parseGlogLine(text);
    if (!glog) {
      this.stats.fail_glog += 1;
      this.logger.debug({ lineno }, "parse.glog_mismatch");
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(glog.payload);
    } catch (error) {
      this.stats.fail_json += 1;
      this.logger.debug({ lineno, error: errorMessage(error) }, "parse.json_invalid");
      return;
    }
    if (!isRecord(raw)) {
      this.stats.fail_json += 1;
      this.logger.debug({ lineno }, "parse.json_not_object");
      return;
    }

    const parsed = EnvelopeSchema.safeParse(raw);
    if (!parsed.success) {
      this.stats.fail_json += 1;
      this.logger.debug({ lineno, issues: parsed.error.issues.length }, "parse.envelope_invalid");
      this.sideLog.write(glog.prefix, raw, null);
      return;
    }
    const envelope = parsed.data;

    for (const field of unknownEnvelopeFields(raw)) {
      this.stats.unknown += 1;
      this.unknownFields.add(field);
      if (this.config.verbose) this.logger.info({ field, lineno }, "parse.unknown_field");
    }

    if (envelope.str) {
      const [value, id] = envelope.str;
      this.strings.insert(id, value);
      return;
    }

    let payload = "";
    if (envelope.has_payload !== null && envelope.has_payload !== undefined) {
      payload = readContinuationPayload(cursor);
      if (!payloadMatchesDigest(payload, envelope.has_payload)) {
        this.stats.fail_payload_md5 += 1;
        this.logger.warn({ lineno, expected: envelope.has_payload }, "parse.payload_md5_mismatch");
      }
    }

    const rank = envelope.rank ?? null;
    if (this.expectedRank !== null) {
      if (rank !== this.expectedRank) {
        this.stats.other_rank += 1;
        this.sideLog.write(glog.prefix, raw, null);
        return;
      }
    } else if (rank !== null) {
      this.expectedRank = rank;
      this.logger.info({ rank }, "parse.rank_detected");
    }

    this.stats.ok += 1;
    this.acceptRecord(lineno, glog.prefix, raw, envelope, rank, payload);
  }

  private acceptRecord(
    lineno: number,
    prefix: GlogPrefix,
    raw: Record<string, unknown>,
    envelope: Envelope,
    rank: number | null,
    payload: string,
  ): void {
    const compileId: CompileId | null = envelope.compile_id
      ? normalizeCompileId(compileIdFromInput(envelope.compile_id))
      : null;
    const bucket = this.directory.bucket(compileId);
    const context: DispatchContext = { sink: this.sink, bucket, stats: this.stats, logger: this.logger };
    const args: ParserCallArgs = { lineno, rank, compileId, payload, strings: this.strings };

    let payloadFilename: string | null = null;
    for (const entry of this.parsers) {
      const result = runParser(entry, envelope, args, context);
      if (result.payloadFilename !== null) payloadFilename = result.payloadFilename;
    }

    const metrics = envelope.compilation_metrics;
    if (metrics) {
      this.metricsIndex.push(compileId, metrics);
      const entry = compilationMetricsParser(
        {
          stacks: this.stacks,
          specializations: this.specializations,
          fastGuards: this.fastGuards,
          outputFiles: [...bucket],
        },
        this.config.customHeaderHtml,
      );
      const result = runParser(entry, envelope, args, context);
      const page = result.files[result.files.length - 1];
      if (metrics.fail_type && !metrics.fail_reason) {
        this.logger.warn({ lineno }, "parse.fail_reason_missing");
      }
      this.failures.push(...failuresFromMetrics(metrics, compileId, page ? page.url : null));
    }

    if (this.config.export) {
      const guard = envelope.guard_added;
      if (guard && guard.prefix !== "eval") {
        this.sideLog.write(prefix, raw, null);
        return;
      }
      this.collectExportFailures(envelope, args, context);
    }

    if (envelope.stack) {
      this.unknownStackTrie.insert(envelope.stack, null);
    }

    if (envelope.chromium_event) {
      try {
        this.chromiumEvents.push(JSON.parse(payload));
      } catch (error) {
        recordParserFailure(this.stats, "chromium_event");
        this.logger.warn({ lineno, error: errorMessage(error) }, "parse.chromium_event_invalid");
      }
    }

    if (envelope.symbolic_shape_specialization) {
      this.specializations.push(compileId, envelope.symbolic_shape_specialization);
    }
    if (envelope.guard_added_fast) {
      this.fastGuards.push(compileId, envelope.guard_added_fast);
    }
    const startStack = envelope.dynamo_start?.stack;
    if (startStack) {
      const stack = withoutConvertFrameSuffix(startStack, this.strings);
      this.stacks.set(compileId, stack);
      this.stackTrie.insert(stack, compileId);
    }

    if (envelope.chromium_event) return;

    if (payloadFilename === null && payload !== "" && envelope.has_payload) {
      payloadFilename = `payloads/${payloadDigest(payload).toString("hex")}.txt`;
      this.sink.push(payloadFilename, payload);
    }
    this.sideLog.write(prefix, raw, payloadFilename);
  }

  private collectExportFailures(envelope: Envelope, args: ParserCallArgs, context: DispatchContext): void {
    const guardPage = (failureType: string, reason: string) => {
      const result = runParser(symbolicGuardParser(this.arena), envelope, args, context);
      const page = result.files[result.files.length - 1];
      const additionalInfo = page
        ? `See <a href="${escapeHtml(page.url)}">symbolic guard information</a>.`
        : "";
      this.exportFailures.push({ failureType, reason, additionalInfo });
    };

    const guard = envelope.guard_added;
    if (guard) {
      guardPage(
        "Guard Evaluated",
        `Export evaluated the guard <code>${escapeHtml(guard.expr ?? "")}</code>, which may cause a constraint violation.`,
      );
    }
    const provenance = envelope.propagate_real_tensors_provenance;
    if (provenance) {
      guardPage(
        "Data Dependent Error",
        `Export could not decide whether <code>${escapeHtml(provenance.expr ?? "")}</code> always holds; it was specialized to <code>${escapeHtml(provenance.result ?? "")}</code> and asserts were added to the graph.`,
      );
    }
    const missing = envelope.missing_fake_kernel;
    if (missing) {
      this.exportFailures.push({
        failureType: "Missing Fake Kernel",
        reason: `<code>torch.ops.${escapeHtml(missing.op ?? "")}</code> has no fake kernel implementation.`,
        additionalInfo: FAKE_KERNEL_HELP,
      });
    }
    const mismatched = envelope.mismatched_fake_kernel;
    if (mismatched) {
      this.exportFailures.push({
        failureType: "Mismatched Fake Kernel",
        reason: `<code>torch.ops.${escapeHtml(mismatched.op ?? "")}</code> has a fake kernel that disagrees with the real kernel: ${escapeHtml(mismatched.reason ?? "")}`,
        additionalInfo: FAKE_KERNEL_HELP,
      });
    }
    if (envelope.expression_created) this.arena.addExpression(envelope.expression_created);
    if (envelope.create_unbacked_symbol) this.arena.addUnbackedSymbol(envelope.create_unbacked_symbol);
  }

  private finish(text: string): ParseResult {
    const outputs = this.sink.outputs;
    const unknownFields = Array.from(this.unknownFields).sort();
    const result: ParseResult = { outputs, stats: this.stats, directory: this.directory, unknownFields };

    this.logger.info({ stats: formatParseStats(this.stats) }, "parse.completed");
    if (unknownFields.length > 0) {
      this.logger.warn({ fields: unknownFields }, "parse.unknown_fields");
    }

    if (this.config.export) {
      const program = this.directory.allFiles().find((file) => file.url.includes("exported_program"));
      outputs.push({
        path: "index.html",
        content: renderExportIndex(this.exportFailures, {
          exportedProgramUrl: program ? program.url : null,
          customHeaderHtml: this.config.customHeaderHtml,
        }),
      });
      return result;
    }

    outputs.push({
      path: "failures_and_restarts.html",
      content: renderFailuresAndRestarts(this.failures, this.config.customHeaderHtml),
    });
    outputs.push({ path: "chromium_events.json", content: JSON.stringify(this.chromiumEvents, null, 2) });
    outputs.push({ path: "compile_directory.json", content: JSON.stringify(this.directory.toJSON(), null, 2) });

    const directoryNames = this.directory
      .entries()
      .flatMap(({ compileId }) => (compileId === null ? [] : [compileIdDirectoryName(compileId)]));
    const provenancePages = this.config.inductorProvenance
      ? directoryNames.map((name) => `provenance_tracking_${name}.json`)
      : [];

    const renderTrie = (trie: StackTrie): string | null =>
      trie.isEmpty
        ? null
        : trie.render({
            caption: "Stack",
            strings: this.strings,
            statusOf: (compileId) => compileStatus(this.metricsIndex.peek(compileId)),
          });

    outputs.push({
      path: "index.html",
      content: renderIndexPage(this.directory, {
        customHeaderHtml: this.config.customHeaderHtml,
        failureCount: this.failures.length,
        hasChromiumEvents: this.chromiumEvents.length > 0,
        provenancePages,
        stackTrieHtml: renderTrie(this.stackTrie),
        unknownStackTrieHtml: renderTrie(this.unknownStackTrie),
      }),
    });
    outputs.push({ path: "raw.log", content: text });
    outputs.push({ path: "raw.jsonl", content: this.sideLog.render(this.strings) });

    if (this.config.strict && strictFailureCount(this.stats) > 0) {
      throw new TraceParseError({
        code: "strict_failures",
        message: `Strict mode: ${formatParseStats(this.stats)}`,
        stats: this.stats,
      });
    }
    if (this.config.strictCompileId && this.directory.hasUnknown()) {
      throw new TraceParseError({
        code: "unknown_compile_id",
        message: "Some log entries did not have a compile id",
        stats: this.stats,
      });
    }

    if (this.config.inductorProvenance) {
      // Snapshot: the lookups must not see provenance files added below.
      const emitted = [...outputs];
      directoryNames.forEach((name, i) => {
        const mappings = convertNodeMappingsToLineNumbers(provenanceSourcesFor(emitted, name));
        outputs.push({ path: provenancePages[i], content: JSON.stringify(mappings, null, 2) });
      });
    }

    return result;
  }
}

/** Interprets log text already in memory. `raw.log` gets `text` verbatim. */
export function parseLogText(text: string, config: ParseConfig = defaultParseConfig()): ParseResult {
  return new LogPass(config).run(text);
}

export function parseLog(path: string, config: ParseConfig = defaultParseConfig()): ParseResult {
  if (!existsSync(path) || !statSync(path).isFile()) {
    throw new TraceParseError({ code: "input_not_file", message: `${path} is not a file`, path });
  }
  return parseLogText(readFileSync(path, "utf8"), config);
}
