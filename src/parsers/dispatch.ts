import type { Envelope } from "../contracts/envelope";
import { addUniqueSuffix, type ArtifactSink, type OutputFile } from "../directory/compile_directory";
import { recordParserFailure, type ParseStats } from "../ingest/parse_stats";
import type { ReportLogger } from "../logging/logger";
import type { ParserCallArgs, ParserEntry, ParserResults } from "./parser_interfaces";

export type DispatchContext = {
  sink: ArtifactSink;
  bucket: OutputFile[];
  stats: ParseStats;
  logger: ReportLogger;
};

export type DispatchResult = {
  /** Set when the parser wrote the payload (raw or reformatted). */
  payloadFilename: string | null;
  files: OutputFile[];
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs one parser against one record and files its outputs. A throwing
 * handler or formatter is counted and logged; the pass carries on.
 */
export function runParser(
  entry: ParserEntry,
  envelope: Envelope,
  args: ParserCallArgs,
  context: DispatchContext,
): DispatchResult {
  const result: DispatchResult = { payloadFilename: null, files: [] };
  const bound = entry.bind(envelope);
  if (!bound) return result;

  let outputs: ParserResults;
  try {
    outputs = bound(args);
  } catch (error) {
    recordParserFailure(context.stats, entry.name);
    context.logger.warn(
      { parser: entry.name, lineno: args.lineno, error: errorMessage(error) },
      "parse.parser_failed",
    );
    return result;
  }

  const { sink, bucket } = context;
  for (const output of outputs) {
    switch (output.kind) {
      case "file":
        result.files.push(sink.addUniqueFile(bucket, output.path, output.content));
        break;
      case "global_file":
        result.files.push(sink.addFile(bucket, output.path, output.content));
        break;
      case "payload_file": {
        const file = sink.addUniqueFile(bucket, output.path, args.payload);
        result.files.push(file);
        result.payloadFilename = file.url;
        break;
      }
      case "payload_reformat_file": {
        const path = addUniqueSuffix(output.path, sink.nextSequence);
        let content: string;
        try {
          content = output.format(args.payload);
        } catch (error) {
          recordParserFailure(context.stats, entry.name);
          context.logger.warn(
            { parser: entry.name, path, lineno: args.lineno, error: errorMessage(error) },
            "parse.format_failed",
          );
          break;
        }
        const file = sink.addFile(bucket, path, content);
        result.files.push(file);
        result.payloadFilename = file.url;
        break;
      }
      case "link":
        result.files.push(sink.addLink(bucket, output.name, output.url));
        break;
    }
  }
  return result;
}
