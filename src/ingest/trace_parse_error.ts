import type { ParseStats } from "./parse_stats";

export type TraceParseErrorCode =
  | "input_not_file"
  | "strict_failures"
  | "unknown_compile_id"
  | "not_a_directory"
  | "no_rank_logs"
  | "no_log_files"
  | "output_exists"
  | "artifact_invalid";

export interface TraceParseErrorDetails {
  code: TraceParseErrorCode;
  message: string;
  path?: string;
  stats?: ParseStats;
}

export class TraceParseError extends Error {
  public readonly code: TraceParseErrorCode;
  public readonly details: TraceParseErrorDetails;

  constructor(details: TraceParseErrorDetails) {
    super(details.message);
    this.name = "TraceParseError";
    this.code = details.code;
    this.details = details;
  }

  toJSON() {
    return {
      error: "trace_parse_failed",
      code: this.code,
      message: this.message,
      details: {
        path: this.details.path,
        stats: this.details.stats,
      },
    };
  }
}
