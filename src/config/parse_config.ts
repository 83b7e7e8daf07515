import { config as loadEnv } from "dotenv";

import type { ParseStats } from "../ingest/parse_stats";
import type { ReportLogger } from "../logging/logger";
import type { ParserEntry } from "../parsers/parser_interfaces";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

export type ProgressCallback = (bytesRead: number, stats: Readonly<ParseStats>) => void;

export type ParseConfig = {
  strict: boolean;
  strictCompileId: boolean;
  verbose: boolean;
  plainText: boolean;
  export: boolean;
  inductorProvenance: boolean;
  customHeaderHtml: string;
  /** Run after the built-in parsers, in order. */
  customParsers: ParserEntry[];
  logger?: ReportLogger;
  onProgress?: ProgressCallback;
};

export function defaultParseConfig(): ParseConfig {
  return {
    strict: false,
    strictCompileId: false,
    verbose: false,
    plainText: false,
    export: false,
    inductorProvenance: false,
    customHeaderHtml: "",
    customParsers: [],
  };
}

const TRUTHY = new Set(["1", "true", "yes", "on"]);

export function envFlag(value: string | undefined): boolean {
  return value !== undefined && TRUTHY.has(value.trim().toLowerCase());
}

type EnvSource = Record<string, string | undefined>;

/** Defaults from TRACE_REPORT_* variables; CLI flags are applied on top. */
export function loadParseConfigFromEnv(env: EnvSource = process.env): ParseConfig {
  return {
    ...defaultParseConfig(),
    strict: envFlag(env.TRACE_REPORT_STRICT),
    strictCompileId: envFlag(env.TRACE_REPORT_STRICT_COMPILE_ID),
    verbose: envFlag(env.TRACE_REPORT_VERBOSE),
    plainText: envFlag(env.TRACE_REPORT_PLAIN_TEXT),
  };
}
