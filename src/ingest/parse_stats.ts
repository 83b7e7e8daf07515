export type ParseStats = {
  ok: number;
  other_rank: number;
  fail_glog: number;
  fail_json: number;
  fail_payload_md5: number;
  fail_dynamo_guards_json: number;
  fail_parser: number;
  fail_key_conflict: number;
  fail_json_serialization: number;
  unknown: number;
  // Per parser name; counts every failure attributed to that parser.
  parser_failures: Record<string, number>;
};

export function createParseStats(): ParseStats {
  return {
    ok: 0,
    other_rank: 0,
    fail_glog: 0,
    fail_json: 0,
    fail_payload_md5: 0,
    fail_dynamo_guards_json: 0,
    fail_parser: 0,
    fail_key_conflict: 0,
    fail_json_serialization: 0,
    unknown: 0,
    parser_failures: {},
  };
}

export function recordParserFailure(stats: ParseStats, parserName: string): void {
  if (parserName === "dynamo_guards") {
    stats.fail_dynamo_guards_json += 1;
  } else {
    stats.fail_parser += 1;
  }
  stats.parser_failures[parserName] = (stats.parser_failures[parserName] ?? 0) + 1;
}

/**
 * Failures that make a strict pass fail. Records from another rank count:
 * a correctly configured run logs one rank per file.
 */
export function strictFailureCount(stats: ParseStats): number {
  return (
    stats.fail_glog +
    stats.fail_json +
    stats.fail_payload_md5 +
    stats.other_rank +
    stats.fail_dynamo_guards_json +
    stats.fail_parser
  );
}

export function formatParseStats(stats: ParseStats): string {
  const parts = [
    `ok: ${stats.ok}`,
    `other_rank: ${stats.other_rank}`,
    `fail_glog: ${stats.fail_glog}`,
    `fail_json: ${stats.fail_json}`,
    `fail_payload_md5: ${stats.fail_payload_md5}`,
    `fail_dynamo_guards_json: ${stats.fail_dynamo_guards_json}`,
    `fail_parser: ${stats.fail_parser}`,
    `fail_key_conflict: ${stats.fail_key_conflict}`,
    `fail_json_serialization: ${stats.fail_json_serialization}`,
    `unknown: ${stats.unknown}`,
  ];
  return `Stats { ${parts.join(", ")} }`;
}
