import type { ReportLogger } from "../logging/logger";
import { formatGlogTimestamp, type GlogPrefix } from "./glog_line";
import type { InternTable } from "./intern_table";
import type { ParseStats } from "./parse_stats";

const hasOwn = (record: Record<string, unknown>, key: string): boolean =>
  Object.prototype.hasOwnProperty.call(record, key);

/**
 * Builds `raw.jsonl`: each record re-serialized with its glog prefix fields
 * added. A record that already carries one of those fields is dropped.
 */
export class SideLog {
  private readonly lines: string[] = [];

  constructor(
    private readonly stats: ParseStats,
    private readonly logger: ReportLogger,
    private readonly year: number,
  ) {}

  write(prefix: GlogPrefix, record: Record<string, unknown>, payloadFilename: string | null): boolean {
    const additions: Array<[string, unknown]> = [
      ["timestamp", formatGlogTimestamp(prefix, this.year)],
      ["thread", prefix.thread],
      ["pathname", prefix.pathname],
      ["lineno", prefix.line],
    ];
    if (payloadFilename !== null) additions.push(["payload_filename", payloadFilename]);

    const augmented: Record<string, unknown> = { ...record };
    for (const [key, value] of additions) {
      if (hasOwn(record, key)) {
        this.stats.fail_key_conflict += 1;
        this.logger.warn({ key, lineno: prefix.line }, "side_log.key_conflict");
        return false;
      }
      augmented[key] = value;
    }

    try {
      this.lines.push(JSON.stringify(augmented));
    } catch (error) {
      this.stats.fail_json_serialization += 1;
      this.logger.warn(
        { error: error instanceof Error ? error.message : String(error) },
        "side_log.serialize_failed",
      );
      return false;
    }
    return true;
  }

  /** String table line first, then one line per kept record. */
  render(strings: InternTable): string {
    const header = JSON.stringify({ string_table: strings.toStringTable() });
    return [header, ...this.lines].map((line) => `${line}\n`).join("");
  }
}
