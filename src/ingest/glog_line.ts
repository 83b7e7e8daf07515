// Not anchored: launchers prefix lines with things like "[rank0]:".
const GLOG_LINE_PATTERN =
  /(?<level>[VIWEC])(?<month>\d{2})(?<day>\d{2}) (?<hour>\d{2}):(?<minute>\d{2}):(?<second>\d{2})\.(?<micros>\d{6}) (?<thread>\d+)\s+(?<pathname>[^:]+):(?<line>\d+)\] (?<payload>.)/;

export type GlogLevel = "V" | "I" | "W" | "E" | "C";

export type GlogPrefix = {
  level: GlogLevel;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  microsecond: number;
  thread: number;
  pathname: string;
  line: number;
};

export type GlogLine = {
  prefix: GlogPrefix;
  /** Everything from the first payload character to the end of the line. */
  payload: string;
};

const isLevel = (value: string): value is GlogLevel =>
  value === "V" || value === "I" || value === "W" || value === "E" || value === "C";

export function parseGlogLine(line: string): GlogLine | null {
  const match = GLOG_LINE_PATTERN.exec(line);
  const groups = match?.groups;
  if (!match || !groups) return null;

  const level = groups.level;
  if (!isLevel(level)) return null;

  // The payload group captures one character; the payload runs to end of line.
  const payloadStart = match.index + match[0].length - 1;

  return {
    prefix: {
      level,
      month: Number(groups.month),
      day: Number(groups.day),
      hour: Number(groups.hour),
      minute: Number(groups.minute),
      second: Number(groups.second),
      microsecond: Number(groups.micros),
      thread: Number(groups.thread),
      pathname: groups.pathname,
      line: Number(groups.line),
    },
    payload: line.slice(payloadStart),
  };
}

const pad = (value: number, width: number) => String(value).padStart(width, "0");

/**
 * ISO-8601 with microseconds. Log lines carry no year, so the caller supplies
 * one (normally the current UTC year).
 */
export function formatGlogTimestamp(prefix: GlogPrefix, year: number): string {
  return (
    `${pad(year, 4)}-${pad(prefix.month, 2)}-${pad(prefix.day, 2)}` +
    `T${pad(prefix.hour, 2)}:${pad(prefix.minute, 2)}:${pad(prefix.second, 2)}` +
    `.${pad(prefix.microsecond, 6)}Z`
  );
}
