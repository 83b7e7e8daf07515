import { describe, it, expect } from "vitest";

import { formatGlogTimestamp, parseGlogLine } from "../src/ingest/glog_line";

describe("parseGlogLine", () => {
  it("splits the prefix from the JSON payload", () => {
    const parsed = parseGlogLine('V0102 03:04:05.000006 77 a/b.py:12] {"x":1}');
    expect(parsed).toEqual({
      prefix: {
        level: "V",
        month: 1,
        day: 2,
        hour: 3,
        minute: 4,
        second: 5,
        microsecond: 6,
        thread: 77,
        pathname: "a/b.py",
        line: 12,
      },
      payload: '{"x":1}',
    });
  });

  it("tolerates a launcher prefix before the glog header", () => {
    const parsed = parseGlogLine('[rank3]:I1231 23:59:59.999999 5 x.py:1] {"rank":3}');
    expect(parsed?.prefix.level).toBe("I");
    expect(parsed?.payload).toBe('{"rank":3}');
  });

  it("keeps everything after the header, including further brackets", () => {
    const parsed = parseGlogLine("W0101 00:00:00.000000 1 y.py:9] [not json] tail");
    expect(parsed?.payload).toBe("[not json] tail");
  });

  it("returns null for lines without a glog header", () => {
    expect(parseGlogLine("plain text")).toBeNull();
    expect(parseGlogLine("V0102 03:04:05 77 a/b.py:12] {}")).toBeNull();
  });
});

describe("formatGlogTimestamp", () => {
  it("renders an ISO timestamp with microseconds for the given year", () => {
    const parsed = parseGlogLine("V0102 03:04:05.000006 77 a/b.py:12] {}");
    expect(parsed).not.toBeNull();
    if (!parsed) return;
    expect(formatGlogTimestamp(parsed.prefix, 2024)).toBe("2024-01-02T03:04:05.000006Z");
  });
});
