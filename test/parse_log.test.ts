import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, it, expect, afterAll } from "vitest";

import { defaultParseConfig, type ParseConfig } from "../src/config/parse_config";
import type { Envelope } from "../src/contracts/envelope";
import { parseLog, parseLogText, type ParseResult } from "../src/ingest/parse_log";
import { TraceParseError } from "../src/ingest/trace_parse_error";
import { defineParser } from "../src/parsers/parser_interfaces";
import { FRAME_0_0, glogLine, md5Hex, payloadLines, recordingLogger } from "./support/log_lines";

const quietConfig = (overrides: Partial<ParseConfig> = {}): ParseConfig => ({
  ...defaultParseConfig(),
  logger: recordingLogger(),
  ...overrides,
});

const parse = (lines: string[], overrides: Partial<ParseConfig> = {}): ParseResult =>
  parseLogText(lines.join("\n"), quietConfig(overrides));

const output = (result: ParseResult, path: string): string | undefined =>
  result.outputs.find((entry) => entry.path === path)?.content;

const sideLogRecords = (result: ParseResult): Array<Record<string, unknown>> =>
  (output(result, "raw.jsonl") ?? "")
    .split("\n")
    .filter((line) => line !== "")
    .map((line) => JSON.parse(line));

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("parseLogText", () => {
  it("writes a verified payload and still accepts a following record without one", () => {
    const result = parse([
      ...payloadLines({ dynamo_output_graph: {}, compile_id: FRAME_0_0 }, "graph():\n    return x"),
      glogLine({ compile_id: FRAME_0_0 }),
    ]);

    expect(result.stats.ok).toBe(2);
    expect(result.stats.fail_payload_md5).toBe(0);
    expect(output(result, "-_0_0_0/dynamo_output_graph_0.txt")).toBe("graph():\n    return x");
    expect(result.outputs.filter((entry) => entry.path.startsWith("-_0_0_0/"))).toHaveLength(1);
  });

  it("emits the report files in a fixed order", () => {
    const result = parse([glogLine({ compile_id: FRAME_0_0 })]);
    expect(result.outputs.map((entry) => entry.path)).toEqual([
      "failures_and_restarts.html",
      "chromium_events.json",
      "compile_directory.json",
      "index.html",
      "raw.log",
      "raw.jsonl",
    ]);
  });

  it("counts a bad line without disturbing the next one", () => {
    const result = parse(["this is not glog", glogLine({ compile_id: FRAME_0_0 })]);
    expect(result.stats.fail_glog).toBe(1);
    expect(result.stats.ok).toBe(1);
  });

  it("counts invalid JSON once and keeps it out of the side log", () => {
    const result = parse([
      "V1018 12:34:56.000123 1 a.py:1] {not json",
      "V1018 12:34:56.000123 1 a.py:1] [1, 2]",
    ]);
    expect(result.stats.fail_json).toBe(2);
    expect(sideLogRecords(result)).toEqual([{ string_table: [null] }]);
  });

  it("flags a payload whose digest does not match but keeps the record", () => {
    const result = parse([
      glogLine({ dynamo_output_graph: {}, compile_id: FRAME_0_0, has_payload: md5Hex("other") }),
      "\tactual",
    ]);
    expect(result.stats.fail_payload_md5).toBe(1);
    expect(result.stats.ok).toBe(1);
    expect(output(result, "-_0_0_0/dynamo_output_graph_0.txt")).toBe("actual");
  });

  it("sticks to the first rank seen and side-logs the others", () => {
    const result = parse([
      glogLine({ rank: 0, compile_id: FRAME_0_0 }),
      glogLine({ rank: 1, compile_id: FRAME_0_0 }),
      glogLine({ compile_id: FRAME_0_0 }),
      glogLine({ rank: 0, compile_id: FRAME_0_0 }),
    ]);
    expect(result.stats.ok).toBe(2);
    expect(result.stats.other_rank).toBe(2);
    expect(sideLogRecords(result)).toHaveLength(5);
  });

  it("interns strings and resolves stack frames through them", () => {
    const result = parse([
      glogLine({ str: ["/src/train.py", 2] }),
      glogLine({ dynamo_start: { stack: [{ filename: 2, line: 30, name: "step" }] }, compile_id: FRAME_0_0 }),
      glogLine({ compilation_metrics: { co_name: "step" }, compile_id: FRAME_0_0 }),
    ]);

    expect(result.stats.ok).toBe(2);
    expect(sideLogRecords(result)[0]).toEqual({ string_table: [null, null, "/src/train.py"] });
    expect(output(result, "-_0_0_0/compilation_metrics_0.html")).toContain("<li>/src/train.py:30 in step</li>");
  });

  it("files every matching handler's output and merges ids that differ only by a missing attempt", () => {
    const result = parse([
      ...payloadLines(
        { graph_dump: { name: "g" }, dynamo_output_graph: {}, compile_id: { frame_id: 0, frame_compile_id: 1 } },
        "graph",
      ),
      glogLine({ link: { name: "l", url: "https://example.test/l" }, compile_id: { frame_id: 0, frame_compile_id: 1, attempt: 0 } }),
    ]);

    expect(output(result, "-_0_1_0/g_0.txt")).toBe("graph");
    expect(output(result, "-_0_1_0/dynamo_output_graph_1.txt")).toBe("graph");
    expect(JSON.parse(output(result, "compile_directory.json") ?? "")).toEqual({
      "[0/1]": {
        artifacts: [
          { url: "-_0_1_0/g_0.txt", name: "g_0.txt", number: 0, suffix: "", readable_url: null },
          {
            url: "-_0_1_0/dynamo_output_graph_1.txt",
            name: "dynamo_output_graph_1.txt",
            number: 1,
            suffix: "",
            readable_url: null,
          },
          { url: "https://example.test/l", name: "l", number: 2, suffix: "", readable_url: null },
        ],
      },
    });
  });

  it("renders compile start stacks and free-standing stacks as tries on the index page", () => {
    const result = parse([
      glogLine({ str: ["/src/train.py", 1] }),
      glogLine({
        dynamo_start: {
          stack: [
            { filename: 1, line: 3, name: "main" },
            { filename: 1, line: 7, name: "step" },
            { filename: 0, uninterned_filename: "/venv/site-packages/torch/_dynamo/convert_frame.py", line: 1, name: "__call__" },
            { filename: 0, uninterned_filename: "/venv/site-packages/torch/_dynamo/convert_frame.py", line: 2, name: "__call__" },
            { filename: 0, uninterned_filename: "/venv/site-packages/torch/_dynamo/convert_frame.py", line: 3, name: "__call__" },
          ],
        },
        compile_id: FRAME_0_0,
      }),
      glogLine({ compilation_metrics: { graph_op_count: 4 }, compile_id: FRAME_0_0 }),
      glogLine({ stack: [{ filename: 1, line: 3, name: "main" }], describe_tensor: {} }),
    ]);

    const index = output(result, "index.html") ?? "";
    expect(index).toContain(
      [
        "<h3>Stack trie</h3>",
        "<details><summary>Stack</summary>",
        "<ul>",
        "<li>/src/train.py:3 in main</li>",
        '<li><a href="#-_0_0_0" class="status-ok">[0/0]</a> /src/train.py:7 in step</li>',
        "</ul>",
        "</details>",
      ].join("\n"),
    );
    expect(index).toContain("<h3>Unknown stacks</h3>");
    expect(index).toContain("<li>(unknown) /src/train.py:3 in main</li>");
    expect(index).toContain('<li id="-_0_0_0"><b>[0/0]</b>');
    expect(index).not.toContain("convert_frame.py");
  });

  it("leaves the stack tries off the index page when no record carried a stack", () => {
    const index = output(parse([glogLine({ compile_id: FRAME_0_0 })]), "index.html") ?? "";
    expect(index).not.toContain("<h3>Stack trie</h3>");
    expect(index).not.toContain("<h3>Unknown stacks</h3>");
  });

  it("adds the glog fields to each side log record", () => {
    const result = parse([glogLine({ compile_id: FRAME_0_0 }, { line: 77, thread: 9 })]);
    const [, record] = sideLogRecords(result);
    expect(record).toEqual({
      compile_id: FRAME_0_0,
      timestamp: `${new Date().getUTCFullYear()}-10-18T12:34:56.000123Z`,
      thread: 9,
      pathname: "torch/_dynamo/convert_frame.py",
      lineno: 77,
    });
  });

  it("drops a side log record that already has a glog field", () => {
    const result = parse([glogLine({ compile_id: FRAME_0_0, thread: "main" })]);
    expect(result.stats.fail_key_conflict).toBe(1);
    expect(result.stats.unknown).toBe(1);
    expect(result.unknownFields).toEqual(["thread"]);
    expect(sideLogRecords(result)).toHaveLength(1);
  });

  it("stores payloads no parser claimed under their digest", () => {
    const digest = md5Hex("tensor meta");
    const result = parse(payloadLines({ describe_tensor: {}, compile_id: FRAME_0_0 }, "tensor meta"));
    expect(output(result, `payloads/${digest}.txt`)).toBe("tensor meta");
    expect(sideLogRecords(result)[1].payload_filename).toBe(`payloads/${digest}.txt`);
  });

  it("collects chromium events without side-logging them", () => {
    const event = { name: "dynamo", ph: "B", ts: 1 };
    const result = parse([
      ...payloadLines({ chromium_event: {} }, JSON.stringify(event)),
      ...payloadLines({ chromium_event: {} }, "{broken"),
    ]);
    expect(JSON.parse(output(result, "chromium_events.json") ?? "")).toEqual([event]);
    expect(result.stats.parser_failures).toEqual({ chromium_event: 1 });
    expect(sideLogRecords(result)).toHaveLength(1);
  });

  it("lists compilation failures and restarts", () => {
    const result = parse([
      glogLine({
        compile_id: FRAME_0_0,
        compilation_metrics: {
          fail_type: "Unsupported",
          fail_reason: "bad op",
          fail_user_frame_filename: "m.py",
          fail_user_frame_lineno: 3,
          restart_reasons: ["graph break"],
        },
      }),
    ]);

    const page = output(result, "failures_and_restarts.html");
    expect(page).toContain(
      '<tr><td><a href="-_0_0_0/compilation_metrics_0.html">[0/0]</a></td><td>RestartAnalysis: graph break</td></tr>',
    );
    expect(page).toContain(
      '<tr><td><a href="-_0_0_0/compilation_metrics_0.html">[0/0]</a></td><td>Unsupported: bad op (m.py:3)</td></tr>',
    );
    expect(output(result, "index.html")).toContain("2 failure(s) or restart(s).");
  });

  it("runs custom parsers after the built-in ones", () => {
    const custom = defineParser({
      name: "shape_notes",
      getMetadata: (envelope: Envelope) => envelope.describe_tensor ?? undefined,
      parse: ({ lineno, compileId }) => [
        { kind: "file", path: `${compileId ? "frame" : "none"}/notes_${lineno}.txt`, content: "seen" },
      ],
    });
    const result = parse([glogLine({ describe_tensor: {}, compile_id: FRAME_0_0 })], { customParsers: [custom] });
    expect(output(result, "frame/notes_1_0.txt")).toBe("seen");
  });

  it("fails a strict pass that saw bad lines, after building outputs", () => {
    const err = thrownBy(() => parse(["garbage", glogLine({ compile_id: FRAME_0_0 })], { strict: true }));
    expect(err).toBeInstanceOf(TraceParseError);
    expect(err instanceof TraceParseError ? err.code : null).toBe("strict_failures");
  });

  it("fails a strict compile id pass when a record had no compile id", () => {
    const err = thrownBy(() => parse([glogLine({ describe_tensor: {} })], { strictCompileId: true }));
    expect(err instanceof TraceParseError ? err.code : null).toBe("unknown_compile_id");
    expect(() => parse([glogLine({ compile_id: FRAME_0_0 })], { strictCompileId: true })).not.toThrow();
  });

  it("writes only an export summary in export mode", () => {
    const result = parse(
      [
        ...payloadLines({ exported_program: {}, compile_id: FRAME_0_0 }, "ExportedProgram"),
        glogLine({ missing_fake_kernel: { op: "mylib.custom" } }),
      ],
      { export: true },
    );
    expect(result.outputs.map((entry) => entry.path)).toEqual(["-_0_0_0/exported_program_0.txt", "index.html"]);
    const index = output(result, "index.html") ?? "";
    expect(index).toContain("<code>torch.ops.mylib.custom</code> has no fake kernel implementation.");
    expect(index).toContain('<a href="-_0_0_0/exported_program_0.txt">Exported program</a>');
  });

  it("writes provenance mappings per compile id on request", () => {
    const result = parse([glogLine({ compile_id: FRAME_0_0 })], { inductorProvenance: true });
    const result2 = parse(
      [
        ...payloadLines({ inductor_pre_grad_graph: {}, compile_id: FRAME_0_0 }, "x = placeholder()\ny = relu(x)"),
        ...payloadLines({ inductor_post_grad_graph: {}, compile_id: FRAME_0_0 }, "x = placeholder()\nz = relu(x)"),
        ...payloadLines(
          { artifact: { name: "inductor_provenance_tracking_node_mappings", encoding: "json" }, compile_id: FRAME_0_0 },
          JSON.stringify({ preToPost: { y: ["z"] } }),
        ),
      ],
      { inductorProvenance: true },
    );
    const mappings = JSON.parse(output(result2, "provenance_tracking_-_0_0_0.json") ?? "");
    expect(mappings.preToPost).toEqual({ "2": [2] });
    expect(output(result, "provenance_tracking_-_0_0_0.json")).toBe("{}");
  });
});

describe("parseLog", () => {
  const dir = mkdtempSync(join(tmpdir(), "parse-log-"));

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads the log from disk and keeps it verbatim", () => {
    const path = join(dir, "trace.log");
    const text = `${glogLine({ compile_id: FRAME_0_0 })}\n`;
    writeFileSync(path, text);
    const result = parseLog(path, quietConfig());
    expect(output(result, "raw.log")).toBe(text);
  });

  it("rejects a path that is not a file", () => {
    const err = thrownBy(() => parseLog(dir, quietConfig()));
    expect(err instanceof TraceParseError ? err.code : null).toBe("input_not_file");
  });
});
