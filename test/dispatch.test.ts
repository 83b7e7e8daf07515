import { describe, it, expect } from "vitest";

import { EnvelopeSchema, type Envelope } from "../src/contracts/envelope";
import { ArtifactSink, CompileDirectory } from "../src/directory/compile_directory";
import { InternTable } from "../src/ingest/intern_table";
import { createParseStats } from "../src/ingest/parse_stats";
import { runParser, type DispatchContext } from "../src/parsers/dispatch";
import { dynamoGuardsParser } from "../src/parsers/default_parsers";
import { defineParser, type ParserCallArgs } from "../src/parsers/parser_interfaces";
import { recordingLogger } from "./support/log_lines";

const FRAME_0 = { frameId: 0, frameCompileId: 0, attempt: 0, compiledAutogradId: null };

function setup() {
  const logger = recordingLogger();
  const context: DispatchContext = {
    sink: new ArtifactSink(),
    bucket: new CompileDirectory().bucket(FRAME_0),
    stats: createParseStats(),
    logger,
  };
  return { context, logger };
}

const callArgs = (payload: string): ParserCallArgs => ({
  lineno: 5,
  rank: null,
  compileId: FRAME_0,
  payload,
  strings: new InternTable(),
});

const linkRecord = EnvelopeSchema.parse({ link: { name: "docs", url: "https://example.test" } });

describe("runParser", () => {
  it("skips parsers whose field is absent", () => {
    const { context } = setup();
    const result = runParser(dynamoGuardsParser, linkRecord, callArgs(""), context);
    expect(result).toEqual({ payloadFilename: null, files: [] });
    expect(context.sink.outputs).toEqual([]);
  });

  it("files every output a parser returns, in order", () => {
    const { context } = setup();
    const multi = defineParser({
      name: "multi",
      getMetadata: (envelope: Envelope) => envelope.link ?? undefined,
      parse: ({ metadata }) => [
        { kind: "file", path: "-_0_0_0/a.txt", content: metadata.name },
        { kind: "payload_file", path: "-_0_0_0/payload.txt" },
        { kind: "payload_reformat_file", path: "-_0_0_0/upper.txt", format: (p) => p.toUpperCase() },
        { kind: "global_file", path: "shared/b.txt", content: "b" },
        { kind: "link", name: metadata.name, url: metadata.url },
      ],
    });

    const result = runParser(multi, linkRecord, callArgs("body"), context);

    expect(context.sink.outputs).toEqual([
      { path: "-_0_0_0/a_0.txt", content: "docs" },
      { path: "-_0_0_0/payload_1.txt", content: "body" },
      { path: "-_0_0_0/upper_2.txt", content: "BODY" },
      { path: "shared/b.txt", content: "b" },
    ]);
    expect(result.payloadFilename).toBe("-_0_0_0/upper_2.txt");
    expect(result.files.map((file) => file.url)).toEqual([
      "-_0_0_0/a_0.txt",
      "-_0_0_0/payload_1.txt",
      "-_0_0_0/upper_2.txt",
      "shared/b.txt",
      "https://example.test",
    ]);
  });

  it("counts a throwing parser and keeps going", () => {
    const { context, logger } = setup();
    const broken = defineParser({
      name: "broken",
      getMetadata: (envelope: Envelope) => envelope.link ?? undefined,
      parse: () => {
        throw new Error("boom");
      },
    });

    const result = runParser(broken, linkRecord, callArgs(""), context);

    expect(result.files).toEqual([]);
    expect(context.stats.fail_parser).toBe(1);
    expect(context.stats.parser_failures).toEqual({ broken: 1 });
    expect(logger.events).toContainEqual({
      level: "warn",
      msg: "parse.parser_failed",
      obj: { parser: "broken", lineno: 5, error: "boom" },
    });
  });

  it("drops only the output whose formatter throws", () => {
    const { context } = setup();
    const partial = defineParser({
      name: "partial",
      getMetadata: (envelope: Envelope) => envelope.link ?? undefined,
      parse: () => [
        {
          kind: "payload_reformat_file",
          path: "-_0_0_0/bad.json",
          format: () => {
            throw new Error("bad format");
          },
        },
        { kind: "file", path: "-_0_0_0/ok.txt", content: "ok" },
      ],
    });

    const result = runParser(partial, linkRecord, callArgs("x"), context);

    expect(context.stats.fail_parser).toBe(1);
    expect(result.payloadFilename).toBeNull();
    expect(context.sink.outputs).toEqual([{ path: "-_0_0_0/ok_0.txt", content: "ok" }]);
  });

  it("counts malformed guard payloads separately", () => {
    const { context } = setup();
    const record = EnvelopeSchema.parse({ dynamo_guards: {} });
    runParser(dynamoGuardsParser, record, callArgs("{not json"), context);
    expect(context.stats.fail_dynamo_guards_json).toBe(1);
    expect(context.stats.fail_parser).toBe(0);
  });
});
