import { describe, it, expect } from "vitest";

import { EnvelopeSchema } from "../src/contracts/envelope";
import { InternTable } from "../src/ingest/intern_table";
import {
  artifactParser,
  defaultParsers,
  dumpFileParser,
  dynamoGuardsParser,
  extractEvalWithKeyId,
  graphDumpParser,
  inductorOutputCodeParser,
  sentinelFileParser,
} from "../src/parsers/default_parsers";
import { formatJsonPretty } from "../src/parsers/file_outputs";
import type { ParserEntry, ParserResults } from "../src/parsers/parser_interfaces";
import { formatStack, simplifyFilename } from "../src/parsers/stack_format";

const FRAME_0 = { frameId: 0, frameCompileId: 0, attempt: 0, compiledAutogradId: null };

function run(entry: ParserEntry, record: Record<string, unknown>, payload = "", strings = new InternTable()): ParserResults {
  const bound = entry.bind(EnvelopeSchema.parse(record));
  if (!bound) throw new Error(`${entry.name} did not apply`);
  return bound({ lineno: 9, rank: 0, compileId: FRAME_0, payload, strings });
}

describe("default parsers", () => {
  it("writes sentinel payloads to <kind>.txt", () => {
    expect(run(sentinelFileParser("aot_forward_graph"), { aot_forward_graph: {} })).toEqual([
      { kind: "payload_file", path: "-_0_0_0/aot_forward_graph.txt" },
    ]);
  });

  it("names graph dumps after the graph", () => {
    expect(run(graphDumpParser, { graph_dump: { name: "pre_fusion" } })).toEqual([
      { kind: "payload_file", path: "-_0_0_0/pre_fusion.txt" },
    ]);
  });

  it("writes string artifacts raw and JSON artifacts pretty-printed", () => {
    expect(run(artifactParser, { artifact: { name: "notes", encoding: "string" } })).toEqual([
      { kind: "payload_file", path: "-_0_0_0/notes.txt" },
    ]);

    const [json] = run(artifactParser, { artifact: { name: "cfg", encoding: "json" } });
    expect(json.kind).toBe("payload_reformat_file");
    if (json.kind !== "payload_reformat_file") return;
    expect(json.path).toBe("-_0_0_0/cfg.json");
    expect(json.format('{"a":[1]}')).toBe('{\n  "a": [\n    1\n  ]\n}');
  });

  it("rejects unsupported artifact encodings", () => {
    expect(() => run(artifactParser, { artifact: { name: "blob", encoding: "base64" } })).toThrow(
      "unsupported artifact encoding: base64",
    );
  });

  it("writes inductor output code as text or html", () => {
    const record = { inductor_output_code: { filename: "/tmp/cache/cxyz.py" } };
    expect(run(inductorOutputCodeParser({ plainText: true }), record)).toEqual([
      { kind: "payload_file", path: "-_0_0_0/inductor_output_code_cxyz.txt" },
    ]);

    const [html] = run(inductorOutputCodeParser({ plainText: false }), record, "x < y");
    expect(html.kind).toBe("file");
    if (html.kind !== "file") return;
    expect(html.path).toBe("-_0_0_0/inductor_output_code_cxyz.html");
    expect(html.content).toContain("<pre>x &lt; y</pre>");
  });

  it("stores dumped files globally with addressable lines", () => {
    const [page] = run(dumpFileParser, { dump_file: { name: "<eval_with_key>.12" } }, "a = 1\nb = 2\n");
    expect(page.kind).toBe("global_file");
    if (page.kind !== "global_file") return;
    expect(page.path).toBe("dump_file/eval_with_key_12.html");
    expect(page.content).toContain('<pre><span id="L1">a = 1</span><span id="L2">b = 2</span></pre>');
  });

  it("extracts fx eval ids", () => {
    expect(extractEvalWithKeyId("<eval_with_key>.7")).toBe(7);
    expect(extractEvalWithKeyId("model.py")).toBeNull();
  });

  it("renders guards with their stacks", () => {
    const strings = new InternTable();
    strings.insert(1, "/usr/lib/python3/site-packages/model/net.py");
    const payload = JSON.stringify([{ code: "x < 3", user_stack: [{ filename: 1, line: 4, name: "forward" }] }]);

    const [page] = run(dynamoGuardsParser, { dynamo_guards: {} }, payload, strings);

    expect(page.kind).toBe("file");
    if (page.kind !== "file") return;
    expect(page.path).toBe("-_0_0_0/dynamo_guards.html");
    expect(page.content).toContain(
      "<li><code>x &lt; 3</code><details><summary>Stack</summary>\n<ul>\n<li>model/net.py:4 in forward</li>\n</ul>\n</details></li>",
    );
  });

  it("registers every built-in parser once", () => {
    const names = defaultParsers({ plainText: false }).map((entry) => entry.name);
    expect(new Set(names).size).toBe(names.length);
    expect(names).toContain("dynamo_guards");
    expect(names).toContain("artifact");
  });
});

describe("formatting helpers", () => {
  it("passes unparseable JSON through", () => {
    expect(formatJsonPretty("{nope")).toBe("{nope");
  });

  it("shortens site-packages paths", () => {
    expect(simplifyFilename("/venv/lib/python3.11/site-packages/torch/nn.py")).toBe("torch/nn.py");
    expect(simplifyFilename("/home/me/train.py")).toBe("/home/me/train.py");
  });

  it("renders nothing for an empty stack", () => {
    expect(formatStack([], "Stack", new InternTable())).toBe("");
    expect(formatStack(null, "Stack", new InternTable())).toBe("");
  });
});
