import { describe, it, expect } from "vitest";

import type { CompileId } from "../src/contracts/compile_id";
import type { FrameSummary } from "../src/contracts/envelope";
import { InternTable } from "../src/ingest/intern_table";
import { withoutConvertFrameSuffix } from "../src/parsers/stack_format";
import { compileStatus, StackTrie } from "../src/render/stack_trie";

const strings = new InternTable();
strings.insert(1, "train.py");
strings.insert(2, "model.py");

const MAIN: FrameSummary = { filename: 1, line: 10, name: "main" };
const FORWARD: FrameSummary = { filename: 2, line: 5, name: "forward" };
const BACKWARD: FrameSummary = { filename: 2, line: 9, name: "backward" };

const compileId = (frameCompileId: number): CompileId => ({
  frameId: 0,
  frameCompileId,
  attempt: 0,
  compiledAutogradId: null,
});

const convertFrame = (name: string): FrameSummary => ({
  filename: 0,
  uninterned_filename: "/usr/lib/python3/site-packages/torch/_dynamo/convert_frame.py",
  line: 1,
  name,
});

describe("compileStatus", () => {
  it("derives the status from the compile's metrics", () => {
    expect(compileStatus([])).toBe("missing");
    expect(compileStatus([{ fail_type: "Unsupported", graph_op_count: 3 }])).toBe("error");
    expect(compileStatus([{ graph_op_count: 0 }, {}])).toBe("empty");
    expect(compileStatus([{ graph_op_count: 2, restart_reasons: ["graph break"] }])).toBe("break");
    expect(compileStatus([{ graph_op_count: 2, restart_reasons: [] }])).toBe("ok");
  });
});

describe("StackTrie", () => {
  it("shares common prefixes and nests a level where stacks fork", () => {
    const trie = new StackTrie();
    trie.insert([MAIN, FORWARD], compileId(0));
    trie.insert([MAIN, BACKWARD], compileId(1));

    const html = trie.render({
      caption: "Stack",
      strings,
      statusOf: (id) => (id.frameCompileId === 0 ? "ok" : "error"),
    });
    expect(html).toBe(
      [
        "<details><summary>Stack</summary>",
        "<ul>",
        "<li>train.py:10 in main</li>",
        '<li><a href="#-_0_0_0" class="status-ok">[0/0]</a> model.py:5 in forward',
        "<ul>",
        "</ul></li>",
        '<li><a href="#-_0_1_0" class="status-error">[0/1]</a> model.py:9 in backward',
        "<ul>",
        "</ul></li>",
        "</ul>",
        "</details>",
      ].join("\n"),
    );
  });

  it("marks stacks that belong to no compile", () => {
    const trie = new StackTrie();
    expect(trie.isEmpty).toBe(true);
    trie.insert([MAIN], null);
    expect(trie.isEmpty).toBe(false);
    expect(trie.render({ caption: "Stack", strings, statusOf: () => "ok" })).toContain(
      "<li>(unknown) train.py:10 in main</li>",
    );
  });
});

describe("withoutConvertFrameSuffix", () => {
  it("drops either trailing wrapper sequence", () => {
    expect(
      withoutConvertFrameSuffix(
        [MAIN, convertFrame("catch_errors"), convertFrame("_convert_frame"), convertFrame("_convert_frame_assert")],
        strings,
      ),
    ).toEqual([MAIN]);
    expect(
      withoutConvertFrameSuffix([MAIN, convertFrame("__call__"), convertFrame("__call__"), convertFrame("__call__")], strings),
    ).toEqual([MAIN]);
  });

  it("keeps stacks that only partly match", () => {
    const short = [MAIN, convertFrame("__call__")];
    expect(withoutConvertFrameSuffix(short, strings)).toEqual(short);
    const otherFile = [MAIN, FORWARD, { ...FORWARD, name: "__call__" }, { ...FORWARD, name: "__call__" }];
    expect(withoutConvertFrameSuffix(otherFile, strings)).toEqual(otherFile);
  });
});
