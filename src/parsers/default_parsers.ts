import { posix } from "node:path";

import { z } from "zod";

import { formatCompileId } from "../contracts/compile_id";
import {
  StackSummarySchema,
  type BackwardCompilationMetricsMetadata,
  type EmptyMetadata,
  type Envelope,
} from "../contracts/envelope";
import { anchorSource, escapeHtml, renderKeyValueTable, renderPage, renderPre } from "../render/html";
import {
  formatJsonPretty,
  payloadFileOutput,
  payloadReformatFileOutput,
  simpleFileOutput,
} from "./file_outputs";
import { defineParser, type ParserEntry, type ParserResults } from "./parser_interfaces";
import { formatStack } from "./stack_format";

export type ParserCatalogOptions = {
  plainText: boolean;
};

type SentinelKind =
  | "optimize_ddp_split_graph"
  | "compiled_autograd_graph"
  | "aot_forward_graph"
  | "aot_backward_graph"
  | "aot_inference_graph"
  | "aot_joint_graph"
  | "inductor_post_grad_graph"
  | "inductor_pre_grad_graph"
  | "dynamo_cpp_guards_str"
  | "exported_program";

export const SENTINEL_KINDS: readonly SentinelKind[] = [
  "optimize_ddp_split_graph",
  "compiled_autograd_graph",
  "aot_forward_graph",
  "aot_backward_graph",
  "aot_inference_graph",
  "aot_joint_graph",
  "inductor_post_grad_graph",
  "inductor_pre_grad_graph",
  "dynamo_cpp_guards_str",
];

/** Writes the payload to `<kind>.txt` whenever the kind field is present. */
export function sentinelFileParser(kind: SentinelKind): ParserEntry {
  return defineParser<EmptyMetadata>({
    name: kind,
    getMetadata: (envelope) => envelope[kind] ?? undefined,
    parse: ({ lineno, compileId }) => payloadFileOutput(`${kind}.txt`, lineno, compileId),
  });
}

export const graphDumpParser = defineParser({
  name: "graph_dump",
  getMetadata: (envelope: Envelope) => envelope.graph_dump ?? undefined,
  parse: ({ lineno, compileId, metadata }) =>
    payloadFileOutput(`${metadata.name}.txt`, lineno, compileId),
});

export const dynamoOutputGraphParser = defineParser({
  name: "dynamo_output_graph",
  getMetadata: (envelope: Envelope) => envelope.dynamo_output_graph ?? undefined,
  parse: ({ lineno, compileId }) => payloadFileOutput("dynamo_output_graph.txt", lineno, compileId),
});

const DynamoGuardSchema = z.object({
  code: z.string(),
  stack: StackSummarySchema.nullish(),
  user_stack: StackSummarySchema.nullish(),
}).passthrough();

export const DynamoGuardListSchema = z.array(DynamoGuardSchema);

/** Throws on a payload that is not a guard list; dispatch counts it separately. */
export const dynamoGuardsParser = defineParser({
  name: "dynamo_guards",
  getMetadata: (envelope: Envelope) => envelope.dynamo_guards ?? undefined,
  parse: ({ lineno, compileId, payload, strings }) => {
    const guards = DynamoGuardListSchema.parse(JSON.parse(payload));
    const items = guards
      .map((guard) => {
        const stack = formatStack(guard.user_stack ?? guard.stack, "Stack", strings);
        return `<li><code>${escapeHtml(guard.code)}</code>${stack}</li>`;
      })
      .join("\n");
    const title = `Guards ${compileId ? formatCompileId(compileId) : "(unknown)"}`;
    const html = renderPage({ title, body: `<ul>\n${items}\n</ul>` });
    return simpleFileOutput("dynamo_guards.html", lineno, compileId, html);
  },
});

export function inductorOutputCodeParser(options: ParserCatalogOptions): ParserEntry {
  return defineParser({
    name: "inductor_output_code",
    getMetadata: (envelope: Envelope) => envelope.inductor_output_code ?? undefined,
    parse: ({ lineno, compileId, metadata, payload }): ParserResults => {
      const stem = metadata.filename ? posix.parse(metadata.filename).name : "";
      const base = stem ? `inductor_output_code_${stem}` : "inductor_output_code";
      if (options.plainText) {
        return payloadFileOutput(`${base}.txt`, lineno, compileId);
      }
      const html = renderPage({ title: base, body: renderPre(payload) });
      return simpleFileOutput(`${base}.html`, lineno, compileId, html);
    },
  });
}

export const optimizeDdpSplitChildParser = defineParser({
  name: "optimize_ddp_split_child",
  getMetadata: (envelope: Envelope) => envelope.optimize_ddp_split_child ?? undefined,
  parse: ({ lineno, compileId, metadata }) =>
    payloadFileOutput(`optimize_ddp_split_child_${metadata.name}.txt`, lineno, compileId),
});

export const linkParser = defineParser({
  name: "link",
  getMetadata: (envelope: Envelope) => envelope.link ?? undefined,
  parse: ({ metadata }): ParserResults => [{ kind: "link", name: metadata.name, url: metadata.url }],
});

export const artifactParser = defineParser({
  name: "artifact",
  getMetadata: (envelope: Envelope) => envelope.artifact ?? undefined,
  parse: ({ lineno, compileId, metadata }): ParserResults => {
    switch (metadata.encoding) {
      case "string":
        return payloadFileOutput(`${metadata.name}.txt`, lineno, compileId);
      case "json":
        return payloadReformatFileOutput(`${metadata.name}.json`, lineno, compileId, formatJsonPretty);
      default:
        throw new Error(`unsupported artifact encoding: ${metadata.encoding}`);
    }
  },
});

const EVAL_WITH_KEY = /<eval_with_key>\.([0-9]+)/;

export function extractEvalWithKeyId(filename: string): number | null {
  const match = EVAL_WITH_KEY.exec(filename);
  return match?.[1] === undefined ? null : Number(match[1]);
}

export const dumpFileParser = defineParser({
  name: "dump_file",
  getMetadata: (envelope: Envelope) => envelope.dump_file ?? undefined,
  parse: ({ metadata, payload }): ParserResults => {
    const fxId = extractEvalWithKeyId(metadata.name);
    const filename = fxId === null ? `${metadata.name}.html` : `eval_with_key_${fxId}.html`;
    return [{ kind: "global_file", path: `dump_file/${filename}`, content: anchorSource(payload) }];
  },
});

function metricsRows(metadata: Record<string, unknown>): Array<[string, string]> {
  return Object.entries(metadata)
    .filter(([, value]) => value !== null && value !== undefined)
    .map(([key, value]) => [key, typeof value === "string" ? value : JSON.stringify(value)]);
}

function backwardMetricsParser(
  name: "bwd_compilation_metrics" | "aot_autograd_backward_compilation_metrics",
): ParserEntry {
  return defineParser<BackwardCompilationMetricsMetadata>({
    name,
    getMetadata: (envelope) => envelope[name] ?? undefined,
    parse: ({ lineno, compileId, metadata }) => {
      const prefix = compileId ? formatCompileId(compileId) : "(unknown)";
      const html = renderPage({
        title: `Backward compilation metrics for ${prefix}`,
        body: renderKeyValueTable(metricsRows(metadata)),
      });
      return simpleFileOutput(`${name}.html`, lineno, compileId, html);
    },
  });
}

export const bwdCompilationMetricsParser = backwardMetricsParser("bwd_compilation_metrics");
export const aotAutogradBackwardCompilationMetricsParser = backwardMetricsParser(
  "aot_autograd_backward_compilation_metrics",
);

/** Registry used for a normal pass, in dispatch order. */
export function defaultParsers(options: ParserCatalogOptions): ParserEntry[] {
  return [
    ...SENTINEL_KINDS.map(sentinelFileParser),
    graphDumpParser,
    dynamoOutputGraphParser,
    dynamoGuardsParser,
    inductorOutputCodeParser(options),
    optimizeDdpSplitChildParser,
    linkParser,
    artifactParser,
    dumpFileParser,
    bwdCompilationMetricsParser,
    aotAutogradBackwardCompilationMetricsParser,
  ];
}

/** Registry used in export mode. */
export function exportParsers(): ParserEntry[] {
  return [sentinelFileParser("exported_program")];
}
