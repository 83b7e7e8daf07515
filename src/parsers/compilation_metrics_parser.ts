import { formatCompileId, type CompileId } from "../contracts/compile_id";
import type {
  CompilationMetricsMetadata,
  Envelope,
  GuardAddedFastMetadata,
  StackSummary,
  SymbolicShapeSpecializationMetadata,
} from "../contracts/envelope";
import type { CompileIdIndex, CompileIdMap } from "../directory/compile_id_index";
import type { OutputFile } from "../directory/compile_directory";
import { CACHE_STATUS_SUFFIX } from "../directory/compile_directory";
import { escapeHtml, renderKeyValueTable, renderLink, renderPage } from "../render/html";
import { simpleFileOutput } from "./file_outputs";
import { defineParser, type InternResolver, type ParserEntry } from "./parser_interfaces";
import { formatStack } from "./stack_format";

export type CompilationMetricsContext = {
  stacks: CompileIdMap<StackSummary>;
  specializations: CompileIdIndex<SymbolicShapeSpecializationMetadata>;
  fastGuards: CompileIdIndex<GuardAddedFastMetadata>;
  /** Files already emitted for this record's compile id. */
  outputFiles: readonly OutputFile[];
};

const METRIC_TABLE_OMIT = new Set(["restart_reasons"]);

function compileLabel(compileId: CompileId | null): string {
  return compileId ? formatCompileId(compileId) : "(unknown)";
}

/** `X_Y_Z/<rest>` → `<rest>`, since the page sits inside the compile directory. */
function stripCompileDir(url: string): string {
  const slash = url.indexOf("/");
  return slash < 0 ? url : url.slice(slash + 1);
}

function renderOutputFiles(files: readonly OutputFile[]): string {
  if (files.length === 0) return "";
  const items = files
    .map((file) => {
      const suffix = CACHE_STATUS_SUFFIX[file.status];
      const readable = file.readableUrl
        ? ` (${renderLink(stripCompileDir(file.readableUrl), "readable")})`
        : "";
      return `<li>${renderLink(stripCompileDir(file.url), stripCompileDir(file.name))} ${suffix}${readable}</li>`;
    })
    .join("\n");
  return `<h3>Output files</h3>\n<ul>\n${items}\n</ul>`;
}

function renderSpecializations(
  specializations: SymbolicShapeSpecializationMetadata[],
  strings: InternResolver,
): string {
  if (specializations.length === 0) return "";
  const rows = specializations
    .map((specialization) => {
      const sources = (specialization.sources ?? []).map(escapeHtml).join("<br>");
      return [
        "<tr>",
        `<td>${sources}</td>`,
        `<td>${escapeHtml(specialization.symbol ?? "")} = ${escapeHtml(specialization.value ?? "")}</td>`,
        `<td>${formatStack(specialization.user_stack, "User Stack", strings)}${formatStack(specialization.stack, "Framework Stack", strings)}</td>`,
        "</tr>",
      ].join("");
    })
    .join("\n");
  return `<h3>Symbolic shape specializations</h3>\n<table>\n<tr><th>Sources</th><th>Specialization</th><th>Stacks</th></tr>\n${rows}\n</table>`;
}

function renderFastGuards(guards: GuardAddedFastMetadata[], strings: InternResolver): string {
  if (guards.length === 0) return "";
  const rows = guards
    .map(
      (guard) =>
        `<tr><td><code>${escapeHtml(guard.expr ?? "")}</code></td><td>${formatStack(guard.user_stack, "User Stack", strings)}${formatStack(guard.stack, "Framework Stack", strings)}</td></tr>`,
    )
    .join("\n");
  return `<h3>Guards added (fast path)</h3>\n<table>\n<tr><th>Expression</th><th>Stacks</th></tr>\n${rows}\n</table>`;
}

function metricRows(metrics: CompilationMetricsMetadata): Array<[string, string]> {
  const rows: Array<[string, string]> = [];
  for (const [key, value] of Object.entries(metrics)) {
    if (value === null || value === undefined || METRIC_TABLE_OMIT.has(key)) continue;
    rows.push([key, typeof value === "string" ? value : JSON.stringify(value)]);
  }
  return rows;
}

/**
 * Built per record, since the page depends on the files emitted for the
 * compile id so far. Specializations and fast guards are taken from their
 * indices.
 */
export function compilationMetricsParser(
  context: CompilationMetricsContext,
  customHeaderHtml = "",
): ParserEntry {
  return defineParser({
    name: "compilation_metrics",
    getMetadata: (envelope: Envelope) => envelope.compilation_metrics ?? undefined,
    parse: ({ lineno, compileId, metadata, strings }) => {
      const stack = context.stacks.get(compileId);
      const miniStack: StackSummary =
        metadata.co_name && metadata.co_filename && typeof metadata.co_firstlineno === "number"
          ? [{ filename: -1, uninterned_filename: metadata.co_filename, line: metadata.co_firstlineno, name: metadata.co_name }]
          : [];
      const specializations = context.specializations.take(compileId);
      const fastGuards = context.fastGuards.take(compileId);

      const body = [
        formatStack(stack, "Stack", strings),
        formatStack(miniStack, "Frame", strings),
        renderKeyValueTable(metricRows(metadata)),
        renderSpecializations(specializations, strings),
        renderFastGuards(fastGuards, strings),
        renderOutputFiles(context.outputFiles),
      ]
        .filter((part) => part !== "")
        .join("\n");

      const html = renderPage({
        title: `Compilation metrics for ${compileLabel(compileId)}`,
        body,
        headerHtml: customHeaderHtml,
      });
      return simpleFileOutput("compilation_metrics.html", lineno, compileId, html);
    },
  });
}

export type FailureEntry = {
  /** HTML cell: compile id, linked to its metrics page when known. */
  compileIdHtml: string;
  kind: "restart" | "failure";
  reason: string;
};

const MISSING_FAIL_REASON = "(no failure reason recorded)";

export function failuresFromMetrics(
  metrics: CompilationMetricsMetadata,
  compileId: CompileId | null,
  metricsUrl: string | null,
): FailureEntry[] {
  const label = compileLabel(compileId);
  const compileIdHtml = compileId && metricsUrl ? renderLink(metricsUrl, label) : escapeHtml(label);
  const entries: FailureEntry[] = [];
  for (const restart of metrics.restart_reasons ?? []) {
    entries.push({ compileIdHtml, kind: "restart", reason: `RestartAnalysis: ${restart}` });
  }
  if (metrics.fail_type) {
    const reason = metrics.fail_reason ?? MISSING_FAIL_REASON;
    const file = metrics.fail_user_frame_filename ?? "N/A";
    const line = metrics.fail_user_frame_lineno ?? 0;
    entries.push({
      compileIdHtml,
      kind: "failure",
      reason: `${metrics.fail_type}: ${reason} (${file}:${line})`,
    });
  }
  return entries;
}

export function renderFailuresAndRestarts(entries: readonly FailureEntry[], customHeaderHtml = ""): string {
  const rows = entries
    .map((entry) => `<tr><td>${entry.compileIdHtml}</td><td>${escapeHtml(entry.reason)}</td></tr>`)
    .join("\n");
  const body =
    entries.length === 0
      ? "<p>No failures or restarts.</p>"
      : `<table>\n<tr><th>Compile id</th><th>Reason</th></tr>\n${rows}\n</table>`;
  return renderPage({ title: "Failures and restarts", body, headerHtml: customHeaderHtml });
}
