import type {
  Envelope,
  SymExprInfoMetadata,
  SymbolicGuardMetadata,
} from "../contracts/envelope";
import { escapeHtml, renderKeyValueTable, renderLink, renderPage } from "../render/html";
import { simpleFileOutput } from "./file_outputs";
import { defineParser, type InternResolver, type ParserEntry } from "./parser_interfaces";
import { formatStack } from "./stack_format";

/**
 * Symbolic expressions by node id. Later records with the same id replace
 * earlier ones.
 */
export class SymExprArena {
  private readonly nodes = new Map<number, SymExprInfoMetadata>();

  get size(): number {
    return this.nodes.size;
  }

  get(id: number): SymExprInfoMetadata | undefined {
    return this.nodes.get(id);
  }

  /** Returns false when the record has no result id. */
  addExpression(info: SymExprInfoMetadata): boolean {
    if (typeof info.result_id !== "number") return false;
    this.nodes.set(info.result_id, info);
    return true;
  }

  addUnbackedSymbol(symbol: {
    symbol?: string | null;
    node_id?: number | null;
    stack?: SymExprInfoMetadata["stack"];
    user_stack?: SymExprInfoMetadata["user_stack"];
  }): boolean {
    if (typeof symbol.node_id !== "number") return false;
    this.nodes.set(symbol.node_id, {
      result: symbol.symbol ?? null,
      result_id: symbol.node_id,
      stack: symbol.stack ?? null,
      user_stack: symbol.user_stack ?? null,
    });
    return true;
  }
}

const INDENT_PX = 20;

/**
 * Depth-first rendering rooted at `rootId`. A node reached twice is rendered
 * once; ids missing from the arena render nothing.
 */
export function renderSymExprTree(
  rootId: number,
  arena: SymExprArena,
  strings: InternResolver,
): string {
  const visited = new Set<number>();

  const visit = (id: number, depth: number): string => {
    if (visited.has(id)) return "";
    visited.add(id);
    const info = arena.get(id);
    if (!info) return "";

    const children = (info.argument_ids ?? []).map((childId) => visit(childId, depth + 1)).join("");
    const node = [
      `<div class="sym-expr" style="margin-left: ${depth * INDENT_PX}px;">`,
      `<h4>${escapeHtml(info.result ?? "")}</h4>`,
      `<p><b>Method:</b> ${escapeHtml(info.method ?? "")}</p>`,
      `<p><b>Arguments:</b> ${escapeHtml((info.arguments ?? []).join(", "))}</p>`,
      formatStack(info.user_stack, "User Stack", strings, true),
      formatStack(info.stack, "Stack", strings),
      "</div>",
    ]
      .filter((part) => part !== "")
      .join("\n");
    return `${node}\n${children}`;
  };

  return visit(rootId, 0);
}

function renderFrameLocals(guard: SymbolicGuardMetadata): string {
  const locals = guard.frame_locals;
  if (!locals) return "";
  const rows: Array<[string, string]> = [
    ...Object.entries(locals.locals ?? {}),
    ...Object.entries(locals.symbols ?? {}),
  ];
  return rows.length === 0 ? "" : `<h3>Locals</h3>\n${renderKeyValueTable(rows)}`;
}

/** Prefers the provenance record when both fields are present. */
export function symbolicGuardMetadata(envelope: Envelope): SymbolicGuardMetadata | undefined {
  return envelope.propagate_real_tensors_provenance ?? envelope.guard_added ?? undefined;
}

export function symbolicGuardParser(arena: SymExprArena): ParserEntry {
  return defineParser({
    name: "symbolic_guard",
    getMetadata: symbolicGuardMetadata,
    parse: ({ lineno, compileId, metadata, strings }) => {
      const tree =
        typeof metadata.expr_node_id === "number"
          ? renderSymExprTree(metadata.expr_node_id, arena, strings)
          : "";
      const body = [
        `<p><code>${escapeHtml(metadata.expr ?? "")}</code></p>`,
        formatStack(metadata.user_stack, "User Stack", strings, true),
        formatStack(metadata.stack, "Framework Stack", strings),
        renderFrameLocals(metadata),
        tree ? `<h3>Expression tree</h3>\n${tree}` : "",
      ]
        .filter((part) => part !== "")
        .join("\n");
      const html = renderPage({ title: "Symbolic guard information", body });
      return simpleFileOutput("symbolic_guard_information.html", lineno, compileId, html);
    },
  });
}

export type ExportFailure = {
  failureType: string;
  /** Pre-rendered HTML. */
  reason: string;
  additionalInfo: string;
};

export function renderExportIndex(
  failures: readonly ExportFailure[],
  options: { exportedProgramUrl: string | null; customHeaderHtml?: string },
): string {
  const summary =
    failures.length === 0
      ? "<p>Export succeeded with no failures.</p>"
      : `<p>Export reported ${failures.length} failure(s).</p>`;
  const program = options.exportedProgramUrl
    ? `<p>${renderLink(options.exportedProgramUrl, "Exported program")}</p>`
    : "";
  const rows = failures
    .map(
      (failure) =>
        `<tr><td>${escapeHtml(failure.failureType)}</td><td>${failure.reason}</td><td>${failure.additionalInfo}</td></tr>`,
    )
    .join("\n");
  const table =
    failures.length === 0
      ? ""
      : `<table>\n<tr><th>Failure type</th><th>Reason</th><th>Additional information</th></tr>\n${rows}\n</table>`;
  return renderPage({
    title: "Export report",
    body: [summary, program, table].filter((part) => part !== "").join("\n"),
    headerHtml: options.customHeaderHtml,
  });
}
