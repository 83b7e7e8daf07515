import { compileIdDirectoryName, formatCompileId, type CompileId } from "../contracts/compile_id";
import type { CompilationMetricsMetadata, FrameSummary, StackSummary } from "../contracts/envelope";
import type { InternResolver } from "../parsers/parser_interfaces";
import { renderFrame } from "../parsers/stack_format";
import { escapeAttribute, escapeHtml } from "./html";

export type CompileStatus = "ok" | "break" | "empty" | "error" | "missing";

/** Status of a compile id from every `compilation_metrics` record it produced. */
export function compileStatus(metrics: readonly CompilationMetricsMetadata[]): CompileStatus {
  if (metrics.length === 0) return "missing";
  if (metrics.some((m) => m.fail_type)) return "error";
  if (metrics.every((m) => (m.graph_op_count ?? 0) === 0)) return "empty";
  if (metrics.some((m) => (m.restart_reasons ?? []).length > 0)) return "break";
  return "ok";
}

type TrieNode = {
  frame: FrameSummary | null;
  // Compile ids whose stack ends here; null for stacks with no compile id.
  terminals: Array<CompileId | null>;
  children: Map<string, TrieNode>;
};

const newNode = (frame: FrameSummary | null): TrieNode => ({ frame, terminals: [], children: new Map() });

const frameKey = (frame: FrameSummary): string =>
  JSON.stringify([frame.filename, frame.uninterned_filename ?? null, frame.line, frame.name, frame.loc ?? null]);

/**
 * Prefix tree of stacks, outermost frame first. Children keep insertion
 * order.
 */
export class StackTrie {
  private readonly root = newNode(null);

  insert(stack: StackSummary, compileId: CompileId | null): void {
    let node = this.root;
    for (const frame of stack) {
      const key = frameKey(frame);
      let child = node.children.get(key);
      if (!child) {
        child = newNode(frame);
        node.children.set(key, child);
      }
      node = child;
    }
    node.terminals.push(compileId);
  }

  get isEmpty(): boolean {
    return this.root.children.size === 0 && this.root.terminals.length === 0;
  }

  /**
   * Nested list inside a `<details>` block. A node with siblings opens a new
   * level; a lone child stays at its parent's indentation. Compile ids link
   * to their compile directory entry on the index page.
   */
  render(args: {
    caption: string;
    strings: InternResolver;
    statusOf: (compileId: CompileId) => CompileStatus;
  }): string {
    const lines: string[] = [`<details><summary>${escapeHtml(args.caption)}</summary>`, "<ul>"];
    this.renderChildren(this.root, lines, args);
    lines.push("</ul>", "</details>");
    return lines.join("\n");
  }

  private renderChildren(
    node: TrieNode,
    lines: string[],
    args: { strings: InternResolver; statusOf: (compileId: CompileId) => CompileStatus },
  ): void {
    const branching = node.children.size > 1;
    for (const child of node.children.values()) {
      const frame = child.frame ? renderFrame(child.frame, args.strings) : "";
      const marks = child.terminals.map((id) => terminalMark(id, args.statusOf)).join("");
      if (branching) {
        lines.push(`<li>${marks}${frame}`, "<ul>");
        this.renderChildren(child, lines, args);
        lines.push("</ul></li>");
      } else {
        lines.push(`<li>${marks}${frame}</li>`);
        this.renderChildren(child, lines, args);
      }
    }
  }
}

function terminalMark(id: CompileId | null, statusOf: (compileId: CompileId) => CompileStatus): string {
  if (id === null) return "(unknown) ";
  const anchor = escapeAttribute(`#${compileIdDirectoryName(id)}`);
  return `<a href="${anchor}" class="status-${statusOf(id)}">${escapeHtml(formatCompileId(id))}</a> `;
}
