import { compileIdDirectoryName, formatCompileId } from "../contracts/compile_id";
import { CACHE_STATUS_SUFFIX, type CompileDirectory } from "../directory/compile_directory";
import { escapeAttribute, escapeHtml, renderLink, renderPage } from "./html";

export type IndexPageOptions = {
  customHeaderHtml: string;
  failureCount: number;
  hasChromiumEvents: boolean;
  provenancePages: string[];
  /** Rendered trie of compile start stacks; null when no compile had one. */
  stackTrieHtml: string | null;
  /** Rendered trie of stacks carried by records outside any compile. */
  unknownStackTrieHtml: string | null;
};

/** Landing page of a single-rank report. */
export function renderIndexPage(directory: CompileDirectory, options: IndexPageOptions): string {
  const sections: string[] = [];

  const failures =
    options.failureCount === 0
      ? "No failures or restarts."
      : `${options.failureCount} failure(s) or restart(s).`;
  sections.push(`<p>${renderLink("failures_and_restarts.html", "Failures and restarts")}: ${escapeHtml(failures)}</p>`);
  if (options.hasChromiumEvents) {
    sections.push(`<p>${renderLink("chromium_events.json", "Chromium trace events")}</p>`);
  }
  sections.push(`<p>${renderLink("raw.jsonl", "Raw records")} ${renderLink("raw.log", "(original log)")}</p>`);

  if (options.stackTrieHtml !== null) {
    sections.push(`<h3>Stack trie</h3>\n${options.stackTrieHtml}`);
  }
  if (options.unknownStackTrieHtml !== null) {
    sections.push(`<h3>Unknown stacks</h3>\n${options.unknownStackTrieHtml}`);
  }

  const groups = directory.entries().map(({ compileId, files }) => {
    const label = compileId === null ? "(unknown)" : formatCompileId(compileId);
    const items = files
      .map((file) => {
        const suffix = CACHE_STATUS_SUFFIX[file.status];
        const readable = file.readableUrl ? ` ${renderLink(file.readableUrl, "(readable)")}` : "";
        return `<li>${renderLink(file.url, file.name)}${suffix ? ` ${suffix}` : ""}${readable}</li>`;
      })
      .join("\n");
    const anchor = compileId === null ? "" : ` id="${escapeAttribute(compileIdDirectoryName(compileId))}"`;
    return `<li${anchor}><b>${escapeHtml(label)}</b>\n<ul>\n${items}\n</ul></li>`;
  });
  sections.push(`<h3>Compile directory</h3>\n<ul>\n${groups.join("\n")}\n</ul>`);

  if (options.provenancePages.length > 0) {
    const links = options.provenancePages.map((page) => `<li>${renderLink(page, page)}</li>`).join("\n");
    sections.push(`<h3>Provenance tracking</h3>\n<ul>\n${links}\n</ul>`);
  }

  return renderPage({
    title: "Compile report",
    body: sections.join("\n"),
    headerHtml: options.customHeaderHtml,
  });
}
