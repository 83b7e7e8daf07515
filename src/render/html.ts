const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
};

/** Escapes text content (not attribute values). */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>]/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function escapeAttribute(text: string): string {
  return escapeHtml(text).replace(/"/g, "&quot;").replace(/'/g, "&#39;");
}

const BASE_CSS = `body { font-family: ui-sans-serif, system-ui, sans-serif; margin: 1.5em; }
pre { background: #f6f8fa; padding: 0.75em; overflow-x: auto; }
table { border-collapse: collapse; }
td, th { border: 1px solid #ddd; padding: 0.25em 0.5em; text-align: left; vertical-align: top; }
.status-ok { color: #1a7f37; }
.status-break { color: #9a6700; }
.status-empty { color: #57606a; }
.status-error { color: #cf222e; }
.status-missing { color: #8250df; }`;

export function renderPage(args: { title: string; body: string; headerHtml?: string }): string {
  return [
    "<!DOCTYPE html>",
    "<html>",
    "<head>",
    `<meta charset="UTF-8">`,
    `<title>${escapeHtml(args.title)}</title>`,
    `<style>${BASE_CSS}</style>`,
    "</head>",
    "<body>",
    args.headerHtml ?? "",
    `<h2>${escapeHtml(args.title)}</h2>`,
    args.body,
    "</body>",
    "</html>",
    "",
  ].join("\n");
}

export function renderPre(text: string): string {
  return `<pre>${escapeHtml(text)}</pre>`;
}

export function renderLink(href: string, label: string): string {
  return `<a href="${escapeAttribute(href)}">${escapeHtml(label)}</a>`;
}

/** Two-column table; values are rendered as escaped text. */
export function renderKeyValueTable(rows: Array<[string, string]>): string {
  const body = rows
    .map(([key, value]) => `<tr><th>${escapeHtml(key)}</th><td>${escapeHtml(value)}</td></tr>`)
    .join("\n");
  return `<table>\n${body}\n</table>`;
}

/**
 * Source listing where each line is addressable as `#L<n>`.
 */
export function anchorSource(text: string): string {
  const lines = text.split("\n");
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  const spans = lines
    .map((line, i) => `<span id="L${i + 1}">${escapeHtml(line)}</span>`)
    .join("");
  const style = `pre { counter-reset: line; }
pre span { display: block; }
pre span:before { counter-increment: line; content: counter(line); display: inline-block; padding: 0 .5em; margin-right: .5em; color: #888; }
pre span:target { background-color: #ffff00; }`;
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<title>Source Code</title>
<style>${style}</style>
</head>
<body><pre>${spans}</pre></body>
</html>
`;
}
