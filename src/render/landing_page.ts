import type { Diagnostics, DivergenceGroup } from "../contracts/multi_rank";
import { escapeHtml, renderLink, renderPage } from "./html";

export type LandingPageOptions = {
  ranks: readonly number[];
  diagnostics: Diagnostics;
  hasChromiumEvents: boolean;
  customHeaderHtml: string;
};

function renderGroups(title: string, groups: readonly DivergenceGroup[]): string {
  if (groups.length === 0) return "";
  const rows = groups
    .map(
      (group) =>
        `<tr><td>${escapeHtml(group.ranks.join(", "))}</td><td><code>${escapeHtml(group.sequence)}</code></td></tr>`,
    )
    .join("\n");
  return `<h3>${escapeHtml(title)}</h3>\n<table>\n<tr><th>Ranks</th><th>Signature</th></tr>\n${rows}\n</table>`;
}

function renderRuntimeAnalysis(diagnostics: Diagnostics): string {
  const analysis = diagnostics.analysis;
  if (!analysis) return "";
  if (analysis.hasMismatchedGraphCounts) {
    return "<h3>Runtime analysis</h3>\n<p>Ranks compiled different numbers of graphs; runtimes were not compared.</p>";
  }
  const rows = analysis.graphs
    .map((graph) => {
      const [fastest, slowest] = graph.rankDetails;
      return `<tr><td>${escapeHtml(graph.graphId)}</td><td>${graph.deltaMs}</td><td>${fastest.rank} (${fastest.runtimeMs} ms)</td><td>${slowest.rank} (${slowest.runtimeMs} ms)</td></tr>`;
    })
    .join("\n");
  return `<h3>Runtime analysis</h3>\n<table>\n<tr><th>Graph</th><th>Delta (ms)</th><th>Fastest</th><th>Slowest</th></tr>\n${rows}\n</table>`;
}

/** Entry page of a multi-rank report. */
export function renderLandingPage(options: LandingPageOptions): string {
  const { diagnostics } = options;
  const flags = diagnostics.divergence;
  const diverged = flags.cache || flags.collective || flags.tensorMeta || flags.compileIds;

  const rankLinks = options.ranks
    .map((rank) => `<li>${renderLink(`rank_${rank}/index.html`, `Rank ${rank}`)}</li>`)
    .join("\n");

  const artifacts: string[] = [];
  if (options.hasChromiumEvents) artifacts.push(renderLink("chromium_events.json", "Combined chromium events"));
  if (diagnostics.artifacts.runtimeTrace) {
    artifacts.push(renderLink("chromium_trace_with_runtime.json", "Runtime trace"));
    artifacts.push(renderLink("runtime_estimations.json", "Runtime estimations"));
  }
  artifacts.push(renderLink("diagnostics.json", "Diagnostics"));

  const body = [
    `<p>${diverged ? "Ranks diverged." : "No divergence detected across ranks."}</p>`,
    `<h3>Ranks</h3>\n<ul>\n${rankLinks}\n</ul>`,
    `<p>${artifacts.join(" | ")}</p>`,
    renderGroups("Compile id divergence", diagnostics.compileIdGroups),
    renderGroups("Cache divergence", diagnostics.cacheGroups),
    renderGroups("Collective schedule divergence", diagnostics.collectiveGroups),
    renderGroups("Tensor metadata divergence", diagnostics.tensorMetaGroups),
    renderRuntimeAnalysis(diagnostics),
  ]
    .filter((part) => part !== "")
    .join("\n");

  return renderPage({ title: "Multi-rank report", body, headerHtml: options.customHeaderHtml });
}
