import type { GraphRuntime, GraphRuntimeDelta, RuntimeAnalysis } from "../contracts/multi_rank";

const nsToMs = (ns: number): number => Math.round((ns / 1e6) * 1000) / 1000;

/**
 * Compares per-rank graph runtimes by position. Ranks reporting different
 * graph counts are not compared at all.
 */
export function analyzeGraphRuntimeDeltas(runtimes: readonly GraphRuntime[]): RuntimeAnalysis | null {
  if (runtimes.length === 0) return null;

  const byRank = new Map<number, Array<{ graph: string; totalNs: number }>>();
  for (const { rank, graph, ops } of runtimes) {
    const totalNs = ops.reduce((sum, op) => sum + op.estimated_runtime_ns, 0);
    const graphs = byRank.get(rank);
    if (graphs) {
      graphs.push({ graph, totalNs });
    } else {
      byRank.set(rank, [{ graph, totalNs }]);
    }
  }

  const counts = Array.from(byRank.values(), (graphs) => graphs.length);
  const graphCount = Math.max(...counts);
  if (graphCount !== Math.min(...counts)) {
    return { graphs: [], hasMismatchedGraphCounts: true };
  }

  const ranks = Array.from(byRank.keys()).sort((a, b) => a - b);
  const graphs: GraphRuntimeDelta[] = [];
  for (let index = 0; index < graphCount; index++) {
    let minNs = Number.POSITIVE_INFINITY;
    let maxNs = Number.NEGATIVE_INFINITY;
    let fastest = 0;
    let slowest = 0;
    let graphId = "";
    ranks.forEach((rank, position) => {
      const entry = byRank.get(rank)?.[index];
      if (!entry) return;
      if (position === 0) graphId = entry.graph;
      // Ties go to the later rank.
      if (entry.totalNs <= minNs) {
        minNs = entry.totalNs;
        fastest = rank;
      }
      if (entry.totalNs >= maxNs) {
        maxNs = entry.totalNs;
        slowest = rank;
      }
    });
    graphs.push({
      graphIndex: index,
      graphId,
      deltaMs: nsToMs(maxNs - minNs),
      rankDetails: [
        { rank: fastest, runtimeMs: nsToMs(minNs) },
        { rank: slowest, runtimeMs: nsToMs(maxNs) },
      ],
    });
  }

  graphs.sort((a, b) => (a.graphId < b.graphId ? -1 : a.graphId > b.graphId ? 1 : 0));
  return { graphs, hasMismatchedGraphCounts: false };
}
