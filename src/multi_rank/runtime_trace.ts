import { createHash } from "node:crypto";

import type { GraphRuntime } from "../contracts/multi_rank";

export type TraceEvent = {
  name: string;
  ph: "X" | "M";
  pid: number;
  tid?: number;
  ts?: number;
  dur?: number;
  cat?: string;
  args: Record<string, unknown>;
};

/** Stable 32-bit thread id for a (rank, graph) pair. */
export function threadIdFor(rank: number, graph: string): number {
  return createHash("sha256").update(`${rank}\u0000${graph}`).digest().readUInt32BE(0);
}

export const opDurationUs = (runtimeNs: number): number => Math.max(1, Math.ceil(runtimeNs / 1000));

/**
 * Chrome trace with one duration event per estimated op, laid end to end per
 * (rank, graph), followed by process and thread naming metadata.
 */
export function buildRuntimeTrace(runtimes: readonly GraphRuntime[]): TraceEvent[] {
  const events: TraceEvent[] = [];
  const threadsByPid = new Map<number, Map<number, string>>();

  for (const { rank, graph, ops } of runtimes) {
    const tid = threadIdFor(rank, graph);
    const threads = threadsByPid.get(rank) ?? new Map<number, string>();
    if (!threads.has(tid)) threads.set(tid, graph);
    threadsByPid.set(rank, threads);

    let offsetUs = 0;
    for (const op of ops) {
      const dur = opDurationUs(op.estimated_runtime_ns);
      events.push({
        name: op.name,
        ph: "X",
        ts: offsetUs,
        dur,
        pid: rank,
        tid,
        cat: "runtime",
        args: { graph, rank, runtime_ns: Math.trunc(op.estimated_runtime_ns) },
      });
      offsetUs += dur;
    }
  }

  const pids = Array.from(threadsByPid.keys()).sort((a, b) => a - b);
  for (const pid of pids) {
    events.push(
      { name: "process_name", ph: "M", pid, args: { name: `Rank ${pid}` } },
      { name: "process_sort_index", ph: "M", pid, args: { sort_index: pid } },
    );
  }
  for (const pid of pids) {
    const threads = Array.from(threadsByPid.get(pid) ?? new Map<number, string>()).sort(([, a], [, b]) =>
      a < b ? -1 : a > b ? 1 : 0,
    );
    threads.forEach(([tid, graph], index) => {
      events.push(
        { name: "thread_name", ph: "M", pid, tid, args: { name: `graph ${graph}` } },
        { name: "thread_sort_index", ph: "M", pid, tid, args: { sort_index: index } },
      );
    });
  }
  return events;
}
