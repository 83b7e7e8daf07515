import type { DivergenceGroup } from "../contracts/multi_rank";

export type SignatureGrouping = {
  groups: DivergenceGroup[];
  divergent: boolean;
};

/**
 * Buckets ranks by signature. Groups keep first-seen signature order; ranks
 * within a group are ascending.
 */
export function groupBySignature(
  entries: ReadonlyArray<{ rank: number; signature: string }>,
): SignatureGrouping {
  const bySignature = new Map<string, number[]>();
  for (const { rank, signature } of entries) {
    const ranks = bySignature.get(signature);
    if (ranks) {
      ranks.push(rank);
    } else {
      bySignature.set(signature, [rank]);
    }
  }
  const groups = Array.from(bySignature, ([sequence, ranks]) => ({
    sequence,
    ranks: [...ranks].sort((a, b) => a - b),
  }));
  return { groups, divergent: groups.length > 1 };
}

/** Groups as reported: empty unless the signatures diverge. */
export function reportedGroups(grouping: SignatureGrouping): DivergenceGroup[] {
  return grouping.divergent ? grouping.groups : [];
}

/** Per rank: every graph's ops, in graph order, joined by ",". */
export function collectiveSignatures(
  ranks: readonly number[],
  schedules: ReadonlyArray<{ rank: number; ops: string[] }>,
): Array<{ rank: number; signature: string }> {
  if (schedules.length === 0) return [];
  return ranks.map((rank) => ({
    rank,
    signature: schedules
      .filter((schedule) => schedule.rank === rank)
      .flatMap((schedule) => schedule.ops)
      .join(","),
  }));
}

/** Per rank present: fingerprints sorted by graph id, joined by ",". */
export function tensorMetaSignatures(
  fingerprints: ReadonlyArray<{ rank: number; graph: string; fingerprint: string }>,
): Array<{ rank: number; signature: string }> {
  const byRank = new Map<number, Array<{ graph: string; fingerprint: string }>>();
  for (const { rank, graph, fingerprint } of fingerprints) {
    const list = byRank.get(rank);
    if (list) {
      list.push({ graph, fingerprint });
    } else {
      byRank.set(rank, [{ graph, fingerprint }]);
    }
  }
  return Array.from(byRank, ([rank, entries]) => ({
    rank,
    signature: [...entries]
      .sort((a, b) => (a.graph < b.graph ? -1 : a.graph > b.graph ? 1 : 0))
      .map((entry) => entry.fingerprint)
      .join(","),
  }));
}

export function compileIdSignature(compileIds: readonly string[]): string {
  return [...compileIds].sort().join(",");
}
