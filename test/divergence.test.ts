import { describe, it, expect } from "vitest";

import {
  collectiveSignatures,
  compileIdSignature,
  groupBySignature,
  reportedGroups,
  tensorMetaSignatures,
} from "../src/multi_rank/divergence";

describe("groupBySignature", () => {
  it("groups ranks sharing a signature in first-seen order", () => {
    const grouping = groupBySignature([
      { rank: 1, signature: "a" },
      { rank: 0, signature: "a" },
      { rank: 2, signature: "b" },
    ]);
    expect(grouping).toEqual({
      groups: [
        { sequence: "a", ranks: [0, 1] },
        { sequence: "b", ranks: [2] },
      ],
      divergent: true,
    });
    expect(reportedGroups(grouping)).toEqual(grouping.groups);
  });

  it("reports no groups when every rank agrees", () => {
    const grouping = groupBySignature([
      { rank: 0, signature: "same" },
      { rank: 1, signature: "same" },
    ]);
    expect(grouping.divergent).toBe(false);
    expect(reportedGroups(grouping)).toEqual([]);
  });

  it("treats no ranks as no divergence", () => {
    expect(groupBySignature([])).toEqual({ groups: [], divergent: false });
  });
});

describe("signatures", () => {
  it("joins each rank's collective ops across graphs", () => {
    const signatures = collectiveSignatures(
      [0, 1, 2],
      [
        { rank: 0, ops: ["all_reduce", "all_gather"] },
        { rank: 0, ops: ["broadcast"] },
        { rank: 1, ops: ["all_reduce"] },
      ],
    );
    expect(signatures).toEqual([
      { rank: 0, signature: "all_reduce,all_gather,broadcast" },
      { rank: 1, signature: "all_reduce" },
      { rank: 2, signature: "" },
    ]);
  });

  it("skips collective comparison when no rank logged a schedule", () => {
    expect(collectiveSignatures([0, 1], [])).toEqual([]);
  });

  it("orders tensor fingerprints by graph", () => {
    expect(
      tensorMetaSignatures([
        { rank: 0, graph: "b", fingerprint: "B" },
        { rank: 0, graph: "a", fingerprint: "A" },
        { rank: 1, graph: "a", fingerprint: "A" },
      ]),
    ).toEqual([
      { rank: 0, signature: "A,B" },
      { rank: 1, signature: "A" },
    ]);
  });

  it("sorts compile ids before joining", () => {
    expect(compileIdSignature(["[1/0]", "[0/0]"])).toBe("[0/0],[1/0]");
  });
});
