import { z } from "zod";

export const OpRuntimeSchema = z.object({
  name: z.string(),
  estimated_runtime_ns: z.number(),
});

export const RuntimeAndTensorMetaSchema = z.object({
  ops: z.array(OpRuntimeSchema),
}).passthrough();

export const CollectiveScheduleSchema = z.array(z.string());

export const CompileDirectoryFileSchema = z.record(
  z.object({
    artifacts: z.array(
      z.object({
        number: z.number(),
        suffix: z.string(),
      }).passthrough(),
    ).default([]),
  }).passthrough(),
);

export type OpRuntime = z.infer<typeof OpRuntimeSchema>;

/** Estimated op runtimes of one graph (compile directory) on one rank. */
export type GraphRuntime = {
  rank: number;
  graph: string;
  ops: OpRuntime[];
};

export type CollectiveSchedule = {
  rank: number;
  graph: string;
  ops: string[];
};

export type TensorMetaFingerprint = {
  rank: number;
  graph: string;
  fingerprint: string;
};

export type RankMetadata = {
  rank: number;
  compileIds: string[];
  cacheSequence: string;
};

export type DivergenceGroup = {
  readonly sequence: string;
  readonly ranks: readonly number[];
};

export type RuntimeRankDetail = {
  rank: number;
  runtimeMs: number;
};

export type GraphRuntimeDelta = {
  graphIndex: number;
  graphId: string;
  deltaMs: number;
  /** [fastest, slowest]. */
  rankDetails: [RuntimeRankDetail, RuntimeRankDetail];
};

export type RuntimeAnalysis = {
  graphs: GraphRuntimeDelta[];
  hasMismatchedGraphCounts: boolean;
};

export type Diagnostics = {
  divergence: {
    cache: boolean;
    collective: boolean;
    tensorMeta: boolean;
    compileIds: boolean;
  };
  artifacts: {
    runtimeTrace: boolean;
  };
  analysis: RuntimeAnalysis | null;
  cacheGroups: DivergenceGroup[];
  collectiveGroups: DivergenceGroup[];
  tensorMetaGroups: DivergenceGroup[];
  compileIdGroups: DivergenceGroup[];
};
