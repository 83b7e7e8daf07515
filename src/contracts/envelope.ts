import { z } from "zod";

import { CompileIdSchema } from "./compile_id";

export const FrameSummarySchema = z.object({
  // Interned string id; resolve through the pass's InternTable.
  filename: z.number().int(),
  line: z.number().int(),
  name: z.string(),
  loc: z.string().nullish(),
  uninterned_filename: z.string().nullish(),
});

export const StackSummarySchema = z.array(FrameSummarySchema);

export type FrameSummary = z.infer<typeof FrameSummarySchema>;
export type StackSummary = z.infer<typeof StackSummarySchema>;

export const EmptyMetadataSchema = z.object({}).passthrough();

export const GraphDumpMetadataSchema = z.object({ name: z.string() }).passthrough();

export const InductorOutputCodeMetadataSchema = z.object({
  filename: z.string().nullish(),
}).passthrough();

export const OptimizeDdpSplitChildMetadataSchema = z.object({ name: z.string() }).passthrough();

export const LinkMetadataSchema = z.object({
  name: z.string(),
  url: z.string(),
}).passthrough();

export const ArtifactMetadataSchema = z.object({
  name: z.string(),
  encoding: z.string(),
}).passthrough();

export const DumpFileMetadataSchema = z.object({ name: z.string() }).passthrough();

export const DynamoStartMetadataSchema = z.object({
  stack: StackSummarySchema.nullish(),
}).passthrough();

export const CompilationMetricsMetadataSchema = z.object({
  co_name: z.string().nullish(),
  co_filename: z.string().nullish(),
  co_firstlineno: z.number().int().nullish(),
  fail_type: z.string().nullish(),
  fail_reason: z.string().nullish(),
  fail_user_frame_filename: z.string().nullish(),
  fail_user_frame_lineno: z.number().int().nullish(),
  restart_reasons: z.array(z.string()).nullish(),
  graph_op_count: z.number().int().nullish(),
}).passthrough();

export const BackwardCompilationMetricsMetadataSchema = z.object({
  fail_type: z.string().nullish(),
  fail_reason: z.string().nullish(),
}).passthrough();

export const SymbolicShapeSpecializationMetadataSchema = z.object({
  symbol: z.string().nullish(),
  sources: z.array(z.string()).nullish(),
  value: z.string().nullish(),
  reason: z.string().nullish(),
  stack: StackSummarySchema.nullish(),
  user_stack: StackSummarySchema.nullish(),
}).passthrough();

export const GuardAddedFastMetadataSchema = z.object({
  expr: z.string().nullish(),
  stack: StackSummarySchema.nullish(),
  user_stack: StackSummarySchema.nullish(),
}).passthrough();

export const FrameLocalsSchema = z.object({
  locals: z.record(z.string()).nullish(),
  symbols: z.record(z.string()).nullish(),
}).passthrough();

export const SymbolicGuardMetadataSchema = z.object({
  expr: z.string().nullish(),
  result: z.string().nullish(),
  prefix: z.string().nullish(),
  expr_node_id: z.number().int().nullish(),
  stack: StackSummarySchema.nullish(),
  user_stack: StackSummarySchema.nullish(),
  frame_locals: FrameLocalsSchema.nullish(),
}).passthrough();

export const SymExprInfoMetadataSchema = z.object({
  method: z.string().nullish(),
  arguments: z.array(z.string()).nullish(),
  argument_ids: z.array(z.number().int()).nullish(),
  result: z.string().nullish(),
  result_id: z.number().int().nullish(),
  stack: StackSummarySchema.nullish(),
  user_stack: StackSummarySchema.nullish(),
}).passthrough();

export const UnbackedSymbolMetadataSchema = z.object({
  symbol: z.string().nullish(),
  node_id: z.number().int().nullish(),
  stack: StackSummarySchema.nullish(),
  user_stack: StackSummarySchema.nullish(),
}).passthrough();

export const FakeKernelMetadataSchema = z.object({
  op: z.string().nullish(),
  reason: z.string().nullish(),
}).passthrough();

/**
 * One decoded log record. Known kind fields are validated; anything else is
 * kept by `passthrough()` and reported as an unknown field.
 */
export const EnvelopeSchema = z.object({
  rank: z.number().int().min(0).nullish(),
  compile_id: CompileIdSchema.nullish(),
  has_payload: z.string().nullish(),
  str: z.tuple([z.string(), z.number().int().min(0)]).nullish(),
  stack: StackSummarySchema.nullish(),

  dynamo_start: DynamoStartMetadataSchema.nullish(),
  dynamo_output_graph: EmptyMetadataSchema.nullish(),
  dynamo_guards: EmptyMetadataSchema.nullish(),
  dynamo_cpp_guards_str: EmptyMetadataSchema.nullish(),
  optimize_ddp_split_graph: EmptyMetadataSchema.nullish(),
  optimize_ddp_split_child: OptimizeDdpSplitChildMetadataSchema.nullish(),
  compiled_autograd_graph: EmptyMetadataSchema.nullish(),
  aot_forward_graph: EmptyMetadataSchema.nullish(),
  aot_backward_graph: EmptyMetadataSchema.nullish(),
  aot_inference_graph: EmptyMetadataSchema.nullish(),
  aot_joint_graph: EmptyMetadataSchema.nullish(),
  inductor_pre_grad_graph: EmptyMetadataSchema.nullish(),
  inductor_post_grad_graph: EmptyMetadataSchema.nullish(),
  inductor_output_code: InductorOutputCodeMetadataSchema.nullish(),
  graph_dump: GraphDumpMetadataSchema.nullish(),
  link: LinkMetadataSchema.nullish(),
  artifact: ArtifactMetadataSchema.nullish(),
  dump_file: DumpFileMetadataSchema.nullish(),
  chromium_event: EmptyMetadataSchema.nullish(),
  exported_program: EmptyMetadataSchema.nullish(),

  compilation_metrics: CompilationMetricsMetadataSchema.nullish(),
  bwd_compilation_metrics: BackwardCompilationMetricsMetadataSchema.nullish(),
  aot_autograd_backward_compilation_metrics: BackwardCompilationMetricsMetadataSchema.nullish(),

  symbolic_shape_specialization: SymbolicShapeSpecializationMetadataSchema.nullish(),
  guard_added_fast: GuardAddedFastMetadataSchema.nullish(),
  guard_added: SymbolicGuardMetadataSchema.nullish(),
  propagate_real_tensors_provenance: SymbolicGuardMetadataSchema.nullish(),
  expression_created: SymExprInfoMetadataSchema.nullish(),
  create_unbacked_symbol: UnbackedSymbolMetadataSchema.nullish(),
  missing_fake_kernel: FakeKernelMetadataSchema.nullish(),
  mismatched_fake_kernel: FakeKernelMetadataSchema.nullish(),

  // Recognized but not rendered.
  describe_storage: EmptyMetadataSchema.nullish(),
  describe_tensor: EmptyMetadataSchema.nullish(),
  describe_source: EmptyMetadataSchema.nullish(),
  create_symbol: EmptyMetadataSchema.nullish(),
}).passthrough();

export type Envelope = Readonly<z.infer<typeof EnvelopeSchema>>;

export type EmptyMetadata = z.infer<typeof EmptyMetadataSchema>;
export type CompilationMetricsMetadata = z.infer<typeof CompilationMetricsMetadataSchema>;
export type BackwardCompilationMetricsMetadata = z.infer<typeof BackwardCompilationMetricsMetadataSchema>;
export type SymbolicShapeSpecializationMetadata = z.infer<typeof SymbolicShapeSpecializationMetadataSchema>;
export type GuardAddedFastMetadata = z.infer<typeof GuardAddedFastMetadataSchema>;
export type SymbolicGuardMetadata = z.infer<typeof SymbolicGuardMetadataSchema>;
export type SymExprInfoMetadata = z.infer<typeof SymExprInfoMetadataSchema>;

const KNOWN_ENVELOPE_FIELDS = new Set<string>(EnvelopeSchema.keyof().options);

export function unknownEnvelopeFields(raw: Record<string, unknown>): string[] {
  return Object.keys(raw).filter((key) => !KNOWN_ENVELOPE_FIELDS.has(key));
}
