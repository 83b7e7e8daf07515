import { z } from "zod";

const OptionalId = z.number().int().min(0).nullish();

export const CompileIdSchema = z.object({
  frame_id: OptionalId,
  frame_compile_id: OptionalId,
  attempt: OptionalId,
  compiled_autograd_id: OptionalId,
});

export type CompileIdInput = z.infer<typeof CompileIdSchema>;

/**
 * Identifies one compilation attempt inside a rank. Every part is optional in
 * the log; absent parts are `null` here.
 */
export type CompileId = {
  readonly frameId: number | null;
  readonly frameCompileId: number | null;
  readonly attempt: number | null;
  readonly compiledAutogradId: number | null;
};

export function compileIdFromInput(input: CompileIdInput): CompileId {
  return {
    frameId: input.frame_id ?? null,
    frameCompileId: input.frame_compile_id ?? null,
    attempt: input.attempt ?? null,
    compiledAutogradId: input.compiled_autograd_id ?? null,
  };
}

/**
 * Runtime compile ids sometimes omit the attempt; those collapse into
 * attempt 0. Applying this twice yields the same id.
 */
export function normalizeCompileId(id: CompileId): CompileId {
  if (id.frameCompileId !== null && id.attempt === null) {
    return { ...id, attempt: 0 };
  }
  return id;
}

const part = (value: number | null): string => (value === null ? "-" : String(value));

/** Human-readable form, e.g. `[0/1]`, `[0/1_2]`, `[!3/0/1]`. */
export function formatCompileId(id: CompileId): string {
  const autograd = id.compiledAutogradId === null ? "" : `!${id.compiledAutogradId}/`;
  const attempt = id.attempt !== null && id.attempt !== 0 ? `_${id.attempt}` : "";
  return `[${autograd}${part(id.frameId)}/${part(id.frameCompileId)}${attempt}]`;
}

/** Directory form, e.g. `-_0_1_0`. */
export function compileIdDirectoryName(id: CompileId): string {
  return [id.compiledAutogradId, id.frameId, id.frameCompileId, id.attempt].map(part).join("_");
}

/** Stable map key; two ids are the same bucket iff their keys are equal. */
export function compileIdKey(id: CompileId | null): string {
  return id === null ? "unknown" : compileIdDirectoryName(id);
}

export function compileIdDirForLine(id: CompileId | null, lineno: number): string {
  return id === null ? `unknown_${lineno}` : compileIdDirectoryName(id);
}
