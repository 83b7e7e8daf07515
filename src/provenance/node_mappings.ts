import { z } from "zod";

const NodeMappingsSchema = z.object({
  version: z.number().optional(),
  preToPost: z.record(z.unknown()).optional(),
  postToPre: z.record(z.unknown()).optional(),
  cppCodeToPost: z.record(z.unknown()).optional(),
  postToCppCode: z.record(z.unknown()).optional(),
}).passthrough();

type NodeMapping = Record<string, unknown>;

/** Line number (as string key) → target line numbers. */
export type LineMapping = Record<string, number[]>;

export type ProvenanceLineMappings = {
  preToPost: LineMapping;
  postToPre: LineMapping;
  pyCodeToPost: LineMapping;
  postToPyCode: LineMapping;
  cppCodeToPost: LineMapping;
  postToCppCode: LineMapping;
};

export type ProvenanceSources = {
  nodeMappings: string;
  preGradGraph: string;
  postGradGraph: string;
  outputCode: string;
  aotWrapperCode: string;
};

const splitLines = (text: string): string[] => (text === "" ? [] : text.split(/\r?\n/));

function isCodeLine(line: string, commentPrefix: string): boolean {
  const stripped = line.trim();
  return stripped.length > 0 && !stripped.startsWith(commentPrefix);
}

/** `name: type = op(...)` → `name`. */
export function extractNodeName(line: string): string | null {
  const trimmed = line.trim();
  if (!isCodeLine(trimmed, "#")) return null;
  const name = trimmed.split("=")[0].split(":")[0].trim();
  return name.length > 0 ? name : null;
}

/** Node name → 1-based line of its last definition. */
export function nodeLineIndex(graph: string): Map<string, number> {
  const index = new Map<string, number>();
  splitLines(graph).forEach((line, i) => {
    const name = extractNodeName(line);
    if (name !== null) index.set(name, i + 1);
  });
  return index;
}

function dropLeadingEmptyLines(text: string): string[] {
  const lines = splitLines(text);
  const first = lines.findIndex((line) => line.length > 0);
  return first < 0 ? [] : lines.slice(first);
}

function firstIndexOrZero(lines: string[], predicate: (line: string) => boolean): number {
  const index = lines.findIndex(predicate);
  return index < 0 ? 0 : index;
}

function pureKernelName(kernelName: string): string {
  const colon = kernelName.indexOf(":");
  return colon < 0 ? kernelName : kernelName.slice(0, colon);
}

function pushLine(index: Map<string, number[]>, key: string, line: number): void {
  const lines = index.get(key);
  if (lines) {
    lines.push(line);
  } else {
    index.set(key, [line]);
  }
}

/**
 * Kernel name → lines of the Python output code that launch it, counted from
 * the `# AOT ID:` header. A name with a `:<handle>` suffix maps to the first
 * launch after its handle; otherwise to every line mentioning the kernel.
 */
export function pythonKernelLineIndex(code: string, kernelNames: string[]): Map<string, number[]> {
  const lines = dropLeadingEmptyLines(code);
  const index = new Map<string, number[]>();
  const callLine = firstIndexOrZero(
    lines,
    (line) => line.includes("def") && line.includes("call") && line.includes("(args)"),
  );
  const headerLine = firstIndexOrZero(lines, (line) => line.includes("# AOT ID:"));

  for (const kernelName of kernelNames) {
    const pure = pureKernelName(kernelName);
    let found = false;
    if (kernelName.includes(":")) {
      const handleLine = lines.findIndex((line, i) => i >= callLine && line.includes(kernelName));
      if (handleLine >= 0) {
        const launch = lines.findIndex((line, j) => j > handleLine && line.includes(pure));
        if (launch >= 0) {
          pushLine(index, kernelName, launch + 1 - headerLine);
          found = true;
        }
      }
    }
    if (!found) {
      lines.forEach((line, i) => {
        if (i >= callLine && line.includes(pure)) pushLine(index, kernelName, i + 1 - headerLine);
      });
    }
  }
  return index;
}

/** Like the Python index, over AOT wrapper code starting at `::run_impl(`. */
export function cppKernelLineIndex(code: string, kernelNames: string[]): Map<string, number[]> {
  const lines = dropLeadingEmptyLines(code);
  const index = new Map<string, number[]>();
  const runImplLine = firstIndexOrZero(lines, (line) => line.includes("::run_impl("));

  for (const kernelName of kernelNames) {
    const pure = pureKernelName(kernelName);
    let found = false;
    if (kernelName.includes(":")) {
      for (let i = runImplLine; i < lines.length && !found; i++) {
        const line = lines[i];
        if (!isCodeLine(line, "def") || !isCodeLine(line, "static inline void") || !line.includes(kernelName)) {
          continue;
        }
        const launch = lines.findIndex((candidate, j) => j > i && candidate.includes(pure));
        if (launch >= 0) {
          pushLine(index, kernelName, launch + 1);
          found = true;
        }
      }
    }
    if (!found) {
      lines.forEach((line, i) => {
        if (i >= runImplLine && line.includes(pure)) pushLine(index, kernelName, i + 1);
      });
    }
  }
  return index;
}

const stringEntries = (value: unknown): string[] =>
  Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === "string") : [];

function mapNodes(
  mapping: NodeMapping | undefined,
  source: Map<string, number>,
  target: Map<string, number>,
): LineMapping {
  const result: LineMapping = {};
  for (const [sourceNode, targetNodes] of Object.entries(mapping ?? {})) {
    const sourceLine = source.get(sourceNode);
    if (sourceLine === undefined) continue;
    const targetLines = stringEntries(targetNodes).flatMap((node) => {
      const line = target.get(node);
      return line === undefined ? [] : [line];
    });
    if (targetLines.length > 0) result[String(sourceLine)] = targetLines;
  }
  return result;
}

function mapKernelsToNodes(
  mapping: NodeMapping | undefined,
  kernels: Map<string, number[]>,
  nodes: Map<string, number>,
): LineMapping {
  const result: LineMapping = {};
  for (const [kernelName, postNodes] of Object.entries(mapping ?? {})) {
    const targetLines = stringEntries(postNodes).flatMap((node) => {
      const line = nodes.get(node);
      return line === undefined ? [] : [line];
    });
    if (targetLines.length === 0) continue;
    for (const kernelLine of kernels.get(kernelName) ?? []) {
      result[String(kernelLine)] = targetLines;
    }
  }
  return result;
}

function mapNodesToKernels(
  mapping: NodeMapping | undefined,
  nodes: Map<string, number>,
  kernels: Map<string, number[]>,
): LineMapping {
  const result: LineMapping = {};
  for (const [postNode, kernelNames] of Object.entries(mapping ?? {})) {
    const postLine = nodes.get(postNode);
    if (postLine === undefined) continue;
    const targetLines = stringEntries(kernelNames).flatMap((name) => kernels.get(name) ?? []);
    if (targetLines.length > 0) result[String(postLine)] = targetLines;
  }
  return result;
}

/**
 * Converts node-level provenance mappings into line-number mappings between
 * the graph dumps and generated code. Unparseable mappings yield `{}`.
 */
export function convertNodeMappingsToLineNumbers(
  sources: ProvenanceSources,
): ProvenanceLineMappings | Record<string, never> {
  let raw: unknown;
  try {
    raw = JSON.parse(sources.nodeMappings);
  } catch {
    return {};
  }
  const parsed = NodeMappingsSchema.safeParse(raw);
  if (!parsed.success) return {};
  const mappings = parsed.data;

  const kernelNames = Object.keys(mappings.cppCodeToPost ?? {});
  const pre = nodeLineIndex(sources.preGradGraph);
  const post = nodeLineIndex(sources.postGradGraph);
  const pyKernels = pythonKernelLineIndex(sources.outputCode, kernelNames);
  const cppKernels = cppKernelLineIndex(sources.aotWrapperCode, kernelNames);

  return {
    preToPost: mapNodes(mappings.preToPost, pre, post),
    postToPre: mapNodes(mappings.postToPre, post, pre),
    pyCodeToPost: mapKernelsToNodes(mappings.cppCodeToPost, pyKernels, post),
    postToPyCode: mapNodesToKernels(mappings.postToCppCode, post, pyKernels),
    cppCodeToPost: mapKernelsToNodes(mappings.cppCodeToPost, cppKernels, post),
    postToCppCode: mapNodesToKernels(mappings.postToCppCode, post, cppKernels),
  };
}

const PRE_GRAD_PATTERNS = ["before_pre_grad_graph", "inductor_pre_grad_graph"];
const POST_GRAD_PATTERNS = ["after_post_grad_graph", "inductor_post_grad_graph"];

/**
 * Latest output under `<dir>/` whose path contains `<dir>/<pattern>`, trying
 * patterns in order; empty when none.
 */
export function findDirectoryContent(
  outputs: ReadonlyArray<{ path: string; content: string }>,
  directoryName: string,
  patterns: string[],
): string {
  for (const pattern of patterns) {
    const needle = `${directoryName}/${pattern}`;
    for (let i = outputs.length - 1; i >= 0; i--) {
      if (outputs[i].path.includes(needle)) return outputs[i].content;
    }
  }
  return "";
}

export function provenanceSourcesFor(
  outputs: ReadonlyArray<{ path: string; content: string }>,
  directoryName: string,
): ProvenanceSources {
  return {
    nodeMappings: findDirectoryContent(outputs, directoryName, ["inductor_provenance_tracking_node_mappings"]),
    preGradGraph: findDirectoryContent(outputs, directoryName, PRE_GRAD_PATTERNS),
    postGradGraph: findDirectoryContent(outputs, directoryName, POST_GRAD_PATTERNS),
    outputCode: findDirectoryContent(outputs, directoryName, ["inductor_output_code"]),
    aotWrapperCode: findDirectoryContent(outputs, directoryName, ["inductor_aot_wrapper_code"]),
  };
}
