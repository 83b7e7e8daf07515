import { posix } from "node:path";

import { compileIdKey, formatCompileId, type CompileId } from "../contracts/compile_id";
import { escapeHtml } from "../render/html";

export type CacheStatus = "none" | "hit" | "miss" | "bypass";

export const CACHE_STATUS_SUFFIX: Record<CacheStatus, string> = {
  none: "",
  hit: "✅",
  miss: "❌",
  bypass: "❓",
};

export function cacheStatusForPath(path: string): CacheStatus {
  if (path.includes("cache_miss")) return "miss";
  if (path.includes("cache_hit")) return "hit";
  if (path.includes("cache_bypass")) return "bypass";
  return "none";
}

export type OutputFile = {
  url: string;
  name: string;
  number: number;
  status: CacheStatus;
  readableUrl: string | null;
};

export type ParseOutputEntry = { path: string; content: string };

export type CompileDirectoryBucket = {
  compileId: CompileId | null;
  files: OutputFile[];
};

export type CompileDirectoryJson = Record<
  string,
  {
    artifacts: Array<{
      url: string;
      name: string;
      number: number;
      suffix: string;
      readable_url: string | null;
    }>;
  }
>;

/**
 * Compile id → artifacts, both in first-seen order. Callers pass normalized
 * ids; records without an id share the `null` bucket.
 */
export class CompileDirectory {
  private readonly buckets = new Map<string, CompileDirectoryBucket>();

  bucket(compileId: CompileId | null): OutputFile[] {
    const key = compileIdKey(compileId);
    let entry = this.buckets.get(key);
    if (!entry) {
      entry = { compileId, files: [] };
      this.buckets.set(key, entry);
    }
    return entry.files;
  }

  hasUnknown(): boolean {
    return this.buckets.has(compileIdKey(null));
  }

  entries(): CompileDirectoryBucket[] {
    return Array.from(this.buckets.values());
  }

  allFiles(): OutputFile[] {
    return this.entries().flatMap((entry) => entry.files);
  }

  toJSON(): CompileDirectoryJson {
    const json: CompileDirectoryJson = {};
    for (const { compileId, files } of this.buckets.values()) {
      const key = compileId === null ? "unknown" : formatCompileId(compileId);
      json[key] = {
        artifacts: files.map((file) => ({
          url: file.url,
          // Leading directories are already in the url.
          name: file.name.split("/").pop() ?? file.name,
          number: file.number,
          suffix: CACHE_STATUS_SUFFIX[file.status],
          readable_url: file.readableUrl,
        })),
      };
    }
    return json;
  }
}

/** `dir/stem.ext` → `dir/stem_<n>.ext`. */
export function addUniqueSuffix(rawPath: string, sequence: number): string {
  const parsed = posix.parse(rawPath);
  if (!parsed.name) return rawPath;
  return posix.join(parsed.dir, `${parsed.name}_${sequence}${parsed.ext}`);
}

const STACK_TRACES_PREFIX = "inductor_provenance_tracking_kernel_stack_traces";

function isStackTracesFile(path: string): boolean {
  const base = posix.basename(path);
  return base.startsWith(STACK_TRACES_PREFIX) && base.endsWith(".json");
}

function renderStackTracesHtml(jsonContent: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonContent);
  } catch {
    return null;
  }
  let html = "<html><body>\n";
  if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
    for (const [kernel, traces] of Object.entries(parsed)) {
      html += `<h3>${escapeHtml(kernel)}</h3>\n`;
      if (!Array.isArray(traces)) continue;
      for (const trace of traces) {
        if (typeof trace !== "string") continue;
        // Traces carry literal "\n" sequences.
        const decoded = trace.replace(/\\n/g, "\n").replace(/\n+$/, "");
        html += `<pre>${escapeHtml(decoded)}</pre>\n`;
      }
    }
  }
  html += "</body></html>\n";
  return html;
}

/**
 * Collects a pass's output files and hands out the pass-wide sequence
 * numbers used for unique suffixes and artifact identity.
 */
export class ArtifactSink {
  readonly outputs: ParseOutputEntry[] = [];
  private sequence = 0;

  get nextSequence(): number {
    return this.sequence;
  }

  /** Raw output with no directory entry and no sequence number. */
  push(path: string, content: string): void {
    this.outputs.push({ path, content });
  }

  addFile(bucket: OutputFile[], path: string, content: string): OutputFile {
    this.outputs.push({ path, content });

    let readableUrl: string | null = null;
    if (isStackTracesFile(path)) {
      const html = renderStackTracesHtml(content);
      if (html !== null) {
        const parsed = posix.parse(path);
        readableUrl = posix.join(parsed.dir, `${parsed.name}_readable.html`);
        this.outputs.push({ path: readableUrl, content: html });
        this.sequence += 1;
      }
    }

    const file: OutputFile = {
      url: path,
      name: path,
      number: this.sequence,
      status: cacheStatusForPath(path),
      readableUrl,
    };
    bucket.push(file);
    this.sequence += 1;
    return file;
  }

  addUniqueFile(bucket: OutputFile[], rawPath: string, content: string): OutputFile {
    return this.addFile(bucket, addUniqueSuffix(rawPath, this.sequence), content);
  }

  addLink(bucket: OutputFile[], name: string, url: string): OutputFile {
    const file: OutputFile = {
      url,
      name,
      number: this.sequence,
      status: "none",
      readableUrl: null,
    };
    bucket.push(file);
    this.sequence += 1;
    return file;
  }
}
