import type { FrameSummary, StackSummary } from "../contracts/envelope";
import { escapeHtml } from "../render/html";
import type { InternResolver } from "./parser_interfaces";

const SITE_PACKAGES_MARKERS = ["/site-packages/", "/dist-packages/"];

/** Drops everything up to and including a site-packages directory. */
export function simplifyFilename(filename: string): string {
  for (const marker of SITE_PACKAGES_MARKERS) {
    const index = filename.lastIndexOf(marker);
    if (index >= 0) return filename.slice(index + marker.length);
  }
  return filename;
}

export function frameFilename(frame: FrameSummary, strings: InternResolver): string {
  return frame.uninterned_filename ?? strings.resolve(frame.filename);
}

export function formatFrame(frame: FrameSummary, strings: InternResolver): string {
  return `${simplifyFilename(frameFilename(frame, strings))}:${frame.line} in ${frame.name}`;
}

/** Escaped `<li>` body for one frame, with its source line when present. */
export function renderFrame(frame: FrameSummary, strings: InternResolver): string {
  const loc = frame.loc ? `<br><code>${escapeHtml(frame.loc)}</code>` : "";
  return `${escapeHtml(formatFrame(frame, strings))}${loc}`;
}

const CONVERT_FRAME_FILENAME = "torch/_dynamo/convert_frame.py";
const CONVERT_FRAME_SUFFIXES: ReadonlyArray<readonly string[]> = [
  ["catch_errors", "_convert_frame", "_convert_frame_assert"],
  ["__call__", "__call__", "__call__"],
];

/** Drops the trailing frame-conversion wrapper frames from a compile's start stack. */
export function withoutConvertFrameSuffix(stack: StackSummary, strings: InternResolver): StackSummary {
  let frames = stack;
  for (const names of CONVERT_FRAME_SUFFIXES) {
    const start = frames.length - names.length;
    if (start < 0) continue;
    const suffix = frames.slice(start);
    const matches = suffix.every(
      (frame, i) =>
        frame.name === names[i] && simplifyFilename(frameFilename(frame, strings)) === CONVERT_FRAME_FILENAME,
    );
    if (matches) frames = frames.slice(0, start);
  }
  return frames;
}

export function formatStack(
  stack: StackSummary | null | undefined,
  caption: string,
  strings: InternResolver,
  open = false,
): string {
  if (!stack || stack.length === 0) return "";
  const items = stack.map((frame) => `<li>${renderFrame(frame, strings)}</li>`).join("\n");
  return `<details${open ? " open" : ""}><summary>${escapeHtml(caption)}</summary>\n<ul>\n${items}\n</ul>\n</details>`;
}
