import { compileIdDirForLine, type CompileId } from "../contracts/compile_id";
import type { ParserResults, PayloadFormatter } from "./parser_interfaces";

export function buildFilePath(filename: string, lineno: number, compileId: CompileId | null): string {
  return `${compileIdDirForLine(compileId, lineno)}/${filename}`;
}

export function simpleFileOutput(
  filename: string,
  lineno: number,
  compileId: CompileId | null,
  content: string,
): ParserResults {
  return [{ kind: "file", path: buildFilePath(filename, lineno, compileId), content }];
}

export function payloadFileOutput(
  filename: string,
  lineno: number,
  compileId: CompileId | null,
): ParserResults {
  return [{ kind: "payload_file", path: buildFilePath(filename, lineno, compileId) }];
}

export function payloadReformatFileOutput(
  filename: string,
  lineno: number,
  compileId: CompileId | null,
  format: PayloadFormatter,
): ParserResults {
  return [{ kind: "payload_reformat_file", path: buildFilePath(filename, lineno, compileId), format }];
}

/** Pretty-prints JSON payloads; anything unparseable passes through unchanged. */
export function formatJsonPretty(payload: string): string {
  try {
    return JSON.stringify(JSON.parse(payload), null, 2);
  } catch {
    return payload;
  }
}
