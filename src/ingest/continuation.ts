import { createHash } from "node:crypto";

export type NumberedLine = { lineno: number; text: string };

/**
 * Peekable cursor over the non-empty physical lines of a log. Line numbers
 * are 1-based and count skipped blank lines.
 */
export class LineCursor {
  private readonly lines: NumberedLine[] = [];
  private position = 0;

  constructor(text: string) {
    const raw = text.split(/\r?\n/);
    for (let i = 0; i < raw.length; i++) {
      if (raw[i].length === 0) continue;
      this.lines.push({ lineno: i + 1, text: raw[i] });
    }
  }

  next(): NumberedLine | null {
    if (this.position >= this.lines.length) return null;
    return this.lines[this.position++];
  }

  nextIf(predicate: (line: NumberedLine) => boolean): NumberedLine | null {
    const candidate = this.lines[this.position];
    if (!candidate || !predicate(candidate)) return null;
    this.position++;
    return candidate;
  }
}

/**
 * Consumes the tab-prefixed lines that follow a `has_payload` record. Lines
 * are joined with "\n" and no newline follows the last one.
 */
export function readContinuationPayload(cursor: LineCursor): string {
  const parts: string[] = [];
  let line = cursor.nextIf((candidate) => candidate.text.startsWith("\t"));
  while (line) {
    parts.push(line.text.slice(1));
    line = cursor.nextIf((candidate) => candidate.text.startsWith("\t"));
  }
  return parts.join("\n");
}

const MD5_HEX_PATTERN = /^[0-9a-f]{32}$/;

export function payloadDigest(payload: string): Buffer {
  return createHash("md5").update(payload, "utf8").digest();
}

/**
 * True when `expectedHex` is a lowercase 32-digit hex MD5 equal to the digest
 * of the payload. An undecodable expectation never matches.
 */
export function payloadMatchesDigest(payload: string, expectedHex: string): boolean {
  if (!MD5_HEX_PATTERN.test(expectedHex)) return false;
  return Buffer.from(expectedHex, "hex").equals(payloadDigest(payload));
}
