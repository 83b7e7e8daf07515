import type { CompileId } from "../contracts/compile_id";
import type { Envelope } from "../contracts/envelope";

export type InternResolver = {
  resolve(id: number): string;
};

export type PayloadFormatter = (payload: string) => string;

export type ParserOutput =
  // Per-compile-id file; the path gets a unique `_<seq>` suffix.
  | { kind: "file"; path: string; content: string }
  // Like `file`, without the suffix.
  | { kind: "global_file"; path: string; content: string }
  // Suffixed file whose content is the record's payload.
  | { kind: "payload_file"; path: string }
  // Suffixed file whose content is format(payload).
  | { kind: "payload_reformat_file"; path: string; format: PayloadFormatter }
  // Directory entry pointing elsewhere.
  | { kind: "link"; name: string; url: string };

export type ParserResults = ParserOutput[];

export type ParserArgs<M> = {
  lineno: number;
  metadata: M;
  rank: number | null;
  compileId: CompileId | null;
  /** Continuation payload; empty string when the record has none. */
  payload: string;
  strings: InternResolver;
};

/**
 * A predicate/handler pair. `getMetadata` picks this parser's field out of
 * the envelope (undefined = not applicable); `parse` turns it into outputs.
 */
export interface StructuredLogParser<M> {
  name: string;
  getMetadata(envelope: Envelope): M | undefined;
  parse(args: ParserArgs<M>): ParserResults;
}

export type ParserCallArgs = Omit<ParserArgs<unknown>, "metadata">;

export type BoundParser = (args: ParserCallArgs) => ParserResults;

/** Type-erased registry entry; the metadata type stays inside the closure. */
export type ParserEntry = {
  name: string;
  bind(envelope: Envelope): BoundParser | null;
};

export function defineParser<M>(parser: StructuredLogParser<M>): ParserEntry {
  return {
    name: parser.name,
    bind(envelope) {
      const metadata = parser.getMetadata(envelope);
      if (metadata === undefined || metadata === null) return null;
      return (args) => parser.parse({ ...args, metadata });
    },
  };
}
