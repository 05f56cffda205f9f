import type { Span } from "./tokens.js";

/**
 * Lexing or item-level parse failure. Carries the 1-based position of the
 * offending token; the message itself has no location so callers can prefix
 * it with the file name.
 */
export class RustSyntaxError extends Error {
  readonly line: number;
  readonly column: number;
  readonly offset: number;

  constructor(message: string, span: Pick<Span, "start" | "line" | "column">) {
    super(message);
    this.name = "RustSyntaxError";
    this.line = span.line;
    this.column = span.column;
    this.offset = span.start;
  }
}
