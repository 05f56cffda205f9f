import { RustSyntaxError } from "./errors.js";
import type { Delimiter, LiteralToken, Span, TokenTree } from "./tokens.js";

const IDENT_START = /[\p{XID_Start}_]/u;
const IDENT_CONTINUE = /\p{XID_Continue}/u;
const ASCII_ALNUM = /[0-9A-Za-z_]/;
const PUNCT = new Set("~!@#$%^&*-+=|:;,.<>?/");

const OPEN: Partial<Record<string, Delimiter>> = { "(": "paren", "[": "bracket", "{": "brace" };
const CLOSE: Partial<Record<string, Delimiter>> = { ")": "paren", "]": "bracket", "}": "brace" };

interface Frame {
  readonly delimiter: Delimiter;
  readonly open: Span;
  readonly stream: TokenTree[];
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9";
}

function isWhitespace(ch: string): boolean {
  // Rust's Pattern_White_Space: ASCII whitespace plus NEL, LRM, RLM, LS and PS.
  return /\s/u.test(ch) || ch === "\u0085" || ch === "\u200E" || ch === "\u200F";
}

/**
 * Lexer for Rust source text.
 *
 * Produces nested token trees (see tokens.ts). Comments, doc comments and
 * whitespace are dropped. Malformed input (unterminated literals or comments,
 * unbalanced delimiters, characters that cannot start a token) throws
 * RustSyntaxError.
 */
export class Lexer {
  private readonly source: string;
  private readonly length: number;
  private readonly lineStarts: readonly number[];
  private index = 0;

  constructor(source: string) {
    this.source = source;
    this.length = source.length;
    this.lineStarts = computeLineStarts(source);
  }

  tokenize(): TokenTree[] {
    const root: TokenTree[] = [];
    const stack: Frame[] = [];
    const current = (): TokenTree[] => stack[stack.length - 1]?.stream ?? root;

    this.index = 0;
    this.skipShebang();

    for (;;) {
      this.skipTrivia();
      if (this.index >= this.length) break;

      const ch = this.source[this.index];
      const open = OPEN[ch];
      if (open) {
        stack.push({ delimiter: open, open: this.span(this.index, this.index + 1), stream: [] });
        this.index++;
        continue;
      }

      const close = CLOSE[ch];
      if (close) {
        const frame = stack.pop();
        if (!frame) {
          throw this.error(`unexpected closing delimiter \`${ch}\``, this.index);
        }
        if (frame.delimiter !== close) {
          throw this.error(`mismatched closing delimiter \`${ch}\``, this.index);
        }
        this.index++;
        current().push({
          kind: "group",
          delimiter: frame.delimiter,
          stream: frame.stream,
          span: { ...frame.open, end: this.index },
        });
        continue;
      }

      current().push(this.readToken());
    }

    const unclosed = stack[stack.length - 1];
    if (unclosed) {
      throw new RustSyntaxError("this file contains an unclosed delimiter", unclosed.open);
    }
    return root;
  }

  /** 1-based line/column for an offset. */
  locate(offset: number): { line: number; column: number } {
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.lineStarts[mid] <= offset) low = mid;
      else high = mid - 1;
    }
    return { line: low + 1, column: offset - this.lineStarts[low] + 1 };
  }

  private span(start: number, end: number): Span {
    return { start, end, ...this.locate(start) };
  }

  private error(message: string, offset: number): RustSyntaxError {
    return new RustSyntaxError(message, this.span(offset, offset));
  }

  private skipShebang(): void {
    if (!this.source.startsWith("#!") || /^#!\s*\[/.test(this.source)) return;
    const newline = this.source.indexOf("\n");
    this.index = newline === -1 ? this.length : newline;
  }

  private skipTrivia(): void {
    while (this.index < this.length) {
      const ch = this.source[this.index];
      if (isWhitespace(ch)) {
        this.index++;
      } else if (this.source.startsWith("//", this.index)) {
        const newline = this.source.indexOf("\n", this.index);
        this.index = newline === -1 ? this.length : newline;
      } else if (this.source.startsWith("/*", this.index)) {
        this.skipBlockComment();
      } else {
        return;
      }
    }
  }

  private skipBlockComment(): void {
    const start = this.index;
    let depth = 0;
    while (this.index < this.length) {
      if (this.source.startsWith("/*", this.index)) {
        depth++;
        this.index += 2;
      } else if (this.source.startsWith("*/", this.index)) {
        depth--;
        this.index += 2;
        if (depth === 0) return;
      } else {
        this.index++;
      }
    }
    throw this.error("unterminated block comment", start);
  }

  private readToken(): TokenTree {
    const start = this.index;
    const ch = this.source[start];

    if (ch === '"') return this.readString(start, start);
    if (ch === "'") return this.readQuote(start);
    if (isDigit(ch)) return this.readNumber(start);

    const prefixed = this.readPrefixed(start);
    if (prefixed) return prefixed;

    if (this.isIdentStartAt(start)) {
      const end = this.identEnd(start);
      return { kind: "ident", text: this.source.slice(start, end), raw: false, span: this.advance(start, end) };
    }

    if (PUNCT.has(ch)) {
      return { kind: "punct", char: ch, span: this.advance(start, start + 1) };
    }

    throw this.error(`unknown start of token \`${String.fromCodePoint(this.source.codePointAt(start) ?? 0)}\``, start);
  }

  /** Raw identifiers and literals introduced by `r`, `b`, `c`, `br` or `cr`. */
  private readPrefixed(start: number): TokenTree | null {
    const src = this.source;

    if (src[start] === "r" && src[start + 1] === "#" && this.isIdentStartAt(start + 2)) {
      const end = this.identEnd(start + 2);
      return { kind: "ident", text: src.slice(start + 2, end), raw: true, span: this.advance(start, end) };
    }

    let quote = start;
    if (src.startsWith("br", start) || src.startsWith("cr", start)) quote = start + 2;
    else if (src[start] === "r") quote = start + 1;
    if (quote !== start) {
      let hashes = 0;
      while (src[quote + hashes] === "#") hashes++;
      if (src[quote + hashes] === '"') {
        return this.readRawString(start, quote + hashes, hashes);
      }
    }

    if ((src[start] === "b" || src[start] === "c") && src[start + 1] === '"') {
      return this.readString(start, start + 1);
    }
    if (src[start] === "b" && src[start + 1] === "'") {
      return this.readCharLiteral(start, start + 1);
    }
    return null;
  }

  private readString(start: number, quote: number): LiteralToken {
    let i = quote + 1;
    for (;;) {
      if (i >= this.length) throw this.error("unterminated double quote string", start);
      const c = this.source[i];
      if (c === "\\") {
        i += 2;
      } else if (c === '"') {
        i++;
        break;
      } else {
        i++;
      }
    }
    return this.literal(start, this.suffixEnd(i));
  }

  private readRawString(start: number, quote: number, hashes: number): LiteralToken {
    const terminator = `"${"#".repeat(hashes)}`;
    const close = this.source.indexOf(terminator, quote + 1);
    if (close === -1) throw this.error("unterminated raw string", start);
    return this.literal(start, this.suffixEnd(close + terminator.length));
  }

  private readQuote(start: number): TokenTree {
    const next = this.source[start + 1];
    if (next === "\\") return this.readCharLiteral(start, start);

    const cp = this.source.codePointAt(start + 1);
    if (cp === undefined) throw this.error("unterminated character literal", start);
    const width = cp > 0xffff ? 2 : 1;
    if (this.source[start + 1 + width] === "'") {
      return this.literal(start, this.suffixEnd(start + 2 + width));
    }

    if (this.isIdentStartAt(start + 1)) {
      const end = this.identEnd(start + 1);
      return { kind: "lifetime", name: this.source.slice(start + 1, end), span: this.advance(start, end) };
    }
    throw this.error("unterminated character literal", start);
  }

  private readCharLiteral(start: number, quote: number): LiteralToken {
    let i = quote + 1;
    for (;;) {
      const c = this.source[i];
      if (i >= this.length || c === "\n") throw this.error("unterminated character literal", start);
      if (c === "\\") {
        i += 2;
      } else if (c === "'") {
        i++;
        break;
      } else {
        i++;
      }
    }
    return this.literal(start, this.suffixEnd(i));
  }

  private readNumber(start: number): LiteralToken {
    const hex = /^0[xX]/.test(this.source.slice(start, start + 2));
    let i = this.numberPartEnd(start, hex);
    if (this.source[i] === "." && isDigit(this.source[i + 1])) {
      i = this.numberPartEnd(i + 1, hex);
    }
    return this.literal(start, i);
  }

  private numberPartEnd(from: number, hex: boolean): number {
    let i = from;
    while (i < this.length) {
      const c = this.source[i];
      if (ASCII_ALNUM.test(c)) {
        i++;
      } else if ((c === "+" || c === "-") && !hex && /[eE]/.test(this.source[i - 1]) && isDigit(this.source[i + 1])) {
        i++;
      } else {
        break;
      }
    }
    return i;
  }

  private suffixEnd(from: number): number {
    return this.isIdentStartAt(from) ? this.identEnd(from) : from;
  }

  private isIdentStartAt(offset: number): boolean {
    const cp = this.source.codePointAt(offset);
    return cp !== undefined && IDENT_START.test(String.fromCodePoint(cp));
  }

  private identEnd(from: number): number {
    let i = from;
    while (i < this.length) {
      const cp = this.source.codePointAt(i);
      if (cp === undefined || !IDENT_CONTINUE.test(String.fromCodePoint(cp))) break;
      i += cp > 0xffff ? 2 : 1;
    }
    return i;
  }

  private literal(start: number, end: number): LiteralToken {
    return { kind: "literal", text: this.source.slice(start, end), span: this.advance(start, end) };
  }

  private advance(start: number, end: number): Span {
    this.index = end;
    return this.span(start, end);
  }
}

function computeLineStarts(source: string): number[] {
  const starts = [0];
  for (let i = 0; i < source.length; i++) {
    if (source.charCodeAt(i) === 10) starts.push(i + 1);
  }
  return starts;
}

/** Tokenize Rust source into token trees. */
export function tokenize(source: string): TokenTree[] {
  return new Lexer(source).tokenize();
}
