/**
 * Token trees produced by the Rust lexer.
 *
 * Delimited groups are kept nested (a `group` owns its inner stream), which
 * is all the item parser needs: it never looks inside expressions, only at
 * item keywords, names, attributes and the braces that open nested scopes.
 */

export type Delimiter = "paren" | "bracket" | "brace";

/**
 * Source location of a token.
 *
 * - `start`/`end` : UTF-16 offsets, end exclusive
 * - `line`/`column` : 1-based position of `start`
 */
export interface Span {
  readonly start: number;
  readonly end: number;
  readonly line: number;
  readonly column: number;
}

export interface IdentToken {
  readonly kind: "ident";
  /** Identifier text without the `r#` prefix of raw identifiers. */
  readonly text: string;
  readonly raw: boolean;
  readonly span: Span;
}

export interface PunctToken {
  readonly kind: "punct";
  readonly char: string;
  readonly span: Span;
}

export interface LiteralToken {
  readonly kind: "literal";
  /** Literal source text, including quotes, prefixes and suffixes. */
  readonly text: string;
  readonly span: Span;
}

export interface LifetimeToken {
  readonly kind: "lifetime";
  /** Lifetime or label name without the leading quote. */
  readonly name: string;
  readonly span: Span;
}

export interface GroupToken {
  readonly kind: "group";
  readonly delimiter: Delimiter;
  readonly stream: readonly TokenTree[];
  /** Covers the opening delimiter through the closing one. */
  readonly span: Span;
}

export type TokenTree = IdentToken | PunctToken | LiteralToken | LifetimeToken | GroupToken;

export function isIdent(token: TokenTree | undefined, text?: string): token is IdentToken {
  return token?.kind === "ident" && (text === undefined || (token.text === text && !token.raw));
}

export function isPunct(token: TokenTree | undefined, char?: string): token is PunctToken {
  return token?.kind === "punct" && (char === undefined || token.char === char);
}

export function isGroup(token: TokenTree | undefined, delimiter?: Delimiter): token is GroupToken {
  return token?.kind === "group" && (delimiter === undefined || token.delimiter === delimiter);
}

/** Render a token for error messages. */
export function describeToken(token: TokenTree): string {
  switch (token.kind) {
    case "ident":
      return `\`${token.raw ? "r#" : ""}${token.text}\``;
    case "punct":
      return `\`${token.char}\``;
    case "literal":
      return `literal \`${token.text}\``;
    case "lifetime":
      return `lifetime \`'${token.name}\``;
    case "group":
      return token.delimiter === "paren" ? "`(`" : token.delimiter === "bracket" ? "`[`" : "`{`";
  }
}
