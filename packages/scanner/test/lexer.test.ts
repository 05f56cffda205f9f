import { describe, expect, it } from "vitest";

import { Lexer, RustSyntaxError, tokenize, type TokenTree } from "../src/syntax/index.js";

/** Compact rendering of a token stream for assertions. */
function shape(tokens: readonly TokenTree[]): unknown[] {
  return tokens.map((token) => {
    switch (token.kind) {
      case "ident":
        return token.raw ? `r#${token.text}` : token.text;
      case "punct":
        return token.char;
      case "literal":
        return { literal: token.text };
      case "lifetime":
        return `'${token.name}`;
      case "group":
        return { [token.delimiter]: shape(token.stream) };
    }
  });
}

function syntaxError(source: string): RustSyntaxError {
  try {
    tokenize(source);
  } catch (error) {
    if (error instanceof RustSyntaxError) return error;
    throw error;
  }
  throw new Error("expected tokenize to fail");
}

describe("tokenize", () => {
  it("nests delimited groups", () => {
    expect(shape(tokenize("#[derive(NativeClass)] struct A;"))).toEqual([
      "#",
      { bracket: ["derive", { paren: ["NativeClass"] }] },
      "struct",
      "A",
      ";",
    ]);
  });

  it("records 1-based positions and group spans", () => {
    const [fn, name, params, body] = tokenize("fn main() {\n  x\n}");
    expect(fn.span).toEqual({ start: 0, end: 2, line: 1, column: 1 });
    expect(name.span).toEqual({ start: 3, end: 7, line: 1, column: 4 });
    expect(params.span).toEqual({ start: 7, end: 9, line: 1, column: 8 });
    expect(body.span).toEqual({ start: 10, end: 17, line: 1, column: 11 });
    expect(body.kind === "group" && body.stream[0].span).toEqual({ start: 14, end: 15, line: 2, column: 3 });
  });

  it("skips comments, including nested block comments", () => {
    const tokens = tokenize("// hi\n/* a /* nested */ b */ fn");
    expect(shape(tokens)).toEqual(["fn"]);
    expect(tokens[0].span.line).toBe(2);
    expect(tokens[0].span.column).toBe(24);
  });

  it("skips doc comments", () => {
    expect(shape(tokenize("/// Docs\n//! Crate docs\n/** block */ struct S;"))).toEqual(["struct", "S", ";"]);
  });

  it("skips a shebang line but not an inner attribute", () => {
    const script = tokenize("#!/usr/bin/env run-cargo-script\nfn main() {}");
    expect(shape(script)).toEqual(["fn", "main", { paren: [] }, { brace: [] }]);
    expect(script[0].span.line).toBe(2);

    expect(shape(tokenize("#![allow(dead_code)]"))).toEqual(["#", "!", { bracket: ["allow", { paren: ["dead_code"] }] }]);
  });

  it("reads string, byte, C-string and raw string literals", () => {
    const source = 'r#"a"b"# b"x" c"y" br"z" "esc\\"aped" "s"suffix';
    expect(shape(tokenize(source))).toEqual([
      { literal: 'r#"a"b"#' },
      { literal: 'b"x"' },
      { literal: 'c"y"' },
      { literal: 'br"z"' },
      { literal: '"esc\\"aped"' },
      { literal: '"s"suffix' },
    ]);
  });

  it("tells character literals from lifetimes", () => {
    expect(shape(tokenize("'c' '\\n' b'q' &'a str 'outer: loop"))).toEqual([
      { literal: "'c'" },
      { literal: "'\\n'" },
      { literal: "b'q'" },
      "&",
      "'a",
      "str",
      "'outer",
      ":",
      "loop",
    ]);
  });

  it("reads numbers with fractions, exponents and suffixes", () => {
    expect(shape(tokenize("1.5e-3f64 0xFFu8 1_000 2.0 x.0"))).toEqual([
      { literal: "1.5e-3f64" },
      { literal: "0xFFu8" },
      { literal: "1_000" },
      { literal: "2.0" },
      "x",
      ".",
      { literal: "0" },
    ]);
  });

  it("reads raw identifiers without their prefix", () => {
    const [token] = tokenize("r#type");
    expect(token).toMatchObject({ kind: "ident", text: "type", raw: true });
  });

  it("reads unicode identifiers", () => {
    expect(shape(tokenize("struct Größe;"))).toEqual(["struct", "Größe", ";"]);
  });

  it("reports an unclosed delimiter at its opening position", () => {
    const error = syntaxError("fn a() {");
    expect(error.message).toBe("this file contains an unclosed delimiter");
    expect([error.line, error.column]).toEqual([1, 8]);
  });

  it("reports unexpected and mismatched closing delimiters", () => {
    const stray = syntaxError(")");
    expect(stray.message).toBe("unexpected closing delimiter `)`");
    expect([stray.line, stray.column]).toEqual([1, 1]);

    const mismatched = syntaxError("(]");
    expect(mismatched.message).toBe("mismatched closing delimiter `]`");
    expect(mismatched.column).toBe(2);
  });

  it("reports unterminated strings and comments", () => {
    expect(syntaxError('"abc').message).toBe("unterminated double quote string");
    expect(syntaxError('r#"abc"').message).toBe("unterminated raw string");
    expect(syntaxError("/* x /* y */").message).toBe("unterminated block comment");
  });

  it("reports characters that cannot start a token", () => {
    const error = syntaxError("let x = €;");
    expect(error.message).toBe("unknown start of token `€`");
    expect(error.column).toBe(9);
  });
});

describe("Lexer.locate", () => {
  it("maps offsets to line and column", () => {
    const lexer = new Lexer("ab\ncd\n");
    expect(lexer.locate(0)).toEqual({ line: 1, column: 1 });
    expect(lexer.locate(4)).toEqual({ line: 2, column: 2 });
    expect(lexer.locate(6)).toEqual({ line: 3, column: 1 });
  });
});
