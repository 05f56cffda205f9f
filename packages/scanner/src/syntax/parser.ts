import { RustSyntaxError } from "./errors.js";
import { tokenize } from "./lexer.js";
import type { Attribute, BlockItem, Item, SourceFile } from "./ast.js";
import {
  describeToken,
  isGroup,
  isIdent,
  isPunct,
  type GroupToken,
  type IdentToken,
  type PunctToken,
  type TokenTree,
} from "./tokens.js";

/**
 * Where a token stream sits:
 * - `items`: file, module, impl, trait and extern bodies. Anything that is
 *   not an item is a syntax error.
 * - `block`: function bodies, expressions, struct bodies. Non-item tokens
 *   are skipped, but every nested group is still searched for items.
 */
type ScopeMode = "items" | "block";

interface ParsedScope {
  readonly inner: Attribute[];
  readonly items: Item[];
}

interface ParsedItem {
  readonly item: Item;
  /** Index just past the item's last token. */
  readonly end: number;
}

const AFTER_DEFAULT = new Set(["fn", "impl", "type", "const", "unsafe", "async"]);
const AFTER_CONST = new Set(["fn", "unsafe", "async", "extern"]);

function fail(message: string, token: TokenTree): never {
  throw new RustSyntaxError(message, token.span);
}

/**
 * Item-level parser over token trees.
 *
 * This is deliberately not a full Rust grammar: signatures, types and
 * expressions are skipped as opaque token runs. What it does model exactly
 * is the item structure (names, attributes and the scopes items nest in),
 * which is what declaration discovery needs.
 */
export class ItemParser {
  parseFile(tokens: readonly TokenTree[]): SourceFile {
    const scope = this.parseScope(tokens, "items");
    return { attrs: scope.inner, items: scope.items };
  }

  parseScope(stream: readonly TokenTree[], mode: ScopeMode): ParsedScope {
    const inner: Attribute[] = [];
    const items: Item[] = [];
    let attrs: Attribute[] = [];
    let i = 0;

    while (i < stream.length) {
      const token = stream[i];

      if (isPunct(token, "#")) {
        const next = stream[i + 1];
        const afterBang = stream[i + 2];
        if (isPunct(next, "!") && isGroup(afterBang, "bracket")) {
          inner.push(this.parseAttribute(afterBang, true));
          i += 3;
          continue;
        }
        if (isGroup(next, "bracket")) {
          attrs.push(this.parseAttribute(next, false));
          i += 2;
          continue;
        }
        if (mode === "items") fail("expected `[` after `#`", token);
        attrs = [];
        i++;
        continue;
      }

      const parsed = this.parseItem(stream, i, attrs, mode);
      if (parsed) {
        items.push(parsed.item);
        attrs = [];
        i = parsed.end;
        continue;
      }

      if (isPunct(token, ";")) {
        attrs = [];
        i++;
        continue;
      }

      if (mode === "items") {
        fail(`expected item, found ${describeToken(token)}`, token);
      }

      items.push(...this.collectNested([token]));
      attrs = [];
      i++;
    }

    return { inner, items };
  }

  parseAttribute(group: GroupToken, inner: boolean): Attribute {
    const s = group.stream;
    let k = 0;
    let global = false;
    if (isPunct(s[0], ":") && isPunct(s[1], ":")) {
      global = true;
      k = 2;
    }

    const first = s[k];
    if (!isIdent(first)) fail("expected attribute path", first ?? group);

    const path = [segmentText(first)];
    k++;
    for (;;) {
      const segment = s[k + 2];
      if (!isPunct(s[k], ":") || !isPunct(s[k + 1], ":") || !isIdent(segment)) break;
      path.push(segmentText(segment));
      k += 3;
    }

    return { path, global, tokens: s.slice(k), inner, span: group.span };
  }

  /** Items found inside any group of `tokens`, each group wrapped in a BlockItem. */
  collectNested(tokens: readonly TokenTree[]): BlockItem[] {
    const blocks: BlockItem[] = [];
    for (const token of tokens) {
      if (token.kind !== "group") continue;
      const { items } = this.parseScope(token.stream, "block");
      if (items.length > 0) {
        blocks.push({ kind: "block", attrs: [], span: token.span, items });
      }
    }
    return blocks;
  }

  private parseItem(
    stream: readonly TokenTree[],
    start: number,
    attrs: readonly Attribute[],
    mode: ScopeMode,
  ): ParsedItem | null {
    const span = stream[start].span;
    let j = this.skipVisibility(stream, start);
    j = this.skipQualifiers(stream, j);

    const keyword = stream[j];
    if (!isIdent(keyword)) return null;
    if (keyword.raw) return this.parseMacroCall(stream, j, attrs, span);

    switch (keyword.text) {
      case "struct":
      case "enum": {
        const name = this.expectName(stream, j, mode);
        if (!name) return null;
        const end = this.findTerminator(stream, j + 2, keyword.text === "struct");
        if (end === -1) {
          fail(`expected \`{\`${keyword.text === "struct" ? " or `;`" : ""} after ${keyword.text} \`${name.text}\``, name);
        }
        const children = this.collectNested(stream.slice(j + 2, end + 1));
        const item: Item =
          keyword.text === "struct"
            ? { kind: "struct", name: name.text, attrs, span, children }
            : { kind: "enum", name: name.text, attrs, span, children };
        return { item, end: end + 1 };
      }

      case "union": {
        const name = stream[j + 1];
        const after = stream[j + 2];
        if (!isIdent(name) || !(isGroup(after, "brace") || isPunct(after, "<") || isIdent(after, "where"))) {
          return this.parseMacroCall(stream, j, attrs, span);
        }
        const end = this.findTerminator(stream, j + 2, false);
        if (end === -1) fail(`expected \`{\` after union \`${name.text}\``, name);
        const children = this.collectNested(stream.slice(j + 2, end + 1));
        return { item: { kind: "union", name: name.text, attrs, span, children }, end: end + 1 };
      }

      case "mod": {
        const name = this.expectName(stream, j, mode);
        if (!name) return null;
        const body = stream[j + 2];
        if (isPunct(body, ";")) {
          return { item: { kind: "mod", name: name.text, attrs, span, innerAttrs: [], items: null }, end: j + 3 };
        }
        if (!isGroup(body, "brace")) fail(`expected \`{\` or \`;\` after mod \`${name.text}\``, name);
        const scope = this.parseScope(body.stream, "items");
        return {
          item: { kind: "mod", name: name.text, attrs, span, innerAttrs: scope.inner, items: scope.items },
          end: j + 3,
        };
      }

      case "impl": {
        const end = this.findTerminator(stream, j + 1, false);
        const body = stream[end];
        if (end === -1 || !isGroup(body, "brace")) {
          if (mode === "block") return null;
          fail("expected `{` after impl header", keyword);
        }
        const scope = this.parseScope(body.stream, "items");
        return { item: { kind: "impl", attrs, span, items: scope.items }, end: end + 1 };
      }

      case "trait": {
        const name = this.expectName(stream, j, mode);
        if (!name) return null;
        const end = this.findTerminator(stream, j + 2, true);
        if (end === -1) fail(`expected \`{\` after trait \`${name.text}\``, name);
        const body = stream[end];
        const items = isGroup(body, "brace") ? this.parseScope(body.stream, "items").items : [];
        return { item: { kind: "trait", name: name.text, attrs, span, items }, end: end + 1 };
      }

      case "fn": {
        const name = this.expectName(stream, j, mode);
        if (!name) return null;
        const end = this.findTerminator(stream, j + 2, true);
        if (end === -1) fail(`expected \`{\` or \`;\` after signature of fn \`${name.text}\``, name);
        const body = stream[end];
        return {
          item: {
            kind: "fn",
            name: name.text,
            attrs,
            span,
            body: isGroup(body, "brace") ? this.parseScope(body.stream, "block").items : null,
          },
          end: end + 1,
        };
      }

      case "extern": {
        let k = j + 1;
        if (isIdent(stream[k], "crate")) return this.parseToSemicolon(stream, j, attrs, span, "extern crate", mode);
        if (stream[k]?.kind === "literal") k++;
        const body = stream[k];
        if (!isGroup(body, "brace")) {
          if (mode === "block") return null;
          fail("expected `{` after extern", keyword);
        }
        const scope = this.parseScope(body.stream, "items");
        return { item: { kind: "other", keyword: "extern", attrs, span, children: scope.items }, end: k + 1 };
      }

      case "const":
        if (isGroup(stream[j + 1], "brace")) return null;
        return this.parseToSemicolon(stream, j, attrs, span, "const", mode);

      case "use":
      case "type":
      case "static":
        return this.parseToSemicolon(stream, j, attrs, span, keyword.text, mode);

      case "macro_rules": {
        const body = stream[j + 3];
        if (!isPunct(stream[j + 1], "!") || !isIdent(stream[j + 2]) || !isGroup(body)) {
          return null;
        }
        let end = j + 4;
        if (body.delimiter !== "brace" && isPunct(stream[end], ";")) end++;
        return { item: { kind: "other", keyword: "macro_rules", attrs, span, children: [] }, end };
      }

      default:
        return this.parseMacroCall(stream, j, attrs, span);
    }
  }

  /** `path::to::name! (...)`, `name! [...]` or `name! {...}`; body is not parsed. */
  private parseMacroCall(
    stream: readonly TokenTree[],
    j: number,
    attrs: readonly Attribute[],
    span: TokenTree["span"],
  ): ParsedItem | null {
    let k = j + 1;
    while (isPunct(stream[k], ":") && isPunct(stream[k + 1], ":") && isIdent(stream[k + 2])) k += 3;
    const body = stream[k + 1];
    if (!isPunct(stream[k], "!") || !isGroup(body)) return null;
    let end = k + 2;
    if (body.delimiter !== "brace" && isPunct(stream[end], ";")) end++;
    return { item: { kind: "other", keyword: "macro", attrs, span, children: [] }, end };
  }

  private parseToSemicolon(
    stream: readonly TokenTree[],
    j: number,
    attrs: readonly Attribute[],
    span: TokenTree["span"],
    keyword: string,
    mode: ScopeMode,
  ): ParsedItem | null {
    let k = j + 1;
    while (k < stream.length && !isPunct(stream[k], ";")) k++;
    if (k >= stream.length) {
      if (mode === "block") return null;
      fail(`expected \`;\` to end \`${keyword}\` item`, stream[j]);
    }
    return {
      item: { kind: "other", keyword, attrs, span, children: this.collectNested(stream.slice(j + 1, k)) },
      end: k + 1,
    };
  }

  private expectName(stream: readonly TokenTree[], j: number, mode: ScopeMode): IdentToken | null {
    const name = stream[j + 1];
    if (isIdent(name)) return name;
    if (mode === "block") return null;
    return fail(`expected identifier after \`${describeKeyword(stream[j])}\``, name ?? stream[j]);
  }

  /**
   * Index of the first `{...}` (or `;`, when allowed) at or after `from` that
   * sits outside generic angle brackets, or -1. Braced const-generic
   * arguments such as `Foo<{ N }>` are skipped.
   */
  private findTerminator(stream: readonly TokenTree[], from: number, allowSemicolon: boolean): number {
    let angles = 0;
    for (let k = from; k < stream.length; k++) {
      const token = stream[k];
      if (isPunct(token, "<")) {
        angles++;
      } else if (isPunct(token, ">")) {
        if (!isArrow(stream[k - 1], token)) angles = Math.max(0, angles - 1);
      } else if (angles === 0) {
        if (isGroup(token, "brace")) return k;
        if (isPunct(token, ";")) return allowSemicolon ? k : -1;
      }
    }
    return -1;
  }

  private skipVisibility(stream: readonly TokenTree[], j: number): number {
    if (!isIdent(stream[j], "pub")) return j;
    return isGroup(stream[j + 1], "paren") ? j + 2 : j + 1;
  }

  private skipQualifiers(stream: readonly TokenTree[], from: number): number {
    let j = from;
    for (;;) {
      const token = stream[j];
      const next = stream[j + 1];
      if ((isIdent(token, "unsafe") || isIdent(token, "async") || isIdent(token, "safe")) && isIdent(next)) {
        j++;
      } else if (isIdent(token, "auto") && isIdent(next, "trait")) {
        j++;
      } else if (isIdent(token, "default") && isIdent(next) && AFTER_DEFAULT.has(next.text)) {
        j++;
      } else if (isIdent(token, "const") && isIdent(next) && AFTER_CONST.has(next.text)) {
        j++;
      } else if (isIdent(token, "extern")) {
        const k = stream[j + 1]?.kind === "literal" ? j + 2 : j + 1;
        if (!isIdent(stream[k], "fn") && !isIdent(stream[k], "unsafe")) return j;
        j = k;
      } else {
        return j;
      }
    }
  }
}

/** `->`: a `-` immediately followed by `>`. */
function isArrow(previous: TokenTree | undefined, token: PunctToken): boolean {
  return isPunct(previous, "-") && previous.span.end === token.span.start;
}

function segmentText(token: IdentToken): string {
  return token.raw ? `r#${token.text}` : token.text;
}

function describeKeyword(token: TokenTree): string {
  return token.kind === "ident" ? token.text : describeToken(token);
}

/** Parse Rust source text into its item tree. Throws RustSyntaxError. */
export function parseFile(source: string): SourceFile {
  return new ItemParser().parseFile(tokenize(source));
}
