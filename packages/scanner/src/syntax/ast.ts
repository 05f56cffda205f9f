import type { Span, TokenTree } from "./tokens.js";

/**
 * `#[path tokens]` or `#![path tokens]`.
 *
 * `path` holds the segments of the attribute path; `tokens` is everything
 * after it (for `#[derive(Debug)]`, a single parenthesized group).
 */
export interface Attribute {
  readonly path: readonly string[];
  /** True when the path starts with `::`. */
  readonly global: boolean;
  readonly tokens: readonly TokenTree[];
  readonly inner: boolean;
  readonly span: Span;
}

interface ItemBase {
  readonly attrs: readonly Attribute[];
  readonly span: Span;
}

export interface StructItem extends ItemBase {
  readonly kind: "struct";
  readonly name: string;
  /** Items nested in the body (e.g. inside const-generic or discriminant blocks). */
  readonly children: readonly Item[];
}

export interface EnumItem extends ItemBase {
  readonly kind: "enum";
  readonly name: string;
  readonly children: readonly Item[];
}

export interface UnionItem extends ItemBase {
  readonly kind: "union";
  readonly name: string;
  readonly children: readonly Item[];
}

export interface ModItem extends ItemBase {
  readonly kind: "mod";
  readonly name: string;
  readonly innerAttrs: readonly Attribute[];
  /** null for `mod name;` declarations whose body lives in another file. */
  readonly items: readonly Item[] | null;
}

export interface ImplItem extends ItemBase {
  readonly kind: "impl";
  readonly items: readonly Item[];
}

export interface TraitItem extends ItemBase {
  readonly kind: "trait";
  readonly name: string;
  readonly items: readonly Item[];
}

export interface FnItem extends ItemBase {
  readonly kind: "fn";
  readonly name: string;
  /** Items declared inside the body; null for bodiless signatures. */
  readonly body: readonly Item[] | null;
}

/** A brace-delimited scope nested in an expression or another item. */
export interface BlockItem extends ItemBase {
  readonly kind: "block";
  readonly items: readonly Item[];
}

/**
 * Items the scanner never matches: `use`, `type`, `const`, `static`,
 * `extern crate`, `extern` blocks and macro invocations/definitions.
 */
export interface OtherItem extends ItemBase {
  readonly kind: "other";
  readonly keyword: string;
  readonly children: readonly Item[];
}

export type Item =
  | StructItem
  | EnumItem
  | UnionItem
  | ModItem
  | ImplItem
  | TraitItem
  | FnItem
  | BlockItem
  | OtherItem;

export type ItemKind = Item["kind"];

export interface SourceFile {
  /** Inner attributes (`#![...]`) at the top of the file. */
  readonly attrs: readonly Attribute[];
  readonly items: readonly Item[];
}

/** Direct children of an item, for container variants. */
export function childItems(item: Item): readonly Item[] {
  switch (item.kind) {
    case "struct":
    case "enum":
    case "union":
    case "other":
      return item.children;
    case "mod":
      return item.items ?? [];
    case "impl":
    case "trait":
    case "block":
      return item.items;
    case "fn":
      return item.body ?? [];
    default: {
      const exhaustive: never = item;
      return exhaustive;
    }
  }
}
