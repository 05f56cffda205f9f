/**
 * Rust Syntax
 *
 * Token-tree lexer and item-level parser for Rust sources, plus a
 * recursive visitor over the resulting item tree.
 */

export type {
  Attribute,
  BlockItem,
  EnumItem,
  FnItem,
  ImplItem,
  Item,
  ItemKind,
  ModItem,
  OtherItem,
  SourceFile,
  StructItem,
  TraitItem,
  UnionItem,
} from "./ast.js";
export { childItems } from "./ast.js";

export type {
  Delimiter,
  GroupToken,
  IdentToken,
  LifetimeToken,
  LiteralToken,
  PunctToken,
  Span,
  TokenTree,
} from "./tokens.js";
export { describeToken, isGroup, isIdent, isPunct } from "./tokens.js";

export { RustSyntaxError } from "./errors.js";
export { Lexer, tokenize } from "./lexer.js";
export { ItemParser, parseFile } from "./parser.js";
export { countItems, visitItems, type ItemVisitor } from "./visit.js";
