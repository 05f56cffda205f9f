import type { Attribute, Span } from "./syntax/index.js";
import { describeToken, isIdent } from "./syntax/index.js";

/** Derive macro that registers a type with the host. */
export const NATIVE_CLASS_DERIVE = "NativeClass";

export type DeriveMatch =
  | { readonly kind: "match" }
  | { readonly kind: "no-match" }
  | { readonly kind: "invalid"; readonly message: string; readonly span: Span };

/** `#[derive ...]`: a single-segment, non-global path. */
export function isDeriveAttribute(attr: Attribute): boolean {
  return !attr.inner && !attr.global && attr.path.length === 1 && attr.path[0] === "derive";
}

/**
 * Decide whether a declaration's attributes derive NativeClass.
 *
 * Every token after the `derive` path must be a delimited group; the
 * declaration matches when `NativeClass` appears among the top-level tokens
 * of one of those groups. The first malformed derive makes the whole
 * declaration invalid.
 */
export function matchNativeClassDerive(
  attrs: readonly Attribute[],
  derive: string = NATIVE_CLASS_DERIVE,
): DeriveMatch {
  let matched = false;

  for (const attr of attrs) {
    if (!isDeriveAttribute(attr)) continue;

    for (const token of attr.tokens) {
      if (token.kind !== "group") {
        return {
          kind: "invalid",
          message: `unexpected ${describeToken(token)} in #[derive] attribute, expected a parenthesized list`,
          span: token.span,
        };
      }
      if (token.stream.some((inner) => isIdent(inner, derive))) {
        matched = true;
      }
    }
  }

  return matched ? { kind: "match" } : { kind: "no-match" };
}
