import { childItems, type EnumItem, type Item, type ItemKind, type StructItem } from "./ast.js";

/**
 * Per-kind callbacks. Children of every item are visited after the callback,
 * whether or not one is registered for that kind.
 */
export interface ItemVisitor {
  struct?(item: StructItem, path: readonly string[]): void;
  enum?(item: EnumItem, path: readonly string[]): void;
  item?(item: Item, path: readonly string[]): void;
}

/**
 * Walk an item tree depth-first. `path` is the chain of named module
 * scopes enclosing the item (handy for diagnostics).
 */
export function visitItems(items: readonly Item[], visitor: ItemVisitor, path: readonly string[] = []): void {
  for (const item of items) {
    visitItem(item, visitor, path);
  }
}

function visitItem(item: Item, visitor: ItemVisitor, path: readonly string[]): void {
  visitor.item?.(item, path);

  switch (item.kind) {
    case "struct":
      visitor.struct?.(item, path);
      break;
    case "enum":
      visitor.enum?.(item, path);
      break;
    default:
      break;
  }

  const scope = item.kind === "mod" ? [...path, item.name] : path;
  visitItems(childItems(item), visitor, scope);
}

/** Count items per kind in a tree; used for debug output. */
export function countItems(items: readonly Item[]): Partial<Record<ItemKind, number>> {
  const counts: Partial<Record<ItemKind, number>> = {};
  visitItems(items, {
    item(item) {
      counts[item.kind] = (counts[item.kind] ?? 0) + 1;
    },
  });
  return counts;
}
