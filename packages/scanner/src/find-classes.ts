import { debug } from "@gdnative-utils/shared";

import { matchNativeClassDerive, NATIVE_CLASS_DERIVE } from "./derive.js";
import type { DeriveIssue } from "./errors.js";
import type { EnumItem, SourceFile, StructItem } from "./syntax/index.js";
import { visitItems } from "./syntax/index.js";

/** Set of type names discovered by a scan. */
export type Classes = ReadonlySet<string>;

/** Outcome of scanning one file: discovered names plus malformed derives. */
export interface FileScan {
  readonly classes: ReadonlySet<string>;
  readonly issues: readonly DeriveIssue[];
}

export interface FindClassesOptions {
  /** Used in issue locations. */
  readonly fileName?: string;
  /** Derive to look for; defaults to NativeClass. */
  readonly derive?: string;
}

/**
 * Find every struct and enum in a parsed file whose derive list names the
 * marker, at any nesting depth (modules, function bodies, impl blocks).
 */
export function findClasses(file: SourceFile, options: FindClassesOptions = {}): FileScan {
  const fileName = options.fileName ?? "<source>";
  const derive = options.derive ?? NATIVE_CLASS_DERIVE;
  const classes = new Set<string>();
  const issues: DeriveIssue[] = [];

  const inspect = (item: StructItem | EnumItem, path: readonly string[]): void => {
    const result = matchNativeClassDerive(item.attrs, derive);
    switch (result.kind) {
      case "match":
        debug.scan("declaration.match", { file: fileName, name: item.name, kind: item.kind, module: path.join("::") });
        classes.add(item.name);
        break;
      case "invalid":
        issues.push({
          file: fileName,
          line: result.span.line,
          column: result.span.column,
          declaration: item.name,
          message: result.message,
        });
        break;
      case "no-match":
        break;
    }
  };

  visitItems(file.items, { struct: inspect, enum: inspect });

  return { classes, issues };
}

/**
 * Fold per-file results: names are unioned (duplicates collapse), issues are
 * concatenated in input order.
 */
export function combineFileScans(scans: Iterable<FileScan>): FileScan {
  const classes = new Set<string>();
  const issues: DeriveIssue[] = [];
  for (const scan of scans) {
    for (const name of scan.classes) classes.add(name);
    issues.push(...scan.issues);
  }
  return { classes, issues };
}
