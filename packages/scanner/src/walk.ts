/**
 * Source Tree Walking
 *
 * Lists a crate's source files the way cargo tooling usually does: hidden
 * entries are skipped and `.gitignore` / `.ignore` files are honored in
 * the root's parent directories and in every directory on the way down. Any
 * directory under the root that cannot be read aborts the walk.
 */

import type { Dirent } from "node:fs";
import { readdir, readFile, stat } from "node:fs/promises";
import { dirname, extname, join, relative, resolve } from "node:path";
import picomatch from "picomatch";

import { debug, escapesBase, nullLogger, toSlashPath, type Logger } from "@gdnative-utils/shared";

import { errorMessage, isNodeError, ScanError, ScanErrorCode } from "./errors.js";

export interface WalkOptions {
  /**
   * File extensions to collect.
   * @default [".rs"]
   */
  readonly extensions?: readonly string[];

  /**
   * Include files and directories whose name starts with a dot.
   * @default false
   */
  readonly hidden?: boolean;

  /**
   * Ignore files read from each directory, later ones taking precedence.
   * @default [".gitignore", ".ignore"]
   */
  readonly ignoreFiles?: readonly string[];

  /**
   * Also apply the ignore files found in the root's parent directories.
   * @default true
   */
  readonly parents?: boolean;

  /** Extra globs, relative to the walk root, to leave out. */
  readonly exclude?: readonly string[];

  readonly logger?: Logger;
}

/** One parsed line of an ignore file. */
export interface IgnoreRule {
  /** Directory the ignore file lives in; patterns are relative to it. */
  readonly base: string;
  readonly pattern: string;
  readonly negated: boolean;
  readonly directoryOnly: boolean;
  readonly match: (relativePath: string) => boolean;
}

export const DEFAULT_EXTENSIONS: readonly string[] = [".rs"];
export const DEFAULT_IGNORE_FILES: readonly string[] = [".gitignore", ".ignore"];

/**
 * Parse the contents of a gitignore-style file.
 *
 * Supports comments, `!` negation, trailing `/` for directories, leading `/`
 * (or any inner `/`) for anchoring to `base`, and `**` globs.
 */
export function parseIgnoreFile(content: string, base: string): IgnoreRule[] {
  const rules: IgnoreRule[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    let line = rawLine.replace(/(?<!\\)\s+$/, "");
    if (line === "" || line.startsWith("#")) continue;
    if (line.startsWith("\\#") || line.startsWith("\\!")) line = line.slice(1);
    else if (line.startsWith("!")) {
      rules.push(...compileRule(line.slice(1), base, true));
      continue;
    }
    rules.push(...compileRule(line, base, false));
  }

  return rules;
}

function compileRule(source: string, base: string, negated: boolean): IgnoreRule[] {
  let pattern = source;
  const directoryOnly = pattern.endsWith("/");
  if (directoryOnly) pattern = pattern.slice(0, -1);
  if (pattern === "") return [];

  const anchored = pattern.includes("/");
  if (pattern.startsWith("/")) pattern = pattern.slice(1);
  const glob = anchored ? pattern : `**/${pattern}`;

  return [
    {
      base,
      pattern: source,
      negated,
      directoryOnly,
      match: picomatch(glob, { dot: true }),
    },
  ];
}

/** Last matching rule wins, as in git. */
export function isIgnored(path: string, isDirectory: boolean, rules: readonly IgnoreRule[]): boolean {
  let ignored = false;
  for (const rule of rules) {
    if (rule.directoryOnly && !isDirectory) continue;
    const rel = relative(rule.base, path);
    if (rel === "" || escapesBase(rel)) continue;
    if (rule.match(toSlashPath(rel))) {
      ignored = !rule.negated;
    }
  }
  return ignored;
}

/**
 * Collect source files under `root`, sorted by path.
 *
 * @throws {ScanError} SCAN_WALK_FAILED when `root` is not a directory or a
 * directory/ignore file on the way cannot be read.
 */
export async function walkSourceFiles(root: string, options: WalkOptions = {}): Promise<string[]> {
  const log = options.logger ?? nullLogger;
  const absoluteRoot = resolve(root);
  const extensions = new Set(options.extensions ?? DEFAULT_EXTENSIONS);
  const ignoreFiles = options.ignoreFiles ?? DEFAULT_IGNORE_FILES;
  const excluded = options.exclude?.length ? picomatch([...options.exclude], { dot: true }) : null;
  const hidden = options.hidden ?? false;

  await assertDirectory(absoluteRoot);
  debug.walk("start", { root: absoluteRoot, extensions: [...extensions] });

  const files: string[] = [];

  const visit = async (dir: string, inherited: readonly IgnoreRule[]): Promise<void> => {
    const entries = await readDirectory(dir);
    const rules = [...inherited, ...(await loadIgnoreRules(dir, ignoreFiles))];

    for (const entry of entries) {
      if (!hidden && entry.name.startsWith(".")) continue;

      const fullPath = join(dir, entry.name);
      const isDirectory = entry.isDirectory();

      if (isIgnored(fullPath, isDirectory, rules)) {
        debug.walk("ignored", { path: fullPath });
        continue;
      }
      if (excluded && excluded(toSlashPath(relative(absoluteRoot, fullPath)))) {
        debug.walk("excluded", { path: fullPath });
        continue;
      }

      if (isDirectory) {
        await visit(fullPath, rules);
      } else if ((entry.isFile() || entry.isSymbolicLink()) && extensions.has(extname(entry.name))) {
        files.push(fullPath);
      }
    }
  };

  const inherited = options.parents === false ? [] : await loadAncestorRules(absoluteRoot, ignoreFiles);
  await visit(absoluteRoot, inherited);
  files.sort();

  debug.walk("done", { root: absoluteRoot, count: files.length });
  log.log(`[walk] ${files.length} source file(s) under ${absoluteRoot}`);
  return files;
}

async function assertDirectory(path: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(path)).isDirectory();
  } catch (error) {
    throw new ScanError(`Directory walking error: ${path}: ${errorMessage(error)}`, ScanErrorCode.WALK_FAILED, path, {
      cause: error,
    });
  }
  if (!isDirectory) {
    throw new ScanError(`Directory walking error: ${path} is not a directory`, ScanErrorCode.WALK_FAILED, path);
  }
}

async function readDirectory(dir: string): Promise<Dirent[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (error) {
    throw new ScanError(`Directory walking error: ${dir}: ${errorMessage(error)}`, ScanErrorCode.WALK_FAILED, dir, {
      cause: error,
    });
  }
}

/** Rules from every directory above `root`, outermost first so nearer files take precedence. */
async function loadAncestorRules(root: string, names: readonly string[]): Promise<IgnoreRule[]> {
  const ancestors: string[] = [];
  for (let dir = root; dirname(dir) !== dir; ) {
    dir = dirname(dir);
    ancestors.unshift(dir);
  }

  const rules: IgnoreRule[] = [];
  for (const dir of ancestors) {
    try {
      rules.push(...(await loadIgnoreRules(dir, names)));
    } catch (error) {
      // Outside the walked tree; an unreadable file only loses its rules.
      debug.walk("ignore-file.skip", { dir, error: errorMessage(error) });
    }
  }
  return rules;
}

async function loadIgnoreRules(dir: string, names: readonly string[]): Promise<IgnoreRule[]> {
  const rules: IgnoreRule[] = [];
  for (const name of names) {
    const path = join(dir, name);
    let content: string;
    try {
      content = await readFile(path, "utf-8");
    } catch (error) {
      if (isNodeError(error) && (error.code === "ENOENT" || error.code === "EISDIR")) continue;
      throw new ScanError(`Directory walking error: ${path}: ${errorMessage(error)}`, ScanErrorCode.WALK_FAILED, path, {
        cause: error,
      });
    }
    const parsed = parseIgnoreFile(content, dir);
    debug.walk("ignore-file", { path, rules: parsed.length });
    rules.push(...parsed);
  }
  return rules;
}
