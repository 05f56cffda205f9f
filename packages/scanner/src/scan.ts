/**
 * Declaration Scanner
 *
 * Reads crate sources, parses each into an item tree and collects the
 * structs and enums that derive NativeClass. Malformed derives are gathered
 * across the whole scan and reported together; read and parse failures stop
 * the scan at the first offending file.
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";

import { debug, nullLogger, type Logger } from "@gdnative-utils/shared";

import { errorMessage, ScanError, ScanErrorCode } from "./errors.js";
import { combineFileScans, findClasses, type Classes, type FileScan } from "./find-classes.js";
import { countItems, parseFile, RustSyntaxError, type SourceFile } from "./syntax/index.js";
import { walkSourceFiles, type WalkOptions } from "./walk.js";

export interface ScanOptions {
  readonly logger?: Logger;
  /** @default "utf-8" */
  readonly encoding?: BufferEncoding;
  /** Derive to look for; defaults to NativeClass. */
  readonly derive?: string;
}

export interface ScanCrateOptions extends ScanOptions {
  readonly walk?: Omit<WalkOptions, "logger">;
}

/**
 * Scan one file's text. Pure: no I/O.
 *
 * @throws {ScanError} SCAN_PARSE_FAILED when the text is not valid Rust at item level.
 */
export function scanSource(source: string, fileName: string, options: Pick<ScanOptions, "derive"> = {}): FileScan {
  const file = parseSource(source, fileName);
  debug.parse("file", { path: fileName, items: countItems(file.items) });
  return findClasses(file, { fileName, derive: options.derive });
}

function parseSource(source: string, fileName: string): SourceFile {
  try {
    return parseFile(source);
  } catch (error) {
    if (error instanceof RustSyntaxError) {
      throw new ScanError(
        `Parsing error: ${fileName}:${error.line}:${error.column}: ${error.message}`,
        ScanErrorCode.PARSE_FAILED,
        fileName,
        { cause: error },
      );
    }
    throw error;
  }
}

/**
 * Read and scan one file.
 *
 * @throws {ScanError} SCAN_READ_FAILED or SCAN_PARSE_FAILED
 */
export async function scanFile(path: string, options: ScanOptions = {}): Promise<FileScan> {
  let source: string;
  try {
    source = await readFile(path, options.encoding ?? "utf-8");
  } catch (error) {
    throw new ScanError(`File reading error: ${path}: ${errorMessage(error)}`, ScanErrorCode.READ_FAILED, path, {
      cause: error,
    });
  }

  const result = scanSource(source, path, options);
  debug.scan("file.done", { path, classes: result.classes.size, issues: result.issues.length });
  return result;
}

/**
 * Scan a list of files and return every discovered declaration name.
 *
 * Paths are de-duplicated and processed one at a time in sorted order, so
 * the result does not depend on the order they were passed in.
 *
 * @throws {ScanError} the first read/parse failure, or one combined
 * SCAN_INVALID_DERIVE error listing every malformed derive.
 */
export async function scanFiles(paths: Iterable<string>, options: ScanOptions = {}): Promise<Classes> {
  const log = options.logger ?? nullLogger;
  const ordered = [...new Set([...paths].map((p) => resolve(p)))].sort();

  debug.scan("start", { files: ordered.length });

  const scans: FileScan[] = [];
  for (const path of ordered) {
    scans.push(await scanFile(path, options));
  }

  const combined = combineFileScans(scans);
  if (combined.issues.length > 0) {
    const error = ScanError.fromIssues(combined.issues);
    log.error(`[scan] ${error.message}`);
    throw error;
  }

  log.log(`[scan] found ${combined.classes.size} native class(es) in ${ordered.length} file(s)`);
  return combined.classes;
}

/**
 * Walk a crate directory and scan every source file in it.
 */
export async function scanCrate(dir: string, options: ScanCrateOptions = {}): Promise<Classes> {
  const files = await walkSourceFiles(dir, { ...options.walk, logger: options.logger });
  return scanFiles(files, options);
}
