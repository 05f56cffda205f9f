// Scanner - finds Rust types that derive NativeClass

export {
  type DeriveIssue,
  type ScanErrorCodeType,
  ScanError,
  ScanErrorCode,
  formatIssue,
  isScanError,
} from "./errors.js";

export { type DeriveMatch, NATIVE_CLASS_DERIVE, isDeriveAttribute, matchNativeClassDerive } from "./derive.js";

export {
  type Classes,
  type FileScan,
  type FindClassesOptions,
  combineFileScans,
  findClasses,
} from "./find-classes.js";

export {
  type IgnoreRule,
  type WalkOptions,
  DEFAULT_EXTENSIONS,
  DEFAULT_IGNORE_FILES,
  isIgnored,
  parseIgnoreFile,
  walkSourceFiles,
} from "./walk.js";

export { type ScanCrateOptions, type ScanOptions, scanCrate, scanFile, scanFiles, scanSource } from "./scan.js";

export * from "./syntax/index.js";
