/**
 * GDNative project utilities for cargo build scripts.
 *
 * Scan a crate for types deriving `NativeClass`, then generate the
 * `.gdnlib` manifest and one `.gdns` descriptor per type:
 *
 * ```ts
 * import { BuildMode, Generator, scanCrate } from "@gdnative-utils/project-utils";
 *
 * const classes = await scanCrate("src");
 * await new Generator()
 *   .projectDir("../godot")
 *   .buildMode(BuildMode.Debug)
 *   .build(classes);
 * ```
 */

export { type Logger, nullLogger } from "@gdnative-utils/shared";

export {
  type Classes,
  type DeriveIssue,
  type ScanCrateOptions,
  type ScanOptions,
  type WalkOptions,
  ScanError,
  ScanErrorCode,
  isScanError,
  scanCrate,
  scanFiles,
  walkSourceFiles,
} from "@gdnative-utils/scanner";

export {
  type Environment,
  type GenerateReport,
  type GeneratorOptions,
  type ResolvedGeneratorConfig,
  BuildMode,
  Generator,
  GeneratorError,
  GeneratorErrorCode,
  generate,
  generateResources,
  isGeneratorError,
  resolveGeneratorConfig,
} from "@gdnative-utils/generator";

export { type BuildResourcesOptions, type BuildResourcesResult, buildResources } from "./build.js";
