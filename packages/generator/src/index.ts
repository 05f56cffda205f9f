// Generator - .gdnlib and .gdns resources for a GDNative crate

export {
  type Environment,
  type GeneratorOptions,
  type ResolvedGeneratorConfig,
  BuildMode,
  DEFAULT_OUTPUT_DIR_NAME,
  resolveGeneratorConfig,
} from "./config.js";

export { type GeneratorErrorCodeType, GeneratorError, GeneratorErrorCode, isGeneratorError } from "./errors.js";

export {
  type Binaries,
  type BinaryPath,
  type Platform,
  type PlatformId,
  type RelativePath,
  PLATFORMS,
  RES_PREFIX,
  binaryPaths,
  normalizeLibName,
  relativize,
} from "./paths.js";

export {
  CLASS_DESCRIPTOR_EXTENSION,
  MANIFEST_EXTENSION,
  renderClassDescriptor,
  renderManifest,
} from "./templates.js";

export {
  type GenerateOptions,
  type GenerateReport,
  type GenerateResourcesOptions,
  Generator,
  generate,
  generateResources,
} from "./generate.js";
