/* =============================================================================
 * GENERATOR ERRORS
 * ============================================================================= */

/** Error codes */
export const GeneratorErrorCode = {
  MISSING_PROJECT_DIR: "CONFIG_MISSING_PROJECT_DIR",
  MISSING_LIB_NAME: "CONFIG_MISSING_LIB_NAME",
  MISSING_TARGET_DIR: "CONFIG_MISSING_TARGET_DIR",
  MISSING_BUILD_MODE: "CONFIG_MISSING_BUILD_MODE",
  CANONICALIZE_FAILED: "CONFIG_CANONICALIZE_FAILED",
  MKDIR_FAILED: "GENERATE_MKDIR_FAILED",
  WRITE_FAILED: "GENERATE_WRITE_FAILED",
} as const;

export type GeneratorErrorCodeType = (typeof GeneratorErrorCode)[keyof typeof GeneratorErrorCode];

/**
 * Configuration or write failure while generating resources.
 *
 * `key` names the configuration option at fault (CONFIG_* codes), `path`
 * the file or directory involved.
 */
export class GeneratorError extends Error {
  readonly key?: string;
  readonly path?: string;

  constructor(
    message: string,
    public readonly code: GeneratorErrorCodeType,
    options?: { key?: string; path?: string; cause?: unknown },
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "GeneratorError";
    this.key = options?.key;
    this.path = options?.path;
  }
}

export function isGeneratorError(error: unknown): error is GeneratorError {
  return error instanceof GeneratorError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
