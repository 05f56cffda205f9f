/**
 * Generator Configuration
 *
 * Every input the generator needs, with the fallbacks cargo provides to
 * build scripts. Resolution order per option:
 *
 * | option       | 1. explicit  | 2. environment      | 3. derived               |
 * |--------------|--------------|---------------------|--------------------------|
 * | `libName`    | option       | `CARGO_PKG_NAME`    |                          |
 * | `projectDir` | option       |                     | (required)               |
 * | `outputDir`  | option       |                     | `<projectDir>/native`    |
 * | `targetDir`  | option       | `CARGO_TARGET_DIR`  | `OUT_DIR/../../../..`    |
 * | `buildMode`  | option       | `PROFILE`           |                          |
 *
 * All directories are canonicalized (absolute, symlinks resolved) before
 * any relative path is computed from them.
 */

import { realpath } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";

import { debug } from "@gdnative-utils/shared";

import { errorMessage, GeneratorError, GeneratorErrorCode } from "./errors.js";

/** Cargo profile the library is built with. */
export const BuildMode = {
  Debug: "debug",
  Release: "release",
} as const;

export type BuildMode = (typeof BuildMode)[keyof typeof BuildMode];

/** Environment variables consulted for fallbacks (usually `process.env`). */
export type Environment = Readonly<Record<string, string | undefined>>;

export interface GeneratorOptions {
  /** Root of the Godot project (the directory holding `project.godot`). */
  readonly projectDir?: string;
  /**
   * Directory inside the project that receives the generated files.
   * @default `<projectDir>/native`
   */
  readonly outputDir?: string;
  /** Cargo's `target` directory. */
  readonly targetDir?: string;
  /** Crate name. */
  readonly libName?: string;
  readonly buildMode?: BuildMode;
}

export interface ResolvedGeneratorConfig {
  readonly projectDir: string;
  readonly outputDir: string;
  readonly targetDir: string;
  readonly libName: string;
  readonly buildMode: BuildMode;
}

export const DEFAULT_OUTPUT_DIR_NAME = "native";

/** cargo sets OUT_DIR to `target/<profile>/build/<crate>-<hash>/out`. */
const OUT_DIR_DEPTH = 4;

/**
 * Resolve options against the environment.
 *
 * @throws {GeneratorError} a CONFIG_* error naming the option that could not be resolved
 */
export async function resolveGeneratorConfig(
  options: GeneratorOptions,
  env: Environment = process.env,
): Promise<ResolvedGeneratorConfig> {
  const libName = resolveLibName(options, env);

  if (!options.projectDir) {
    throw new GeneratorError("Godot project dir not given", GeneratorErrorCode.MISSING_PROJECT_DIR, {
      key: "projectDir",
    });
  }
  const projectDir = await canonicalize(options.projectDir, "projectDir");

  const outputDir = options.outputDir
    ? await canonicalizeMissing(options.outputDir, "outputDir")
    : join(projectDir, DEFAULT_OUTPUT_DIR_NAME);

  const targetDir = await resolveTargetDir(options, env);
  const buildMode = resolveBuildMode(options, env);

  const config: ResolvedGeneratorConfig = { projectDir, outputDir, targetDir, libName, buildMode };
  debug.generate("config.resolved", { ...config });
  return config;
}

function resolveLibName(options: GeneratorOptions, env: Environment): string {
  const name = options.libName || env["CARGO_PKG_NAME"];
  if (!name) {
    throw new GeneratorError(
      "Library name not given and CARGO_PKG_NAME is not set",
      GeneratorErrorCode.MISSING_LIB_NAME,
      { key: "libName" },
    );
  }
  return name;
}

async function resolveTargetDir(options: GeneratorOptions, env: Environment): Promise<string> {
  if (options.targetDir) {
    return canonicalize(options.targetDir, "targetDir");
  }

  const candidates: Array<{ source: string; locate: () => Promise<string> }> = [];
  const cargoTargetDir = env["CARGO_TARGET_DIR"];
  if (cargoTargetDir) {
    candidates.push({ source: "CARGO_TARGET_DIR", locate: () => realpath(resolve(cargoTargetDir)) });
  }
  const outDir = env["OUT_DIR"];
  if (outDir) {
    candidates.push({ source: "OUT_DIR", locate: () => targetDirFromOutDir(outDir) });
  }

  for (const candidate of candidates) {
    try {
      const path = await candidate.locate();
      debug.generate("config.target-dir", { source: candidate.source, path });
      return path;
    } catch (error) {
      debug.generate("config.target-dir.skip", { source: candidate.source, error: errorMessage(error) });
    }
  }

  throw new GeneratorError(
    "Target dir not given and unable to find it from CARGO_TARGET_DIR or OUT_DIR",
    GeneratorErrorCode.MISSING_TARGET_DIR,
    { key: "targetDir" },
  );
}

/** Climb from the canonical OUT_DIR, so `..` steps out of symlinks the way the filesystem does. */
async function targetDirFromOutDir(outDir: string): Promise<string> {
  let path = await realpath(resolve(outDir));
  for (let i = 0; i < OUT_DIR_DEPTH; i++) path = dirname(path);
  return path;
}

function resolveBuildMode(options: GeneratorOptions, env: Environment): BuildMode {
  if (options.buildMode) return options.buildMode;

  const profile = env["PROFILE"];
  if (profile === BuildMode.Debug || profile === BuildMode.Release) return profile;

  const reason = profile ? `PROFILE "${profile}" is not a known build mode` : "PROFILE is not set";
  throw new GeneratorError(`Build mode not given and ${reason}`, GeneratorErrorCode.MISSING_BUILD_MODE, {
    key: "buildMode",
  });
}

/** Resolve symlinks in an existing path. */
async function canonicalize(path: string, key: string): Promise<string> {
  try {
    return await realpath(resolve(path));
  } catch (error) {
    throw canonicalizeError(path, key, error);
  }
}

/**
 * Canonicalize a path that may not exist yet: the nearest existing ancestor
 * is resolved and the missing tail appended to it.
 */
async function canonicalizeMissing(path: string, key: string): Promise<string> {
  const tail: string[] = [];
  let current = resolve(path);

  for (;;) {
    try {
      const real = await realpath(current);
      return join(real, ...tail.reverse());
    } catch (error) {
      const parent = dirname(current);
      if (!isNotFound(error) || parent === current) {
        throw canonicalizeError(path, key, error);
      }
      tail.push(basename(current));
      current = parent;
    }
  }
}

function canonicalizeError(path: string, key: string, cause: unknown): GeneratorError {
  return new GeneratorError(
    `Unable to canonicalize ${key} ${path}: ${errorMessage(cause)}`,
    GeneratorErrorCode.CANONICALIZE_FAILED,
    { key, path, cause },
  );
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
