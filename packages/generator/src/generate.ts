/**
 * Resource Generator
 *
 * Writes the library manifest and one class descriptor per discovered class
 * into the project's output directory. Existing files are never touched, so
 * hand edits survive and re-running the build only fills in what is missing.
 */

import { mkdir, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { debug, nullLogger, type Logger } from "@gdnative-utils/shared";

import {
  resolveGeneratorConfig,
  type BuildMode,
  type Environment,
  type GeneratorOptions,
  type ResolvedGeneratorConfig,
} from "./config.js";
import { errorMessage, GeneratorError, GeneratorErrorCode } from "./errors.js";
import { binaryPaths, relativize } from "./paths.js";
import {
  CLASS_DESCRIPTOR_EXTENSION,
  MANIFEST_EXTENSION,
  renderClassDescriptor,
  renderManifest,
} from "./templates.js";

export interface GenerateOptions {
  readonly logger?: Logger;
}

export interface GenerateReport {
  /** Path of the library manifest, whether written or kept. */
  readonly manifest: string;
  /** Files created by this run, in write order. */
  readonly written: readonly string[];
  /** Files left alone because they already existed. */
  readonly skipped: readonly string[];
}

/**
 * Write the manifest and class descriptors for an already resolved config.
 *
 * Classes are written in sorted order. The first failed write aborts the
 * run; files written before it stay on disk.
 *
 * @throws {GeneratorError} GENERATE_MKDIR_FAILED or GENERATE_WRITE_FAILED
 */
export async function generate(
  config: ResolvedGeneratorConfig,
  classes: Iterable<string>,
  options: GenerateOptions = {},
): Promise<GenerateReport> {
  const log = options.logger ?? nullLogger;
  const written: string[] = [];
  const skipped: string[] = [];

  const sync = async (path: string, render: () => string): Promise<void> => {
    if (await fileExists(path)) {
      log.log(`[generate] kept ${path}`);
      skipped.push(path);
      return;
    }
    await writeResource(path, render());
    log.info(`[generate] wrote ${path}`);
    written.push(path);
  };

  try {
    await mkdir(config.outputDir, { recursive: true });
  } catch (error) {
    throw new GeneratorError(
      `Unable to create output dir ${config.outputDir}: ${errorMessage(error)}`,
      GeneratorErrorCode.MKDIR_FAILED,
      { path: config.outputDir, cause: error },
    );
  }

  const manifestPath = join(config.outputDir, `${config.libName}${MANIFEST_EXTENSION}`);
  const target = relativize(config.targetDir, config.projectDir);
  const binaries = binaryPaths(target.path, config.buildMode, config.libName);
  debug.generate("manifest", { path: manifestPath, prefix: target.prefix, base: target.path });

  await sync(manifestPath, () => renderManifest(target.prefix, binaries));

  const manifestRef = relativize(manifestPath, config.projectDir);
  debug.generate("manifest.ref", { prefix: manifestRef.prefix, path: manifestRef.path });

  for (const name of [...new Set(classes)].sort()) {
    const path = join(config.outputDir, `${name}${CLASS_DESCRIPTOR_EXTENSION}`);
    await sync(path, () => renderClassDescriptor(manifestRef.prefix, manifestRef.path, name));
  }

  debug.generate("done", { written: written.length, skipped: skipped.length });
  return { manifest: manifestPath, written, skipped };
}

export interface GenerateResourcesOptions extends GeneratorOptions, GenerateOptions {
  /** @default process.env */
  readonly env?: Environment;
}

/** Resolve configuration, then generate. */
export async function generateResources(
  options: GenerateResourcesOptions,
  classes: Iterable<string>,
): Promise<GenerateReport> {
  const config = await resolveGeneratorConfig(options, options.env);
  return generate(config, classes, { logger: options.logger });
}

/**
 * Fluent front end for build scripts.
 *
 * ```ts
 * const classes = await scanCrate("src");
 * await new Generator()
 *   .projectDir("../godot")
 *   .buildMode(BuildMode.Release)
 *   .build(classes);
 * ```
 *
 * Anything not set falls back to cargo's build-script environment
 * (see {@link resolveGeneratorConfig}).
 */
export class Generator {
  private options: GenerateResourcesOptions = {};

  /** Required: root of the Godot project. */
  projectDir(dir: string): this {
    this.options = { ...this.options, projectDir: dir };
    return this;
  }

  outputDir(dir: string): this {
    this.options = { ...this.options, outputDir: dir };
    return this;
  }

  targetDir(dir: string): this {
    this.options = { ...this.options, targetDir: dir };
    return this;
  }

  libName(name: string): this {
    this.options = { ...this.options, libName: name };
    return this;
  }

  buildMode(mode: BuildMode): this {
    this.options = { ...this.options, buildMode: mode };
    return this;
  }

  logger(logger: Logger): this {
    this.options = { ...this.options, logger };
    return this;
  }

  env(env: Environment): this {
    this.options = { ...this.options, env };
    return this;
  }

  build(classes: Iterable<string>): Promise<GenerateReport> {
    return generateResources(this.options, classes);
  }
}

async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return false;
    }
    throw new GeneratorError(`Unable to check ${path}: ${errorMessage(error)}`, GeneratorErrorCode.WRITE_FAILED, {
      path,
      cause: error,
    });
  }
}

async function writeResource(path: string, content: string): Promise<void> {
  try {
    await writeFile(path, content, "utf-8");
  } catch (error) {
    throw new GeneratorError(`Unable to write ${path}: ${errorMessage(error)}`, GeneratorErrorCode.WRITE_FAILED, {
      path,
      cause: error,
    });
  }
}
