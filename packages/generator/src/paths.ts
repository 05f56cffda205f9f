/**
 * Path Layout
 *
 * Decides how descriptor files refer to other files (project-relative
 * `res://` or absolute) and where cargo puts the compiled library for each
 * platform the host supports.
 */

import { isAbsolute, posix, relative } from "node:path";

import { escapesBase, toSlashPath } from "@gdnative-utils/shared";

import type { BuildMode } from "./config.js";

/** Prefix the host resolves against its project root. */
export const RES_PREFIX = "res://";

export interface RelativePath {
  /** `res://` when the path sits inside the project, otherwise empty. */
  readonly prefix: string;
  /** Slash-separated path; absolute when `prefix` is empty. */
  readonly path: string;
}

/**
 * Express `base` relative to `against`.
 *
 * Paths inside `against` become `res://` + relative path; anything outside
 * it (or on another drive) is kept absolute.
 */
export function relativize(base: string, against: string): RelativePath {
  const rel = relative(against, base);
  if (escapesBase(rel) || isAbsolute(rel)) {
    return { prefix: "", path: toSlashPath(base) };
  }
  return { prefix: RES_PREFIX, path: toSlashPath(rel) };
}

/** Cargo replaces `-` with `_` in the names of compiled artifacts. */
export function normalizeLibName(name: string): string {
  return name.replaceAll("-", "_");
}

export type PlatformId =
  | "Android.armeabi-v7a"
  | "Android.arm64-v8a"
  | "Android.x86"
  | "Android.x86_64"
  | "X11.64"
  | "OSX.64"
  | "Windows.64";

export interface Platform {
  readonly id: PlatformId;
  /** Cross-compilation target triple; absent for host builds. */
  readonly triple?: string;
  readonly fileName: (lib: string) => string;
}

const sharedObject = (lib: string): string => `lib${lib}.so`;

/** Platforms in manifest order. */
export const PLATFORMS: readonly Platform[] = [
  { id: "Android.armeabi-v7a", triple: "armv7-linux-androideabi", fileName: sharedObject },
  { id: "Android.arm64-v8a", triple: "aarch64-linux-android", fileName: sharedObject },
  { id: "Android.x86", triple: "i686-linux-android", fileName: sharedObject },
  { id: "Android.x86_64", triple: "x86_64-linux-android", fileName: sharedObject },
  { id: "X11.64", fileName: sharedObject },
  { id: "OSX.64", fileName: (lib) => `lib${lib}.dylib` },
  { id: "Windows.64", fileName: (lib) => `${lib}.dll` },
];

export interface BinaryPath {
  readonly platform: PlatformId;
  readonly triple?: string;
  readonly path: string;
}

export type Binaries = readonly BinaryPath[];

/**
 * Location of the compiled library for every supported platform.
 *
 * `artifactBase` is the target directory as it should appear in the
 * manifest (relative or absolute); the result always uses `/`.
 */
export function binaryPaths(artifactBase: string, mode: BuildMode, libName: string): Binaries {
  const base = toSlashPath(artifactBase);
  const lib = normalizeLibName(libName);

  return PLATFORMS.map((platform) => {
    const segments = platform.triple ? [platform.triple, mode] : [mode];
    return {
      platform: platform.id,
      ...(platform.triple ? { triple: platform.triple } : {}),
      path: posix.join(base, ...segments, platform.fileName(lib)),
    };
  });
}
