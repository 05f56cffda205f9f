import path from "node:path";

/**
 * Convert a native path to forward slashes. Godot resource files expect `/`
 * on every platform.
 */
export function toSlashPath(input: string, separator: string = path.sep): string {
  if (separator === "/") return input;
  return input.split(separator).join("/");
}

/** True when a relative path climbs out of its base (`..` or `../x`). */
export function escapesBase(relative: string): boolean {
  const slashed = relative.replace(/\\/g, "/");
  return slashed === ".." || slashed.startsWith("../");
}
