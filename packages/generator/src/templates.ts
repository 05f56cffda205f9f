/**
 * Descriptor Templates
 *
 * Text for the two resource kinds Godot reads at runtime:
 * - `.gdnlib`: where the native library lives on each platform
 * - `.gdns`: a NativeScript binding one class name to that library
 */

import type { Binaries } from "./paths.js";

export const MANIFEST_EXTENSION = ".gdnlib";
export const CLASS_DESCRIPTOR_EXTENSION = ".gdns";

const GENERAL_SECTION = [
  "singleton=false",
  "load_once=true",
  'symbol_prefix="godot_"',
  "reloadable=true",
];

/**
 * Render a `.gdnlib` library manifest.
 *
 * Every binary path gets the same `prefix`; dependency lists start empty.
 */
export function renderManifest(prefix: string, binaries: Binaries): string {
  const entries = binaries.map((binary) => `${binary.platform}="${prefix}${binary.path}"`);
  const dependencies = binaries.map((binary) => `${binary.platform}=[  ]`);

  return [
    "[entry]",
    ...entries,
    "",
    "[dependencies]",
    "",
    ...dependencies,
    "",
    "[general]",
    "",
    ...GENERAL_SECTION,
    "",
  ].join("\n");
}

/** Render a `.gdns` NativeScript resource for one class. */
export function renderClassDescriptor(prefix: string, manifestPath: string, name: string): string {
  return `[gd_resource type="NativeScript" load_steps=2 format=2]

[ext_resource path="${prefix}${manifestPath}" type="GDNativeLibrary" id=1]

[resource]
class_name = "${name}"
script_class_name = "${name}"
library = ExtResource( 1 )
`;
}
