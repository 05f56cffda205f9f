import { describe, expect, it } from "vitest";

import { BuildMode } from "../src/config.js";
import { binaryPaths } from "../src/paths.js";
import { renderClassDescriptor, renderManifest } from "../src/templates.js";

describe("renderManifest", () => {
  it("renders entry, dependency and general sections", () => {
    const text = renderManifest("res://", binaryPaths("target", BuildMode.Debug, "demo"));
    expect(text).toBe(
      [
        "[entry]",
        'Android.armeabi-v7a="res://target/armv7-linux-androideabi/debug/libdemo.so"',
        'Android.arm64-v8a="res://target/aarch64-linux-android/debug/libdemo.so"',
        'Android.x86="res://target/i686-linux-android/debug/libdemo.so"',
        'Android.x86_64="res://target/x86_64-linux-android/debug/libdemo.so"',
        'X11.64="res://target/debug/libdemo.so"',
        'OSX.64="res://target/debug/libdemo.dylib"',
        'Windows.64="res://target/debug/demo.dll"',
        "",
        "[dependencies]",
        "",
        "Android.armeabi-v7a=[  ]",
        "Android.arm64-v8a=[  ]",
        "Android.x86=[  ]",
        "Android.x86_64=[  ]",
        "X11.64=[  ]",
        "OSX.64=[  ]",
        "Windows.64=[  ]",
        "",
        "[general]",
        "",
        "singleton=false",
        "load_once=true",
        'symbol_prefix="godot_"',
        "reloadable=true",
        "",
      ].join("\n"),
    );
  });

  it("writes absolute paths without a prefix", () => {
    const text = renderManifest("", binaryPaths("/opt/build/target", BuildMode.Release, "demo"));
    expect(text.split("\n")).toContain('X11.64="/opt/build/target/release/libdemo.so"');
  });

  it("is deterministic", () => {
    const binaries = binaryPaths("target", BuildMode.Debug, "demo");
    expect(renderManifest("res://", binaries)).toBe(renderManifest("res://", binaries));
  });
});

describe("renderClassDescriptor", () => {
  it("binds the class name to the manifest", () => {
    expect(renderClassDescriptor("res://", "native/demo.gdnlib", "Player")).toBe(
      [
        '[gd_resource type="NativeScript" load_steps=2 format=2]',
        "",
        '[ext_resource path="res://native/demo.gdnlib" type="GDNativeLibrary" id=1]',
        "",
        "[resource]",
        'class_name = "Player"',
        'script_class_name = "Player"',
        "library = ExtResource( 1 )",
        "",
      ].join("\n"),
    );
  });

  it("references an absolute manifest path as given", () => {
    const text = renderClassDescriptor("", "/elsewhere/native/demo.gdnlib", "Enemy");
    expect(text.split("\n")[2]).toBe('[ext_resource path="/elsewhere/native/demo.gdnlib" type="GDNativeLibrary" id=1]');
  });
});
