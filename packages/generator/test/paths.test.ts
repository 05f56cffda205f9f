import { describe, expect, it } from "vitest";

import { BuildMode } from "../src/config.js";
import { binaryPaths, normalizeLibName, relativize, RES_PREFIX } from "../src/paths.js";

describe("relativize", () => {
  it("uses res:// for paths inside the project", () => {
    expect(relativize("/proj/target", "/proj")).toEqual({ prefix: RES_PREFIX, path: "target" });
    expect(relativize("/proj/native/lib.gdnlib", "/proj")).toEqual({ prefix: "res://", path: "native/lib.gdnlib" });
  });

  it("keeps paths outside the project absolute", () => {
    expect(relativize("/tmp/xyz/target", "/proj")).toEqual({ prefix: "", path: "/tmp/xyz/target" });
    expect(relativize("/project-other/target", "/proj")).toEqual({ prefix: "", path: "/project-other/target" });
    expect(relativize("/", "/proj")).toEqual({ prefix: "", path: "/" });
  });

  it("treats the project root itself as inside", () => {
    expect(relativize("/proj", "/proj")).toEqual({ prefix: "res://", path: "" });
  });

  it("does not mistake dot-dot-prefixed names for parent traversal", () => {
    expect(relativize("/proj/..cache/target", "/proj")).toEqual({ prefix: "res://", path: "..cache/target" });
  });
});

describe("normalizeLibName", () => {
  it("replaces every hyphen with an underscore", () => {
    expect(normalizeLibName("my-lib")).toBe("my_lib");
    expect(normalizeLibName("a-b-c")).toBe("a_b_c");
    expect(normalizeLibName("plain")).toBe("plain");
  });
});

describe("binaryPaths", () => {
  it("lists every platform with its target triple directory", () => {
    expect(binaryPaths("target", BuildMode.Debug, "generator_test")).toEqual([
      {
        platform: "Android.armeabi-v7a",
        triple: "armv7-linux-androideabi",
        path: "target/armv7-linux-androideabi/debug/libgenerator_test.so",
      },
      {
        platform: "Android.arm64-v8a",
        triple: "aarch64-linux-android",
        path: "target/aarch64-linux-android/debug/libgenerator_test.so",
      },
      {
        platform: "Android.x86",
        triple: "i686-linux-android",
        path: "target/i686-linux-android/debug/libgenerator_test.so",
      },
      {
        platform: "Android.x86_64",
        triple: "x86_64-linux-android",
        path: "target/x86_64-linux-android/debug/libgenerator_test.so",
      },
      { platform: "X11.64", path: "target/debug/libgenerator_test.so" },
      { platform: "OSX.64", path: "target/debug/libgenerator_test.dylib" },
      { platform: "Windows.64", path: "target/debug/generator_test.dll" },
    ]);
  });

  it("uses the release directory for release builds", () => {
    const paths = binaryPaths("/tmp/xyz/target", BuildMode.Release, "demo").map((binary) => binary.path);
    expect(paths).toContain("/tmp/xyz/target/release/libdemo.so");
    expect(paths).toContain("/tmp/xyz/target/aarch64-linux-android/release/libdemo.so");
    expect(paths).toContain("/tmp/xyz/target/release/demo.dll");
  });

  it("normalizes hyphenated library names", () => {
    const x11 = binaryPaths("target", BuildMode.Debug, "my-lib").find((binary) => binary.platform === "X11.64");
    expect(x11?.path).toBe("target/debug/libmy_lib.so");
  });

  it("combines with relativize for project-relative and absolute entries", () => {
    const inside = relativize("/proj/target", "/proj");
    const insideX11 = binaryPaths(inside.path, BuildMode.Debug, "generator_test")[4];
    expect(`${inside.prefix}${insideX11.path}`).toBe("res://target/debug/libgenerator_test.so");

    const outside = relativize("/tmp/xyz/target", "/proj");
    const outsideX11 = binaryPaths(outside.path, BuildMode.Debug, "generator_test")[4];
    expect(`${outside.prefix}${outsideX11.path}`).toBe("/tmp/xyz/target/debug/libgenerator_test.so");
  });
});
