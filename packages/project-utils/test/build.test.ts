import { existsSync, mkdirSync, mkdtempSync, readFileSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import { dirname, join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { BuildMode, buildResources, ScanError, ScanErrorCode } from "../src/index.js";

function write(root: string, relativePath: string, content: string): void {
  const full = join(root, relativePath);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, content, "utf-8");
}

describe("buildResources", () => {
  let root: string;
  let crate: string;
  let godot: string;

  beforeEach(() => {
    root = realpathSync(mkdtempSync(join(os.tmpdir(), "gdnative-build-")));
    crate = join(root, "rust");
    godot = join(root, "godot");
    mkdirSync(godot);
    mkdirSync(join(crate, "target"), { recursive: true });
    write(crate, "src/lib.rs", "mod hud;\n\n#[derive(NativeClass)]\n#[inherit(Node)]\npub struct Game;\n");
    write(crate, "src/hud.rs", "#[derive(NativeClass)]\n#[inherit(Control)]\npub struct Hud;\n");
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("scans the crate and writes a descriptor per class", async () => {
    const { classes, report } = await buildResources({
      crateDir: crate,
      projectDir: godot,
      targetDir: join(crate, "target"),
      libName: "space-game",
      buildMode: BuildMode.Debug,
      env: {},
    });

    expect([...classes].sort()).toEqual(["Game", "Hud"]);
    expect(report.written).toEqual([
      join(godot, "native", "space-game.gdnlib"),
      join(godot, "native", "Game.gdns"),
      join(godot, "native", "Hud.gdns"),
    ]);

    const manifest = readFileSync(report.manifest, "utf-8");
    expect(manifest).toContain(`X11.64="${join(crate, "target")}/debug/libspace_game.so"`);

    const hud = readFileSync(join(godot, "native", "Hud.gdns"), "utf-8");
    expect(hud).toContain('[ext_resource path="res://native/space-game.gdnlib" type="GDNativeLibrary" id=1]');
    expect(hud).toContain('class_name = "Hud"');
  });

  it("writes nothing when the scan fails", async () => {
    write(crate, "src/broken.rs", "#[derive = NativeClass]\nstruct Broken;\n");

    let caught: unknown;
    try {
      await buildResources({
        crateDir: crate,
        projectDir: godot,
        targetDir: join(crate, "target"),
        libName: "space-game",
        buildMode: BuildMode.Debug,
        env: {},
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ScanError);
    expect(caught instanceof ScanError && caught.code).toBe(ScanErrorCode.INVALID_DERIVE);
    expect(existsSync(join(godot, "native"))).toBe(false);
  });
});
