import { afterEach, describe, expect, it, vi } from "vitest";
import {
  configureDebug,
  debug,
  formatDebugMessage,
  isDebugEnabled,
  refreshDebugChannels,
  resetDebugConfig,
} from "../src/debug.js";

describe("debug channels", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetDebugConfig();
    refreshDebugChannels();
  });

  it("formats pretty messages with inline data", () => {
    expect(formatDebugMessage("scan", "file.done", { path: "src/lib.rs", classes: 2 })).toBe(
      '[scan.file.done] { path="src/lib.rs", classes=2 }',
    );
    expect(formatDebugMessage("walk", "start")).toBe("[walk.start]");
    expect(formatDebugMessage("walk", "skip", { names: ["a", "b"] })).toBe('[walk.skip] { names=["a", "b"] }');
  });

  it("formats JSON messages", () => {
    configureDebug({ format: "json" });
    expect(formatDebugMessage("generate", "manifest", { prefix: "res://" })).toBe(
      '{"channel":"generate","point":"manifest","data":{"prefix":"res://"}}',
    );
  });

  it("emits only on enabled channels", () => {
    vi.stubEnv("GDNATIVE_DEBUG", "scan");
    refreshDebugChannels();
    const lines: string[] = [];
    configureDebug({ output: (message) => lines.push(message) });

    debug.scan("hit", { name: "Player" });
    debug.walk("dir", { path: "src" });

    expect(lines).toEqual(['[scan.hit] { name="Player" }']);
    expect(isDebugEnabled("scan")).toBe(true);
    expect(isDebugEnabled("walk")).toBe(false);
  });

  it("enables every channel with a wildcard", () => {
    vi.stubEnv("GDNATIVE_DEBUG", "*");
    refreshDebugChannels();
    expect(isDebugEnabled("generate")).toBe(true);
    expect(isDebugEnabled("parse")).toBe(true);
  });

  it("is disabled when the variable is unset or false", () => {
    vi.stubEnv("GDNATIVE_DEBUG", "false");
    refreshDebugChannels();
    expect(isDebugEnabled()).toBe(false);
  });
});
