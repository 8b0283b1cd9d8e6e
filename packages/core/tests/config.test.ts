import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { config, loadConfig, normalizeConfig, ConfigError } from "../src/index.js";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "parley-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("falls back to defaults", () => {
    const loaded = loadConfig({ searchFrom: dir, env: {} });
    expect(loaded.config).toEqual({
      debug: false,
      log: { level: "info" },
      chat: { greet: true, prompt: "you > " },
    });
    expect(loaded.filepath).toBeUndefined();
  });

  it("reads an rc file", () => {
    writeFileSync(
      join(dir, ".parleyrc.json"),
      JSON.stringify({ log: { level: "warn" }, chat: { seed: 7 } })
    );
    const loaded = loadConfig({ searchFrom: dir, env: {} });
    expect(loaded.config.log.level).toBe("warn");
    expect(loaded.config.chat.seed).toBe(7);
    expect(loaded.config.chat.greet).toBe(true);
    expect(loaded.filepath).toBe(join(dir, ".parleyrc.json"));
  });

  it("reads the parley key of package.json", () => {
    writeFileSync(join(dir, "package.json"), JSON.stringify({ name: "x", parley: { chat: { greet: false } } }));
    expect(loadConfig({ searchFrom: dir, env: {} }).config.chat.greet).toBe(false);
  });

  it("lets environment variables override files", () => {
    writeFileSync(join(dir, ".parleyrc.json"), JSON.stringify({ log: { level: "warn" } }));
    const loaded = loadConfig({
      searchFrom: dir,
      env: { PARLEY_LOG__LEVEL: "error", PARLEY_CHAT_SEED: "42", UNRELATED: "1" },
    });
    expect(loaded.config.log.level).toBe("error");
    expect(loaded.config.chat.seed).toBe(42);
  });

  it("forces debug logging in debug mode", () => {
    const loaded = loadConfig({ searchFrom: dir, env: { PARLEY_DEBUG: "1" } });
    expect(loaded.config.debug).toBe(true);
    expect(loaded.config.log.level).toBe("debug");
  });

  it("keeps string fields from the environment as written", () => {
    const numeric = loadConfig({ searchFrom: dir, env: { PARLEY_CHAT__PROMPT: "42" } });
    expect(numeric.config.chat.prompt).toBe("42");
    const empty = loadConfig({ searchFrom: dir, env: { PARLEY_CHAT__PROMPT: "" } });
    expect(empty.config.chat.prompt).toBe("");
  });

  it("converts boolean and integer fields from the environment", () => {
    const loaded = loadConfig({
      searchFrom: dir,
      env: { PARLEY_CHAT__GREET: "false", PARLEY_CHAT__SEED: "-3" },
    });
    expect(loaded.config.chat.greet).toBe(false);
    expect(loaded.config.chat.seed).toBe(-3);
  });

  it("rejects a non-integer seed from the environment", () => {
    expect(() => loadConfig({ searchFrom: dir, env: { PARLEY_CHAT__SEED: "4.5" } })).toThrow(
      '"chat.seed" must be an integer, got "4.5"'
    );
  });

  it("ignores ES module config files", () => {
    writeFileSync(join(dir, ".parleyrc.mjs"), "export default { chat: { greet: false } };\n");
    const loaded = loadConfig({ searchFrom: dir, env: {} });
    expect(loaded.config.chat.greet).toBe(true);
    expect(loaded.filepath).toBeUndefined();
  });

  it("rejects unknown log levels", () => {
    expect(() => loadConfig({ searchFrom: dir, env: { PARLEY_LOG_LEVEL: "loud" } })).toThrow(ConfigError);
  });

  it("rejects malformed rc files", () => {
    writeFileSync(join(dir, ".parleyrc.json"), "{ not json");
    expect(() => loadConfig({ searchFrom: dir, env: {} })).toThrow(ConfigError);
  });
});

describe("normalizeConfig", () => {
  it("rejects non-integer seeds", () => {
    expect(() => normalizeConfig({ chat: { seed: 1.5 } })).toThrow('"chat.seed" must be an integer');
  });

  it("accepts numeric booleans", () => {
    expect(normalizeConfig({ chat: { greet: 0 } }).chat.greet).toBe(false);
  });
});

describe("config", () => {
  afterEach(() => {
    config.reset();
  });

  it("applies programmatic values on top of loaded ones", () => {
    config.set({ chat: { seed: 3 } });
    expect(config.get("chat.seed")).toBe(3);
    expect(config.getAll().chat.seed).toBe(3);
  });

  it("forgets programmatic values after reset", () => {
    config.set({ chat: { prompt: "> " } });
    config.reset();
    expect(config.get("chat.prompt")).not.toBe("> ");
  });
});
