import { describe, it, expect } from "vitest";
import { PassThrough, Writable } from "stream";
import { dirname } from "path";
import { fileURLToPath } from "url";
import { runCli, type CliIO } from "../src/index.js";

const script = fileURLToPath(new URL("./fixtures/pointer.dialogue", import.meta.url));

function collector() {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
}

function session(inputText: string, interactive = false) {
  const input = new PassThrough();
  input.end(inputText);
  const output = collector();
  const error = collector();
  const io: CliIO = {
    input,
    output: output.stream,
    error: error.stream,
    env: {},
    cwd: dirname(script),
    interactive,
  };
  return { io, output, error };
}

describe("runCli", () => {
  it("greets, answers and stops at /quit", async () => {
    const { io, output, error } = session("pointer\n\nwhatever\n/quit\npointer\n");
    expect(await runCli([script, "--seed", "1"], io)).toBe(0);
    expect(output.text()).toBe(
      "Hi! Ask me about pointers.\nA pointer stores an address.\nHi! Ask me about pointers.\n"
    );
    expect(error.text()).toBe("[parley:graph] info loaded 2 nodes and 1 edges, root 0\n");
  });

  it("skips the greeting with --no-greet", async () => {
    const { io, output } = session("pointer\n");
    expect(await runCli([script, "--no-greet"], io)).toBe(0);
    expect(output.text()).toBe("A pointer stores an address.\n");
  });

  it("writes the prompt in interactive mode", async () => {
    const { io, output } = session("pointer\n", true);
    expect(await runCli([script, "--no-greet"], io)).toBe(0);
    expect(output.text()).toBe("you > A pointer stores an address.\nyou > ");
  });

  it("takes settings from the environment", async () => {
    const { io, output, error } = session("");
    io.env = { PARLEY_CHAT_GREET: "false", PARLEY_LOG_LEVEL: "warn" };
    expect(await runCli([script], io)).toBe(0);
    expect(output.text()).toBe("");
    expect(error.text()).toBe("");
  });

  it("prints usage on bad arguments", async () => {
    const { io, error } = session("");
    expect(await runCli([], io)).toBe(1);
    expect(error.text()).toBe(
      "Missing dialogue script\nUsage: parley <script> [--seed N] [--no-greet]\n"
    );
  });

  it("rejects a non-numeric seed", async () => {
    const { io, error } = session("");
    expect(await runCli([script, "--seed", "abc"], io)).toBe(1);
    expect(error.text()).toContain("--seed expects an integer, got abc\n");
  });

  it("prints usage for --help", async () => {
    const { io, output } = session("");
    expect(await runCli(["--help"], io)).toBe(0);
    expect(output.text()).toBe("Usage: parley <script> [--seed N] [--no-greet]\n");
  });

  it("fails when the script cannot be loaded", async () => {
    const { io, error } = session("");
    expect(await runCli(["does-not-exist.dialogue"], io)).toBe(1);
    expect(error.text()).toMatch(/^\[parley:cli\] error cannot load does-not-exist\.dialogue: Error: ENOENT/);
  });
});
