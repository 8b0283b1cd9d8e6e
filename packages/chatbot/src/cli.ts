#!/usr/bin/env node

/**
 * parley CLI -- chat with a dialogue script in the terminal
 *
 * Usage:
 *   parley <script> [--seed N] [--no-greet]
 */

import * as readline from "readline";
import type { Readable, Writable } from "stream";
import { pathToFileURL } from "url";
import { createLogger, loadConfig, type ParleyConfig } from "@parley/core";
import { EmptyResponseSetError, loadDialogueFile, type LoadedDialogue } from "@parley/graph";
import { ChatBot } from "./chatbot.js";
import { mathRandom, seededRandom } from "./random.js";
import { writerSink } from "./sink.js";

export interface CliIO {
  input: Readable;
  output: Writable;
  /** Log output (default: `output`) */
  error?: Writable;
  env?: NodeJS.ProcessEnv;
  /** Directory searched for config files (default: process.cwd()) */
  cwd?: string;
  /** Write the prompt before each line (default: input is a TTY) */
  interactive?: boolean;
}

interface CliOptions {
  script: string;
  seed?: number;
  greet?: boolean;
}

const USAGE = "Usage: parley <script> [--seed N] [--no-greet]";

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function parseArgs(args: string[]): CliOptions | "help" {
  let script: string | undefined;
  let seed: number | undefined;
  let greet: boolean | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") {
      return "help";
    } else if (arg === "--seed" || arg === "-s") {
      const value = args[++i];
      if (value === undefined || !/^-?\d+$/.test(value)) {
        throw new UsageError(`--seed expects an integer, got ${value ?? "nothing"}`);
      }
      seed = parseInt(value, 10);
    } else if (arg === "--no-greet") {
      greet = false;
    } else if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else if (script === undefined) {
      script = arg;
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
  }

  if (script === undefined) throw new UsageError("Missing dialogue script");
  return {
    script,
    ...(seed !== undefined ? { seed } : {}),
    ...(greet !== undefined ? { greet } : {}),
  };
}

/**
 * Run an interactive session. Resolves with the process exit code.
 */
export async function runCli(args: string[], io: CliIO): Promise<number> {
  const errorStream = io.error ?? io.output;
  const writeLine = (stream: Writable) => (line: string) => {
    stream.write(`${line}\n`);
  };

  let options: CliOptions | "help";
  let settings: ParleyConfig;
  try {
    options = parseArgs(args);
    settings = loadConfig({ env: io.env ?? process.env, searchFrom: io.cwd ?? process.cwd() }).config;
  } catch (error) {
    writeLine(errorStream)(error instanceof Error ? error.message : String(error));
    writeLine(errorStream)(USAGE);
    return 1;
  }
  if (options === "help") {
    writeLine(io.output)(USAGE);
    return 0;
  }

  const loggerFor = (scope: string) =>
    createLogger(scope, { level: settings.log.level, writer: writeLine(errorStream) });
  const logger = loggerFor("cli");

  let dialogue: LoadedDialogue;
  try {
    dialogue = loadDialogueFile(options.script, { logger: loggerFor("graph") });
  } catch (error) {
    logger.error(`cannot load ${options.script}`, error);
    return 1;
  }

  const seed = options.seed ?? settings.chat.seed;
  const bot = new ChatBot(dialogue.graph, {
    sink: writerSink(writeLine(io.output)),
    random: seed !== undefined ? seededRandom(seed) : mathRandom,
    logger: loggerFor("chatbot"),
  });
  bot.initialize(dialogue.root);
  if (options.greet ?? settings.chat.greet) bot.greet();

  const interactive = io.interactive ?? ("isTTY" in io.input && io.input.isTTY === true);
  const prompt = () => {
    if (interactive) io.output.write(settings.chat.prompt);
  };

  // leaving the loop early closes the interface
  const rl = readline.createInterface({ input: io.input, terminal: false });
  prompt();
  for await (const rawLine of rl) {
    const line = rawLine.trim();
    if (line === "/quit" || line === "/exit") break;
    if (line !== "") {
      try {
        bot.receiveMessage(line);
      } catch (error) {
        if (!(error instanceof EmptyResponseSetError)) throw error;
        logger.error("no reply", error);
      }
    }
    prompt();
  }
  return 0;
}

if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href) {
  runCli(process.argv.slice(2), {
    input: process.stdin,
    output: process.stdout,
    error: process.stderr,
  }).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
