/**
 * @parley/chatbot
 *
 * Keyword-driven conversation over a dialogue graph.
 */

export { ChatBot } from "./chatbot.js";
export type { ChatBotOptions } from "./chatbot.js";

export { selectTransition } from "./selection.js";
export type { TransitionMatch } from "./selection.js";

export { mathRandom, seededRandom, pickIndex } from "./random.js";
export type { RandomSource } from "./random.js";

export { arraySink, writerSink } from "./sink.js";
export type { OutputSink, ArraySink } from "./sink.js";

export { ChatBotStateError } from "./errors.js";

export { runCli } from "./cli.js";
export type { CliIO } from "./cli.js";
