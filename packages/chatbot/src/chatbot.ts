import { silentLogger, type Logger } from "@parley/core";
import {
  EmptyResponseSetError,
  type DialogueGraph,
  type DialogueNode,
  type NodeId,
} from "@parley/graph";
import { mathRandom, pickIndex, type RandomSource } from "./random.js";
import { selectTransition } from "./selection.js";
import type { OutputSink } from "./sink.js";
import { ChatBotStateError } from "./errors.js";

export interface ChatBotOptions {
  /** Where chosen responses are delivered */
  sink: OutputSink;
  /** Response picker (default: Math.random) */
  random?: RandomSource;
  logger?: Logger;
}

interface Cursor {
  root: NodeId;
  current: NodeId;
}

/**
 * Walks a dialogue graph one user message at a time.
 *
 * The bot holds a single cursor into the graph. Each message moves the cursor
 * along the outgoing edge whose keyword is closest to the input, or back to
 * the root when the current node has no outgoing edges, and delivers one of
 * the destination's responses to the sink.
 *
 * @example
 * ```ts
 * const { graph, root } = loadDialogueFile("pointers.dialogue");
 * const bot = new ChatBot(graph, { sink: writerSink(console.log), random: seededRandom(1) });
 * bot.initialize(root);
 * bot.greet();
 * bot.receiveMessage("what is a pointer?");
 * ```
 */
export class ChatBot {
  private readonly sink: OutputSink;
  private readonly random: RandomSource;
  private readonly logger: Logger;
  private cursor: Cursor | undefined;

  constructor(
    private readonly graph: DialogueGraph,
    options: ChatBotOptions
  ) {
    this.sink = options.sink;
    this.random = options.random ?? mathRandom;
    this.logger = options.logger ?? silentLogger;
  }

  get isInitialized(): boolean {
    return this.cursor !== undefined;
  }

  /** Place the cursor on `root`, which also becomes the fallback destination. */
  initialize(root: NodeId): void {
    this.graph.node(root);
    this.cursor = { root, current: root };
    this.logger.debug(`conversation starts at node ${root}`);
  }

  /**
   * Advance the conversation with one user message and deliver the reply.
   * Throws {@link EmptyResponseSetError} if the destination has no responses;
   * the cursor has already moved by then.
   */
  receiveMessage(input: string): string {
    const cursor = this.requireCursor("receiveMessage");
    const from = cursor.current;
    const match = selectTransition(this.graph.outgoingEdges(from), input);

    if (match) {
      cursor.current = match.edge.target;
      this.logger.debug(
        `moved ${from} -> ${cursor.current} via "${match.keyword}" (distance ${match.distance})`
      );
    } else {
      cursor.current = cursor.root;
      this.logger.debug(`node ${from} has no outgoing edges, back to root ${cursor.root}`);
    }

    return this.respond(cursor.current);
  }

  /** Deliver a response of the current node without moving. */
  greet(): string {
    return this.respond(this.requireCursor("greet").current);
  }

  currentNode(): DialogueNode {
    return this.graph.node(this.requireCursor("currentNode").current);
  }

  rootNode(): DialogueNode {
    return this.graph.node(this.requireCursor("rootNode").root);
  }

  private respond(node: NodeId): string {
    const responses = this.graph.responses(node);
    if (responses.length === 0) {
      throw new EmptyResponseSetError(node);
    }
    const text = responses[pickIndex(this.random, responses.length)];
    this.sink.deliver(text);
    return text;
  }

  private requireCursor(operation: string): Cursor {
    if (!this.cursor) throw new ChatBotStateError(operation);
    return this.cursor;
  }
}
