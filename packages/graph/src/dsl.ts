import { silentLogger, type Logger } from "@parley/core";
import type { DialogueVerification, NodeId } from "./types.js";
import { DialogueGraph } from "./graph.js";
import { assertValidDialogue } from "./verify.js";
import { DialogueSyntaxError, InvalidGraphStructureError } from "./errors.js";

/** A parsed, verified and frozen dialogue. */
export interface LoadedDialogue {
  readonly graph: DialogueGraph;
  readonly root: NodeId;
  readonly verification: DialogueVerification;
}

export interface ParseDialogueOptions {
  logger?: Logger;
}

const ROOT_DIRECTIVE = /^@root\s+(\S+)$/;
const RESPONSE_LINE = /^(\d+)\s*:\s*(.*)$/;
const EDGE_LINE = /^(\d+)\s*->\s*(\d+)\s*\[(.*)\]$/;

/**
 * Parse a dialogue from a line-oriented script.
 *
 * Syntax — one declaration per line:
 *   `<id>: <response text>`          add a response to node `<id>`
 *   `<from> -> <to> [kw1, kw2, ...]` add an edge triggered by the keywords
 *   `@root <id>`                     choose the root node
 *
 * Nodes are created on first mention. Without `@root`, the first node that
 * no edge points to becomes the root. Blank lines and lines starting with
 * `#` are ignored.
 *
 * @example
 * ```ts
 * const { graph, root } = parseDialogue(`
 *   0: Hello! Ask me about pointers.
 *   1: A pointer stores an address.
 *   0 -> 1 [pointer, address]
 *   1 -> 0 [back]
 *   @root 0
 * `);
 * ```
 */
export function parseDialogue(source: string, options: ParseDialogueOptions = {}): LoadedDialogue {
  const logger = options.logger ?? silentLogger;
  const graph = new DialogueGraph();
  let declaredRoot: NodeId | undefined;

  const lines = source.split("\n");
  for (let index = 0; index < lines.length; index++) {
    const rawLine = lines[index];
    const lineNo = index + 1;
    const line = rawLine.trim();
    if (line === "" || line.startsWith("#")) continue;

    const rootMatch = line.match(ROOT_DIRECTIVE);
    if (rootMatch) {
      if (declaredRoot !== undefined) {
        throw new DialogueSyntaxError(lineNo, rawLine, "root declared twice");
      }
      if (!/^\d+$/.test(rootMatch[1])) {
        throw new DialogueSyntaxError(lineNo, rawLine, "root must be a node id");
      }
      declaredRoot = parseInt(rootMatch[1], 10);
      continue;
    }

    const edgeMatch = line.match(EDGE_LINE);
    if (edgeMatch) {
      const keywords = edgeMatch[3]
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean);
      if (keywords.length === 0) {
        throw new DialogueSyntaxError(lineNo, rawLine, "edge needs at least one keyword");
      }
      const from = graph.ensureNode(parseInt(edgeMatch[1], 10)).id;
      const to = graph.ensureNode(parseInt(edgeMatch[2], 10)).id;
      graph.connect(from, to, keywords);
      continue;
    }

    const responseMatch = line.match(RESPONSE_LINE);
    if (responseMatch) {
      const text = responseMatch[2].trim();
      if (!text) {
        throw new DialogueSyntaxError(lineNo, rawLine, "missing response text");
      }
      graph.addResponse(graph.ensureNode(parseInt(responseMatch[1], 10)).id, text);
      continue;
    }

    throw new DialogueSyntaxError(
      lineNo,
      rawLine,
      'expected "<id>: <response>", "<from> -> <to> [keywords]" or "@root <id>"'
    );
  }

  if (graph.size === 0) {
    throw new InvalidGraphStructureError("Dialogue script declares no nodes");
  }

  const root = declaredRoot ?? inferRoot(graph, logger);
  const verification = assertValidDialogue(graph, root);
  if (verification.unreachableNodes.length > 0) {
    logger.warn(`nodes unreachable from root ${root}: ${verification.unreachableNodes.join(", ")}`);
  }
  logger.info(`loaded ${graph.size} nodes and ${graph.edgeCount} edges, root ${root}`);

  return { graph: graph.freeze(), root, verification };
}

function inferRoot(graph: DialogueGraph, logger: Logger): NodeId {
  const candidates = graph.findRoot();
  if (candidates.length === 0) {
    throw new InvalidGraphStructureError(
      'Every node has an incoming edge; declare the root with "@root <id>"'
    );
  }
  if (candidates.length > 1) {
    logger.debug(`several nodes without incoming edges (${candidates.join(", ")}), using ${candidates[0]}`);
  }
  return candidates[0];
}
