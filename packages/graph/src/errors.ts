import type { DialogueVerification, NodeId } from "./types.js";

/**
 * Thrown when a dialogue graph is malformed: a dangling edge, a duplicate or
 * missing node, a missing root, or a mutation after the graph was frozen.
 */
export class InvalidGraphStructureError extends Error {
  constructor(
    message: string,
    readonly verification?: DialogueVerification
  ) {
    super(message);
    this.name = "InvalidGraphStructureError";
  }
}

/** Thrown when the conversation reaches a node that has nothing to say. */
export class EmptyResponseSetError extends Error {
  constructor(readonly nodeId: NodeId) {
    super(`Node ${nodeId} has no responses`);
    this.name = "EmptyResponseSetError";
  }
}

/** Malformed line in a dialogue script. */
export class DialogueSyntaxError extends SyntaxError {
  constructor(
    readonly line: number,
    readonly source: string,
    reason: string
  ) {
    super(`Line ${line}: ${reason} in: "${source}"`);
    this.name = "DialogueSyntaxError";
  }
}
