/** Stable identity of a dialogue node: a non-negative integer. */
export type NodeId = number;

/** Identity of an edge, assigned by the graph that created it. */
export type EdgeId = number;

/** A keyword-triggered transition between two nodes. */
export interface DialogueEdge {
  readonly id: EdgeId;
  readonly source: NodeId;
  readonly target: NodeId;
  /** Trigger phrases, in declaration order. */
  readonly keywords: ReadonlyArray<string>;
}

/** Read-only view of a node and the edges it owns. */
export interface DialogueNode {
  readonly id: NodeId;
  /** Candidate bot responses, in declaration order. */
  readonly responses: ReadonlyArray<string>;
  /** Outgoing edges, in insertion order. */
  readonly outgoing: ReadonlyArray<DialogueEdge>;
}

/** Result of checking a dialogue graph before a conversation starts. */
export interface DialogueVerification {
  /** Root present and every node has at least one response. */
  readonly valid: boolean;
  readonly missingRoot: boolean;
  /** Nodes that no path from the root leads to. */
  readonly unreachableNodes: ReadonlyArray<NodeId>;
  /** Nodes without responses. */
  readonly emptyNodes: ReadonlyArray<NodeId>;
  /** Nodes without outgoing edges; the conversation returns to the root from them. */
  readonly leafNodes: ReadonlyArray<NodeId>;
}
