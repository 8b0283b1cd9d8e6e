import type { DialogueEdge, DialogueNode, EdgeId, NodeId } from "./types.js";
import { InvalidGraphStructureError } from "./errors.js";

interface NodeRecord {
  readonly id: NodeId;
  readonly responses: string[];
  /** Owned by this node. */
  readonly outgoing: DialogueEdge[];
  /** Back-references only; the owning node is `edge.source`. */
  readonly incoming: DialogueEdge[];
}

/**
 * Arena of dialogue nodes addressed by numeric id.
 *
 * Edges hold ids, never node objects, so cycles need no special handling.
 * A node owns its outgoing edges; the incoming-edge index is a pure relation
 * kept alongside for introspection. The graph is built once, then
 * {@link DialogueGraph.freeze | frozen} and only read during a conversation.
 *
 * @example
 * ```ts
 * const g = new DialogueGraph();
 * g.addNode(0);
 * g.addNode(1);
 * g.addResponse(0, "Hi! Ask me about memory.");
 * g.addResponse(1, "The heap holds dynamic allocations.");
 * g.connect(0, 1, ["heap", "memory"]);
 * g.outgoingEdges(0)[0].target; // 1
 * ```
 */
export class DialogueGraph {
  private readonly records = new Map<NodeId, NodeRecord>();
  private readonly created = new WeakSet<DialogueEdge>();
  private readonly attached = new Set<DialogueEdge>();
  private nextEdgeId: EdgeId = 0;
  private frozen = false;

  /** Number of nodes. */
  get size(): number {
    return this.records.size;
  }

  /** Number of attached edges. */
  get edgeCount(): number {
    return this.attached.size;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /** Create a node. Ids must be unique non-negative integers. */
  addNode(id: NodeId): DialogueNode {
    this.assertMutable();
    if (!Number.isInteger(id) || id < 0) {
      throw new InvalidGraphStructureError(`Node id must be a non-negative integer, got ${id}`);
    }
    if (this.records.has(id)) {
      throw new InvalidGraphStructureError(`Node ${id} already exists`);
    }
    const record: NodeRecord = { id, responses: [], outgoing: [], incoming: [] };
    this.records.set(id, record);
    return view(record);
  }

  /** Return the node with `id`, creating it if it does not exist yet. */
  ensureNode(id: NodeId): DialogueNode {
    const existing = this.records.get(id);
    return existing ? view(existing) : this.addNode(id);
  }

  hasNode(id: NodeId): boolean {
    return this.records.has(id);
  }

  /** Read-only view of a node. Throws if the node does not exist. */
  node(id: NodeId): DialogueNode {
    return view(this.record(id));
  }

  /** Node ids in insertion order. */
  nodeIds(): NodeId[] {
    return [...this.records.keys()];
  }

  /** Append a candidate response to a node. Duplicates are allowed. */
  addResponse(node: NodeId, text: string): void {
    this.assertMutable();
    this.record(node).responses.push(text);
  }

  /**
   * Build an edge value from `source` to `target`. The edge belongs to no node
   * until it is passed to {@link addOutgoingEdge}.
   */
  createEdge(source: NodeId, target: NodeId, keywords: ReadonlyArray<string>): DialogueEdge {
    this.assertMutable();
    this.record(source);
    const edge: DialogueEdge = Object.freeze({
      id: this.nextEdgeId++,
      source,
      target,
      keywords: Object.freeze([...keywords]),
    });
    this.created.add(edge);
    return edge;
  }

  /**
   * Hand ownership of `edge` to `node`. The edge must come from this graph's
   * {@link createEdge}, its target must be a node of this graph and its source
   * must be `node`.
   */
  addOutgoingEdge(node: NodeId, edge: DialogueEdge): void {
    this.assertMutable();
    const source = this.record(node);
    if (!this.created.has(edge)) {
      throw new InvalidGraphStructureError(
        `Edge ${edge.id} was not created by this graph; use createEdge()`
      );
    }
    if (edge.source !== node) {
      throw new InvalidGraphStructureError(
        `Edge ${edge.id} starts at node ${edge.source}, cannot attach it to node ${node}`
      );
    }
    const target = this.records.get(edge.target);
    if (!target) {
      throw new InvalidGraphStructureError(
        `Edge ${edge.id} from node ${node} targets missing node ${edge.target}`
      );
    }
    if (this.attached.has(edge)) {
      throw new InvalidGraphStructureError(`Edge ${edge.id} is already attached`);
    }
    this.attached.add(edge);
    source.outgoing.push(edge);
    target.incoming.push(edge);
  }

  /** Create an edge and attach it to its source in one step. */
  connect(source: NodeId, target: NodeId, keywords: ReadonlyArray<string>): DialogueEdge {
    const edge = this.createEdge(source, target, keywords);
    this.addOutgoingEdge(source, edge);
    return edge;
  }

  /** Edges owned by `node`, in insertion order. */
  outgoingEdges(node: NodeId): ReadonlyArray<DialogueEdge> {
    return this.record(node).outgoing;
  }

  /** Edges pointing at `node`, in insertion order. */
  incomingEdges(node: NodeId): ReadonlyArray<DialogueEdge> {
    return this.record(node).incoming;
  }

  /** Responses of `node`, in insertion order. */
  responses(node: NodeId): ReadonlyArray<string> {
    return this.record(node).responses;
  }

  /** Ids of nodes without incoming edges, in insertion order. */
  findRoot(): NodeId[] {
    const roots: NodeId[] = [];
    for (const record of this.records.values()) {
      if (record.incoming.length === 0) roots.push(record.id);
    }
    return roots;
  }

  /** Forbid further mutation. Idempotent. */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  private record(id: NodeId): NodeRecord {
    const record = this.records.get(id);
    if (!record) {
      throw new InvalidGraphStructureError(`Node ${id} does not exist`);
    }
    return record;
  }

  private assertMutable(): void {
    if (this.frozen) {
      throw new InvalidGraphStructureError("Dialogue graph is frozen");
    }
  }
}

function view(record: NodeRecord): DialogueNode {
  return { id: record.id, responses: record.responses, outgoing: record.outgoing };
}
