import type { NodeId } from "./types.js";
import type { DialogueGraph } from "./graph.js";

/** Breadth-first search from `start` over outgoing edges, returning node ids in visit order. */
export function bfs(graph: DialogueGraph, start: NodeId): NodeId[] {
  if (!graph.hasNode(start)) return [];
  const visited = new Set<NodeId>([start]);
  const order: NodeId[] = [];
  const queue: NodeId[] = [start];

  for (let head = 0; head < queue.length; head++) {
    const node = queue[head];
    order.push(node);
    for (const edge of graph.outgoingEdges(node)) {
      if (!visited.has(edge.target)) {
        visited.add(edge.target);
        queue.push(edge.target);
      }
    }
  }
  return order;
}

/** All node ids reachable from `start` (inclusive). */
export function reachable(graph: DialogueGraph, start: NodeId): Set<NodeId> {
  return new Set(bfs(graph, start));
}

/** Check if there is a directed path from `from` to `to`. */
export function hasPath(graph: DialogueGraph, from: NodeId, to: NodeId): boolean {
  if (from === to) return graph.hasNode(from);
  return reachable(graph, from).has(to);
}
