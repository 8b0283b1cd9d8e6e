import type { DialogueVerification, NodeId } from "./types.js";
import type { DialogueGraph } from "./graph.js";
import { reachable } from "./algorithms.js";
import { InvalidGraphStructureError } from "./errors.js";

/**
 * Check a dialogue graph before a conversation starts.
 *
 * A graph is valid when the root exists and every node has at least one
 * response. Unreachable nodes and leaves are reported but allowed: leaves
 * hand the conversation back to the root.
 */
export function verifyDialogue(graph: DialogueGraph, root: NodeId): DialogueVerification {
  const missingRoot = !graph.hasNode(root);
  const reached = missingRoot ? new Set<NodeId>() : reachable(graph, root);
  const ids = graph.nodeIds();

  const unreachableNodes = ids.filter((id) => !reached.has(id));
  const emptyNodes = ids.filter((id) => graph.responses(id).length === 0);
  const leafNodes = ids.filter((id) => graph.outgoingEdges(id).length === 0);

  return {
    valid: !missingRoot && emptyNodes.length === 0,
    missingRoot,
    unreachableNodes,
    emptyNodes,
    leafNodes,
  };
}

/** Like {@link verifyDialogue}, but throws when the graph is not valid. */
export function assertValidDialogue(graph: DialogueGraph, root: NodeId): DialogueVerification {
  const result = verifyDialogue(graph, root);
  if (result.valid) return result;

  const problems: string[] = [];
  if (result.missingRoot) problems.push(`root node ${root} does not exist`);
  if (result.emptyNodes.length > 0) {
    problems.push(`nodes without responses: ${result.emptyNodes.join(", ")}`);
  }
  throw new InvalidGraphStructureError(`Invalid dialogue graph: ${problems.join("; ")}`, result);
}
