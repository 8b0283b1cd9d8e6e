export type { NodeId, EdgeId, DialogueNode, DialogueEdge, DialogueVerification } from "./types.js";

export { DialogueGraph } from "./graph.js";

export { InvalidGraphStructureError, EmptyResponseSetError, DialogueSyntaxError } from "./errors.js";

export { bfs, reachable, hasPath } from "./algorithms.js";

export { verifyDialogue, assertValidDialogue } from "./verify.js";

export { parseDialogue } from "./dsl.js";
export type { LoadedDialogue, ParseDialogueOptions } from "./dsl.js";

export { loadDialogueFile } from "./loader.js";
