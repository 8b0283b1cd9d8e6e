import { closestMatch } from "@parley/strings";
import type { DialogueEdge } from "@parley/graph";

/** The winning `(edge, keyword)` pair for an input. */
export interface TransitionMatch {
  readonly edge: DialogueEdge;
  readonly keyword: string;
  readonly distance: number;
}

/**
 * Pick the edge whose keyword is closest to `input` by edit distance.
 *
 * Pairs are enumerated edge by edge, keyword by keyword, in insertion order;
 * on equal distance the first pair wins. Returns `undefined` when there is no
 * pair to score.
 */
export function selectTransition(
  edges: ReadonlyArray<DialogueEdge>,
  input: string
): TransitionMatch | undefined {
  const pairs: Array<{ edge: DialogueEdge; keyword: string }> = [];
  for (const edge of edges) {
    for (const keyword of edge.keywords) {
      pairs.push({ edge, keyword });
    }
  }

  const best = closestMatch(
    input,
    pairs.map((p) => p.keyword)
  );
  if (best === undefined) return undefined;
  return { edge: pairs[best.index].edge, keyword: best.candidate, distance: best.distance };
}
