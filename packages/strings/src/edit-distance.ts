/**
 * Edit distance (Levenshtein) between two strings, ignoring case.
 *
 * Counts the minimum number of single-character insertions, deletions or
 * substitutions needed to turn `a` into `b`. Characters are compared by code
 * point after upper-casing both inputs, so `editDistance("Hello", "HELLO")`
 * is `0`.
 *
 * Runs in O(|a|·|b|) time over a single rolling row of `|b| + 1` costs.
 *
 * @example
 * ```ts
 * editDistance("kitten", "sitting"); // 3
 * editDistance("", "abc");           // 3
 * ```
 */
export function editDistance(a: string, b: string): number {
  const s1 = [...a.toUpperCase()];
  const s2 = [...b.toUpperCase()];
  const m = s1.length;
  const n = s2.length;

  if (m === 0) return n;
  if (n === 0) return m;

  const costs = new Array<number>(n + 1);
  for (let k = 0; k <= n; k++) costs[k] = k;

  for (let i = 0; i < m; i++) {
    // `corner` holds the diagonal cost (row i-1, column j) before it is overwritten
    let corner = i;
    costs[0] = i + 1;

    for (let j = 0; j < n; j++) {
      const upper = costs[j + 1];
      if (s1[i] === s2[j]) {
        costs[j + 1] = corner;
      } else {
        costs[j + 1] = Math.min(costs[j], upper, corner) + 1;
      }
      corner = upper;
    }
  }

  return costs[n];
}

/** Result of {@link closestMatch}. */
export interface ClosestMatch {
  readonly candidate: string;
  readonly index: number;
  readonly distance: number;
}

/**
 * Find the candidate closest to `input` by {@link editDistance}.
 *
 * Ties go to the earliest candidate. Returns `undefined` for an empty list.
 */
export function closestMatch(
  input: string,
  candidates: ReadonlyArray<string>
): ClosestMatch | undefined {
  let best: ClosestMatch | undefined;
  for (let index = 0; index < candidates.length; index++) {
    const candidate = candidates[index];
    const distance = editDistance(candidate, input);
    if (best === undefined || distance < best.distance) {
      best = { candidate, index, distance };
    }
  }
  return best;
}
