/**
 * Compute the Levenshtein edit distance between two strings.
 * Case-insensitive comparison.
 */
export function computeLevenshteinDistance(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();

  if (left === right) return 0;
  if (left.length === 0) return right.length;
  if (right.length === 0) return left.length;

  let prev = Array.from({ length: right.length + 1 }, (_, j) => j);
  let curr = new Array<number>(right.length + 1).fill(0);

  for (let i = 1; i <= left.length; i++) {
    curr[0] = i;
    for (let j = 1; j <= right.length; j++) {
      const cost = left[i - 1] === right[j - 1] ? 0 : 1;
      curr[j] = Math.min(
        prev[j]! + 1,
        curr[j - 1]! + 1,
        prev[j - 1]! + cost,
      );
    }
    [prev, curr] = [curr, prev];
  }

  return prev[right.length]!;
}

export type Scored<T> = {
  value: T;
  distance: number;
  /** One of the candidate's names contains the query. */
  contains: boolean;
};

/**
 * Rank candidates against a query. A candidate may go by several names (a
 * deck by its file name and its title); its best name counts. Candidates
 * whose name contains the query rank ahead of the rest, then by distance.
 */
export function rankCandidates<T>(
  query: string,
  candidates: T[],
  namesOf: (candidate: T) => string[],
  maxResults = 5,
): Scored<T>[] {
  const needle = query.toLowerCase();
  const scored = candidates.map((value): Scored<T> => {
    const names = namesOf(value);
    return {
      value,
      distance: Math.min(...names.map((name) => computeLevenshteinDistance(query, name))),
      contains: names.some((name) => name.toLowerCase().includes(needle)),
    };
  });

  scored.sort((a, b) => Number(b.contains) - Number(a.contains) || a.distance - b.distance);

  return scored.slice(0, maxResults);
}

/**
 * Largest edit distance still accepted as a typo of `query`. Anything
 * further away is treated as no match, since a match selects a deck to write.
 */
export function typoTolerance(query: string): number {
  return Math.max(2, Math.floor(query.length / 3));
}
