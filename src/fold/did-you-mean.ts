import { SUGGESTION_THRESHOLD } from "../core/constants.js";

/**
 * Rank options by how closely they resemble `given`, best first.
 *
 * Each option is compared only against its first `given.length + 1`
 * characters, so a short typo still matches a long identifier. Options
 * scoring below the suggestion threshold are dropped; equal scores keep
 * alphabetical order.
 */
export function didYouMean(
  given: string,
  options: Iterable<string>,
): string[] {
  const input = [...given];

  const scored: Array<{ option: string; score: number }> = [];
  for (const option of options) {
    const prefix = [...option].slice(0, input.length + 1);
    scored.push({ option, score: normalizedDamerauLevenshtein(input, prefix) });
  }

  return scored
    .filter(({ score }) => score >= SUGGESTION_THRESHOLD)
    .sort((a, b) =>
      b.score !== a.score
        ? b.score - a.score
        : a.option < b.option
          ? -1
          : a.option > b.option
            ? 1
            : 0,
    )
    .map(({ option }) => option);
}

/** Similarity in [0, 1]. Two empty sequences are identical. */
export function normalizedDamerauLevenshtein(
  a: readonly string[],
  b: readonly string[],
): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - damerauLevenshtein(a, b) / longest;
}

/**
 * Edit distance counting insertions, deletions, substitutions and
 * transpositions of adjacent characters, where transposed characters may
 * still be edited afterwards.
 */
export function damerauLevenshtein(
  a: readonly string[],
  b: readonly string[],
): number {
  const max = a.length + b.length;
  const d: number[][] = [];
  for (let i = 0; i < a.length + 2; i++) {
    d.push(new Array<number>(b.length + 2).fill(0));
  }

  d[0][0] = max;
  for (let i = 0; i <= a.length; i++) {
    d[i + 1][0] = max;
    d[i + 1][1] = i;
  }
  for (let j = 0; j <= b.length; j++) {
    d[0][j + 1] = max;
    d[1][j + 1] = j;
  }

  // Last row where each character of `a` was seen.
  const lastRow = new Map<string, number>();

  for (let i = 1; i <= a.length; i++) {
    let lastMatchCol = 0;
    for (let j = 1; j <= b.length; j++) {
      const k = lastRow.get(b[j - 1]) ?? 0;
      const l = lastMatchCol;
      let cost = 1;
      if (a[i - 1] === b[j - 1]) {
        cost = 0;
        lastMatchCol = j;
      }
      d[i + 1][j + 1] = Math.min(
        d[i][j] + cost,
        d[i + 1][j] + 1,
        d[i][j + 1] + 1,
        d[k][l] + (i - k - 1) + 1 + (j - l - 1),
      );
    }
    lastRow.set(a[i - 1], i);
  }

  return d[a.length + 1][b.length + 1];
}
