/**
 * Pricewise — Title Similarity
 *
 * Character-level sequence similarity: 2·M / (|a| + |b|), where M is the
 * total size of the matching blocks found by repeatedly taking the longest
 * common substring and recursing on both sides of it.
 *
 * Unlike token-set overlap, this scores "boat airdopes 141" against
 * "boat airdopes 141 anc" as near-identical.
 */

export interface MatchingBlock {
  /** Start index in `a`. */
  a: number;
  /** Start index in `b`. */
  b: number;
  size: number;
}

/** Sequences this long or longer ignore their most frequent elements when seeding matches. */
const POPULAR_MIN_LENGTH = 200;

/**
 * Map each element of `b` to the ascending list of indices where it occurs.
 * For long sequences, elements occurring in more than 1% of positions are
 * dropped from the index; they can still join a match by extension.
 */
function indexSequence(b: readonly string[]): Map<string, number[]> {
  const index = new Map<string, number[]>();

  b.forEach((element, position) => {
    const positions = index.get(element);
    if (positions) {
      positions.push(position);
    } else {
      index.set(element, [position]);
    }
  });

  if (b.length >= POPULAR_MIN_LENGTH) {
    const threshold = Math.floor(b.length / 100) + 1;
    for (const [element, positions] of index) {
      if (positions.length > threshold) {
        index.delete(element);
      }
    }
  }

  return index;
}

function findLongestMatch(
  a: readonly string[],
  b: readonly string[],
  bIndex: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): MatchingBlock {
  let bestA = alo;
  let bestB = blo;
  let bestSize = 0;

  // Length of the match ending at a[i-1], b[j] for each j
  let runLengths = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const nextRunLengths = new Map<number, number>();

    for (const j of bIndex.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;

      const k = (runLengths.get(j - 1) ?? 0) + 1;
      nextRunLengths.set(j, k);

      if (k > bestSize) {
        bestA = i - k + 1;
        bestB = j - k + 1;
        bestSize = k;
      }
    }

    runLengths = nextRunLengths;
  }

  // Grow the match over elements left out of the index
  while (bestA > alo && bestB > blo && a[bestA - 1] === b[bestB - 1]) {
    bestA--;
    bestB--;
    bestSize++;
  }
  while (
    bestA + bestSize < ahi &&
    bestB + bestSize < bhi &&
    a[bestA + bestSize] === b[bestB + bestSize]
  ) {
    bestSize++;
  }

  return { a: bestA, b: bestB, size: bestSize };
}

/**
 * Non-overlapping matching blocks in ascending order, adjacent blocks merged.
 */
export function matchingBlocks(left: string, right: string): MatchingBlock[] {
  const a = Array.from(left);
  const b = Array.from(right);
  const bIndex = indexSequence(b);

  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  const found: MatchingBlock[] = [];

  while (pending.length > 0) {
    const next = pending.pop();
    if (!next) break;
    const [alo, ahi, blo, bhi] = next;

    const match = findLongestMatch(a, b, bIndex, alo, ahi, blo, bhi);
    if (match.size === 0) continue;

    found.push(match);
    if (alo < match.a && blo < match.b) {
      pending.push([alo, match.a, blo, match.b]);
    }
    if (match.a + match.size < ahi && match.b + match.size < bhi) {
      pending.push([match.a + match.size, ahi, match.b + match.size, bhi]);
    }
  }

  found.sort((x, y) => x.a - y.a || x.b - y.b);

  const merged: MatchingBlock[] = [];
  for (const block of found) {
    const last = merged[merged.length - 1];
    if (last && last.a + last.size === block.a && last.b + last.size === block.b) {
      last.size += block.size;
    } else {
      merged.push({ ...block });
    }
  }

  return merged;
}

/**
 * Similarity in [0, 1]. Two empty strings score 1.
 */
export function sequenceRatio(left: string, right: string): number {
  const total = Array.from(left).length + Array.from(right).length;
  if (total === 0) return 1;

  const matches = matchingBlocks(left, right).reduce((sum, block) => sum + block.size, 0);
  return (2 * matches) / total;
}

/**
 * Similarity of two canonical titles. An empty title never matches anything.
 */
export function titleSimilarity(a: string, b: string): number {
  if (!a || !b) return 0;
  return sequenceRatio(a, b);
}
