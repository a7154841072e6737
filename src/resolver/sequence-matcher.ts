/**
 * symdoc - Sequence Similarity
 * @module resolver/sequence-matcher
 *
 * Ratcliff/Obershelp "gestalt pattern matching": the similarity of two
 * strings is `2 * M / T`, where `M` counts characters in the longest common
 * blocks found recursively and `T` is the combined length. Strings are
 * compared by code point and case-sensitively.
 */

// =============================================================================
// Types
// =============================================================================

export interface MatchingBlock {
  /** Start in `a` */
  a: number;
  /** Start in `b` */
  b: number;
  size: number;
}

export interface CloseMatchOptions {
  /** Maximum number of matches (default: 3) */
  limit?: number;
  /** Minimum similarity in [0, 1] (default: 0.6) */
  cutoff?: number;
}

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_MATCH_LIMIT = 3;
export const DEFAULT_MATCH_CUTOFF = 0.6;

/** `b` sequences at least this long drop their most frequent characters */
const AUTOJUNK_MIN_LENGTH = 200;

function ratioOf(matches: number, length: number): number {
  return length > 0 ? (2 * matches) / length : 1;
}

// =============================================================================
// Sequence Matcher
// =============================================================================

/**
 * Compares one `b` string against many `a` strings; the index built for `b`
 * is reused between calls to {@link setA}.
 *
 * ```typescript
 * const matcher = new SequenceMatcher('CreateFile', 'CretaeFile');
 * matcher.ratio(); // 0.9
 * ```
 */
export class SequenceMatcher {
  private a: string[] = [];
  private b: string[] = [];
  /** Positions of each character of `b`, popular characters removed */
  private b2j = new Map<string, number[]>();
  private bCounts: Map<string, number> | null = null;
  private matchingBlocks: MatchingBlock[] | null = null;

  constructor(a = '', b = '') {
    this.setB(b);
    this.setA(a);
  }

  setA(a: string): void {
    this.a = Array.from(a);
    this.matchingBlocks = null;
  }

  setB(b: string): void {
    this.b = Array.from(b);
    this.matchingBlocks = null;
    this.bCounts = null;
    this.indexB();
  }

  private indexB(): void {
    const b2j = new Map<string, number[]>();
    this.b.forEach((char, j) => {
      const positions = b2j.get(char);
      if (positions) {
        positions.push(j);
      } else {
        b2j.set(char, [j]);
      }
    });

    const n = this.b.length;
    if (n >= AUTOJUNK_MIN_LENGTH) {
      const threshold = Math.floor(n / 100) + 1;
      for (const [char, positions] of b2j) {
        if (positions.length > threshold) {
          b2j.delete(char);
        }
      }
    }

    this.b2j = b2j;
  }

  /**
   * Longest block with `a[i..i+size) == b[j..j+size)` inside the given
   * ranges. Ties go to the block starting earliest in `a`, then in `b`.
   */
  findLongestMatch(alo: number, ahi: number, blo: number, bhi: number): MatchingBlock {
    const { a, b, b2j } = this;
    let bestI = alo;
    let bestJ = blo;
    let bestSize = 0;
    let j2len = new Map<number, number>();

    for (let i = alo; i < ahi; i++) {
      const nextJ2len = new Map<number, number>();
      for (const j of b2j.get(a[i]) ?? []) {
        if (j < blo) continue;
        if (j >= bhi) break;
        const k = (j2len.get(j - 1) ?? 0) + 1;
        nextJ2len.set(j, k);
        if (k > bestSize) {
          bestI = i - k + 1;
          bestJ = j - k + 1;
          bestSize = k;
        }
      }
      j2len = nextJ2len;
    }

    // Popular characters were left out of the index; grow the block over them
    while (bestI > alo && bestJ > blo && a[bestI - 1] === b[bestJ - 1]) {
      bestI--;
      bestJ--;
      bestSize++;
    }
    while (bestI + bestSize < ahi && bestJ + bestSize < bhi && a[bestI + bestSize] === b[bestJ + bestSize]) {
      bestSize++;
    }

    return { a: bestI, b: bestJ, size: bestSize };
  }

  /**
   * Non-overlapping common blocks, in increasing order, adjacent blocks merged
   */
  getMatchingBlocks(): MatchingBlock[] {
    if (this.matchingBlocks) {
      return this.matchingBlocks;
    }

    const queue: Array<[number, number, number, number]> = [[0, this.a.length, 0, this.b.length]];
    const blocks: MatchingBlock[] = [];

    for (let range = queue.pop(); range; range = queue.pop()) {
      const [alo, ahi, blo, bhi] = range;
      const match = this.findLongestMatch(alo, ahi, blo, bhi);
      if (match.size === 0) continue;

      blocks.push(match);
      if (alo < match.a && blo < match.b) {
        queue.push([alo, match.a, blo, match.b]);
      }
      if (match.a + match.size < ahi && match.b + match.size < bhi) {
        queue.push([match.a + match.size, ahi, match.b + match.size, bhi]);
      }
    }

    blocks.sort((x, y) => x.a - y.a || x.b - y.b);

    const merged: MatchingBlock[] = [];
    for (const block of blocks) {
      const last = merged[merged.length - 1];
      if (last && last.a + last.size === block.a && last.b + last.size === block.b) {
        last.size += block.size;
      } else {
        merged.push({ ...block });
      }
    }

    this.matchingBlocks = merged;
    return merged;
  }

  /**
   * Similarity in [0, 1]; two empty strings are identical
   */
  ratio(): number {
    const matches = this.getMatchingBlocks().reduce((sum, block) => sum + block.size, 0);
    return ratioOf(matches, this.a.length + this.b.length);
  }

  /**
   * Upper bound on {@link ratio} from character counts alone
   */
  quickRatio(): number {
    if (!this.bCounts) {
      this.bCounts = new Map();
      for (const char of this.b) {
        this.bCounts.set(char, (this.bCounts.get(char) ?? 0) + 1);
      }
    }

    const available = new Map<string, number>();
    let matches = 0;
    for (const char of this.a) {
      const left = available.get(char) ?? this.bCounts.get(char) ?? 0;
      available.set(char, left - 1);
      if (left > 0) {
        matches++;
      }
    }
    return ratioOf(matches, this.a.length + this.b.length);
  }

  /**
   * Upper bound on {@link ratio} from the lengths alone
   */
  realQuickRatio(): number {
    const la = this.a.length;
    const lb = this.b.length;
    return ratioOf(Math.min(la, lb), la + lb);
  }
}

// =============================================================================
// Close Matches
// =============================================================================

/**
 * Candidates whose similarity to `word` reaches the cutoff, best first
 *
 * Equal scores are ordered by candidate, descending.
 *
 * @example
 * getCloseMatches('ReadFil', ['ReadFileEx', 'ReadFile', 'WriteFile'])
 * // ['ReadFile', 'ReadFileEx']
 */
export function getCloseMatches(
  word: string,
  candidates: Iterable<string>,
  options: CloseMatchOptions = {}
): string[] {
  const limit = options.limit ?? DEFAULT_MATCH_LIMIT;
  const cutoff = options.cutoff ?? DEFAULT_MATCH_CUTOFF;

  if (!(limit > 0)) {
    throw new RangeError(`limit must be > 0: ${limit}`);
  }
  if (!(cutoff >= 0 && cutoff <= 1)) {
    throw new RangeError(`cutoff must be in [0, 1]: ${cutoff}`);
  }

  const matcher = new SequenceMatcher('', word);
  const scored: Array<{ score: number; candidate: string }> = [];

  for (const candidate of candidates) {
    matcher.setA(candidate);
    if (
      matcher.realQuickRatio() >= cutoff &&
      matcher.quickRatio() >= cutoff &&
      matcher.ratio() >= cutoff
    ) {
      scored.push({ score: matcher.ratio(), candidate });
    }
  }

  scored.sort(
    (x, y) =>
      y.score - x.score || (x.candidate < y.candidate ? 1 : x.candidate > y.candidate ? -1 : 0)
  );

  return scored.slice(0, limit).map((entry) => entry.candidate);
}
