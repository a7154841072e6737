/**
 * symdoc - Name Resolver
 * @module resolver/resolver
 *
 * Maps a possibly misspelled symbol name onto a stored key.
 */

import { type CloseMatchOptions, getCloseMatches } from './sequence-matcher.js';

// =============================================================================
// Types
// =============================================================================

export type Resolution =
  | { kind: 'exact'; key: string }
  | { kind: 'fuzzy'; key: string }
  | { kind: 'ambiguous'; candidates: string[] }
  | { kind: 'not-found' };

export type CloseMatcher = (
  query: string,
  keys: Iterable<string>,
  options?: CloseMatchOptions
) => string[];

export interface ResolveOptions extends CloseMatchOptions {
  /** Fuzzy matching strategy (default: {@link getCloseMatches}) */
  matcher?: CloseMatcher;
}

/**
 * Single-choice picker supplied by the host
 */
export interface Disambiguator {
  /**
   * Index of the chosen candidate, or -1 when the user cancels
   */
  pick(candidates: readonly string[]): Promise<number>;
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Resolve `query` against the stored keys
 *
 * An exact key wins without any fuzzy matching. Otherwise a single close
 * match is accepted as a silent correction, and several are returned for
 * the caller to choose from, best first.
 */
export function resolveName(
  query: string,
  knownKeys: ReadonlySet<string>,
  options: ResolveOptions = {}
): Resolution {
  if (knownKeys.has(query)) {
    return { kind: 'exact', key: query };
  }

  const { matcher = getCloseMatches, ...matchOptions } = options;
  const matches = matcher(query, knownKeys, matchOptions);

  if (matches.length === 0) {
    return { kind: 'not-found' };
  }
  if (matches.length === 1) {
    return { kind: 'fuzzy', key: matches[0] };
  }
  return { kind: 'ambiguous', candidates: matches };
}

/**
 * Final key for a resolution, asking `disambiguator` when there are several
 * candidates. Cancelling is the same as not finding anything.
 */
export async function chooseKey(
  resolution: Resolution,
  disambiguator: Disambiguator
): Promise<string | null> {
  switch (resolution.kind) {
    case 'exact':
    case 'fuzzy':
      return resolution.key;
    case 'not-found':
      return null;
    case 'ambiguous': {
      const index = await disambiguator.pick(resolution.candidates);
      return resolution.candidates[index] ?? null;
    }
  }
}
