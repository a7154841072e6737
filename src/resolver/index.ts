/**
 * symdoc - Resolver Module
 * @module resolver
 */

export {
  SequenceMatcher,
  getCloseMatches,
  DEFAULT_MATCH_LIMIT,
  DEFAULT_MATCH_CUTOFF,
  type MatchingBlock,
  type CloseMatchOptions,
} from './sequence-matcher.js';

export {
  resolveName,
  chooseKey,
  type Resolution,
  type ResolveOptions,
  type CloseMatcher,
  type Disambiguator,
} from './resolver.js';

export { cleanSelection, SELECTION_PREFIXES, type SelectionPrefix } from './selection.js';
