/**
 * symdoc - Documentation Lookup
 *
 * Host-facing service: takes whatever text the user highlighted and returns
 * the matching documentation, asking the host to disambiguate when needed.
 *
 * @module lookup
 */

import { type Disambiguator, type Resolution, chooseKey, resolveName } from './resolver/resolver.js';
import type { CloseMatchOptions } from './resolver/sequence-matcher.js';
import { cleanSelection } from './resolver/selection.js';
import type { DocsStoreView } from './storage/docs-view.js';
import { logger } from './utils/logger.js';

// ============================================================================
// TYPES
// ============================================================================

export type LookupResult =
  | { kind: 'found'; name: string; content: string; resolution: Resolution['kind'] }
  | { kind: 'invalid-selection' }
  | { kind: 'not-found'; query: string };

export interface DocsLookupOptions {
  /** Fuzzy matching thresholds */
  matching?: CloseMatchOptions;
}

// ============================================================================
// LOOKUP
// ============================================================================

/**
 * The key set is read once when the lookup is created; documents are read
 * through the view on every hit, following its cache policy.
 *
 * ```typescript
 * const lookup = new DocsLookup(new DocsStoreView('apidocs.db'), picker);
 * const result = await lookup.lookup('j_CreateFileW(hFile)');
 * ```
 */
export class DocsLookup {
  private readonly view: DocsStoreView;
  private readonly disambiguator: Disambiguator;
  private readonly knownKeys: ReadonlySet<string>;
  private readonly matching: CloseMatchOptions;

  constructor(view: DocsStoreView, disambiguator: Disambiguator, options: DocsLookupOptions = {}) {
    this.view = view;
    this.disambiguator = disambiguator;
    this.knownKeys = new Set(view.keys());
    this.matching = options.matching ?? {};
  }

  get size(): number {
    return this.knownKeys.size;
  }

  async lookup(selection: string | null | undefined): Promise<LookupResult> {
    const query = cleanSelection(selection);
    if (!query) {
      return { kind: 'invalid-selection' };
    }

    const resolution = resolveName(query, this.knownKeys, this.matching);
    const key = await chooseKey(resolution, this.disambiguator);
    if (key === null) {
      logger.debug('No documentation matched', { query, resolution: resolution.kind });
      return { kind: 'not-found', query };
    }

    const content = this.view.get(key);
    if (content === undefined) {
      logger.warn('Key disappeared from the database', { key, path: this.view.filePath });
      return { kind: 'not-found', query };
    }

    if (resolution.kind !== 'exact') {
      logger.debug('Resolved approximate name', { query, key, resolution: resolution.kind });
    }

    return { kind: 'found', name: key, content, resolution: resolution.kind };
  }
}
