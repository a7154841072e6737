/**
 * symdoc
 *
 * Offline lookup database for API symbol documentation.
 *
 * - Builder: parses markdown pages with front matter on a worker pool,
 *   normalizes them and saves a compressed key-value database
 * - Resolver: maps a highlighted, possibly misspelled name to a stored key,
 *   with caller-mediated disambiguation
 *
 * @packageDocumentation
 * @module symdoc
 *
 * @example Build
 * ```ts
 * import { DocsBuilder } from 'symdoc';
 *
 * await new DocsBuilder({ rootDir: '/tmp/docs', output: 'apidocs.db' }).build();
 * ```
 *
 * @example Lookup
 * ```ts
 * import { DocsLookup, DocsStoreView } from 'symdoc';
 *
 * const lookup = new DocsLookup(new DocsStoreView('apidocs.db'), {
 *   pick: async (candidates) => 0,
 * });
 * const result = await lookup.lookup('j_CreateFileW(hFile)');
 * ```
 */

export {
  DocsBuilder,
  type DocsBuilderOptions,
  type DocsetSummary,
  type BuildResult,
} from './builder.js';

export { DocsLookup, type DocsLookupOptions, type LookupResult } from './lookup.js';

export {
  loadConfig,
  mergeConfig,
  parseUserConfig,
  validateConfig,
  DEFAULT_CONFIG,
  DEFAULT_DOCSETS,
  type SymdocConfig,
  type ResolvedConfig,
} from './config.js';

export * from './core/index.js';
export * from './normalizer/index.js';
export * from './parser/index.js';
export * from './resolver/index.js';
export * from './storage/index.js';
export * from './utils/index.js';
