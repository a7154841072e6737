/**
 * symdoc - Store View
 * @module storage/docs-view
 *
 * Query-side, read-only access to a saved store.
 */

import { existsSync } from 'node:fs';

import { MissingFileError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { type Codec, deflateCodec } from './codec.js';
import { type StoreViewOptions, readStoreFile } from './store.js';

/**
 * Read-only view over a database file
 *
 * The file is opened lazily on the first access. With `useCache` (the
 * default) the decoded entries and the key set are kept for the lifetime of
 * the view; without it every call re-reads the file, so a database rebuilt
 * in place is picked up by the next query.
 *
 * ```typescript
 * const view = new DocsStoreView('apidocs.db');
 * view.get('CreateFile'); // normalized markdown, or undefined
 * ```
 */
export class DocsStoreView {
  readonly filePath: string;
  readonly useCache: boolean;
  private readonly codec: Codec;
  private cache: Map<string, Buffer> | null = null;
  private keyCache: Set<string> | null = null;

  constructor(filePath: string, options: StoreViewOptions = {}) {
    if (!existsSync(filePath)) {
      throw new MissingFileError(filePath, `Database file not found: ${filePath}`);
    }
    this.filePath = filePath;
    this.useCache = options.useCache ?? true;
    this.codec = options.codec ?? deflateCodec;
  }

  private entries(): Map<string, Buffer> {
    if (this.cache) {
      return this.cache;
    }

    logger.debug('Reading database', { path: this.filePath, cached: this.useCache });
    const entries = readStoreFile(this.filePath, this.codec);
    if (this.useCache) {
      this.cache = entries;
    }
    return entries;
  }

  /**
   * Decompressed document for `name`, or undefined when it is not stored
   */
  get(name: string): string | undefined {
    const data = this.entries().get(name);
    return data === undefined ? undefined : this.codec.decompress(data);
  }

  has(name: string): boolean {
    return this.entries().has(name);
  }

  /**
   * Every stored symbol name
   */
  keys(): ReadonlySet<string> {
    if (this.keyCache) {
      return this.keyCache;
    }
    const keys = new Set(this.entries().keys());
    if (this.useCache) {
      this.keyCache = keys;
    }
    return keys;
  }

  get size(): number {
    return this.entries().size;
  }
}
