/**
 * symdoc - Store File Format
 * @module storage/store
 *
 * The database is a single JSON document:
 *
 * ```json
 * { "codec": "deflate", "entries": { "CreateFile": "<base64 of compressed text>" } }
 * ```
 *
 * Writing goes through {@link DocsStoreWriter}, reading through
 * {@link DocsStoreView}; the two share nothing but this format.
 */

import { readFileSync } from 'node:fs';

import { StoreError } from '../utils/errors.js';
import type { Codec } from './codec.js';

// =============================================================================
// Types
// =============================================================================

export interface StoreDocument {
  codec: string;
  entries: Record<string, string>;
}

export interface StoreViewOptions {
  /** Keep the decoded file in memory after the first read (default: true) */
  useCache?: boolean;
  /** Codec the store was written with (default: deflate) */
  codec?: Codec;
}

// =============================================================================
// Constants
// =============================================================================

/** Default database file name */
export const DEFAULT_STORE_FILE = 'apidocs.db';

// =============================================================================
// Serialization
// =============================================================================

function isStoreDocument(value: unknown): value is StoreDocument {
  if (typeof value !== 'object' || value === null) return false;
  if (!('codec' in value) || typeof value.codec !== 'string') return false;
  if (!('entries' in value) || typeof value.entries !== 'object' || value.entries === null) {
    return false;
  }
  return Object.values(value.entries).every((entry) => typeof entry === 'string');
}

/**
 * Serialize compressed entries into the store file contents
 */
export function serializeStore(codec: Codec, entries: ReadonlyMap<string, Buffer>): string {
  const document: StoreDocument = {
    codec: codec.name,
    entries: Object.fromEntries(
      [...entries].map(([name, data]) => [name, data.toString('base64')])
    ),
  };
  return JSON.stringify(document);
}

/**
 * Parse store file contents back into compressed entries
 */
export function deserializeStore(text: string, codec: Codec): Map<string, Buffer> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new StoreError('STORE_CORRUPTED', 'Database file is not valid JSON', {
      cause: error instanceof Error ? error : undefined,
    });
  }

  if (!isStoreDocument(parsed)) {
    throw new StoreError('STORE_CORRUPTED', 'Database file has an unexpected layout');
  }

  if (parsed.codec !== codec.name) {
    throw new StoreError(
      'CODEC_MISMATCH',
      `Database was written with codec "${parsed.codec}", expected "${codec.name}"`
    );
  }

  const entries = new Map<string, Buffer>();
  for (const [name, encoded] of Object.entries(parsed.entries)) {
    entries.set(name, Buffer.from(encoded, 'base64'));
  }
  return entries;
}

/**
 * Read and decode a store file
 */
export function readStoreFile(filePath: string, codec: Codec): Map<string, Buffer> {
  return deserializeStore(readFileSync(filePath, 'utf-8'), codec);
}
