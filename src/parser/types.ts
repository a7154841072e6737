/**
 * symdoc - Parser Types
 *
 * @module parser/types
 */

import type { SymdocError } from '../utils/errors.js';

// ============================================================================
// DOCUMENT TYPES
// ============================================================================

/**
 * One raw documentation page, split at its front-matter delimiters
 */
export interface SourceDocument {
  /** Path the page was read from */
  filePath: string;
  /** Metadata between the first and second `---` */
  frontMatter: string;
  /** Everything after the second `---`, delimiters inside it preserved */
  body: string;
}

/**
 * A documented symbol as it is stored in the database
 */
export interface ApiDocRecord {
  /** Case-sensitive symbol name, e.g. `CreateFileA` */
  readonly name: string;
  /** Normalized markdown */
  readonly content: string;
}

// ============================================================================
// PARSE RESULTS
// ============================================================================

export interface ParseOptions {
  /**
   * Accept names that break the naming rules. Only for debugging single
   * files; builds never set it.
   */
  force?: boolean;
  /** Skip the markdown normalizer and keep the raw body */
  raw?: boolean;
}

export type ParseOutcome =
  | { ok: true; record: ApiDocRecord }
  | { ok: false; filePath: string; error: SymdocError };
