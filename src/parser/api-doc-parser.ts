/**
 * symdoc - Documentation Page Parser
 *
 * Turns one markdown page with front matter into an {@link ApiDocRecord}.
 * Only pages titled `<Name> function` are accepted.
 *
 * @module parser/api-doc-parser
 */

import { existsSync, readFileSync } from 'node:fs';

import { normalizeMarkdown } from '../normalizer/index.js';
import { FormatError, MissingFileError, wrapError } from '../utils/errors.js';
import { findNameViolation } from './name-rules.js';
import type { ApiDocRecord, ParseOptions, ParseOutcome, SourceDocument } from './types.js';

// ============================================================================
// CONSTANTS
// ============================================================================

/** Front-matter delimiter. Only its first two occurrences are structural. */
export const FRONT_MATTER_DELIMITER = '---';

const TITLE_PATTERN = /title: (.*)/;
const FUNCTION_TITLE_PATTERN = /(\S+) function/;

// ============================================================================
// READING
// ============================================================================

/**
 * Read a page as UTF-8 text
 *
 * Bytes that do not decode are dropped and line endings are normalized to
 * `\n`.
 */
export function readSourceText(filePath: string): string {
  if (!existsSync(filePath)) {
    throw new MissingFileError(filePath);
  }
  return readFileSync(filePath)
    .toString('utf-8')
    .replace(/\uFFFD/g, '')
    .replace(/\r\n?/g, '\n');
}

/**
 * Split page text into front matter and body
 *
 * Text before the first delimiter is ignored. The body keeps any further
 * delimiters, which show up in tables and code blocks.
 */
export function splitFrontMatter(text: string, filePath: string): SourceDocument {
  const [, frontMatter, ...body] = text.split(FRONT_MATTER_DELIMITER);
  if (frontMatter === undefined) {
    throw new FormatError('MISSING_FRONT_MATTER', `No front matter in ${filePath}`, { filePath });
  }
  return { filePath, frontMatter, body: body.join(FRONT_MATTER_DELIMITER) };
}

// ============================================================================
// NAME EXTRACTION
// ============================================================================

/**
 * Symbol name from a `title: CreateFileA function (fileapi.h)` field
 *
 * Backslashes (markdown escapes such as `Foo\_Bar`) are removed.
 */
export function extractSymbolName(frontMatter: string, filePath: string): string {
  const title = TITLE_PATTERN.exec(frontMatter);
  if (!title) {
    throw new FormatError('MISSING_TITLE', `Title is not present in ${filePath}`, { filePath });
  }

  const match = FUNCTION_TITLE_PATTERN.exec(title[1]);
  if (!match) {
    throw new FormatError('UNSUPPORTED_TITLE', `Unsupported title format in ${filePath}`, {
      filePath,
      technical: { title: title[1] },
    });
  }

  return match[1].replaceAll('\\', '');
}

function validateName(name: string, filePath: string, force: boolean): void {
  if (name === '') {
    throw new FormatError('INVALID_NAME', `Empty function name in ${filePath}`, { filePath });
  }
  if (force) return;

  const violation = findNameViolation(name);
  if (violation) {
    throw new FormatError('INVALID_NAME', `Invalid function name ${name} in ${filePath}`, {
      filePath,
      technical: { name, fragment: violation.fragment, kind: violation.kind },
    });
  }
}

// ============================================================================
// ENTRY POINTS
// ============================================================================

/**
 * Parse a page, throwing on failure
 */
export function readApiDoc(filePath: string, options: ParseOptions = {}): ApiDocRecord {
  const document = splitFrontMatter(readSourceText(filePath), filePath);
  const name = extractSymbolName(document.frontMatter, filePath);
  validateName(name, filePath, options.force ?? false);

  return Object.freeze({
    name,
    content: options.raw ? document.body : normalizeMarkdown(document.body),
  });
}

/**
 * Parse a page, reporting failure as a value so callers can skip the file
 */
export function parseApiDoc(filePath: string, options: ParseOptions = {}): ParseOutcome {
  try {
    return { ok: true, record: readApiDoc(filePath, options) };
  } catch (error) {
    return { ok: false, filePath, error: wrapError(error, `Failed to read ${filePath}`) };
  }
}
