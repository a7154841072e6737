/**
 * symdoc - Database Builder
 *
 * Parses every configured docset under a root directory and saves the
 * resulting records into one database file.
 *
 * @module builder
 */

import * as path from 'path';

import { DEFAULT_DOCSETS } from './config.js';
import { ParallelExtractor, type ParallelExtractorConfig } from './core/parallel-extractor.js';
import { type Codec, deflateCodec } from './storage/codec.js';
import { DocsStoreWriter } from './storage/docs-writer.js';
import { DEFAULT_STORE_FILE } from './storage/store.js';
import { EmptyResultError } from './utils/errors.js';
import { logger } from './utils/logger.js';
import { isDirectory } from './utils/paths.js';

// ============================================================================
// TYPES
// ============================================================================

export interface DocsBuilderOptions {
  /** Directory the docsets are relative to */
  rootDir: string;
  /** Docset subpaths, processed in order (later docsets win on name clashes) */
  docsets?: string[];
  /** Database file to write */
  output?: string;
  /** Value codec */
  codec?: Codec;
  /** Extraction pool settings */
  extractor?: ParallelExtractorConfig;
}

export interface DocsetSummary {
  docset: string;
  path: string;
  found: boolean;
  parsed: number;
  failed: number;
  durationMs: number;
}

export type BuildResult =
  | { status: 'saved'; output: string; records: number; docsets: DocsetSummary[] }
  | { status: 'empty'; docsets: DocsetSummary[] };

// ============================================================================
// BUILDER
// ============================================================================

/**
 * ```typescript
 * const result = await new DocsBuilder({ rootDir: '/tmp/docs' }).build();
 * if (result.status === 'empty') {
 *   // nothing checked out yet
 * }
 * ```
 */
export class DocsBuilder {
  private readonly rootDir: string;
  private readonly docsets: string[];
  private readonly output: string;
  private readonly codec: Codec;
  private readonly extractor: ParallelExtractor;

  constructor(options: DocsBuilderOptions) {
    this.rootDir = options.rootDir;
    this.docsets = options.docsets ?? DEFAULT_DOCSETS;
    this.output = options.output ?? DEFAULT_STORE_FILE;
    this.codec = options.codec ?? deflateCodec;
    this.extractor = new ParallelExtractor(options.extractor);
  }

  async build(): Promise<BuildResult> {
    logger.info('starting the parsing');

    const writer = new DocsStoreWriter(this.codec);
    const summaries: DocsetSummary[] = [];

    for (const docset of this.docsets) {
      const docsetPath = path.join(this.rootDir, docset);
      logger.info(`parsing ${docsetPath}`);

      // The coordinating loop is the only writer; records arrive batch by batch
      for await (const record of this.extractor.extract(docsetPath)) {
        writer.set(record.name, record.content);
      }

      const stats = this.extractor.stats;
      summaries.push({
        docset,
        path: docsetPath,
        found: isDirectory(docsetPath),
        parsed: stats.parsed,
        failed: stats.failed,
        durationMs: stats.durationMs,
      });
      logger.info(`parsing ${docsetPath} completed`, {
        files: stats.files,
        parsed: stats.parsed,
        failed: stats.failed,
        duration: `${stats.durationMs}ms`,
      });
    }

    logger.info('parsing was finished', { records: writer.size });

    if (writer.size === 0) {
      logger.error(`${new EmptyResultError(this.docsets).message}, exit`);
      return { status: 'empty', docsets: summaries };
    }

    await writer.save(this.output);
    logger.info(`saved to ${this.output}`);

    return { status: 'saved', output: this.output, records: writer.size, docsets: summaries };
  }
}
