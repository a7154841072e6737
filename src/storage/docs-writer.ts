/**
 * symdoc - Store Writer
 * @module storage/docs-writer
 *
 * Build-side container. Accepts documents and persists them; it has no
 * read-back API, so a store is never queried while it is being built.
 */

import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { logger } from '../utils/logger.js';
import { type Codec, deflateCodec } from './codec.js';
import { serializeStore } from './store.js';

export class DocsStoreWriter {
  private readonly entries = new Map<string, Buffer>();
  private readonly codec: Codec;

  constructor(codec: Codec = deflateCodec) {
    this.codec = codec;
  }

  /**
   * Insert or replace the document stored under `name`
   */
  set(name: string, content: string): void {
    this.entries.set(name, this.codec.compress(content));
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Write the store to `filePath`
   *
   * The file is written next to its destination and renamed into place, so
   * an interrupted save never leaves a truncated database behind.
   */
  async save(filePath: string): Promise<void> {
    const tempFile = `${filePath}.tmp`;
    const data = serializeStore(this.codec, this.entries);

    await mkdir(dirname(filePath), { recursive: true });

    try {
      await writeFile(tempFile, data, 'utf-8');
      await rename(tempFile, filePath);
    } catch (error) {
      await rm(tempFile, { force: true });
      throw error;
    }

    logger.info('Database saved', {
      path: filePath,
      entries: this.entries.size,
      size: `${(Buffer.byteLength(data) / 1024).toFixed(1)}KB`,
    });
  }
}
