/**
 * Tests for the parallel extractor
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'path';
import { Worker } from 'worker_threads';
import { ParallelExtractor, ThreadRunner } from '../src/core/parallel-extractor.js';
import { extractBatch, failBatch } from '../src/core/extract-task.js';
import type { ApiDocRecord } from '../src/parser/index.js';
import type { LogEntry } from '../src/utils/logger.js';
import { captureLogs, functionPage, makeTempDir, removeDir, writeDoc } from './helpers.js';

async function collect(iterable: AsyncIterable<ApiDocRecord>): Promise<ApiDocRecord[]> {
  const records: ApiDocRecord[] = [];
  for await (const record of iterable) {
    records.push(record);
  }
  return records.sort((a, b) => a.name.localeCompare(b.name));
}

describe('ParallelExtractor', () => {
  let testDir: string;
  let logs: LogEntry[];

  beforeEach(() => {
    logs = captureLogs();
    testDir = makeTempDir();

    writeDoc(testDir, 'fileapi/nf-fileapi-createfile.md', functionPage('CreateFile', 'Creates a file.'));
    writeDoc(testDir, 'handleapi/nf-handleapi-closehandle.md', functionPage('CloseHandle', 'Closes a handle.'));
    writeDoc(testDir, 'fileapi/ns-fileapi-foo_info.md', '---\ntitle: FOO_INFO structure (fileapi.h)\n---\n');
    writeDoc(testDir, 'fileapi/_fileapi-shared.md', functionPage('SharedFragment'));
    writeDoc(testDir, 'fileapi/notes.txt', functionPage('NotesPage'));
  });

  afterEach(() => {
    removeDir(testDir);
  });

  it('should yield every page that parses', async () => {
    const extractor = new ParallelExtractor({ runner: 'inline' });
    const records = await collect(extractor.extract(testDir));

    expect(records).toEqual([
      { name: 'CloseHandle', content: '\nCloses a handle.' },
      { name: 'CreateFile', content: '\nCreates a file.' },
    ]);
    expect(extractor.stats).toMatchObject({ files: 3, parsed: 2, failed: 1 });
  });

  it('should yield frozen records', async () => {
    const records = await collect(new ParallelExtractor({ runner: 'inline' }).extract(testDir));
    expect(records.every((record) => Object.isFrozen(record))).toBe(true);
  });

  it('should log each failing file at debug level', async () => {
    await collect(new ParallelExtractor({ runner: 'inline' }).extract(testDir));

    const failures = logs.filter((entry) => entry.message.startsWith('failed to process'));
    expect(failures).toHaveLength(1);
    expect(failures[0]).toMatchObject({
      level: 'debug',
      message: `failed to process ${path.join(testDir, 'fileapi', 'ns-fileapi-foo_info.md')}`,
      context: { code: 'UNSUPPORTED_TITLE' },
    });
  });

  it('should spread small batches over several workers', async () => {
    const extractor = new ParallelExtractor({ runner: 'inline', batchSize: 1, workers: 2 });
    const records = await collect(extractor.extract(testDir));

    expect(records.map((record) => record.name)).toEqual(['CloseHandle', 'CreateFile']);
    expect(extractor.stats).toMatchObject({ files: 3, parsed: 2, failed: 1 });
  });

  it('should skip excluded paths', async () => {
    const extractor = new ParallelExtractor({ runner: 'inline', exclude: ['handleapi/**'] });
    const records = await collect(extractor.extract(testDir));

    expect(records.map((record) => record.name)).toEqual(['CreateFile']);
    expect(extractor.stats).toMatchObject({ files: 2, parsed: 1, failed: 1 });
  });

  it('should use the configured extension', async () => {
    const extractor = new ParallelExtractor({ runner: 'inline', extension: '.txt' });
    const records = await collect(extractor.extract(testDir));

    expect(records.map((record) => record.name)).toEqual(['NotesPage']);
  });

  it('should fall back to the calling thread without a compiled worker', async () => {
    const extractor = new ParallelExtractor({ runner: 'auto' });
    const records = await collect(extractor.extract(testDir));

    expect(records.map((record) => record.name)).toEqual(['CloseHandle', 'CreateFile']);
  });

  it('should warn and yield nothing for a missing root', async () => {
    const missing = path.join(testDir, 'absent');
    const extractor = new ParallelExtractor({ runner: 'inline' });

    expect(await collect(extractor.extract(missing))).toEqual([]);
    expect(extractor.stats).toMatchObject({ files: 0, parsed: 0, failed: 0 });
    expect(logs.filter((entry) => entry.level === 'warn').map((entry) => entry.message)).toEqual([
      `${missing} directory could not be found`,
      'try: git submodule update --recursive',
      `skipping ${missing}`,
    ]);
  });

  it('should reset the stats between runs', async () => {
    const extractor = new ParallelExtractor({ runner: 'inline' });
    await collect(extractor.extract(testDir));
    await collect(extractor.extract(path.join(testDir, 'handleapi')));

    expect(extractor.stats).toMatchObject({ files: 1, parsed: 1, failed: 0 });
  });
});

describe('worker threads', () => {
  const workerScript = new URL('./fixtures/page-worker.mjs', import.meta.url);
  let testDir: string;
  let logs: LogEntry[];

  beforeEach(() => {
    logs = captureLogs();
    testDir = makeTempDir();
  });

  afterEach(() => {
    removeDir(testDir);
  });

  it('should parse batches on worker threads', async () => {
    for (const name of ['CloseHandle', 'CreateFile', 'ReadFile']) {
      writeDoc(testDir, `${name}.md`, functionPage(name));
    }
    const extractor = new ParallelExtractor({ runner: 'threads', workerScript, batchSize: 1, workers: 1 });

    const records = await collect(extractor.extract(testDir));

    expect(records.map((record) => record.name)).toEqual(['CloseHandle', 'CreateFile', 'ReadFile']);
    // One worker, reused for every batch
    expect(new Set(records.map((record) => record.content)).size).toBe(1);
    expect(records[0].content).not.toBe('thread 0');
    expect(extractor.stats).toMatchObject({ files: 3, parsed: 3, failed: 0 });
  });

  it('should fail only the batch of a crashed worker', async () => {
    for (const name of ['a', 'b', 'crash', 'd']) {
      writeDoc(testDir, `${name}.md`, functionPage(name));
    }
    const extractor = new ParallelExtractor({ runner: 'threads', workerScript, batchSize: 1, workers: 1 });

    const records = await collect(extractor.extract(testDir));

    expect(records.map((record) => record.name)).toEqual(['a', 'b', 'd']);
    expect(extractor.stats).toMatchObject({ files: 4, parsed: 3, failed: 1 });
    expect(logs.find((entry) => entry.message.startsWith('failed to process'))).toMatchObject({
      message: `failed to process ${path.join(testDir, 'crash.md')}`,
      context: { code: 'INTERNAL_ERROR', reason: 'worker exited with code 1' },
    });
    expect(logs.filter((entry) => entry.level === 'error').map((entry) => entry.message)).toEqual([
      'Worker exited during a task',
    ]);
  });

  it('should reuse idle workers and terminate them on dispose', async () => {
    const runner = new ThreadRunner(() => new Worker(workerScript));

    const first = await runner.run({ id: 0, files: ['/docs/a.md'] });
    const second = await runner.run({ id: 1, files: ['/docs/b.md'] });

    expect(first.records[0].name).toBe('a');
    expect(second.records[0].content).toBe(first.records[0].content);
    expect(runner.size).toBe(1);

    await runner.dispose();
    expect(runner.size).toBe(0);
  });

  it('should fail a batch whose worker cannot be started', async () => {
    const runner = new ThreadRunner(() => {
      throw new Error('thread limit reached');
    });

    const result = await runner.run({ id: 4, files: ['/docs/a.md', '/docs/b.md'] });

    expect(result).toEqual({
      id: 4,
      records: [],
      failures: [
        { file: '/docs/a.md', code: 'INTERNAL_ERROR', message: 'thread limit reached' },
        { file: '/docs/b.md', code: 'INTERNAL_ERROR', message: 'thread limit reached' },
      ],
    });
    expect(runner.size).toBe(0);
    expect(logs.filter((entry) => entry.level === 'error').map((entry) => entry.message)).toEqual([
      'Could not start a worker',
    ]);
    await runner.dispose();
  });

  it('should parse on the calling thread when the worker script is missing', async () => {
    writeDoc(testDir, 'ReadFile.md', functionPage('ReadFile'));
    const extractor = new ParallelExtractor({
      runner: 'threads',
      workerScript: new URL('./no-such-worker.mjs', import.meta.url),
    });

    const records = await collect(extractor.extract(testDir));

    expect(records.map((record) => record.name)).toEqual(['ReadFile']);
    expect(logs.filter((entry) => entry.level === 'warn').map((entry) => entry.message)).toEqual([
      'Worker script not found, parsing on the main thread',
    ]);
  });
});

describe('extraction tasks', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = makeTempDir();
  });

  afterEach(() => {
    removeDir(testDir);
  });

  it('should split a batch into records and failures', () => {
    const good = writeDoc(testDir, 'good.md', functionPage('ReadFile'));
    const missing = path.join(testDir, 'missing.md');

    const result = extractBatch({ id: 7, files: [good, missing] });

    expect(result.id).toBe(7);
    expect(result.records).toEqual([{ name: 'ReadFile', content: '' }]);
    expect(result.failures).toEqual([
      { file: missing, code: 'FILE_NOT_FOUND', message: `File not found: ${missing}` },
    ]);
  });

  it('should fail every file of a crashed batch', () => {
    expect(failBatch({ id: 3, files: ['a.md', 'b.md'] }, new Error('worker exited with code 1'))).toEqual({
      id: 3,
      records: [],
      failures: [
        { file: 'a.md', code: 'INTERNAL_ERROR', message: 'worker exited with code 1' },
        { file: 'b.md', code: 'INTERNAL_ERROR', message: 'worker exited with code 1' },
      ],
    });
  });
});
