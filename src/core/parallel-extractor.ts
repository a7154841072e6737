/**
 * symdoc - Parallel Extractor
 * @module core/parallel-extractor
 *
 * Walks a documentation tree and parses every page on a pool of worker
 * threads. Records are streamed batch by batch, in completion order.
 */

import { existsSync } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { Worker } from 'node:worker_threads';
import { glob } from 'glob';

import type { ApiDocRecord } from '../parser/index.js';
import { logger } from '../utils/logger.js';
import { isDirectory, isIncludeFragment } from '../utils/paths.js';
import {
  type ExtractionBatchResult,
  type ExtractionTask,
  extractBatch,
  failBatch,
} from './extract-task.js';

// =============================================================================
// Types
// =============================================================================

export type RunnerMode = 'auto' | 'threads' | 'inline';

/**
 * Parallel extractor configuration
 */
export interface ParallelExtractorConfig {
  /** Pool size (default: available parallelism) */
  workers?: number;
  /** Files per task */
  batchSize?: number;
  /** Source file extension (default: .md) */
  extension?: string;
  /** Glob patterns, relative to the root, never parsed */
  exclude?: string[];
  /**
   * `threads` runs pages on worker threads, `inline` on the calling thread.
   * `auto` picks threads when the compiled worker script is available.
   */
  runner?: RunnerMode;
  /** Worker thread entry (default: the compiled `extract-worker.js`) */
  workerScript?: URL;
}

export interface ExtractionStats {
  files: number;
  parsed: number;
  failed: number;
  durationMs: number;
}

export interface BatchRunner {
  run(task: ExtractionTask): Promise<ExtractionBatchResult>;
  dispose(): Promise<void>;
}

// =============================================================================
// Runners
// =============================================================================

const WORKER_SCRIPT = new URL('./extract-worker.js', import.meta.url);

function workerScriptAvailable(script: URL): boolean {
  return script.protocol === 'file:' && existsSync(fileURLToPath(script));
}

/**
 * Worker threads, spawned on demand and reused between tasks. A worker that
 * crashes, or cannot be spawned, fails only the task it was given; the next
 * task spawns a replacement.
 */
export class ThreadRunner implements BatchRunner {
  private workers = new Set<Worker>();
  private idle: Worker[] = [];
  private readonly createWorker: () => Worker;

  constructor(createWorker: () => Worker) {
    this.createWorker = createWorker;
  }

  /**
   * Live workers, busy or idle
   */
  get size(): number {
    return this.workers.size;
  }

  async run(task: ExtractionTask): Promise<ExtractionBatchResult> {
    let worker: Worker;
    try {
      worker = this.idle.pop() ?? this.spawn();
    } catch (error) {
      logger.error('Could not start a worker', {
        task: task.id,
        error: error instanceof Error ? error.message : String(error),
      });
      return failBatch(task, error);
    }

    return new Promise((resolve) => {
      const settle = (result: ExtractionBatchResult, healthy: boolean) => {
        worker.off('message', onMessage);
        worker.off('error', onError);
        worker.off('exit', onExit);
        if (healthy) {
          this.idle.push(worker);
        } else {
          this.workers.delete(worker);
        }
        resolve(result);
      };

      const onMessage = (result: ExtractionBatchResult) => settle(result, true);
      const onError = (error: Error) => {
        logger.error('Worker error', { task: task.id, error: error.message });
        settle(failBatch(task, error), false);
      };
      const onExit = (code: number) => {
        logger.error('Worker exited during a task', { task: task.id, code });
        settle(failBatch(task, new Error(`worker exited with code ${code}`)), false);
      };

      worker.on('message', onMessage);
      worker.on('error', onError);
      worker.on('exit', onExit);
      worker.postMessage(task);
    });
  }

  async dispose(): Promise<void> {
    const workers = [...this.workers];
    this.workers.clear();
    this.idle = [];
    await Promise.all(workers.map((worker) => worker.terminate()));
  }

  private spawn(): Worker {
    const worker = this.createWorker();
    this.workers.add(worker);
    return worker;
  }
}

/**
 * Same contract on the calling thread, used when no compiled worker script
 * exists (running from TypeScript sources) or when asked for explicitly.
 */
class InlineRunner implements BatchRunner {
  async run(task: ExtractionTask): Promise<ExtractionBatchResult> {
    await new Promise<void>((resolve) => setImmediate(resolve));
    return extractBatch(task);
  }

  async dispose(): Promise<void> {}
}

/**
 * Run `run` over `items` with at most `concurrency` in flight, yielding
 * results as they complete
 */
async function* settleAsCompleted<T, R>(
  items: readonly T[],
  concurrency: number,
  run: (item: T) => Promise<R>
): AsyncGenerator<R> {
  const pending = new Map<number, Promise<{ index: number; result: R }>>();
  let next = 0;

  const launch = () => {
    const index = next++;
    pending.set(index, run(items[index]).then((result) => ({ index, result })));
  };

  while (next < items.length && pending.size < concurrency) {
    launch();
  }

  while (pending.size > 0) {
    const { index, result } = await Promise.race(pending.values());
    pending.delete(index);
    if (next < items.length) {
      launch();
    }
    yield result;
  }
}

// =============================================================================
// Parallel Extractor
// =============================================================================

/**
 * Usage:
 * ```typescript
 * const extractor = new ParallelExtractor({ workers: 8 });
 *
 * for await (const record of extractor.extract('sdk-api/sdk-api-src/content')) {
 *   writer.set(record.name, record.content);
 * }
 * console.log(extractor.stats);
 * ```
 */
export class ParallelExtractor {
  private config: Required<ParallelExtractorConfig>;
  private lastStats: ExtractionStats = { files: 0, parsed: 0, failed: 0, durationMs: 0 };

  constructor(config?: ParallelExtractorConfig) {
    this.config = {
      workers: config?.workers || Math.max(1, os.availableParallelism()),
      batchSize: config?.batchSize || 64,
      extension: config?.extension || '.md',
      exclude: config?.exclude || [],
      runner: config?.runner || 'auto',
      workerScript: config?.workerScript || WORKER_SCRIPT,
    };
  }

  /**
   * Statistics of the most recent {@link extract} run
   */
  get stats(): ExtractionStats {
    return { ...this.lastStats };
  }

  /**
   * Every page under `rootDir` that parses, in no particular order
   *
   * A missing root is reported as a warning and yields nothing.
   */
  async *extract(rootDir: string): AsyncGenerator<ApiDocRecord> {
    const startTime = performance.now();
    const root = path.resolve(rootDir);
    this.lastStats = { files: 0, parsed: 0, failed: 0, durationMs: 0 };

    if (!isDirectory(root)) {
      logger.warn(`${root} directory could not be found`);
      logger.warn('try: git submodule update --recursive');
      logger.warn(`skipping ${root}`);
      return;
    }

    const files = await this.listFiles(root);
    const tasks = this.createTasks(files);
    this.lastStats.files = files.length;

    if (tasks.length === 0) {
      logger.debug('No source files found', { root, extension: this.config.extension });
      return;
    }

    const runner = this.createRunner();
    const concurrency = Math.min(this.config.workers, tasks.length);

    logger.debug('Starting extraction', {
      root,
      files: files.length,
      tasks: tasks.length,
      workers: concurrency,
    });

    try {
      for await (const result of settleAsCompleted(tasks, concurrency, (task) => runner.run(task))) {
        for (const failure of result.failures) {
          logger.debug(`failed to process ${failure.file}`, {
            code: failure.code,
            reason: failure.message,
          });
        }
        this.lastStats.failed += result.failures.length;
        this.lastStats.parsed += result.records.length;

        for (const record of result.records) {
          yield Object.freeze({ name: record.name, content: record.content });
        }
      }
    } finally {
      await runner.dispose();
      this.lastStats.durationMs = Math.round(performance.now() - startTime);
    }

    logger.debug('Extraction complete', { root, ...this.lastStats });
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async listFiles(root: string): Promise<string[]> {
    const files = await glob(`**/*${this.config.extension}`, {
      cwd: root,
      nodir: true,
      absolute: true,
      ignore: this.config.exclude,
    });
    return files.filter((file) => !isIncludeFragment(file)).sort();
  }

  private createTasks(files: string[]): ExtractionTask[] {
    const tasks: ExtractionTask[] = [];

    for (let i = 0; i < files.length; i += this.config.batchSize) {
      tasks.push({
        id: tasks.length,
        files: files.slice(i, i + this.config.batchSize),
      });
    }

    return tasks;
  }

  private createRunner(): BatchRunner {
    const { runner, workerScript } = this.config;
    if (runner === 'inline') {
      return new InlineRunner();
    }
    if (workerScriptAvailable(workerScript)) {
      return new ThreadRunner(() => new Worker(workerScript));
    }
    if (runner === 'threads') {
      logger.warn('Worker script not found, parsing on the main thread', {
        script: workerScript.href,
      });
    }
    return new InlineRunner();
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export function createParallelExtractor(config?: ParallelExtractorConfig): ParallelExtractor {
  return new ParallelExtractor(config);
}
