/**
 * symdoc - Core Module
 *
 * @module core
 */

export { ParallelExtractor, ThreadRunner, createParallelExtractor } from './parallel-extractor.js';
export type {
  ParallelExtractorConfig,
  ExtractionStats,
  RunnerMode,
  BatchRunner,
} from './parallel-extractor.js';

export { extractBatch, failBatch } from './extract-task.js';
export type { ExtractionTask, ExtractionBatchResult, FileFailure } from './extract-task.js';
