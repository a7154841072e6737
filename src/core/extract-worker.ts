/**
 * symdoc - Extraction Worker
 * @module core/extract-worker
 *
 * Worker thread entry point: receives {@link ExtractionTask} messages and
 * answers each with its {@link ExtractionBatchResult}.
 */

import { parentPort } from 'node:worker_threads';

import { extractBatch, type ExtractionTask } from './extract-task.js';

if (!parentPort) {
  throw new Error('extract-worker must be started as a worker thread');
}

const port = parentPort;

port.on('message', (task: ExtractionTask) => {
  port.postMessage(extractBatch(task));
});
