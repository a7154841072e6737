/**
 * symdoc - Extraction Tasks
 * @module core/extract-task
 *
 * Unit of work shared by the worker threads and the in-process runner.
 * Everything here crosses a thread boundary, so it stays plain data.
 */

import { parseApiDoc } from '../parser/index.js';
import type { ApiDocRecord } from '../parser/index.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Batch of files handed to one worker
 */
export interface ExtractionTask {
  id: number;
  files: string[];
}

export interface FileFailure {
  file: string;
  code: string;
  message: string;
}

export interface ExtractionBatchResult {
  id: number;
  records: ApiDocRecord[];
  failures: FileFailure[];
}

// =============================================================================
// Batch Processing
// =============================================================================

/**
 * Parse every file of a batch. Failing files end up in `failures`.
 */
export function extractBatch(task: ExtractionTask): ExtractionBatchResult {
  const records: ApiDocRecord[] = [];
  const failures: FileFailure[] = [];

  for (const file of task.files) {
    const outcome = parseApiDoc(file);
    if (outcome.ok) {
      records.push(outcome.record);
    } else {
      failures.push({ file, code: outcome.error.code, message: outcome.error.message });
    }
  }

  return { id: task.id, records, failures };
}

/**
 * Result for a batch whose worker died before answering
 */
export function failBatch(task: ExtractionTask, error: unknown): ExtractionBatchResult {
  const message = error instanceof Error ? error.message : String(error);
  return {
    id: task.id,
    records: [],
    failures: task.files.map((file) => ({ file, code: 'INTERNAL_ERROR', message })),
  };
}
