/**
 * Shared fixtures for the test suites
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { type LogEntry, logger } from '../src/utils/logger.js';

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'symdoc-test-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Write a file below `root`, creating parent directories
 */
export function writeDoc(root: string, relativePath: string, content: string | Buffer): string {
  const filePath = path.join(root, relativePath);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
  return filePath;
}

/**
 * Page text for a function named `name`
 */
export function functionPage(name: string, body = ''): string {
  return `---\nUID: NF:test.${name}\ntitle: ${name} function (test.h)\n---\n${body}`;
}

/**
 * Route every log entry into the returned array instead of the terminal
 */
export function captureLogs(): LogEntry[] {
  const entries: LogEntry[] = [];
  logger.configure({ level: 'debug', output: (entry) => entries.push(entry) });
  return entries;
}
