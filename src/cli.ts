#!/usr/bin/env node
/**
 * symdoc - CLI
 *
 * Builds the documentation database and queries it from the terminal.
 *
 * @module cli
 */

import { Command } from 'commander';
import * as path from 'path';

import { DocsBuilder } from './builder.js';
import { TerminalPicker } from './cli/picker.js';
import { type ResolvedConfig, loadConfig, mergeConfig, validateConfig } from './config.js';
import { DocsLookup } from './lookup.js';
import { readApiDoc } from './parser/index.js';
import { type Codec, getCodec } from './storage/codec.js';
import { DocsStoreView } from './storage/docs-view.js';
import { EmptyResultError, wrapError } from './utils/errors.js';
import { logger } from './utils/logger.js';

const VERSION = '1.0.0';

// ============================================================================
// OPTION TYPES
// ============================================================================

interface BuildCommandOptions {
  log?: string;
  debug?: boolean;
  output?: string;
  workers?: string;
  docset?: string[];
}

interface LookupCommandOptions {
  db?: string;
  cache: boolean;
  raw?: boolean;
  debug?: boolean;
}

interface KeysCommandOptions {
  db?: string;
  filter?: string;
}

interface InspectCommandOptions {
  raw?: boolean;
}

// ============================================================================
// HELPERS
// ============================================================================

function fail(message: string): void {
  console.error(message);
  process.exitCode = 1;
}

/**
 * Project config with command-line overrides, or null after reporting why
 * it is unusable
 */
async function resolveConfig(overrides: Partial<ResolvedConfig>): Promise<ResolvedConfig | null> {
  const loaded = await loadConfig(process.cwd());
  const config = mergeConfig({ ...loaded, ...overrides });
  const { valid, errors } = validateConfig(config);
  if (!valid) {
    fail(`✗ Invalid configuration:\n${errors.map((error) => `  • ${error}`).join('\n')}`);
    return null;
  }
  return config;
}

function codecFor(config: ResolvedConfig): Codec {
  const codec = getCodec(config.codec);
  if (!codec) {
    throw new Error(`Unknown codec: ${config.codec}`);
  }
  return codec;
}

const program = new Command();

program
  .name('symdoc')
  .description('Offline API documentation database: build it from markdown sources, look symbols up')
  .version(VERSION);

// ============================================================================
// BUILD COMMAND
// ============================================================================

program
  .command('build')
  .description('Parse the documentation repositories under a directory into a database')
  .argument('[dirpath]', 'directory containing the documentation repositories', '.')
  .option('-l, --log <file>', 'write log output to a file instead of the terminal')
  .option('-d, --debug', 'print lots of debugging statements')
  .option('-o, --output <file>', 'output database file')
  .option('-w, --workers <n>', 'number of extraction workers')
  .option('--docset <path...>', 'docset subpaths to parse, replacing the configured ones')
  .action(async (dirpath: string, options: BuildCommandOptions) => {
    logger.configure({
      level: options.debug ? 'debug' : 'info',
      ...(options.log ? { file: path.resolve(options.log) } : {}),
    });

    const config = await resolveConfig({
      ...(options.output ? { output: options.output } : {}),
      ...(options.workers ? { workers: Number(options.workers) } : {}),
      ...(options.docset ? { docsets: options.docset } : {}),
    });
    if (!config) return;

    const builder = new DocsBuilder({
      rootDir: path.resolve(dirpath),
      docsets: config.docsets,
      output: path.resolve(config.output),
      codec: codecFor(config),
      extractor: {
        workers: config.workers,
        batchSize: config.batchSize,
        extension: config.extension,
        exclude: config.exclude,
      },
    });

    const result = await builder.build();

    if (result.status === 'empty') {
      // Not an error: the docsets may simply not be checked out yet
      console.log(new EmptyResultError(config.docsets).toCliOutput());
      return;
    }

    console.log(`✅ Saved ${result.records} symbols to ${result.output}`);
  });

// ============================================================================
// LOOKUP COMMAND
// ============================================================================

program
  .command('lookup')
  .description('Show the documentation for a symbol, correcting near misses')
  .argument('<selection>', 'symbol name or selected text, e.g. "j_CreateFileW(hFile)"')
  .option('--db <file>', 'database file')
  .option('--no-cache', 're-read the database on every access')
  .option('--raw', 'print only the stored text')
  .option('-d, --debug', 'print debugging statements')
  .action(async (selection: string, options: LookupCommandOptions) => {
    logger.configure({ level: options.debug ? 'debug' : 'warn' });

    const config = await resolveConfig({
      ...(options.db ? { output: options.db } : {}),
      ...(options.cache ? {} : { useCache: false }),
    });
    if (!config) return;

    const view = new DocsStoreView(path.resolve(config.output), {
      useCache: config.useCache,
      codec: codecFor(config),
    });
    const lookup = new DocsLookup(view, new TerminalPicker());
    const result = await lookup.lookup(selection);

    switch (result.kind) {
      case 'invalid-selection':
        fail('invalid selection');
        return;
      case 'not-found':
        fail('description not found');
        return;
      case 'found':
        if (!options.raw && result.resolution !== 'exact') {
          console.error(`(showing ${result.name})`);
        }
        console.log(result.content);
    }
  });

// ============================================================================
// KEYS COMMAND
// ============================================================================

program
  .command('keys')
  .description('List the symbols stored in a database')
  .option('--db <file>', 'database file')
  .option('-f, --filter <text>', 'only names containing this text')
  .action(async (options: KeysCommandOptions) => {
    logger.configure({ level: 'warn' });

    const config = await resolveConfig(options.db ? { output: options.db } : {});
    if (!config) return;

    const view = new DocsStoreView(path.resolve(config.output), { codec: codecFor(config) });
    const { filter } = options;
    const names = [...view.keys()]
      .filter((name) => filter === undefined || name.includes(filter))
      .sort();

    for (const name of names) {
      console.log(name);
    }
  });

// ============================================================================
// INSPECT COMMAND
// ============================================================================

program
  .command('inspect')
  .description('Parse a single documentation page, ignoring the name rules')
  .argument('<file>', 'markdown page')
  .option('--raw', 'print the body without normalizing it')
  .action((file: string, options: InspectCommandOptions) => {
    const record = readApiDoc(path.resolve(file), { force: true, raw: options.raw });
    console.log(`name: ${record.name}\n`);
    console.log(record.content);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  fail(wrapError(error).toCliOutput());
});
