/**
 * symdoc - Configuration
 *
 * Loads builder and lookup settings from, in order of priority:
 * - .symdocrc.json
 * - .symdocrc
 * - symdoc.config.js / symdoc.config.mjs
 * - package.json "symdoc" field
 *
 * Command-line flags override whatever is loaded here.
 *
 * @module config
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { pathToFileURL } from 'url';

import { codecNames } from './storage/codec.js';
import { DEFAULT_STORE_FILE } from './storage/store.js';
import { logger } from './utils/logger.js';

// ============================================================================
// TYPES
// ============================================================================

export interface SymdocConfig {
  /** Documentation trees, relative to the build root */
  docsets?: string[];

  /** Database file written by `build` and read by `lookup` */
  output?: string;

  /** Extension of documentation pages */
  extension?: string;

  /** Glob patterns excluded from every docset */
  exclude?: string[];

  /** Extraction pool size */
  workers?: number;

  /** Pages per extraction task */
  batchSize?: number;

  /** Value codec name (`deflate` or `identity`) */
  codec?: string;

  /** Keep the database in memory between lookups */
  useCache?: boolean;
}

export type ResolvedConfig = Required<SymdocConfig>;

// ============================================================================
// DEFAULTS
// ============================================================================

/** Content directories of the SDK and driver documentation repositories */
export const DEFAULT_DOCSETS = [
  'sdk-api/sdk-api-src/content',
  'windows-driver-docs-ddi/wdk-ddi-src/content',
];

export const DEFAULT_CONFIG: ResolvedConfig = {
  docsets: DEFAULT_DOCSETS,
  output: DEFAULT_STORE_FILE,
  extension: '.md',
  exclude: [],
  workers: Math.max(1, os.availableParallelism()),
  batchSize: 64,
  codec: 'deflate',
  useCache: true,
};

// ============================================================================
// CONFIG LOADER
// ============================================================================

const CONFIG_FILES = ['.symdocrc.json', '.symdocrc', 'symdoc.config.js', 'symdoc.config.mjs'];

/**
 * Load configuration from a project directory
 *
 * @param projectRoot - Directory to search for config files
 * @returns Merged configuration with defaults
 */
export async function loadConfig(projectRoot: string): Promise<ResolvedConfig> {
  const resolvedRoot = path.resolve(projectRoot);

  for (const configFile of CONFIG_FILES) {
    const configPath = path.join(resolvedRoot, configFile);

    if (fs.existsSync(configPath)) {
      try {
        return mergeConfig(parseUserConfig(await loadConfigFile(configPath)));
      } catch (error) {
        logger.warn(`Failed to load ${configFile}`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  const packageJsonPath = path.join(resolvedRoot, 'package.json');
  if (fs.existsSync(packageJsonPath)) {
    try {
      const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
      if (isRecord(packageJson) && packageJson.symdoc !== undefined) {
        return mergeConfig(parseUserConfig(packageJson.symdoc));
      }
    } catch (error) {
      logger.warn('Failed to read symdoc settings from package.json', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return { ...DEFAULT_CONFIG };
}

async function loadConfigFile(configPath: string): Promise<unknown> {
  const ext = path.extname(configPath);

  if (ext === '.json' || configPath.endsWith('.symdocrc')) {
    return JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  }

  if (ext === '.js' || ext === '.mjs') {
    const module: unknown = await import(pathToFileURL(configPath).href);
    return isRecord(module) && module.default !== undefined ? module.default : module;
  }

  throw new Error(`Unsupported config file format: ${ext}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Check the shape of user-supplied settings
 */
export function parseUserConfig(value: unknown): SymdocConfig {
  if (!isRecord(value)) {
    throw new Error('configuration must be an object');
  }

  const config: SymdocConfig = {};
  const problems: string[] = [];

  const { docsets, output, extension, exclude, workers, batchSize, codec, useCache } = value;

  if (docsets !== undefined) {
    if (isStringArray(docsets)) config.docsets = docsets;
    else problems.push('docsets must be an array of strings');
  }
  if (exclude !== undefined) {
    if (isStringArray(exclude)) config.exclude = exclude;
    else problems.push('exclude must be an array of strings');
  }
  if (output !== undefined) {
    if (typeof output === 'string') config.output = output;
    else problems.push('output must be a string');
  }
  if (extension !== undefined) {
    if (typeof extension === 'string') config.extension = extension;
    else problems.push('extension must be a string');
  }
  if (codec !== undefined) {
    if (typeof codec === 'string') config.codec = codec;
    else problems.push('codec must be a string');
  }
  if (workers !== undefined) {
    if (typeof workers === 'number') config.workers = workers;
    else problems.push('workers must be a number');
  }
  if (batchSize !== undefined) {
    if (typeof batchSize === 'number') config.batchSize = batchSize;
    else problems.push('batchSize must be a number');
  }
  if (useCache !== undefined) {
    if (typeof useCache === 'boolean') config.useCache = useCache;
    else problems.push('useCache must be a boolean');
  }

  if (problems.length > 0) {
    throw new Error(problems.join('; '));
  }
  return config;
}

/**
 * Merge user config with defaults
 */
export function mergeConfig(userConfig: SymdocConfig): ResolvedConfig {
  return {
    docsets: userConfig.docsets ?? DEFAULT_CONFIG.docsets,
    output: userConfig.output ?? DEFAULT_CONFIG.output,
    extension: userConfig.extension ?? DEFAULT_CONFIG.extension,
    exclude: [...DEFAULT_CONFIG.exclude, ...(userConfig.exclude || [])],
    workers: userConfig.workers ?? DEFAULT_CONFIG.workers,
    batchSize: userConfig.batchSize ?? DEFAULT_CONFIG.batchSize,
    codec: userConfig.codec ?? DEFAULT_CONFIG.codec,
    useCache: userConfig.useCache ?? DEFAULT_CONFIG.useCache,
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: SymdocConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (config.docsets !== undefined && config.docsets.length === 0) {
    errors.push('docsets must name at least one directory');
  }

  if (config.workers !== undefined && (!Number.isInteger(config.workers) || config.workers < 1)) {
    errors.push('workers must be a positive integer');
  }

  if (
    config.batchSize !== undefined &&
    (!Number.isInteger(config.batchSize) || config.batchSize < 1)
  ) {
    errors.push('batchSize must be a positive integer');
  }

  if (config.extension !== undefined && !config.extension.startsWith('.')) {
    errors.push('extension must start with a dot');
  }

  if (config.codec !== undefined && !codecNames().includes(config.codec)) {
    errors.push(`codec must be one of: ${codecNames().join(', ')}`);
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
