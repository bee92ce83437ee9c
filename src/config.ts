/**
 * Configuration file support for apisift
 * Loads config from .apisift.json, .apisift.yaml, or package.json
 * CLI flags override config file values
 */

import { cosmiconfig } from 'cosmiconfig';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { buildStaticRules, loadDefaultStaticLists, type StaticResourceRules } from './classify.js';
import type { Logger } from './logger.js';

export const DEFAULT_SIMILARITY_THRESHOLD = 0.8;

export const DEFAULTS = {
  dbPath: './api_data.db',
  filter: '',
  enableDeduplication: true,
  enableSimilarityDedup: true,
  similarityThreshold: '0.8',
  similarityWindowSeconds: 600,
  storeTimeoutMs: 5000,
  maxConcurrentExchanges: 8,
  port: 8080,
  caDir: './.apisift',
} as const;

export const fileConfigSchema = z.object({
  // Store
  dbPath: z.string().min(1).optional(),
  storeTimeoutMs: z.number().int().positive().optional(),

  // Filtering
  filter: z.string().optional(),
  staticExtensions: z.array(z.string()).optional(),
  staticContentTypes: z.array(z.string()).optional(),
  staticPathPatterns: z.array(z.string()).optional(),

  // Deduplication
  enableDeduplication: z.boolean().optional(),
  enableSimilarityDedup: z.boolean().optional(),
  similarityThreshold: z.union([z.string(), z.number()]).optional(),
  similarityWindowSeconds: z.number().int().nonnegative().optional(),

  // Proxy
  port: z.number().int().min(0).max(65535).optional(),
  caDir: z.string().min(1).optional(),
  maxConcurrentExchanges: z.number().int().positive().optional(),

  // Output
  quiet: z.boolean().optional(),
  verbose: z.boolean().optional(),
  debug: z.boolean().optional(),
  json: z.boolean().optional(),
}).strict();

export type ApisiftFileConfig = z.infer<typeof fileConfigSchema>;

/**
 * Immutable settings the capture pipeline runs with. Replaced as a whole
 * on reconfigure.
 */
export interface CaptureConfig {
  readonly dbPath: string;
  readonly filter: string;
  readonly dedupEnabled: boolean;
  readonly fuzzyDedupEnabled: boolean;
  readonly similarityThreshold: number;
  readonly similarityWindowSeconds: number;
  readonly staticRules: StaticResourceRules;
  readonly storeTimeoutMs: number;
  readonly maxConcurrentExchanges: number;
}

const explorer = cosmiconfig('apisift', {
  searchPlaces: [
    'package.json',
    '.apisift.json',
    '.apisift.yaml',
    '.apisift.yml',
    'apisift.config.json',
    'apisift.config.yaml',
    'apisift.config.yml',
  ],
});

function validateFileConfig(raw: unknown, filepath: string): ApisiftFileConfig {
  const parsed = fileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config in ${filepath}: ${issues}`);
  }
  return parsed.data;
}

/**
 * Load configuration from file system. With `configPath` that exact file is
 * loaded; otherwise the search starts at `searchFrom` (default cwd).
 * Returns null if no config file found. Relative paths in the file are
 * resolved against the file's directory.
 */
export async function loadConfig(configPath?: string, searchFrom?: string): Promise<ApisiftFileConfig | null> {
  let result: Awaited<ReturnType<typeof explorer.search>>;
  try {
    result = configPath ? await explorer.load(configPath) : await explorer.search(searchFrom);
  } catch (error) {
    // Config file exists but is malformed
    if (error instanceof Error) {
      throw new ConfigError(`Failed to load config: ${error.message}`, { cause: error });
    }
    throw error;
  }

  if (!result || result.isEmpty) {
    return null;
  }
  const config = validateFileConfig(result.config, result.filepath);
  return resolveConfigPaths(config, path.dirname(result.filepath));
}

/**
 * Merge config file with CLI options
 * CLI options take precedence over config file
 */
export function mergeConfig(
  configFile: ApisiftFileConfig | null,
  cliOptions: ApisiftFileConfig,
): ApisiftFileConfig {
  // Override with CLI options (only if explicitly provided)
  const overrides = Object.fromEntries(
    Object.entries(cliOptions).filter(([, value]) => value !== undefined),
  );
  return validateFileConfig({ ...(configFile ?? {}), ...overrides }, 'command-line options');
}

/**
 * Resolve file paths in config relative to config file location
 */
export function resolveConfigPaths(
  config: ApisiftFileConfig,
  configDir: string,
): ApisiftFileConfig {
  const resolved = { ...config };

  if (resolved.dbPath && resolved.dbPath !== ':memory:' && !path.isAbsolute(resolved.dbPath)) {
    resolved.dbPath = path.resolve(configDir, resolved.dbPath);
  }

  if (resolved.caDir && !path.isAbsolute(resolved.caDir)) {
    resolved.caDir = path.resolve(configDir, resolved.caDir);
  }

  return resolved;
}

/**
 * Parse the similarity threshold. Unparseable input falls back to the
 * default with a warning; a number outside 0..1 is a configuration error.
 */
export function parseThreshold(value: string | number | undefined, logger?: Logger): number {
  if (value === undefined) {
    return DEFAULT_SIMILARITY_THRESHOLD;
  }

  const parsed = typeof value === 'number' ? value : Number.parseFloat(value);
  if (!Number.isFinite(parsed)) {
    logger?.warn(`Invalid similarityThreshold "${value}", using ${DEFAULT_SIMILARITY_THRESHOLD}`);
    return DEFAULT_SIMILARITY_THRESHOLD;
  }
  if (parsed < 0 || parsed > 1) {
    throw new ConfigError(`similarityThreshold must be between 0 and 1, got ${parsed}`);
  }
  return parsed;
}

/**
 * Build the immutable pipeline configuration from merged options
 */
export function resolveCaptureConfig(options: ApisiftFileConfig, logger?: Logger): CaptureConfig {
  const defaults = loadDefaultStaticLists();
  const maxConcurrentExchanges = options.maxConcurrentExchanges ?? DEFAULTS.maxConcurrentExchanges;
  if (!Number.isInteger(maxConcurrentExchanges) || maxConcurrentExchanges < 1) {
    throw new ConfigError('maxConcurrentExchanges must be at least 1');
  }

  const windowSeconds = options.similarityWindowSeconds ?? DEFAULTS.similarityWindowSeconds;
  if (!Number.isFinite(windowSeconds) || windowSeconds < 0) {
    throw new ConfigError('similarityWindowSeconds must be a non-negative number');
  }

  return Object.freeze({
    dbPath: options.dbPath ?? DEFAULTS.dbPath,
    filter: options.filter ?? DEFAULTS.filter,
    dedupEnabled: options.enableDeduplication ?? DEFAULTS.enableDeduplication,
    fuzzyDedupEnabled: options.enableSimilarityDedup ?? DEFAULTS.enableSimilarityDedup,
    similarityThreshold: parseThreshold(options.similarityThreshold ?? DEFAULTS.similarityThreshold, logger),
    similarityWindowSeconds: windowSeconds,
    staticRules: buildStaticRules({
      extensions: options.staticExtensions ?? defaults.extensions,
      contentTypes: options.staticContentTypes ?? defaults.contentTypes,
      pathPatterns: options.staticPathPatterns ?? defaults.pathPatterns,
    }),
    storeTimeoutMs: options.storeTimeoutMs ?? DEFAULTS.storeTimeoutMs,
    maxConcurrentExchanges,
  });
}
