/**
 * Run command - start the capture proxy
 */

import { resolve } from 'path';
import ora, { type Ora } from 'ora';
import { DEFAULTS, loadConfig, mergeConfig, resolveCaptureConfig, type ApisiftFileConfig } from '../config.js';
import { ApisiftError, ConfigError, describeError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { CapturePipeline } from '../pipeline.js';
import { startCaptureProxy, type CaptureProxy } from '../proxy.js';
import { outputJSON, renderOutcomeStats, renderRunHeader, type OutputMode } from '../ui/render.js';

export interface RunCommandOptions {
  // Proxy
  port?: string;
  caDir?: string;
  maxConcurrent?: string;

  // Store
  db?: string;
  storeTimeoutMs?: string;

  // Filtering & dedup
  filter?: string;
  dedup?: boolean;
  similarity?: boolean;
  threshold?: string;
  windowSeconds?: string;

  // Output
  quiet?: boolean;
  verbose?: boolean;
  debug?: boolean;
  json?: boolean;
}

function parseInteger(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`--${name} expects an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Translate command-line flags into config keys. Flags left out stay
 * undefined so config file values survive the merge.
 */
export function cliToConfig(options: RunCommandOptions): ApisiftFileConfig {
  return {
    port: parseInteger('port', options.port),
    caDir: options.caDir ? resolve(options.caDir) : undefined,
    maxConcurrentExchanges: parseInteger('maxConcurrent', options.maxConcurrent),
    dbPath: options.db ? resolve(options.db) : undefined,
    storeTimeoutMs: parseInteger('storeTimeoutMs', options.storeTimeoutMs),
    filter: options.filter,
    // --no-dedup / --no-similarity only ever switch features off
    enableDeduplication: options.dedup === false ? false : undefined,
    enableSimilarityDedup: options.similarity === false ? false : undefined,
    similarityThreshold: options.threshold,
    similarityWindowSeconds: parseInteger('windowSeconds', options.windowSeconds),
    quiet: options.quiet,
    verbose: options.verbose,
    debug: options.debug,
    json: options.json,
  };
}

export function outputModeOf(config: ApisiftFileConfig): OutputMode {
  return {
    json: config.json ?? false,
    quiet: config.quiet ?? false,
    verbose: config.verbose ?? false,
    debug: config.debug ?? false,
  };
}

function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolveSignal) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolveSignal(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

/**
 * Re-read the config file and swap it into the running pipeline
 */
async function reload(
  pipeline: CapturePipeline,
  cliConfig: ApisiftFileConfig,
  configPath: string | undefined,
  logger: Logger,
): Promise<void> {
  try {
    const fileConfig = await loadConfig(configPath);
    const next = resolveCaptureConfig(mergeConfig(fileConfig, cliConfig), logger);
    await pipeline.reconfigure(next);
    logger.info('Configuration reloaded');
  } catch (error) {
    logger.error(`Reload failed, keeping previous configuration: ${describeError(error)}`);
  }
}

export async function runCommand(options: RunCommandOptions, configPath?: string): Promise<void> {
  const cliConfig = cliToConfig(options);
  const merged = mergeConfig(await loadConfig(configPath), cliConfig);
  const outputMode = outputModeOf(merged);
  const logger = createLogger(outputMode);
  const captureConfig = resolveCaptureConfig(merged, logger);

  const spinner: Ora | null = outputMode.json || outputMode.quiet
    ? null
    : ora('Starting capture proxy...').start();

  const pipeline = new CapturePipeline(captureConfig, { logger });
  if (!pipeline.getStore()) {
    spinner?.fail('Capture store unavailable');
    await pipeline.shutdown();
    throw new ApisiftError(`Could not open capture store at ${captureConfig.dbPath}`);
  }

  let proxy: CaptureProxy;
  try {
    proxy = await startCaptureProxy({
      port: merged.port ?? DEFAULTS.port,
      caDir: merged.caDir ?? resolve(DEFAULTS.caDir),
      pipeline,
      logger,
    });
  } catch (error) {
    spinner?.fail('Proxy failed to start');
    await pipeline.shutdown();
    throw error;
  }
  spinner?.succeed(`Listening on port ${proxy.port}`);

  if (outputMode.json) {
    outputJSON({
      event: 'started',
      port: proxy.port,
      proxyUrl: proxy.url,
      dbPath: captureConfig.dbPath,
      caCertPath: proxy.caCertPath,
    });
  } else {
    logger.info(renderRunHeader({
      proxyUrl: proxy.url,
      dbPath: captureConfig.dbPath,
      caCertPath: proxy.caCertPath,
      filter: captureConfig.filter,
    }));
  }

  // SIGHUP re-reads the config file without dropping the proxy
  const onHangup = () => {
    void reload(pipeline, cliConfig, configPath, logger);
  };
  process.on('SIGHUP', onHangup);

  const signal = await waitForShutdownSignal();
  process.off('SIGHUP', onHangup);
  logger.debug(`Received ${signal}, stopping`);

  const stopping = outputMode.json || outputMode.quiet ? null : ora('Draining in-flight exchanges...').start();
  await proxy.stop();
  await pipeline.shutdown();
  stopping?.stop();

  const stats = pipeline.getStats();
  if (outputMode.json) {
    outputJSON({ event: 'stopped', stats });
  } else {
    logger.info('\n' + renderOutcomeStats(stats));
  }
}
