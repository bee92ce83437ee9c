/**
 * Capture pipeline
 *
 * Every completed exchange runs through:
 *   classify -> filter -> hash -> exact dup -> signature -> fuzzy dup -> insert
 *
 * The first stage that rejects the exchange decides the outcome. Nothing
 * thrown by a stage escapes onExchangeComplete: capture must never break
 * the proxied traffic.
 */

import { classifyWithReason } from './classify.js';
import type { CaptureConfig } from './config.js';
import { computeContentHash, ExactDuplicateDetector, FuzzyDuplicateDetector, type DedupeStore } from './dedupe.js';
import { ApisiftError, describeError, FilterSyntaxError } from './errors.js';
import { compileFilter, type FilterPredicate } from './filter.js';
import { silentLogger, type Logger } from './logger.js';
import { composeSignature } from './normalize.js';
import { ConcurrencyLimiter } from './queue.js';
import { buildCapturedRecord } from './record.js';
import { redactUrl } from './redact.js';
import { CaptureStore } from './store.js';
import { formatScore } from './ui/format.js';
import type { Exchange, NewCapturedRecord, OutcomeStatus, PipelineOutcome, PipelineStage } from './types.js';

/**
 * Store operations the pipeline uses. CaptureStore implements it.
 */
export interface PipelineStore extends DedupeStore {
  insertIfAbsent(record: NewCapturedRecord): boolean;
  close(): void;
}

export interface CapturePipelineOptions {
  logger?: Logger;
  /** Opens the store for a config; defaults to a CaptureStore at config.dbPath */
  openStore?: (config: CaptureConfig) => PipelineStore;
  /** Clock in epoch seconds */
  now?: () => number;
}

export type PipelineStats = Record<OutcomeStatus, number>;

function emptyStats(): PipelineStats {
  return {
    static: 0,
    filtered: 0,
    duplicate: 0,
    similar: 0,
    captured: 0,
    error: 0,
    closed: 0,
  };
}

function openCaptureStore(config: CaptureConfig): PipelineStore {
  return new CaptureStore(config.dbPath, { timeoutMs: config.storeTimeoutMs });
}

export class CapturePipeline {
  private config: CaptureConfig;
  private store: PipelineStore | null = null;
  private filter: FilterPredicate | null = null;
  private exact: ExactDuplicateDetector;
  private fuzzy: FuzzyDuplicateDetector;
  private limiter: ConcurrencyLimiter;
  private closed = false;
  private stats = emptyStats();

  private readonly logger: Logger;
  private readonly openStore: (config: CaptureConfig) => PipelineStore;
  private readonly now: () => number;

  constructor(config: CaptureConfig, options: CapturePipelineOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.openStore = options.openStore ?? openCaptureStore;
    this.now = options.now ?? (() => Date.now() / 1000);

    this.config = config;
    this.limiter = new ConcurrencyLimiter(config.maxConcurrentExchanges);
    this.exact = new ExactDuplicateDetector(null, config);
    this.fuzzy = new FuzzyDuplicateDetector(null, config);
    this.apply(config);
  }

  /**
   * Run one completed exchange through the pipeline. Never rejects.
   */
  async onExchangeComplete(exchange: Exchange): Promise<PipelineOutcome> {
    if (this.closed) {
      return this.finish(exchange, { status: 'closed' });
    }
    return this.limiter.run(async () => {
      if (this.closed) {
        return this.finish(exchange, { status: 'closed' });
      }
      return this.finish(exchange, this.process(exchange));
    });
  }

  /**
   * Swap in a new configuration. New exchanges wait while in-flight ones
   * finish; then the store is reopened and the filter recompiled.
   */
  async reconfigure(config: CaptureConfig): Promise<void> {
    if (this.closed) {
      throw new ApisiftError('Cannot reconfigure a pipeline that has been shut down');
    }

    const limiter = this.limiter;
    limiter.pause();
    try {
      await limiter.drain();
      this.closeStore();
      this.config = config;
      if (config.maxConcurrentExchanges !== limiter.concurrency) {
        this.limiter = new ConcurrencyLimiter(config.maxConcurrentExchanges);
      }
      this.apply(config);
      this.logger.debug(`Reconfigured capture pipeline (db: ${config.dbPath})`);
    } finally {
      limiter.resume();
    }
  }

  /**
   * Stop accepting exchanges, wait for in-flight ones and close the store.
   * Later calls do nothing.
   */
  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.limiter.drain();
    this.closeStore();
  }

  getStats(): PipelineStats {
    return { ...this.stats };
  }

  getConfig(): CaptureConfig {
    return this.config;
  }

  /** The open store, or null when opening it failed or after shutdown */
  getStore(): PipelineStore | null {
    return this.store;
  }

  isClosed(): boolean {
    return this.closed;
  }

  private apply(config: CaptureConfig): void {
    try {
      this.store = this.openStore(config);
    } catch (error) {
      this.store = null;
      this.logger.error(`Could not open capture store at ${config.dbPath}: ${describeError(error)}`);
    }

    try {
      this.filter = compileFilter(config.filter, config.staticRules);
    } catch (error) {
      if (!(error instanceof FilterSyntaxError)) throw error;
      this.filter = null;
      this.logger.error(`${error.message}; custom filter disabled`);
    }

    this.exact = new ExactDuplicateDetector(this.store, config);
    this.fuzzy = new FuzzyDuplicateDetector(this.store, config);
  }

  private closeStore(): void {
    const store = this.store;
    this.store = null;
    if (!store) return;
    try {
      store.close();
    } catch (error) {
      this.logger.error(describeError(error));
    }
  }

  private process(exchange: Exchange): PipelineOutcome {
    let stage: PipelineStage = 'classify';
    try {
      const { classification, reason } = classifyWithReason(exchange, this.config.staticRules);
      if (classification === 'static') {
        return { status: 'static', reason };
      }

      stage = 'filter';
      if (this.filter && !this.filter(exchange)) {
        return { status: 'filtered' };
      }

      stage = 'hash';
      const hash = computeContentHash(exchange);

      stage = 'exact';
      if (this.exact.isDuplicate(hash)) {
        return { status: 'duplicate', hash };
      }

      stage = 'fuzzy';
      const now = this.now();
      const match = this.fuzzy.findSimilar(composeSignature(exchange), exchange.host, now);
      if (match) {
        return { status: 'similar', hash, matchedId: match.id, score: match.score };
      }

      stage = 'store';
      if (!this.store) {
        throw new ApisiftError('capture store is not open');
      }
      const inserted = this.store.insertIfAbsent(buildCapturedRecord(exchange, hash, now));
      return inserted ? { status: 'captured', hash } : { status: 'duplicate', hash };
    } catch (error) {
      return { status: 'error', stage, message: describeError(error) };
    }
  }

  private finish(exchange: Exchange, outcome: PipelineOutcome): PipelineOutcome {
    this.stats[outcome.status]++;

    const line = `${exchange.method} ${redactUrl(exchange.url)}`;
    switch (outcome.status) {
      case 'error':
        this.logger.error(`Dropped ${line} at ${outcome.stage}: ${outcome.message}`);
        break;
      case 'static':
        this.logger.debug(`static (${outcome.reason}) ${line}`);
        break;
      case 'similar':
        this.logger.debug(`similar to #${outcome.matchedId} (${formatScore(outcome.score)}) ${line}`);
        break;
      default:
        this.logger.debug(`${outcome.status} ${line}`);
    }
    return outcome;
  }
}
