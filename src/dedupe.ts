/**
 * Duplicate detection
 *
 * Two tiers:
 * - exact: a content hash over method, URL, query and (for writes) body,
 *   checked against the store's unique index
 * - fuzzy: signature similarity against recent captures for the same host
 */

import { createHash } from 'crypto';
import { decodeBody, getHeader } from './http.js';
import { canonicalJson, queryToObject, signatureFromStored, stableStringify } from './normalize.js';
import { signatureSimilarity } from './similarity.js';
import type { Exchange, Signature, SignatureRow } from './types.js';

const BODY_HASHED_METHODS = new Set(['POST', 'PUT', 'PATCH']);

/** Upper bound on rows scanned per fuzzy check */
export const MAX_SIMILARITY_CANDIDATES = 200;

/**
 * Store lookups the detectors need
 */
export interface DedupeStore {
  hasHash(hash: string): boolean;
  findRecentByHost(host: string, sinceTimestamp: number, limit: number): SignatureRow[];
}

export interface DedupeSettings {
  dedupEnabled: boolean;
  fuzzyDedupEnabled: boolean;
  similarityThreshold: number;
  similarityWindowSeconds: number;
}

/**
 * Text folded into the hash for request bodies: key-sorted JSON with number
 * literals kept as written when the body is JSON, the decoded text otherwise.
 */
function bodyComponent(exchange: Exchange): string | null {
  if (!BODY_HASHED_METHODS.has(exchange.method.toUpperCase())) return null;
  if (!exchange.requestBody || exchange.requestBody.length === 0) return null;

  const text = decodeBody(exchange.requestBody);
  if (getHeader(exchange.requestHeaders, 'content-type').toLowerCase().startsWith('application/json')) {
    try {
      return canonicalJson(text);
    } catch {
      return text;
    }
  }
  return text;
}

/**
 * MD5 hex digest identifying an exchange for exact deduplication
 */
export function computeContentHash(exchange: Exchange): string {
  const components = [
    exchange.method,
    exchange.url,
    stableStringify(queryToObject(exchange.query)),
  ];
  const body = bodyComponent(exchange);
  if (body !== null) {
    components.push(body);
  }
  return createHash('md5').update(components.join('|'), 'utf8').digest('hex');
}

export class ExactDuplicateDetector {
  constructor(
    private readonly store: DedupeStore | null,
    private readonly settings: Pick<DedupeSettings, 'dedupEnabled'>,
  ) {}

  /**
   * True when a record with this hash already exists. Store errors propagate.
   */
  isDuplicate(hash: string): boolean {
    if (!this.settings.dedupEnabled || !this.store) {
      return false;
    }
    return this.store.hasHash(hash);
  }
}

export interface SimilarMatch {
  id: number;
  score: number;
}

export class FuzzyDuplicateDetector {
  constructor(
    private readonly store: DedupeStore | null,
    private readonly settings: DedupeSettings,
  ) {}

  /**
   * First recent record for `host` whose signature scores at or above the
   * threshold, scanning newest first. Store errors propagate.
   *
   * @param now - reference time in seconds; the window ends here
   */
  findSimilar(signature: Signature, host: string, now: number): SimilarMatch | null {
    const { dedupEnabled, fuzzyDedupEnabled, similarityThreshold, similarityWindowSeconds } = this.settings;
    if (!dedupEnabled || !fuzzyDedupEnabled || !this.store) {
      return null;
    }

    const since = now - similarityWindowSeconds;
    const rows = this.store.findRecentByHost(host, since, MAX_SIMILARITY_CANDIDATES);

    for (const row of rows) {
      const other = signatureFromStored(row.host, row.path, row.queryParams);
      const score = signatureSimilarity(signature, other, similarityThreshold);
      if (score >= similarityThreshold) {
        return { id: row.id, score };
      }
    }
    return null;
  }

  isSimilarDuplicate(signature: Signature, host: string, now: number): boolean {
    return this.findSimilar(signature, host, now) !== null;
  }
}
