/**
 * Tests for deduplication logic
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  computeContentHash,
  ExactDuplicateDetector,
  FuzzyDuplicateDetector,
  MAX_SIMILARITY_CANDIDATES,
  type DedupeSettings,
  type DedupeStore,
} from '../src/dedupe.js';
import { composeSignature } from '../src/normalize.js';
import { buildCapturedRecord } from '../src/record.js';
import { CaptureStore } from '../src/store.js';
import type { SignatureRow } from '../src/types.js';
import { makeExchange, T0 } from './helpers.js';

const SETTINGS: DedupeSettings = {
  dedupEnabled: true,
  fuzzyDedupEnabled: true,
  similarityThreshold: 0.8,
  similarityWindowSeconds: 600,
};

describe('computeContentHash', () => {
  it('hashes method, URL and sorted query', () => {
    const exchange = makeExchange({ url: 'https://api.example.com/api/users?page=1' });
    expect(computeContentHash(exchange)).toBe('b29a8d9bb87a72836e0d42a7f7bcb6c9');
  });

  it('folds key-sorted JSON bodies into the hash for writes', () => {
    const exchange = makeExchange({
      method: 'POST',
      url: 'https://api.example.com/api/items',
      requestHeaders: { 'Content-Type': 'application/json; charset=utf-8' },
      requestBody: Buffer.from('{ "b": 2, "a": 1 }'),
    });
    expect(computeContentHash(exchange)).toBe('d591444647c8b733bd8945f9cde94d06');
  });

  it('ignores JSON key order and whitespace in bodies', () => {
    const base = {
      method: 'PUT',
      url: 'https://api.example.com/api/items/1',
      requestHeaders: { 'content-type': 'application/json' },
    };
    const a = makeExchange({ ...base, requestBody: Buffer.from('{"x":1,"y":[1,2]}') });
    const b = makeExchange({ ...base, requestBody: Buffer.from('{ "y": [1, 2], "x": 1 }') });
    expect(computeContentHash(a)).toBe(computeContentHash(b));
  });

  it('distinguishes different bodies, including non-JSON ones', () => {
    const form = { method: 'POST', url: 'https://api.example.com/form', requestHeaders: { 'content-type': 'text/plain' } };
    const a = makeExchange({ ...form, requestBody: Buffer.from('name=a') });
    const b = makeExchange({ ...form, requestBody: Buffer.from('name=b') });
    expect(computeContentHash(a)).not.toBe(computeContentHash(b));
  });

  it('falls back to body text when a JSON body does not parse', () => {
    const broken = {
      method: 'POST',
      url: 'https://api.example.com/api/items',
      requestHeaders: { 'content-type': 'application/json' },
    };
    const a = makeExchange({ ...broken, requestBody: Buffer.from('{oops') });
    const b = makeExchange({ ...broken, requestBody: Buffer.from('{oops!') });
    expect(computeContentHash(a)).toMatch(/^[0-9a-f]{32}$/);
    expect(computeContentHash(a)).not.toBe(computeContentHash(b));
  });

  it('keeps 64-bit ids apart in JSON bodies', () => {
    const order = {
      method: 'POST',
      url: 'https://api.example.com/api/orders',
      requestHeaders: { 'content-type': 'application/json' },
    };
    // both ids round to the same double
    const a = makeExchange({ ...order, requestBody: Buffer.from('{"orderId": 1234567890123456789}') });
    const b = makeExchange({ ...order, requestBody: Buffer.from('{"orderId": 1234567890123456790}') });
    expect(computeContentHash(a)).not.toBe(computeContentHash(b));
  });

  it('leaves GET bodies out of the hash', () => {
    const a = makeExchange({ requestBody: Buffer.from('one') });
    const b = makeExchange({ requestBody: Buffer.from('two') });
    expect(computeContentHash(a)).toBe(computeContentHash(b));
  });
});

describe('ExactDuplicateDetector', () => {
  const store: DedupeStore = {
    hasHash: hash => hash === 'seen',
    findRecentByHost: () => [],
  };

  it('reports hashes already stored', () => {
    const detector = new ExactDuplicateDetector(store, { dedupEnabled: true });
    expect(detector.isDuplicate('seen')).toBe(true);
    expect(detector.isDuplicate('fresh')).toBe(false);
  });

  it('reports nothing when disabled or without a store', () => {
    expect(new ExactDuplicateDetector(store, { dedupEnabled: false }).isDuplicate('seen')).toBe(false);
    expect(new ExactDuplicateDetector(null, { dedupEnabled: true }).isDuplicate('seen')).toBe(false);
  });

  it('propagates store errors', () => {
    const failing: DedupeStore = {
      hasHash: () => { throw new Error('disk I/O error'); },
      findRecentByHost: () => [],
    };
    expect(() => new ExactDuplicateDetector(failing, { dedupEnabled: true }).isDuplicate('x')).toThrow('disk I/O error');
  });
});

describe('FuzzyDuplicateDetector', () => {
  let store: CaptureStore;

  function capture(url: string, hash: string, startedAt: number): void {
    store.insertIfAbsent(buildCapturedRecord(makeExchange({ url, startedAt }), hash, startedAt));
  }

  beforeEach(() => {
    store = new CaptureStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  it('matches a request that differs only by a cache buster', () => {
    capture('https://api.example.com/api/users?page=1', 'h1', T0 - 60);

    const signature = composeSignature(makeExchange({ url: 'https://api.example.com/api/users?page=1&_t=1700000000' }));
    const detector = new FuzzyDuplicateDetector(store, SETTINGS);

    const match = detector.findSimilar(signature, 'api.example.com', T0);
    expect(match?.id).toBe(1);
    expect(match?.score).toBeCloseTo(1);
    expect(detector.isSimilarDuplicate(signature, 'api.example.com', T0)).toBe(true);
  });

  it('ignores records older than the window', () => {
    capture('https://api.example.com/api/users?page=1', 'h1', T0 - 700);

    const signature = composeSignature(makeExchange({ url: 'https://api.example.com/api/users?page=1' }));
    const detector = new FuzzyDuplicateDetector(store, SETTINGS);
    expect(detector.isSimilarDuplicate(signature, 'api.example.com', T0)).toBe(false);
  });

  it('only compares records from the same host', () => {
    capture('https://other.example.com/api/users?page=1', 'h1', T0 - 60);

    const signature = composeSignature(makeExchange({ url: 'https://api.example.com/api/users?page=1' }));
    expect(new FuzzyDuplicateDetector(store, SETTINGS).isSimilarDuplicate(signature, 'api.example.com', T0)).toBe(false);
  });

  it('never matches a different path', () => {
    capture('https://api.example.com/api/orders?page=1', 'h1', T0 - 60);

    const signature = composeSignature(makeExchange({ url: 'https://api.example.com/api/users?page=1' }));
    expect(new FuzzyDuplicateDetector(store, SETTINGS).findSimilar(signature, 'api.example.com', T0)).toBeNull();
  });

  it('scores near-identical queries against the threshold', () => {
    capture('https://api.example.com/api/users?page=1', 'h1', T0 - 60);
    const signature = composeSignature(makeExchange({ url: 'https://api.example.com/api/users?page=2' }));

    // queries differ in one of 12 characters: 0.3 + 0.7 * 22/24
    const lenient = new FuzzyDuplicateDetector(store, SETTINGS).findSimilar(signature, 'api.example.com', T0);
    expect(lenient?.score).toBeCloseTo(0.9417, 4);

    const strict = new FuzzyDuplicateDetector(store, { ...SETTINGS, similarityThreshold: 0.95 });
    expect(strict.findSimilar(signature, 'api.example.com', T0)).toBeNull();
  });

  it('returns the newest matching record', () => {
    capture('https://api.example.com/api/users?page=1', 'h1', T0 - 120);
    capture('https://api.example.com/api/users?page=1&v=2', 'h2', T0 - 30);

    const signature = composeSignature(makeExchange({ url: 'https://api.example.com/api/users?page=1' }));
    expect(new FuzzyDuplicateDetector(store, SETTINGS).findSimilar(signature, 'api.example.com', T0)?.id).toBe(2);
  });

  it('is off when fuzzy or exact dedup is disabled', () => {
    capture('https://api.example.com/api/users?page=1', 'h1', T0 - 60);
    const signature = composeSignature(makeExchange({ url: 'https://api.example.com/api/users?page=1' }));

    expect(new FuzzyDuplicateDetector(store, { ...SETTINGS, fuzzyDedupEnabled: false })
      .isSimilarDuplicate(signature, 'api.example.com', T0)).toBe(false);
    expect(new FuzzyDuplicateDetector(store, { ...SETTINGS, dedupEnabled: false })
      .isSimilarDuplicate(signature, 'api.example.com', T0)).toBe(false);
    expect(new FuzzyDuplicateDetector(null, SETTINGS)
      .isSimilarDuplicate(signature, 'api.example.com', T0)).toBe(false);
  });

  describe('with large queries', () => {
    const keys = Array.from({ length: 60 }, (_, i) => `f${String(i).padStart(2, '0')}`);
    const query = (value: (key: string) => string) =>
      JSON.stringify(Object.fromEntries(keys.map(key => [key, value(key)])));
    const incoming = { host: 'api.example.com', path: '/api/search', query: query(key => `value-${key}-abcdefgh`) };
    const strict = { ...SETTINGS, similarityThreshold: 0.99 };

    function storeOf(rows: SignatureRow[]): DedupeStore {
      return { hasHash: () => false, findRecentByHost: () => rows };
    }

    it('rejects a full window of near misses within a time bound', () => {
      // Same characters in a different order: every value has two letters swapped
      const rows: SignatureRow[] = Array.from({ length: MAX_SIMILARITY_CANDIDATES }, (_, i) => {
        const swapAt = i % 7;
        const letters = 'abcdefgh'.split('');
        [letters[swapAt], letters[swapAt + 1]] = [letters[swapAt + 1], letters[swapAt]];
        return {
          id: i + 1,
          host: 'api.example.com',
          path: '/api/search',
          queryParams: query(key => `value-${key}-${letters.join('')}`),
        };
      });
      expect(incoming.query.length).toBeGreaterThan(1400);

      const started = performance.now();
      const match = new FuzzyDuplicateDetector(storeOf(rows), strict).findSimilar(incoming, 'api.example.com', T0);
      const elapsed = performance.now() - started;

      expect(match).toBeNull();
      expect(elapsed).toBeLessThan(500);
    });

    it('still scores a near-identical query exactly', () => {
      const stored = incoming.query;
      const longer = query(key => (key === 'f30' ? `value-${key}-abcdefghx` : `value-${key}-abcdefgh`));
      const rows = [{ id: 9, host: 'api.example.com', path: '/api/search', queryParams: longer }];

      const match = new FuzzyDuplicateDetector(storeOf(rows), strict).findSimilar(incoming, 'api.example.com', T0);

      expect(match?.id).toBe(9);
      expect(match?.score).toBeCloseTo(0.3 + 0.7 * ((2 * stored.length) / (stored.length + longer.length)), 10);
    });
  });

  it('asks the store for a bounded, windowed scan', () => {
    const calls: Array<[string, number, number]> = [];
    const recording: DedupeStore = {
      hasHash: () => false,
      findRecentByHost: (host, since, limit): SignatureRow[] => {
        calls.push([host, since, limit]);
        return [];
      },
    };

    new FuzzyDuplicateDetector(recording, SETTINGS).findSimilar(
      { host: 'api.example.com', path: '/x', query: '{}' },
      'api.example.com',
      T0,
    );
    expect(calls).toEqual([['api.example.com', T0 - 600, MAX_SIMILARITY_CANDIDATES]]);
  });
});
