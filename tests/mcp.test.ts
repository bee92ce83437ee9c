import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { captureStats, getCapture, listRecentCaptures, presentRecord } from '../src/commands/mcp.js';
import { ApisiftError } from '../src/errors.js';
import { buildCapturedRecord } from '../src/record.js';
import { CaptureStore } from '../src/store.js';
import { makeExchange, T0 } from './helpers.js';

describe('MCP capture tools', () => {
  let store: CaptureStore;

  beforeEach(() => {
    store = new CaptureStore(':memory:');
    const records = [
      makeExchange({ url: 'https://api.example.com/api/users?page=1', startedAt: T0 }),
      makeExchange({
        method: 'POST',
        url: 'https://api.example.com/api/login?token=test-token',
        startedAt: T0 + 1,
        completedAt: T0 + 1.25,
        requestHeaders: { 'content-type': 'application/json', authorization: 'Bearer test-token' },
        requestBody: Buffer.from('{"user":"ada","password":"test-secret"}'),
      }),
      makeExchange({ url: 'https://b.example.com/health', startedAt: T0 + 2 }),
    ];
    records.forEach((exchange, i) => {
      store.insertIfAbsent(buildCapturedRecord(exchange, `hash-${i + 1}`));
    });
  });

  afterEach(() => {
    store.close();
  });

  it('lists captures newest first with a watermark', () => {
    const result = listRecentCaptures(store, { limit: 2 });

    expect(result.total).toBe(3);
    expect(result.maxId).toBe(3);
    expect(result.captures.map(c => c.id)).toEqual([3, 2]);
    expect(result.captures[1]).toEqual({
      id: 2,
      method: 'POST',
      url: 'https://api.example.com/api/login?token=%5BREDACTED%5D',
      host: 'api.example.com',
      path: '/api/login',
      status: 200,
      responseTime: 0.25,
      capturedAt: '2023-11-14T22:13:21.000Z',
    });
  });

  it('lists only captures after a watermark', () => {
    expect(listRecentCaptures(store, { afterId: 1 }).captures.map(c => c.id)).toEqual([2, 3]);
  });

  it('masks credentials in a single capture by default', () => {
    const capture = getCapture(store, { id: 2 });

    expect(capture.requestHeaders).toEqual({
      'content-type': 'application/json',
      authorization: '[REDACTED]',
    });
    expect(capture.requestBody).toBe('{"user":"ada","password":"[REDACTED]"}');
    expect(capture.url).toBe('https://api.example.com/api/login?token=%5BREDACTED%5D');
  });

  it('returns the stored values when redaction is off', () => {
    const capture = getCapture(store, { id: 2, redact: false });

    expect(capture.requestHeaders.authorization).toBe('Bearer test-token');
    expect(capture.requestBody).toBe('{"user":"ada","password":"test-secret"}');
  });

  it('rejects unknown ids', () => {
    expect(() => getCapture(store, { id: 42 })).toThrow(ApisiftError);
    expect(() => getCapture(store, { id: 42 })).toThrow('No capture with id 42');
  });

  it('summarizes the store', () => {
    expect(captureStats(store)).toEqual({
      total: 3,
      maxId: 3,
      latestCaptureAt: '2023-11-14T22:13:22.000Z',
      topHosts: [
        { host: 'api.example.com', count: 2 },
        { host: 'b.example.com', count: 1 },
      ],
    });
  });

  it('keeps non-JSON bodies and unparsable headers as they are', () => {
    const [record] = store.listRecent(1);
    const presented = presentRecord({ ...record, headers: 'not json', responseBody: 'plain text' });

    expect(presented.requestHeaders).toEqual({});
    expect(presented.responseBody).toBe('plain text');
  });
});
