import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { silentLogger } from '../src/logger.js';
import { CapturePipeline } from '../src/pipeline.js';
import {
  ensureCertificateAuthority,
  ExchangeAssembler,
  flattenHeaders,
  toExchange,
  type RequestSnapshot,
  type ResponseSnapshot,
} from '../src/proxy.js';
import { CaptureStore } from '../src/store.js';
import type { Exchange } from '../src/types.js';
import { makeConfig, T0 } from './helpers.js';

function makeRequest(overrides: Partial<RequestSnapshot> = {}): RequestSnapshot {
  return {
    id: 'req-1',
    method: 'get',
    url: 'https://api.example.com:8443/v1/items?page=2&tag=a&tag=b',
    headers: { accept: 'application/json' },
    body: null,
    remoteIpAddress: '::ffff:127.0.0.1',
    startTime: T0 * 1000,
    startTimestamp: 5000,
    ...overrides,
  };
}

describe('flattenHeaders', () => {
  it('joins repeated values and drops missing ones', () => {
    expect(flattenHeaders({
      'set-cookie': ['a=1', 'b=2'],
      'content-type': 'text/plain',
      'x-missing': undefined,
    })).toEqual({
      'set-cookie': 'a=1, b=2',
      'content-type': 'text/plain',
    });
  });
});

describe('toExchange', () => {
  it('pairs a request with its response', () => {
    const exchange = toExchange(makeRequest(), {
      statusCode: 201,
      headers: { 'content-type': 'application/json' },
      body: Buffer.from('{}'),
      responseSentTimestamp: 5250,
    });

    expect(exchange).toEqual({
      method: 'GET',
      url: 'https://api.example.com:8443/v1/items?page=2&tag=a&tag=b',
      host: 'api.example.com:8443',
      path: '/v1/items',
      query: [['page', '2'], ['tag', 'a'], ['tag', 'b']],
      requestHeaders: { accept: 'application/json' },
      requestBody: null,
      startedAt: T0,
      completedAt: T0 + 0.25,
      clientAddress: '::ffff:127.0.0.1',
      response: {
        status: 201,
        headers: { 'content-type': 'application/json' },
        body: Buffer.from('{}'),
      },
    });
  });

  it('has no completion time without response timing', () => {
    const exchange = toExchange(makeRequest({ remoteIpAddress: undefined }), { statusCode: 204, headers: {}, body: null });
    expect(exchange.response?.status).toBe(204);
    expect(exchange.completedAt).toBeUndefined();
    expect(exchange.clientAddress).toBe('');
  });
});

describe('ExchangeAssembler', () => {
  const ok: ResponseSnapshot = { statusCode: 200, headers: { 'content-type': 'application/json' }, body: Buffer.from('[]') };

  it('delivers a request once its response arrives', async () => {
    const delivered: Exchange[] = [];
    const assembler = new ExchangeAssembler(async exchange => { delivered.push(exchange); }, silentLogger);

    assembler.requestSeen('req-1', Promise.resolve(makeRequest()));
    expect(assembler.getPending()).toBe(1);
    assembler.responseSeen('req-1', () => Promise.resolve(ok));
    await assembler.settle();

    expect(delivered).toHaveLength(1);
    expect(delivered[0].response?.status).toBe(200);
    expect(assembler.getPending()).toBe(0);
    expect(assembler.getInFlight()).toBe(0);
  });

  it('never delivers aborted requests', async () => {
    const deliver = vi.fn(async () => 'captured');
    const assembler = new ExchangeAssembler(deliver, silentLogger);

    assembler.requestSeen('req-1', Promise.resolve(makeRequest()));
    assembler.requestAborted('req-1');
    assembler.responseSeen('req-1', () => Promise.resolve(ok));
    await assembler.settle();

    expect(deliver).not.toHaveBeenCalled();
    expect(assembler.getPending()).toBe(0);
  });

  it('ignores responses for unknown requests', async () => {
    const deliver = vi.fn(async () => 'captured');
    const snapshot = vi.fn(() => Promise.resolve(ok));
    const assembler = new ExchangeAssembler(deliver, silentLogger);

    assembler.responseSeen('nobody', snapshot);
    await assembler.settle();

    expect(snapshot).not.toHaveBeenCalled();
    expect(deliver).not.toHaveBeenCalled();
  });

  it('logs delivery failures', async () => {
    const error = vi.fn();
    const assembler = new ExchangeAssembler(async () => { throw new Error('pipeline down'); }, { ...silentLogger, error });

    assembler.requestSeen('req-7', Promise.resolve(makeRequest()));
    assembler.responseSeen('req-7', () => Promise.resolve(ok));
    await assembler.settle();

    expect(error).toHaveBeenCalledWith('Capture failed for request req-7: pipeline down');
  });

  it('captures a retry after an aborted attempt at the same URL', async () => {
    const store = new CaptureStore(':memory:');
    const pipeline = new CapturePipeline(makeConfig(), { openStore: () => store, now: () => T0 + 10 });
    const assembler = new ExchangeAssembler(exchange => pipeline.onExchangeComplete(exchange), silentLogger);

    try {
      assembler.requestSeen('first', Promise.resolve(makeRequest({ id: 'first' })));
      assembler.requestAborted('first');
      assembler.requestSeen('retry', Promise.resolve(makeRequest({ id: 'retry' })));
      assembler.responseSeen('retry', () => Promise.resolve(ok));
      await assembler.settle();

      expect(pipeline.getStats().captured).toBe(1);
      expect(store.count()).toBe(1);
      expect(store.listRecent(1)[0].responseStatus).toBe(200);
    } finally {
      await pipeline.shutdown();
      store.close();
    }
  });
});

describe('ensureCertificateAuthority', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'apisift-ca-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reuses an existing key pair', async () => {
    writeFileSync(join(dir, 'ca.key'), 'test-key');
    writeFileSync(join(dir, 'ca.pem'), 'test-cert');

    expect(await ensureCertificateAuthority(dir)).toEqual({
      keyPath: join(dir, 'ca.key'),
      certPath: join(dir, 'ca.pem'),
    });
    expect(readFileSync(join(dir, 'ca.key'), 'utf-8')).toBe('test-key');
  });

  it('generates a CA on first use', async () => {
    const caDir = join(dir, 'nested');
    const { keyPath, certPath } = await ensureCertificateAuthority(caDir);

    expect(readFileSync(certPath, 'utf-8')).toContain('BEGIN CERTIFICATE');
    expect(readFileSync(keyPath, 'utf-8')).toContain('PRIVATE KEY');
    expect(statSync(keyPath).mode & 0o777).toBe(0o600);
  }, 30_000);
});
