/**
 * Shared fixtures for tests
 */

import { buildStaticRules, loadDefaultStaticLists, type StaticResourceRules } from '../src/classify.js';
import { resolveCaptureConfig, type ApisiftFileConfig, type CaptureConfig } from '../src/config.js';
import { splitUrl } from '../src/normalize.js';
import type { Exchange } from '../src/types.js';

export const T0 = 1_700_000_000;

export function defaultRules(): StaticResourceRules {
  return buildStaticRules(loadDefaultStaticLists());
}

/**
 * A JSON GET to api.example.com unless overridden. host/path/query are
 * derived from the url.
 */
export function makeExchange(overrides: Partial<Exchange> = {}): Exchange {
  const url = overrides.url ?? 'https://api.example.com/api/users';
  return {
    method: 'GET',
    ...splitUrl(url),
    requestHeaders: { 'user-agent': 'test-agent' },
    requestBody: null,
    response: {
      status: 200,
      headers: { 'content-type': 'application/json' },
      body: Buffer.from('{"ok":true}'),
    },
    startedAt: T0,
    completedAt: T0 + 0.25,
    clientAddress: '127.0.0.1',
    ...overrides,
    url,
  };
}

export function makeConfig(overrides: ApisiftFileConfig = {}): CaptureConfig {
  return resolveCaptureConfig({ dbPath: ':memory:', ...overrides });
}
