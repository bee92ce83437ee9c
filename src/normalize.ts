/**
 * Request signature normalization
 *
 * Builds the (host, path, query) signature used for approximate duplicate
 * detection:
 * - Drops high-churn query parameters (cache busters, timestamps, sessions)
 * - Drops values that look like epoch timestamps (10+ digits)
 * - Reduces URL-valued parameters to scheme://host
 * - Serializes what is left as key-sorted JSON
 */

import { isLosslessNumber, parse as parseLossless, stringify as stringifyLossless } from 'lossless-json';
import type { Exchange, Signature } from './types.js';

/**
 * Parameter names that change on every request without changing meaning
 */
const NOISE_PARAMS = new Set([
  // timing / cache busting
  'timestamp', 'ts', 't', '_t', 'time', '_time', 'cache_buster', 'cb',
  'r', 'rnd', 'random', '_', '__', 'v', 'ver', 'version',
  // session and tracking
  'session', 'sid', 'ssid', 'uid', 'user_id', 'token', 'csrf',
  // cache and debug switches
  'debug', 'nocache', 'bust', '_bust', 'reload',
]);

const TIME_KEY_FRAGMENTS = ['timestamp', '_time', 'time_'];

const URL_PARAMS = new Set(['url', 'page_url', 'ref', 'referer', 'redirect']);

const EPOCH_LIKE = /^\d{10,}$/;

export const EMPTY_SIGNATURE: Signature = { host: '', path: '', query: '{}' };

/**
 * JSON.stringify with object keys sorted at every depth
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(sortKeys(value)) ?? 'null';
}

/**
 * Re-serialize JSON text with sorted keys and no whitespace. Numbers keep
 * their literal text, so integers beyond 2^53 stay distinct. Throws on
 * invalid JSON.
 */
export function canonicalJson(text: string): string {
  return stringifyLossless(sortKeys(parseLossless(text), isLosslessNumber)) ?? 'null';
}

function sortKeys(value: unknown, isScalar: (value: unknown) => boolean = () => false): unknown {
  if (Array.isArray(value)) {
    return value.map(child => sortKeys(child, isScalar));
  }
  if (value !== null && typeof value === 'object' && !isScalar(value)) {
    const entries: Array<[string, unknown]> = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return Object.fromEntries(entries.map(([key, child]) => [key, sortKeys(child, isScalar)]));
  }
  return value;
}

/**
 * Collapse the ordered multi-map to a plain object; the first value wins
 * for repeated keys.
 */
export function queryToObject(query: Array<[string, string]>): Record<string, string> {
  const firstValues = new Map<string, string>();
  for (const [key, value] of query) {
    if (!firstValues.has(key)) {
      firstValues.set(key, value);
    }
  }
  return Object.fromEntries(firstValues);
}

/**
 * Whether a query parameter is noise that should not affect similarity
 */
export function isNoiseParam(key: string, value: string): boolean {
  const lowerKey = key.toLowerCase();
  if (NOISE_PARAMS.has(lowerKey)) {
    return true;
  }
  if (TIME_KEY_FRAGMENTS.some(fragment => lowerKey.includes(fragment))) {
    return true;
  }
  return EPOCH_LIKE.test(value);
}

function reduceUrlValue(value: string): string {
  if (!value.startsWith('http://') && !value.startsWith('https://')) {
    return value;
  }
  try {
    const parsed = new URL(value);
    return `${parsed.protocol}//${parsed.host}`;
  } catch {
    return value;
  }
}

/**
 * Apply the noise-parameter policy to a query object
 */
export function filterQueryParams(params: Record<string, string>): Record<string, string> {
  const kept: Array<[string, string]> = [];
  for (const [key, value] of Object.entries(params)) {
    if (isNoiseParam(key, value)) {
      continue;
    }
    kept.push([key, URL_PARAMS.has(key.toLowerCase()) ? reduceUrlValue(value) : value]);
  }
  return Object.fromEntries(kept);
}

/**
 * Compose the similarity signature of an exchange
 */
export function composeSignature(exchange: Exchange): Signature {
  let parsed: URL;
  try {
    parsed = new URL(exchange.url);
  } catch {
    return EMPTY_SIGNATURE;
  }

  const params = filterQueryParams(queryToObject(exchange.query));
  return {
    host: parsed.host,
    path: parsed.pathname,
    query: stableStringify(params),
  };
}

/**
 * Rebuild a signature from stored columns. The stored query JSON is passed
 * through the same parameter policy so both sides compare like for like.
 */
export function signatureFromStored(host: string, path: string, queryParams: string): Signature {
  let params: Record<string, string> = {};
  try {
    const parsed: unknown = queryParams ? JSON.parse(queryParams) : {};
    if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
      params = Object.fromEntries(
        Object.entries(parsed).map(([key, value]) => [key, typeof value === 'string' ? value : String(value)]),
      );
    }
  } catch {
    params = {};
  }
  return { host, path, query: stableStringify(filterQueryParams(params)) };
}

/**
 * "host|path|sorted-query-json"
 */
export function signatureToString(signature: Signature): string {
  return `${signature.host}|${signature.path}|${signature.query}`;
}

/**
 * Split a URL into the parts an Exchange carries. Unparseable URLs yield
 * empty parts.
 */
export function splitUrl(url: string): { host: string; path: string; query: Array<[string, string]> } {
  try {
    const parsed = new URL(url);
    return {
      host: parsed.host,
      path: parsed.pathname,
      query: Array.from(parsed.searchParams.entries()),
    };
  } catch {
    return { host: '', path: '', query: [] };
  }
}
