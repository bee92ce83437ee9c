/**
 * Build the stored form of an exchange
 */

import { decodeBody } from './http.js';
import { queryToObject } from './normalize.js';
import type { Exchange, NewCapturedRecord } from './types.js';

function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value) ?? '';
  } catch {
    return '';
  }
}

/**
 * Latency in seconds. Falls back to "now" when the proxy did not report a
 * completion time; null without a response.
 */
export function responseTime(exchange: Exchange, nowSeconds: number): number | null {
  if (!exchange.response) return null;
  const end = exchange.completedAt ?? nowSeconds;
  return Math.max(0, end - exchange.startedAt);
}

/**
 * Serialize an exchange for insertion. Bodies are decoded as UTF-8 with
 * replacement characters; anything that cannot be serialized becomes ''.
 */
export function buildCapturedRecord(
  exchange: Exchange,
  requestHash: string,
  nowSeconds: number = Date.now() / 1000,
): NewCapturedRecord {
  const response = exchange.response;
  return {
    requestHash,
    timestamp: exchange.startedAt,
    method: exchange.method,
    url: exchange.url,
    host: exchange.host,
    path: exchange.path,
    queryParams: safeJson(queryToObject(exchange.query)),
    headers: safeJson(exchange.requestHeaders),
    requestBody: decodeBody(exchange.requestBody),
    responseStatus: response ? response.status : null,
    responseHeaders: response ? safeJson(response.headers) : '',
    responseBody: response ? decodeBody(response.body) : '',
    responseTime: responseTime(exchange, nowSeconds),
    clientIp: exchange.clientAddress,
  };
}
