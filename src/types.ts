/**
 * Core types for apisift
 */

/**
 * Response half of an exchange. Absent when the upstream never answered.
 */
export interface ExchangeResponse {
  status: number;
  headers: Record<string, string>;
  body: Buffer | null;
}

/**
 * One completed request/response pair as observed by the capture proxy.
 * Timestamps are float seconds since the epoch.
 */
export interface Exchange {
  method: string;
  url: string;
  host: string;
  path: string;
  query: Array<[string, string]>;   // ordered multi-map, repeated keys allowed
  requestHeaders: Record<string, string>;
  requestBody: Buffer | null;
  response?: ExchangeResponse;
  startedAt: number;
  completedAt?: number;
  clientAddress: string;
}

/**
 * Row of the api_requests table.
 */
export interface CapturedRecord {
  id: number;
  requestHash: string;
  timestamp: number;
  method: string;
  url: string;
  host: string;
  path: string;
  queryParams: string;
  headers: string;
  requestBody: string;
  responseStatus: number | null;
  responseHeaders: string;
  responseBody: string;
  responseTime: number | null;
  clientIp: string;
  createdAt: string;
}

/** Record as handed to the store; id and createdAt are assigned on insert. */
export type NewCapturedRecord = Omit<CapturedRecord, 'id' | 'createdAt'>;

/** Stored columns the fuzzy detector needs to rebuild a signature. */
export type SignatureRow = Pick<CapturedRecord, 'id' | 'host' | 'path' | 'queryParams'>;

export interface Signature {
  host: string;
  path: string;
  query: string;   // key-sorted JSON object
}

export type Classification = 'static' | 'candidate';

export type ClassificationReason = 'extension' | 'content-type' | 'path' | 'html' | 'none';

export type PipelineStage = 'classify' | 'filter' | 'hash' | 'exact' | 'fuzzy' | 'store';

export type PipelineOutcome =
  | { status: 'static'; reason: ClassificationReason }
  | { status: 'filtered' }
  | { status: 'duplicate'; hash: string }
  | { status: 'similar'; hash: string; matchedId: number; score: number }
  | { status: 'captured'; hash: string }
  | { status: 'error'; stage: PipelineStage; message: string }
  | { status: 'closed' };

export type OutcomeStatus = PipelineOutcome['status'];

export interface StoreWatermark {
  maxId: number;
  count: number;
}
