/**
 * SQLite storage for captured exchanges
 *
 * One append-only table keyed by a unique request hash. Inserts use
 * INSERT OR IGNORE, so replaying the same hash never creates a second row
 * and never raises. Every call commits before returning; readers in other
 * processes see new rows immediately.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { StoreError, type StoreOperation } from './errors.js';
import type { CapturedRecord, NewCapturedRecord, SignatureRow, StoreWatermark } from './types.js';

const SCHEMA = `
CREATE TABLE IF NOT EXISTS api_requests (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    request_hash TEXT UNIQUE,
    timestamp REAL,
    method TEXT,
    url TEXT,
    host TEXT,
    path TEXT,
    query_params TEXT,
    headers TEXT,
    request_body TEXT,
    response_status INTEGER,
    response_headers TEXT,
    response_body TEXT,
    response_time REAL,
    client_ip TEXT,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX IF NOT EXISTS idx_request_hash ON api_requests(request_hash);
CREATE INDEX IF NOT EXISTS idx_timestamp ON api_requests(timestamp);
CREATE INDEX IF NOT EXISTS idx_host ON api_requests(host);
`;

const DEFAULT_LIST_LIMIT = 100;

interface DbRecordRow {
  id: number;
  request_hash: string;
  timestamp: number;
  method: string;
  url: string;
  host: string;
  path: string;
  query_params: string | null;
  headers: string | null;
  request_body: string | null;
  response_status: number | null;
  response_headers: string | null;
  response_body: string | null;
  response_time: number | null;
  client_ip: string | null;
  created_at: string;
}

interface DbSignatureRow {
  id: number;
  host: string;
  path: string;
  query_params: string | null;
}

interface DbHostCountRow {
  host: string;
  count: number;
}

interface DbWatermarkRow {
  maxId: number | null;
  count: number;
}

function toRecord(row: DbRecordRow): CapturedRecord {
  return {
    id: row.id,
    requestHash: row.request_hash,
    timestamp: row.timestamp,
    method: row.method,
    url: row.url,
    host: row.host,
    path: row.path,
    queryParams: row.query_params ?? '',
    headers: row.headers ?? '',
    requestBody: row.request_body ?? '',
    responseStatus: row.response_status,
    responseHeaders: row.response_headers ?? '',
    responseBody: row.response_body ?? '',
    responseTime: row.response_time,
    clientIp: row.client_ip ?? '',
    createdAt: row.created_at,
  };
}

export interface CaptureStoreOptions {
  /** How long a statement waits on a locked database before failing (ms) */
  timeoutMs?: number;
  readonly?: boolean;
}

function openDatabase(dbPath: string, options: CaptureStoreOptions): Database.Database {
  const readonly = options.readonly ?? false;
  try {
    if (dbPath !== ':memory:' && !readonly) {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    const db = new Database(dbPath, {
      timeout: options.timeoutMs ?? 5000,
      readonly,
      fileMustExist: readonly,
    });
    if (!readonly) {
      db.pragma('journal_mode = WAL');
      db.exec(SCHEMA);
    }
    return db;
  } catch (error) {
    throw new StoreError('open', error);
  }
}

export class CaptureStore {
  readonly path: string;
  private db: Database.Database;
  private closed = false;

  constructor(dbPath: string, options: CaptureStoreOptions = {}) {
    this.path = dbPath;
    this.db = openDatabase(dbPath, options);
  }

  private run<T>(operation: StoreOperation, fn: () => T): T {
    if (this.closed) {
      throw new StoreError(operation, new Error('store is closed'));
    }
    try {
      return fn();
    } catch (error) {
      throw new StoreError(operation, error);
    }
  }

  /**
   * Insert unless a row with the same request hash exists.
   * Returns true when a row was written.
   */
  insertIfAbsent(record: NewCapturedRecord): boolean {
    return this.run('insert', () => {
      const result = this.db.prepare(`
        INSERT OR IGNORE INTO api_requests
        (request_hash, timestamp, method, url, host, path, query_params,
         headers, request_body, response_status, response_headers,
         response_body, response_time, client_ip)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        record.requestHash,
        record.timestamp,
        record.method,
        record.url,
        record.host,
        record.path,
        record.queryParams,
        record.headers,
        record.requestBody,
        record.responseStatus,
        record.responseHeaders,
        record.responseBody,
        record.responseTime,
        record.clientIp,
      );
      return result.changes > 0;
    });
  }

  hasHash(hash: string): boolean {
    return this.run('lookup', () => {
      const row = this.db.prepare('SELECT 1 FROM api_requests WHERE request_hash = ? LIMIT 1').get(hash);
      return row !== undefined;
    });
  }

  /**
   * Most recent rows for a host with timestamp >= sinceTimestamp, newest first
   */
  findRecentByHost(host: string, sinceTimestamp: number, limit: number): SignatureRow[] {
    return this.run('scan', () => {
      const rows = this.db.prepare(`
        SELECT id, host, path, query_params FROM api_requests
        WHERE host = ? AND timestamp >= ?
        ORDER BY timestamp DESC
        LIMIT ?
      `).all(host, sinceTimestamp, limit) as DbSignatureRow[];

      return rows.map(row => ({
        id: row.id,
        host: row.host,
        path: row.path,
        queryParams: row.query_params ?? '',
      }));
    });
  }

  /**
   * Most recent captures by exchange timestamp
   */
  listRecent(limit: number = DEFAULT_LIST_LIMIT): CapturedRecord[] {
    return this.run('read', () => {
      const rows = this.db.prepare(`
        SELECT * FROM api_requests ORDER BY timestamp DESC, id DESC LIMIT ?
      `).all(limit) as DbRecordRow[];
      return rows.map(toRecord);
    });
  }

  /**
   * Rows inserted after the given id, oldest first. Pair with getWatermark()
   * to poll for new captures.
   */
  listAfter(afterId: number, limit: number = DEFAULT_LIST_LIMIT): CapturedRecord[] {
    return this.run('read', () => {
      const rows = this.db.prepare(`
        SELECT * FROM api_requests WHERE id > ? ORDER BY id ASC LIMIT ?
      `).all(afterId, limit) as DbRecordRow[];
      return rows.map(toRecord);
    });
  }

  getRecord(id: number): CapturedRecord | undefined {
    return this.run('read', () => {
      const row = this.db.prepare('SELECT * FROM api_requests WHERE id = ?').get(id) as DbRecordRow | undefined;
      return row ? toRecord(row) : undefined;
    });
  }

  count(): number {
    return this.getWatermark().count;
  }

  /**
   * Highest id and row count; changes whenever a capture is written
   */
  getWatermark(): StoreWatermark {
    return this.run('read', () => {
      const row = this.db.prepare(
        'SELECT MAX(id) AS maxId, COUNT(*) AS count FROM api_requests',
      ).get() as DbWatermarkRow;
      return { maxId: row.maxId ?? 0, count: row.count };
    });
  }

  /**
   * Capture counts per host, busiest first
   */
  topHosts(limit: number = 10): Array<{ host: string; count: number }> {
    return this.run('read', () => {
      return this.db.prepare(`
        SELECT host, COUNT(*) AS count FROM api_requests
        GROUP BY host ORDER BY count DESC, host ASC LIMIT ?
      `).all(limit) as DbHostCountRow[];
    });
  }

  isOpen(): boolean {
    return !this.closed;
  }

  /**
   * Close the connection. Safe to call more than once.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      this.db.close();
    } catch (error) {
      throw new StoreError('close', error);
    }
  }
}
