/**
 * Intercepting HTTP(S) proxy
 *
 * mockttp passes every request through to its real destination and reports
 * the completed request and response as separate events. They are paired
 * by request id and handed to the capture pipeline as one Exchange once the
 * response is complete. Requests that never get a response are not captured.
 *
 * HTTPS interception needs a local CA; it is generated on first start and
 * kept in caDir. Clients must trust ca.pem to see decrypted traffic.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import path from 'path';
import { generateCACertificate, getLocal, type CompletedBody, type CompletedRequest, type CompletedResponse } from 'mockttp';
import type { Logger } from './logger.js';
import { splitUrl } from './normalize.js';
import type { CapturePipeline } from './pipeline.js';
import { redactError } from './redact.js';
import type { Exchange } from './types.js';

export type RawHeaders = Record<string, string | string[] | undefined>;

/** Request half as reported by the proxy, body already decoded */
export interface RequestSnapshot {
  id: string;
  method: string;
  url: string;
  headers: RawHeaders;
  body: Buffer | null;
  remoteIpAddress?: string;
  /** Epoch milliseconds */
  startTime: number;
  /** High-resolution clock at start, milliseconds */
  startTimestamp: number;
}

export interface ResponseSnapshot {
  statusCode: number;
  headers: RawHeaders;
  body: Buffer | null;
  /** High-resolution clock once the response was sent, milliseconds */
  responseSentTimestamp?: number;
}

export interface CaptureProxyOptions {
  port: number;
  caDir: string;
  pipeline: CapturePipeline;
  logger: Logger;
}

export interface CaptureProxy {
  port: number;
  url: string;
  caCertPath: string;
  stop(): Promise<void>;
}

/**
 * Join repeated header values and drop missing ones
 */
export function flattenHeaders(headers: RawHeaders): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    flat[name] = Array.isArray(value) ? value.join(', ') : value;
  }
  return flat;
}

/**
 * Pair a request with its response as an Exchange
 */
export function toExchange(request: RequestSnapshot, response: ResponseSnapshot): Exchange {
  const { host, path: urlPath, query } = splitUrl(request.url);
  const startedAt = request.startTime / 1000;

  const exchange: Exchange = {
    method: request.method.toUpperCase(),
    url: request.url,
    host,
    path: urlPath,
    query,
    requestHeaders: flattenHeaders(request.headers),
    requestBody: request.body,
    response: {
      status: response.statusCode,
      headers: flattenHeaders(response.headers),
      body: response.body,
    },
    startedAt,
    clientAddress: request.remoteIpAddress ?? '',
  };

  if (response.responseSentTimestamp !== undefined) {
    exchange.completedAt = startedAt + (response.responseSentTimestamp - request.startTimestamp) / 1000;
  }

  return exchange;
}

async function readBody(body: CompletedBody): Promise<Buffer | null> {
  // Undo content-encoding; fall back to the raw bytes for unknown encodings
  const decoded = await body.getDecodedBuffer().catch(() => undefined);
  const buffer = decoded ?? body.buffer;
  return buffer.length > 0 ? buffer : null;
}

async function snapshotRequest(request: CompletedRequest): Promise<RequestSnapshot> {
  return {
    id: request.id,
    method: request.method,
    url: request.url,
    headers: request.headers,
    body: await readBody(request.body),
    remoteIpAddress: request.remoteIpAddress,
    startTime: request.timingEvents.startTime,
    startTimestamp: request.timingEvents.startTimestamp,
  };
}

async function snapshotResponse(response: CompletedResponse): Promise<ResponseSnapshot> {
  return {
    statusCode: response.statusCode,
    headers: response.headers,
    body: await readBody(response.body),
    responseSentTimestamp: response.timingEvents.responseSentTimestamp,
  };
}

/**
 * Load the interception CA from caDir, generating it on first use
 */
export async function ensureCertificateAuthority(caDir: string): Promise<{ keyPath: string; certPath: string }> {
  const keyPath = path.join(caDir, 'ca.key');
  const certPath = path.join(caDir, 'ca.pem');

  if (!existsSync(keyPath) || !existsSync(certPath)) {
    mkdirSync(caDir, { recursive: true });
    const ca = await generateCACertificate({
      subject: { commonName: 'apisift capture CA' },
    });
    writeFileSync(keyPath, ca.key, { mode: 0o600 });
    writeFileSync(certPath, ca.cert);
  } else {
    // Surface unreadable files at startup rather than on the first TLS handshake
    readFileSync(keyPath);
    readFileSync(certPath);
  }

  return { keyPath, certPath };
}

/**
 * Pairs request and response events by id. Only exchanges that received a
 * response are delivered; aborted requests are forgotten.
 */
export class ExchangeAssembler {
  private readonly requests = new Map<string, Promise<RequestSnapshot>>();
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly deliver: (exchange: Exchange) => Promise<unknown>,
    private readonly logger: Logger,
  ) {}

  requestSeen(id: string, snapshot: Promise<RequestSnapshot>): void {
    this.requests.set(id, snapshot);
  }

  responseSeen(id: string, snapshot: () => Promise<ResponseSnapshot>): void {
    const pending = this.requests.get(id);
    if (!pending) return;
    this.requests.delete(id);

    const task: Promise<void> = Promise.all([pending, snapshot()])
      .then(([request, response]) => this.deliver(toExchange(request, response)))
      .then(
        () => undefined,
        (error: unknown) => {
          this.logger.error(`Capture failed for request ${id}: ${redactError(error)}`);
        },
      )
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  requestAborted(id: string): void {
    this.requests.delete(id);
  }

  getPending(): number {
    return this.requests.size;
  }

  getInFlight(): number {
    return this.inFlight.size;
  }

  /**
   * Wait for delivered exchanges to finish and drop unanswered requests
   */
  async settle(): Promise<void> {
    await Promise.allSettled([...this.inFlight]);
    this.requests.clear();
  }
}

/**
 * Start the proxy and feed every completed exchange to the pipeline
 */
export async function startCaptureProxy(options: CaptureProxyOptions): Promise<CaptureProxy> {
  const { pipeline, logger } = options;
  const { keyPath, certPath } = await ensureCertificateAuthority(options.caDir);

  const server = getLocal({
    https: { keyPath, certPath },
    recordTraffic: false,
  });

  const assembler = new ExchangeAssembler(exchange => pipeline.onExchangeComplete(exchange), logger);

  await server.forAnyRequest().thenPassThrough();

  await server.on('request', (request) => {
    assembler.requestSeen(request.id, snapshotRequest(request));
  });

  await server.on('response', (response) => {
    assembler.responseSeen(response.id, () => snapshotResponse(response));
  });

  await server.on('abort', (aborted) => {
    assembler.requestAborted(aborted.id);
  });

  await server.start(options.port);
  logger.debug(`Proxy listening on ${server.url}`);

  return {
    port: server.port,
    url: server.url,
    caCertPath: certPath,
    async stop() {
      await server.stop();
      await assembler.settle();
    },
  };
}
