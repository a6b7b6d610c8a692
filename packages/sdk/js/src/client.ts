/**
 * FeedClient: REST operations of the feed service plus the two SSE feeds.
 *
 * Every request carries the identity headers (`X-Pro-Id`, `X-Pro-Token`)
 * once `setAuth` has been called or the client was built with them.
 */

import {
  ApiError,
  CancelledError,
  createFetchTransport,
  DEFAULT_TIMEOUT_MS,
  type ExecuteOptions,
  type ExecuteRequest,
  executeWithTransport,
  extractErrorMessage,
  isSuccessStatus,
  ProtocolError,
  positiveParams,
  setOptional,
  statusLine,
  type Transport,
  TransportError,
  ValidationError
} from '@feedwire/core';
import type { ResolvedFeedConfig } from '@feedwire/core/config';
import type { z } from 'zod';
import { formatCursorTimestamp } from './cursor';
import { type FactsStreamHandler, type FactsStreamOptions, factsStream, streamFacts } from './facts';
import {
  filterParams,
  type MatchesStreamHandler,
  type MatchesStreamOptions,
  type MatchFilters,
  matchesStream,
  requireDirection,
  streamMatches
} from './matches';
import {
  type CreateProWalletResponse,
  CreateProWalletResponseSchema,
  type FactsWindow,
  FactsWindowSchema,
  type MatchesSnapshot,
  MatchesSnapshotSchema,
  type MatchesWindow,
  MatchesWindowSchema,
  type MatchingDirection,
  type PatchReviewStatusResponse,
  PatchReviewStatusResponseSchema,
  type SpeechStatusResponse,
  SpeechStatusResponseSchema,
  type SpeechUploadResponse,
  SpeechUploadResponseSchema,
  type UploadSpeechTextResponse,
  type VerifyProWalletResponse,
  VerifyProWalletResponseSchema
} from './schemas';
import { describeIssues, requireProId } from './stream';

export interface FeedClientOptions {
  /** Scheme, host and optional base path, e.g. `https://api.example.com/feed`. */
  baseUrl: string;
  proId?: string;
  proToken?: string;
  /**
   * Per-request timeout for REST calls. Streams never time out.
   * @default 30000
   */
  timeoutMs?: number;
  /** Sent with every request; request-specific and identity headers win. */
  headers?: Record<string, string>;
  /** Defaults to the global `fetch`. */
  transport?: Transport;
}

export interface SendOptions {
  query?: URLSearchParams;
  headers?: HeadersInit;
  body?: BodyInit;
  /** Overrides the client timeout; 0 disables it. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/** Options accepted by every REST operation. */
export interface CallOptions {
  signal?: AbortSignal;
}

export interface CreateProWalletOptions extends CallOptions {
  /** Privileged key, sent as `X-Manax-Key` when non-empty. */
  adminKey?: string;
}

export interface UploadSpeechAudioRequest extends CallOptions {
  proId: string;
  sessionId: string;
  /** 0-based index within the session. */
  chunkIndex: number;
  audio: Blob | string;
  /** @default "audio" */
  fileName?: string;
  /** Hz; omitted when unset or 0. */
  sampleRate?: number;
}

export interface UploadSpeechTextRequest extends CallOptions {
  proId: string;
  sessionId: string;
  chunkIndex: number;
  text: string;
}

export interface SpeechStatusKey extends CallOptions {
  proId?: string;
  sessionId: string;
  chunkIndex: number;
}

export interface UpdatesSince {
  /** Omitted from the query when unset. */
  sinceUpdatedUtc?: Date;
  /** @default 0 */
  sinceId?: number;
}

export interface FactsSnapshotOptions extends CallOptions {
  limit?: number;
}

export interface FactsUpdatesOptions extends CallOptions, UpdatesSince {
  limit?: number;
}

export interface MatchesSnapshotOptions extends CallOptions, MatchFilters {
  direction: MatchingDirection;
}

export interface MatchesUpdatesOptions extends CallOptions, MatchFilters, UpdatesSince {
  /** Omit to receive both directions. */
  direction?: MatchingDirection;
}

function joinPaths(basePath: string, suffixPath: string): string {
  const normalizedBase = basePath === '/' ? '' : basePath.replace(/\/+$/, '');
  const normalizedSuffix = suffixPath.startsWith('/') ? suffixPath : `/${suffixPath}`;
  return `${normalizedBase}${normalizedSuffix}`;
}

function parseBaseUrl(raw: string): URL {
  const trimmed = typeof raw === 'string' ? raw.trim() : '';
  if (!trimmed) {
    throw new ValidationError('baseUrl must not be empty');
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw new ValidationError(`invalid baseUrl '${trimmed}'`);
  }
  if (!url.host) {
    throw new ValidationError(`baseUrl must include scheme and host: '${trimmed}'`);
  }

  url.search = '';
  url.hash = '';
  return url;
}

function requireNonNegativeInteger(value: number, name: string, operation: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${operation}: ${name} must be a non-negative integer`);
  }
}

function requireNonEmpty(value: string, name: string, operation: string): string {
  const trimmed = typeof value === 'string' ? value.trim() : '';
  if (!trimmed) {
    throw new ValidationError(`${operation}: ${name} must not be empty`);
  }
  return trimmed;
}

function sinceParams(since: UpdatesSince, operation: string): Array<[string, string]> {
  const sinceId = since.sinceId ?? 0;
  requireNonNegativeInteger(sinceId, 'sinceId', operation);

  const params: Array<[string, string]> = [];
  if (since.sinceUpdatedUtc !== undefined) {
    if (Number.isNaN(since.sinceUpdatedUtc.getTime())) {
      throw new ValidationError(`${operation}: sinceUpdatedUtc must be a valid date`);
    }
    params.push(['sinceUpdatedUtc', formatCursorTimestamp(since.sinceUpdatedUtc)]);
  }
  params.push(['sinceId', String(sinceId)]);
  return params;
}

export class FeedClient {
  readonly baseUrl: URL;
  readonly timeoutMs: number;
  private readonly transport: Transport;
  private readonly defaultHeaders: Record<string, string>;
  private proId = '';
  private proToken = '';

  constructor(options: FeedClientOptions) {
    this.baseUrl = parseBaseUrl(options.baseUrl);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.transport = options.transport ?? createFetchTransport();
    this.defaultHeaders = { ...options.headers };
    this.setAuth(options.proId ?? '', options.proToken ?? '');
  }

  /** Identity sent with every later request. Empty values are not sent. */
  setAuth(proId: string, proToken: string): void {
    this.proId = proId.trim();
    this.proToken = proToken.trim();
  }

  get identity(): { proId: string; hasToken: boolean } {
    return { proId: this.proId, hasToken: this.proToken !== '' };
  }

  /** Base URL joined with `endpoint`; the base path is preserved. */
  buildUrl(endpoint: string, query?: URLSearchParams): string {
    const url = new URL(this.baseUrl.toString());
    url.pathname = joinPaths(url.pathname, endpoint.trim());
    url.search = query ? query.toString() : '';
    return url.toString();
  }

  /**
   * Merge default, request-specific and identity headers, in that order.
   * `Accept` defaults to JSON.
   */
  applyHeaders(extra?: HeadersInit): Headers {
    const headers = new Headers(this.defaultHeaders);
    new Headers(extra).forEach((value, key) => {
      headers.set(key, value);
    });

    if (this.proId) headers.set('X-Pro-Id', this.proId);
    if (this.proToken) headers.set('X-Pro-Token', this.proToken);
    if (!headers.has('Accept')) headers.set('Accept', 'application/json');

    return headers;
  }

  /** Send one request and resolve once headers arrive. Status is not checked. */
  async send(method: string, endpoint: string, options: SendOptions = {}): Promise<Response> {
    const request: ExecuteRequest = setOptional<ExecuteRequest>({
      method,
      url: this.buildUrl(endpoint, options.query),
      headers: this.applyHeaders(options.headers)
    })
      .ifDefined('body', options.body)
      .build();

    const execOptions = setOptional<ExecuteOptions>({
      timeoutMs: options.timeoutMs ?? this.timeoutMs
    })
      .ifDefined('signal', options.signal)
      .build();

    return executeWithTransport(request, execOptions, this.transport);
  }

  /**
   * Send a request and return the parsed JSON body, or `undefined` for an
   * empty 2xx body. Non-2xx responses become an ApiError.
   */
  async requestRaw(method: string, endpoint: string, options: SendOptions = {}): Promise<unknown> {
    const response = await this.send(method, endpoint, options);

    let body: Uint8Array;
    try {
      body = new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      if (options.signal?.aborted) {
        throw new CancelledError(options.signal.reason);
      }
      throw new TransportError('read response body', error);
    }

    if (!isSuccessStatus(response.status)) {
      throw new ApiError(response.status, extractErrorMessage(body, statusLine(response)), body);
    }

    if (body.length === 0) return undefined;

    try {
      return JSON.parse(new TextDecoder().decode(body));
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new ProtocolError(`decode JSON response: ${detail}`, { cause: error });
    }
  }

  /** Like `requestRaw`, validated with `schema`. An empty body decodes as `{}`. */
  async requestJson<S extends z.ZodTypeAny>(
    schema: S,
    method: string,
    endpoint: string,
    options: SendOptions = {}
  ): Promise<z.output<S>> {
    const raw = await this.requestRaw(method, endpoint, options);
    const result = schema.safeParse(raw ?? {});
    if (!result.success) {
      throw new ProtocolError(`decode JSON response: ${describeIssues(result.error)}`, {
        cause: result.error
      });
    }
    return result.data;
  }

  // ==========================================================================
  // Wallet
  // ==========================================================================

  async createProWallet(options: CreateProWalletOptions = {}): Promise<CreateProWalletResponse> {
    const adminKey = options.adminKey?.trim() ?? '';
    return this.requestJson(CreateProWalletResponseSchema, 'POST', '/api/crypto/pro-wallet/create', {
      headers: adminKey ? { 'X-Manax-Key': adminKey } : {},
      ...signalOf(options)
    });
  }

  async verifyProWallet(
    proId: string,
    token: string,
    options: CallOptions = {}
  ): Promise<VerifyProWalletResponse> {
    const query = new URLSearchParams({
      proId: requireProId(proId, 'verifyProWallet'),
      token: requireNonEmpty(token, 'token', 'verifyProWallet')
    });
    return this.requestJson(VerifyProWalletResponseSchema, 'GET', '/api/crypto/pro-wallet/verify', {
      query,
      ...signalOf(options)
    });
  }

  // ==========================================================================
  // Speech
  // ==========================================================================

  async uploadSpeechAudio(request: UploadSpeechAudioRequest): Promise<SpeechUploadResponse> {
    const operation = 'uploadSpeechAudio';
    if (request.audio === undefined || request.audio === null) {
      throw new ValidationError(`${operation}: audio is required`);
    }
    const proId = requireProId(request.proId, operation);
    const sessionId = requireNonEmpty(request.sessionId, 'sessionId', operation);
    requireNonNegativeInteger(request.chunkIndex, 'chunkIndex', operation);

    const audio = typeof request.audio === 'string' ? new Blob([request.audio]) : request.audio;
    const fileName = request.fileName?.trim() ? request.fileName : 'audio';

    const form = new FormData();
    form.append('audio', audio, fileName);
    form.append('proId', proId);
    form.append('sessionId', sessionId);
    form.append('chunkIndex', String(request.chunkIndex));
    if (request.sampleRate !== undefined && request.sampleRate > 0) {
      form.append('sampleRate', String(request.sampleRate));
    }

    // Content-Type with the multipart boundary is set by fetch
    return this.requestJson(SpeechUploadResponseSchema, 'POST', '/api/speech/upload', {
      body: form,
      ...signalOf(request)
    });
  }

  async uploadSpeechText(request: UploadSpeechTextRequest): Promise<UploadSpeechTextResponse> {
    const operation = 'uploadSpeechText';
    requireProId(request.proId, operation);
    requireNonEmpty(request.sessionId, 'sessionId', operation);
    requireNonNegativeInteger(request.chunkIndex, 'chunkIndex', operation);
    requireNonEmpty(request.text, 'text', operation);

    const body = JSON.stringify({
      proId: request.proId,
      sessionId: request.sessionId,
      chunkIndex: request.chunkIndex,
      text: request.text
    });

    const raw = await this.requestRaw('POST', '/api/speech/text', {
      headers: { 'Content-Type': 'application/json' },
      body,
      ...signalOf(request)
    });
    return { raw: raw ?? null };
  }

  async getSpeechStatusById(id: number, options: CallOptions = {}): Promise<SpeechStatusResponse> {
    if (!Number.isInteger(id) || id <= 0) {
      throw new ValidationError('getSpeechStatusById: id must be a positive integer');
    }
    return this.requestJson(SpeechStatusResponseSchema, 'GET', '/api/speech/status', {
      query: new URLSearchParams({ id: String(id) }),
      ...signalOf(options)
    });
  }

  async getSpeechStatusByKey(key: SpeechStatusKey): Promise<SpeechStatusResponse> {
    const operation = 'getSpeechStatusByKey';
    const sessionId = requireNonEmpty(key.sessionId, 'sessionId', operation);
    requireNonNegativeInteger(key.chunkIndex, 'chunkIndex', operation);

    const query = new URLSearchParams();
    const proId = key.proId?.trim();
    if (proId) query.set('proId', proId);
    query.set('sessionId', sessionId);
    query.set('chunkIndex', String(key.chunkIndex));

    return this.requestJson(SpeechStatusResponseSchema, 'GET', '/api/speech/status', {
      query,
      ...signalOf(key)
    });
  }

  // ==========================================================================
  // Facts
  // ==========================================================================

  async getFactsSnapshot(proId: string, options: FactsSnapshotOptions = {}): Promise<FactsWindow> {
    const query = new URLSearchParams([
      ['proId', requireProId(proId, 'getFactsSnapshot')],
      ...positiveParams({ limit: options.limit })
    ]);
    return this.requestJson(FactsWindowSchema, 'GET', '/api/facts/items/snapshot', {
      query,
      ...signalOf(options)
    });
  }

  async getFactsUpdates(proId: string, options: FactsUpdatesOptions = {}): Promise<FactsWindow> {
    const operation = 'getFactsUpdates';
    const query = new URLSearchParams([
      ['proId', requireProId(proId, operation)],
      ...sinceParams(options, operation),
      ...positiveParams({ limit: options.limit })
    ]);
    return this.requestJson(FactsWindowSchema, 'GET', '/api/facts/items/updates', {
      query,
      ...signalOf(options)
    });
  }

  /** `reviewStatus` is usually "ok" or "not"; an empty string clears it. */
  async patchFactReviewStatus(
    proId: string,
    id: number,
    reviewStatus: string,
    options: CallOptions = {}
  ): Promise<PatchReviewStatusResponse> {
    const operation = 'patchFactReviewStatus';
    const query = new URLSearchParams({ proId: requireProId(proId, operation) });
    if (!Number.isInteger(id) || id <= 0) {
      throw new ValidationError(`${operation}: id must be a positive integer`);
    }

    return this.requestJson(
      PatchReviewStatusResponseSchema,
      'PATCH',
      `/api/facts/items/${id}/review-status`,
      {
        query,
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ reviewStatus: reviewStatus.trim() }),
        ...signalOf(options)
      }
    );
  }

  // ==========================================================================
  // Matches
  // ==========================================================================

  async getMatchesSnapshot(
    proId: string,
    options: MatchesSnapshotOptions
  ): Promise<MatchesSnapshot> {
    const operation = 'getMatchesSnapshot';
    const query = new URLSearchParams([
      ['proId', requireProId(proId, operation)],
      ['direction', requireDirection(options.direction, operation)],
      ...filterParams(options)
    ]);
    return this.requestJson(MatchesSnapshotSchema, 'GET', '/api/matches/items/snapshot', {
      query,
      ...signalOf(options)
    });
  }

  async getMatchesUpdates(
    proId: string,
    options: MatchesUpdatesOptions = {}
  ): Promise<MatchesWindow> {
    const operation = 'getMatchesUpdates';
    const query = new URLSearchParams([['proId', requireProId(proId, operation)]]);
    if (options.direction) query.set('direction', options.direction);
    for (const [key, value] of [...sinceParams(options, operation), ...filterParams(options)]) {
      query.set(key, value);
    }
    return this.requestJson(MatchesWindowSchema, 'GET', '/api/matches/items/updates', {
      query,
      ...signalOf(options)
    });
  }

  // ==========================================================================
  // Streams
  // ==========================================================================

  streamFacts(options: FactsStreamOptions, handler: FactsStreamHandler): Promise<void> {
    return streamFacts(this, options, handler);
  }

  factsStream(options: FactsStreamOptions): AsyncGenerator<FactsWindow, void, undefined> {
    return factsStream(this, options);
  }

  streamMatches(options: MatchesStreamOptions, handler: MatchesStreamHandler): Promise<void> {
    return streamMatches(this, options, handler);
  }

  matchesStream(options: MatchesStreamOptions): AsyncGenerator<MatchesWindow, void, undefined> {
    return matchesStream(this, options);
  }
}

function signalOf(options: CallOptions): { signal?: AbortSignal } {
  return options.signal ? { signal: options.signal } : {};
}

export function createFeedClient(options: FeedClientOptions): FeedClient {
  return new FeedClient(options);
}

/** Build a client from a resolved configuration (see `resolveFeedConfig`). */
export function createFeedClientFromConfig(
  config: ResolvedFeedConfig,
  transport?: Transport
): FeedClient {
  return new FeedClient(
    setOptional<FeedClientOptions>({
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
      headers: config.headers
    })
      .ifDefined('proId', config.proId)
      .ifDefined('proToken', config.proToken)
      .ifDefined('transport', transport)
      .build()
  );
}
