import {
  CancelledError,
  classifyErrorResponse,
  createLogger,
  isCommentFrame,
  isSuccessStatus,
  ProtocolError,
  releaseReader,
  type SSEFrame,
  SSEFrameReader,
  TransportError,
  ValidationError
} from '@feedwire/core';
import type { z } from 'zod';
import type { FeedClient } from './client';

const log = createLogger('stream');

const STREAM_HEADERS = {
  Accept: 'text/event-stream',
  'Cache-Control': 'no-cache'
} as const;

/** Passed to the handler alongside each decoded payload. */
export interface StreamContext {
  /** The signal the stream was opened with, if any. */
  signal?: AbortSignal;
  /** The raw frame the payload was decoded from. */
  frame: SSEFrame;
}

/**
 * Called once per decoded payload, strictly in arrival order. The next frame
 * is not read until the returned promise settles; a throw ends the stream
 * and propagates unchanged.
 */
export type StreamHandler<T> = (payload: T, context: StreamContext) => void | Promise<void>;

export interface FeedEvent<T> {
  payload: T;
  frame: SSEFrame;
}

export interface FeedStreamRequest<S extends z.ZodTypeAny> {
  /** Operation name prefixed to error messages. */
  operation: string;
  endpoint: string;
  /** Frames named anything else are skipped; unnamed frames are accepted. */
  eventName: string;
  schema: S;
  query: URLSearchParams;
  signal?: AbortSignal;
}

export function requireProId(proId: string, operation: string): string {
  const trimmed = typeof proId === 'string' ? proId.trim() : '';
  if (!trimmed) {
    throw new ValidationError(`${operation}: proId must not be empty`);
  }
  return trimmed;
}

export function requireHandler(handler: unknown, operation: string): void {
  if (typeof handler !== 'function') {
    throw new ValidationError(`${operation}: handler must be a function`);
  }
}

/**
 * Open one streaming session and yield decoded payloads until the server
 * ends the stream. Never reconnects. The body reader is released on every
 * exit path, including a consumer that stops iterating early.
 */
export async function* openFeedStream<S extends z.ZodTypeAny>(
  client: FeedClient,
  request: FeedStreamRequest<S>
): AsyncGenerator<FeedEvent<z.output<S>>, void, undefined> {
  const { operation, signal } = request;

  const response = await client.send('GET', request.endpoint, {
    query: request.query,
    headers: STREAM_HEADERS,
    // Streams stay open indefinitely; only the caller's signal ends them
    timeoutMs: 0,
    ...(signal ? { signal } : {})
  });

  if (!isSuccessStatus(response.status)) {
    throw await classifyErrorResponse(response);
  }

  if (!response.body) {
    log.debug(`${operation}: response has no body`);
    return;
  }

  const reader = response.body.getReader();
  const frames = new SSEFrameReader(reader);
  log.debug(`${operation}: connected to ${request.endpoint}`);

  try {
    while (true) {
      let frame: SSEFrame | undefined;
      try {
        frame = await frames.read();
      } catch (error) {
        if (signal?.aborted) {
          throw new CancelledError(signal.reason);
        }
        throw new TransportError(`${operation}: read SSE event`, error);
      }

      if (!frame) {
        log.debug(`${operation}: stream ended by server`);
        return;
      }

      if (isCommentFrame(frame)) {
        log.debug(`${operation}: comment ${JSON.stringify(frame.comment)}`);
        continue;
      }

      if (frame.event !== '' && frame.event !== request.eventName) {
        log.debug(`${operation}: skipping event "${frame.event}"`);
        continue;
      }

      if (frame.data === '') {
        throw new ProtocolError(
          `${operation}: received event "${request.eventName}" with empty data payload`
        );
      }

      yield { payload: decodePayload(request, frame.data), frame };
    }
  } finally {
    await releaseReader(reader);
    log.debug(`${operation}: connection released`);
  }
}

function decodePayload<S extends z.ZodTypeAny>(
  request: FeedStreamRequest<S>,
  data: string
): z.output<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ProtocolError(`${request.operation}: decode JSON payload: ${detail}`, {
      cause: error
    });
  }

  const result = request.schema.safeParse(raw);
  if (!result.success) {
    throw new ProtocolError(
      `${request.operation}: decode JSON payload: ${describeIssues(result.error)}`,
      { cause: result.error }
    );
  }
  return result.data;
}

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

/** Drive a feed generator to completion, awaiting the handler for each payload. */
export async function dispatchFeed<T>(
  events: AsyncIterable<FeedEvent<T>>,
  handler: StreamHandler<T>,
  signal: AbortSignal | undefined
): Promise<void> {
  for await (const { payload, frame } of events) {
    await handler(payload, signal ? { signal, frame } : { frame });
  }
}

export async function* payloadsOf<T>(
  events: AsyncIterable<FeedEvent<T>>
): AsyncGenerator<T, void, undefined> {
  for await (const { payload } of events) {
    yield payload;
  }
}
