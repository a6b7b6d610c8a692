import { CancelledError, TimeoutError, TransportError } from './errors';
import { createLogger } from './logger';
import type { Transport } from './runtime/types';
import { setOptional } from './utils/optional';

const log = createLogger('execute');

export const DEFAULT_TIMEOUT_MS = 30000;

export interface ExecuteRequest {
  method: string;
  url: string;
  headers: Headers;
  body?: BodyInit;
}

export interface ExecuteOptions {
  /**
   * Request timeout in milliseconds. Ignored when `signal` is given.
   * Pass 0 for no timeout (long-lived streams).
   * @default 30000
   */
  timeoutMs?: number;

  /**
   * AbortSignal for cancellation. Takes precedence over timeout.
   */
  signal?: AbortSignal;
}

/**
 * Determines if body should be attached to the request.
 * GET and HEAD requests should not have a body per HTTP spec.
 */
function shouldAttachBody(method: string, body: ExecuteRequest['body']): boolean {
  return body !== undefined && !['GET', 'HEAD'].includes(method.toUpperCase());
}

/**
 * Create an AbortSignal for request execution.
 * Uses provided signal or creates an internal timeout-based signal.
 */
function createExecutionSignal(opts: { provided?: AbortSignal; timeoutMs: number }): {
  signal?: AbortSignal;
  isInternalTimeout: boolean;
  cleanup: () => void;
} {
  if (opts.provided) {
    return { signal: opts.provided, isInternalTimeout: false, cleanup: () => {} };
  }
  if (opts.timeoutMs <= 0) {
    return { isInternalTimeout: false, cleanup: () => {} };
  }

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), opts.timeoutMs);

  return {
    signal: controller.signal,
    isInternalTimeout: true,
    cleanup: () => clearTimeout(timeoutId)
  };
}

/**
 * Map a failure raised before any response arrived.
 * Caller aborts win over whatever error the transport surfaced.
 */
export function mapExecuteError(
  error: unknown,
  ctx: { signal?: AbortSignal; timeoutMs: number; isInternalTimeout: boolean }
): Error {
  if (ctx.signal?.aborted) {
    if (ctx.isInternalTimeout) {
      return new TimeoutError(ctx.timeoutMs);
    }
    return new CancelledError(ctx.signal.reason);
  }
  return new TransportError('http request failed', error);
}

/**
 * Execute an HTTP request using an explicit transport.
 * Resolves with the response as soon as headers arrive; the body is the
 * caller's to consume or release.
 */
export async function executeWithTransport(
  request: ExecuteRequest,
  options: ExecuteOptions,
  transport: Transport
): Promise<Response> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  const { signal, isInternalTimeout, cleanup } = createExecutionSignal(
    setOptional<{ timeoutMs: number; provided?: AbortSignal }>({ timeoutMs })
      .ifDefined('provided', options.signal)
      .build()
  );

  const init = setOptional<RequestInit>({
    method: request.method,
    headers: request.headers
  })
    .ifDefined('signal', signal)
    .ifDefined('body', shouldAttachBody(request.method, request.body) ? request.body : undefined)
    .build();

  log.debug(`${request.method} ${request.url} via ${transport.name}`);

  try {
    return await transport.fetch(request.url, init);
  } catch (error) {
    throw mapExecuteError(
      error,
      setOptional<{ signal?: AbortSignal; timeoutMs: number; isInternalTimeout: boolean }>({
        timeoutMs,
        isInternalTimeout
      })
        .ifDefined('signal', signal)
        .build()
    );
  } finally {
    cleanup();
  }
}
