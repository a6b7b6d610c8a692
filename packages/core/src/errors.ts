// ============================================================================
// Error Taxonomy
// ============================================================================

/**
 * Base error class for all feedwire errors.
 * Provides consistent error structure with code and message.
 */
export class FeedError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FeedError';
  }

  toObject() {
    return { error: { code: this.code, message: this.message } };
  }
}

// ============================================================================
// Specific Error Types
// ============================================================================

export class ValidationError extends FeedError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
  }
}

/**
 * Non-2xx response from the API service.
 * `body` holds the raw bytes read from the response (possibly truncated).
 */
export class ApiError extends FeedError {
  constructor(
    public readonly status: number,
    message: string,
    public readonly body: Uint8Array = new Uint8Array()
  ) {
    super('API_ERROR', message);
    this.name = 'ApiError';
  }

  /** Raw body decoded as UTF-8. */
  bodyText(): string {
    return new TextDecoder().decode(this.body);
  }

  override toObject() {
    return { error: { code: this.code, message: this.message, status: this.status } };
  }
}

export class TransportError extends FeedError {
  constructor(message: string, cause: unknown) {
    super('TRANSPORT_ERROR', `${message}: ${describeCause(cause)}`, { cause });
    this.name = 'TransportError';
  }
}

export class ProtocolError extends FeedError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PROTOCOL_ERROR', message, options);
    this.name = 'ProtocolError';
  }
}

/**
 * The caller aborted the signal bound to the request.
 * `cause` is the signal's abort reason.
 */
export class CancelledError extends FeedError {
  constructor(reason?: unknown) {
    super('CANCELLED', 'Request cancelled', { cause: reason });
    this.name = 'CancelledError';
  }
}

export class TimeoutError extends FeedError {
  constructor(public readonly timeoutMs: number) {
    super('TIMEOUT', `Request timeout after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export function isCancellation(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}
