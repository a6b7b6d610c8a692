// Errors
export {
  ApiError,
  CancelledError,
  FeedError,
  isCancellation,
  ProtocolError,
  TimeoutError,
  TransportError,
  ValidationError
} from './errors';
// Request execution
export {
  DEFAULT_TIMEOUT_MS,
  type ExecuteOptions,
  type ExecuteRequest,
  executeWithTransport,
  mapExecuteError
} from './execute';
// Logging
export { createLogger, type Logger } from './logger';
// SSE framing and status classification
export {
  type ClassifyOptions,
  classifyErrorResponse,
  ERROR_BODY_LIMIT_BYTES,
  extractErrorMessage,
  isCommentFrame,
  isSuccessStatus,
  parseSSEStream,
  readBodyPrefix,
  releaseReader,
  type SSEFrame,
  SSEFrameReader,
  statusLine
} from './protocols';
// Runtime adapters
export {
  createFetchTransport,
  createHandlerTransport,
  type FetchLike,
  type RequestHandler,
  type Transport
} from './runtime';
// Utilities
export { type OptionalBuilder, positiveParams, setOptional } from './utils/optional';
