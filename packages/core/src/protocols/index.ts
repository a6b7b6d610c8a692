export {
  isCommentFrame,
  parseSSEStream,
  releaseReader,
  type SSEFrame,
  SSEFrameReader
} from './sse';
export {
  type ClassifyOptions,
  classifyErrorResponse,
  ERROR_BODY_LIMIT_BYTES,
  extractErrorMessage,
  isSuccessStatus,
  readBodyPrefix,
  statusLine
} from './status';
