/**
 * @feedwire/sdk: typed client for the facts and matches feeds.
 *
 * @example
 * ```ts
 * const client = createFeedClient({ baseUrl: 'https://api.example.com', proId, proToken });
 * const snapshot = await client.getMatchesSnapshot(proId, { direction: 'Offer' });
 * await client.streamMatches(
 *   { proId, direction: 'Offer', cursor: cursorOf(snapshot), signal },
 *   (window) => console.log(window.items.length)
 * );
 * ```
 */

export {
  type CallOptions,
  type CreateProWalletOptions,
  createFeedClient,
  createFeedClientFromConfig,
  FeedClient,
  type FeedClientOptions,
  type FactsSnapshotOptions,
  type FactsUpdatesOptions,
  type MatchesSnapshotOptions,
  type MatchesUpdatesOptions,
  type SendOptions,
  type SpeechStatusKey,
  type UpdatesSince,
  type UploadSpeechAudioRequest,
  type UploadSpeechTextRequest
} from './client';
export { compareCursors, cursorOf, formatCursorTimestamp, type StreamCursor } from './cursor';
export {
  FACTS_EVENT,
  FACTS_STREAM_ENDPOINT,
  type FactsStreamHandler,
  type FactsStreamOptions,
  factsStream,
  streamFacts
} from './facts';
export {
  MATCHES_EVENT,
  MATCHES_STREAM_ENDPOINT,
  type MatchesStreamHandler,
  type MatchesStreamOptions,
  type MatchFilters,
  matchesStream,
  streamMatches
} from './matches';
export * from './schemas';
export { type StreamContext, type StreamHandler } from './stream';

// Errors callers are expected to branch on
export {
  ApiError,
  CancelledError,
  FeedError,
  isCancellation,
  ProtocolError,
  TimeoutError,
  TransportError,
  ValidationError
} from '@feedwire/core';
