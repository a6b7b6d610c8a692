import { positiveParams, ValidationError } from '@feedwire/core';
import type { FeedClient } from './client';
import { formatCursorTimestamp, type StreamCursor, validateCursor } from './cursor';
import { type MatchesWindow, MatchesWindowSchema, type MatchingDirection } from './schemas';
import {
  dispatchFeed,
  type FeedEvent,
  openFeedStream,
  payloadsOf,
  requireHandler,
  requireProId,
  type StreamHandler
} from './stream';

export const MATCHES_STREAM_ENDPOINT = '/api/matches/items/stream';
export const MATCHES_EVENT = 'matches';

/** Server-side filters. Zero, negative or unset values are not sent. */
export interface MatchFilters {
  minScore?: number;
  limit?: number;
  minRationaleLength?: number;
  maxRationaleLength?: number;
}

export interface MatchesStreamOptions extends MatchFilters {
  proId: string;
  /** Only matches after this position are delivered. */
  cursor: StreamCursor;
  direction: MatchingDirection;
  signal?: AbortSignal;
}

export type MatchesStreamHandler = StreamHandler<MatchesWindow>;

export function filterParams(filters: MatchFilters): Array<[string, string]> {
  return positiveParams({
    minScore: filters.minScore,
    limit: filters.limit,
    minRationaleLength: filters.minRationaleLength,
    maxRationaleLength: filters.maxRationaleLength
  });
}

export function requireDirection(direction: string, operation: string): string {
  if (typeof direction !== 'string' || direction === '') {
    throw new ValidationError(`${operation}: direction must not be empty`);
  }
  return direction;
}

function openMatches(
  client: FeedClient,
  options: MatchesStreamOptions,
  operation: string
): AsyncGenerator<FeedEvent<MatchesWindow>, void, undefined> {
  const proId = requireProId(options.proId, operation);
  const direction = requireDirection(options.direction, operation);
  validateCursor(options.cursor, operation);

  const query = new URLSearchParams([
    ['proId', proId],
    ['sinceUpdatedUtc', formatCursorTimestamp(options.cursor.updatedUtc)],
    ['sinceId', String(options.cursor.id)],
    ['direction', direction],
    ...filterParams(options)
  ]);

  return openFeedStream(client, {
    operation,
    endpoint: MATCHES_STREAM_ENDPOINT,
    eventName: MATCHES_EVENT,
    schema: MatchesWindowSchema,
    query,
    ...(options.signal ? { signal: options.signal } : {})
  });
}

/**
 * Pull-based matches stream starting after `options.cursor`. Take the cursor
 * from a matches snapshot (see `cursorOf`) and pass the latest one back in
 * when reconnecting.
 */
export function matchesStream(
  client: FeedClient,
  options: MatchesStreamOptions
): AsyncGenerator<MatchesWindow, void, undefined> {
  return payloadsOf(openMatches(client, options, 'matchesStream'));
}

export async function streamMatches(
  client: FeedClient,
  options: MatchesStreamOptions,
  handler: MatchesStreamHandler
): Promise<void> {
  requireHandler(handler, 'streamMatches');
  await dispatchFeed(openMatches(client, options, 'streamMatches'), handler, options.signal);
}
