import type { FeedClient } from './client';
import { type FactsWindow, FactsWindowSchema } from './schemas';
import {
  dispatchFeed,
  type FeedEvent,
  openFeedStream,
  payloadsOf,
  requireHandler,
  requireProId,
  type StreamHandler
} from './stream';

export const FACTS_STREAM_ENDPOINT = '/api/facts/items/stream';
export const FACTS_EVENT = 'facts';

export interface FactsStreamOptions {
  proId: string;
  signal?: AbortSignal;
}

export type FactsStreamHandler = StreamHandler<FactsWindow>;

/**
 * The server first replays the current window of facts for `proId`, then
 * pushes a new `facts` event whenever the window changes.
 */
function openFacts(
  client: FeedClient,
  options: FactsStreamOptions,
  operation: string
): AsyncGenerator<FeedEvent<FactsWindow>, void, undefined> {
  const proId = requireProId(options.proId, operation);
  return openFeedStream(client, {
    operation,
    endpoint: FACTS_STREAM_ENDPOINT,
    eventName: FACTS_EVENT,
    schema: FactsWindowSchema,
    query: new URLSearchParams({ proId }),
    ...(options.signal ? { signal: options.signal } : {})
  });
}

/**
 * Pull-based facts stream. Validation runs when this is called; the
 * connection opens on the first `next()`.
 *
 * @example
 * ```ts
 * for await (const window of factsStream(client, { proId: 'p_1', signal })) {
 *   render(window.items);
 * }
 * ```
 */
export function factsStream(
  client: FeedClient,
  options: FactsStreamOptions
): AsyncGenerator<FactsWindow, void, undefined> {
  return payloadsOf(openFacts(client, options, 'factsStream'));
}

/**
 * Stream facts into `handler` until the server closes the stream, the
 * signal aborts (rejects with CancelledError) or the handler throws.
 */
export async function streamFacts(
  client: FeedClient,
  options: FactsStreamOptions,
  handler: FactsStreamHandler
): Promise<void> {
  requireHandler(handler, 'streamFacts');
  await dispatchFeed(openFacts(client, options, 'streamFacts'), handler, options.signal);
}
