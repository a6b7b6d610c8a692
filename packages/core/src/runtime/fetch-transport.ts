import type { FetchLike, RequestHandler, Transport } from './types';

/**
 * Create a transport backed by a standard fetch implementation.
 * Defaults to the global fetch (Node 18+).
 */
export function createFetchTransport(fetchImpl: FetchLike = fetch): Transport {
  return {
    name: 'fetch',
    async fetch(url, init) {
      return await fetchImpl(url, init);
    }
  };
}

/**
 * Create a transport that hands each request to an in-process handler
 * instead of the network. The request keeps the caller's signal.
 */
export function createHandlerTransport(handler: RequestHandler): Transport {
  return {
    name: 'handler',
    async fetch(url, init) {
      return await handler(new Request(url, init));
    }
  };
}
