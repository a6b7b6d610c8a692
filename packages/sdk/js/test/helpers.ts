import { createHandlerTransport, type Transport } from '@feedwire/core';
import { createFeedClient, type FeedClient, type FeedClientOptions } from '../src';

export const BASE_URL = 'http://feed.test';

/** Anything with a fetch-style entry point, such as a hono app. */
export interface FetchApp {
  fetch(request: Request): Response | Promise<Response>;
}

/** Client whose requests are served in process by `app`. */
export function clientFor(app: FetchApp, options: Partial<FeedClientOptions> = {}): FeedClient {
  return createFeedClient({
    baseUrl: BASE_URL,
    transport: createHandlerTransport((request) => app.fetch(request)),
    ...options
  });
}

export function sseBody(...frames: string[]): string {
  return frames.join('');
}

export function frame(event: string | undefined, data: string): string {
  return `${event === undefined ? '' : `event: ${event}\n`}data: ${data}\n\n`;
}

export interface RecordedRequest {
  url: URL;
  headers: Headers;
}

/**
 * SSE feed driven by the test: frames are pushed on demand, and aborting the
 * request signal errors the body the way fetch does.
 */
export interface LiveFeed {
  transport: Transport;
  requests: RecordedRequest[];
  push(text: string): void;
  end(): void;
  /** Times the body's underlying source was cancelled by the reader. */
  readonly cancels: number;
  /** Whether a reader still holds the body; false again once the client releases it. */
  readonly bodyLocked: boolean;
}

export function createLiveFeed(status = 200): LiveFeed {
  const encoder = new TextEncoder();
  const requests: RecordedRequest[] = [];
  let controller: ReadableStreamDefaultController<Uint8Array> | undefined;
  let cancels = 0;

  const stream = new ReadableStream<Uint8Array>({
    start(c) {
      controller = c;
    },
    cancel() {
      cancels++;
    }
  });

  const transport: Transport = {
    name: 'live-feed',
    async fetch(url, init) {
      requests.push({ url: new URL(url), headers: new Headers(init.headers) });

      const signal = init.signal;
      if (signal?.aborted) {
        throw new DOMException('This operation was aborted', 'AbortError');
      }
      signal?.addEventListener('abort', () => controller?.error(signal.reason), { once: true });

      return new Response(stream, {
        status,
        headers: { 'Content-Type': 'text/event-stream' }
      });
    }
  };

  return {
    transport,
    requests,
    push: (text) => controller?.enqueue(encoder.encode(text)),
    end: () => controller?.close(),
    get cancels() {
      return cancels;
    },
    get bodyLocked() {
      return stream.locked;
    }
  };
}

export function liveClient(feed: LiveFeed, options: Partial<FeedClientOptions> = {}): FeedClient {
  return createFeedClient({ baseUrl: BASE_URL, transport: feed.transport, ...options });
}

/** Resolves after pending microtasks and one macrotask have run. */
export function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
