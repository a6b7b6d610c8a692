import { EventEmitter } from 'node:events';
import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { createHandlerTransport, type Transport } from '@feedwire/core';
import { createFeedClientFromConfig } from '@feedwire/sdk';
import type { FeedCommandDeps } from '../../src/cmd/common';

export const BASE_URL = 'http://feed.test';

export interface FetchApp {
  fetch(request: Request): Response | Promise<Response>;
}

/** Transport that serves requests with `app`, e.g. a hono app. */
export function appTransport(app: FetchApp): Transport {
  return createHandlerTransport((request) => app.fetch(request));
}

export interface MemoryOutput {
  write(text: string): boolean;
  text(): string;
}

export function memoryOutput(): MemoryOutput {
  let buffer = '';
  return {
    write(text) {
      buffer += text;
      return true;
    },
    text: () => buffer
  };
}

export interface Harness {
  deps: FeedCommandDeps;
  stdout: MemoryOutput;
  stderr: MemoryOutput;
  signals: EventEmitter;
}

/**
 * Command dependencies wired to an in-process server, with captured output
 * and a fake process for SIGINT. No config file is found from `cwd`.
 */
export async function createHarness(
  transport: Transport,
  env: Record<string, string> = { FEEDWIRE_BASE_URL: BASE_URL }
): Promise<Harness> {
  const cwd = await mkdtemp(path.join(tmpdir(), 'feedwire-cli-'));
  const stdout = memoryOutput();
  const stderr = memoryOutput();
  const signals = new EventEmitter();

  return {
    deps: {
      createClient: (config) => createFeedClientFromConfig(config, transport),
      env,
      cwd,
      stdout,
      stderr,
      signalTarget: signals,
      color: false
    },
    stdout,
    stderr,
    signals
  };
}

/** SSE feed pushed by the test; aborting the request errors the body. */
export interface LiveFeed {
  transport: Transport;
  urls: URL[];
  push(text: string): void;
  end(): void;
}

export function createLiveFeed(): LiveFeed {
  const encoder = new TextEncoder();
  const urls: URL[] = [];
  let controller: ReadableStreamDefaultController<Uint8Array> | undefined;

  const stream = new ReadableStream<Uint8Array>({
    start(c) {
      controller = c;
    }
  });

  const transport: Transport = {
    name: 'live-feed',
    async fetch(url, init) {
      urls.push(new URL(url));
      const signal = init.signal;
      if (signal?.aborted) {
        throw new DOMException('This operation was aborted', 'AbortError');
      }
      signal?.addEventListener('abort', () => controller?.error(signal.reason), { once: true });
      return new Response(stream, { headers: { 'Content-Type': 'text/event-stream' } });
    }
  };

  return {
    transport,
    urls,
    push: (text) => controller?.enqueue(encoder.encode(text)),
    end: () => controller?.close()
  };
}

/** Wait (a bounded number of macrotasks) until `predicate` holds. */
export async function until(predicate: () => boolean): Promise<void> {
  for (let i = 0; i < 100; i++) {
    if (predicate()) return;
    await new Promise((resolve) => setTimeout(resolve, 0));
  }
  throw new Error('condition not met');
}
