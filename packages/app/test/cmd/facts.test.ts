import { Hono } from 'hono';
import { describe, expect, test } from 'vitest';
import { factsCommand, runFactsSnapshot, runFactsStream } from '../../src/cmd/facts';
import { appTransport, createHarness, createLiveFeed, until } from '../helpers/harness';

const WINDOW = {
  proId: 'p_1',
  cursorUpdatedUtc: '2025-01-01T00:00:00Z',
  cursorId: 7,
  items: [
    { id: 3, proId: 'p_1', factText: 'likes tea', status: 'ok' },
    { id: 4, proId: 'p_1', factText: 'owns a boat', status: 'stale', reviewStatus: 'not' }
  ]
};

function snapshotApp(seen: URL[] = []) {
  const app = new Hono();
  app.get('/api/facts/items/snapshot', (c) => {
    seen.push(new URL(c.req.url));
    return c.json(WINDOW);
  });
  return app;
}

describe('facts command definition', () => {
  test('registers under "facts"', () => {
    expect(factsCommand.command).toBe('facts');
  });
});

describe('facts snapshot', () => {
  test('prints the window header and one line per fact', async () => {
    const h = await createHarness(appTransport(snapshotApp()));

    const code = await runFactsSnapshot({ proId: 'p_1' }, h.deps);

    expect(code).toBe(0);
    expect(h.stdout.text()).toBe(
      [
        'snapshot p_1 cursor 2025-01-01T00:00:00Z#7 (2 items)',
        '  #3 [ok] likes tea',
        '  #4 [stale] owns a boat (review: not)',
        ''
      ].join('\n')
    );
    expect(h.stderr.text()).toBe('');
  });

  test('sends the pro id and a positive limit', async () => {
    const seen: URL[] = [];
    const h = await createHarness(appTransport(snapshotApp(seen)));

    await runFactsSnapshot({ proId: 'p_1', limit: 5 }, h.deps);

    expect(seen[0]?.search).toBe('?proId=p_1&limit=5');
  });

  test('takes the pro id from the environment', async () => {
    const seen: URL[] = [];
    const h = await createHarness(appTransport(snapshotApp(seen)), {
      FEEDWIRE_BASE_URL: 'http://feed.test',
      FEEDWIRE_PRO_ID: 'p_env'
    });

    const code = await runFactsSnapshot({}, h.deps);

    expect(code).toBe(0);
    expect(seen[0]?.searchParams.get('proId')).toBe('p_env');
  });

  test('--json prints the decoded window as one JSON line', async () => {
    const h = await createHarness(appTransport(snapshotApp()));

    await runFactsSnapshot({ proId: 'p_1', json: true }, h.deps);

    const lines = h.stdout.text().trimEnd().split('\n');
    expect(lines).toHaveLength(1);
    const printed: unknown = JSON.parse(lines[0] ?? '');
    expect(printed).toMatchObject({ cursorId: 7, items: [{ id: 3 }, { id: 4 }] });
  });

  test('fails with exit code 1 when no pro id is configured', async () => {
    const h = await createHarness(appTransport(snapshotApp()));

    const code = await runFactsSnapshot({}, h.deps);

    expect(code).toBe(1);
    expect(h.stderr.text()).toBe(
      'error: a pro id is required (--pro-id, FEEDWIRE_PRO_ID or proId in feedwire.jsonc)\n'
    );
  });

  test('fails with exit code 1 when no base URL is configured', async () => {
    const h = await createHarness(appTransport(snapshotApp()), {});

    const code = await runFactsSnapshot({ proId: 'p_1' }, h.deps);

    expect(code).toBe(1);
    expect(h.stderr.text()).toBe(
      'error: baseUrl is not configured (set FEEDWIRE_BASE_URL, --base-url or baseUrl in feedwire.jsonc)\n'
    );
  });

  test('--base-url overrides the environment', async () => {
    const seen: URL[] = [];
    const h = await createHarness(appTransport(snapshotApp(seen)), {});

    const code = await runFactsSnapshot({ proId: 'p_1', baseUrl: 'http://other.test' }, h.deps);

    expect(code).toBe(0);
    expect(seen[0]?.host).toBe('other.test');
  });

  test('reports API errors with their status', async () => {
    const app = new Hono();
    app.get('/api/facts/items/snapshot', (c) => c.json({ error: 'unknown pro' }, 404));
    const h = await createHarness(appTransport(app));

    const code = await runFactsSnapshot({ proId: 'p_9' }, h.deps);

    expect(code).toBe(1);
    expect(h.stderr.text()).toBe('error: API 404: unknown pro\n');
  });
});

describe('facts stream', () => {
  const event = `event: facts\ndata: ${JSON.stringify({ ...WINDOW, items: [WINDOW.items[0]] })}\n\n`;

  test('prints every window until the server closes the stream', async () => {
    const feed = createLiveFeed();
    const h = await createHarness(feed.transport);
    feed.push(event);
    feed.push(event);
    feed.end();

    const code = await runFactsStream({ proId: 'p_1' }, h.deps);

    expect(code).toBe(0);
    const block = 'facts p_1 cursor 2025-01-01T00:00:00Z#7 (1 item)\n  #3 [ok] likes tea\n';
    expect(h.stdout.text()).toBe(block + block);
    expect(feed.urls[0]?.search).toBe('?proId=p_1');
  });

  test('Ctrl+C closes the stream and exits cleanly', async () => {
    const feed = createLiveFeed();
    const h = await createHarness(feed.transport);
    feed.push(event);

    const running = runFactsStream({ proId: 'p_1' }, h.deps);
    await until(() => h.stdout.text().includes('#3'));
    h.signals.emit('SIGINT');

    await expect(running).resolves.toBe(0);
    expect(h.stderr.text()).toBe('interrupted, closing stream\n');
    expect(h.signals.listenerCount('SIGINT')).toBe(0);
  });

  test('exits 1 when the server rejects the stream', async () => {
    const app = new Hono();
    app.get('/api/facts/items/stream', (c) => c.text('maintenance', 503));
    const h = await createHarness(appTransport(app));

    const code = await runFactsStream({ proId: 'p_1' }, h.deps);

    expect(code).toBe(1);
    expect(h.stderr.text()).toBe('error: API 503: maintenance\n');
    expect(h.signals.listenerCount('SIGINT')).toBe(0);
  });
});
