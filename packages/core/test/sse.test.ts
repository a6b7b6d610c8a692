import { describe, expect, test } from 'vitest';
import {
  isCommentFrame,
  parseSSEStream,
  releaseReader,
  SSEFrameReader
} from '../src/protocols/sse';
import { byteChunks, collect, createStreamFromChunks } from './utils/streams';

function framesOf(...chunks: Array<string | Uint8Array>) {
  return collect(parseSSEStream(createStreamFromChunks(chunks).getReader()));
}

describe('SSEFrameReader', () => {
  test('parses a named event', async () => {
    const frames = await framesOf('event: facts\ndata: {"a":1}\n\n');
    expect(frames).toEqual([{ event: 'facts', data: '{"a":1}' }]);
  });

  test('joins multiple data lines with a newline', async () => {
    const frames = await framesOf('data: first\ndata: second\n\n');
    expect(frames).toEqual([{ event: '', data: 'first\nsecond' }]);
  });

  test('does not start data with a separator after an empty data line', async () => {
    const frames = await framesOf('data:\ndata: x\n\n');
    expect(frames).toEqual([{ event: '', data: 'x' }]);
  });

  test('strips CR from CRLF line endings', async () => {
    const frames = await framesOf('event: facts\r\ndata: 1\r\n\r\n');
    expect(frames).toEqual([{ event: 'facts', data: '1' }]);
  });

  test('ignores runs of blank lines between frames', async () => {
    const frames = await framesOf('\n\n\ndata: a\n\n\n\ndata: b\n\n');
    expect(frames.map((f) => f.data)).toEqual(['a', 'b']);
  });

  test('surfaces a comment-only frame as a keep-alive', async () => {
    const frames = await framesOf(': ping\n\n');
    expect(frames).toEqual([{ event: '', data: '', comment: 'ping' }]);
    expect(frames[0] && isCommentFrame(frames[0])).toBe(true);
  });

  test('drops comments inside a frame with fields', async () => {
    const frames = await framesOf('event: facts\n: note\ndata: 1\n\n');
    expect(frames).toEqual([{ event: 'facts', data: '1' }]);
  });

  test('drops a leading comment once the frame carries an event', async () => {
    const frames = await framesOf(': hello\nevent: facts\ndata: 1\n\n');
    expect(frames).toEqual([{ event: 'facts', data: '1' }]);
  });

  test('records id and retry verbatim, last value wins', async () => {
    const frames = await framesOf('id: 1\nid: 7\nretry: 1000\ndata: x\n\n');
    expect(frames).toEqual([{ event: '', data: 'x', id: '7', retry: '1000' }]);
  });

  test('strips at most one leading space from a value', async () => {
    const frames = await framesOf('data:x\n\ndata:  y\n\n');
    expect(frames.map((f) => f.data)).toEqual(['x', ' y']);
  });

  test('treats a line without a colon as a field with an empty value', async () => {
    const frames = await framesOf('event\ndata\n\n');
    expect(frames).toEqual([{ event: '', data: '' }]);
  });

  test('ignores unknown fields', async () => {
    const frames = await framesOf('foo: bar\ndata: x\n\n');
    expect(frames).toEqual([{ event: '', data: 'x' }]);
  });

  test('discards a trailing frame without its blank line', async () => {
    expect(await framesOf('data: a\n\ndata: b\n')).toEqual([{ event: '', data: 'a' }]);
    expect(await framesOf('data: a\n\ndata: b')).toEqual([{ event: '', data: 'a' }]);
  });

  test('parses identically when split into single bytes', async () => {
    const wire = 'event: matches\ndata: {"text":"héllo ✓"}\n\n';
    const frames = await framesOf(...byteChunks(wire));
    expect(frames).toEqual([{ event: 'matches', data: '{"text":"héllo ✓"}' }]);
  });

  test('joins a long line that arrives in many small chunks', async () => {
    const payload = 'x'.repeat(4096);
    const wire = `data: ${payload}\r\n\r\n`;
    const chunks: string[] = [];
    for (let i = 0; i < wire.length; i += 7) {
      chunks.push(wire.slice(i, i + 7));
    }

    const frames = await framesOf(...chunks);
    expect(frames).toEqual([{ event: '', data: payload }]);
  });

  test('keeps a byte order mark at the start of a line as part of the field name', async () => {
    const frames = await framesOf('data: a\n\n\uFEFFevent: other\ndata: b\n\n');
    expect(frames).toEqual([
      { event: '', data: 'a' },
      { event: '', data: 'b' }
    ]);
  });

  test('keeps returning undefined after end of stream', async () => {
    const reader = new SSEFrameReader(createStreamFromChunks(['data: a\n\n']).getReader());
    expect(await reader.read()).toEqual({ event: '', data: 'a' });
    expect(await reader.read()).toBeUndefined();
    expect(await reader.read()).toBeUndefined();
  });

  test('propagates a source read error unchanged', async () => {
    const failure = new Error('connection reset');
    let pulls = 0;
    const stream = new ReadableStream<Uint8Array>({
      pull(controller) {
        pulls++;
        if (pulls === 1) {
          controller.enqueue(new TextEncoder().encode('data: partial\n'));
        } else {
          controller.error(failure);
        }
      }
    });

    const reader = new SSEFrameReader(stream.getReader());
    await expect(reader.read()).rejects.toBe(failure);
  });
});

describe('releaseReader', () => {
  test('cancels the underlying source', async () => {
    let cancels = 0;
    const stream = new ReadableStream<Uint8Array>({
      pull() {},
      cancel() {
        cancels++;
      }
    });

    await releaseReader(stream.getReader());
    expect(cancels).toBe(1);
    expect(stream.locked).toBe(false);
  });

  test('does not throw for an errored stream', async () => {
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.error(new Error('gone'));
      }
    });

    await expect(releaseReader(stream.getReader())).resolves.toBeUndefined();
    expect(stream.locked).toBe(false);
  });
});
