import { createLogger } from '../logger';

const log = createLogger('sse');

const LF = 0x0a;
const CR = 0x0d;

/**
 * One Server-Sent Events frame, terminated on the wire by a blank line.
 *
 * SSE format:
 *   : comment (keep-alive)
 *   event: <type>
 *   data: <payload>   (may repeat; joined with '\n')
 *   id: <id>
 *   retry: <ms>
 *   <blank line> (frame boundary)
 */
export interface SSEFrame {
  /** Event type. Empty for the default (unnamed) event. */
  event: string;
  /** Concatenated `data` lines. Empty when the frame carried none. */
  data: string;
  id?: string;
  /** Raw `retry` value; never interpreted here. */
  retry?: string;
  /** Set only on comment-only frames, e.g. `: ping`. */
  comment?: string;
}

/**
 * Incremental SSE parser over a byte stream.
 *
 * Lines are split on raw bytes before UTF-8 decoding, so a multi-byte
 * character split across network chunks is decoded intact. Not safe for
 * concurrent `read()` calls.
 */
export class SSEFrameReader {
  /** Unscanned bytes of the latest chunk. */
  private buffer: Uint8Array = new Uint8Array(0);
  /** Earlier chunks of the current line, already scanned for LF. */
  private pending: Uint8Array[] = [];
  private ended = false;
  // Lines are decoded one by one; a U+FEFF at the start of a line is content
  private readonly decoder = new TextDecoder('utf-8', { ignoreBOM: true });

  constructor(private readonly source: ReadableStreamDefaultReader<Uint8Array>) {}

  /**
   * Read the next complete frame.
   * Resolves `undefined` at end of stream; a trailing frame without its
   * blank line is discarded. Rejects with the source's read error unchanged.
   */
  async read(): Promise<SSEFrame | undefined> {
    const frame: SSEFrame = { event: '', data: '' };
    let hasLines = false;
    let hasFields = false;
    let hasData = false;

    while (true) {
      const line = await this.readLine();
      if (line === undefined) {
        if (hasLines) log.debug('stream ended inside a frame; discarding partial frame');
        return undefined;
      }

      if (line === '') {
        // Runs of blank lines before any content are separators, not frames
        if (!hasLines) continue;
        break;
      }
      hasLines = true;

      if (line.startsWith(':')) {
        // Inline comments inside a frame with fields are dropped
        if (!hasFields && !hasData) {
          frame.comment = line.slice(1).trim();
        }
        continue;
      }

      const { field, value } = splitField(line);
      switch (field) {
        case 'event':
          frame.event = value;
          hasFields = true;
          break;
        case 'data':
          if (frame.data.length > 0) {
            frame.data += '\n';
          }
          frame.data += value;
          hasData = true;
          break;
        case 'id':
          frame.id = value;
          hasFields = true;
          break;
        case 'retry':
          frame.retry = value;
          hasFields = true;
          break;
        default:
          // Unknown fields are ignored
          break;
      }
    }

    if (frame.comment !== undefined && (frame.event !== '' || frame.data !== '')) {
      delete frame.comment;
    }
    return frame;
  }

  /**
   * Next line without its terminator (trailing CRs stripped), or
   * `undefined` once the source is exhausted.
   */
  private async readLine(): Promise<string | undefined> {
    while (true) {
      const index = this.buffer.indexOf(LF);
      if (index >= 0) {
        const bytes = joinBytes(this.pending, this.buffer.subarray(0, index));
        this.pending = [];
        this.buffer = this.buffer.subarray(index + 1);

        let end = bytes.length;
        while (end > 0 && bytes[end - 1] === CR) end--;
        return this.decoder.decode(bytes.subarray(0, end));
      }

      if (this.buffer.length > 0) {
        this.pending.push(this.buffer);
        this.buffer = new Uint8Array(0);
      }

      if (this.ended) return undefined;

      const { done, value } = await this.source.read();
      if (done) {
        this.ended = true;
        continue;
      }
      this.buffer = value;
    }
  }
}

function splitField(line: string): { field: string; value: string } {
  const index = line.indexOf(':');
  if (index < 0) {
    return { field: line, value: '' };
  }
  let value = line.slice(index + 1);
  if (value.startsWith(' ')) {
    value = value.slice(1);
  }
  return { field: line.slice(0, index), value };
}

function joinBytes(head: Uint8Array[], tail: Uint8Array): Uint8Array {
  if (head.length === 0) return tail;
  let length = tail.length;
  for (const chunk of head) length += chunk.length;

  const joined = new Uint8Array(length);
  let offset = 0;
  for (const chunk of [...head, tail]) {
    joined.set(chunk, offset);
    offset += chunk.length;
  }
  return joined;
}

/**
 * Parse an SSE stream from a ReadableStreamDefaultReader.
 * Yields frames as they complete on the wire, keep-alive comments included.
 */
export async function* parseSSEStream(
  reader: ReadableStreamDefaultReader<Uint8Array>
): AsyncGenerator<SSEFrame, void, unknown> {
  const frames = new SSEFrameReader(reader);
  while (true) {
    const frame = await frames.read();
    if (!frame) return;
    yield frame;
  }
}

/**
 * Keep-alive frame: a comment and nothing else.
 */
export function isCommentFrame(frame: SSEFrame): boolean {
  return !!frame.comment && frame.event === '' && frame.data === '';
}

/**
 * Cancel a body reader, closing the underlying connection, and release its
 * lock on the body. Call only when no read is pending.
 */
export async function releaseReader(reader: ReadableStreamDefaultReader<Uint8Array>): Promise<void> {
  try {
    await reader.cancel();
  } catch (error) {
    log.debug(`body release failed: ${error instanceof Error ? error.message : String(error)}`);
  } finally {
    reader.releaseLock();
  }
}
