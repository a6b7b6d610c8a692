const encoder = new TextEncoder();

/**
 * Readable byte stream that hands out one chunk per pull, then closes.
 */
export function createStreamFromChunks(chunks: Array<string | Uint8Array>): ReadableStream<Uint8Array> {
  let index = 0;

  return new ReadableStream<Uint8Array>({
    pull(controller) {
      const chunk = chunks[index];
      if (chunk === undefined) {
        controller.close();
        return;
      }
      controller.enqueue(typeof chunk === 'string' ? encoder.encode(chunk) : chunk);
      index++;
    }
  });
}

/** Split text into single-byte chunks, cutting through multi-byte characters. */
export function byteChunks(text: string): Uint8Array[] {
  return Array.from(encoder.encode(text), (byte) => Uint8Array.of(byte));
}

export async function collect<T>(gen: AsyncIterable<T>): Promise<T[]> {
  const results: T[] = [];
  for await (const item of gen) {
    results.push(item);
  }
  return results;
}
