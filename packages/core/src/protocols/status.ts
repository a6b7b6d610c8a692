import { z } from 'zod';
import { ApiError } from '../errors';
import { createLogger } from '../logger';
import { releaseReader } from './sse';

const log = createLogger('status');

/** Upper bound on error body bytes read before streaming is abandoned. */
export const ERROR_BODY_LIMIT_BYTES = 64 * 1024;

const ErrorBodySchema = z.object({ error: z.string() });

export interface ClassifyOptions {
  /** Maximum number of body bytes to read. */
  limitBytes?: number;
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Read at most `limitBytes` of a response body, then release it.
 * A read failure part way keeps whatever was received.
 */
export async function readBodyPrefix(response: Response, limitBytes: number): Promise<Uint8Array> {
  if (!response.body) return new Uint8Array();

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;

  try {
    while (total < limitBytes) {
      const { done, value } = await reader.read();
      if (done) break;
      const take = Math.min(value.length, limitBytes - total);
      chunks.push(take === value.length ? value : value.subarray(0, take));
      total += take;
    }
  } catch (error) {
    log.debug(
      `error body read stopped after ${total} bytes: ${error instanceof Error ? error.message : String(error)}`
    );
  } finally {
    await releaseReader(reader);
  }

  const body = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    body.set(chunk, offset);
    offset += chunk.length;
  }
  return body;
}

/**
 * Pick the message for a failed response:
 * JSON `error` field, then body text, then the status line.
 */
export function extractErrorMessage(body: Uint8Array, statusLine: string): string {
  const text = new TextDecoder().decode(body);

  const fromJson = parseErrorField(text);
  if (fromJson) return fromJson;

  const trimmed = text.trim();
  if (trimmed) return trimmed;

  return statusLine;
}

function parseErrorField(text: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return '';
  }
  const result = ErrorBodySchema.safeParse(parsed);
  return result.success ? result.data.error.trim() : '';
}

export function statusLine(response: Response): string {
  return `${response.status} ${response.statusText}`.trim();
}

/**
 * Convert a non-success response into an ApiError carrying the status,
 * the extracted message and the raw body bytes.
 */
export async function classifyErrorResponse(
  response: Response,
  options: ClassifyOptions = {}
): Promise<ApiError> {
  const body = await readBodyPrefix(response, options.limitBytes ?? ERROR_BODY_LIMIT_BYTES);
  return new ApiError(response.status, extractErrorMessage(body, statusLine(response)), body);
}
