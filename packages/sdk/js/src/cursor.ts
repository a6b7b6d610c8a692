import { ValidationError } from '@feedwire/core';
import type { CursorWindow } from './schemas';

/**
 * Position in a feed, ordered by (updatedUtc, id).
 * Obtain one from a snapshot or updates response, or from any stream payload.
 */
export interface StreamCursor {
  updatedUtc: Date;
  /**
   * 64-bit on the server; only ids up to `Number.MAX_SAFE_INTEGER` are
   * exact here, and payloads carrying larger ids fail to decode.
   */
  id: number;
}

/** RFC 3339 in UTC with second precision, e.g. `2025-01-01T00:00:00Z`. */
export function formatCursorTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function validateCursor(cursor: StreamCursor, operation: string): void {
  if (!cursor) {
    throw new ValidationError(`${operation}: cursor is required`);
  }
  if (!(cursor.updatedUtc instanceof Date) || Number.isNaN(cursor.updatedUtc.getTime())) {
    throw new ValidationError(`${operation}: cursor.updatedUtc must be a valid date`);
  }
  if (!Number.isSafeInteger(cursor.id) || cursor.id < 0) {
    throw new ValidationError(`${operation}: cursor.id must be a non-negative integer`);
  }
}

/** Cursor positioned after the given window. */
export function cursorOf(window: CursorWindow): StreamCursor {
  const updatedUtc = new Date(window.cursorUpdatedUtc);
  if (Number.isNaN(updatedUtc.getTime())) {
    throw new ValidationError(`invalid cursor timestamp '${window.cursorUpdatedUtc}'`);
  }
  return { updatedUtc, id: window.cursorId };
}

export function compareCursors(a: StreamCursor, b: StreamCursor): number {
  const byTime = a.updatedUtc.getTime() - b.updatedUtc.getTime();
  if (byTime !== 0) return byTime < 0 ? -1 : 1;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}
