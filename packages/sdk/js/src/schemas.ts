import { z } from 'zod';

// ============================================================================
// Lenient field helpers
// ============================================================================
//
// The service omits or nulls fields freely. Missing scalars decode to their
// zero value, missing lists to [], and a present value of the wrong type is
// still a decode failure.

const text = () =>
  z
    .string()
    .nullish()
    .transform((value) => value ?? '');

const optionalText = () =>
  z
    .string()
    .nullish()
    .transform((value) => value ?? null);

// Ids are 64-bit on the server. JSON numbers above 2^53 - 1 lose precision
// when parsed, so they are rejected rather than echoed back wrong as a cursor.
const UNSAFE_INTEGER = 'integer is outside the exactly representable range (2^53 - 1)';

const exactInteger = () =>
  z
    .number()
    .int()
    .min(Number.MIN_SAFE_INTEGER, { message: UNSAFE_INTEGER })
    .max(Number.MAX_SAFE_INTEGER, { message: UNSAFE_INTEGER });

const integer = () =>
  exactInteger()
    .nullish()
    .transform((value) => value ?? 0);

const optionalInteger = () =>
  exactInteger()
    .nullish()
    .transform((value) => value ?? null);

const decimal = () =>
  z
    .number()
    .nullish()
    .transform((value) => value ?? 0);

const flag = () =>
  z
    .boolean()
    .nullish()
    .transform((value) => value ?? false);

function list<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(item)
    .nullish()
    .transform((value): z.output<T>[] => value ?? []);
}

// ============================================================================
// Facts
// ============================================================================

export const FactItemSchema = z.object({
  id: integer(),
  proId: text(),
  factText: text(),
  factHash: text(),
  /** "ok" | "stale" | "false" */
  status: text(),
  falseReason: optionalText(),
  createdUtc: text(),
  lastSeenUtc: text(),
  updatedUtc: text(),
  /** "ok" | "not" | null */
  reviewStatus: optionalText(),
  reviewUpdatedUtc: optionalText(),
  isWritable: flag()
});

/**
 * A window of facts plus the cursor after it. Returned by the snapshot and
 * updates endpoints and carried by every `facts` stream event.
 */
export const FactsWindowSchema = z.object({
  proId: text(),
  cursorUpdatedUtc: text(),
  cursorId: integer(),
  items: list(FactItemSchema)
});

export const PatchReviewStatusResponseSchema = z.object({
  code: text(),
  reason: optionalText()
});

// ============================================================================
// Matches
// ============================================================================

export const MATCHING_DIRECTIONS = ['Offer', 'Seek'] as const;

/**
 * Offer: "who needs me?"; Seek: "who do I need?".
 * Sent verbatim; the server owns the set of accepted values.
 */
export type MatchingDirection = (typeof MATCHING_DIRECTIONS)[number];

export const MatchItemSchema = z.object({
  id: integer(),
  proId: text(),
  targetProId: text(),
  direction: text(),
  score: decimal(),
  rationale: text(),
  modelId: text(),
  createdUtc: text(),
  updatedUtc: text()
});

export const MatchesSnapshotSchema = z.object({
  proId: text(),
  direction: text(),
  cursorUpdatedUtc: text(),
  cursorId: integer(),
  items: list(MatchItemSchema)
});

/** Updates response and `matches` stream payload; `direction` is null when both are included. */
export const MatchesWindowSchema = z.object({
  proId: text(),
  direction: optionalText(),
  cursorUpdatedUtc: text(),
  cursorId: integer(),
  items: list(MatchItemSchema)
});

// ============================================================================
// Wallet
// ============================================================================

export const CreateProWalletResponseSchema = z.object({
  proId: text(),
  token: text(),
  /** 24 space-separated words. */
  mnemonic24: text(),
  createdUtc: text()
});

export const VerifyProWalletResponseSchema = z.object({
  proId: text(),
  valid: flag()
});

// ============================================================================
// Speech
// ============================================================================

export const SpeechUploadResponseSchema = z.object({
  ok: flag(),
  existed: flag(),
  id: optionalInteger(),
  proId: text(),
  sessionId: text(),
  chunkIndex: integer(),
  sampleRate: optionalInteger(),
  storedPath: text(),
  wav16kMonoPath: optionalText(),
  transcript: text()
});

export const SpeechStatusResponseSchema = z.object({
  ok: flag(),
  found: flag(),
  id: optionalInteger(),
  proId: text(),
  sessionId: text(),
  chunkIndex: integer(),
  /** "pending" | "ok" | "error" */
  asrStatus: text(),
  asrError: optionalText(),
  transcript: text(),
  durationSec: z
    .number()
    .nullish()
    .transform((value) => value ?? null),
  audioSha256: optionalText()
});

// ============================================================================
// Types
// ============================================================================

export type FactItem = z.output<typeof FactItemSchema>;
export type FactsWindow = z.output<typeof FactsWindowSchema>;
export type PatchReviewStatusResponse = z.output<typeof PatchReviewStatusResponseSchema>;
export type MatchItem = z.output<typeof MatchItemSchema>;
export type MatchesSnapshot = z.output<typeof MatchesSnapshotSchema>;
export type MatchesWindow = z.output<typeof MatchesWindowSchema>;
export type CreateProWalletResponse = z.output<typeof CreateProWalletResponseSchema>;
export type VerifyProWalletResponse = z.output<typeof VerifyProWalletResponseSchema>;
export type SpeechUploadResponse = z.output<typeof SpeechUploadResponseSchema>;
export type SpeechStatusResponse = z.output<typeof SpeechStatusResponseSchema>;

/** Body of POST /api/speech/text, kept as the server sent it. */
export interface UploadSpeechTextResponse {
  raw: unknown;
}

/** Anything carrying a feed cursor: snapshots, updates and stream payloads. */
export interface CursorWindow {
  cursorUpdatedUtc: string;
  cursorId: number;
}
