// Price client errors: attempt-level failures and the caller-facing union.

import { Data } from "effect";

// --- Attempt failures ---
// Produced by a single transport call + validation. Never leave the client
// as-is: the orchestrator resolves them into a ClientError or a cached value.

export class NetworkError extends Data.TaggedError("NetworkError")<{
  readonly message: string;
}> {}

export class HttpError extends Data.TaggedError("HttpError")<{
  readonly status: number;
  readonly retryAfterSeconds?: number;
}> {}

export type ValidationKind = "DataIntegrity" | "Incomplete";

export type ValidationReason =
  | "MalformedPayload"
  | "MissingPrice"
  | "NullPrice"
  | "NonNumericPrice"
  | "NonPositivePrice"
  | "SymbolMismatch";

export class ValidationError extends Data.TaggedError("ValidationError")<{
  readonly kind: ValidationKind;
  readonly reason: ValidationReason;
  readonly message: string;
}> {}

export type QuoteFailure = NetworkError | HttpError | ValidationError;

// --- Client errors ---

/** Empty symbol or malformed ClientConfig. Raised before any network call. */
export class InvalidInput extends Data.TaggedError("InvalidInput")<{
  readonly symbol: string;
  readonly message: string;
}> {}

/** The payload itself is wrong. Never retried, never masked by cache. */
export class DataIntegrityError extends Data.TaggedError("DataIntegrityError")<{
  readonly symbol: string;
  readonly reason: ValidationReason;
  readonly message: string;
  readonly hadCachedValue: boolean;
}> {}

/** Transient failures exhausted the retry budget and nothing was cached. */
export class NoDataAvailableError extends Data.TaggedError("NoDataAvailableError")<{
  readonly symbol: string;
  readonly attempts: number;
  readonly lastFailure: QuoteFailure;
  readonly message: string;
}> {}

export class RateLimitError extends Data.TaggedError("RateLimitError")<{
  readonly symbol: string;
  readonly retryAfterSeconds?: number;
  readonly waited: boolean;
  readonly hadCachedValue: boolean;
  readonly message: string;
}> {}

export type ClientError =
  | InvalidInput
  | DataIntegrityError
  | NoDataAvailableError
  | RateLimitError;
