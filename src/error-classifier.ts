// Error classification: the fallback policy table.
//
// Transient infrastructure trouble may be masked by a cached price.
// Anything suggesting the data itself is wrong must never be.

import type { InvalidInput, QuoteFailure } from "./price-errors.ts";

export type ErrorKind =
  | "Transient"
  | "Incomplete"
  | "DataIntegrity"
  | "RateLimited"
  | "InvalidInput";

export function classify(failure: QuoteFailure | InvalidInput): ErrorKind {
  switch (failure._tag) {
    case "NetworkError":
      return "Transient";
    case "HttpError":
      // 5xx and any other unexpected status: the source is unhealthy, the
      // data has not been seen.
      return failure.status === 429 ? "RateLimited" : "Transient";
    case "ValidationError":
      return failure.kind;
    case "InvalidInput":
      return "InvalidInput";
  }
}

/** Kinds that may be substituted with a cached value once retries run out. */
export function isFallbackPermitted(kind: ErrorKind): boolean {
  switch (kind) {
    case "Transient":
    case "Incomplete":
      return true;
    case "DataIntegrity":
    case "RateLimited":
    case "InvalidInput":
      return false;
  }
}

/** Kinds worth another attempt after backoff. Same set as fallback. */
export function isRetryable(kind: ErrorKind): boolean {
  return isFallbackPermitted(kind);
}
