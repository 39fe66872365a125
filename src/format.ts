// Pure formatting functions: no I/O. Used for alerting and operator output.

import type { FetchResult } from "./domain.ts";
import type { ClientError, RateLimitError } from "./price-errors.ts";

// --- ANSI escape codes ---

const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// --- Result formatting ---

export function formatResult(result: FetchResult): string {
  const observed = new Date(result.observedAt).toISOString();
  const lines = [
    "",
    `${BOLD}  ${result.symbol}  ${result.price}${RESET}`,
    result.degraded
      ? `  ${YELLOW}⚠ cached price from ${observed}${RESET}`
      : `  ${DIM}${observed}${RESET}`,
    "",
  ];

  return lines.join("\n");
}

// --- Error formatting ---

export function formatError(error: ClientError): string {
  const friendly = classifyError(error);
  return [
    "",
    `${RED}${BOLD}  ✗ ${friendly.title}${RESET}`,
    `  ${DIM}${friendly.hint}${RESET}`,
    "",
  ].join("\n");
}

interface ClassifiedError {
  readonly title: string;
  readonly hint: string;
}

function classifyError(error: ClientError): ClassifiedError {
  switch (error._tag) {
    case "InvalidInput":
      return {
        title: "Invalid input",
        hint: error.message,
      };
    case "DataIntegrityError":
      return {
        title: `Bad price data for ${error.symbol}`,
        hint: `${error.message}. Halt trading on this symbol.`,
      };
    case "NoDataAvailableError":
      return {
        title: `No price for ${error.symbol}`,
        hint: `Gave up after ${error.attempts} attempt${error.attempts === 1 ? "" : "s"} and nothing was cached.`,
      };
    case "RateLimitError":
      return classifyRateLimit(error);
  }
}

function classifyRateLimit(error: RateLimitError): ClassifiedError {
  if (error.retryAfterSeconds !== undefined) {
    return {
      title: "Rate limited",
      hint: `Retry after ${error.retryAfterSeconds}s.`,
    };
  }
  return {
    title: "Rate limited",
    hint: error.waited
      ? "Still rate limited after waiting once."
      : "Too many requests. Wait a moment and try again.",
  };
}
