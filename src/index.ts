export type { FetchResult, PriceRecord, RateLimitSignal, RawQuote } from "./domain.ts";
export {
  ClientConfig,
  decodeClientConfig,
  defaultClientConfig,
  loadClientConfig,
} from "./client-config.ts";
export {
  DataIntegrityError,
  HttpError,
  InvalidInput,
  NetworkError,
  NoDataAvailableError,
  RateLimitError,
  ValidationError,
} from "./price-errors.ts";
export type {
  ClientError,
  QuoteFailure,
  ValidationKind,
  ValidationReason,
} from "./price-errors.ts";
export { validate } from "./validator.ts";
export type { ValidationResult } from "./validator.ts";
export { classify, isFallbackPermitted, isRetryable } from "./error-classifier.ts";
export type { ErrorKind } from "./error-classifier.ts";
export { backoffSchedule, execute } from "./retry-controller.ts";
export type { RetryPolicy } from "./retry-controller.ts";
export { handleRateLimit, parseRetryAfter } from "./rate-limit.ts";
export type { RateLimitDecision } from "./rate-limit.ts";
export { makePriceCache, PriceCache, PriceCacheLive } from "./price-cache.ts";
export { QuoteTransport } from "./quote-transport.ts";
export { HttpQuoteTransportLive } from "./providers/http-quote-transport.ts";
export { interpretQuote, makePriceClient, PriceClient, PriceClientLive } from "./price-client.ts";
export { formatError, formatResult } from "./format.ts";
export { PriceClientHttpLive } from "./live.ts";
