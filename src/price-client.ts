// Price client: fetch, validate, retry, fall back to cache.
//
//   Validating ──► Success
//        │
//        ├──► Retrying ──► Validating (next attempt) / CacheFallback / Failed
//        ├──► RateLimited ──► Validating (one attempt after waiting) / Failed
//        └──► Failed
//
// Only Transient and Incomplete failures may end in CacheFallback.

import {
  Clock,
  Console,
  Context,
  Duration,
  Effect,
  Either,
  Layer,
  Option,
  Ref,
} from "effect";
import { type ClientConfig, decodeClientConfig } from "./client-config.ts";
import type { FetchResult, PriceRecord, RawQuote } from "./domain.ts";
import { classify, isFallbackPermitted, isRetryable } from "./error-classifier.ts";
import {
  type ClientError,
  DataIntegrityError,
  HttpError,
  InvalidInput,
  NoDataAvailableError,
  type QuoteFailure,
  RateLimitError,
  ValidationError,
} from "./price-errors.ts";
import { PriceCache } from "./price-cache.ts";
import { QuoteTransport } from "./quote-transport.ts";
import { handleRateLimit } from "./rate-limit.ts";
import { execute } from "./retry-controller.ts";
import { validate } from "./validator.ts";

// --- Service ---

export class PriceClient extends Context.Tag("PriceClient")<
  PriceClient,
  {
    readonly fetch: (
      symbol: string,
      config: ClientConfig,
    ) => Effect.Effect<FetchResult, ClientError>;
  }
>() {}

// --- Single attempt ---

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/** Turn a raw transport answer into a validated record, or the failure
 *  that describes why it is not one. */
export function interpretQuote(
  raw: RawQuote,
  symbol: string,
): Effect.Effect<PriceRecord, HttpError | ValidationError> {
  if (!isSuccessStatus(raw.status)) {
    return Effect.fail(
      new HttpError({
        status: raw.status,
        retryAfterSeconds: raw.rateLimit?.retryAfterSeconds,
      }),
    );
  }

  const result = validate(raw.body, symbol);
  switch (result._tag) {
    case "Invalid":
      return Effect.fail(
        new ValidationError({
          kind: result.kind,
          reason: result.reason,
          message: result.message,
        }),
      );
    case "Valid":
      return Clock.currentTimeMillis.pipe(
        Effect.map((observedAt) => ({
          symbol: result.symbol,
          price: result.price,
          observedAt,
        })),
      );
  }
}

function retryAfterOf(failure: QuoteFailure): number | undefined {
  return failure._tag === "HttpError" ? failure.retryAfterSeconds : undefined;
}

function describeFailure(failure: QuoteFailure): string {
  switch (failure._tag) {
    case "NetworkError":
    case "ValidationError":
      return failure.message;
    case "HttpError":
      return `HTTP ${failure.status}`;
  }
}

// --- Client ---

export const makePriceClient = Effect.gen(function* () {
  const transport = yield* QuoteTransport;
  const cache = yield* PriceCache;

  const fetch = (
    symbol: string,
    config: ClientConfig,
  ): Effect.Effect<FetchResult, ClientError> =>
    Effect.gen(function* () {
      if (typeof symbol !== "string" || symbol.trim().length === 0) {
        return yield* new InvalidInput({
          symbol: String(symbol),
          message: `Invalid symbol: ${JSON.stringify(symbol)}`,
        });
      }

      const decoded = decodeClientConfig(config);
      if (Either.isLeft(decoded)) {
        return yield* new InvalidInput({
          symbol,
          message: `Invalid client config: ${decoded.left.message}`,
        });
      }
      const cfg = decoded.right;

      const attempts = yield* Ref.make(0);
      const attempt = Ref.update(attempts, (n) => n + 1).pipe(
        Effect.zipRight(transport.requestQuote(symbol)),
        Effect.flatMap((raw) => interpretQuote(raw, symbol)),
      );

      const rateLimitError = (retryAfterSeconds: number | undefined, waited: boolean) =>
        Effect.flatMap(cache.get(symbol), (cached) =>
          Effect.fail(
            new RateLimitError({
              symbol,
              retryAfterSeconds,
              waited,
              hadCachedValue: Option.isSome(cached),
              message: waited
                ? `Still rate limited for ${symbol} after waiting`
                : `Rate limited for ${symbol}` +
                  (retryAfterSeconds === undefined ? "" : `, retry after ${retryAfterSeconds}s`),
            }),
          ),
        );

      // RateLimited: fail fast, or wait once and make exactly one more attempt.
      const onRateLimited = (
        failure: QuoteFailure,
      ): Effect.Effect<PriceRecord, QuoteFailure | RateLimitError> => {
        const decision = handleRateLimit(
          { retryAfterSeconds: retryAfterOf(failure) },
          cfg,
        );
        switch (decision._tag) {
          case "Fail":
            return Console.warn(`[price-client] ${symbol}: rate limited, failing fast`).pipe(
              Effect.zipRight(rateLimitError(decision.retryAfterSeconds, false)),
            );
          case "Wait":
            return Console.warn(
              `[price-client] ${symbol}: rate limited, waiting ${decision.seconds}s`,
            ).pipe(
              Effect.zipRight(Effect.sleep(Duration.seconds(decision.seconds))),
              Effect.zipRight(attempt),
            );
        }
      };

      // Anything left over once retries and the rate-limit wait are spent.
      const resolve = (failure: QuoteFailure) =>
        Effect.gen(function* () {
          const kind = classify(failure);
          const cached = yield* cache.get(symbol);

          if (failure._tag === "ValidationError" && !isFallbackPermitted(failure.kind)) {
            yield* Console.error(`[price-client] ${symbol}: ${failure.message}`);
            return yield* new DataIntegrityError({
              symbol,
              reason: failure.reason,
              message: failure.message,
              hadCachedValue: Option.isSome(cached),
            });
          }

          if (kind === "RateLimited") {
            return yield* rateLimitError(retryAfterOf(failure), true);
          }

          if (Option.isSome(cached)) {
            yield* Console.warn(
              `[price-client] ${symbol}: serving cached price ${cached.value.price} (${describeFailure(failure)})`,
            );
            return { ...cached.value, degraded: true };
          }

          return yield* new NoDataAvailableError({
            symbol,
            attempts: yield* Ref.get(attempts),
            lastFailure: failure,
            message: `No data available for ${symbol}: ${describeFailure(failure)}`,
          });
        });

      return yield* execute(attempt, {
        maxRetries: cfg.maxRetries,
        backoffBase: Duration.seconds(cfg.backoffBaseSeconds),
        isRetryable: (e) => isRetryable(classify(e)),
        label: `retry:${symbol}`,
      }).pipe(
        Effect.catchIf((e) => classify(e) === "RateLimited", onRateLimited),
        Effect.tap((record) => cache.put(record)),
        Effect.tap((record) =>
          Console.debug(`[price-client] ${symbol}: ${record.price}`),
        ),
        Effect.map((record): FetchResult => ({ ...record, degraded: false })),
        Effect.catchTags({
          NetworkError: resolve,
          HttpError: resolve,
          ValidationError: resolve,
        }),
      );
    });

  return PriceClient.of({ fetch });
});

export const PriceClientLive = Layer.effect(PriceClient, makePriceClient);
