// HTTP quote transport: live implementation of QuoteTransport.

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Config, Duration, Effect, Layer } from "effect";
import { NetworkError } from "../price-errors.ts";
import { QuoteTransport } from "../quote-transport.ts";
import { parseRetryAfter } from "../rate-limit.ts";

export const HttpQuoteTransportLive = Layer.effect(
  QuoteTransport,
  Effect.gen(function* () {
    // No filterStatusOk: status handling is the client's job, and a 429
    // must reach it together with its Retry-After header.
    const client = (yield* HttpClient.HttpClient).pipe(
      HttpClient.mapRequest(HttpClientRequest.acceptJson),
    );
    const url = yield* Config.string("QUOTE_API_URL").pipe(
      Config.withDefault("https://api.hyperliquid.xyz/info"),
    );
    const timeout = yield* Config.duration("QUOTE_API_TIMEOUT").pipe(
      Config.withDefault(Duration.seconds(10)),
    );

    return QuoteTransport.of({
      requestQuote: (symbol: string) =>
        Effect.gen(function* () {
          const response = yield* client.get(url, {
            urlParams: { type: "metaAndAssetCtxs" },
          });
          const body = yield* response.text;
          return {
            status: response.status,
            body,
            rateLimit:
              response.status === 429
                ? { retryAfterSeconds: parseRetryAfter(response.headers["retry-after"]) }
                : undefined,
          };
        }).pipe(
          Effect.timeoutFail({
            duration: timeout,
            onTimeout: () =>
              new NetworkError({ message: `${symbol}: request timed out` }),
          }),
          Effect.catchTags({
            RequestError: (e) =>
              Effect.fail(new NetworkError({ message: e.message })),
            ResponseError: (e) =>
              Effect.fail(
                new NetworkError({ message: `Reading response failed: ${e.message}` }),
              ),
          }),
        ),
    });
  }),
);
