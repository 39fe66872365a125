// Scripted QuoteTransport: in-process stand-in for tests and development.
//
// Each symbol gets a list of responses played in order; the last one repeats.
// Calls are counted per symbol so tests can assert on network traffic.

import { type Context, Effect, HashMap, Option, Ref } from "effect";
import type { RawQuote } from "../domain.ts";
import { NetworkError } from "../price-errors.ts";
import { QuoteTransport } from "../quote-transport.ts";

export type StubResponse = Effect.Effect<RawQuote, NetworkError>;

// --- Response helpers ---

export const respond = (status: number, body: unknown = ""): StubResponse =>
  Effect.succeed({ status, body });

export const quote = (body: unknown): StubResponse => respond(200, body);

export const rateLimited = (retryAfterSeconds?: number): StubResponse =>
  Effect.succeed({ status: 429, body: "", rateLimit: { retryAfterSeconds } });

export const networkFailure = (message = "connection reset"): StubResponse =>
  Effect.fail(new NetworkError({ message }));

// --- Stub ---

export interface QuoteTransportStub {
  readonly transport: Context.Tag.Service<QuoteTransport>;
  readonly calls: (symbol: string) => Effect.Effect<number>;
  readonly totalCalls: Effect.Effect<number>;
}

export function makeQuoteTransportStub(
  script: Readonly<Record<string, ReadonlyArray<StubResponse>>>,
): Effect.Effect<QuoteTransportStub> {
  return Effect.gen(function* () {
    const counts = yield* Ref.make(HashMap.empty<string, number>());

    const calls = (symbol: string) =>
      Ref.get(counts).pipe(
        Effect.map((m) => Option.getOrElse(HashMap.get(m, symbol), () => 0)),
      );

    const requestQuote = (symbol: string): StubResponse =>
      Ref.modify(counts, (m) => {
        const index = Option.getOrElse(HashMap.get(m, symbol), () => 0);
        return [index, HashMap.set(m, symbol, index + 1)] as const;
      }).pipe(
        Effect.flatMap((index) => {
          const responses = script[symbol] ?? [];
          const response = responses[Math.min(index, responses.length - 1)];
          return response ?? respond(404);
        }),
      );

    return {
      transport: QuoteTransport.of({ requestQuote }),
      calls,
      totalCalls: Ref.get(counts).pipe(
        Effect.map((m) => HashMap.reduce(m, 0, (sum, n) => sum + n)),
      ),
    };
  });
}
