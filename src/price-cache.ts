// Price cache: per-symbol last-known-good store.
//
// One Ref holds the whole map, so every get/put is a single atomic step and a
// reader never sees a half-written record. Each layer build gets its own Ref:
// two clients share a cache only when handed the same service.

import { Context, Effect, HashMap, Layer, Option, Ref } from "effect";
import type { PriceRecord } from "./domain.ts";

export class PriceCache extends Context.Tag("PriceCache")<
  PriceCache,
  {
    readonly get: (symbol: string) => Effect.Effect<Option.Option<PriceRecord>>;
    /** Last write by completion time wins: a record never replaces one
     *  observed strictly later. */
    readonly put: (record: PriceRecord) => Effect.Effect<void>;
    readonly clear: Effect.Effect<void>;
  }
>() {}

export const makePriceCache = Effect.gen(function* () {
  const ref = yield* Ref.make(HashMap.empty<string, PriceRecord>());

  return PriceCache.of({
    get: (symbol) =>
      Ref.get(ref).pipe(
        Effect.map((entries) =>
          HashMap.get(entries, symbol).pipe(
            Option.filter((record) => record.symbol === symbol),
          ),
        ),
      ),
    put: (record) =>
      Ref.update(ref, (entries) =>
        Option.match(HashMap.get(entries, record.symbol), {
          onNone: () => HashMap.set(entries, record.symbol, record),
          onSome: (current) =>
            current.observedAt > record.observedAt
              ? entries
              : HashMap.set(entries, record.symbol, record),
        }),
      ),
    clear: Ref.set(ref, HashMap.empty<string, PriceRecord>()),
  });
});

export const PriceCacheLive = Layer.effect(PriceCache, makePriceCache);
