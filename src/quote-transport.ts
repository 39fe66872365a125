// Quote transport: outbound service definition.
//
// The transport only moves bytes: status codes and payload checks belong to
// the client.

import { Context, type Effect } from "effect";
import type { RawQuote } from "./domain.ts";
import type { NetworkError } from "./price-errors.ts";

export class QuoteTransport extends Context.Tag("QuoteTransport")<
  QuoteTransport,
  {
    readonly requestQuote: (symbol: string) => Effect.Effect<RawQuote, NetworkError>;
  }
>() {}
