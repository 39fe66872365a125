// Production wiring: HTTP transport over fetch, one cache per layer build.

import { FetchHttpClient } from "@effect/platform";
import { Layer } from "effect";
import { PriceCacheLive } from "./price-cache.ts";
import { PriceClientLive } from "./price-client.ts";
import { HttpQuoteTransportLive } from "./providers/http-quote-transport.ts";

export const PriceClientHttpLive = PriceClientLive.pipe(
  Layer.provide(Layer.merge(HttpQuoteTransportLive, PriceCacheLive)),
  Layer.provide(FetchHttpClient.layer),
);
