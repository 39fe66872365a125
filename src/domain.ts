// Pure domain types: no framework dependency, no I/O.

/** Last validated price for one symbol. Replaced whole, never mutated. */
export interface PriceRecord {
  readonly symbol: string;
  readonly price: number;
  readonly observedAt: number; // epoch ms
}

/** What a fetch hands back. `degraded` marks a value served from cache. */
export interface FetchResult extends PriceRecord {
  readonly degraded: boolean;
}

export interface RateLimitSignal {
  readonly retryAfterSeconds?: number;
}

/** Raw transport answer, before any status or payload checks. */
export interface RawQuote {
  readonly status: number;
  readonly body: unknown;
  readonly rateLimit?: RateLimitSignal;
}
