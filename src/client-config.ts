// ClientConfig: per-call tuning knobs, validated with Schema.

import { Config, Effect, Schema } from "effect";

export const ClientConfig = Schema.Struct({
  maxRetries: Schema.Int.pipe(Schema.nonNegative()),
  backoffBaseSeconds: Schema.Number.pipe(Schema.finite(), Schema.positive()),
  failFastOnRateLimit: Schema.Boolean,
  defaultRateLimitWaitSeconds: Schema.Int.pipe(Schema.positive()),
});

export type ClientConfig = typeof ClientConfig.Type;

export const defaultClientConfig: ClientConfig = {
  maxRetries: 3,
  backoffBaseSeconds: 0.3,
  failFastOnRateLimit: false,
  defaultRateLimitWaitSeconds: 60,
};

export const decodeClientConfig = Schema.decodeUnknownEither(ClientConfig);

// --- Environment ---

const fromEnv = Config.all({
  maxRetries: Config.integer("PRICE_CLIENT_MAX_RETRIES").pipe(
    Config.withDefault(defaultClientConfig.maxRetries),
  ),
  backoffBaseSeconds: Config.number("PRICE_CLIENT_BACKOFF_BASE_SECONDS").pipe(
    Config.withDefault(defaultClientConfig.backoffBaseSeconds),
  ),
  failFastOnRateLimit: Config.boolean("PRICE_CLIENT_FAIL_FAST_ON_RATE_LIMIT").pipe(
    Config.withDefault(defaultClientConfig.failFastOnRateLimit),
  ),
  defaultRateLimitWaitSeconds: Config.integer(
    "PRICE_CLIENT_DEFAULT_RATE_LIMIT_WAIT_SECONDS",
  ).pipe(Config.withDefault(defaultClientConfig.defaultRateLimitWaitSeconds)),
});

/** Read a ClientConfig from the active ConfigProvider (env by default). */
export const loadClientConfig = Effect.flatMap(fromEnv, (raw) =>
  Schema.decode(ClientConfig)(raw),
);
