// Rate-limit handling: pure decision, no sleeping here.

import type { ClientConfig } from "./client-config.ts";
import type { RateLimitSignal } from "./domain.ts";

// --- Decision ---

export type Wait = { readonly _tag: "Wait"; readonly seconds: number };
export type Fail = {
  readonly _tag: "Fail";
  readonly retryAfterSeconds: number | undefined;
};

export type RateLimitDecision = Wait | Fail;

export const Wait = (seconds: number): Wait => ({ _tag: "Wait", seconds });

export const Fail = (retryAfterSeconds: number | undefined): Fail => ({
  _tag: "Fail",
  retryAfterSeconds,
});

/** Fail-fast hands the retry-after value back to the caller; otherwise wait
 *  for the signalled duration, or the configured default when none was sent. */
export function handleRateLimit(
  signal: RateLimitSignal,
  config: Pick<ClientConfig, "failFastOnRateLimit" | "defaultRateLimitWaitSeconds">,
): RateLimitDecision {
  if (config.failFastOnRateLimit) {
    return Fail(signal.retryAfterSeconds);
  }
  return Wait(signal.retryAfterSeconds ?? config.defaultRateLimitWaitSeconds);
}

// --- Retry-After header ---

/** Positive whole seconds, or undefined for anything else (dates included). */
export function parseRetryAfter(header: string | undefined): number | undefined {
  if (header === undefined) return undefined;
  const trimmed = header.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  const seconds = Number(trimmed);
  return seconds > 0 ? seconds : undefined;
}
