// Retry controller: bounded exponential backoff over any Effect.
//
// Knows nothing about HTTP: the caller decides which failures are worth
// another attempt through `isRetryable`.

import { Console, Duration, Effect, Schedule } from "effect";

export interface RetryPolicy<E> {
  readonly maxRetries: number;
  readonly backoffBase: Duration.DurationInput;
  readonly isRetryable: (e: E) => boolean;
  readonly label?: string;
}

/** Delays base, 2·base, 4·base, … for at most `maxRetries` recurrences. */
export function backoffSchedule(
  maxRetries: number,
  backoffBase: Duration.DurationInput,
) {
  return Schedule.exponential(backoffBase, 2).pipe(
    Schedule.intersect(Schedule.recurs(maxRetries)),
  );
}

/** Run `operation`, retrying retryable failures with exponential backoff.
 *  A non-retryable failure aborts at once; after the last retry the final
 *  failure is surfaced unchanged. Sleeps are interruptible. */
export function execute<A, E, R>(
  operation: Effect.Effect<A, E, R>,
  policy: RetryPolicy<E>,
): Effect.Effect<A, E, R> {
  const label = policy.label ?? "retry";
  const base = Duration.decode(policy.backoffBase);

  return Effect.suspend(() => {
    let attemptIndex = 0;

    const attempt = Effect.suspend(() => {
      const current = attemptIndex++;
      return operation.pipe(
        Effect.tapError((e) =>
          policy.isRetryable(e) && current < policy.maxRetries
            ? Console.debug(
                `[${label}] attempt ${current + 1}/${policy.maxRetries + 1} failed, backing off ${Duration.format(Duration.times(base, 2 ** current))}`,
              )
            : Effect.void,
        ),
      );
    });

    return attempt.pipe(
      Effect.retry({
        schedule: backoffSchedule(policy.maxRetries, base),
        while: policy.isRetryable,
      }),
    );
  });
}
