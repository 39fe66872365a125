// Backoff timing is read from the TestClock: Effect.timed reports virtual
// time, so the assertions are exact.

import assert from "node:assert/strict";
import { test } from "node:test";
import { Duration, Effect, Either, Exit, Fiber, Ref, TestClock, TestContext } from "effect";
import { execute, type RetryPolicy } from "./retry-controller.ts";

// --- Helpers ---

function run<A, E>(effect: Effect.Effect<A, E>): Promise<A> {
  return Effect.runPromise(effect.pipe(Effect.provide(TestContext.TestContext)));
}

/** An operation that fails with `fail-<n>` for its first `failures` calls. */
function flaky(calls: Ref.Ref<number>, failures: number): Effect.Effect<string, string> {
  return Ref.updateAndGet(calls, (n) => n + 1).pipe(
    Effect.flatMap((n) => (n <= failures ? Effect.fail(`fail-${n}`) : Effect.succeed(`ok-${n}`))),
  );
}

const policy = (overrides: Partial<RetryPolicy<string>> = {}): RetryPolicy<string> => ({
  maxRetries: 3,
  backoffBase: "1 second",
  isRetryable: () => true,
  ...overrides,
});

function settle(failures: number, retryPolicy: RetryPolicy<string>) {
  return run(
    Effect.gen(function* () {
      const calls = yield* Ref.make(0);
      const fiber = yield* Effect.fork(
        Effect.timed(Effect.either(execute(flaky(calls, failures), retryPolicy))),
      );
      yield* TestClock.adjust("1 hour");
      const [elapsed, outcome] = yield* Fiber.join(fiber);
      return { elapsed: Duration.toMillis(elapsed), outcome, calls: yield* Ref.get(calls) };
    }),
  );
}

// --- Tests ---

test("execute: first-attempt success makes no retries", async () => {
  const result = await settle(0, policy());

  assert.equal(Either.getOrUndefined(result.outcome), "ok-1");
  assert.equal(result.calls, 1);
  assert.equal(result.elapsed, 0);
});

test("execute: persistent failure makes exactly maxRetries + 1 attempts", async () => {
  const result = await settle(Infinity, policy());

  assert.equal(result.calls, 4);
  assert.ok(Either.isLeft(result.outcome));
  if (Either.isLeft(result.outcome)) assert.equal(result.outcome.left, "fail-4");
});

test("execute: backoff doubles from the base (1s + 2s + 4s)", async () => {
  const result = await settle(Infinity, policy());

  assert.equal(result.elapsed, 7000);
});

test("execute: recovers mid-way and stops retrying", async () => {
  const result = await settle(2, policy({ backoffBase: "300 millis" }));

  assert.equal(Either.getOrUndefined(result.outcome), "ok-3");
  assert.equal(result.calls, 3);
  assert.equal(result.elapsed, 300 + 600);
});

test("execute: non-retryable failure aborts without backoff", async () => {
  const result = await settle(Infinity, policy({ isRetryable: (e) => e !== "fail-1" }));

  assert.equal(result.calls, 1);
  assert.equal(result.elapsed, 0);
  assert.ok(Either.isLeft(result.outcome));
});

test("execute: maxRetries 0 means a single attempt", async () => {
  const result = await settle(Infinity, policy({ maxRetries: 0 }));

  assert.equal(result.calls, 1);
  assert.equal(result.elapsed, 0);
});

test("execute: backoff sleep is interruptible", async () => {
  const result = await run(
    Effect.gen(function* () {
      const calls = yield* Ref.make(0);
      const fiber = yield* Effect.fork(execute(flaky(calls, Infinity), policy()));
      yield* TestClock.adjust("500 millis");
      const exit = yield* Fiber.interrupt(fiber);
      return { interrupted: Exit.isInterrupted(exit), calls: yield* Ref.get(calls) };
    }),
  );

  assert.equal(result.interrupted, true);
  assert.equal(result.calls, 1);
});
