import assert from "node:assert/strict";
import { test } from "node:test";
import { classify, isFallbackPermitted, isRetryable } from "./error-classifier.ts";
import {
  HttpError,
  InvalidInput,
  NetworkError,
  ValidationError,
} from "./price-errors.ts";

const integrity = (reason: "MalformedPayload" | "NonNumericPrice" | "NonPositivePrice" | "SymbolMismatch") =>
  new ValidationError({ kind: "DataIntegrity", reason, message: "" });

// --- classify ---

test("classify: network failures and timeouts are transient", () => {
  assert.equal(classify(new NetworkError({ message: "ECONNRESET" })), "Transient");
  assert.equal(classify(new NetworkError({ message: "BTC: request timed out" })), "Transient");
});

test("classify: server errors are transient", () => {
  assert.equal(classify(new HttpError({ status: 500 })), "Transient");
  assert.equal(classify(new HttpError({ status: 503 })), "Transient");
});

test("classify: other unexpected statuses are transient", () => {
  assert.equal(classify(new HttpError({ status: 404 })), "Transient");
});

test("classify: 429 is rate limited", () => {
  assert.equal(classify(new HttpError({ status: 429, retryAfterSeconds: 60 })), "RateLimited");
});

test("classify: payload problems are data-integrity failures", () => {
  assert.equal(classify(integrity("MalformedPayload")), "DataIntegrity");
  assert.equal(classify(integrity("NonNumericPrice")), "DataIntegrity");
  assert.equal(classify(integrity("NonPositivePrice")), "DataIntegrity");
  assert.equal(classify(integrity("SymbolMismatch")), "DataIntegrity");
});

test("classify: missing or null price is incomplete", () => {
  assert.equal(
    classify(new ValidationError({ kind: "Incomplete", reason: "NullPrice", message: "" })),
    "Incomplete",
  );
});

test("classify: empty symbol is invalid input", () => {
  assert.equal(classify(new InvalidInput({ symbol: "", message: "" })), "InvalidInput");
});

// --- isFallbackPermitted / isRetryable ---

test("isFallbackPermitted: only transient and incomplete failures may use cache", () => {
  assert.equal(isFallbackPermitted("Transient"), true);
  assert.equal(isFallbackPermitted("Incomplete"), true);
  assert.equal(isFallbackPermitted("DataIntegrity"), false);
  assert.equal(isFallbackPermitted("RateLimited"), false);
  assert.equal(isFallbackPermitted("InvalidInput"), false);
});

test("isRetryable: matches the fallback set", () => {
  assert.equal(isRetryable("Transient"), true);
  assert.equal(isRetryable("Incomplete"), true);
  assert.equal(isRetryable("DataIntegrity"), false);
  assert.equal(isRetryable("RateLimited"), false);
});
