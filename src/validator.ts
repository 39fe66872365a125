// Quote validation: pure classification of a raw response body.
//
// Checks run in a fixed order and stop at the first failure, so each
// failure mode maps to exactly one reason.

import { Either, Schema } from "effect";
import type { ValidationKind, ValidationReason } from "./price-errors.ts";

// --- Result ---

export type Valid = {
  readonly _tag: "Valid";
  readonly symbol: string;
  readonly price: number;
};

export type Invalid = {
  readonly _tag: "Invalid";
  readonly kind: ValidationKind;
  readonly reason: ValidationReason;
  readonly message: string;
};

export type ValidationResult = Valid | Invalid;

export const Valid = (symbol: string, price: number): Valid => ({
  _tag: "Valid",
  symbol,
  price,
});

const REASON_KIND: Record<ValidationReason, ValidationKind> = {
  MalformedPayload: "DataIntegrity",
  MissingPrice: "Incomplete",
  NullPrice: "Incomplete",
  NonNumericPrice: "DataIntegrity",
  NonPositivePrice: "DataIntegrity",
  SymbolMismatch: "DataIntegrity",
};

export const Invalid = (reason: ValidationReason, message: string): Invalid => ({
  _tag: "Invalid",
  kind: REASON_KIND[reason],
  reason,
  message,
});

// --- Validation ---

const decodeJson = Schema.decodeUnknownEither(Schema.parseJson());

type Quote = Readonly<Record<string, unknown>>;

function isQuote(value: unknown): value is Quote {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Name the quote reports for itself, if any. */
function reportedSymbol(quote: Quote): unknown {
  return "symbol" in quote ? quote["symbol"] : quote["name"];
}

export function validate(body: unknown, requestedSymbol: string): ValidationResult {
  let data: unknown = body;
  if (typeof body === "string") {
    const parsed = decodeJson(body);
    if (Either.isLeft(parsed)) {
      return Invalid("MalformedPayload", `Malformed payload for ${requestedSymbol}: not valid JSON`);
    }
    data = parsed.right;
  }

  let quote: Quote;
  if (Array.isArray(data)) {
    const entry = data.find(
      (item): item is Quote => isQuote(item) && reportedSymbol(item) === requestedSymbol,
    );
    if (entry === undefined) {
      return Invalid("MissingPrice", `No quote entry for ${requestedSymbol}`);
    }
    quote = entry;
  } else if (isQuote(data)) {
    quote = data;
  } else {
    return Invalid(
      "MalformedPayload",
      `Malformed payload for ${requestedSymbol}: expected an object or a list`,
    );
  }

  if (!("price" in quote)) {
    return Invalid("MissingPrice", `Price field missing for ${requestedSymbol}`);
  }

  const price = quote["price"];
  if (price === null) {
    return Invalid("NullPrice", `Price is null for ${requestedSymbol}`);
  }
  if (typeof price !== "number" || !Number.isFinite(price)) {
    return Invalid(
      "NonNumericPrice",
      `Invalid price format for ${requestedSymbol}: ${JSON.stringify(price)}`,
    );
  }
  if (price <= 0) {
    return Invalid(
      "NonPositivePrice",
      `Invalid price value for ${requestedSymbol}: ${price} (must be positive)`,
    );
  }

  const reported = reportedSymbol(quote);
  if (reported !== undefined && reported !== requestedSymbol) {
    return Invalid(
      "SymbolMismatch",
      `Symbol mismatch: requested ${requestedSymbol}, got ${JSON.stringify(reported)}`,
    );
  }

  return Valid(requestedSymbol, price);
}
