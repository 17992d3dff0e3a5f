/**
 * Precondition failures for measured quantities.
 *
 * Every failure is a tagged error so callers running inside Effect can pattern
 * match with `Effect.catchTag`. The pure operations throw them synchronously:
 * they signal caller bugs, never transient conditions, and nothing in this
 * package retries or recovers from them.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * Raised when a rational exponent is built from a zero denominator or a
 * non-integral component.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InvalidRationalError extends Data.TaggedError("InvalidRationalError")<{
  readonly numerator: bigint | number
  readonly denominator: bigint | number
  readonly reason: string
}> {
  override get message(): string {
    return `Invalid rational ${this.numerator}/${this.denominator}: ${this.reason}`
  }
}

/**
 * Raised when a quantity would be constructed with a non-finite value or an
 * error that is neither non-negative nor `+Infinity`.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * makeQuantity(Number.NaN, 0.1) // throws InvalidQuantityError
 * ```
 */
export class InvalidQuantityError extends Data.TaggedError("InvalidQuantityError")<{
  readonly value: number
  readonly error: number
  readonly reason: string
}> {
  override get message(): string {
    return `Invalid quantity ${this.value} +/- ${this.error}: ${this.reason}`
  }
}

/**
 * Raised when adding or subtracting quantities whose units differ.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnitMismatchError extends Data.TaggedError("UnitMismatchError")<{
  readonly operation: "add" | "subtract"
  readonly left: string
  readonly right: string
}> {
  override get message(): string {
    return `Cannot ${this.operation} quantities with different units: [${this.left}] and [${this.right}]`
  }
}

/**
 * Raised when a transcendental function receives an operand carrying units.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DimensionlessRequiredError extends Data.TaggedError("DimensionlessRequiredError")<{
  readonly operation: "exp" | "log" | "sin" | "cos"
  readonly units: string
}> {
  override get message(): string {
    return `${this.operation}(...) requires a dimensionless quantity, got [${this.units}]`
  }
}

/**
 * Raised when taking the natural logarithm of a non-positive value.
 *
 * @category Errors
 * @since 0.1.0
 */
export class NonPositiveLogarithmError extends Data.TaggedError("NonPositiveLogarithmError")<{
  readonly value: number
}> {
  override get message(): string {
    return `log(...) requires a positive value, got ${this.value}`
  }
}

/**
 * Raised when the formatter is asked for fewer than one significant digit.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InvalidSignificantDigitsError extends Data.TaggedError("InvalidSignificantDigitsError")<{
  readonly significantDigits: number
}> {
  override get message(): string {
    return `Significant digits must be an integer >= 1, got ${this.significantDigits}`
  }
}

/**
 * Union of every precondition failure raised by this package.
 *
 * @category Errors
 * @since 0.1.0
 */
export type QuantityError =
  | InvalidRationalError
  | InvalidQuantityError
  | UnitMismatchError
  | DimensionlessRequiredError
  | NonPositiveLogarithmError
  | InvalidSignificantDigitsError

/**
 * @category Refinements
 * @since 0.1.0
 */
export const isQuantityError = (error: unknown): error is QuantityError =>
  error instanceof InvalidRationalError ||
  error instanceof InvalidQuantityError ||
  error instanceof UnitMismatchError ||
  error instanceof DimensionlessRequiredError ||
  error instanceof NonPositiveLogarithmError ||
  error instanceof InvalidSignificantDigitsError
