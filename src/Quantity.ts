/**
 * Measured quantities: a value, its uncertainty, and its units.
 *
 * Every operation returns a new quantity whose error is propagated from the
 * operands. Binary operators combine errors under an {@link ErrorPropagation}
 * model; unary functions use the first-order estimate `Δf ≈ |f'(x)| Δx`, which
 * is only meaningful while the relative error stays small.
 *
 * Quantities deliberately have no equality or ordering: two measurements with
 * overlapping uncertainty are neither equal nor ordered.
 *
 * @since 0.1.0
 */

import { Effect, Schema } from "effect"
import {
  DimensionlessRequiredError,
  InvalidQuantityError,
  isQuantityError,
  NonPositiveLogarithmError,
  type QuantityError,
  UnitMismatchError,
} from "./Errors.js"
import { half, type Rational, rationalToNumber } from "./Rational.js"
import {
  dimensionless,
  divideUnits,
  equalUnits,
  formatUnits,
  isDimensionless,
  multiplyUnits,
  powUnits,
  type Units,
} from "./Units.js"

/**
 * How independent errors combine in binary operations.
 *
 * - `"worst-case"`: linear sum of the contributions, assuming fully correlated
 *   errors.
 * - `"quadrature"`: root-sum-of-squares, assuming independent errors.
 *
 * @category Models
 * @since 0.1.0
 */
export const ErrorPropagation = Schema.Literal("worst-case", "quadrature")

/**
 * @category Models
 * @since 0.1.0
 */
export type ErrorPropagation = typeof ErrorPropagation.Type

const validate = (value: number, error: number): void => {
  if (!Number.isFinite(value)) {
    throw new InvalidQuantityError({ value, error, reason: "value must be finite" })
  }
  if (Number.isNaN(error) || error < 0) {
    throw new InvalidQuantityError({ value, error, reason: "error must be >= 0 or +Infinity" })
  }
}

/**
 * Immutable `value ± error` with units. `error` is `+Infinity` when the
 * uncertainty could not be bounded (see {@link divideQuantities}).
 *
 * @category Models
 * @since 0.1.0
 */
export class Quantity {
  readonly value: number
  readonly error: number
  readonly units: Units

  constructor(value: number, error: number, units: Units) {
    validate(value, error)
    this.value = value
    this.error = error
    this.units = units
  }

  /**
   * Diagnostic rendering, e.g. `"9.81 +/- 0.02 m s^-2"`. Use
   * `formatWithSignificantError` for display.
   */
  toString(): string {
    const units = isDimensionless(this.units) ? "" : ` ${formatUnits(this.units)}`
    return `${this.value} +/- ${this.error}${units}`
  }
}

/**
 * @category Constructors
 * @since 0.1.0
 * @example
 * ```ts
 * const g = makeQuantity(9.81, 0.02, makeUnits({ m: one, s: makeRational(-2) }))
 * ```
 */
export const makeQuantity = (value: number, error: number, units: Units = dimensionless): Quantity =>
  new Quantity(value, error, units)

/**
 * A quantity known without uncertainty.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const exactQuantity = (value: number, units: Units = dimensionless): Quantity =>
  new Quantity(value, 0, units)

/**
 * @category Predicates
 * @since 0.1.0
 */
export const isUnbounded = (quantity: Quantity): boolean => quantity.error === Number.POSITIVE_INFINITY

/**
 * `error / |value|`; `+Infinity` for a zero value with non-zero error.
 *
 * @category Getters
 * @since 0.1.0
 */
export const relativeError = (quantity: Quantity): number =>
  quantity.error === 0 ? 0 : quantity.error / Math.abs(quantity.value)

/**
 * `|sensitivity| · error`, except that an exact input contributes nothing and
 * an unbounded input stays unbounded (`0 · ∞` would otherwise be NaN).
 */
const propagate = (sensitivity: number, error: number): number =>
  error === 0 ? 0 : error === Number.POSITIVE_INFINITY ? error : Math.abs(sensitivity) * error

const combineErrors = (a: number, b: number, model: ErrorPropagation): number =>
  model === "worst-case" ? a + b : Math.sqrt(a * a + b * b)

const assertSameUnits = (operation: "add" | "subtract", left: Quantity, right: Quantity): void => {
  if (!equalUnits(left.units, right.units)) {
    throw new UnitMismatchError({
      operation,
      left: formatUnits(left.units),
      right: formatUnits(right.units),
    })
  }
}

/**
 * @category Arithmetic
 * @since 0.1.0
 */
export const addQuantities = (
  left: Quantity,
  right: Quantity,
  model: ErrorPropagation = "worst-case",
): Quantity => {
  assertSameUnits("add", left, right)
  return new Quantity(left.value + right.value, combineErrors(left.error, right.error, model), left.units)
}

/**
 * @category Arithmetic
 * @since 0.1.0
 */
export const subtractQuantities = (
  left: Quantity,
  right: Quantity,
  model: ErrorPropagation = "worst-case",
): Quantity => {
  assertSameUnits("subtract", left, right)
  return new Quantity(left.value - right.value, combineErrors(left.error, right.error, model), left.units)
}

/**
 * Units multiply; mismatched units are never an error here.
 *
 * @category Arithmetic
 * @since 0.1.0
 */
export const multiplyQuantities = (
  left: Quantity,
  right: Quantity,
  model: ErrorPropagation = "worst-case",
): Quantity =>
  new Quantity(
    left.value * right.value,
    combineErrors(propagate(right.value, left.error), propagate(left.value, right.error), model),
    multiplyUnits(left.units, right.units),
  )

/**
 * Units divide. When the denominator's interval `[v - e, v + e]` contains
 * zero the quotient is unstable: the result keeps `left / right` as its value
 * and reports `+Infinity` error under either model.
 *
 * @category Arithmetic
 * @since 0.1.0
 */
export const divideQuantities = (
  left: Quantity,
  right: Quantity,
  model: ErrorPropagation = "worst-case",
): Quantity => {
  const value = left.value / right.value
  const units = divideUnits(left.units, right.units)
  if (right.value - right.error <= 0 && right.value + right.error >= 0) {
    return new Quantity(value, Number.POSITIVE_INFINITY, units)
  }
  const numeratorTerm = propagate(1 / right.value, left.error)
  const denominatorTerm = propagate(left.value / (right.value * right.value), right.error)
  return new Quantity(value, combineErrors(numeratorTerm, denominatorTerm, model), units)
}

/**
 * @category Arithmetic
 * @since 0.1.0
 */
export const negateQuantity = (quantity: Quantity): Quantity =>
  new Quantity(-quantity.value, quantity.error, quantity.units)

/**
 * `v^p` with units raised to `p`. A negative base with a fractional power
 * yields NaN, which fails construction.
 *
 * @category Functions
 * @since 0.1.0
 */
export const powQuantity = (quantity: Quantity, exponent: Rational): Quantity => {
  const p = rationalToNumber(exponent)
  return new Quantity(
    Math.pow(quantity.value, p),
    propagate(p * Math.pow(quantity.value, p - 1), quantity.error),
    powUnits(quantity.units, exponent),
  )
}

/**
 * @category Functions
 * @since 0.1.0
 */
export const sqrtQuantity = (quantity: Quantity): Quantity => powQuantity(quantity, half)

const requireDimensionless = (operation: "exp" | "log" | "sin" | "cos", quantity: Quantity): void => {
  if (!isDimensionless(quantity.units)) {
    throw new DimensionlessRequiredError({ operation, units: formatUnits(quantity.units) })
  }
}

/**
 * @category Functions
 * @since 0.1.0
 */
export const expQuantity = (quantity: Quantity): Quantity => {
  requireDimensionless("exp", quantity)
  const value = Math.exp(quantity.value)
  return new Quantity(value, propagate(value, quantity.error), dimensionless)
}

/**
 * Natural logarithm.
 *
 * @category Functions
 * @since 0.1.0
 */
export const logQuantity = (quantity: Quantity): Quantity => {
  requireDimensionless("log", quantity)
  if (!(quantity.value > 0)) {
    throw new NonPositiveLogarithmError({ value: quantity.value })
  }
  return new Quantity(Math.log(quantity.value), propagate(1 / quantity.value, quantity.error), dimensionless)
}

/**
 * Argument in radians.
 *
 * @category Functions
 * @since 0.1.0
 */
export const sinQuantity = (quantity: Quantity): Quantity => {
  requireDimensionless("sin", quantity)
  return new Quantity(
    Math.sin(quantity.value),
    propagate(Math.cos(quantity.value), quantity.error),
    dimensionless,
  )
}

/**
 * Argument in radians.
 *
 * @category Functions
 * @since 0.1.0
 */
export const cosQuantity = (quantity: Quantity): Quantity => {
  requireDimensionless("cos", quantity)
  return new Quantity(
    Math.cos(quantity.value),
    propagate(Math.sin(quantity.value), quantity.error),
    dimensionless,
  )
}

/**
 * Run a quantity computation inside Effect, surfacing precondition failures
 * in the error channel. Anything else thrown is a defect.
 *
 * @category Combinators
 * @since 0.1.0
 * @example
 * ```ts
 * const ratio = yield* tryQuantity(() => divideQuantities(distance, time)).pipe(
 *   Effect.catchTag("InvalidQuantityError", () => Effect.succeed(fallback)),
 * )
 * ```
 */
export const tryQuantity = <A>(evaluate: () => A): Effect.Effect<A, QuantityError> =>
  Effect.suspend(() => {
    try {
      return Effect.succeed(evaluate())
    } catch (error) {
      return isQuantityError(error) ? Effect.fail(error) : Effect.die(error)
    }
  })
