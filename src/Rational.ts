/**
 * Exact rational numbers used as unit exponents.
 *
 * Exponents must stay exact (`m^1/2 * m^1/2` is exactly `m`), so they are
 * kept as reduced bigint fractions rather than floats. Only value computations
 * such as `v^p` go through {@link rationalToNumber}.
 *
 * @since 0.1.0
 */

import { Data } from "effect"
import { InvalidRationalError } from "./Errors.js"

/**
 * Reduced fraction with a strictly positive denominator. Instances compare
 * structurally through `Equal.equals`; build them with {@link makeRational} so
 * the reduced form is guaranteed.
 *
 * @category Models
 * @since 0.1.0
 */
export class Rational extends Data.Class<{
  readonly numerator: bigint
  readonly denominator: bigint
}> {
  toString(): string {
    return formatRational(this)
  }
}

const gcd = (a: bigint, b: bigint): bigint => {
  let x = a < 0n ? -a : a
  let y = b < 0n ? -b : b
  while (y !== 0n) {
    const t = y
    y = x % y
    x = t
  }
  return x
}

const toBigInt = (
  component: bigint | number,
  numerator: bigint | number,
  denominator: bigint | number,
): bigint => {
  if (typeof component === "bigint") {
    return component
  }
  if (!Number.isSafeInteger(component)) {
    throw new InvalidRationalError({ numerator, denominator, reason: "components must be integers" })
  }
  return BigInt(component)
}

const reduce = (numerator: bigint, denominator: bigint): Rational => {
  if (numerator === 0n) {
    return new Rational({ numerator: 0n, denominator: 1n })
  }
  const sign = denominator < 0n ? -1n : 1n
  const divisor = gcd(numerator, denominator)
  return new Rational({
    numerator: (sign * numerator) / divisor,
    denominator: (sign * denominator) / divisor,
  })
}

/**
 * Build a rational from integer components, reducing to lowest terms.
 *
 * @category Constructors
 * @since 0.1.0
 * @example
 * ```ts
 * formatRational(makeRational(2, -4)) // "-1/2"
 * ```
 */
export const makeRational = (
  numerator: bigint | number,
  denominator: bigint | number = 1n,
): Rational => {
  const num = toBigInt(numerator, numerator, denominator)
  const den = toBigInt(denominator, numerator, denominator)
  if (den === 0n) {
    throw new InvalidRationalError({ numerator, denominator, reason: "denominator cannot be zero" })
  }
  return reduce(num, den)
}

/**
 * @category Constants
 * @since 0.1.0
 */
export const zero: Rational = makeRational(0n)

/**
 * @category Constants
 * @since 0.1.0
 */
export const one: Rational = makeRational(1n)

/**
 * Exponent of a square root.
 *
 * @category Constants
 * @since 0.1.0
 */
export const half: Rational = makeRational(1n, 2n)

/**
 * @category Arithmetic
 * @since 0.1.0
 */
export const addRational = (left: Rational, right: Rational): Rational =>
  reduce(
    left.numerator * right.denominator + right.numerator * left.denominator,
    left.denominator * right.denominator,
  )

/**
 * @category Arithmetic
 * @since 0.1.0
 */
export const subtractRational = (left: Rational, right: Rational): Rational =>
  addRational(left, negateRational(right))

/**
 * @category Arithmetic
 * @since 0.1.0
 */
export const multiplyRational = (left: Rational, right: Rational): Rational =>
  reduce(left.numerator * right.numerator, left.denominator * right.denominator)

/**
 * @category Arithmetic
 * @since 0.1.0
 */
export const negateRational = (self: Rational): Rational =>
  new Rational({ numerator: -self.numerator, denominator: self.denominator })

/**
 * @category Predicates
 * @since 0.1.0
 */
export const isZeroRational = (self: Rational): boolean => self.numerator === 0n

/**
 * Float approximation of the fraction. Exponent bookkeeping never goes
 * through this.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const rationalToNumber = (self: Rational): number =>
  Number(self.numerator) / Number(self.denominator)

/**
 * Render as `"n"` for integers and `"n/d"` otherwise.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const formatRational = (self: Rational): string =>
  self.denominator === 1n ? `${self.numerator}` : `${self.numerator}/${self.denominator}`
