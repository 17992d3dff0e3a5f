/**
 * Dimensional signatures: symbol → exact rational exponent.
 *
 * Symbols are opaque strings matched exactly (`"m"` and `"meter"` are
 * unrelated). Every operation builds a fresh signature with zero exponents
 * removed, which is the canonical form equality relies on.
 *
 * @since 0.1.0
 */

import { Data, Equal, HashMap, Option } from "effect"
import {
  addRational,
  formatRational,
  isZeroRational,
  multiplyRational,
  negateRational,
  one,
  type Rational,
  subtractRational,
  zero,
} from "./Rational.js"

/**
 * Normalized unit signature. Two signatures are `Equal.equals` when their
 * exponent maps match, regardless of insertion order.
 *
 * @category Models
 * @since 0.1.0
 */
export class Units extends Data.Class<{
  readonly exponents: HashMap.HashMap<string, Rational>
}> {
  toString(): string {
    return formatUnits(this)
  }
}

const normalize = (exponents: HashMap.HashMap<string, Rational>): Units =>
  new Units({ exponents: HashMap.filter(exponents, (exponent) => !isZeroRational(exponent)) })

/**
 * Build a signature from a record of exponents, dropping zero entries.
 *
 * @category Constructors
 * @since 0.1.0
 * @example
 * ```ts
 * const acceleration = makeUnits({ m: one, s: makeRational(-2) })
 * formatUnits(acceleration) // "m s^-2"
 * ```
 */
export const makeUnits = (exponents: Readonly<Record<string, Rational>>): Units =>
  normalize(HashMap.fromIterable(Object.entries(exponents)))

/**
 * Single-symbol signature, `symbol^exponent`.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const unit = (symbol: string, exponent: Rational = one): Units =>
  makeUnits({ [symbol]: exponent })

/**
 * The empty signature.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const dimensionless: Units = makeUnits({})

const exponentOf = (units: Units, symbol: string): Rational =>
  Option.getOrElse(HashMap.get(units.exponents, symbol), () => zero)

const combineUnits = (
  left: Units,
  right: Units,
  combine: (a: Rational, b: Rational) => Rational,
): Units =>
  normalize(
    HashMap.reduce(right.exponents, left.exponents, (acc, exponent, symbol) =>
      HashMap.set(acc, symbol, combine(exponentOf(left, symbol), exponent)),
    ),
  )

/**
 * @category Algebra
 * @since 0.1.0
 */
export const multiplyUnits = (left: Units, right: Units): Units =>
  combineUnits(left, right, addRational)

/**
 * @category Algebra
 * @since 0.1.0
 */
export const divideUnits = (left: Units, right: Units): Units =>
  combineUnits(left, right, subtractRational)

/**
 * @category Algebra
 * @since 0.1.0
 */
export const invertUnits = (units: Units): Units =>
  normalize(HashMap.map(units.exponents, negateRational))

/**
 * Multiply every exponent by `exponent`.
 *
 * @category Algebra
 * @since 0.1.0
 */
export const powUnits = (units: Units, exponent: Rational): Units =>
  normalize(HashMap.map(units.exponents, (current) => multiplyRational(current, exponent)))

/**
 * @category Predicates
 * @since 0.1.0
 */
export const isDimensionless = (units: Units): boolean => HashMap.isEmpty(units.exponents)

/**
 * @category Predicates
 * @since 0.1.0
 */
export const equalUnits = (left: Units, right: Units): boolean => Equal.equals(left, right)

const compareSymbols = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0)

/**
 * Space-separated terms sorted by symbol; exponent 1 is implicit.
 *
 * @category Conversions
 * @since 0.1.0
 * @example
 * ```ts
 * formatUnits(makeUnits({ s: makeRational(-1), kg: one, m: half })) // "kg m^1/2 s^-1"
 * ```
 */
export const formatUnits = (units: Units): string =>
  HashMap.toEntries(units.exponents)
    .sort(([a], [b]) => compareSymbols(a, b))
    .map(([symbol, exponent]) =>
      Equal.equals(exponent, one) ? symbol : `${symbol}^${formatRational(exponent)}`,
    )
    .join(" ")
