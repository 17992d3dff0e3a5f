import { describe, it, expect } from "@effect/vitest"
import * as FastCheck from "effect/FastCheck"
import { UnitMismatchError } from "../src/Errors.js"
import { formatWithSignificantError } from "../src/Format.js"
import { countSignificantDigits } from "../src/internal/decimal.js"
import {
  addQuantities,
  divideQuantities,
  exactQuantity,
  makeQuantity,
  multiplyQuantities,
  subtractQuantities,
} from "../src/Quantity.js"
import { makeRational, type Rational } from "../src/Rational.js"
import { invertUnits, isDimensionless, makeUnits, multiplyUnits, unit } from "../src/Units.js"

const value = FastCheck.double({ min: -1e6, max: 1e6, noNaN: true })
const error = FastCheck.double({ min: 0, max: 1e3, noNaN: true })
// Below 1 so the rounded error never gains integer trailing zeros ("120000").
const fractionalError = FastCheck.double({ min: 1e-6, max: 0.999, noNaN: true })
const significantDigits = FastCheck.integer({ min: 1, max: 6 })
const symbol = FastCheck.constantFrom("m", "s", "kg", "K", "mol")
const symbolPair = FastCheck.constantFrom(
  ["m", "s"] as const,
  ["kg", "m"] as const,
  ["K", "kg"] as const,
  ["mol", "s"] as const,
)
const exponents = FastCheck.dictionary(
  symbol,
  FastCheck.tuple(FastCheck.integer({ min: -4, max: 4 }), FastCheck.integer({ min: 1, max: 3 })).map(
    ([numerator, denominator]): Rational => makeRational(numerator, denominator),
  ),
)

const errorText = (formatted: string): string => formatted.split(" ± ")[1] ?? ""

describe("quantity properties", () => {
  it("zero errors always render as (no error)", () => {
    FastCheck.assert(
      FastCheck.property(value, significantDigits, FastCheck.boolean(), (v, digits, leadingOne) => {
        expect(formatWithSignificantError(exactQuantity(v, unit("m")), digits, leadingOne)).toContain("(no error)")
      }),
    )
  })

  it("worst-case addition sums values and errors", () => {
    FastCheck.assert(
      FastCheck.property(value, error, value, error, (v1, e1, v2, e2) => {
        const sum = addQuantities(makeQuantity(v1, e1), makeQuantity(v2, e2))
        expect(sum.value).toBe(v1 + v2)
        expect(sum.error).toBe(e1 + e2)
      }),
    )
  })

  it("products and quotients accept any units while sums require equal ones", () => {
    FastCheck.assert(
      FastCheck.property(symbolPair, value, error, error, ([left, right], v, e1, e2) => {
        const a = makeQuantity(v, e1, unit(left))
        const b = makeQuantity(Math.abs(v) + 1, e2, unit(right))
        expect(() => multiplyQuantities(a, b)).not.toThrow()
        expect(() => divideQuantities(a, b)).not.toThrow()
        expect(() => addQuantities(a, b)).toThrow(UnitMismatchError)
        expect(() => subtractQuantities(a, b)).toThrow(UnitMismatchError)
      }),
    )
  })

  it("a signature times its inverse is dimensionless", () => {
    FastCheck.assert(
      FastCheck.property(exponents, (entries) => {
        const units = makeUnits(entries)
        expect(isDimensionless(multiplyUnits(invertUnits(units), units))).toBe(true)
      }),
    )
  })

  it("errors render with exactly the requested significant digits", () => {
    FastCheck.assert(
      FastCheck.property(value, fractionalError, significantDigits, (v, e, digits) => {
        const formatted = formatWithSignificantError(makeQuantity(v, e), digits, false)
        expect(countSignificantDigits(errorText(formatted))).toBe(digits)
      }),
    )
  })

  it("the leading-one exception only ever promotes a single digit to two", () => {
    FastCheck.assert(
      FastCheck.property(value, fractionalError, significantDigits, (v, e, digits) => {
        const count = countSignificantDigits(errorText(formatWithSignificantError(makeQuantity(v, e), digits, true)))
        expect(count === digits || (digits === 1 && count === 2)).toBe(true)
      }),
    )
  })

  it("denominators whose interval reaches zero give unbounded errors", () => {
    const denominator = FastCheck.double({ min: -100, max: 100, noNaN: true }).filter((d) => Math.abs(d) >= 1e-3)
    FastCheck.assert(
      FastCheck.property(value, error, denominator, error, (v, e, d, extra) => {
        const ratio = divideQuantities(makeQuantity(v, e), makeQuantity(d, Math.abs(d) + extra))
        expect(ratio.error).toBe(Number.POSITIVE_INFINITY)
      }),
    )
  })
})
