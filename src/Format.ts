/**
 * Significant-error formatting.
 *
 * The error decides the precision: it is rounded to the requested number of
 * significant digits and the value is printed with exactly as many decimals as
 * the rounded error. All rounding is half-up on the decimal expansion of each
 * float, never on its binary expansion.
 *
 * @since 0.1.0
 */

import { BigDecimal, Config, Context, Effect, Layer, Schema } from "effect"
import { InvalidSignificantDigitsError } from "./Errors.js"
import {
  countDecimals,
  countSignificantDigits,
  leadingDigits,
  toPlainString,
  toStrippedString,
} from "./internal/decimal.js"
import { isUnbounded, type Quantity } from "./Quantity.js"
import { formatUnits, isDimensionless } from "./Units.js"

/**
 * Options controlling {@link formatWithSignificantError}.
 *
 * @category Models
 * @since 0.1.0
 */
export class FormatOptions extends Schema.Class<FormatOptions>("FormatOptions")({
  significantDigits: Schema.Int.pipe(Schema.greaterThanOrEqualTo(1)),
  leadingOneException: Schema.Boolean,
}) {}

/**
 * @category Predicates
 * @since 0.1.0
 */
export const isValidSignificantDigits = (significantDigits: number): boolean =>
  Number.isInteger(significantDigits) && significantDigits >= 1

const withUnits = (text: string, quantity: Quantity): string =>
  isDimensionless(quantity.units) ? text : `${text} ${formatUnits(quantity.units)}`

// Ties away from zero, padded to exactly `scale` fraction digits.
const roundHalfUp = (decimal: BigDecimal.BigDecimal, scale: number): BigDecimal.BigDecimal =>
  BigDecimal.scale(BigDecimal.round(decimal, { scale, mode: "half-from-zero" }), scale)

const toSignificantDigits = (rounded: BigDecimal.BigDecimal, significantDigits: number): string => {
  if (rounded.value === 0n) {
    return significantDigits === 1 ? "0" : `0.${"0".repeat(significantDigits - 1)}`
  }
  const stripped = toStrippedString(rounded)
  const missing = significantDigits - countSignificantDigits(stripped)
  if (missing <= 0) {
    return stripped
  }
  return stripped.includes(".")
    ? `${stripped}${"0".repeat(missing)}`
    : `${stripped}.${"0".repeat(missing)}`
}

/**
 * Render `value ± error` with the error rounded to `significantDigits`
 * significant digits and the value printed to the same decimal place.
 *
 * With `leadingOneException`, a one-digit error whose leading digit is 1 is
 * printed with two digits instead (`120` → `"120"` rather than `"100"`).
 *
 * A zero error prints the raw value followed by `(no error)`; an unbounded
 * error prints the raw value followed by `± ∞`.
 *
 * @category Formatting
 * @since 0.1.0
 * @example
 * ```ts
 * formatWithSignificantError(makeQuantity(1.321, 0.214), 2, false) // "1.32 ± 0.21"
 * formatWithSignificantError(makeQuantity(12345, 120), 1, true)    // "12350 ± 120"
 * ```
 */
export const formatWithSignificantError = (
  quantity: Quantity,
  significantDigits: number,
  leadingOneException: boolean,
): string => {
  if (!isValidSignificantDigits(significantDigits)) {
    throw new InvalidSignificantDigitsError({ significantDigits })
  }
  if (quantity.error === 0) {
    return withUnits(`${quantity.value} (no error)`, quantity)
  }
  if (isUnbounded(quantity)) {
    return withUnits(`${quantity.value} ± ∞`, quantity)
  }

  const error = BigDecimal.unsafeFromNumber(Math.abs(quantity.error))
  const { exponent, leadingDigit } = leadingDigits(error)
  const effectiveDigits =
    leadingOneException && leadingDigit === 1 && significantDigits === 1 ? 2 : significantDigits
  const shift = effectiveDigits - 1 - exponent

  const errorText = toSignificantDigits(roundHalfUp(error, shift), effectiveDigits)
  const roundedValue = roundHalfUp(BigDecimal.unsafeFromNumber(quantity.value), shift)
  const valueText = toPlainString(roundHalfUp(roundedValue, countDecimals(errorText)))

  return withUnits(`${valueText} ± ${errorText}`, quantity)
}

/**
 * @category Formatting
 * @since 0.1.0
 */
export const formatWithOptions = (quantity: Quantity, options: FormatOptions): string =>
  formatWithSignificantError(quantity, options.significantDigits, options.leadingOneException)

export interface QuantityFormatterService {
  readonly options: FormatOptions
  readonly format: (quantity: Quantity) => Effect.Effect<string, InvalidSignificantDigitsError>
  readonly formatWith: (
    quantity: Quantity,
    options: { readonly significantDigits: number; readonly leadingOneException: boolean },
  ) => Effect.Effect<string, InvalidSignificantDigitsError>
}

const render = (
  quantity: Quantity,
  significantDigits: number,
  leadingOneException: boolean,
): Effect.Effect<string, InvalidSignificantDigitsError> =>
  Effect.suspend(() =>
    isValidSignificantDigits(significantDigits)
      ? Effect.succeed(formatWithSignificantError(quantity, significantDigits, leadingOneException))
      : Effect.fail(new InvalidSignificantDigitsError({ significantDigits })),
  ).pipe(
    Effect.tap((text) =>
      isUnbounded(quantity)
        ? Effect.logWarning("Formatting a quantity with unbounded uncertainty")
        : Effect.logDebug(`Formatted quantity as ${text}`),
    ),
    Effect.annotateLogs({ significantDigits, leadingOneException }),
  )

const makeService = (options: FormatOptions): QuantityFormatterService => ({
  options,
  format: (quantity) => render(quantity, options.significantDigits, options.leadingOneException),
  formatWith: (quantity, overrides) =>
    render(quantity, overrides.significantDigits, overrides.leadingOneException),
})

/**
 * `QUANTITY_SIGNIFICANT_DIGITS` (default 1, must be >= 1).
 *
 * @category Config
 * @since 0.1.0
 */
export const significantDigitsConfig: Config.Config<number> = Config.integer("QUANTITY_SIGNIFICANT_DIGITS").pipe(
  Config.withDefault(1),
  Config.validate({
    message: "Expected an integer >= 1",
    validation: isValidSignificantDigits,
  }),
)

/**
 * `QUANTITY_LEADING_ONE_EXCEPTION` (default false).
 *
 * @category Config
 * @since 0.1.0
 */
export const leadingOneExceptionConfig: Config.Config<boolean> = Config.boolean(
  "QUANTITY_LEADING_ONE_EXCEPTION",
).pipe(Config.withDefault(false))

/**
 * Formatter with preconfigured options, for report generators that print many
 * quantities the same way.
 *
 * @category Services
 * @since 0.1.0
 */
export class QuantityFormatter extends Context.Tag("measured-quantities/QuantityFormatter")<
  QuantityFormatter,
  QuantityFormatterService
>() {
  /**
   * Options read from the active `ConfigProvider`.
   */
  static readonly layer = Layer.effect(
    this,
    Effect.gen(function* () {
      const significantDigits = yield* significantDigitsConfig
      const leadingOneException = yield* leadingOneExceptionConfig
      return makeService(new FormatOptions({ significantDigits, leadingOneException }))
    }),
  )

  static layerWith(options: FormatOptions) {
    return Layer.succeed(this, makeService(options))
  }
}
