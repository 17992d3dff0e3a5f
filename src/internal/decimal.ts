import { BigDecimal } from "effect"

/**
 * Positional rendering without exponent notation; keeps exactly `scale`
 * fraction digits when the scale is positive.
 */
export const toPlainString = (decimal: BigDecimal.BigDecimal): string => {
  const negative = decimal.value < 0n
  const digits = (negative ? -decimal.value : decimal.value).toString()
  const sign = negative ? "-" : ""
  if (decimal.scale <= 0) {
    return decimal.value === 0n ? "0" : `${sign}${digits}${"0".repeat(-decimal.scale)}`
  }
  const padded = digits.padStart(decimal.scale + 1, "0")
  const split = padded.length - decimal.scale
  return `${sign}${padded.slice(0, split)}.${padded.slice(split)}`
}

/**
 * Plain rendering with trailing fraction zeros removed (`1.50` → `"1.5"`,
 * `100` → `"100"`).
 */
export const toStrippedString = (decimal: BigDecimal.BigDecimal): string =>
  toPlainString(BigDecimal.normalize(decimal))

/**
 * Base-10 order of magnitude (`floor(log10 |d|)`) and first significant digit
 * of a non-zero decimal.
 */
export const leadingDigits = (
  decimal: BigDecimal.BigDecimal,
): { readonly exponent: number; readonly leadingDigit: number } => {
  const digits = (decimal.value < 0n ? -decimal.value : decimal.value).toString()
  return {
    exponent: digits.length - 1 - decimal.scale,
    leadingDigit: Number(digits[0]),
  }
}

/**
 * Digits from the first non-zero digit onwards, ignoring sign and point.
 * `"0.50"` → 2, `"100"` → 3, `"0.000"` → 0.
 */
export const countSignificantDigits = (text: string): number => {
  const digits = text.replace(".", "").replace(/^-/, "")
  const firstNonZero = digits.search(/[1-9]/)
  return firstNonZero < 0 ? 0 : digits.length - firstNonZero
}

/**
 * Digits after the decimal point, 0 when there is none.
 */
export const countDecimals = (text: string): number => {
  const index = text.indexOf(".")
  return index < 0 ? 0 : text.length - index - 1
}
