/**
 * Formatting matrix shared by the formatter tests: value, error, significant
 * digits, leading-one exception, expected rendering.
 */
export interface FormatCase {
  readonly value: number
  readonly error: number
  readonly significantDigits: number
  readonly leadingOneException: boolean
  readonly expected: string
}

const row = (
  value: number,
  error: number,
  significantDigits: number,
  leadingOneException: boolean,
  expected: string,
): FormatCase => ({ value, error, significantDigits, leadingOneException, expected })

export const formatCases: ReadonlyArray<FormatCase> = [
  row(1.321, 0.214, 1, false, "1.3 ± 0.2"),
  row(1.321, 0.214, 2, false, "1.32 ± 0.21"),
  row(1.321, 0.214, 3, false, "1.321 ± 0.214"),
  row(1.321, 0.214, 1, true, "1.3 ± 0.2"),
  row(1.321, 0.214, 2, true, "1.32 ± 0.21"),
  row(1.321, 0.214, 3, true, "1.321 ± 0.214"),

  row(12.345, 0.6789, 1, false, "12.3 ± 0.7"),
  row(12.345, 0.6789, 2, false, "12.35 ± 0.68"),
  row(12.345, 0.6789, 3, false, "12.345 ± 0.679"),
  row(12.345, 0.6789, 1, true, "12.3 ± 0.7"),
  row(12.345, 0.6789, 2, true, "12.35 ± 0.68"),
  row(12.345, 0.6789, 3, true, "12.345 ± 0.679"),

  row(0.0123, 0.0022, 1, false, "0.012 ± 0.002"),
  row(0.0123, 0.0022, 2, false, "0.0123 ± 0.0022"),
  row(0.0123, 0.0022, 1, true, "0.012 ± 0.002"),
  row(0.0123, 0.0022, 2, true, "0.0123 ± 0.0022"),

  row(12345, 120, 1, false, "12300 ± 100"),
  row(12345, 120, 2, false, "12350 ± 120"),
  row(12345, 123, 3, false, "12345 ± 123"),
  row(12345, 123, 4, false, "12345.0 ± 123.0"),
  row(12345, 120, 1, true, "12350 ± 120"),
  row(12345, 120, 2, true, "12350 ± 120"),
  row(12345, 123, 3, true, "12345 ± 123"),
  row(12345, 123, 4, true, "12345.0 ± 123.0"),

  row(12345, 1000, 1, false, "12000 ± 1000"),
  row(12345, 1000, 2, false, "12300 ± 1000"),
  row(12345, 1000, 3, false, "12350 ± 1000"),
  row(12345, 1000, 4, false, "12345 ± 1000"),
  row(12345, 1000, 5, false, "12345.0 ± 1000.0"),
  row(12345, 1000, 1, true, "12300 ± 1000"),
  row(12345, 1000, 2, true, "12300 ± 1000"),
  row(12345, 1000, 3, true, "12350 ± 1000"),
  row(12345, 1000, 4, true, "12345 ± 1000"),
  row(12345, 1000, 5, true, "12345.0 ± 1000.0"),

  row(12.345, 0.5, 1, false, "12.3 ± 0.5"),
  row(12.345, 0.5, 2, false, "12.35 ± 0.50"),
  row(12.345, 0.5, 3, false, "12.345 ± 0.500"),
  row(12.345, 0.5, 1, true, "12.3 ± 0.5"),
  row(12.345, 0.5, 2, true, "12.35 ± 0.50"),
  row(12.345, 0.5, 3, true, "12.345 ± 0.500"),
]
