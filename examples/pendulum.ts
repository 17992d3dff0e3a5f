import { Console, Effect } from "effect"
import { FormatOptions, QuantityFormatter } from "../src/Format.js"
import {
  divideQuantities,
  exactQuantity,
  makeQuantity,
  multiplyQuantities,
  powQuantity,
} from "../src/Quantity.js"
import { makeRational } from "../src/Rational.js"
import { unit } from "../src/Units.js"

// g = 4π² L / T² from one length and one period measurement.
const length = makeQuantity(0.995, 0.002, unit("m"))
const period = makeQuantity(2.003, 0.004, unit("s"))

const program = Effect.gen(function* () {
  const formatter = yield* QuantityFormatter
  const fourPiSquared = exactQuantity(4 * Math.PI * Math.PI)
  const gravity = divideQuantities(
    multiplyQuantities(fourPiSquared, length),
    powQuantity(period, makeRational(2)),
    "quadrature",
  )

  yield* Console.log(`L = ${yield* formatter.format(length)}`)
  yield* Console.log(`T = ${yield* formatter.format(period)}`)
  yield* Console.log(`g = ${yield* formatter.format(gravity)}`)
}).pipe(
  Effect.provide(
    QuantityFormatter.layerWith(new FormatOptions({ significantDigits: 1, leadingOneException: true })),
  ),
)

Effect.runPromise(program).catch((error) => {
  console.error("Failed to run pendulum example", error)
  process.exitCode = 1
})
