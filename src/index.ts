/**
 * @since 0.1.0
 */
export * from "./Errors.js"
export * from "./Rational.js"
export * from "./Units.js"
export * from "./Quantity.js"
export * from "./Format.js"
