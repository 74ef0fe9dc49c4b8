/**
 * @since 0.1.0
 */
export * from "./Errors.js"
export * from "./Types.js"
export * from "./RomanNumerals.js"
export * from "./Elements.js"
export * from "./Species.js"
export * from "./Abundances.js"
export * from "./Radiation.js"
export * from "./Quantities.js"
export * from "./Units.js"
export * from "./Notation.js"
export * from "./Paths.js"
