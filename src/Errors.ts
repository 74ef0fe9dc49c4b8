/**
 * Notation error taxonomy.
 *
 * Every failure raised while parsing or rendering species notation is a
 * tagged error so callers can pattern match with `Effect.catchTag`. Each one
 * carries the offending input verbatim; messages stay human-readable for
 * logs while the fields remain available for programmatic handling.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * Raised when an integer cannot be written as a roman numeral (outside
 * `[1, 3999]` or not an integer).
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * yield* Effect.fail(new OutOfRangeError({ value: 4000 }))
 * ```
 */
export class OutOfRangeError extends Data.TaggedError("OutOfRangeError")<{
  readonly value: number
}> {
  override get message(): string {
    return `Argument must be an integer between 1 and 3999 - supplied ${this.value}`
  }
}

/**
 * Raised when a string is not a canonical roman numeral.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InvalidNumeralError extends Data.TaggedError("InvalidNumeralError")<{
  readonly input: string
}> {
  override get message(): string {
    return `Input is not a valid roman numeral: ${this.input}`
  }
}

/**
 * Raised when a (normalized) element symbol is absent from the registry.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnknownElementSymbolError extends Data.TaggedError("UnknownElementSymbolError")<{
  readonly input: string
}> {
  override get message(): string {
    return `Expecting an atomic symbol (e.g. Fe) - supplied ${this.input}`
  }
}

/**
 * Raised when an atomic number has no registered symbol.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnknownAtomicNumberError extends Data.TaggedError("UnknownAtomicNumberError")<{
  readonly atomicNumber: number
}> {
  override get message(): string {
    return `No element registered for atomic number ${this.atomicNumber}`
  }
}

/**
 * Raised when a species string matches neither accepted grammar, or when its
 * ionization token is neither a roman numeral nor a plain integer.
 *
 * @category Errors
 * @since 0.1.0
 */
export class MalformedSpeciesError extends Data.TaggedError("MalformedSpeciesError")<{
  readonly input: string
  readonly reason: string
}> {
  override get message(): string {
    return `Expecting a species notation (e.g. "Si 2", "Si II", "Fe IV") - supplied ${this.input}: ${this.reason}`
  }
}

/**
 * Raised when the ionization stage is non-positive or exceeds the atomic
 * number of the element.
 *
 * @category Errors
 * @since 0.1.0
 */
export class IonizationOutOfRangeError extends Data.TaggedError("IonizationOutOfRangeError")<{
  readonly input: string
  readonly atomicNumber: number
  readonly ionizationStage: number
}> {
  override get message(): string {
    return `Species "${this.input}" does not exist: ionization stage ${this.ionizationStage} must be between 1 and ${this.atomicNumber}`
  }
}

/**
 * Raised when a value is not a `"<number> <unit>"` quantity string. `input`
 * is whatever the caller supplied, string or not.
 *
 * @category Errors
 * @since 0.1.0
 */
export class MalformedQuantityError extends Data.TaggedError("MalformedQuantityError")<{
  readonly input: unknown
}> {
  override get message(): string {
    return `Expecting a quantity string (e.g. "5 km/s") - supplied ${String(this.input)}`
  }
}

/**
 * Raised when the element table source cannot be read, decoded, or violates
 * the one-symbol-per-number invariant.
 *
 * @category Errors
 * @since 0.1.0
 */
export class ElementDataError extends Data.TaggedError("ElementDataError")<{
  readonly source: string
  readonly reason: string
}> {
  override get message(): string {
    return `Invalid element table ${this.source}: ${this.reason}`
  }
}

/**
 * Raised when an abundance table cannot be read or one of its rows is not a
 * shell index followed by numeric abundances.
 *
 * @category Errors
 * @since 0.1.0
 */
export class AbundanceTableError extends Data.TaggedError("AbundanceTableError")<{
  readonly source: string
  readonly reason: string
}> {
  override get message(): string {
    return `Invalid abundance table ${this.source}: ${this.reason}`
  }
}

/**
 * Raised when `quantityLinspace` is asked for a sample count that is not a
 * positive integer.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InvalidLinspaceError extends Data.TaggedError("InvalidLinspaceError")<{
  readonly num: number
}> {
  override get message(): string {
    return `Number of samples must be a positive integer - supplied ${this.num}`
  }
}

/**
 * @category Errors
 * @since 0.1.0
 */
export type RomanNumeralError = OutOfRangeError | InvalidNumeralError

/**
 * Failures of `parseSpecies`.
 *
 * @category Errors
 * @since 0.1.0
 */
export type SpeciesError =
  | MalformedSpeciesError
  | UnknownElementSymbolError
  | IonizationOutOfRangeError

/**
 * Union of every error the notation engine itself can raise.
 *
 * @category Errors
 * @since 0.1.0
 */
export type NotationError =
  | RomanNumeralError
  | SpeciesError
  | UnknownAtomicNumberError
  | MalformedQuantityError
  | AbundanceTableError
