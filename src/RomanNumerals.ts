/**
 * Roman numeral codec for ionization stages.
 *
 * Only canonical subtractive forms in `[1, 3999]` are accepted: decoding
 * re-encodes its result and requires an exact match with the (uppercased)
 * input, so "IIII", "IL" or "VVVIV" fail rather than being normalized.
 *
 * @since 0.1.0
 */

import { Effect, Either } from "effect"
import { InvalidNumeralError, OutOfRangeError } from "./Errors.js"

const ROMAN_PAIRS: ReadonlyArray<readonly [value: number, numeral: string]> = [
  [1000, "M"],
  [900, "CM"],
  [500, "D"],
  [400, "CD"],
  [100, "C"],
  [90, "XC"],
  [50, "L"],
  [40, "XL"],
  [10, "X"],
  [9, "IX"],
  [5, "V"],
  [4, "IV"],
  [1, "I"],
]

const FACE_VALUES: Readonly<Record<string, number>> = {
  M: 1000,
  D: 500,
  C: 100,
  L: 50,
  X: 10,
  V: 5,
  I: 1,
}

const ROMAN_CHARACTERS = /^[MDCLXVI]+$/

const isEncodable = (value: number): boolean =>
  Number.isInteger(value) && value > 0 && value < 4000

const unsafeEncode = (value: number): string => {
  let remaining = value
  let result = ""
  for (const [pairValue, numeral] of ROMAN_PAIRS) {
    const count = Math.floor(remaining / pairValue)
    result += numeral.repeat(count)
    remaining -= pairValue * count
  }
  return result
}

const signedSum = (upper: string): number => {
  let total = 0
  for (let index = 0; index < upper.length; index++) {
    const value = FACE_VALUES[upper.charAt(index)] ?? 0
    const next = FACE_VALUES[upper.charAt(index + 1)] ?? 0
    total += next > value ? -value : value
  }
  return total
}

/**
 * Encode an integer as a canonical roman numeral.
 *
 * @category Codec
 * @since 0.1.0
 * @example
 * ```ts
 * Effect.runSync(encodeRoman(1999)) // "MCMXCIX"
 * ```
 */
export const encodeRoman = (value: number): Effect.Effect<string, OutOfRangeError> =>
  isEncodable(value)
    ? Effect.succeed(unsafeEncode(value))
    : Effect.fail(new OutOfRangeError({ value }))

/**
 * Decode a canonical roman numeral (any letter case) into an integer.
 *
 * @category Codec
 * @since 0.1.0
 */
export const decodeRoman = (input: string): Effect.Effect<number, InvalidNumeralError> =>
  Either.match(decodeRomanEither(input), {
    onLeft: Effect.fail,
    onRight: Effect.succeed,
  })

/**
 * Synchronous variant of {@link decodeRoman}, used where a parser needs to
 * try the numeral reading before an alternative one.
 *
 * @category Codec
 * @since 0.1.0
 */
export const decodeRomanEither = (input: string): Either.Either<number, InvalidNumeralError> => {
  const upper = input.toUpperCase()
  if (!ROMAN_CHARACTERS.test(upper)) {
    return Either.left(new InvalidNumeralError({ input }))
  }
  const total = signedSum(upper)
  return isEncodable(total) && unsafeEncode(total) === upper
    ? Either.right(total)
    : Either.left(new InvalidNumeralError({ input }))
}

/**
 * @category Predicates
 * @since 0.1.0
 */
export const isRomanNumeral = (input: string): boolean => Either.isRight(decodeRomanEither(input))
