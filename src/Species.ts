/**
 * Species notation: "Si II", "Si 2" and "Si2" all name singly ionized
 * silicon, `SpeciesId(14, 1)`.
 *
 * Parsing accepts two shapes, `<symbol><digits>` (with optional whitespace in
 * between) and `<symbol> <token>` where the token is a roman numeral or a
 * plain integer. The ionization token is read as a roman numeral first, so an
 * ambiguous token such as "IV" is always 4.
 *
 * @since 0.1.0
 */

import { Effect, Either, Option } from "effect"
import { type ElementRegistry, elementNumberToSymbol, elementSymbolToNumber } from "./Elements.js"
import {
  IonizationOutOfRangeError,
  MalformedSpeciesError,
  type SpeciesError,
  type UnknownAtomicNumberError,
} from "./Errors.js"
import { decodeRomanEither, encodeRoman } from "./RomanNumerals.js"
import { IonNumber, SpeciesId, type SpeciesTuple } from "./Types.js"

/**
 * How the ionization stage was written.
 *
 * @category Species
 * @since 0.1.0
 */
export type IonizationToken =
  | { readonly _tag: "Roman"; readonly token: string; readonly stage: number }
  | { readonly _tag: "Arabic"; readonly token: string; readonly stage: number }

const SYMBOL_THEN_DIGITS = /^([A-Za-z]+)\s*(\d+)$/
const DIGITS = /^\d+$/

const splitSpecies = (raw: string): Option.Option<readonly [symbol: string, ionization: string]> => {
  const trimmed = raw.trim()
  const match = SYMBOL_THEN_DIGITS.exec(trimmed)
  const symbol = match?.[1]
  const digits = match?.[2]
  if (symbol !== undefined && digits !== undefined) {
    return Option.some([symbol, digits] as const)
  }
  const parts = trimmed.split(/\s+/)
  const [first, second] = parts
  return parts.length === 2 && first && second ? Option.some([first, second] as const) : Option.none()
}

/**
 * Read an ionization token, roman numeral first and plain integer second.
 *
 * @category Species
 * @since 0.1.0
 */
export const readIonizationToken = (token: string): Option.Option<IonizationToken> => {
  const roman = decodeRomanEither(token)
  if (Either.isRight(roman)) {
    return Option.some<IonizationToken>({ _tag: "Roman", token, stage: roman.right })
  }
  return DIGITS.test(token)
    ? Option.some<IonizationToken>({ _tag: "Arabic", token, stage: Number(token) })
    : Option.none()
}

/**
 * Parse a species string into its canonical identifier.
 *
 * @category Species
 * @since 0.1.0
 * @example
 * ```ts
 * const siII = yield* parseSpecies(registry, "Si II")
 * siII.toTuple() // [14, 1]
 * ```
 */
export const parseSpecies = (
  registry: ElementRegistry,
  raw: string,
): Effect.Effect<SpeciesId, SpeciesError> =>
  Effect.gen(function* () {
    const split = splitSpecies(raw)
    if (Option.isNone(split)) {
      return yield* new MalformedSpeciesError({
        input: raw,
        reason: "not of format <element_symbol><number> (e.g. Fe 2, Fe2, Fe II)",
      })
    }
    const [symbolToken, ionizationToken] = split.value
    const atomicNumber = yield* elementSymbolToNumber(registry, symbolToken)

    const ionization = readIonizationToken(ionizationToken)
    if (Option.isNone(ionization)) {
      return yield* new MalformedSpeciesError({
        input: raw,
        reason: `ion number "${ionizationToken}" could not be parsed`,
      })
    }

    const stage = ionization.value.stage
    if (stage < 1 || stage > atomicNumber) {
      return yield* new IonizationOutOfRangeError({ input: raw, atomicNumber, ionizationStage: stage })
    }
    return new SpeciesId({ atomicNumber, ionNumber: IonNumber.make(stage - 1) })
  })

/**
 * Render a species as `"<symbol> <stage>"`, the stage being `ionNumber + 1`
 * written as a roman numeral (default) or a decimal integer. Identifiers
 * whose ion number is not an integer in `[0, atomicNumber)` fail in both
 * renderings, since neither would parse back.
 *
 * @category Species
 * @since 0.1.0
 * @example
 * ```ts
 * yield* formatSpecies(registry, siII)        // "Si II"
 * yield* formatSpecies(registry, siII, false) // "Si 2"
 * ```
 */
export const formatSpecies = (
  registry: ElementRegistry,
  species: SpeciesTuple,
  useRoman = true,
): Effect.Effect<string, UnknownAtomicNumberError | IonizationOutOfRangeError> =>
  Effect.gen(function* () {
    const symbol = yield* elementNumberToSymbol(registry, species.atomicNumber)
    const stage = species.ionNumber + 1
    if (!Number.isInteger(stage) || stage < 1 || stage > species.atomicNumber) {
      return yield* new IonizationOutOfRangeError({
        input: `${symbol} ${stage}`,
        atomicNumber: species.atomicNumber,
        ionizationStage: stage,
      })
    }
    // stage is at most 118 here
    const rendered = useRoman ? yield* Effect.orDie(encodeRoman(stage)) : String(stage)
    return `${symbol} ${rendered}`
  })
