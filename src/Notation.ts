/**
 * Notation service: the caller-facing operations with the element table and
 * the unit resolver already wired in.
 *
 * @since 0.1.0
 */

import { Context, Effect, Layer } from "effect"
import { type AbundanceTable, abundanceColumns, readAbundanceTable } from "./Abundances.js"
import { ElementTable, elementNumberToSymbol, elementSymbolToNumber } from "./Elements.js"
import type {
  AbundanceTableError,
  InvalidNumeralError,
  IonizationOutOfRangeError,
  MalformedQuantityError,
  OutOfRangeError,
  SpeciesError,
  UnknownAtomicNumberError,
  UnknownElementSymbolError,
} from "./Errors.js"
import type { Measurement } from "./internal/units/Quantity.js"
import { parseQuantity } from "./Quantities.js"
import { decodeRoman, encodeRoman } from "./RomanNumerals.js"
import { formatSpecies, parseSpecies } from "./Species.js"
import type { AtomicNumber, SpeciesId, SpeciesTuple } from "./Types.js"
import { UnitManager } from "./Units.js"

export interface NotationService {
  readonly encodeRoman: (value: number) => Effect.Effect<string, OutOfRangeError>
  readonly decodeRoman: (input: string) => Effect.Effect<number, InvalidNumeralError>
  readonly elementSymbolToNumber: (symbol: string) => Effect.Effect<AtomicNumber, UnknownElementSymbolError>
  readonly elementNumberToSymbol: (atomicNumber: number) => Effect.Effect<string, UnknownAtomicNumberError>
  readonly parseSpecies: (input: string) => Effect.Effect<SpeciesId, SpeciesError>
  readonly formatSpecies: (
    species: SpeciesTuple,
    useRoman?: boolean,
  ) => Effect.Effect<string, UnknownAtomicNumberError | IonizationOutOfRangeError>
  readonly parseQuantity: (input: unknown) => Effect.Effect<Measurement, MalformedQuantityError>
  readonly abundanceColumns: (count: number) => Effect.Effect<ReadonlyArray<string>, UnknownAtomicNumberError>
  readonly readAbundanceTable: (
    path: string,
  ) => Effect.Effect<AbundanceTable, AbundanceTableError | UnknownAtomicNumberError>
}

const makeNotation = Effect.gen(function* () {
  const registry = yield* ElementTable
  const units = yield* UnitManager

  const service: NotationService = {
    encodeRoman,
    decodeRoman,
    elementSymbolToNumber: (symbol) => elementSymbolToNumber(registry, symbol),
    elementNumberToSymbol: (atomicNumber) => elementNumberToSymbol(registry, atomicNumber),
    parseSpecies: (input) => parseSpecies(registry, input),
    formatSpecies: (species, useRoman = true) => formatSpecies(registry, species, useRoman),
    parseQuantity: (input) => parseQuantity(input, units),
    abundanceColumns: (count) => abundanceColumns(registry, count),
    readAbundanceTable: (path) => readAbundanceTable(registry, path),
  }
  return service
})

export class Notation extends Context.Tag("species-notation/Notation")<
  Notation,
  NotationService
>() {
  /**
   * Requires `ElementTable` and `UnitManager`.
   */
  static readonly layerWithoutDependencies = Layer.effect(this, makeNotation)

  /**
   * Bundled element table and default units.
   */
  static readonly layer = Layer.effect(this, makeNotation).pipe(
    Layer.provide(Layer.merge(ElementTable.layer, UnitManager.layer())),
  )
}
