/**
 * Type Foundations & Branded Identifiers
 *
 * Atomic numbers, ion numbers and ionization stages are all plain integers at
 * runtime; brands keep a zero-based ion number from being passed where a
 * one-based ionization stage is expected.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"

/**
 * Highest atomic number of a named element.
 *
 * @since 0.1.0
 * @category Constants
 */
export const MAX_ATOMIC_NUMBER = 118

/**
 * Branded atomic number in `[1, 118]`.
 *
 * @since 0.1.0
 * @category IDs
 */
export const AtomicNumber = Schema.Int.pipe(
  Schema.between(1, MAX_ATOMIC_NUMBER),
  Schema.brand("AtomicNumber"),
)

/**
 * Type extracted from AtomicNumber schema
 *
 * @since 0.1.0
 * @category IDs
 */
export type AtomicNumber = typeof AtomicNumber.Type

/**
 * Branded zero-based ionization index (0 = neutral atom).
 *
 * @since 0.1.0
 * @category IDs
 */
export const IonNumber = Schema.Int.pipe(Schema.nonNegative(), Schema.brand("IonNumber"))

/**
 * Type extracted from IonNumber schema
 *
 * @since 0.1.0
 * @category IDs
 */
export type IonNumber = typeof IonNumber.Type

/**
 * Branded one-based ionization stage (1 = neutral, rendered "I").
 *
 * @since 0.1.0
 * @category IDs
 */
export const IonizationStage = Schema.Int.pipe(
  Schema.greaterThanOrEqualTo(1),
  Schema.brand("IonizationStage"),
)

/**
 * Type extracted from IonizationStage schema
 *
 * @since 0.1.0
 * @category IDs
 */
export type IonizationStage = typeof IonizationStage.Type

/**
 * Structural shape of a species identifier. `formatSpecies` accepts anything
 * of this shape, so identifiers built outside this package can still be
 * rendered.
 *
 * @since 0.1.0
 * @category Species
 */
export interface SpeciesTuple {
  readonly atomicNumber: number
  readonly ionNumber: number
}

/**
 * Canonical species identifier: `(atomicNumber, ionNumber)` with
 * `0 <= ionNumber < atomicNumber`. Display strings are derived from it,
 * never stored.
 *
 * @since 0.1.0
 * @category Species
 * @example
 * ```ts
 * const siII = new SpeciesId({
 *   atomicNumber: AtomicNumber.make(14),
 *   ionNumber: IonNumber.make(1),
 * })
 * ```
 */
export class SpeciesId extends Schema.Class<SpeciesId>("SpeciesId")(
  Schema.Struct({
    atomicNumber: AtomicNumber,
    ionNumber: IonNumber,
  }).pipe(
    Schema.filter(({ atomicNumber, ionNumber }) =>
      ionNumber < atomicNumber
        ? undefined
        : `ion number ${ionNumber} must be smaller than atomic number ${atomicNumber}`,
    ),
  ),
) {
  /**
   * One-based ionization stage of this species.
   */
  get ionizationStage(): IonizationStage {
    return IonizationStage.make(this.ionNumber + 1)
  }

  /**
   * Plain `[atomicNumber, ionNumber]` pair, e.g. for use as a map key.
   */
  toTuple(): readonly [number, number] {
    return [this.atomicNumber, this.ionNumber]
  }
}
