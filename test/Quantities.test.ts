import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import { InvalidLinspaceError, MalformedQuantityError } from "../src/Errors.js"
import { makeQuantity } from "../src/internal/units/Quantity.js"
import { parseQuantity, quantityLinspace, type UnitResolver } from "../src/Quantities.js"
import {
  DEFAULT_UNIT_DEFINITIONS,
  UnitDimensionMismatchError,
  UnitManager,
  makeRegistry,
} from "../src/Units.js"

describe("parseQuantity", () => {
  it.effect("splits value and unit and resolves the unit", () =>
    Effect.gen(function* () {
      const manager = yield* UnitManager
      const speed = yield* parseQuantity("5 km/s", manager)
      expect(speed.value).toBe(5)
      expect(speed.unit).toBe("km/s")
      expect(speed.units).toEqual({ km: 1, s: -1 })
    }).pipe(Effect.provide(UnitManager.layer())),
  )

  it.effect("keeps compound unit tokens whole", () =>
    Effect.gen(function* () {
      const manager = yield* UnitManager
      const flux = yield* parseQuantity("  1e5 erg / (Angstrom cm2 s) ", manager)
      expect(flux.value).toBe(100000)
      expect(flux.unit).toBe("erg / (Angstrom cm2 s)")
      expect(flux.units).toEqual({ erg: 1, Angstrom: -1, cm: -2, s: -1 })
    }).pipe(Effect.provide(UnitManager.layer())),
  )

  it.effect("reads signed and fractional values", () =>
    Effect.gen(function* () {
      const manager = yield* UnitManager
      expect((yield* parseQuantity("-2.5 K", manager)).value).toBe(-2.5)
      expect((yield* parseQuantity(".5 Mpc", manager)).value).toBe(0.5)
    }).pipe(Effect.provide(UnitManager.layer())),
  )

  it.effect("rejects malformed strings", () =>
    Effect.gen(function* () {
      const manager = yield* UnitManager
      for (const input of ["abc", "5", "", "five km", "5km", "0x10 km", "1e999 km"]) {
        const error = yield* parseQuantity(input, manager).pipe(Effect.flip)
        expect(error).toBeInstanceOf(MalformedQuantityError)
        expect(error.input).toBe(input)
      }
    }).pipe(Effect.provide(UnitManager.layer())),
  )

  it.effect("rejects values that are not strings", () =>
    Effect.gen(function* () {
      const manager = yield* UnitManager
      const error = yield* parseQuantity(42, manager).pipe(Effect.flip)
      expect(error.input).toBe(42)
      expect(error.message).toBe('Expecting a quantity string (e.g. "5 km/s") - supplied 42')
    }).pipe(Effect.provide(UnitManager.layer())),
  )

  it.effect("reports units rejected by the resolver as malformed quantities", () =>
    Effect.gen(function* () {
      const manager = yield* UnitManager
      for (const input of ["5 furlongs", "5 km//s", "5 KM"]) {
        const error = yield* parseQuantity(input, manager).pipe(Effect.flip)
        expect(error).toBeInstanceOf(MalformedQuantityError)
        expect(error.input).toBe(input)
      }
    }).pipe(Effect.provide(UnitManager.layer())),
  )

  it.effect("rejects unknown units after the first term", () =>
    Effect.gen(function* () {
      const manager = yield* UnitManager
      for (const input of ["5 km furlong", "5 km/parsnip", "5 km constructor", "5 km/toString", "5 km/hasOwnProperty"]) {
        const error = yield* parseQuantity(input, manager).pipe(Effect.flip)
        expect(error).toBeInstanceOf(MalformedQuantityError)
        expect(error.input).toBe(input)
      }
    }).pipe(Effect.provide(UnitManager.layer())),
  )

  it.effect("delegates to any resolver", () =>
    Effect.gen(function* () {
      const tokens: UnitResolver<{ readonly value: number; readonly unit: string }, never> = {
        resolve: (value, unit) => Effect.succeed({ value, unit }),
      }
      expect(yield* parseQuantity("3 apples", tokens)).toEqual({ value: 3, unit: "apples" })

      const rejecting: UnitResolver<never, string> = {
        resolve: () => Effect.fail("no units here"),
      }
      const error = yield* parseQuantity("3 apples", rejecting).pipe(Effect.flip)
      expect(error).toBeInstanceOf(MalformedQuantityError)
    }),
  )
})

describe("quantityLinspace", () => {
  const registry = makeRegistry(DEFAULT_UNIT_DEFINITIONS)

  it.effect("spaces samples in the units of the start", () =>
    Effect.gen(function* () {
      const samples = yield* quantityLinspace(
        registry,
        makeQuantity(0, { km: 1 }),
        makeQuantity(1000, { m: 1 }),
        3,
      )
      expect(samples.map((sample) => sample.value)).toEqual([0, 0.5, 1])
      expect(samples.every((sample) => sample.units["km"] === 1)).toBe(true)
    }),
  )

  it.effect("can leave out the endpoint", () =>
    Effect.gen(function* () {
      const samples = yield* quantityLinspace(
        registry,
        makeQuantity(0, { km: 1 }),
        makeQuantity(1, { km: 1 }),
        4,
        false,
      )
      expect(samples.map((sample) => sample.value)).toEqual([0, 0.25, 0.5, 0.75])
    }),
  )

  it.effect("returns only the start for a single sample", () =>
    Effect.gen(function* () {
      const samples = yield* quantityLinspace(
        registry,
        makeQuantity(7, { s: 1 }),
        makeQuantity(9, { s: 1 }),
        1,
      )
      expect(samples.map((sample) => sample.value)).toEqual([7])
    }),
  )

  it.effect("rejects sample counts below one", () =>
    Effect.gen(function* () {
      const error = yield* quantityLinspace(
        registry,
        makeQuantity(0, { s: 1 }),
        makeQuantity(1, { s: 1 }),
        0,
      ).pipe(Effect.flip)
      expect(error).toBeInstanceOf(InvalidLinspaceError)
    }),
  )

  it.effect("rejects endpoints of different dimensions", () =>
    Effect.gen(function* () {
      const error = yield* quantityLinspace(
        registry,
        makeQuantity(0, { km: 1 }),
        makeQuantity(1, { s: 1 }),
        2,
      ).pipe(Effect.flip)
      expect(error).toBeInstanceOf(UnitDimensionMismatchError)
    }),
  )
})
