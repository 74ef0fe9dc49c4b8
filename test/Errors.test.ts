import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import {
  ElementDataError,
  InvalidLinspaceError,
  InvalidNumeralError,
  IonizationOutOfRangeError,
  MalformedQuantityError,
  MalformedSpeciesError,
  OutOfRangeError,
  UnknownAtomicNumberError,
  UnknownElementSymbolError,
  type NotationError,
} from "../src/Errors.js"

describe("Notation error hierarchy", () => {
  it("formats roman numeral errors", () => {
    expect(new OutOfRangeError({ value: 4000 }).message).toBe(
      "Argument must be an integer between 1 and 3999 - supplied 4000",
    )
    expect(new InvalidNumeralError({ input: "IIII" }).message).toBe(
      "Input is not a valid roman numeral: IIII",
    )
  })

  it("formats element errors", () => {
    expect(new UnknownElementSymbolError({ input: "Xx" }).message).toBe(
      "Expecting an atomic symbol (e.g. Fe) - supplied Xx",
    )
    expect(new UnknownAtomicNumberError({ atomicNumber: 150 }).message).toBe(
      "No element registered for atomic number 150",
    )
    expect(new ElementDataError({ source: "table.json", reason: "not an array" }).message).toBe(
      "Invalid element table table.json: not an array",
    )
  })

  it("formats species errors", () => {
    expect(new MalformedSpeciesError({ input: "Si", reason: "missing stage" }).message).toBe(
      'Expecting a species notation (e.g. "Si 2", "Si II", "Fe IV") - supplied Si: missing stage',
    )
    expect(
      new IonizationOutOfRangeError({ input: "Fe 99", atomicNumber: 26, ionizationStage: 99 }).message,
    ).toBe('Species "Fe 99" does not exist: ionization stage 99 must be between 1 and 26')
  })

  it("formats quantity errors", () => {
    expect(new MalformedQuantityError({ input: "abc" }).message).toBe(
      'Expecting a quantity string (e.g. "5 km/s") - supplied abc',
    )
    expect(new MalformedQuantityError({ input: null }).message).toBe(
      'Expecting a quantity string (e.g. "5 km/s") - supplied null',
    )
    expect(new InvalidLinspaceError({ num: 0 }).message).toBe(
      "Number of samples must be a positive integer - supplied 0",
    )
  })

  it.effect("supports catchTag on IonizationOutOfRangeError", () =>
    Effect.gen(function* () {
      const failure: Effect.Effect<string, NotationError> = Effect.fail(
        new IonizationOutOfRangeError({ input: "He 3", atomicNumber: 2, ionizationStage: 3 }),
      )
      const handled = yield* failure.pipe(
        Effect.catchTag("IonizationOutOfRangeError", (error) => {
          expect(error.input).toBe("He 3")
          expect(error.atomicNumber).toBe(2)
          expect(error.ionizationStage).toBe(3)
          return Effect.succeed("handled")
        }),
        Effect.catchAll(() => Effect.succeed("unexpected")),
      )

      expect(handled).toBe("handled")
    }),
  )

  it.effect("supports catchTag on MalformedQuantityError", () =>
    Effect.gen(function* () {
      const handled = yield* Effect.fail(new MalformedQuantityError({ input: 42 })).pipe(
        Effect.catchTag("MalformedQuantityError", (error) => Effect.succeed(error.input)),
      )

      expect(handled).toBe(42)
    }),
  )
})
