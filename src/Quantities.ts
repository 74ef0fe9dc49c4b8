/**
 * Quantity strings: `"<number> <unit>"`, e.g. `"5 km/s"` or
 * `"1e5 erg / (Angstrom cm2 s)"`.
 *
 * The parser only splits the string and reads the number; the unit is handed,
 * together with the value, to a {@link UnitResolver}. Whatever the resolver
 * rejects is reported as `MalformedQuantityError`, so callers see a single
 * error type at this boundary.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import { InvalidLinspaceError, MalformedQuantityError } from "./Errors.js"
import { makeQuantity, type Quantity } from "./internal/units/Quantity.js"
import {
  convertQuantityToUnits,
  type UnitDimensionMismatchError,
  type UnitNotFoundError,
  type UnitRegistry,
} from "./Units.js"

/**
 * Anything able to turn a value and a unit token into a quantity.
 * `UnitManagerService` is one.
 *
 * @category Quantities
 * @since 0.1.0
 */
export interface UnitResolver<Q, E = unknown> {
  readonly resolve: (value: number, unit: string) => Effect.Effect<Q, E>
}

const VALUE_AND_UNIT = /^(\S+)\s+(\S[\s\S]*)$/
const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/

/**
 * Parse a quantity string and delegate its unit to `resolver`.
 *
 * @category Quantities
 * @since 0.1.0
 * @example
 * ```ts
 * const manager = yield* UnitManager
 * const speed = yield* parseQuantity("5 km/s", manager)
 * speed.value // 5
 * speed.unit  // "km/s"
 * ```
 */
export const parseQuantity = <Q, E>(
  raw: unknown,
  resolver: UnitResolver<Q, E>,
): Effect.Effect<Q, MalformedQuantityError> => {
  if (typeof raw !== "string") {
    return Effect.fail(new MalformedQuantityError({ input: raw }))
  }
  const match = VALUE_AND_UNIT.exec(raw.trim())
  const valueToken = match?.[1]
  const unitToken = match?.[2]
  if (valueToken === undefined || unitToken === undefined || !DECIMAL.test(valueToken)) {
    return Effect.fail(new MalformedQuantityError({ input: raw }))
  }
  const value = Number(valueToken)
  if (!Number.isFinite(value)) {
    return Effect.fail(new MalformedQuantityError({ input: raw }))
  }
  return resolver.resolve(value, unitToken).pipe(
    Effect.tapError((cause) =>
      Effect.logDebug("Unit rejected by resolver").pipe(
        Effect.annotateLogs({ unit: unitToken, cause: String(cause) }),
      ),
    ),
    Effect.mapError(() => new MalformedQuantityError({ input: raw })),
  )
}

/**
 * `num` evenly spaced quantities from `start` to `stop` (inclusive unless
 * `endpoint` is false), all in the units of `start`.
 *
 * @category Quantities
 * @since 0.1.0
 */
export const quantityLinspace = (
  registry: UnitRegistry,
  start: Quantity,
  stop: Quantity,
  num: number,
  endpoint = true,
): Effect.Effect<
  ReadonlyArray<Quantity>,
  InvalidLinspaceError | UnitNotFoundError | UnitDimensionMismatchError
> =>
  Effect.gen(function* () {
    if (!Number.isInteger(num) || num < 1) {
      return yield* new InvalidLinspaceError({ num })
    }
    const converted = yield* convertQuantityToUnits(registry, stop, start.units)
    const divisions = endpoint ? num - 1 : num
    const step = divisions === 0 ? 0 : (converted.value - start.value) / divisions
    return Array.from({ length: num }, (_, index) =>
      makeQuantity(
        endpoint && divisions > 0 && index === divisions ? converted.value : start.value + index * step,
        start.units,
      ),
    )
  })
