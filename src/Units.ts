/**
 * Units module providing schema-backed definitions and explicit conversion helpers.
 *
 * This is the measurement component that quantity strings are handed to: the
 * registry keeps track of symbolic unit definitions, their canonical
 * dimensions, and scaling factors relative to the SI base unit of that
 * dimension. Unit expressions (`km/s`, `erg / (Angstrom cm2 s)`) are parsed
 * into unit maps and checked against the registry. Symbols are case-sensitive,
 * so `Mpc` and `mpc` are different units.
 *
 * @since 0.1.0
 */

import { Context, Data, Effect, Layer, Ref, Schema } from "effect"
import { UnitSyntaxError } from "./internal/units/errors.js"
import {
  type Measurement,
  type Quantity,
  type UnitMap,
  makeMeasurement,
  makeQuantity,
} from "./internal/units/Quantity.js"
import { parseUnitExpression } from "./internal/units/UnitParser.js"

export { UnitSyntaxError }
export type { Measurement, Quantity, UnitMap }

/**
 * Canonical representation of the dimension for a unit: keys are dimension names,
 * values are exponents (e.g. `{ mass: 1 }`, `{ length: 1, time: -2 }`).
 *
 * @since 0.1.0
 */
export type DimensionMap = Readonly<Record<string, number>>

const DimensionMapSchema = Schema.Record({
  key: Schema.String,
  value: Schema.Number,
})

const normalizeSymbol = (symbol: string): string => symbol.trim()

const lookupTables = new WeakMap<UnitRegistry, ReadonlyMap<string, UnitDefinition>>()

/**
 * Declarative unit definition describing how a symbol relates to a canonical
 * dimension and base scaling factor.
 *
 * @since 0.1.0
 */
export class UnitDefinition extends Schema.Class<UnitDefinition>("UnitDefinition")({
  symbol: Schema.NonEmptyTrimmedString,
  aliases: Schema.optional(Schema.Array(Schema.NonEmptyTrimmedString)),
  dimension: DimensionMapSchema,
  factor: Schema.Number.pipe(Schema.greaterThan(0)),
  description: Schema.optional(Schema.String),
}) {}

/**
 * Aggregate registry holding all known unit definitions.
 *
 * @since 0.1.0
 */
export class UnitRegistry extends Schema.Class<UnitRegistry>("UnitRegistry")({
  units: Schema.Array(UnitDefinition),
}) {
  /**
   * Convert the registry into a lookup map keyed by unit symbol and alias.
   * Later definitions shadow earlier ones.
   */
  toMap(): ReadonlyMap<string, UnitDefinition> {
    const cached = lookupTables.get(this)
    if (cached) {
      return cached
    }
    const table = new Map(
      this.units.flatMap((definition) =>
        [definition.symbol, ...(definition.aliases ?? [])].map(
          (symbol) => [normalizeSymbol(symbol), definition] as const,
        ),
      ),
    )
    lookupTables.set(this, table)
    return table
  }
}

/**
 * Raised when a requested unit symbol does not exist within the registry.
 *
 * @since 0.1.0
 */
export class UnitNotFoundError extends Data.TaggedError("UnitNotFoundError")<{
  readonly symbol: string
}> {
  override get message(): string {
    return `Unknown unit symbol "${this.symbol}"`
  }
}

/**
 * Raised when two unit expressions are incompatible (mismatched dimensions).
 *
 * @since 0.1.0
 */
export class UnitDimensionMismatchError extends Data.TaggedError("UnitDimensionMismatchError")<{
  readonly from: string
  readonly to: string
  readonly fromDimension: DimensionMap
  readonly toDimension: DimensionMap
}> {
  override get message(): string {
    return `Cannot convert ${this.from} to ${this.to}: dimensions do not match`
  }
}

/**
 * Scale and dimension of a (possibly composite) unit map.
 *
 * @since 0.1.0
 */
export interface ResolvedUnit {
  readonly factor: number
  readonly dimension: DimensionMap
}

const dimensionKey = (dimension: DimensionMap): string =>
  Object.entries(dimension)
    .filter(([, exponent]) => Math.abs(exponent) > 1e-12)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, exponent]) => `${name}:${exponent}`)
    .join("|")

const lookupUnit = (
  registry: UnitRegistry,
  symbol: string,
): Effect.Effect<UnitDefinition, UnitNotFoundError> => {
  const definition = registry.toMap().get(normalizeSymbol(symbol))
  return definition
    ? Effect.succeed(definition)
    : Effect.fail(new UnitNotFoundError({ symbol }))
}

/**
 * Parse a unit expression into a unit map.
 *
 * @category Parsing
 * @since 0.1.0
 */
export const parseUnits = (expression: string): Effect.Effect<UnitMap, UnitSyntaxError> =>
  Effect.try({
    try: () => parseUnitExpression(expression),
    catch: (error) =>
      error instanceof UnitSyntaxError
        ? error
        : new UnitSyntaxError({
            expression,
            column: 1,
            snippet: expression,
            problem: error instanceof Error ? error.message : String(error),
          }),
  })

/**
 * Combine the definitions of every symbol in a unit map into one scale factor
 * and dimension.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const resolveUnitMap = (
  registry: UnitRegistry,
  units: UnitMap,
): Effect.Effect<ResolvedUnit, UnitNotFoundError> =>
  Effect.gen(function* () {
    let factor = 1
    const dimension: Record<string, number> = Object.create(null)
    for (const [symbol, exponent] of Object.entries(units)) {
      const definition = yield* lookupUnit(registry, symbol)
      factor *= Math.pow(definition.factor, exponent)
      for (const [name, power] of Object.entries(definition.dimension)) {
        dimension[name] = (dimension[name] ?? 0) + power * exponent
      }
    }
    return { factor, dimension }
  })

const resolveExpression = (
  registry: UnitRegistry,
  expression: string,
): Effect.Effect<readonly [UnitMap, ResolvedUnit], UnitNotFoundError | UnitSyntaxError> =>
  Effect.gen(function* () {
    const units = yield* parseUnits(expression)
    const resolved = yield* resolveUnitMap(registry, units)
    return [units, resolved] as const
  })

const ensureSameDimension = (
  from: string,
  to: string,
  fromUnit: ResolvedUnit,
  toUnit: ResolvedUnit,
): Effect.Effect<void, UnitDimensionMismatchError> =>
  dimensionKey(fromUnit.dimension) === dimensionKey(toUnit.dimension)
    ? Effect.void
    : Effect.fail(
        new UnitDimensionMismatchError({
          from,
          to,
          fromDimension: fromUnit.dimension,
          toDimension: toUnit.dimension,
        }),
      )

const renderUnits = (units: UnitMap): string =>
  Object.entries(units)
    .map(([symbol, exponent]) => (exponent === 1 ? symbol : `${symbol}^${exponent}`))
    .join(" ")

/**
 * Register a set of unit definitions into a registry.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeRegistry = (
  definitions: ReadonlyArray<UnitDefinition>,
): UnitRegistry => new UnitRegistry({ units: [...definitions] })

/**
 * Append additional unit definitions to an existing registry.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const extendRegistry = (
  registry: UnitRegistry,
  definitions: ReadonlyArray<UnitDefinition>,
): UnitRegistry =>
  new UnitRegistry({ units: [...registry.units, ...definitions] })

/**
 * Explicitly convert a scalar value from one unit expression to another of
 * the same dimension.
 *
 * @category Conversions
 * @since 0.1.0
 * @example
 * ```ts
 * yield* convertValue(registry, 1, "km/s", "cm/s") // 100000
 * ```
 */
export const convertValue = (
  registry: UnitRegistry,
  value: number,
  fromUnit: string,
  toUnit: string,
): Effect.Effect<number, UnitNotFoundError | UnitDimensionMismatchError | UnitSyntaxError> =>
  Effect.gen(function* () {
    const [, from] = yield* resolveExpression(registry, fromUnit)
    const [, to] = yield* resolveExpression(registry, toUnit)
    yield* ensureSameDimension(fromUnit, toUnit, from, to)
    return (value * from.factor) / to.factor
  })

/**
 * Convert a quantity to the given unit map.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const convertQuantityToUnits = (
  registry: UnitRegistry,
  quantity: Quantity,
  units: UnitMap,
): Effect.Effect<Quantity, UnitNotFoundError | UnitDimensionMismatchError> =>
  Effect.gen(function* () {
    const from = yield* resolveUnitMap(registry, quantity.units)
    const to = yield* resolveUnitMap(registry, units)
    yield* ensureSameDimension(renderUnits(quantity.units), renderUnits(units), from, to)
    return makeQuantity((quantity.value * from.factor) / to.factor, units)
  })

/**
 * Convert a quantity to the given unit expression.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const convertQuantity = (
  registry: UnitRegistry,
  quantity: Quantity,
  toUnit: string,
): Effect.Effect<Quantity, UnitNotFoundError | UnitDimensionMismatchError | UnitSyntaxError> =>
  Effect.flatMap(parseUnits(toUnit), (units) => convertQuantityToUnits(registry, quantity, units))

/**
 * Construct a measurement for a value expressed in the given unit expression,
 * failing when the expression does not parse or names an unknown unit.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const quantityFromUnit = (
  registry: UnitRegistry,
  value: number,
  unit: string,
): Effect.Effect<Measurement, UnitNotFoundError | UnitSyntaxError> =>
  Effect.map(resolveExpression(registry, unit), ([units]) => makeMeasurement(value, unit, units))

export interface UnitManagerService {
  readonly register: (definitions: ReadonlyArray<UnitDefinition>) => Effect.Effect<UnitRegistry, never>
  readonly registry: Effect.Effect<UnitRegistry>
  readonly find: (symbol: string) => Effect.Effect<UnitDefinition, UnitNotFoundError>
  readonly ensureUnitMap: (units: UnitMap) => Effect.Effect<void, UnitNotFoundError>
  readonly convertValue: (
    value: number,
    fromUnit: string,
    toUnit: string,
  ) => Effect.Effect<number, UnitNotFoundError | UnitDimensionMismatchError | UnitSyntaxError>
  readonly convertQuantity: (
    quantity: Quantity,
    toUnit: string,
  ) => Effect.Effect<Quantity, UnitNotFoundError | UnitDimensionMismatchError | UnitSyntaxError>
  /**
   * Unit resolver handed to `parseQuantity`.
   */
  readonly resolve: (
    value: number,
    unit: string,
  ) => Effect.Effect<Measurement, UnitNotFoundError | UnitSyntaxError>
}

const defineUnit = (
  symbol: string,
  dimension: DimensionMap,
  factor: number,
  description: string,
  aliases?: ReadonlyArray<string>,
): UnitDefinition =>
  new UnitDefinition({ symbol, dimension, factor, description, ...(aliases ? { aliases } : {}) })

/**
 * Units available without registration. Factors are relative to SI base units.
 *
 * @since 0.1.0
 */
export const DEFAULT_UNIT_DEFINITIONS: ReadonlyArray<UnitDefinition> = [
  defineUnit("m", { length: 1 }, 1, "Metre"),
  defineUnit("cm", { length: 1 }, 1e-2, "Centimetre"),
  defineUnit("km", { length: 1 }, 1e3, "Kilometre"),
  defineUnit("nm", { length: 1 }, 1e-9, "Nanometre"),
  defineUnit("um", { length: 1 }, 1e-6, "Micrometre", ["micron"]),
  defineUnit("Angstrom", { length: 1 }, 1e-10, "Angstrom", ["angstrom", "AA"]),
  defineUnit("au", { length: 1 }, 1.495978707e11, "Astronomical unit", ["AU"]),
  defineUnit("pc", { length: 1 }, 3.0856775814913673e16, "Parsec"),
  defineUnit("kpc", { length: 1 }, 3.0856775814913673e19, "Kiloparsec"),
  defineUnit("Mpc", { length: 1 }, 3.0856775814913673e22, "Megaparsec"),
  defineUnit("Rsun", { length: 1 }, 6.957e8, "Nominal solar radius"),
  defineUnit("s", { time: 1 }, 1, "Second"),
  defineUnit("h", { time: 1 }, 3600, "Hour", ["hour"]),
  defineUnit("d", { time: 1 }, 86400, "Day", ["day"]),
  defineUnit("yr", { time: 1 }, 31557600, "Julian year", ["year"]),
  defineUnit("g", { mass: 1 }, 1e-3, "Gram"),
  defineUnit("kg", { mass: 1 }, 1, "Kilogram"),
  defineUnit("Msun", { mass: 1 }, 1.988409870698051e30, "Solar mass"),
  defineUnit("J", { mass: 1, length: 2, time: -2 }, 1, "Joule"),
  defineUnit("erg", { mass: 1, length: 2, time: -2 }, 1e-7, "Erg"),
  defineUnit("eV", { mass: 1, length: 2, time: -2 }, 1.602176634e-19, "Electronvolt"),
  defineUnit("W", { mass: 1, length: 2, time: -3 }, 1, "Watt"),
  defineUnit("Lsun", { mass: 1, length: 2, time: -3 }, 3.828e26, "Nominal solar luminosity"),
  defineUnit("Hz", { time: -1 }, 1, "Hertz"),
  defineUnit("K", { temperature: 1 }, 1, "Kelvin"),
  defineUnit("rad", {}, 1, "Radian"),
  defineUnit("deg", {}, Math.PI / 180, "Degree"),
  defineUnit("sr", {}, 1, "Steradian"),
]

const ensureUnitMapKnown = (
  registry: UnitRegistry,
  units: UnitMap,
): Effect.Effect<void, UnitNotFoundError> =>
  Effect.all(Object.keys(units).map((symbol) => lookupUnit(registry, symbol)), {
    discard: true,
  })

export class UnitManager extends Context.Tag("species-notation/UnitManager")<
  UnitManager,
  UnitManagerService
>() {
  static layer(initialDefinitions: ReadonlyArray<UnitDefinition> = DEFAULT_UNIT_DEFINITIONS) {
    return Layer.effect(this, Effect.gen(function* () {
      const registryRef = yield* Ref.make(makeRegistry(initialDefinitions))
      const getRegistry = Ref.get(registryRef)

      const service: UnitManagerService = {
        register: (definitions) =>
          Ref.updateAndGet(registryRef, (current) => extendRegistry(current, definitions)),
        registry: getRegistry,
        find: (symbol) => Effect.flatMap(getRegistry, (registry) => lookupUnit(registry, symbol)),
        ensureUnitMap: (units) => Effect.flatMap(getRegistry, (registry) => ensureUnitMapKnown(registry, units)),
        convertValue: (value, fromUnit, toUnit) =>
          Effect.flatMap(getRegistry, (registry) => convertValue(registry, value, fromUnit, toUnit)),
        convertQuantity: (quantity, toUnit) =>
          Effect.flatMap(getRegistry, (registry) => convertQuantity(registry, quantity, toUnit)),
        resolve: (value, unit) =>
          Effect.flatMap(getRegistry, (registry) => quantityFromUnit(registry, value, unit)),
      }

      return service
    }))
  }
}
