/**
 * Element symbol registry.
 *
 * An immutable bijection between atomic numbers and element symbols, built
 * once from an ordered list of records (by default the bundled
 * `data/atomic-symbols.json`) and read thereafter. Construction checks only
 * that numbers and symbols are unique; everything else about the table is the
 * data source's responsibility.
 *
 * @since 0.1.0
 */

import { Context, Effect, Layer, Schema } from "effect"
import { readFileSync } from "node:fs"
import { ElementDataError, UnknownAtomicNumberError, UnknownElementSymbolError } from "./Errors.js"
import { ATOMIC_SYMBOLS_FILE, dataPath } from "./Paths.js"
import { AtomicNumber } from "./Types.js"

/**
 * One row of the element table.
 *
 * @category Elements
 * @since 0.1.0
 */
export class ElementRecord extends Schema.Class<ElementRecord>("ElementRecord")({
  atomicNumber: AtomicNumber,
  symbol: Schema.String.pipe(Schema.pattern(/^[A-Z][a-z]{0,2}$/)),
}) {}

const ElementTableJson = Schema.parseJson(Schema.Array(ElementRecord))

/**
 * Read-only lookup tables for both directions of the symbol mapping.
 *
 * @category Elements
 * @since 0.1.0
 */
export class ElementRegistry {
  readonly #bySymbol: ReadonlyMap<string, AtomicNumber>
  readonly #byNumber: ReadonlyMap<number, string>
  readonly #records: ReadonlyArray<ElementRecord>

  private constructor(records: ReadonlyArray<ElementRecord>) {
    this.#records = records
    this.#bySymbol = new Map(records.map((record) => [record.symbol, record.atomicNumber] as const))
    this.#byNumber = new Map(records.map((record) => [record.atomicNumber, record.symbol] as const))
  }

  /**
   * Build a registry, failing when two records share a number or a symbol.
   */
  static make(
    records: ReadonlyArray<ElementRecord>,
    source = "<in-memory>",
  ): Effect.Effect<ElementRegistry, ElementDataError> {
    const numbers = new Set<number>()
    const symbols = new Set<string>()
    for (const { atomicNumber, symbol } of records) {
      if (numbers.has(atomicNumber)) {
        return Effect.fail(new ElementDataError({ source, reason: `duplicate atomic number ${atomicNumber}` }))
      }
      if (symbols.has(symbol)) {
        return Effect.fail(new ElementDataError({ source, reason: `duplicate symbol "${symbol}"` }))
      }
      numbers.add(atomicNumber)
      symbols.add(symbol)
    }
    return Effect.succeed(new ElementRegistry([...records]))
  }

  get size(): number {
    return this.#records.length
  }

  get records(): ReadonlyArray<ElementRecord> {
    return this.#records
  }

  numberOf(symbol: string): AtomicNumber | undefined {
    return this.#bySymbol.get(symbol)
  }

  symbolOf(atomicNumber: number): string | undefined {
    return this.#byNumber.get(atomicNumber)
  }
}

/**
 * Uppercase the first character and lowercase the rest ("fE" -> "Fe").
 *
 * @category Elements
 * @since 0.1.0
 */
export const reformatElementSymbol = (raw: string): string =>
  raw.charAt(0).toUpperCase() + raw.slice(1).toLowerCase()

/**
 * Resolve an element symbol in any capitalization to its atomic number.
 *
 * @category Elements
 * @since 0.1.0
 * @example
 * ```ts
 * yield* elementSymbolToNumber(registry, "FE") // 26
 * ```
 */
export const elementSymbolToNumber = (
  registry: ElementRegistry,
  raw: string,
): Effect.Effect<AtomicNumber, UnknownElementSymbolError> => {
  const atomicNumber = registry.numberOf(reformatElementSymbol(raw))
  return atomicNumber === undefined
    ? Effect.fail(new UnknownElementSymbolError({ input: raw }))
    : Effect.succeed(atomicNumber)
}

/**
 * @category Elements
 * @since 0.1.0
 */
export const elementNumberToSymbol = (
  registry: ElementRegistry,
  atomicNumber: number,
): Effect.Effect<string, UnknownAtomicNumberError> => {
  const symbol = registry.symbolOf(atomicNumber)
  return symbol === undefined
    ? Effect.fail(new UnknownAtomicNumberError({ atomicNumber }))
    : Effect.succeed(symbol)
}

/**
 * Read and decode an element table file (a JSON array of
 * `{ atomicNumber, symbol }` objects).
 *
 * @category Loading
 * @since 0.1.0
 */
export const loadElementRecords = (
  path: string,
): Effect.Effect<ReadonlyArray<ElementRecord>, ElementDataError> =>
  Effect.try({
    try: () => readFileSync(path, "utf-8"),
    catch: (error) =>
      new ElementDataError({
        source: path,
        reason: error instanceof Error ? error.message : String(error),
      }),
  }).pipe(
    Effect.flatMap((text) =>
      Schema.decodeUnknown(ElementTableJson)(text).pipe(
        Effect.mapError((error) => new ElementDataError({ source: path, reason: error.message })),
      ),
    ),
  )

const loadRegistry = (path: string): Effect.Effect<ElementRegistry, ElementDataError> =>
  Effect.gen(function* () {
    const records = yield* loadElementRecords(path)
    const registry = yield* ElementRegistry.make(records, path)
    yield* Effect.logDebug("Loaded element table").pipe(
      Effect.annotateLogs({ source: path, elements: registry.size }),
    )
    return registry
  })

/**
 * Process-wide element registry. Layers are memoized by Effect, so the table
 * is read once per provided runtime.
 *
 * @category Services
 * @since 0.1.0
 */
export class ElementTable extends Context.Tag("species-notation/ElementTable")<
  ElementTable,
  ElementRegistry
>() {
  /**
   * Registry read from `atomic-symbols.json` in the configured data directory.
   */
  static readonly layer = Layer.effect(
    this,
    Effect.flatMap(dataPath(ATOMIC_SYMBOLS_FILE), loadRegistry),
  )

  static fromFile(path: string) {
    return Layer.effect(this, loadRegistry(path))
  }

  static fromRecords(records: ReadonlyArray<ElementRecord>) {
    return Layer.effect(this, ElementRegistry.make(records))
  }
}
