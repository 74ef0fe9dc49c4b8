/**
 * Abundance tables: whitespace-separated rows of a shell index followed by
 * one abundance per element, hydrogen first. `#` starts a comment.
 *
 * ```text
 * # shell  H     He    Li
 * 0        0.70  0.28  0.02
 * 1        0.60  0.35  0.05
 * ```
 *
 * The shell index is dropped and the remaining columns are labelled with
 * element symbols in atomic-number order.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import { readFileSync } from "node:fs"
import { type ElementRegistry, elementNumberToSymbol } from "./Elements.js"
import { AbundanceTableError, type UnknownAtomicNumberError } from "./Errors.js"

/**
 * @category Abundances
 * @since 0.1.0
 */
export interface AbundanceTable {
  readonly columns: ReadonlyArray<string>
  readonly rows: ReadonlyArray<ReadonlyArray<number>>
}

const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/

/**
 * Symbols of the first `count` elements, e.g. `["H", "He", "Li"]` for 3.
 *
 * @category Abundances
 * @since 0.1.0
 */
export const abundanceColumns = (
  registry: ElementRegistry,
  count: number,
): Effect.Effect<ReadonlyArray<string>, UnknownAtomicNumberError> => {
  const atomicNumbers: Array<number> = []
  for (let atomicNumber = 1; atomicNumber <= count; atomicNumber++) {
    atomicNumbers.push(atomicNumber)
  }
  return Effect.forEach(atomicNumbers, (atomicNumber) => elementNumberToSymbol(registry, atomicNumber))
}

/**
 * Parse the text of an abundance table.
 *
 * @category Abundances
 * @since 0.1.0
 */
export const parseAbundanceTable = (
  registry: ElementRegistry,
  text: string,
  source = "<in-memory>",
): Effect.Effect<AbundanceTable, AbundanceTableError | UnknownAtomicNumberError> =>
  Effect.gen(function* () {
    const rows: Array<ReadonlyArray<number>> = []
    let width: number | undefined
    const lines = text.split(/\r?\n/)
    for (let index = 0; index < lines.length; index++) {
      const line = (lines[index] ?? "").replace(/#.*$/, "").trim()
      if (line === "") {
        continue
      }
      const lineNumber = index + 1
      const fields = line.split(/\s+/)
      if (fields.length < 2) {
        return yield* new AbundanceTableError({
          source,
          reason: `line ${lineNumber}: expected a shell index and at least one abundance`,
        })
      }
      if (width !== undefined && fields.length !== width) {
        return yield* new AbundanceTableError({
          source,
          reason: `line ${lineNumber}: expected ${width} fields, found ${fields.length}`,
        })
      }
      width = fields.length
      const invalid = fields.find((field) => !DECIMAL.test(field))
      if (invalid !== undefined) {
        return yield* new AbundanceTableError({
          source,
          reason: `line ${lineNumber}: "${invalid}" is not a number`,
        })
      }
      rows.push(fields.slice(1).map(Number))
    }
    if (width === undefined) {
      return yield* new AbundanceTableError({ source, reason: "no data rows" })
    }
    const columns = yield* abundanceColumns(registry, width - 1)
    return { columns, rows }
  })

/**
 * Read and parse an abundance table file.
 *
 * @category Abundances
 * @since 0.1.0
 */
export const readAbundanceTable = (
  registry: ElementRegistry,
  path: string,
): Effect.Effect<AbundanceTable, AbundanceTableError | UnknownAtomicNumberError> =>
  Effect.try({
    try: () => readFileSync(path, "utf-8"),
    catch: (error) =>
      new AbundanceTableError({
        source: path,
        reason: error instanceof Error ? error.message : String(error),
      }),
  }).pipe(Effect.flatMap((text) => parseAbundanceTable(registry, text, path)))
