import { Effect, Schema } from "effect"
import { fileURLToPath } from "node:url"
import { ElementRecord, ElementRegistry } from "../src/Elements.js"

const decodeRecord = Schema.decodeSync(ElementRecord)

/**
 * Directory holding the JSON fixtures used by the loader tests.
 */
export const testDataDir: string = fileURLToPath(new URL("./data/", import.meta.url))

/**
 * A handful of light elements plus silicon and iron.
 */
export const makeElementRecords = (): ReadonlyArray<ElementRecord> =>
  [
    { atomicNumber: 1, symbol: "H" },
    { atomicNumber: 2, symbol: "He" },
    { atomicNumber: 6, symbol: "C" },
    { atomicNumber: 8, symbol: "O" },
    { atomicNumber: 14, symbol: "Si" },
    { atomicNumber: 26, symbol: "Fe" },
  ].map((record) => decodeRecord(record))

export const makeElementRegistry = (): ElementRegistry =>
  Effect.runSync(ElementRegistry.make(makeElementRecords()))
