import { describe, it, expect } from "@effect/vitest"
import { ConfigProvider, Effect } from "effect"
import { join } from "node:path"
import { ATOMIC_SYMBOLS_FILE, bundledDataDir, dataPath } from "../src/Paths.js"

describe("dataPath", () => {
  it.effect("defaults to the bundled data directory", () =>
    Effect.gen(function* () {
      const path = yield* dataPath(ATOMIC_SYMBOLS_FILE)
      expect(path).toBe(join(bundledDataDir, "atomic-symbols.json"))
    }).pipe(Effect.withConfigProvider(ConfigProvider.fromMap(new Map()))),
  )

  it.effect("follows SPECIES_NOTATION_DATA_DIR", () =>
    Effect.gen(function* () {
      const path = yield* dataPath(ATOMIC_SYMBOLS_FILE)
      expect(path).toBe(join("/srv/tables", "atomic-symbols.json"))
    }).pipe(
      Effect.withConfigProvider(
        ConfigProvider.fromMap(new Map([["SPECIES_NOTATION_DATA_DIR", "/srv/tables"]])),
      ),
    ),
  )
})
