/**
 * Locations of the data files shipped with the package.
 *
 * The data directory defaults to the bundled `data/` folder and can be
 * redirected with the `SPECIES_NOTATION_DATA_DIR` environment variable (or any
 * other `ConfigProvider` installed by the caller).
 *
 * @since 0.1.0
 */

import { Config, ConfigError, Effect } from "effect"
import { join } from "node:path"
import { fileURLToPath } from "node:url"

/**
 * Directory bundled with the package (`<package>/data`).
 *
 * @category Paths
 * @since 0.1.0
 */
export const bundledDataDir: string = fileURLToPath(new URL("../data/", import.meta.url))

/**
 * Name of the element table inside the data directory.
 *
 * @category Paths
 * @since 0.1.0
 */
export const ATOMIC_SYMBOLS_FILE = "atomic-symbols.json"

/**
 * Configured data directory.
 *
 * @category Config
 * @since 0.1.0
 */
export const DataDirConfig: Config.Config<string> = Config.string("SPECIES_NOTATION_DATA_DIR").pipe(
  Config.withDefault(bundledDataDir),
)

/**
 * Resolve a file inside the configured data directory.
 *
 * @category Paths
 * @since 0.1.0
 * @example
 * ```ts
 * const path = yield* dataPath("atomic-symbols.json")
 * ```
 */
export const dataPath = (fileName: string): Effect.Effect<string, ConfigError.ConfigError> =>
  Effect.map(DataDirConfig, (dir) => join(dir, fileName))
