/**
 * Black-body radiation in cgs units.
 *
 * @since 0.1.0
 */

/**
 * Boltzmann constant, erg / K.
 *
 * @category Constants
 * @since 0.1.0
 */
export const K_B_CGS = 1.380649e-16

/**
 * Speed of light, cm / s.
 *
 * @category Constants
 * @since 0.1.0
 */
export const C_CGS = 2.99792458e10

/**
 * Planck constant, erg s.
 *
 * @category Constants
 * @since 0.1.0
 */
export const H_CGS = 6.62607015e-27

/**
 * Planck's law: specific intensity of a black body at frequency `nu` (Hz)
 * and temperature `temperature` (K), in erg s^-1 cm^-2 Hz^-1 sr^-1.
 *
 * @category Radiation
 * @since 0.1.0
 * @example
 * ```ts
 * intensityBlackBody(5e14, 5800)
 * ```
 */
export const intensityBlackBody = (nu: number, temperature: number): number => {
  const betaRad = 1 / (K_B_CGS * temperature)
  const coefficient = (2 * H_CGS) / C_CGS ** 2
  return (coefficient * nu ** 3) / Math.expm1(H_CGS * nu * betaRad)
}

/**
 * {@link intensityBlackBody} over a frequency grid.
 *
 * @category Radiation
 * @since 0.1.0
 */
export const intensityBlackBodySpectrum = (
  frequencies: ReadonlyArray<number>,
  temperature: number,
): ReadonlyArray<number> => frequencies.map((nu) => intensityBlackBody(nu, temperature))
