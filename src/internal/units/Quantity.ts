export type UnitMap = Record<string, number>

export interface Quantity {
  readonly value: number
  readonly units: UnitMap
}

/**
 * Quantity produced from a quantity string: the unit token is kept exactly as
 * written alongside the parsed unit map.
 */
export interface Measurement extends Quantity {
  readonly unit: string
}

const EPSILON = 1e-12

const normalizeUnits = (units: UnitMap): UnitMap => {
  const result: UnitMap = Object.create(null)
  for (const key of Object.keys(units)) {
    const exponent = units[key] ?? 0
    if (Math.abs(exponent) > EPSILON) {
      result[key] = exponent
    }
  }
  return result
}

export const makeQuantity = (value: number, units?: UnitMap): Quantity => ({
  value,
  units: normalizeUnits(units ? { ...units } : Object.create(null)),
})

export const makeMeasurement = (value: number, unit: string, units: UnitMap): Measurement => ({
  ...makeQuantity(value, units),
  unit,
})

const combineUnits = (left: UnitMap, right: UnitMap, multiplier: 1 | -1): UnitMap => {
  const result: UnitMap = Object.assign(Object.create(null), left)
  for (const key of Object.keys(right)) {
    result[key] = (result[key] ?? 0) + (right[key] ?? 0) * multiplier
  }
  return normalizeUnits(result)
}

export const multiplyUnits = (left: UnitMap, right: UnitMap): UnitMap =>
  combineUnits(left, right, 1)

export const divideUnits = (left: UnitMap, right: UnitMap): UnitMap =>
  combineUnits(left, right, -1)

export const powUnits = (units: UnitMap, exponent: number): UnitMap => {
  const result: UnitMap = Object.create(null)
  for (const key of Object.keys(units)) {
    result[key] = (units[key] ?? 0) * exponent
  }
  return normalizeUnits(result)
}
