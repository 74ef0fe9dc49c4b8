import { describe, it, expect } from "vitest"
import * as SpeciesNotation from "../src/index.js"

describe("public API export surface", () => {
  it("exposes core modules", () => {
    expect(SpeciesNotation).toHaveProperty("encodeRoman")
    expect(SpeciesNotation).toHaveProperty("decodeRoman")
    expect(SpeciesNotation).toHaveProperty("ElementTable")
    expect(SpeciesNotation).toHaveProperty("parseSpecies")
    expect(SpeciesNotation).toHaveProperty("formatSpecies")
    expect(SpeciesNotation).toHaveProperty("parseQuantity")
    expect(SpeciesNotation).toHaveProperty("UnitManager")
    expect(SpeciesNotation).toHaveProperty("Notation")
    expect(SpeciesNotation).toHaveProperty("SpeciesId")
    expect(SpeciesNotation).toHaveProperty("MalformedSpeciesError")
    expect(SpeciesNotation).toHaveProperty("readAbundanceTable")
    expect(SpeciesNotation).toHaveProperty("intensityBlackBody")
  })
})
