import { createToken, Lexer } from "chevrotain"

/**
 * Token definitions for unit expressions such as `km/s`,
 * `erg / (Angstrom cm2 s)` or `kg m^2 s^-2`. The `per` keyword falls back to
 * the identifier token for longer words that merely start with "per".
 */
export const WhiteSpace = createToken({ name: "WhiteSpace", pattern: /\s+/, group: Lexer.SKIPPED })

export const UnitIdentifier = createToken({ name: "UnitIdentifier", pattern: /[A-Za-z_]+/ })

export const UnitPer = createToken({
  name: "UnitPer",
  pattern: /per/i,
  longer_alt: UnitIdentifier,
})

export const UnitNumber = createToken({ name: "UnitNumber", pattern: /\d+(?:\.\d+)?/ })

export const Star = createToken({ name: "Star", pattern: /\*/ })
export const Slash = createToken({ name: "Slash", pattern: /\// })
export const Caret = createToken({ name: "Caret", pattern: /\^|\*\*/ })
export const Minus = createToken({ name: "Minus", pattern: /-/ })
export const LParen = createToken({ name: "LParen", pattern: /\(/ })
export const RParen = createToken({ name: "RParen", pattern: /\)/ })

export const UnitTokens = [
  WhiteSpace,
  UnitPer,
  UnitIdentifier,
  UnitNumber,
  Caret,
  Star,
  Slash,
  Minus,
  LParen,
  RParen,
]

export const UnitLexer = new Lexer(UnitTokens, { positionTracking: "full" })
