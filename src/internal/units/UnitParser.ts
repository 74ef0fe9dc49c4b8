import type { IToken, TokenType } from "chevrotain"
import {
  Caret,
  LParen,
  Minus,
  RParen,
  Slash,
  Star,
  UnitIdentifier,
  UnitLexer,
  UnitNumber,
  UnitPer,
} from "./tokens.js"
import { divideUnits, multiplyUnits, powUnits, type UnitMap } from "./Quantity.js"
import { UnitSyntaxError } from "./errors.js"

class Stream {
  readonly #tokens: ReadonlyArray<IToken>
  readonly #source: string
  #index = 0

  constructor(tokens: ReadonlyArray<IToken>, source: string) {
    this.#tokens = tokens
    this.#source = source
  }

  peek(offset = 0): IToken | undefined {
    return this.#tokens[this.#index + offset]
  }

  consume(): IToken {
    const token = this.peek()
    if (!token) {
      throw this.error(undefined, "Unexpected end of unit expression")
    }
    this.#index += 1
    return token
  }

  match(tokenType: TokenType): boolean {
    const token = this.peek()
    if (token && token.tokenType === tokenType) {
      this.#index += 1
      return true
    }
    return false
  }

  expect(tokenType: TokenType, message: string): IToken {
    const token = this.peek()
    if (!token || token.tokenType !== tokenType) {
      throw this.error(token, message)
    }
    this.#index += 1
    return token
  }

  nextIs(tokenType: TokenType): boolean {
    return this.peek()?.tokenType === tokenType
  }

  done(): boolean {
    return this.#index >= this.#tokens.length
  }

  error(token: IToken | undefined, problem: string): UnitSyntaxError {
    const column = token?.startColumn ?? this.#source.length + 1
    return new UnitSyntaxError({
      expression: this.#source,
      column,
      snippet: `${this.#source}\n${" ".repeat(Math.max(0, column - 1))}^`,
      problem,
    })
  }
}

const isSquared = (token: IToken): boolean => token.image.toLowerCase() === "squared"
const isCubed = (token: IToken): boolean => token.image.toLowerCase() === "cubed"

const startsTerm = (stream: Stream): boolean => {
  const next = stream.peek()
  return (
    next !== undefined &&
    (next.tokenType === LParen || (next.tokenType === UnitIdentifier && !isSquared(next) && !isCubed(next)))
  )
}

const parseProduct = (stream: Stream): UnitMap => {
  let current = parseTerm(stream)
  while (true) {
    if (stream.match(Star)) {
      current = multiplyUnits(current, parseTerm(stream))
      continue
    }
    if (stream.match(Slash) || stream.match(UnitPer)) {
      current = divideUnits(current, parseTerm(stream))
      continue
    }
    if (startsTerm(stream)) {
      current = multiplyUnits(current, parseTerm(stream))
      continue
    }
    break
  }
  return current
}

const parseExponent = (stream: Stream, required: boolean): number | undefined => {
  const negative = stream.match(Minus)
  if (!negative && !required && !stream.nextIs(UnitNumber)) {
    return undefined
  }
  const token = stream.expect(UnitNumber, "Expected exponent")
  const exponent = Number(token.image) * (negative ? -1 : 1)
  if (!Number.isFinite(exponent)) {
    throw stream.error(token, "Invalid unit exponent")
  }
  return exponent
}

const parseTerm = (stream: Stream): UnitMap => {
  let base = parseAtom(stream)
  const exponent = parseExponent(stream, stream.match(Caret))
  if (exponent !== undefined) {
    base = powUnits(base, exponent)
  }
  const maybePow = stream.peek()
  if (maybePow && maybePow.tokenType === UnitIdentifier) {
    if (isSquared(maybePow)) {
      stream.consume()
      base = powUnits(base, 2)
    } else if (isCubed(maybePow)) {
      stream.consume()
      base = powUnits(base, 3)
    }
  }
  return base
}

const parseAtom = (stream: Stream): UnitMap => {
  if (stream.match(LParen)) {
    const inner = parseProduct(stream)
    stream.expect(RParen, "Expected ')' in unit expression")
    return inner
  }
  const next = stream.peek()
  if (next && next.tokenType === UnitNumber) {
    stream.consume()
    if (Number(next.image) !== 1) {
      throw stream.error(next, "Only 1 may stand in place of a unit")
    }
    return Object.create(null)
  }
  const token = stream.expect(UnitIdentifier, "Expected unit identifier")
  const unit: UnitMap = Object.create(null)
  unit[token.image] = 1
  return unit
}

/**
 * Parse a unit expression into a map of unit symbols to exponents. Adjacent
 * terms multiply, so `erg / (Angstrom cm2 s)` is
 * `{ erg: 1, Angstrom: -1, cm: -2, s: -1 }`. Throws `UnitSyntaxError`.
 */
export const parseUnitExpression = (text: string): UnitMap => {
  const lexing = UnitLexer.tokenize(text)
  const lexError = lexing.errors[0]
  if (lexError) {
    const column = lexError.column ?? 1
    throw new UnitSyntaxError({
      expression: text,
      column,
      snippet: `${text}\n${" ".repeat(Math.max(0, column - 1))}^`,
      problem: lexError.message,
    })
  }
  const stream = new Stream(lexing.tokens, text)
  if (stream.done()) {
    throw stream.error(undefined, "Empty unit expression")
  }
  const result = parseProduct(stream)
  if (!stream.done()) {
    throw stream.error(stream.peek(), "Unexpected trailing input in unit expression")
  }
  return result
}
