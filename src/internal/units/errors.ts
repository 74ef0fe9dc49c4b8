import { Data } from "effect"

export class UnitSyntaxError extends Data.TaggedError("UnitSyntaxError")<{
  readonly expression: string
  readonly column: number
  readonly snippet: string
  readonly problem: string
}> {
  override get message(): string {
    return `Unit syntax error at column ${this.column}: ${this.problem}`
  }
}
