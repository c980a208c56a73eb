import { Data } from "effect"

export type ParseErrorCode = "UnexpectedToken" | "UnterminatedGroup" | "EmptyInput" | "NestingTooDeep"

export class EquationParseError extends Data.TaggedError("EquationParseError")<{
  readonly code: ParseErrorCode
  readonly source: string
  readonly offset: number
  readonly line: number
  readonly column: number
  readonly snippet: string
  readonly problem: string
}> {
  override get message(): string {
    return `Equation parse error at line ${this.line}, column ${this.column}: ${this.problem}`
  }
}

export class UnknownIdentifierError extends Data.TaggedError("UnknownIdentifierError")<{
  readonly name: string
  readonly offset: number
}> {
  override get message(): string {
    return `Unknown identifier "${this.name}" at offset ${this.offset}`
  }
}

export class ArityMismatchError extends Data.TaggedError("ArityMismatchError")<{
  readonly subject: string
  readonly expected: number
  readonly actual: number
  readonly offset: number
}> {
  override get message(): string {
    return `${this.subject} expects ${this.expected} item(s) but received ${this.actual}`
  }
}

export class UnsupportedConstructError extends Data.TaggedError("UnsupportedConstructError")<{
  readonly construct: string
  readonly offset: number
}> {
  override get message(): string {
    return `Unsupported construct at offset ${this.offset}: ${this.construct}`
  }
}

export class UndefinedOperationError extends Data.TaggedError("UndefinedOperationError")<{
  readonly operation: string
  readonly offset: number
}> {
  override get message(): string {
    return `Expression is undefined for every input: ${this.operation}`
  }
}

export type BindError =
  | UnknownIdentifierError
  | ArityMismatchError
  | UnsupportedConstructError
  | UndefinedOperationError

export type EquationError = EquationParseError | BindError

export const isBindError = (error: unknown): error is BindError =>
  error instanceof UnknownIdentifierError ||
  error instanceof ArityMismatchError ||
  error instanceof UnsupportedConstructError ||
  error instanceof UndefinedOperationError
