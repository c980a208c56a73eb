import { Effect, Either } from "effect"
import type { IToken, TokenType } from "chevrotain"
import {
  Caret,
  Comma,
  EqEq,
  EquationLexer,
  Identifier,
  LBrace,
  LBracket,
  LParen,
  Minus,
  NumberLiteral,
  Plus,
  Prime,
  RBrace,
  RBracket,
  RParen,
  Slash,
  Star,
} from "./tokens.js"
import type {
  BinaryNode,
  BinaryOp,
  DerivativeNode,
  EquationForm,
  EquationNode,
  Expr,
  NodeId,
  Span,
} from "./Ast.js"
import { DERIVATIVE_OPERATOR, isBuiltinName } from "./Builtins.js"
import { EquationParseError, type ParseErrorCode } from "./errors.js"

interface BinaryInfo {
  readonly precedence: number
  readonly rightAssociative?: boolean
  readonly op: BinaryOp
}

const BinaryOperators = new Map<TokenType, BinaryInfo>([
  [Plus, { precedence: 1, op: "+" }],
  [Minus, { precedence: 1, op: "-" }],
  [Star, { precedence: 2, op: "*" }],
  [Slash, { precedence: 2, op: "/" }],
  [Caret, { precedence: 3, op: "^", rightAssociative: true }],
])

// Unary minus binds looser than `^`, so `-x^2` is `-(x^2)`.
const NEGATE_OPERAND_PRECEDENCE = 3

/** Deepest expression tree, and deepest nesting of groups and unary signs, accepted. */
export const MAX_EXPRESSION_DEPTH = 256

const Closers = new Map<TokenType, { readonly token: TokenType; readonly image: string }>([
  [LParen, { token: RParen, image: ")" }],
  [LBracket, { token: RBracket, image: "]" }],
  [LBrace, { token: RBrace, image: "}" }],
])

const locate = (source: string, offset: number): { readonly line: number; readonly column: number } => {
  const before = source.slice(0, offset)
  const lines = before.split(/\r?\n/)
  const current = lines[lines.length - 1] ?? ""
  return { line: lines.length, column: current.length + 1 }
}

const snippet = (source: string, line: number, column: number): string => {
  const lines = source.split(/\r?\n/)
  const target = lines[line - 1] ?? ""
  return `${target}\n${" ".repeat(Math.max(0, column - 1))}^`
}

export const makeParseError = (
  source: string,
  offset: number,
  code: ParseErrorCode,
  problem: string,
): EquationParseError => {
  const { line, column } = locate(source, offset)
  return new EquationParseError({
    code,
    source,
    offset,
    line,
    column,
    snippet: snippet(source, line, column),
    problem,
  })
}

const spanFromToken = (token: IToken): Span => ({
  start: token.startOffset,
  end: (token.endOffset ?? token.startOffset) + 1,
  line: token.startLine ?? 1,
  column: token.startColumn ?? 1,
})

const combineSpans = (start: Span, end: Span): Span => ({
  start: start.start,
  end: end.end,
  line: start.line,
  column: start.column,
})

const makeId = (span: Span): NodeId => `n:${span.start}:${span.end}`

class TokenStream {
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

  previous(): IToken | undefined {
    return this.#tokens[this.#index - 1]
  }

  consume(): IToken {
    const token = this.peek()
    if (!token) {
      throw makeParseError(this.#source, this.#source.length, "UnexpectedToken", "Unexpected end of input")
    }
    this.#index += 1
    return token
  }

  match(tokenType: TokenType): boolean {
    if (this.peek()?.tokenType === tokenType) {
      this.#index += 1
      return true
    }
    return false
  }

  expect(tokenType: TokenType, message: string): IToken {
    const token = this.peek()
    if (!token) {
      throw makeParseError(this.#source, this.#source.length, "UnexpectedToken", `${message}, found end of input`)
    }
    if (token.tokenType !== tokenType) {
      throw makeParseError(this.#source, token.startOffset, "UnexpectedToken", `${message}, found "${token.image}"`)
    }
    this.#index += 1
    return token
  }

  /**
   * Consume the closer for a group opened by `open`. Running out of input
   * is reported as an unterminated group pointing at the opener.
   */
  close(open: IToken): IToken {
    const closer = Closers.get(open.tokenType)
    if (!closer) {
      throw makeParseError(this.#source, open.startOffset, "UnexpectedToken", `"${open.image}" does not open a group`)
    }
    const token = this.peek()
    if (!token) {
      throw makeParseError(
        this.#source,
        open.startOffset,
        "UnterminatedGroup",
        `"${open.image}" is never closed; expected "${closer.image}"`,
      )
    }
    if (token.tokenType !== closer.token) {
      throw makeParseError(
        this.#source,
        token.startOffset,
        "UnexpectedToken",
        `Expected "${closer.image}" to close "${open.image}", found "${token.image}"`,
      )
    }
    this.#index += 1
    return token
  }

  get done(): boolean {
    return this.#index >= this.#tokens.length
  }
}

const isGroupOpener = (token: IToken | undefined): boolean =>
  token !== undefined && (token.tokenType === LParen || token.tokenType === LBracket)

class EquationPrattParser {
  readonly #stream: TokenStream
  readonly #source: string
  readonly #depths = new WeakMap<Expr, number>()
  #nesting = 0

  constructor(tokens: ReadonlyArray<IToken>, source: string) {
    this.#stream = new TokenStream(tokens, source)
    this.#source = source
  }

  parseEquation(): EquationNode {
    const first = this.#stream.peek()
    const lhs = this.parseList(() => this.parseDerivative())
    this.#stream.expect(EqEq, 'Expected "==" after the derivative list')
    const rhs = this.parseList(() => this.parseExpression(0))

    if (!this.#stream.done) {
      const token = this.#stream.peek()
      throw makeParseError(
        this.#source,
        token?.startOffset ?? this.#source.length,
        "UnexpectedToken",
        `Unexpected token "${token?.image ?? "<eof>"}" after equation`,
      )
    }

    const last = this.#stream.previous()
    const span = first && last ? combineSpans(spanFromToken(first), spanFromToken(last)) : rhs.span
    const form: EquationForm = lhs.braced ? "list" : "single"
    return {
      _tag: "Equation",
      id: makeId(span),
      form,
      derivatives: lhs.items,
      rhs: rhs.items,
      span,
    }
  }

  parseList<A extends { readonly span: Span }>(
    item: () => A,
  ): { readonly items: ReadonlyArray<A>; readonly braced: boolean; readonly span: Span } {
    const open = this.#stream.peek()
    if (open?.tokenType !== LBrace) {
      const single = item()
      return { items: [single], braced: false, span: single.span }
    }
    this.#stream.consume()
    const items: Array<A> = []
    if (this.#stream.peek()?.tokenType !== RBrace) {
      do {
        items.push(item())
      } while (this.#stream.match(Comma))
    }
    const close = this.#stream.close(open)
    return { items, braced: true, span: combineSpans(spanFromToken(open), spanFromToken(close)) }
  }

  parseDerivative(): DerivativeNode {
    const head = this.#stream.expect(Identifier, "Expected a derivative such as D(x) or x'[t]")

    if (head.image === DERIVATIVE_OPERATOR && isGroupOpener(this.#stream.peek())) {
      const open = this.#stream.consume()
      const variable = this.#stream.expect(Identifier, "Expected a state variable inside D(...)")
      const argument = this.parseApplication()
      let withRespectTo: string | undefined
      if (this.#stream.match(Comma)) {
        withRespectTo = this.#stream.expect(Identifier, "Expected the independent variable after ','").image
      }
      const close = this.#stream.close(open)
      return this.makeDerivative(variable.image, head, close, argument, withRespectTo)
    }

    const prime = this.#stream.expect(Prime, `Expected "'" after "${head.image}" in a derivative`)
    if (!isGroupOpener(this.#stream.peek())) {
      const next = this.#stream.peek()
      throw makeParseError(
        this.#source,
        next?.startOffset ?? prime.startOffset + 1,
        "UnexpectedToken",
        `Expected "[t]" or "(t)" after "${head.image}'"`,
      )
    }
    const withRespectTo = this.parseApplication()
    const end = this.#stream.previous() ?? head
    return this.makeDerivative(head.image, head, end, undefined, withRespectTo)
  }

  /** Optional `[t]` / `(t)` suffix; returns the applied identifier. */
  parseApplication(): string | undefined {
    const open = this.#stream.peek()
    if (!open || !isGroupOpener(open)) {
      return undefined
    }
    this.#stream.consume()
    const argument = this.#stream.expect(Identifier, "Expected the independent variable")
    this.#stream.close(open)
    return argument.image
  }

  parseExpression(minPrecedence: number): Expr {
    this.#nesting += 1
    try {
      if (this.#nesting > MAX_EXPRESSION_DEPTH) {
        throw this.tooDeep(this.#stream.peek()?.startOffset ?? this.#source.length)
      }
      let left = this.parseUnary()
      // Pratt loop
      while (true) {
        const token = this.#stream.peek()
        if (!token) {
          break
        }
        const info = BinaryOperators.get(token.tokenType)
        if (!info || info.precedence < minPrecedence) {
          break
        }
        this.#stream.consume()
        const nextPrecedence = info.rightAssociative ? info.precedence : info.precedence + 1
        const right = this.parseExpression(nextPrecedence)
        left = this.withDepth(this.makeBinaryNode(info.op, left, right), token.startOffset, [left, right])
      }
      return left
    } finally {
      this.#nesting -= 1
    }
  }

  tooDeep(offset: number): EquationParseError {
    return makeParseError(
      this.#source,
      offset,
      "NestingTooDeep",
      `Expression nested too deeply (more than ${MAX_EXPRESSION_DEPTH} levels)`,
    )
  }

  /** Record the tree depth of `node`, rejecting trees deeper than the limit. */
  withDepth(node: Expr, offset: number, children: ReadonlyArray<Expr>): Expr {
    let depth = 1
    for (const child of children) {
      depth = Math.max(depth, (this.#depths.get(child) ?? 1) + 1)
    }
    if (depth > MAX_EXPRESSION_DEPTH) {
      throw this.tooDeep(offset)
    }
    this.#depths.set(node, depth)
    return node
  }

  parseUnary(): Expr {
    const token = this.#stream.peek()
    if (token?.tokenType === Minus) {
      this.#stream.consume()
      const expr = this.parseExpression(NEGATE_OPERAND_PRECEDENCE)
      const span = combineSpans(spanFromToken(token), expr.span)
      return this.withDepth({ _tag: "Negate", id: makeId(span), expr, span }, token.startOffset, [expr])
    }
    if (token?.tokenType === Plus) {
      this.#stream.consume()
      return this.parseExpression(NEGATE_OPERAND_PRECEDENCE)
    }
    return this.parsePrimary()
  }

  parsePrimary(): Expr {
    const token = this.#stream.peek()
    if (!token) {
      throw makeParseError(this.#source, this.#source.length, "UnexpectedToken", "Unexpected end of input")
    }

    switch (token.tokenType) {
      case NumberLiteral: {
        this.#stream.consume()
        const value = Number(token.image)
        if (!Number.isFinite(value)) {
          throw makeParseError(this.#source, token.startOffset, "UnexpectedToken", `Invalid number literal: ${token.image}`)
        }
        const span = spanFromToken(token)
        return { _tag: "NumberLiteral", id: makeId(span), value, span }
      }
      case Identifier: {
        this.#stream.consume()
        return this.parseIdentifierOrCall(token)
      }
      case LParen: {
        this.#stream.consume()
        const expr = this.parseExpression(0)
        this.#stream.close(token)
        return expr
      }
      default:
        throw makeParseError(this.#source, token.startOffset, "UnexpectedToken", `Unexpected token "${token.image}"`)
    }
  }

  parseIdentifierOrCall(token: IToken): Expr {
    const open = this.#stream.peek()
    if (!open || !isGroupOpener(open)) {
      const span = spanFromToken(token)
      return { _tag: "Ref", id: makeId(span), name: token.image, span }
    }
    this.#stream.consume()
    const args: Array<Expr> = []
    if (this.#stream.peek()?.tokenType !== Closers.get(open.tokenType)?.token) {
      do {
        args.push(this.parseExpression(0))
      } while (this.#stream.match(Comma))
    }
    const close = this.#stream.close(open)
    const span = combineSpans(spanFromToken(token), spanFromToken(close))

    // `x[t]` / `x(t)`: a non-function name applied to a single bare identifier.
    const [only] = args
    const isCallable = isBuiltinName(token.image) || token.image === DERIVATIVE_OPERATOR
    if (!isCallable && args.length === 1 && only?._tag === "Ref" && only.argument === undefined) {
      return { _tag: "Ref", id: makeId(span), name: token.image, argument: only.name, span }
    }
    return this.withDepth({ _tag: "Call", id: makeId(span), name: token.image, args, span }, token.startOffset, args)
  }

  makeDerivative(
    variable: string,
    start: IToken,
    end: IToken,
    argument: string | undefined,
    withRespectTo: string | undefined,
  ): DerivativeNode {
    const span = combineSpans(spanFromToken(start), spanFromToken(end))
    return {
      _tag: "Derivative",
      id: makeId(span),
      variable,
      ...(argument !== undefined ? { argument } : {}),
      ...(withRespectTo !== undefined ? { withRespectTo } : {}),
      span,
    }
  }

  makeBinaryNode(op: BinaryOp, left: Expr, right: Expr): BinaryNode {
    const span = combineSpans(left.span, right.span)
    return { _tag: "Binary", id: makeId(span), op, left, right, span }
  }
}

/**
 * Parse equation source into an AST. Throws {@link EquationParseError}.
 */
export const parseSystemAst = (source: string): EquationNode => {
  if (source.trim().length === 0) {
    throw makeParseError(source, 0, "EmptyInput", "Equation text is empty")
  }
  const { tokens, errors } = EquationLexer.tokenize(source)
  const [lexError] = errors
  if (lexError) {
    const character = source.charAt(lexError.offset)
    throw makeParseError(source, lexError.offset, "UnexpectedToken", `Unexpected character "${character}"`)
  }
  return new EquationPrattParser(tokens, source).parseEquation()
}

const toParseError = (source: string, error: unknown): EquationParseError =>
  error instanceof EquationParseError
    ? error
    : makeParseError(source, 0, "UnexpectedToken", error instanceof Error ? error.message : String(error))

export const parseSystemEffect = (source: string): Effect.Effect<EquationNode, EquationParseError> =>
  Effect.try({
    try: () => parseSystemAst(source),
    catch: (error) => toParseError(source, error),
  })

export const parseSystemEither = (source: string): Either.Either<EquationNode, EquationParseError> =>
  Either.try({
    try: () => parseSystemAst(source),
    catch: (error) => toParseError(source, error),
  })
