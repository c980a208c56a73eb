import { Effect, Either } from "effect"
import type { BinaryOp, DerivativeNode, EquationNode, Expr } from "./Ast.js"
import { type Builtin, DERIVATIVE_OPERATOR, isBuiltinName, lookupBuiltin } from "./Builtins.js"
import {
  ArityMismatchError,
  type BindError,
  isBindError,
  UndefinedOperationError,
  UnknownIdentifierError,
  UnsupportedConstructError,
} from "./errors.js"

/**
 * Name-free expression tree produced by the binder. Every identifier is
 * resolved to a state index, the independent variable or a constant.
 */
export type BoundExpr =
  | { readonly _tag: "Const"; readonly value: number }
  | { readonly _tag: "State"; readonly index: number; readonly name: string }
  | { readonly _tag: "Time" }
  | { readonly _tag: "Neg"; readonly expr: BoundExpr }
  | { readonly _tag: "Binary"; readonly op: BinaryOp; readonly left: BoundExpr; readonly right: BoundExpr }
  | { readonly _tag: "Call"; readonly builtin: Builtin; readonly args: ReadonlyArray<BoundExpr> }

export interface CompiledSystemSpec {
  readonly stateVariables: ReadonlyArray<string>
  readonly independentVariable: string
  readonly parameters: Readonly<Record<string, number>>
  readonly equations: ReadonlyArray<BoundExpr>
}

export interface BindOptions {
  readonly independentVariable?: string
  readonly parameters?: Readonly<Record<string, number>>
}

export const DEFAULT_INDEPENDENT_VARIABLE = "t"

interface Scope {
  readonly states: ReadonlyMap<string, number>
  readonly independentVariable: string
  readonly parameters: ReadonlyMap<string, number>
}

const isLiteral = (expr: Expr, predicate: (value: number) => boolean): boolean => {
  switch (expr._tag) {
    case "NumberLiteral":
      return predicate(expr.value)
    case "Negate":
      return expr.expr._tag === "NumberLiteral" && predicate(-expr.expr.value)
    default:
      return false
  }
}

const checkIndependentArgument = (
  owner: string,
  argument: string | undefined,
  independentVariable: string,
  offset: number,
): void => {
  if (argument !== undefined && argument !== independentVariable) {
    throw new UnsupportedConstructError({
      construct: `${owner} is applied to "${argument}" but the independent variable is "${independentVariable}"`,
      offset,
    })
  }
}

const declareStates = (
  derivatives: ReadonlyArray<DerivativeNode>,
  independentVariable: string,
  parameters: ReadonlyMap<string, number>,
): Map<string, number> => {
  const states = new Map<string, number>()
  for (const derivative of derivatives) {
    const { variable, span } = derivative
    if (variable === independentVariable) {
      throw new UnsupportedConstructError({
        construct: `"${variable}" is the independent variable and cannot also be a state variable`,
        offset: span.start,
      })
    }
    if (variable === DERIVATIVE_OPERATOR || isBuiltinName(variable)) {
      throw new UnsupportedConstructError({
        construct: `"${variable}" is reserved and cannot be a state variable`,
        offset: span.start,
      })
    }
    if (parameters.has(variable)) {
      throw new UnsupportedConstructError({
        construct: `"${variable}" is both a parameter and a state variable`,
        offset: span.start,
      })
    }
    if (states.has(variable)) {
      throw new UnsupportedConstructError({
        construct: `derivative of "${variable}" is declared more than once`,
        offset: span.start,
      })
    }
    checkIndependentArgument(`"${variable}"`, derivative.argument, independentVariable, span.start)
    checkIndependentArgument(`derivative of "${variable}"`, derivative.withRespectTo, independentVariable, span.start)
    states.set(variable, states.size)
  }
  return states
}

const bindExpr = (expr: Expr, scope: Scope): BoundExpr => {
  switch (expr._tag) {
    case "NumberLiteral":
      return { _tag: "Const", value: expr.value }
    case "Ref": {
      checkIndependentArgument(`"${expr.name}"`, expr.argument, scope.independentVariable, expr.span.start)
      const index = scope.states.get(expr.name)
      if (index !== undefined) {
        return { _tag: "State", index, name: expr.name }
      }
      if (expr.argument !== undefined) {
        // Only state variables are functions of time.
        throw new UnknownIdentifierError({ name: expr.name, offset: expr.span.start })
      }
      if (expr.name === scope.independentVariable) {
        return { _tag: "Time" }
      }
      const constant = scope.parameters.get(expr.name)
      if (constant !== undefined) {
        return { _tag: "Const", value: constant }
      }
      throw new UnknownIdentifierError({ name: expr.name, offset: expr.span.start })
    }
    case "Negate":
      return { _tag: "Neg", expr: bindExpr(expr.expr, scope) }
    case "Binary": {
      if (expr.op === "/" && isLiteral(expr.right, (value) => value === 0)) {
        throw new UndefinedOperationError({ operation: "division by literal zero", offset: expr.span.start })
      }
      if (
        expr.op === "^" &&
        isLiteral(expr.left, (value) => value === 0) &&
        isLiteral(expr.right, (value) => value < 0)
      ) {
        throw new UndefinedOperationError({ operation: "zero raised to a negative power", offset: expr.span.start })
      }
      return {
        _tag: "Binary",
        op: expr.op,
        left: bindExpr(expr.left, scope),
        right: bindExpr(expr.right, scope),
      }
    }
    case "Call": {
      if (expr.name === DERIVATIVE_OPERATOR) {
        throw new UnsupportedConstructError({
          construct: "derivatives may only appear on the left-hand side",
          offset: expr.span.start,
        })
      }
      const builtin = lookupBuiltin(expr.name)
      if (!builtin) {
        throw new UnsupportedConstructError({ construct: `unknown function "${expr.name}"`, offset: expr.span.start })
      }
      if (expr.args.length !== builtin.arity) {
        throw new ArityMismatchError({
          subject: `function "${expr.name}"`,
          expected: builtin.arity,
          actual: expr.args.length,
          offset: expr.span.start,
        })
      }
      if (
        builtin.name === "pow" &&
        expr.args[0] !== undefined &&
        expr.args[1] !== undefined &&
        isLiteral(expr.args[0], (value) => value === 0) &&
        isLiteral(expr.args[1], (value) => value < 0)
      ) {
        throw new UndefinedOperationError({ operation: "zero raised to a negative power", offset: expr.span.start })
      }
      return { _tag: "Call", builtin, args: expr.args.map((arg) => bindExpr(arg, scope)) }
    }
  }
}

/**
 * Resolve names in a parsed equation and fix the state ordering.
 * Throws a {@link BindError}.
 */
export const bindSystem = (ast: EquationNode, options: BindOptions = {}): CompiledSystemSpec => {
  const independentVariable = options.independentVariable ?? DEFAULT_INDEPENDENT_VARIABLE
  const parameterEntries = Object.entries(options.parameters ?? {})
  const parameters = new Map(parameterEntries)

  if (parameters.has(independentVariable)) {
    throw new UnsupportedConstructError({
      construct: `"${independentVariable}" is the independent variable and cannot be a parameter`,
      offset: 0,
    })
  }
  if (ast.derivatives.length === 0) {
    throw new UnsupportedConstructError({ construct: "system declares no derivatives", offset: ast.span.start })
  }

  const states = declareStates(ast.derivatives, independentVariable, parameters)

  if (ast.rhs.length !== ast.derivatives.length) {
    throw new ArityMismatchError({
      subject: "right-hand side list",
      expected: ast.derivatives.length,
      actual: ast.rhs.length,
      offset: ast.rhs[0]?.span.start ?? ast.span.end,
    })
  }

  const scope: Scope = { states, independentVariable, parameters }
  return {
    stateVariables: Array.from(states.keys()),
    independentVariable,
    parameters: Object.fromEntries(parameterEntries),
    equations: ast.rhs.map((expr) => bindExpr(expr, scope)),
  }
}

const toBindError = (error: unknown): BindError => {
  if (isBindError(error)) {
    return error
  }
  return new UnsupportedConstructError({
    construct: error instanceof Error ? error.message : String(error),
    offset: 0,
  })
}

export const bindSystemEffect = (
  ast: EquationNode,
  options?: BindOptions,
): Effect.Effect<CompiledSystemSpec, BindError> =>
  Effect.try({
    try: () => bindSystem(ast, options),
    catch: toBindError,
  })

export const bindSystemEither = (
  ast: EquationNode,
  options?: BindOptions,
): Either.Either<CompiledSystemSpec, BindError> =>
  Either.try({
    try: () => bindSystem(ast, options),
    catch: toBindError,
  })
