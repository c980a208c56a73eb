import type { BinaryOp } from "./Ast.js"
import type { BoundExpr, CompiledSystemSpec } from "./Binder.js"
import { binaryKernels, power, unaryKernels } from "./Builtins.js"

/**
 * Scalar evaluator for one state dimension.
 */
export type Evaluator = (t: number, state: ReadonlyArray<number>) => number

export interface CompiledSystem {
  readonly stateVariables: ReadonlyArray<string>
  readonly independentVariable: string
  readonly dimension: number
  readonly evaluators: ReadonlyArray<Evaluator>
  /**
   * Right-hand side `f(t, y)`. Returns a fresh array of length `dimension`
   * in declared variable order.
   */
  readonly derivative: (t: number, state: ReadonlyArray<number>) => Array<number>
}

const binaryOps: Readonly<Record<BinaryOp, (a: number, b: number) => number>> = {
  "+": (a, b) => a + b,
  "-": (a, b) => a - b,
  "*": (a, b) => a * b,
  "/": (a, b) => a / b,
  "^": power,
}

const compileExpr = (expr: BoundExpr): Evaluator => {
  switch (expr._tag) {
    case "Const": {
      const value = expr.value
      return () => value
    }
    case "State": {
      const index = expr.index
      return (_t, state) => state[index] ?? Number.NaN
    }
    case "Time":
      return (t) => t
    case "Neg": {
      const inner = compileExpr(expr.expr)
      return (t, state) => -inner(t, state)
    }
    case "Binary": {
      const op = binaryOps[expr.op]
      const left = compileExpr(expr.left)
      const right = compileExpr(expr.right)
      return (t, state) => op(left(t, state), right(t, state))
    }
    case "Call": {
      const { name } = expr.builtin
      const [first, second] = expr.args.map(compileExpr)
      if (first === undefined) {
        return () => Number.NaN
      }
      switch (name) {
        case "pow":
        case "min":
        case "max": {
          const kernel = binaryKernels[name]
          if (second === undefined) {
            return () => Number.NaN
          }
          return (t, state) => kernel(first(t, state), second(t, state))
        }
        default: {
          const kernel = unaryKernels[name]
          return (t, state) => kernel(first(t, state))
        }
      }
    }
  }
}

/**
 * Build closures over a bound system. Evaluation performs no name lookups and
 * never throws; domain errors surface as NaN for the solver to detect.
 */
export const compileSystem = (spec: CompiledSystemSpec): CompiledSystem => {
  const evaluators = spec.equations.map(compileExpr)
  const dimension = evaluators.length
  return {
    stateVariables: spec.stateVariables,
    independentVariable: spec.independentVariable,
    dimension,
    evaluators,
    derivative: (t, state) => {
      const out = new Array<number>(dimension)
      for (let i = 0; i < dimension; i++) {
        out[i] = evaluators[i]?.(t, state) ?? Number.NaN
      }
      return out
    },
  }
}
