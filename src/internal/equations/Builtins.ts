/**
 * Closed set of functions an equation may call. Each entry fixes the arity and
 * the numeric kernel; domain errors produce NaN rather than throwing so the
 * evaluation path stays exception free.
 */

export type BuiltinName = "sin" | "cos" | "exp" | "log" | "sqrt" | "abs" | "pow" | "min" | "max"

export interface Builtin {
  readonly name: BuiltinName
  readonly arity: 1 | 2
}

export const power = (base: number, exponent: number): number =>
  base < 0 && !Number.isInteger(exponent) ? Number.NaN : Math.pow(base, exponent)

export const naturalLog = (x: number): number => (x > 0 ? Math.log(x) : Number.NaN)

export const unaryKernels: Readonly<Record<Extract<BuiltinName, "sin" | "cos" | "exp" | "log" | "sqrt" | "abs">, (x: number) => number>> = {
  sin: Math.sin,
  cos: Math.cos,
  exp: Math.exp,
  log: naturalLog,
  sqrt: Math.sqrt,
  abs: Math.abs,
}

export const binaryKernels: Readonly<Record<Extract<BuiltinName, "pow" | "min" | "max">, (a: number, b: number) => number>> = {
  pow: power,
  min: Math.min,
  max: Math.max,
}

const builtins: ReadonlyArray<Builtin> = [
  { name: "sin", arity: 1 },
  { name: "cos", arity: 1 },
  { name: "exp", arity: 1 },
  { name: "log", arity: 1 },
  { name: "sqrt", arity: 1 },
  { name: "abs", arity: 1 },
  { name: "pow", arity: 2 },
  { name: "min", arity: 2 },
  { name: "max", arity: 2 },
]

// Lowercase names plus the capitalised notebook spellings (`Sin`, `Power`, ...).
const byName = new Map<string, Builtin>()
for (const builtin of builtins) {
  byName.set(builtin.name, builtin)
  byName.set(builtin.name.charAt(0).toUpperCase() + builtin.name.slice(1), builtin)
}
const powBuiltin = byName.get("pow")
if (powBuiltin) {
  byName.set("Power", powBuiltin)
}

export const lookupBuiltin = (name: string): Builtin | undefined => byName.get(name)

export const isBuiltinName = (name: string): boolean => byName.has(name)

/**
 * Identifier reserved for the derivative operator.
 */
export const DERIVATIVE_OPERATOR = "D"
