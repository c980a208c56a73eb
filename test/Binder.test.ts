import { describe, expect, it } from "@effect/vitest"
import { Either } from "effect"
import { type BindOptions, bindSystemEither, type CompiledSystemSpec } from "../src/internal/equations/Binder.js"
import type { BindError } from "../src/internal/equations/errors.js"
import { parseSystemAst } from "../src/internal/equations/Parser.js"

const bind = (source: string, options?: BindOptions): CompiledSystemSpec => {
  const result = bindSystemEither(parseSystemAst(source), options)
  if (Either.isLeft(result)) {
    throw new Error(`expected "${source}" to bind: ${result.left.message}`)
  }
  return result.right
}

const bindFailure = (source: string, options?: BindOptions): BindError => {
  const result = bindSystemEither(parseSystemAst(source), options)
  if (Either.isRight(result)) {
    throw new Error(`expected "${source}" to fail binding`)
  }
  return result.left
}

describe("semantic binder", () => {
  it("fixes state order from the derivative list", () => {
    const spec = bind("{D(x), D(y)} == {x - y, x*y}")
    expect(spec.stateVariables).toEqual(["x", "y"])
    expect(spec.independentVariable).toBe("t")
    expect(spec.equations[0]).toEqual({
      _tag: "Binary",
      op: "-",
      left: { _tag: "State", index: 0, name: "x" },
      right: { _tag: "State", index: 1, name: "y" },
    })
  })

  it("orders by first appearance, not alphabetically", () => {
    expect(bind("{D(y), D(x)} == {x, y}").stateVariables).toEqual(["y", "x"])
  })

  it("reports unbound identifiers with their offset", () => {
    const error = bindFailure("{D(x)} == {x+z}")
    expect(error._tag).toBe("UnknownIdentifierError")
    expect(error).toMatchObject({ name: "z", offset: 13 })
  })

  it("resolves the independent variable", () => {
    expect(bind("D(x) == t").equations[0]).toEqual({ _tag: "Time" })
    expect(bind("D(x) == s", { independentVariable: "s" }).equations[0]).toEqual({ _tag: "Time" })
    expect(bindFailure("D(x) == t", { independentVariable: "s" })).toMatchObject({
      _tag: "UnknownIdentifierError",
      name: "t",
    })
  })

  it("substitutes parameters as constants", () => {
    const spec = bind("D(x) == -k*x", { parameters: { k: 2 } })
    expect(spec.parameters).toEqual({ k: 2 })
    expect(spec.equations[0]).toEqual({
      _tag: "Binary",
      op: "*",
      left: { _tag: "Neg", expr: { _tag: "Const", value: 2 } },
      right: { _tag: "State", index: 0, name: "x" },
    })
  })

  it("accepts applied references in the independent variable", () => {
    const spec = bind("{x'[t], y'[t]} == {y[t], -x[t]}")
    expect(spec.equations).toEqual([
      { _tag: "State", index: 1, name: "y" },
      { _tag: "Neg", expr: { _tag: "State", index: 0, name: "x" } },
    ])
  })

  it("rejects applications to anything but the independent variable", () => {
    expect(bindFailure("D(x) == x[s]")._tag).toBe("UnsupportedConstructError")
    expect(bindFailure("D[x[t], s] == x")._tag).toBe("UnsupportedConstructError")
    expect(bindFailure("x'[s] == x")._tag).toBe("UnsupportedConstructError")
  })

  it("rejects repeated state variables", () => {
    const error = bindFailure("{D(x), D(x)} == {1, 2}")
    expect(error._tag).toBe("UnsupportedConstructError")
    expect(error.offset).toBe(7)
  })

  it("rejects a state variable named like the independent variable", () => {
    expect(bindFailure("D(t) == 1")._tag).toBe("UnsupportedConstructError")
  })

  it("rejects a parameter that shadows a state variable", () => {
    expect(bindFailure("D(x) == x", { parameters: { x: 1 } })._tag).toBe("UnsupportedConstructError")
  })

  it("checks list lengths", () => {
    expect(bindFailure("{D(x), D(y)} == {x}")).toMatchObject({
      _tag: "ArityMismatchError",
      expected: 2,
      actual: 1,
    })
    expect(bindFailure("D(x) == {x, x}")).toMatchObject({
      _tag: "ArityMismatchError",
      expected: 1,
      actual: 2,
    })
  })

  it("rejects derivatives on the right-hand side", () => {
    expect(bindFailure("D(x) == D(x)")._tag).toBe("UnsupportedConstructError")
  })

  it("rejects unknown functions", () => {
    const error = bindFailure("D(x) == foo(x, 1)")
    expect(error._tag).toBe("UnsupportedConstructError")
    expect(error.message).toBe(`Unsupported construct at offset 8: unknown function "foo"`)
  })

  it("checks builtin argument counts", () => {
    expect(bindFailure("D(x) == sin(x, 1)")).toMatchObject({
      _tag: "ArityMismatchError",
      subject: `function "sin"`,
      expected: 1,
      actual: 2,
    })
    expect(bindFailure("D(x) == pow(x)")).toMatchObject({ expected: 2, actual: 1 })
  })

  it("rejects statically undefined literal forms", () => {
    for (const source of ["D(x) == x/0", "D(x) == x/-0", "D(x) == 0^-1", "D(x) == pow(0, -2)"]) {
      expect(bindFailure(source)._tag).toBe("UndefinedOperationError")
    }
  })

  it("defers division by a computed zero to evaluation", () => {
    expect(bind("D(x) == x/(1-1)").stateVariables).toEqual(["x"])
  })

  it("rejects an empty system", () => {
    expect(bindFailure("{} == {}")._tag).toBe("UnsupportedConstructError")
  })
})
