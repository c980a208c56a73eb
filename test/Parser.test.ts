import { describe, expect, it } from "@effect/vitest"
import { Effect, Either } from "effect"
import { EquationParseError } from "../src/internal/equations/errors.js"
import { parseSystemAst, parseSystemEffect, parseSystemEither } from "../src/internal/equations/Parser.js"

const parseFailure = (source: string): EquationParseError => {
  const result = parseSystemEither(source)
  if (Either.isRight(result)) {
    throw new Error(`expected "${source}" to fail`)
  }
  return result.left
}

describe("equation parser", () => {
  it("parses the list form", () => {
    const equation = parseSystemAst("{D(x), D(y)} == {x - y, x*y}")
    expect(equation.form).toBe("list")
    expect(equation.derivatives.map((derivative) => derivative.variable)).toEqual(["x", "y"])
    expect(equation.rhs).toMatchObject([
      { _tag: "Binary", op: "-", left: { _tag: "Ref", name: "x" }, right: { _tag: "Ref", name: "y" } },
      { _tag: "Binary", op: "*", left: { _tag: "Ref", name: "x" }, right: { _tag: "Ref", name: "y" } },
    ])
  })

  it("parses the single form", () => {
    const equation = parseSystemAst("D(x) == -x")
    expect(equation.form).toBe("single")
    expect(equation.derivatives).toHaveLength(1)
    expect(equation.rhs).toMatchObject([{ _tag: "Negate", expr: { _tag: "Ref", name: "x" } }])
  })

  it("parses arithmetic with precedence", () => {
    const [expr] = parseSystemAst("D(x) == 1 + 2 * 3").rhs
    expect(expr).toMatchObject({
      _tag: "Binary",
      op: "+",
      left: { _tag: "NumberLiteral", value: 1 },
      right: {
        _tag: "Binary",
        op: "*",
        left: { _tag: "NumberLiteral", value: 2 },
        right: { _tag: "NumberLiteral", value: 3 },
      },
    })
  })

  it("keeps subtraction left-associative", () => {
    const [expr] = parseSystemAst("D(x) == 8 - 4 - 2").rhs
    expect(expr).toMatchObject({
      _tag: "Binary",
      op: "-",
      left: { _tag: "Binary", op: "-", left: { value: 8 }, right: { value: 4 } },
      right: { value: 2 },
    })
  })

  it("makes exponentiation right-associative", () => {
    const [expr] = parseSystemAst("D(x) == 2^3^2").rhs
    expect(expr).toMatchObject({
      _tag: "Binary",
      op: "^",
      left: { _tag: "NumberLiteral", value: 2 },
      right: { _tag: "Binary", op: "^", left: { value: 3 }, right: { value: 2 } },
    })
  })

  it("binds unary minus looser than exponentiation", () => {
    const [negated] = parseSystemAst("D(x) == -x^2").rhs
    expect(negated).toMatchObject({
      _tag: "Negate",
      expr: { _tag: "Binary", op: "^", left: { name: "x" }, right: { value: 2 } },
    })

    const [exponent] = parseSystemAst("D(x) == 2^-1").rhs
    expect(exponent).toMatchObject({
      _tag: "Binary",
      op: "^",
      left: { value: 2 },
      right: { _tag: "Negate", expr: { value: 1 } },
    })
  })

  it("drops unary plus", () => {
    const [expr] = parseSystemAst("D(x) == +x").rhs
    expect(expr).toMatchObject({ _tag: "Ref", name: "x" })
  })

  it("reads decimal and exponent literals", () => {
    const equation = parseSystemAst("{D(x), D(y), D(z)} == {1.5e-3, .25, 2.}")
    expect(equation.rhs.map((expr) => (expr._tag === "NumberLiteral" ? expr.value : Number.NaN))).toEqual([
      0.0015, 0.25, 2,
    ])
  })

  it("accepts every derivative surface form", () => {
    const prime = parseSystemAst("x'[t] == -x").derivatives[0]
    expect(prime).toMatchObject({ variable: "x", withRespectTo: "t" })
    expect(prime?.argument).toBeUndefined()

    expect(parseSystemAst("x'(t) == -x").derivatives[0]).toMatchObject({ variable: "x", withRespectTo: "t" })

    const explicit = parseSystemAst("D[x[t], t] == -x[t]")
    expect(explicit.derivatives[0]).toMatchObject({ variable: "x", argument: "t", withRespectTo: "t" })
    expect(explicit.rhs[0]).toMatchObject({ _tag: "Negate", expr: { _tag: "Ref", name: "x", argument: "t" } })

    const bare = parseSystemAst("D(x) == x").derivatives[0]
    expect(bare?.variable).toBe("x")
    expect(bare?.withRespectTo).toBeUndefined()
  })

  it("reads applied references in both bracket styles", () => {
    const equation = parseSystemAst("{x'[t], y'[t]} == {y[t], -x(t)}")
    expect(equation.rhs).toMatchObject([
      { _tag: "Ref", name: "y", argument: "t" },
      { _tag: "Negate", expr: { _tag: "Ref", name: "x", argument: "t" } },
    ])
  })

  it("parses builtin calls including capitalised names", () => {
    const equation = parseSystemAst("{D(x), D(y)} == {Sin[x], pow(y, 2)}")
    expect(equation.rhs).toMatchObject([
      { _tag: "Call", name: "Sin", args: [{ _tag: "Ref", name: "x" }] },
      { _tag: "Call", name: "pow", args: [{ _tag: "Ref", name: "y" }, { _tag: "NumberLiteral", value: 2 }] },
    ])
  })

  it("records source spans", () => {
    const [expr] = parseSystemAst("D(x) == x + 10").rhs
    expect(expr?.span).toMatchObject({ start: 8, end: 14, line: 1, column: 9 })
  })

  it("rejects blank input", () => {
    for (const source of ["", "   \n  "]) {
      const error = parseFailure(source)
      expect(error.code).toBe("EmptyInput")
      expect(error.offset).toBe(0)
    }
  })

  it("reports an unclosed parenthesis at its opener", () => {
    const error = parseFailure("D(x) == (x + 1")
    expect(error.code).toBe("UnterminatedGroup")
    expect(error.offset).toBe(8)
    expect(error.line).toBe(1)
    expect(error.column).toBe(9)
    expect(error.snippet).toBe("D(x) == (x + 1\n        ^")
  })

  it("reports an unclosed brace at its opener", () => {
    const error = parseFailure("{D(x), D(y)} == {x, y")
    expect(error.code).toBe("UnterminatedGroup")
    expect(error.offset).toBe(16)
  })

  it("reports a token where a closer was expected", () => {
    const error = parseFailure("{D(x), D(y) == {x, y}")
    expect(error.code).toBe("UnexpectedToken")
    expect(error.offset).toBe(12)
  })

  it("reports characters outside the vocabulary", () => {
    const error = parseFailure("D(x) == x $ 1")
    expect(error.code).toBe("UnexpectedToken")
    expect(error.offset).toBe(10)

    expect(parseFailure("D(x) = x").offset).toBe(5)
  })

  it("rejects trailing tokens", () => {
    const error = parseFailure("D(x) == x y")
    expect(error.code).toBe("UnexpectedToken")
    expect(error.offset).toBe(10)
  })

  it("requires the independent variable after a prime", () => {
    const error = parseFailure("x' == -x")
    expect(error.code).toBe("UnexpectedToken")
    expect(error.offset).toBe(3)
    expect(error.problem).toBe(`Expected "[t]" or "(t)" after "x'"`)

    expect(parseFailure("x'").offset).toBe(2)
  })

  it("rejects expressions nested too deeply", () => {
    const parens = parseFailure(`D(x) == ${"(".repeat(300)}x${")".repeat(300)}`)
    expect(parens.code).toBe("NestingTooDeep")
    expect(parens.offset).toBe(264)
    expect(parens.problem).toBe("Expression nested too deeply (more than 256 levels)")

    const chain = parseFailure(`D(x) == x${" + x".repeat(300)}`)
    expect(chain.code).toBe("NestingTooDeep")
    expect(chain.offset).toBe(1030)
  })

  it("accepts nesting within the limit", () => {
    expect(parseSystemAst(`D(x) == ${"(".repeat(200)}x${")".repeat(200)}`).rhs[0]).toMatchObject({
      _tag: "Ref",
      name: "x",
    })
    expect(parseSystemAst(`D(x) == x${" + x".repeat(200)}`).rhs[0]).toMatchObject({ _tag: "Binary", op: "+" })
  })

  it("computes line and column across newlines", () => {
    const error = parseFailure("{D(x),\n D(y)} == {x,\n y +}")
    expect(error.offset).toBe(25)
    expect(error.line).toBe(3)
    expect(error.column).toBe(5)
    expect(error.snippet).toBe(" y +}\n    ^")
    expect(error.message).toBe(`Equation parse error at line 3, column 5: Unexpected token "}"`)
  })

  it.effect("exposes an Effect wrapper", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(parseSystemEffect("D(x) =="))
      expect(error).toBeInstanceOf(EquationParseError)
      expect(error.code).toBe("UnexpectedToken")

      const equation = yield* parseSystemEffect("D(x) == 1")
      expect(equation.rhs).toHaveLength(1)
    }),
  )
})
