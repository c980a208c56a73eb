import { Lexer, createToken } from "chevrotain"

/**
 * Token definitions for the equation lexer. Characters outside this
 * vocabulary are lexing errors reported with their offset.
 */

export const WhiteSpace = createToken({ name: "WhiteSpace", pattern: /\s+/, group: Lexer.SKIPPED })

export const NumberLiteral = createToken({
  name: "NumberLiteral",
  pattern: /(?:\d+\.\d*|\.\d+|\d+)(?:[eE][+-]?\d+)?/,
})

export const Identifier = createToken({ name: "Identifier", pattern: /[A-Za-z]+[0-9]*/ })

export const EqEq = createToken({ name: "EqEq", pattern: /==/ })
export const Plus = createToken({ name: "Plus", pattern: /\+/ })
export const Minus = createToken({ name: "Minus", pattern: /-/ })
export const Star = createToken({ name: "Star", pattern: /\*/ })
export const Slash = createToken({ name: "Slash", pattern: /\// })
export const Caret = createToken({ name: "Caret", pattern: /\^/ })
export const Prime = createToken({ name: "Prime", pattern: /'/ })
export const LParen = createToken({ name: "LParen", pattern: /\(/ })
export const RParen = createToken({ name: "RParen", pattern: /\)/ })
export const LBracket = createToken({ name: "LBracket", pattern: /\[/ })
export const RBracket = createToken({ name: "RBracket", pattern: /\]/ })
export const LBrace = createToken({ name: "LBrace", pattern: /\{/ })
export const RBrace = createToken({ name: "RBrace", pattern: /\}/ })
export const Comma = createToken({ name: "Comma", pattern: /,/ })

export const EquationTokens = [
  WhiteSpace,
  NumberLiteral,
  Identifier,
  EqEq,
  Plus,
  Minus,
  Star,
  Slash,
  Caret,
  Prime,
  LParen,
  RParen,
  LBracket,
  RBracket,
  LBrace,
  RBrace,
  Comma,
]

export const EquationLexer = new Lexer(EquationTokens, { positionTracking: "full" })
