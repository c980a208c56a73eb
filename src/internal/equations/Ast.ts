export type NodeId = string

export interface Span {
  readonly start: number
  readonly end: number
  readonly line: number
  readonly column: number
}

export type BinaryOp = "+" | "-" | "*" | "/" | "^"

export interface NumberLiteralNode {
  readonly _tag: "NumberLiteral"
  readonly id: NodeId
  readonly value: number
  readonly span: Span
}

/**
 * Variable reference. `argument` is set for the applied form `x[t]` / `x(t)`
 * and names the variable the reference is applied to.
 */
export interface ReferenceNode {
  readonly _tag: "Ref"
  readonly id: NodeId
  readonly name: string
  readonly argument?: string
  readonly span: Span
}

export interface NegateNode {
  readonly _tag: "Negate"
  readonly id: NodeId
  readonly expr: Expr
  readonly span: Span
}

export interface BinaryNode {
  readonly _tag: "Binary"
  readonly id: NodeId
  readonly op: BinaryOp
  readonly left: Expr
  readonly right: Expr
  readonly span: Span
}

export interface CallNode {
  readonly _tag: "Call"
  readonly id: NodeId
  readonly name: string
  readonly args: ReadonlyArray<Expr>
  readonly span: Span
}

export type Expr = NumberLiteralNode | ReferenceNode | NegateNode | BinaryNode | CallNode

/**
 * Derivative of a state variable. `withRespectTo` is present only for the
 * explicit forms (`D[x[t], t]`, `x'[t]`) that name the independent variable;
 * `argument` holds the inner application in `D[x[t], t]`.
 */
export interface DerivativeNode {
  readonly _tag: "Derivative"
  readonly id: NodeId
  readonly variable: string
  readonly argument?: string
  readonly withRespectTo?: string
  readonly span: Span
}

export type EquationForm = "single" | "list"

/**
 * Top-level `lhs == rhs`. Both sides are lists so a malformed list form with
 * mismatched lengths still parses; pairing them up is the binder's job.
 */
export interface EquationNode {
  readonly _tag: "Equation"
  readonly id: NodeId
  readonly form: EquationForm
  readonly derivatives: ReadonlyArray<DerivativeNode>
  readonly rhs: ReadonlyArray<Expr>
  readonly span: Span
}

export type Node = Expr | DerivativeNode | EquationNode
