/**
 * Abstract syntax tree produced by the parser and consumed by node visitors
 * and the code generator.
 */

// ---------------------------------------------------------------------------
// Expressions
// ---------------------------------------------------------------------------

export type ConstantValue = string | number | boolean | null

export interface ConstantExpression {
  type: 'constant'
  value: ConstantValue
  lineno: number
}

export interface NameExpression {
  type: 'name'
  name: string
  lineno: number
}

export interface ArrayExpression {
  type: 'array'
  elements: ExpressionNode[]
  lineno: number
}

export interface HashEntry {
  key: string
  value: ExpressionNode
}

export interface HashExpression {
  type: 'hash'
  entries: HashEntry[]
  lineno: number
}

/** `node.attribute` or `node[attribute]` */
export interface GetAttrExpression {
  type: 'getAttr'
  node: ExpressionNode
  attribute: ExpressionNode
  lineno: number
}

export interface FilterExpression {
  type: 'filter'
  node: ExpressionNode
  filter: string
  args: ExpressionNode[]
  lineno: number
}

export interface FunctionExpression {
  type: 'function'
  name: string
  args: ExpressionNode[]
  lineno: number
}

/** `node is [not] test(args)` */
export interface TestExpression {
  type: 'test'
  node: ExpressionNode
  test: string
  args: ExpressionNode[]
  negated: boolean
  lineno: number
}

export interface UnaryExpression {
  type: 'unary'
  operator: string
  node: ExpressionNode
  lineno: number
}

export interface BinaryExpression {
  type: 'binary'
  operator: string
  left: ExpressionNode
  right: ExpressionNode
  lineno: number
}

/** `test ? then : otherwise` */
export interface ConditionalExpression {
  type: 'conditional'
  test: ExpressionNode
  then: ExpressionNode
  otherwise: ExpressionNode
  lineno: number
}

export type ExpressionNode =
  | ConstantExpression
  | NameExpression
  | ArrayExpression
  | HashExpression
  | GetAttrExpression
  | FilterExpression
  | FunctionExpression
  | TestExpression
  | UnaryExpression
  | BinaryExpression
  | ConditionalExpression

// ---------------------------------------------------------------------------
// Statements
// ---------------------------------------------------------------------------

export interface TextNode {
  type: 'text'
  data: string
  lineno: number
}

export interface PrintNode {
  type: 'print'
  expr: ExpressionNode
  lineno: number
}

export interface IfBranch {
  condition: ExpressionNode
  body: StatementNode[]
}

export interface IfNode {
  type: 'if'
  branches: IfBranch[]
  elseBody: StatementNode[] | null
  lineno: number
}

export interface ForNode {
  type: 'for'
  keyTarget: string | null
  valueTarget: string
  sequence: ExpressionNode
  body: StatementNode[]
  elseBody: StatementNode[] | null
  lineno: number
}

export interface SetNode {
  type: 'set'
  name: string
  value: ExpressionNode
  lineno: number
}

export interface IncludeNode {
  type: 'include'
  template: ExpressionNode
  variables: ExpressionNode | null
  only: boolean
  ignoreMissing: boolean
  lineno: number
}

export type StatementNode = TextNode | PrintNode | IfNode | ForNode | SetNode | IncludeNode

/** Root of a parsed template */
export interface ModuleNode {
  type: 'module'
  name: string
  body: StatementNode[]
}
