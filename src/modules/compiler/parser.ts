/**
 * Parser — builds a ModuleNode from a token stream.
 *
 * Expressions are parsed by precedence climbing over the operators the
 * extension set provides. Filters, functions and tests are checked against
 * the extension set here, so unknown names fail at compile time.
 */

import { TemplateSyntaxError } from '../../core/errors.js'
import type { CompilerEnvironment } from './compile-pipeline.js'
import type {
  ExpressionNode,
  HashEntry,
  IfBranch,
  IncludeNode,
  ModuleNode,
  StatementNode,
} from './nodes.js'
import type { Token, TokenStream } from './token-stream.js'

const END_TAGS = new Set(['endif', 'elseif', 'else', 'endfor'])

export class Parser {
  constructor(
    private readonly env: CompilerEnvironment,
    private readonly stream: TokenStream
  ) {}

  parse(): ModuleNode {
    return { type: 'module', name: this.stream.name, body: this.subparse(null) }
  }

  // -------------------------------------------------------------------------
  // Statements
  // -------------------------------------------------------------------------

  /**
   * Parse statements until EOF or until a tag in `endTags` is reached; in the
   * latter case the tag name is left as the current token.
   */
  private subparse(endTags: string[] | null): StatementNode[] {
    const body: StatementNode[] = []

    while (!this.stream.isEOF()) {
      const token = this.stream.current
      switch (token.type) {
        case 'text':
          this.stream.next()
          body.push({ type: 'text', data: token.value, lineno: token.lineno })
          break

        case 'var_start': {
          this.stream.next()
          const expr = this.parseExpression()
          this.stream.expect('var_end')
          body.push({ type: 'print', expr, lineno: token.lineno })
          break
        }

        case 'block_start': {
          this.stream.next()
          const tag = this.stream.current
          if (tag.type !== 'name') {
            throw this.error('A block must start with a tag name.', tag)
          }
          if (endTags !== null && endTags.includes(tag.value)) {
            return body
          }
          this.stream.next()
          body.push(this.parseTag(tag))
          break
        }

        default:
          throw this.error('Lexer or parser ended up in unsupported state.', token)
      }
    }

    if (endTags !== null) {
      throw this.error(
        `Unexpected end of template (expecting one of: ${endTags.join(', ')}).`,
        this.stream.current
      )
    }
    return body
  }

  private parseTag(tag: Token): StatementNode {
    switch (tag.value) {
      case 'if':
        return this.parseIf(tag)
      case 'for':
        return this.parseFor(tag)
      case 'set':
        return this.parseSet(tag)
      case 'include':
        return this.parseInclude(tag)
      default:
        if (END_TAGS.has(tag.value)) {
          throw this.error(`Unexpected "${tag.value}" tag.`, tag)
        }
        throw this.error(`Unknown "${tag.value}" tag.`, tag)
    }
  }

  private parseIf(tag: Token): StatementNode {
    const branches: IfBranch[] = []
    let condition = this.parseExpression()
    this.stream.expect('block_end')
    branches.push({ condition, body: this.subparse(['elseif', 'else', 'endif']) })

    let elseBody: StatementNode[] | null = null
    for (;;) {
      const end = this.stream.next()
      if (end.value === 'elseif') {
        condition = this.parseExpression()
        this.stream.expect('block_end')
        branches.push({ condition, body: this.subparse(['elseif', 'else', 'endif']) })
        continue
      }
      if (end.value === 'else') {
        this.stream.expect('block_end')
        elseBody = this.subparse(['endif'])
        this.stream.next()
      }
      break
    }
    this.stream.expect('block_end')

    return { type: 'if', branches, elseBody, lineno: tag.lineno }
  }

  private parseFor(tag: Token): StatementNode {
    let keyTarget: string | null = null
    let valueTarget = this.stream.expect('name', undefined, 'Expected a loop variable').value
    if (this.stream.test('punctuation', ',')) {
      this.stream.next()
      keyTarget = valueTarget
      valueTarget = this.stream.expect('name', undefined, 'Expected a loop variable').value
    }
    this.stream.expect('operator', 'in')
    const sequence = this.parseExpression()
    this.stream.expect('block_end')

    const body = this.subparse(['else', 'endfor'])
    let elseBody: StatementNode[] | null = null
    if (this.stream.next().value === 'else') {
      this.stream.expect('block_end')
      elseBody = this.subparse(['endfor'])
      this.stream.next()
    }
    this.stream.expect('block_end')

    return { type: 'for', keyTarget, valueTarget, sequence, body, elseBody, lineno: tag.lineno }
  }

  private parseSet(tag: Token): StatementNode {
    const name = this.stream.expect('name', undefined, 'Expected a variable name').value
    this.stream.expect('operator', '=')
    const value = this.parseExpression()
    this.stream.expect('block_end')
    return { type: 'set', name, value, lineno: tag.lineno }
  }

  private parseInclude(tag: Token): IncludeNode {
    const template = this.parseExpression()

    let ignoreMissing = false
    if (this.stream.test('name', 'ignore')) {
      this.stream.next()
      this.stream.expect('name', 'missing')
      ignoreMissing = true
    }

    let variables: ExpressionNode | null = null
    if (this.stream.test('name', 'with')) {
      this.stream.next()
      variables = this.parseExpression()
    }

    let only = false
    if (this.stream.test('name', 'only')) {
      this.stream.next()
      only = true
    }
    this.stream.expect('block_end')

    return { type: 'include', template, variables, only, ignoreMissing, lineno: tag.lineno }
  }

  // -------------------------------------------------------------------------
  // Expressions
  // -------------------------------------------------------------------------

  parseExpression(precedence = 0): ExpressionNode {
    let expr = this.getPrimary()

    for (;;) {
      const token = this.stream.current
      const operator =
        token.type === 'operator' ? this.env.getBinaryOperators().get(token.value) : undefined
      if (operator === undefined || operator.precedence < precedence) break

      this.stream.next()
      if (operator.kind === 'test') {
        expr = this.parseTestExpression(expr, operator.negated, token)
      } else {
        const right = this.parseExpression(
          operator.associativity === 'left' ? operator.precedence + 1 : operator.precedence
        )
        expr = { type: 'binary', operator: token.value, left: expr, right, lineno: token.lineno }
      }
    }

    return precedence === 0 ? this.parseConditional(expr) : expr
  }

  private getPrimary(): ExpressionNode {
    const token = this.stream.current

    if (token.type === 'operator') {
      const operator = this.env.getUnaryOperators().get(token.value)
      if (operator !== undefined) {
        this.stream.next()
        const node = this.parseExpression(operator.precedence)
        return this.parsePostfix({ type: 'unary', operator: token.value, node, lineno: token.lineno })
      }
    }

    if (token.type === 'punctuation' && token.value === '(') {
      this.stream.next()
      const expr = this.parseExpression()
      this.stream.expect('punctuation', ')', 'An opened parenthesis is not properly closed')
      return this.parsePostfix(expr)
    }

    return this.parsePrimaryExpression()
  }

  private parseConditional(expr: ExpressionNode): ExpressionNode {
    let result = expr
    while (this.stream.test('punctuation', '?')) {
      const token = this.stream.next()
      const then = this.parseExpression()
      this.stream.expect('punctuation', ':', 'The ternary operator must have a default value')
      const otherwise = this.parseExpression()
      result = { type: 'conditional', test: result, then, otherwise, lineno: token.lineno }
    }
    return result
  }

  private parsePrimaryExpression(): ExpressionNode {
    const token = this.stream.current
    let node: ExpressionNode

    switch (token.type) {
      case 'name':
        this.stream.next()
        node = this.parseName(token)
        break
      case 'number':
        this.stream.next()
        node = { type: 'constant', value: Number(token.value), lineno: token.lineno }
        break
      case 'string':
        this.stream.next()
        node = { type: 'constant', value: token.value, lineno: token.lineno }
        break
      case 'punctuation':
        if (token.value === '[') {
          node = this.parseArray()
          break
        }
        if (token.value === '{') {
          node = this.parseHash()
          break
        }
        throw this.unexpected(token)
      default:
        throw this.unexpected(token)
    }

    return this.parsePostfix(node)
  }

  private parseName(token: Token): ExpressionNode {
    switch (token.value) {
      case 'true':
      case 'TRUE':
        return { type: 'constant', value: true, lineno: token.lineno }
      case 'false':
      case 'FALSE':
        return { type: 'constant', value: false, lineno: token.lineno }
      case 'null':
      case 'NULL':
      case 'none':
      case 'NONE':
        return { type: 'constant', value: null, lineno: token.lineno }
    }

    if (this.stream.test('punctuation', '(')) {
      if (this.env.getFunction(token.value) === undefined) {
        throw this.error(`Unknown "${token.value}" function.`, token)
      }
      return { type: 'function', name: token.value, args: this.parseArguments(), lineno: token.lineno }
    }

    return { type: 'name', name: token.value, lineno: token.lineno }
  }

  private parsePostfix(start: ExpressionNode): ExpressionNode {
    let node = start
    for (;;) {
      const token = this.stream.current
      if (token.type !== 'punctuation') break

      if (token.value === '.') {
        this.stream.next()
        const attr = this.stream.next()
        if (attr.type !== 'name' && attr.type !== 'number') {
          throw this.error(`Expected name or number after "." but got "${attr.value}".`, attr)
        }
        const attribute: ExpressionNode = {
          type: 'constant',
          value: attr.type === 'number' ? Number(attr.value) : attr.value,
          lineno: attr.lineno,
        }
        node = { type: 'getAttr', node, attribute, lineno: token.lineno }
      } else if (token.value === '[') {
        this.stream.next()
        const attribute = this.parseExpression()
        this.stream.expect('punctuation', ']')
        node = { type: 'getAttr', node, attribute, lineno: token.lineno }
      } else if (token.value === '|') {
        this.stream.next()
        node = this.parseFilter(node)
      } else {
        break
      }
    }
    return node
  }

  private parseFilter(node: ExpressionNode): ExpressionNode {
    const name = this.stream.expect('name', undefined, 'Expected a filter name')
    if (this.env.getFilter(name.value) === undefined) {
      throw this.error(`Unknown "${name.value}" filter.`, name)
    }
    const args = this.stream.test('punctuation', '(') ? this.parseArguments() : []
    return { type: 'filter', node, filter: name.value, args, lineno: name.lineno }
  }

  private parseTestExpression(node: ExpressionNode, negated: boolean, operator: Token): ExpressionNode {
    const name = this.stream.expect('name', undefined, 'Expected a test name')
    if (this.env.getTest(name.value) === undefined) {
      throw this.error(`Unknown "${name.value}" test.`, name)
    }
    const args = this.stream.test('punctuation', '(') ? this.parseArguments() : []
    return { type: 'test', node, test: name.value, args, negated, lineno: operator.lineno }
  }

  private parseArguments(): ExpressionNode[] {
    const args: ExpressionNode[] = []
    this.stream.expect('punctuation', '(', 'A list of arguments must begin with an opening parenthesis')
    while (!this.stream.test('punctuation', ')')) {
      if (args.length > 0) {
        this.stream.expect('punctuation', ',', 'Arguments must be separated by a comma')
      }
      args.push(this.parseExpression())
    }
    this.stream.expect('punctuation', ')', 'A list of arguments must be closed by a parenthesis')
    return args
  }

  private parseArray(): ExpressionNode {
    const open = this.stream.expect('punctuation', '[', 'An array element was expected')
    const elements: ExpressionNode[] = []
    while (!this.stream.test('punctuation', ']')) {
      if (elements.length > 0) {
        this.stream.expect('punctuation', ',', 'An array element must be followed by a comma')
        // trailing comma
        if (this.stream.test('punctuation', ']')) break
      }
      elements.push(this.parseExpression())
    }
    this.stream.expect('punctuation', ']', 'An opened array is not properly closed')
    return { type: 'array', elements, lineno: open.lineno }
  }

  private parseHash(): ExpressionNode {
    const open = this.stream.expect('punctuation', '{', 'A hash element was expected')
    const entries: HashEntry[] = []
    while (!this.stream.test('punctuation', '}')) {
      if (entries.length > 0) {
        this.stream.expect('punctuation', ',', 'A hash value must be followed by a comma')
        if (this.stream.test('punctuation', '}')) break
      }
      const key = this.stream.next()
      if (key.type !== 'name' && key.type !== 'string' && key.type !== 'number') {
        throw this.error('A hash key must be a quoted string, a number or a name.', key)
      }
      this.stream.expect('punctuation', ':', 'A hash key must be followed by a colon (:)')
      entries.push({ key: key.value, value: this.parseExpression() })
    }
    this.stream.expect('punctuation', '}', 'An opened hash is not properly closed')
    return { type: 'hash', entries, lineno: open.lineno }
  }

  // -------------------------------------------------------------------------
  // Errors
  // -------------------------------------------------------------------------

  private unexpected(token: Token): TemplateSyntaxError {
    const value = token.value === '' ? '' : ` of value "${token.value}"`
    return this.error(`Unexpected token "${token.type}"${value}.`, token)
  }

  private error(message: string, token: Token): TemplateSyntaxError {
    return new TemplateSyntaxError(message, { templateName: this.stream.name, lineno: token.lineno })
  }
}
