/**
 * Tokens produced by the lexer and the cursor the parser reads them through.
 */

import { TemplateSyntaxError } from '../../core/errors.js'

export type TokenType =
  | 'text'
  | 'var_start'
  | 'var_end'
  | 'block_start'
  | 'block_end'
  | 'name'
  | 'number'
  | 'string'
  | 'operator'
  | 'punctuation'
  | 'eof'

export interface Token {
  type: TokenType
  value: string
  lineno: number
}

export class TokenStream {
  private _current = 0

  constructor(
    private readonly tokens: Token[],
    /** Template name, used in error messages */
    readonly name: string
  ) {}

  get current(): Token {
    return this.at(this._current)
  }

  /** Look ahead without moving; `look(1)` is the token after the current one */
  look(offset = 1): Token {
    return this.at(this._current + offset)
  }

  /** Move to the next token and return the one that was current */
  next(): Token {
    const token = this.current
    if (token.type !== 'eof') {
      this._current++
    }
    return token
  }

  test(type: TokenType, values?: string | string[]): boolean {
    const token = this.current
    if (token.type !== type) return false
    if (values === undefined) return true
    return typeof values === 'string' ? token.value === values : values.includes(token.value)
  }

  /** Consume the current token if it matches, otherwise fail */
  expect(type: TokenType, value?: string, message?: string): Token {
    if (!this.test(type, value)) {
      const token = this.current
      const found = token.value === '' ? `"${token.type}"` : `"${token.type}" of value "${token.value}"`
      const wanted = value === undefined ? `"${type}"` : `"${type}" with value "${value}"`
      throw new TemplateSyntaxError(
        `${message !== undefined ? `${message}. ` : ''}Unexpected token ${found} (${wanted} expected).`,
        { templateName: this.name, lineno: token.lineno }
      )
    }
    return this.next()
  }

  isEOF(): boolean {
    return this.current.type === 'eof'
  }

  private at(index: number): Token {
    const token = this.tokens[Math.min(index, this.tokens.length - 1)]
    if (token === undefined) {
      throw new TemplateSyntaxError('Unexpected end of template.', { templateName: this.name })
    }
    return token
  }
}
