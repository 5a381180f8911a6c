/**
 * Lexer — splits template source into text and expression tokens.
 *
 * Delimiters: `{{ }}` output, `{% %}` tags, `{# #}` comments. A `-` inside a
 * delimiter (`{{-`, `-%}`) trims whitespace on that side.
 */

import { TemplateSyntaxError } from '../../core/errors.js'
import type { CompilerEnvironment } from './compile-pipeline.js'
import { TokenStream, type Token, type TokenType } from './token-stream.js'

const TAG_START_RE = /\{\{|\{%|\{#/g
const WHITESPACE_RE = /\s+/y
const NAME_RE = /[a-zA-Z_][a-zA-Z0-9_]*/y
const NUMBER_RE = /[0-9]+(?:\.[0-9]+)?/y
const STRING_RE = /"([^"\\]*(?:\\.[^"\\]*)*)"|'([^'\\]*(?:\\.[^'\\]*)*)'/y
const PUNCTUATION = '()[]{}?:.,|'
const CLOSING: Record<string, string> = { ')': '(', ']': '[', '}': '{' }
const ESCAPES: Record<string, string> = { n: '\n', t: '\t', r: '\r' }

/** `=` is not an operator but shares the operator token type (`{% set a = b %}`) */
const ASSIGNMENT = '='

function countNewlines(text: string): number {
  let count = 0
  for (const ch of text) {
    if (ch === '\n') count++
  }
  return count
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function unescapeString(body: string): string {
  return body.replace(/\\(.)/gs, (_match, ch: string) => ESCAPES[ch] ?? ch)
}

export class Lexer {
  private _operatorRe: RegExp | null = null

  constructor(
    private readonly env: Pick<CompilerEnvironment, 'getUnaryOperators' | 'getBinaryOperators'>
  ) {}

  tokenize(source: string, name: string): TokenStream {
    return new TokenStream(new LexerRun(source, name, this.operatorRe()).run(), name)
  }

  /**
   * Longest operators first; word operators ("not", "is not") must not be
   * followed by a name character and allow any whitespace between words.
   */
  private operatorRe(): RegExp {
    if (this._operatorRe === null) {
      const operators = new Set<string>([
        ...this.env.getUnaryOperators().keys(),
        ...this.env.getBinaryOperators().keys(),
        ASSIGNMENT,
      ])
      const patterns = [...operators]
        .sort((a, b) => b.length - a.length)
        .map((op) => {
          const pattern = escapeRegExp(op).replace(/ +/g, '\\s+')
          return /^[a-zA-Z]/.test(op) && /[a-zA-Z]$/.test(op)
            ? `${pattern}(?![a-zA-Z0-9_])`
            : pattern
        })
      this._operatorRe = new RegExp(patterns.join('|'), 'y')
    }
    return this._operatorRe
  }
}

// ---------------------------------------------------------------------------
// A single tokenization pass
// ---------------------------------------------------------------------------

class LexerRun {
  private readonly code: string
  private readonly tokens: Token[] = []
  private pos = 0
  private lineno = 1
  private trimNextText = false

  constructor(
    source: string,
    private readonly name: string,
    private readonly operatorRe: RegExp
  ) {
    this.code = source.replace(/\r\n?/g, '\n')
  }

  run(): Token[] {
    for (;;) {
      TAG_START_RE.lastIndex = this.pos
      const match = TAG_START_RE.exec(this.code)
      const start = match === null ? this.code.length : match.index
      const trimBefore = match !== null && this.code[start + 2] === '-'

      this.pushText(this.code.slice(this.pos, start), trimBefore)
      if (match === null) break

      this.pos = start + 2 + (trimBefore ? 1 : 0)
      if (match[0] === '{#') {
        this.lexComment()
      } else {
        this.lexExpression(match[0] === '{{')
      }
    }

    this.push('eof', '')
    return this.tokens
  }

  private pushText(raw: string, trimEnd: boolean): void {
    let text = raw
    let lineno = this.lineno
    if (this.trimNextText) {
      const trimmed = text.replace(/^\s+/, '')
      lineno += countNewlines(text.slice(0, text.length - trimmed.length))
      text = trimmed
      this.trimNextText = false
    }
    if (trimEnd) {
      text = text.replace(/\s+$/, '')
    }
    if (text !== '') {
      this.tokens.push({ type: 'text', value: text, lineno })
    }
    this.lineno += countNewlines(raw)
  }

  private lexComment(): void {
    const end = this.code.indexOf('#}', this.pos)
    if (end === -1) {
      throw this.error('Unclosed comment.')
    }
    this.trimNextText = this.code[end - 1] === '-'
    this.lineno += countNewlines(this.code.slice(this.pos, end))
    this.pos = end + 2
  }

  private lexExpression(isVariable: boolean): void {
    const startLine = this.lineno
    const endDelimiter = isVariable ? '}}' : '%}'
    const brackets: Array<{ ch: string; lineno: number }> = []
    this.push(isVariable ? 'var_start' : 'block_start', '')

    for (;;) {
      WHITESPACE_RE.lastIndex = this.pos
      const ws = WHITESPACE_RE.exec(this.code)
      if (ws !== null) {
        this.lineno += countNewlines(ws[0])
        this.pos += ws[0].length
      }

      if (this.pos >= this.code.length) {
        throw this.error(`Unclosed "${isVariable ? 'variable' : 'block'}".`, startLine)
      }

      if (brackets.length === 0) {
        const trimAfter = this.code.startsWith(`-${endDelimiter}`, this.pos)
        if (trimAfter || this.code.startsWith(endDelimiter, this.pos)) {
          this.push(isVariable ? 'var_end' : 'block_end', '')
          this.pos += endDelimiter.length + (trimAfter ? 1 : 0)
          this.trimNextText = trimAfter
          return
        }
      }

      if (this.lexToken(brackets)) continue

      throw this.error(`Unexpected character "${this.code.charAt(this.pos)}".`)
    }
  }

  private lexToken(brackets: Array<{ ch: string; lineno: number }>): boolean {
    const operator = this.matchAt(this.operatorRe)
    if (operator !== null) {
      this.push('operator', operator.replace(/\s+/g, ' '))
      this.advance(operator)
      return true
    }

    const name = this.matchAt(NAME_RE)
    if (name !== null) {
      this.push('name', name)
      this.advance(name)
      return true
    }

    const number = this.matchAt(NUMBER_RE)
    if (number !== null) {
      this.push('number', number)
      this.advance(number)
      return true
    }

    const ch = this.code.charAt(this.pos)
    if (PUNCTUATION.includes(ch)) {
      if (ch === '(' || ch === '[' || ch === '{') {
        brackets.push({ ch, lineno: this.lineno })
      } else if (ch in CLOSING) {
        const open = brackets.pop()
        if (open === undefined) {
          throw this.error(`Unexpected "${ch}".`)
        }
        if (open.ch !== CLOSING[ch]) {
          throw this.error(`Unclosed "${open.ch}".`, open.lineno)
        }
      }
      this.push('punctuation', ch)
      this.pos++
      return true
    }

    STRING_RE.lastIndex = this.pos
    const str = STRING_RE.exec(this.code)
    if (str !== null) {
      this.push('string', unescapeString(str[1] ?? str[2] ?? ''))
      this.advance(str[0])
      return true
    }

    return false
  }

  private matchAt(re: RegExp): string | null {
    re.lastIndex = this.pos
    const match = re.exec(this.code)
    return match === null ? null : match[0]
  }

  private advance(consumed: string): void {
    this.lineno += countNewlines(consumed)
    this.pos += consumed.length
  }

  private push(type: TokenType, value: string): void {
    this.tokens.push({ type, value, lineno: this.lineno })
  }

  private error(message: string, lineno: number = this.lineno): TemplateSyntaxError {
    return new TemplateSyntaxError(message, { templateName: this.name, lineno })
  }
}
