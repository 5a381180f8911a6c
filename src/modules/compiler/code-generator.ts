/**
 * CodeGenerator — turns a ModuleNode into the body of a JavaScript function.
 *
 * The generated body returns a TemplateUnit:
 *
 *   "use strict";
 *   return {
 *     templateName: "page.html",
 *     display(context, rt, out) { ... },
 *   };
 *
 * Everything the code needs at render time goes through `rt` (the
 * TemplateRuntime); output is pushed onto `out`.
 */

import { TemplateSyntaxError } from '../../core/errors.js'
import type { CompilerEnvironment } from './compile-pipeline.js'
import type { ExpressionNode, ModuleNode, StatementNode } from './nodes.js'
import { CONTEXT_VAR, OUTPUT_VAR, RUNTIME_VAR as rt } from './scope.js'

const INDENT = '  '

function literal(value: unknown): string {
  return JSON.stringify(value) ?? 'undefined'
}

export class CodeGenerator {
  private lines: string[] = []
  private indentation = 0
  private varIndex = 0
  private templateName = ''

  constructor(private readonly env: CompilerEnvironment) {}

  generate(module: ModuleNode): string {
    this.lines = []
    this.indentation = 0
    this.varIndex = 0
    this.templateName = module.name

    this.write(`// ${literal(module.name)}`)
    this.write('"use strict";')
    this.write('return {')
    this.indent()
    this.write(`templateName: ${literal(module.name)},`)
    this.write(`display(${CONTEXT_VAR}, ${rt}, ${OUTPUT_VAR}) {`)
    this.indent()
    this.compileBody(module.body, CONTEXT_VAR)
    this.outdent()
    this.write('},')
    this.outdent()
    this.write('};')

    return this.lines.join('\n') + '\n'
  }

  // -------------------------------------------------------------------------
  // Writer
  // -------------------------------------------------------------------------

  private write(line: string): void {
    this.lines.push(INDENT.repeat(this.indentation) + line)
  }

  private indent(): void {
    this.indentation++
  }

  private outdent(): void {
    this.indentation--
  }

  private nextVar(): number {
    return ++this.varIndex
  }

  // -------------------------------------------------------------------------
  // Statements
  // -------------------------------------------------------------------------

  private compileBody(body: StatementNode[], ctx: string): void {
    for (const node of body) {
      this.compileStatement(node, ctx)
    }
  }

  private compileStatement(node: StatementNode, ctx: string): void {
    switch (node.type) {
      case 'text':
        this.write(`${OUTPUT_VAR}.push(${literal(node.data)});`)
        break

      case 'print': {
        const value = this.compileExpression(node.expr, ctx)
        const strategy = this.env.getAutoescapeStrategy()
        if (strategy !== false && !this.isSafe(node.expr)) {
          this.write(`${OUTPUT_VAR}.push(${rt}.escape(${value}, ${literal(strategy)}));`)
        } else {
          this.write(`${OUTPUT_VAR}.push(${rt}.toStr(${value}));`)
        }
        break
      }

      case 'if':
        node.branches.forEach((branch, i) => {
          const condition = `${rt}.truthy(${this.compileExpression(branch.condition, ctx)})`
          this.write(i === 0 ? `if (${condition}) {` : `} else if (${condition}) {`)
          this.indent()
          this.compileBody(branch.body, ctx)
          this.outdent()
        })
        if (node.elseBody !== null) {
          this.write('} else {')
          this.indent()
          this.compileBody(node.elseBody, ctx)
          this.outdent()
        }
        this.write('}')
        break

      case 'for': {
        const n = this.nextVar()
        const entries = `entries_${String(n)}`
        const index = `i_${String(n)}`
        const loopCtx = `context_${String(n)}`
        const bindings = [`...${ctx}`, `${literal(node.valueTarget)}: ${entries}[${index}][1]`]
        if (node.keyTarget !== null) {
          bindings.push(`${literal(node.keyTarget)}: ${entries}[${index}][0]`)
        }
        bindings.push(`loop: ${rt}.loop(${index}, ${entries}.length)`)

        this.write(`const ${entries} = ${rt}.iterate(${this.compileExpression(node.sequence, ctx)});`)
        this.write(`for (let ${index} = 0; ${index} < ${entries}.length; ${index}++) {`)
        this.indent()
        this.write(`const ${loopCtx} = { ${bindings.join(', ')} };`)
        this.compileBody(node.body, loopCtx)
        this.outdent()
        this.write('}')
        if (node.elseBody !== null) {
          this.write(`if (${entries}.length === 0) {`)
          this.indent()
          this.compileBody(node.elseBody, ctx)
          this.outdent()
          this.write('}')
        }
        break
      }

      case 'set':
        this.write(`${ctx}[${literal(node.name)}] = ${this.compileExpression(node.value, ctx)};`)
        break

      case 'include': {
        const template = this.compileExpression(node.template, ctx)
        const variables =
          node.variables === null ? 'null' : this.compileExpression(node.variables, ctx)
        this.write(
          `${OUTPUT_VAR}.push(${rt}.include(${template}, ${variables}, ${ctx}, ` +
            `${String(node.only)}, ${String(node.ignoreMissing)}, ${String(node.lineno)}));`
        )
        break
      }
    }
  }

  // -------------------------------------------------------------------------
  // Expressions
  // -------------------------------------------------------------------------

  /**
   * @param lenient - undefined variables and attributes yield undefined even
   *   under strict variables (used under `default` and `is defined`)
   */
  private compileExpression(node: ExpressionNode, ctx: string, lenient = false): string {
    const line = String(node.lineno)

    switch (node.type) {
      case 'constant':
        return literal(node.value)

      case 'name':
        if (node.name === '_context') return ctx
        return `${rt}.variable(${ctx}, ${literal(node.name)}, ${line}, ${String(lenient)})`

      case 'array':
        return `[${node.elements.map((e) => this.compileExpression(e, ctx)).join(', ')}]`

      case 'hash': {
        const entries = node.entries.map(
          (e) => `${literal(e.key)}: ${this.compileExpression(e.value, ctx)}`
        )
        return `{ ${entries.join(', ')} }`
      }

      case 'getAttr':
        return (
          `${rt}.attribute(${this.compileExpression(node.node, ctx, lenient)}, ` +
          `${this.compileExpression(node.attribute, ctx)}, ${line}, ${String(lenient)})`
        )

      case 'filter': {
        const subject = this.compileExpression(node.node, ctx, lenient || node.filter === 'default')
        const args = node.args.map((a) => this.compileExpression(a, ctx))
        return `${rt}.filter(${literal(node.filter)}, ${line}, ${[subject, ...args].join(', ')})`
      }

      case 'function': {
        const args = node.args.map((a) => this.compileExpression(a, ctx))
        return `${rt}.callFunction(${[literal(node.name), line, ...args].join(', ')})`
      }

      case 'test': {
        const subject = this.compileExpression(node.node, ctx, lenient || node.test === 'defined')
        const args = node.args.map((a) => this.compileExpression(a, ctx))
        const call = `${rt}.test(${literal(node.test)}, ${line}, ${[subject, ...args].join(', ')})`
        return node.negated ? `!${call}` : call
      }

      case 'unary': {
        const operator = this.env.getUnaryOperators().get(node.operator)
        if (operator === undefined) {
          throw this.error(`Unknown unary operator "${node.operator}".`, node.lineno)
        }
        return operator.compile(this.compileExpression(node.node, ctx, lenient))
      }

      case 'binary': {
        const operator = this.env.getBinaryOperators().get(node.operator)
        if (operator === undefined || operator.kind !== 'expression') {
          throw this.error(`Unknown binary operator "${node.operator}".`, node.lineno)
        }
        return operator.compile(
          this.compileExpression(node.left, ctx, lenient),
          this.compileExpression(node.right, ctx, lenient)
        )
      }

      case 'conditional':
        return (
          `(${rt}.truthy(${this.compileExpression(node.test, ctx, lenient)}) ? ` +
          `${this.compileExpression(node.then, ctx, lenient)} : ` +
          `${this.compileExpression(node.otherwise, ctx, lenient)})`
        )
    }
  }

  /** Output that is not escaped: constants and safe filters/functions */
  private isSafe(node: ExpressionNode): boolean {
    switch (node.type) {
      case 'constant':
        return true
      case 'filter':
        return this.env.getFilter(node.filter)?.isSafe ?? false
      case 'function':
        return this.env.getFunction(node.name)?.isSafe ?? false
      case 'conditional':
        return this.isSafe(node.then) && this.isSafe(node.otherwise)
      default:
        return false
    }
  }

  private error(message: string, lineno: number): TemplateSyntaxError {
    return new TemplateSyntaxError(message, { templateName: this.templateName, lineno })
  }
}
