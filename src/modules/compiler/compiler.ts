/**
 * TemplateCompiler — the default CompilePipeline.
 *
 * tokenize → parse → node visitors (by priority) → code generation.
 */

import { Lexer } from './lexer.js'
import { Parser } from './parser.js'
import { CodeGenerator } from './code-generator.js'
import type { CompilePipeline, CompilerEnvironment } from './compile-pipeline.js'
import type { ModuleNode } from './nodes.js'

export class TemplateCompiler implements CompilePipeline {
  private readonly lexer: Lexer

  constructor(private readonly env: CompilerEnvironment) {
    this.lexer = new Lexer(env)
  }

  compile(source: string, name: string): string {
    return this.generate(this.parse(source, name))
  }

  parse(source: string, name: string): ModuleNode {
    const stream = this.lexer.tokenize(source, name)
    let module = new Parser(this.env, stream).parse()
    for (const visitor of this.env.getNodeVisitors()) {
      module = visitor.visit(module)
    }
    return module
  }

  generate(module: ModuleNode): string {
    return new CodeGenerator(this.env).generate(module)
  }
}
