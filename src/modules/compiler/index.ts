export type { CompilePipeline, CompilerEnvironment } from './compile-pipeline.js'
export { TemplateCompiler } from './compiler.js'
export { CodeGenerator } from './code-generator.js'
export { Lexer } from './lexer.js'
export { Parser } from './parser.js'
export { TokenStream } from './token-stream.js'
export type { Token, TokenType } from './token-stream.js'
export type * from './nodes.js'
