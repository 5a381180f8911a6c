/**
 * `trellis compile <name>` — print the generated code of a template.
 */

import type { Command } from 'commander'
import { EXIT_SUCCESS, loadEnvironment, reportTemplateError } from '../utils/environment-loader.js'

export interface CompileOptions {
  projectRoot?: string
}

export async function runCompile(name: string, opts: CompileOptions = {}): Promise<number> {
  const result = await loadEnvironment(opts)
  if (!result.ok) {
    return result.exitCode
  }

  let code: string
  try {
    code = result.env.compileSource(result.env.getLoader().getSource(name), name)
  } catch (err: unknown) {
    return reportTemplateError(err)
  }
  process.stdout.write(code)
  return EXIT_SUCCESS
}

export function registerCompileCommand(program: Command): void {
  program
    .command('compile <name>')
    .description('Print the code generated for a template')
    .option('--project-root <dir>', 'Project root containing .trellis/config.yaml')
    .action(async (name: string, opts: { projectRoot?: string }) => {
      process.exitCode = await runCompile(name, opts)
    })
}
