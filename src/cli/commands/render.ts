/**
 * `trellis render <name>` — render a template to stdout.
 *
 * Context comes from a YAML or JSON file (`--context`) and from repeated
 * `--set key=value` flags, which win over the file.
 */

import type { Command } from 'commander'
import { readFile } from 'fs/promises'
import yaml from 'js-yaml'
import type { TemplateContext } from '../../modules/runtime/template.js'
import { errorMessage, isPlainObject } from '../../utils/helpers.js'
import {
  EXIT_INVALID,
  EXIT_SUCCESS,
  loadEnvironment,
  reportTemplateError,
} from '../utils/environment-loader.js'

// ---------------------------------------------------------------------------
// Context parsing
// ---------------------------------------------------------------------------

function coerceValue(raw: string): unknown {
  const trimmed = raw.trim()
  if (trimmed === 'true') return true
  if (trimmed === 'false') return false
  if (trimmed === 'null') return null
  if (/^-?\d+$/.test(trimmed)) return parseInt(trimmed, 10)
  if (/^-?\d*\.\d+$/.test(trimmed)) return parseFloat(trimmed)
  return raw
}

/**
 * Parse `key=value` assignments. Returns null when one is malformed.
 */
export function parseAssignments(assignments: string[]): TemplateContext | null {
  const context: TemplateContext = {}
  for (const assignment of assignments) {
    const eq = assignment.indexOf('=')
    if (eq <= 0) {
      return null
    }
    context[assignment.slice(0, eq).trim()] = coerceValue(assignment.slice(eq + 1))
  }
  return context
}

export async function readContextFile(path: string): Promise<TemplateContext> {
  const parsed: unknown = yaml.load(await readFile(path, 'utf-8'))
  if (parsed === undefined || parsed === null) {
    return {}
  }
  if (!isPlainObject(parsed)) {
    throw new Error(`Context file "${path}" must contain a mapping`)
  }
  return parsed
}

// ---------------------------------------------------------------------------
// `render` action
// ---------------------------------------------------------------------------

export interface RenderOptions {
  projectRoot?: string
  context?: string
  set?: string[]
  strictVariables?: boolean
}

export async function runRender(name: string, opts: RenderOptions = {}): Promise<number> {
  const assigned = parseAssignments(opts.set ?? [])
  if (assigned === null) {
    process.stderr.write('  Error: --set expects key=value\n')
    return EXIT_INVALID
  }

  let fileContext: TemplateContext = {}
  if (opts.context !== undefined) {
    try {
      fileContext = await readContextFile(opts.context)
    } catch (err: unknown) {
      process.stderr.write(`  Error reading context: ${errorMessage(err)}\n`)
      return EXIT_INVALID
    }
  }

  const result = await loadEnvironment({
    ...(opts.projectRoot !== undefined && { projectRoot: opts.projectRoot }),
    ...(opts.strictVariables === true && {
      cliOverrides: { environment: { strict_variables: true } },
    }),
  })
  if (!result.ok) {
    return result.exitCode
  }

  let output: string
  try {
    output = result.env.render(name, { ...fileContext, ...assigned })
  } catch (err: unknown) {
    return reportTemplateError(err)
  }
  process.stdout.write(output)
  return EXIT_SUCCESS
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

export function registerRenderCommand(program: Command): void {
  program
    .command('render <name>')
    .description('Render a template to stdout')
    .option('--context <file>', 'YAML or JSON file with template variables')
    .option('--set <key=value>', 'Set a template variable (repeatable)', collect, [])
    .option('--strict-variables', 'Fail on undefined variables')
    .option('--project-root <dir>', 'Project root containing .trellis/config.yaml')
    .action(
      async (
        name: string,
        opts: { context?: string; set: string[]; strictVariables?: boolean; projectRoot?: string }
      ) => {
        const exitCode = await runRender(name, opts)
        process.exitCode = exitCode
      }
    )
}
