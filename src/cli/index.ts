#!/usr/bin/env node
/**
 * Trellis CLI - Main entry point
 * Provides the `trellis` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { createLogger } from '../utils/logger.js'
import { errorMessage } from '../utils/helpers.js'
import { registerRenderCommand } from './commands/render.js'
import { registerCompileCommand } from './commands/compile.js'
import { registerIdentityCommand } from './commands/identity.js'

const logger = createLogger('cli')

interface PackageInfo {
  name?: string
  version?: string
}

function isPackageInfo(value: unknown): value is PackageInfo {
  return typeof value === 'object' && value !== null
}

/** Resolve the package version relative to this file (run from src/ or dist/) */
async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  for (const pkgPath of [resolve(here, '../../package.json'), resolve(here, '../package.json')]) {
    let content: string
    try {
      content = await readFile(pkgPath, 'utf-8')
    } catch (err: unknown) {
      logger.debug({ pkgPath, error: errorMessage(err) }, 'package.json not found, trying next path')
      continue
    }
    const pkg: unknown = JSON.parse(content)
    if (isPackageInfo(pkg) && pkg.name === 'trellis' && typeof pkg.version === 'string') {
      return pkg.version
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('trellis')
    .description('Trellis - compile, cache and render templates')
    .version(version, '-v, --version', 'Output the current version')

  registerRenderCommand(program)
  registerCompileCommand(program)
  registerIdentityCommand(program)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

void main()
