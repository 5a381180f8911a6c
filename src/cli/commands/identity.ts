/**
 * `trellis identity <name>` — print the cache identity of a template and,
 * when caching is enabled, where its artifact is stored.
 */

import type { Command } from 'commander'
import { EXIT_SUCCESS, loadEnvironment, reportTemplateError } from '../utils/environment-loader.js'

export interface IdentityOptions {
  projectRoot?: string
  json?: boolean
}

export async function runIdentity(name: string, opts: IdentityOptions = {}): Promise<number> {
  const result = await loadEnvironment({
    ...(opts.projectRoot !== undefined && { projectRoot: opts.projectRoot }),
  })
  if (!result.ok) {
    return result.exitCode
  }
  const env = result.env

  let identity: string
  try {
    identity = env.getTemplateIdentity(name)
  } catch (err: unknown) {
    return reportTemplateError(err)
  }

  const target = env.getCacheTarget()
  const store = env.getArtifactStore()
  const key = target.kind === 'disabled' ? null : store.generateKey(name, identity)
  const timestamp = key === null ? 0 : store.getTimestamp(key)

  if (opts.json === true) {
    process.stdout.write(
      JSON.stringify({ name, identity, cache: target.kind, key, timestamp }, null, 2) + '\n'
    )
  } else {
    process.stdout.write(`${identity}\n`)
    if (key !== null) {
      process.stdout.write(`  cache: ${target.kind}\n  key: ${key}\n`)
      process.stdout.write(`  cached: ${timestamp > 0 ? new Date(timestamp).toISOString() : 'no'}\n`)
    }
  }
  return EXIT_SUCCESS
}

export function registerIdentityCommand(program: Command): void {
  program
    .command('identity <name>')
    .description('Print the cache identity of a template')
    .option('--json', 'Output as JSON')
    .option('--project-root <dir>', 'Project root containing .trellis/config.yaml')
    .action(async (name: string, opts: { json?: boolean; projectRoot?: string }) => {
      process.exitCode = await runIdentity(name, opts)
    })
}
