/**
 * Unit tests for `src/cli/commands/identity.ts`
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { join } from 'path'
import { runIdentity } from '../identity.js'
import { captureOutput, createTestProject, type CapturedOutput, type TestProject } from './cli-test-project.js'

vi.mock('../../../utils/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
  setDefaultLogLevel: vi.fn(),
}))

const IDENTITY = /^__Template_[0-9a-f]{64}$/

let project: TestProject
let output: CapturedOutput

beforeEach(() => {
  project = createTestProject({ 'hello.html': 'Hello {{ name }}' })
  output = captureOutput()
})

afterEach(() => {
  vi.restoreAllMocks()
  project.cleanup()
})

describe('runIdentity', () => {
  it('prints only the identity when caching is disabled', async () => {
    const code = await runIdentity('hello.html', { projectRoot: project.root })
    expect(code).toBe(0)
    const lines = output.stdout().split('\n')
    expect(lines).toHaveLength(2)
    expect(lines[0]).toMatch(IDENTITY)
    expect(lines[1]).toBe('')
  })

  it('prints the cache key of a filesystem cache', async () => {
    project.write('.trellis/config.yaml', 'cache:\n  type: filesystem\n  path: cache\n')
    await runIdentity('hello.html', { projectRoot: project.root })
    const lines = output.stdout().split('\n')
    expect(lines[0]).toMatch(IDENTITY)
    expect(lines[1]).toBe('  cache: filesystem')
    expect(lines[2]?.startsWith(`  key: ${join(project.root, 'cache')}`)).toBe(true)
    expect(lines[3]).toBe('  cached: no')
  })

  it('outputs JSON', async () => {
    project.write('.trellis/config.yaml', 'cache:\n  type: filesystem\n  path: cache\n')
    await runIdentity('hello.html', { projectRoot: project.root, json: true })
    const parsed: unknown = JSON.parse(output.stdout())
    expect(parsed).toMatchObject({ name: 'hello.html', cache: 'filesystem', timestamp: 0 })
    expect(parsed).toHaveProperty('identity', expect.stringMatching(IDENTITY))
  })

  it('gives the same identity on every run', async () => {
    await runIdentity('hello.html', { projectRoot: project.root })
    await runIdentity('hello.html', { projectRoot: project.root })
    const [first, second] = output.stdout().trim().split('\n')
    expect(first).toBe(second)
  })

  it('reports a missing template', async () => {
    const code = await runIdentity('nope.html', { projectRoot: project.root })
    expect(code).toBe(1)
    expect(output.stderr().startsWith('  LoaderError: Unable to find template "nope.html"')).toBe(true)
  })
})
