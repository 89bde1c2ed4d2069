/**
 * Unit tests for `src/cli/commands/create.ts` and the verify/types commands
 * that share its plumbing.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Command } from 'commander'
import {
  CREATE_EXIT_ERROR,
  CREATE_EXIT_SUCCESS,
  registerCreateCommand,
  runCreateAction,
  type CreateActionOptions,
} from '../create.js'
import { registerVerifyCommand } from '../verify.js'
import { registerTypesCommand } from '../types.js'
import { DEFAULT_LASTCHANGE } from '../field-options.js'
import type { ConfigSystem } from '../../../modules/config/config-system.js'
import type { Prompter } from '../../utils/prompt.js'
import { FakeRunner, upstreamHandler } from '../../../modules/spec-builder/__tests__/fake-runner.js'

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

let root: string
let workdir: string
let templateDir: string

function stubConfig(): ConfigSystem {
  return {
    load: vi.fn(async () => {}),
    getConfig: () => ({ template_dir: templateDir, packager: 'John Doe <j@x.com>' }),
    isLoaded: true,
  }
}

function baseOptions(overrides: Partial<CreateActionOptions> = {}): CreateActionOptions {
  return {
    module: 'foo',
    type: 'python3',
    specVersion: '1.2',
    summary: 'Foo lib',
    lastchange: DEFAULT_LASTCHANGE,
    date: '2024-03-15',
    workdir,
    configSystem: stubConfig(),
    ...overrides,
  }
}

function captureStream(stream: NodeJS.WriteStream): { chunks: string[]; restore: () => void } {
  const chunks: string[] = []
  const spy = vi.spyOn(stream, 'write').mockImplementation((data: string | Uint8Array) => {
    chunks.push(typeof data === 'string' ? data : Buffer.from(data).toString('utf-8'))
    return true
  })
  return { chunks, restore: () => spy.mockRestore() }
}

let stdout: ReturnType<typeof captureStream>
let stderr: ReturnType<typeof captureStream>

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'specgen-create-'))
  workdir = join(root, 'work')
  templateDir = join(root, 'templates')
  mkdirSync(workdir)
  mkdirSync(templateDir)
  writeFileSync(join(templateDir, 'python3.spec'), 'Name: python3-module-$module\n%changelog\n$stamp-alt1\n$lastchange\n')
  stdout = captureStream(process.stdout)
  stderr = captureStream(process.stderr)
})

afterEach(() => {
  stdout.restore()
  stderr.restore()
  rmSync(root, { recursive: true, force: true })
})

// ---------------------------------------------------------------------------
// runCreateAction
// ---------------------------------------------------------------------------

describe('runCreateAction', () => {
  it('deploys the package directory and reports it', async () => {
    const exitCode = await runCreateAction(baseOptions())

    const specPath = join(workdir, 'python3-module-foo', 'python3-module-foo.spec')
    expect(exitCode).toBe(CREATE_EXIT_SUCCESS)
    expect(stdout.chunks).toEqual([`Created ${join(workdir, 'python3-module-foo')}\n`])
    expect(readFileSync(specPath, 'utf-8')).toBe(
      'Name: python3-module-foo\n%changelog\n* Fri Mar 15 2024 John Doe <j@x.com> 1.2-alt1\n- Initial build.\n'
    )
  })

  it('fails when required fields are missing and not interactive', async () => {
    const exitCode = await runCreateAction(baseOptions({ module: undefined }))

    expect(exitCode).toBe(CREATE_EXIT_ERROR)
    expect(stderr.chunks.join('')).toBe('Error: Missing or invalid fields:\n  • module: Required\n')
    expect(existsSync(join(workdir, 'python3-module-foo'))).toBe(false)
  })

  it('prompts for missing fields when interactive', async () => {
    const answers = ['bar', '', 'MIT', '', '']
    const prompter: Prompter = {
      ask: vi.fn(async () => answers.shift() ?? ''),
      close: vi.fn(),
    }

    const exitCode = await runCreateAction(
      baseOptions({ module: undefined, summary: undefined, interactive: true, prompter })
    )

    expect(exitCode).toBe(CREATE_EXIT_SUCCESS)
    expect(vi.mocked(prompter.ask).mock.calls.map((c) => c[0])).toEqual([
      'Module name: ',
      'Summary: ',
      'License: ',
      'URL: ',
      'Description: ',
    ])
    expect(prompter.close).toHaveBeenCalledTimes(1)
    expect(existsSync(join(workdir, 'python3-module-bar', 'python3-module-bar.spec'))).toBe(true)
  })

  it('rejects a malformed date', async () => {
    const exitCode = await runCreateAction(baseOptions({ date: '2024/03/15' }))
    expect(exitCode).toBe(CREATE_EXIT_ERROR)
    expect(stderr.chunks.join('')).toBe('Error: Invalid date "2024/03/15": expected YYYY-MM-DD\n')
  })

  it('reports a missing template as an error', async () => {
    const exitCode = await runCreateAction(baseOptions({ type: 'haskell' }))
    expect(exitCode).toBe(CREATE_EXIT_ERROR)
    expect(stderr.chunks.join('')).toBe(
      `Error: Template for spec type "haskell" not found: ${join(templateDir, 'haskell.spec')}\n`
    )
  })

  it('clones from upstream with --git and prints the tag', async () => {
    const runner = new FakeRunner(upstreamHandler('v1.2'))
    const exitCode = await runCreateAction(
      baseOptions({ git: true, url: 'https://example.org/foo.git', runner })
    )

    expect(exitCode).toBe(CREATE_EXIT_SUCCESS)
    expect(stdout.chunks).toEqual([
      `Created ${join(workdir, 'python3-module-foo')}\n`,
      'Upstream tag: v1.2\n',
    ])
    expect(runner.calls).toHaveLength(9)
  })

  it('verifies against a matching reference without output', async () => {
    await runCreateAction(baseOptions())
    stdout.chunks.length = 0
    const reported: string[] = []

    const exitCode = await runCreateAction(
      baseOptions({
        reference: join(workdir, 'python3-module-foo'),
        output: { write: (chunk: string) => reported.push(chunk) },
      })
    )

    expect(exitCode).toBe(CREATE_EXIT_SUCCESS)
    expect(reported).toEqual([])
    expect(stdout.chunks).toEqual([])
  })

  it('exits non-zero and reports differences against a stale reference', async () => {
    await runCreateAction(baseOptions())
    const reported: string[] = []

    const exitCode = await runCreateAction(
      baseOptions({
        specVersion: '1.3',
        reference: join(workdir, 'python3-module-foo'),
        output: { write: (chunk: string) => reported.push(chunk) },
      })
    )

    expect(exitCode).toBe(CREATE_EXIT_ERROR)
    expect(reported).toHaveLength(1)
    expect(reported[0]).toMatch(/^Files \S+python3-module-foo\.spec and \S+python3-module-foo\.spec differ\n$/)
    expect(stderr.chunks.join('')).toBe(
      `Error: Generated package differs from reference ${join(workdir, 'python3-module-foo')}\n`
    )
  })
})

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

describe('command registration', () => {
  it('registers create, verify and types', () => {
    const program = new Command()
    registerCreateCommand(program)
    registerVerifyCommand(program)
    registerTypesCommand(program)
    expect(program.commands.map((c) => c.name())).toEqual(['create', 'verify', 'types'])
  })

  it('exposes the shared field options on create and verify', () => {
    const program = new Command()
    registerCreateCommand(program)
    registerVerifyCommand(program)
    for (const command of program.commands) {
      const flags = command.options.map((o) => o.long)
      expect(flags).toEqual([
        '--module',
        '--type',
        '--spec-version',
        '--summary',
        '--license',
        '--url',
        '--description',
        '--lastchange',
        '--tag',
        '--git',
        '--date',
        '--template-dir',
        '--interactive',
      ])
    }
  })

  it('prints the prefix table for `types`', async () => {
    const program = new Command()
    registerTypesCommand(program)
    await program.parseAsync(['types'], { from: 'user' })

    expect(stdout.chunks.join('')).toBe(
      [
        'Type    | Prefix          | Example           ',
        '--------+-----------------+-------------------',
        'nodejs  | node-           | node-foo          ',
        'perl    | perl-           | perl-foo          ',
        'python3 | python3-module- | python3-module-foo',
        'ruby    | gem-            | gem-foo           ',
      ].join('\n') + '\n'
    )
  })

  it('prints the prefix table as JSON', async () => {
    const program = new Command()
    registerTypesCommand(program)
    await program.parseAsync(['types', '--output-format', 'json'], { from: 'user' })

    expect(JSON.parse(stdout.chunks.join(''))).toEqual({
      python3: 'python3-module-',
      perl: 'perl-',
      ruby: 'gem-',
      nodejs: 'node-',
    })
  })
})
