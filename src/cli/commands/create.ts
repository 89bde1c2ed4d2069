/**
 * `specgen create` command
 *
 * Renders the spec template for a module and stages `<package>/` with the
 * spec file and `.gear/rules`, optionally cloned from the upstream URL.
 *
 * Usage:
 *   specgen create -m foo -t python3 --spec-version 1.0
 *   specgen create -m foo -t python3 --spec-version 1.0 -u https://example.org/foo.git --git
 *
 * Exit codes:
 *   0  - success
 *   1  - configuration, filesystem, external tool or verification error
 */

import type { Command } from 'commander'
import { createLogger } from '../../utils/logger.js'
import { ConfigurationError, SpecgenError } from '../../core/errors.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { ConfigSystem } from '../../modules/config/config-system.js'
import type { PartialSpecgenConfig } from '../../modules/config/config-schema.js'
import { createSpecBuilder } from '../../modules/spec-builder/spec-builder-impl.js'
import type { ReportStream } from '../../modules/spec-builder/spec-builder.js'
import type { CommandRunner } from '../../modules/spec-builder/command-runner.js'
import { FieldInputSchema, normalizeFields, type FieldInput } from '../../modules/spec-builder/types.js'
import { parseDate } from '../../modules/spec-builder/naming.js'
import { addFieldOptions, type FieldOptions } from './field-options.js'
import { createReadlinePrompter, promptForMissingFields, type Prompter } from '../utils/prompt.js'

const logger = createLogger('create-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const CREATE_EXIT_SUCCESS = 0
export const CREATE_EXIT_ERROR = 1

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CreateActionOptions extends FieldOptions {
  /** Reference directory; switches the action to self-test mode */
  reference?: string
  /** Directory to stage in (default: cwd) */
  workdir?: string
  /** ConfigSystem to use (injectable for testing) */
  configSystem?: ConfigSystem
  /** Runner for external tools (injectable for testing) */
  runner?: CommandRunner
  /** Prompter for --interactive (injectable for testing) */
  prompter?: Prompter
  /** Sink for the self-test difference report (default: stdout) */
  output?: ReportStream
}

// ---------------------------------------------------------------------------
// Field collection
// ---------------------------------------------------------------------------

function toFieldInput(options: FieldOptions): Partial<FieldInput> {
  return {
    module: options.module,
    spec_type: options.type,
    version: options.specVersion,
    summary: options.summary,
    license: options.license,
    url: options.url,
    description: options.description,
    lastchange: options.lastchange,
  }
}

/**
 * Gather fields from the options, prompting for missing ones when
 * interactive, and validate them.
 * @throws {ConfigurationError} when a required field is missing
 */
async function collectFields(options: CreateActionOptions): Promise<FieldInput> {
  let input = toFieldInput(options)

  if (options.interactive === true) {
    const prompter = options.prompter ?? createReadlinePrompter()
    try {
      input = await promptForMissingFields(input, prompter)
    } finally {
      prompter.close()
    }
  }

  const parsed = FieldInputSchema.safeParse(input)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
    throw new ConfigurationError(`Missing or invalid fields:\n${issues}`, { issues: parsed.error.issues })
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// runCreateAction - testable core logic
// ---------------------------------------------------------------------------

/**
 * Core action for `create` and `verify`.
 *
 * Returns an exit code. Separated from Commander integration for testability.
 */
export async function runCreateAction(options: CreateActionOptions): Promise<number> {
  try {
    const cliOverrides: PartialSpecgenConfig =
      options.templateDir !== undefined ? { template_dir: options.templateDir } : {}
    const configSystem = options.configSystem ?? createConfigSystem({ cliOverrides, runner: options.runner })
    await configSystem.load()

    const fields = await collectFields(options)
    const builder = createSpecBuilder(normalizeFields(fields), configSystem.getConfig(), {
      workdir: options.workdir,
      useUpstream: options.git ?? false,
      tag: options.tag,
      date: options.date !== undefined ? parseDate(options.date) : undefined,
      runner: options.runner,
      output: options.output,
    })

    if (options.reference !== undefined) {
      await builder.verifyAgainstReference(options.reference)
      return CREATE_EXIT_SUCCESS
    }

    const result = await builder.deploy()
    process.stdout.write(`Created ${result.packageDir}\n`)
    if (result.resolvedTag !== undefined) {
      process.stdout.write(`Upstream tag: ${result.resolvedTag}\n`)
    }
    return CREATE_EXIT_SUCCESS
  } catch (err) {
    if (err instanceof SpecgenError) {
      logger.error({ err: err.toJSON() }, 'specgen failed')
      process.stderr.write(`Error: ${err.message}\n`)
      return CREATE_EXIT_ERROR
    }
    throw err
  }
}

// ---------------------------------------------------------------------------
// registerCreateCommand
// ---------------------------------------------------------------------------

/**
 * Register the `specgen create` command with the CLI program.
 *
 * @param program - Commander program instance
 */
export function registerCreateCommand(program: Command): void {
  addFieldOptions(
    program
      .command('create')
      .description('Render a spec and stage the gear package directory')
  ).action(async (opts: FieldOptions) => {
    process.exitCode = await runCreateAction(opts)
  })
}
