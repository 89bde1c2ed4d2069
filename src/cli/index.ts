#!/usr/bin/env node
/**
 * specgen CLI - Main entry point
 * Provides the `specgen` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'node:url'
import { dirname, resolve } from 'node:path'
import { readFile } from 'node:fs/promises'
import { logger } from '../utils/logger.js'
import { registerCreateCommand } from './commands/create.js'
import { registerVerifyCommand } from './commands/verify.js'
import { registerTypesCommand } from './commands/types.js'

/** Resolve the package version from package.json relative to this file */
async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  // src/cli or dist/cli: package.json sits two levels up
  const pkgPath = resolve(here, '../../package.json')
  try {
    const content = await readFile(pkgPath, 'utf-8')
    const pkg: unknown = JSON.parse(content)
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version
    }
    return '0.0.0'
  } catch (err) {
    logger.debug({ err, pkgPath }, 'Could not read package version')
    return '0.0.0'
  }
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('specgen')
    .description('Generate an RPM spec from a template and stage a gear package directory')
    .version(version, '-v, --version', 'Output the current version')
    .enablePositionalOptions()

  registerCreateCommand(program)
  registerVerifyCommand(program)
  registerTypesCommand(program)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`)
    process.exit(1)
  }
}

// Errors are handled internally by main() which calls process.exit(1)
void main()
