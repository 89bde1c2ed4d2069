/**
 * `specgen verify` command
 *
 * Self-test: runs a full create in a temporary directory and compares the
 * generated package directory with a reference directory (ignoring .git).
 * Prints one line per difference and exits non-zero on any mismatch;
 * prints nothing when the trees are identical.
 *
 * Usage:
 *   specgen verify ./python3-module-foo -m foo -t python3 --spec-version 1.0 --date 2024-03-15
 */

import type { Command } from 'commander'
import { addFieldOptions, type FieldOptions } from './field-options.js'
import { runCreateAction } from './create.js'

/**
 * Register the `specgen verify` command with the CLI program.
 *
 * @param program - Commander program instance
 */
export function registerVerifyCommand(program: Command): void {
  addFieldOptions(
    program
      .command('verify <referenceDir>')
      .description('Regenerate the package in a scratch directory and compare it with a reference')
  ).action(async (referenceDir: string, opts: FieldOptions) => {
    process.exitCode = await runCreateAction({ ...opts, reference: referenceDir })
  })
}
