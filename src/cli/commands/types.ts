/**
 * `specgen types` command
 *
 * Lists the spec types that carry a package name prefix. Any other spec
 * type is accepted too and uses the bare module name.
 */

import type { Command } from 'commander'
import { PACKAGE_PREFIXES } from '../../modules/spec-builder/naming.js'
import { buildSpecTypeRows, formatSpecTypeTable } from '../utils/formatting.js'

/**
 * Register the `specgen types` command with the CLI program.
 *
 * @param program - Commander program instance
 */
export function registerTypesCommand(program: Command): void {
  program
    .command('types')
    .description('List spec types with a package name prefix')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action((opts: { outputFormat: string }) => {
      if (opts.outputFormat === 'json') {
        process.stdout.write(JSON.stringify(PACKAGE_PREFIXES, null, 2) + '\n')
        return
      }
      process.stdout.write(formatSpecTypeTable(buildSpecTypeRows(PACKAGE_PREFIXES)) + '\n')
    })
}
