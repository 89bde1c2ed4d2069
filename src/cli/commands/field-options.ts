/**
 * Field options shared by `specgen create` and `specgen verify`.
 */

import type { Command } from 'commander'

/** Default changelog entry text */
export const DEFAULT_LASTCHANGE = '- Initial build.'

/** Parsed Commander options common to create and verify */
export interface FieldOptions {
  module?: string
  type?: string
  specVersion?: string
  summary?: string
  license?: string
  url?: string
  description?: string
  lastchange?: string
  tag?: string
  git?: boolean
  date?: string
  templateDir?: string
  interactive?: boolean
}

/**
 * Attach the field options to a command.
 */
export function addFieldOptions(command: Command): Command {
  return command
    .option('-m, --module <name>', 'Module name')
    .option('-t, --type <type>', 'Spec type (selects the template)')
    .option('--spec-version <version>', 'Package version')
    .option('-s, --summary <text>', 'One-line package summary')
    .option('-l, --license <license>', 'License')
    .option('-u, --url <url>', 'Project URL (cloned with --git)')
    .option('-d, --description <text>', 'Package description')
    .option('--lastchange <text>', 'Changelog entry text', DEFAULT_LASTCHANGE)
    .option('--tag <tag>', 'Upstream tag to reset to (default: most recent tag)')
    .option('-g, --git', 'Clone the package directory from the upstream URL', false)
    .option('--date <YYYY-MM-DD>', 'Changelog date (default: today)')
    .option('--template-dir <dir>', 'Template directory override')
    .option('-i, --interactive', 'Prompt for missing fields', false)
}
