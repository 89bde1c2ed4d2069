/**
 * Naming rules: package names, gear rule lines and changelog stamps.
 */

import { ConfigurationError } from '../../core/errors.js'

// ---------------------------------------------------------------------------
// Type-to-prefix table
// ---------------------------------------------------------------------------

/**
 * Package name prefix per spec type. Types not listed here use the bare
 * module name.
 */
export const PACKAGE_PREFIXES: Readonly<Record<string, string>> = {
  python3: 'python3-module-',
  perl: 'perl-',
  ruby: 'gem-',
  nodejs: 'node-',
}

/**
 * Derive the package name from the spec type and module name.
 */
export function derivePackageName(specType: string, moduleName: string): string {
  const prefix = Object.hasOwn(PACKAGE_PREFIXES, specType) ? PACKAGE_PREFIXES[specType] : undefined
  return prefix !== undefined ? `${prefix}${moduleName}` : moduleName
}

// ---------------------------------------------------------------------------
// Build-source descriptor and gear rules
// ---------------------------------------------------------------------------

/** Build place for specs packaged from the working tree */
export const LOCAL_BUILD_PLACE = '.'

/**
 * Build place for specs packaged from an upstream clone: the given tag, or
 * the gear version tag reference when none was supplied.
 */
export function upstreamBuildPlace(tag?: string): string {
  return `${tag ?? 'v@version@'}:.`
}

/**
 * Render the single `.gear/rules` line.
 * `@version@` is written literally; gear expands it at build time.
 */
export function buildRuleLine(buildPlace: string, packageName: string, moduleName: string): string {
  if (packageName === moduleName) {
    return `tar: ${buildPlace}\n`
  }
  const base = `${moduleName}-@version@`
  return `tar: ${buildPlace} name=${base} base=${base}\n`
}

// ---------------------------------------------------------------------------
// Changelog stamp
// ---------------------------------------------------------------------------

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const

/**
 * Format a date as `Ddd Mmm DD YYYY` in local time, the form rpm expects in
 * %changelog headers.
 */
export function formatChangelogDate(date: Date): string {
  const weekday = WEEKDAYS[date.getDay()] ?? ''
  const month = MONTHS[date.getMonth()] ?? ''
  const day = String(date.getDate()).padStart(2, '0')
  return `${weekday} ${month} ${day} ${date.getFullYear()}`
}

/**
 * Build the changelog header line, e.g.
 * `* Fri Mar 15 2024 John Doe <j@x.com> 1.2`.
 */
export function formatStamp(date: Date, packager: string, version: string): string {
  return ['*', formatChangelogDate(date), packager, version].join(' ')
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/

/**
 * Parse a `YYYY-MM-DD` string into a local-time Date.
 * @throws {ConfigurationError} when the string is malformed or not a real date
 */
export function parseDate(value: string): Date {
  const match = DATE_PATTERN.exec(value)
  if (match === null) {
    throw new ConfigurationError(`Invalid date "${value}": expected YYYY-MM-DD`, { date: value })
  }
  const year = Number(match[1])
  const month = Number(match[2])
  const day = Number(match[3])
  const date = new Date(year, month - 1, day)
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    throw new ConfigurationError(`Invalid date "${value}": no such calendar day`, { date: value })
  }
  return date
}
