/**
 * CLI output formatting utilities
 *
 * Provides human-readable table formatting for the `specgen types` listing.
 */

/**
 * A row in the spec type table.
 */
export interface SpecTypeRow {
  type: string
  prefix: string
  example: string
}

/**
 * Build spec type rows from the prefix table, sorted by type name.
 * The example column shows the package name derived for module "foo".
 */
export function buildSpecTypeRows(prefixes: Readonly<Record<string, string>>): SpecTypeRow[] {
  return Object.entries(prefixes)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([type, prefix]) => ({ type, prefix, example: `${prefix}foo` }))
}

/**
 * Format a simple ASCII table with headers and rows.
 * @param headers - Column header labels
 * @param rows - Data rows (arrays of string values in column order)
 * @param keys - Object keys to extract from each row (same order as headers)
 */
export function formatTable(
  headers: string[],
  rows: Record<string, string>[],
  keys: string[]
): string {
  // Compute column widths as max of header and data lengths
  const widths = headers.map((header, i) => {
    const key = keys[i] ?? header
    const dataMax = rows.reduce((max, row) => {
      const val = row[key] ?? ''
      return Math.max(max, val.length)
    }, 0)
    return Math.max(header.length, dataMax)
  })

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-')
  const headerRow = headers.map((h, i) => h.padEnd(widths[i] ?? h.length)).join(' | ')

  const dataRows = rows.map((row) =>
    keys.map((key, i) => {
      const val = row[key] ?? ''
      return val.padEnd(widths[i] ?? val.length)
    }).join(' | ')
  )

  return [headerRow, separator, ...dataRows].join('\n')
}

/**
 * Format spec type rows as a human-readable table.
 */
export function formatSpecTypeTable(rows: SpecTypeRow[]): string {
  const headers = ['Type', 'Prefix', 'Example']
  const keys = ['type', 'prefix', 'example']
  const tableRows = rows.map((row) => ({
    type: row.type,
    prefix: row.prefix,
    example: row.example,
  }))
  return formatTable(headers, tableRows, keys)
}
