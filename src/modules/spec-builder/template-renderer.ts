/**
 * Template loading and safe placeholder substitution.
 *
 * Placeholder syntax:
 *   $name     identifier made of letters, digits and underscores
 *   ${name}   braced form, for placeholders followed by identifier characters
 *   $$        a literal dollar sign
 *
 * Substitution never fails: placeholders without a value in the mapping are
 * left exactly as written.
 */

import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { ConfigurationError } from '../../core/errors.js'
import { errorCode } from '../../utils/fs-safe.js'

/** File suffix appended to a spec type to locate its template */
export const TEMPLATE_SUFFIX = '.spec'

const PLACEHOLDER_PATTERN = /\$(?:(\$)|([_a-zA-Z][_a-zA-Z0-9]*)|\{([_a-zA-Z][_a-zA-Z0-9]*)\})/g

/**
 * List the distinct placeholder names used in `text`, in order of first
 * appearance. `$$` escapes are not placeholders.
 */
export function extractPlaceholders(text: string): string[] {
  const names = new Set<string>()
  for (const match of text.matchAll(PLACEHOLDER_PATTERN)) {
    const name = match[2] ?? match[3]
    if (name !== undefined) names.add(name)
  }
  return [...names]
}

/**
 * Replace the placeholders of `text` that have a value in `values`.
 */
export function safeSubstitute(text: string, values: Readonly<Record<string, string>>): string {
  const known = new Set(extractPlaceholders(text).filter((name) => Object.hasOwn(values, name)))

  return text.replace(
    PLACEHOLDER_PATTERN,
    (whole: string, escaped: string | undefined, bare: string | undefined, braced: string | undefined) => {
      if (escaped !== undefined) return '$'
      const name = bare ?? braced
      if (name === undefined || !known.has(name)) return whole
      return values[name] ?? whole
    }
  )
}

/** Absolute path of the template for `specType` */
export function templatePath(templateDir: string, specType: string): string {
  return join(templateDir, `${specType}${TEMPLATE_SUFFIX}`)
}

/**
 * Read the raw template for `specType`.
 * @throws {ConfigurationError} when the template file does not exist
 */
export async function loadTemplate(templateDir: string, specType: string): Promise<string> {
  const path = templatePath(templateDir, specType)
  try {
    return await readFile(path, 'utf-8')
  } catch (err) {
    const code = errorCode(err)
    if (code === 'ENOENT' || code === 'ENOTDIR' || code === 'EISDIR') {
      throw new ConfigurationError(`Template for spec type "${specType}" not found: ${path}`, {
        specType,
        templatePath: path,
      })
    }
    throw err
  }
}
