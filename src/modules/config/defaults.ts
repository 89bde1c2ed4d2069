/**
 * Built-in default values for the specgen configuration.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   config file → environment variables → CLI flags
 */

import type { PartialSpecgenConfig } from './config-schema.js'

/** System-wide template location */
export const DEFAULT_TEMPLATE_DIR = '/usr/share/specgen/templates'

export const DEFAULT_CONFIG: PartialSpecgenConfig = {
  template_dir: DEFAULT_TEMPLATE_DIR,
}

/** Environment variable naming an alternative config file */
export const CONFIG_FILE_ENV = 'SPECGEN_CONFIG'

/** Environment variables overriding single config keys */
export const ENV_VAR_MAP: Record<string, keyof PartialSpecgenConfig> = {
  SPECGEN_TEMPLATE_DIR: 'template_dir',
  SPECGEN_PACKAGER: 'packager',
}
