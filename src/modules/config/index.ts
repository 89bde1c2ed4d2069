/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, queryRpmPackager } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export { SpecgenConfigSchema, PartialSpecgenConfigSchema } from './config-schema.js'
export type { SpecgenConfig, PartialSpecgenConfig } from './config-schema.js'
export { DEFAULT_CONFIG, DEFAULT_TEMPLATE_DIR, CONFIG_FILE_ENV, ENV_VAR_MAP } from './defaults.js'
