/**
 * ConfigSystem implementation - resolves the template directory and the
 * packager identity once at startup.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → config file         ($SPECGEN_CONFIG or ~/.config/specgen/config.yaml)
 *     → environment vars    (SPECGEN_TEMPLATE_DIR, SPECGEN_PACKAGER)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 *     → rpm --eval %packager, only when no layer above named a packager
 */

import { readFile } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { homedir } from 'node:os'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { pathExists } from '../../utils/fs-safe.js'
import { ConfigurationError } from '../../core/errors.js'
import { defaultCommandRunner, type CommandRunner } from '../spec-builder/command-runner.js'
import {
  SpecgenConfigSchema,
  PartialSpecgenConfigSchema,
  type SpecgenConfig,
  type PartialSpecgenConfig,
} from './config-schema.js'
import { CONFIG_FILE_ENV, DEFAULT_CONFIG, ENV_VAR_MAP } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Layer helpers
// ---------------------------------------------------------------------------

/** Overlay the defined values of `override` onto `base` */
function mergeDefined(base: PartialSpecgenConfig, override: PartialSpecgenConfig): PartialSpecgenConfig {
  const result: PartialSpecgenConfig = { ...base }
  if (override.template_dir !== undefined) result.template_dir = override.template_dir
  if (override.packager !== undefined) result.packager = override.packager
  return result
}

/**
 * Read the SPECGEN_* environment variables into a partial config.
 * Empty values are treated as unset.
 */
function readEnvOverrides(env: NodeJS.ProcessEnv): PartialSpecgenConfig {
  const overrides: PartialSpecgenConfig = {}
  for (const [envKey, configKey] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]?.trim()
    if (rawValue === undefined || rawValue === '') continue
    overrides[configKey] = rawValue
  }
  return overrides
}

/**
 * Ask rpm for the `%packager` macro.
 *
 * @returns the packager identity, or undefined when rpm fails or the macro
 *   is not defined (rpm then echoes the macro name back)
 */
export async function queryRpmPackager(runner: CommandRunner): Promise<string | undefined> {
  const result = await runner.run('rpm', ['--eval', '%packager'])
  if (result.code !== 0) {
    logger.debug({ code: result.code, stderr: result.stderr }, 'rpm --eval %packager failed')
    return undefined
  }
  const value = result.stdout.trim()
  if (value === '' || value === '%packager') return undefined
  return value
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: SpecgenConfig | null = null
  private readonly _env: NodeJS.ProcessEnv
  private readonly _configFile: string
  private readonly _cliOverrides: PartialSpecgenConfig
  private readonly _runner: CommandRunner

  constructor(options: ConfigSystemOptions = {}) {
    this._env = options.env ?? process.env
    this._configFile = resolve(
      options.configFile ??
        this._env[CONFIG_FILE_ENV] ??
        join(homedir(), '.config', 'specgen', 'config.yaml')
    )
    this._cliOverrides = options.cliOverrides ?? {}
    this._runner = options.runner ?? defaultCommandRunner
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    // 1. Built-in defaults
    let merged: PartialSpecgenConfig = { ...DEFAULT_CONFIG }

    // 2. Config file if present
    const fileConfig = await this._loadYamlFile(this._configFile)
    if (fileConfig !== null) {
      merged = mergeDefined(merged, fileConfig)
    }

    // 3. Environment variable overrides
    merged = mergeDefined(merged, readEnvOverrides(this._env))

    // 4. CLI flag overrides
    merged = mergeDefined(merged, this._cliOverrides)

    // 5. Fall back to the rpm macro for the packager
    if (merged.packager === undefined) {
      merged.packager = await queryRpmPackager(this._runner)
    }

    if (merged.packager === undefined) {
      throw new ConfigurationError(
        'No packager identity configured: set SPECGEN_PACKAGER or define %packager in ~/.rpmmacros',
        { configFile: this._configFile }
      )
    }

    const result = SpecgenConfigSchema.safeParse(merged)
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`)
        .join('\n')
      throw new ConfigurationError(`Configuration validation failed:\n${issues}`, {
        issues: result.error.issues,
      })
    }

    this._config = result.data
    logger.debug({ templateDir: result.data.template_dir }, 'Configuration loaded successfully')
  }

  getConfig(): SpecgenConfig {
    if (this._config === null) {
      throw new ConfigurationError(
        'Configuration has not been loaded. Call load() before getConfig().',
        {}
      )
    }
    return this._config
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _loadYamlFile(filePath: string): Promise<PartialSpecgenConfig | null> {
    if (!(await pathExists(filePath))) return null

    let parsed: unknown
    try {
      const raw = await readFile(filePath, 'utf-8')
      parsed = yaml.load(raw) ?? {}
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigurationError(`Failed to read config file at ${filePath}: ${message}`, {
        filePath,
      })
    }

    const result = PartialSpecgenConfigSchema.safeParse(parsed)
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `  • ${i.path.join('.')}: ${i.message}`)
        .join('\n')
      throw new ConfigurationError(`Invalid config file at ${filePath}:\n${issues}`, {
        filePath,
        issues: result.error.issues,
      })
    }

    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const { packager } = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
