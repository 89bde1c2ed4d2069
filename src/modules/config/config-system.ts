/**
 * ConfigSystem interface - public contract for configuration resolution.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { SpecgenConfig, PartialSpecgenConfig } from './config-schema.js'
import type { CommandRunner } from '../spec-builder/command-runner.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /** Config file to read (default: $SPECGEN_CONFIG or ~/.config/specgen/config.yaml) */
  configFile?: string
  /** Values that override everything else. Typically populated from CLI flags. */
  cliOverrides?: PartialSpecgenConfig
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
  /** Runner used to query rpm for the packager (injectable for testing) */
  runner?: CommandRunner
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides the resolved specgen configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < config file < env vars < CLI flags
 * with `rpm --eval %packager` consulted only when no layer names a packager.
 */
export interface ConfigSystem {
  /**
   * Resolve and validate configuration from all sources.
   * @throws {ConfigurationError} when the packager cannot be resolved or a
   *   config file is malformed
   */
  load(): Promise<void>

  /**
   * Return the resolved configuration.
   * @throws {ConfigurationError} if `load()` has not been called.
   */
  getConfig(): SpecgenConfig

  readonly isLoaded: boolean
}
