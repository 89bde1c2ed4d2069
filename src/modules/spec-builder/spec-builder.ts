/**
 * SpecBuilder interface - public contract for rendering and staging a spec.
 *
 * Create an instance via `createSpecBuilder()` from spec-builder-impl.ts.
 */

import type { CommandRunner } from './command-runner.js'
import type { DeployResult } from './types.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/** Minimal sink for the self-test difference report */
export interface ReportStream {
  write(chunk: string): unknown
}

export interface SpecBuilderOptions {
  /** Directory the package directory is staged in (default: process.cwd()) */
  workdir?: string
  /** Clone the package directory from the upstream URL */
  useUpstream?: boolean
  /** Upstream tag to reset to; the most recent tag when omitted */
  tag?: string
  /** Changelog date (default: now) */
  date?: Date
  /** Runner for git and gear tools (injectable for testing) */
  runner?: CommandRunner
  /** Where the self-test writes its difference report (default: process.stdout) */
  output?: ReportStream
}

// ---------------------------------------------------------------------------
// SpecBuilder interface
// ---------------------------------------------------------------------------

export interface SpecBuilder {
  /** Package name; undefined until `render()` has run */
  readonly packageName: string | undefined

  /** Build-source descriptor written into .gear/rules */
  readonly buildPlace: string

  /**
   * Render the template for the configured spec type.
   * Fixes the package name for the rest of the session.
   * @throws {ConfigurationError} when the template file does not exist
   */
  render(): Promise<string>

  /**
   * Render if needed, then stage the package directory with its spec and
   * gear rules. Clones from upstream when the builder is in upstream mode.
   * @throws {FileSystemError} when a directory cannot be created
   * @throws {ExternalToolError} when an upstream step fails
   */
  deploy(): Promise<DeployResult>

  /**
   * `deploy()` with upstream mode switched on.
   */
  deployFromUpstream(): Promise<DeployResult>

  /**
   * Deploy from scratch in a temporary directory and compare the result with
   * `referenceDir`. Differences are written to the report stream.
   * @throws {VerificationError} when the trees differ
   */
  verifyAgainstReference(referenceDir: string): Promise<void>
}
