/**
 * SpecBuilder implementation.
 *
 * Lifecycle: constructed once per invocation from the field mapping and the
 * resolved configuration, then `render()` → `deploy()` (or
 * `verifyAgainstReference()`, which runs a full deploy of its own in a
 * scratch directory).
 *
 * The builder never changes the process working directory; every path and
 * every external tool is anchored at `workdir` or the package directory.
 */

import { mkdir } from 'node:fs/promises'
import { basename, join, resolve } from 'node:path'
import { createLogger } from '../../utils/logger.js'
import { errorCode, pathExists, withTempDir, writeFileAtomic } from '../../utils/fs-safe.js'
import {
  ConfigurationError,
  ExternalToolError,
  FileSystemError,
  VerificationError,
} from '../../core/errors.js'
import type { SpecgenConfig } from '../config/config-schema.js'
import { defaultCommandRunner, type CommandRunner } from './command-runner.js'
import { loadTemplate, safeSubstitute } from './template-renderer.js'
import {
  LOCAL_BUILD_PLACE,
  buildRuleLine,
  derivePackageName,
  formatStamp,
  upstreamBuildPlace,
} from './naming.js'
import {
  RESOLVE_TAG_STEP,
  bootstrapSteps,
  finalizeSteps,
  runPipeline,
  type PipelineResult,
} from './upstream-pipeline.js'
import { diffDirectories, directoriesEqual, formatDifference } from './dir-compare.js'
import type { ReportStream, SpecBuilder, SpecBuilderOptions } from './spec-builder.js'
import type { DeployResult, FieldMapping } from './types.js'

const logger = createLogger('spec-builder')

/** Directory holding gear build rules inside a package directory */
export const GEAR_DIR = '.gear'

/** gear rules file name inside GEAR_DIR */
export const RULES_FILE = 'rules'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Create exactly one directory. An existing directory is an error, so a
 * half-finished earlier run is never merged into.
 */
async function createDirectory(path: string, purpose: string): Promise<void> {
  try {
    await mkdir(path)
  } catch (err) {
    const code = errorCode(err)
    const reason = code === 'EEXIST' ? 'already exists' : err instanceof Error ? err.message : String(err)
    throw new FileSystemError(`Cannot create ${purpose} ${path}: ${reason}`, { path, code })
  }
}

/** Write one staged file, reporting failures as FileSystemError */
async function writeStagedFile(path: string, contents: string, purpose: string): Promise<void> {
  try {
    await writeFileAtomic(path, contents)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new FileSystemError(`Cannot write ${purpose} ${path}: ${reason}`, { path, code: errorCode(err) })
  }
}

/** Raise the failure of a pipeline as ExternalToolError */
function assertPipelineOk(
  result: PipelineResult,
  stage: string
): asserts result is Extract<PipelineResult, { ok: true }> {
  if (result.ok) return
  const { failure, completed } = result
  throw new ExternalToolError(
    `${stage} failed at step "${failure.step}": ${failure.tool} exited with code ${failure.exitCode}` +
      (failure.stderr !== '' ? `\n${failure.stderr}` : ''),
    { ...failure, completed }
  )
}

// ---------------------------------------------------------------------------
// SpecBuilderImpl
// ---------------------------------------------------------------------------

export class SpecBuilderImpl implements SpecBuilder {
  private readonly _fields: FieldMapping
  private readonly _config: SpecgenConfig
  private readonly _options: SpecBuilderOptions
  private readonly _workdir: string
  private readonly _timestamp: Date
  private readonly _tag: string | undefined
  private readonly _runner: CommandRunner
  private readonly _output: ReportStream
  private _useUpstream: boolean
  private _packageName: string | undefined
  private _specText: string | undefined

  constructor(fields: FieldMapping, config: SpecgenConfig, options: SpecBuilderOptions = {}) {
    // The configured packager always wins over a caller-supplied one
    this._fields = { ...fields, packager: config.packager }
    this._config = config
    this._options = options
    this._workdir = resolve(options.workdir ?? process.cwd())
    this._timestamp = options.date ?? new Date()
    this._tag = options.tag
    this._runner = options.runner ?? defaultCommandRunner
    this._output = options.output ?? process.stdout
    this._useUpstream = options.useUpstream ?? false
  }

  get packageName(): string | undefined {
    return this._packageName
  }

  get buildPlace(): string {
    return this._useUpstream ? upstreamBuildPlace(this._tag) : LOCAL_BUILD_PLACE
  }

  async render(): Promise<string> {
    const { spec_type: specType, module: moduleName } = this._fields
    const template = await loadTemplate(this._config.template_dir, specType)

    this._packageName ??= derivePackageName(specType, moduleName)
    this._fields.stamp = formatStamp(this._timestamp, this._fields.packager, this._fields.version)
    this._specText = safeSubstitute(template, this._fields)

    logger.debug({ specType, packageName: this._packageName }, 'Rendered spec template')
    return this._specText
  }

  async deploy(): Promise<DeployResult> {
    const specText = this._specText ?? (await this.render())
    const packageName = this._packageName ?? derivePackageName(this._fields.spec_type, this._fields.module)
    const moduleName = this._fields.module
    const buildPlace = this.buildPlace

    let packageDir: string
    let resolvedTag: string | undefined
    if (basename(this._workdir) === packageName) {
      packageDir = this._workdir
      logger.debug({ packageDir }, 'Staging in place')
    } else if (this._useUpstream) {
      packageDir = join(this._workdir, packageName)
      resolvedTag = await this._bootstrapUpstream(packageName)
    } else {
      packageDir = join(this._workdir, packageName)
      await createDirectory(packageDir, 'package directory')
    }

    const gearDir = join(packageDir, GEAR_DIR)
    await createDirectory(gearDir, 'gear directory')

    const rulesPath = join(gearDir, RULES_FILE)
    await writeStagedFile(rulesPath, buildRuleLine(buildPlace, packageName, moduleName), 'gear rules')

    const specPath = join(packageDir, `${packageName}.spec`)
    await writeStagedFile(specPath, specText, 'spec file')

    if (this._useUpstream) {
      const result = await runPipeline(finalizeSteps(packageDir), this._runner)
      assertPipelineOk(result, 'Post-deploy bookkeeping')
    }

    logger.info({ packageName, packageDir, buildPlace }, 'Package directory deployed')
    return { packageName, packageDir, specPath, rulesPath, buildPlace, resolvedTag }
  }

  async deployFromUpstream(): Promise<DeployResult> {
    this._useUpstream = true
    return this.deploy()
  }

  async verifyAgainstReference(referenceDir: string): Promise<void> {
    const reference = resolve(this._workdir, referenceDir)
    if (!(await pathExists(reference))) {
      throw new FileSystemError(`Reference directory not found: ${reference}`, { path: reference })
    }

    await withTempDir('specgen-verify-', async (scratchDir) => {
      const scratch = new SpecBuilderImpl(this._fields, this._config, {
        ...this._options,
        workdir: scratchDir,
        useUpstream: this._useUpstream,
      })
      const { packageDir } = await scratch.deploy()

      if (await directoriesEqual(reference, packageDir)) {
        logger.debug({ reference }, 'Generated tree matches reference')
        return
      }

      const differences = await diffDirectories(reference, packageDir)
      for (const diff of differences) {
        this._output.write(`${formatDifference(diff)}\n`)
      }
      throw new VerificationError(`Generated package differs from reference ${reference}`, {
        referenceDir: reference,
        differences: differences.length,
      })
    })
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  /**
   * Clone upstream into `<workdir>/<packageName>` and prepare the packaging
   * branch. Returns the tag the tree was reset to.
   */
  private async _bootstrapUpstream(packageName: string): Promise<string> {
    const url = this._fields.url
    if (url === '') {
      throw new ConfigurationError('Cloning from upstream requires a url', { packageName })
    }

    const result = await runPipeline(
      bootstrapSteps({ workdir: this._workdir, packageName, url, tag: this._tag }),
      this._runner
    )
    assertPipelineOk(result, 'Upstream bootstrap')

    const resolvedTag = this._tag ?? result.outputs[RESOLVE_TAG_STEP] ?? ''
    logger.info({ url, tag: resolvedTag, pinned: this._tag !== undefined }, 'Upstream tree reset to tag')
    return resolvedTag
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new SpecBuilder.
 *
 * @example
 * const builder = createSpecBuilder(normalizeFields(input), config.getConfig())
 * await builder.deploy()
 */
export function createSpecBuilder(
  fields: FieldMapping,
  config: SpecgenConfig,
  options: SpecBuilderOptions = {}
): SpecBuilder {
  return new SpecBuilderImpl(fields, config, options)
}
