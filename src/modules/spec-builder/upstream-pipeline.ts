/**
 * upstream-pipeline.ts - Ordered external-tool steps for upstream packaging.
 *
 * A pipeline is a list of steps, each a single external command. Steps run
 * strictly in order; the first non-zero exit stops the pipeline and is
 * reported with the step name, tool, arguments, exit code and stderr.
 * Nothing is rolled back: the directory is left as the failing step left it.
 *
 * Two pipelines are defined here:
 *  - bootstrap: clone the upstream repository, reset to a tag, branch off
 *    and commit an empty tree as the packaging starting point
 *  - finalize:  post-deploy gear bookkeeping (tags, remotes, staging)
 */

import { join } from 'node:path'
import { createLogger } from '../../utils/logger.js'
import type { CommandRunner } from './command-runner.js'

const logger = createLogger('upstream-pipeline')

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Remote name given to the upstream repository */
export const UPSTREAM_REMOTE = 'upstream'

/** Packaging branch created on top of the upstream tag */
export const PACKAGING_BRANCH = 'sisyphus'

/** Message of the commit that empties the tree */
export const CLEANUP_COMMIT_MESSAGE = 'Remove upstream sources'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Outputs of completed steps, keyed by step name */
export type StepOutputs = Readonly<Record<string, string>>

export interface PipelineStep {
  /** Step name used in logs and failure reports */
  name: string
  tool: string
  /** Arguments, or a function computing them from earlier step outputs */
  args: string[] | ((outputs: StepOutputs) => string[])
  cwd: string
}

export interface StepFailure {
  step: string
  tool: string
  args: string[]
  cwd: string
  exitCode: number
  stderr: string
}

export type PipelineResult =
  | { ok: true; outputs: StepOutputs }
  | { ok: false; failure: StepFailure; completed: string[] }

// ---------------------------------------------------------------------------
// runPipeline
// ---------------------------------------------------------------------------

/**
 * Run `steps` in order and stop at the first failure.
 */
export async function runPipeline(steps: PipelineStep[], runner: CommandRunner): Promise<PipelineResult> {
  const outputs: Record<string, string> = {}
  const completed: string[] = []

  for (const step of steps) {
    const args = typeof step.args === 'function' ? step.args(outputs) : step.args
    logger.debug({ step: step.name, tool: step.tool, args, cwd: step.cwd }, 'Running pipeline step')

    const result = await runner.run(step.tool, args, { cwd: step.cwd })
    if (result.code !== 0) {
      const failure: StepFailure = {
        step: step.name,
        tool: step.tool,
        args,
        cwd: step.cwd,
        exitCode: result.code,
        stderr: result.stderr,
      }
      logger.error({ ...failure, completed }, 'Pipeline step failed')
      return { ok: false, failure, completed }
    }

    outputs[step.name] = result.stdout.trim()
    completed.push(step.name)
  }

  return { ok: true, outputs }
}

// ---------------------------------------------------------------------------
// Step builders
// ---------------------------------------------------------------------------

export interface BootstrapParams {
  /** Directory the clone is created in */
  workdir: string
  packageName: string
  url: string
  /** Tag to reset to; the most recent reachable tag when omitted */
  tag?: string
}

/** Name of the step whose output is the tag the tree was reset to */
export const RESOLVE_TAG_STEP = 'resolve-tag'

/**
 * Steps that turn an upstream URL into a packaging directory whose
 * packaging branch starts from an empty tree.
 */
export function bootstrapSteps(params: BootstrapParams): PipelineStep[] {
  const packageDir = join(params.workdir, params.packageName)
  const { tag } = params

  const steps: PipelineStep[] = [
    {
      name: 'clone',
      tool: 'git',
      args: ['clone', '-o', UPSTREAM_REMOTE, params.url, params.packageName],
      cwd: params.workdir,
    },
  ]

  if (tag === undefined) {
    steps.push({
      name: RESOLVE_TAG_STEP,
      tool: 'git',
      args: ['describe', '--tags', '--abbrev=0'],
      cwd: packageDir,
    })
  }

  steps.push(
    {
      name: 'reset',
      tool: 'git',
      args: (outputs) => ['reset', '--hard', tag ?? outputs[RESOLVE_TAG_STEP] ?? ''],
      cwd: packageDir,
    },
    {
      name: 'branch',
      tool: 'git',
      args: ['checkout', '-b', PACKAGING_BRANCH],
      cwd: packageDir,
    },
    {
      name: 'remove',
      tool: 'git',
      args: ['rm', '-r', '-q', '.'],
      cwd: packageDir,
    },
    {
      name: 'commit',
      tool: 'git',
      args: ['commit', '-q', '-m', CLEANUP_COMMIT_MESSAGE],
      cwd: packageDir,
    }
  )

  return steps
}

/**
 * Post-deploy bookkeeping run inside the package directory once the spec
 * and rules are written.
 */
export function finalizeSteps(packageDir: string): PipelineStep[] {
  return [
    { name: 'update-tags', tool: 'gear-update-tag', args: ['-a'], cwd: packageDir },
    { name: 'save-remotes', tool: 'gear-remotes-save', args: [], cwd: packageDir },
    { name: 'stage', tool: 'git', args: ['add', '.'], cwd: packageDir },
  ]
}
