/**
 * Barrel exports for the spec-builder module.
 */

export { createSpecBuilder, SpecBuilderImpl, GEAR_DIR, RULES_FILE } from './spec-builder-impl.js'
export type { SpecBuilder, SpecBuilderOptions, ReportStream } from './spec-builder.js'
export { FIELD_KEYS, FieldInputSchema, normalizeFields } from './types.js'
export type { FieldKey, FieldMapping, FieldInput, DeployResult } from './types.js'
export {
  PACKAGE_PREFIXES,
  LOCAL_BUILD_PLACE,
  derivePackageName,
  upstreamBuildPlace,
  buildRuleLine,
  formatChangelogDate,
  formatStamp,
  parseDate,
} from './naming.js'
export {
  TEMPLATE_SUFFIX,
  extractPlaceholders,
  safeSubstitute,
  templatePath,
  loadTemplate,
} from './template-renderer.js'
export {
  UPSTREAM_REMOTE,
  PACKAGING_BRANCH,
  CLEANUP_COMMIT_MESSAGE,
  RESOLVE_TAG_STEP,
  runPipeline,
  bootstrapSteps,
  finalizeSteps,
} from './upstream-pipeline.js'
export type { PipelineStep, PipelineResult, StepFailure, StepOutputs, BootstrapParams } from './upstream-pipeline.js'
export { directoriesEqual, diffDirectories, formatDifference, DEFAULT_IGNORED } from './dir-compare.js'
export type { DirDifference, EntryType, CompareOptions } from './dir-compare.js'
export { spawnCommand, defaultCommandRunner } from './command-runner.js'
export type { CommandRunner, CommandResult, RunOptions } from './command-runner.js'
