/**
 * Shared types for the spec-builder module.
 */

import { z } from 'zod'

/** Keys recognized by the spec templates */
export const FIELD_KEYS = [
  'spec_type',
  'module',
  'version',
  'summary',
  'license',
  'url',
  'packager',
  'description',
  'stamp',
  'lastchange',
] as const

export type FieldKey = (typeof FIELD_KEYS)[number]

/** Complete field mapping; every key present, possibly empty */
export type FieldMapping = Record<FieldKey, string>

/** Caller-supplied fields, before defaults are filled in */
export const FieldInputSchema = z.object({
  spec_type: z.string().min(1, 'spec type is required'),
  module: z.string().min(1, 'module name is required'),
  version: z.string().min(1, 'version is required'),
  summary: z.string().optional(),
  license: z.string().optional(),
  url: z.string().optional(),
  packager: z.string().optional(),
  description: z.string().optional(),
  stamp: z.string().optional(),
  lastchange: z.string().optional(),
})

export type FieldInput = z.infer<typeof FieldInputSchema>

/**
 * Fill every absent key of `input` with an empty string.
 */
export function normalizeFields(input: FieldInput): FieldMapping {
  return {
    spec_type: input.spec_type,
    module: input.module,
    version: input.version,
    summary: input.summary ?? '',
    license: input.license ?? '',
    url: input.url ?? '',
    packager: input.packager ?? '',
    description: input.description ?? '',
    stamp: input.stamp ?? '',
    lastchange: input.lastchange ?? '',
  }
}

/** Result of a deploy run */
export interface DeployResult {
  packageName: string
  /** Directory holding the spec and .gear/ */
  packageDir: string
  specPath: string
  rulesPath: string
  buildPlace: string
  /** Tag the upstream bootstrap reset to; undefined when no clone happened */
  resolvedTag?: string
}
