/**
 * Zod validation schemas for the specgen configuration.
 *
 * The configuration is flat: where templates live and who the packager is.
 */

import { z } from 'zod'

export const SpecgenConfigSchema = z
  .object({
    /** Directory holding one `<spec type>.spec` template per package type */
    template_dir: z.string().min(1),
    /** Packager identity written into changelog stamps, e.g. "Jane Doe <jane@example.org>" */
    packager: z.string().min(1),
  })
  .strict()

export type SpecgenConfig = z.infer<typeof SpecgenConfigSchema>

/** Any subset of the config, as found in a config file or an override layer */
export const PartialSpecgenConfigSchema = SpecgenConfigSchema.partial()

export type PartialSpecgenConfig = z.infer<typeof PartialSpecgenConfigSchema>
