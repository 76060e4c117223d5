/**
 * Generator Configuration
 *
 * Options can be passed explicitly or picked up from the environment:
 * - MOSDL_DOC_TYPE: bulk | inline | suppress (case-insensitive)
 * - MOSDL_OUT_DIR: directory receiving one `.mosdl` file per area
 */

import { z } from 'zod'
import { Errors } from './errors/index.js'

/**
 * Documentation rendering modes
 *
 * - BULK: operation documentation is gathered into one block ahead of the
 *   operation (recommended)
 * - INLINE: every comment is written right before the element it documents
 * - SUPPRESS: documentation is stripped completely
 */
export const DOC_TYPES = ['BULK', 'INLINE', 'SUPPRESS'] as const

export type DocType = (typeof DOC_TYPES)[number]

export const GeneratorConfigSchema = z.object({
  docType: z.preprocess(
    (value) => (typeof value === 'string' ? value.toUpperCase() : value),
    z.enum(DOC_TYPES)
  ).default('BULK'),
  outDir: z.string().min(1, 'must not be empty').default('.'),
  newline: z.enum(['\n', '\r\n']).default('\n'),
})

export type GeneratorConfig = z.infer<typeof GeneratorConfigSchema>

export type GeneratorConfigInput = z.input<typeof GeneratorConfigSchema>

/**
 * Resolve generator configuration
 *
 * Explicit values win over environment variables, which win over defaults.
 *
 * @throws MosdlError with code INVALID_CONFIG
 */
export function loadConfig(
  input: GeneratorConfigInput = {},
  env: Record<string, string | undefined> = process.env
): GeneratorConfig {
  const result = GeneratorConfigSchema.safeParse({
    docType: input.docType ?? env.MOSDL_DOC_TYPE,
    outDir: input.outDir ?? env.MOSDL_OUT_DIR,
    newline: input.newline,
  })

  if (!result.success) {
    throw Errors.config(
      result.error.issues.map((issue) => `${issue.path.map(String).join('.') || 'root'}: ${issue.message}`)
    )
  }

  return result.data
}
