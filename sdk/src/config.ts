import { z } from 'zod'
import { ConfigError } from './types'
import type { SpanFormatterConfig } from './types'

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  locale: z
    .string()
    .min(1)
    .refine(isSupportedLocale, { message: 'Unknown locale tag' })
    .nullable(),
  debug: z.boolean().default(false),
})

export type ResolvedConfig = z.infer<typeof configSchema>

function isSupportedLocale(tag: string): boolean {
  try {
    return Intl.getCanonicalLocales(tag).length === 1
  } catch {
    return false
  }
}

/**
 * Locale the host runtime formats with when none is configured
 */
export function runtimeLocale(): string {
  return new Intl.NumberFormat().resolvedOptions().locale
}

/**
 * Merge explicit config over environment defaults and validate
 *
 * Environment:
 * - `RICHFMT_LOCALE`: default locale (`none` disables localization)
 * - `RICHFMT_DEBUG`: `1` enables debug logging
 */
export function loadConfig(
  overrides: SpanFormatterConfig = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig {
  const envLocale = env.RICHFMT_LOCALE === 'none' ? null : env.RICHFMT_LOCALE || runtimeLocale()

  const raw = {
    locale: overrides.locale !== undefined ? overrides.locale : envLocale,
    debug: overrides.debug ?? env.RICHFMT_DEBUG === '1',
  }

  const parsed = configSchema.safeParse(raw)
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid formatter config: ${detail}`)
  }

  return parsed.data
}
