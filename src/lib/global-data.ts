import { siteConfig, type IdentityField } from '@/lib/config'

export type SiteIdentity = Readonly<Record<IdentityField, string>>

export type EnvSource = Readonly<Record<string, string | undefined>>

export type DecodingErrorPolicy = 'fallback' | 'throw'

export interface GlobalDataOptions {
  /**
   * What to do with a malformed percent-encoded value.
   * `fallback` uses the field's default and warns, `throw` rethrows.
   */
  onDecodingError?: DecodingErrorPolicy
  logger?: Pick<Console, 'warn'>
}

export class DecodingError extends Error {
  readonly variable: string

  constructor(variable: string, cause: unknown) {
    super(`Malformed percent-encoding in ${variable}`, { cause })
    this.name = 'DecodingError'
    this.variable = variable
  }
}

export function lookupEnv(env: EnvSource, variable: string): string | undefined {
  return env[variable]
}

// Set-but-empty counts as unset
export function isPresent(value: string | undefined): value is string {
  return value !== undefined && value !== ''
}

export function decodeEnvValue(variable: string, value: string): string {
  try {
    return decodeURIComponent(value)
  } catch (err) {
    if (err instanceof URIError) {
      throw new DecodingError(variable, err)
    }
    throw err
  }
}

export function resolveField(
  env: EnvSource,
  field: IdentityField,
  options: GlobalDataOptions = {},
): string {
  const variable = siteConfig.envVars[field]
  const fallback = siteConfig.defaults[field]
  const raw = lookupEnv(env, variable)

  if (!isPresent(raw)) {
    return fallback
  }

  try {
    return decodeEnvValue(variable, raw)
  } catch (err) {
    if (!(err instanceof DecodingError) || options.onDecodingError === 'throw') {
      throw err
    }
    const logger = options.logger ?? console
    logger.warn(
      `${siteConfig.logPrefix} ${err.message}, using default "${fallback}"`,
    )
    return fallback
  }
}

/**
 * Resolves the site identity (author name, blog title, footer text).
 *
 * Reads `process.env` unless another source is given. Every call builds a
 * new frozen record; nothing is cached.
 */
export function getGlobalData(
  env: EnvSource = process.env,
  options: GlobalDataOptions = {},
): SiteIdentity {
  return Object.freeze({
    name: resolveField(env, 'name', options),
    blogTitle: resolveField(env, 'blogTitle', options),
    footerText: resolveField(env, 'footerText', options),
  })
}
