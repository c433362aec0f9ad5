import { ConfigurationError } from '../errors'
import { PackageRecord } from '../types'

export function compileNamePattern(pattern: string, isWhitelist: boolean = true): RegExp {
  try {
    return new RegExp(pattern, 'i')
  } catch (error) {
    const kind = isWhitelist ? 'whitelist' : 'blacklist'
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`Invalid ${kind} pattern "${pattern}": ${reason}`)
  }
}

/**
 * Keep packages whose name matches `pattern` (whitelist) or does not match it
 * (blacklist). The pattern is searched case-insensitively anywhere in the
 * name. An empty pattern disables filtering.
 */
export function applyWhitelistOrBlacklist(
  packages: readonly PackageRecord[],
  pattern: string,
  isWhitelist: boolean = true
): readonly PackageRecord[] {
  if (pattern === '') {
    return packages
  }

  const regex = compileNamePattern(pattern, isWhitelist)
  return packages.filter((pkg) => regex.test(pkg.name) === isWhitelist)
}
