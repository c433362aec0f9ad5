import * as semver from 'semver'
import { PIP_JSON_FORMAT_AFTER, PIP_VERSION_CHECK_FLAG_SINCE } from '../constants'
import { OutputFormat } from '../types'

/**
 * Public version identifiers as defined by PEP 440: epoch, release segments,
 * pre, post and dev qualifiers and a local segment.
 */
export const VERSION_PATTERN = new RegExp(
  [
    'v?',
    '(?:',
    '(?:[0-9]+!)?', // epoch
    '[0-9]+(?:\\.[0-9]+)*', // release
    '(?:[-_.]?(?:alpha|a|beta|b|preview|pre|c|rc)[-_.]?[0-9]*)?', // pre
    '(?:-[0-9]+|[-_.]?(?:post|rev|r)[-_.]?[0-9]*)?', // post
    '(?:[-_.]?dev[-_.]?[0-9]*)?', // dev
    ')',
    '(?:\\+[a-z0-9]+(?:[-_.][a-z0-9]+)*)?', // local
  ].join(''),
  'gi'
)

export const NAME_PATTERN = /^[a-z0-9_-]+/i

/**
 * Extracts the version from `pip --version` output, e.g.
 * "pip 23.2.1 from /usr/lib/python3/dist-packages/pip (python 3.11)".
 */
export function parsePipVersion(output: string): string | null {
  const match = /^pip\s+(\S+)/.exec(output.trim())
  if (!match) {
    return null
  }
  return semver.coerce(match[1])?.version ?? null
}

export function supportsVersionCheckFlag(pipVersion: string | null): boolean {
  return pipVersion === null || semver.gte(pipVersion, PIP_VERSION_CHECK_FLAG_SINCE)
}

/**
 * JSON output arrived after pip 9.0; anything older only prints legacy text.
 * An unknown version is assumed to be recent.
 */
export function selectOutputFormat(pipVersion: string | null): OutputFormat {
  if (pipVersion === null) {
    return 'structured'
  }
  return semver.gt(pipVersion, PIP_JSON_FORMAT_AFTER) ? 'structured' : 'legacy'
}
