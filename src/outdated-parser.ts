import { OutputDecodeError } from './errors'
import { OutputFormat, PackageRecord } from './types'
import { NAME_PATTERN, VERSION_PATTERN } from './utils/version'

interface PipListEntry {
  name: string
  version: string
  latest_version: string
}

function isPipListEntry(value: unknown): value is PipListEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'version' in value &&
    typeof value.version === 'string' &&
    'latest_version' in value &&
    typeof value.latest_version === 'string'
  )
}

/**
 * Decode `pip list --outdated --format=json` output. Extra keys such as
 * `latest_filetype` are ignored.
 */
export function parseStructured(output: string): PackageRecord[] {
  let decoded: unknown
  try {
    decoded = JSON.parse(output)
  } catch (error) {
    throw new OutputDecodeError(error instanceof Error ? error.message : String(error))
  }

  if (!Array.isArray(decoded)) {
    throw new OutputDecodeError('Expected a JSON array from pip list')
  }

  return decoded.map((entry: unknown, index) => {
    if (!isPipListEntry(entry)) {
      throw new OutputDecodeError(
        `Entry ${index} of pip list output lacks name, version or latest_version`
      )
    }
    return {
      name: entry.name,
      currentVersion: entry.version,
      latestVersion: entry.latest_version,
    }
  })
}

/**
 * Scrape the text printed by pip releases without JSON output, e.g.
 * "requests (2.9.1) - Latest: 2.10.0 [wheel]". Lines without a leading name
 * and exactly two versions are skipped: old pip prints headers and notices
 * in between.
 */
export function parseLegacy(output: string): PackageRecord[] {
  const packages: PackageRecord[] = []

  for (const line of output.split(/\r?\n/)) {
    const nameMatch = NAME_PATTERN.exec(line)
    const versions = Array.from(line.matchAll(VERSION_PATTERN), (match) => match[0])

    if (nameMatch && versions.length === 2) {
      packages.push({
        name: nameMatch[0],
        currentVersion: versions[0],
        latestVersion: versions[1],
      })
    }
  }

  return packages
}

export function parseOutdatedPackages(output: string, format: OutputFormat): PackageRecord[] {
  return format === 'structured' ? parseStructured(output) : parseLegacy(output)
}
