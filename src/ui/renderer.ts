import chalk from 'chalk'
import { InstallOutcome, PackageRecord } from '../types'

/**
 * A requirement line that `pip install -r` accepts
 */
export function renderRequirement(name: string, version: string): string {
  return `${name}==${version}`
}

export function renderAvailable(pkg: PackageRecord): string {
  return `${chalk.cyan(pkg.name)}==${chalk.green(pkg.latestVersion)} is available (you have ${chalk.yellow(pkg.currentVersion)})`
}

export function renderUpToDate(): string {
  return chalk.green('Everything up-to-date')
}

export function renderInstallSummary(outcomes: readonly InstallOutcome[]): string {
  const failed = outcomes.filter((o) => o.exitCode !== 0)
  if (failed.length === 0) {
    return chalk.green('✅ Upgrade finished')
  }

  const names = failed.flatMap((o) => o.packages).join(', ')
  return chalk.yellow(
    `⚠️  ${failed.length} of ${outcomes.length} pip install run(s) failed: ${names}`
  )
}
