import { writeFileSync } from 'fs'
import { join } from 'path'
import { FREEZE_FILE } from './constants'
import { InstallOutcome, PackageRecord, PipCommand, UpgradeOptions } from './types'
import { renderInstallSummary, renderRequirement } from './ui'
import { CommandRunner, formatCommand, Logger } from './utils'

export class PackageUpgrader {
  private runner: CommandRunner
  private pip: PipCommand
  private logger: Logger
  private cwd: string

  constructor(runner: CommandRunner, pip: PipCommand, logger: Logger, cwd: string = process.cwd()) {
    this.runner = runner
    this.pip = pip
    this.logger = logger
    this.cwd = cwd
  }

  public async upgradePackages(
    packages: readonly PackageRecord[],
    forwarded: readonly string[],
    options: UpgradeOptions = {}
  ): Promise<InstallOutcome[]> {
    if (packages.length === 0) {
      this.logger.info('No packages to upgrade.')
      return []
    }

    if (options.freeze) {
      this.freezePackages(packages)
    }

    const names = packages.map((pkg) => pkg.name)
    const batches = options.continueOnFail ? names.map((name) => [name]) : [names]
    const outcomes: InstallOutcome[] = []
    // An AbortedError from the runner stops the remaining installs
    for (const batch of batches) {
      outcomes.push(await this.install(batch, forwarded))
    }

    this.logger.info(renderInstallSummary(outcomes))
    return outcomes
  }

  /**
   * Record the installed versions so an upgrade can be rolled back with
   * `pip install -r`
   */
  public freezePackages(packages: readonly PackageRecord[]): string {
    const path = join(this.cwd, FREEZE_FILE)
    const content = packages
      .map((pkg) => `${renderRequirement(pkg.name, pkg.currentVersion)}\n`)
      .join('')
    writeFileSync(path, content, 'utf-8')
    this.logger.debug(`Wrote ${packages.length} pinned version(s) to ${path}`)
    return path
  }

  private async install(names: string[], forwarded: readonly string[]): Promise<InstallOutcome> {
    const args = [...this.pip.args, 'install', '-U', ...forwarded, ...names]
    this.logger.debug(formatCommand(this.pip.file, args))

    const exitCode = await this.runner.call(this.pip.file, args)
    if (exitCode !== 0) {
      this.logger.warn(`pip install exited with code ${exitCode} for ${names.join(', ')}`)
    }
    return { packages: names, exitCode }
  }
}
