import { getPipCommand } from '../config'
import { INSTALL_ONLY_FLAGS, LIST_ONLY_FLAGS } from '../constants'
import { AbortedError, ConfigurationError } from '../errors'
import { InteractiveUI } from '../interactive-ui'
import { PackageDetector } from '../package-detector'
import { PackageRecord, PipCommand, PipReviewOptions, RunResult } from '../types'
import { AnswerReader, readTerminalAnswer, renderRequirement, renderUpToDate } from '../ui'
import { PackageUpgrader } from '../upgrader'
import {
  applyWhitelistOrBlacklist,
  CommandRunner,
  compileNamePattern,
  createLogger,
  createProcessRunner,
  filterForwards,
  Logger,
} from '../utils'

/**
 * Collaborators that talk to the outside world. The CLI uses the defaults.
 */
export interface PipReviewDependencies {
  runner?: CommandRunner
  pip?: PipCommand
  logger?: Logger
  readAnswer?: AnswerReader
}

/**
 * Main orchestrator: list, filter, select and upgrade
 */
export class PipReview {
  private options: PipReviewOptions
  private logger: Logger
  private detector: PackageDetector
  private ui: InteractiveUI
  private upgrader: PackageUpgrader

  constructor(options: PipReviewOptions = {}, deps: PipReviewDependencies = {}) {
    const cwd = options.cwd ?? process.cwd()
    const runner = deps.runner ?? createProcessRunner(cwd)
    const pip = deps.pip ?? getPipCommand()

    this.options = options
    this.logger = deps.logger ?? createLogger({ verbose: options.verbose })
    this.detector = new PackageDetector(runner, pip, this.logger, { silent: options.raw })
    this.ui = new InteractiveUI(this.logger, deps.readAnswer ?? readTerminalAnswer)
    this.upgrader = new PackageUpgrader(runner, pip, this.logger, cwd)
  }

  public async run(): Promise<RunResult> {
    try {
      await this.review()
      return { status: 'success' }
    } catch (error) {
      if (error instanceof AbortedError) {
        return { status: 'aborted' }
      }
      return { status: 'fatal', message: error instanceof Error ? error.message : String(error) }
    }
  }

  private async review(): Promise<void> {
    this.checkConfiguration()

    const { raw, auto, interactive, whitelist = '', blacklist = '' } = this.options
    const forwarded = this.options.forwarded ?? []
    const listArgs = filterForwards(forwarded, INSTALL_ONLY_FLAGS)
    const installArgs = filterForwards(forwarded, LIST_ONLY_FLAGS)
    if (forwarded.length > 0) {
      this.logger.debug(`Forwarding to pip list: ${listArgs.join(' ') || '(nothing)'}`)
      this.logger.debug(`Forwarding to pip install: ${installArgs.join(' ') || '(nothing)'}`)
    }

    const strategy = await this.detector.detectStrategy()
    let outdated: readonly PackageRecord[] = await this.detector.getOutdatedPackages(
      listArgs,
      strategy
    )
    outdated = applyWhitelistOrBlacklist(outdated, whitelist, true)
    outdated = applyWhitelistOrBlacklist(outdated, blacklist, false)

    if (outdated.length === 0 && !raw) {
      this.logger.info(renderUpToDate())
      return
    }

    if (auto) {
      await this.upgrade(outdated, installArgs)
      return
    }

    if (raw) {
      outdated.forEach((pkg) => this.logger.info(renderRequirement(pkg.name, pkg.latestVersion)))
      return
    }

    if (!interactive) {
      this.ui.displayPackages(outdated)
      return
    }

    const { selected } = await this.ui.selectPackagesToUpgrade(outdated)
    if (selected.length > 0) {
      await this.upgrade(selected, installArgs)
    }
  }

  /**
   * Everything that can be rejected before pip is run
   */
  private checkConfiguration(): void {
    if (this.options.raw && this.options.interactive) {
      throw new ConfigurationError('--raw and --interactive cannot be used together')
    }
    if (this.options.whitelist) {
      compileNamePattern(this.options.whitelist, true)
    }
    if (this.options.blacklist) {
      compileNamePattern(this.options.blacklist, false)
    }
  }

  private async upgrade(packages: readonly PackageRecord[], installArgs: string[]): Promise<void> {
    await this.upgrader.upgradePackages(packages, installArgs, {
      continueOnFail: this.options.continueOnFail,
      freeze: this.options.freezeOutdatedPackages,
    })
  }
}
