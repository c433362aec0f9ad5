import ora from 'ora'
import { parseOutdatedPackages } from './outdated-parser'
import { OutputFormat, PackageRecord, PipCommand } from './types'
import { CommandRunner, formatCommand, Logger } from './utils'
import { parsePipVersion, selectOutputFormat, supportsVersionCheckFlag } from './utils/version'

export interface DetectorOptions {
  silent?: boolean // Suppress the progress spinner
}

export interface ListStrategy {
  pipVersion: string | null
  format: OutputFormat
}

export class PackageDetector {
  private runner: CommandRunner
  private pip: PipCommand
  private logger: Logger
  private silent: boolean

  constructor(runner: CommandRunner, pip: PipCommand, logger: Logger, options?: DetectorOptions) {
    this.runner = runner
    this.pip = pip
    this.logger = logger
    this.silent = options?.silent === true
  }

  /**
   * Decide once per run how `pip list` is asked for its output
   */
  public async detectStrategy(): Promise<ListStrategy> {
    const output = await this.runner.capture(this.pip.file, [...this.pip.args, '--version'])
    const pipVersion = parsePipVersion(output)
    if (pipVersion === null) {
      this.logger.debug(`Could not read a pip version from "${output.trim()}"`)
    }

    const format = selectOutputFormat(pipVersion)
    this.logger.debug(`pip ${pipVersion ?? 'unknown'}, using ${format} list output`)
    return { pipVersion, format }
  }

  public buildListArgs(forwarded: readonly string[], strategy: ListStrategy): string[] {
    const args = [...this.pip.args, 'list', '--outdated', ...forwarded]
    if (supportsVersionCheckFlag(strategy.pipVersion)) {
      args.push('--disable-pip-version-check')
    }
    if (strategy.format === 'structured') {
      args.push('--format=json')
    }
    return args
  }

  public async getOutdatedPackages(
    forwarded: readonly string[],
    strategy: ListStrategy
  ): Promise<PackageRecord[]> {
    const args = this.buildListArgs(forwarded, strategy)
    this.logger.debug(formatCommand(this.pip.file, args))

    const spinner = ora({ text: 'Checking for outdated packages...', isSilent: this.silent }).start()
    let output: string
    try {
      output = await this.runner.capture(this.pip.file, args)
    } catch (error) {
      spinner.fail('Failed to list outdated packages')
      throw error
    }
    spinner.stop()

    const packages = parseOutdatedPackages(output, strategy.format)
    this.logger.debug(
      `Found ${packages.length} outdated package${packages.length === 1 ? '' : 's'}`
    )
    return packages
  }
}
