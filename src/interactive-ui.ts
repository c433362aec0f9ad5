import { UPGRADE_PROMPT } from './constants'
import { AskerState, PackageRecord } from './types'
import { AnswerReader, ask, initialAskerState, readTerminalAnswer, renderAvailable } from './ui'
import { Logger } from './utils'

export interface SelectionResult {
  selected: PackageRecord[]
  state: AskerState
}

export class InteractiveUI {
  private logger: Logger
  private readAnswer: AnswerReader

  constructor(logger: Logger, readAnswer: AnswerReader = readTerminalAnswer) {
    this.logger = logger
    this.readAnswer = readAnswer
  }

  public displayPackages(packages: readonly PackageRecord[]): void {
    packages.forEach((pkg) => this.logger.info(renderAvailable(pkg)))
  }

  /**
   * Announce each package and ask whether to upgrade it. Once the user
   * answers all or quit, the remaining packages are still listed but no
   * longer asked about.
   */
  public async selectPackagesToUpgrade(
    packages: readonly PackageRecord[],
    state: AskerState = initialAskerState
  ): Promise<SelectionResult> {
    const selected: PackageRecord[] = []
    let current = state

    for (const pkg of packages) {
      this.logger.info(renderAvailable(pkg))
      const result = await ask(current, UPGRADE_PROMPT, this.readAnswer)
      current = result.state
      if (result.decision === 'y' || result.decision === 'a') {
        selected.push(pkg)
      }
    }

    return { selected, state: current }
  }
}
