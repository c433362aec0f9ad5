import chalk from 'chalk'
import { RunResult } from '../types'

export interface ExitChannel {
  stdout: (text: string) => void
  stderr: (text: string) => void
  exit: (code: number) => void
}

const processChannel: ExitChannel = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  exit: (code) => process.exit(code),
}

export function exitCodeFor(result: RunResult): number {
  return result.status === 'fatal' ? 1 : 0
}

/**
 * Report the outcome of a run and end the process. An abort is not a failure.
 */
export function exitWith(result: RunResult, channel: ExitChannel = processChannel): void {
  if (result.status === 'aborted') {
    channel.stdout('\nAborted\n')
  } else if (result.status === 'fatal') {
    channel.stderr(`${chalk.red(result.message)}\n`)
  }
  channel.exit(exitCodeFor(result))
}
