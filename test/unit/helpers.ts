import { vi } from 'vitest'
import { AnswerReader } from '../../src/ui'
import { CommandRunner, createLogger, Logger } from '../../src/utils'

export interface RecordedCommand {
  kind: 'capture' | 'call'
  file: string
  args: string[]
}

export interface FakeRunnerHandlers {
  capture?: (args: string[]) => string
  call?: (args: string[]) => number
}

/**
 * In-memory stand-in for pip. Records every command and answers from the
 * given handlers.
 */
export class FakeRunner implements CommandRunner {
  public commands: RecordedCommand[] = []
  private handlers: FakeRunnerHandlers

  constructor(handlers: FakeRunnerHandlers = {}) {
    this.handlers = handlers
  }

  async capture(file: string, args: string[]): Promise<string> {
    this.commands.push({ kind: 'capture', file, args })
    return this.handlers.capture ? this.handlers.capture(args) : ''
  }

  async call(file: string, args: string[]): Promise<number> {
    this.commands.push({ kind: 'call', file, args })
    return this.handlers.call ? this.handlers.call(args) : 0
  }

  calls(): string[][] {
    return this.commands.filter((c) => c.kind === 'call').map((c) => c.args)
  }
}

export const PIP = { file: 'python3', args: ['-m', 'pip'] }

/**
 * Answers `--version` with the given pip version and `list` with `listing`
 */
export function pipCapture(version: string, listing: string): (args: string[]) => string {
  return (args) =>
    args.includes('--version')
      ? `pip ${version} from /usr/lib/python3/dist-packages/pip (python 3.11)\n`
      : listing
}

export interface RecordingLogger {
  logger: Logger
  stdout: string[]
  stderr: string[]
}

export function createRecordingLogger(verbose: boolean = false): RecordingLogger {
  const stdout: string[] = []
  const stderr: string[] = []
  const logger = createLogger({
    verbose,
    stdout: (line) => stdout.push(line),
    stderr: (line) => stderr.push(line),
  })
  return { logger, stdout, stderr }
}

/**
 * A reader that replies with the given answers in order
 */
export function scriptedAnswers(answers: string[]) {
  const queue = [...answers]
  return vi.fn<AnswerReader>(async () => {
    const next = queue.shift()
    if (next === undefined) {
      throw new Error('No scripted answer left')
    }
    return next
  })
}
