export class PipReviewError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

export class ConfigurationError extends PipReviewError {}

export class CommandFailedError extends PipReviewError {
  readonly command: string
  readonly exitCode: number | null

  constructor(command: string, exitCode: number | null, detail?: string) {
    const reason = exitCode === null ? 'could not be started' : `exited with code ${exitCode}`
    super(`Command failed: ${command}\n${detail ?? reason}`)
    this.command = command
    this.exitCode = exitCode
  }
}

/**
 * Structured pip output that does not decode. Usually means pip is too old
 * or too new for the format this tool expects.
 */
export class OutputDecodeError extends PipReviewError {}

export class AbortedError extends PipReviewError {
  constructor() {
    super('Aborted')
  }
}
