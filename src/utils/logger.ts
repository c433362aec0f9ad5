import chalk from 'chalk'

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

export interface LoggerOptions {
  verbose?: boolean
  stdout?: (line: string) => void
  stderr?: (line: string) => void
}

/**
 * Debug and info go to stdout, warnings and errors to stderr. Info lines are
 * printed as given so that raw output stays pipeable.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const stdout = options.stdout ?? ((line: string) => console.log(line))
  const stderr = options.stderr ?? ((line: string) => console.error(line))

  return {
    debug: (message) => {
      if (options.verbose) {
        stdout(chalk.gray(message))
      }
    },
    info: (message) => stdout(message),
    warn: (message) => stderr(chalk.yellow(message)),
    error: (message) => stderr(chalk.red(message)),
  }
}
