import { spawn } from 'child_process'
import { AbortedError, CommandFailedError } from '../errors'

/**
 * Runs external commands one at a time. The process-backed implementation is
 * used by the CLI; tests substitute their own.
 */
export interface CommandRunner {
  /** Run a command and resolve with its stdout. Rejects if it does not exit with 0. */
  capture(file: string, args: string[]): Promise<string>
  /** Run a command with inherited stdio and resolve with its exit code. */
  call(file: string, args: string[]): Promise<number>
}

interface ChildResult {
  code: number | null
  signal: NodeJS.Signals | null
  stdout: string
  interrupted: boolean // SIGINT reached this process while the child ran
}

let activeChildren = 0

/**
 * True while a child is running. Its SIGINT is then turned into an
 * AbortedError once the child has exited.
 */
export function hasActiveChild(): boolean {
  return activeChildren > 0
}

export function formatCommand(file: string, args: string[]): string {
  return [file, ...args].join(' ')
}

function spawnAsync(
  file: string,
  args: string[],
  captureOutput: boolean,
  cwd?: string
): Promise<ChildResult> {
  return new Promise((resolve, reject) => {
    let stdout = ''
    let interrupted = false
    let finished = false
    const onInterrupt = () => {
      interrupted = true
    }
    // A failed spawn can emit both 'error' and 'close'
    const finish = (): boolean => {
      if (finished) {
        return false
      }
      finished = true
      activeChildren--
      process.off('SIGINT', onInterrupt)
      return true
    }

    activeChildren++
    process.on('SIGINT', onInterrupt)

    const child = spawn(file, args, {
      stdio: ['inherit', captureOutput ? 'pipe' : 'inherit', 'inherit'],
      cwd,
    })

    if (child.stdout) {
      child.stdout.setEncoding('utf-8')
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk
      })
    }

    child.on('error', (error) => {
      if (finish()) {
        reject(new CommandFailedError(formatCommand(file, args), null, error.message))
      }
    })

    child.on('close', (code, signal) => {
      if (finish()) {
        resolve({ code, signal, stdout, interrupted })
      }
    })
  })
}

function checkInterrupted(result: ChildResult): void {
  // pip catches Ctrl+C itself and exits with status 1, so the signal is
  // only seen by this process
  if (result.interrupted || result.signal === 'SIGINT') {
    throw new AbortedError()
  }
}

/**
 * Execute a command and capture stdout
 */
export async function executeCommand(file: string, args: string[], cwd?: string): Promise<string> {
  const result = await spawnAsync(file, args, true, cwd)
  checkInterrupted(result)

  if (result.code !== 0) {
    const detail = result.signal ? `terminated by ${result.signal}` : undefined
    throw new CommandFailedError(formatCommand(file, args), result.code, detail)
  }
  return result.stdout
}

/**
 * Execute a command, letting it write to the terminal
 */
export async function callCommand(file: string, args: string[], cwd?: string): Promise<number> {
  const result = await spawnAsync(file, args, false, cwd)
  checkInterrupted(result)
  return result.code ?? 1
}

export function createProcessRunner(cwd?: string): CommandRunner {
  return {
    capture: (file, args) => executeCommand(file, args, cwd),
    call: (file, args) => callCommand(file, args, cwd),
  }
}
