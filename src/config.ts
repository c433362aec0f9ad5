import { PYTHON_ENV_VAR } from './constants'
import { PipCommand } from './types'

export function resolvePythonExecutable(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): string {
  const configured = env[PYTHON_ENV_VAR]?.trim()
  if (configured) {
    return configured
  }
  return platform === 'win32' ? 'python' : 'python3'
}

/**
 * pip is run as a module of the interpreter so that the packages inspected
 * and upgraded are the ones that interpreter sees
 */
export function getPipCommand(python: string = resolvePythonExecutable()): PipCommand {
  return { file: python, args: ['-m', 'pip'] }
}
