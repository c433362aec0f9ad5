export interface PackageRecord {
  readonly name: string // As reported by pip, passed verbatim to the installer
  readonly currentVersion: string
  readonly latestVersion: string
}

export type OutputFormat = 'structured' | 'legacy'

export type Decision = 'y' | 'n' | 'a' | 'q'

export interface AskerState {
  readonly cachedDecision: Decision | null // Set once by 'a' or 'q'
  readonly lastDecision: Decision | null // Shown as the prompt default
}

export interface PipCommand {
  file: string
  args: string[] // Arguments placed before the pip subcommand, e.g. ['-m', 'pip']
}

export interface InstallOutcome {
  packages: string[]
  exitCode: number
}

export interface UpgradeOptions {
  continueOnFail?: boolean
  freeze?: boolean
}

export interface PipReviewOptions {
  cwd?: string
  verbose?: boolean
  raw?: boolean
  interactive?: boolean
  auto?: boolean
  continueOnFail?: boolean
  freezeOutdatedPackages?: boolean
  whitelist?: string
  blacklist?: string
  forwarded?: string[] // Tokens the CLI did not recognise, before classification
}

export type RunResult =
  | { status: 'success' }
  | { status: 'aborted' }
  | { status: 'fatal'; message: string }
