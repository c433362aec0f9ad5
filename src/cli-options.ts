import { Command } from 'commander'
import { PipReviewOptions } from './types'

const EPILOG = `
Unrecognised arguments will be forwarded to pip list --outdated and
pip install, so you can pass things such as --user, --pre and --timeout
and they will do what you expect. See pip list -h and pip install -h
for a full overview of the options.`

type CliOptions = {
  verbose?: boolean
  raw?: boolean
  interactive?: boolean
  auto?: boolean
  continueOnFail?: boolean
  freezeOutdatedPackages?: boolean
  whitelist: string
  blacklist: string
}

export function createProgram(): Command {
  return new Command()
    .name('pip-review')
    .description('Keeps your Python packages fresh')
    .version('1.0.0')
    .option('-v, --verbose', 'show more output')
    .option('-r, --raw', 'print raw lines (suitable for passing to pip install)')
    .option('-i, --interactive', 'ask interactively to install updates')
    .option('-a, --auto', 'automatically install every update found')
    .option('-C, --continue-on-fail', 'continue with other installs when one fails')
    .option(
      '--freeze-outdated-packages',
      'freeze all outdated packages to "requirements.txt" before upgrading them'
    )
    .option('--whitelist <pattern>', 'only check packages matching this name pattern', '')
    .option('--blacklist <pattern>', 'skip packages matching this name pattern', '')
    .allowUnknownOption()
    .allowExcessArguments(true)
    .addHelpText('after', EPILOG)
}

/**
 * Read options from a parsed program. Tokens commander did not recognise are
 * kept, in order, for forwarding to pip.
 */
export function readReviewOptions(program: Command): PipReviewOptions {
  const options = program.opts<CliOptions>()

  // Commander.js: boolean flags are undefined if not provided
  return {
    verbose: options.verbose === true,
    raw: options.raw === true,
    interactive: options.interactive === true,
    auto: options.auto === true,
    continueOnFail: options.continueOnFail === true,
    freezeOutdatedPackages: options.freezeOutdatedPackages === true,
    whitelist: options.whitelist,
    blacklist: options.blacklist,
    forwarded: [...program.args],
  }
}
