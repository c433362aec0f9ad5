#!/usr/bin/env node

import chalk from 'chalk'
import { createProgram, readReviewOptions } from './cli-options'
import { exitWith } from './core/exit'
import { PipReview } from './index'
import { hasActiveChild } from './utils'

const program = createProgram()

program.action(async () => {
  const review = new PipReview(readReviewOptions(program))
  exitWith(await review.run())
})

// Handle uncaught errors gracefully
process.on('uncaughtException', (error) => {
  console.error(chalk.red('Uncaught Exception:'), error.message)
  process.exit(1)
})

process.on('unhandledRejection', (reason) => {
  console.error(chalk.red('Unhandled Rejection:'), reason)
  process.exit(1)
})

// Ctrl+C at a prompt. While pip runs, the runner turns it into an abort once pip exits.
process.on('SIGINT', () => {
  if (!hasActiveChild()) {
    exitWith({ status: 'aborted' })
  }
})

process.on('SIGTERM', () => exitWith({ status: 'aborted' }))

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`Error: ${error}`))
  process.exit(1)
})
