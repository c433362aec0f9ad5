export * from './types'
export * from './errors'
export * from './constants'
export * from './config'
export * from './utils'
export * from './ui'
export * from './outdated-parser'
export * from './package-detector'
export * from './interactive-ui'
export * from './upgrader'
export * from './core/review-runner'
export * from './core/exit'
