/**
 * Shared utilities
 */

export * from './exec'
export * from './filter'
export * from './forward'
export * from './logger'
export * from './version'
