export * from './asker'
export * from './prompt'
export * from './renderer'
