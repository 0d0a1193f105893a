export * from './types.js'
export * from './namespace.js'
export * from './square.js'
export * from './orchestrator.js'
