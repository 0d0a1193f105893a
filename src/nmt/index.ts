export * from './types.js'
export * from './hasher.js'
export * from './nmt.js'
