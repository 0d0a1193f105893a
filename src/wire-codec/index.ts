export * from './types.js'
export * from './blob-pointer.js'
export * from './framing.js'
