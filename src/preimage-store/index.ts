export * from './types.js'
export * from './collect.js'
export * from './memory.js'
export * from './sqlite.js'
export * from './redis.js'
export * from './file.js'
