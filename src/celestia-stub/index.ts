export * from './types.js'
export * from './local-file-storage.js'
export * from './stub.js'
