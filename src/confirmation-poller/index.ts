export * from './types.js'
export * from './poller.js'
