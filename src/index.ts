export * from './wire-codec/index.js'
export * from './nmt/index.js'
export * from './confirmation-poller/index.js'
export * from './celestia-da/index.js'
export * from './celestia-rpc/index.js'
export * from './blobstream/index.js'
export * from './celestia-stub/index.js'
export * from './preimage-store/index.js'
export * from './shared/errors.js'
export { createCelestiaDAApp } from './app.js'
export type { CelestiaDAApp } from './app.js'
export { loadConfig } from './shared/config.js'
export type { Config } from './shared/config.js'
