export { createBlobstreamBridge } from './bridge.js'
export type { BlobstreamBridgeConfig } from './bridge.js'
export { blobstreamAbi } from './abi.js'
