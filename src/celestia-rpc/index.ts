export { createJsonRpcClient } from './json-rpc.js'
export { createCelestiaNodeClient } from './node-client.js'
export type { CelestiaNodeClient } from './node-client.js'
export { createTendermintClient } from './tendermint-client.js'
export type { JsonRpcClient, JsonRpcClientConfig, JsonRpcParams, CelestiaNodeClientConfig } from './types.js'
