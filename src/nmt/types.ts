import type { Hex } from 'viem'

export const NAMESPACE_SIZE = 29
export const SHA256_SIZE = 32

/** minNamespace || maxNamespace || sha256 */
export const NAMESPACED_HASH_SIZE = NAMESPACE_SIZE * 2 + SHA256_SIZE

export const LEAF_PREFIX = 0x00
export const NODE_PREFIX = 0x01

export type NmtOptions = {
  namespaceSize: number
  // Drop the max (parity) namespace from a node's range when it only appears on the right
  ignoreMaxNamespace: boolean
}

export const DEFAULT_NMT_OPTIONS: NmtOptions = {
  namespaceSize: NAMESPACE_SIZE,
  ignoreMaxNamespace: true,
}

/** A digest together with the exact bytes that were hashed to produce it. */
export type PreimageRecord = {
  digest: Hex
  preimage: Uint8Array
}

/** Result of one hashing step: the namespaced hash and what it should record. */
export type HashStep = {
  hash: Uint8Array
  record: PreimageRecord
}

export type OnHash = (digest: Hex, preimage: Uint8Array) => void

export type PreimageLookup = (digest: Hex) => Promise<Uint8Array | null>

export type Share = Uint8Array | null | undefined
