import type { Hex } from 'viem'
import type { PreimageRecord } from '../nmt/types.js'

/**
 * Backing store for the digest to preimage relation the NMT engine produces.
 * Implementations must tolerate concurrent callers; entries are never removed.
 */
export type PreimageStore = {
  record: (digest: Hex, preimage: Uint8Array) => Promise<void>
  recordAll: (entries: PreimageRecord[]) => Promise<void>
  lookup: (digest: Hex) => Promise<Uint8Array | null>
}
