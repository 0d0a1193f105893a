import type { Hex } from 'viem'
import type { PreimageStore } from './types.js'

export const createMemoryPreimageStore = (): PreimageStore & { size: () => number } => {
  const entries = new Map<string, Uint8Array>()

  const record = async (digest: Hex, preimage: Uint8Array): Promise<void> => {
    entries.set(digest.toLowerCase(), preimage.slice())
  }

  return {
    record,
    recordAll: async (records) => {
      for (const { digest, preimage } of records) {
        await record(digest, preimage)
      }
    },
    lookup: async (digest) => entries.get(digest.toLowerCase()) ?? null,
    size: () => entries.size,
  }
}
