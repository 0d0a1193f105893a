import type { Hex } from 'viem'
import type { OnHash, PreimageRecord } from '../nmt/types.js'

/**
 * Buffers the records produced by a synchronous `computeRoot` so they can be
 * written to an async {@link PreimageStore} afterwards.
 */
export const collectPreimages = (): { onHash: OnHash; entries: PreimageRecord[] } => {
  const entries: PreimageRecord[] = []
  const onHash = (digest: Hex, preimage: Uint8Array) => {
    entries.push({ digest, preimage })
  }
  return { onHash, entries }
}
