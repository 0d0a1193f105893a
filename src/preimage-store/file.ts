import type { PreimageStore } from './types.js'
import type { LocalFileStorage } from '../celestia-stub/local-file-storage.js'
import { NotFoundError } from '../shared/errors.js'

/** Keeps preimages as one file per digest in a {@link LocalFileStorage} directory. */
export const createFilePreimageStore = (storage: LocalFileStorage): PreimageStore => ({
  record: (digest, preimage) => storage.putKeyValue(digest, preimage),
  recordAll: async (records) => {
    for (const { digest, preimage } of records) {
      await storage.putKeyValue(digest, preimage)
    }
  },
  lookup: async (digest) => {
    const result = await storage.getByHash(digest)
    if (result.ok) return result.value
    if (result.error instanceof NotFoundError) return null
    throw result.error
  },
})
