import type { PreimageStore } from './types.js'
import type { Database } from '../database/types.js'
import { createPreimagesRepository } from '../database/repositories/preimages.js'

export const createSqlitePreimageStore = (db: Database): PreimageStore => {
  const repo = createPreimagesRepository(db)
  return {
    record: repo.save,
    recordAll: repo.saveMany,
    lookup: repo.findByDigest,
  }
}
