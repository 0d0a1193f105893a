import type { Hex } from 'viem'
import type { PreimageStore } from './types.js'

/** The slice of an ioredis client this store needs. */
export type RedisPreimageClient = {
  getBuffer: (key: string) => Promise<Buffer | null>
  set: (key: string, value: Buffer) => Promise<unknown>
}

export type RedisPreimageStoreConfig = {
  keyPrefix: string
}

const defaultRedisConfig: RedisPreimageStoreConfig = {
  keyPrefix: 'nmt:preimage:',
}

export const createRedisPreimageStore = (
  redis: RedisPreimageClient,
  config: Partial<RedisPreimageStoreConfig> = {}
): PreimageStore => {
  const keyPrefix = config.keyPrefix ?? defaultRedisConfig.keyPrefix
  const keyFor = (digest: Hex) => `${keyPrefix}${digest.toLowerCase()}`

  const record = async (digest: Hex, preimage: Uint8Array): Promise<void> => {
    await redis.set(keyFor(digest), Buffer.from(preimage))
  }

  return {
    record,
    recordAll: async (records) => {
      await Promise.all(records.map(({ digest, preimage }) => record(digest, preimage)))
    },
    lookup: async (digest) => {
      const value = await redis.getBuffer(keyFor(digest))
      return value ? new Uint8Array(value) : null
    },
  }
}
