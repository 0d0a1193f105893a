import { Redis } from 'ioredis'
import { getAddress, http } from 'viem'
import type { Config } from './shared/config.js'
import { logger } from './shared/logger.js'
import { createDatabase } from './database/create-database.js'
import type { Database } from './database/types.js'
import { createBlobPointersRepository, type BlobPointersRepository } from './database/repositories/blob-pointers.js'
import { createJsonRpcClient, createCelestiaNodeClient, createTendermintClient } from './celestia-rpc/index.js'
import { createBlobstreamBridge } from './blobstream/index.js'
import { createConfirmationPoller } from './confirmation-poller/index.js'
import { createCelestiaDA, namespaceFromHex, type CelestiaDA } from './celestia-da/index.js'
import { createCelestiaDAStub, createLocalFileStorage } from './celestia-stub/index.js'
import {
  createFilePreimageStore,
  createMemoryPreimageStore,
  createRedisPreimageStore,
  createSqlitePreimageStore,
  type PreimageStore,
} from './preimage-store/index.js'

export type CelestiaDAApp = {
  da: CelestiaDA
  stub: ReturnType<typeof createCelestiaDAStub>
  preimages: PreimageStore
  pointers: BlobPointersRepository
  close: () => Promise<void>
}

/**
 * Wires the DA client, the local stub, the preimage store selected by
 * PREIMAGE_BACKEND and the blob pointer ledger from a loaded config.
 */
export const createCelestiaDAApp = async (config: Config): Promise<CelestiaDAApp> => {
  let redisClient: Redis | null = null

  logger.info(`[App] Opening SQLite database at ${config.database.sqlitePath}`)
  const db: Database = await createDatabase({ type: 'sqlite', sqlitePath: config.database.sqlitePath })
  await db.migrate()

  try {
    const node = createCelestiaNodeClient(
      createJsonRpcClient({
        url: config.celestia.rpcUrl,
        authToken: config.celestia.authToken,
        timeoutMs: config.celestia.rpcTimeoutMs,
      }),
      { gasPrice: config.celestia.gasPrice },
    )
    const tendermint = createTendermintClient(
      createJsonRpcClient({ url: config.celestia.tendermintRpcUrl, timeoutMs: config.celestia.rpcTimeoutMs }),
    )
    const bridge = createBlobstreamBridge({
      address: getAddress(config.blobstream.address),
      transport: http(config.blobstream.ethRpcUrl),
    })
    const poller = createConfirmationPoller({
      intervalMs: config.polling.intervalMs,
      maxAttempts: config.polling.maxAttempts,
    })

    const da = createCelestiaDA({
      namespace: namespaceFromHex(config.celestia.namespaceId),
      blobs: node,
      proofs: node,
      headers: node,
      squares: node,
      inclusionProofs: tendermint,
      bridge,
      poller,
    })

    const storage = createLocalFileStorage({ dataDir: config.stub.dataDir })
    const stub = createCelestiaDAStub(storage)

    let preimages: PreimageStore
    switch (config.preimages.backend) {
      case 'memory':
        preimages = createMemoryPreimageStore()
        break
      case 'sqlite':
        preimages = createSqlitePreimageStore(db)
        break
      case 'redis': {
        const client = new Redis(config.redis.url, { maxRetriesPerRequest: 3 })
        client.on('connect', () => logger.info('[App] Connected to Redis for NMT preimages'))
        client.on('error', (err) => logger.error('[App] Redis client error:', err))
        redisClient = client
        preimages = createRedisPreimageStore(client)
        break
      }
      case 'file':
        preimages = createFilePreimageStore(storage)
        break
    }
    logger.info(`[App] NMT preimages kept in ${config.preimages.backend} store`)

    const close = async () => {
      if (redisClient) {
        await redisClient.quit()
        logger.info('[App] Redis client disconnected')
      }
      await db.close()
    }

    return { da, stub, preimages, pointers: createBlobPointersRepository(db), close }
  } catch (error) {
    await db.close()
    throw error
  }
}
