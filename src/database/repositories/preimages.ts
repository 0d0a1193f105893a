import type { Hex } from 'viem'
import type { Database } from '../types.js'

type PreimageRow = {
  digest: string
  preimage: Buffer
}

export const createPreimagesRepository = (db: Database) => {
  // Preimages are content addressed, so a repeated digest carries the same bytes
  const save = async (digest: Hex, preimage: Uint8Array): Promise<void> => {
    await db.query(
      `INSERT INTO nmt_preimages (digest, preimage) VALUES (?, ?)
       ON CONFLICT (digest) DO NOTHING`,
      [digest.toLowerCase(), preimage]
    )
  }

  const saveMany = async (entries: Array<{ digest: Hex; preimage: Uint8Array }>): Promise<void> => {
    if (entries.length === 0) return
    await db.transaction(async (tx) => {
      for (const { digest, preimage } of entries) {
        await tx.query(
          `INSERT INTO nmt_preimages (digest, preimage) VALUES (?, ?)
           ON CONFLICT (digest) DO NOTHING`,
          [digest.toLowerCase(), preimage]
        )
      }
    })
  }

  const findByDigest = async (digest: Hex): Promise<Uint8Array | null> => {
    const result = await db.query<PreimageRow>(
      'SELECT digest, preimage FROM nmt_preimages WHERE digest = ?',
      [digest.toLowerCase()]
    )
    const row = result.rows[0]
    return row ? new Uint8Array(row.preimage) : null
  }

  const count = async (): Promise<number> => {
    const result = await db.query<{ total: number }>('SELECT COUNT(*) AS total FROM nmt_preimages')
    return result.rows[0]?.total ?? 0
  }

  return {
    save,
    saveMany,
    findByDigest,
    count
  }
}

export type PreimagesRepository = ReturnType<typeof createPreimagesRepository>
