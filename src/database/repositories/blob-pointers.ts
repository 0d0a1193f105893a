import { bytesToHex } from 'viem'
import type { Database } from '../types.js'
import type { BlobPointer } from '../../wire-codec/types.js'
import { decodeBlobPointer, encodeBlobPointer } from '../../wire-codec/blob-pointer.js'

export type StoredBlobPointer = {
  pointer: BlobPointer
  verified: boolean | null
  storedAt: Date
  verifiedAt: Date | null
}

type BlobPointerRow = {
  tx_commitment: string
  block_height: string | number
  data_root: string
  encoded: Buffer
  verified: number | null
  stored_at: string
  verified_at: string | null
}

// SQLite CURRENT_TIMESTAMP is UTC without a zone marker
const parseTimestamp = (value: string): Date => new Date(`${value.replace(' ', 'T')}Z`)

const mapRow = (row: BlobPointerRow): StoredBlobPointer => ({
  pointer: decodeBlobPointer(new Uint8Array(row.encoded)),
  verified: row.verified === null ? null : row.verified === 1,
  storedAt: parseTimestamp(row.stored_at),
  verifiedAt: row.verified_at ? parseTimestamp(row.verified_at) : null,
})

export const createBlobPointersRepository = (db: Database) => {
  const save = async (pointer: BlobPointer): Promise<void> => {
    await db.query(
      `INSERT INTO blob_pointers (tx_commitment, block_height, data_root, encoded)
       VALUES (?, ?, ?, ?)
       ON CONFLICT (tx_commitment) DO UPDATE SET
         block_height = excluded.block_height,
         data_root = excluded.data_root,
         encoded = excluded.encoded`,
      [
        bytesToHex(pointer.txCommitment),
        pointer.blockHeight,
        bytesToHex(pointer.dataRoot),
        encodeBlobPointer(pointer)
      ]
    )
  }

  const recordVerification = async (pointer: BlobPointer, verified: boolean): Promise<void> => {
    await db.query(
      `UPDATE blob_pointers
       SET encoded = ?, verified = ?, verified_at = CURRENT_TIMESTAMP
       WHERE tx_commitment = ?`,
      [encodeBlobPointer(pointer), verified ? 1 : 0, bytesToHex(pointer.txCommitment)]
    )
  }

  const findByCommitment = async (txCommitment: Uint8Array): Promise<StoredBlobPointer | null> => {
    const result = await db.query<BlobPointerRow>(
      'SELECT * FROM blob_pointers WHERE tx_commitment = ?',
      [bytesToHex(txCommitment)]
    )
    const row = result.rows[0]
    return row ? mapRow(row) : null
  }

  const findByHeightRange = async (
    fromHeight: bigint,
    toHeight: bigint,
    limit = 100
  ): Promise<StoredBlobPointer[]> => {
    const result = await db.query<BlobPointerRow>(
      `SELECT * FROM blob_pointers
       WHERE block_height >= ? AND block_height <= ?
       ORDER BY block_height ASC
       LIMIT ?`,
      [fromHeight, toHeight, limit]
    )
    return result.rows.map(mapRow)
  }

  const findUnverified = async (limit = 100): Promise<StoredBlobPointer[]> => {
    const result = await db.query<BlobPointerRow>(
      `SELECT * FROM blob_pointers
       WHERE verified IS NULL
       ORDER BY block_height ASC
       LIMIT ?`,
      [limit]
    )
    return result.rows.map(mapRow)
  }

  return {
    save,
    recordVerification,
    findByCommitment,
    findByHeightRange,
    findUnverified
  }
}

export type BlobPointersRepository = ReturnType<typeof createBlobPointersRepository>
