import type { DatabaseConnection } from './types.js'
import { logger } from '../shared/logger.js'

type Migration = {
  version: number
  name: string
  up: (db: DatabaseConnection) => Promise<void>
}

const migrations: Migration[] = [
  {
    version: 1,
    name: 'nmt_preimages',
    up: async (db) => {
      await db.query(`
        CREATE TABLE IF NOT EXISTS nmt_preimages (
          digest TEXT PRIMARY KEY,
          preimage BLOB NOT NULL,
          recorded_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
        )
      `)
    }
  },
  {
    version: 2,
    name: 'blob_pointers',
    up: async (db) => {
      await db.query(`
        CREATE TABLE IF NOT EXISTS blob_pointers (
          tx_commitment TEXT PRIMARY KEY,
          block_height BIGINT NOT NULL,
          data_root TEXT NOT NULL,
          encoded BLOB NOT NULL,
          verified BOOLEAN,
          stored_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
          verified_at TIMESTAMP
        )
      `)

      await db.query(`
        CREATE INDEX idx_blob_pointers_height ON blob_pointers(block_height)
      `)
    }
  }
]

export const runMigrations = async (db: DatabaseConnection): Promise<void> => {
  await db.query(`
    CREATE TABLE IF NOT EXISTS migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    )
  `)

  const result = await db.query<{ version: number }>('SELECT version FROM migrations')
  const appliedVersions = new Set(result.rows.map(r => r.version))

  for (const migration of migrations) {
    if (!appliedVersions.has(migration.version)) {
      logger.info(`[DB] Applying migration ${migration.version}: ${migration.name}`)

      await db.transaction(async (tx) => {
        await migration.up(tx)
        await tx.query(
          'INSERT INTO migrations (version, name) VALUES (?, ?)',
          [migration.version, migration.name]
        )
      })

      logger.info(`[DB] Migration ${migration.version} applied successfully`)
    }
  }
}
