import sqlite3 from 'sqlite3';
import type { Database, DatabaseConfig, QueryResult, DatabaseConnection, SqlParam } from './types.js';
import { runMigrations } from './migrations.js';
import { logger } from '../shared/logger.js';
import path from 'node:path';
import fs from 'node:fs';

const IN_MEMORY = ':memory:';

// Promisify sqlite3 methods
const openDb = (dbPath: string): Promise<sqlite3.Database> => {
  return new Promise((resolve, reject) => {
    if (dbPath !== IN_MEMORY) {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }
    const db = new sqlite3.Database(dbPath, (err: Error | null) => {
      if (err) {
        logger.error(`[DB] Error opening SQLite database at ${dbPath}:`, err);
        reject(err);
      } else {
        logger.info(`[DB] SQLite database opened successfully at ${dbPath}`);
        resolve(db);
      }
    });
  });
};

// sqlite3 binds bigint and Uint8Array poorly; hand it strings and Buffers.
const toSqliteParams = (params: SqlParam[] = []): Array<string | number | boolean | null | Buffer> =>
  params.map((param) => {
    if (typeof param === 'bigint') return param.toString();
    if (param instanceof Uint8Array && !Buffer.isBuffer(param)) {
      return Buffer.from(param.buffer, param.byteOffset, param.byteLength);
    }
    return param;
  });

const dbRun = (db: sqlite3.Database, sql: string, params?: SqlParam[]): Promise<{ lastID: number; changes: number }> => {
  return new Promise((resolve, reject) => {
    db.run(sql, toSqliteParams(params), function (this: sqlite3.RunResult, err: Error | null) {
      if (err) {
        reject(err);
      } else {
        resolve({ lastID: this.lastID, changes: this.changes });
      }
    });
  });
};

const dbAll = <T>(db: sqlite3.Database, sql: string, params?: SqlParam[]): Promise<T[]> => {
  return new Promise((resolve, reject) => {
    db.all(sql, toSqliteParams(params), (err: Error | null, rows: T[]) => {
      if (err) {
        reject(err);
      } else {
        resolve(rows);
      }
    });
  });
};

const dbClose = (db: sqlite3.Database): Promise<void> => {
  return new Promise((resolve, reject) => {
    db.close((err: Error | null) => {
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
};

const createSQLiteConnection = async (dbPath: string): Promise<Database> => {
  const db = await openDb(dbPath);

  // SELECT goes through db.all, everything else (DDL, INSERT, UPDATE, DELETE) through db.run
  const query = async <T = Record<string, unknown>>(sql: string, params?: SqlParam[]): Promise<QueryResult<T>> => {
    if (sql.trim().toUpperCase().startsWith('SELECT')) {
      const rows = await dbAll<T>(db, sql, params);
      return {
        rows: rows,
        rowCount: rows.length
      };
    }
    const result = await dbRun(db, sql, params);
    return {
      rows: [],
      rowCount: result.changes
    };
  };

  const transaction = async <T>(fn: (tx: DatabaseConnection) => Promise<T>): Promise<T> => {
    await dbRun(db, 'BEGIN IMMEDIATE');
    try {
      const txConnection: DatabaseConnection = {
        query,
        transaction: () => { throw new Error('Nested transactions not supported'); },
        close: async () => { /* No-op for individual transaction object */ }
      };
      const result = await fn(txConnection);
      await dbRun(db, 'COMMIT');
      return result;
    } catch (error) {
      await dbRun(db, 'ROLLBACK');
      throw error;
    }
  };

  const close = async () => {
    await dbClose(db);
    logger.info('[DB] SQLite database connection closed.');
  };

  const migrate = async () => {
    await runMigrations({ query, transaction, close });
  };

  return { query, transaction, close, migrate };
};

export const createDatabase = async (config: DatabaseConfig): Promise<Database> => {
  if (config.type === 'sqlite') {
    if (!config.sqlitePath) {
      throw new Error('sqlitePath is required for SQLite database. Check config schema.');
    }
    return createSQLiteConnection(config.sqlitePath);
  }
  const exhaustiveCheck: never = config.type;
  throw new Error(`Unsupported database type: ${exhaustiveCheck}`);
};
