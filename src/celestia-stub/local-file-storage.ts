import fs from 'node:fs/promises';
import path from 'node:path';
import crypto from 'node:crypto';
import { keccak256, type Hex } from 'viem';
import { logger } from '../shared/logger.js';
import { NotFoundError, StorageError } from '../shared/errors.js';
import { type Result, Ok, Err } from '../shared/result.js';
import type { LocalFileStorageConfig } from './types.js';

export const encodeStorageKey = (key: Hex): string => key.slice(2).toLowerCase();

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export const createLocalFileStorage = (config: LocalFileStorageConfig) => {
  const { dataDir } = config;

  const ensureDataDir = async (): Promise<void> => {
    await fs.mkdir(dataDir, { recursive: true });
  };

  // Write to a temp file in the same directory, then rename over the final path.
  const writeAtomically = async (fileName: string, data: Uint8Array): Promise<void> => {
    await ensureDataDir();
    const finalPath = path.join(dataDir, fileName);
    const tempPath = path.join(dataDir, `${fileName}.${crypto.randomBytes(6).toString('hex')}.tmp`);

    const handle = await fs.open(tempPath, 'wx', 0o600);
    try {
      await handle.writeFile(data);
    } finally {
      await handle.close();
    }

    try {
      await fs.rename(tempPath, finalPath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  };

  const putKeyValue = async (key: Hex, value: Uint8Array): Promise<void> => {
    logger.debug(`[LocalFileStorage] put ${key} (${value.length} bytes) in ${dataDir}`);
    await writeAtomically(encodeStorageKey(key), value);
  };

  /** Stores `data` under its keccak-256 hash and returns the key. */
  const put = async (data: Uint8Array): Promise<Hex> => {
    const key = keccak256(data);
    await putKeyValue(key, data);
    return key;
  };

  const getByHash = async (key: Hex): Promise<Result<Uint8Array, NotFoundError | StorageError>> => {
    logger.debug(`[LocalFileStorage] get ${key} from ${dataDir}`);
    const pathname = path.join(dataDir, encodeStorageKey(key));
    try {
      const data = await fs.readFile(pathname);
      return Ok(new Uint8Array(data));
    } catch (error) {
      if (isMissingFile(error)) {
        return Err(new NotFoundError('stored value', key));
      }
      const reason = error instanceof Error ? error.message : String(error);
      return Err(new StorageError(`reading ${key} failed: ${reason}`, { cause: error }));
    }
  };

  return {
    put,
    putKeyValue,
    getByHash,
    toString: () => `LocalFileStorage(${dataDir})`,
  };
};

export type LocalFileStorage = ReturnType<typeof createLocalFileStorage>;
