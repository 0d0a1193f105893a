import { bytesToHex } from 'viem';
import { logger } from '../shared/logger.js';
import { FormatError } from '../shared/errors.js';
import { unwrap } from '../shared/result.js';
import { frameMessage, isStubHeaderByte } from '../wire-codec/framing.js';
import { STUB_HEADER_FLAG, HASH_SIZE } from '../wire-codec/types.js';
import type { LocalFileStorage } from './local-file-storage.js';
import type { DataAvailabilityStubReader, DataAvailabilityStubWriter } from './types.js';

/**
 * Local stand-in for Celestia: messages go to files keyed by their hash and the
 * batch poster gets back `0x02 || key` instead of a blob pointer.
 */
export const createCelestiaDAStub = (storage: LocalFileStorage): DataAvailabilityStubWriter & DataAvailabilityStubReader => {
  const store = async (message: Uint8Array): Promise<Uint8Array> => {
    try {
      const key = await storage.put(message);
      return frameMessage(STUB_HEADER_FLAG, Buffer.from(key.slice(2), 'hex'));
    } catch (error) {
      logger.warn('[CelestiaDAStub] Error writing message', { error });
      throw error;
    }
  };

  const read = async (serialized: Uint8Array): Promise<Uint8Array> => {
    if (serialized.length !== 1 + HASH_SIZE || !isStubHeaderByte(serialized[0])) {
      throw new FormatError(`stub message must be the stub flag followed by a ${HASH_SIZE} byte key`);
    }
    const key = bytesToHex(serialized.subarray(1));
    const result = await storage.getByHash(key);
    if (!result.ok) {
      logger.warn(`[CelestiaDAStub] Error reading message ${key}: ${result.error.message}`);
    }
    return unwrap(result);
  };

  return {
    store,
    read,
  };
};
