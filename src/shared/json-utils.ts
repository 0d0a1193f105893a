import { bytesToHex } from 'viem';

/**
 * JSON.stringify replacer that turns BigInt values into decimal strings and
 * byte arrays into 0x-prefixed hex, so blob pointers can be logged or stored as JSON.
 */
export const bigIntReplacer = (_key: string, value: unknown): unknown => {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Uint8Array) {
    return bytesToHex(value);
  }
  // Buffer#toJSON runs before the replacer sees the value
  if (isSerializedBuffer(value)) {
    return bytesToHex(Uint8Array.from(value.data));
  }
  return value;
};

const isSerializedBuffer = (value: unknown): value is { type: 'Buffer'; data: number[] } =>
  typeof value === 'object' &&
  value !== null &&
  'type' in value &&
  value.type === 'Buffer' &&
  'data' in value &&
  Array.isArray(value.data);

/**
 * Produces a plain object safe to attach as winston metadata.
 */
export const toLogMeta = (value: Record<string, unknown>): Record<string, unknown> =>
  JSON.parse(JSON.stringify(value, bigIntReplacer));
