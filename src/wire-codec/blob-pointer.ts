import { bytesToHex } from 'viem'
import { FormatError } from '../shared/errors.js'
import {
  type BlobPointer,
  BLOB_POINTER_SCHEMA_VERSION,
  EXTENDED_HEADER_SIZE,
  FIXED_SECTION_SIZE,
  HASH_SIZE,
} from './types.js'

const MAX_U64 = (1n << 64n) - 1n

const assertU64 = (name: string, value: bigint) => {
  if (value < 0n || value > MAX_U64) {
    throw new FormatError(`${name} ${value} does not fit in an unsigned 64-bit integer`)
  }
}

const assertHash = (name: string, value: Uint8Array) => {
  if (value.length !== HASH_SIZE) {
    throw new FormatError(`${name} must be ${HASH_SIZE} bytes, got ${value.length}`)
  }
}

const hasExtendedSection = (pointer: BlobPointer): boolean =>
  pointer.start !== 0n ||
  pointer.sharesLength !== 0n ||
  pointer.key !== 0n ||
  pointer.numLeaves !== 0n ||
  pointer.tupleRootNonce !== 0n ||
  pointer.sideNodes.length > 0

export const validateBlobPointer = (pointer: BlobPointer): void => {
  assertU64('blockHeight', pointer.blockHeight)
  assertU64('start', pointer.start)
  assertU64('sharesLength', pointer.sharesLength)
  assertU64('key', pointer.key)
  assertU64('numLeaves', pointer.numLeaves)
  assertU64('tupleRootNonce', pointer.tupleRootNonce)
  assertHash('txCommitment', pointer.txCommitment)
  assertHash('dataRoot', pointer.dataRoot)
  pointer.sideNodes.forEach((node, i) => assertHash(`sideNodes[${i}]`, node))
  if (pointer.numLeaves > 0n && pointer.key >= pointer.numLeaves) {
    throw new FormatError(`proof key ${pointer.key} must be below numLeaves ${pointer.numLeaves}`)
  }
}

/**
 * Encodes a pointer using schema version 1:
 *
 *   version(1) | blockHeight(8) | txCommitment(32) | dataRoot(32)
 *   [ start(8) | sharesLength(8) | key(8) | numLeaves(8) | tupleRootNonce(8)
 *     | sideNodeCount(8) | sideNodes(32 * count) ]
 *
 * Integers are little-endian. The bracketed section is written unless every
 * field in it is zero and there are no side nodes.
 */
export const encodeBlobPointer = (pointer: BlobPointer): Uint8Array => {
  validateBlobPointer(pointer)

  const extended = hasExtendedSection(pointer)
  const size = FIXED_SECTION_SIZE +
    (extended ? EXTENDED_HEADER_SIZE + pointer.sideNodes.length * HASH_SIZE : 0)
  const buf = Buffer.alloc(size)

  let offset = buf.writeUInt8(BLOB_POINTER_SCHEMA_VERSION, 0)
  offset = buf.writeBigUInt64LE(pointer.blockHeight, offset)
  buf.set(pointer.txCommitment, offset)
  offset += HASH_SIZE
  buf.set(pointer.dataRoot, offset)
  offset += HASH_SIZE

  if (extended) {
    offset = buf.writeBigUInt64LE(pointer.start, offset)
    offset = buf.writeBigUInt64LE(pointer.sharesLength, offset)
    offset = buf.writeBigUInt64LE(pointer.key, offset)
    offset = buf.writeBigUInt64LE(pointer.numLeaves, offset)
    offset = buf.writeBigUInt64LE(pointer.tupleRootNonce, offset)
    offset = buf.writeBigUInt64LE(BigInt(pointer.sideNodes.length), offset)
    for (const node of pointer.sideNodes) {
      buf.set(node, offset)
      offset += HASH_SIZE
    }
  }

  return new Uint8Array(buf)
}

// Copies out of the source so later mutation of either side cannot leak through.
const copyBytes = (buf: Buffer, start: number, end: number): Uint8Array =>
  new Uint8Array(buf.subarray(start, end))

export const decodeBlobPointer = (data: Uint8Array): BlobPointer => {
  if (data.length < FIXED_SECTION_SIZE) {
    throw new FormatError(`blob pointer needs at least ${FIXED_SECTION_SIZE} bytes, got ${data.length}`)
  }
  const buf = Buffer.from(data.buffer, data.byteOffset, data.byteLength)

  const version = buf.readUInt8(0)
  if (version !== BLOB_POINTER_SCHEMA_VERSION) {
    throw new FormatError(`unsupported blob pointer schema version ${version}`)
  }

  const pointer: BlobPointer = {
    blockHeight: buf.readBigUInt64LE(1),
    txCommitment: copyBytes(buf, 9, 9 + HASH_SIZE),
    dataRoot: copyBytes(buf, 9 + HASH_SIZE, FIXED_SECTION_SIZE),
    start: 0n,
    sharesLength: 0n,
    key: 0n,
    numLeaves: 0n,
    tupleRootNonce: 0n,
    sideNodes: [],
  }

  if (buf.length === FIXED_SECTION_SIZE) {
    return pointer
  }

  if (buf.length < FIXED_SECTION_SIZE + EXTENDED_HEADER_SIZE) {
    throw new FormatError(
      `truncated blob pointer proof section: need ${EXTENDED_HEADER_SIZE} bytes, got ${buf.length - FIXED_SECTION_SIZE}`,
    )
  }

  let offset = FIXED_SECTION_SIZE
  const readU64 = (): bigint => {
    const value = buf.readBigUInt64LE(offset)
    offset += 8
    return value
  }

  pointer.start = readU64()
  pointer.sharesLength = readU64()
  pointer.key = readU64()
  pointer.numLeaves = readU64()
  pointer.tupleRootNonce = readU64()
  const sideNodeCount = readU64()

  const remaining = BigInt(buf.length - offset)
  const declared = sideNodeCount * BigInt(HASH_SIZE)
  if (declared > remaining) {
    throw new FormatError(`side node section declares ${declared} bytes but only ${remaining} remain`)
  }
  if (declared < remaining) {
    throw new FormatError(`${remaining - declared} unexpected trailing bytes after side nodes`)
  }

  for (let i = 0n; i < sideNodeCount; i++) {
    pointer.sideNodes.push(copyBytes(buf, offset, offset + HASH_SIZE))
    offset += HASH_SIZE
  }

  if (pointer.numLeaves > 0n && pointer.key >= pointer.numLeaves) {
    throw new FormatError(`proof key ${pointer.key} must be below numLeaves ${pointer.numLeaves}`)
  }

  return pointer
}

/** Short, log-friendly description of a pointer. */
export const describeBlobPointer = (pointer: BlobPointer): string =>
  `height=${pointer.blockHeight} commitment=${bytesToHex(pointer.txCommitment)} shares=${pointer.start}+${pointer.sharesLength}`
