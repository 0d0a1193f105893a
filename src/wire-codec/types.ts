/**
 * Reference to a blob posted to Celestia, plus the Blobstream proof that its
 * block's data root was attested on the settlement chain.
 *
 * `store` fills the height, share range, commitment and data root. `verify`
 * fills `key`, `numLeaves`, `sideNodes` and `tupleRootNonce` in place.
 */
export type BlobPointer = {
  blockHeight: bigint
  start: bigint
  sharesLength: bigint
  txCommitment: Uint8Array
  dataRoot: Uint8Array
  key: bigint
  numLeaves: bigint
  sideNodes: Uint8Array[]
  tupleRootNonce: bigint
}

export const BLOB_POINTER_SCHEMA_VERSION = 1

export const HASH_SIZE = 32
const U64_SIZE = 8

// version(1) + height(8) + commitment(32) + data root(32)
export const FIXED_SECTION_SIZE = 1 + U64_SIZE + HASH_SIZE * 2

// start, sharesLength, key, numLeaves, tupleRootNonce, side node count
export const EXTENDED_HEADER_SIZE = U64_SIZE * 6

/** Tag byte prefixed to a serialized Celestia blob pointer. */
export const BLOB_POINTER_HEADER_FLAG = 0x0c

/** Tag byte prefixed to a serialized stub storage key. */
export const STUB_HEADER_FLAG = 0x02
