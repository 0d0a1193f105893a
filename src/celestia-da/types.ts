import type { BlobPointer } from '../wire-codec/types.js'
import type { ConfirmationPoller } from '../confirmation-poller/types.js'
import type { OnHash } from '../nmt/types.js'

// ============================================================================
// Collaborators (implemented in celestia-rpc/ and blobstream/)
// ============================================================================

export type SubmittedBlob = {
  height: bigint
  commitment: Uint8Array
}

export type BlobSubmitter = {
  submit: (namespace: Uint8Array, data: Uint8Array, signal?: AbortSignal) => Promise<SubmittedBlob>
}

export type BlobGetter = {
  getBlob: (height: bigint, namespace: Uint8Array, commitment: Uint8Array, signal?: AbortSignal) => Promise<Uint8Array>
}

/** NMT range proof for the shares of one blob within one row. */
export type NmtRangeProof = {
  start: number
  end: number
  nodes: Uint8Array[]
  leafHash: Uint8Array | null
  isMaxNamespaceIgnored: boolean
}

export type ProofFetcher = {
  getInclusionProof: (height: bigint, namespace: Uint8Array, commitment: Uint8Array, signal?: AbortSignal) => Promise<NmtRangeProof[]>
  checkIncluded: (
    height: bigint,
    namespace: Uint8Array,
    proof: NmtRangeProof[],
    commitment: Uint8Array,
    signal?: AbortSignal,
  ) => Promise<boolean>
}

export type ExtendedHeader = {
  height: bigint
  dataRoot: Uint8Array
  rowRoots: Uint8Array[]
  columnRoots: Uint8Array[]
}

export type HeaderReader = {
  getHeaderByHeight: (height: bigint, signal?: AbortSignal) => Promise<ExtendedHeader>
  getLocalHead: (signal?: AbortSignal) => Promise<bigint>
}

export type ExtendedDataSquare = {
  width: number
  row: (index: number) => Uint8Array[]
}

export type SquareReader = {
  getExtendedDataSquare: (header: ExtendedHeader, signal?: AbortSignal) => Promise<ExtendedDataSquare>
}

export type DataRootInclusionProof = {
  index: bigint
  total: bigint
  aunts: Uint8Array[]
}

export type InclusionProofFetcher = {
  getDataRootInclusionProof: (
    height: bigint,
    beginBlock: bigint,
    endBlock: bigint,
    signal?: AbortSignal,
  ) => Promise<DataRootInclusionProof>
}

export type DataRootTuple = {
  height: bigint
  dataRoot: Uint8Array
}

export type BinaryMerkleProof = {
  sideNodes: Uint8Array[]
  key: bigint
  numLeaves: bigint
}

export type AttestationBridge = {
  currentNonce: (signal?: AbortSignal) => Promise<bigint>
  verifyAttestation: (nonce: bigint, tuple: DataRootTuple, proof: BinaryMerkleProof, signal?: AbortSignal) => Promise<boolean>
}

// ============================================================================
// Exposed contracts
// ============================================================================

/** The covering rows of the extended data square for one blob. */
export type SquareData = {
  rowRoots: Uint8Array[]
  columnRoots: Uint8Array[]
  rows: Uint8Array[][]
  // Width of the extended data square
  squareSize: number
  startRow: number
  endRow: number
}

export type ReadResult = {
  data: Uint8Array
  squareData: SquareData
}

export type CallOptions = {
  signal?: AbortSignal
}

export type ReadOptions = CallOptions & {
  // When set, the covering rows are re-hashed, checked against the row roots and their preimages recorded
  onHash?: OnHash
}

export type VerifyOptions = CallOptions & {
  // Attestation nonce covering [beginBlock, endBlock); the pointer's own nonce when absent
  tupleRootNonce?: bigint
}

export type DataAvailabilityWriter = {
  store: (message: Uint8Array, options?: CallOptions) => Promise<BlobPointer>
  serialize: (pointer: BlobPointer) => Uint8Array
  waitForHeight: (height: bigint, options?: CallOptions) => Promise<bigint>
  waitForRelay: (nonce: bigint, options?: CallOptions) => Promise<bigint>
  verify: (pointer: BlobPointer, beginBlock: bigint, endBlock: bigint, options?: VerifyOptions) => Promise<boolean>
}

export type DataAvailabilityReader = {
  read: (pointer: BlobPointer, options?: ReadOptions) => Promise<ReadResult>
}

export type CelestiaDADependencies = {
  namespace: Uint8Array
  blobs: BlobSubmitter & BlobGetter
  proofs: ProofFetcher
  headers: HeaderReader
  squares: SquareReader
  inclusionProofs: InclusionProofFetcher
  bridge: AttestationBridge
  poller: ConfirmationPoller
}
