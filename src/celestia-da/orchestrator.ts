import { bytesToHex } from 'viem'
import { logger } from '../shared/logger.js'
import { toLogMeta } from '../shared/json-utils.js'
import { FormatError, InclusionCheckError, SubmissionRejectedError } from '../shared/errors.js'
import { serializeBlobPointer } from '../wire-codec/framing.js'
import { describeBlobPointer, validateBlobPointer } from '../wire-codec/blob-pointer.js'
import { HASH_SIZE, type BlobPointer } from '../wire-codec/types.js'
import { coveringRows, recordSquarePreimages } from './square.js'
import type {
  CallOptions,
  CelestiaDADependencies,
  DataAvailabilityReader,
  DataAvailabilityWriter,
  NmtRangeProof,
  ReadOptions,
  ReadResult,
  SquareData,
  VerifyOptions,
} from './types.js'

export type CelestiaDA = DataAvailabilityWriter & DataAvailabilityReader

const shareSpan = (proof: NmtRangeProof[]): { start: bigint; sharesLength: bigint } => {
  const [first] = proof
  if (!first) {
    throw new FormatError('inclusion proof has no share ranges')
  }
  const sharesLength = proof.reduce((total, range) => {
    if (range.end < range.start) {
      throw new FormatError(`share range [${range.start}, ${range.end}) is inverted`)
    }
    return total + BigInt(range.end - range.start)
  }, 0n)
  return { start: BigInt(first.start), sharesLength }
}

/**
 * Celestia data availability for a rollup batch poster: posts batches as blobs,
 * reads them back with the rows that hold them, and checks the Blobstream
 * attestation of their block on the settlement chain.
 */
export const createCelestiaDA = (deps: CelestiaDADependencies): CelestiaDA => {
  const { namespace, blobs, proofs, headers, squares, inclusionProofs, bridge, poller } = deps

  const store = async (message: Uint8Array, options: CallOptions = {}): Promise<BlobPointer> => {
    const { signal } = options
    logger.info(`[CelestiaDA] Submitting ${message.length} byte blob`)

    const { height, commitment } = await blobs.submit(namespace, message, signal)
    if (height === 0n) {
      logger.warn('[CelestiaDA] Blob submission returned height 0')
      throw new SubmissionRejectedError(height)
    }

    try {
      const shareProof = await proofs.getInclusionProof(height, namespace, commitment, signal)
      const included = await proofs.checkIncluded(height, namespace, shareProof, commitment, signal)
      if (!included) {
        throw new InclusionCheckError(height, bytesToHex(commitment))
      }

      const header = await headers.getHeaderByHeight(height, signal)
      const { start, sharesLength } = shareSpan(shareProof)

      const pointer: BlobPointer = {
        blockHeight: height,
        start,
        sharesLength,
        txCommitment: commitment,
        dataRoot: header.dataRoot,
        key: 0n,
        numLeaves: 0n,
        sideNodes: [],
        tupleRootNonce: 0n,
      }
      validateBlobPointer(pointer)

      logger.info(`[CelestiaDA] Stored ${describeBlobPointer(pointer)}`)
      return pointer
    } catch (error) {
      logger.warn(
        `[CelestiaDA] Blob submitted at height ${height} but its pointer could not be built; inclusion unknown`,
        toLogMeta({ commitment, error: error instanceof Error ? error.message : String(error) }),
      )
      throw error
    }
  }

  const read = async (pointer: BlobPointer, options: ReadOptions = {}): Promise<ReadResult> => {
    const { signal, onHash } = options
    logger.debug(`[CelestiaDA] Reading ${describeBlobPointer(pointer)}`)

    const data = await blobs.getBlob(pointer.blockHeight, namespace, pointer.txCommitment, signal)
    const header = await headers.getHeaderByHeight(pointer.blockHeight, signal)
    const eds = await squares.getExtendedDataSquare(header, signal)

    const squareSize = eds.width
    const { startRow, endRow } = coveringRows(pointer.start, pointer.sharesLength, squareSize)

    const rows: Uint8Array[][] = []
    for (let i = startRow; i <= endRow; i++) {
      rows.push(eds.row(i))
    }

    const squareData: SquareData = {
      rowRoots: header.rowRoots,
      columnRoots: header.columnRoots,
      rows,
      squareSize,
      startRow,
      endRow,
    }

    if (onHash) {
      recordSquarePreimages(squareData, onHash)
    }

    return { data, squareData }
  }

  const verify = async (
    pointer: BlobPointer,
    beginBlock: bigint,
    endBlock: bigint,
    options: VerifyOptions = {},
  ): Promise<boolean> => {
    const { signal } = options

    const inclusionProof = await inclusionProofs.getDataRootInclusionProof(
      pointer.blockHeight,
      beginBlock,
      endBlock,
      signal,
    )
    inclusionProof.aunts.forEach((aunt, i) => {
      if (aunt.length !== HASH_SIZE) {
        throw new FormatError(`aunt ${i} is ${aunt.length} bytes, expected ${HASH_SIZE}`)
      }
    })

    const nonce = options.tupleRootNonce ?? pointer.tupleRootNonce
    await poller.waitForNonce(bridge.currentNonce, nonce, signal)

    pointer.key = inclusionProof.index
    pointer.numLeaves = inclusionProof.total
    pointer.sideNodes = [...inclusionProof.aunts]
    pointer.tupleRootNonce = nonce

    logger.info(`[CelestiaDA] Verifying attestation nonce ${nonce} for height ${pointer.blockHeight}`)
    return bridge.verifyAttestation(
      nonce,
      { height: pointer.blockHeight, dataRoot: pointer.dataRoot },
      { sideNodes: pointer.sideNodes, key: pointer.key, numLeaves: pointer.numLeaves },
      signal,
    )
  }

  const waitForHeight = async (height: bigint, options: CallOptions = {}): Promise<bigint> =>
    poller.waitForHeight(headers.getLocalHead, height, options.signal)

  const waitForRelay = async (nonce: bigint, options: CallOptions = {}): Promise<bigint> =>
    poller.waitForNonce(bridge.currentNonce, nonce, options.signal)

  return {
    store,
    serialize: serializeBlobPointer,
    read,
    verify,
    waitForHeight,
    waitForRelay,
  }
}
