import { z } from 'zod'
import { bytesToHex } from 'viem'
import { logger } from '../shared/logger.js'
import { FormatError, TransportError } from '../shared/errors.js'
import type {
  BlobGetter,
  BlobSubmitter,
  ExtendedDataSquare,
  ExtendedHeader,
  HeaderReader,
  NmtRangeProof,
  ProofFetcher,
  SquareReader,
  SubmittedBlob,
} from '../celestia-da/types.js'
import type { CelestiaNodeClientConfig, JsonRpcClient } from './types.js'
import {
  blobSchema,
  extendedDataSquareSchema,
  extendedHeaderSchema,
  nmtRangeProofSchema,
  uint64,
} from './schemas.js'

export type CelestiaNodeClient = BlobSubmitter & BlobGetter & ProofFetcher & HeaderReader & SquareReader

const SHARE_VERSION_ZERO = 0

const toBase64 = (bytes: Uint8Array): string => Buffer.from(bytes).toString('base64')

const sameBytes = (a: Uint8Array, b: Uint8Array): boolean =>
  a.length === b.length && a.every((byte, i) => byte === b[i])

const encodeRangeProof = (proof: NmtRangeProof) => ({
  start: proof.start,
  end: proof.end,
  nodes: proof.nodes.map(toBase64),
  leaf_hash: proof.leafHash ? toBase64(proof.leafHash) : null,
  is_max_namespace_ignored: proof.isMaxNamespaceIgnored,
})

/**
 * Celestia light/bridge node adapter speaking the node's JSON-RPC API
 * (blob, header and share modules). Byte fields travel as base64.
 */
export const createCelestiaNodeClient = (
  rpc: JsonRpcClient,
  config: CelestiaNodeClientConfig = {},
): CelestiaNodeClient => {
  const submitOptions =
    config.gasPrice !== undefined ? { gas_price: config.gasPrice, is_gas_price_set: true } : {}

  const getAll = async (height: bigint, namespace: Uint8Array, signal?: AbortSignal) => {
    const blobs = await rpc.call(
      'blob.GetAll',
      [height.toString(), [toBase64(namespace)]],
      z.array(blobSchema).nullable(),
      signal,
    )
    return blobs ?? []
  }

  const submit = async (namespace: Uint8Array, data: Uint8Array, signal?: AbortSignal): Promise<SubmittedBlob> => {
    const blob = { namespace: toBase64(namespace), data: toBase64(data), share_version: SHARE_VERSION_ZERO }
    const height = await rpc.call('blob.Submit', [[blob], submitOptions], uint64, signal)
    if (height === 0n) {
      return { height, commitment: new Uint8Array() }
    }

    // The node computes the share commitment; read it back from the block
    const included = await getAll(height, namespace, signal)
    const match = included.find((candidate) => sameBytes(candidate.data, data))
    if (!match) {
      throw new TransportError(`blob submitted at height ${height} is missing from blob.GetAll`, 'blob.GetAll')
    }
    logger.debug(`[CelestiaNode] Blob included at height ${height} with commitment ${bytesToHex(match.commitment)}`)
    return { height, commitment: match.commitment }
  }

  const getBlob = async (
    height: bigint,
    namespace: Uint8Array,
    commitment: Uint8Array,
    signal?: AbortSignal,
  ): Promise<Uint8Array> => {
    const blob = await rpc.call(
      'blob.Get',
      [height.toString(), toBase64(namespace), toBase64(commitment)],
      blobSchema,
      signal,
    )
    return blob.data
  }

  const getInclusionProof = async (
    height: bigint,
    namespace: Uint8Array,
    commitment: Uint8Array,
    signal?: AbortSignal,
  ): Promise<NmtRangeProof[]> =>
    rpc.call(
      'blob.GetProof',
      [height.toString(), toBase64(namespace), toBase64(commitment)],
      z.array(nmtRangeProofSchema),
      signal,
    )

  const checkIncluded = async (
    height: bigint,
    namespace: Uint8Array,
    proof: NmtRangeProof[],
    commitment: Uint8Array,
    signal?: AbortSignal,
  ): Promise<boolean> =>
    rpc.call(
      'blob.Included',
      [height.toString(), toBase64(namespace), proof.map(encodeRangeProof), toBase64(commitment)],
      z.boolean(),
      signal,
    )

  const getHeaderByHeight = async (height: bigint, signal?: AbortSignal): Promise<ExtendedHeader> =>
    rpc.call('header.GetByHeight', [height.toString()], extendedHeaderSchema, signal)

  const getLocalHead = async (signal?: AbortSignal): Promise<bigint> => {
    const head = await rpc.call('header.LocalHead', [], extendedHeaderSchema, signal)
    return head.height
  }

  const getExtendedDataSquare = async (header: ExtendedHeader, signal?: AbortSignal): Promise<ExtendedDataSquare> => {
    // share.GetEDS takes the full header object, so re-read it verbatim
    const rawHeader = await rpc.call('header.GetByHeight', [header.height.toString()], z.unknown(), signal)
    const { data_square: shares } = await rpc.call('share.GetEDS', [rawHeader], extendedDataSquareSchema, signal)

    const width = Math.round(Math.sqrt(shares.length))
    if (width * width !== shares.length || width % 2 !== 0) {
      throw new FormatError(`extended data square at height ${header.height} has ${shares.length} shares`)
    }

    return {
      width,
      row: (index: number) => {
        if (!Number.isInteger(index) || index < 0 || index >= width) {
          throw new FormatError(`row ${index} is outside a square of width ${width}`)
        }
        return shares.slice(index * width, (index + 1) * width)
      },
    }
  }

  return {
    submit,
    getBlob,
    getInclusionProof,
    checkIncluded,
    getHeaderByHeight,
    getLocalHead,
    getExtendedDataSquare,
  }
}
