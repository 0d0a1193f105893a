import type { DataRootInclusionProof, InclusionProofFetcher } from '../celestia-da/types.js'
import type { JsonRpcClient } from './types.js'
import { dataRootInclusionProofSchema } from './schemas.js'

/**
 * Celestia consensus node (Tendermint RPC) adapter. Only the data root
 * inclusion proof against a Blobstream data commitment is needed.
 */
export const createTendermintClient = (rpc: JsonRpcClient): InclusionProofFetcher => ({
  getDataRootInclusionProof: async (
    height: bigint,
    beginBlock: bigint,
    endBlock: bigint,
    signal?: AbortSignal,
  ): Promise<DataRootInclusionProof> =>
    rpc.call(
      'data_root_inclusion_proof',
      { height: height.toString(), start: beginBlock.toString(), end: endBlock.toString() },
      dataRootInclusionProofSchema,
      signal,
    ),
})
