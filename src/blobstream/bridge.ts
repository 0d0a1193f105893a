import { bytesToHex, createPublicClient, type Address, type Transport } from 'viem'
import { logger } from '../shared/logger.js'
import { TransportError } from '../shared/errors.js'
import type { AttestationBridge, BinaryMerkleProof, DataRootTuple } from '../celestia-da/types.js'
import { blobstreamAbi } from './abi.js'

export type BlobstreamBridgeConfig = {
  address: Address
  // http(ethRpcUrl) in production
  transport: Transport
}

const describe = (error: unknown): string => (error instanceof Error ? error.message : String(error))

/**
 * Read-only view of a Blobstream contract on the settlement chain.
 */
export const createBlobstreamBridge = (config: BlobstreamBridgeConfig): AttestationBridge => {
  const client = createPublicClient({ transport: config.transport })

  const currentNonce = async (signal?: AbortSignal): Promise<bigint> => {
    signal?.throwIfAborted()
    try {
      return await client.readContract({
        address: config.address,
        abi: blobstreamAbi,
        functionName: 'state_eventNonce',
      })
    } catch (error) {
      throw new TransportError(`state_eventNonce failed: ${describe(error)}`, 'state_eventNonce', { cause: error })
    }
  }

  const verifyAttestation = async (
    nonce: bigint,
    tuple: DataRootTuple,
    proof: BinaryMerkleProof,
    signal?: AbortSignal,
  ): Promise<boolean> => {
    signal?.throwIfAborted()
    logger.debug(`[Blobstream] verifyAttestation nonce=${nonce} height=${tuple.height} key=${proof.key}/${proof.numLeaves}`)
    try {
      return await client.readContract({
        address: config.address,
        abi: blobstreamAbi,
        functionName: 'verifyAttestation',
        args: [
          nonce,
          { height: tuple.height, dataRoot: bytesToHex(tuple.dataRoot) },
          { sideNodes: proof.sideNodes.map((node) => bytesToHex(node)), key: proof.key, numLeaves: proof.numLeaves },
        ],
      })
    } catch (error) {
      throw new TransportError(`verifyAttestation failed: ${describe(error)}`, 'verifyAttestation', { cause: error })
    }
  }

  return { currentNonce, verifyAttestation }
}
