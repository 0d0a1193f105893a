import { parseAbi } from 'viem'

export const blobstreamAbi = parseAbi([
  'struct DataRootTuple { uint256 height; bytes32 dataRoot; }',
  'struct BinaryMerkleProof { bytes32[] sideNodes; uint256 key; uint256 numLeaves; }',
  'function state_eventNonce() view returns (uint256)',
  'function verifyAttestation(uint256 _tupleRootNonce, DataRootTuple _tuple, BinaryMerkleProof _proof) view returns (bool)',
])
