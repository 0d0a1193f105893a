import { bytesToHex } from 'viem'
import { FormatError, IncompleteInputError, MissingPreimageError } from '../shared/errors.js'
import { digestOf, hashLeaf, hashNode, maxNamespaceOf, minNamespaceOf, namespacedHashSize } from './hasher.js'
import {
  type HashStep,
  type NmtOptions,
  type OnHash,
  type PreimageLookup,
  type Share,
  DEFAULT_NMT_OPTIONS,
  LEAF_PREFIX,
  NODE_PREFIX,
} from './types.js'

const isComplete = (shares: readonly Share[]): shares is Uint8Array[] =>
  shares.every((share) => share !== null && share !== undefined)

// Largest power of two strictly below n (RFC 6962 split point)
const splitPoint = (n: number): number => {
  let k = 1
  while (k * 2 < n) {
    k *= 2
  }
  return k
}

/**
 * Computes the namespaced Merkle root over `shares`, in order.
 *
 * Every hash computed while building the tree is reported through `onHash`
 * exactly once, with the digest and the bytes that produced it. The tree
 * itself is not kept: the root plus those records are enough for
 * {@link reconstructContent} to recover the shares.
 */
export const computeRoot = (
  shares: readonly Share[],
  onHash: OnHash,
  options: NmtOptions = DEFAULT_NMT_OPTIONS,
): Uint8Array => {
  if (shares.length === 0) {
    throw new IncompleteInputError('can not compute root of an empty row')
  }
  if (!isComplete(shares)) {
    throw new IncompleteInputError('can not compute root of incomplete row')
  }

  const emit = ({ hash, record }: HashStep): Uint8Array => {
    onHash(record.digest, record.preimage)
    return hash
  }

  // Leaves are hashed up front so namespace ordering is checked before any node is built.
  const leaves = shares.map((share) => hashLeaf(share, options))
  for (let i = 1; i < leaves.length; i++) {
    const prev = maxNamespaceOf(leaves[i - 1].hash, options)
    const next = minNamespaceOf(leaves[i].hash, options)
    if (Buffer.compare(prev, next) > 0) {
      throw new FormatError(`share ${i} is out of namespace order`)
    }
  }
  const leafHashes = leaves.map(emit)

  const build = (start: number, end: number): Uint8Array => {
    if (end - start === 1) {
      return leafHashes[start]
    }
    const k = splitPoint(end - start)
    const left = build(start, start + k)
    const right = build(start + k, end)
    return emit(hashNode(left, right, options))
  }

  return build(0, leafHashes.length)
}

/**
 * Recovers the ordered leaf payloads under `root` using only a digest to
 * preimage lookup. Leaves come back with their namespace prefix.
 */
export const reconstructContent = async (
  lookup: PreimageLookup,
  root: Uint8Array,
  options: NmtOptions = DEFAULT_NMT_OPTIONS,
): Promise<Uint8Array[]> => {
  const hashSize = namespacedHashSize(options)
  if (root.length !== hashSize) {
    throw new FormatError(`namespaced hash must be ${hashSize} bytes, got ${root.length}`)
  }

  const digest = bytesToHex(digestOf(root, options))
  const preimage = await lookup(digest)
  if (!preimage) {
    throw new MissingPreimageError(digest)
  }

  const sameNamespace = Buffer.compare(minNamespaceOf(root, options), maxNamespaceOf(root, options)) === 0
  // A node whose children share one namespace also has min == max, so the prefix decides.
  if (sameNamespace && preimage[0] === LEAF_PREFIX) {
    return [new Uint8Array(preimage.subarray(1))]
  }

  if (preimage.length !== 1 + hashSize * 2 || preimage[0] !== NODE_PREFIX) {
    throw new FormatError(`preimage of ${digest} is not an inner node`)
  }

  const left = await reconstructContent(lookup, preimage.subarray(1, 1 + hashSize), options)
  const right = await reconstructContent(lookup, preimage.subarray(1 + hashSize), options)
  return [...left, ...right]
}
