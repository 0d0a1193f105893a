import crypto from 'node:crypto'
import { describe, it, expect, vi } from 'vitest'
import { bytesToHex, type Hex } from 'viem'
import { computeRoot, reconstructContent } from './nmt.js'
import { hashLeaf, hashNode } from './hasher.js'
import { NAMESPACE_SIZE, type PreimageLookup } from './types.js'
import { FormatError, IncompleteInputError, MissingPreimageError } from '../shared/errors.js'

const SHARE_SIZE = 64

const encoder = new TextEncoder()
const decoder = new TextDecoder()

// Pads text with zeros to a full share, so its first byte doubles as the namespace
const paddedShare = (text: string): Uint8Array => {
  const share = new Uint8Array(SHARE_SIZE)
  share.set(encoder.encode(text))
  return share
}

const namespacedShare = (namespaceByte: number, payload: string): Uint8Array => {
  const share = new Uint8Array(SHARE_SIZE)
  share[NAMESPACE_SIZE - 1] = namespaceByte
  share.set(encoder.encode(payload), NAMESPACE_SIZE)
  return share
}

const unpad = (share: Uint8Array): string => decoder.decode(share).replace(/\0+$/, '')

const sha256 = (...parts: Uint8Array[]) => {
  const hash = crypto.createHash('sha256')
  parts.forEach((part) => hash.update(part))
  return new Uint8Array(hash.digest())
}

const recordInto = (oracle: Map<Hex, Uint8Array>) => (digest: Hex, preimage: Uint8Array) => {
  oracle.set(digest, preimage)
}

const lookupFrom = (oracle: Map<Hex, Uint8Array>): PreimageLookup => async (digest) => oracle.get(digest) ?? null

const buildOracle = (shares: Uint8Array[]) => {
  const oracle = new Map<Hex, Uint8Array>()
  const root = computeRoot(shares, recordInto(oracle))
  return { oracle, root }
}

describe('computeRoot', () => {
  it('hashes a single share as a leaf', () => {
    const share = paddedShare('a')
    const root = computeRoot([share], () => {})

    const namespace = share.subarray(0, NAMESPACE_SIZE)
    expect(root.subarray(0, NAMESPACE_SIZE)).toEqual(namespace)
    expect(root.subarray(NAMESPACE_SIZE, NAMESPACE_SIZE * 2)).toEqual(namespace)
    expect(root.subarray(NAMESPACE_SIZE * 2)).toEqual(sha256(Uint8Array.of(0x00), share))
  })

  it('hashes two leaves under a node prefixed with the namespace range', () => {
    const left = paddedShare('a')
    const right = paddedShare('b')
    const root = computeRoot([left, right], () => {})

    const leftLeaf = hashLeaf(left).hash
    const rightLeaf = hashLeaf(right).hash
    expect(root.subarray(0, NAMESPACE_SIZE)).toEqual(left.subarray(0, NAMESPACE_SIZE))
    expect(root.subarray(NAMESPACE_SIZE, NAMESPACE_SIZE * 2)).toEqual(right.subarray(0, NAMESPACE_SIZE))
    expect(root.subarray(NAMESPACE_SIZE * 2)).toEqual(sha256(Uint8Array.of(0x01), leftLeaf, rightLeaf))
  })

  it('reports every computed hash exactly once with its preimage', () => {
    const shares = ['a', 'b', 'c', 'd'].map(paddedShare)
    const onHash = vi.fn()

    computeRoot(shares, onHash)

    // 4 leaves + 3 inner nodes
    expect(onHash).toHaveBeenCalledTimes(7)
    const digests = onHash.mock.calls.map(([digest]) => digest)
    expect(new Set(digests).size).toBe(7)
    for (const [digest, preimage] of onHash.mock.calls) {
      expect(digest).toBe(bytesToHex(sha256(preimage)))
    }
    expect(onHash.mock.calls[0][1]).toEqual(new Uint8Array([0x00, ...shares[0]]))
  })

  it('is deterministic in its root and preimage set', () => {
    const shares = ['a', 'b', 'c', 'd', 'e'].map(paddedShare)
    const first = buildOracle(shares)
    const second = buildOracle(shares.map((share) => share.slice()))

    expect(second.root).toEqual(first.root)
    expect([...second.oracle.entries()]).toEqual([...first.oracle.entries()])
  })

  it('fails on an absent share before hashing anything', () => {
    const onHash = vi.fn()
    const shares = [paddedShare('a'), null, paddedShare('c')]

    expect(() => computeRoot(shares, onHash)).toThrow(IncompleteInputError)
    expect(onHash).not.toHaveBeenCalled()
  })

  it('fails on a single undefined share', () => {
    expect(() => computeRoot([undefined], () => {})).toThrow('can not compute root of incomplete row')
  })

  it('fails on an empty share list', () => {
    expect(() => computeRoot([], () => {})).toThrow(IncompleteInputError)
  })

  it('fails when shares are out of namespace order', () => {
    const shares = [paddedShare('b'), paddedShare('a')]
    expect(() => computeRoot(shares, () => {})).toThrow('share 1 is out of namespace order')
  })

  it('fails on a share shorter than the namespace', () => {
    expect(() => computeRoot([new Uint8Array(NAMESPACE_SIZE - 1)], () => {})).toThrow(FormatError)
  })

  it('leaves the max namespace out of the root range', () => {
    const data = namespacedShare(0x01, 'payload')
    const parity = new Uint8Array(SHARE_SIZE).fill(0xff)
    const root = computeRoot([data, parity], () => {})

    expect(root.subarray(NAMESPACE_SIZE, NAMESPACE_SIZE * 2)).toEqual(data.subarray(0, NAMESPACE_SIZE))
  })
})

describe('hashNode', () => {
  it('rejects children in the wrong namespace order', () => {
    const left = hashLeaf(paddedShare('b')).hash
    const right = hashLeaf(paddedShare('a')).hash
    expect(() => hashNode(left, right)).toThrow('children are not ordered by namespace')
  })
})

describe('reconstructContent', () => {
  it('recovers a b c d in their original order', async () => {
    const shares = ['a', 'b', 'c', 'd'].map(paddedShare)
    const { oracle, root } = buildOracle(shares)

    const content = await reconstructContent(lookupFrom(oracle), root)

    expect(content).toEqual(shares)
    expect(content.map(unpad)).toEqual(['a', 'b', 'c', 'd'])
  })

  it.each([1, 2, 3, 5, 7, 8, 13])('recovers a row of %i shares', async (count) => {
    const shares = Array.from({ length: count }, (_, i) => namespacedShare(i + 1, `share-${i}`))
    const { oracle, root } = buildOracle(shares)

    expect(await reconstructContent(lookupFrom(oracle), root)).toEqual(shares)
  })

  it('recovers shares that all belong to one namespace', async () => {
    const shares = ['x', 'y', 'z'].map((payload) => namespacedShare(0x07, payload))
    const { oracle, root } = buildOracle(shares)

    const content = await reconstructContent(lookupFrom(oracle), root)

    expect(content).toEqual(shares)
  })

  it('recovers a row ending in max namespace shares', async () => {
    const parity = new Uint8Array(SHARE_SIZE).fill(0xff)
    const shares = [namespacedShare(0x01, 'one'), namespacedShare(0x02, 'two'), parity, parity]
    const { oracle, root } = buildOracle(shares)

    expect(await reconstructContent(lookupFrom(oracle), root)).toEqual(shares)
  })

  it('fails with the missing digest when any single preimage is removed', async () => {
    const shares = Array.from({ length: 6 }, (_, i) => namespacedShare(i + 1, `blob-${i}`))
    const { oracle, root } = buildOracle(shares)

    for (const digest of oracle.keys()) {
      const damaged = new Map(oracle)
      damaged.delete(digest)

      await expect(reconstructContent(lookupFrom(damaged), root)).rejects.toThrow(MissingPreimageError)
      await expect(reconstructContent(lookupFrom(damaged), root)).rejects.toMatchObject({ digest })
    }
  })

  it('fails on an empty oracle with the root digest', async () => {
    const { root } = buildOracle([paddedShare('a'), paddedShare('b')])

    await expect(reconstructContent(lookupFrom(new Map()), root)).rejects.toMatchObject({
      name: 'MissingPreimageError',
      digest: bytesToHex(root.subarray(NAMESPACE_SIZE * 2)),
    })
  })

  it('fails on an inner preimage with the wrong length', async () => {
    const { oracle, root } = buildOracle([paddedShare('a'), paddedShare('b')])
    const rootDigest = bytesToHex(root.subarray(NAMESPACE_SIZE * 2))
    oracle.set(rootDigest, Uint8Array.of(0x01, 0x02))

    await expect(reconstructContent(lookupFrom(oracle), root)).rejects.toThrow(FormatError)
  })

  it('rejects a root of the wrong size', async () => {
    await expect(reconstructContent(lookupFrom(new Map()), new Uint8Array(32))).rejects.toThrow(
      'namespaced hash must be 90 bytes, got 32',
    )
  })
})
