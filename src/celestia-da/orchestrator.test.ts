import { describe, expect, it, vi } from 'vitest'
import { createCelestiaDA } from './orchestrator.js'
import { rowLeaves } from './square.js'
import { createBlobNamespaceV0 } from './namespace.js'
import type { AttestationBridge, CelestiaDADependencies, ExtendedHeader, NmtRangeProof } from './types.js'
import { createConfirmationPoller } from '../confirmation-poller/poller.js'
import type { PollerConfig } from '../confirmation-poller/types.js'
import { computeRoot, reconstructContent } from '../nmt/nmt.js'
import { NAMESPACE_SIZE } from '../nmt/types.js'
import { collectPreimages } from '../preimage-store/collect.js'
import { createMemoryPreimageStore } from '../preimage-store/memory.js'
import { deserializeBlobPointer } from '../wire-codec/framing.js'
import { BLOB_POINTER_HEADER_FLAG, type BlobPointer } from '../wire-codec/types.js'
import {
  FormatError,
  InclusionCheckError,
  PollCancelledError,
  PollTimeoutError,
  SubmissionRejectedError,
  TransportError,
} from '../shared/errors.js'

const HEIGHT = 42n
const SQUARE_WIDTH = 4
const SHARE_SIZE = 64

const namespace = createBlobNamespaceV0(Uint8Array.of(0x0a, 0x0b))
const message = new TextEncoder().encode('rollup batch')
const commitment = new Uint8Array(32).fill(0xc0)
const dataRoot = new Uint8Array(32).fill(0xd0)
const aunt = new Uint8Array(32).fill(0xa0)

// Original shares carry increasing namespaces row by row; the right half of each row is parity
const buildSquare = (): Uint8Array[][] =>
  Array.from({ length: SQUARE_WIDTH }, (_, row) =>
    Array.from({ length: SQUARE_WIDTH }, (_, column) => {
      const share = new Uint8Array(SHARE_SIZE).fill(row * SQUARE_WIDTH + column)
      share.fill(0, 0, NAMESPACE_SIZE)
      share[NAMESPACE_SIZE - 1] = 0x10 + row * SQUARE_WIDTH + column
      return share
    }),
  )

const square = buildSquare()
const rowRoots = square.map((row) => computeRoot(rowLeaves(row), () => undefined))

const header: ExtendedHeader = {
  height: HEIGHT,
  dataRoot,
  rowRoots,
  columnRoots: rowRoots.map((root) => root.slice()),
}

const shareProof: NmtRangeProof[] = [
  { start: 2, end: 4, nodes: [], leafHash: null, isMaxNamespaceIgnored: true },
  { start: 4, end: 5, nodes: [], leafHash: null, isMaxNamespaceIgnored: true },
]

const storedPointer = (overrides: Partial<BlobPointer> = {}): BlobPointer => ({
  blockHeight: HEIGHT,
  start: 2n,
  sharesLength: 3n,
  txCommitment: commitment,
  dataRoot,
  key: 0n,
  numLeaves: 0n,
  sideNodes: [],
  tupleRootNonce: 0n,
  ...overrides,
})

// In-process stand-in for a Celestia node, a consensus node and the Blobstream contract
const createFakeNetwork = (pollerConfig: Partial<PollerConfig> = {}) => {
  const deps = {
    namespace,
    blobs: {
      submit: vi.fn(async (_namespace: Uint8Array, _data: Uint8Array) => ({ height: HEIGHT, commitment })),
      getBlob: vi.fn(async () => message),
    },
    proofs: {
      getInclusionProof: vi.fn(async () => shareProof),
      checkIncluded: vi.fn(async () => true),
    },
    headers: {
      getHeaderByHeight: vi.fn(async () => header),
      getLocalHead: vi.fn<(signal?: AbortSignal) => Promise<bigint>>(async () => HEIGHT),
    },
    squares: {
      getExtendedDataSquare: vi.fn(async () => ({
        width: SQUARE_WIDTH,
        row: (index: number) => square[index] ?? [],
      })),
    },
    inclusionProofs: {
      getDataRootInclusionProof: vi.fn(async () => ({ index: 5n, total: 64n, aunts: [aunt] })),
    },
    bridge: {
      currentNonce: vi.fn<(signal?: AbortSignal) => Promise<bigint>>(async () => 10n),
      verifyAttestation: vi.fn<AttestationBridge['verifyAttestation']>(async () => true),
    },
    poller: createConfirmationPoller({ intervalMs: 0, ...pollerConfig }),
  } satisfies CelestiaDADependencies
  return { deps, da: createCelestiaDA(deps) }
}

describe('createCelestiaDA', () => {
  describe('store', () => {
    it('submits the message and returns a pointer spanning its shares', async () => {
      const { deps, da } = createFakeNetwork()

      const pointer = await da.store(message)

      expect(pointer).toEqual(storedPointer())
      expect(deps.blobs.submit).toHaveBeenCalledWith(namespace, message, undefined)
      expect(deps.proofs.checkIncluded).toHaveBeenCalledWith(HEIGHT, namespace, shareProof, commitment, undefined)
      expect(deps.headers.getHeaderByHeight).toHaveBeenCalledWith(HEIGHT, undefined)
    })

    it('rejects a submission reported at height 0 without asking for proofs', async () => {
      const { deps, da } = createFakeNetwork()
      deps.blobs.submit.mockResolvedValueOnce({ height: 0n, commitment: new Uint8Array() })

      await expect(da.store(message)).rejects.toBeInstanceOf(SubmissionRejectedError)
      expect(deps.proofs.getInclusionProof).not.toHaveBeenCalled()
    })

    it('fails when the node does not confirm inclusion', async () => {
      const { deps, da } = createFakeNetwork()
      deps.proofs.checkIncluded.mockResolvedValueOnce(false)

      const error = await da.store(message).catch((e: unknown) => e)

      expect(error).toBeInstanceOf(InclusionCheckError)
      expect(error).toMatchObject({ height: HEIGHT, commitment: `0x${'c0'.repeat(32)}` })
      expect(deps.headers.getHeaderByHeight).not.toHaveBeenCalled()
    })

    it('rethrows a header failure unchanged', async () => {
      const { deps, da } = createFakeNetwork()
      const failure = new TransportError('header.GetByHeight failed: timeout', 'header.GetByHeight')
      deps.headers.getHeaderByHeight.mockRejectedValueOnce(failure)

      await expect(da.store(message)).rejects.toBe(failure)
    })

    it('rejects an inclusion proof without share ranges', async () => {
      const { deps, da } = createFakeNetwork()
      deps.proofs.getInclusionProof.mockResolvedValueOnce([])

      await expect(da.store(message)).rejects.toThrow('inclusion proof has no share ranges')
    })
  })

  describe('serialize', () => {
    it('frames the pointer behind the blob pointer flag', () => {
      const { da } = createFakeNetwork()
      const pointer = storedPointer()

      const serialized = da.serialize(pointer)

      expect(serialized[0]).toBe(BLOB_POINTER_HEADER_FLAG)
      expect(deserializeBlobPointer(serialized)).toEqual(pointer)
    })
  })

  describe('read', () => {
    it('returns the blob data and the rows covering its shares', async () => {
      const { deps, da } = createFakeNetwork()

      const { data, squareData } = await da.read(storedPointer({ start: 1n, sharesLength: 2n }))

      expect(data).toBe(message)
      expect(squareData).toEqual({
        rowRoots,
        columnRoots: header.columnRoots,
        rows: [square[0], square[1]],
        squareSize: SQUARE_WIDTH,
        startRow: 0,
        endRow: 1,
      })
      expect(deps.blobs.getBlob).toHaveBeenCalledWith(HEIGHT, namespace, commitment, undefined)
    })

    it('clamps the last row to the edge of the extended square', async () => {
      const { da } = createFakeNetwork()

      const { squareData } = await da.read(storedPointer({ start: 6n, sharesLength: 10n }))

      expect(squareData.startRow).toBe(3)
      expect(squareData.endRow).toBe(3)
      expect(squareData.rows).toEqual([square[3]])
    })

    it('records row preimages that rebuild each covering row from its root', async () => {
      const { da } = createFakeNetwork()
      const { onHash, entries } = collectPreimages()
      const store = createMemoryPreimageStore()

      await da.read(storedPointer({ start: 0n, sharesLength: 2n }), { onHash })
      await store.recordAll(entries)

      await expect(reconstructContent(store.lookup, rowRoots[0])).resolves.toEqual(rowLeaves(square[0]))
      await expect(reconstructContent(store.lookup, rowRoots[1])).resolves.toEqual(rowLeaves(square[1]))
    })

    it('rejects rows that do not hash to the committed row root', async () => {
      const { deps, da } = createFakeNetwork()
      deps.headers.getHeaderByHeight.mockResolvedValueOnce({ ...header, rowRoots: [rowRoots[1], rowRoots[0]] })

      await expect(da.read(storedPointer({ start: 0n, sharesLength: 1n }), { onHash: () => undefined })).rejects.toThrow(
        FormatError,
      )
    })
  })

  describe('verify', () => {
    it('verifies against the pointer nonce once the bridge has moved past it', async () => {
      const { deps, da } = createFakeNetwork()
      deps.bridge.currentNonce.mockResolvedValueOnce(7n).mockResolvedValueOnce(8n)
      const pointer = storedPointer({ tupleRootNonce: 7n })

      await expect(da.verify(pointer, 1n, 65n)).resolves.toBe(true)

      expect(deps.inclusionProofs.getDataRootInclusionProof).toHaveBeenCalledWith(HEIGHT, 1n, 65n, undefined)
      expect(deps.bridge.currentNonce).toHaveBeenCalledTimes(2)
      expect(deps.bridge.verifyAttestation).toHaveBeenCalledWith(
        7n,
        { height: HEIGHT, dataRoot },
        { sideNodes: [aunt], key: 5n, numLeaves: 64n },
        undefined,
      )
      expect(pointer).toMatchObject({ key: 5n, numLeaves: 64n, sideNodes: [aunt], tupleRootNonce: 7n })
    })

    it('does not re-target a pointer nonce the bridge has already passed', async () => {
      const { deps, da } = createFakeNetwork({ maxAttempts: 3 })
      deps.bridge.currentNonce.mockResolvedValue(8n)
      const pointer = storedPointer({ tupleRootNonce: 7n })

      await expect(da.verify(pointer, 1n, 65n)).resolves.toBe(true)

      expect(deps.bridge.currentNonce).toHaveBeenCalledTimes(1)
      expect(deps.bridge.verifyAttestation.mock.calls[0]?.[0]).toBe(7n)
      expect(pointer.tupleRootNonce).toBe(7n)
    })

    it('prefers a caller-supplied nonce over the pointer nonce', async () => {
      const { deps, da } = createFakeNetwork()
      deps.bridge.currentNonce.mockResolvedValueOnce(5n).mockResolvedValueOnce(6n)
      const pointer = storedPointer({ tupleRootNonce: 2n })

      await expect(da.verify(pointer, 1n, 65n, { tupleRootNonce: 5n })).resolves.toBe(true)

      expect(deps.bridge.currentNonce).toHaveBeenCalledTimes(2)
      expect(deps.bridge.verifyAttestation.mock.calls[0]?.[0]).toBe(5n)
      expect(pointer.tupleRootNonce).toBe(5n)
    })

    it('keeps polling while the bridge only equals the target nonce', async () => {
      const { deps, da } = createFakeNetwork({ maxAttempts: 3 })
      deps.bridge.currentNonce.mockResolvedValue(5n)

      await expect(da.verify(storedPointer(), 1n, 65n, { tupleRootNonce: 5n })).rejects.toBeInstanceOf(PollTimeoutError)

      expect(deps.bridge.currentNonce).toHaveBeenCalledTimes(3)
      expect(deps.bridge.verifyAttestation).not.toHaveBeenCalled()
    })

    it('copies the side nodes into the pointer', async () => {
      const { deps, da } = createFakeNetwork()
      const aunts = [aunt]
      deps.inclusionProofs.getDataRootInclusionProof.mockResolvedValueOnce({ index: 5n, total: 64n, aunts })
      const pointer = storedPointer()

      await da.verify(pointer, 1n, 65n)
      aunts.push(new Uint8Array(32))

      expect(pointer.sideNodes).toEqual([aunt])
    })

    it('reports a rejected attestation as false', async () => {
      const { deps, da } = createFakeNetwork()
      deps.bridge.verifyAttestation.mockResolvedValueOnce(false)

      await expect(da.verify(storedPointer(), 1n, 65n)).resolves.toBe(false)
    })

    it('propagates a failed contract call instead of answering false', async () => {
      const { deps, da } = createFakeNetwork()
      const failure = new TransportError('verifyAttestation failed: execution reverted', 'verifyAttestation')
      deps.bridge.verifyAttestation.mockRejectedValueOnce(failure)

      await expect(da.verify(storedPointer(), 1n, 65n)).rejects.toBe(failure)
    })

    it('rejects side nodes that are not 32 bytes before touching the bridge', async () => {
      const { deps, da } = createFakeNetwork()
      deps.inclusionProofs.getDataRootInclusionProof.mockResolvedValueOnce({
        index: 5n,
        total: 64n,
        aunts: [new Uint8Array(31)],
      })

      await expect(da.verify(storedPointer(), 1n, 65n)).rejects.toThrow('aunt 0 is 31 bytes, expected 32')
      expect(deps.bridge.currentNonce).not.toHaveBeenCalled()
    })
  })

  describe('waitForHeight', () => {
    it('resolves once the local head reaches the height', async () => {
      const { deps, da } = createFakeNetwork()
      deps.headers.getLocalHead.mockResolvedValueOnce(40n).mockResolvedValueOnce(41n).mockResolvedValueOnce(43n)

      await expect(da.waitForHeight(HEIGHT)).resolves.toBe(43n)
      expect(deps.headers.getLocalHead).toHaveBeenCalledTimes(3)
    })

    it('stops when cancelled', async () => {
      const { da } = createFakeNetwork()
      const controller = new AbortController()
      controller.abort()

      await expect(da.waitForHeight(HEIGHT, { signal: controller.signal })).rejects.toBeInstanceOf(PollCancelledError)
    })
  })

  describe('waitForRelay', () => {
    it('resolves with the first nonce past the given one', async () => {
      const { deps, da } = createFakeNetwork()
      deps.bridge.currentNonce.mockResolvedValueOnce(12n).mockResolvedValueOnce(13n)

      await expect(da.waitForRelay(12n)).resolves.toBe(13n)
    })
  })
})
