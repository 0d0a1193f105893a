import { bytesToHex } from 'viem'
import { FormatError } from '../shared/errors.js'
import { computeRoot } from '../nmt/nmt.js'
import { maxNamespace } from '../nmt/hasher.js'
import { DEFAULT_NMT_OPTIONS, type NmtOptions, type OnHash } from '../nmt/types.js'
import type { SquareData } from './types.js'

export type RowWindow = {
  startRow: number
  endRow: number
}

/**
 * Rows of an extended data square of `squareSize` that hold the shares
 * [start, start + sharesLength) of the original square. Both ends inclusive.
 */
export const coveringRows = (start: bigint, sharesLength: bigint, squareSize: number): RowWindow => {
  if (squareSize < 2 || squareSize % 2 !== 0) {
    throw new FormatError(`extended square width must be even and positive, got ${squareSize}`)
  }
  const odsWidth = BigInt(squareSize / 2)
  const lastRow = BigInt(squareSize - 1)

  const startRow = start / odsWidth
  let endRow = (start + sharesLength) / odsWidth
  if (endRow > lastRow) {
    endRow = lastRow
  }
  if (startRow > endRow) {
    throw new FormatError(`share ${start} lies outside a square of width ${squareSize}`)
  }
  return { startRow: Number(startRow), endRow: Number(endRow) }
}

/**
 * Leaves pushed into the row tree of an extended square: original shares are
 * keyed by their own namespace, parity shares in the right half by the
 * maximum namespace.
 */
export const rowLeaves = (row: Uint8Array[], options: NmtOptions = DEFAULT_NMT_OPTIONS): Uint8Array[] => {
  const half = row.length / 2
  const parity = maxNamespace(options.namespaceSize)
  return row.map((share, column) => {
    const namespace = column < half ? share.subarray(0, options.namespaceSize) : parity
    const leaf = new Uint8Array(options.namespaceSize + share.length)
    leaf.set(namespace)
    leaf.set(share, options.namespaceSize)
    return leaf
  })
}

/**
 * Re-hashes every covering row, checks it against the committed row root and
 * hands each preimage to `onHash` so the row can later be rebuilt from its root.
 */
export const recordSquarePreimages = (
  squareData: SquareData,
  onHash: OnHash,
  options: NmtOptions = DEFAULT_NMT_OPTIONS,
): void => {
  squareData.rows.forEach((row, offset) => {
    const rowIndex = squareData.startRow + offset
    const expected = squareData.rowRoots[rowIndex]
    if (!expected) {
      throw new FormatError(`no row root for row ${rowIndex}`)
    }
    const root = computeRoot(rowLeaves(row, options), onHash, options)
    if (bytesToHex(root) !== bytesToHex(expected)) {
      throw new FormatError(`row ${rowIndex} hashes to ${bytesToHex(root)}, expected ${bytesToHex(expected)}`)
    }
  })
}
