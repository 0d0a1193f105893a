import crypto from 'node:crypto'
import { bytesToHex } from 'viem'
import { FormatError } from '../shared/errors.js'
import {
  type HashStep,
  type NmtOptions,
  DEFAULT_NMT_OPTIONS,
  LEAF_PREFIX,
  NODE_PREFIX,
  SHA256_SIZE,
} from './types.js'

const sha256 = (data: Uint8Array): Uint8Array =>
  new Uint8Array(crypto.createHash('sha256').update(data).digest())

const concat = (...parts: Uint8Array[]): Uint8Array => {
  const out = new Uint8Array(parts.reduce((size, part) => size + part.length, 0))
  let offset = 0
  for (const part of parts) {
    out.set(part, offset)
    offset += part.length
  }
  return out
}

const compareBytes = (a: Uint8Array, b: Uint8Array): number => Buffer.compare(a, b)

export const maxNamespace = (namespaceSize: number): Uint8Array =>
  new Uint8Array(namespaceSize).fill(0xff)

export const namespacedHashSize = (options: NmtOptions): number =>
  options.namespaceSize * 2 + SHA256_SIZE

export const minNamespaceOf = (hash: Uint8Array, options: NmtOptions = DEFAULT_NMT_OPTIONS): Uint8Array =>
  hash.subarray(0, options.namespaceSize)

export const maxNamespaceOf = (hash: Uint8Array, options: NmtOptions = DEFAULT_NMT_OPTIONS): Uint8Array =>
  hash.subarray(options.namespaceSize, options.namespaceSize * 2)

export const digestOf = (hash: Uint8Array, options: NmtOptions = DEFAULT_NMT_OPTIONS): Uint8Array =>
  hash.subarray(options.namespaceSize * 2)

const step = (minNs: Uint8Array, maxNs: Uint8Array, preimage: Uint8Array): HashStep => {
  const digest = sha256(preimage)
  return {
    hash: concat(minNs, maxNs, digest),
    record: { digest: bytesToHex(digest), preimage },
  }
}

/**
 * Hashes a namespace-prefixed share: `ns || ns || sha256(0x00 || share)`.
 */
export const hashLeaf = (share: Uint8Array, options: NmtOptions = DEFAULT_NMT_OPTIONS): HashStep => {
  if (share.length < options.namespaceSize) {
    throw new FormatError(`share of ${share.length} bytes is shorter than the ${options.namespaceSize} byte namespace`)
  }
  const namespace = share.slice(0, options.namespaceSize)
  return step(namespace, namespace, concat(Uint8Array.of(LEAF_PREFIX), share))
}

/**
 * Hashes two namespaced child hashes: `minNs || maxNs || sha256(0x01 || left || right)`.
 */
export const hashNode = (left: Uint8Array, right: Uint8Array, options: NmtOptions = DEFAULT_NMT_OPTIONS): HashStep => {
  const size = namespacedHashSize(options)
  if (left.length !== size || right.length !== size) {
    throw new FormatError(`child hashes must be ${size} bytes, got ${left.length} and ${right.length}`)
  }

  const leftMax = maxNamespaceOf(left, options)
  const rightMin = minNamespaceOf(right, options)
  const rightMax = maxNamespaceOf(right, options)
  if (compareBytes(leftMax, rightMin) > 0) {
    throw new FormatError('children are not ordered by namespace')
  }

  const minNs = minNamespaceOf(left, options).slice()
  const maxNs = options.ignoreMaxNamespace && compareBytes(rightMin, maxNamespace(options.namespaceSize)) === 0
    ? leftMax.slice()
    : rightMax.slice()

  return step(minNs, maxNs, concat(Uint8Array.of(NODE_PREFIX), left, right))
}
