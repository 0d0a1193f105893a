import { hexToBytes, isHex } from 'viem'
import { FormatError } from '../shared/errors.js'
import { NAMESPACE_SIZE } from '../nmt/types.js'

export const NAMESPACE_VERSION_ZERO = 0
export const NAMESPACE_VERSION_ZERO_ID_SIZE = 10

/**
 * Builds a 29 byte version 0 blob namespace: the version byte, 18 zero bytes,
 * then the user id left-padded with zeros to 10 bytes.
 */
export const createBlobNamespaceV0 = (id: Uint8Array): Uint8Array => {
  if (id.length === 0 || id.length > NAMESPACE_VERSION_ZERO_ID_SIZE) {
    throw new FormatError(`namespace id must be 1 to ${NAMESPACE_VERSION_ZERO_ID_SIZE} bytes, got ${id.length}`)
  }
  const namespace = new Uint8Array(NAMESPACE_SIZE)
  namespace[0] = NAMESPACE_VERSION_ZERO
  namespace.set(id, NAMESPACE_SIZE - id.length)
  if (isReservedNamespace(namespace)) {
    throw new FormatError('namespace id falls in the reserved range')
  }
  return namespace
}

// Primary reserved namespaces: version 0 with every id byte but the last zero
export const isReservedNamespace = (namespace: Uint8Array): boolean =>
  namespace[0] === NAMESPACE_VERSION_ZERO &&
  namespace.subarray(1, NAMESPACE_SIZE - 1).every((byte) => byte === 0)

export const namespaceFromHex = (namespaceId: string): Uint8Array => {
  const hex = namespaceId.startsWith('0x') ? namespaceId : `0x${namespaceId}`
  if (!isHex(hex) || hex.length % 2 !== 0) {
    throw new FormatError(`namespace id ${namespaceId} is not valid hex`)
  }
  return createBlobNamespaceV0(hexToBytes(hex))
}
