import { FormatError } from '../shared/errors.js'
import { decodeBlobPointer, encodeBlobPointer } from './blob-pointer.js'
import { type BlobPointer, BLOB_POINTER_HEADER_FLAG, STUB_HEADER_FLAG } from './types.js'

// Header bytes may carry other flag bits, so these test containment, not equality.
export const isBlobPointerHeaderByte = (header: number): boolean =>
  (BLOB_POINTER_HEADER_FLAG & header) > 0

export const isStubHeaderByte = (header: number): boolean =>
  (STUB_HEADER_FLAG & header) > 0

export const frameMessage = (flag: number, payload: Uint8Array): Uint8Array => {
  const framed = new Uint8Array(payload.length + 1)
  framed[0] = flag
  framed.set(payload, 1)
  return framed
}

export const serializeBlobPointer = (pointer: BlobPointer): Uint8Array =>
  frameMessage(BLOB_POINTER_HEADER_FLAG, encodeBlobPointer(pointer))

export const deserializeBlobPointer = (message: Uint8Array): BlobPointer => {
  if (message.length === 0) {
    throw new FormatError('empty message')
  }
  const header = message[0]
  if (!isBlobPointerHeaderByte(header)) {
    throw new FormatError(`header byte 0x${header.toString(16).padStart(2, '0')} does not mark a blob pointer`)
  }
  return decodeBlobPointer(message.subarray(1))
}
