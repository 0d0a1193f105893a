import { z } from 'zod'
import { hexToBytes } from 'viem'

export const base64Bytes = z
  .string()
  .regex(/^[A-Za-z0-9+/]*={0,2}$/, 'expected base64')
  .transform((value) => new Uint8Array(Buffer.from(value, 'base64')))

// Tendermint encodes hashes as bare hex
export const hexBytes = z
  .string()
  .regex(/^(?:[0-9a-fA-F]{2})*$/, 'expected hex')
  .transform((value) => hexToBytes(`0x${value}`))

// int64 and uint64 values arrive as decimal strings in Tendermint JSON
export const uint64 = z
  .union([z.string().regex(/^\d+$/), z.number().int().nonnegative()])
  .transform((value) => BigInt(value))

export const blobSchema = z.object({
  namespace: base64Bytes,
  data: base64Bytes,
  share_version: z.number().int(),
  commitment: base64Bytes,
  index: z.number().int().optional(),
})

export const nmtRangeProofSchema = z
  .object({
    start: z.number().int().nonnegative().default(0),
    end: z.number().int().nonnegative(),
    nodes: z.array(base64Bytes).nullish(),
    leaf_hash: base64Bytes.nullish(),
    is_max_namespace_ignored: z.boolean().default(true),
  })
  .transform((proof) => ({
    start: proof.start,
    end: proof.end,
    nodes: proof.nodes ?? [],
    leafHash: proof.leaf_hash ?? null,
    isMaxNamespaceIgnored: proof.is_max_namespace_ignored,
  }))

export const extendedHeaderSchema = z
  .object({
    header: z.object({
      height: uint64,
      data_hash: hexBytes,
    }),
    dah: z.object({
      row_roots: z.array(base64Bytes),
      column_roots: z.array(base64Bytes),
    }),
  })
  .transform((raw) => ({
    height: raw.header.height,
    dataRoot: raw.header.data_hash,
    rowRoots: raw.dah.row_roots,
    columnRoots: raw.dah.column_roots,
  }))

export const extendedDataSquareSchema = z.object({
  data_square: z.array(base64Bytes),
})

export const dataRootInclusionProofSchema = z
  .object({
    proof: z.object({
      total: uint64,
      index: uint64,
      leaf_hash: base64Bytes.nullish(),
      aunts: z.array(base64Bytes).nullish(),
    }),
  })
  .transform(({ proof }) => ({
    index: proof.index,
    total: proof.total,
    aunts: proof.aunts ?? [],
  }))
