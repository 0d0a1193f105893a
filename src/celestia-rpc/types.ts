import type { z } from 'zod'

export type JsonRpcParams = unknown[] | Record<string, unknown>

export type JsonRpcClientConfig = {
  url: string
  authToken?: string
  timeoutMs?: number
}

export type JsonRpcClient = {
  call: <S extends z.ZodTypeAny>(
    method: string,
    params: JsonRpcParams,
    resultSchema: S,
    signal?: AbortSignal,
  ) => Promise<z.output<S>>
  toString: () => string
}

export type CelestiaNodeClientConfig = {
  gasPrice?: number
}
