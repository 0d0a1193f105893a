import fetch from 'node-fetch'
import { z } from 'zod'
import { logger } from '../shared/logger.js'
import { bigIntReplacer } from '../shared/json-utils.js'
import { TransportError } from '../shared/errors.js'
import type { JsonRpcClient, JsonRpcClientConfig, JsonRpcParams } from './types.js'

const defaultClientConfig = {
  timeoutMs: 30000,
}

const jsonRpcResponseSchema = z.object({
  jsonrpc: z.literal('2.0').optional(),
  id: z.union([z.number(), z.string(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
})

const describe = (error: unknown): string => (error instanceof Error ? error.message : String(error))

/**
 * Minimal JSON-RPC 2.0 client over HTTP POST.
 *
 * Each call is a single request. Every failure surfaces as a TransportError,
 * except a cancellation requested through the caller's signal, which is
 * rethrown as is.
 */
export const createJsonRpcClient = (config: JsonRpcClientConfig): JsonRpcClient => {
  const timeoutMs = config.timeoutMs ?? defaultClientConfig.timeoutMs
  let nextId = 1

  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    Accept: 'application/json',
  }
  if (config.authToken) {
    headers['Authorization'] = `Bearer ${config.authToken}`
  }

  const post = async (method: string, params: JsonRpcParams, signal?: AbortSignal): Promise<unknown> => {
    const body = JSON.stringify({ jsonrpc: '2.0', id: nextId++, method, params }, bigIntReplacer)
    const requestSignal = signal
      ? AbortSignal.any([signal, AbortSignal.timeout(timeoutMs)])
      : AbortSignal.timeout(timeoutMs)

    const response = await fetch(config.url, {
      method: 'POST',
      headers,
      body,
      signal: requestSignal,
    })

    if (!response.ok) {
      const errorBody = await response.text()
      throw new TransportError(`${method} failed with status ${response.status}: ${errorBody}`, method)
    }

    return response.json()
  }

  const call = async <S extends z.ZodTypeAny>(
    method: string,
    params: JsonRpcParams,
    resultSchema: S,
    signal?: AbortSignal,
  ): Promise<z.output<S>> => {
    let payload: unknown
    try {
      logger.debug(`[JsonRpc] ${method} -> ${config.url}`)
      payload = await post(method, params, signal)
    } catch (error) {
      if (signal?.aborted || error instanceof TransportError) {
        throw error
      }
      throw new TransportError(`${method} failed: ${describe(error)}`, method, { cause: error })
    }

    const envelope = jsonRpcResponseSchema.safeParse(payload)
    if (!envelope.success) {
      throw new TransportError(`${method} returned a malformed JSON-RPC response`, method, { cause: envelope.error })
    }
    if (envelope.data.error) {
      const { code, message } = envelope.data.error
      throw new TransportError(`${method} failed: ${message} (code ${code})`, method)
    }

    const result = resultSchema.safeParse(envelope.data.result)
    if (!result.success) {
      throw new TransportError(`${method} returned an unexpected result: ${result.error.message}`, method, {
        cause: result.error,
      })
    }
    return result.data
  }

  return {
    call,
    toString: () => `JsonRpcClient(${config.url})`,
  }
}
