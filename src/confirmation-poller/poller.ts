import { logger } from '../shared/logger.js'
import { PollCancelledError, PollTimeoutError } from '../shared/errors.js'
import { sleep } from '../shared/sleep.js'
import type { ConfirmationPoller, PollerConfig, PollRequest } from './types.js'

const defaultPollerConfig: PollerConfig = {
  intervalMs: 5000,
}

export const createConfirmationPoller = (config: Partial<PollerConfig> = {}): ConfirmationPoller => {
  const pollerConfig: PollerConfig = {
    intervalMs: config.intervalMs ?? defaultPollerConfig.intervalMs,
    ...(config.maxAttempts !== undefined && { maxAttempts: config.maxAttempts }),
  }

  const pollUntil = async <T>({ label, read, isSatisfied, signal }: PollRequest<T>): Promise<T> => {
    let attempts = 0

    const assertNotCancelled = () => {
      if (signal?.aborted) {
        logger.info(`[Poller] ${label}: cancelled after ${attempts} attempts`)
        throw new PollCancelledError(label)
      }
    }

    // Polling until the first satisfying read; only "not yet" loops
    for (;;) {
      assertNotCancelled()

      // Read errors are not retried
      const value = await read(signal)
      attempts++

      if (isSatisfied(value)) {
        logger.debug(`[Poller] ${label}: satisfied with ${String(value)} after ${attempts} attempts`)
        return value
      }

      if (pollerConfig.maxAttempts !== undefined && attempts >= pollerConfig.maxAttempts) {
        throw new PollTimeoutError(label, attempts)
      }

      logger.debug(`[Poller] ${label}: not yet (current: ${String(value)}), waiting ${pollerConfig.intervalMs}ms`)
      assertNotCancelled()
      await sleep(pollerConfig.intervalMs, signal)
      assertNotCancelled()
    }
  }

  const waitForHeight = (
    readHeight: (signal?: AbortSignal) => Promise<bigint>,
    target: bigint,
    signal?: AbortSignal,
  ): Promise<bigint> =>
    pollUntil({
      label: `waitForHeight(${target})`,
      read: readHeight,
      isSatisfied: (height) => height >= target,
      signal,
    })

  const waitForNonce = (
    readNonce: (signal?: AbortSignal) => Promise<bigint>,
    target: bigint,
    signal?: AbortSignal,
  ): Promise<bigint> =>
    pollUntil({
      label: `waitForNonce(>${target})`,
      read: readNonce,
      isSatisfied: (nonce) => nonce > target,
      signal,
    })

  return {
    pollUntil,
    waitForHeight,
    waitForNonce,
  }
}
