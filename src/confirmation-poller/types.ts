export type PollerConfig = {
  intervalMs: number
  // Unbounded when absent; chain finality is the natural ceiling
  maxAttempts?: number
}

export type PollRequest<T> = {
  label: string
  read: (signal?: AbortSignal) => Promise<T>
  isSatisfied: (value: T) => boolean
  signal?: AbortSignal
}

export type ConfirmationPoller = {
  pollUntil: <T>(request: PollRequest<T>) => Promise<T>
  waitForHeight: (readHeight: (signal?: AbortSignal) => Promise<bigint>, target: bigint, signal?: AbortSignal) => Promise<bigint>
  waitForNonce: (readNonce: (signal?: AbortSignal) => Promise<bigint>, target: bigint, signal?: AbortSignal) => Promise<bigint>
}
