import type { Hex } from 'viem'

// ============================================================================
// Error Types
// ============================================================================

/** An external call (Celestia node, Tendermint RPC, settlement chain) failed. */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly method?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'TransportError'
  }
}

/** Bytes that do not follow the expected wire or tree layout. */
export class FormatError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'FormatError'
  }
}

export class IncompleteInputError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'IncompleteInputError'
  }
}

/** The preimage oracle has no entry for a digest reached during reconstruction. */
export class MissingPreimageError extends Error {
  constructor(public readonly digest: Hex) {
    super(`preimage not found for digest ${digest}`)
    this.name = 'MissingPreimageError'
  }
}

export class SubmissionRejectedError extends Error {
  constructor(public readonly height: bigint) {
    super(`blob submission returned unexpected height ${height}`)
    this.name = 'SubmissionRejectedError'
  }
}

export class InclusionCheckError extends Error {
  constructor(public readonly height: bigint, public readonly commitment: Hex) {
    super(`blob ${commitment} is not reported as included at height ${height}`)
    this.name = 'InclusionCheckError'
  }
}

export class NotFoundError extends Error {
  constructor(resource: string, identifier: string) {
    super(`${resource} not found: ${identifier}`)
    this.name = 'NotFoundError'
  }
}

/** A local storage operation failed for a reason other than a missing entry. */
export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'StorageError'
  }
}

export class PollCancelledError extends Error {
  constructor(label: string) {
    super(`${label}: polling cancelled`)
    this.name = 'PollCancelledError'
  }
}

export class PollTimeoutError extends Error {
  constructor(label: string, public readonly attempts: number) {
    super(`${label}: condition not met after ${attempts} attempts`)
    this.name = 'PollTimeoutError'
  }
}
