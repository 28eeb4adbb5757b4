/**
 * Relay error taxonomy.
 *
 * Every failure that crosses an adapter boundary (draft backends, bridge
 * transport, approval channel, operator callbacks) is converted into one of
 * these kinds so callers can switch on `kind` instead of sniffing messages.
 */

import { isRetryable } from './utils/retry.js'

export type RelayErrorKind =
  | 'transient_io'
  | 'timeout'
  | 'permanent_recipient'
  | 'policy_rejection'
  | 'duplicate_callback'
  | 'malformed_callback'

export abstract class RelayError extends Error {
  abstract readonly kind: RelayErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Network or backend failure worth retrying. */
export class TransientIOError extends RelayError {
  readonly kind = 'transient_io' as const
}

/** An operation exceeded its hard deadline. */
export class TimeoutError extends RelayError {
  readonly kind = 'timeout' as const

  constructor(readonly label: string, readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`)
  }
}

/** The transport says the recipient can never be reached. Not retried. */
export class PermanentRecipientError extends RelayError {
  readonly kind = 'permanent_recipient' as const

  constructor(readonly conversationId: string, detail: string) {
    super(`recipient ${conversationId} rejected: ${detail}`)
  }
}

/** A message was dropped because its conversation is not eligible. */
export class PolicyRejection extends RelayError {
  readonly kind = 'policy_rejection' as const

  constructor(readonly conversationId: string, readonly reason: string) {
    super(`conversation ${conversationId} filtered: ${reason}`)
  }
}

/** A decision arrived for a record that is already resolved. */
export class DuplicateCallback extends RelayError {
  readonly kind = 'duplicate_callback' as const

  constructor(readonly recordId: string, readonly state: string) {
    super(`approval ${recordId} already resolved (${state})`)
  }
}

/** A decision payload could not be parsed or names no known record. */
export class MalformedCallback extends RelayError {
  readonly kind = 'malformed_callback' as const
}

/**
 * Normalise anything thrown at an adapter boundary. Relay errors pass
 * through; everything else becomes transient IO, which the caller may retry
 * or surface.
 */
export function toRelayError(err: unknown): RelayError {
  if (err instanceof RelayError) return err
  if (err instanceof Error) {
    if (err.name === 'AbortError') return new TransientIOError(`aborted: ${err.message}`, { cause: err })
    const prefix = isRetryable(err) ? '' : 'unclassified: '
    return new TransientIOError(`${prefix}${err.message}`, { cause: err })
  }
  return new TransientIOError(typeof err === 'string' ? err : 'non-Error thrown')
}
