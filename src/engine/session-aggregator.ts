import { AggregateFailure } from '../core/errors'
import { CapturedFailure } from '../core/types/failures'
import { formatAggregateMessage } from '../reporting/aggregate-message'
import { logger } from '../logger'

/**
 * What the aggregator needs from a session: a one-time drain and the header to report under
 */
export interface DrainableSession {
  readonly id: string
  readonly config: { readonly failureHeader: string }
  drain(): readonly CapturedFailure[]
}

/**
 * Drains the session and raises one AggregateFailure listing every captured failure in
 * sequence order, or returns when nothing was captured
 */
export function assertAll(session: DrainableSession): void {
  const failures = session.drain()

  if (failures.length === 0) {
    return
  }

  const ordered = [...failures].sort((left, right) => left.sequence - right.sequence)
  logger.debug(`Session ${session.id} failed with ${ordered.length} failure(s)`)

  throw new AggregateFailure(formatAggregateMessage(ordered, session.config.failureHeader), ordered)
}
