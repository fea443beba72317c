import { CapturedFailure } from './types/failures'

/**
 * Raised by assertion checks. The message is complete and final: the soft-assertion
 * engine records it verbatim.
 */
export class AssertionFailure extends Error {
  constructor(
    message: string,
    public readonly actual?: unknown,
    public readonly expected?: unknown,
  ) {
    super(message)
    this.name = 'AssertionFailure'
  }
}

/**
 * Invalid engine usage: absent delegate, malformed contract, drained session, bad configuration argument.
 * Never deferred.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/**
 * Error form of a failure captured from a check call or an explicit fail()
 */
export class CheckFailure extends Error {
  constructor(public readonly failure: CapturedFailure) {
    super(failure.message, { cause: failure.cause })
    this.name = 'CheckFailure'
  }
}

/**
 * Error form of a failure captured while navigating to another object under test
 */
export class NavigationFailure extends Error {
  constructor(public readonly failure: CapturedFailure) {
    super(failure.message, { cause: failure.cause })
    this.name = 'NavigationFailure'
  }
}

export function toError(failure: CapturedFailure): CheckFailure | NavigationFailure {
  return failure.kind === 'navigation' ? new NavigationFailure(failure) : new CheckFailure(failure)
}

/**
 * Single failure raised when a soft-assertion session with captured failures is drained
 */
export class AggregateFailure extends Error {
  public readonly errors: readonly unknown[]

  constructor(
    message: string,
    public readonly failures: readonly CapturedFailure[],
  ) {
    super(message)
    this.name = 'AggregateFailure'
    this.errors = failures.map((failure) => failure.cause)
  }

  /**
   * One line per captured failure, first line of each message only
   */
  getErrorSummary(): string {
    return this.failures
      .map((failure) => {
        const [firstLine] = failure.message.split('\n')
        return `${failure.sequence}. ${failure.method}: ${firstLine}`
      })
      .join('\n')
  }
}

export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
