import { CapturedFailure, FailureDraft } from '../core/types/failures'

/**
 * Ordered, append-only store of the failures captured during one soft-assertion session.
 * Sequence numbers start at 1 and follow call order across every proxy of the session.
 */
export class ErrorCollector {
  private readonly failures: CapturedFailure[] = []
  private nextSequence = 1

  append(draft: FailureDraft): CapturedFailure {
    const failure: CapturedFailure = Object.freeze({ ...draft, sequence: this.nextSequence })
    this.nextSequence += 1
    this.failures.push(failure)
    return failure
  }

  collected(): readonly CapturedFailure[] {
    return [...this.failures]
  }

  isEmpty(): boolean {
    return this.failures.length === 0
  }

  get size(): number {
    return this.failures.length
  }
}
