export type InvocationKind = 'check' | 'navigation' | 'terminal'

// How a failure entered the collector: a deferred chained call, or an explicit fail()/check()
export type FailureKind = Exclude<InvocationKind, 'terminal'> | 'explicit'

export interface InvocationRecord {
  method: string
  args: readonly unknown[]
  kind: InvocationKind
}

export interface FailureDraft {
  kind: FailureKind
  method: string
  label?: string
  message: string
  cause: unknown
}

export interface CapturedFailure extends Readonly<FailureDraft> {
  readonly sequence: number
}
