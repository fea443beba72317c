import { randomUUID } from 'node:crypto'
import { ConfigurationError } from '../core/errors'
import { representationNamed } from '../core/representation'
import { SoftAssertionsConfig, SoftAssertionsConfigInput } from '../core/types/config'
import { CapturedFailure, FailureDraft } from '../core/types/failures'
import { loadConfig } from '../core/config/load'
import { logger } from '../logger'
import { ChainState } from './chain-state'
import { AssertionContract, ConfigurableAssertion } from './contract'
import { ErrorCollector } from './error-collector'
import { AssertionProxyFactory, FailureSink } from './proxy-factory'
import { assertAll } from './session-aggregator'

export type SessionStatus = 'open' | 'drained'

/**
 * Lifecycle container of one soft-assertion run. Owns exactly one ErrorCollector from
 * creation until it is drained; a drained session accepts no further captures.
 */
export class Session implements FailureSink {
  readonly id: string = randomUUID()
  private collector: ErrorCollector | undefined = new ErrorCollector()
  private readonly proxies: AssertionProxyFactory

  constructor(readonly config: SoftAssertionsConfig) {
    this.proxies = new AssertionProxyFactory(this)
  }

  get status(): SessionStatus {
    return this.collector ? 'open' : 'drained'
  }

  get isOpen(): boolean {
    return this.collector !== undefined
  }

  /**
   * Wraps an assertion object so that its failures are deferred to this session
   */
  wrap<A extends C, C extends ConfigurableAssertion>(delegate: A, contract: AssertionContract<C>): A {
    this.requireCollector('wrap')
    const state = ChainState.initial(representationNamed(this.config.representation))
    const proxy = this.proxies.wrap(delegate, contract, state)
    delegate.applyConfiguration(state.configuration())
    return proxy
  }

  record(draft: FailureDraft): CapturedFailure {
    return this.requireCollector(draft.method).append(draft)
  }

  /**
   * Captures a failure raised outside any wrapped assertion chain
   */
  recordFailure(message: string, cause?: unknown, method = 'fail'): CapturedFailure {
    const failure = this.record({ kind: 'explicit', method, message, cause })
    logger.debug(`Captured explicit failure #${failure.sequence} in session ${this.id}`)
    return failure
  }

  collectedFailures(): readonly CapturedFailure[] {
    return this.collector ? this.collector.collected() : []
  }

  /**
   * Hands over every captured failure and closes the session. Draining a drained session yields nothing.
   */
  drain(): readonly CapturedFailure[] {
    const { collector } = this
    if (!collector) {
      return []
    }
    this.collector = undefined
    logger.debug(`Session ${this.id} drained with ${collector.size} failure(s)`)
    return collector.collected()
  }

  assertAll(): void {
    assertAll(this)
  }

  private requireCollector(operation: string): ErrorCollector {
    if (!this.collector) {
      throw new ConfigurationError(
        `Soft assertion session ${this.id} has already been drained; ${operation} needs a new session`,
      )
    }
    return this.collector
  }
}

export function beginSession(overrides: SoftAssertionsConfigInput = {}): Session {
  const config = loadConfig({ overrides })
  logger.setLevel(config.logLevel)
  const session = new Session(config)
  logger.debug(`Soft assertion session ${session.id} started`)
  return session
}
