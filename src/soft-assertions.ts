import { format } from 'node:util'
import { ErrorAssert, errorAssertContract } from './assertions/error-assert'
import { ListAssert, listAssertContract } from './assertions/list-assert'
import { MapAssert, mapAssertContract } from './assertions/map-assert'
import { NumberAssert, numberAssertContract } from './assertions/number-assert'
import { ObjectAssert, objectAssertContract } from './assertions/object-assert'
import { StringAssert, stringAssertContract } from './assertions/string-assert'
import { CheckFailure, NavigationFailure, messageOf, toError } from './core/errors'
import { SoftAssertionsConfigInput } from './core/types/config'
import { CapturedFailure } from './core/types/failures'
import { AssertionContract, ConfigurableAssertion } from './engine/contract'
import { Session, beginSession } from './engine/session'

export type ErrorType = abstract new (...args: never[]) => Error

/**
 * Collects the failures of every assertion started through it and reports them together
 * on assertAll().
 *
 * ```ts
 * const softly = new SoftAssertions()
 * softly.assertThat(order.total).isGreaterThan(0)
 * softly.assertThat(order.lines).first().hasFieldOrPropertyWithValue('sku', 'A-1')
 * softly.assertAll()
 * ```
 */
export class SoftAssertions {
  protected readonly session: Session

  constructor(config: SoftAssertionsConfigInput = {}) {
    this.session = beginSession(config)
  }

  assertThat(actual: number): NumberAssert
  assertThat(actual: string): StringAssert
  assertThat<E>(actual: readonly E[]): ListAssert<E>
  assertThat<K, V>(actual: ReadonlyMap<K, V>): MapAssert<K, V>
  assertThat(actual: Error): ErrorAssert
  assertThat<T>(actual: T): ObjectAssert<T>
  assertThat(
    actual: unknown,
  ): NumberAssert | StringAssert | ListAssert<unknown> | MapAssert<unknown, unknown> | ErrorAssert | ObjectAssert<unknown> {
    if (typeof actual === 'number') {
      return this.proxy(new NumberAssert(actual), numberAssertContract)
    }
    if (typeof actual === 'string') {
      return this.proxy(new StringAssert(actual), stringAssertContract)
    }
    if (Array.isArray(actual)) {
      return this.proxy(new ListAssert<unknown>(actual), listAssertContract)
    }
    if (actual instanceof Map) {
      return this.proxy(new MapAssert<unknown, unknown>(actual), mapAssertContract)
    }
    if (actual instanceof Error) {
      return this.proxy(new ErrorAssert(actual), errorAssertContract)
    }
    return this.assertThatObject(actual)
  }

  /**
   * Object assertions even for values that have a more specific family
   */
  assertThatObject<T>(actual: T): ObjectAssert<T> {
    return this.proxy(new ObjectAssert(actual), objectAssertContract)
  }

  /**
   * Soft version of any assertion family, including custom ones with their own contract
   */
  proxy<A extends C, C extends ConfigurableAssertion>(delegate: A, contract: AssertionContract<C>): A {
    return this.session.wrap(delegate, contract)
  }

  /**
   * Runs `assertion` and captures whatever it throws
   */
  check(assertion: () => void): void {
    try {
      assertion()
    } catch (error) {
      this.session.recordFailure(messageOf(error), error, 'check')
    }
  }

  fail(message: string, ...args: unknown[]): void {
    this.session.recordFailure(args.length === 0 ? message : format(message, ...args))
  }

  failWithCause(message: string, cause: unknown): void {
    this.session.recordFailure(message, cause)
  }

  /**
   * Records that an error of `errorType` was expected but nothing was thrown
   */
  shouldHaveThrown(errorType: ErrorType): void {
    this.session.recordFailure(`${errorType.name} should have been thrown`, undefined, 'shouldHaveThrown')
  }

  collectedFailures(): readonly CapturedFailure[] {
    return this.session.collectedFailures()
  }

  errorsCollected(): Array<CheckFailure | NavigationFailure> {
    return this.collectedFailures().map(toError)
  }

  wasSuccess(): boolean {
    return this.collectedFailures().length === 0
  }

  assertAll(): void {
    this.session.assertAll()
  }
}

/**
 * Runs `softly` with a fresh SoftAssertions and asserts all collected failures afterwards.
 * An error thrown by the callback itself (e.g. by a terminal method) propagates as is.
 */
export function assertSoftly(softly: (assertions: SoftAssertions) => void, config: SoftAssertionsConfigInput = {}): void {
  const assertions = new SoftAssertions(config)
  softly(assertions)
  assertions.assertAll()
}
