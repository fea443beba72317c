import { format, isDeepStrictEqual } from 'node:util'
import { AssertionFailure } from '../core/errors'
import { Representation, STANDARD_REPRESENTATION } from '../core/representation'
import { AssertionConfiguration } from '../engine/chain-state'
import { chainConfigurationMethods } from '../engine/chain-configuration'
import { Comparator, ComparatorRegistry } from '../engine/comparator-registry'
import { ConfigurableAssertion, returnsSelf, returnsValue } from '../engine/contract'
import { SHOULD_NOT_BE_NULL, comparisonSuffix, expecting, shouldBeEqual } from './messages'

export interface AssertionInfo {
  description?: string
  overridingMessage?: string
  comparators: ComparatorRegistry
  representation: Representation
}

export type AssertionType = abstract new (...args: never[]) => unknown

/**
 * Base of every assertion family. Checks return `this` so they chain, and throw an
 * AssertionFailure with a complete message on failure.
 *
 * Used on its own (hard assertions) the object applies its label and message override
 * itself. Wrapped by a soft-assertion session, the chain configuration methods never
 * reach it: the session keeps label and override and pushes comparators and
 * representation in through applyConfiguration.
 */
export abstract class AbstractAssert<T> implements ConfigurableAssertion {
  protected info: AssertionInfo = {
    comparators: ComparatorRegistry.EMPTY,
    representation: STANDARD_REPRESENTATION,
  }

  constructor(readonly actual: T) {}

  as(label: string, ...args: unknown[]): this {
    this.info = { ...this.info, description: args.length === 0 ? label : format(label, ...args) }
    return this
  }

  describedAs(label: string, ...args: unknown[]): this {
    return this.as(label, ...args)
  }

  overridingErrorMessage(template: string, ...args: unknown[]): this {
    this.info = { ...this.info, overridingMessage: args.length === 0 ? template : format(template, ...args) }
    return this
  }

  withFailMessage(template: string, ...args: unknown[]): this {
    return this.overridingErrorMessage(template, ...args)
  }

  usingComparator(comparator: Comparator<T>): this {
    return this.withComparators(this.info.comparators.with({ kind: 'actual' }, comparator))
  }

  usingDefaultComparator(): this {
    return this.withComparators(this.info.comparators.without({ kind: 'actual' }))
  }

  usingElementComparator<E>(comparator: Comparator<E>): this {
    return this.withComparators(this.info.comparators.with({ kind: 'element' }, comparator))
  }

  usingComparatorForType<V>(typeName: string, comparator: Comparator<V>): this {
    return this.withComparators(this.info.comparators.with({ kind: 'type', typeName }, comparator))
  }

  usingComparatorForField<V>(path: string, comparator: Comparator<V>): this {
    return this.withComparators(this.info.comparators.with({ kind: 'field', path }, comparator))
  }

  withRepresentation(representation: Representation): this {
    this.info = { ...this.info, representation }
    return this
  }

  applyConfiguration(configuration: AssertionConfiguration): void {
    this.info = { ...this.info, comparators: configuration.comparators, representation: configuration.representation }
  }

  isEqualTo(expected: T): this {
    const comparator = this.actualComparator()
    if (!this.areEqual(this.actual, expected, comparator)) {
      const suffix = comparator ? comparisonSuffix(comparator.description) : ''
      this.failWith(shouldBeEqual(this.display(this.actual), this.display(expected)) + suffix, expected)
    }
    return this
  }

  isNotEqualTo(other: T): this {
    if (this.areEqual(this.actual, other, this.actualComparator())) {
      this.failWith(expecting(this.display(this.actual), `not to be equal to:\n  ${this.display(other)}`), other)
    }
    return this
  }

  isNull(): this {
    if (this.actual !== null && this.actual !== undefined) {
      this.failWith(expecting(this.display(this.actual), 'to be null'), null)
    }
    return this
  }

  isNotNull(): this {
    if (this.actual === null || this.actual === undefined) {
      this.failWith(SHOULD_NOT_BE_NULL)
    }
    return this
  }

  isSameAs(expected: unknown): this {
    if (!Object.is(this.actual, expected)) {
      const clause = `and:\n  ${this.display(expected)}\nto refer to the same object`
      this.failWith(expecting(this.display(this.actual), clause), expected)
    }
    return this
  }

  isInstanceOf(type: AssertionType): this {
    this.isNotNull()
    if (!(this.actual instanceof type)) {
      this.failWith(expecting(this.display(this.actual), `to be an instance of:\n  ${type.name}`), type)
    }
    return this
  }

  satisfies(requirements: (actual: T) => void): this {
    requirements(this.actual)
    return this
  }

  matches(predicate: (actual: T) => boolean, description = 'given predicate'): this {
    if (!predicate(this.actual)) {
      this.failWith(expecting(this.display(this.actual), `to match ${description}`))
    }
    return this
  }

  getActual(): T {
    return this.actual
  }

  protected display(value: unknown): string {
    return this.info.representation.toStringOf(value)
  }

  protected get comparators(): ComparatorRegistry {
    return this.info.comparators
  }

  protected actualComparator(): Comparator<unknown> | undefined {
    return this.info.comparators.get({ kind: 'actual' }) ?? this.info.comparators.forType(this.actual)
  }

  protected areEqual(actual: unknown, expected: unknown, comparator?: Comparator<unknown>): boolean {
    return comparator ? comparator.compare(actual, expected) === 0 : isDeepStrictEqual(actual, expected)
  }

  protected failWith(message: string, expected?: unknown): never {
    const text = this.info.overridingMessage ?? message
    const labelled = this.info.description === undefined ? text : `[${this.info.description}] ${text}`
    throw new AssertionFailure(labelled, this.actual, expected)
  }

  /**
   * Hands label, comparators and representation over to an assertion on a derived value
   */
  protected propagateTo<N extends AbstractAssert<unknown>>(next: N): N {
    next.applyConfiguration({ comparators: this.info.comparators, representation: this.info.representation })
    if (this.info.description !== undefined) {
      next.as(this.info.description)
    }
    return next
  }

  private withComparators(comparators: ComparatorRegistry): this {
    this.info = { ...this.info, comparators }
    return this
  }
}

export const abstractAssertMethods = {
  ...chainConfigurationMethods,
  isEqualTo: returnsSelf(),
  isNotEqualTo: returnsSelf(),
  isNull: returnsSelf(),
  isNotNull: returnsSelf(),
  isSameAs: returnsSelf(),
  isInstanceOf: returnsSelf(),
  satisfies: returnsSelf(),
  matches: returnsSelf(),
  getActual: returnsValue(),
}
