import { AssertionContract, defineContract, navigatesTo, returnsSelf } from '../engine/contract'
import { AbstractAssert, abstractAssertMethods } from './abstract-assert'
import { comparisonSuffix, expecting, shouldHaveSize } from './messages'
import { ListAssert, listAssertContract } from './list-assert'
import { ObjectAssert, objectAssertContract } from './object-assert'

export class MapAssert<K, V> extends AbstractAssert<ReadonlyMap<K, V>> {
  containsKey(key: K): this {
    if (!this.actual.has(key)) {
      this.failWith(expecting(this.display(this.actual), `to contain key:\n  ${this.display(key)}`), key)
    }
    return this
  }

  doesNotContainKey(key: K): this {
    if (this.actual.has(key)) {
      this.failWith(expecting(this.display(this.actual), `not to contain key:\n  ${this.display(key)}`), key)
    }
    return this
  }

  containsEntry(key: K, value: V): this {
    const comparator = this.comparators.forType(value)
    const present = this.actual.has(key) && this.areEqual(this.actual.get(key), value, comparator)
    if (!present) {
      const clause = `to contain entry:\n  ${this.display(key)}=${this.display(value)}`
      this.failWith(
        expecting(this.display(this.actual), clause) + (comparator ? comparisonSuffix(comparator.description) : ''),
        value,
      )
    }
    return this
  }

  hasSize(expected: number): this {
    if (this.actual.size !== expected) {
      this.failWith(shouldHaveSize(this.display(this.actual), this.actual.size, expected), expected)
    }
    return this
  }

  isEmpty(): this {
    if (this.actual.size > 0) {
      this.failWith(`Expecting empty but was: ${this.display(this.actual)}`)
    }
    return this
  }

  /**
   * Continues on the value stored under `key`, failing when the key is absent
   */
  extractingByKey(key: K): ObjectAssert<V | undefined> {
    this.containsKey(key)
    return this.propagateTo(new ObjectAssert(this.actual.get(key)))
  }

  /**
   * Continues on one extracted value per entry, in insertion order
   */
  extractingFromEntries<R>(extractor: (entry: readonly [K, V]) => R): ListAssert<R> {
    return this.propagateTo(new ListAssert(Array.from(this.actual.entries(), (entry) => extractor(entry))))
  }

  keys(): ListAssert<K> {
    return this.propagateTo(new ListAssert(Array.from(this.actual.keys())))
  }

  values(): ListAssert<V> {
    return this.propagateTo(new ListAssert(Array.from(this.actual.values())))
  }
}

export const mapAssertContract: AssertionContract<MapAssert<unknown, unknown>> = defineContract<
  MapAssert<unknown, unknown>
>({
  name: 'MapAssert',
  prototype: MapAssert.prototype,
  methods: {
    ...abstractAssertMethods,
    containsKey: returnsSelf(),
    doesNotContainKey: returnsSelf(),
    containsEntry: returnsSelf(),
    hasSize: returnsSelf(),
    isEmpty: returnsSelf(),
    extractingByKey: navigatesTo(() => objectAssertContract),
    extractingFromEntries: navigatesTo(() => listAssertContract),
    keys: navigatesTo(() => listAssertContract),
    values: navigatesTo(() => listAssertContract),
  },
})
