import { AssertionContract, defineContract, navigatesTo, returnsSelf } from '../engine/contract'
import { AbstractAssert, abstractAssertMethods } from './abstract-assert'
import { SHOULD_NOT_BE_NULL, comparisonSuffix, expecting } from './messages'

export interface PropertyLookup {
  found: boolean
  value: unknown
}

/**
 * Follows a dotted path such as "address.city" through nested objects
 */
export function readPropertyPath(root: unknown, path: string): PropertyLookup {
  let current: unknown = root

  for (const segment of path.split('.')) {
    if (typeof current !== 'object' || current === null || !(segment in current)) {
      return { found: false, value: undefined }
    }
    current = Reflect.get(current, segment)
  }

  return { found: true, value: current }
}

export class ObjectAssert<T> extends AbstractAssert<T> {
  /**
   * Continues the chain on a value derived from the actual one
   */
  extracting<R>(extractor: (actual: T) => R): ObjectAssert<R> {
    if (this.actual === null || this.actual === undefined) {
      this.failWith(SHOULD_NOT_BE_NULL)
    }
    return this.propagateTo(new ObjectAssert(extractor(this.actual)))
  }

  hasFieldOrPropertyWithValue(path: string, expected: unknown): this {
    this.isNotNull()
    const lookup = readPropertyPath(this.actual, path)
    const actual = this.display(this.actual)

    if (!lookup.found) {
      this.failWith(expecting(actual, `to have a property or a field named ${JSON.stringify(path)}`))
    }

    const comparator = this.comparators.forField(path, lookup.value)
    if (!this.areEqual(lookup.value, expected, comparator)) {
      const clause =
        `to have a property or a field named ${JSON.stringify(path)} with value\n  ${this.display(expected)}\n` +
        `but value was:\n  ${this.display(lookup.value)}`
      this.failWith(expecting(actual, clause) + (comparator ? comparisonSuffix(comparator.description) : ''), expected)
    }
    return this
  }
}

export const objectAssertContract: AssertionContract<ObjectAssert<unknown>> = defineContract<ObjectAssert<unknown>>({
  name: 'ObjectAssert',
  prototype: ObjectAssert.prototype,
  methods: {
    ...abstractAssertMethods,
    extracting: navigatesTo(() => objectAssertContract),
    hasFieldOrPropertyWithValue: returnsSelf(),
  },
})
