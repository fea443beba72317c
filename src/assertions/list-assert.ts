import { isDeepStrictEqual } from 'node:util'
import { Comparator } from '../engine/comparator-registry'
import { AssertionContract, defineContract, navigatesTo, returnsSelf, returnsValue } from '../engine/contract'
import { AbstractAssert, abstractAssertMethods } from './abstract-assert'
import { SHOULD_NOT_BE_EMPTY, comparisonSuffix, expecting, shouldHaveSize } from './messages'
import { NumberAssert, numberAssertMethods } from './number-assert'
import { ObjectAssert, objectAssertContract } from './object-assert'

export class ListAssert<E> extends AbstractAssert<readonly E[]> {
  hasSize(expected: number): this {
    if (this.actual.length !== expected) {
      this.failWith(shouldHaveSize(this.display(this.actual), this.actual.length, expected), expected)
    }
    return this
  }

  isEmpty(): this {
    if (this.actual.length > 0) {
      this.failWith(`Expecting empty but was: ${this.display(this.actual)}`)
    }
    return this
  }

  isNotEmpty(): this {
    if (this.actual.length === 0) {
      this.failWith(SHOULD_NOT_BE_EMPTY)
    }
    return this
  }

  contains(...values: E[]): this {
    const missing = values.filter((value) => !this.actual.some((element) => this.elementsEqual(element, value)))
    if (missing.length > 0) {
      const clause =
        `to contain:\n  ${this.display(values)}\n` +
        `but could not find the following element(s):\n  ${this.display(missing)}`
      this.failWith(expecting(this.display(this.actual), clause) + this.elementComparisonSuffix(), values)
    }
    return this
  }

  containsExactly(...values: E[]): this {
    const sameElements =
      values.length === this.actual.length &&
      values.every((value, index) => this.elementsEqual(this.actual[index], value))
    if (!sameElements) {
      const clause = `to contain exactly (and in same order):\n  ${this.display(values)}`
      this.failWith(expecting(this.display(this.actual), clause) + this.elementComparisonSuffix(), values)
    }
    return this
  }

  doesNotContain(...values: E[]): this {
    const found = values.filter((value) => this.actual.some((element) => this.elementsEqual(element, value)))
    if (found.length > 0) {
      const clause = `not to contain:\n  ${this.display(values)}\nbut found:\n  ${this.display(found)}`
      this.failWith(expecting(this.display(this.actual), clause) + this.elementComparisonSuffix(), values)
    }
    return this
  }

  first(): ObjectAssert<E> {
    this.isNotEmpty()
    return this.propagateTo(new ObjectAssert(this.actual[0]))
  }

  last(): ObjectAssert<E> {
    this.isNotEmpty()
    return this.propagateTo(new ObjectAssert(this.actual[this.actual.length - 1]))
  }

  element(index: number): ObjectAssert<E> {
    this.isNotEmpty()
    this.checkIndex(index)
    return this.propagateTo(new ObjectAssert(this.actual[index]))
  }

  singleElement(): ObjectAssert<E> {
    this.hasSize(1)
    return this.propagateTo(new ObjectAssert(this.actual[0]))
  }

  size(): ListSizeAssert<E> {
    return this.propagateTo(new ListSizeAssert(this.actual))
  }

  extracting<R>(extractor: (element: E) => R): ListAssert<R> {
    return this.propagateTo(new ListAssert(this.actual.map((element) => extractor(element))))
  }

  /**
   * Continues on the concatenation of the lists extracted from every element
   */
  flatExtracting<R>(extractor: (element: E) => readonly R[]): ListAssert<R> {
    return this.propagateTo(new ListAssert(this.actual.flatMap((element) => extractor(element))))
  }

  filteredOn(predicate: (element: E) => boolean): ListAssert<E> {
    return this.propagateTo(new ListAssert(this.actual.filter((element) => predicate(element))))
  }

  /**
   * Raw element access, no assertion involved
   * @throws RangeError when the index is outside the list
   */
  elementAt(index: number): E {
    if (!Number.isInteger(index) || index < 0 || index >= this.actual.length) {
      throw new RangeError(`Index ${index} is out of bounds for a list of size ${this.actual.length}`)
    }
    return this.actual[index]
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.actual.length) {
      this.failWith(
        `Expecting index to be between 0 and ${this.actual.length - 1} (inclusive) but was: ${index}`,
        index,
      )
    }
  }

  private elementComparator(element: unknown): Comparator<unknown> | undefined {
    return this.comparators.get({ kind: 'element' }) ?? this.comparators.forType(element)
  }

  private elementsEqual(element: unknown, expected: unknown): boolean {
    const comparator = this.elementComparator(element)
    return comparator ? comparator.compare(element, expected) === 0 : isDeepStrictEqual(element, expected)
  }

  private elementComparisonSuffix(): string {
    const comparator = this.comparators.get({ kind: 'element' })
    return comparator ? comparisonSuffix(comparator.description) : ''
  }
}

/**
 * Number checks on the size of a list, with a way back to the list itself
 */
export class ListSizeAssert<E> extends NumberAssert {
  constructor(private readonly elements: readonly E[]) {
    super(elements.length)
  }

  /**
   * Continues on the list again, with whatever this size assertion was configured with
   */
  returnToList(): ListAssert<E> {
    return this.propagateTo(new ListAssert(this.elements))
  }
}

export const listAssertContract: AssertionContract<ListAssert<unknown>> = defineContract<ListAssert<unknown>>({
  name: 'ListAssert',
  prototype: ListAssert.prototype,
  methods: {
    ...abstractAssertMethods,
    hasSize: returnsSelf(),
    isEmpty: returnsSelf(),
    isNotEmpty: returnsSelf(),
    contains: returnsSelf(),
    containsExactly: returnsSelf(),
    doesNotContain: returnsSelf(),
    first: navigatesTo(() => objectAssertContract),
    last: navigatesTo(() => objectAssertContract),
    element: navigatesTo(() => objectAssertContract),
    singleElement: navigatesTo(() => objectAssertContract),
    size: navigatesTo(() => listSizeAssertContract),
    extracting: navigatesTo(() => listAssertContract),
    flatExtracting: navigatesTo(() => listAssertContract),
    filteredOn: navigatesTo(() => listAssertContract),
    elementAt: returnsValue(),
  },
})

export const listSizeAssertContract: AssertionContract<ListSizeAssert<unknown>> = defineContract<
  ListSizeAssert<unknown>
>({
  name: 'ListSizeAssert',
  prototype: ListSizeAssert.prototype,
  methods: {
    ...numberAssertMethods,
    returnToList: navigatesTo(() => listAssertContract),
  },
})
