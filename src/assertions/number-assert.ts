import { AssertionContract, defineContract, returnsSelf } from '../engine/contract'
import { AbstractAssert, abstractAssertMethods } from './abstract-assert'
import { comparisonSuffix, expecting, shouldBeEqual } from './messages'

export class NumberAssert extends AbstractAssert<number> {
  isGreaterThan(other: number): this {
    if (!(this.compareTo(other) > 0)) {
      this.failWith(expecting(this.display(this.actual), `to be greater than:\n  ${this.display(other)}`), other)
    }
    return this
  }

  isLessThan(other: number): this {
    if (!(this.compareTo(other) < 0)) {
      this.failWith(expecting(this.display(this.actual), `to be less than:\n  ${this.display(other)}`), other)
    }
    return this
  }

  isBetween(start: number, end: number): this {
    if (!(this.compareTo(start) >= 0 && this.compareTo(end) <= 0)) {
      const range = `[${this.display(start)}, ${this.display(end)}]`
      this.failWith(expecting(this.display(this.actual), `to be between:\n  ${range}`), [start, end])
    }
    return this
  }

  isCloseTo(expected: number, offset: number): this {
    const difference = Math.abs(this.actual - expected)
    if (!(difference <= offset)) {
      const clause =
        `to be close to:\n  ${this.display(expected)}\n` +
        `by less than ${this.display(offset)} but difference was ${this.display(difference)}`
      this.failWith(expecting(this.display(this.actual), clause), expected)
    }
    return this
  }

  /**
   * Numeric zero check: -0 passes, NaN fails
   */
  isZero(): this {
    if (this.compareTo(0) !== 0) {
      const comparator = this.actualComparator()
      const suffix = comparator ? comparisonSuffix(comparator.description) : ''
      this.failWith(shouldBeEqual(this.display(this.actual), this.display(0)) + suffix, 0)
    }
    return this
  }

  isPositive(): this {
    return this.isGreaterThan(0)
  }

  isNegative(): this {
    return this.isLessThan(0)
  }

  // NaN on either side, or from the comparator, orders as nothing: every check on it fails
  private compareTo(other: number): number {
    const comparator = this.actualComparator()
    return comparator ? comparator.compare(this.actual, other) : this.actual - other
  }
}

export const numberAssertMethods = {
  ...abstractAssertMethods,
  isGreaterThan: returnsSelf(),
  isLessThan: returnsSelf(),
  isBetween: returnsSelf(),
  isCloseTo: returnsSelf(),
  isZero: returnsSelf(),
  isPositive: returnsSelf(),
  isNegative: returnsSelf(),
}

export const numberAssertContract: AssertionContract<NumberAssert> = defineContract<NumberAssert>({
  name: 'NumberAssert',
  prototype: NumberAssert.prototype,
  methods: numberAssertMethods,
})
