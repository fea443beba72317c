import { AssertionContract, defineContract, navigatesTo, returnsSelf } from '../engine/contract'
import { AbstractAssert, abstractAssertMethods } from './abstract-assert'
import { SHOULD_NOT_BE_EMPTY, expecting, shouldHaveSize } from './messages'
import { NumberAssert, numberAssertContract } from './number-assert'

export class StringAssert extends AbstractAssert<string> {
  startsWith(prefix: string): this {
    if (!this.actual.startsWith(prefix)) {
      this.failWith(expecting(this.display(this.actual), `to start with:\n  ${this.display(prefix)}`), prefix)
    }
    return this
  }

  endsWith(suffix: string): this {
    if (!this.actual.endsWith(suffix)) {
      this.failWith(expecting(this.display(this.actual), `to end with:\n  ${this.display(suffix)}`), suffix)
    }
    return this
  }

  contains(...values: string[]): this {
    const missing = values.filter((value) => !this.actual.includes(value))
    if (missing.length > 0) {
      this.failWith(expecting(this.display(this.actual), `to contain:\n  ${this.display(missing)}`), values)
    }
    return this
  }

  containsPattern(pattern: RegExp): this {
    const searchable = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''))
    if (!searchable.test(this.actual)) {
      this.failWith(expecting(this.display(this.actual), `to contain pattern:\n  ${String(pattern)}`), pattern)
    }
    return this
  }

  isEmpty(): this {
    if (this.actual.length > 0) {
      this.failWith(expecting(this.display(this.actual), 'to be empty'))
    }
    return this
  }

  isNotEmpty(): this {
    if (this.actual.length === 0) {
      this.failWith(SHOULD_NOT_BE_EMPTY)
    }
    return this
  }

  hasSize(expected: number): this {
    if (this.actual.length !== expected) {
      this.failWith(shouldHaveSize(this.display(this.actual), this.actual.length, expected), expected)
    }
    return this
  }

  hasSizeLessThan(boundary: number): this {
    if (this.actual.length >= boundary) {
      const message = `Expecting size of:\n  ${this.display(this.actual)}\nto be less than ${boundary} but was ${this.actual.length}`
      this.failWith(message, boundary)
    }
    return this
  }

  length(): NumberAssert {
    return this.propagateTo(new NumberAssert(this.actual.length))
  }
}

export const stringAssertContract: AssertionContract<StringAssert> = defineContract<StringAssert>({
  name: 'StringAssert',
  prototype: StringAssert.prototype,
  methods: {
    ...abstractAssertMethods,
    startsWith: returnsSelf(),
    endsWith: returnsSelf(),
    contains: returnsSelf(),
    containsPattern: returnsSelf(),
    isEmpty: returnsSelf(),
    isNotEmpty: returnsSelf(),
    hasSize: returnsSelf(),
    hasSizeLessThan: returnsSelf(),
    length: navigatesTo(() => numberAssertContract),
  },
})
