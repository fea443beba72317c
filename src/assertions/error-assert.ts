import { AssertionContract, defineContract, navigatesTo, returnsSelf } from '../engine/contract'
import { AbstractAssert, abstractAssertMethods } from './abstract-assert'
import { StringAssert, stringAssertContract } from './string-assert'

export class ErrorAssert extends AbstractAssert<Error> {
  hasMessage(expected: string): this {
    if (this.actual.message !== expected) {
      const message =
        `Expecting message to be:\n  ${this.display(expected)}\n` + `but was:\n  ${this.display(this.actual.message)}`
      this.failWith(message, expected)
    }
    return this
  }

  hasMessageContaining(expected: string): this {
    if (!this.actual.message.includes(expected)) {
      this.failWith(this.messageClause(`to contain:\n  ${this.display(expected)}`), expected)
    }
    return this
  }

  hasMessageStartingWith(expected: string): this {
    if (!this.actual.message.startsWith(expected)) {
      this.failWith(this.messageClause(`to start with:\n  ${this.display(expected)}`), expected)
    }
    return this
  }

  hasNoCause(): this {
    if (this.actual.cause !== undefined) {
      this.failWith(`Expecting actual not to have a cause but it had:\n  ${this.display(this.actual.cause)}`)
    }
    return this
  }

  /**
   * Continues on the direct cause, failing when there is none or it is not an Error
   */
  cause(): ErrorAssert {
    return this.propagateTo(new ErrorAssert(this.requireCause(this.actual)))
  }

  /**
   * Continues on the deepest Error of the cause chain
   */
  rootCause(): ErrorAssert {
    let root = this.requireCause(this.actual)
    const seen = new Set<Error>([this.actual, root])

    while (root.cause instanceof Error && !seen.has(root.cause)) {
      root = root.cause
      seen.add(root)
    }

    return this.propagateTo(new ErrorAssert(root))
  }

  message(): StringAssert {
    return this.propagateTo(new StringAssert(this.actual.message))
  }

  private requireCause(error: Error): Error {
    const { cause } = error
    if (cause === undefined) {
      this.failWith('Expecting actual to have a cause but it had none')
    }
    if (!(cause instanceof Error)) {
      this.failWith(`Expecting actual cause to be an Error but was:\n  ${this.display(cause)}`)
    }
    return cause
  }

  private messageClause(clause: string): string {
    return `Expecting message:\n  ${this.display(this.actual.message)}\n${clause}`
  }
}

export const errorAssertContract: AssertionContract<ErrorAssert> = defineContract<ErrorAssert>({
  name: 'ErrorAssert',
  prototype: ErrorAssert.prototype,
  methods: {
    ...abstractAssertMethods,
    hasMessage: returnsSelf(),
    hasMessageContaining: returnsSelf(),
    hasMessageStartingWith: returnsSelf(),
    hasNoCause: returnsSelf(),
    cause: navigatesTo(() => errorAssertContract),
    rootCause: navigatesTo(() => errorAssertContract),
    message: navigatesTo(() => stringAssertContract),
  },
})
