import { describe, it, expect, beforeEach } from '@jest/globals'
import { SoftAssertions, assertSoftly } from './soft-assertions'
import { AggregateFailure, AssertionFailure, CheckFailure, NavigationFailure } from './core/errors'
import { ListAssert } from './assertions/list-assert'
import { ObjectAssert } from './assertions/object-assert'
import { caseInsensitiveComparator } from './engine/comparator-registry'

describe('SoftAssertions', () => {
  let softly: SoftAssertions

  beforeEach(() => {
    softly = new SoftAssertions()
  })

  const messages = () => softly.collectedFailures().map((failure) => failure.message)

  describe('deferred checks', () => {
    it('should record only the failing call of a chain', () => {
      softly.assertThat(1).isEqualTo(2).isEqualTo(1)

      expect(messages()).toEqual(['expected: 2\n but was: 1'])
    })

    it('should record one failure for a failed navigation and ignore the poisoned calls after it', () => {
      softly.assertThat([]).first().isNull()

      expect(softly.collectedFailures()).toEqual([
        expect.objectContaining({
          sequence: 1,
          kind: 'navigation',
          method: 'first',
          message: 'Expecting actual not to be empty',
        }),
      ])
    })

    it('should return normally from assertAll when nothing was checked', () => {
      expect(() => softly.assertAll()).not.toThrow()
      expect(softly.wasSuccess()).toBe(true)
    })

    it('should record the message override verbatim', () => {
      softly.assertThat(1).overridingErrorMessage('boom').isEqualTo(2)

      expect(messages()).toEqual(['boom'])
    })

    it('should keep failures of independent chains in invocation order', () => {
      softly.assertThat('frodo').startsWith('sam')
      softly.assertThat(42).isNegative()

      expect(softly.collectedFailures()).toHaveLength(2)
      expect(softly.collectedFailures().map((failure) => failure.method)).toEqual(['startsWith', 'isNegative'])
    })

    it('should report N failing checks as N failures in call order', () => {
      const values = [3, 4, 5]

      values.forEach((value) => softly.assertThat(value).as('value %d', value).isZero())

      expect(messages()).toEqual([
        '[value 3] expected: 0\n but was: 3',
        '[value 4] expected: 0\n but was: 4',
        '[value 5] expected: 0\n but was: 5',
      ])
    })
  })

  describe('assertThat', () => {
    it('should pick the assertion family from the value', () => {
      expect(softly.assertThat([1])).toBeInstanceOf(ListAssert)
      expect(softly.assertThat({ id: 1 })).toBeInstanceOf(ObjectAssert)
      expect(softly.assertThatObject('text')).toBeInstanceOf(ObjectAssert)
    })

    it('should navigate from a list size back to the list', () => {
      softly.assertThat([1, 2]).as('items').size().isGreaterThan(5).returnToList().contains(3)

      expect(messages()).toEqual([
        '[items] Expecting actual:\n  2\nto be greater than:\n  5',
        '[items] Expecting actual:\n  [1, 2]\nto contain:\n  [3]\nbut could not find the following element(s):\n  [3]',
      ])
    })

    it('should navigate into map values', () => {
      const stock = new Map([['apples', 3]])

      softly.assertThat(stock).extractingByKey('pears').isEqualTo(1)
      softly.assertThat(stock).extractingByKey('apples').isEqualTo(4)

      expect(softly.collectedFailures().map((failure) => [failure.kind, failure.message])).toEqual([
        ['navigation', 'Expecting actual:\n  {"apples"=3}\nto contain key:\n  "pears"'],
        ['check', 'expected: 4\n but was: 3'],
      ])
    })

    it('should navigate through error causes', () => {
      const error = new Error('outer', { cause: new Error('middle', { cause: new Error('inner') }) })

      softly.assertThat(error).rootCause().hasMessage('other')
      softly.assertThat(new Error('alone')).cause().hasMessage('never checked')

      expect(messages()).toEqual([
        'Expecting message to be:\n  "other"\nbut was:\n  "inner"',
        'Expecting actual to have a cause but it had none',
      ])
    })

    it('should compare list elements with the element comparator', () => {
      softly.assertThat(['Merry', 'Pippin']).usingElementComparator(caseInsensitiveComparator).contains('merry', 'sam')

      expect(messages()).toEqual([
        'Expecting actual:\n  ["Merry", "Pippin"]\nto contain:\n  ["merry", "sam"]\n' +
          'but could not find the following element(s):\n  ["sam"]\n' +
          'when comparing values using case-insensitive string comparator',
      ])
    })

    it('should defer failures of every number check on NaN', () => {
      softly.assertThat(Number.NaN).isGreaterThan(0).isLessThan(0).isBetween(0, 1)

      expect(softly.collectedFailures().map((failure) => failure.method)).toEqual([
        'isGreaterThan',
        'isLessThan',
        'isBetween',
      ])
    })

    it('should flat-extract nested lists', () => {
      const fellowship = [
        { name: 'Frodo', items: ['ring', 'sting'] },
        { name: 'Sam', items: ['rope'] },
      ]

      softly
        .assertThat(fellowship)
        .flatExtracting((member) => member.items)
        .containsExactly('ring', 'sting', 'rope')
      softly
        .assertThat(fellowship)
        .flatExtracting((member) => member.items)
        .contains('ring', 'axe')
        .hasSize(2)
      softly
        .assertThat(fellowship)
        .flatExtracting((): string[] => {
          throw new Error('no items')
        })
        .isEmpty()

      expect(softly.collectedFailures().map((failure) => [failure.kind, failure.message])).toEqual([
        [
          'check',
          'Expecting actual:\n  ["ring", "sting", "rope"]\nto contain:\n  ["ring", "axe"]\n' +
            'but could not find the following element(s):\n  ["axe"]',
        ],
        ['check', 'Expected size: 2 but was: 3 in:\n["ring", "sting", "rope"]'],
        ['navigation', 'no items'],
      ])
    })

    it('should extract values from map entries', () => {
      const ages = new Map([
        ['Frodo', 33],
        ['Sam', 38],
      ])

      softly
        .assertThat(ages)
        .extractingFromEntries(([name, age]) => `${name}:${age}`)
        .containsExactly('Frodo:33', 'Sam:38')
      softly
        .assertThat(ages)
        .extractingFromEntries(([, age]) => age)
        .contains(33, 50)
      softly
        .assertThat(ages)
        .extractingFromEntries((): number => {
          throw new Error('bad entry')
        })
        .isNotEmpty()

      expect(softly.collectedFailures().map((failure) => [failure.kind, failure.method, failure.message])).toEqual([
        [
          'check',
          'contains',
          'Expecting actual:\n  [33, 38]\nto contain:\n  [33, 50]\nbut could not find the following element(s):\n  [50]',
        ],
        ['navigation', 'extractingFromEntries', 'bad entry'],
      ])
    })

    it('should let terminal errors escape immediately', () => {
      expect(() => softly.assertThat([1]).elementAt(3)).toThrow(RangeError)
      expect(softly.wasSuccess()).toBe(true)
    })
  })

  describe('explicit failures', () => {
    it('should record fail() messages with format arguments', () => {
      softly.fail('%d lines left', 3)
      softly.fail('plain 100%')

      expect(messages()).toEqual(['3 lines left', 'plain 100%'])
      expect(softly.collectedFailures()[0].kind).toBe('explicit')
    })

    it('should keep the cause given to failWithCause', () => {
      const cause = new Error('disk full')

      softly.failWithCause('could not save', cause)

      expect(softly.collectedFailures()[0]).toEqual(
        expect.objectContaining({ method: 'fail', message: 'could not save', cause }),
      )
    })

    it('should record a missing error with shouldHaveThrown', () => {
      softly.shouldHaveThrown(RangeError)

      expect(softly.collectedFailures()[0]).toEqual(
        expect.objectContaining({ method: 'shouldHaveThrown', message: 'RangeError should have been thrown' }),
      )
    })

    it('should capture anything thrown inside check()', () => {
      softly.check(() => {
        throw new TypeError('not a number')
      })
      softly.check(() => undefined)

      expect(softly.collectedFailures()).toEqual([
        expect.objectContaining({ kind: 'explicit', method: 'check', message: 'not a number' }),
      ])
    })
  })

  describe('errorsCollected', () => {
    it('should turn failures into errors by kind', () => {
      softly.assertThat(1).isZero()
      softly.assertThat([]).last()

      const [check, navigation] = softly.errorsCollected()

      expect(check).toBeInstanceOf(CheckFailure)
      expect(check.message).toBe('expected: 0\n but was: 1')
      expect(check.cause).toBeInstanceOf(AssertionFailure)
      expect(navigation).toBeInstanceOf(NavigationFailure)
      expect(navigation.message).toBe('Expecting actual not to be empty')
    })
  })

  describe('configuration', () => {
    it('should use the configured failure header', () => {
      const checkout = new SoftAssertions({ failureHeader: 'Checkout' })
      checkout.fail('empty basket')

      expect(() => checkout.assertAll()).toThrow('Checkout (1 failure)\n-- failure 1 --\nempty basket')
    })
  })
})

describe('assertSoftly', () => {
  it('should return when every assertion passed', () => {
    expect(() =>
      assertSoftly((softly) => {
        softly.assertThat('frodo').startsWith('fro').hasSize(5)
      }),
    ).not.toThrow()
  })

  it('should raise every failure at the end', () => {
    let raised: unknown

    try {
      assertSoftly((softly) => {
        softly.assertThat('frodo').as('name').startsWith('sam')
        softly.assertThat(33).isLessThan(18)
      })
    } catch (error) {
      raised = error
    }

    expect(raised).toBeInstanceOf(AggregateFailure)
    if (raised instanceof AggregateFailure) {
      expect(raised.message).toBe(
        'Multiple Failures (2 failures)\n' +
          '-- failure 1 --\n[name] Expecting actual:\n  "frodo"\nto start with:\n  "sam"\n' +
          '-- failure 2 --\nExpecting actual:\n  33\nto be less than:\n  18',
      )
    }
  })
})
