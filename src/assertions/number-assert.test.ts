import { describe, it, expect } from '@jest/globals'
import { assertThat } from './assert-that'
import { AssertionFailure } from '../core/errors'
import { comparatorOf } from '../engine/comparator-registry'

describe('NumberAssert', () => {
  it('should compare against bounds', () => {
    expect(() => assertThat(5).isGreaterThan(4).isLessThan(6).isBetween(5, 5).isPositive()).not.toThrow()
    expect(() => assertThat(5).isGreaterThan(5)).toThrow(
      new AssertionFailure('Expecting actual:\n  5\nto be greater than:\n  5'),
    )
    expect(() => assertThat(-2).isBetween(0, 10)).toThrow(
      new AssertionFailure('Expecting actual:\n  -2\nto be between:\n  [0, 10]'),
    )
  })

  it('should check closeness within an offset', () => {
    expect(() => assertThat(10).isCloseTo(10.4, 0.5)).not.toThrow()
    expect(() => assertThat(10).isCloseTo(12, 1)).toThrow(
      new AssertionFailure('Expecting actual:\n  10\nto be close to:\n  12\nby less than 1 but difference was 2'),
    )
  })

  it('should fail every ordering check on NaN', () => {
    expect(() => assertThat(Number.NaN).isGreaterThan(0)).toThrow(
      new AssertionFailure('Expecting actual:\n  NaN\nto be greater than:\n  0'),
    )
    expect(() => assertThat(Number.NaN).isLessThan(0)).toThrow(AssertionFailure)
    expect(() => assertThat(Number.NaN).isBetween(0, 1)).toThrow(AssertionFailure)
    expect(() => assertThat(Number.NaN).isPositive()).toThrow(AssertionFailure)
    expect(() => assertThat(Number.NaN).isNegative()).toThrow(AssertionFailure)
    expect(() => assertThat(1).isBetween(Number.NaN, 2)).toThrow(AssertionFailure)
    expect(() => assertThat(Number.NaN).isZero()).toThrow(new AssertionFailure('expected: 0\n but was: NaN'))
  })

  it('should fail when the comparator cannot order the values', () => {
    const undecided = comparatorOf<number>(() => Number.NaN)

    expect(() => assertThat(1).usingComparator(undecided).isPositive()).toThrow(AssertionFailure)
  })

  it('should accept negative zero as zero', () => {
    expect(() => assertThat(-0).isZero()).not.toThrow()
  })

  it('should never treat NaN as close', () => {
    expect(() => assertThat(Number.NaN).isCloseTo(0, 1)).toThrow(AssertionFailure)
  })

  it('should describe sign checks with the underlying comparison', () => {
    expect(() => assertThat(0).isZero()).not.toThrow()
    expect(() => assertThat(0).isNegative()).toThrow(
      new AssertionFailure('Expecting actual:\n  0\nto be less than:\n  0'),
    )
  })

  it('should order with a registered comparator', () => {
    const reversed = comparatorOf<number>((left, right) => right - left, 'reverse order')

    expect(() => assertThat(1).usingComparator(reversed).isGreaterThan(2)).not.toThrow()
  })
})
