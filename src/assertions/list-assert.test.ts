import { describe, it, expect } from '@jest/globals'
import { assertThat } from './assert-that'
import { ListSizeAssert } from './list-assert'
import { AssertionFailure } from '../core/errors'
import { caseInsensitiveComparator } from '../engine/comparator-registry'

describe('ListAssert', () => {
  describe('size and emptiness', () => {
    it('should check sizes', () => {
      expect(() => assertThat([1, 2]).hasSize(2).isNotEmpty()).not.toThrow()
      expect(() => assertThat([1, 2]).hasSize(3)).toThrow(new AssertionFailure('Expected size: 3 but was: 2 in:\n[1, 2]'))
      expect(() => assertThat([1]).isEmpty()).toThrow(new AssertionFailure('Expecting empty but was: [1]'))
    })
  })

  describe('contents', () => {
    it('should list missing elements', () => {
      expect(() => assertThat([1, 2]).contains(2, 3)).toThrow(
        new AssertionFailure(
          'Expecting actual:\n  [1, 2]\nto contain:\n  [2, 3]\nbut could not find the following element(s):\n  [3]',
        ),
      )
    })

    it('should check exact order', () => {
      expect(() => assertThat(['a', 'b']).containsExactly('a', 'b')).not.toThrow()
      expect(() => assertThat(['a', 'b']).containsExactly('b', 'a')).toThrow(
        new AssertionFailure('Expecting actual:\n  ["a", "b"]\nto contain exactly (and in same order):\n  ["b", "a"]'),
      )
    })

    it('should list unexpected elements that were found', () => {
      expect(() => assertThat([1, 2, 3]).doesNotContain(4, 2)).toThrow(
        new AssertionFailure('Expecting actual:\n  [1, 2, 3]\nnot to contain:\n  [4, 2]\nbut found:\n  [2]'),
      )
    })

    it('should compare elements deeply by default', () => {
      expect(() => assertThat([{ id: 1 }]).contains({ id: 1 })).not.toThrow()
    })

    it('should fall back to the type comparator for elements', () => {
      const assertion = assertThat(['Sam']).usingComparatorForType('string', caseInsensitiveComparator)

      expect(() => assertion.containsExactly('SAM')).not.toThrow()
    })
  })

  describe('navigation', () => {
    it('should navigate to elements by position', () => {
      expect(() => assertThat([1, 2, 3]).first().isEqualTo(1)).not.toThrow()
      expect(() => assertThat([1, 2, 3]).last().isEqualTo(3)).not.toThrow()
      expect(() => assertThat([1, 2, 3]).element(1).isEqualTo(2)).not.toThrow()
    })

    it('should reject an index outside the list', () => {
      expect(() => assertThat([1, 2]).element(2)).toThrow(
        new AssertionFailure('Expecting index to be between 0 and 1 (inclusive) but was: 2'),
      )
    })

    it('should require exactly one element for singleElement', () => {
      expect(() => assertThat([7]).singleElement().isEqualTo(7)).not.toThrow()
      expect(() => assertThat([7, 8]).singleElement()).toThrow(
        new AssertionFailure('Expected size: 1 but was: 2 in:\n[7, 8]'),
      )
    })

    it('should extract and filter elements', () => {
      const hobbits = [
        { name: 'Frodo', age: 33 },
        { name: 'Sam', age: 38 },
        { name: 'Pippin', age: 28 },
      ]

      expect(() =>
        assertThat(hobbits)
          .filteredOn((hobbit) => hobbit.age > 30)
          .extracting((hobbit) => hobbit.name)
          .containsExactly('Frodo', 'Sam'),
      ).not.toThrow()
    })

    it('should navigate to the size and back', () => {
      const size = assertThat([1, 2]).as('pair').size()
      const list = size.isEqualTo(2).returnToList()

      expect(size).toBeInstanceOf(ListSizeAssert)
      expect(list.getActual()).toEqual([1, 2])
      expect(() => list.contains(3)).toThrow(
        new AssertionFailure(
          '[pair] Expecting actual:\n  [1, 2]\nto contain:\n  [3]\nbut could not find the following element(s):\n  [3]',
        ),
      )
    })
  })

  describe('elementAt', () => {
    it('should return raw elements', () => {
      expect(assertThat(['a', 'b']).elementAt(1)).toBe('b')
    })

    it('should throw a RangeError outside the list', () => {
      expect(() => assertThat(['a']).elementAt(-1)).toThrow(new RangeError('Index -1 is out of bounds for a list of size 1'))
    })
  })
})
