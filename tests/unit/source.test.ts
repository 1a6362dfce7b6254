import { describe, it, expect } from '@jest/globals'
import { ArraySource, isSizedIterator, sized, toIterator } from '../../src/core/source'

describe('Sources', () => {
  describe('ArraySource', () => {
    it('should yield items in order and then stay done', () => {
      const source = sized(['a', 'b'])

      expect(source.next()).toEqual({ done: false, value: 'a' })
      expect(source.next()).toEqual({ done: false, value: 'b' })
      expect(source.next()).toEqual({ done: true, value: undefined })
      expect(source.next()).toEqual({ done: true, value: undefined })
    })

    it('should count down its remaining items', () => {
      const source = new ArraySource([1, 2, 3])
      expect(source.remaining()).toBe(3)

      source.next()
      expect(source.remaining()).toBe(2)

      source.next()
      source.next()
      source.next()
      expect(source.remaining()).toBe(0)
    })

    it('should accept any array-like', () => {
      const source = sized('hey')
      expect([...source]).toEqual(['h', 'e', 'y'])
    })
  })

  describe('isSizedIterator', () => {
    it('should recognise a source with remaining()', () => {
      expect(isSizedIterator(sized([1]))).toBe(true)
    })

    it('should not treat plain iterators as sized', () => {
      expect(isSizedIterator([1, 2][Symbol.iterator]())).toBe(false)
    })
  })

  describe('toIterator', () => {
    it('should take the iterator of an iterable', () => {
      const iterator = toIterator(new Set([5, 6]))
      expect(iterator.next()).toEqual({ done: false, value: 5 })
    })

    it('should iterate the characters of a string', () => {
      const iterator = toIterator('ab')
      expect(iterator.next()).toEqual({ done: false, value: 'a' })
      expect(iterator.next()).toEqual({ done: false, value: 'b' })
    })

    it('should use an iterator as it is', () => {
      function* numbers() {
        yield 1
      }
      const generator = numbers()
      expect(toIterator(generator)).toBe(generator)
    })

    it('should use an object with only next() as it is', () => {
      let count = 0
      const counter: Iterator<number> = {
        next: () => ({ done: false, value: count++ }),
      }
      expect(toIterator(counter)).toBe(counter)
    })
  })
})
