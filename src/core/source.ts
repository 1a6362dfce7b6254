// Source adapters - turn iterables into the iterators a lookahead buffer consumes
import { SizedIterator } from './types'

/**
 * Iterator over an array-like that knows how many items it has left
 */
export class ArraySource<T> implements SizedIterator<T>, Iterable<T> {
  private position = 0

  constructor(private readonly items: ArrayLike<T>) {}

  next(): IteratorResult<T, undefined> {
    if (this.position >= this.items.length) {
      return { done: true, value: undefined }
    }
    return { done: false, value: this.items[this.position++] }
  }

  remaining(): number {
    return Math.max(0, this.items.length - this.position)
  }

  [Symbol.iterator](): this {
    return this
  }
}

/**
 * Wrap an array-like in a sized source
 */
export function sized<T>(items: ArrayLike<T>): ArraySource<T> {
  return new ArraySource(items)
}

/**
 * Check whether a source reports its exact remaining count
 */
export function isSizedIterator<T>(source: Iterator<T>): source is SizedIterator<T> {
  return 'remaining' in source && typeof source.remaining === 'function'
}

/**
 * Get the iterator to pull from. Iterators are used as they are; other iterables have
 * `[Symbol.iterator]()` called once.
 */
export function toIterator<T>(source: Iterable<T> | Iterator<T>): Iterator<T> {
  if (isIterator(source)) {
    return source
  }
  return source[Symbol.iterator]()
}

function isIterator<T>(source: Iterable<T> | Iterator<T>): source is Iterator<T> {
  // strings are iterable primitives
  const { next }: { next?: unknown } = Object(source)
  return typeof next === 'function'
}
