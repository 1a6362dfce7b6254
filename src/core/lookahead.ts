// Lookahead buffer - peek, mutate and push back items of a lazily pulled source
import { Deque } from './deque'
import { assertIndex, checkRange, extraPullsFor, resolveRange } from './range'
import { isSizedIterator, toIterator } from './source'
import {
  ILookahead,
  IndexRange,
  LookaheadOptions,
  SizedIterator,
  SizeHint,
  Slot,
  SliceView,
} from './types'
import { BufferSlot, BufferSliceView } from './views'

/**
 * Iterator with a buffer in front of its forward-only source.
 * Items are pulled from the source only when an operation needs them and are kept in an
 * internal buffer until consumed.
 */
export class Lookahead<T> implements ILookahead<T> {
  protected readonly source: Iterator<T>
  protected readonly buffer: Deque<T>
  protected exhausted = false

  constructor(source: Iterable<T> | Iterator<T>, options: LookaheadOptions = {}) {
    this.source = toIterator(source)
    this.buffer = new Deque<T>(options.initialCapacity)
  }

  /**
   * Number of items pulled from the source but not yet consumed
   */
  get bufferedLength(): number {
    return this.buffer.length
  }

  /**
   * Push an item to the front; it is the next one consumed
   */
  push(item: T): void {
    this.buffer.pushFront(item)
  }

  next(): IteratorResult<T, undefined> {
    if (this.buffer.length > 0) {
      return { done: false, value: this.buffer.shift() }
    }
    return this.pull()
  }

  /**
   * Consume and return the next item, or undefined when none is left
   */
  pop(): T | undefined {
    const result = this.next()
    return result.done ? undefined : result.value
  }

  /**
   * Item that the (n+1)-th pop would return, without consuming anything
   */
  peek(n = 0): T | undefined {
    assertIndex(n)
    if (this.fillTo(n + 1) > 0) {
      return undefined
    }
    return this.buffer.at(n)
  }

  /**
   * Writable handle onto the item that the (n+1)-th pop would return
   */
  peekMut(n = 0): Slot<T> | undefined {
    assertIndex(n)
    if (this.fillTo(n + 1) > 0) {
      return undefined
    }
    return new BufferSlot(this.buffer, n)
  }

  /**
   * Items at the range's positions, without consuming them.
   * The result is truncated when the source runs out before the range's end.
   */
  peekSlice(range: IndexRange): readonly T[] | undefined {
    const bounds = this.prepareSlice(range)
    if (!bounds) {
      return undefined
    }
    return this.buffer.slice(bounds[0], bounds[1])
  }

  /**
   * Writable view over the range's positions
   */
  peekSliceMut(range: IndexRange): SliceView<T> | undefined {
    const bounds = this.prepareSlice(range)
    if (!bounds) {
      return undefined
    }
    return new BufferSliceView(this.buffer, bounds[0], bounds[1])
  }

  sizeHint(): SizeHint {
    return [this.buffer.length, this.exhausted ? this.buffer.length : undefined]
  }

  /**
   * Close the source and drop everything buffered
   */
  return(): IteratorResult<T, undefined> {
    this.buffer.clear()
    if (!this.exhausted) {
      this.exhausted = true
      this.source.return?.()
    }
    return { done: true, value: undefined }
  }

  [Symbol.iterator](): this {
    return this
  }

  /**
   * Buffered items and whether the source may still produce more,
   * e.g. `Lookahead [1, 2] (source open)`
   */
  toString(): string {
    const items = Array.from(this.buffer, (item) => String(item)).join(', ')
    return `Lookahead [${items}] (source ${this.exhausted ? 'exhausted' : 'open'})`
  }

  /**
   * Pull until `n` items are buffered or the source is exhausted
   * @returns How many items are still missing (0 when the target was reached)
   */
  protected fillTo(n: number): number {
    this.buffer.reserve(this.knownPulls(n - this.buffer.length))
    while (this.buffer.length < n) {
      const result = this.pull()
      if (result.done) {
        break
      }
      this.buffer.pushBack(result.value)
    }
    return Math.max(0, n - this.buffer.length)
  }

  /**
   * Pull exactly enough items to cover the range's end, or everything for an open end
   */
  protected fillRange(range: IndexRange): void {
    const extra = extraPullsFor(range, this.buffer.length)
    if (extra === undefined) {
      this.fillAll()
      return
    }
    this.fillTo(this.buffer.length + extra)
  }

  /**
   * How many of `wanted` pulls are certain to yield an item. Room is reserved only for
   * those; the buffer grows by doubling past them.
   */
  protected knownPulls(_wanted: number): number {
    return 0
  }

  protected fillAll(): void {
    for (let result = this.pull(); !result.done; result = this.pull()) {
      this.buffer.pushBack(result.value)
    }
  }

  private prepareSlice(range: IndexRange): [number, number] | undefined {
    checkRange(range)
    this.fillRange(range)
    return resolveRange(range, this.buffer.length)
  }

  private pull(): IteratorResult<T, undefined> {
    if (this.exhausted) {
      return { done: true, value: undefined }
    }
    const result = this.source.next()
    if (result.done) {
      this.exhausted = true
      return { done: true, value: undefined }
    }
    return { done: false, value: result.value }
  }
}

/**
 * Lookahead over a source that reports its exact remaining count
 */
export class SizedLookahead<T> extends Lookahead<T> {
  private readonly sizedSource: SizedIterator<T>

  constructor(source: SizedIterator<T>, options: LookaheadOptions = {}) {
    super(source, options)
    this.sizedSource = source
  }

  /**
   * Exact number of items left: everything buffered (pushed items included) plus what
   * the source still holds
   */
  remaining(): number {
    const fromSource = this.exhausted ? 0 : this.sizedSource.remaining()
    return this.buffer.length + fromSource
  }

  sizeHint(): SizeHint {
    const remaining = this.remaining()
    return [remaining, remaining]
  }

  protected knownPulls(wanted: number): number {
    const fromSource = this.exhausted ? 0 : this.sizedSource.remaining()
    return Math.max(0, Math.min(wanted, fromSource))
  }
}

/**
 * Wrap a source in a lookahead buffer, keeping exact sizing when the source has it
 */
export function lookahead<T>(source: SizedIterator<T>, options?: LookaheadOptions): SizedLookahead<T>
export function lookahead<T>(
  source: Iterable<T> | Iterator<T>,
  options?: LookaheadOptions
): Lookahead<T>
export function lookahead<T>(
  source: Iterable<T> | Iterator<T>,
  options: LookaheadOptions = {}
): Lookahead<T> {
  const iterator = toIterator(source)
  if (isSizedIterator(iterator)) {
    return new SizedLookahead(iterator, options)
  }
  return new Lookahead(iterator, options)
}
