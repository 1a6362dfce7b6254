// Growable ring buffer backing the lookahead buffer
export const DEFAULT_BUFFER_CAPACITY = 16

const EMPTY: unique symbol = Symbol('empty')

/**
 * Double-ended queue over a ring buffer.
 * Grows by doubling and can be rearranged so its items sit at the start of storage.
 */
export class Deque<T> {
  private items: Array<T | typeof EMPTY>
  private head = 0
  private size = 0
  private modifications = 0

  constructor(initialCapacity: number = DEFAULT_BUFFER_CAPACITY) {
    if (!Number.isInteger(initialCapacity) || initialCapacity < 1) {
      throw new RangeError(`Buffer capacity must be a positive integer, got ${initialCapacity}`)
    }
    this.items = new Array<T | typeof EMPTY>(initialCapacity).fill(EMPTY)
  }

  /**
   * Number of items held
   */
  get length(): number {
    return this.size
  }

  /**
   * Number of slots allocated
   */
  get capacity(): number {
    return this.items.length
  }

  /**
   * Incremented whenever existing items change position (front insertions and removals)
   */
  get version(): number {
    return this.modifications
  }

  /**
   * Whether the items occupy storage slots `0..length` in order
   */
  get isContiguous(): boolean {
    return this.head === 0
  }

  /**
   * Ensure room for `additional` more items without growing again
   */
  reserve(additional: number): void {
    const requiredSize = this.size + additional
    if (requiredSize <= this.items.length) {
      return
    }

    const newSize = Math.max(this.items.length * 2, requiredSize)
    const newItems = new Array<T | typeof EMPTY>(newSize).fill(EMPTY)
    for (let i = 0; i < this.size; i++) {
      newItems[i] = this.items[this.physical(i)]
    }
    this.items = newItems
    this.head = 0
  }

  /**
   * Append an item at the back
   */
  pushBack(item: T): void {
    this.reserve(1)
    this.items[this.physical(this.size)] = item
    this.size++
  }

  /**
   * Insert an item at the front
   */
  pushFront(item: T): void {
    this.reserve(1)
    this.head = (this.head - 1 + this.items.length) % this.items.length
    this.items[this.head] = item
    this.size++
    this.modifications++
  }

  /**
   * Remove and return the front item
   */
  shift(): T {
    if (this.size === 0) {
      throw new RangeError('Cannot shift from an empty buffer')
    }
    const item = this.read(this.head)
    this.items[this.head] = EMPTY
    this.head = (this.head + 1) % this.items.length
    this.size--
    this.modifications++
    if (this.size === 0) {
      this.head = 0
    }
    return item
  }

  /**
   * Item at logical position `index`
   */
  at(index: number): T {
    this.checkIndex(index)
    return this.read(this.physical(index))
  }

  /**
   * Replace the item at logical position `index`
   */
  set(index: number, item: T): void {
    this.checkIndex(index)
    this.items[this.physical(index)] = item
  }

  /**
   * Move items to storage slots `0..length`, preserving order.
   * Logical positions are unchanged, so handles stay valid.
   */
  makeContiguous(): void {
    if (this.head === 0) {
      return
    }
    const rotated = new Array<T | typeof EMPTY>(this.items.length).fill(EMPTY)
    for (let i = 0; i < this.size; i++) {
      rotated[i] = this.items[this.physical(i)]
    }
    this.items = rotated
    this.head = 0
  }

  /**
   * Copy of the items at logical positions `start..end`.
   * Makes the buffer contiguous first and then copies straight from storage.
   */
  slice(start: number, end: number): T[] {
    if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || start > end || end > this.size) {
      throw new RangeError(`Slice ${start}..${end} out of bounds for buffer of length ${this.size}`)
    }
    this.makeContiguous()
    const result: T[] = []
    for (let slot = start; slot < end; slot++) {
      result.push(this.read(slot))
    }
    return result
  }

  /**
   * Drop every item
   */
  clear(): void {
    this.items.fill(EMPTY)
    this.head = 0
    this.size = 0
    this.modifications++
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.size; i++) {
      yield this.at(i)
    }
  }

  private physical(index: number): number {
    return (this.head + index) % this.items.length
  }

  private read(slot: number): T {
    const item = this.items[slot]
    if (item === EMPTY) {
      throw new Error(`Buffer slot ${slot} is unexpectedly empty`)
    }
    return item
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new RangeError(`Index ${index} out of bounds for buffer of length ${this.size}`)
    }
  }
}
