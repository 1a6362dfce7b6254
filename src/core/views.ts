// Position-addressed handles onto buffered items
import { Deque } from './deque'
import { Slot, SliceView } from './types'

/**
 * Base for handles that address the buffer by logical position.
 * A handle is invalidated once items ahead of it are added or removed.
 */
abstract class BufferHandle<T> {
  private readonly version: number

  constructor(protected readonly buffer: Deque<T>) {
    this.version = buffer.version
  }

  protected checkValid(): void {
    if (this.buffer.version !== this.version) {
      throw new Error('Handle is no longer valid: items were pushed or consumed since it was taken')
    }
  }
}

/**
 * Writable handle onto the item at one buffer position
 */
export class BufferSlot<T> extends BufferHandle<T> implements Slot<T> {
  constructor(
    buffer: Deque<T>,
    readonly position: number
  ) {
    super(buffer)
  }

  get(): T {
    this.checkValid()
    return this.buffer.at(this.position)
  }

  set(value: T): void {
    this.checkValid()
    this.buffer.set(this.position, value)
  }

  update(fn: (value: T) => T): T {
    const value = fn(this.get())
    this.set(value)
    return value
  }
}

/**
 * Writable view over buffer positions `start..end`
 */
export class BufferSliceView<T> extends BufferHandle<T> implements SliceView<T> {
  constructor(
    buffer: Deque<T>,
    private readonly start: number,
    private readonly end: number
  ) {
    super(buffer)
  }

  get length(): number {
    return this.end - this.start
  }

  get(index: number): T {
    this.checkValid()
    return this.buffer.at(this.position(index))
  }

  set(index: number, value: T): void {
    this.checkValid()
    this.buffer.set(this.position(index), value)
  }

  toArray(): T[] {
    this.checkValid()
    return this.buffer.slice(this.start, this.end)
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.length; i++) {
      yield this.get(i)
    }
  }

  private position(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      throw new RangeError(`Index ${index} out of bounds for view of length ${this.length}`)
    }
    return this.start + index
  }
}
