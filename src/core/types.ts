// Shared type definitions for the lookahead buffer

/**
 * One end of an index range
 */
export type Bound =
  | { kind: 'unbounded' }
  | { kind: 'included'; index: number }
  | { kind: 'excluded'; index: number }

/**
 * A range of logical positions, 0 being the next item to be consumed
 */
export interface IndexRange {
  start: Bound
  end: Bound
}

/**
 * A source that can report exactly how many items it has left
 */
export interface SizedIterator<T> extends Iterator<T> {
  remaining(): number
}

/**
 * Lower bound and optional upper bound on the number of items left
 */
export type SizeHint = [lower: number, upper: number | undefined]

/**
 * Options accepted when wrapping a source
 */
export interface LookaheadOptions {
  /** Initial slot count of the internal buffer (default: 16) */
  initialCapacity?: number
}

/**
 * Writable handle onto a single buffered item
 */
export interface Slot<T> {
  get(): T
  set(value: T): void
  update(fn: (value: T) => T): T
}

/**
 * Writable view over a contiguous run of buffered items
 */
export interface SliceView<T> extends Iterable<T> {
  readonly length: number
  get(index: number): T
  set(index: number, value: T): void
  toArray(): T[]
}

/**
 * Public surface of a lookahead buffer
 */
export interface ILookahead<T> extends Iterator<T, undefined>, Iterable<T> {
  readonly bufferedLength: number
  push(item: T): void
  pop(): T | undefined
  peek(n?: number): T | undefined
  peekMut(n?: number): Slot<T> | undefined
  peekSlice(range: IndexRange): readonly T[] | undefined
  peekSliceMut(range: IndexRange): SliceView<T> | undefined
  sizeHint(): SizeHint
}
