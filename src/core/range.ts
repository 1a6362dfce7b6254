// Index range construction and resolution
import { Bound, IndexRange } from './types'

const UNBOUNDED: Bound = { kind: 'unbounded' }

/**
 * Throw unless the value is a usable position
 */
export function assertIndex(index: number, what = 'Index'): void {
  if (!Number.isInteger(index) || index < 0) {
    throw new RangeError(`${what} must be a non-negative integer, got ${index}`)
  }
}

/**
 * `start..end`
 */
export function range(start: number, end: number): IndexRange {
  assertIndex(start, 'Range start')
  assertIndex(end, 'Range end')
  return { start: { kind: 'included', index: start }, end: { kind: 'excluded', index: end } }
}

/**
 * `start..=end`
 */
export function rangeInclusive(start: number, end: number): IndexRange {
  assertIndex(start, 'Range start')
  assertIndex(end, 'Range end')
  return { start: { kind: 'included', index: start }, end: { kind: 'included', index: end } }
}

/**
 * `start..`
 */
export function rangeFrom(start: number): IndexRange {
  assertIndex(start, 'Range start')
  return { start: { kind: 'included', index: start }, end: UNBOUNDED }
}

/**
 * `..end`
 */
export function rangeTo(end: number): IndexRange {
  assertIndex(end, 'Range end')
  return { start: UNBOUNDED, end: { kind: 'excluded', index: end } }
}

/**
 * `..=end`
 */
export function rangeToInclusive(end: number): IndexRange {
  assertIndex(end, 'Range end')
  return { start: UNBOUNDED, end: { kind: 'included', index: end } }
}

/**
 * `..`
 */
export function fullRange(): IndexRange {
  return { start: UNBOUNDED, end: UNBOUNDED }
}

/**
 * First position covered by the range
 */
export function startPosition(range: IndexRange): number {
  const bound = range.start
  switch (bound.kind) {
    case 'unbounded':
      return 0
    case 'included':
      assertIndex(bound.index, 'Range start')
      return bound.index
    case 'excluded':
      assertIndex(bound.index, 'Range start')
      return bound.index + 1
  }
}

/**
 * Position one past the last covered by the range, or undefined if it has no end
 */
export function endPosition(range: IndexRange): number | undefined {
  const bound = range.end
  switch (bound.kind) {
    case 'unbounded':
      return undefined
    case 'included':
      assertIndex(bound.index, 'Range end')
      return bound.index + 1
    case 'excluded':
      assertIndex(bound.index, 'Range end')
      return bound.index
  }
}

/**
 * Number of items to pull on top of `buffered` so the range's end is covered.
 * Returns undefined when the range has no end and the source must be drained.
 */
export function extraPullsFor(range: IndexRange, buffered: number): number | undefined {
  const end = endPosition(range)
  if (end === undefined) {
    return undefined
  }
  return Math.max(0, end - buffered)
}

/**
 * Throw if the range's start lies past its end
 */
export function checkRange(range: IndexRange): void {
  const start = startPosition(range)
  const end = endPosition(range)
  if (end !== undefined && start > end) {
    throw new RangeError(`Range start ${start} is past its end ${end}`)
  }
}

/**
 * Clamp a range against `available` items.
 * A range past the available end is truncated; a range that starts past it is absent.
 * @returns Half-open `[start, end)` pair, or undefined
 */
export function resolveRange(
  range: IndexRange,
  available: number
): [start: number, end: number] | undefined {
  checkRange(range)
  const start = startPosition(range)
  const requestedEnd = endPosition(range)

  if (start > available) {
    return undefined
  }

  const end = requestedEnd === undefined ? available : Math.min(requestedEnd, available)
  return [start, end]
}
