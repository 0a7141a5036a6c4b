/**
 * The disjoint interval engine.
 *
 * Operates in place on a sorted array of non-empty, pairwise disjoint,
 * non-mergeable intervals. Every mutation locates the affected run of
 * intervals with two binary searches and rewrites that run with a single
 * `splice`, so the array is canonical again as soon as the call returns.
 *
 * @since 0.1.0
 * @internal
 */

import * as Arr from "effect/Array"
import * as Option from "effect/Option"
import * as Order from "effect/Order"
import type { Strategy } from "./strategy.js"

/**
 * `"fuse"` includes intervals that merely touch the query, since they must be
 * merged with it. `"strict"` only includes intervals sharing a value with it.
 *
 * @internal
 */
export type OverlapMode = "fuse" | "strict"

/**
 * Inclusive index range. Empty when `start > end`, in which case `start` is
 * where the query would be inserted.
 *
 * @internal
 */
export interface IndexRange {
  readonly start: number
  readonly end: number
}

/**
 * Index of the first element satisfying `predicate`, which must be false for
 * a prefix of the array and true for the rest. `self.length` if none does.
 *
 * @internal
 */
export const firstIndex = <A>(self: ReadonlyArray<A>, predicate: (a: A) => boolean): number => {
  let low = 0
  let high = self.length
  while (low < high) {
    const middle = (low + high) >>> 1
    if (predicate(self[middle])) {
      high = middle
    } else {
      low = middle + 1
    }
  }
  return low
}

/**
 * Index of the last element satisfying `predicate`, which must be true for a
 * prefix of the array and false for the rest. `-1` if none does.
 *
 * @internal
 */
export const lastIndex = <A>(self: ReadonlyArray<A>, predicate: (a: A) => boolean): number => {
  let low = 0
  let high = self.length
  while (low < high) {
    const middle = (low + high) >>> 1
    if (predicate(self[middle])) {
      low = middle + 1
    } else {
      high = middle
    }
  }
  return low - 1
}

/**
 * The run of stored intervals overlapping `interval`.
 *
 * @internal
 */
export const overlapRange = <V, I>(
  strategy: Strategy<V, I>,
  intervals: ReadonlyArray<I>,
  interval: I,
  mode: OverlapMode
): IndexRange => {
  const O = strategy.boundaryOrder
  const lower = strategy.lower(interval)
  const upper = strategy.upper(interval)
  const reaches = mode === "fuse" ? Order.greaterThanOrEqualTo(O) : Order.greaterThan(O)
  const startsBefore = mode === "fuse" ? Order.lessThanOrEqualTo(O) : Order.lessThan(O)
  return {
    start: firstIndex(intervals, (stored) => reaches(strategy.upper(stored), lower)),
    end: lastIndex(intervals, (stored) => startsBefore(strategy.lower(stored), upper))
  }
}

/**
 * Index of the stored interval containing `value`.
 *
 * @internal
 */
export const indexOfValue = <V, I>(
  strategy: Strategy<V, I>,
  intervals: ReadonlyArray<I>,
  value: V
): Option.Option<number> => {
  let low = 0
  let high = intervals.length - 1
  while (low <= high) {
    const middle = (low + high) >>> 1
    const stored = intervals[middle]
    if (strategy.containsValue(stored, value)) {
      return Option.some(middle)
    }
    if (strategy.precedes(stored, value)) {
      low = middle + 1
    } else {
      high = middle - 1
    }
  }
  return Option.none()
}

/**
 * True if `interval` lies within a single stored interval.
 *
 * @internal
 */
export const containsInterval = <V, I>(
  strategy: Strategy<V, I>,
  intervals: ReadonlyArray<I>,
  interval: I
): boolean => {
  const { end, start } = overlapRange(strategy, intervals, interval, "strict")
  return start === end && strategy.containsInterval(intervals[start], interval)
}

/**
 * Adds a non-empty interval.
 *
 * @internal
 */
export const insert = <V, I>(strategy: Strategy<V, I>, intervals: Array<I>, interval: I): void => {
  const { end, start } = overlapRange(strategy, intervals, interval, "fuse")
  if (start > end) {
    intervals.splice(start, 0, interval)
    return
  }
  if (start === end && strategy.containsInterval(intervals[start], interval)) {
    return
  }
  const fused = strategy.extent(strategy.extent(intervals[start], interval), intervals[end])
  intervals.splice(start, end - start + 1, fused)
}

/**
 * Removes every value of a non-empty interval.
 *
 * The first overlapping interval keeps its part below `interval`, the last one
 * keeps its part above it, and everything in between is dropped. When both
 * are the same stored interval, `interval` was a hole inside it and it is
 * split in two.
 *
 * @internal
 */
export const remove = <V, I>(strategy: Strategy<V, I>, intervals: Array<I>, interval: I): void => {
  const { end, start } = overlapRange(strategy, intervals, interval, "strict")
  if (start > end) {
    return
  }
  const [below] = strategy.difference(intervals[start], interval)
  const [, above] = strategy.difference(intervals[end], interval)
  intervals.splice(start, end - start + 1, ...Arr.getSomes([below, above]))
}

/**
 * Sorts non-empty intervals and merges every overlapping or touching pair.
 *
 * @internal
 */
export const normalize = <V, I>(strategy: Strategy<V, I>, intervals: Iterable<I>): Array<I> => {
  const touches = Order.greaterThanOrEqualTo(strategy.boundaryOrder)
  const result: Array<I> = []
  for (const interval of Arr.sort(intervals, strategy.order)) {
    const last = result.length - 1
    if (last >= 0 && touches(strategy.upper(result[last]), strategy.lower(interval))) {
      result[last] = strategy.extent(result[last], interval)
    } else {
      result.push(interval)
    }
  }
  return result
}
