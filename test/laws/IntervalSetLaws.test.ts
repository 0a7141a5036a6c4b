/**
 * Property-based tests for interval set laws.
 *
 * Every set is checked against a plain membership model:
 * - Canonical form: intervals are non-empty, sorted and never touching
 * - Membership: a value is in the set iff it is in one of its inputs
 * - Algebra: union, intersection, difference and complement agree with
 *   the boolean operations on membership
 *
 * @since 0.1.0
 */

import { describe, it, expect } from "vitest"
import * as Array from "effect/Array"
import * as Equal from "effect/Equal"
import * as FastCheck from "effect/FastCheck"
import * as Boundary from "../../src/Boundary.js"
import * as Domain from "../../src/Domain.js"
import * as Interval from "../../src/Interval.js"
import * as IntervalSet from "../../src/IntervalSet.js"
import * as Range from "../../src/Range.js"

const small = Domain.integerRange(0, 40)
const points = Array.range(0, 40)

const rangeArbitrary = FastCheck
  .tuple(FastCheck.integer({ min: 0, max: 40 }), FastCheck.integer({ min: 0, max: 40 }))
  .map(([start, end]) => Range.make(start, end))

const rangesArbitrary = FastCheck.array(rangeArbitrary, { maxLength: 8 })

const intervalArbitrary = FastCheck
  .record({
    start: FastCheck.integer({ min: 0, max: 20 }),
    end: FastCheck.integer({ min: 0, max: 20 }),
    openStart: FastCheck.boolean(),
    openEnd: FastCheck.boolean()
  })
  .map(({ end, openEnd, openStart, start }) =>
    Interval.make(
      openStart ? Boundary.above(start) : Boundary.below(start),
      openEnd ? Boundary.below(end) : Boundary.above(end)
    )
  )

// Half steps hit both the endpoints and the gaps between them.
const samples = Array.map(Array.range(-2, 42), (n) => n / 2)

const containsValue = Range.contains(small)

const memberOf = (ranges: ReadonlyArray<Range.Range<number>>) => (value: number): boolean =>
  ranges.some((range) => containsValue(range, value))

const membership = (set: IntervalSet.DiscreteSet<number>): ReadonlyArray<boolean> =>
  Array.map(points, (value) => IntervalSet.has(set, value))

const isCanonicalDiscrete = (set: IntervalSet.DiscreteSet<number>): boolean =>
  Array.fromIterable(set).every((range, index, ranges) =>
    range.start <= range.end && (index === 0 || ranges[index - 1].end + 1 < range.start)
  )

const isCanonicalDense = (set: IntervalSet.DenseSet<number>): boolean => {
  const O = Boundary.getOrder(Domain.real)
  const isEmpty = Interval.isEmpty(Domain.real)
  return Array.fromIterable(set).every((interval, index, intervals) =>
    !isEmpty(interval) && (index === 0 || O(intervals[index - 1].upper, interval.lower) < 0)
  )
}

describe("IntervalSet Laws", () => {
  describe("Construction", () => {
    it("produces canonical sets holding exactly the input values", () =>
      FastCheck.assert(
        FastCheck.property(rangesArbitrary, (ranges) => {
          const set = IntervalSet.fromIntervals(small, ranges)
          expect(isCanonicalDiscrete(set)).toBe(true)
          expect(membership(set)).toEqual(Array.map(points, memberOf(ranges)))
          expect(IntervalSet.size(set)).toBe(Array.filter(points, memberOf(ranges)).length)
        }),
        { numRuns: 200 }
      ))

    it("does not depend on the order of the inputs", () =>
      FastCheck.assert(
        FastCheck.property(rangesArbitrary, (ranges) => {
          const forward = IntervalSet.fromIntervals(small, ranges)
          const backward = IntervalSet.fromIntervals(small, Array.reverse(ranges))
          expect(Equal.equals(forward, backward)).toBe(true)
        }),
        { numRuns: 100 }
      ))

    it("agrees with incremental insertion", () =>
      FastCheck.assert(
        FastCheck.property(rangesArbitrary, (ranges) => {
          const set = IntervalSet.empty(small)
          for (const range of ranges) {
            IntervalSet.addInterval(set, range)
            expect(isCanonicalDiscrete(set)).toBe(true)
          }
          expect(Equal.equals(set, IntervalSet.fromIntervals(small, ranges))).toBe(true)
        }),
        { numRuns: 100 }
      ))

    it("round-trips through values", () =>
      FastCheck.assert(
        FastCheck.property(rangesArbitrary, (ranges) => {
          const set = IntervalSet.fromIntervals(small, ranges)
          const rebuilt = IntervalSet.fromValues(small, IntervalSet.values(set))
          expect(Equal.equals(set, rebuilt)).toBe(true)
        }),
        { numRuns: 100 }
      ))
  })

  describe("Mutation", () => {
    it("keeps the canonical form through random inserts and removals", () =>
      FastCheck.assert(
        FastCheck.property(
          FastCheck.array(FastCheck.tuple(FastCheck.boolean(), rangeArbitrary), { maxLength: 20 }),
          (operations) => {
            const set = IntervalSet.empty(small)
            const model = Array.map(points, () => false)
            for (const [insert, range] of operations) {
              if (insert) {
                IntervalSet.addInterval(set, range)
              } else {
                IntervalSet.removeInterval(set, range)
              }
              for (const value of points) {
                if (containsValue(range, value)) {
                  model[value] = insert
                }
              }
              expect(isCanonicalDiscrete(set)).toBe(true)
            }
            expect(membership(set)).toEqual(model)
          }
        ),
        { numRuns: 200 }
      ))

    it("removing an added value restores a set that lacked it", () =>
      FastCheck.assert(
        FastCheck.property(rangesArbitrary, FastCheck.integer({ min: 0, max: 40 }), (ranges, value) => {
          const set = IntervalSet.fromIntervals(small, ranges)
          IntervalSet.remove(set, value)
          const before = IntervalSet.copy(set)
          IntervalSet.add(set, value)
          IntervalSet.remove(set, value)
          expect(Equal.equals(set, before)).toBe(true)
        }),
        { numRuns: 100 }
      ))
  })

  describe("Algebra", () => {
    const algebra = FastCheck.tuple(rangesArbitrary, rangesArbitrary)

    it("union, intersection and differences match membership", () =>
      FastCheck.assert(
        FastCheck.property(algebra, ([left, right]) => {
          const a = IntervalSet.fromIntervals(small, left)
          const b = IntervalSet.fromIntervals(small, right)
          const inA = memberOf(left)
          const inB = memberOf(right)
          expect(membership(IntervalSet.union(a, b))).toEqual(Array.map(points, (v) => inA(v) || inB(v)))
          expect(membership(IntervalSet.intersection(a, b))).toEqual(Array.map(points, (v) => inA(v) && inB(v)))
          expect(membership(IntervalSet.difference(a, b))).toEqual(Array.map(points, (v) => inA(v) && !inB(v)))
          expect(membership(IntervalSet.symmetricDifference(a, b))).toEqual(
            Array.map(points, (v) => inA(v) !== inB(v))
          )
          expect(membership(IntervalSet.complement(a))).toEqual(Array.map(points, (v) => !inA(v)))
        }),
        { numRuns: 200 }
      ))

    it("union and intersection are commutative", () =>
      FastCheck.assert(
        FastCheck.property(algebra, ([left, right]) => {
          const a = IntervalSet.fromIntervals(small, left)
          const b = IntervalSet.fromIntervals(small, right)
          expect(Equal.equals(IntervalSet.union(a, b), IntervalSet.union(b, a))).toBe(true)
          expect(Equal.equals(IntervalSet.intersection(a, b), IntervalSet.intersection(b, a))).toBe(true)
        }),
        { numRuns: 100 }
      ))

    it("union and intersection are idempotent", () =>
      FastCheck.assert(
        FastCheck.property(rangesArbitrary, (ranges) => {
          const a = IntervalSet.fromIntervals(small, ranges)
          expect(Equal.equals(IntervalSet.union(a, a), a)).toBe(true)
          expect(Equal.equals(IntervalSet.intersection(a, a), a)).toBe(true)
          expect(IntervalSet.isEmpty(IntervalSet.difference(a, a))).toBe(true)
        }),
        { numRuns: 100 }
      ))

    it("complement is an involution", () =>
      FastCheck.assert(
        FastCheck.property(rangesArbitrary, (ranges) => {
          const a = IntervalSet.fromIntervals(small, ranges)
          expect(Equal.equals(IntervalSet.complement(IntervalSet.complement(a)), a)).toBe(true)
        }),
        { numRuns: 100 }
      ))

    it("a set contains its intersection with any other set", () =>
      FastCheck.assert(
        FastCheck.property(algebra, ([left, right]) => {
          const a = IntervalSet.fromIntervals(small, left)
          const common = IntervalSet.intersection(a, IntervalSet.fromIntervals(small, right))
          if (!IntervalSet.isEmpty(a)) {
            expect(IntervalSet.containsAll(a, common)).toBe(true)
          }
        }),
        { numRuns: 100 }
      ))
  })

  describe("Dense domains", () => {
    const intervalsArbitrary = FastCheck.array(intervalArbitrary, { maxLength: 6 })
    const contains = Interval.contains(Domain.real)

    it("produce canonical sets holding exactly the input values", () =>
      FastCheck.assert(
        FastCheck.property(intervalsArbitrary, (intervals) => {
          const set = IntervalSet.fromIntervals(Domain.real, intervals)
          expect(isCanonicalDense(set)).toBe(true)
          for (const value of samples) {
            expect(IntervalSet.has(set, value)).toBe(intervals.some((interval) => contains(interval, value)))
          }
        }),
        { numRuns: 200 }
      ))

    it("complement and difference match membership", () =>
      FastCheck.assert(
        FastCheck.property(intervalsArbitrary, intervalsArbitrary, (left, right) => {
          const a = IntervalSet.fromIntervals(Domain.real, left)
          const b = IntervalSet.fromIntervals(Domain.real, right)
          const complement = IntervalSet.complement(a)
          const difference = IntervalSet.difference(a, b)
          expect(isCanonicalDense(complement)).toBe(true)
          expect(isCanonicalDense(difference)).toBe(true)
          for (const value of samples) {
            const inA = left.some((interval) => contains(interval, value))
            const inB = right.some((interval) => contains(interval, value))
            expect(IntervalSet.has(complement, value)).toBe(!inA)
            expect(IntervalSet.has(difference, value)).toBe(inA && !inB)
          }
        }),
        { numRuns: 200 }
      ))

    it("keep the canonical form through random inserts and removals", () =>
      FastCheck.assert(
        FastCheck.property(
          FastCheck.array(FastCheck.tuple(FastCheck.boolean(), intervalArbitrary), { maxLength: 20 }),
          (operations) => {
            const set = IntervalSet.empty(Domain.real)
            const model = Array.map(samples, () => false)
            for (const [insert, interval] of operations) {
              if (insert) {
                IntervalSet.addInterval(set, interval)
              } else {
                IntervalSet.removeInterval(set, interval)
              }
              samples.forEach((value, index) => {
                if (contains(interval, value)) {
                  model[index] = insert
                }
              })
              expect(isCanonicalDense(set)).toBe(true)
            }
            expect(Array.map(samples, (value) => IntervalSet.has(set, value))).toEqual(model)
          }
        ),
        { numRuns: 200 }
      ))
  })
})
