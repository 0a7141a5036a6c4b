/**
 * Interval sets.
 *
 * An interval set stores a set of values from an ordered domain as the
 * minimal ascending sequence of disjoint intervals covering exactly those
 * values. Large runs of values therefore cost a single entry:
 *
 * ```ts
 * import * as Domain from "interval-sets/Domain"
 * import * as IntervalSet from "interval-sets/IntervalSet"
 * import * as Range from "interval-sets/Range"
 *
 * String(IntervalSet.fromIntervals(Domain.integer, [Range.make(0, 0), Range.make(2, 4), Range.make(5, 6)]))
 * // "{0, 2..6}"
 * ```
 *
 * Invariants, true after every operation:
 * - no stored interval is empty
 * - stored intervals are pairwise disjoint
 * - no two consecutive intervals could be merged into one (in a discrete
 *   domain, they are separated by at least one missing value)
 * - intervals are sorted in ascending order
 *
 * Sets over discrete domains store inclusive `Range`s, sets over dense
 * domains store boundary pair `Interval`s. Both accept either kind of
 * interval as input.
 *
 * `add*` and `remove*` mutate the set in place. The set algebra (`union`,
 * `difference`, `intersection`, `symmetricDifference`, `complement`) returns
 * new sets and never modifies its operands.
 *
 * @since 0.1.0
 */

import * as Arr from "effect/Array"
import * as Equal from "effect/Equal"
import { dual } from "effect/Function"
import * as Hash from "effect/Hash"
import type { Inspectable } from "effect/Inspectable"
import * as Option from "effect/Option"
import type { Pipeable } from "effect/Pipeable"
import * as Predicate from "effect/Predicate"
import type { Mutable } from "effect/Types"
import type * as Domain from "./Domain.js"
import * as Engine from "./internal/engine.js"
import { makeProtoBase } from "./internal/proto.js"
import * as Strategy from "./internal/strategy.js"
import type * as Interval from "./Interval.js"
import * as Range from "./Range.js"

// =============================================================================
// Symbols
// =============================================================================

/**
 * IntervalSet type identifier.
 *
 * @since 0.1.0
 * @category symbols
 */
export const IntervalSetTypeId: unique symbol = Symbol.for("interval-sets/IntervalSet")

/**
 * IntervalSet type identifier type.
 *
 * @since 0.1.0
 * @category symbols
 */
export type IntervalSetTypeId = typeof IntervalSetTypeId

// =============================================================================
// Models
// =============================================================================

/**
 * A set of `V` values stored as intervals of type `I`.
 *
 * Iterating the set yields its intervals in ascending order.
 *
 * @since 0.1.0
 * @category models
 */
export interface IntervalSet<V, I, D extends Domain.Domain<V> = Domain.Domain<V>>
  extends Iterable<I>, Equal.Equal, Pipeable, Inspectable
{
  readonly [IntervalSetTypeId]: IntervalSetTypeId
  readonly domain: D
  /** @internal */
  readonly strategy: Strategy.Strategy<V, I>
  /** @internal */
  readonly intervals: Array<I>
}

/**
 * A set over a discrete domain, stored as inclusive ranges.
 *
 * @since 0.1.0
 * @category models
 */
export type DiscreteSet<V> = IntervalSet<V, Range.Range<V>, Domain.Discrete<V>>

/**
 * A set over a dense domain, stored as boundary pairs.
 *
 * @since 0.1.0
 * @category models
 */
export type DenseSet<V> = IntervalSet<V, Interval.Interval<V>, Domain.Dense<V>>

/**
 * Intervals accepted as input by every set.
 *
 * @since 0.1.0
 * @category models
 */
export type IntervalInput<V> = Strategy.Input<V>

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Type guard to check if a value is an IntervalSet.
 *
 * @since 0.1.0
 * @category guards
 */
export const isIntervalSet = (u: unknown): u is IntervalSet<unknown, unknown> =>
  Predicate.hasProperty(u, IntervalSetTypeId)

// =============================================================================
// Proto Objects
// =============================================================================

/** @internal */
const ProtoIntervalSet = {
  ...makeProtoBase(IntervalSetTypeId),
  [Symbol.iterator](this: IntervalSet<unknown, unknown>): Iterator<unknown> {
    return this.intervals[Symbol.iterator]()
  },
  [Equal.symbol](this: IntervalSet<unknown, unknown>, that: unknown): boolean {
    if (!isIntervalSet(that) || that.domain.name !== this.domain.name || that.domain._tag !== this.domain._tag) {
      return false
    }
    const intervals = that.intervals
    return this.intervals.length === intervals.length &&
      this.intervals.every((interval, index) => this.strategy.equivalence(interval, intervals[index]))
  },
  [Hash.symbol](this: IntervalSet<unknown, unknown>): number {
    let hash = Hash.string(this.domain.name)
    for (const interval of this.intervals) {
      hash = Hash.combine(this.strategy.hash(interval))(hash)
    }
    return Hash.optimize(hash)
  },
  toString(this: IntervalSet<unknown, unknown>): string {
    return `{${this.intervals.map(this.strategy.format).join(", ")}}`
  },
  toJSON(this: IntervalSet<unknown, unknown>) {
    return {
      _id: "IntervalSet",
      domain: this.domain.name,
      intervals: this.intervals.map(this.strategy.format)
    }
  }
}

/** @internal */
const make = <V, I, D extends Domain.Domain<V>>(
  domain: D,
  strategy: Strategy.Strategy<V, I>,
  intervals: Array<I>
): IntervalSet<V, I, D> => {
  const set: Mutable<IntervalSet<V, I, D>> = Object.create(ProtoIntervalSet)
  set.domain = domain
  set.strategy = strategy
  set.intervals = intervals
  return set
}

/** @internal */
const fromInputs = <V, I, D extends Domain.Domain<V>>(
  domain: D,
  strategy: Strategy.Strategy<V, I>,
  inputs: Iterable<IntervalInput<V>>
): IntervalSet<V, I, D> =>
  make(domain, strategy, Engine.normalize(strategy, Arr.filterMap(inputs, (input) => strategy.fromInput(input))))

/** @internal */
const fromSingletons = <V, I, D extends Domain.Domain<V>>(
  domain: D,
  strategy: Strategy.Strategy<V, I>,
  values: Iterable<V>
): IntervalSet<V, I, D> =>
  make(domain, strategy, Engine.normalize(strategy, Arr.filterMap(values, (value) => strategy.fromValue(value))))

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a set from intervals.
 *
 * Intervals may be given in any order and may overlap. Each is clipped to
 * the domain and dropped when nothing is left. Both `Range`s and
 * `Interval`s are accepted whatever the domain.
 *
 * @example
 * ```ts
 * import * as Domain from "interval-sets/Domain"
 * import * as Interval from "interval-sets/Interval"
 * import * as IntervalSet from "interval-sets/IntervalSet"
 * import * as Range from "interval-sets/Range"
 *
 * const integers = IntervalSet.fromIntervals(Domain.integer, [Range.make(1, 3), Range.make(2, 4), Range.make(0, 0)])
 * String(integers) // "{0..4}"
 *
 * const reals = IntervalSet.fromIntervals(Domain.real, [Interval.closed(0, 1), Interval.closed(0.5, 2)])
 * String(reals) // "{0..2}"
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export function fromIntervals<V>(domain: Domain.Discrete<V>, intervals: Iterable<IntervalInput<V>>): DiscreteSet<V>
export function fromIntervals<V>(domain: Domain.Dense<V>, intervals: Iterable<IntervalInput<V>>): DenseSet<V>
export function fromIntervals<V>(
  domain: Domain.Domain<V>,
  intervals: Iterable<IntervalInput<V>>
): DiscreteSet<V> | DenseSet<V>
export function fromIntervals<V>(
  domain: Domain.Domain<V>,
  intervals: Iterable<IntervalInput<V>>
): DiscreteSet<V> | DenseSet<V> {
  return domain._tag === "Discrete"
    ? fromInputs(domain, Strategy.discrete(domain), intervals)
    : fromInputs(domain, Strategy.dense(domain), intervals)
}

/**
 * Creates an empty set.
 *
 * @since 0.1.0
 * @category constructors
 */
export function empty<V>(domain: Domain.Discrete<V>): DiscreteSet<V>
export function empty<V>(domain: Domain.Dense<V>): DenseSet<V>
export function empty<V>(domain: Domain.Domain<V>): DiscreteSet<V> | DenseSet<V>
export function empty<V>(domain: Domain.Domain<V>): DiscreteSet<V> | DenseSet<V> {
  return fromIntervals(domain, [])
}

/**
 * Creates a set from individual values.
 *
 * @example
 * ```ts
 * import * as Domain from "interval-sets/Domain"
 * import * as IntervalSet from "interval-sets/IntervalSet"
 *
 * String(IntervalSet.fromValues(Domain.integer, [3, 1, 2, 7, 2])) // "{1..3, 7}"
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export function fromValues<V>(domain: Domain.Discrete<V>, values: Iterable<V>): DiscreteSet<V>
export function fromValues<V>(domain: Domain.Dense<V>, values: Iterable<V>): DenseSet<V>
export function fromValues<V>(domain: Domain.Domain<V>, values: Iterable<V>): DiscreteSet<V> | DenseSet<V>
export function fromValues<V>(domain: Domain.Domain<V>, values: Iterable<V>): DiscreteSet<V> | DenseSet<V> {
  return domain._tag === "Discrete"
    ? fromSingletons(domain, Strategy.discrete(domain), values)
    : fromSingletons(domain, Strategy.dense(domain), values)
}

/**
 * Creates a set from a bit mask: bit `n` set means the value with ordinal `n`
 * is a member. Bits for ordinals outside the domain are ignored.
 *
 * Runs of set bits become ranges directly, without sorting or merging.
 *
 * @example
 * ```ts
 * import * as Domain from "interval-sets/Domain"
 * import * as IntervalSet from "interval-sets/IntervalSet"
 *
 * String(IntervalSet.fromBitmask(Domain.integer, 0b1110_0111n)) // "{0..2, 5..7}"
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const fromBitmask = <V>(domain: Domain.Discrete<V>, mask: bigint): DiscreteSet<V> => {
  const first = domain.ordinal(domain.min)
  const last = domain.ordinal(domain.max)
  const ranges: Array<Range.Range<V>> = []
  const emit = (start: number, end: number): void => {
    const from = Math.max(start, first)
    const to = Math.min(end, last)
    if (from <= to) {
      ranges.push(Range.make(domain.fromOrdinal(from), domain.fromOrdinal(to)))
    }
  }
  let run = -1
  let bit = 0
  for (let rest = mask; rest > 0n; rest >>= 1n) {
    if ((rest & 1n) === 1n) {
      if (run < 0) run = bit
    } else if (run >= 0) {
      emit(run, bit - 1)
      run = -1
    }
    bit++
  }
  if (run >= 0) {
    emit(run, bit - 1)
  }
  return make(domain, Strategy.discrete(domain), ranges)
}

/**
 * The set of every value of the domain.
 *
 * @since 0.1.0
 * @category constructors
 */
export function universe<V>(domain: Domain.Discrete<V>): DiscreteSet<V>
export function universe<V>(domain: Domain.Dense<V>): DenseSet<V>
export function universe<V>(domain: Domain.Domain<V>): DiscreteSet<V> | DenseSet<V>
export function universe<V>(domain: Domain.Domain<V>): DiscreteSet<V> | DenseSet<V> {
  if (domain._tag === "Discrete") {
    const strategy = Strategy.discrete(domain)
    return make(domain, strategy, [strategy.universe])
  }
  const strategy = Strategy.dense(domain)
  return make(domain, strategy, [strategy.universe])
}

/**
 * A copy of the set that shares no mutable state with it.
 *
 * @since 0.1.0
 * @category constructors
 */
export const copy = <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>): IntervalSet<V, I, D> =>
  make(self.domain, self.strategy, Arr.copy(self.intervals))

// =============================================================================
// Mutations
// =============================================================================

/**
 * Adds a value to the set, in place. Values outside the domain are ignored.
 *
 * @example
 * ```ts
 * import * as Domain from "interval-sets/Domain"
 * import * as IntervalSet from "interval-sets/IntervalSet"
 * import { pipe } from "effect/Function"
 *
 * const set = IntervalSet.empty(Domain.integer)
 *
 * // Data-first
 * IntervalSet.add(set, 1)
 *
 * // Data-last (with pipe)
 * pipe(set, IntervalSet.add(2))
 *
 * String(set) // "{1..2}"
 * ```
 *
 * @since 0.1.0
 * @category mutations
 */
export const add: {
  <V>(value: V): <I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>) => IntervalSet<V, I, D>
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, value: V): IntervalSet<V, I, D>
} = dual(
  2,
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, value: V): IntervalSet<V, I, D> => {
    const single = self.strategy.fromValue(value)
    if (Option.isSome(single)) {
      Engine.insert(self.strategy, self.intervals, single.value)
    }
    return self
  }
)

/**
 * Adds every value of an interval to the set, in place. Empty intervals are
 * ignored.
 *
 * @example
 * ```ts
 * import * as Domain from "interval-sets/Domain"
 * import * as IntervalSet from "interval-sets/IntervalSet"
 * import * as Range from "interval-sets/Range"
 *
 * const set = IntervalSet.fromIntervals(Domain.integer, [Range.make(0, 1), Range.make(4, 5)])
 * IntervalSet.addInterval(set, Range.make(2, 3))
 * String(set) // "{0..5}"
 * ```
 *
 * @since 0.1.0
 * @category mutations
 */
export const addInterval: {
  <V>(interval: IntervalInput<V>): <I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>) => IntervalSet<V, I, D>
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, interval: IntervalInput<V>): IntervalSet<V, I, D>
} = dual(
  2,
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, interval: IntervalInput<V>): IntervalSet<V, I, D> => {
    const input = self.strategy.fromInput(interval)
    if (Option.isSome(input)) {
      Engine.insert(self.strategy, self.intervals, input.value)
    }
    return self
  }
)

/**
 * Adds every value of `that` to the set, in place.
 *
 * @since 0.1.0
 * @category mutations
 */
export const addAll: {
  <V, I, D extends Domain.Domain<V>>(that: IntervalSet<V, I, D>): (self: IntervalSet<V, I, D>) => IntervalSet<V, I, D>
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, that: IntervalSet<V, I, D>): IntervalSet<V, I, D>
} = dual(
  2,
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, that: IntervalSet<V, I, D>): IntervalSet<V, I, D> => {
    for (const interval of Arr.copy(that.intervals)) {
      Engine.insert(self.strategy, self.intervals, interval)
    }
    return self
  }
)

/**
 * Removes a value from the set, in place. Values outside the domain are
 * ignored.
 *
 * @example
 * ```ts
 * import * as Domain from "interval-sets/Domain"
 * import * as IntervalSet from "interval-sets/IntervalSet"
 * import * as Range from "interval-sets/Range"
 *
 * const set = IntervalSet.fromIntervals(Domain.integer, [Range.make(1, 10)])
 * IntervalSet.remove(set, 5)
 * String(set) // "{1..4, 6..10}"
 * ```
 *
 * @since 0.1.0
 * @category mutations
 */
export const remove: {
  <V>(value: V): <I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>) => IntervalSet<V, I, D>
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, value: V): IntervalSet<V, I, D>
} = dual(
  2,
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, value: V): IntervalSet<V, I, D> => {
    const single = self.strategy.fromValue(value)
    if (Option.isSome(single)) {
      Engine.remove(self.strategy, self.intervals, single.value)
    }
    return self
  }
)

/**
 * Removes every value of an interval from the set, in place. Empty intervals
 * are ignored.
 *
 * @since 0.1.0
 * @category mutations
 */
export const removeInterval: {
  <V>(interval: IntervalInput<V>): <I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>) => IntervalSet<V, I, D>
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, interval: IntervalInput<V>): IntervalSet<V, I, D>
} = dual(
  2,
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, interval: IntervalInput<V>): IntervalSet<V, I, D> => {
    const input = self.strategy.fromInput(interval)
    if (Option.isSome(input)) {
      Engine.remove(self.strategy, self.intervals, input.value)
    }
    return self
  }
)

/**
 * Removes every value of `that` from the set, in place.
 *
 * @since 0.1.0
 * @category mutations
 */
export const removeAll: {
  <V, I, D extends Domain.Domain<V>>(that: IntervalSet<V, I, D>): (self: IntervalSet<V, I, D>) => IntervalSet<V, I, D>
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, that: IntervalSet<V, I, D>): IntervalSet<V, I, D>
} = dual(
  2,
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, that: IntervalSet<V, I, D>): IntervalSet<V, I, D> => {
    for (const interval of Arr.copy(that.intervals)) {
      Engine.remove(self.strategy, self.intervals, interval)
    }
    return self
  }
)

// =============================================================================
// Getters
// =============================================================================

/**
 * True if `value` is a member of the set.
 *
 * @since 0.1.0
 * @category getters
 */
export const has: {
  <V>(value: V): <I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>) => boolean
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, value: V): boolean
} = dual(
  2,
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, value: V): boolean =>
    Option.isSome(Engine.indexOfValue(self.strategy, self.intervals, value))
)

/**
 * True if every value of `interval` is a member of the set. Always false for
 * an empty interval.
 *
 * @example
 * ```ts
 * import * as Domain from "interval-sets/Domain"
 * import * as IntervalSet from "interval-sets/IntervalSet"
 * import * as Range from "interval-sets/Range"
 *
 * const set = IntervalSet.fromIntervals(Domain.integer, [Range.make(1, 2), Range.make(5, 40)])
 * IntervalSet.hasInterval(set, Range.make(1, 2)) // true
 * IntervalSet.hasInterval(set, Range.make(3, 5)) // false
 * ```
 *
 * @since 0.1.0
 * @category getters
 */
export const hasInterval: {
  <V>(interval: IntervalInput<V>): <I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>) => boolean
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, interval: IntervalInput<V>): boolean
} = dual(
  2,
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, interval: IntervalInput<V>): boolean =>
    Option.match(self.strategy.fromInput(interval), {
      onNone: () => false,
      onSome: (input) => Engine.containsInterval(self.strategy, self.intervals, input)
    })
)

/**
 * True if every value of `that` is a member of `self`.
 *
 * An empty `self` contains nothing, not even the empty set.
 *
 * @since 0.1.0
 * @category getters
 */
export const containsAll: {
  <V, I, D extends Domain.Domain<V>>(that: IntervalSet<V, I, D>): (self: IntervalSet<V, I, D>) => boolean
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, that: IntervalSet<V, I, D>): boolean
} = dual(
  2,
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, that: IntervalSet<V, I, D>): boolean =>
    self.intervals.length > 0 &&
    that.intervals.every((interval) => Engine.containsInterval(self.strategy, self.intervals, interval))
)

/**
 * @since 0.1.0
 * @category getters
 */
export const isEmpty = <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>): boolean =>
  self.intervals.length === 0

/**
 * The number of values in a set over a discrete domain.
 *
 * Exact up to `Number.MAX_SAFE_INTEGER`; use `bigSize` for larger sets.
 *
 * @since 0.1.0
 * @category getters
 */
export const size = <V>(self: DiscreteSet<V>): number => {
  const sizeOf = Range.size(self.domain)
  return self.intervals.reduce((total, range) => total + sizeOf(range), 0)
}

/**
 * The exact number of values in a set over a discrete domain.
 *
 * @example
 * ```ts
 * import * as Domain from "interval-sets/Domain"
 * import * as IntervalSet from "interval-sets/IntervalSet"
 *
 * IntervalSet.bigSize(IntervalSet.universe(Domain.integer)) // 18014398509481983n
 * ```
 *
 * @since 0.1.0
 * @category getters
 */
export const bigSize = <V>(self: DiscreteSet<V>): bigint => {
  const sizeOf = Range.bigSize(self.domain)
  return self.intervals.reduce((total, range) => total + sizeOf(range), 0n)
}

/**
 * The number of stored intervals.
 *
 * @since 0.1.0
 * @category getters
 */
export const intervalCount = <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>): number =>
  self.intervals.length

/**
 * The interval at `index`. Negative indices count from the end, `-1` being
 * the last interval.
 *
 * @since 0.1.0
 * @category getters
 */
export const getInterval: {
  (index: number): <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>) => Option.Option<I>
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, index: number): Option.Option<I>
} = dual(
  2,
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, index: number): Option.Option<I> =>
    Arr.get(self.intervals, index < 0 ? self.intervals.length + index : index)
)

/**
 * The stored intervals in ascending order.
 *
 * @since 0.1.0
 * @category getters
 */
export const intervals = <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>): Iterable<I> => ({
  [Symbol.iterator]: () => self.intervals[Symbol.iterator]()
})

/**
 * Every member of a set over a discrete domain, in ascending order.
 *
 * @example
 * ```ts
 * import * as Domain from "interval-sets/Domain"
 * import * as IntervalSet from "interval-sets/IntervalSet"
 * import * as Range from "interval-sets/Range"
 *
 * const set = IntervalSet.fromIntervals(Domain.integer, [Range.make(1, 3), Range.make(7, 8)])
 * Array.from(IntervalSet.values(set)) // [1, 2, 3, 7, 8]
 * ```
 *
 * @since 0.1.0
 * @category getters
 */
export const values = <V>(self: DiscreteSet<V>): Iterable<V> => {
  const valuesOf = Range.values(self.domain)
  return {
    *[Symbol.iterator]() {
      for (const range of self.intervals) {
        yield* valuesOf(range)
      }
    }
  }
}

// =============================================================================
// Set Algebra
// =============================================================================

/**
 * Every value of the domain that is not in the set.
 *
 * @example
 * ```ts
 * import * as Domain from "interval-sets/Domain"
 * import * as Interval from "interval-sets/Interval"
 * import * as IntervalSet from "interval-sets/IntervalSet"
 *
 * const set = IntervalSet.fromIntervals(Domain.real, [Interval.closed(0, 1)])
 * String(IntervalSet.complement(set)) // "{-Infinity..<0, 1<..Infinity}"
 * ```
 *
 * @since 0.1.0
 * @category set algebra
 */
export const complement = <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>): IntervalSet<V, I, D> =>
  removeAll(make(self.domain, self.strategy, [self.strategy.universe]), self)

/**
 * The values in either set.
 *
 * @since 0.1.0
 * @category set algebra
 */
export const union: {
  <V, I, D extends Domain.Domain<V>>(that: IntervalSet<V, I, D>): (self: IntervalSet<V, I, D>) => IntervalSet<V, I, D>
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, that: IntervalSet<V, I, D>): IntervalSet<V, I, D>
} = dual(
  2,
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, that: IntervalSet<V, I, D>): IntervalSet<V, I, D> =>
    addAll(copy(self), that)
)

/**
 * The values of `self` that are not in `that`.
 *
 * @since 0.1.0
 * @category set algebra
 */
export const difference: {
  <V, I, D extends Domain.Domain<V>>(that: IntervalSet<V, I, D>): (self: IntervalSet<V, I, D>) => IntervalSet<V, I, D>
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, that: IntervalSet<V, I, D>): IntervalSet<V, I, D>
} = dual(
  2,
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, that: IntervalSet<V, I, D>): IntervalSet<V, I, D> =>
    removeAll(copy(self), that)
)

/**
 * The values in both sets, computed by removing from `self` everything
 * outside `that`.
 *
 * @example
 * ```ts
 * import * as Domain from "interval-sets/Domain"
 * import * as IntervalSet from "interval-sets/IntervalSet"
 * import * as Range from "interval-sets/Range"
 *
 * const letters = IntervalSet.fromIntervals(Domain.char, [Range.make("a", "d")])
 * const picked = IntervalSet.fromValues(Domain.char, ["b", "d"])
 * String(IntervalSet.intersection(letters, picked)) // "{\"b\", \"d\"}"
 * ```
 *
 * @since 0.1.0
 * @category set algebra
 */
export const intersection: {
  <V, I, D extends Domain.Domain<V>>(that: IntervalSet<V, I, D>): (self: IntervalSet<V, I, D>) => IntervalSet<V, I, D>
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, that: IntervalSet<V, I, D>): IntervalSet<V, I, D>
} = dual(
  2,
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, that: IntervalSet<V, I, D>): IntervalSet<V, I, D> =>
    removeAll(copy(self), complement(that))
)

/**
 * The values in exactly one of the two sets.
 *
 * @since 0.1.0
 * @category set algebra
 */
export const symmetricDifference: {
  <V, I, D extends Domain.Domain<V>>(that: IntervalSet<V, I, D>): (self: IntervalSet<V, I, D>) => IntervalSet<V, I, D>
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, that: IntervalSet<V, I, D>): IntervalSet<V, I, D>
} = dual(
  2,
  <V, I, D extends Domain.Domain<V>>(self: IntervalSet<V, I, D>, that: IntervalSet<V, I, D>): IntervalSet<V, I, D> =>
    addAll(difference(self, that), difference(that, self))
)
