/**
 * Inclusive value ranges over discrete domains.
 *
 * In a discrete domain every endpoint can be expressed as a closed one, so an
 * interval is stored as the plain pair of its first and last member. The
 * boundaries are derived on demand: `lower = below(start)` and
 * `upper = above(end)`.
 *
 * A range is empty when `start` is after `end`.
 *
 * @since 0.1.0
 */

import * as Equivalence from "effect/Equivalence"
import { dual, pipe } from "effect/Function"
import * as Hash from "effect/Hash"
import * as Option from "effect/Option"
import * as Order from "effect/Order"
import * as Boundary from "./Boundary.js"
import * as Domain from "./Domain.js"
import type * as Interval from "./Interval.js"

// =============================================================================
// Models
// =============================================================================

/**
 * @since 0.1.0
 * @category models
 */
export interface Range<V> {
  readonly _tag: "Range"
  readonly start: V
  readonly end: V
}

// =============================================================================
// Constructors
// =============================================================================

/**
 * The values from `start` to `end`, both included.
 *
 * @since 0.1.0
 * @category constructors
 */
export const make = <V>(start: V, end: V): Range<V> => ({ _tag: "Range", start, end })

/**
 * @since 0.1.0
 * @category constructors
 */
export const singleton = <V>(value: V): Range<V> => make(value, value)

/**
 * Converts a boundary pair into the range of values between the boundaries.
 *
 * Returns `None` when no value of the domain lies between them.
 *
 * @example
 * ```ts
 * import * as Domain from "interval-sets/Domain"
 * import * as Interval from "interval-sets/Interval"
 * import * as Range from "interval-sets/Range"
 *
 * Range.fromInterval(Domain.integer)(Interval.open(0, 4)) // Some(1..3)
 * Range.fromInterval(Domain.integer)(Interval.open(0, 1)) // None
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const fromInterval = <V>(domain: Domain.Discrete<V>) => {
  const keep = nonEmpty(domain)
  return (interval: Interval.Interval<V>): Option.Option<Range<V>> => {
    const start = interval.lower.side === "Below"
      ? Option.some(interval.lower.value)
      : Domain.successor(domain, interval.lower.value)
    const end = interval.upper.side === "Above"
      ? Option.some(interval.upper.value)
      : Domain.predecessor(domain, interval.upper.value)
    return pipe(
      Option.zipWith(start, end, (first, last) => make(first, last)),
      Option.flatMap(keep)
    )
  }
}

// =============================================================================
// Getters
// =============================================================================

/**
 * @since 0.1.0
 * @category getters
 */
export const lower = <V>(self: Range<V>): Boundary.Boundary<V> => Boundary.below(self.start)

/**
 * @since 0.1.0
 * @category getters
 */
export const upper = <V>(self: Range<V>): Boundary.Boundary<V> => Boundary.above(self.end)

/**
 * The number of values in the range.
 *
 * Counts above `Number.MAX_SAFE_INTEGER` lose precision; see `bigSize`.
 *
 * @since 0.1.0
 * @category getters
 */
export const size = <V>(domain: Domain.Discrete<V>) => (self: Range<V>): number =>
  Math.max(0, domain.ordinal(self.end) - domain.ordinal(self.start) + 1)

/**
 * The exact number of values in the range.
 *
 * @since 0.1.0
 * @category getters
 */
export const bigSize = <V>(domain: Domain.Discrete<V>) => (self: Range<V>): bigint => {
  const count = BigInt(domain.ordinal(self.end)) - BigInt(domain.ordinal(self.start)) + 1n
  return count > 0n ? count : 0n
}

/**
 * Every value of the range in ascending order.
 *
 * @example
 * ```ts
 * import * as Domain from "interval-sets/Domain"
 * import * as Range from "interval-sets/Range"
 *
 * Array.from(Range.values(Domain.char)(Range.make("a", "d"))) // ["a", "b", "c", "d"]
 * ```
 *
 * @since 0.1.0
 * @category getters
 */
export const values = <V>(domain: Domain.Discrete<V>) => (self: Range<V>): Iterable<V> => ({
  *[Symbol.iterator]() {
    const last = domain.ordinal(self.end)
    for (let n = domain.ordinal(self.start); n <= last; n++) {
      yield domain.fromOrdinal(n)
    }
  }
})

/**
 * The same values as a closed boundary pair.
 *
 * @since 0.1.0
 * @category getters
 */
export const toInterval = <V>(self: Range<V>): Interval.Interval<V> => ({
  _tag: "Interval",
  lower: lower(self),
  upper: upper(self)
})

// =============================================================================
// Predicates
// =============================================================================

/**
 * @since 0.1.0
 * @category predicates
 */
export const isEmpty = <V>(domain: Domain.Domain<V>) => (self: Range<V>): boolean =>
  domain.order(self.start, self.end) > 0

/**
 * @since 0.1.0
 * @category predicates
 */
export const isSingleton = <V>(domain: Domain.Domain<V>) => (self: Range<V>): boolean =>
  domain.order(self.start, self.end) === 0

/**
 * @since 0.1.0
 * @category predicates
 */
export const contains = <V>(domain: Domain.Domain<V>): {
  (value: V): (self: Range<V>) => boolean
  (self: Range<V>, value: V): boolean
} =>
  dual(2, (self: Range<V>, value: V): boolean =>
    domain.order(self.start, value) <= 0 && domain.order(value, self.end) <= 0)

/**
 * True if `self` encloses `that`. Empty ranges neither enclose nor are
 * enclosed.
 *
 * @since 0.1.0
 * @category predicates
 */
export const containsRange = <V>(domain: Domain.Domain<V>): {
  (that: Range<V>): (self: Range<V>) => boolean
  (self: Range<V>, that: Range<V>): boolean
} => {
  const empty = isEmpty(domain)
  return dual(2, (self: Range<V>, that: Range<V>): boolean =>
    !empty(self) && !empty(that) &&
    domain.order(self.start, that.start) <= 0 && domain.order(that.end, self.end) <= 0)
}

/**
 * True if the ranges share a value or are adjacent, so that their union is a
 * single range.
 *
 * @example
 * ```ts
 * import * as Domain from "interval-sets/Domain"
 * import * as Range from "interval-sets/Range"
 *
 * const overlaps = Range.overlaps(Domain.integer)
 * overlaps(Range.make(1, 2), Range.make(2, 3)) // true
 * overlaps(Range.make(1, 2), Range.make(3, 4)) // true
 * overlaps(Range.make(1, 2), Range.make(4, 5)) // false
 * ```
 *
 * @since 0.1.0
 * @category predicates
 */
export const overlaps = <V>(domain: Domain.Discrete<V>): {
  (that: Range<V>): (self: Range<V>) => boolean
  (self: Range<V>, that: Range<V>): boolean
} => {
  const empty = isEmpty(domain)
  return dual(2, (self: Range<V>, that: Range<V>): boolean =>
    !empty(self) && !empty(that) &&
    domain.ordinal(self.end) + 1 >= domain.ordinal(that.start) &&
    domain.ordinal(that.end) + 1 >= domain.ordinal(self.start))
}

// =============================================================================
// Operations
// =============================================================================

/**
 * `Some(self)` unless the range is empty.
 *
 * @since 0.1.0
 * @category operations
 */
export const nonEmpty = <V>(domain: Domain.Domain<V>) => {
  const empty = isEmpty(domain)
  return (self: Range<V>): Option.Option<Range<V>> => empty(self) ? Option.none() : Option.some(self)
}

/**
 * The values in both ranges. May be empty.
 *
 * @since 0.1.0
 * @category operations
 */
export const intersection = <V>(domain: Domain.Domain<V>): {
  (that: Range<V>): (self: Range<V>) => Range<V>
  (self: Range<V>, that: Range<V>): Range<V>
} => {
  const max = Order.max(domain.order)
  const min = Order.min(domain.order)
  return dual(2, (self: Range<V>, that: Range<V>): Range<V> =>
    make(max(self.start, that.start), min(self.end, that.end)))
}

/**
 * The smallest range enclosing both ranges.
 *
 * @since 0.1.0
 * @category operations
 */
export const extent = <V>(domain: Domain.Domain<V>): {
  (that: Range<V>): (self: Range<V>) => Range<V>
  (self: Range<V>, that: Range<V>): Range<V>
} => {
  const max = Order.max(domain.order)
  const min = Order.min(domain.order)
  return dual(2, (self: Range<V>, that: Range<V>): Range<V> =>
    make(min(self.start, that.start), max(self.end, that.end)))
}

/**
 * The parts of `self` below and above `that`, each `None` when empty.
 *
 * A part that would have to start past the edge of the domain is `None`.
 *
 * @example
 * ```ts
 * import * as Domain from "interval-sets/Domain"
 * import * as Range from "interval-sets/Range"
 *
 * Range.difference(Domain.integer)(Range.make(0, 4), Range.make(1, 2))
 * // [Some(0..0), Some(3..4)]
 * ```
 *
 * @since 0.1.0
 * @category operations
 */
export const difference = <V>(domain: Domain.Discrete<V>): {
  (that: Range<V>): (self: Range<V>) => readonly [Option.Option<Range<V>>, Option.Option<Range<V>>]
  (self: Range<V>, that: Range<V>): readonly [Option.Option<Range<V>>, Option.Option<Range<V>>]
} => {
  const keep = nonEmpty(domain)
  return dual(2, (self: Range<V>, that: Range<V>) =>
    [
      pipe(
        Domain.predecessor(domain, that.start),
        Option.flatMap((end) => keep(make(self.start, end)))
      ),
      pipe(
        Domain.successor(domain, that.end),
        Option.flatMap((start) => keep(make(start, self.end)))
      )
    ] as const)
}

// =============================================================================
// Instances
// =============================================================================

/**
 * Orders ranges by start then end. Empty ranges come first.
 *
 * @since 0.1.0
 * @category instances
 */
export const getOrder = <V>(domain: Domain.Domain<V>): Order.Order<Range<V>> => {
  const empty = isEmpty(domain)
  const byValues = Order.combine(
    Order.mapInput(domain.order, (self: Range<V>) => self.start),
    Order.mapInput(domain.order, (self: Range<V>) => self.end)
  )
  return Order.make((self, that) => {
    const selfEmpty = empty(self)
    const thatEmpty = empty(that)
    if (selfEmpty || thatEmpty) {
      return selfEmpty && thatEmpty ? 0 : selfEmpty ? -1 : 1
    }
    return byValues(self, that)
  })
}

/**
 * @since 0.1.0
 * @category instances
 */
export const getEquivalence = <V>(domain: Domain.Domain<V>): Equivalence.Equivalence<Range<V>> => {
  const O = getOrder(domain)
  return Equivalence.make((self, that) => O(self, that) === 0)
}

/**
 * @since 0.1.0
 * @category instances
 */
export const hash = <V>(domain: Domain.Domain<V>) => (self: Range<V>): number =>
  pipe(
    domain.hash(self.start),
    Hash.combine(domain.hash(self.end)),
    Hash.optimize
  )

// =============================================================================
// Formatting
// =============================================================================

/**
 * Renders `0..4` as `"0..4"` and a single value range as the value alone.
 *
 * @since 0.1.0
 * @category formatting
 */
export const format = <V>(domain: Domain.Domain<V>) => (self: Range<V>): string =>
  domain.order(self.start, self.end) === 0
    ? domain.format(self.start)
    : `${domain.format(self.start)}..${domain.format(self.end)}`
