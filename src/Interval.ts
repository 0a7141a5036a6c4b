/**
 * Intervals delimited by a pair of boundaries.
 *
 * This is the representation used for dense domains, where an endpoint can
 * be open or closed independently on each side. Every endpoint combination is
 * expressed by pairing `Boundary.below` and `Boundary.above`:
 *
 * | notation | lower       | upper       |
 * | -------- | ----------- | ----------- |
 * | `[a, b]` | `below(a)`  | `above(b)`  |
 * | `(a, b)` | `above(a)`  | `below(b)`  |
 * | `[a, b)` | `below(a)`  | `below(b)`  |
 * | `(a, b]` | `above(a)`  | `above(b)`  |
 *
 * An interval is empty when its upper boundary is not above its lower one.
 *
 * @since 0.1.0
 */

import * as Equivalence from "effect/Equivalence"
import { dual, pipe } from "effect/Function"
import * as Hash from "effect/Hash"
import * as Option from "effect/Option"
import * as Order from "effect/Order"
import * as Boundary from "./Boundary.js"
import type * as Domain from "./Domain.js"

// =============================================================================
// Models
// =============================================================================

/**
 * @since 0.1.0
 * @category models
 */
export interface Interval<V> {
  readonly _tag: "Interval"
  readonly lower: Boundary.Boundary<V>
  readonly upper: Boundary.Boundary<V>
}

// =============================================================================
// Constructors
// =============================================================================

/**
 * @since 0.1.0
 * @category constructors
 */
export const make = <V>(lower: Boundary.Boundary<V>, upper: Boundary.Boundary<V>): Interval<V> => ({
  _tag: "Interval",
  lower,
  upper
})

/**
 * `[start, end]`
 *
 * @since 0.1.0
 * @category constructors
 */
export const closed = <V>(start: V, end: V): Interval<V> => make(Boundary.below(start), Boundary.above(end))

/**
 * `(start, end)`
 *
 * @since 0.1.0
 * @category constructors
 */
export const open = <V>(start: V, end: V): Interval<V> => make(Boundary.above(start), Boundary.below(end))

/**
 * `[start, end)`
 *
 * @since 0.1.0
 * @category constructors
 */
export const closedOpen = <V>(start: V, end: V): Interval<V> => make(Boundary.below(start), Boundary.below(end))

/**
 * `(start, end]`
 *
 * @since 0.1.0
 * @category constructors
 */
export const openClosed = <V>(start: V, end: V): Interval<V> => make(Boundary.above(start), Boundary.above(end))

/**
 * `[value, value]`
 *
 * @since 0.1.0
 * @category constructors
 */
export const singleton = <V>(value: V): Interval<V> => closed(value, value)

// =============================================================================
// Predicates
// =============================================================================

/**
 * @since 0.1.0
 * @category predicates
 */
export const isOpenBelow = <V>(self: Interval<V>): boolean => self.lower.side === "Above"

/**
 * @since 0.1.0
 * @category predicates
 */
export const isOpenAbove = <V>(self: Interval<V>): boolean => self.upper.side === "Below"

/**
 * @since 0.1.0
 * @category predicates
 */
export const isOpen = <V>(self: Interval<V>): boolean => isOpenBelow(self) && isOpenAbove(self)

/**
 * @since 0.1.0
 * @category predicates
 */
export const isClosed = <V>(self: Interval<V>): boolean => !isOpenBelow(self) && !isOpenAbove(self)

/**
 * True if the upper boundary is at or below the lower boundary.
 *
 * @example
 * ```ts
 * import * as Domain from "interval-sets/Domain"
 * import * as Interval from "interval-sets/Interval"
 *
 * const isEmpty = Interval.isEmpty(Domain.real)
 * isEmpty(Interval.closed(2, 1)) // true
 * isEmpty(Interval.open(1, 1)) // true
 * isEmpty(Interval.singleton(1)) // false
 * ```
 *
 * @since 0.1.0
 * @category predicates
 */
export const isEmpty = <V>(domain: Domain.Domain<V>) => {
  const O = Boundary.getOrder(domain)
  return (self: Interval<V>): boolean => O(self.upper, self.lower) <= 0
}

/**
 * True if the interval holds exactly one value.
 *
 * @since 0.1.0
 * @category predicates
 */
export const isSingleton = <V>(domain: Domain.Domain<V>) => (self: Interval<V>): boolean =>
  isClosed(self) && domain.order(self.lower.value, self.upper.value) === 0

/**
 * True if `value` lies inside the interval.
 *
 * @since 0.1.0
 * @category predicates
 */
export const contains = <V>(domain: Domain.Domain<V>): {
  (value: V): (self: Interval<V>) => boolean
  (self: Interval<V>, value: V): boolean
} => {
  const isBelowValue = Boundary.isBelowValue(domain)
  const isAboveValue = Boundary.isAboveValue(domain)
  return dual(2, (self: Interval<V>, value: V): boolean =>
    isBelowValue(self.lower, value) && isAboveValue(self.upper, value))
}

/**
 * True if `self` encloses `that`. Empty intervals neither enclose nor are
 * enclosed.
 *
 * @since 0.1.0
 * @category predicates
 */
export const containsInterval = <V>(domain: Domain.Domain<V>): {
  (that: Interval<V>): (self: Interval<V>) => boolean
  (self: Interval<V>, that: Interval<V>): boolean
} => {
  const O = Boundary.getOrder(domain)
  const empty = isEmpty(domain)
  return dual(2, (self: Interval<V>, that: Interval<V>): boolean =>
    !empty(self) && !empty(that) &&
    O(self.lower, that.lower) <= 0 && O(that.upper, self.upper) <= 0)
}

/**
 * True if the two intervals overlap or touch, so that their union is a single
 * interval.
 *
 * @example
 * ```ts
 * import * as Domain from "interval-sets/Domain"
 * import * as Interval from "interval-sets/Interval"
 *
 * const overlaps = Interval.overlaps(Domain.real)
 * overlaps(Interval.closedOpen(0, 1), Interval.closed(1, 2)) // true
 * overlaps(Interval.closedOpen(0, 1), Interval.openClosed(1, 2)) // false
 * ```
 *
 * @since 0.1.0
 * @category predicates
 */
export const overlaps = <V>(domain: Domain.Domain<V>): {
  (that: Interval<V>): (self: Interval<V>) => boolean
  (self: Interval<V>, that: Interval<V>): boolean
} => {
  const O = Boundary.getOrder(domain)
  const empty = isEmpty(domain)
  return dual(2, (self: Interval<V>, that: Interval<V>): boolean =>
    !empty(self) && !empty(that) &&
    O(self.upper, that.lower) >= 0 && O(that.upper, self.lower) >= 0)
}

// =============================================================================
// Operations
// =============================================================================

/**
 * `Some(self)` unless the interval is empty.
 *
 * @since 0.1.0
 * @category operations
 */
export const nonEmpty = <V>(domain: Domain.Domain<V>) => {
  const empty = isEmpty(domain)
  return (self: Interval<V>): Option.Option<Interval<V>> => empty(self) ? Option.none() : Option.some(self)
}

/**
 * The values in both intervals. May be empty.
 *
 * @since 0.1.0
 * @category operations
 */
export const intersection = <V>(domain: Domain.Domain<V>): {
  (that: Interval<V>): (self: Interval<V>) => Interval<V>
  (self: Interval<V>, that: Interval<V>): Interval<V>
} => {
  const O = Boundary.getOrder(domain)
  const max = Order.max(O)
  const min = Order.min(O)
  return dual(2, (self: Interval<V>, that: Interval<V>): Interval<V> =>
    make(max(self.lower, that.lower), min(self.upper, that.upper)))
}

/**
 * The smallest interval enclosing both intervals.
 *
 * @since 0.1.0
 * @category operations
 */
export const extent = <V>(domain: Domain.Domain<V>): {
  (that: Interval<V>): (self: Interval<V>) => Interval<V>
  (self: Interval<V>, that: Interval<V>): Interval<V>
} => {
  const O = Boundary.getOrder(domain)
  const max = Order.max(O)
  const min = Order.min(O)
  return dual(2, (self: Interval<V>, that: Interval<V>): Interval<V> =>
    make(min(self.lower, that.lower), max(self.upper, that.upper)))
}

/**
 * The parts of `self` below and above `that`, each `None` when empty.
 *
 * @example
 * ```ts
 * import * as Domain from "interval-sets/Domain"
 * import * as Interval from "interval-sets/Interval"
 *
 * Interval.difference(Domain.real)(Interval.closed(0, 4), Interval.closed(1, 2))
 * // [Some([0, 1)), Some((2, 4])]
 * ```
 *
 * @since 0.1.0
 * @category operations
 */
export const difference = <V>(domain: Domain.Domain<V>): {
  (that: Interval<V>): (self: Interval<V>) => readonly [Option.Option<Interval<V>>, Option.Option<Interval<V>>]
  (self: Interval<V>, that: Interval<V>): readonly [Option.Option<Interval<V>>, Option.Option<Interval<V>>]
} => {
  const keep = nonEmpty(domain)
  return dual(2, (self: Interval<V>, that: Interval<V>) =>
    [
      keep(make(self.lower, that.lower)),
      keep(make(that.upper, self.upper))
    ] as const)
}

// =============================================================================
// Instances
// =============================================================================

/**
 * Orders intervals by lower then upper boundary. Empty intervals come first.
 *
 * @since 0.1.0
 * @category instances
 */
export const getOrder = <V>(domain: Domain.Domain<V>): Order.Order<Interval<V>> => {
  const O = Boundary.getOrder(domain)
  const empty = isEmpty(domain)
  const byBoundaries = Order.combine(
    Order.mapInput(O, (self: Interval<V>) => self.lower),
    Order.mapInput(O, (self: Interval<V>) => self.upper)
  )
  return Order.make((self, that) => {
    const selfEmpty = empty(self)
    const thatEmpty = empty(that)
    if (selfEmpty || thatEmpty) {
      return selfEmpty && thatEmpty ? 0 : selfEmpty ? -1 : 1
    }
    return byBoundaries(self, that)
  })
}

/**
 * Two intervals are equivalent when both are empty or their boundaries are
 * equal.
 *
 * @since 0.1.0
 * @category instances
 */
export const getEquivalence = <V>(domain: Domain.Domain<V>): Equivalence.Equivalence<Interval<V>> => {
  const O = getOrder(domain)
  return Equivalence.make((self, that) => O(self, that) === 0)
}

/**
 * @since 0.1.0
 * @category instances
 */
export const hash = <V>(domain: Domain.Domain<V>) => (self: Interval<V>): number =>
  pipe(
    Hash.string(self.lower.side),
    Hash.combine(domain.hash(self.lower.value)),
    Hash.combine(Hash.string(self.upper.side)),
    Hash.combine(domain.hash(self.upper.value)),
    Hash.optimize
  )

// =============================================================================
// Formatting
// =============================================================================

/**
 * Renders `[0, 1]` as `"0..1"`, `[0, 1)` as `"0..<1"`, `(0, 1]` as `"0<..1"`
 * and `[2, 2]` as `"2"`.
 *
 * @since 0.1.0
 * @category formatting
 */
export const format = <V>(domain: Domain.Domain<V>) => {
  const singleton = isSingleton(domain)
  return (self: Interval<V>): string => {
    if (singleton(self)) {
      return domain.format(self.lower.value)
    }
    const openBelow = isOpenBelow(self) ? "<" : ""
    const openAbove = isOpenAbove(self) ? "<" : ""
    return `${domain.format(self.lower.value)}${openBelow}..${openAbove}${domain.format(self.upper.value)}`
  }
}
