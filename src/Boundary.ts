/**
 * Boundaries (cut points) between domain values.
 *
 * A boundary divides a domain into the values below it and the values above
 * it. No value ever sits on a boundary, so an endpoint's open or closed nature
 * is carried by which side of its value the boundary lies on:
 *
 * - `below(v)` is the cut immediately before `v`; a range starting there
 *   includes `v`.
 * - `above(v)` is the cut immediately after `v`; a range ending there
 *   includes `v`.
 *
 * In a discrete domain `above(v)` and `below(succ(v))` are the same cut and
 * compare as equal.
 *
 * @since 0.1.0
 */

import * as Either from "effect/Either"
import { dual } from "effect/Function"
import * as Order from "effect/Order"
import * as Domain from "./Domain.js"

// =============================================================================
// Models
// =============================================================================

/**
 * Which side of its value a boundary lies on.
 *
 * @since 0.1.0
 * @category models
 */
export type Side = "Below" | "Above"

/**
 * @since 0.1.0
 * @category models
 */
export interface Boundary<V> {
  readonly side: Side
  readonly value: V
}

// =============================================================================
// Constructors
// =============================================================================

/**
 * The boundary immediately below `value`.
 *
 * @since 0.1.0
 * @category constructors
 */
export const below = <V>(value: V): Boundary<V> => ({ side: "Below", value })

/**
 * The boundary immediately above `value`.
 *
 * @since 0.1.0
 * @category constructors
 */
export const above = <V>(value: V): Boundary<V> => ({ side: "Above", value })

// =============================================================================
// Guards
// =============================================================================

/**
 * @since 0.1.0
 * @category guards
 */
export const isBelow = <V>(self: Boundary<V>): boolean => self.side === "Below"

/**
 * @since 0.1.0
 * @category guards
 */
export const isAbove = <V>(self: Boundary<V>): boolean => self.side === "Above"

// =============================================================================
// Ordering
// =============================================================================

/**
 * The order of boundaries in `domain`.
 *
 * Boundaries on the same side order by value. `below(x)` sorts after
 * `above(y)` when `x > y`, except in a discrete domain where `x` directly
 * follows `y`: those two are the same cut.
 *
 * @example
 * ```ts
 * import * as Boundary from "interval-sets/Boundary"
 * import * as Domain from "interval-sets/Domain"
 *
 * const O = Boundary.getOrder(Domain.integer)
 * O(Boundary.above(1), Boundary.below(2)) // 0
 * O(Boundary.below(1), Boundary.above(1)) // -1
 *
 * const R = Boundary.getOrder(Domain.real)
 * R(Boundary.above(1), Boundary.below(2)) // -1
 * ```
 *
 * @since 0.1.0
 * @category ordering
 */
export const getOrder = <V>(domain: Domain.Domain<V>): Order.Order<Boundary<V>> =>
  Order.make((self, that) => {
    const byValue = domain.order(self.value, that.value)
    if (self.side === that.side) {
      return byValue
    }
    if (self.side === "Below") {
      if (byValue <= 0) return -1
      return Domain.adjacent(domain, that.value, self.value) ? 0 : 1
    }
    if (byValue >= 0) return 1
    return Domain.adjacent(domain, self.value, that.value) ? 0 : -1
  })

/**
 * @since 0.1.0
 * @category ordering
 */
export const equals = <V>(domain: Domain.Domain<V>): {
  (that: Boundary<V>): (self: Boundary<V>) => boolean
  (self: Boundary<V>, that: Boundary<V>): boolean
} => {
  const O = getOrder(domain)
  return dual(2, (self: Boundary<V>, that: Boundary<V>): boolean => O(self, that) === 0)
}

/**
 * @since 0.1.0
 * @category ordering
 */
export const lessThan = <V>(domain: Domain.Domain<V>) => Order.lessThan(getOrder(domain))

/**
 * @since 0.1.0
 * @category ordering
 */
export const lessThanOrEqualTo = <V>(domain: Domain.Domain<V>) => Order.lessThanOrEqualTo(getOrder(domain))

/**
 * @since 0.1.0
 * @category ordering
 */
export const greaterThan = <V>(domain: Domain.Domain<V>) => Order.greaterThan(getOrder(domain))

/**
 * @since 0.1.0
 * @category ordering
 */
export const greaterThanOrEqualTo = <V>(domain: Domain.Domain<V>) => Order.greaterThanOrEqualTo(getOrder(domain))

/**
 * True if the boundary lies below `value`, that is `value` is on its upper
 * side.
 *
 * @example
 * ```ts
 * import * as Boundary from "interval-sets/Boundary"
 * import * as Domain from "interval-sets/Domain"
 *
 * const isBelowValue = Boundary.isBelowValue(Domain.integer)
 * isBelowValue(Boundary.below(0), 0) // true
 * isBelowValue(Boundary.above(0), 0) // false
 * ```
 *
 * @since 0.1.0
 * @category ordering
 */
export const isBelowValue = <V>(domain: Domain.Domain<V>): {
  (value: V): (self: Boundary<V>) => boolean
  (self: Boundary<V>, value: V): boolean
} =>
  dual(2, (self: Boundary<V>, value: V): boolean =>
    self.side === "Below"
      ? domain.order(self.value, value) <= 0
      : domain.order(self.value, value) < 0)

/**
 * True if the boundary lies above `value`, that is `value` is on its lower
 * side.
 *
 * @since 0.1.0
 * @category ordering
 */
export const isAboveValue = <V>(domain: Domain.Domain<V>): {
  (value: V): (self: Boundary<V>) => boolean
  (self: Boundary<V>, value: V): boolean
} =>
  dual(2, (self: Boundary<V>, value: V): boolean =>
    self.side === "Below"
      ? domain.order(value, self.value) < 0
      : domain.order(value, self.value) <= 0)

// =============================================================================
// Adjacent Values
// =============================================================================

/**
 * The value immediately above the boundary.
 *
 * Fails with a `DomainError` when the boundary is above a value of a dense
 * domain, or above the maximum of a discrete domain.
 *
 * @example
 * ```ts
 * import * as Boundary from "interval-sets/Boundary"
 * import * as Domain from "interval-sets/Domain"
 *
 * Boundary.valueAbove(Domain.integer)(Boundary.below(0)) // Either.right(0)
 * Boundary.valueAbove(Domain.integer)(Boundary.above(0)) // Either.right(1)
 * ```
 *
 * @since 0.1.0
 * @category getters
 */
export const valueAbove = <V>(domain: Domain.Domain<V>) =>
(self: Boundary<V>): Either.Either<V, Domain.DomainError> => {
  if (self.side === "Below") {
    return Either.right(self.value)
  }
  if (domain._tag === "Dense") {
    return Either.left(
      new Domain.DomainError({ message: `value above ${domain.format(self.value)} is undefined in dense domain ${domain.name}` })
    )
  }
  return Either.fromOption(
    Domain.successor(domain, self.value),
    () => new Domain.DomainError({ message: `no value above ${domain.format(self.value)} in ${domain.name}` })
  )
}

/**
 * The value immediately below the boundary.
 *
 * Fails with a `DomainError` when the boundary is below a value of a dense
 * domain, or below the minimum of a discrete domain.
 *
 * @since 0.1.0
 * @category getters
 */
export const valueBelow = <V>(domain: Domain.Domain<V>) =>
(self: Boundary<V>): Either.Either<V, Domain.DomainError> => {
  if (self.side === "Above") {
    return Either.right(self.value)
  }
  if (domain._tag === "Dense") {
    return Either.left(
      new Domain.DomainError({ message: `value below ${domain.format(self.value)} is undefined in dense domain ${domain.name}` })
    )
  }
  return Either.fromOption(
    Domain.predecessor(domain, self.value),
    () => new Domain.DomainError({ message: `no value below ${domain.format(self.value)} in ${domain.name}` })
  )
}

/**
 * Like `valueAbove`, throwing the `DomainError` instead of returning it.
 *
 * @since 0.1.0
 * @category unsafe
 */
export const unsafeValueAbove = <V>(domain: Domain.Domain<V>) => {
  const get = valueAbove(domain)
  return (self: Boundary<V>): V =>
    Either.getOrThrowWith(get(self), (error) => error)
}

/**
 * Like `valueBelow`, throwing the `DomainError` instead of returning it.
 *
 * @since 0.1.0
 * @category unsafe
 */
export const unsafeValueBelow = <V>(domain: Domain.Domain<V>) => {
  const get = valueBelow(domain)
  return (self: Boundary<V>): V =>
    Either.getOrThrowWith(get(self), (error) => error)
}

// =============================================================================
// Formatting
// =============================================================================

/**
 * Renders `below(v)` as `"<v"` and `above(v)` as `"v>"`.
 *
 * @since 0.1.0
 * @category formatting
 */
export const format = <V>(domain: Domain.Domain<V>) => (self: Boundary<V>): string =>
  self.side === "Below" ? `<${domain.format(self.value)}` : `${domain.format(self.value)}>`
