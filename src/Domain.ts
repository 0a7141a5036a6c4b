/**
 * Ordered value domains.
 *
 * A domain tells the interval machinery how values of a type compare and
 * whether the type is discrete (every value has a well defined successor and
 * predecessor) or dense (between any two values there is always another one).
 *
 * Discrete domains describe their values through an integer ordinal mapping,
 * which gives adjacency, cardinality and enumeration for free. Dense domains
 * only need an `Order` and the two extreme values.
 *
 * The kind of a domain is inspected once, when a set is created, to select the
 * interval representation used for that set.
 *
 * @since 0.1.0
 */

import * as Data from "effect/Data"
import * as Hash from "effect/Hash"
import * as Option from "effect/Option"
import * as Order from "effect/Order"
import * as Predicate from "effect/Predicate"

// =============================================================================
// Symbols
// =============================================================================

/**
 * Domain type identifier.
 *
 * @since 0.1.0
 * @category symbols
 */
export const DomainTypeId: unique symbol = Symbol.for("interval-sets/Domain")

/**
 * Domain type identifier type.
 *
 * @since 0.1.0
 * @category symbols
 */
export type DomainTypeId = typeof DomainTypeId

// =============================================================================
// Models
// =============================================================================

/**
 * Properties shared by every domain.
 *
 * @since 0.1.0
 * @category models
 */
export interface DomainBase<V> {
  readonly [DomainTypeId]: DomainTypeId
  readonly name: string
  readonly order: Order.Order<V>
  readonly min: V
  readonly max: V
  readonly format: (value: V) => string
  readonly hash: (value: V) => number
}

/**
 * A domain whose values map one-to-one onto a contiguous range of integers.
 *
 * @since 0.1.0
 * @category models
 */
export interface Discrete<V> extends DomainBase<V> {
  readonly _tag: "Discrete"
  readonly ordinal: (value: V) => number
  readonly fromOrdinal: (ordinal: number) => V
}

/**
 * A domain with no notion of a next or previous value.
 *
 * @since 0.1.0
 * @category models
 */
export interface Dense<V> extends DomainBase<V> {
  readonly _tag: "Dense"
}

/**
 * @since 0.1.0
 * @category models
 */
export type Domain<V> = Discrete<V> | Dense<V>

// =============================================================================
// Errors
// =============================================================================

/**
 * Raised when a value is requested past the edge of a domain, when a dense
 * domain is asked for an adjacent value, or when a domain is configured with
 * invalid bounds.
 *
 * @since 0.1.0
 * @category errors
 */
export class DomainError extends Data.TaggedError("DomainError")<{
  readonly message: string
}> { }

// =============================================================================
// Type Guards
// =============================================================================

/**
 * @since 0.1.0
 * @category guards
 */
export const isDomain = (u: unknown): u is Domain<unknown> =>
  Predicate.hasProperty(u, DomainTypeId)

/**
 * @since 0.1.0
 * @category guards
 */
export const isDiscrete = <V>(self: Domain<V>): self is Discrete<V> => self._tag === "Discrete"

/**
 * @since 0.1.0
 * @category guards
 */
export const isDense = <V>(self: Domain<V>): self is Dense<V> => self._tag === "Dense"

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a discrete domain from an ordinal mapping.
 *
 * `ordinal` and `fromOrdinal` must be inverse to each other for every value
 * between `min` and `max`. Values are ordered, hashed and compared by their
 * ordinals. Unless `format` is given, primitive values render with `String`
 * and other values as `#` followed by their ordinal.
 *
 * @example
 * ```ts
 * import * as Domain from "interval-sets/Domain"
 *
 * const Weekday = ["mon", "tue", "wed", "thu", "fri", "sat", "sun"] as const
 * type Weekday = typeof Weekday[number]
 *
 * const weekday = Domain.discrete<Weekday>({
 *   name: "Weekday",
 *   ordinal: (day) => Weekday.indexOf(day),
 *   fromOrdinal: (n) => Weekday[n],
 *   min: "mon",
 *   max: "sun"
 * })
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const discrete = <V>(options: {
  readonly name: string
  readonly ordinal: (value: V) => number
  readonly fromOrdinal: (ordinal: number) => V
  readonly min: V
  readonly max: V
  readonly format?: (value: V) => string
  readonly hash?: (value: V) => number
}): Discrete<V> => ({
  [DomainTypeId]: DomainTypeId,
  _tag: "Discrete",
  name: options.name,
  order: Order.mapInput(Order.number, options.ordinal),
  ordinal: options.ordinal,
  fromOrdinal: options.fromOrdinal,
  min: options.min,
  max: options.max,
  format: options.format ?? ((value) => Predicate.isObject(value) ? `#${options.ordinal(value)}` : String(value)),
  hash: options.hash ?? ((value) => Hash.number(options.ordinal(value)))
})

/**
 * Creates a dense domain from an `Order` and its extreme values.
 *
 * The default `hash` is `Hash.hash`, which hashes plain objects by reference.
 * Domains over object values that should compare by content must pass a
 * `hash` consistent with `order`, or sets built on them will not be
 * `Equal` even when they hold the same intervals.
 *
 * @since 0.1.0
 * @category constructors
 */
export const dense = <V>(options: {
  readonly name: string
  readonly order: Order.Order<V>
  readonly min: V
  readonly max: V
  readonly format?: (value: V) => string
  readonly hash?: (value: V) => number
}): Dense<V> => ({
  [DomainTypeId]: DomainTypeId,
  _tag: "Dense",
  name: options.name,
  order: options.order,
  min: options.min,
  max: options.max,
  format: options.format ?? String,
  hash: options.hash ?? Hash.hash
})

/**
 * Safe integers, from `Number.MIN_SAFE_INTEGER` to `Number.MAX_SAFE_INTEGER`.
 *
 * @since 0.1.0
 * @category domains
 */
export const integer: Discrete<number> = discrete({
  name: "Integer",
  ordinal: (value) => value,
  fromOrdinal: (ordinal) => ordinal,
  min: Number.MIN_SAFE_INTEGER,
  max: Number.MAX_SAFE_INTEGER,
  hash: Hash.number
})

/**
 * Integers between `min` and `max`, both inclusive.
 *
 * Throws a `DomainError` when a bound is not a safe integer or when `min`
 * exceeds `max`.
 *
 * @example
 * ```ts
 * import * as Domain from "interval-sets/Domain"
 *
 * const byte = Domain.integerRange(0, 255)
 * ```
 *
 * @since 0.1.0
 * @category domains
 */
export const integerRange = (min: number, max: number): Discrete<number> => {
  if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max)) {
    throw new DomainError({ message: `integer range bounds must be safe integers, got ${min} and ${max}` })
  }
  if (min > max) {
    throw new DomainError({ message: `integer range lower bound ${min} exceeds upper bound ${max}` })
  }
  return discrete({
    name: `Integer[${min}..${max}]`,
    ordinal: (value) => value,
    fromOrdinal: (ordinal) => ordinal,
    min,
    max,
    hash: Hash.number
  })
}

/**
 * Single Unicode code points, ordered by code point.
 *
 * @since 0.1.0
 * @category domains
 */
export const char: Discrete<string> = discrete({
  name: "Char",
  ordinal: (value) => value.codePointAt(0) ?? 0,
  fromOrdinal: (ordinal) => String.fromCodePoint(ordinal),
  min: "\u0000",
  max: String.fromCodePoint(0x10ffff),
  format: (value) => JSON.stringify(value),
  hash: Hash.string
})

/**
 * Real numbers, including both infinities.
 *
 * @since 0.1.0
 * @category domains
 */
export const real: Dense<number> = dense({
  name: "Real",
  order: Order.number,
  min: Number.NEGATIVE_INFINITY,
  max: Number.POSITIVE_INFINITY,
  hash: Hash.number
})

/**
 * JavaScript dates over the whole representable time range.
 *
 * @since 0.1.0
 * @category domains
 */
export const date: Dense<Date> = dense({
  name: "Date",
  order: Order.Date,
  min: new Date(-8.64e15),
  max: new Date(8.64e15),
  format: (value) => value.toISOString(),
  hash: (value) => Hash.number(value.getTime())
})

// =============================================================================
// Operations
// =============================================================================

/**
 * True if `that` is the value immediately after `self`.
 *
 * Always false in a dense domain.
 *
 * @example
 * ```ts
 * import * as Domain from "interval-sets/Domain"
 *
 * Domain.adjacent(Domain.integer, 0, 1) // true
 * Domain.adjacent(Domain.integer, 0, 2) // false
 * Domain.adjacent(Domain.real, 0, 1) // false
 * ```
 *
 * @since 0.1.0
 * @category operations
 */
export const adjacent = <V>(domain: Domain<V>, self: V, that: V): boolean =>
  domain._tag === "Discrete" && domain.ordinal(self) + 1 === domain.ordinal(that)

/**
 * The value after `value`, or `None` at the top of the domain.
 *
 * @since 0.1.0
 * @category operations
 */
export const successor = <V>(domain: Discrete<V>, value: V): Option.Option<V> =>
  domain.order(value, domain.max) >= 0
    ? Option.none()
    : Option.some(domain.fromOrdinal(domain.ordinal(value) + 1))

/**
 * The value before `value`, or `None` at the bottom of the domain.
 *
 * @since 0.1.0
 * @category operations
 */
export const predecessor = <V>(domain: Discrete<V>, value: V): Option.Option<V> =>
  domain.order(value, domain.min) <= 0
    ? Option.none()
    : Option.some(domain.fromOrdinal(domain.ordinal(value) - 1))
