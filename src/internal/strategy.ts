/**
 * Interval representations used by the set engine.
 *
 * A strategy bundles every interval-level operation the engine needs for one
 * representation: inclusive `Range`s for discrete domains, boundary pair
 * `Interval`s for dense ones. It is built once when a set is created so the
 * engine itself never checks which kind of domain it is working on.
 *
 * @since 0.1.0
 * @internal
 */

import type * as Equivalence from "effect/Equivalence"
import * as Option from "effect/Option"
import type * as Order from "effect/Order"
import * as Boundary from "../Boundary.js"
import type * as Domain from "../Domain.js"
import * as Interval from "../Interval.js"
import * as Range from "../Range.js"

/**
 * Either interval type, as accepted from callers.
 *
 * @internal
 */
export type Input<V> = Range.Range<V> | Interval.Interval<V>

/** @internal */
export interface Strategy<V, I> {
  readonly boundaryOrder: Order.Order<Boundary.Boundary<V>>
  readonly lower: (self: I) => Boundary.Boundary<V>
  readonly upper: (self: I) => Boundary.Boundary<V>
  /** The input clipped to the domain, `None` when nothing is left. */
  readonly fromInput: (input: Input<V>) => Option.Option<I>
  /** `None` for values outside the domain. */
  readonly fromValue: (value: V) => Option.Option<I>
  readonly universe: I
  readonly containsValue: (self: I, value: V) => boolean
  /** True if every value of the interval is less than `value`. */
  readonly precedes: (self: I, value: V) => boolean
  readonly containsInterval: (self: I, that: I) => boolean
  readonly extent: (self: I, that: I) => I
  readonly difference: (self: I, that: I) => readonly [Option.Option<I>, Option.Option<I>]
  readonly order: Order.Order<I>
  readonly equivalence: Equivalence.Equivalence<I>
  readonly hash: (self: I) => number
  readonly format: (self: I) => string
}

/** @internal */
export const discrete = <V>(domain: Domain.Discrete<V>): Strategy<V, Range.Range<V>> => {
  const fromInterval = Range.fromInterval(domain)
  const nonEmpty = Range.nonEmpty(domain)
  const contains = Range.contains(domain)
  const containsRange = Range.containsRange(domain)
  const extent = Range.extent(domain)
  const difference = Range.difference(domain)
  const intersection = Range.intersection(domain)
  const universe = Range.make(domain.min, domain.max)
  const clip = (range: Range.Range<V>) => nonEmpty(intersection(range, universe))
  return {
    boundaryOrder: Boundary.getOrder(domain),
    lower: Range.lower,
    upper: Range.upper,
    fromInput: (input) => input._tag === "Range" ? clip(input) : Option.flatMap(fromInterval(input), clip),
    fromValue: (value) => contains(universe, value) ? Option.some(Range.singleton(value)) : Option.none(),
    universe,
    containsValue: (self, value) => contains(self, value),
    precedes: (self, value) => domain.order(self.end, value) < 0,
    containsInterval: (self, that) => containsRange(self, that),
    extent: (self, that) => extent(self, that),
    difference: (self, that) => difference(self, that),
    order: Range.getOrder(domain),
    equivalence: Range.getEquivalence(domain),
    hash: Range.hash(domain),
    format: Range.format(domain)
  }
}

/** @internal */
export const dense = <V>(domain: Domain.Dense<V>): Strategy<V, Interval.Interval<V>> => {
  const nonEmpty = Interval.nonEmpty(domain)
  const isAboveValue = Boundary.isAboveValue(domain)
  const contains = Interval.contains(domain)
  const containsInterval = Interval.containsInterval(domain)
  const extent = Interval.extent(domain)
  const difference = Interval.difference(domain)
  const intersection = Interval.intersection(domain)
  const universe = Interval.closed(domain.min, domain.max)
  return {
    boundaryOrder: Boundary.getOrder(domain),
    lower: (self) => self.lower,
    upper: (self) => self.upper,
    fromInput: (input) =>
      nonEmpty(intersection(input._tag === "Interval" ? input : Range.toInterval(input), universe)),
    fromValue: (value) => contains(universe, value) ? Option.some(Interval.singleton(value)) : Option.none(),
    universe,
    containsValue: (self, value) => contains(self, value),
    precedes: (self, value) => !isAboveValue(self.upper, value),
    containsInterval: (self, that) => containsInterval(self, that),
    extent: (self, that) => extent(self, that),
    difference: (self, that) => difference(self, that),
    order: Interval.getOrder(domain),
    equivalence: Interval.getEquivalence(domain),
    hash: Interval.hash(domain),
    format: Interval.format(domain)
  }
}
