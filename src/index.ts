/**
 * Disjoint interval sets over ordered domains.
 *
 * @since 0.1.0
 */

/**
 * @since 0.1.0
 */
export * as Boundary from "./Boundary.js"

/**
 * @since 0.1.0
 */
export * as Domain from "./Domain.js"

/**
 * @since 0.1.0
 */
export * as Interval from "./Interval.js"

/**
 * @since 0.1.0
 */
export * as IntervalSet from "./IntervalSet.js"

/**
 * @since 0.1.0
 */
export * as Range from "./Range.js"
