/**
 * Example: Room bookings and port allocation with interval sets.
 *
 * Bookings live on the dense `Date` domain, where half-open intervals keep
 * back-to-back meetings apart. Ports live on a bounded integer domain, where
 * neighbouring allocations collapse into a single range.
 *
 * @since 0.1.0
 */

import * as Console from "effect/Console"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"
import * as Domain from "../src/Domain.js"
import * as Interval from "../src/Interval.js"
import * as IntervalSet from "../src/IntervalSet.js"
import * as Range from "../src/Range.js"

const at = (time: string) => new Date(`2024-03-04T${time}:00.000Z`)

const slot = (from: string, to: string) => Interval.closedOpen(at(from), at(to))

// Example 1: Free time in a meeting room
const roomBookings = Effect.gen(function* () {
  yield* Console.log("=== Room Bookings ===")

  const booked = IntervalSet.fromIntervals(Domain.date, [
    slot("09:00", "10:00"),
    slot("10:00", "11:30"),
    slot("14:00", "15:00")
  ])
  yield* Console.log("Booked:", String(booked))

  const workingDay = IntervalSet.fromIntervals(Domain.date, [slot("08:00", "18:00")])
  const free = IntervalSet.difference(workingDay, booked)
  yield* Console.log("Free:", String(free))

  const request = slot("11:00", "12:00")
  const available = IntervalSet.hasInterval(free, request)
  yield* Console.log("11:00-12:00 available:", available) // false

  IntervalSet.removeInterval(booked, slot("10:00", "11:30"))
  yield* Console.log("After cancelling 10:00-11:30:", String(booked))
})

// Example 2: Allocating ports from a bounded pool
const portPool = Effect.gen(function* () {
  yield* Console.log("\n=== Port Pool ===")

  const ports = yield* Effect.try({
    try: () => Domain.integerRange(1024, 65535),
    catch: (error) => new Domain.DomainError({ message: String(error) })
  })

  const allocated = pipe(
    IntervalSet.empty(ports),
    IntervalSet.addInterval(Range.make(8000, 8010)),
    IntervalSet.add(8011),
    IntervalSet.add(9000)
  )
  yield* Console.log("Allocated:", String(allocated)) // {8000..8011, 9000}
  yield* Console.log("Allocated count:", IntervalSet.size(allocated)) // 13

  const free = IntervalSet.complement(allocated)
  yield* Console.log("Free ranges:", String(free)) // {1024..7999, 8012..8999, 9001..65535}
  yield* Console.log("Free count:", IntervalSet.size(free)) // 64499
})

// Example 3: Invalid domains fail with a DomainError
const invalidPool = Effect.gen(function* () {
  yield* Console.log("\n=== Invalid Pool ===")

  yield* Effect.try({
    try: () => Domain.integerRange(100, 1),
    catch: (error) =>
      error instanceof Domain.DomainError ? error : new Domain.DomainError({ message: String(error) })
  }).pipe(
    Effect.catchTag("DomainError", (error) => Console.log("Rejected:", error.message))
  )
})

// Run all examples
const program = Effect.gen(function* () {
  yield* roomBookings
  yield* portPool
  yield* invalidPool
})

Effect.runPromise(program).catch(console.error)
