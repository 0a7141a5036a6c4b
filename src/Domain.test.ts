/**
 * Unit tests for value domains.
 *
 * @since 0.1.0
 */

import { describe, it, expect } from "vitest"
import * as Hash from "effect/Hash"
import * as Option from "effect/Option"
import * as Domain from "./Domain.js"

const Weekday = ["mon", "tue", "wed", "thu", "fri", "sat", "sun"] as const
type Weekday = typeof Weekday[number]

const weekday = Domain.discrete<Weekday>({
  name: "Weekday",
  ordinal: (day) => Weekday.indexOf(day),
  fromOrdinal: (n) => Weekday[n],
  min: "mon",
  max: "sun"
})

describe("Domain", () => {
  describe("guards", () => {
    it("should tell discrete and dense domains apart", () => {
      expect(Domain.isDiscrete(Domain.integer)).toBe(true)
      expect(Domain.isDense(Domain.integer)).toBe(false)
      expect(Domain.isDense(Domain.real)).toBe(true)
      expect(Domain.isDiscrete(Domain.date)).toBe(false)
    })

    it("should recognize domains", () => {
      expect(Domain.isDomain(Domain.char)).toBe(true)
      expect(Domain.isDomain(weekday)).toBe(true)
      expect(Domain.isDomain({ name: "Integer" })).toBe(false)
    })
  })

  describe("adjacent", () => {
    it("should hold for consecutive values of a discrete domain", () => {
      expect(Domain.adjacent(Domain.integer, 0, 1)).toBe(true)
      expect(Domain.adjacent(Domain.integer, 1, 0)).toBe(false)
      expect(Domain.adjacent(Domain.integer, 0, 2)).toBe(false)
      expect(Domain.adjacent(Domain.char, "a", "b")).toBe(true)
      expect(Domain.adjacent(weekday, "sat", "sun")).toBe(true)
    })

    it("should never hold in a dense domain", () => {
      expect(Domain.adjacent(Domain.real, 0, 1)).toBe(false)
    })
  })

  describe("successor and predecessor", () => {
    it("should step through the ordinals", () => {
      expect(Domain.successor(Domain.integer, 5)).toEqual(Option.some(6))
      expect(Domain.predecessor(Domain.integer, 5)).toEqual(Option.some(4))
      expect(Domain.successor(Domain.char, "a")).toEqual(Option.some("b"))
      expect(Domain.predecessor(weekday, "tue")).toEqual(Option.some("mon"))
    })

    it("should stop at the edges of the domain", () => {
      const small = Domain.integerRange(0, 3)
      expect(Option.isNone(Domain.successor(small, 3))).toBe(true)
      expect(Option.isNone(Domain.predecessor(small, 0))).toBe(true)
      expect(Option.isNone(Domain.successor(Domain.integer, Number.MAX_SAFE_INTEGER))).toBe(true)
      expect(Option.isNone(Domain.successor(weekday, "sun"))).toBe(true)
    })
  })

  describe("built-in domains", () => {
    it("should map characters to code points", () => {
      expect(Domain.char.ordinal("a")).toBe(97)
      expect(Domain.char.fromOrdinal(98)).toBe("b")
      expect(Domain.char.format("a")).toBe("\"a\"")
    })

    it("should order discrete values by ordinal", () => {
      expect(weekday.order("mon", "fri")).toBe(-1)
      expect(weekday.order("sun", "fri")).toBe(1)
      expect(weekday.order("wed", "wed")).toBe(0)
    })

    it("should name integer ranges by their bounds", () => {
      const byte = Domain.integerRange(0, 255)
      expect(byte.name).toBe("Integer[0..255]")
      expect(byte.min).toBe(0)
      expect(byte.max).toBe(255)
    })

    it("should hash and format object values by ordinal", () => {
      const slot = Domain.discrete<{ readonly n: number }>({
        name: "Slot",
        ordinal: (value) => value.n,
        fromOrdinal: (n) => ({ n }),
        min: { n: 0 },
        max: { n: 9 }
      })
      expect(slot.hash({ n: 3 })).toBe(slot.hash({ n: 3 }))
      expect(slot.hash({ n: 3 })).toBe(Hash.number(3))
      expect(slot.format({ n: 3 })).toBe("#3")
      expect(weekday.format("mon")).toBe("mon")
    })

    it("should format dates as ISO strings", () => {
      expect(Domain.date.format(new Date(0))).toBe("1970-01-01T00:00:00.000Z")
    })
  })

  describe("DomainError", () => {
    it("should reject inverted integer ranges", () => {
      expect(() => Domain.integerRange(5, 1)).toThrow(Domain.DomainError)
      expect(() => Domain.integerRange(5, 1)).toThrow("integer range lower bound 5 exceeds upper bound 1")
    })

    it("should reject bounds that are not safe integers", () => {
      expect(() => Domain.integerRange(0.5, 4)).toThrow(Domain.DomainError)
      expect(() => Domain.integerRange(0, Infinity)).toThrow(Domain.DomainError)
    })

    it("should carry its tag", () => {
      const error = new Domain.DomainError({ message: "out of range" })
      expect(error._tag).toBe("DomainError")
      expect(error.message).toBe("out of range")
    })
  })
})
