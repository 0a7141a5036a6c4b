/**
 * Unit tests for boundaries.
 *
 * @since 0.1.0
 */

import { describe, it, expect } from "vitest"
import * as Either from "effect/Either"
import * as Boundary from "./Boundary.js"
import * as Domain from "./Domain.js"

describe("Boundary", () => {
  describe("getOrder", () => {
    const O = Boundary.getOrder(Domain.integer)
    const R = Boundary.getOrder(Domain.real)

    it("should order boundaries on the same side by value", () => {
      expect(O(Boundary.below(1), Boundary.below(2))).toBe(-1)
      expect(O(Boundary.above(3), Boundary.above(2))).toBe(1)
      expect(O(Boundary.above(2), Boundary.above(2))).toBe(0)
    })

    it("should place below(v) before above(v)", () => {
      expect(O(Boundary.below(1), Boundary.above(1))).toBe(-1)
      expect(O(Boundary.above(1), Boundary.below(1))).toBe(1)
      expect(R(Boundary.below(1), Boundary.above(1))).toBe(-1)
    })

    it("should treat above(v) and below(v + 1) as the same cut in a discrete domain", () => {
      expect(O(Boundary.above(1), Boundary.below(2))).toBe(0)
      expect(O(Boundary.below(2), Boundary.above(1))).toBe(0)
      expect(Boundary.equals(Domain.integer)(Boundary.above(1), Boundary.below(2))).toBe(true)
      expect(Boundary.equals(Domain.char)(Boundary.above("a"), Boundary.below("b"))).toBe(true)
    })

    it("should keep above(v) and below(w) apart in a dense domain", () => {
      expect(R(Boundary.above(1), Boundary.below(2))).toBe(-1)
      expect(R(Boundary.below(2), Boundary.above(1))).toBe(1)
      expect(Boundary.equals(Domain.real)(Boundary.above(1), Boundary.below(2))).toBe(false)
    })

    it("should order non-adjacent cuts of a discrete domain by value", () => {
      expect(O(Boundary.above(1), Boundary.below(3))).toBe(-1)
      expect(O(Boundary.below(3), Boundary.above(1))).toBe(1)
    })

    it("should back the comparison helpers", () => {
      expect(Boundary.lessThan(Domain.integer)(Boundary.below(1), Boundary.above(1))).toBe(true)
      expect(Boundary.lessThanOrEqualTo(Domain.integer)(Boundary.above(1), Boundary.below(2))).toBe(true)
      expect(Boundary.greaterThan(Domain.integer)(Boundary.above(1), Boundary.below(2))).toBe(false)
      expect(Boundary.greaterThanOrEqualTo(Domain.real)(Boundary.below(2), Boundary.above(1))).toBe(true)
    })
  })

  describe("comparison against values", () => {
    it("should compare below(v) as the cut just before v", () => {
      const isBelowValue = Boundary.isBelowValue(Domain.integer)
      const isAboveValue = Boundary.isAboveValue(Domain.integer)
      expect(isBelowValue(Boundary.below(0), 0)).toBe(true)
      expect(isBelowValue(Boundary.below(0), -1)).toBe(false)
      expect(isAboveValue(Boundary.below(0), -1)).toBe(true)
      expect(isAboveValue(Boundary.below(0), 0)).toBe(false)
    })

    it("should compare above(v) as the cut just after v", () => {
      const isBelowValue = Boundary.isBelowValue(Domain.real)
      const isAboveValue = Boundary.isAboveValue(Domain.real)
      expect(isBelowValue(Boundary.above(0), 0)).toBe(false)
      expect(isBelowValue(Boundary.above(0), 0.1)).toBe(true)
      expect(isAboveValue(Boundary.above(0), 0)).toBe(true)
      expect(isAboveValue(Boundary.above(0), 0.1)).toBe(false)
    })
  })

  describe("adjacent values", () => {
    it("should return the value on the requested side", () => {
      expect(Boundary.valueAbove(Domain.integer)(Boundary.below(0))).toEqual(Either.right(0))
      expect(Boundary.valueAbove(Domain.integer)(Boundary.above(0))).toEqual(Either.right(1))
      expect(Boundary.valueBelow(Domain.integer)(Boundary.above(0))).toEqual(Either.right(0))
      expect(Boundary.valueBelow(Domain.integer)(Boundary.below(0))).toEqual(Either.right(-1))
    })

    it("should fail in a dense domain", () => {
      const result = Boundary.valueAbove(Domain.real)(Boundary.above(0))
      expect(Either.isLeft(result)).toBe(true)
      expect(Boundary.valueAbove(Domain.real)(Boundary.below(0))).toEqual(Either.right(0))
      expect(() => Boundary.unsafeValueBelow(Domain.real)(Boundary.below(1))).toThrow(Domain.DomainError)
    })

    it("should fail past the edge of a discrete domain", () => {
      const small = Domain.integerRange(0, 3)
      expect(Either.isLeft(Boundary.valueAbove(small)(Boundary.above(3)))).toBe(true)
      expect(Either.isLeft(Boundary.valueBelow(small)(Boundary.below(0)))).toBe(true)
      expect(() => Boundary.unsafeValueAbove(small)(Boundary.above(3))).toThrow("no value above 3 in Integer[0..3]")
      expect(Boundary.unsafeValueAbove(small)(Boundary.above(2))).toBe(3)
    })
  })

  describe("format", () => {
    it("should show which side of the value the cut is on", () => {
      expect(Boundary.format(Domain.integer)(Boundary.below(3))).toBe("<3")
      expect(Boundary.format(Domain.integer)(Boundary.above(3))).toBe("3>")
      expect(Boundary.format(Domain.char)(Boundary.below("a"))).toBe("<\"a\"")
    })
  })
})
