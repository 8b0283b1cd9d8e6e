/**
 * Tests for @parley/strings
 */

import { describe, it, expect } from "vitest";
import { editDistance, closestMatch } from "../src/index.js";

const samples = ["", "a", "hi", "hello", "helo", "HELP", "kitten", "sitting", "Memory", "mem0ry"];

describe("@parley/strings", () => {
  // ==========================================================================
  // editDistance
  // ==========================================================================

  describe("editDistance", () => {
    it("handles empty inputs", () => {
      expect(editDistance("", "abc")).toBe(3);
      expect(editDistance("abc", "")).toBe(3);
      expect(editDistance("", "")).toBe(0);
    });

    it("computes the classic examples", () => {
      expect(editDistance("kitten", "sitting")).toBe(3);
      expect(editDistance("flaw", "lawn")).toBe(2);
      expect(editDistance("hello", "helo")).toBe(1);
      expect(editDistance("hi", "helo")).toBe(3);
    });

    it("ignores case", () => {
      expect(editDistance("Hello", "HELLO")).toBe(0);
      expect(editDistance("heLP", "Helo")).toBe(1);
    });

    it("compares by code point", () => {
      expect(editDistance("😀a", "a")).toBe(1);
      expect(editDistance("😀", "😃")).toBe(1);
    });

    it("is zero for identical strings", () => {
      for (const s of samples) {
        expect(editDistance(s, s)).toBe(0);
      }
    });

    it("is symmetric", () => {
      for (const a of samples) {
        for (const b of samples) {
          expect(editDistance(a, b)).toBe(editDistance(b, a));
        }
      }
    });

    it("satisfies the triangle inequality", () => {
      for (const a of samples) {
        for (const b of samples) {
          for (const c of samples) {
            expect(editDistance(a, c)).toBeLessThanOrEqual(editDistance(a, b) + editDistance(b, c));
          }
        }
      }
    });

    it("never exceeds the longer length", () => {
      expect(editDistance("abc", "xyz")).toBe(3);
      expect(editDistance("ab", "wxyz")).toBe(4);
    });
  });

  // ==========================================================================
  // closestMatch
  // ==========================================================================

  describe("closestMatch", () => {
    it("returns undefined without candidates", () => {
      expect(closestMatch("anything", [])).toBeUndefined();
    });

    it("picks the nearest candidate", () => {
      expect(closestMatch("sittin", ["kitten", "sitting"])).toEqual({
        candidate: "sitting",
        index: 1,
        distance: 1,
      });
    });

    it("prefers the earliest candidate on ties", () => {
      // "hello" and "help" are both one edit away from "helo"
      expect(closestMatch("helo", ["hi", "hello", "help"])).toEqual({
        candidate: "hello",
        index: 1,
        distance: 1,
      });
    });
  });
});
