import { describe, expect, it } from "vitest";
import { bestSimilarity, levenshteinDistance, maxPossibleSimilarity, similarityRatio } from "../src/similarity";

describe("similarity", () => {
  describe("levenshteinDistance", () => {
    it("should count single-character edits", () => {
      expect(levenshteinDistance("kitten", "sitting")).toBe(3);
      expect(levenshteinDistance("good", "good")).toBe(0);
      expect(levenshteinDistance("", "abc")).toBe(3);
    });
  });

  describe("similarityRatio", () => {
    it("should be bounded in [0, 1]", () => {
      expect(similarityRatio("good", "good")).toBe(1);
      expect(similarityRatio("", "")).toBe(1);
      expect(similarityRatio("abc", "")).toBe(0);
      expect(similarityRatio("abc", "xyz")).toBe(0);
    });

    it("should normalize the distance by the longer string", () => {
      expect(similarityRatio("kitten", "sitting")).toBeCloseTo(4 / 7);
      expect(similarityRatio("terible", "terrible")).toBeCloseTo(0.875);
    });

    it("should be symmetric", () => {
      expect(similarityRatio("flaw", "lawn")).toBe(similarityRatio("lawn", "flaw"));
    });
  });

  describe("maxPossibleSimilarity", () => {
    it("should bound the ratio from the lengths alone", () => {
      expect(maxPossibleSimilarity("abc", "abcdef")).toBe(0.5);
      expect(maxPossibleSimilarity("", "")).toBe(1);
    });
  });

  describe("bestSimilarity", () => {
    it("should short-circuit on exact membership", () => {
      expect(bestSimilarity("good", new Set(["good", "great"]))).toEqual({ word: "good", score: 1 });
    });

    it("should return the closest word and its score", () => {
      const best = bestSimilarity("god", new Set(["good", "great"]));
      expect(best.word).toBe("good");
      expect(best.score).toBeCloseTo(0.75);
    });

    it("should break ties alphabetically regardless of set order", () => {
      expect(bestSimilarity("bat", new Set(["cat", "hat"])).word).toBe("cat");
      expect(bestSimilarity("bat", new Set(["hat", "cat"])).word).toBe("cat");
    });

    it("should report no match for an empty candidate", () => {
      expect(bestSimilarity("", new Set(["good"]))).toEqual({ word: null, score: 0 });
    });
  });
});
