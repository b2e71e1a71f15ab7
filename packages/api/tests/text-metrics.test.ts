import { describe, expect, it } from "vitest";

import {
  editDistance,
  normalizeText,
  standardDeviation,
  textSimilarity,
  tokenizeWords,
  wordErrorRate,
} from "../src/lib/text-metrics.js";

describe("text metrics", () => {
  it("collapses whitespace when normalising", () => {
    expect(normalizeText("  Account \n\t 12345 ")).toBe("Account 12345");
  });

  it("tokenizes into lower-cased words without punctuation", () => {
    expect(tokenizeWords("Hello, World! It's 42.")).toEqual(["hello", "world", "it's", "42"]);
  });

  it("computes edit distance over characters and words", () => {
    expect(editDistance(Array.from("kitten"), Array.from("sitting"))).toBe(3);
    expect(editDistance(["a", "b"], [])).toBe(2);
    expect(editDistance([], ["a"])).toBe(1);
  });

  it("scores text similarity relative to the longer string", () => {
    expect(textSimilarity("Account 12345", "Account  12345")).toBe(1);
    expect(textSimilarity("kitten", "sitting")).toBeCloseTo(4 / 7, 10);
    expect(textSimilarity("", "")).toBe(1);
    expect(textSimilarity("abc", "")).toBe(0);
  });

  it("computes word error rate against the reference", () => {
    expect(wordErrorRate("the cat sat", "the cat sat")).toBe(0);
    expect(wordErrorRate("the cat sat", "the cat sat down")).toBeCloseTo(1 / 3, 10);
    expect(wordErrorRate("the cat sat", "a dog")).toBe(1);
    expect(wordErrorRate("", "")).toBe(0);
    expect(wordErrorRate("", "noise")).toBe(1);
  });

  it("computes population standard deviation", () => {
    expect(standardDeviation([])).toBe(0);
    expect(standardDeviation([0.5, 0.5, 0.5])).toBe(0);
    expect(standardDeviation([0, 1])).toBe(0.5);
  });
});
