import { describe, it, expect } from "vitest";
import { PatternDetector } from "./patterns";
import { createSeededRandom, randomIndex } from "./random";

describe("PatternDetector", () => {
  const detector = new PatternDetector();

  it("flags a unit repeated over at least half the password", () => {
    expect([...detector.detect("abab")]).toEqual(["RepeatedPattern"]);
    expect([...detector.detect("abcabc")]).toEqual(["RepeatedPattern"]);
    expect(detector.inspect("abababab").repeatedPattern).toBe('"ab" x4');
    expect(detector.inspect("xyZ!9Z!9").repeatedPattern).toBe('"Z!9" x2');
  });

  it("ignores repeats covering less than half the password", () => {
    expect(detector.detect("abab9#Qm!x").has("RepeatedPattern")).toBe(false);
  });

  it("does not count single-character repeats as a pattern", () => {
    expect(detector.detect("aaX").size).toBe(0);
  });

  it("flags ascending and descending runs of three", () => {
    expect([...detector.detect("321xyz")]).toEqual(["SequentialRun"]);
    expect(detector.inspect("321xyz").sequentialRun).toBe("321");
    expect(detector.inspect("Q9abcdef").sequentialRun).toBe("abcdef");
    expect(detector.detect("abcdef").has("RepeatedPattern")).toBe(false);
  });

  it("needs adjacent positions for a run", () => {
    expect(detector.detect("a1b2c3").size).toBe(0);
    expect(detector.detect("acegik").size).toBe(0);
  });

  it("is case-sensitive", () => {
    expect(detector.detect("aBc").size).toBe(0);
    expect(detector.detect("abAB").has("RepeatedPattern")).toBe(false);
  });

  it("flags adjacent keyboard keys", () => {
    expect(detector.inspect("Zqwerty!").sequentialRun).toBe("qwerty");
    expect(detector.inspect("9lkj").sequentialRun).toBe("lkj");
    expect(new PatternDetector({ keyboard: false }).detect("qwerty").size).toBe(0);
  });

  it("finds nothing in empty or patternless input", () => {
    expect(detector.detect("").size).toBe(0);
    expect(detector.detect("Xk7$qPz2").size).toBe(0);
    expect(detector.detect("password").size).toBe(0);
  });

  it("stays fast on long input", () => {
    const random = createSeededRandom(11);
    const letters = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ";
    const long = Array.from({ length: 5000 }, () => letters[randomIndex(random, letters.length)]).join("");

    const started = performance.now();
    detector.inspect(long);
    expect(detector.inspect("ab".repeat(2500)).repeatedPattern).toBe('"ab" x2500');
    expect(performance.now() - started).toBeLessThan(1000);
  });

  it("finds a repeat that starts after the first character", () => {
    expect(detector.inspect("Q7#xyxyxy").repeatedPattern).toBe('"xy" x3');
  });
});
