import { generatePattern, kSyntheticPattern } from "./patterns";
import { createRandom, randomBelow } from "./random";

describe("benchmark inputs", () => {
  it("reproduces the same sequence from the same seed", () => {
    const a = createRandom(42);
    const b = createRandom(42);
    const c = createRandom(43);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
    expect([c(), c(), c()]).not.toEqual(first);
  });

  it("keeps randomBelow inside its bound", () => {
    const rand = createRandom(5);
    for (let i = 0; i < 200; i += 1) {
      const n = randomBelow(rand, 10);
      expect(n).toBeGreaterThanOrEqual(0);
      expect(n).toBeLessThan(10);
    }
  });

  it("generates every pattern at the requested size", () => {
    for (const kind of kSyntheticPattern.keys) {
      expect(generatePattern(kind, 100, createRandom(1)).length).toBe(100);
    }
  });

  it("fills the deterministic patterns", () => {
    const rand = createRandom(1);
    expect(generatePattern("zeros", 4, rand)).toEqual(new Uint8Array(4));
    expect(Array.from(generatePattern("sequence", 130, rand).subarray(126))).toEqual([126, 127, 0, 1]);
    expect(Array.from(generatePattern("pattern", 6, rand))).toEqual([0x12, 0x34, 0x56, 0x78, 0x12, 0x34]);
  });

  it("keeps random values in range", () => {
    const rand = createRandom(9);
    expect(generatePattern("nibbles", 500, rand).every((b) => b < 16)).toBe(true);
    expect(generatePattern("random", 500, rand).every((b) => b < 0x80)).toBe(true);
    expect(generatePattern("mixed", 500, rand).every((b) => b < 0x80)).toBe(true);
  });
});
