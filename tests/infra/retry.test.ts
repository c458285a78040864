import { describe, it, expect } from "vitest";
import { calculateBackoff, nextRetryAt } from "../../src/infra/retry.js";

const centre = (): number => 0.5;
const lowest = (): number => 0;
const highest = (): number => 0.999999;

describe("retry", () => {
  describe("calculateBackoff", () => {
    it("should double the delay with each attempt", () => {
      expect(calculateBackoff(1, { random: centre })).toBe(60);
      expect(calculateBackoff(2, { random: centre })).toBe(120);
      expect(calculateBackoff(3, { random: centre })).toBe(240);
      expect(calculateBackoff(5, { random: centre })).toBe(960);
    });

    it("should cap the un-jittered delay at one hour", () => {
      expect(calculateBackoff(6, { random: centre })).toBe(1920);
      expect(calculateBackoff(7, { random: centre })).toBe(3600);
      expect(calculateBackoff(20, { random: centre })).toBe(3600);
    });

    it("should jitter by at most 20% either way", () => {
      expect(calculateBackoff(1, { random: lowest })).toBe(48);
      expect(calculateBackoff(1, { random: highest })).toBe(72);
      expect(calculateBackoff(10, { random: lowest })).toBe(2880);
      expect(calculateBackoff(10, { random: highest })).toBe(4320);
    });

    it("should stay within [48, 72] for the first attempt with real randomness", () => {
      for (let i = 0; i < 200; i++) {
        const delay = calculateBackoff(1);
        expect(delay).toBeGreaterThanOrEqual(48);
        expect(delay).toBeLessThanOrEqual(72);
      }
    });

    it("should stay within 3600 ± 20% once capped", () => {
      for (let i = 0; i < 200; i++) {
        const delay = calculateBackoff(12);
        expect(delay).toBeGreaterThanOrEqual(2880);
        expect(delay).toBeLessThanOrEqual(4320);
      }
    });

    it("should never return less than one second", () => {
      expect(calculateBackoff(1, { baseDelaySec: 1, jitterRatio: 1, random: lowest })).toBe(1);
    });
  });

  describe("nextRetryAt", () => {
    it("should add the backoff to now", () => {
      const now = new Date("2026-01-01T00:00:00.000Z");
      expect(nextRetryAt(2, now, { random: centre }).toISOString()).toBe("2026-01-01T00:02:00.000Z");
    });
  });
});
