import { describe, it, expect } from "vitest";
import {
  MAX_SQRT_RATIO,
  MAX_TICK,
  MIN_SQRT_RATIO,
  MIN_TICK,
  Q96,
} from "../src/constants";
import { PoolError, PoolErrorCode } from "../src/errors";
import {
  priceToSqrtPriceX96,
  priceToTick,
  sqrtPriceToTick,
  sqrtPriceX96ToPrice,
  tickToPrice,
  tickToSqrtPrice,
} from "../src/tick_math";

const SAMPLE_TICKS = [
  MIN_TICK, -500000, -69080, -1, 0, 1, 6931, 69080, 69200, 500000, MAX_TICK - 1,
];

const codeOf = (fn: () => unknown) => {
  try {
    fn();
  } catch (e) {
    return e instanceof PoolError ? e.errorCode : "unexpected";
  }
  return "none";
};

describe("TickMath", () => {
  describe("tickToSqrtPrice", () => {
    it("should return 2^96 at tick 0", () => {
      expect(tickToSqrtPrice(0)).toBe(79228162514264337593543950336n);
      expect(tickToSqrtPrice(0)).toBe(Q96);
    });

    it("should hit the sqrt price bounds at the tick bounds", () => {
      expect(tickToSqrtPrice(MIN_TICK)).toBe(MIN_SQRT_RATIO);
      expect(tickToSqrtPrice(MAX_TICK)).toBe(MAX_SQRT_RATIO);
    });

    it("should price the range used across the pool tests", () => {
      expect(tickToSqrtPrice(69080)).toBe(2505288394476896181651817945149n);
      expect(tickToSqrtPrice(69200)).toBe(2520364554301612241575132066155n);
      expect(tickToSqrtPrice(69320)).toBe(2535531438449947674995274185250n);
    });

    it("should be strictly increasing", () => {
      for (const t of SAMPLE_TICKS) {
        expect(tickToSqrtPrice(t + 1)).toBeGreaterThan(tickToSqrtPrice(t));
      }
    });

    it("should reject ticks outside the bounds", () => {
      expect(codeOf(() => tickToSqrtPrice(MAX_TICK + 1))).toBe(PoolErrorCode.PriceOutOfRange);
      expect(codeOf(() => tickToSqrtPrice(MIN_TICK - 1))).toBe(PoolErrorCode.PriceOutOfRange);
      expect(codeOf(() => tickToSqrtPrice(1.5))).toBe(PoolErrorCode.PriceOutOfRange);
    });
  });

  describe("sqrtPriceToTick", () => {
    it("should invert tickToSqrtPrice", () => {
      for (const t of SAMPLE_TICKS) {
        expect(sqrtPriceToTick(tickToSqrtPrice(t))).toBe(t);
      }
    });

    it("should return the greatest tick at or below the price", () => {
      for (const t of SAMPLE_TICKS) {
        expect(sqrtPriceToTick(tickToSqrtPrice(t + 1) - 1n)).toBe(t);
      }
    });

    it("should handle the bounds", () => {
      expect(sqrtPriceToTick(MIN_SQRT_RATIO)).toBe(MIN_TICK);
      expect(sqrtPriceToTick(MAX_SQRT_RATIO - 1n)).toBe(MAX_TICK - 1);
      expect(sqrtPriceToTick(MAX_SQRT_RATIO)).toBe(MAX_TICK);
    });

    it("should map sqrt(2) * 2^96 to tick 6931", () => {
      expect(sqrtPriceToTick(112045541949572279837463876454n)).toBe(6931);
    });

    it("should reject prices outside the bounds", () => {
      expect(codeOf(() => sqrtPriceToTick(MIN_SQRT_RATIO - 1n))).toBe(PoolErrorCode.PriceOutOfRange);
      expect(codeOf(() => sqrtPriceToTick(MAX_SQRT_RATIO + 1n))).toBe(PoolErrorCode.PriceOutOfRange);
    });
  });

  describe("decimal helpers", () => {
    it("should convert exact squares", () => {
      expect(priceToSqrtPriceX96("1")).toBe(Q96);
      expect(priceToSqrtPriceX96("4")).toBe(2n * Q96);
      expect(sqrtPriceX96ToPrice(2n * Q96).toString()).toBe("4");
      expect(tickToPrice(0).toString()).toBe("1");
    });

    it("should find the tick for a price", () => {
      expect(priceToTick("1")).toBe(0);
      // log(1000) / log(1.0001) = 69081.0066
      expect(priceToTick("1000")).toBe(69081);
    });

    it("should reject non-positive prices", () => {
      expect(codeOf(() => priceToSqrtPriceX96(0))).toBe(PoolErrorCode.PriceOutOfRange);
      expect(codeOf(() => priceToSqrtPriceX96("-1"))).toBe(PoolErrorCode.PriceOutOfRange);
    });
  });
});
