import { describe, it, expect } from "vitest";
import { Q96 } from "../src/constants";
import { PoolError, PoolErrorCode } from "../src/errors";
import {
  getAmount0Delta,
  getAmount1Delta,
  getNextSqrtPriceFromInput,
  getNextSqrtPriceFromOutput,
} from "../src/sqrt_price_math";
import { computeSwapStep } from "../src/swap_math";

// floor(sqrt(1.01) * 2^96)
const SQRT_1_01 = 79623317895830914510639640423n;
// floor(sqrt(10) * 2^96)
const SQRT_10 = 250541448375047931186413801569n;

describe("SqrtPriceMath", () => {
  it("should halve the price when one token0 unit per unit of liquidity is added", () => {
    expect(getNextSqrtPriceFromInput(Q96, 10n ** 18n, 10n ** 18n, true)).toBe(Q96 / 2n);
  });

  it("should move the price by amount / L for token1", () => {
    expect(getNextSqrtPriceFromInput(Q96, 10n ** 18n, 10n ** 18n, false)).toBe(2n * Q96);
    expect(getNextSqrtPriceFromOutput(Q96, 10n ** 18n, 5n * 10n ** 17n, true)).toBe(Q96 / 2n);
  });

  it("should reject zero liquidity", () => {
    expect(() => getNextSqrtPriceFromInput(Q96, 0n, 1n, true)).toThrow("Liquidity must be positive");
  });

  it("should reject output beyond reserves", () => {
    try {
      getNextSqrtPriceFromOutput(Q96, 10n ** 18n, 10n ** 18n, true);
      expect.unreachable();
    } catch (e) {
      expect(PoolError.isPoolErrorCode(e, PoolErrorCode.ArithmeticOverflow)).toBe(true);
    }
  });

  it("should compute deltas with the requested rounding", () => {
    expect(getAmount0Delta(Q96, 2n * Q96, 10n ** 18n, false)).toBe(5n * 10n ** 17n);
    expect(getAmount0Delta(2n * Q96, Q96, 10n ** 18n, true)).toBe(5n * 10n ** 17n);
    expect(getAmount1Delta(Q96, 2n * Q96, 10n ** 18n, false)).toBe(10n ** 18n);
    expect(getAmount1Delta(Q96, Q96 + 1n, 1n, true)).toBe(1n);
    expect(getAmount1Delta(Q96, Q96 + 1n, 1n, false)).toBe(0n);
  });
});

describe("computeSwapStep", () => {
  it("should cap exact input at the price target", () => {
    const step = computeSwapStep(Q96, SQRT_1_01, 2n * 10n ** 18n, 10n ** 18n, 600);
    expect(step.sqrtPriceNextX96).toBe(SQRT_1_01);
    expect(step.amountIn).toBe(9975124224178055n);
    expect(step.amountOut).toBe(9925619580021728n);
    expect(step.feeAmount).toBe(5988667735148n);
  });

  it("should cap exact output at the price target", () => {
    const step = computeSwapStep(Q96, SQRT_1_01, 2n * 10n ** 18n, -(10n ** 18n), 600);
    expect(step.sqrtPriceNextX96).toBe(SQRT_1_01);
    expect(step.amountIn).toBe(9975124224178055n);
    expect(step.amountOut).toBe(9925619580021728n);
    expect(step.feeAmount).toBe(5988667735148n);
  });

  it("should spend all exact input short of the target", () => {
    const step = computeSwapStep(Q96, SQRT_10, 2n * 10n ** 18n, 10n ** 18n, 600);
    expect(step.sqrtPriceNextX96).toBeLessThan(SQRT_10);
    expect(step.amountIn).toBe(999400000000000000n);
    expect(step.amountOut).toBe(666399946655997866n);
    expect(step.feeAmount).toBe(600000000000000n);
    expect(step.amountIn + step.feeAmount).toBe(10n ** 18n);
  });

  it("should move nothing without liquidity", () => {
    const step = computeSwapStep(Q96, Q96 / 2n, 0n, 1000n, 3000);
    expect(step.sqrtPriceNextX96).toBe(Q96 / 2n);
    expect(step.amountIn).toBe(0n);
    expect(step.amountOut).toBe(0n);
    expect(step.feeAmount).toBe(0n);
  });
});
