import { FEE_DENOMINATOR } from "./constants";
import { mulDiv, mulDivRoundingUp } from "./full_math";
import {
  getAmount0Delta,
  getAmount1Delta,
  getNextSqrtPriceFromInput,
  getNextSqrtPriceFromOutput,
} from "./sqrt_price_math";

export type SwapStepResult = {
  sqrtPriceNextX96: bigint;
  amountIn: bigint; // principal, excluding fee
  amountOut: bigint;
  feeAmount: bigint;
};

/**
 * One constant-product segment from `sqrtPriceCurrentX96` toward
 * `sqrtPriceTargetX96` with fixed liquidity.
 *
 * The fee is withheld from the input before the step is sized and is
 * reported separately from principal:
 * - exact input: sized with `remaining * (1e6 - fee) / 1e6`; a step that
 *   stops short of the target spends all of `remaining`, so the fee is
 *   `remaining - amountIn`
 * - otherwise the fee is `ceil(amountIn * fee / (1e6 - fee))`
 *
 * `amountRemaining` > 0 is exact input, < 0 exact output.
 */
export function computeSwapStep(
  sqrtPriceCurrentX96: bigint,
  sqrtPriceTargetX96: bigint,
  liquidity: bigint,
  amountRemaining: bigint,
  feePips: number
): SwapStepResult {
  const zeroForOne = sqrtPriceCurrentX96 >= sqrtPriceTargetX96;
  const exactIn = amountRemaining >= 0n;
  const fee = BigInt(feePips);
  const denominator = BigInt(FEE_DENOMINATOR);

  let sqrtPriceNextX96: bigint;
  let amountIn = 0n;
  let amountOut = 0n;

  if (exactIn) {
    const amountRemainingLessFee = mulDiv(
      amountRemaining,
      denominator - fee,
      denominator
    );
    amountIn = zeroForOne
      ? getAmount0Delta(sqrtPriceTargetX96, sqrtPriceCurrentX96, liquidity, true)
      : getAmount1Delta(sqrtPriceCurrentX96, sqrtPriceTargetX96, liquidity, true);
    sqrtPriceNextX96 =
      amountRemainingLessFee >= amountIn
        ? sqrtPriceTargetX96
        : getNextSqrtPriceFromInput(
            sqrtPriceCurrentX96,
            liquidity,
            amountRemainingLessFee,
            zeroForOne
          );
  } else {
    amountOut = zeroForOne
      ? getAmount1Delta(sqrtPriceTargetX96, sqrtPriceCurrentX96, liquidity, false)
      : getAmount0Delta(sqrtPriceCurrentX96, sqrtPriceTargetX96, liquidity, false);
    sqrtPriceNextX96 =
      -amountRemaining >= amountOut
        ? sqrtPriceTargetX96
        : getNextSqrtPriceFromOutput(
            sqrtPriceCurrentX96,
            liquidity,
            -amountRemaining,
            zeroForOne
          );
  }

  const reachedTarget = sqrtPriceTargetX96 === sqrtPriceNextX96;

  if (zeroForOne) {
    if (!(reachedTarget && exactIn)) {
      amountIn = getAmount0Delta(sqrtPriceNextX96, sqrtPriceCurrentX96, liquidity, true);
    }
    if (!(reachedTarget && !exactIn)) {
      amountOut = getAmount1Delta(sqrtPriceNextX96, sqrtPriceCurrentX96, liquidity, false);
    }
  } else {
    if (!(reachedTarget && exactIn)) {
      amountIn = getAmount1Delta(sqrtPriceCurrentX96, sqrtPriceNextX96, liquidity, true);
    }
    if (!(reachedTarget && !exactIn)) {
      amountOut = getAmount0Delta(sqrtPriceCurrentX96, sqrtPriceNextX96, liquidity, false);
    }
  }

  // rounding on the price may overshoot the requested output by a unit
  if (!exactIn && amountOut > -amountRemaining) {
    amountOut = -amountRemaining;
  }

  const feeAmount =
    exactIn && !reachedTarget
      ? amountRemaining - amountIn
      : mulDivRoundingUp(amountIn, fee, denominator - fee);

  return { sqrtPriceNextX96, amountIn, amountOut, feeAmount };
}
