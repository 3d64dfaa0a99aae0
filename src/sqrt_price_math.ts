import { Q96, RESOLUTION } from "./constants";
import { overflowError, validationError } from "./errors";
import {
  checkUint160,
  checkUint256,
  divRoundingUp,
  mulDiv,
  mulDivRoundingUp,
} from "./full_math";

/**
 * Next sqrt price after adding or removing `amount` of token0.
 * `new = L * sqrtP / (L +/- amount * sqrtP)`, always rounded up so the
 * price never moves further than the amount pays for.
 */
export function getNextSqrtPriceFromAmount0RoundingUp(
  sqrtPriceX96: bigint,
  liquidity: bigint,
  amount: bigint,
  add: boolean
): bigint {
  if (amount === 0n) return sqrtPriceX96;
  const numerator1 = liquidity << RESOLUTION;
  const product = amount * sqrtPriceX96;

  if (add) {
    return checkUint160(
      mulDivRoundingUp(numerator1, sqrtPriceX96, numerator1 + product),
      "next sqrt price"
    );
  }
  if (numerator1 <= product) {
    throw overflowError("Insufficient token0 reserves for requested output");
  }
  return checkUint160(
    mulDivRoundingUp(numerator1, sqrtPriceX96, numerator1 - product),
    "next sqrt price"
  );
}

/**
 * Next sqrt price after adding or removing `amount` of token1.
 * `new = sqrtP +/- amount / L`, always rounded down.
 */
export function getNextSqrtPriceFromAmount1RoundingDown(
  sqrtPriceX96: bigint,
  liquidity: bigint,
  amount: bigint,
  add: boolean
): bigint {
  if (add) {
    const quotient = (amount << RESOLUTION) / liquidity;
    return checkUint160(sqrtPriceX96 + quotient, "next sqrt price");
  }
  const quotient = divRoundingUp(amount << RESOLUTION, liquidity);
  if (sqrtPriceX96 <= quotient) {
    throw overflowError("Insufficient token1 reserves for requested output");
  }
  return sqrtPriceX96 - quotient;
}

export function getNextSqrtPriceFromInput(
  sqrtPriceX96: bigint,
  liquidity: bigint,
  amountIn: bigint,
  zeroForOne: boolean
): bigint {
  if (sqrtPriceX96 <= 0n) throw validationError("Sqrt price must be positive");
  if (liquidity <= 0n) throw validationError("Liquidity must be positive");

  return zeroForOne
    ? getNextSqrtPriceFromAmount0RoundingUp(sqrtPriceX96, liquidity, amountIn, true)
    : getNextSqrtPriceFromAmount1RoundingDown(sqrtPriceX96, liquidity, amountIn, true);
}

export function getNextSqrtPriceFromOutput(
  sqrtPriceX96: bigint,
  liquidity: bigint,
  amountOut: bigint,
  zeroForOne: boolean
): bigint {
  if (sqrtPriceX96 <= 0n) throw validationError("Sqrt price must be positive");
  if (liquidity <= 0n) throw validationError("Liquidity must be positive");

  return zeroForOne
    ? getNextSqrtPriceFromAmount1RoundingDown(sqrtPriceX96, liquidity, amountOut, false)
    : getNextSqrtPriceFromAmount0RoundingUp(sqrtPriceX96, liquidity, amountOut, false);
}

/**
 * token0 between two prices: `L * (sqrtB - sqrtA) / (sqrtA * sqrtB)`.
 */
export function getAmount0Delta(
  sqrtRatioAX96: bigint,
  sqrtRatioBX96: bigint,
  liquidity: bigint,
  roundUp: boolean
): bigint {
  const [a, b] =
    sqrtRatioAX96 > sqrtRatioBX96
      ? [sqrtRatioBX96, sqrtRatioAX96]
      : [sqrtRatioAX96, sqrtRatioBX96];
  if (a <= 0n) throw validationError("Sqrt price must be positive");

  const numerator1 = liquidity << RESOLUTION;
  const numerator2 = b - a;

  return roundUp
    ? checkUint256(divRoundingUp(mulDivRoundingUp(numerator1, numerator2, b), a))
    : mulDiv(numerator1, numerator2, b) / a;
}

/**
 * token1 between two prices: `L * (sqrtB - sqrtA)`.
 */
export function getAmount1Delta(
  sqrtRatioAX96: bigint,
  sqrtRatioBX96: bigint,
  liquidity: bigint,
  roundUp: boolean
): bigint {
  const diff =
    sqrtRatioAX96 > sqrtRatioBX96
      ? sqrtRatioAX96 - sqrtRatioBX96
      : sqrtRatioBX96 - sqrtRatioAX96;

  return roundUp
    ? mulDivRoundingUp(liquidity, diff, Q96)
    : mulDiv(liquidity, diff, Q96);
}
