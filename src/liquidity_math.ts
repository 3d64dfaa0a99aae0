import { Q96 } from "./constants";
import { PoolError, PoolErrorCode, overflowError, validationError } from "./errors";
import { checkUint128, mulDiv } from "./full_math";
import { getAmount0Delta, getAmount1Delta } from "./sqrt_price_math";
import { tickToSqrtPrice } from "./tick_math";

export type TokenAmounts = {
  amount0: bigint;
  amount1: bigint;
};

/**
 * Token amounts represented by `liquidity` on [tickLower, tickUpper) at
 * `sqrtPriceX96`:
 * - below the range: all token0, `L * (sb - sa) / (sa * sb)`
 * - above the range: all token1, `L * (sb - sa)`
 * - inside: token0 on [P, b], token1 on [a, P]
 *
 * Round up for amounts paid into the pool, down for amounts paid out.
 */
export function amountsForLiquidity(
  sqrtPriceX96: bigint,
  tickLower: number,
  tickUpper: number,
  liquidity: bigint,
  roundUp = false
): TokenAmounts {
  if (tickLower >= tickUpper) throw validationError("Invalid tick range");
  checkUint128(liquidity, "liquidity");

  const sa = tickToSqrtPrice(tickLower);
  const sb = tickToSqrtPrice(tickUpper);

  if (sqrtPriceX96 <= sa) {
    return {
      amount0: getAmount0Delta(sa, sb, liquidity, roundUp),
      amount1: 0n,
    };
  }
  if (sqrtPriceX96 >= sb) {
    return {
      amount0: 0n,
      amount1: getAmount1Delta(sa, sb, liquidity, roundUp),
    };
  }
  return {
    amount0: getAmount0Delta(sqrtPriceX96, sb, liquidity, roundUp),
    amount1: getAmount1Delta(sa, sqrtPriceX96, liquidity, roundUp),
  };
}

function liquidityForAmount0(sa: bigint, sb: bigint, amount0: bigint): bigint {
  const intermediate = mulDiv(sa, sb, Q96);
  return mulDiv(amount0, intermediate, sb - sa);
}

function liquidityForAmount1(sa: bigint, sb: bigint, amount1: bigint): bigint {
  return mulDiv(amount1, Q96, sb - sa);
}

/**
 * Largest liquidity on [tickLower, tickUpper) that the two budgets can pay
 * for at `sqrtPriceX96`.
 */
export function liquidityForAmounts(
  sqrtPriceX96: bigint,
  tickLower: number,
  tickUpper: number,
  amount0: bigint,
  amount1: bigint
): bigint {
  if (tickLower >= tickUpper) throw validationError("Invalid tick range");
  const sa = tickToSqrtPrice(tickLower);
  const sb = tickToSqrtPrice(tickUpper);

  let liquidity: bigint;
  if (sqrtPriceX96 <= sa) {
    liquidity = liquidityForAmount0(sa, sb, amount0);
  } else if (sqrtPriceX96 < sb) {
    const liquidity0 = liquidityForAmount0(sqrtPriceX96, sb, amount0);
    const liquidity1 = liquidityForAmount1(sa, sqrtPriceX96, amount1);
    liquidity = liquidity0 < liquidity1 ? liquidity0 : liquidity1;
  } else {
    liquidity = liquidityForAmount1(sa, sb, amount1);
  }
  return checkUint128(liquidity, "liquidity");
}

/**
 * `x + y` for a uint128 liquidity and a signed delta.
 */
export function addDelta(x: bigint, y: bigint): bigint {
  const z = x + y;
  if (z < 0n) {
    throw new PoolError(
      "Insufficient liquidity",
      PoolErrorCode.InsufficientLiquidity
    );
  }
  if (z >> 128n !== 0n) throw overflowError("Liquidity exceeds uint128");
  return z;
}
