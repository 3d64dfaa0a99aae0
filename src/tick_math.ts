import Decimal from "decimal.js";
import {
  MAX_SQRT_RATIO,
  MAX_TICK,
  MIN_SQRT_RATIO,
  MIN_TICK,
  MAX_UINT256,
  Q96,
} from "./constants";
import { PoolError, PoolErrorCode } from "./errors";

/***************** Precision setup *****************/
export const D = (x: Decimal.Value) => new Decimal(x);
Decimal.set({
  precision: 80,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -1e6,
  toExpPos: 1e6,
});

const Q96D = D(Q96.toString());

// sqrt(1.0001)^-(2^i) in Q128.128, for i = 1..19 (bit 0 seeds the ratio)
const TICK_FACTORS: ReadonlyArray<readonly [number, bigint]> = [
  [0x2, 0xfff97272373d413259a46990580e213an],
  [0x4, 0xfff2e50f5f656932ef12357cf3c7fdccn],
  [0x8, 0xffe5caca7e10e4e61c3624eaa0941cd0n],
  [0x10, 0xffcb9843d60f6159c9db58835c926644n],
  [0x20, 0xff973b41fa98c081472e6896dfb254c0n],
  [0x40, 0xff2ea16466c96a3843ec78b326b52861n],
  [0x80, 0xfe5dee046a99a2a811c461f1969c3053n],
  [0x100, 0xfcbe86c7900a88aedcffc83b479aa3a4n],
  [0x200, 0xf987a7253ac413176f2b074cf7815e54n],
  [0x400, 0xf3392b0822b70005940c7a398e4b70f3n],
  [0x800, 0xe7159475a2c29b7443b29c7fa6e889d9n],
  [0x1000, 0xd097f3bdfd2022b8845ad8f792aa5825n],
  [0x2000, 0xa9f746462d870fdf8a65dc1f90e061e5n],
  [0x4000, 0x70d869a156d2a1b890bb3df62baf32f7n],
  [0x8000, 0x31be135f97d08fd981231505542fcfa6n],
  [0x10000, 0x9aa508b5b7a84e1c677de54f3e99bc9n],
  [0x20000, 0x5d6af8dedb81196699c329225ee604n],
  [0x40000, 0x2216e584f5fa1ea926041bedfe98n],
  [0x80000, 0x48a170391f7dc42444e8fa2n],
];

// log_sqrt(1.0001)(2) in Q128.128 and the error bounds of the 14-bit log2
const LOG_SQRT_10001 = 255738958999603826347141n;
const TICK_LOW_ERROR = 3402992956809132418596140100660247210n;
const TICK_HI_ERROR = 291339464771989622907027621153398088495n;

/**
 * sqrt(1.0001^tick) as a Q64.96 number, rounded up.
 * Strictly increasing in tick.
 */
export function tickToSqrtPrice(tick: number): bigint {
  if (!Number.isInteger(tick) || tick < MIN_TICK || tick > MAX_TICK) {
    throw new PoolError(
      `Tick ${tick} out of bounds [${MIN_TICK}, ${MAX_TICK}]`,
      PoolErrorCode.PriceOutOfRange
    );
  }

  const absTick = Math.abs(tick);
  let ratio =
    (absTick & 0x1) !== 0
      ? 0xfffcb933bd6fad37aa2d162d1a594001n
      : 0x100000000000000000000000000000000n;
  for (const [bit, factor] of TICK_FACTORS) {
    if ((absTick & bit) !== 0) ratio = (ratio * factor) >> 128n;
  }

  if (tick > 0) ratio = MAX_UINT256 / ratio;

  // Q128.128 -> Q64.96, rounding up so that sqrtPriceToTick inverts exactly
  return (ratio >> 32n) + (ratio % (1n << 32n) === 0n ? 0n : 1n);
}

/**
 * Greatest tick whose sqrt price is <= sqrtPriceX96.
 */
export function sqrtPriceToTick(sqrtPriceX96: bigint): number {
  if (sqrtPriceX96 < MIN_SQRT_RATIO || sqrtPriceX96 > MAX_SQRT_RATIO) {
    throw new PoolError(
      `Sqrt price ${sqrtPriceX96} out of bounds [${MIN_SQRT_RATIO}, ${MAX_SQRT_RATIO}]`,
      PoolErrorCode.PriceOutOfRange
    );
  }
  if (sqrtPriceX96 === MAX_SQRT_RATIO) return MAX_TICK;

  const ratio = sqrtPriceX96 << 32n;

  // most significant bit
  let r = ratio;
  let msb = 0n;
  for (const shift of [128n, 64n, 32n, 16n, 8n, 4n, 2n, 1n]) {
    if (r >= 1n << shift) {
      msb += shift;
      r >>= shift;
    }
  }

  r = msb >= 128n ? ratio >> (msb - 127n) : ratio << (127n - msb);

  // integer part of log2, then 14 fractional bits by repeated squaring
  let log2 = (msb - 128n) << 64n;
  for (let bit = 63n; bit >= 50n; bit--) {
    r = (r * r) >> 127n;
    const f = r >> 128n;
    log2 |= f << bit;
    r >>= f;
  }

  const logSqrt10001 = log2 * LOG_SQRT_10001;
  const tickLow = Number((logSqrt10001 - TICK_LOW_ERROR) >> 128n);
  const tickHi = Number((logSqrt10001 + TICK_HI_ERROR) >> 128n);

  const tick =
    tickLow === tickHi
      ? tickLow
      : tickToSqrtPrice(Math.min(tickHi, MAX_TICK)) <= sqrtPriceX96
      ? tickHi
      : tickLow;
  return Math.min(Math.max(tick, MIN_TICK), MAX_TICK);
}

/***************** Decimal helpers *****************/
export function tickToPrice(tick: number): Decimal {
  return D(1.0001).pow(tick);
}

export function priceToSqrtPriceX96(price: Decimal.Value): bigint {
  const p = D(price);
  if (!p.isFinite() || p.lte(0)) {
    throw new PoolError(
      `Price ${p.toString()} must be positive`,
      PoolErrorCode.PriceOutOfRange
    );
  }
  return BigInt(p.sqrt().mul(Q96D).floor().toFixed(0));
}

export function sqrtPriceX96ToPrice(sqrtPriceX96: bigint): Decimal {
  const s = D(sqrtPriceX96.toString()).div(Q96D);
  return s.mul(s);
}

export function priceToTick(price: Decimal.Value): number {
  return sqrtPriceToTick(priceToSqrtPriceX96(price));
}
