import {
  MAX_INT128,
  MAX_INT256,
  MAX_UINT128,
  MAX_UINT160,
  MAX_UINT256,
  MIN_INT128,
  MIN_INT256,
} from "./constants";
import { overflowError } from "./errors";

// bigint products never wrap, so the only checks needed are on the results

export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) throw overflowError("mulDiv: division by zero");
  return checkUint256((a * b) / denominator, "mulDiv");
}

export function mulDivRoundingUp(
  a: bigint,
  b: bigint,
  denominator: bigint
): bigint {
  if (denominator === 0n)
    throw overflowError("mulDivRoundingUp: division by zero");
  const product = a * b;
  const result =
    product / denominator + (product % denominator > 0n ? 1n : 0n);
  return checkUint256(result, "mulDivRoundingUp");
}

export function divRoundingUp(x: bigint, y: bigint): bigint {
  if (y === 0n) throw overflowError("divRoundingUp: division by zero");
  return x / y + (x % y > 0n ? 1n : 0n);
}

/***************** Width checks *****************/
function checkRange(
  x: bigint,
  min: bigint,
  max: bigint,
  width: string,
  label: string
): bigint {
  if (x < min || x > max) {
    throw overflowError(`${label}: ${x} does not fit ${width}`);
  }
  return x;
}

export const checkUint128 = (x: bigint, label = "value") =>
  checkRange(x, 0n, MAX_UINT128, "uint128", label);
export const checkUint160 = (x: bigint, label = "value") =>
  checkRange(x, 0n, MAX_UINT160, "uint160", label);
export const checkUint256 = (x: bigint, label = "value") =>
  checkRange(x, 0n, MAX_UINT256, "uint256", label);
export const checkInt128 = (x: bigint, label = "value") =>
  checkRange(x, MIN_INT128, MAX_INT128, "int128", label);
export const checkInt256 = (x: bigint, label = "value") =>
  checkRange(x, MIN_INT256, MAX_INT256, "int256", label);
