import dotenv from "dotenv";
import { DEFAULT_FEE_PIPS, DEFAULT_TICK_SEARCH_WINDOW } from "../constants";
import { validationError } from "../errors";
import { priceToSqrtPriceX96, sqrtPriceToTick } from "../tick_math";
import type { Address } from "../types";

dotenv.config();

export interface PoolConfig {
  token0: Address;
  token1: Address;
  sqrtPriceX96: bigint;
  feePips: number;
  tickSearchWindow: number;
  resetTickOnEmpty: boolean;
}

function intVar(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  if (!/^\d+$/.test(raw.trim())) throw validationError(`${name} must be an integer, got "${raw}"`);
  return parseInt(raw, 10);
}

function boolVar(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  if (raw === "true") return true;
  if (raw === "false") return false;
  throw validationError(`${name} must be true or false, got "${raw}"`);
}

/**
 * Reads pool parameters from the environment. The two token addresses are
 * sorted so token0 is always the lower one; the initial price is taken from
 * POOL_INITIAL_SQRT_PRICE_X96 when set, otherwise from POOL_INITIAL_PRICE.
 */
export function loadPoolConfig(env: NodeJS.ProcessEnv = process.env): PoolConfig {
  const a = env.POOL_TOKEN0;
  const b = env.POOL_TOKEN1;
  if (!a || !b) throw validationError("POOL_TOKEN0 and POOL_TOKEN1 are required");
  if (a.toLowerCase() === b.toLowerCase()) {
    throw validationError("POOL_TOKEN0 and POOL_TOKEN1 must differ");
  }
  const [token0, token1] = a.toLowerCase() < b.toLowerCase() ? [a, b] : [b, a];

  let sqrtPriceX96: bigint;
  const rawSqrt = env.POOL_INITIAL_SQRT_PRICE_X96;
  if (rawSqrt) {
    if (!/^\d+$/.test(rawSqrt.trim())) {
      throw validationError(`POOL_INITIAL_SQRT_PRICE_X96 must be an integer, got "${rawSqrt}"`);
    }
    sqrtPriceX96 = BigInt(rawSqrt.trim());
  } else if (env.POOL_INITIAL_PRICE) {
    const price = env.POOL_INITIAL_PRICE.trim();
    if (!/^\d+(\.\d+)?$/.test(price) || /^0+(\.0+)?$/.test(price)) {
      throw validationError(`POOL_INITIAL_PRICE must be a positive decimal, got "${price}"`);
    }
    sqrtPriceX96 = priceToSqrtPriceX96(price);
  } else {
    throw validationError("POOL_INITIAL_PRICE or POOL_INITIAL_SQRT_PRICE_X96 is required");
  }
  // rejects prices outside the tick range
  sqrtPriceToTick(sqrtPriceX96);

  const feePips = intVar(env, "POOL_FEE_PIPS", DEFAULT_FEE_PIPS);
  if (feePips >= 1_000_000) throw validationError(`POOL_FEE_PIPS must be below 1000000`);
  const tickSearchWindow = intVar(env, "POOL_TICK_SEARCH_WINDOW", DEFAULT_TICK_SEARCH_WINDOW);
  if (tickSearchWindow < 1) throw validationError("POOL_TICK_SEARCH_WINDOW must be at least 1");

  return {
    token0,
    token1,
    sqrtPriceX96,
    feePips,
    tickSearchWindow,
    resetTickOnEmpty: boolVar(env, "POOL_RESET_TICK_ON_EMPTY", false),
  };
}
