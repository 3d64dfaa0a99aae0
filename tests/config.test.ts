import { describe, it, expect } from "vitest";
import { databaseOptions } from "../src/config/database";
import { loadPoolConfig } from "../src/config/pool";
import { Q96 } from "../src/constants";
import { PoolError, PoolErrorCode } from "../src/errors";

const base = { POOL_TOKEN0: "0xbbbb", POOL_TOKEN1: "0xaaaa", POOL_INITIAL_PRICE: "1" };

const codeOf = (env: NodeJS.ProcessEnv) => {
  try {
    loadPoolConfig(env);
  } catch (e) {
    return e instanceof PoolError ? e.errorCode : "unexpected";
  }
  return "none";
};

describe("loadPoolConfig", () => {
  it("should sort tokens and apply defaults", () => {
    expect(loadPoolConfig(base)).toEqual({
      token0: "0xaaaa",
      token1: "0xbbbb",
      sqrtPriceX96: Q96,
      feePips: 3000,
      tickSearchWindow: 2560,
      resetTickOnEmpty: false,
    });
  });

  it("should prefer an explicit sqrt price", () => {
    const config = loadPoolConfig({
      ...base,
      POOL_INITIAL_SQRT_PRICE_X96: "112045541949572279837463876454",
      POOL_FEE_PIPS: "500",
      POOL_TICK_SEARCH_WINDOW: "64",
      POOL_RESET_TICK_ON_EMPTY: "true",
    });
    expect(config.sqrtPriceX96).toBe(112045541949572279837463876454n);
    expect(config.feePips).toBe(500);
    expect(config.tickSearchWindow).toBe(64);
    expect(config.resetTickOnEmpty).toBe(true);
  });

  it("should reject missing or malformed values", () => {
    expect(codeOf({ POOL_TOKEN0: "0xaaaa", POOL_INITIAL_PRICE: "1" })).toBe(PoolErrorCode.ValidationError);
    expect(codeOf({ ...base, POOL_TOKEN1: "0xBBBB" })).toBe(PoolErrorCode.ValidationError);
    expect(codeOf({ POOL_TOKEN0: "0xaaaa", POOL_TOKEN1: "0xbbbb" })).toBe(PoolErrorCode.ValidationError);
    expect(codeOf({ ...base, POOL_INITIAL_PRICE: "0" })).toBe(PoolErrorCode.ValidationError);
    expect(codeOf({ ...base, POOL_INITIAL_PRICE: "abc" })).toBe(PoolErrorCode.ValidationError);
    expect(codeOf({ ...base, POOL_FEE_PIPS: "0.3" })).toBe(PoolErrorCode.ValidationError);
    expect(codeOf({ ...base, POOL_FEE_PIPS: "1000000" })).toBe(PoolErrorCode.ValidationError);
    expect(codeOf({ ...base, POOL_TICK_SEARCH_WINDOW: "0" })).toBe(PoolErrorCode.ValidationError);
    expect(codeOf({ ...base, POOL_RESET_TICK_ON_EMPTY: "yes" })).toBe(PoolErrorCode.ValidationError);
  });

  it("should reject a price outside the tick range", () => {
    expect(codeOf({ ...base, POOL_INITIAL_SQRT_PRICE_X96: "1" })).toBe(PoolErrorCode.PriceOutOfRange);
  });
});

describe("databaseOptions", () => {
  it("should read the PG variables", () => {
    const options = databaseOptions({ PGHOST: "db", PGPORT: "6543", PGDATABASE: "pools", PGSSL: "true" });
    expect(options.host).toBe("db");
    expect(options.port).toBe(6543);
    expect(options.database).toBe("pools");
    expect(options.ssl).toBe("require");
    expect(options.max).toBe(10);
  });
});
