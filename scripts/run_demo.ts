/**
 * Pool demo
 *
 * Creates two tokens, funds two users, opens a pool and walks through
 * mint -> swap -> burn, printing state and audit records along the way.
 *
 *   tsx scripts/run_demo.ts            # in-memory audit trail only
 *   tsx scripts/run_demo.ts --persist  # also write records to Postgres
 */

import { parseArgs } from "util";
import { AuditTrail } from "../src/audit/audit_trail";
import { BufferedAuditSink } from "../src/audit/buffered_audit_sink";
import { PostgresAuditStore } from "../src/audit/postgres_audit_store";
import { createSql } from "../src/config/database";
import { loadPoolConfig, type PoolConfig } from "../src/config/pool";
import { InMemoryCustody } from "../src/custody/in_memory_custody";
import { InMemoryShareLedger } from "../src/custody/in_memory_share_ledger";
import { liquidityForAmounts } from "../src/liquidity_math";
import { PoolEngine } from "../src/pool_engine";
import { priceToSqrtPriceX96, sqrtPriceX96ToPrice } from "../src/tick_math";
import type { PoolEventListener } from "../src/types";

const FUNDING = 10n ** 24n;

function demoConfig(): PoolConfig {
  if (process.env.POOL_TOKEN0 || process.env.POOL_TOKEN1) {
    return loadPoolConfig();
  }
  const a = "0x5fbdb2315678afecb367f032d93f642f64180aa3";
  const b = "0xe7f1725e7734ce288f8367e1bb143e90bb3f0512";
  const [token0, token1] = a < b ? [a, b] : [b, a];
  return {
    token0,
    token1,
    sqrtPriceX96: priceToSqrtPriceX96("1000"),
    feePips: 3000,
    tickSearchWindow: 2560,
    resetTickOnEmpty: false,
  };
}

const fmt = (x: bigint) => x.toLocaleString("en-US");

async function main() {
  const { values: args } = parseArgs({
    options: { persist: { type: "boolean", default: false } },
  });

  console.log("=== Concentrated Liquidity Pool Demo ===\n");

  const config = demoConfig();
  const custody = new InMemoryCustody("pool");
  const shares = new InMemoryShareLedger();
  const trail = new AuditTrail();
  const listeners: PoolEventListener[] = [trail];

  const sql = args.persist ? createSql() : undefined;
  const store = sql ? new PostgresAuditStore(sql, `${config.token0}/${config.token1}`) : undefined;
  const sink = store ? new BufferedAuditSink(store, { batchSize: 50, logger: console }) : undefined;
  if (sink) listeners.push(sink);

  const pool = new PoolEngine({ ...config, custody, shares, listeners, logger: console });

  for (const user of ["alice", "bob"]) {
    for (const token of [pool.token0, pool.token1]) {
      custody.mintTo(user, token, FUNDING);
      custody.approve(user, token, FUNDING);
    }
  }

  const start = pool.getPoolState();
  console.log(`token0: ${pool.token0}`);
  console.log(`token1: ${pool.token1}`);
  console.log(`Price: ${sqrtPriceX96ToPrice(start.sqrtPriceX96).toFixed(6)} (tick ${start.currentTick})\n`);

  // ±120 ticks (~1.2%) around the starting tick
  const tickLower = start.currentTick - 120;
  const tickUpper = start.currentTick + 120;
  const liquidity = liquidityForAmounts(start.sqrtPriceX96, tickLower, tickUpper, 10n ** 18n, 10n ** 21n);

  const minted = pool.mint({
    owner: "alice",
    tickLower,
    tickUpper,
    amount: liquidity,
    amount0Max: 10n ** 18n + 10n,
    amount1Max: 10n ** 21n + 10n,
  });
  console.log(`[MINT] alice L=${fmt(liquidity)} on [${tickLower}, ${tickUpper}]`);
  console.log(`       paid ${fmt(minted.amount0)} token0, ${fmt(minted.amount1)} token1\n`);

  const swapped = pool.swap({ sender: "bob", zeroForOne: true, amountSpecified: 10n ** 17n });
  console.log(`[SWAP] bob sells ${fmt(swapped.amount0)} token0 for ${fmt(-swapped.amount1)} token1`);
  console.log(`       fee ${fmt(swapped.feeAmount)}, now tick ${swapped.tick}\n`);

  const burned = pool.burn({ owner: "alice", tickLower, tickUpper, amount: liquidity / 2n });
  console.log(`[BURN] alice L=${fmt(liquidity / 2n)}`);
  console.log(`       got ${fmt(burned.amount0)} token0, ${fmt(burned.amount1)} token1\n`);

  console.log("=== Final state ===");
  console.log(JSON.stringify(pool.stateToJSON(), null, 2));

  console.log("\n=== Audit records ===");
  for (const r of trail.all()) {
    console.log(
      `#${r.seq} ${r.kind.padEnd(4)} ${r.actor.padEnd(5)} tick ${r.before.tick} -> ${r.after.tick}, ` +
        `amount0 ${fmt(r.amount0)}, amount1 ${fmt(r.amount1)}`
    );
  }

  if (sink && store) {
    await sink.flush();
    console.log(`\n✅ Stored ${trail.all().length} records in pool_audit_records`);
    await store.close();
  }
}

main().catch((err) => {
  console.error("❌ Demo failed:", err);
  process.exit(1);
});
