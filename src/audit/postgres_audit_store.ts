import type { Sql } from "../config/database";
import type { PoolAuditRecord } from "../types";
import type { AuditStore } from "./buffered_audit_sink";

export interface AuditRow {
  pool_id: string;
  seq: number;
  kind: PoolAuditRecord["kind"];
  actor: string;
  timestamp_ms: number;
  tick_before: number;
  tick_after: number;
  liquidity_before: string;
  liquidity_after: string;
  sqrt_price_before: string;
  sqrt_price_after: string;
  amount0: string;
  amount1: string;
  data: string; // JSON, bigints as decimal strings
}

const COLUMNS = [
  "pool_id",
  "seq",
  "kind",
  "actor",
  "timestamp_ms",
  "tick_before",
  "tick_after",
  "liquidity_before",
  "liquidity_after",
  "sqrt_price_before",
  "sqrt_price_after",
  "amount0",
  "amount1",
  "data",
] as const satisfies readonly (keyof AuditRow)[];

export function toAuditRow(poolId: string, record: PoolAuditRecord): AuditRow {
  const { seq, kind, actor, timestampMs, before, after, amount0, amount1 } = record;
  return {
    pool_id: poolId,
    seq,
    kind,
    actor,
    timestamp_ms: timestampMs,
    tick_before: before.tick,
    tick_after: after.tick,
    liquidity_before: before.liquidity.toString(),
    liquidity_after: after.liquidity.toString(),
    sqrt_price_before: before.sqrtPriceX96.toString(),
    sqrt_price_after: after.sqrtPriceX96.toString(),
    amount0: amount0.toString(),
    amount1: amount1.toString(),
    data: JSON.stringify(record, (_key, value: unknown) =>
      typeof value === "bigint" ? value.toString() : value
    ),
  };
}

export function buildInsert(
  poolId: string,
  records: readonly PoolAuditRecord[]
): { text: string; values: (string | number)[] } {
  const values: (string | number)[] = [];
  const tuples = records.map((record) => {
    const row = toAuditRow(poolId, record);
    const placeholders = COLUMNS.map((col) => {
      values.push(row[col]);
      return col === "data" ? `$${values.length}::jsonb` : `$${values.length}`;
    });
    return `(${placeholders.join(", ")})`;
  });

  const text = `INSERT INTO pool_audit_records (${COLUMNS.join(
    ", "
  )}) VALUES ${tuples.join(", ")} ON CONFLICT (pool_id, seq) DO NOTHING`;
  return { text, values };
}

export class PostgresAuditStore implements AuditStore {
  constructor(private readonly sql: Sql, private readonly poolId: string) {}

  async insert(records: readonly PoolAuditRecord[]): Promise<void> {
    if (records.length === 0) return;
    const { text, values } = buildInsert(this.poolId, records);
    await this.sql.unsafe(text, values);
  }

  /**
   * Close database connection
   */
  async close(): Promise<void> {
    await this.sql.end();
  }
}
