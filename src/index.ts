export * from "./constants";
export * from "./errors";
export * from "./full_math";
export * from "./tick_math";
export * from "./sqrt_price_math";
export * from "./swap_math";
export * from "./liquidity_math";
export * from "./tick_ledger";
export * from "./position_store";
export * from "./pool_engine";
export type * from "./types";
export { InMemoryCustody } from "./custody/in_memory_custody";
export type { TransferDirection, TransferHook } from "./custody/in_memory_custody";
export { InMemoryShareLedger } from "./custody/in_memory_share_ledger";
export { AuditTrail } from "./audit/audit_trail";
export { BufferedAuditSink } from "./audit/buffered_audit_sink";
export type { AuditStore, BufferedAuditSinkOptions } from "./audit/buffered_audit_sink";
export { PostgresAuditStore, buildInsert, toAuditRow } from "./audit/postgres_audit_store";
export type { AuditRow } from "./audit/postgres_audit_store";
export { loadPoolConfig } from "./config/pool";
export type { PoolConfig } from "./config/pool";
export { createSql, databaseOptions } from "./config/database";
