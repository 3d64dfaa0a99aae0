import type { Address, PoolAuditRecord, PoolEventListener } from "../types";

type RecordOf<K extends PoolAuditRecord["kind"]> = Extract<
  PoolAuditRecord,
  { kind: K }
>;

export class AuditTrail implements PoolEventListener {
  private records: PoolAuditRecord[] = [];

  onPoolEvent(record: PoolAuditRecord): void {
    this.records.push(record);
  }

  all(): readonly PoolAuditRecord[] {
    return this.records;
  }

  byKind<K extends PoolAuditRecord["kind"]>(kind: K): RecordOf<K>[] {
    return this.records.filter(
      (r): r is RecordOf<K> => r.kind === kind
    );
  }

  byActor(actor: Address): PoolAuditRecord[] {
    return this.records.filter((r) => r.actor === actor);
  }

  last(): PoolAuditRecord | undefined {
    return this.records[this.records.length - 1];
  }

  clear() {
    this.records = [];
  }
}
