import type { PoolAuditRecord, PoolEventListener } from "../types";

export interface AuditStore {
  insert(records: readonly PoolAuditRecord[]): Promise<void>;
}

export type BufferedAuditSinkOptions = {
  batchSize?: number;
  logger?: Partial<Console>;
};

/**
 * Collects records synchronously and writes them to an AuditStore in
 * batches. A failed write puts its batch back at the head of the buffer.
 */
export class BufferedAuditSink implements PoolEventListener {
  private buffer: PoolAuditRecord[] = [];
  private inflight: Promise<void> = Promise.resolve();
  private readonly batchSize: number;
  private readonly logger?: Partial<Console>;

  constructor(
    private readonly store: AuditStore,
    options: BufferedAuditSinkOptions = {}
  ) {
    this.batchSize = Math.max(1, options.batchSize ?? 100);
    this.logger = options.logger;
  }

  get pending(): number {
    return this.buffer.length;
  }

  onPoolEvent(record: PoolAuditRecord): void {
    this.buffer.push(record);
    if (this.buffer.length >= this.batchSize) {
      this.flush().catch((err: unknown) => {
        this.logger?.error?.(
          `⚠️  Audit flush failed, ${this.buffer.length} records kept:`,
          err
        );
      });
    }
  }

  // Drains everything buffered so far, one batch at a time
  flush(): Promise<void> {
    const run = this.inflight.then(() => this.drain());
    this.inflight = run.catch(() => undefined);
    return run;
  }

  private async drain() {
    while (this.buffer.length > 0) {
      const batch = this.buffer.splice(0, this.batchSize);
      try {
        await this.store.insert(batch);
        this.logger?.debug?.(`[audit] stored ${batch.length} records`);
      } catch (err) {
        this.buffer.unshift(...batch);
        throw err;
      }
    }
  }
}
