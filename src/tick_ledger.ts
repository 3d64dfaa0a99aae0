import { MAX_TICK, MIN_TICK } from "./constants";
import { validationError } from "./errors";
import { checkInt128 } from "./full_math";
import { addDelta } from "./liquidity_math";

export interface TickInfo {
  // sum of liquidity referencing this tick as either boundary
  liquidityGross: bigint;
  // applied to active liquidity when price crosses upward, negated downward
  liquidityNet: bigint;
  initialized: boolean;
}

export type NextTick = {
  tick: number;
  found: boolean;
};

export type TickLedgerOptions = {
  // forget a tick once its gross liquidity returns to zero
  resetOnEmpty?: boolean;
};

const EMPTY_TICK: Readonly<TickInfo> = Object.freeze({
  liquidityGross: 0n,
  liquidityNet: 0n,
  initialized: false,
});

/**
 * Sparse tick -> TickInfo map with a sorted index of initialized ticks.
 * Absent ticks read as EMPTY_TICK.
 */
export class TickLedger {
  private readonly ticks: Map<number, TickInfo> = new Map();
  // ascending, only initialized ticks
  private index: number[] = [];
  readonly resetOnEmpty: boolean;

  constructor(options: TickLedgerOptions = {}) {
    this.resetOnEmpty = options.resetOnEmpty ?? false;
  }

  get(tick: number): Readonly<TickInfo> {
    return this.ticks.get(tick) ?? EMPTY_TICK;
  }

  get size(): number {
    return this.ticks.size;
  }

  initializedTicks(): readonly number[] {
    return this.index;
  }

  /**
   * Adds `liquidityDelta` at `tick` as the lower (`upper = false`) or upper
   * boundary of a range. Returns whether the initialized flag changed.
   */
  recordLiquidityChange(
    tick: number,
    liquidityDelta: bigint,
    upper: boolean
  ): { flipped: boolean } {
    if (!Number.isInteger(tick) || tick < MIN_TICK || tick > MAX_TICK) {
      throw validationError("Tick out of range");
    }

    const before = this.get(tick);
    const liquidityGross = addDelta(before.liquidityGross, liquidityDelta);
    const liquidityNet = checkInt128(
      upper
        ? before.liquidityNet - liquidityDelta
        : before.liquidityNet + liquidityDelta,
      "liquidityNet"
    );

    if (liquidityGross === 0n && this.resetOnEmpty) {
      const flipped = before.initialized;
      this.ticks.delete(tick);
      if (flipped) this.removeFromIndex(tick);
      return { flipped };
    }

    const initialized = before.initialized || liquidityGross > 0n;
    this.ticks.set(tick, { liquidityGross, liquidityNet, initialized });
    const flipped = initialized !== before.initialized;
    if (flipped) this.insertIntoIndex(tick);
    return { flipped };
  }

  /**
   * Nearest initialized tick at or below `fromTick` (`lte`) or strictly above
   * it, no further than `searchWindow` ticks away. Without one, returns the
   * window boundary (clamped to the tick bounds) with `found = false`.
   */
  findNextInitializedTick(
    fromTick: number,
    lte: boolean,
    searchWindow: number
  ): NextTick {
    if (!Number.isInteger(searchWindow) || searchWindow < 1) {
      throw validationError("Search window must be a positive integer");
    }

    if (lte) {
      const boundary = Math.max(fromTick - searchWindow, MIN_TICK);
      // last index with value <= fromTick
      const i = this.upperBound(fromTick) - 1;
      if (i >= 0 && this.index[i] >= boundary) {
        return { tick: this.index[i], found: true };
      }
      return { tick: boundary, found: false };
    }

    const boundary = Math.min(fromTick + searchWindow, MAX_TICK);
    // first index with value > fromTick
    const i = this.upperBound(fromTick);
    if (i < this.index.length && this.index[i] <= boundary) {
      return { tick: this.index[i], found: true };
    }
    return { tick: boundary, found: false };
  }

  clone(): TickLedger {
    const copy = new TickLedger({ resetOnEmpty: this.resetOnEmpty });
    for (const [tick, info] of this.ticks) {
      copy.ticks.set(tick, { ...info });
    }
    copy.index = [...this.index];
    return copy;
  }

  entries(): Array<[number, Readonly<TickInfo>]> {
    return Array.from(this.ticks.entries()).sort((a, b) => a[0] - b[0]);
  }

  private upperBound(tick: number): number {
    let lo = 0;
    let hi = this.index.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.index[mid] <= tick) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }

  private insertIntoIndex(tick: number) {
    this.index.splice(this.upperBound(tick), 0, tick);
  }

  private removeFromIndex(tick: number) {
    const i = this.upperBound(tick) - 1;
    if (i >= 0 && this.index[i] === tick) this.index.splice(i, 1);
  }
}
