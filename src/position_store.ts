import { validationError } from "./errors";
import { addDelta } from "./liquidity_math";
import type { Address } from "./types";

export class PositionKey {
  owner: Address;
  lower: number;
  upper: number;
  constructor(owner: Address, lower: number, upper: number) {
    this.owner = owner;
    this.lower = lower;
    this.upper = upper;
  }
  id(): string {
    return `${this.owner}:${this.lower}:${this.upper}`;
  }
}

export interface PositionInfo {
  liquidity: bigint;
  // fee checkpoints and owed amounts are carried but not accrued yet
  feeGrowthInside0LastX128: bigint;
  feeGrowthInside1LastX128: bigint;
  tokensOwed0: bigint;
  tokensOwed1: bigint;
}

const EMPTY_POSITION: Readonly<PositionInfo> = Object.freeze({
  liquidity: 0n,
  feeGrowthInside0LastX128: 0n,
  feeGrowthInside1LastX128: 0n,
  tokensOwed0: 0n,
  tokensOwed1: 0n,
});

/**
 * (owner, lower, upper) -> PositionInfo. Absent keys read as an empty
 * position; entries are never pruned.
 */
export class PositionStore {
  private readonly positions: Map<string, { key: PositionKey; info: PositionInfo }> =
    new Map();

  get(owner: Address, lower: number, upper: number): Readonly<PositionInfo> {
    return (
      this.positions.get(new PositionKey(owner, lower, upper).id())?.info ??
      EMPTY_POSITION
    );
  }

  update(
    owner: Address,
    lower: number,
    upper: number,
    liquidityDelta: bigint
  ): Readonly<PositionInfo> {
    if (lower >= upper) throw validationError("Invalid tick range");

    const key = new PositionKey(owner, lower, upper);
    const entry = this.positions.get(key.id());
    const before = entry?.info ?? EMPTY_POSITION;
    const info: PositionInfo = {
      ...before,
      liquidity: addDelta(before.liquidity, liquidityDelta),
    };
    this.positions.set(key.id(), { key, info });
    return info;
  }

  list(): Array<{ key: PositionKey; info: Readonly<PositionInfo> }> {
    return Array.from(this.positions.values());
  }

  clone(): PositionStore {
    const copy = new PositionStore();
    for (const [id, { key, info }] of this.positions) {
      copy.positions.set(id, { key, info: { ...info } });
    }
    return copy;
  }
}
