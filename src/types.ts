export type Address = string;

/***************** Collaborators *****************/
export interface Custody {
  // pulls `amount` of `token` from `account` into the pool; throws
  // InsufficientFunds / InsufficientAllowance
  debit(account: Address, token: Address, amount: bigint): void;
  // pays `amount` of `token` from the pool to `account`
  credit(account: Address, token: Address, amount: bigint): void;
  // undo a debit/credit of the same call; must not fail or call out
  refund(account: Address, token: Address, amount: bigint): void;
  reclaim(account: Address, token: Address, amount: bigint): void;
}

export interface ShareLedger {
  mint(owner: Address, amount: bigint): void;
  burn(owner: Address, amount: bigint): void;
  balanceOf(owner: Address): bigint;
}

/***************** Pool state *****************/
export interface PoolState {
  liquidity: bigint; // active liquidity
  sqrtPriceX96: bigint; // Q64.96
  tick: number;
  feeGrowthGlobal0X128: bigint;
  feeGrowthGlobal1X128: bigint;
}

export type PoolStateView = {
  liquidity: bigint;
  sqrtPriceX96: bigint;
  currentTick: number;
};

export type PositionView = {
  liquidity: bigint;
  tokensOwed0: bigint;
  tokensOwed1: bigint;
};

/***************** Operation args *****************/
export interface MintArgs {
  owner: Address;
  tickLower: number;
  tickUpper: number;
  amount: bigint; // liquidity
  amount0Max: bigint;
  amount1Max: bigint;
}

export interface BurnArgs {
  owner: Address;
  tickLower: number;
  tickUpper: number;
  amount: bigint; // liquidity
}

export interface SwapArgs {
  sender: Address;
  recipient?: Address; // defaults to sender
  zeroForOne: boolean; // true: token0 -> token1
  amountSpecified: bigint; // exact input (positive) or exact output (negative)
  sqrtPriceLimitX96?: bigint;
}

/***************** Operation results *****************/
export type MintResult = {
  amount0: bigint;
  amount1: bigint;
};

export type BurnResult = {
  amount0: bigint;
  amount1: bigint;
};

export type SwapResult = {
  // positive: paid by the caller, negative: paid to the recipient
  amount0: bigint;
  amount1: bigint;
  sqrtPriceX96: bigint;
  tick: number;
  liquidity: bigint;
  feeAmount: bigint;
  crossedTicks: number[];
};

/***************** Audit records *****************/
export type StateSnapshot = {
  liquidity: bigint;
  sqrtPriceX96: bigint;
  tick: number;
};

type AuditBase = {
  seq: number;
  timestampMs: number;
  actor: Address;
  before: StateSnapshot;
  after: StateSnapshot;
};

export type MintAuditRecord = AuditBase & {
  kind: "mint";
  tickLower: number;
  tickUpper: number;
  liquidity: bigint;
  amount0: bigint;
  amount1: bigint;
  positionLiquidityAfter: bigint;
};

export type BurnAuditRecord = AuditBase & {
  kind: "burn";
  tickLower: number;
  tickUpper: number;
  liquidity: bigint;
  amount0: bigint;
  amount1: bigint;
  positionLiquidityAfter: bigint;
};

export type SwapAuditRecord = AuditBase & {
  kind: "swap";
  recipient: Address;
  zeroForOne: boolean;
  amountSpecified: bigint;
  amount0: bigint;
  amount1: bigint;
  feeAmount: bigint;
  crossedTicks: number[];
};

export type PoolAuditRecord = MintAuditRecord | BurnAuditRecord | SwapAuditRecord;

export interface PoolEventListener {
  onPoolEvent(record: PoolAuditRecord): void;
}
