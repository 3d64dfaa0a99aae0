import {
  DEFAULT_FEE_PIPS,
  DEFAULT_TICK_SEARCH_WINDOW,
  FEE_DENOMINATOR,
  MAX_SQRT_RATIO,
  MAX_TICK,
  MIN_SQRT_RATIO,
  MIN_TICK,
} from "./constants";
import { PoolError, PoolErrorCode, validationError } from "./errors";
import { checkInt256, checkUint128 } from "./full_math";
import { addDelta, amountsForLiquidity } from "./liquidity_math";
import { PositionStore, type PositionInfo } from "./position_store";
import { computeSwapStep } from "./swap_math";
import { TickLedger, type TickInfo } from "./tick_ledger";
import {
  sqrtPriceToTick,
  sqrtPriceX96ToPrice,
  tickToSqrtPrice,
} from "./tick_math";
import type {
  Address,
  BurnArgs,
  BurnResult,
  Custody,
  MintArgs,
  MintResult,
  PoolAuditRecord,
  PoolEventListener,
  PoolState,
  PoolStateView,
  PositionView,
  ShareLedger,
  StateSnapshot,
  SwapArgs,
  SwapResult,
} from "./types";

export type PoolEngineConfig = {
  token0: Address;
  token1: Address;
  sqrtPriceX96: bigint; // initial price, Q64.96
  custody: Custody;
  shares: ShareLedger;
  feePips?: number; // default 3000 = 0.30%
  tickSearchWindow?: number;
  resetTickOnEmpty?: boolean;
  listeners?: PoolEventListener[];
  logger?: Partial<Console>;
  now?: () => number;
};

type WorkingCopy = {
  state: PoolState;
  ticks: TickLedger;
  positions: PositionStore;
};

type Transfer = {
  account: Address;
  token: Address;
  amount: bigint;
};

type Settlement = {
  debits: Transfer[];
  credits: Transfer[];
  shares?: { kind: "mint" | "burn"; owner: Address; amount: bigint };
};

const snapshot = (s: PoolState): StateSnapshot => ({
  liquidity: s.liquidity,
  sqrtPriceX96: s.sqrtPriceX96,
  tick: s.tick,
});

/***************** Pool core *****************/
export class PoolEngine {
  readonly token0: Address;
  readonly token1: Address;
  readonly feePips: number;
  readonly tickSearchWindow: number;

  private state: PoolState;
  private ticks: TickLedger;
  private positions: PositionStore = new PositionStore();

  private readonly custody: Custody;
  private readonly shares: ShareLedger;
  private readonly listeners: PoolEventListener[];
  private readonly logger?: Partial<Console>;
  private readonly now: () => number;

  private locked = false;
  private seq = 0;

  constructor(config: PoolEngineConfig) {
    if (!config.token0 || !config.token1) {
      throw validationError("token0 and token1 are required");
    }
    if (config.token0.toLowerCase() >= config.token1.toLowerCase()) {
      throw validationError("token0 must sort before token1");
    }
    const feePips = config.feePips ?? DEFAULT_FEE_PIPS;
    if (!Number.isInteger(feePips) || feePips < 0 || feePips >= FEE_DENOMINATOR) {
      throw validationError(`Invalid fee ${feePips}`);
    }
    const window = config.tickSearchWindow ?? DEFAULT_TICK_SEARCH_WINDOW;
    if (!Number.isInteger(window) || window < 1) {
      throw validationError(`Invalid tick search window ${window}`);
    }

    this.token0 = config.token0;
    this.token1 = config.token1;
    this.feePips = feePips;
    this.tickSearchWindow = window;
    this.custody = config.custody;
    this.shares = config.shares;
    this.listeners = [...(config.listeners ?? [])];
    this.logger = config.logger;
    this.now = config.now ?? Date.now;
    this.ticks = new TickLedger({ resetOnEmpty: config.resetTickOnEmpty });
    this.state = {
      liquidity: 0n,
      sqrtPriceX96: config.sqrtPriceX96,
      tick: sqrtPriceToTick(config.sqrtPriceX96),
      feeGrowthGlobal0X128: 0n,
      feeGrowthGlobal1X128: 0n,
    };
  }

  addListener(listener: PoolEventListener): void {
    this.listeners.push(listener);
  }

  // ----- Mint -----
  mint(args: MintArgs): MintResult {
    const { result, record } = this.lock(() => {
      this.validateRange(args.tickLower, args.tickUpper);
      if (args.amount <= 0n) throw validationError("Amount must be positive");
      checkUint128(args.amount, "liquidity");

      const w = this.workingCopy();
      const before = snapshot(w.state);
      const { amount0, amount1 } = amountsForLiquidity(
        w.state.sqrtPriceX96,
        args.tickLower,
        args.tickUpper,
        args.amount,
        true
      );
      if (amount0 > args.amount0Max || amount1 > args.amount1Max) {
        throw new PoolError(
          `Slippage check failed: needs ${amount0} token0 / ${amount1} token1`,
          PoolErrorCode.SlippageExceeded
        );
      }

      const position = this.modifyPosition(
        w,
        args.owner,
        args.tickLower,
        args.tickUpper,
        args.amount
      );

      this.settle({
        debits: this.transfers(args.owner, amount0, amount1),
        credits: [],
        shares: { kind: "mint", owner: args.owner, amount: args.amount },
      });
      this.publish(w);

      const record: PoolAuditRecord = {
        kind: "mint",
        seq: this.seq,
        timestampMs: this.now(),
        actor: args.owner,
        tickLower: args.tickLower,
        tickUpper: args.tickUpper,
        liquidity: args.amount,
        amount0,
        amount1,
        positionLiquidityAfter: position.liquidity,
        before,
        after: snapshot(this.state),
      };
      return { result: { amount0, amount1 }, record };
    });

    this.emit(record);
    return result;
  }

  // ----- Burn -----
  burn(args: BurnArgs): BurnResult {
    const { result, record } = this.lock(() => {
      this.validateRange(args.tickLower, args.tickUpper);
      if (args.amount <= 0n) throw validationError("Amount must be positive");

      const held = this.positions.get(args.owner, args.tickLower, args.tickUpper);
      if (args.amount > held.liquidity) {
        throw new PoolError(
          "Insufficient liquidity",
          PoolErrorCode.InsufficientLiquidity
        );
      }

      const w = this.workingCopy();
      const before = snapshot(w.state);
      // fees since mint are not reconciled here
      const { amount0, amount1 } = amountsForLiquidity(
        w.state.sqrtPriceX96,
        args.tickLower,
        args.tickUpper,
        args.amount,
        false
      );

      const position = this.modifyPosition(
        w,
        args.owner,
        args.tickLower,
        args.tickUpper,
        -args.amount
      );

      this.settle({
        debits: [],
        credits: this.transfers(args.owner, amount0, amount1),
        shares: { kind: "burn", owner: args.owner, amount: args.amount },
      });
      this.publish(w);

      const record: PoolAuditRecord = {
        kind: "burn",
        seq: this.seq,
        timestampMs: this.now(),
        actor: args.owner,
        tickLower: args.tickLower,
        tickUpper: args.tickUpper,
        liquidity: args.amount,
        amount0,
        amount1,
        positionLiquidityAfter: position.liquidity,
        before,
        after: snapshot(this.state),
      };
      return { result: { amount0, amount1 }, record };
    });

    this.emit(record);
    return result;
  }

  // ----- Swap -----
  swap(args: SwapArgs): SwapResult {
    const recipient = args.recipient ?? args.sender;

    const { result, record } = this.lock(() => {
      // swaps never touch the tick ledger or positions
      const w: WorkingCopy = {
        state: { ...this.state },
        ticks: this.ticks,
        positions: this.positions,
      };
      const before = snapshot(w.state);
      const result = this.computeSwap(
        w.state,
        args.zeroForOne,
        args.amountSpecified,
        args.sqrtPriceLimitX96
      );

      const debits: Transfer[] = [];
      const credits: Transfer[] = [];
      for (const [token, amount] of [
        [this.token0, result.amount0],
        [this.token1, result.amount1],
      ] as const) {
        if (amount > 0n) debits.push({ account: args.sender, token, amount });
        if (amount < 0n) credits.push({ account: recipient, token, amount: -amount });
      }
      this.settle({ debits, credits });
      this.publish(w);

      const record: PoolAuditRecord = {
        kind: "swap",
        seq: this.seq,
        timestampMs: this.now(),
        actor: args.sender,
        recipient,
        zeroForOne: args.zeroForOne,
        amountSpecified: args.amountSpecified,
        amount0: result.amount0,
        amount1: result.amount1,
        feeAmount: result.feeAmount,
        crossedTicks: [...result.crossedTicks],
        before,
        after: snapshot(this.state),
      };
      return { result, record };
    });

    this.emit(record);
    return result;
  }

  /**
   * Runs the swap loop against a copy of the current state; nothing is
   * settled or committed.
   */
  quoteSwap(
    zeroForOne: boolean,
    amountSpecified: bigint,
    sqrtPriceLimitX96?: bigint
  ): SwapResult {
    return this.computeSwap(
      { ...this.state },
      zeroForOne,
      amountSpecified,
      sqrtPriceLimitX96
    );
  }

  /***************** Queries *****************/
  getPoolState(): PoolStateView {
    return {
      liquidity: this.state.liquidity,
      sqrtPriceX96: this.state.sqrtPriceX96,
      currentTick: this.state.tick,
    };
  }

  getPosition(owner: Address, tickLower: number, tickUpper: number): PositionView {
    const p = this.positions.get(owner, tickLower, tickUpper);
    return {
      liquidity: p.liquidity,
      tokensOwed0: p.tokensOwed0,
      tokensOwed1: p.tokensOwed1,
    };
  }

  getTick(tick: number): Readonly<TickInfo> {
    return this.ticks.get(tick);
  }

  initializedTicks(): readonly number[] {
    return this.ticks.initializedTicks();
  }

  balanceOf(owner: Address): bigint {
    return this.shares.balanceOf(owner);
  }

  /***************** Private internals *****************/
  private lock<T>(fn: () => T): T {
    if (this.locked) {
      throw new PoolError("Reentrant call", PoolErrorCode.Reentrancy);
    }
    this.locked = true;
    try {
      return fn();
    } finally {
      this.locked = false;
    }
  }

  private validateRange(lower: number, upper: number) {
    if (!Number.isInteger(lower) || !Number.isInteger(upper)) {
      throw validationError("Ticks must be integers");
    }
    if (!(lower < upper)) throw validationError("Invalid tick range");
    if (lower < MIN_TICK || upper > MAX_TICK) {
      throw validationError("Tick out of range");
    }
  }

  private workingCopy(): WorkingCopy {
    return {
      state: { ...this.state },
      ticks: this.ticks.clone(),
      positions: this.positions.clone(),
    };
  }

  private publish(w: WorkingCopy) {
    this.state = w.state;
    this.ticks = w.ticks;
    this.positions = w.positions;
    this.seq++;
  }

  private modifyPosition(
    w: WorkingCopy,
    owner: Address,
    lower: number,
    upper: number,
    liquidityDelta: bigint
  ): Readonly<PositionInfo> {
    w.ticks.recordLiquidityChange(lower, liquidityDelta, false);
    w.ticks.recordLiquidityChange(upper, liquidityDelta, true);

    // if inside active range, the change applies to active liquidity
    if (w.state.tick >= lower && w.state.tick < upper) {
      w.state.liquidity = addDelta(w.state.liquidity, liquidityDelta);
    }
    return w.positions.update(owner, lower, upper, liquidityDelta);
  }

  private transfers(account: Address, amount0: bigint, amount1: bigint): Transfer[] {
    const out: Transfer[] = [];
    if (amount0 > 0n) out.push({ account, token: this.token0, amount: amount0 });
    if (amount1 > 0n) out.push({ account, token: this.token1, amount: amount1 });
    return out;
  }

  /**
   * Debits, then the share movement, then credits. Any failure unwinds
   * whatever already ran, in reverse, before the error propagates.
   */
  private settle(s: Settlement) {
    const debited: Transfer[] = [];
    const credited: Transfer[] = [];
    let sharesMoved = false;
    try {
      for (const d of s.debits) {
        this.custody.debit(d.account, d.token, d.amount);
        debited.push(d);
      }
      if (s.shares?.kind === "mint") this.shares.mint(s.shares.owner, s.shares.amount);
      if (s.shares?.kind === "burn") this.shares.burn(s.shares.owner, s.shares.amount);
      sharesMoved = true;
      for (const c of s.credits) {
        this.custody.credit(c.account, c.token, c.amount);
        credited.push(c);
      }
    } catch (err) {
      for (const c of credited.reverse()) {
        this.custody.reclaim(c.account, c.token, c.amount);
      }
      if (sharesMoved && s.shares?.kind === "mint") this.shares.burn(s.shares.owner, s.shares.amount);
      if (sharesMoved && s.shares?.kind === "burn") this.shares.mint(s.shares.owner, s.shares.amount);
      for (const d of debited.reverse()) {
        this.custody.refund(d.account, d.token, d.amount);
      }
      this.logger?.debug?.("settlement unwound", err);
      throw err;
    }
  }

  /**
   * Swap loop over `state` (mutated in place). Each iteration either spends
   * the remaining amount or moves the price to the step target.
   */
  private computeSwap(
    state: PoolState,
    zeroForOne: boolean,
    amountSpecified: bigint,
    sqrtPriceLimitArg?: bigint
  ): SwapResult {
    if (amountSpecified === 0n) throw validationError("Amount cannot be zero");
    checkInt256(amountSpecified, "amountSpecified");

    const sqrtPriceLimitX96 =
      sqrtPriceLimitArg ??
      (zeroForOne ? MIN_SQRT_RATIO + 1n : MAX_SQRT_RATIO - 1n);
    const validLimit = zeroForOne
      ? sqrtPriceLimitX96 < state.sqrtPriceX96 && sqrtPriceLimitX96 > MIN_SQRT_RATIO
      : sqrtPriceLimitX96 > state.sqrtPriceX96 && sqrtPriceLimitX96 < MAX_SQRT_RATIO;
    if (!validLimit) throw validationError("Invalid price limit");

    const exactInput = amountSpecified > 0n;
    let amountSpecifiedRemaining = amountSpecified;
    let amountCalculated = 0n;
    let feeAmount = 0n;
    const crossedTicks: number[] = [];

    while (
      amountSpecifiedRemaining !== 0n &&
      state.sqrtPriceX96 !== sqrtPriceLimitX96
    ) {
      const sqrtPriceStartX96 = state.sqrtPriceX96;
      const next = this.ticks.findNextInitializedTick(
        state.tick,
        zeroForOne,
        this.tickSearchWindow
      );
      const sqrtPriceNextX96 = tickToSqrtPrice(next.tick);
      const sqrtPriceTargetX96 = (
        zeroForOne
          ? sqrtPriceNextX96 < sqrtPriceLimitX96
          : sqrtPriceNextX96 > sqrtPriceLimitX96
      )
        ? sqrtPriceLimitX96
        : sqrtPriceNextX96;

      const step = computeSwapStep(
        sqrtPriceStartX96,
        sqrtPriceTargetX96,
        state.liquidity,
        amountSpecifiedRemaining,
        this.feePips
      );
      state.sqrtPriceX96 = step.sqrtPriceNextX96;

      if (exactInput) {
        amountSpecifiedRemaining -= step.amountIn + step.feeAmount;
        amountCalculated -= step.amountOut;
      } else {
        amountSpecifiedRemaining += step.amountOut;
        amountCalculated += step.amountIn + step.feeAmount;
      }
      feeAmount += step.feeAmount;

      if (state.sqrtPriceX96 === sqrtPriceNextX96) {
        // crossing: moving down undoes what moving up would apply
        const { liquidityNet } = this.ticks.get(next.tick);
        state.liquidity = addDelta(
          state.liquidity,
          zeroForOne ? -liquidityNet : liquidityNet
        );
        if (next.found) crossedTicks.push(next.tick);
        state.tick = zeroForOne ? next.tick - 1 : next.tick;
      } else if (state.sqrtPriceX96 !== sqrtPriceStartX96) {
        state.tick = sqrtPriceToTick(state.sqrtPriceX96);
      }
    }

    const consumed = amountSpecified - amountSpecifiedRemaining;
    const [amount0, amount1] =
      zeroForOne === exactInput
        ? [consumed, amountCalculated]
        : [amountCalculated, consumed];

    return {
      amount0,
      amount1,
      sqrtPriceX96: state.sqrtPriceX96,
      tick: state.tick,
      liquidity: state.liquidity,
      feeAmount,
      crossedTicks,
    };
  }

  private emit(record: PoolAuditRecord) {
    this.logger?.debug?.(
      `[pool] ${record.kind} #${record.seq} by ${record.actor}: tick ${record.before.tick} -> ${record.after.tick}, liquidity ${record.before.liquidity} -> ${record.after.liquidity}`
    );
    for (const listener of this.listeners) {
      try {
        listener.onPoolEvent(record);
      } catch (err) {
        this.logger?.error?.(
          `⚠️  Pool event listener failed on ${record.kind} #${record.seq}:`,
          err
        );
      }
    }
  }

  /***************** Inspection helpers *****************/
  stateToJSON() {
    const ticks = this.ticks.entries().map(([index, t]) => ({
      index,
      liquidityGross: t.liquidityGross.toString(),
      liquidityNet: t.liquidityNet.toString(),
      initialized: t.initialized,
    }));
    const positions = this.positions.list().map(({ key, info }) => ({
      id: key.id(),
      liquidity: info.liquidity.toString(),
      owed0: info.tokensOwed0.toString(),
      owed1: info.tokensOwed1.toString(),
    }));
    return {
      token0: this.token0,
      token1: this.token1,
      feePips: this.feePips,
      price: sqrtPriceX96ToPrice(this.state.sqrtPriceX96).toSignificantDigits(18).toString(),
      sqrtPriceX96: this.state.sqrtPriceX96.toString(),
      currentTick: this.state.tick,
      liquidity: this.state.liquidity.toString(),
      feeGrowthGlobal0X128: this.state.feeGrowthGlobal0X128.toString(),
      feeGrowthGlobal1X128: this.state.feeGrowthGlobal1X128.toString(),
      ticks,
      positions,
    };
  }
}

export default PoolEngine;
