import { PoolError, PoolErrorCode, validationError } from "../errors";
import type { Address, Custody } from "../types";

export type TransferDirection = "debit" | "credit";

export type TransferHook = (
  direction: TransferDirection,
  account: Address,
  token: Address,
  amount: bigint
) => void;

/**
 * Token balances and allowances held in memory. `debit` pulls from an
 * account into the pool's own balance, `credit` pays out of it.
 */
export class InMemoryCustody implements Custody {
  readonly pool: Address;
  onTransfer?: TransferHook;

  private balances = new Map<string, bigint>();
  private allowances = new Map<string, bigint>();

  constructor(pool: Address = "pool", onTransfer?: TransferHook) {
    this.pool = pool;
    this.onTransfer = onTransfer;
  }

  private static key(account: Address, token: Address) {
    return `${account}|${token}`;
  }

  balanceOf(account: Address, token: Address): bigint {
    return this.balances.get(InMemoryCustody.key(account, token)) ?? 0n;
  }

  allowance(account: Address, token: Address): bigint {
    return this.allowances.get(InMemoryCustody.key(account, token)) ?? 0n;
  }

  mintTo(account: Address, token: Address, amount: bigint) {
    if (amount < 0n) throw validationError("Amount must be positive");
    this.add(account, token, amount);
  }

  approve(account: Address, token: Address, amount: bigint) {
    if (amount < 0n) throw validationError("Amount must be positive");
    this.allowances.set(InMemoryCustody.key(account, token), amount);
  }

  debit(account: Address, token: Address, amount: bigint): void {
    if (amount <= 0n) return;
    this.checkDebit(account, token, amount);
    this.onTransfer?.("debit", account, token, amount);
    // the hook may have moved funds or changed the allowance
    this.checkDebit(account, token, amount);
    const k = InMemoryCustody.key(account, token);
    this.allowances.set(k, this.allowance(account, token) - amount);
    this.add(account, token, -amount);
    this.add(this.pool, token, amount);
  }

  credit(account: Address, token: Address, amount: bigint): void {
    if (amount <= 0n) return;
    this.checkReserve(token, amount);
    this.onTransfer?.("credit", account, token, amount);
    this.checkReserve(token, amount);
    this.add(this.pool, token, -amount);
    this.add(account, token, amount);
  }

  /** Returns a debit taken earlier, allowance included. No hook. */
  refund(account: Address, token: Address, amount: bigint): void {
    if (amount <= 0n) return;
    const k = InMemoryCustody.key(account, token);
    this.allowances.set(k, this.allowance(account, token) + amount);
    this.add(this.pool, token, -amount);
    this.add(account, token, amount);
  }

  /** Takes back a credit paid earlier. No hook. */
  reclaim(account: Address, token: Address, amount: bigint): void {
    if (amount <= 0n) return;
    this.add(account, token, -amount);
    this.add(this.pool, token, amount);
  }

  private checkDebit(account: Address, token: Address, amount: bigint) {
    const allowed = this.allowance(account, token);
    if (allowed < amount) {
      throw new PoolError(
        `Insufficient allowance: ${account} approved ${allowed} of ${token}, needs ${amount}`,
        PoolErrorCode.InsufficientAllowance
      );
    }
    const balance = this.balanceOf(account, token);
    if (balance < amount) {
      throw new PoolError(
        `Insufficient funds: ${account} holds ${balance} of ${token}, needs ${amount}`,
        PoolErrorCode.InsufficientFunds
      );
    }
  }

  private checkReserve(token: Address, amount: bigint) {
    const reserve = this.balanceOf(this.pool, token);
    if (reserve < amount) {
      throw new PoolError(
        `Insufficient funds: pool holds ${reserve} of ${token}, needs ${amount}`,
        PoolErrorCode.InsufficientFunds
      );
    }
  }

  private add(account: Address, token: Address, delta: bigint) {
    const k = InMemoryCustody.key(account, token);
    this.balances.set(k, (this.balances.get(k) ?? 0n) + delta);
  }
}
