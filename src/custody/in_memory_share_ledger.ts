import { PoolError, PoolErrorCode, validationError } from "../errors";
import type { Address, ShareLedger } from "../types";

// LP shares, one share per unit of liquidity
export class InMemoryShareLedger implements ShareLedger {
  private balances = new Map<Address, bigint>();
  private supply = 0n;

  mint(owner: Address, amount: bigint): void {
    if (amount <= 0n) throw validationError("Amount must be positive");
    this.balances.set(owner, this.balanceOf(owner) + amount);
    this.supply += amount;
  }

  burn(owner: Address, amount: bigint): void {
    if (amount <= 0n) throw validationError("Amount must be positive");
    const balance = this.balanceOf(owner);
    if (balance < amount) {
      throw new PoolError(
        "Insufficient liquidity",
        PoolErrorCode.InsufficientLiquidity
      );
    }
    if (balance === amount) this.balances.delete(owner);
    else this.balances.set(owner, balance - amount);
    this.supply -= amount;
  }

  balanceOf(owner: Address): bigint {
    return this.balances.get(owner) ?? 0n;
  }

  totalSupply(): bigint {
    return this.supply;
  }
}
