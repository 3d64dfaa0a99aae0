import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryCustody } from "../src/custody/in_memory_custody";
import { InMemoryShareLedger } from "../src/custody/in_memory_share_ledger";
import { PoolError, PoolErrorCode } from "../src/errors";

const codeOf = (fn: () => void) => {
  try {
    fn();
  } catch (e) {
    return e instanceof PoolError ? e.errorCode : "unexpected";
  }
  return "none";
};

describe("InMemoryCustody", () => {
  let custody: InMemoryCustody;

  beforeEach(() => {
    custody = new InMemoryCustody("pool");
    custody.mintTo("alice", "USDC", 1_000n);
  });

  it("should move approved funds into the pool", () => {
    custody.approve("alice", "USDC", 600n);
    custody.debit("alice", "USDC", 400n);
    expect(custody.balanceOf("alice", "USDC")).toBe(600n);
    expect(custody.balanceOf("pool", "USDC")).toBe(400n);
    expect(custody.allowance("alice", "USDC")).toBe(200n);
  });

  it("should check the allowance before the balance", () => {
    expect(codeOf(() => custody.debit("alice", "USDC", 1n))).toBe(PoolErrorCode.InsufficientAllowance);
    custody.approve("alice", "USDC", 5_000n);
    expect(codeOf(() => custody.debit("alice", "USDC", 1_001n))).toBe(PoolErrorCode.InsufficientFunds);
    expect(custody.balanceOf("alice", "USDC")).toBe(1_000n);
  });

  it("should pay out only what the pool holds", () => {
    custody.approve("alice", "USDC", 1_000n);
    custody.debit("alice", "USDC", 300n);
    custody.credit("bob", "USDC", 250n);
    expect(custody.balanceOf("bob", "USDC")).toBe(250n);
    expect(custody.balanceOf("pool", "USDC")).toBe(50n);
    expect(codeOf(() => custody.credit("bob", "USDC", 51n))).toBe(PoolErrorCode.InsufficientFunds);
  });

  it("should ignore zero transfers", () => {
    custody.debit("alice", "USDC", 0n);
    custody.credit("alice", "USDC", 0n);
    expect(custody.balanceOf("alice", "USDC")).toBe(1_000n);
  });

  it("should apply a debit on top of changes made by the hook", () => {
    custody.approve("alice", "USDC", 100n);
    custody.onTransfer = (direction, account, token) => {
      if (direction === "debit") custody.approve(account, token, 500n);
    };
    custody.debit("alice", "USDC", 100n);
    expect(custody.allowance("alice", "USDC")).toBe(400n);
    expect(custody.balanceOf("alice", "USDC")).toBe(900n);
  });

  it("should fail a debit whose funds the hook moved away", () => {
    custody.approve("alice", "USDC", 2_000n);
    custody.onTransfer = () => {
      custody.onTransfer = undefined;
      custody.debit("alice", "USDC", 600n);
    };
    expect(codeOf(() => custody.debit("alice", "USDC", 500n))).toBe(PoolErrorCode.InsufficientFunds);
    expect(custody.balanceOf("alice", "USDC")).toBe(400n);
    expect(custody.allowance("alice", "USDC")).toBe(1_400n);
  });

  it("should undo a debit and a credit without calling the hook", () => {
    const calls: string[] = [];
    custody.approve("alice", "USDC", 300n);
    custody.debit("alice", "USDC", 300n);
    custody.credit("bob", "USDC", 100n);
    custody.onTransfer = (direction) => {
      calls.push(direction);
    };
    custody.reclaim("bob", "USDC", 100n);
    custody.refund("alice", "USDC", 300n);
    expect(calls).toEqual([]);
    expect(custody.balanceOf("alice", "USDC")).toBe(1_000n);
    expect(custody.allowance("alice", "USDC")).toBe(300n);
    expect(custody.balanceOf("bob", "USDC")).toBe(0n);
    expect(custody.balanceOf("pool", "USDC")).toBe(0n);
  });

  it("should call the transfer hook before moving funds", () => {
    const calls: string[] = [];
    custody.onTransfer = (direction, account, token, amount) => {
      calls.push(`${direction} ${account} ${token} ${amount} ${custody.balanceOf(account, token)}`);
    };
    custody.approve("alice", "USDC", 100n);
    custody.debit("alice", "USDC", 100n);
    custody.credit("alice", "USDC", 40n);
    expect(calls).toEqual(["debit alice USDC 100 1000", "credit alice USDC 40 900"]);
  });
});

describe("InMemoryShareLedger", () => {
  it("should track balances and supply", () => {
    const ledger = new InMemoryShareLedger();
    ledger.mint("alice", 10n);
    ledger.mint("bob", 5n);
    ledger.burn("alice", 4n);
    expect(ledger.balanceOf("alice")).toBe(6n);
    expect(ledger.totalSupply()).toBe(11n);
  });

  it("should refuse to burn more than the balance", () => {
    const ledger = new InMemoryShareLedger();
    ledger.mint("alice", 1n);
    expect(codeOf(() => ledger.burn("alice", 2n))).toBe(PoolErrorCode.InsufficientLiquidity);
    expect(ledger.totalSupply()).toBe(1n);
  });
});
