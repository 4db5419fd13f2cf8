/**
 * Value-transfer primitives.
 *
 * The escrow engine only talks to `AssetLedger`; `InMemoryLedger` backs the
 * local node and the tests. A batch is all-or-nothing: if any transfer in it
 * would overdraw a balance or an allowance, nothing is applied.
 */

import type { Address } from "viem";

export type LedgerCommitResult =
  | { ok: true }
  | { ok: false; reason: string };

export interface LedgerBatch {
  transfer(asset: Address, from: Address, to: Address, amount: bigint): LedgerBatch;
  transferFrom(
    asset: Address,
    spender: Address,
    from: Address,
    to: Address,
    amount: bigint
  ): LedgerBatch;
  commit(): Promise<LedgerCommitResult>;
}

export interface AssetLedger {
  balanceOf(asset: Address, holder: Address): Promise<bigint>;
  allowance(asset: Address, owner: Address, spender: Address): Promise<bigint>;
  atomic(): LedgerBatch;
}

interface TransferOperation {
  asset: Address;
  from: Address;
  to: Address;
  amount: bigint;
  spender?: Address;
}

function balanceKey(asset: Address, holder: Address): string {
  return `${asset.toLowerCase()}:${holder.toLowerCase()}`;
}

function allowanceKey(asset: Address, owner: Address, spender: Address): string {
  return `${asset.toLowerCase()}:${owner.toLowerCase()}:${spender.toLowerCase()}`;
}

class InMemoryLedgerBatch implements LedgerBatch {
  private operations: TransferOperation[] = [];

  constructor(private ledger: InMemoryLedger) {}

  transfer(asset: Address, from: Address, to: Address, amount: bigint): LedgerBatch {
    this.operations.push({ asset, from, to, amount });
    return this;
  }

  transferFrom(
    asset: Address,
    spender: Address,
    from: Address,
    to: Address,
    amount: bigint
  ): LedgerBatch {
    this.operations.push({ asset, from, to, amount, spender });
    return this;
  }

  commit(): Promise<LedgerCommitResult> {
    return Promise.resolve(this.ledger.applyOperations(this.operations));
  }
}

export class InMemoryLedger implements AssetLedger {
  private balances = new Map<string, bigint>();
  private allowances = new Map<string, bigint>();

  balanceOf(asset: Address, holder: Address): Promise<bigint> {
    return Promise.resolve(this.balances.get(balanceKey(asset, holder)) ?? 0n);
  }

  allowance(asset: Address, owner: Address, spender: Address): Promise<bigint> {
    return Promise.resolve(this.allowances.get(allowanceKey(asset, owner, spender)) ?? 0n);
  }

  atomic(): LedgerBatch {
    return new InMemoryLedgerBatch(this);
  }

  /**
   * Credit new units to a holder
   */
  mint(asset: Address, to: Address, amount: bigint): void {
    const key = balanceKey(asset, to);
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
  }

  approve(asset: Address, owner: Address, spender: Address, amount: bigint): void {
    this.allowances.set(allowanceKey(asset, owner, spender), amount);
  }

  /**
   * Single transfer outside any escrow flow (e.g. pre-funding an address)
   */
  transfer(asset: Address, from: Address, to: Address, amount: bigint): Promise<LedgerCommitResult> {
    return this.atomic().transfer(asset, from, to, amount).commit();
  }

  /** @internal applied by InMemoryLedgerBatch.commit */
  applyOperations(operations: readonly TransferOperation[]): LedgerCommitResult {
    const stagedBalances = new Map<string, bigint>();
    const stagedAllowances = new Map<string, bigint>();
    const readBalance = (key: string) => stagedBalances.get(key) ?? this.balances.get(key) ?? 0n;
    const readAllowance = (key: string) =>
      stagedAllowances.get(key) ?? this.allowances.get(key) ?? 0n;

    for (const op of operations) {
      if (op.amount < 0n) {
        return { ok: false, reason: `negative amount ${op.amount}` };
      }
      if (op.amount === 0n) continue;

      if (op.spender) {
        const key = allowanceKey(op.asset, op.from, op.spender);
        const allowed = readAllowance(key);
        if (allowed < op.amount) {
          return {
            ok: false,
            reason: `insufficient allowance: ${op.spender} may spend ${allowed} of ${op.asset} from ${op.from}, needs ${op.amount}`,
          };
        }
        stagedAllowances.set(key, allowed - op.amount);
      }

      const fromKey = balanceKey(op.asset, op.from);
      const available = readBalance(fromKey);
      if (available < op.amount) {
        return {
          ok: false,
          reason: `insufficient balance: ${op.from} holds ${available} of ${op.asset}, needs ${op.amount}`,
        };
      }
      stagedBalances.set(fromKey, available - op.amount);

      const toKey = balanceKey(op.asset, op.to);
      stagedBalances.set(toKey, readBalance(toKey) + op.amount);
    }

    for (const [key, value] of stagedBalances) this.balances.set(key, value);
    for (const [key, value] of stagedAllowances) this.allowances.set(key, value);
    return { ok: true };
  }
}
