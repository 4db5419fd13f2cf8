/**
 * Shared machinery of source and destination escrows.
 *
 * An escrow is a clone bound to one Immutables digest. Every mutating call
 * re-supplies the Immutables, runs under the escrow's lock, validates fully,
 * then commits all of its transfers in a single ledger batch before the
 * status changes and the journal entry is appended.
 */

import type { Address, Hex } from "viem";
import type { AuthorizationPolicy } from "../auth/policies.ts";
import type { ChainContext } from "../chain/context.ts";
import { ESCROW_LOCK_PREFIX, NATIVE_ASSET } from "../config/constants.ts";
import { Journal } from "../state/journal.ts";
import type { EscrowJournalEntry } from "../types/events.ts";
import {
  type CallContext,
  EscrowRole,
  EscrowStatus,
  type Immutables,
  type PublicActionKind,
  TimelockStage,
} from "../types/index.ts";
import { EscrowError, EscrowErrorType } from "../utils/escrow-errors.ts";
import { hashImmutables } from "../utils/immutables.ts";
import { Logger, escrowLogger } from "../utils/logger.ts";
import { validateSecret } from "../utils/secrets.ts";
import {
  type EscrowPhase,
  currentPhase,
  formatDuration,
  rescueInstant,
  unlockInstant,
} from "../utils/timelocks.ts";

export interface EscrowOptions {
  address: Address;
  immutables: Immutables; // deployedAt already stamped into timelocks
  chain: ChainContext;
  rescueDelay: bigint;
  policy: AuthorizationPolicy;
  onStatusChange?: (escrow: Address, status: EscrowStatus) => Promise<void>;
  logger?: Logger;
}

export interface EscrowBalances {
  token: bigint;
  native: bigint;
}

interface Payout {
  asset: Address;
  to: Address;
  amount: bigint;
}

export abstract class BaseEscrow {
  abstract readonly role: EscrowRole;

  readonly address: Address;
  readonly digest: Hex;
  readonly journal: Journal<EscrowJournalEntry>;

  protected immutables: Immutables;
  protected chain: ChainContext;
  protected rescueDelay: bigint;
  protected policy: AuthorizationPolicy;
  protected logger: Logger;

  private statusValue = EscrowStatus.Active;
  private onStatusChange?: (escrow: Address, status: EscrowStatus) => Promise<void>;

  constructor(options: EscrowOptions) {
    this.address = options.address;
    this.immutables = { ...options.immutables };
    this.digest = hashImmutables(options.immutables);
    this.chain = options.chain;
    this.rescueDelay = options.rescueDelay;
    this.policy = options.policy;
    this.onStatusChange = options.onStatusChange;
    this.logger = options.logger ?? escrowLogger;
    this.journal = new Journal<EscrowJournalEntry>(`escrow:${options.address}`, this.logger);
  }

  get status(): EscrowStatus {
    return this.statusValue;
  }

  get hashlock(): Hex {
    return this.immutables.hashlock;
  }

  getImmutables(): Immutables {
    return { ...this.immutables };
  }

  phase(now: bigint = this.chain.clock.now()): EscrowPhase {
    return currentPhase(this.immutables.timelocks, this.role, now);
  }

  async balances(): Promise<EscrowBalances> {
    const [token, native] = await Promise.all([
      this.chain.ledger.balanceOf(this.immutables.token, this.address),
      this.chain.ledger.balanceOf(NATIVE_ASSET, this.address),
    ]);
    return { token, native };
  }

  /**
   * Recover any asset from the escrow to the taker once the rescue delay has
   * passed. Works in every status and may be repeated.
   */
  rescueFunds(
    ctx: CallContext,
    asset: Address,
    amount: bigint,
    immutables: Immutables
  ): Promise<void> {
    return this.exclusive(async () => {
      this.assertImmutables(immutables);
      this.assertTaker(ctx);
      const opensAt = rescueInstant(this.immutables.timelocks, this.rescueDelay);
      const now = this.chain.clock.now();
      if (now < opensAt) {
        throw new EscrowError(
          EscrowErrorType.INVALID_TIME,
          `rescue opens in ${formatDuration(opensAt - now)}`,
          { opensAt, now }
        );
      }

      await this.commit([{ asset, to: this.immutables.taker, amount }]);
      this.journal.append({
        type: "FundsRescued",
        escrow: this.address,
        asset,
        amount,
        timestamp: now,
      });
      this.logger.logEscrowEvent(this.address, "FundsRescued", { asset, amount });
    });
  }

  /**
   * Serialize a mutating operation behind every other one on this escrow
   */
  protected exclusive<T>(fn: () => Promise<T>): Promise<T> {
    return this.chain.locks.withLock(`${ESCROW_LOCK_PREFIX}:${this.address.toLowerCase()}`, fn);
  }

  protected assertImmutables(immutables: Immutables): void {
    let digest: Hex;
    try {
      digest = hashImmutables(immutables);
    } catch (error) {
      throw new EscrowError(
        EscrowErrorType.INVALID_IMMUTABLES,
        error instanceof Error ? error.message : String(error)
      );
    }
    if (digest !== this.digest) {
      throw new EscrowError(EscrowErrorType.INVALID_IMMUTABLES, undefined, {
        expected: this.digest,
        received: digest,
      });
    }
  }

  protected assertActive(): void {
    if (this.statusValue !== EscrowStatus.Active) {
      throw new EscrowError(EscrowErrorType.INVALID_STATE, this.statusValue);
    }
  }

  protected assertTaker(ctx: CallContext): void {
    if (ctx.caller.toLowerCase() !== this.immutables.taker.toLowerCase()) {
      throw new EscrowError(EscrowErrorType.INVALID_CALLER, `${ctx.caller} is not the taker`);
    }
  }

  protected async assertAuthorized(ctx: CallContext, action: PublicActionKind): Promise<void> {
    const authorized = await this.policy.isAuthorized({
      chainId: this.chain.chainId,
      escrow: this.address,
      orderHash: this.immutables.orderHash,
      caller: ctx.caller,
      action,
      endorsement: ctx.endorsement,
    });
    if (!authorized) {
      throw new EscrowError(
        EscrowErrorType.INVALID_CALLER,
        `${ctx.caller} rejected by ${this.policy.name} for ${action}`
      );
    }
  }

  /**
   * Require `now` to be inside [from, until); `until` omitted means open-ended
   */
  protected assertWindow(from: TimelockStage, until?: TimelockStage): bigint {
    const now = this.chain.clock.now();
    const opensAt = unlockInstant(this.immutables.timelocks, from);
    if (now < opensAt) {
      throw new EscrowError(
        EscrowErrorType.INVALID_TIME,
        `${TimelockStage[from]} opens in ${formatDuration(opensAt - now)}`,
        { opensAt, now }
      );
    }
    if (until !== undefined) {
      const closesAt = unlockInstant(this.immutables.timelocks, until);
      if (now >= closesAt) {
        throw new EscrowError(
          EscrowErrorType.INVALID_TIME,
          `window closed at ${closesAt} (${TimelockStage[until]})`,
          { closesAt, now }
        );
      }
    }
    return now;
  }

  protected assertSecret(secret: Hex): void {
    if (!validateSecret(secret, this.immutables.hashlock)) {
      throw new EscrowError(EscrowErrorType.INVALID_SECRET);
    }
  }

  /**
   * Pay out the amount and the safety deposit, mark the escrow withdrawn and
   * publish the secret before the registry mirror is written
   */
  protected async settleWithdrawal(
    ctx: CallContext,
    secret: Hex,
    recipient: Address,
    now: bigint
  ): Promise<void> {
    await this.commit([
      { asset: this.immutables.token, to: recipient, amount: this.immutables.amount },
      { asset: NATIVE_ASSET, to: ctx.caller, amount: this.immutables.safetyDeposit },
    ]);
    this.statusValue = EscrowStatus.Withdrawn;
    this.journal.append({
      type: "EscrowWithdrawal",
      escrow: this.address,
      secret,
      recipient,
      caller: ctx.caller,
      timestamp: now,
    });
    this.logger.logEscrowEvent(this.address, "Withdrawn", {
      role: this.role,
      recipient,
      caller: ctx.caller,
    });
    await this.mirrorStatus(EscrowStatus.Withdrawn);
  }

  /**
   * Return the amount, pay the safety deposit, then mark the escrow cancelled
   */
  protected async settleCancellation(
    ctx: CallContext,
    recipient: Address,
    now: bigint
  ): Promise<void> {
    await this.commit([
      { asset: this.immutables.token, to: recipient, amount: this.immutables.amount },
      { asset: NATIVE_ASSET, to: ctx.caller, amount: this.immutables.safetyDeposit },
    ]);
    this.statusValue = EscrowStatus.Cancelled;
    this.journal.append({
      type: "EscrowCancelled",
      escrow: this.address,
      recipient,
      caller: ctx.caller,
      timestamp: now,
    });
    this.logger.logEscrowEvent(this.address, "Cancelled", {
      role: this.role,
      recipient,
      caller: ctx.caller,
    });
    await this.mirrorStatus(EscrowStatus.Cancelled);
  }

  private async commit(payouts: Payout[]): Promise<void> {
    const batch = this.chain.ledger.atomic();
    for (const payout of payouts) {
      batch.transfer(payout.asset, this.address, payout.to, payout.amount);
    }
    const result = await batch.commit();
    if (!result.ok) {
      this.logger.logEscrowEvent(this.address, "TransferFailed", { reason: result.reason });
      throw new EscrowError(EscrowErrorType.TRANSFER_FAILED, result.reason);
    }
  }

  /**
   * Write the status to the registry. The escrow has already settled on the
   * ledger, so a failed write is logged and the call still succeeds.
   */
  private async mirrorStatus(status: EscrowStatus): Promise<void> {
    if (!this.onStatusChange) return;
    try {
      await this.onStatusChange(this.address, status);
    } catch (error) {
      this.logger.error(`Failed to record status ${status} for ${this.address}`, error);
    }
  }
}
