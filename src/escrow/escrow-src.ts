import type { Address, Hex } from "viem";
import {
  type CallContext,
  EscrowRole,
  type Immutables,
  TimelockStage,
} from "../types/index.ts";
import { BaseEscrow } from "./base-escrow.ts";

/**
 * Source-chain escrow: holds the maker's tokens for the resolver (taker).
 *
 * Withdrawal pays the taker, cancellation returns the tokens to the maker.
 */
export class EscrowSrc extends BaseEscrow {
  readonly role = EscrowRole.Source;

  withdraw(ctx: CallContext, secret: Hex, immutables: Immutables): Promise<void> {
    return this.withdrawTo(ctx, secret, immutables.taker, immutables);
  }

  /**
   * Private withdrawal paying the amount to `target` instead of the taker
   */
  withdrawTo(
    ctx: CallContext,
    secret: Hex,
    target: Address,
    immutables: Immutables
  ): Promise<void> {
    return this.exclusive(async () => {
      this.assertImmutables(immutables);
      this.assertActive();
      this.assertTaker(ctx);
      const now = this.assertWindow(TimelockStage.SrcWithdrawal, TimelockStage.SrcCancellation);
      this.assertSecret(secret);
      await this.settleWithdrawal(ctx, secret, target, now);
    });
  }

  publicWithdraw(ctx: CallContext, secret: Hex, immutables: Immutables): Promise<void> {
    return this.exclusive(async () => {
      this.assertImmutables(immutables);
      this.assertActive();
      await this.assertAuthorized(ctx, "SRC_PUBLIC_WITHDRAW");
      const now = this.assertWindow(
        TimelockStage.SrcPublicWithdrawal,
        TimelockStage.SrcCancellation
      );
      this.assertSecret(secret);
      await this.settleWithdrawal(ctx, secret, this.immutables.taker, now);
    });
  }

  cancel(ctx: CallContext, immutables: Immutables): Promise<void> {
    return this.exclusive(async () => {
      this.assertImmutables(immutables);
      this.assertActive();
      this.assertTaker(ctx);
      const now = this.assertWindow(TimelockStage.SrcCancellation);
      await this.settleCancellation(ctx, this.immutables.maker, now);
    });
  }

  publicCancel(ctx: CallContext, immutables: Immutables): Promise<void> {
    return this.exclusive(async () => {
      this.assertImmutables(immutables);
      this.assertActive();
      await this.assertAuthorized(ctx, "SRC_PUBLIC_CANCEL");
      const now = this.assertWindow(TimelockStage.SrcPublicCancellation);
      await this.settleCancellation(ctx, this.immutables.maker, now);
    });
  }
}
