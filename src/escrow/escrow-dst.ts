import type { Hex } from "viem";
import {
  type CallContext,
  EscrowRole,
  type Immutables,
  TimelockStage,
} from "../types/index.ts";
import { BaseEscrow } from "./base-escrow.ts";

/**
 * Destination-chain escrow: holds the resolver's tokens for the maker.
 *
 * Withdrawal pays the maker (revealing the secret), cancellation refunds the
 * taker. There is no public cancellation on this side.
 */
export class EscrowDst extends BaseEscrow {
  readonly role = EscrowRole.Destination;

  withdraw(ctx: CallContext, secret: Hex, immutables: Immutables): Promise<void> {
    return this.exclusive(async () => {
      this.assertImmutables(immutables);
      this.assertActive();
      this.assertTaker(ctx);
      const now = this.assertWindow(TimelockStage.DstWithdrawal, TimelockStage.DstCancellation);
      this.assertSecret(secret);
      await this.settleWithdrawal(ctx, secret, this.immutables.maker, now);
    });
  }

  publicWithdraw(ctx: CallContext, secret: Hex, immutables: Immutables): Promise<void> {
    return this.exclusive(async () => {
      this.assertImmutables(immutables);
      this.assertActive();
      await this.assertAuthorized(ctx, "DST_PUBLIC_WITHDRAW");
      const now = this.assertWindow(
        TimelockStage.DstPublicWithdrawal,
        TimelockStage.DstCancellation
      );
      this.assertSecret(secret);
      await this.settleWithdrawal(ctx, secret, this.immutables.maker, now);
    });
  }

  cancel(ctx: CallContext, immutables: Immutables): Promise<void> {
    return this.exclusive(async () => {
      this.assertImmutables(immutables);
      this.assertActive();
      this.assertTaker(ctx);
      const now = this.assertWindow(TimelockStage.DstCancellation);
      await this.settleCancellation(ctx, this.immutables.taker, now);
    });
  }
}
