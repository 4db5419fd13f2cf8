/**
 * SecretRelay - carries a secret revealed on the destination chain back to
 * the source escrow.
 *
 * The maker reveals the secret when withdrawing on the destination side; the
 * relay watches that escrow's journal and uses the secret to withdraw the
 * source escrow for the resolver.
 */

import type { Hex } from "viem";
import type { EscrowDst } from "../escrow/escrow-dst.ts";
import type { EscrowSrc } from "../escrow/escrow-src.ts";
import type { EscrowJournalEntry, Sequenced } from "../types/events.ts";
import type { CallContext, Immutables } from "../types/index.ts";
import { EscrowErrorHandler } from "../utils/escrow-errors.ts";
import { Logger, relayLogger } from "../utils/logger.ts";
import { validateSecret } from "../utils/secrets.ts";

export type RelayStatus = "IDLE" | "WATCHING" | "COMPLETED" | "FAILED" | "STOPPED";

export type RelayMode = "private" | "public";

export interface RelayState {
  status: RelayStatus;
  secret?: Hex;
  error?: string;
}

export interface SecretRelayOptions {
  source: EscrowSrc;
  sourceImmutables: Immutables;
  destination: EscrowDst;
  ctx: CallContext; // identity used on the source chain
  mode?: RelayMode; // private: ctx is the taker; public: ctx is a keeper
  logger?: Logger;
}

export class SecretRelay {
  private state: RelayState = { status: "IDLE" };
  private unsubscribe?: () => void;
  private resolveSettled: (state: RelayState) => void = () => {};
  private settled: Promise<RelayState>;
  private logger: Logger;

  constructor(private options: SecretRelayOptions) {
    this.logger = options.logger ?? relayLogger;
    this.settled = new Promise((resolve) => {
      this.resolveSettled = resolve;
    });
  }

  get status(): RelayState {
    return { ...this.state };
  }

  /**
   * Start watching the destination journal, replaying what is already there
   */
  start(): void {
    if (this.state.status !== "IDLE") return;
    this.state = { status: "WATCHING" };
    this.logger.info(
      `Watching ${this.options.destination.address} for ${this.options.source.address}`
    );
    const unsubscribe = this.options.destination.journal.subscribe((record) =>
      this.handle(record)
    );
    // Replay may already have settled the relay
    if (this.state.status === "WATCHING") {
      this.unsubscribe = unsubscribe;
    } else {
      unsubscribe();
    }
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    if (this.state.status === "WATCHING") {
      this.finish({ status: "STOPPED" });
    }
  }

  /**
   * Resolves once the relay completed, failed or was stopped
   */
  whenSettled(): Promise<RelayState> {
    return this.settled;
  }

  private async handle(record: Sequenced<EscrowJournalEntry>): Promise<void> {
    const { entry } = record;
    if (entry.type !== "EscrowWithdrawal" || this.state.status !== "WATCHING") return;

    const { source, sourceImmutables, ctx } = this.options;
    if (!validateSecret(entry.secret, sourceImmutables.hashlock)) {
      this.logger.warn(`Revealed secret does not open ${source.address}`);
      this.finish({ status: "FAILED", secret: entry.secret, error: "secret does not match hashlock" });
      return;
    }

    this.logger.info(`Secret revealed at sequence ${record.sequence}, withdrawing source`);
    try {
      if (this.options.mode === "public") {
        await source.publicWithdraw(ctx, entry.secret, sourceImmutables);
      } else {
        await source.withdraw(ctx, entry.secret, sourceImmutables);
      }
      this.finish({ status: "COMPLETED", secret: entry.secret });
    } catch (error) {
      const escrowError = EscrowErrorHandler.parseError(error);
      this.logger.error(`Source withdrawal failed: ${escrowError.message}`);
      this.finish({ status: "FAILED", secret: entry.secret, error: escrowError.message });
    }
  }

  private finish(state: RelayState): void {
    this.state = state;
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    this.resolveSettled({ ...state });
  }
}
